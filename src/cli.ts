#!/usr/bin/env node
/**
 * @module Main
 * This is the main entry point for the livecheck CLI application.
 * It reads a list of domains or URLs, classifies each as ACTIVE or INACTIVE,
 * and appends it to `<output_file>_ACTIVE.txt` or `<output_file>_INACTIVE.txt`.
 */

import { describeError } from './lib/errors.js';
import { runCli } from './lib/runCli.js';

// Self-executing async function to handle conditional dotenv loading.
(async () => {
  // Conditionally load .env file in non-production environments
  if (process.env.NODE_ENV !== 'production') {
    try {
      await import('dotenv/config');
    } catch (error) {
      // dotenv is a dev dependency and may be absent from an installed build
      if (process.env.LIVECHECK_DEBUG) {
        process.stderr.write(`dotenv not loaded: ${describeError(error)}\n`);
      }
    }
  }

  process.exitCode = await runCli(process.argv.slice(2));
})().catch((error: unknown) => {
  process.stderr.write(`Fatal: ${describeError(error)}\n`);
  process.exitCode = 1;
});
