import { ConfigError, describeError } from './errors.js';
import { USAGE, parseConfig } from './config.js';
import type { ParsedArgs } from './config.js';
import { runCheck } from './runCheck.js';
import type { RunOverrides } from './runCheck.js';

/**
 * Runs the command line once and returns the process exit code.
 * 1. Parses flags and environment into a validated configuration.
 * 2. Runs the check, which resets the output files and reads the input.
 * 3. Returns non-zero only when the run could not start.
 */
export async function runCli(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
  overrides: RunOverrides = {}
): Promise<number> {
  let parsed: ParsedArgs;
  try {
    parsed = parseConfig(argv, env);
  } catch (error) {
    if (error instanceof ConfigError) {
      process.stderr.write(`Error: ${error.message}\n\n${USAGE}`);
      return 1;
    }
    throw error;
  }

  if (parsed.help) {
    process.stdout.write(USAGE);
    return 0;
  }

  try {
    await runCheck(parsed.config, overrides);
  } catch (error) {
    process.stderr.write(`Error: ${describeError(error)}\n`);
    return 1;
  }
  return 0;
}
