import * as fs from 'fs/promises';
import { VERDICTS } from './types.js';
import type { ExcludeFilter, Verdict } from './types.js';

/** `<prefix>_ACTIVE.txt` or `<prefix>_INACTIVE.txt`. */
export function outputPathFor(prefix: string, verdict: Verdict): string {
  return `${prefix}_${verdict}.txt`;
}

/**
 * Appends each target to the output file for its verdict.
 *
 * Every write is its own open-append-close. Writes to the same file are also
 * chained one after another, so concurrent workers never interleave lines.
 */
export class ResultSink {
  readonly prefix: string;
  readonly exclude: ExcludeFilter;
  private tails = new Map<string, Promise<void>>();

  constructor(prefix: string, exclude: ExcludeFilter = 'NONE') {
    this.prefix = prefix;
    this.exclude = exclude;
  }

  /**
   * Writes `target` as one line. Resolves with `false` when the verdict is
   * excluded and nothing was written.
   */
  async record(target: string, verdict: Verdict): Promise<boolean> {
    if (verdict === this.exclude) {
      return false;
    }
    const path = outputPathFor(this.prefix, verdict);
    const previous = this.tails.get(path) ?? Promise.resolve();
    // A failed write must not poison the writes queued behind it
    const write = previous
      .catch(() => undefined)
      .then(() => fs.appendFile(path, `${target}\n`, 'utf8'));
    this.tails.set(path, write);
    try {
      await write;
    } finally {
      if (this.tails.get(path) === write) {
        this.tails.delete(path);
      }
    }
    return true;
  }

  /** Deletes both output files if they exist, so a run starts empty. */
  async reset(): Promise<void> {
    await Promise.all(
      VERDICTS.map((verdict) => fs.rm(outputPathFor(this.prefix, verdict), { force: true }))
    );
  }
}
