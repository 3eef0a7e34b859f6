import { styleText } from 'util';
import type { Verdict } from './types.js';

/**
 * Verbosity levels:
 * - 0: errors only
 * - 1: one result line per target, plus the completion line
 * - 2: progress and per-probe detail
 */
export type VerboseLevel = 0 | 1 | 2;

type WriteFn = (line: string) => void;

const VERDICT_COLORS = { ACTIVE: 'green', INACTIVE: 'red' } as const satisfies Record<Verdict, string>;

/**
 * Line-oriented console output for a run. Purely observational: nothing
 * written here affects a verdict.
 */
export class Logger {
  readonly level: VerboseLevel;
  readonly colors: boolean;
  private out: WriteFn;
  private err: WriteFn;

  /**
   * @param out Defaults to stdout.
   * @param err Defaults to stderr.
   * @param colors Bold-colours verdicts. Defaults to on when writing to a stdout terminal.
   */
  constructor(level: VerboseLevel, out?: WriteFn, err?: WriteFn, colors?: boolean) {
    this.level = level;
    this.colors = colors ?? (out === undefined && process.stdout.isTTY === true);
    this.out = out ?? ((line) => process.stdout.write(line));
    this.err = err ?? ((line) => process.stderr.write(line));
  }

  /** Silent logger, used where no output is wanted. */
  static silent(): Logger {
    return new Logger(0, () => {}, () => {});
  }

  get isDebug(): boolean {
    return this.level >= 2;
  }

  debug(message: string): void {
    if (this.level >= 2) {
      this.out(`${message}\n`);
    }
  }

  info(message: string): void {
    if (this.level >= 1) {
      this.out(`${message}\n`);
    }
  }

  result(target: string, verdict: Verdict): void {
    const label = this.colors ? styleText('bold', styleText(VERDICT_COLORS[verdict], verdict)) : verdict;
    this.info(`${target}: ${label}`);
  }

  error(message: string): void {
    this.err(`[ERROR] ${message}\n`);
  }
}
