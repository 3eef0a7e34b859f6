import { Classifier } from './Classifier.js';
import { describeError } from './errors.js';
import { Logger } from './Logger.js';
import { ResultSink } from './ResultSink.js';
import { Semaphore } from './Semaphore.js';
import { normalizeTarget } from './TargetNormalizer.js';
import type { RunSummary } from './types.js';

export const DEFAULT_CONCURRENCY = 10;

type Outcome = 'active' | 'inactive' | 'excluded' | 'failed';

export interface TargetCheckerOptions {
  classifier: Classifier;
  sink: ResultSink;
  concurrency?: number;
  logger?: Logger;
}

/**
 * Runs one classify-and-record workflow per target with at most
 * `concurrency` of them holding a worker slot at a time.
 *
 * Workflows are isolated: each keeps its probe results to itself, completes
 * in whatever order its network calls allow, and can only fail itself. A
 * workflow that throws is logged, counted as `failed` and writes nothing.
 */
export class TargetChecker {
  private classifier: Classifier;
  private sink: ResultSink;
  private logger: Logger;
  readonly concurrency: number;

  constructor(options: TargetCheckerOptions) {
    this.classifier = options.classifier;
    this.sink = options.sink;
    this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    this.logger = options.logger ?? Logger.silent();
  }

  /**
   * Checks every target and resolves once all workflows have settled.
   * Never rejects because of a single target.
   */
  async run(targets: readonly string[]): Promise<RunSummary> {
    const slots = new Semaphore(this.concurrency);
    const summary: RunSummary = {
      total: targets.length,
      active: 0,
      inactive: 0,
      excluded: 0,
      failed: 0,
    };

    const outcomes = await Promise.all(
      targets.map((target) => this.runWorkflow(target, slots))
    );
    for (const outcome of outcomes) {
      summary[outcome] += 1;
    }

    this.logger.info('All tasks completed.');
    return summary;
  }

  private async runWorkflow(target: string, slots: Semaphore): Promise<Outcome> {
    try {
      return await slots.use(() => this.checkOne(target));
    } catch (error) {
      this.logger.error(`Error checking domain or URL ${target}: ${describeError(error)}`);
      return 'failed';
    }
  }

  private async checkOne(target: string): Promise<Outcome> {
    this.logger.debug(`Checking: ${target}`);

    const normalized = normalizeTarget(target);
    const { verdict } = await this.classifier.classify(normalized);
    const written = await this.sink.record(normalized.target, verdict);

    this.logger.result(normalized.target, verdict);
    this.logger.debug(`Finished checking: ${normalized.target}`);

    if (!written) return 'excluded';
    return verdict === 'ACTIVE' ? 'active' : 'inactive';
  }
}
