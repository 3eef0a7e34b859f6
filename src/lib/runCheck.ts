import * as fs from 'fs';
import { Classifier } from './Classifier.js';
import type { ClassifierProbes } from './Classifier.js';
import type { RunConfig } from './config.js';
import { DnsProber } from './DnsProber.js';
import { HttpProber } from './HttpProber.js';
import { Logger } from './Logger.js';
import { ResultSink } from './ResultSink.js';
import { TargetChecker } from './TargetChecker.js';
import { readTargets } from './TargetListParser.js';
import type { RunSummary } from './types.js';
import { WhoisProber } from './WhoisProber.js';

export interface RunOverrides {
  /** Replaces any of the network probers, e.g. with in-process fakes. */
  probes?: Partial<ClassifierProbes>;
  logger?: Logger;
}

/**
 * One full run: empty the output files, read the whole target list, then
 * check every target. Failing to reset the outputs or read the input rejects;
 * nothing after that point does.
 */
export async function runCheck(config: RunConfig, overrides: RunOverrides = {}): Promise<RunSummary> {
  const logger = overrides.logger ?? new Logger(config.verboseLevel);

  const sink = new ResultSink(config.outputFile, config.exclude);
  await sink.reset();

  const targets = await readTargets(fs.createReadStream(config.inputFile, { encoding: 'utf8' }));

  const probes: ClassifierProbes = {
    http:
      overrides.probes?.http ??
      new HttpProber({ timeoutMs: config.httpTimeoutMs, userAgent: config.userAgent, logger }),
    dns: overrides.probes?.dns ?? new DnsProber({ timeoutMs: config.dnsTimeoutMs, logger }),
    whois: overrides.probes?.whois ?? new WhoisProber({ timeoutMs: config.whoisTimeoutMs, logger }),
  };

  const checker = new TargetChecker({
    classifier: new Classifier(probes, config.fallback),
    sink,
    concurrency: config.concurrency,
    logger,
  });
  return checker.run(targets);
}
