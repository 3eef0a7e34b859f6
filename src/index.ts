/**
 * @module livecheck
 * This is the main library entry point.
 * It exports the probers, the classifier and the concurrent runner.
 */

// --- Library Exports ---
export { Classifier } from './lib/Classifier.js';
export type { ClassifierProbes } from './lib/Classifier.js';
export { parseConfig, USAGE } from './lib/config.js';
export type { ParsedArgs, RunConfig } from './lib/config.js';
export { DnsProber } from './lib/DnsProber.js';
export type { DnsProberOptions, LookupFn } from './lib/DnsProber.js';
export {
  ConfigError,
  ParseError,
  ProbeError,
  RegistrationLookupError,
  ResolutionError,
  TransportError,
  describeError,
} from './lib/errors.js';
export {
  ACTIVE_STATUS_CODES,
  HttpProber,
  INACTIVE_STATUS_CODES,
  classifyStatus,
} from './lib/HttpProber.js';
export type { HttpProberOptions } from './lib/HttpProber.js';
export { Logger } from './lib/Logger.js';
export type { VerboseLevel } from './lib/Logger.js';
export { ResultSink, outputPathFor } from './lib/ResultSink.js';
export { runCheck } from './lib/runCheck.js';
export { runCli } from './lib/runCli.js';
export type { RunOverrides } from './lib/runCheck.js';
export { Semaphore } from './lib/Semaphore.js';
export { TargetChecker } from './lib/TargetChecker.js';
export type { TargetCheckerOptions } from './lib/TargetChecker.js';
export { TargetListParser, readTargets } from './lib/TargetListParser.js';
export { extractHostname, normalizeTarget } from './lib/TargetNormalizer.js';
export { WhoisProber, loadWhoisServers, queryWhoisServer } from './lib/WhoisProber.js';
export type { WhoisProberOptions, WhoisQueryFn, WhoisServer, WhoisServerMap } from './lib/WhoisProber.js';
export type * from './lib/types.js';
export { FALLBACK_POLICIES, VERDICTS } from './lib/types.js';
