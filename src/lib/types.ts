/**
 * Final classification of a target.
 */
export const VERDICTS = ['ACTIVE', 'INACTIVE'] as const;
export type Verdict = (typeof VERDICTS)[number];

/**
 * Which verdict, if any, is dropped instead of written to its output file.
 */
export type ExcludeFilter = Verdict | 'NONE';

/**
 * How the classifier treats a target whose HTTP probe gave no liveness signal.
 * - `dns-and-whois`: the host must resolve AND have a WHOIS record.
 * - `dns-only`: resolving is enough.
 * - `http-only`: no fallback, HTTP silence means INACTIVE.
 */
export const FALLBACK_POLICIES = ['dns-and-whois', 'dns-only', 'http-only'] as const;
export type FallbackPolicy = (typeof FALLBACK_POLICIES)[number];

/** Outcome of a DNS or WHOIS probe. */
export type ProbeOutcome = { ok: true } | { ok: false; reason: string };

/** How an HTTP status code bears on liveness. */
export type StatusCategory = 'active' | 'inactive' | 'ambiguous';

/**
 * Result of a single HTTP probe. `status`, `category` and `finalUrl` are only
 * present when a response was received; `error` only when none was.
 */
export interface HttpProbeResult {
  isActive: boolean;
  redirectedToWww: boolean;
  status?: number;
  category?: StatusCategory;
  finalUrl?: string;
  error?: string;
}

/** A target line together with what the probes need from it. */
export interface NormalizedTarget {
  /** The original input line, written verbatim to the output file. */
  target: string;
  /** The URL the HTTP probe requests. */
  probeUrl: string;
  /** Bare hostname for DNS/WHOIS, or null when none could be derived. */
  host: string | null;
}

export interface HttpProbe {
  probe(url: string): Promise<HttpProbeResult>;
}

export interface HostProbe {
  probe(host: string): Promise<ProbeOutcome>;
}

export type ClassifierState =
  | 'START'
  | 'AWAITING_HTTP'
  | 'AWAITING_DNS'
  | 'AWAITING_WHOIS'
  | 'ACTIVE_FINAL'
  | 'INACTIVE_FINAL';

export interface ClassificationResult {
  verdict: Verdict;
  /** Every state visited, in order, ending in a final state. */
  path: ClassifierState[];
  http: HttpProbeResult;
  dns?: ProbeOutcome;
  whois?: ProbeOutcome;
}

/** Counts for one run. Every target lands in exactly one bucket. */
export interface RunSummary {
  total: number;
  active: number;
  inactive: number;
  excluded: number;
  failed: number;
}
