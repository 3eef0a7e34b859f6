/**
 * Error taxonomy. Probe errors never escape their prober: each one is caught
 * and turned into a failed outcome carrying `describeError(err)`.
 */

export type ProbeKind = 'http' | 'dns' | 'whois' | 'parse';

export abstract class ProbeError extends Error {
  abstract readonly kind: ProbeKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** HTTP connection, timeout, TLS or redirect-limit failure. */
export class TransportError extends ProbeError {
  readonly kind = 'http';
}

/** DNS lookup failed or timed out. */
export class ResolutionError extends ProbeError {
  readonly kind = 'dns';
}

/** WHOIS server missing, unreachable, or returned nothing. */
export class RegistrationLookupError extends ProbeError {
  readonly kind = 'whois';
}

/** A target cannot be interpreted as a URL or host. */
export class ParseError extends ProbeError {
  readonly kind = 'parse';
}

/** Invalid command-line or environment configuration. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Renders any thrown value as a single line, following `cause` once so that
 * fetch's opaque "fetch failed" shows the underlying socket error.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    const cause = error.cause;
    if (cause instanceof Error && cause.message && cause.message !== error.message) {
      return `${error.name}: ${error.message} (${cause.message})`;
    }
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
