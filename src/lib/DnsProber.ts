import * as dns from 'dns/promises';
import { ResolutionError, describeError } from './errors.js';
import { Logger } from './Logger.js';
import type { HostProbe, ProbeOutcome } from './types.js';

export const DEFAULT_DNS_TIMEOUT_MS = 5000;

/** Resolves a hostname to its addresses. Rejects on failure. */
export type LookupFn = (host: string) => Promise<unknown>;

const systemLookup: LookupFn = (host) => dns.lookup(host, { all: true });

export interface DnsProberOptions {
  timeoutMs?: number;
  /** Replaces the system resolver, e.g. in tests. */
  lookup?: LookupFn;
  logger?: Logger;
}

/**
 * Checks that a host resolves through the system resolver configuration
 * (`/etc/hosts`, `resolv.conf`). The answer itself is not inspected: any
 * answer without error is a success. No retries.
 *
 * getaddrinfo has no timeout of its own, so each lookup is raced against
 * `timeoutMs`.
 */
export class DnsProber implements HostProbe {
  private timeoutMs: number;
  private lookup: LookupFn;
  private logger: Logger;

  constructor(options: DnsProberOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_DNS_TIMEOUT_MS;
    this.lookup = options.lookup ?? systemLookup;
    this.logger = options.logger ?? Logger.silent();
  }

  async probe(host: string): Promise<ProbeOutcome> {
    try {
      await this.resolveWithTimeout(host);
      this.logger.debug(`DNS Lookup for ${host} succeeded`);
      return { ok: true };
    } catch (error) {
      const reason = describeError(error);
      this.logger.debug(`DNS Lookup for ${host} failed: ${reason}`);
      return { ok: false, reason };
    }
  }

  private resolveWithTimeout(host: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      let settled = false;
      const timer = setTimeout(() => {
        if (settled) return;
        settled = true;
        reject(new ResolutionError(`DNS lookup for ${host} timed out after ${this.timeoutMs}ms`));
      }, this.timeoutMs);

      this.lookup(host).then(
        () => {
          if (settled) return;
          settled = true;
          clearTimeout(timer);
          resolve();
        },
        (error: unknown) => {
          if (settled) return;
          settled = true;
          clearTimeout(timer);
          reject(new ResolutionError(`DNS lookup for ${host} failed`, { cause: error }));
        }
      );
    });
  }
}
