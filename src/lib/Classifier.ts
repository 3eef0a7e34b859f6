import type {
  ClassificationResult,
  ClassifierState,
  FallbackPolicy,
  HostProbe,
  HttpProbe,
  NormalizedTarget,
} from './types.js';

export interface ClassifierProbes {
  http: HttpProbe;
  dns: HostProbe;
  whois: HostProbe;
}

/**
 * Combines the three probes into one verdict. HTTP is asked first; only when
 * it shows no sign of life are DNS and then WHOIS consulted, and WHOIS only
 * after DNS has answered.
 *
 * ```
 * START → AWAITING_HTTP ─┬─ active or www redirect ──────────────→ ACTIVE_FINAL
 *                        ├─ no host / http-only ─────────────────→ INACTIVE_FINAL
 *                        └→ AWAITING_DNS ─┬─ fails ──────────────→ INACTIVE_FINAL
 *                                         ├─ ok, dns-only ───────→ ACTIVE_FINAL
 *                                         └→ AWAITING_WHOIS ─ ok → ACTIVE_FINAL
 *                                                            └ no → INACTIVE_FINAL
 * ```
 */
export class Classifier {
  private probes: ClassifierProbes;
  private policy: FallbackPolicy;

  constructor(probes: ClassifierProbes, policy: FallbackPolicy = 'dns-and-whois') {
    this.probes = probes;
    this.policy = policy;
  }

  get fallbackPolicy(): FallbackPolicy {
    return this.policy;
  }

  async classify(target: NormalizedTarget): Promise<ClassificationResult> {
    const path: ClassifierState[] = ['START', 'AWAITING_HTTP'];

    const http = await this.probes.http.probe(target.probeUrl);
    if (http.isActive || http.redirectedToWww) {
      return { verdict: 'ACTIVE', path: [...path, 'ACTIVE_FINAL'], http };
    }

    const { host } = target;
    if (host === null || this.policy === 'http-only') {
      return { verdict: 'INACTIVE', path: [...path, 'INACTIVE_FINAL'], http };
    }

    path.push('AWAITING_DNS');
    const dns = await this.probes.dns.probe(host);
    if (!dns.ok) {
      // An unresolvable host is inactive whatever WHOIS might say
      return { verdict: 'INACTIVE', path: [...path, 'INACTIVE_FINAL'], http, dns };
    }
    if (this.policy === 'dns-only') {
      return { verdict: 'ACTIVE', path: [...path, 'ACTIVE_FINAL'], http, dns };
    }

    path.push('AWAITING_WHOIS');
    const whois = await this.probes.whois.probe(host);
    return whois.ok
      ? { verdict: 'ACTIVE', path: [...path, 'ACTIVE_FINAL'], http, dns, whois }
      : { verdict: 'INACTIVE', path: [...path, 'INACTIVE_FINAL'], http, dns, whois };
  }
}
