import { TransportError, describeError } from './errors.js';
import { Logger } from './Logger.js';
import type { HttpProbe, HttpProbeResult, StatusCategory } from './types.js';

// Codes that prove a configured server answered, errors included.
export const ACTIVE_STATUS_CODES: ReadonlySet<number> = new Set([
  200, 201, 202, 203, 204, 205, 206,
  300, 301, 302, 303, 304, 307, 308,
  401, 403, 405, 406, 407, 408, 409, 410,
  429,
  500, 501, 502, 503, 504, 505,
]);

// Codes that say the resource or domain is gone.
export const INACTIVE_STATUS_CODES: ReadonlySet<number> = new Set([404, 410, 451]);

const REDIRECT_STATUS_CODES: ReadonlySet<number> = new Set([301, 302, 303, 307, 308]);

export const DEFAULT_HTTP_TIMEOUT_MS = 5000;
export const DEFAULT_MAX_REDIRECTS = 10;
export const DEFAULT_USER_AGENT = 'livecheck/1.0.0';

/**
 * Maps a status code to its liveness category. The active table is checked
 * first, so 410 (listed in both) is active.
 */
export function classifyStatus(status: number): StatusCategory {
  if (ACTIVE_STATUS_CODES.has(status)) return 'active';
  if (INACTIVE_STATUS_CODES.has(status)) return 'inactive';
  return 'ambiguous';
}

/**
 * fetch rejects URLs carrying userinfo, so credentials move into a Basic
 * `Authorization` header. URLs without them are returned untouched.
 */
function splitCredentials(url: string): { href: string; authorization?: string } {
  const parsed = new URL(url);
  if (!parsed.username && !parsed.password) {
    return { href: url };
  }
  const credentials = `${decodeURIComponent(parsed.username)}:${decodeURIComponent(parsed.password)}`;
  parsed.username = '';
  parsed.password = '';
  return {
    href: parsed.toString(),
    authorization: `Basic ${Buffer.from(credentials, 'utf8').toString('base64')}`,
  };
}

export interface HttpProberOptions {
  /** Budget for the whole request, redirects included. */
  timeoutMs?: number;
  maxRedirects?: number;
  userAgent?: string;
  logger?: Logger;
}

/**
 * Issues one GET per target and reports whether the answer proves the host is
 * live. Redirects are followed by hand so the hop limit and the final host are
 * under our control; connections are pooled by the global fetch dispatcher.
 *
 * `probe` never rejects. Transport failures come back as
 * `{ isActive: false, redirectedToWww: false, error }`.
 */
export class HttpProber implements HttpProbe {
  private timeoutMs: number;
  private maxRedirects: number;
  private userAgent: string;
  private logger: Logger;

  constructor(options: HttpProberOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
    this.maxRedirects = options.maxRedirects ?? DEFAULT_MAX_REDIRECTS;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.logger = options.logger ?? Logger.silent();
  }

  async probe(url: string): Promise<HttpProbeResult> {
    try {
      const { status, finalUrl } = await this.fetchFollowingRedirects(url);
      const category = classifyStatus(status);
      const redirectedToWww = new URL(finalUrl).hostname.startsWith('www.');

      if (category === 'active') {
        this.logger.debug(`HTTP check for ${url} succeeded with status code ${status}`);
      } else if (category === 'inactive') {
        this.logger.debug(`HTTP check for ${url} failed with status code ${status}`);
      } else {
        this.logger.debug(`HTTP check for ${url} returned status code ${status}`);
      }
      if (redirectedToWww) {
        this.logger.debug(`Redirected to www: ${finalUrl}`);
      }

      return {
        isActive: category === 'active',
        redirectedToWww,
        status,
        category,
        finalUrl,
      };
    } catch (error) {
      const reason = describeError(error);
      this.logger.debug(`HTTP check for ${url} failed: ${reason}`);
      return { isActive: false, redirectedToWww: false, error: reason };
    }
  }

  /**
   * Follows up to `maxRedirects` hops and returns the status and URL of the
   * first non-redirect response. One timeout signal covers every hop.
   */
  private async fetchFollowingRedirects(
    url: string
  ): Promise<{ status: number; finalUrl: string }> {
    const signal = AbortSignal.timeout(this.timeoutMs);
    let current = url;

    for (let hop = 0; ; hop++) {
      let response: Response;
      let requestUrl = current;
      try {
        const { href, authorization } = splitCredentials(current);
        requestUrl = href;
        const headers: Record<string, string> = { 'User-Agent': this.userAgent };
        if (authorization) {
          headers.Authorization = authorization;
        }
        response = await fetch(href, {
          method: 'GET',
          redirect: 'manual',
          signal,
          headers,
        });
      } catch (error) {
        throw new TransportError(`Request to ${requestUrl} failed`, { cause: error });
      }

      // Only the status line and headers matter
      await this.discardBody(response);

      const location = response.headers.get('location');
      if (!REDIRECT_STATUS_CODES.has(response.status) || !location) {
        return { status: response.status, finalUrl: requestUrl };
      }
      if (hop >= this.maxRedirects) {
        throw new TransportError(
          `Too many redirects (more than ${this.maxRedirects}) starting at ${url}`
        );
      }
      try {
        current = new URL(location, current).toString();
      } catch (error) {
        throw new TransportError(`Invalid redirect location "${location}"`, { cause: error });
      }
    }
  }

  private async discardBody(response: Response): Promise<void> {
    try {
      await response.body?.cancel();
    } catch (error) {
      this.logger.debug(`Discarding response body failed: ${describeError(error)}`);
    }
  }
}
