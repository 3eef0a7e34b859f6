import { ParseError } from './errors.js';
import type { NormalizedTarget } from './types.js';

const HTTP_SCHEME_REGEX = /^https?:\/\//i;
// Any other scheme, e.g. "ftp://" or "mailto:"-style "scheme://".
const FOREIGN_SCHEME_REGEX = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * Turns a raw target line into the URL the HTTP probe requests and, where one
 * can be derived, the bare hostname for DNS and WHOIS.
 *
 * Never throws: a target whose host cannot be determined gets `host: null`
 * and is still probed over HTTP with a best-effort `http://` URL.
 *
 * @example
 * normalizeTarget('example.com');
 * // { target: 'example.com', probeUrl: 'http://example.com', host: 'example.com' }
 * normalizeTarget('https://www.example.com/a');
 * // { target: 'https://www.example.com/a', probeUrl: 'https://www.example.com/a', host: 'www.example.com' }
 */
export function normalizeTarget(raw: string): NormalizedTarget {
  const target = raw.trim();

  if (HTTP_SCHEME_REGEX.test(target)) {
    return { target, probeUrl: target, host: tryHostname(target) };
  }

  const probeUrl = `http://${target}`;
  if (FOREIGN_SCHEME_REGEX.test(target)) {
    return { target, probeUrl, host: null };
  }
  return { target, probeUrl, host: tryHostname(probeUrl) };
}

/**
 * Parses `url` and returns its hostname, throwing {@link ParseError} when the
 * URL is invalid or has no host.
 */
export function extractHostname(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch (error) {
    throw new ParseError(`Cannot parse "${url}" as a URL`, { cause: error });
  }
  // IPv6 literals come back bracketed
  const hostname = parsed.hostname.replace(/^\[(.*)\]$/, '$1');
  if (!hostname) {
    throw new ParseError(`"${url}" has no host`);
  }
  return hostname;
}

function tryHostname(url: string): string | null {
  try {
    return extractHostname(url);
  } catch (error) {
    if (error instanceof ParseError) return null;
    throw error;
  }
}
