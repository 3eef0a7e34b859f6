import { readFileSync } from 'fs';
import * as net from 'net';
import { fileURLToPath } from 'url';
import { getDomain, getPublicSuffix } from 'tldts';
import { z } from 'zod';
import { ConfigError, RegistrationLookupError, describeError } from './errors.js';
import { Logger } from './Logger.js';
import type { HostProbe, ProbeOutcome } from './types.js';

export const DEFAULT_WHOIS_TIMEOUT_MS = 10000;
export const WHOIS_PORT = 43;
const DEFAULT_QUERY_TEMPLATE = '$addr\r\n';

export const DEFAULT_SERVERS_PATH = fileURLToPath(
  new URL('../../data/whois-servers.json', import.meta.url)
);

// An entry is a bare host ("whois.example", optionally "host:port") or a host
// with a query template in which `$addr` stands for the domain.
const WhoisServerEntrySchema = z.union([
  z.string().min(1),
  z.object({
    host: z.string().min(1),
    query: z.string().includes('$addr').optional(),
  }),
]);

export const WhoisServerMapSchema = z.record(z.string(), WhoisServerEntrySchema);
export type WhoisServerMap = z.infer<typeof WhoisServerMapSchema>;

export interface WhoisServer {
  host: string;
  port: number;
  query: string;
}

/** Sends `query` to `server` and resolves with the full response text. */
export type WhoisQueryFn = (server: WhoisServer, query: string, timeoutMs: number) => Promise<string>;

/**
 * Reads and validates a TLD → server map.
 * @throws ConfigError when the file is missing or malformed.
 */
export function loadWhoisServers(path: string = DEFAULT_SERVERS_PATH): WhoisServerMap {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'));
  } catch (error) {
    throw new ConfigError(`Cannot read WHOIS server map ${path}: ${describeError(error)}`);
  }
  const parsed = WhoisServerMapSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid WHOIS server map ${path}: ${parsed.error.message}`);
  }
  return parsed.data;
}

/**
 * Opens a TCP connection to the server, writes the query and collects
 * everything until the server closes. The timeout bounds the whole exchange.
 */
export const queryWhoisServer: WhoisQueryFn = (server, query, timeoutMs) =>
  new Promise<string>((resolve, reject) => {
    const chunks: Buffer[] = [];
    const socket = net.createConnection({ host: server.host, port: server.port });

    const timer = setTimeout(() => {
      socket.destroy(
        new RegistrationLookupError(`WHOIS query to ${server.host} timed out after ${timeoutMs}ms`)
      );
    }, timeoutMs);

    socket.on('connect', () => {
      socket.write(query);
    });
    socket.on('data', (chunk: Buffer) => {
      chunks.push(chunk);
    });
    socket.on('end', () => {
      clearTimeout(timer);
      resolve(Buffer.concat(chunks).toString('utf8'));
    });
    socket.on('error', (error) => {
      clearTimeout(timer);
      reject(
        error instanceof RegistrationLookupError
          ? error
          : new RegistrationLookupError(`WHOIS server ${server.host} unreachable`, { cause: error })
      );
    });
  });

export interface WhoisProberOptions {
  /** TLD → server map. Loaded from `data/whois-servers.json` when omitted. */
  servers?: WhoisServerMap;
  timeoutMs?: number;
  /** Replaces the TCP query, e.g. in tests. */
  query?: WhoisQueryFn;
  logger?: Logger;
}

/**
 * Looks up the registration record of a host's registrable domain on the
 * WHOIS server for its TLD. Succeeds on the first non-empty response.
 */
export class WhoisProber implements HostProbe {
  private servers: WhoisServerMap;
  private timeoutMs: number;
  private query: WhoisQueryFn;
  private logger: Logger;

  constructor(options: WhoisProberOptions = {}) {
    this.servers = options.servers ?? loadWhoisServers();
    this.timeoutMs = options.timeoutMs ?? DEFAULT_WHOIS_TIMEOUT_MS;
    this.query = options.query ?? queryWhoisServer;
    this.logger = options.logger ?? Logger.silent();
  }

  async probe(host: string): Promise<ProbeOutcome> {
    try {
      const { domain, server } = this.resolveServer(host);
      const query = server.query.split('$addr').join(domain);
      const response = await this.query(server, query, this.timeoutMs);
      if (response.trim().length === 0) {
        throw new RegistrationLookupError(`Empty WHOIS response for ${domain} from ${server.host}`);
      }
      this.logger.debug(`WHOIS Lookup for ${host} succeeded`);
      return { ok: true };
    } catch (error) {
      const reason = describeError(error);
      this.logger.debug(`WHOIS Lookup for ${host} failed: ${reason}`);
      return { ok: false, reason };
    }
  }

  /**
   * Picks the registrable domain and the server to ask about it. The full
   * public suffix is tried before its last label, so `co.uk` may have its own
   * entry and otherwise falls back to `uk`.
   */
  resolveServer(host: string): { domain: string; server: WhoisServer } {
    const domain = getDomain(host);
    const suffix = getPublicSuffix(host);
    if (!domain || !suffix) {
      throw new RegistrationLookupError(`${host} has no registrable domain`);
    }

    const tld = suffix.slice(suffix.lastIndexOf('.') + 1);
    const entry = this.servers[suffix] ?? this.servers[tld];
    if (entry === undefined) {
      throw new RegistrationLookupError(`No WHOIS server for TLD .${suffix}`);
    }

    const { host: address, query } =
      typeof entry === 'string' ? { host: entry, query: undefined } : entry;
    return {
      domain,
      server: { ...splitHostPort(address), query: query ?? DEFAULT_QUERY_TEMPLATE },
    };
  }
}

function splitHostPort(address: string): { host: string; port: number } {
  const match = /^([^:]+):(\d+)$/.exec(address);
  if (match) {
    return { host: match[1], port: Number(match[2]) };
  }
  return { host: address, port: WHOIS_PORT };
}
