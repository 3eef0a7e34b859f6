import * as fs from 'fs';
import * as net from 'net';
import * as os from 'os';
import * as path from 'path';
import { afterAll, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConfigError } from '../src/lib/errors.js';
import { WhoisProber, loadWhoisServers } from '../src/lib/WhoisProber.js';

// --- Mock WHOIS server ---
let server: net.Server;
let address: string;
// What the server sends back; null means it never answers
let reply: string | null = '';
const received: string[] = [];

beforeAll(async () => {
  server = net.createServer((socket) => {
    let query = '';
    socket.on('error', () => {
      // client-side timeouts reset the connection
    });
    socket.on('data', (chunk) => {
      query += chunk.toString();
      if (!query.endsWith('\n')) return;
      received.push(query);
      if (reply !== null) {
        socket.end(reply);
      }
    });
  });
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const info = server.address();
  if (info === null || typeof info === 'string') {
    throw new Error('WHOIS test server has no port');
  }
  address = `127.0.0.1:${info.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve) => server.close(() => resolve()));
});

beforeEach(() => {
  reply = '';
  received.length = 0;
});

describe('WhoisProber', () => {
  it('should succeed on a non-empty record and query the registrable domain', async () => {
    reply = 'Domain Name: EXAMPLE.COM\r\nRegistrar: Test Registrar\r\n';
    const prober = new WhoisProber({ servers: { com: address } });

    const outcome = await prober.probe('www.example.com');

    expect(outcome).toEqual({ ok: true });
    expect(received).toEqual(['example.com\r\n']);
  });

  it('should fail on an empty response', async () => {
    reply = '';
    const prober = new WhoisProber({ servers: { com: address } });

    const outcome = await prober.probe('example.com');

    expect(outcome).toEqual({
      ok: false,
      reason: 'RegistrationLookupError: Empty WHOIS response for example.com from 127.0.0.1',
    });
  });

  it('should fail on a whitespace-only response', async () => {
    reply = '\r\n   \r\n';
    const prober = new WhoisProber({ servers: { com: address } });

    const outcome = await prober.probe('example.com');

    expect(outcome.ok).toBe(false);
  });

  it('should use the query template of the server entry', async () => {
    reply = 'Domain: example.de\nStatus: connect\n';
    const prober = new WhoisProber({
      servers: { de: { host: address, query: '-T dn,ace $addr\r\n' } },
    });

    const outcome = await prober.probe('shop.example.de');

    expect(outcome).toEqual({ ok: true });
    expect(received).toEqual(['-T dn,ace example.de\r\n']);
  });

  it('should fail when the server does not answer in time', async () => {
    reply = null;
    const prober = new WhoisProber({ servers: { com: address }, timeoutMs: 50 });

    const outcome = await prober.probe('example.com');

    expect(outcome).toEqual({
      ok: false,
      reason: 'RegistrationLookupError: WHOIS query to 127.0.0.1 timed out after 50ms',
    });
  });

  it('should fail when the server is unreachable', async () => {
    const prober = new WhoisProber({ servers: { com: '127.0.0.1:1' } });

    const outcome = await prober.probe('example.com');

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.reason).toMatch(/^RegistrationLookupError: WHOIS server 127\.0\.0\.1 unreachable/);
    }
  });

  it('should fail without querying when no server is mapped for the TLD', async () => {
    const query = vi.fn(async () => 'record');
    const prober = new WhoisProber({ servers: { com: address }, query });

    const outcome = await prober.probe('example.org');

    expect(outcome).toEqual({
      ok: false,
      reason: 'RegistrationLookupError: No WHOIS server for TLD .org',
    });
    expect(query).not.toHaveBeenCalled();
  });

  it('should fail for a host with no registrable domain', async () => {
    const prober = new WhoisProber({ servers: { com: address } });

    const outcome = await prober.probe('192.0.2.1');

    expect(outcome).toEqual({
      ok: false,
      reason: 'RegistrationLookupError: 192.0.2.1 has no registrable domain',
    });
  });

  it('should pass server, query and timeout to an injected query function', async () => {
    const query = vi.fn(async () => 'record');
    const prober = new WhoisProber({ servers: { com: 'whois.test' }, query, timeoutMs: 1234 });

    const outcome = await prober.probe('example.com');

    expect(outcome).toEqual({ ok: true });
    expect(query).toHaveBeenCalledWith(
      { host: 'whois.test', port: 43, query: '$addr\r\n' },
      'example.com\r\n',
      1234
    );
  });

  it('should fail when the injected query function rejects', async () => {
    const query = vi.fn(async () => {
      throw new Error('socket hang up');
    });
    const prober = new WhoisProber({ servers: { com: 'whois.test' }, query });

    const outcome = await prober.probe('example.com');

    expect(outcome).toEqual({ ok: false, reason: 'Error: socket hang up' });
  });
});

describe('WhoisProber.resolveServer', () => {
  it('should fall back from the public suffix to its last label', () => {
    const prober = new WhoisProber({ servers: { uk: 'whois.nic.uk' } });

    expect(prober.resolveServer('www.example.co.uk')).toEqual({
      domain: 'example.co.uk',
      server: { host: 'whois.nic.uk', port: 43, query: '$addr\r\n' },
    });
  });

  it('should prefer an entry for the full public suffix', () => {
    const prober = new WhoisProber({
      servers: { uk: 'whois.nic.uk', 'co.uk': 'whois.co-uk.test:4343' },
    });

    expect(prober.resolveServer('example.co.uk').server).toEqual({
      host: 'whois.co-uk.test',
      port: 4343,
      query: '$addr\r\n',
    });
  });
});

describe('loadWhoisServers', () => {
  it('should load the bundled server map', () => {
    const servers = loadWhoisServers();
    expect(servers.com).toBe('whois.verisign-grs.com');
    expect(servers.de).toEqual({ host: 'whois.denic.de', query: '-T dn,ace $addr\r\n' });
  });

  it('should reject a map whose query template lacks $addr', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'livecheck-whois-'));
    const file = path.join(dir, 'servers.json');
    fs.writeFileSync(file, JSON.stringify({ de: { host: 'whois.test', query: 'no placeholder' } }));

    try {
      expect(() => loadWhoisServers(file)).toThrow(ConfigError);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('should reject a missing file', () => {
    expect(() => loadWhoisServers('/nonexistent/whois-servers.json')).toThrow(
      /^Cannot read WHOIS server map \/nonexistent\/whois-servers\.json/
    );
  });
});
