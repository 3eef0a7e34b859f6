import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ResultSink, outputPathFor } from '../src/lib/ResultSink.js';

let dir: string;
let prefix: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'livecheck-sink-'));
  prefix = path.join(dir, 'results');
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

function readLines(file: string): string[] {
  return fs.readFileSync(file, 'utf8').split('\n').filter(Boolean);
}

describe('outputPathFor', () => {
  it('should append the verdict and .txt to the prefix', () => {
    expect(outputPathFor('out/run', 'ACTIVE')).toBe('out/run_ACTIVE.txt');
    expect(outputPathFor('out/run', 'INACTIVE')).toBe('out/run_INACTIVE.txt');
  });
});

describe('ResultSink', () => {
  it('should append each target as one line to its verdict file', async () => {
    const sink = new ResultSink(prefix);

    await sink.record('example.com', 'ACTIVE');
    await sink.record('https://gone.example/a', 'INACTIVE');
    await sink.record('example.org', 'ACTIVE');

    expect(fs.readFileSync(`${prefix}_ACTIVE.txt`, 'utf8')).toBe('example.com\nexample.org\n');
    expect(fs.readFileSync(`${prefix}_INACTIVE.txt`, 'utf8')).toBe('https://gone.example/a\n');
  });

  it('should report whether a line was written', async () => {
    const sink = new ResultSink(prefix, 'INACTIVE');

    await expect(sink.record('a.example', 'ACTIVE')).resolves.toBe(true);
    await expect(sink.record('b.example', 'INACTIVE')).resolves.toBe(false);
  });

  it('should not create the file of the excluded verdict', async () => {
    const sink = new ResultSink(prefix, 'INACTIVE');

    await sink.record('a.example', 'ACTIVE');
    await sink.record('b.example', 'INACTIVE');

    expect(readLines(`${prefix}_ACTIVE.txt`)).toEqual(['a.example']);
    expect(fs.existsSync(`${prefix}_INACTIVE.txt`)).toBe(false);
  });

  it('should write whole lines under concurrent records', async () => {
    const sink = new ResultSink(prefix);
    const targets = Array.from({ length: 200 }, (_, i) => `host-${i}.example`);

    await Promise.all(targets.map((target) => sink.record(target, 'ACTIVE')));

    const lines = readLines(`${prefix}_ACTIVE.txt`);
    expect(lines).toHaveLength(200);
    expect(new Set(lines)).toEqual(new Set(targets));
  });

  it('should keep writing after a failed append', async () => {
    const sink = new ResultSink(path.join(dir, 'missing', 'results'));

    await expect(sink.record('a.example', 'ACTIVE')).rejects.toThrow(/ENOENT/);

    fs.mkdirSync(path.join(dir, 'missing'));
    await sink.record('b.example', 'ACTIVE');

    expect(readLines(path.join(dir, 'missing', 'results_ACTIVE.txt'))).toEqual(['b.example']);
  });

  it('should delete both output files on reset', async () => {
    fs.writeFileSync(`${prefix}_ACTIVE.txt`, 'stale.example\n');
    fs.writeFileSync(`${prefix}_INACTIVE.txt`, 'stale.example\n');
    const sink = new ResultSink(prefix);

    await sink.reset();

    expect(fs.existsSync(`${prefix}_ACTIVE.txt`)).toBe(false);
    expect(fs.existsSync(`${prefix}_INACTIVE.txt`)).toBe(false);
  });

  it('should reset without error when no files exist', async () => {
    await expect(new ResultSink(prefix).reset()).resolves.toBeUndefined();
  });
});
