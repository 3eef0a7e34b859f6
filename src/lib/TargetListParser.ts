import { Transform } from 'stream';
import type { TransformCallback } from 'stream';
import { StringDecoder } from 'string_decoder';

/**
 * A Transform stream that splits text into target lines. Lines may span
 * chunk boundaries; `\r\n` and `\n` endings are both accepted. Each line is
 * trimmed and blank lines are dropped. Buffer chunks are decoded as UTF-8,
 * so a character split across two chunks survives.
 *
 * @example
 * // Input chunks: "example.com\r\n\nhttps://exa", "mple.org/a\n"
 * // Output: "example.com", "https://example.org/a"
 */
export class TargetListParser extends Transform {
  private buffer = '';
  private decoder = new StringDecoder('utf8');

  constructor() {
    super({ readableObjectMode: true, decodeStrings: false });
  }

  _transform(
    chunk: Buffer | string,
    encoding: BufferEncoding,
    callback: TransformCallback
  ): void {
    this.buffer += typeof chunk === 'string' ? chunk : this.decoder.write(chunk);

    let newline = this.buffer.indexOf('\n');
    while (newline !== -1) {
      this.emitLine(this.buffer.slice(0, newline));
      this.buffer = this.buffer.slice(newline + 1);
      newline = this.buffer.indexOf('\n');
    }

    callback();
  }

  /**
   * Emits whatever follows the last newline, so a file without a trailing
   * newline still yields its final target.
   */
  _flush(callback: TransformCallback): void {
    this.emitLine(this.buffer + this.decoder.end());
    this.buffer = '';
    callback();
  }

  private emitLine(line: string): void {
    const target = line.trim();
    if (target) {
      this.push(target);
    }
  }
}

/** Collects every target from a readable source of text. */
export async function readTargets(input: NodeJS.ReadableStream): Promise<string[]> {
  const parser = new TargetListParser();
  const targets: string[] = [];
  const done = new Promise<void>((resolve, reject) => {
    input.on('error', reject);
    parser.on('error', reject);
    parser.on('data', (target: string) => targets.push(target));
    parser.on('end', resolve);
  });
  input.pipe(parser);
  await done;
  return targets;
}
