import fs from 'fs';
import { Writable } from 'stream';

/** Writable that keeps everything written to it, for asserting console output. */
export class MemoryStream extends Writable {
  private readonly chunks: string[] = [];

  _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.chunks.push(chunk.toString());
    callback();
  }

  get text(): string {
    return this.chunks.join('');
  }

  lines(): string[] {
    return this.text.split('\n').filter((line) => line !== '');
  }
}

/** Lets records already handed to a winston logger reach its transports. */
export function settle(ms = 20): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Polls `filePath` until `predicate` accepts its lines, then returns them. */
export async function waitForLines(filePath: string, predicate: (lines: string[]) => boolean, timeoutMs = 2000): Promise<string[]> {
  const deadline = Date.now() + timeoutMs;
  for (;;) {
    const lines = fs
      .readFileSync(filePath, 'utf-8')
      .split('\n')
      .filter((line) => line !== '');
    if (predicate(lines) || Date.now() > deadline) return lines;
    await settle(10);
  }
}
