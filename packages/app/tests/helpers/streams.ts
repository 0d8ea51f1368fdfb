import { Readable, Writable } from 'node:stream';

/**
 * Writable stream that keeps everything written to it as one string
 */
export function collectOutput(): { stream: Writable; text: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(String(chunk));
      callback();
    },
  });
  return { stream, text: () => chunks.join('') };
}

/**
 * Readable stream that ends after the given lines
 */
export function inputLines(...lines: string[]): Readable {
  return Readable.from(lines.map((line) => `${line}\n`));
}
