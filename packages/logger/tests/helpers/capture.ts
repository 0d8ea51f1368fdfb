import { Writable } from 'node:stream';

type LogRecord = Record<string, unknown>;

function isRecord(value: unknown): value is LogRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Writable stream that keeps every line written to it
 */
export function captureStream(): { stream: Writable; lines: string[]; records: () => LogRecord[] } {
  const lines: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      lines.push(...String(chunk).split('\n').filter((line) => line.trim().length > 0));
      callback();
    },
  });

  const records = (): LogRecord[] =>
    lines.map((line): unknown => JSON.parse(line)).filter(isRecord);

  return { stream, lines, records };
}
