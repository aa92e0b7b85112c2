import type { DestinationStream } from 'pino';
import type { TextSink } from '../src/types.js';

/** A pino log entry as written to the destination. */
export interface LogEntry {
  level: number;
  msg: string;
  [key: string]: unknown;
}

/** pino numeric levels. */
export const LEVELS = {
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
} as const;

/** Collects written text. */
export function createSink(): TextSink & { text(): string } {
  const chunks: string[] = [];
  return {
    write(chunk: string) {
      chunks.push(chunk);
    },
    text() {
      return chunks.join('');
    },
  };
}

/** Collects pino output and parses it back into entries. */
export function createLogCollector(): DestinationStream & { raw(): string; entries(): LogEntry[] } {
  const lines: string[] = [];
  return {
    write(msg: string) {
      lines.push(msg);
    },
    raw() {
      return lines.join('');
    },
    entries() {
      return lines.map((line): LogEntry => JSON.parse(line));
    },
  };
}
