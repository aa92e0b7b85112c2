/**
 * Type definitions for the pwage application.
 */

import type { LOG_LEVELS } from './constants.js';

/** Log level names accepted on the command line. */
export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * A date pattern as given by the user together with its date-fns translation.
 */
export interface DateFormat {
  /** The strptime-style pattern, e.g. %Y-%m-%d. */
  pattern: string;
  /** Equivalent date-fns pattern used for parsing. */
  tokens: string;
}

/**
 * Configuration for one audit run. Built once from the flags.
 */
export interface AuditConfig {
  /** Age in days at or above which a password is flagged. */
  maxAgeDays: number;
  dateFormat: DateFormat;
  logLevel: LogLevel;
  /** Single-character field delimiter. */
  delimiter: string;
  /** Skip the first non-blank line as a column header. */
  hasHeader: boolean;
}

/**
 * One parsed credential line.
 */
export interface CredentialRecord {
  /** 1-based line number in the input file. */
  lineNumber: number;
  /** Account name or other identifier. */
  identifier: string;
  /** Opaque password or token. Never logged or printed. */
  secret: string;
  /** Raw last-changed date text. */
  lastChanged: string;
}

/**
 * A record after its age has been computed and compared to the threshold.
 */
export interface EvaluatedRecord {
  lineNumber: number;
  identifier: string;
  /** Whole days since the password was last changed, never negative. */
  ageDays: number;
  exceedsThreshold: boolean;
}

/**
 * Result of parsing one raw line.
 */
export type LineParseResult =
  | { kind: 'record'; record: CredentialRecord }
  | { kind: 'blank'; lineNumber: number }
  | { kind: 'malformed'; lineNumber: number; excerpt: string; reason: string };

/** A line that could not be split into a record. */
export type MalformedLine = Extract<LineParseResult, { kind: 'malformed' }>;

/**
 * Result of evaluating one record.
 */
export type Evaluation =
  | { kind: 'evaluated'; record: EvaluatedRecord; lastChanged: string; isFuture: boolean }
  | { kind: 'invalid-date'; lineNumber: number; identifier: string; rawDate: string; reason: string };

/** A record whose date could not be parsed. */
export type InvalidDate = Extract<Evaluation, { kind: 'invalid-date' }>;

/**
 * Counters collected over one audit run.
 */
export interface AuditSummary {
  /** Records whose age was computed. */
  checked: number;
  expired: number;
  malformed: number;
  invalidDates: number;
  futureDates: number;
}

/**
 * Minimal text sink, satisfied by process.stdout and test collectors.
 */
export interface TextSink {
  write(chunk: string): unknown;
}
