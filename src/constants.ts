/**
 * Centralized constants for defaults, limits and exit codes.
 */

/** Program version reported by --version. */
export const VERSION = '0.1.0';

/** Default maximum password age in days before a record is flagged. */
export const DEFAULT_MAX_AGE_DAYS = 90;

/** Default strptime-style pattern for the last-changed field. */
export const DEFAULT_DATE_FORMAT = '%Y-%m-%d';

/** Default field delimiter for credential export lines. */
export const DEFAULT_DELIMITER = ',';

/** Default log level name. */
export const DEFAULT_LOG_LEVEL = 'INFO';

/** Accepted log level names, least to most severe. */
export const LOG_LEVELS = ['DEBUG', 'INFO', 'WARNING', 'ERROR', 'CRITICAL'] as const;

/** Number of fields every record line must provide. */
export const RECORD_FIELD_COUNT = 3;

/** Chunk size in bytes for streaming the input file (64 KiB). */
export const READ_CHUNK_SIZE = 64 * 1024;

/** Placeholder that replaces masked fields in malformed-line excerpts. */
export const MASK = '***';

/** Process exit codes. */
export const EXIT_CODES = {
  ok: 0,
  violations: 1,
  usage: 2,
  runtime: 3,
} as const;

/** Regex pattern for a positive base-10 integer. */
export const POSITIVE_INTEGER_REGEX = /^\d+$/;
