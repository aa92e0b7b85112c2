/**
 * Input validation utilities.
 */

import * as fs from 'node:fs';
import { LOG_LEVELS, POSITIVE_INTEGER_REGEX } from '../constants.js';
import { UsageError } from '../errors.js';
import type { LogLevel } from '../types.js';

/**
 * Validates a maximum age value.
 * @param value Raw flag value
 * @returns The age in days, always greater than zero
 * @throws UsageError if the value is not a positive integer
 */
export function validateMaxAge(value: string): number {
  const trimmed = value.trim();
  if (!POSITIVE_INTEGER_REGEX.test(trimmed)) {
    throw UsageError.invalidMaxAge(value);
  }
  const days = parseInt(trimmed, 10);
  if (days <= 0 || !Number.isSafeInteger(days)) {
    throw UsageError.invalidMaxAge(value);
  }
  return days;
}

/**
 * Validates a log level name, ignoring case.
 * @throws UsageError for names outside DEBUG, INFO, WARNING, ERROR, CRITICAL
 */
export function validateLogLevel(value: string): LogLevel {
  const name = value.trim().toUpperCase();
  const level = LOG_LEVELS.find((candidate) => candidate === name);
  if (level === undefined) {
    throw UsageError.invalidLogLevel(value, LOG_LEVELS);
  }
  return level;
}

/**
 * Validates a field delimiter.
 * @throws UsageError unless the value is one character other than a space or line break
 */
export function validateDelimiter(value: string): string {
  if (value.length !== 1 || /[ \r\n]/.test(value)) {
    throw UsageError.invalidDelimiter(value);
  }
  return value;
}

/**
 * Checks that a path names an existing regular file.
 * @throws UsageError if the path is missing, cannot be inspected, or is not a file
 */
export function ensureFile(filePath: string): void {
  let stats: fs.Stats;
  try {
    stats = fs.statSync(filePath);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw UsageError.fileNotFound(filePath);
    }
    throw UsageError.inaccessible(filePath, error instanceof Error ? error.message : String(error));
  }
  if (!stats.isFile()) {
    throw UsageError.notAFile(filePath);
  }
}
