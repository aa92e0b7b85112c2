/**
 * Logger construction.
 */

import pino, { type DestinationStream, type Level, type Logger } from 'pino';
import type { LogLevel } from './types.js';

/** pino level for each command-line log level. */
const PINO_LEVELS: Readonly<Record<LogLevel, Level>> = {
  DEBUG: 'debug',
  INFO: 'info',
  WARNING: 'warn',
  ERROR: 'error',
  CRITICAL: 'fatal',
};

export function toPinoLevel(level: LogLevel): Level {
  return PINO_LEVELS[level];
}

/**
 * Creates the audit logger. Entries go to stderr unless another destination
 * is given, and any `secret` key is censored.
 */
export function createLogger(level: LogLevel, destination?: DestinationStream): Logger {
  return pino(
    {
      name: 'pwage',
      level: toPinoLevel(level),
      base: undefined,
      timestamp: pino.stdTimeFunctions.isoTime,
      redact: {
        paths: ['secret', '*.secret'],
        censor: '[REDACTED]',
      },
    },
    destination ?? pino.destination({ dest: 2, sync: true })
  );
}
