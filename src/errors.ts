/**
 * Custom error classes for the pwage application.
 */

/**
 * Base application error class.
 */
export class AppError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AppError';
  }
}

/**
 * Errors in flags or configuration, raised before any record is processed.
 */
export class UsageError extends AppError {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }

  static invalidMaxAge(value: string): UsageError {
    return new UsageError(`Invalid max age '${value}'. Max age must be a positive integer.`);
  }

  static invalidLogLevel(value: string, choices: readonly string[]): UsageError {
    return new UsageError(`Invalid log level '${value}'. Choose one of ${choices.join(', ')}.`);
  }

  static invalidDelimiter(value: string): UsageError {
    return new UsageError(`Invalid delimiter '${value}'. Use a single character other than a space or line break.`);
  }

  static invalidDateFormat(format: string, reason: string): UsageError {
    return new UsageError(`Invalid date format '${format}': ${reason}`);
  }

  static fileNotFound(path: string): UsageError {
    return new UsageError(`File not found: ${path}`);
  }

  static inaccessible(path: string, message: string): UsageError {
    return new UsageError(`Cannot access ${path}: ${message}`);
  }

  static notAFile(path: string): UsageError {
    return new UsageError(`Not a regular file: ${path}`);
  }
}

/** Failure category for input errors. */
export type InputErrorCode = 'not-found' | 'io';

/**
 * Errors raised while opening or reading the credential export.
 */
export class InputError extends AppError {
  readonly code: InputErrorCode;

  constructor(code: InputErrorCode, message: string) {
    super(message);
    this.name = 'InputError';
    this.code = code;
  }

  static notFound(path: string): InputError {
    return new InputError('not-found', `File not found: ${path}`);
  }

  static ioError(path: string, message: string): InputError {
    return new InputError('io', `I/O error reading ${path}: ${message}`);
  }
}
