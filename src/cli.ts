/**
 * CLI interface using Commander.js
 */

import { Command, CommanderError, InvalidArgumentError, Option, type OutputConfiguration } from 'commander';
import type { DestinationStream } from 'pino';
import { executeAudit } from './commands/audit.js';
import {
  DEFAULT_DATE_FORMAT,
  DEFAULT_DELIMITER,
  DEFAULT_LOG_LEVEL,
  DEFAULT_MAX_AGE_DAYS,
  EXIT_CODES,
  LOG_LEVELS,
  VERSION,
} from './constants.js';
import { InputError, UsageError } from './errors.js';
import { createLogger } from './logger.js';
import { AuditReporter } from './reporter.js';
import type { AuditConfig, DateFormat, LogLevel, TextSink } from './types.js';
import { translateDateFormat, validateDateFormat } from './utils/date-format.js';
import { ensureFile, validateDelimiter, validateLogLevel, validateMaxAge } from './utils/validation.js';

/** Run a validator and surface its UsageError as a commander argument error. */
function asArgParser<T>(validate: (value: string) => T): (value: string) => T {
  return (value: string) => {
    try {
      return validate(value);
    } catch (error) {
      if (error instanceof UsageError) {
        throw new InvalidArgumentError(error.message);
      }
      throw error;
    }
  };
}

/** Parsed arguments for the audit. */
export interface AuditArgs {
  file: string;
  maxAge: number;
  dateFormat: DateFormat;
  logLevel: LogLevel;
  delimiter: string;
  header: boolean;
}

interface AuditOptions {
  max_age: number;
  date_format: DateFormat;
  log_level: LogLevel;
  delimiter: string;
  header: boolean;
}

/**
 * Create and configure the CLI program.
 * @param onAudit Receives the validated arguments once parsing succeeds
 * @param output Where commander writes help, version and parse errors
 */
export function createProgram(onAudit: (args: AuditArgs) => void, output?: OutputConfiguration): Command {
  const program = new Command();

  program
    .name('pwage')
    .description('Scans a credential export for passwords older than a maximum age')
    .version(VERSION)
    .argument('<file>', 'Credential export with one identifier,secret,last-changed line per record')
    .option(
      '--max_age <days>',
      'Maximum password age in days before a record is flagged',
      asArgParser(validateMaxAge),
      DEFAULT_MAX_AGE_DAYS
    )
    .addOption(
      new Option('--date_format <format>', 'strptime-style pattern of the last-changed field')
        .argParser(asArgParser(validateDateFormat))
        .default(translateDateFormat(DEFAULT_DATE_FORMAT), DEFAULT_DATE_FORMAT)
    )
    .addOption(
      new Option('--log_level <level>', `Log level, one of ${LOG_LEVELS.join(', ')}`)
        .argParser(asArgParser(validateLogLevel))
        .default(DEFAULT_LOG_LEVEL)
    )
    .option('--delimiter <char>', 'Field delimiter', asArgParser(validateDelimiter), DEFAULT_DELIMITER)
    .option('--header', 'Skip the first non-blank line as a column header', false)
    .allowExcessArguments(false)
    .exitOverride()
    .action((file: string, options: AuditOptions) => {
      onAudit({
        file,
        maxAge: options.max_age,
        dateFormat: options.date_format,
        logLevel: options.log_level,
        delimiter: options.delimiter,
        header: options.header,
      });
    });

  if (output) {
    program.configureOutput(output);
  }

  return program;
}

/** Streams and clock used by a CLI run. */
export interface CliIO {
  stdout: TextSink;
  stderr: TextSink;
  /** Overrides the current date. */
  now?: Date;
  /** Overrides the log destination (stderr). */
  logDestination?: DestinationStream;
}

/** Print an error and map it to an exit code. */
function handleError(error: unknown, stderr: TextSink): number {
  if (error instanceof UsageError) {
    stderr.write(`Error: ${error.message}\n`);
    return EXIT_CODES.usage;
  }
  if (error instanceof InputError) {
    stderr.write(`Error: ${error.message}\n`);
    return error.code === 'not-found' ? EXIT_CODES.usage : EXIT_CODES.runtime;
  }
  if (error instanceof Error) {
    stderr.write(`Error: ${error.message}\n`);
    return EXIT_CODES.runtime;
  }
  stderr.write('Error: An unknown error occurred\n');
  return EXIT_CODES.runtime;
}

/**
 * Parses the arguments, runs the audit and returns the process exit code.
 * @param argv User arguments, without the node executable and script path
 */
export function run(argv: string[], io: CliIO): number {
  const parsed: { args?: AuditArgs } = {};
  const program = createProgram(
    (args) => {
      parsed.args = args;
    },
    {
      writeOut: (str) => io.stdout.write(str),
      writeErr: (str) => io.stderr.write(str),
    }
  );

  try {
    program.parse(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_CODES.ok : EXIT_CODES.usage;
    }
    return handleError(error, io.stderr);
  }

  const { args } = parsed;
  if (!args) {
    return EXIT_CODES.usage;
  }

  try {
    ensureFile(args.file);

    const config: AuditConfig = {
      maxAgeDays: args.maxAge,
      dateFormat: args.dateFormat,
      logLevel: args.logLevel,
      delimiter: args.delimiter,
      hasHeader: args.header,
    };
    const logger = createLogger(config.logLevel, io.logDestination);
    const reporter = new AuditReporter(io.stdout, logger, config.maxAgeDays);

    const outcome = executeAudit({ file: args.file, config, now: io.now ?? new Date() }, reporter);

    if (outcome.readError) {
      io.stderr.write(`Error: ${outcome.readError.message}\n`);
      return EXIT_CODES.runtime;
    }
    return outcome.summary.expired > 0 ? EXIT_CODES.violations : EXIT_CODES.ok;
  } catch (error) {
    return handleError(error, io.stderr);
  }
}
