/**
 * Reporting of audit results to an output sink and the logger.
 */

import type { Logger } from 'pino';
import type { AuditSummary, Evaluation, InvalidDate, MalformedLine, TextSink } from './types.js';

/**
 * Collects audit results and writes one report line per finding.
 *
 * Report lines go to `out` regardless of log level. Every finding is
 * also logged with a severity that matches it.
 */
export class AuditReporter {
  private readonly summary: AuditSummary = {
    checked: 0,
    expired: 0,
    malformed: 0,
    invalidDates: 0,
    futureDates: 0,
  };

  constructor(
    private readonly out: TextSink,
    private readonly logger: Logger,
    private readonly maxAgeDays: number
  ) {}

  /** Notes a line skipped as the column header. */
  header(lineNumber: number): void {
    this.logger.debug({ line: lineNumber }, 'Skipping header line');
  }

  /** Reports a line that could not be split into a record. */
  malformed(failure: MalformedLine): void {
    this.summary.malformed++;
    this.logger.warn(
      { line: failure.lineNumber, excerpt: failure.excerpt, reason: failure.reason },
      'Skipping malformed line'
    );
    this.writeLine(`SKIPPED line ${failure.lineNumber}: ${failure.reason} (${failure.excerpt})`);
  }

  /** Reports the outcome of evaluating one record. */
  evaluation(result: Evaluation): void {
    if (result.kind === 'invalid-date') {
      this.invalidDate(result);
      return;
    }

    const { record } = result;
    this.summary.checked++;

    if (result.isFuture) {
      this.summary.futureDates++;
      this.logger.warn(
        { identifier: record.identifier, line: record.lineNumber, lastChanged: result.lastChanged },
        'Last-changed date is in the future'
      );
      this.writeLine(
        `FUTURE ${record.identifier} (line ${record.lineNumber}): last changed '${result.lastChanged}' is in the future, treating age as 0 days`
      );
      return;
    }

    if (record.exceedsThreshold) {
      this.summary.expired++;
      this.logger.warn(
        { identifier: record.identifier, line: record.lineNumber, ageDays: record.ageDays, maxAgeDays: this.maxAgeDays },
        'Password exceeds maximum age'
      );
      this.writeLine(
        `EXPIRED ${record.identifier} (line ${record.lineNumber}): password is ${record.ageDays} days old, exceeding the maximum age of ${this.maxAgeDays} days`
      );
      return;
    }

    this.logger.debug(
      { identifier: record.identifier, line: record.lineNumber, ageDays: record.ageDays },
      'Password within maximum age'
    );
  }

  /**
   * Writes the summary and verdict lines.
   * @returns A copy of the counters
   */
  finish(): AuditSummary {
    const { checked, expired, malformed, invalidDates, futureDates } = this.summary;
    const verdict =
      expired > 0
        ? `Found ${expired} password(s) exceeding the maximum age of ${this.maxAgeDays} days.`
        : 'No passwords exceeding the maximum age found.';

    this.logger.info({ ...this.summary, maxAgeDays: this.maxAgeDays }, verdict);
    this.writeLine(
      `Summary: checked=${checked} expired=${expired} malformed=${malformed} invalid_dates=${invalidDates} future_dates=${futureDates}`
    );
    this.writeLine(verdict);
    return { ...this.summary };
  }

  private invalidDate(failure: InvalidDate): void {
    this.summary.invalidDates++;
    this.logger.error(
      { identifier: failure.identifier, line: failure.lineNumber, rawDate: failure.rawDate, reason: failure.reason },
      'Invalid last-changed date'
    );
    this.writeLine(
      `INVALID ${failure.identifier} (line ${failure.lineNumber}): unparseable date '${failure.rawDate}', ${failure.reason}`
    );
  }

  private writeLine(line: string): void {
    this.out.write(`${line}\n`);
  }
}
