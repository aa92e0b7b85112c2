/**
 * Audit command implementation.
 */

import { InputError } from '../errors.js';
import { evaluateRecord } from '../evaluator.js';
import { parseLine } from '../record.js';
import type { AuditReporter } from '../reporter.js';
import type { AuditConfig, AuditSummary } from '../types.js';
import { readLines } from '../utils/fileio.js';

/**
 * Request parameters for the audit command.
 */
export interface AuditRequest {
  /** Credential export to scan. */
  file: string;
  config: AuditConfig;
  /** The date ages are measured against. */
  now: Date;
}

/**
 * Result of the audit operation.
 */
export interface AuditOutcome {
  summary: AuditSummary;
  /** Set when reading stopped part way; the summary covers the lines read before it. */
  readError?: InputError;
}

/**
 * Scans a credential export in a single pass and reports every record.
 *
 * Malformed lines and unparseable dates are reported and skipped. An I/O
 * failure part way through stops the scan; the summary for what was read
 * is still written and the error is returned in the outcome.
 * @param request Audit request
 * @param reporter Receives each finding in file order
 * @throws InputError with code 'not-found' if the file disappears before it is opened
 */
export function executeAudit(request: AuditRequest, reporter: AuditReporter): AuditOutcome {
  const { config, now } = request;
  let lineNumber = 0;
  let headerPending = config.hasHeader;

  try {
    for (const line of readLines(request.file)) {
      lineNumber++;
      const parsed = parseLine(line, lineNumber, config.delimiter);

      if (parsed.kind === 'blank') {
        continue;
      }
      if (headerPending) {
        headerPending = false;
        reporter.header(lineNumber);
        continue;
      }
      if (parsed.kind === 'malformed') {
        reporter.malformed(parsed);
        continue;
      }

      reporter.evaluation(evaluateRecord(parsed.record, config, now));
    }
  } catch (error) {
    if (error instanceof InputError && error.code === 'io') {
      return { summary: reporter.finish(), readError: error };
    }
    throw error;
  }

  return { summary: reporter.finish() };
}
