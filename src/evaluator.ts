/**
 * Age evaluation for parsed credential records.
 */

import { differenceInCalendarDays } from 'date-fns';
import type { AuditConfig, CredentialRecord, Evaluation } from './types.js';
import { parseDate } from './utils/date-format.js';

/** Subset of the configuration the evaluator reads. */
export type EvaluationConfig = Pick<AuditConfig, 'maxAgeDays' | 'dateFormat'>;

/**
 * Computes the age of a record's password and compares it with the threshold.
 *
 * Age is counted in whole calendar days. A last-changed date after `now`
 * counts as age 0, is marked `isFuture` and is never flagged. The
 * threshold is inclusive.
 * @param record The parsed record
 * @param config Threshold and date pattern
 * @param now The current date
 */
export function evaluateRecord(record: CredentialRecord, config: EvaluationConfig, now: Date): Evaluation {
  const changedAt = parseDate(record.lastChanged, config.dateFormat, now);
  if (changedAt === null) {
    return {
      kind: 'invalid-date',
      lineNumber: record.lineNumber,
      identifier: record.identifier,
      rawDate: record.lastChanged,
      reason: `does not match date format ${config.dateFormat.pattern}`,
    };
  }

  const elapsedDays = differenceInCalendarDays(now, changedAt);
  const isFuture = elapsedDays < 0;
  const ageDays = isFuture ? 0 : elapsedDays;

  return {
    kind: 'evaluated',
    record: {
      lineNumber: record.lineNumber,
      identifier: record.identifier,
      ageDays,
      exceedsThreshold: !isFuture && ageDays >= config.maxAgeDays,
    },
    lastChanged: record.lastChanged,
    isFuture,
  };
}
