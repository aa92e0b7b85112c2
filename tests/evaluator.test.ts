import { describe, it, expect } from 'vitest';
import { format, subDays } from 'date-fns';
import { evaluateRecord, type EvaluationConfig } from '../src/evaluator.js';
import { translateDateFormat } from '../src/utils/date-format.js';
import type { CredentialRecord } from '../src/types.js';

function record(lastChanged: string, identifier = 'alice'): CredentialRecord {
  return { lineNumber: 1, identifier, secret: 'hunter2', lastChanged };
}

function config(maxAgeDays: number, pattern = '%Y-%m-%d'): EvaluationConfig {
  return { maxAgeDays, dateFormat: translateDateFormat(pattern) };
}

describe('evaluateRecord', () => {
  const now = new Date(2024, 2, 31, 12, 0, 0);

  it('flags a record whose age equals the threshold', () => {
    const result = evaluateRecord(record('2024-03-01'), config(30), now);

    expect(result).toEqual({
      kind: 'evaluated',
      record: { lineNumber: 1, identifier: 'alice', ageDays: 30, exceedsThreshold: true },
      lastChanged: '2024-03-01',
      isFuture: false,
    });
  });

  it('does not flag a record one day under the threshold', () => {
    const result = evaluateRecord(record('2024-03-02'), config(30), now);

    expect(result.kind).toBe('evaluated');
    if (result.kind === 'evaluated') {
      expect(result.record.ageDays).toBe(29);
      expect(result.record.exceedsThreshold).toBe(false);
    }
  });

  it('counts whole calendar days across years', () => {
    const result = evaluateRecord(record('2020-01-01'), config(30), new Date(2026, 9, 19, 8, 30));

    expect(result.kind).toBe('evaluated');
    if (result.kind === 'evaluated') {
      expect(result.record.ageDays).toBe(2483);
      expect(result.record.exceedsThreshold).toBe(true);
    }
  });

  it('treats a change earlier today as age zero', () => {
    const result = evaluateRecord(record('2024-03-31'), config(1), now);

    expect(result).toEqual({
      kind: 'evaluated',
      record: { lineNumber: 1, identifier: 'alice', ageDays: 0, exceedsThreshold: false },
      lastChanged: '2024-03-31',
      isFuture: false,
    });
  });

  it('clamps future dates to age zero and never flags them', () => {
    const result = evaluateRecord(record('2099-01-01', 'carol'), config(1), now);

    expect(result).toEqual({
      kind: 'evaluated',
      record: { lineNumber: 1, identifier: 'carol', ageDays: 0, exceedsThreshold: false },
      lastChanged: '2099-01-01',
      isFuture: true,
    });
  });

  it('treats tomorrow as a future date', () => {
    const result = evaluateRecord(record('2024-04-01'), config(30), now);

    expect(result.kind === 'evaluated' && result.isFuture).toBe(true);
  });

  it('returns a failure for an unparseable date', () => {
    const result = evaluateRecord(record('not-a-date', 'bob'), config(30), now);

    expect(result).toEqual({
      kind: 'invalid-date',
      lineNumber: 1,
      identifier: 'bob',
      rawDate: 'not-a-date',
      reason: 'does not match date format %Y-%m-%d',
    });
  });

  it('uses the configured date pattern', () => {
    const result = evaluateRecord(record('01/03/2024'), config(30, '%d/%m/%Y'), now);

    expect(result.kind === 'evaluated' && result.record.ageDays).toBe(30);
  });

  it('flags exactly the ages at or above the threshold', () => {
    for (const threshold of [1, 7, 30, 90, 365]) {
      for (const age of [threshold - 1, threshold, threshold + 1]) {
        const changed = format(subDays(now, age), 'yyyy-MM-dd');
        const result = evaluateRecord(record(changed), config(threshold), now);

        expect(result.kind).toBe('evaluated');
        if (result.kind === 'evaluated') {
          expect(result.record.ageDays).toBe(age);
          expect(result.record.exceedsThreshold).toBe(age >= threshold);
        }
      }
    }
  });

  it('gives the same result for the same inputs', () => {
    const first = evaluateRecord(record('2023-06-15'), config(90), now);
    const second = evaluateRecord(record('2023-06-15'), config(90), now);

    expect(second).toEqual(first);
  });
});
