import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';

vi.mock('../src/utils/fileio.js', async () => {
  const { InputError } = await import('../src/errors.js');
  return {
    *readLines(filePath: string): Generator<string, void, undefined> {
      yield 'alice,hunter2,2020-01-01';
      yield 'erin,correct-horse,2026-10-01';
      throw InputError.ioError(filePath, 'EIO: i/o error, read');
    },
  };
});

import { executeAudit } from '../src/commands/audit.js';
import { run } from '../src/cli.js';
import { AuditReporter } from '../src/reporter.js';
import { createLogger } from '../src/logger.js';
import { translateDateFormat } from '../src/utils/date-format.js';
import { createLogCollector, createSink } from './helpers.js';

describe('I/O failure part way through a file', () => {
  let tempDir: string;
  let filePath: string;
  const now = new Date(2026, 9, 19, 9, 0, 0);

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pwage-read-error-'));
    filePath = path.join(tempDir, 'creds.csv');
    fs.writeFileSync(filePath, 'placeholder\n');
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('keeps the results read so far and returns the error', () => {
    const out = createSink();
    const reporter = new AuditReporter(out, createLogger('INFO', createLogCollector()), 30);

    const outcome = executeAudit(
      {
        file: filePath,
        config: {
          maxAgeDays: 30,
          dateFormat: translateDateFormat('%Y-%m-%d'),
          logLevel: 'INFO',
          delimiter: ',',
          hasHeader: false,
        },
        now,
      },
      reporter
    );

    expect(outcome.summary).toEqual({ checked: 2, expired: 1, malformed: 0, invalidDates: 0, futureDates: 0 });
    expect(outcome.readError?.code).toBe('io');
    expect(out.text()).toBe(
      [
        'EXPIRED alice (line 1): password is 2483 days old, exceeding the maximum age of 30 days',
        'Summary: checked=2 expired=1 malformed=0 invalid_dates=0 future_dates=0',
        'Found 1 password(s) exceeding the maximum age of 30 days.',
        '',
      ].join('\n')
    );
  });

  it('exits with code 3 from the CLI', () => {
    const stdout = createSink();
    const stderr = createSink();

    const code = run([filePath, '--max_age', '30'], {
      stdout,
      stderr,
      now,
      logDestination: createLogCollector(),
    });

    expect(code).toBe(3);
    expect(stderr.text()).toBe(`Error: I/O error reading ${filePath}: EIO: i/o error, read\n`);
    expect(stdout.text()).toContain('Summary: checked=2 expired=1');
  });
});
