/**
 * Record parsing for credential export lines.
 */

import { MASK, RECORD_FIELD_COUNT } from './constants.js';
import type { LineParseResult } from './types.js';

/** Leading characters that can belong to an account identifier. */
const IDENTIFIER_PREFIX_REGEX = /^[\w.@+-]*/;

/**
 * Builds a printable excerpt of a line that keeps only the start of the
 * first field. The first field is cut at the first character that cannot
 * belong to an identifier, since a line split on the wrong delimiter keeps
 * the whole record there; everything else is masked.
 */
export function maskLine(fields: string[], delimiter: string): string {
  const first = fields[0].trim();
  const prefix = IDENTIFIER_PREFIX_REGEX.exec(first)?.[0] ?? '';
  const head = prefix.length < first.length ? `${prefix}${MASK}` : prefix;
  return [head, ...fields.slice(1).map(() => MASK)].join(delimiter);
}

/**
 * Parses one raw line of a credential export.
 *
 * The first field is the identifier and the last is the last-changed date.
 * Anything in between is the secret, rejoined with the delimiter, so a
 * secret that itself contains the delimiter still yields three fields.
 * @param line The raw line, without its line terminator
 * @param lineNumber 1-based position of the line in the file
 * @param delimiter Field delimiter
 */
export function parseLine(line: string, lineNumber: number, delimiter: string): LineParseResult {
  if (line.trim() === '') {
    return { kind: 'blank', lineNumber };
  }

  const fields = line.split(delimiter);
  if (fields.length < RECORD_FIELD_COUNT) {
    return {
      kind: 'malformed',
      lineNumber,
      excerpt: maskLine(fields, delimiter),
      reason: `expected ${RECORD_FIELD_COUNT} fields, found ${fields.length}`,
    };
  }

  const identifier = fields[0].trim();
  const lastChanged = fields[fields.length - 1].trim();
  const secret = fields.slice(1, -1).join(delimiter).trim();

  return {
    kind: 'record',
    record: { lineNumber, identifier, secret, lastChanged },
  };
}
