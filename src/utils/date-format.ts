/**
 * Translation of strptime-style date patterns into date-fns patterns.
 */

import { format, isValid, parse } from 'date-fns';
import { UsageError } from '../errors.js';
import type { DateFormat } from '../types.js';

/**
 * date-fns tokens for each supported strptime directive. Numeric fields use
 * the single-letter tokens so that unpadded values (e.g. 2024-3-7) parse too.
 */
const DIRECTIVES: Readonly<Partial<Record<string, string>>> = {
  Y: 'yyyy',
  y: 'yy',
  m: 'M',
  d: 'd',
  j: 'D',
  H: 'H',
  I: 'h',
  M: 'm',
  S: 's',
  f: 'SSSSSS',
  p: 'a',
  b: 'MMM',
  h: 'MMM',
  B: 'MMMM',
};

/** Allows the day-of-year token used for %j. */
const PARSE_OPTIONS = { useAdditionalDayOfYearTokens: true } as const;

/** Fixed date used to check that a pattern can both format and parse. */
const PROBE_DATE = new Date(2024, 0, 15, 13, 45, 30, 123);

/**
 * Escapes literal text for a date-fns pattern. Runs containing letters are
 * quoted; apostrophes are doubled.
 */
function quoteLiteral(text: string): string {
  const escaped = text.replace(/'/g, "''");
  return /[A-Za-z]/.test(text) ? `'${escaped}'` : escaped;
}

/**
 * Translates a strptime-style pattern into a date-fns pattern.
 * @param pattern A pattern such as %Y-%m-%d or %d/%m/%y %H:%M
 * @returns The pattern and its date-fns translation
 * @throws UsageError for unsupported directives, a dangling %, or no directives at all
 */
export function translateDateFormat(pattern: string): DateFormat {
  let tokens = '';
  let literal = '';
  let directiveCount = 0;

  for (let i = 0; i < pattern.length; i++) {
    const char = pattern[i];
    if (char !== '%') {
      literal += char;
      continue;
    }

    if (i + 1 >= pattern.length) {
      throw UsageError.invalidDateFormat(pattern, 'pattern ends with a dangling %');
    }
    const directive = pattern.charAt(++i);

    if (directive === '%') {
      literal += '%';
      continue;
    }

    const token = DIRECTIVES[directive];
    if (token === undefined) {
      throw UsageError.invalidDateFormat(pattern, `unsupported directive %${directive}`);
    }

    tokens += quoteLiteral(literal) + token;
    literal = '';
    directiveCount++;
  }
  tokens += quoteLiteral(literal);

  if (directiveCount === 0) {
    throw UsageError.invalidDateFormat(pattern, 'pattern contains no date directives');
  }

  return { pattern, tokens };
}

/**
 * Parses date text with a translated pattern.
 * @param text The raw date text
 * @param dateFormat The translated pattern
 * @param referenceDate Supplies any fields the pattern leaves out
 * @returns The parsed date, or null when the text does not match
 */
export function parseDate(text: string, dateFormat: DateFormat, referenceDate: Date): Date | null {
  const parsed = parse(text, dateFormat.tokens, referenceDate, PARSE_OPTIONS);
  return isValid(parsed) ? parsed : null;
}

/**
 * Translates a pattern and checks that a known date survives a format and
 * parse round trip with it.
 * @throws UsageError if the pattern is unsupported or cannot parse its own output
 */
export function validateDateFormat(pattern: string): DateFormat {
  const dateFormat = translateDateFormat(pattern);

  let probe: Date | null;
  try {
    const text = format(PROBE_DATE, dateFormat.tokens, PARSE_OPTIONS);
    probe = parseDate(text, dateFormat, PROBE_DATE);
  } catch (error) {
    throw UsageError.invalidDateFormat(pattern, error instanceof Error ? error.message : String(error));
  }

  if (probe === null) {
    throw UsageError.invalidDateFormat(pattern, 'pattern cannot parse dates it formats');
  }
  return dateFormat;
}
