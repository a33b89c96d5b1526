/**
 * Sample value and timestamp recognizers.
 *
 * Values follow Go's strconv.ParseFloat as described by the exposition format
 * docs: `NaN`, `+Inf`, `-Inf`, or an ordinary float literal.
 */

import { failure, success, wordRun, type ParseResult } from './result.ts';

const FLOAT_LITERAL = /^[+-]?(?:(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?|inf|infinity|nan)$/i;
const INTEGER_LITERAL = /^[+-]?\d+$/;

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

const SPECIAL_VALUES: ReadonlyArray<readonly [string, number]> = [
  ['NaN', Number.NaN],
  ['+Inf', Number.POSITIVE_INFINITY],
  ['-Inf', Number.NEGATIVE_INFINITY],
];

/** Parse a float literal, or undefined when `s` isn't one. */
export function parseFloatLiteral(s: string): number | undefined {
  if (!FLOAT_LITERAL.test(s)) return undefined;
  const unsigned = s.replace(/^[+-]/, '').toLowerCase();
  const negative = s.startsWith('-');
  if (unsigned === 'nan') return Number.NaN;
  if (unsigned === 'inf' || unsigned === 'infinity') {
    return negative ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
  }
  return Number(s);
}

export function valueParser(input: string): ParseResult<number> {
  for (const [literal, value] of SPECIAL_VALUES) {
    if (input.startsWith(literal)) return success(value, input.slice(literal.length));
  }
  const n = wordRun(input);
  if (n === 0) return failure('value', input);
  const value = parseFloatLiteral(input.slice(0, n));
  if (value === undefined) return failure('value', input);
  return success(value, input.slice(n));
}

/** Signed 64-bit integer milliseconds. */
export function timestampParser(input: string): ParseResult<bigint> {
  const n = wordRun(input);
  const word = input.slice(0, n);
  if (!INTEGER_LITERAL.test(word)) return failure('timestamp', input);
  const ts = BigInt(word);
  if (ts < INT64_MIN || ts > INT64_MAX) return failure('timestamp', input);
  return success(ts, input.slice(n));
}
