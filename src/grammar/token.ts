import { failure, success, type ParseResult } from './result.ts';

// Prometheus metric and label names: [A-Za-z_:][A-Za-z0-9_:]*
// https://prometheus.io/docs/concepts/data_model/#metric-names-and-labels

function isTokenHead(ch: string | undefined): boolean {
  if (ch === undefined) return false;
  return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z') || ch === '_' || ch === ':';
}

function isTokenTail(ch: string | undefined): boolean {
  return isTokenHead(ch) || (ch !== undefined && ch >= '0' && ch <= '9');
}

/** Consumes the longest identifier prefix; fails without consuming when the first char can't start one. */
export function tokenParser(input: string): ParseResult<string> {
  if (!isTokenHead(input[0])) return failure('token', input);
  let i = 1;
  while (isTokenTail(input[i])) i++;
  return success(input.slice(0, i), input.slice(i));
}

export function isValidToken(s: string): boolean {
  const res = tokenParser(s);
  return res.ok && res.rest === '';
}
