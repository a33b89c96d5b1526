/**
 * Recognizer result shared by every grammar rule.
 *
 * A recognizer takes the remaining input and either consumes a prefix
 * (`ok: true`, `rest` is what follows) or rejects it (`ok: false`, `rest` is
 * the input at the point the rule gave up).
 */

export type GrammarRule =
  | 'token'
  | 'value'
  | 'timestamp'
  | 'labels'
  | 'label_value'
  | 'whitespace'
  | 'line_ending'
  | 'comment'
  | 'type_keyword';

export type ParseResult<T> =
  | { ok: true; value: T; rest: string }
  | { ok: false; rule: GrammarRule; rest: string };

export type Recognizer<T> = (input: string) => ParseResult<T>;

export function success<T>(value: T, rest: string): ParseResult<T> {
  return { ok: true, value, rest };
}

export function failure<T>(rule: GrammarRule, rest: string): ParseResult<T> {
  return { ok: false, rule, rest };
}

// ─── Shared lexical pieces ──────────────────────────────────────────────────

export function isHorizontalSpace(ch: string | undefined): boolean {
  return ch === ' ' || ch === '\t';
}

/** Length of the leading run of spaces/tabs. */
export function spaceRun(input: string): number {
  let i = 0;
  while (isHorizontalSpace(input[i])) i++;
  return i;
}

/** One or more spaces/tabs. */
export function space1(input: string): ParseResult<null> {
  const n = spaceRun(input);
  if (n === 0) return failure('whitespace', input);
  return success(null, input.slice(n));
}

/** `\n` or `\r\n`. */
export function lineEnding(input: string): ParseResult<null> {
  if (input.startsWith('\n')) return success(null, input.slice(1));
  if (input.startsWith('\r\n')) return success(null, input.slice(2));
  return failure('line_ending', input);
}

/** Length of the leading run that contains no space, tab, CR or LF. */
export function wordRun(input: string): number {
  let i = 0;
  while (i < input.length) {
    const ch = input[i];
    if (ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r') break;
    i++;
  }
  return i;
}

/** Length of the text before the next line terminator (or end of input). */
export function restOfLine(input: string): number {
  let i = 0;
  while (i < input.length) {
    const ch = input[i];
    if (ch === '\n') break;
    if (ch === '\r' && input[i + 1] === '\n') break;
    i++;
  }
  return i;
}
