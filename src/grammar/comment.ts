/**
 * Comment lines, tried in order:
 *  1. `# TYPE <name> [<type>]`
 *  2. `# HELP <text>`
 *  3. `#<anything>` (ignored)
 *
 * Once a line has matched `# TYPE <name>` it is committed to being a type
 * declaration: an unknown type keyword rejects the line instead of letting it
 * fall through to the generic comment form. `# TYPE` without a valid name
 * after it is an ordinary comment.
 */

import { METRIC_TYPES, type MetricType } from '../types/exposition.ts';
import {
  failure,
  lineEnding,
  restOfLine,
  space1,
  spaceRun,
  success,
  wordRun,
  type ParseResult,
} from './result.ts';
import { tokenParser } from './token.ts';

export type CommentLine =
  | { kind: 'type'; name: string; type: MetricType }
  | { kind: 'help'; text: string; name: string | undefined; help: string }
  | { kind: 'other'; text: string };

function isMetricType(word: string): word is MetricType {
  return METRIC_TYPES.some((t) => t === word);
}

/** Matches `#` WS+ keyword WS+ and returns what follows, or undefined. */
function directive(input: string, keyword: 'TYPE' | 'HELP'): string | undefined {
  if (!input.startsWith('#')) return undefined;
  const lead = space1(input.slice(1));
  if (!lead.ok || !lead.rest.startsWith(keyword)) return undefined;
  const trail = space1(lead.rest.slice(keyword.length));
  return trail.ok ? trail.rest : undefined;
}

function typeBody(input: string): ParseResult<CommentLine> {
  const name = tokenParser(input);
  if (!name.ok) return name;

  let rest = name.rest;
  let type: MetricType = 'untyped';
  const pad = spaceRun(rest);
  if (pad > 0) {
    rest = rest.slice(pad);
    const n = wordRun(rest);
    if (n > 0) {
      const word = rest.slice(0, n);
      if (!isMetricType(word)) return failure('type_keyword', rest);
      type = word;
      rest = rest.slice(n);
    }
  }

  const end = lineEnding(rest.slice(spaceRun(rest)));
  if (!end.ok) return end;
  return success<CommentLine>({ kind: 'type', name: name.value, type }, end.rest);
}

/** Splits help text into the metric name and its docstring; `name` is undefined when the text doesn't start with one. */
export function splitHelpText(text: string): { name: string | undefined; help: string } {
  const name = tokenParser(text);
  if (!name.ok) return { name: undefined, help: text };
  const pad = spaceRun(name.rest);
  if (pad === 0 && name.rest !== '') return { name: undefined, help: text };
  return { name: name.value, help: name.rest.slice(pad) };
}

export function typeParser(input: string): ParseResult<CommentLine> {
  const body = directive(input, 'TYPE');
  if (body === undefined) return failure('comment', input);
  return typeBody(body);
}

export function helpParser(input: string): ParseResult<CommentLine> {
  const body = directive(input, 'HELP');
  if (body === undefined) return failure('comment', input);
  const n = restOfLine(body);
  const end = lineEnding(body.slice(n));
  if (!end.ok) return end;
  const text = body.slice(0, n);
  return success<CommentLine>({ kind: 'help', text, ...splitHelpText(text) }, end.rest);
}

export function otherCommentParser(input: string): ParseResult<CommentLine> {
  if (!input.startsWith('#')) return failure('comment', input);
  const n = restOfLine(input.slice(1));
  const end = lineEnding(input.slice(1 + n));
  if (!end.ok) return end;
  return success<CommentLine>({ kind: 'other', text: input.slice(1, 1 + n) }, end.rest);
}

export function commentParser(input: string): ParseResult<CommentLine> {
  const typeBodyInput = directive(input, 'TYPE');
  if (typeBodyInput !== undefined && tokenParser(typeBodyInput).ok) return typeParser(input);
  const help = helpParser(input);
  if (help.ok) return help;
  return otherCommentParser(input);
}
