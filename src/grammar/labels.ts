/**
 * Label block: `{name="value",...}` with an optional trailing comma.
 *
 * Label values are double-quoted; `\n`, `\"` and `\\` are the only escapes.
 * A raw line break, a lone backslash or an unknown escape rejects the value.
 * Duplicate names fold into the map, so the later pair wins.
 */

import type { Labels } from '../types/exposition.ts';
import { failure, success, type ParseResult } from './result.ts';
import { tokenParser } from './token.ts';

const ESCAPES: Record<string, string> = {
  n: '\n',
  '"': '"',
  '\\': '\\',
};

export function emptyLabels(): Labels {
  return Object.create(null);
}

export function labelValueParser(input: string): ParseResult<string> {
  if (input[0] !== '"') return failure('label_value', input);
  let out = '';
  let i = 1;
  while (i < input.length) {
    const ch = input.charAt(i);
    if (ch === '"') return success(out, input.slice(i + 1));
    if (ch === '\n') return failure('label_value', input.slice(i));
    if (ch === '\\') {
      const next = input[i + 1];
      const unescaped = next === undefined ? undefined : ESCAPES[next];
      if (unescaped === undefined) return failure('label_value', input.slice(i));
      out += unescaped;
      i += 2;
      continue;
    }
    out += ch;
    i++;
  }
  return failure('label_value', input.slice(i));
}

/** Absent block → empty labels. A `{` that doesn't open a well-formed block fails. */
export function labelsParser(input: string): ParseResult<Labels> {
  const labels = emptyLabels();
  if (input[0] !== '{') return success(labels, input);

  let rest = input.slice(1);
  if (rest.startsWith('}')) return success(labels, rest.slice(1));

  for (;;) {
    const name = tokenParser(rest);
    if (!name.ok) return failure('labels', name.rest);
    if (!name.rest.startsWith('=')) return failure('labels', name.rest);

    const value = labelValueParser(name.rest.slice(1));
    if (!value.ok) return failure(value.rule, value.rest);
    labels[name.value] = value.value;
    rest = value.rest;

    if (rest.startsWith(',')) {
      rest = rest.slice(1);
      if (rest.startsWith('}')) return success(labels, rest.slice(1));
      continue;
    }
    if (rest.startsWith('}')) return success(labels, rest.slice(1));
    return failure('labels', rest);
  }
}
