import type { Labels } from '../types/exposition.ts';
import { labelsParser } from './labels.ts';
import { failure, lineEnding, space1, spaceRun, success, type ParseResult } from './result.ts';
import { tokenParser } from './token.ts';
import { timestampParser, valueParser } from './value.ts';

export interface SampleEntry {
  name: string;
  labels: Labels;
  value: number;
  timestampMs: bigint | undefined;
}

/**
 * One sample line: `name{labels} value [timestamp]` followed by a line break.
 * See https://prometheus.io/docs/instrumenting/exposition_formats/#text-format-example
 *
 * @example
 * const res = sampleParser('http_requests_total{method="post",code="200"} 1027 1395066363000\n');
 * // res.ok && res.value.labels.method === 'post'
 */
export function sampleParser(input: string): ParseResult<SampleEntry> {
  const name = tokenParser(input);
  if (!name.ok) return name;

  // `name {a="b"} 1` is accepted; spaces only count as padding when a label block follows
  let rest = name.rest;
  const pad = spaceRun(rest);
  if (rest[pad] === '{') rest = rest.slice(pad);

  const labels = labelsParser(rest);
  if (!labels.ok) return labels;

  const sep = space1(labels.rest);
  if (!sep.ok) return sep;

  const value = valueParser(sep.rest);
  if (!value.ok) return value;
  rest = value.rest;

  let timestampMs: bigint | undefined;
  const tsSep = space1(rest);
  if (tsSep.ok) {
    const ts = timestampParser(tsSep.rest);
    if (ts.ok) {
      timestampMs = ts.value;
      rest = ts.rest;
    } else if (lineEnding(tsSep.rest).ok) {
      // trailing spaces before the line break aren't part of the grammar
      return failure('line_ending', rest);
    } else {
      return ts;
    }
  }

  const end = lineEnding(rest);
  if (!end.ok) return end;

  return success({ name: name.value, labels: labels.value, value: value.value, timestampMs }, end.rest);
}
