/**
 * Input driver: classifies the buffer one line at a time.
 *
 * Yields each classified line in order and throws ExpositionParseError at the
 * first line nothing recognizes. There is no skip-and-continue.
 */

import { lineParser, type LineType } from '../grammar/line.ts';
import { ExpositionParseError } from './errors.ts';

export interface ClassifiedLine {
  line: LineType;
  /** 1-based line number in the input. */
  lineNumber: number;
}

export function* readLines(input: string): Generator<ClassifiedLine, void, undefined> {
  let rest = input;
  let lineNumber = 1;
  while (rest.length > 0) {
    const res = lineParser(rest);
    if (!res.ok) {
      const column = rest.length - res.rest.length + 1;
      throw new ExpositionParseError(res.rule, rest, lineNumber, column);
    }
    yield { line: res.value, lineNumber };
    rest = res.rest;
    lineNumber++;
  }
}
