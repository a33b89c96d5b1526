import type { GrammarRule } from '../grammar/result.ts';

/**
 * The single public error kind: a line matched none of comment, sample or
 * blank. Carries the rule that rejected it and the unconsumed input.
 */
export class ExpositionParseError extends Error {
  override readonly name: string = 'ExpositionParseError';

  constructor(
    /** Grammar rule that rejected the input. */
    readonly rule: GrammarRule,
    /** Input from the start of the failing line to the end. */
    readonly remaining: string,
    /** 1-based line number of the failing line. */
    readonly line: number,
    /** 1-based column where the rejecting rule stopped. */
    readonly column: number
  ) {
    super(`Failed to parse line ${line} (${rule}): ${JSON.stringify(firstLine(remaining))}`);
  }

  /** The failing line without its terminator. */
  get snippet(): string {
    return firstLine(this.remaining);
  }
}

function firstLine(s: string): string {
  const nl = s.indexOf('\n');
  const line = nl < 0 ? s : s.slice(0, nl);
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}

/** Precondition guard for the aggregator; a mismatch is a programming error. */
export function assertSameName(expected: string, actual: string): void {
  if (expected !== actual) {
    throw new Error(`Names should be equal when merging into a metric: ${expected} != ${actual}`);
  }
}
