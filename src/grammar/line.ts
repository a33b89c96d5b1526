import { commentParser, type CommentLine } from './comment.ts';
import { lineEnding, spaceRun, success, type ParseResult } from './result.ts';
import { sampleParser, type SampleEntry } from './sample.ts';

export type LineType =
  | { kind: 'comment'; comment: CommentLine }
  | { kind: 'sample'; sample: SampleEntry }
  | { kind: 'empty' };

/** Only spaces/tabs before the line break. */
export function emptyLineParser(input: string): ParseResult<null> {
  return lineEnding(input.slice(spaceRun(input)));
}

/**
 * Classify one line: comment, then sample, then blank.
 * On failure the rejection that got furthest into the line is reported; on a
 * tie the comment rejection wins for `#` lines and the sample one otherwise.
 */
export function lineParser(input: string): ParseResult<LineType> {
  const comment = commentParser(input);
  if (comment.ok) return success<LineType>({ kind: 'comment', comment: comment.value }, comment.rest);

  const sample = sampleParser(input);
  if (sample.ok) return success<LineType>({ kind: 'sample', sample: sample.value }, sample.rest);

  const empty = emptyLineParser(input);
  if (empty.ok) return success<LineType>({ kind: 'empty' }, empty.rest);

  const ranked = input.startsWith('#') ? [comment, sample, empty] : [sample, comment, empty];
  return ranked.reduce((best, candidate) => (candidate.rest.length < best.rest.length ? candidate : best));
}
