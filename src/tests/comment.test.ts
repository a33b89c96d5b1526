import { describe, it, expect } from 'vitest';
import { commentParser, helpParser, otherCommentParser, splitHelpText, typeParser } from '../grammar/comment.ts';

describe('typeParser', () => {
  it('parses a name and type keyword', () => {
    expect(typeParser('# TYPE http_request_duration_seconds histogram\n')).toEqual({
      ok: true,
      value: { kind: 'type', name: 'http_request_duration_seconds', type: 'histogram' },
      rest: '',
    });
    expect(typeParser('# TYPE http_request_duration_seconds   summary\n')).toEqual({
      ok: true,
      value: { kind: 'type', name: 'http_request_duration_seconds', type: 'summary' },
      rest: '',
    });
  });

  it('defaults to untyped when the keyword is missing', () => {
    for (const line of [
      '# TYPE http_request_duration_seconds\n',
      '# TYPE http_request_duration_seconds   \n',
      '# TYPE http_request_duration_seconds\r\n',
    ]) {
      expect(typeParser(line)).toEqual({
        ok: true,
        value: { kind: 'type', name: 'http_request_duration_seconds', type: 'untyped' },
        rest: '',
      });
    }
  });

  it('leaves the next line untouched', () => {
    const res = typeParser('# TYPE http_request_duration_seconds   \nfoo');
    expect(res.rest).toBe('foo');
  });

  it('accepts trailing whitespace after the keyword', () => {
    const res = typeParser('# TYPE up gauge \t\n');
    expect(res.ok && res.value).toEqual({ kind: 'type', name: 'up', type: 'gauge' });
  });

  it('rejects unknown type keywords', () => {
    expect(typeParser('# TYPE http_request_duration_seconds sometype\n')).toEqual({
      ok: false,
      rule: 'type_keyword',
      rest: 'sometype\n',
    });
    expect(typeParser('# TYPE up Counter\n')).toEqual({ ok: false, rule: 'type_keyword', rest: 'Counter\n' });
    expect(typeParser('# TYPE up counterx\n')).toEqual({ ok: false, rule: 'type_keyword', rest: 'counterx\n' });
  });

  it('rejects extra words after the keyword', () => {
    expect(typeParser('# TYPE up gauge extra\n')).toEqual({ ok: false, rule: 'line_ending', rest: 'extra\n' });
  });

  it('rejects an invalid metric name', () => {
    expect(typeParser('# TYPE 1up gauge\n')).toEqual({ ok: false, rule: 'token', rest: '1up gauge\n' });
  });
});

describe('helpParser', () => {
  it('does not match TYPE lines or plain comments', () => {
    expect(helpParser('# TYPE http_request_duration_seconds histogram\n').ok).toBe(false);
    expect(helpParser("# This is a comment and we don't care about it\n").ok).toBe(false);
  });

  it('returns the raw text and splits off the metric name', () => {
    expect(helpParser('# HELP http_request_duration_seconds histogram\nfoo')).toEqual({
      ok: true,
      value: {
        kind: 'help',
        text: 'http_request_duration_seconds histogram',
        name: 'http_request_duration_seconds',
        help: 'histogram',
      },
      rest: 'foo',
    });
  });

  it('does not unescape help text', () => {
    const res = helpParser('# HELP path_bytes Bytes under C:\\\\ and \\n more\n');
    expect(res.ok && res.value).toEqual({
      kind: 'help',
      text: 'path_bytes Bytes under C:\\\\ and \\n more',
      name: 'path_bytes',
      help: 'Bytes under C:\\\\ and \\n more',
    });
  });
});

describe('splitHelpText', () => {
  it('separates name and docstring', () => {
    expect(splitHelpText('up Whether the target is up.')).toEqual({ name: 'up', help: 'Whether the target is up.' });
    expect(splitHelpText('up')).toEqual({ name: 'up', help: '' });
    expect(splitHelpText('up\t  spaced')).toEqual({ name: 'up', help: 'spaced' });
  });

  it('reports no name when the text does not start with a token', () => {
    expect(splitHelpText('1 apple')).toEqual({ name: undefined, help: '1 apple' });
    expect(splitHelpText('up-time is tracked')).toEqual({ name: undefined, help: 'up-time is tracked' });
  });
});

describe('otherCommentParser', () => {
  it('accepts any # line', () => {
    expect(otherCommentParser('# TYPE http_request_duration_seconds histogram\n').ok).toBe(true);
    expect(otherCommentParser('# TYPE http_request_duration_seconds histogram\nfoo').rest).toBe('foo');
    expect(otherCommentParser("#This is a comment and we don't care about it\n")).toEqual({
      ok: true,
      value: { kind: 'other', text: "This is a comment and we don't care about it" },
      rest: '',
    });
    expect(otherCommentParser('#\n').ok).toBe(true);
  });

  it('rejects lines that do not start with #', () => {
    expect(otherCommentParser('foo bar\n')).toEqual({ ok: false, rule: 'comment', rest: 'foo bar\n' });
  });

  it('requires a line break', () => {
    expect(otherCommentParser('# dangling')).toEqual({ ok: false, rule: 'line_ending', rest: '' });
  });
});

describe('commentParser', () => {
  it('rejects non-comment lines', () => {
    expect(commentParser('_TYPE histogram\n')).toEqual({ ok: false, rule: 'comment', rest: '_TYPE histogram\n' });
  });

  it('classifies generic, help and type comments', () => {
    expect(commentParser('# http_request_duration_seconds histogram\n')).toEqual({
      ok: true,
      value: { kind: 'other', text: ' http_request_duration_seconds histogram' },
      rest: '',
    });
    expect(commentParser('# HELP some info\n')).toEqual({
      ok: true,
      value: { kind: 'help', text: 'some info', name: 'some', help: 'info' },
      rest: '',
    });
    expect(commentParser('# TYPE http_request_duration_seconds histogram\n')).toEqual({
      ok: true,
      value: { kind: 'type', name: 'http_request_duration_seconds', type: 'histogram' },
      rest: '',
    });
  });

  it('does not let a bad TYPE line fall through to a generic comment', () => {
    expect(commentParser('# TYPE up sometype\n')).toEqual({ ok: false, rule: 'type_keyword', rest: 'sometype\n' });
  });

  it('treats TYPE without a following name as a generic comment', () => {
    expect(commentParser('# TYPE\n')).toEqual({ ok: true, value: { kind: 'other', text: ' TYPE' }, rest: '' });
    expect(commentParser('# TYPEWRITER up\n').ok).toBe(true);
  });

  it('treats TYPE followed by an invalid or missing name as a generic comment', () => {
    expect(commentParser('# TYPE \n')).toEqual({ ok: true, value: { kind: 'other', text: ' TYPE ' }, rest: '' });
    expect(commentParser('# TYPE 9bad counter\n')).toEqual({
      ok: true,
      value: { kind: 'other', text: ' TYPE 9bad counter' },
      rest: '',
    });
  });
});
