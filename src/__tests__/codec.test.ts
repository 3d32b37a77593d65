/**
 * Codec tests: folding, header parsing and rendering.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  FormatError,
  fold,
  parseHeaders,
  parseText,
  renderText,
  splitText,
  unfold,
  WRAP_WIDTH,
} from '../index.js';
import { expectError } from './helpers.js';

const LONG_LINE =
  'summary: ' + Array.from({ length: 30 }, (_, i) => `word${i}`).join(' ');

// ================================================================
// unfold / fold
// ================================================================

describe('unfold', () => {
  it('joins continuation lines with single spaces', () => {
    assert.equal(unfold('line one\n    line two\n    line three'), 'line one line two line three');
  });

  it('accepts any leading whitespace and CRLF', () => {
    assert.equal(unfold('a\r\n\t b\n  c'), 'a b c');
  });

  it('leaves single lines alone', () => {
    assert.equal(unfold('no folding here'), 'no folding here');
  });
});

describe('fold', () => {
  it('leaves short lines untouched', () => {
    assert.equal(fold('foo: bar'), 'foo: bar');
  });

  it('wraps at word boundaries with an indented continuation', () => {
    assert.equal(fold('aaa bbb ccc ddd', { width: 7 }), 'aaa bbb\n    ccc\n    ddd');
  });

  it('keeps every line within the default width', () => {
    const lines = fold(LONG_LINE).split('\n');
    assert.ok(lines.length > 1);
    for (const line of lines) {
      assert.ok(line.length <= WRAP_WIDTH, `${line.length} > ${WRAP_WIDTH}`);
    }
    for (const line of lines.slice(1)) {
      assert.ok(line.startsWith('    '));
    }
  });

  it('round-trips through unfold', () => {
    assert.equal(unfold(fold(LONG_LINE)), LONG_LINE);
  });

  it('never splits a word longer than the width', () => {
    const word = 'x'.repeat(100);
    assert.equal(fold(`url: ${word}`), `url:\n    ${word}`);
  });

  it('preserves runs of spaces across a break', () => {
    const folded = fold('a  b', { width: 3 });
    assert.equal(folded, 'a \n    b');
    assert.equal(unfold(folded), 'a  b');
  });

  it('writes newlines in a value as spaces', () => {
    assert.equal(fold('note: a\nb'), 'note: a b');
  });
});

// ================================================================
// splitText
// ================================================================

describe('splitText', () => {
  it('splits at the first blank line', () => {
    assert.deepEqual(splitText('foo: bar\nbar: foo\n\nx\n\ny\n'), {
      head: ['foo: bar', 'bar: foo'],
      body: 'x\n\ny\n',
    });
  });

  it('returns an empty body without a separator', () => {
    assert.deepEqual(splitText('foo: bar\n'), { head: ['foo: bar'], body: '' });
  });

  it('treats a whitespace-only line as the separator', () => {
    assert.deepEqual(splitText('a: 1\n   \nbody\n'), { head: ['a: 1'], body: 'body\n' });
  });

  it('handles CRLF headers and keeps the body verbatim', () => {
    assert.deepEqual(splitText('a: 1\r\n\r\nbody\r\n'), { head: ['a: 1'], body: 'body\r\n' });
  });

  it('handles a body with no headers', () => {
    assert.deepEqual(splitText('\nonly body'), { head: [], body: 'only body' });
  });

  it('handles empty text', () => {
    assert.deepEqual(splitText(''), { head: [], body: '' });
  });
});

// ================================================================
// parseHeaders / parseText
// ================================================================

describe('parseHeaders', () => {
  it('unfolds values and records starting lines', () => {
    const headers = parseHeaders([
      'foo: line one',
      '    line two',
      '    line three',
      'bar: line one',
      '  line two',
      '  line three',
    ]);
    assert.deepEqual(headers, [
      { name: 'foo', value: 'line one line two line three', line: 1 },
      { name: 'bar', value: 'line one line two line three', line: 4 },
    ]);
  });

  it('splits at the first colon only', () => {
    assert.deepEqual(parseHeaders(['url: http://example.test/a']), [
      { name: 'url', value: 'http://example.test/a', line: 1 },
    ]);
  });

  it('drops only the blank after the colon', () => {
    assert.deepEqual(parseHeaders(['a:   x  ', 'b:\ty', 'c:z']), [
      { name: 'a', value: '  x  ', line: 1 },
      { name: 'b', value: 'y', line: 2 },
      { name: 'c', value: 'z', line: 3 },
    ]);
  });

  it('rejects a continuation line before any header', () => {
    const err = expectError(FormatError, () => parseHeaders(['  orphan']));
    assert.equal(err.line, 1);
    assert.equal(err.message, 'line 1: continuation line without a header');
  });

  it('rejects a line without a colon', () => {
    const err = expectError(FormatError, () => parseHeaders(['foo: ok', 'garbage']));
    assert.equal(err.line, 2);
    assert.equal(err.message, "line 2: expected 'name: value', got 'garbage'");
  });

  it('rejects a header without a name', () => {
    const err = expectError(FormatError, () => parseHeaders([': value']));
    assert.equal(err.message, 'line 1: header has no name');
  });
});

describe('parseText', () => {
  it('parses headers and body together', () => {
    const parsed = parseText('title: Hello\n\nBody\n');
    assert.deepEqual(parsed, {
      headers: [{ name: 'title', value: 'Hello', line: 1 }],
      body: 'Body\n',
    });
  });
});

// ================================================================
// renderText
// ================================================================

describe('renderText', () => {
  it('writes headers, a blank line and the body', () => {
    const text = renderText(
      [
        { name: 'foo', value: 'bar' },
        { name: 'bar', value: 'foo' },
      ],
      'x\ny\n',
    );
    assert.equal(text, 'foo: bar\nbar: foo\n\nx\ny\n');
  });

  it('adds a trailing newline to the body', () => {
    assert.equal(renderText([{ name: 'a', value: '1' }], 'hi'), 'a: 1\n\nhi\n');
  });

  it('ends after the last header when the body is empty', () => {
    assert.equal(renderText([{ name: 'a', value: '1' }], ''), 'a: 1\n');
  });

  it('starts with the separator when there are no headers', () => {
    const text = renderText([], 'hello');
    assert.equal(text, '\nhello\n');
    assert.deepEqual(parseText(text), { headers: [], body: 'hello\n' });
  });

  it('folds long headers so they parse back unchanged', () => {
    const value = LONG_LINE.slice('summary: '.length);
    const text = renderText([{ name: 'summary', value }], 'body\n');
    assert.ok(text.split('\n\n')[0].includes('\n    '));
    assert.deepEqual(parseText(text).headers, [{ name: 'summary', value, line: 1 }]);
  });
});
