/**
 * Codec: header+body text format.
 *
 * A file is a run of `name: value` header lines ended by the first blank
 * line, followed by a free-text body:
 *
 * ```text
 * title: A value long enough to need folding continues on the next
 *     line, indented
 * tags: one, two
 *
 * Body text...
 * ```
 *
 * Long headers are folded at word boundaries; a line that starts with
 * whitespace continues the previous header. Unfolding turns every newline
 * plus leading whitespace back into a single space.
 */

import { FormatError } from './errors.js';
import type { FoldOptions, Header, ParsedHeader, ParsedText } from './types.js';

/** Maximum width of a written header line. */
export const WRAP_WIDTH = 72;
/** Prefix of folded continuation lines. */
export const CONTINUATION_INDENT = '    ';

/**
 * Join folded lines into one logical line.
 *
 * @example
 * ```ts
 * unfold('line one\n    line two'); // 'line one line two'
 * ```
 */
export function unfold(text: string): string {
  return text.replace(/\r?\n[ \t]+/g, ' ');
}

/**
 * Wrap a logical header line at word boundaries. Words are never split, so
 * a word longer than the width gets a line of its own. Newlines in the input
 * are treated as spaces.
 *
 * `unfold(fold(line)) === line` for any line without newlines.
 */
export function fold(line: string, options: FoldOptions = {}): string {
  const width = options.width ?? WRAP_WIDTH;
  const indent = options.indent ?? CONTINUATION_INDENT;
  const [first, ...words] = line.replace(/\r?\n/g, ' ').split(' ');

  const lines: string[] = [];
  let current = first;
  for (const word of words) {
    // Only break before a word that starts with a visible character:
    // unfolding swallows any whitespace after the indent.
    const breakable = /^\S/.test(word) && current.trim() !== '';
    if (breakable && current.length + 1 + word.length > width) {
      lines.push(current);
      current = indent + word;
    } else {
      current += ' ' + word;
    }
  }
  lines.push(current);
  return lines.join('\n');
}

/**
 * Split text at its first blank line. Returns the header lines (without line
 * terminators) and everything after the blank line, verbatim.
 */
export function splitText(text: string): { head: string[]; body: string } {
  const head: string[] = [];
  let offset = 0;
  while (offset < text.length) {
    const end = text.indexOf('\n', offset);
    const next = end === -1 ? text.length : end + 1;
    const line = text.slice(offset, end === -1 ? text.length : end).replace(/\r$/, '');
    if (line.trim() === '') {
      return { head, body: text.slice(next) };
    }
    head.push(line);
    offset = next;
  }
  return { head, body: '' };
}

/**
 * Parse the header lines of a file into unfolded name/value pairs. Names
 * are trimmed; a value loses only the one blank after the colon.
 *
 * @throws {FormatError} On a line with no `:` or a continuation line with
 *   no header before it.
 */
export function parseHeaders(head: readonly string[]): ParsedHeader[] {
  const headers: ParsedHeader[] = [];
  let pending: string[] = [];
  let start = 0;

  for (let i = 0; i < head.length; i++) {
    const line = head[i];
    if (/^[ \t]/.test(line)) {
      if (pending.length === 0) {
        throw new FormatError('continuation line without a header', i + 1);
      }
      pending.push(line);
      continue;
    }
    if (pending.length > 0) {
      headers.push(toHeader(pending, start));
    }
    pending = [line];
    start = i + 1;
  }
  if (pending.length > 0) {
    headers.push(toHeader(pending, start));
  }
  return headers;
}

/**
 * Parse a whole file.
 *
 * @example
 * ```ts
 * const { headers, body } = parseText('title: Hello\n\nBody\n');
 * headers[0]; // { name: 'title', value: 'Hello', line: 1 }
 * body;       // 'Body\n'
 * ```
 */
export function parseText(text: string): ParsedText {
  const { head, body } = splitText(text);
  return { headers: parseHeaders(head), body };
}

/**
 * Render headers and body. Each header is folded; a non-empty body follows a
 * single blank line and always ends with a newline. With an empty body the
 * text ends right after the last header.
 */
export function renderText(headers: readonly Header[], body: string, options: FoldOptions = {}): string {
  let text = headers.map(({ name, value }) => fold(`${name}: ${value}`, options) + '\n').join('');
  if (body !== '') {
    text += '\n' + body + (body.endsWith('\n') ? '' : '\n');
  }
  return text;
}

function toHeader(lines: readonly string[], line: number): ParsedHeader {
  const logical = unfold(lines.join('\n'));
  const colon = logical.indexOf(':');
  if (colon === -1) {
    throw new FormatError(`expected 'name: value', got '${lines[0]}'`, line);
  }
  const name = logical.slice(0, colon).trim();
  if (name === '') {
    throw new FormatError('header has no name', line);
  }
  // Only the separator blank goes; other whitespace belongs to the value.
  return { name, value: logical.slice(colon + 1).replace(/^[ \t]/, ''), line };
}
