/**
 * Lexical analysis of vCard text (RFC 6350 sections 3.2 – 3.4)
 *
 * Unfolding runs first, then the tokenizer walks the unfolded text once,
 * classifying maximal runs. Each content line is lexed in two modes: before
 * the first unquoted `:` (group, name and parameters) quoted strings and the
 * `. = , ;` delimiters are structural; after it (the value) only backslash
 * escapes and the `, ;` separators are.
 */

import { LexError } from './errors.js';

// ── Line unfolding ─────────────────────────────────────────────────────────

/**
 * Unfold content lines per RFC 6350 §3.2.
 * A line break (CRLF, LF or CR) immediately followed by a single space or tab
 * is removed together with that whitespace character. Other line breaks are
 * left in place.
 */
export function unfold(input: string): string {
  return input.replace(/(?:\r\n|\r|\n)[ \t]/g, '');
}

/**
 * Unfold and split into logical lines, dropping empty ones.
 * Tolerates LF-only and CR-only line endings.
 */
export function unfoldLines(input: string): string[] {
  return unfold(input)
    .split(/\r\n|\r|\n/)
    .filter(line => line.length > 0);
}

// ── Tokens ─────────────────────────────────────────────────────────────────

export type TokenKind =
  | 'word' // run of ALPHA / DIGIT / "-"
  | 'text' // any other run of ordinary characters
  | 'quoted' // DQUOTE-delimited span; `text` holds the content only
  | 'escape' // backslash pair inside a value, e.g. `\,`
  | 'colon'
  | 'semicolon'
  | 'comma'
  | 'dot'
  | 'equals'
  | 'newline';

export interface Token {
  kind: TokenKind;
  text: string;
  /** Content line number, 1-based */
  line: number;
  /** Character offset of the token within its content line */
  offset: number;
}

const ESCAPE_TARGETS = new Set(['\\', ';', ',', 'n', 'N']);

/**
 * Lazily tokenize already-unfolded vCard text.
 *
 * @throws LexError on an unterminated quoted string or an escape sequence
 *   whose target is not one of `\ ; , n N`
 */
export function* tokenize(input: string): Generator<Token, void, undefined> {
  // Sticky patterns are created per call so concurrent streams share nothing
  const word = /[A-Za-z0-9-]+/y;
  const headText = /[^A-Za-z0-9\-:;,.="\r\n]+/y;
  const valueText = /[^\\,;\r\n]+/y;

  let pos = 0;
  let line = 1;
  let lineStart = 0;
  let inValue = false;

  const token = (kind: TokenKind, text: string, start: number): Token => ({
    kind,
    text,
    line,
    offset: start - lineStart,
  });

  const run = (pattern: RegExp): string | undefined => {
    pattern.lastIndex = pos;
    const m = pattern.exec(input);
    return m ? m[0] : undefined;
  };

  while (pos < input.length) {
    const ch = input.charAt(pos);

    if (ch === '\r' || ch === '\n') {
      const length = ch === '\r' && input.charAt(pos + 1) === '\n' ? 2 : 1;
      yield token('newline', input.slice(pos, pos + length), pos);
      pos += length;
      line++;
      lineStart = pos;
      inValue = false;
      continue;
    }

    if (inValue) {
      if (ch === '\\') {
        const target = input.charAt(pos + 1);
        if (!ESCAPE_TARGETS.has(target)) {
          const message =
            target === '' || target === '\r' || target === '\n'
              ? 'Backslash at end of line has nothing to escape'
              : `Invalid escape sequence "\\${target}"`;
          throw new LexError(message, { line, offset: pos - lineStart });
        }
        yield token('escape', input.slice(pos, pos + 2), pos);
        pos += 2;
      } else if (ch === ',') {
        yield token('comma', ch, pos++);
      } else if (ch === ';') {
        yield token('semicolon', ch, pos++);
      } else {
        const text = run(valueText) ?? ch;
        yield token('text', text, pos);
        pos += text.length;
      }
      continue;
    }

    switch (ch) {
      case ':':
        yield token('colon', ch, pos++);
        inValue = true;
        continue;
      case ';':
        yield token('semicolon', ch, pos++);
        continue;
      case ',':
        yield token('comma', ch, pos++);
        continue;
      case '.':
        yield token('dot', ch, pos++);
        continue;
      case '=':
        yield token('equals', ch, pos++);
        continue;
      case '"': {
        let end = pos + 1;
        while (end < input.length) {
          const c = input.charAt(end);
          if (c === '"' || c === '\r' || c === '\n') break;
          end++;
        }
        if (input.charAt(end) !== '"') {
          throw new LexError('Unterminated quoted string', { line, offset: pos - lineStart });
        }
        yield token('quoted', input.slice(pos + 1, end), pos);
        pos = end + 1;
        continue;
      }
    }

    const w = run(word);
    if (w !== undefined) {
      yield token('word', w, pos);
      pos += w.length;
      continue;
    }
    const text = run(headText) ?? ch;
    yield token('text', text, pos);
    pos += text.length;
  }
}
