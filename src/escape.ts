/**
 * Text escaping and unescaping for vCard v4 (RFC 6350 section 3.4)
 *
 * In TEXT value types:
 *   \\ → \
 *   \n or \N → newline (U+000A)
 *   \, → ,
 *   \; → ;
 *
 * Parameter values use the caret encoding of RFC 6868 instead:
 *   ^n → newline, ^^ → ^, ^' → "
 */

import { ValueError } from './errors.js';

/** Unescape a single text component (after splitting on `;` or `,`) */
export function unescapeText(s: string): string {
  return s.replace(/\\(\\|n|N|,|;)/g, (_, c: string) => {
    if (c === 'n' || c === 'N') return '\n';
    return c;
  });
}

// C0 controls other than TAB and LF, plus DEL, have no escaped form
const UNREPRESENTABLE = /[\u0000-\u0008\u000B-\u001F\u007F]/;

/**
 * Escape a text value for use as a TEXT property value or as one component of
 * a structured/list value. The caller joins components with `;` or `,`.
 *
 * @throws ValueError if the text contains a control character that cannot be
 *   written on a content line
 */
export function escapeText(s: string, property?: string): string {
  const bad = UNREPRESENTABLE.exec(s);
  if (bad) {
    const code = bad[0].charCodeAt(0).toString(16).toUpperCase().padStart(4, '0');
    throw new ValueError(`Text contains control character U+${code} which cannot be escaped`, property, s);
  }
  return s
    .replace(/\\/g, '\\\\')
    .replace(/\n/g, '\\n')
    .replace(/,/g, '\\,')
    .replace(/;/g, '\\;');
}

/** Split `value` on unescaped occurrences of `separator`, keeping escapes */
function splitUnescaped(value: string, separator: string): string[] {
  const parts: string[] = [];
  let start = 0;
  for (let i = 0; i < value.length; i++) {
    const ch = value.charAt(i);
    if (ch === '\\') {
      i++;
    } else if (ch === separator) {
      parts.push(value.slice(start, i));
      start = i + 1;
    }
  }
  parts.push(value.slice(start));
  return parts;
}

/**
 * Split a structured value on `;`, respecting backslash escapes.
 * Returns raw (still-escaped) components.
 */
export function splitStructured(value: string): string[] {
  return splitUnescaped(value, ';');
}

/**
 * Split a compound value on `,`, respecting backslash escapes.
 * Returns raw (still-escaped) items.
 */
export function splitList(value: string): string[] {
  return splitUnescaped(value, ',');
}

/** Unescape and split a structured value into its components */
export function parseStructured(value: string): string[] {
  return splitStructured(value).map(unescapeText);
}

/** Unescape and split a list value into its items */
export function parseList(value: string): string[] {
  return splitList(value).map(unescapeText);
}

/** Unescape and split a structured-with-lists value.
 *  Each `;`-separated component may itself be a `,`-separated list.
 *  An empty component yields an empty list.
 */
export function parseStructuredList(value: string): string[][] {
  return splitStructured(value).map(component => (component === '' ? [] : parseList(component)));
}

// ── Parameter values ──────────────────────────────────────────────────────

/**
 * Check whether a parameter value needs quoting (RFC 6350 section 5).
 * Param values containing `:`, `;`, or `,` must be quoted.
 */
export function needsParamQuoting(value: string): boolean {
  return /[;:,]/.test(value);
}

/**
 * Encode `^`, line breaks and `"` with RFC 6868 caret sequences. CRLF and a
 * bare CR are written as `^n`, like LF.
 *
 * @throws ValueError for any other control character
 */
export function encodeParamValue(value: string, property?: string): string {
  const encoded = value.replace(/\^/g, '^^').replace(/\r\n|\r|\n/g, '^n').replace(/"/g, "^'");
  const bad = UNREPRESENTABLE.exec(encoded);
  if (bad) {
    const code = bad[0].charCodeAt(0).toString(16).toUpperCase().padStart(4, '0');
    throw new ValueError(`Parameter value contains control character U+${code} which cannot be encoded`, property, value);
  }
  return encoded;
}

/**
 * Decode RFC 6868 caret sequences. A caret not followed by `n`, `^` or `'`
 * is kept as is.
 */
export function decodeParamValue(value: string): string {
  return value.replace(/\^(n|N|\^|')/g, (_, c: string) => {
    if (c === 'n' || c === 'N') return '\n';
    if (c === "'") return '"';
    return '^';
  });
}

/** Encode and, if necessary, quote a parameter value for output */
export function quoteParamValue(value: string, property?: string): string {
  const encoded = encodeParamValue(value, property);
  return needsParamQuoting(encoded) ? `"${encoded}"` : encoded;
}
