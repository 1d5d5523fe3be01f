/**
 * vCard v4 generator — RFC 6350
 *
 * Strict output:
 *   - CRLF line endings (§3.2)
 *   - Line folding at 75 octets (§3.2), never inside a grapheme or an escape pair
 *   - BEGIN:VCARD, VERSION:4.0 and END:VCARD at fixed positions
 *   - Properties in stored order
 *   - Parameter values caret-encoded (RFC 6868) and quoted when necessary
 */

import type { ParameterMap } from './types.js';
import { ValueError } from './errors.js';
import { quoteParamValue } from './escape.js';
import { formatValue } from './values.js';
import { assertValid, SUPPORTED_VERSION } from './validator.js';
import type { Property } from './property.js';

// ── Line folding ──────────────────────────────────────────────────────────

const MAX_LINE_OCTETS = 75;

const graphemes = new Intl.Segmenter(undefined, { granularity: 'grapheme' });

function octets(s: string): number {
  return Buffer.byteLength(s, 'utf8');
}

/**
 * Units a fold may not split: grapheme clusters, with a backslash joined to
 * the cluster it escapes. A unit wider than a continuation line falls back
 * to code points.
 */
function foldUnits(line: string): string[] {
  const clusters = Array.from(graphemes.segment(line), s => s.segment);
  const units: string[] = [];
  for (let i = 0; i < clusters.length; i++) {
    let unit = clusters[i] ?? '';
    if (unit === '\\' && i + 1 < clusters.length) unit += clusters[++i] ?? '';
    if (octets(unit) > MAX_LINE_OCTETS - 1) units.push(...Array.from(unit));
    else units.push(unit);
  }
  return units;
}

/**
 * Fold a content line to at most 75 octets per line (RFC 6350 §3.2).
 * Continuation lines begin with a single space.
 * Counts UTF-8 bytes, not characters.
 */
export function foldLine(line: string): string {
  if (octets(line) <= MAX_LINE_OCTETS) {
    return line + '\r\n';
  }

  const parts: string[] = [];
  let current = '';
  let used = 0;
  // First segment: 75 octets max.
  // Continuation segments: 74 octets of content + 1-byte leading space = 75.
  let maxBytes = MAX_LINE_OCTETS;

  for (const unit of foldUnits(line)) {
    const size = octets(unit);
    if (used + size > maxBytes && current !== '') {
      parts.push(current);
      current = '';
      used = 0;
      maxBytes = MAX_LINE_OCTETS - 1;
    }
    current += unit;
    used += size;
  }
  parts.push(current);

  return parts.join('\r\n ') + '\r\n';
}

// ── Parameter serialization ───────────────────────────────────────────────

/**
 * Serialize a ParameterMap to string (without leading semicolon).
 * Multiple values for the same parameter are joined with commas.
 * CHARSET is never written.
 */
export function serializeParameters(params: ParameterMap, property?: string): string {
  const parts: string[] = [];

  for (const [name, values] of params) {
    if (values.length === 0 || name === 'CHARSET') continue;
    parts.push(`${name}=${values.map(v => quoteParamValue(v, property)).join(',')}`);
  }

  return parts.join(';');
}

// ── Content line serialization ────────────────────────────────────────────

/** Parameters as written: ENCODING=b is added to binary values lacking it */
function outputParameters(prop: Property): ParameterMap {
  const binary = prop.value.kind === 'binary';
  if (!binary && prop.params.has('ENCODING')) {
    throw new ValueError(`ENCODING on ${prop.name} requires a binary value`, prop.name);
  }
  if (!binary || prop.params.has('ENCODING')) return prop.params;
  return new Map<string, readonly string[]>([...prop.params, ['ENCODING', ['b']]]);
}

/** A property as one unfolded content line, without line terminator */
export function contentLine(prop: Property): string {
  const namePart = prop.group ? `${prop.group}.${prop.name}` : prop.name;
  const paramStr = serializeParameters(outputParameters(prop), prop.name);
  const separator = paramStr ? `;${paramStr}` : '';
  return `${namePart}${separator}:${formatValue(prop.value, prop.name)}`;
}

/**
 * Serialize a single Property to a folded content line string (with CRLF).
 */
export function serializeProperty(prop: Property): string {
  return foldLine(contentLine(prop));
}

// ── Generation options ────────────────────────────────────────────────────

export interface GenerateOptions {
  /**
   * Whether to validate the vCard before generating.
   * Default: true
   */
  validate?: boolean;
}

// ── Card serialization ────────────────────────────────────────────────────

/**
 * Serialize a list of properties to a vCard string.
 * VERSION is always written second, whatever its stored position.
 *
 * @throws ValidationError if validation is enabled and the vCard is invalid
 * @throws ValueError for a value that has no textual form
 */
export function serializeVcard(properties: readonly Property[], options: GenerateOptions = {}): string {
  if (options.validate !== false) {
    assertValid(properties);
  }

  let output = 'BEGIN:VCARD\r\n';
  output += `VERSION:${SUPPORTED_VERSION}\r\n`;

  for (const prop of properties) {
    if (prop.key === 'VERSION') continue;
    output += serializeProperty(prop);
  }

  output += 'END:VCARD\r\n';
  return output;
}
