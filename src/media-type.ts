/**
 * MIME media types for MEDIATYPE parameters (RFC 6350 section 5.7,
 * RFC 6838 section 4.2).
 *
 *   type "/" subtype *(";" attribute "=" (token / quoted-string))
 */

import { ValueError } from './errors.js';
import type { Property } from './property.js';

export interface MediaType {
  /** Lower-cased top-level type, e.g. `image` */
  readonly type: string;
  /** Lower-cased subtype, e.g. `jpeg` */
  readonly subtype: string;
  /** Lower-cased attribute → value */
  readonly parameters: ReadonlyMap<string, string>;
}

const RESTRICTED_NAME = /^[A-Za-z0-9][A-Za-z0-9!#$&^_.+-]{0,126}$/;
const TOKEN = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/;

/** Split on `;` outside double quotes */
function splitParameters(value: string): string[] {
  const parts: string[] = [];
  let current = '';
  let inQuotes = false;
  for (const ch of value) {
    if (ch === '"') inQuotes = !inQuotes;
    if (ch === ';' && !inQuotes) {
      parts.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  parts.push(current);
  return parts;
}

function parse(value: string): MediaType | string {
  const [essence = '', ...rest] = splitParameters(value);
  const slash = essence.indexOf('/');
  if (slash === -1) return 'missing "/" between type and subtype';
  const type = essence.slice(0, slash).trim();
  const subtype = essence.slice(slash + 1).trim();
  if (!RESTRICTED_NAME.test(type)) return `invalid type "${type}"`;
  if (!RESTRICTED_NAME.test(subtype)) return `invalid subtype "${subtype}"`;

  const parameters = new Map<string, string>();
  for (const part of rest) {
    const eq = part.indexOf('=');
    const attribute = (eq === -1 ? part : part.slice(0, eq)).trim();
    if (eq === -1 || !TOKEN.test(attribute)) return `malformed parameter "${part.trim()}"`;
    let v = part.slice(eq + 1).trim();
    if (v.startsWith('"')) {
      if (v.length < 2 || !v.endsWith('"')) return `unterminated quoted value in "${part.trim()}"`;
      v = v.slice(1, -1);
    } else if (!TOKEN.test(v)) {
      return `malformed parameter value "${v}"`;
    }
    parameters.set(attribute.toLowerCase(), v);
  }

  return { type: type.toLowerCase(), subtype: subtype.toLowerCase(), parameters };
}

/** Why a string is not a media type, or undefined if it is one */
export function mediaTypeError(value: string): string | undefined {
  const result = parse(value);
  return typeof result === 'string' ? result : undefined;
}

/** @throws ValueError when the string is not a media type */
export function parseMediaType(value: string): MediaType {
  const result = parse(value);
  if (typeof result === 'string') throw new ValueError(`Invalid media type "${value}": ${result}`, 'MEDIATYPE', value);
  return result;
}

export function formatMediaType(mediaType: MediaType): string {
  let out = `${mediaType.type}/${mediaType.subtype}`;
  for (const [attribute, value] of mediaType.parameters) {
    out += `;${attribute}=${TOKEN.test(value) ? value : `"${value}"`}`;
  }
  return out;
}

/**
 * Media type of a property: its MEDIATYPE parameter, or the type declared by
 * a `data:` URI value.
 */
export function mediaTypeOf(property: Property): MediaType | undefined {
  const declared = property.mediatype;
  if (declared !== undefined) return parseMediaType(declared);

  if (property.value.kind === 'uri') {
    const m = /^data:([^,;]+\/[^,;]+)[;,]/i.exec(property.value.value);
    if (m?.[1]) return parseMediaType(m[1]);
  }
  return undefined;
}
