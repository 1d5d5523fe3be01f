/**
 * jCard binding (RFC 7095): the JSON form of a vCard.
 *
 *   ["vcard", [ [name, {params}, type, value...], ... ]]
 *
 * Dates and times use the extended ISO 8601 forms (`1985-04-12`,
 * `10:22:00`, `-05:00`). Structured values are arrays of components.
 * Inline binary data has no jCard form and is written as a `data:` URI.
 */

import type { DateAndOrTime, DateTime, PartialDate, PartialTime, UtcOffset, Value, ValueType, Zone } from './types.js';
import { ParseError, ValueError } from './errors.js';
import { escapeText } from './escape.js';
import { definitionOf, toValueType } from './definitions.js';
import { formatDate, formatTime, formatUtcOffset } from './datetime.js';
import { encodeBase64, parseValue } from './values.js';
import { isUri } from './uri.js';
import { Property } from './property.js';
import { assertValid, SUPPORTED_VERSION } from './validator.js';
import { Vcard } from './vcard.js';

export type JCardValue = string | number | boolean | readonly JCardValue[];
export type JCardParameters = Record<string, string | string[]>;
export type JCardProperty = [name: string, parameters: JCardParameters, type: string, ...values: JCardValue[]];
export type JCard = ['vcard', JCardProperty[]];

// ── Extended date and time forms ───────────────────────────────────────────

function extendedDate(date: PartialDate): string {
  return formatDate(date)
    .replace(/^(\d{4})(\d{2})(\d{2})$/, '$1-$2-$3')
    .replace(/^--(\d{2})(\d{2})$/, '--$1-$2');
}

function extendedZone(zone: Zone | undefined): string {
  if (zone === undefined || zone === 'Z') return zone ?? '';
  return formatUtcOffset(zone).replace(/^([+-]\d{2})(\d{2})$/, '$1:$2');
}

function extendedOffset(offset: UtcOffset): string {
  return extendedZone(offset);
}

function extendedTime(time: PartialTime): string {
  const body = formatTime({ hour: time.hour, minute: time.minute, second: time.second })
    .replace(/^(\d{2})(\d{2})(\d{2})$/, '$1:$2:$3')
    .replace(/^(\d{2})(\d{2})$/, '$1:$2')
    .replace(/^-(\d{2})(\d{2})$/, '-$1:$2');
  return body + extendedZone(time.zone);
}

function extendedDateTime(value: DateTime): string {
  return `${extendedDate(value.date)}T${extendedTime(value.time)}`;
}

function extendedDateAndOrTime(value: DateAndOrTime): string {
  if (value.date && value.time) return extendedDateTime({ date: value.date, time: value.time });
  if (value.date) return extendedDate(value.date);
  if (value.time) return `T${extendedTime(value.time)}`;
  throw new ValueError('Invalid date-and-or-time: neither date nor time given');
}

/** Extended form back to the basic form the value parsers read */
function basicForm(type: ValueType, value: string): string {
  const date = (s: string): string =>
    s.replace(/^(\d{4})-(\d{2})-(\d{2})$/, '$1$2$3').replace(/^--(\d{2})-(\d{2})$/, '--$1$2');
  const time = (s: string): string => s.replace(/:/g, '');

  switch (type) {
    case 'date':
      return date(value);
    case 'time':
    case 'utc-offset':
      return time(value);
    case 'date-time':
    case 'date-and-or-time':
    case 'timestamp': {
      const t = value.search(/[Tt]/);
      if (t === -1) return date(value);
      return `${date(value.slice(0, t))}T${time(value.slice(t + 1))}`;
    }
    default:
      return value;
  }
}

// ── Encoding ───────────────────────────────────────────────────────────────

const compact = (list: readonly string[]): JCardValue => (list.length === 1 ? (list[0] ?? '') : list.length === 0 ? '' : [...list]);

function jcardValue(prop: Property): [string, JCardValue[]] {
  const value: Value = prop.value;
  switch (value.kind) {
    case 'text':
      return ['text', [value.value]];
    case 'text-list':
      return ['text', [...value.values]];
    case 'boolean':
      return ['boolean', [value.value]];
    case 'integer':
    case 'float':
      return [value.kind, [...value.values]];
    case 'date':
      return ['date', value.values.map(extendedDate)];
    case 'time':
      return ['time', value.values.map(extendedTime)];
    case 'date-time':
    case 'timestamp':
      return [value.kind, value.values.map(extendedDateTime)];
    case 'date-and-or-time':
      return ['date-and-or-time', value.values.map(extendedDateAndOrTime)];
    case 'utc-offset':
      return ['utc-offset', [extendedOffset(value.value)]];
    case 'language-tag':
    case 'uri':
      return [value.kind, [value.value]];
    case 'binary':
      return ['uri', [`data:${prop.mediatype ?? 'application/octet-stream'};base64,${encodeBase64(value.data)}`]];
    case 'name': {
      const n = value.value;
      return [
        'text',
        [[n.familyNames, n.givenNames, n.additionalNames, n.honorificPrefixes, n.honorificSuffixes].map(compact)],
      ];
    }
    case 'address': {
      const a = value.value;
      return [
        'text',
        [[a.postOfficeBox, a.extendedAddress, a.streetAddress, a.locality, a.region, a.postalCode, a.countryName].map(compact)],
      ];
    }
    case 'organization':
      return ['text', [value.value.units.length === 0 ? value.value.name : [value.value.name, ...value.value.units]]];
    case 'gender':
      return ['text', [value.value.identity === undefined ? value.value.sex : [value.value.sex, value.value.identity]]];
    case 'client-pid-map':
      return ['text', [[String(value.value.pid), value.value.uri]]];
  }
}

function jcardParameters(prop: Property): JCardParameters {
  const params: JCardParameters = {};
  if (prop.group !== undefined) params.group = prop.group;
  for (const [key, values] of prop.params) {
    if (key === 'VALUE' || key === 'CHARSET' || (key === 'ENCODING' && prop.value.kind === 'binary')) continue;
    params[key.toLowerCase()] = values.length === 1 ? (values[0] ?? '') : [...values];
  }
  return params;
}

/** Convert a vCard to its jCard form; VERSION comes first */
export function toJCard(card: Vcard): JCard {
  const properties: JCardProperty[] = [['version', {}, 'text', SUPPORTED_VERSION]];
  for (const prop of card.properties) {
    if (prop.key === 'VERSION') continue;
    const [type, values] = jcardValue(prop);
    properties.push([prop.name.toLowerCase(), jcardParameters(prop), type, ...values]);
  }
  return ['vcard', properties];
}

// ── Decoding ───────────────────────────────────────────────────────────────

function malformed(message: string): ParseError {
  return new ParseError('UnexpectedToken', `Not a jCard: ${message}`);
}

function textOf(value: unknown, property: string): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  throw new ValueError(`Expected a scalar jCard value on ${property}`, property);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function decodeParameters(input: Record<string, unknown>, property: string): { params: Map<string, string[]>; group?: string } {
  const params = new Map<string, string[]>();
  let group: string | undefined;
  for (const [key, raw] of Object.entries(input)) {
    const values: unknown[] = Array.isArray(raw) ? raw : [raw];
    const strings = values.map(v => textOf(v, property));
    if (key.toLowerCase() === 'group') group = strings[0];
    else params.set(key.toUpperCase(), strings);
  }
  return group === undefined ? { params } : { params, group };
}

/** Escaped content-line text for a jCard value list */
function rawText(name: string, type: ValueType, values: readonly unknown[]): string {
  const shape = definitionOf(name)?.shape;
  const first = values[0];

  if (type === 'text' && shape !== undefined && shape !== 'kind' && shape !== 'text-list') {
    const components: unknown[] = Array.isArray(first) ? first : [first];
    if (shape === 'client-pid-map') return components.map(c => textOf(c, name)).join(';');
    return components
      .map(c => {
        const items: unknown[] = Array.isArray(c) ? c : [c];
        return items.map(i => escapeText(textOf(i, name), name)).join(',');
      })
      .join(';');
  }

  switch (type) {
    case 'text':
      return values.map(v => escapeText(textOf(v, name), name)).join(',');
    case 'boolean':
      return first === true ? 'TRUE' : first === false ? 'FALSE' : textOf(first, name);
    default:
      return values.map(v => basicForm(type, textOf(v, name))).join(',');
  }
}

/** The type a content line would be read as without a VALUE parameter */
function impliedType(name: string, raw: string): ValueType {
  const def = definitionOf(name);
  if (!def) return 'text';
  if (def.textOrUri) return isUri(raw) ? 'uri' : 'text';
  return def.defaultType;
}

function decodeProperty(input: unknown): Property {
  if (!Array.isArray(input) || input.length < 4) throw malformed('a property must be [name, params, type, value...]');
  const items: unknown[] = input;
  const [name, rawParams, rawType, ...values] = items;
  if (typeof name !== 'string' || !isRecord(rawParams) || typeof rawType !== 'string') {
    throw malformed('a property must be [name, params, type, value...]');
  }

  const upper = name.toUpperCase();
  const def = definitionOf(upper);
  let type: ValueType = rawType.toLowerCase() === 'unknown' ? 'text' : (toValueType(rawType) ?? 'text');
  // Registered date-and-or-time properties may be typed more narrowly
  if (def?.defaultType === 'date-and-or-time' && (type === 'date' || type === 'time' || type === 'date-time')) {
    type = 'date-and-or-time';
  }

  const { params, group } = decodeParameters(rawParams, upper);
  const raw = rawText(upper, type, values);
  if (type !== impliedType(upper, raw)) params.set('VALUE', [type]);

  return new Property(upper, parseValue(raw, { name: upper, params }), params, group);
}

/**
 * Build a vCard from its jCard form.
 *
 * @throws ParseError when the input does not have the jCard shape
 * @throws ValueError for a value that does not match its type
 * @throws ValidationError for a violated occurrence rule
 */
export function fromJCard(input: unknown): Vcard {
  if (!Array.isArray(input) || input[0] !== 'vcard' || !Array.isArray(input[1])) {
    throw malformed('expected ["vcard", [properties...]]');
  }
  const entries: unknown[] = input[1];
  const properties = entries.map(decodeProperty);
  assertValid(properties);
  return new Vcard(properties);
}
