/**
 * Typed value parsing and formatting (RFC 6350 section 4).
 *
 * Dispatch is keyed on the property name and the effective value type: the
 * VALUE parameter when present, otherwise the property's registered default.
 * Unregistered properties default to text.
 */

import type {
  Address,
  ClientPidMap,
  DateAndOrTime,
  DateTime,
  Gender,
  GenderSex,
  Organization,
  ParameterMap,
  PartialDate,
  PartialTime,
  StructuredName,
  Value,
  ValueType,
} from './types.js';
import { ValueError } from './errors.js';
import { definitionOf, RELATED_TYPES, toValueType, type PropertyDefinition } from './definitions.js';
import { escapeText, parseList, parseStructuredList, splitStructured, unescapeText } from './escape.js';
import {
  formatDate,
  formatDateAndOrTime,
  formatDateTime,
  formatTime,
  formatTimestamp,
  formatUtcOffset,
  parseDate,
  parseDateAndOrTime,
  parseDateTime,
  parseTime,
  parseTimestamp,
  parseUtcOffset,
} from './datetime.js';
import { uriSyntaxError } from './uri.js';

/** Extra value checks switched on by parse options */
export interface ValueChecks {
  /** Returns why a language tag is not acceptable, or undefined */
  languageTag?: (tag: string) => string | undefined;
}

export interface ValueContext {
  /** Property name as written */
  name: string;
  params: ParameterMap;
  /** Receives non-fatal observations */
  warn?: (message: string) => void;
  checks?: ValueChecks;
}

const NAME_ARITY = 5;
const ADDRESS_ARITY = 7;
const GENDER_ARITY = 2;

const BASE64 = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;
const INTEGER = /^[+-]?\d+$/;
const FLOAT = /^[+-]?\d+(?:\.\d+)?$/;
const TOKEN = /^[A-Za-z0-9-]+$/;
const LANGUAGE_TAG = /^[A-Za-z]{1,8}(?:-[A-Za-z0-9]{1,8})*$/;
const GENDER_SEXES: readonly GenderSex[] = ['M', 'F', 'O', 'N', 'U', ''];

function first(params: ParameterMap, key: string): string | undefined {
  return params.get(key)?.[0];
}

// ── Effective type ─────────────────────────────────────────────────────────

/**
 * Resolve the value type of a property. A VALUE token the property does not
 * accept is a ValueError.
 */
export function effectiveType(name: string, params: ParameterMap): ValueType {
  const token = first(params, 'VALUE');
  const def = definitionOf(name);
  if (token === undefined) return def?.defaultType ?? 'text';

  const type = toValueType(token);
  if (type === undefined) throw new ValueError(`Unknown value type "${token}"`, name, token);
  if (def && !def.accepts.includes(type)) {
    throw new ValueError(`${def.name} does not accept VALUE=${type}`, name, token);
  }
  return type;
}

// ── Parsing ────────────────────────────────────────────────────────────────

/**
 * Parse the (still escaped) value of one content line.
 *
 * @throws ValueError when the value does not match its type's grammar
 */
export function parseValue(raw: string, ctx: ValueContext): Value {
  const { name, params } = ctx;
  const def = definitionOf(name);

  if (name.toUpperCase() === 'RELATED') checkRelatedTypes(params, name);

  const encoding = first(params, 'ENCODING');
  if (encoding !== undefined) return parseBinary(raw, encoding, def, ctx);

  const type = effectiveType(name, params);
  const explicit = params.has('VALUE');

  if (def?.textOrUri && !explicit) {
    return uriSyntaxError(raw) === undefined ? { kind: 'uri', value: raw } : { kind: 'text', value: unescapeText(raw) };
  }

  if (type === 'text' && def?.shape) {
    switch (def.shape) {
      case 'name':
        return { kind: 'name', value: parseName(raw, name) };
      case 'address':
        return { kind: 'address', value: parseAddress(raw, name) };
      case 'organization':
        return { kind: 'organization', value: parseOrganization(raw) };
      case 'gender':
        return { kind: 'gender', value: parseGender(raw, name) };
      case 'client-pid-map':
        return { kind: 'client-pid-map', value: parseClientPidMap(raw, name) };
      case 'text-list':
        return { kind: 'text-list', values: parseList(raw) };
      case 'kind': {
        const kind = unescapeText(raw);
        if (!TOKEN.test(kind)) throw new ValueError(`KIND must be a single token, got "${kind}"`, name, raw);
        return { kind: 'text', value: kind };
      }
    }
  }

  // Registered date, number and offset properties take one value; extensions
  // carrying VALUE may list several
  return parseTyped(raw, type, name, def === undefined, ctx);
}

function parseTyped(raw: string, type: ValueType, name: string, multiple: boolean, ctx: ValueContext): Value {
  const items = (): string[] => (multiple ? raw.split(',') : [raw]);
  const each = <T>(label: string, parse: (s: string) => T | null): T[] =>
    items().map(item => {
      const parsed = parse(item);
      if (parsed === null) throw new ValueError(`Invalid ${label} value "${item}"`, name, item);
      return parsed;
    });

  switch (type) {
    case 'text':
      return { kind: 'text', value: unescapeText(raw) };
    case 'uri': {
      const reason = uriSyntaxError(raw);
      if (reason) throw new ValueError(`Invalid URI "${raw}": ${reason}`, name, raw);
      return { kind: 'uri', value: raw };
    }
    case 'boolean': {
      const upper = raw.toUpperCase();
      if (upper !== 'TRUE' && upper !== 'FALSE') throw new ValueError(`Invalid boolean value "${raw}"`, name, raw);
      return { kind: 'boolean', value: upper === 'TRUE' };
    }
    case 'integer':
      return { kind: 'integer', values: each('integer', parseInteger) };
    case 'float':
      return { kind: 'float', values: each('float', s => (FLOAT.test(s) ? parseFloat(s) : null)) };
    case 'date':
      return { kind: 'date', values: each('date', s => parseDate(s)) };
    case 'time':
      return { kind: 'time', values: each('time', s => parseTime(s)) };
    case 'date-time':
      return { kind: 'date-time', values: each('date-time', parseDateTime) };
    case 'date-and-or-time':
      return { kind: 'date-and-or-time', values: each('date-and-or-time', parseDateAndOrTime) };
    case 'timestamp':
      return { kind: 'timestamp', values: each('timestamp', parseTimestamp) };
    case 'utc-offset': {
      const offset = parseUtcOffset(raw);
      if (!offset) throw new ValueError(`Invalid UTC offset "${raw}"`, name, raw);
      return { kind: 'utc-offset', value: offset };
    }
    case 'language-tag': {
      const reason = LANGUAGE_TAG.test(raw) ? ctx.checks?.languageTag?.(raw) : 'not a language tag';
      if (reason) throw new ValueError(`Invalid language tag "${raw}": ${reason}`, name, raw);
      return { kind: 'language-tag', value: raw };
    }
  }
}

function parseInteger(s: string): number | null {
  if (!INTEGER.test(s)) return null;
  const n = parseInt(s, 10);
  return Number.isSafeInteger(n) ? n : null;
}

function parseBinary(raw: string, encoding: string, def: PropertyDefinition | undefined, ctx: ValueContext): Value {
  const { name, params } = ctx;
  const upper = encoding.toUpperCase();
  if (upper !== 'B' && upper !== 'BASE64') {
    throw new ValueError(`Unsupported ENCODING "${encoding}"; only b is accepted`, name, encoding);
  }
  if (def && !def.binary) throw new ValueError(`${def.name} does not accept inline binary data`, name, encoding);
  if (params.has('VALUE')) {
    throw new ValueError('ENCODING=b cannot be combined with a VALUE parameter', name, first(params, 'VALUE'));
  }
  if (upper === 'BASE64') ctx.warn?.(`ENCODING=BASE64 on ${name} read as ENCODING=b`);
  return { kind: 'binary', data: decodeBase64(raw, name) };
}

/** Strict Base64: standard alphabet, padded, canonical trailing bits */
export function decodeBase64(raw: string, property?: string): Uint8Array {
  if (!BASE64.test(raw)) throw new ValueError('Invalid Base64 data', property, raw);
  const bytes = Buffer.from(raw, 'base64');
  if (bytes.toString('base64') !== raw) throw new ValueError('Non-canonical Base64 data', property, raw);
  return Uint8Array.from(bytes);
}

export function encodeBase64(data: Uint8Array): string {
  return Buffer.from(data.buffer, data.byteOffset, data.byteLength).toString('base64');
}

function checkRelatedTypes(params: ParameterMap, name: string): void {
  for (const raw of params.get('TYPE') ?? []) {
    for (const type of raw.split(',')) {
      const lower = type.toLowerCase();
      if (!RELATED_TYPES.has(lower) && !/^x-/.test(lower)) {
        throw new ValueError(`Unknown RELATED type "${type}"`, name, type);
      }
    }
  }
}

// ── Structured values ──────────────────────────────────────────────────────

function components(raw: string, arity: number, name: string): string[] {
  const parts = splitStructured(raw);
  if (parts.length > arity) {
    throw new ValueError(`${name} has ${parts.length} components; at most ${arity} are allowed`, name, raw);
  }
  while (parts.length < arity) parts.push('');
  return parts;
}

/** Parse an N value: family;given;additional;prefixes;suffixes */
export function parseName(raw: string, property = 'N'): StructuredName {
  const [family = [], given = [], additional = [], prefixes = [], suffixes = []] = parseStructuredList(
    components(raw, NAME_ARITY, property).join(';'),
  );
  return {
    familyNames: family,
    givenNames: given,
    additionalNames: additional,
    honorificPrefixes: prefixes,
    honorificSuffixes: suffixes,
  };
}

/** Parse an ADR value: pobox;ext;street;locality;region;code;country */
export function parseAddress(raw: string, property = 'ADR'): Address {
  const [postOfficeBox = [], extendedAddress = [], streetAddress = [], locality = [], region = [], postalCode = [], countryName = []] =
    parseStructuredList(components(raw, ADDRESS_ARITY, property).join(';'));
  return { postOfficeBox, extendedAddress, streetAddress, locality, region, postalCode, countryName };
}

export function parseOrganization(raw: string): Organization {
  const [name = '', ...units] = splitStructured(raw).map(unescapeText);
  return { name, units };
}

export function parseGender(raw: string, property = 'GENDER'): Gender {
  const parts = splitStructured(raw);
  if (parts.length > GENDER_ARITY) {
    throw new ValueError(`${property} has ${parts.length} components; at most ${GENDER_ARITY} are allowed`, property, raw);
  }
  const upper = (parts[0] ?? '').toUpperCase();
  const sex = GENDER_SEXES.find(s => s === upper);
  if (sex === undefined) throw new ValueError(`Invalid GENDER sex "${parts[0] ?? ''}"`, property, raw);
  const identity = parts[1];
  return identity === undefined ? { sex } : { sex, identity: unescapeText(identity) };
}

/** Parse a CLIENTPIDMAP value: positive integer `;` URI */
export function parseClientPidMap(raw: string, property = 'CLIENTPIDMAP'): ClientPidMap {
  const semi = raw.indexOf(';');
  if (semi === -1) throw new ValueError('CLIENTPIDMAP needs a source id and a URI', property, raw);
  const id = raw.slice(0, semi);
  const uri = raw.slice(semi + 1);
  const pid = /^\d+$/.test(id) ? parseInt(id, 10) : NaN;
  if (!Number.isSafeInteger(pid) || pid < 1) {
    throw new ValueError(`CLIENTPIDMAP source id must be a positive integer, got "${id}"`, property, id);
  }
  const reason = uriSyntaxError(uri);
  if (reason) throw new ValueError(`Invalid URI "${uri}": ${reason}`, property, uri);
  return { pid, uri };
}

// ── Formatting ─────────────────────────────────────────────────────────────

function checkedUri(value: string, property?: string): string {
  const reason = uriSyntaxError(value);
  if (reason) throw new ValueError(`Invalid URI "${value}": ${reason}`, property, value);
  return value;
}

function formatNumber(n: number, integer: boolean, property?: string): string {
  if (integer ? !Number.isSafeInteger(n) : !Number.isFinite(n)) {
    throw new ValueError(`${n} is not a valid ${integer ? 'integer' : 'float'}`, property, String(n));
  }
  const text = String(n);
  if (/e/i.test(text)) throw new ValueError(`${n} cannot be written without an exponent`, property, text);
  return text;
}

function withProperty<T>(property: string | undefined, format: () => T): T {
  try {
    return format();
  } catch (err) {
    if (err instanceof ValueError && err.property === undefined && property !== undefined) {
      throw new ValueError(err.message, property, err.fragment);
    }
    throw err;
  }
}

const list = <T>(values: readonly T[], format: (v: T) => string): string => values.map(format).join(',');

/**
 * Render a typed value as escaped content-line text, the inverse of
 * {@link parseValue}.
 *
 * @throws ValueError for values that cannot be written
 */
export function formatValue(value: Value, property?: string): string {
  return withProperty(property, (): string => {
    const esc = (s: string): string => escapeText(s, property);
    switch (value.kind) {
      case 'text':
        return esc(value.value);
      case 'text-list':
        return list(value.values, esc);
      case 'boolean':
        return value.value ? 'TRUE' : 'FALSE';
      case 'integer':
        return list(value.values, n => formatNumber(n, true, property));
      case 'float':
        return list(value.values, n => formatNumber(n, false, property));
      case 'date':
        return list<PartialDate>(value.values, formatDate);
      case 'time':
        return list<PartialTime>(value.values, formatTime);
      case 'date-time':
        return list<DateTime>(value.values, formatDateTime);
      case 'date-and-or-time':
        return list<DateAndOrTime>(value.values, formatDateAndOrTime);
      case 'timestamp':
        return list<DateTime>(value.values, formatTimestamp);
      case 'utc-offset':
        return formatUtcOffset(value.value);
      case 'language-tag':
        if (!LANGUAGE_TAG.test(value.value)) {
          throw new ValueError(`Invalid language tag "${value.value}"`, property, value.value);
        }
        return value.value;
      case 'uri':
        return checkedUri(value.value, property);
      case 'binary':
        return encodeBase64(value.data);
      case 'name': {
        const n = value.value;
        return [n.familyNames, n.givenNames, n.additionalNames, n.honorificPrefixes, n.honorificSuffixes]
          .map(component => list(component, esc))
          .join(';');
      }
      case 'address': {
        const a = value.value;
        return [a.postOfficeBox, a.extendedAddress, a.streetAddress, a.locality, a.region, a.postalCode, a.countryName]
          .map(component => list(component, esc))
          .join(';');
      }
      case 'organization':
        return [value.value.name, ...value.value.units].map(esc).join(';');
      case 'gender': {
        const { sex, identity } = value.value;
        if (!GENDER_SEXES.includes(sex)) throw new ValueError(`Invalid GENDER sex "${sex}"`, property, sex);
        return identity === undefined ? sex : `${sex};${esc(identity)}`;
      }
      case 'client-pid-map': {
        const { pid, uri } = value.value;
        if (!Number.isSafeInteger(pid) || pid < 1) {
          throw new ValueError(`CLIENTPIDMAP source id must be a positive integer, got ${pid}`, property, String(pid));
        }
        return `${pid};${checkedUri(uri, property)}`;
      }
    }
  });
}

/** Plain-text rendering of a value, for display (no escaping) */
export function valueToString(value: Value): string {
  switch (value.kind) {
    case 'text':
    case 'uri':
    case 'language-tag':
      return value.value;
    case 'text-list':
      return value.values.join(', ');
    case 'name':
      return [
        ...value.value.honorificPrefixes,
        ...value.value.givenNames,
        ...value.value.additionalNames,
        ...value.value.familyNames,
        ...value.value.honorificSuffixes,
      ].join(' ');
    case 'organization':
      return [value.value.name, ...value.value.units].filter(Boolean).join(', ');
    case 'binary':
      return encodeBase64(value.data);
    default:
      return formatValue(value);
  }
}
