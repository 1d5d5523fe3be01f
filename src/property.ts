/**
 * vCard v4 property — RFC 6350 section 3.3
 *
 * One logical content line: optional group, a name, an ordered parameter map
 * and a typed {@link Value}. Instances are immutable; the parser and the
 * builder are the only producers.
 */

import type { DateAndOrTime, DateTime, ParameterMap, PartialDate, PartialTime, TypeValue, Value } from './types.js';
import { ParseError } from './errors.js';
import { valueToString } from './values.js';

const IDENTIFIER = /^[A-Za-z0-9-]+$/;

/** Parameters as callers may write them */
export type ParameterInit = ParameterMap | Readonly<Record<string, string | readonly string[]>>;

export function isParameterMap(init: ParameterInit): init is ParameterMap {
  return init instanceof Map;
}

/**
 * Normalize parameters: keys upper-cased, duplicate keys merged in
 * first-seen order, every list copied and frozen.
 */
export function normalizeParameters(init: ParameterInit = new Map()): ParameterMap {
  const entries: Iterable<[string, string | readonly string[]]> = isParameterMap(init) ? init : Object.entries(init);
  const out = new Map<string, readonly string[]>();
  for (const [key, raw] of entries) {
    const upper = key.toUpperCase();
    if (!IDENTIFIER.test(upper)) {
      throw new ParseError('MalformedParameter', `Invalid parameter name "${key}"`);
    }
    const values = typeof raw === 'string' ? [raw] : raw;
    out.set(upper, Object.freeze([...(out.get(upper) ?? []), ...values]));
  }
  return out;
}

export function checkIdentifier(kind: 'name' | 'group', value: string): void {
  if (value === '') throw new ParseError('EmptyName', `Property ${kind} must not be empty`);
  if (!IDENTIFIER.test(value)) {
    throw new ParseError('UnexpectedToken', `Property ${kind} "${value}" may only contain letters, digits and "-"`);
  }
}

// ── Value copies ───────────────────────────────────────────────────────────

const same = <T>(item: T): T => item;

function frozenList<T>(items: readonly T[], copy: (item: T) => T = same): readonly T[] {
  return Object.freeze(items.map(copy));
}

function copyDate(date: PartialDate): PartialDate {
  return Object.freeze({ ...date });
}

function copyTime(time: PartialTime): PartialTime {
  const { zone } = time;
  return Object.freeze(zone === undefined || zone === 'Z' ? { ...time } : { ...time, zone: Object.freeze({ ...zone }) });
}

function copyDateTime(value: DateTime): DateTime {
  return Object.freeze({ date: copyDate(value.date), time: copyTime(value.time) });
}

function copyDateAndOrTime(value: DateAndOrTime): DateAndOrTime {
  const copy: { date?: PartialDate; time?: PartialTime } = {};
  if (value.date) copy.date = copyDate(value.date);
  if (value.time) copy.time = copyTime(value.time);
  return Object.freeze(copy);
}

/**
 * Deep, frozen copy of a value. Binary data is copied into a buffer of its
 * own, so releasing a property never touches the caller's bytes.
 */
export function copyValue(value: Value): Value {
  switch (value.kind) {
    case 'text':
    case 'uri':
    case 'language-tag':
    case 'boolean':
      return Object.freeze({ ...value });
    case 'text-list':
      return Object.freeze({ kind: value.kind, values: frozenList(value.values) });
    case 'integer':
      return Object.freeze({ kind: value.kind, values: frozenList(value.values) });
    case 'float':
      return Object.freeze({ kind: value.kind, values: frozenList(value.values) });
    case 'date':
      return Object.freeze({ kind: value.kind, values: frozenList(value.values, copyDate) });
    case 'time':
      return Object.freeze({ kind: value.kind, values: frozenList(value.values, copyTime) });
    case 'date-time':
      return Object.freeze({ kind: value.kind, values: frozenList(value.values, copyDateTime) });
    case 'timestamp':
      return Object.freeze({ kind: value.kind, values: frozenList(value.values, copyDateTime) });
    case 'date-and-or-time':
      return Object.freeze({ kind: value.kind, values: frozenList(value.values, copyDateAndOrTime) });
    case 'utc-offset':
      return Object.freeze({ kind: value.kind, value: Object.freeze({ ...value.value }) });
    case 'gender':
      return Object.freeze({ kind: value.kind, value: Object.freeze({ ...value.value }) });
    case 'client-pid-map':
      return Object.freeze({ kind: value.kind, value: Object.freeze({ ...value.value }) });
    case 'binary':
      return Object.freeze({ kind: value.kind, data: Uint8Array.from(value.data) });
    case 'name': {
      const n = value.value;
      return Object.freeze({
        kind: value.kind,
        value: Object.freeze({
          familyNames: frozenList(n.familyNames),
          givenNames: frozenList(n.givenNames),
          additionalNames: frozenList(n.additionalNames),
          honorificPrefixes: frozenList(n.honorificPrefixes),
          honorificSuffixes: frozenList(n.honorificSuffixes),
        }),
      });
    }
    case 'address': {
      const a = value.value;
      return Object.freeze({
        kind: value.kind,
        value: Object.freeze({
          postOfficeBox: frozenList(a.postOfficeBox),
          extendedAddress: frozenList(a.extendedAddress),
          streetAddress: frozenList(a.streetAddress),
          locality: frozenList(a.locality),
          region: frozenList(a.region),
          postalCode: frozenList(a.postalCode),
          countryName: frozenList(a.countryName),
        }),
      });
    }
    case 'organization':
      return Object.freeze({
        kind: value.kind,
        value: Object.freeze({ name: value.value.name, units: frozenList(value.value.units) }),
      });
  }
}

// ── Property ───────────────────────────────────────────────────────────────

export class Property {
  /** Optional group name (e.g. 'item1') */
  readonly group?: string;
  /** Property name as written */
  readonly name: string;
  /** Upper-cased parameter name → values, in first-seen order */
  readonly params: ParameterMap;
  readonly value: Value;

  constructor(name: string, value: Value, params?: ParameterInit, group?: string) {
    checkIdentifier('name', name);
    if (group !== undefined) {
      checkIdentifier('group', group);
      this.group = group;
    }
    this.name = name;
    this.params = normalizeParameters(params);
    this.value = copyValue(value);
    Object.freeze(this);
  }

  /** Upper-cased name used for every lookup */
  get key(): string {
    return this.name.toUpperCase();
  }

  /** First value of a parameter */
  param(name: string): string | undefined {
    return this.params.get(name.toUpperCase())?.[0];
  }

  // ── Convenience parameter accessors ──────────────────────────────────

  /** TYPE parameter values (lowercased, comma lists split) */
  get type(): TypeValue[] {
    const v = this.params.get('TYPE') ?? [];
    return v.flatMap(s => s.split(',').map(x => x.toLowerCase().trim()));
  }

  /** PREF parameter (1–100, where 1 = most preferred) */
  get pref(): number | undefined {
    const v = this.param('PREF');
    if (v === undefined) return undefined;
    const n = parseInt(v, 10);
    return isNaN(n) ? undefined : n;
  }

  /** LANGUAGE parameter */
  get language(): string | undefined {
    return this.param('LANGUAGE');
  }

  /** ALTID parameter */
  get altid(): string | undefined {
    return this.param('ALTID');
  }

  /** PID parameter values like "1.1", "2" */
  get pid(): string[] {
    return (this.params.get('PID') ?? []).flatMap(s => s.split(','));
  }

  /** VALUE parameter (lowercased) */
  get valueType(): string | undefined {
    return this.param('VALUE')?.toLowerCase();
  }

  /** MEDIATYPE parameter */
  get mediatype(): string | undefined {
    return this.param('MEDIATYPE');
  }

  /** Display text of the value, without escaping */
  get text(): string {
    return valueToString(this.value);
  }

  /** Overwrite inline binary data with zeros */
  release(): void {
    if (this.value.kind === 'binary') this.value.data.fill(0);
  }
}
