/**
 * Programmatic construction of a vCard.
 *
 * A builder is mutable and meant for one owner. A value whose kind is not
 * the property's default type gets a VALUE parameter; {@link VcardBuilder.build}
 * writes every property out and reads it back, checks the occurrence rules,
 * then hands back an immutable {@link Vcard}.
 *
 * @example
 * ```ts
 * const card = new VcardBuilder()
 *   .formattedName('Alice Example')
 *   .name({ familyNames: ['Example'], givenNames: ['Alice'] })
 *   .email('alice@example.com', { TYPE: 'work' })
 *   .build();
 * ```
 */

import type { Address, DateAndOrTime, DateTime, GenderSex, StructuredName, Value } from './types.js';
import { ValueError } from './errors.js';
import { normalizeParameters, Property, type ParameterInit } from './property.js';
import { definitionOf, toValueType } from './definitions.js';
import { parseValue } from './values.js';
import { contentLine } from './generator.js';
import { parseContentLine } from './parser.js';
import { assertValid, SUPPORTED_VERSION } from './validator.js';
import { fromJsDate } from './datetime.js';
import { isUri } from './uri.js';
import { Vcard } from './vcard.js';

type NameInit = { readonly [K in keyof StructuredName]?: string | readonly string[] };
type AddressInit = { readonly [K in keyof Address]?: string | readonly string[] };

const toList = (v: string | readonly string[] | undefined): readonly string[] =>
  v === undefined ? [] : typeof v === 'string' ? [v] : v;

/** Copy parameters and append VALUE */
function withValueType(params: ParameterInit | undefined, type: string): ParameterInit {
  return new Map<string, readonly string[]>([...normalizeParameters(params), ['VALUE', [type]]]);
}

/** Parameters, with VALUE added where a parser would not infer the value's kind */
function impliedValueType(name: string, value: Value, params?: ParameterInit): ParameterInit | undefined {
  const given = normalizeParameters(params);
  if (given.has('VALUE') || given.has('ENCODING')) return params;

  const def = definitionOf(name);
  if (value.kind === 'text' && def?.textOrUri && isUri(value.value)) return withValueType(params, 'text');

  const type = toValueType(value.kind);
  if (type === undefined || type === 'text') return params;
  if (!def) return withValueType(params, type);
  if (type === def.defaultType || (type === 'uri' && def.textOrUri)) return params;
  return def.accepts.includes(type) ? withValueType(params, type) : params;
}

/** Write a property out and parse the line again; the value must keep its kind */
function readBack(prop: Property): void {
  const raw = parseContentLine(contentLine(prop));
  const back = parseValue(raw.value, { name: raw.name, params: raw.parameters });
  if (back.kind === 'binary') back.data.fill(0);
  if (back.kind !== prop.value.kind) {
    throw new ValueError(`${prop.name} holds ${prop.value.kind} but would be read back as ${back.kind}`, prop.name);
  }
}

export class VcardBuilder {
  private readonly properties: Property[] = [new Property('VERSION', { kind: 'text', value: SUPPORTED_VERSION })];

  /** Append any property, registered or extension */
  property(name: string, value: Value, params?: ParameterInit, group?: string): this {
    this.properties.push(new Property(name, value, impliedValueType(name, value, params), group));
    return this;
  }

  formattedName(text: string, params?: ParameterInit): this {
    return this.property('FN', { kind: 'text', value: text }, params);
  }

  name(name: NameInit, params?: ParameterInit): this {
    return this.property(
      'N',
      {
        kind: 'name',
        value: {
          familyNames: toList(name.familyNames),
          givenNames: toList(name.givenNames),
          additionalNames: toList(name.additionalNames),
          honorificPrefixes: toList(name.honorificPrefixes),
          honorificSuffixes: toList(name.honorificSuffixes),
        },
      },
      params,
    );
  }

  nickname(...nicknames: string[]): this {
    return this.property('NICKNAME', { kind: 'text-list', values: nicknames });
  }

  /** A URI, or raw image bytes written inline with ENCODING=b */
  photo(source: string | Uint8Array, params?: ParameterInit): this {
    return typeof source === 'string'
      ? this.property('PHOTO', { kind: 'uri', value: source }, params)
      : this.property('PHOTO', { kind: 'binary', data: source }, params);
  }

  /** A date and/or time, or free text written with VALUE=text */
  birthday(value: DateAndOrTime | string, params?: ParameterInit): this {
    return this.dateOrText('BDAY', value, params);
  }

  anniversary(value: DateAndOrTime | string, params?: ParameterInit): this {
    return this.dateOrText('ANNIVERSARY', value, params);
  }

  private dateOrText(name: string, value: DateAndOrTime | string, params?: ParameterInit): this {
    return typeof value === 'string'
      ? this.property(name, { kind: 'text', value }, params)
      : this.property(name, { kind: 'date-and-or-time', values: [value] }, params);
  }

  gender(sex: GenderSex, identity?: string): this {
    return this.property('GENDER', { kind: 'gender', value: identity === undefined ? { sex } : { sex, identity } });
  }

  url(uri: string, params?: ParameterInit): this {
    return this.property('URL', { kind: 'uri', value: uri }, params);
  }

  address(address: AddressInit, params?: ParameterInit): this {
    return this.property(
      'ADR',
      {
        kind: 'address',
        value: {
          postOfficeBox: toList(address.postOfficeBox),
          extendedAddress: toList(address.extendedAddress),
          streetAddress: toList(address.streetAddress),
          locality: toList(address.locality),
          region: toList(address.region),
          postalCode: toList(address.postalCode),
          countryName: toList(address.countryName),
        },
      },
      params,
    );
  }

  email(address: string, params?: ParameterInit): this {
    return this.property('EMAIL', { kind: 'text', value: address }, params);
  }

  /** A `tel:` URI is written with VALUE=uri, anything else as text */
  tel(number: string, params?: ParameterInit): this {
    return /^tel:/i.test(number)
      ? this.property('TEL', { kind: 'uri', value: number }, params)
      : this.property('TEL', { kind: 'text', value: number }, params);
  }

  organization(name: string, ...units: string[]): this {
    return this.property('ORG', { kind: 'organization', value: { name, units } });
  }

  note(text: string, params?: ParameterInit): this {
    return this.property('NOTE', { kind: 'text', value: text }, params);
  }

  /** A URI such as `urn:uuid:…`; anything else is stored as text */
  uid(uid: string): this {
    return this.property('UID', isUri(uid) ? { kind: 'uri', value: uid } : { kind: 'text', value: uid });
  }

  /** REV timestamp; a JavaScript Date is written in UTC */
  revision(at: Date | DateTime): this {
    return this.property('REV', { kind: 'timestamp', values: [at instanceof Date ? fromJsDate(at) : at] });
  }

  /**
   * Check every property and the occurrence rules, then return the card.
   *
   * @throws ValueError for a value that cannot be written or would not read back
   * @throws ParseError for a malformed PREF, PID or VALUE parameter
   * @throws ValidationError for a violated occurrence rule
   */
  build(): Vcard {
    for (const prop of this.properties) readBack(prop);
    assertValid(this.properties);
    return new Vcard(this.properties);
  }
}
