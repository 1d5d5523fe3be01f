/**
 * Registered vCard v4 properties (RFC 6350 section 6): occurrence rule,
 * default value type, structured shape and the VALUE tokens each accepts.
 *
 * The tables are built once at module load and never mutated.
 */

import type { Cardinality, StructuredShape, ValueType } from './types.js';

export interface PropertyDefinition {
  readonly name: string;
  readonly cardinality: Cardinality;
  /** Value type used when no VALUE parameter is given */
  readonly defaultType: ValueType;
  /** VALUE tokens the property accepts */
  readonly accepts: readonly ValueType[];
  /** Compound shape of a text value, when it is not a plain text */
  readonly shape?: StructuredShape;
  /** Without VALUE, a value with URI syntax is a URI and anything else text */
  readonly textOrUri?: boolean;
  /** Whether ENCODING=b inline data is allowed */
  readonly binary?: boolean;
}

type Definition = Omit<PropertyDefinition, 'name'>;

const uri: Definition = { cardinality: 'zero-or-more', defaultType: 'uri', accepts: ['uri'] };
const uriWithData: Definition = { ...uri, binary: true };
const text: Definition = { cardinality: 'zero-or-more', defaultType: 'text', accepts: ['text'] };

const TABLE: Record<string, Definition> = {
  // General (6.1)
  SOURCE: uri,
  KIND: { cardinality: 'zero-or-one', defaultType: 'text', accepts: ['text'], shape: 'kind' },
  XML: text,

  // Identification (6.2)
  FN: { ...text, cardinality: 'one-or-more' },
  N: { cardinality: 'zero-or-one', defaultType: 'text', accepts: ['text'], shape: 'name' },
  NICKNAME: { ...text, shape: 'text-list' },
  PHOTO: uriWithData,
  // Dates and REV may repeat; only KIND, N, GENDER, PRODID and UID are held to one
  BDAY: { cardinality: 'zero-or-more', defaultType: 'date-and-or-time', accepts: ['date-and-or-time', 'text'] },
  ANNIVERSARY: { cardinality: 'zero-or-more', defaultType: 'date-and-or-time', accepts: ['date-and-or-time', 'text'] },
  GENDER: { cardinality: 'zero-or-one', defaultType: 'text', accepts: ['text'], shape: 'gender' },

  // Delivery addressing (6.3)
  ADR: { ...text, shape: 'address' },

  // Communications (6.4)
  TEL: { cardinality: 'zero-or-more', defaultType: 'text', accepts: ['text', 'uri'] },
  EMAIL: text,
  IMPP: uri,
  LANG: { cardinality: 'zero-or-more', defaultType: 'language-tag', accepts: ['language-tag'] },

  // Geographical (6.5)
  TZ: { cardinality: 'zero-or-more', defaultType: 'text', accepts: ['text', 'uri', 'utc-offset'] },
  GEO: uri,

  // Organizational (6.6)
  TITLE: text,
  ROLE: text,
  LOGO: uriWithData,
  ORG: { ...text, shape: 'organization' },
  MEMBER: uri,
  RELATED: { cardinality: 'zero-or-more', defaultType: 'uri', accepts: ['uri', 'text'], textOrUri: true },

  // Explanatory (6.7)
  CATEGORIES: { ...text, shape: 'text-list' },
  NOTE: text,
  PRODID: { cardinality: 'zero-or-one', defaultType: 'text', accepts: ['text'] },
  REV: { cardinality: 'zero-or-more', defaultType: 'timestamp', accepts: ['timestamp'] },
  SOUND: uriWithData,
  UID: { cardinality: 'zero-or-one', defaultType: 'uri', accepts: ['uri', 'text'], textOrUri: true },
  CLIENTPIDMAP: { cardinality: 'zero-or-more', defaultType: 'text', accepts: ['text'], shape: 'client-pid-map' },
  URL: uri,
  VERSION: { cardinality: 'exactly-one', defaultType: 'text', accepts: ['text'] },

  // Security (6.8)
  KEY: { cardinality: 'zero-or-more', defaultType: 'uri', accepts: ['uri', 'text'], textOrUri: true, binary: true },

  // Calendar (6.9)
  FBURL: uri,
  CALADRURI: uri,
  CALURI: uri,
};

const DEFINITIONS: ReadonlyMap<string, PropertyDefinition> = new Map(
  Object.entries(TABLE).map(([name, def]) => [name, Object.freeze({ name, ...def })]),
);

/** Look up a registered property by name (case-insensitive) */
export function definitionOf(name: string): PropertyDefinition | undefined {
  return DEFINITIONS.get(name.toUpperCase());
}

/** Every registered property, in RFC 6350 section order */
export function registeredProperties(): PropertyDefinition[] {
  return [...DEFINITIONS.values()];
}

/** Extension names that are stored without a warning */
export function isExtensionName(name: string): boolean {
  return /^(?:X|VND)-/i.test(name);
}

// ── Value type tokens ──────────────────────────────────────────────────────

export const VALUE_TYPES: readonly ValueType[] = [
  'text',
  'uri',
  'date',
  'time',
  'date-time',
  'date-and-or-time',
  'timestamp',
  'boolean',
  'integer',
  'float',
  'utc-offset',
  'language-tag',
];

/** Narrow a VALUE parameter token to a value type (case-insensitive) */
export function toValueType(token: string): ValueType | undefined {
  const lower = token.toLowerCase();
  return VALUE_TYPES.find(type => type === lower);
}

// ── Parameter vocabularies ─────────────────────────────────────────────────

/** TYPE values allowed on RELATED (RFC 6350 section 6.6.6) */
export const RELATED_TYPES: ReadonlySet<string> = new Set([
  'contact',
  'acquaintance',
  'friend',
  'met',
  'co-worker',
  'colleague',
  'co-resident',
  'neighbor',
  'child',
  'parent',
  'sibling',
  'spouse',
  'kin',
  'muse',
  'crush',
  'date',
  'sweetheart',
  'me',
  'agent',
  'emergency',
  'work',
  'home',
]);
