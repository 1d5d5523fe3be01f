/**
 * Core type definitions for vCard v4 (RFC 6350)
 */

// ── Value Types ────────────────────────────────────────────────────────────

/** All value types defined in RFC 6350 section 4 (the tokens allowed in VALUE=) */
export type ValueType =
  | 'text'
  | 'uri'
  | 'date'
  | 'time'
  | 'date-time'
  | 'date-and-or-time'
  | 'timestamp'
  | 'boolean'
  | 'integer'
  | 'float'
  | 'utc-offset'
  | 'language-tag';

/** Compound value shapes that have no VALUE token of their own */
export type StructuredShape =
  | 'name'
  | 'address'
  | 'organization'
  | 'gender'
  | 'client-pid-map'
  | 'text-list'
  | 'kind';

/** Occurrence constraint of a property within one vCard (RFC 6350 section 6) */
export type Cardinality = 'exactly-one' | 'zero-or-one' | 'one-or-more' | 'zero-or-more';

/** Well-known TYPE parameter values */
export type TypeValue =
  // address/email/phone
  | 'work' | 'home'
  // telephone
  | 'voice' | 'fax' | 'cell' | 'video' | 'pager' | 'textphone' | 'text'
  // related
  | 'contact' | 'acquaintance' | 'friend' | 'met'
  | 'co-worker' | 'colleague' | 'co-resident' | 'neighbor'
  | 'child' | 'parent' | 'sibling' | 'spouse' | 'kin'
  | 'muse' | 'crush' | 'date' | 'sweetheart' | 'me' | 'agent' | 'emergency'
  | string;

/** GENDER sex component */
export type GenderSex = 'M' | 'F' | 'O' | 'N' | 'U' | '';

// ── Date and time ──────────────────────────────────────────────────────────

/**
 * Partial date (RFC 6350 section 4.3.1).
 * Reduced accuracy (year, year-month) and truncation (month-day, day) are
 * expressed by leaving components undefined.
 */
export interface PartialDate {
  readonly year?: number;
  readonly month?: number;
  readonly day?: number;
}

/** A signed offset from UTC, e.g. `-0500` */
export interface UtcOffset {
  readonly sign: '+' | '-';
  readonly hours: number;
  /** Undefined when the offset was written as hours only (`+05`) */
  readonly minutes?: number;
}

/** `Z` for UTC, otherwise an explicit offset */
export type Zone = 'Z' | UtcOffset;

/** Partial time of day (RFC 6350 section 4.3.2) */
export interface PartialTime {
  readonly hour?: number;
  readonly minute?: number;
  readonly second?: number;
  readonly zone?: Zone;
}

/** A date joined to a time (RFC 6350 section 4.3.3) */
export interface DateTime {
  readonly date: PartialDate;
  readonly time: PartialTime;
}

/** Either a date, a time, or both (RFC 6350 section 4.3.4) */
export interface DateAndOrTime {
  readonly date?: PartialDate;
  readonly time?: PartialTime;
}

// ── Structured Value Types ─────────────────────────────────────────────────

/** Structured name (N property) — RFC 6350 section 6.2.2 */
export interface StructuredName {
  readonly familyNames: readonly string[];
  readonly givenNames: readonly string[];
  readonly additionalNames: readonly string[];
  readonly honorificPrefixes: readonly string[];
  readonly honorificSuffixes: readonly string[];
}

/** Postal address (ADR property) — RFC 6350 section 6.3.1; each component is a list */
export interface Address {
  readonly postOfficeBox: readonly string[];
  readonly extendedAddress: readonly string[];
  readonly streetAddress: readonly string[];
  readonly locality: readonly string[];
  readonly region: readonly string[];
  readonly postalCode: readonly string[];
  readonly countryName: readonly string[];
}

/** Organization (ORG property) — RFC 6350 section 6.6.4 */
export interface Organization {
  readonly name: string;
  readonly units: readonly string[];
}

/** Gender value — RFC 6350 section 6.2.7 */
export interface Gender {
  readonly sex: GenderSex;
  readonly identity?: string;
}

/** CLIENTPIDMAP value — RFC 6350 section 6.7.7 */
export interface ClientPidMap {
  readonly pid: number;
  readonly uri: string;
}

// ── Value union ────────────────────────────────────────────────────────────

export interface TextValue {
  readonly kind: 'text';
  readonly value: string;
}

export interface TextListValue {
  readonly kind: 'text-list';
  readonly values: readonly string[];
}

export interface BooleanValue {
  readonly kind: 'boolean';
  readonly value: boolean;
}

export interface IntegerValue {
  readonly kind: 'integer';
  readonly values: readonly number[];
}

export interface FloatValue {
  readonly kind: 'float';
  readonly values: readonly number[];
}

export interface DateValue {
  readonly kind: 'date';
  readonly values: readonly PartialDate[];
}

export interface TimeValue {
  readonly kind: 'time';
  readonly values: readonly PartialTime[];
}

export interface DateTimeValue {
  readonly kind: 'date-time';
  readonly values: readonly DateTime[];
}

export interface DateAndOrTimeValue {
  readonly kind: 'date-and-or-time';
  readonly values: readonly DateAndOrTime[];
}

export interface TimestampValue {
  readonly kind: 'timestamp';
  readonly values: readonly DateTime[];
}

export interface UtcOffsetValue {
  readonly kind: 'utc-offset';
  readonly value: UtcOffset;
}

export interface LanguageTagValue {
  readonly kind: 'language-tag';
  readonly value: string;
}

export interface UriValue {
  readonly kind: 'uri';
  readonly value: string;
}

/** Inline data carried with ENCODING=b */
export interface BinaryValue {
  readonly kind: 'binary';
  readonly data: Uint8Array;
}

export interface NameValue {
  readonly kind: 'name';
  readonly value: StructuredName;
}

export interface AddressValue {
  readonly kind: 'address';
  readonly value: Address;
}

export interface OrganizationValue {
  readonly kind: 'organization';
  readonly value: Organization;
}

export interface GenderValue {
  readonly kind: 'gender';
  readonly value: Gender;
}

export interface ClientPidMapValue {
  readonly kind: 'client-pid-map';
  readonly value: ClientPidMap;
}

/** Typed property value, discriminated on `kind` */
export type Value =
  | TextValue
  | TextListValue
  | BooleanValue
  | IntegerValue
  | FloatValue
  | DateValue
  | TimeValue
  | DateTimeValue
  | DateAndOrTimeValue
  | TimestampValue
  | UtcOffsetValue
  | LanguageTagValue
  | UriValue
  | BinaryValue
  | NameValue
  | AddressValue
  | OrganizationValue
  | GenderValue
  | ClientPidMapValue;

export type ValueKind = Value['kind'];

// ── Parameter Map ──────────────────────────────────────────────────────────

/**
 * Parameter storage: upper-cased parameter name → decoded values, in the
 * order the parameters were first seen.
 */
export type ParameterMap = ReadonlyMap<string, readonly string[]>;

// ── Raw Property (pre-typed parsing) ──────────────────────────────────────

/**
 * A content line as parsed from text, before type-specific value
 * interpretation. `value` is still escaped.
 */
export interface RawProperty {
  group?: string;
  name: string;
  parameters: ParameterMap;
  value: string;
  /** Content line number (1-based, after unfolding) */
  line: number;
}

// ── Validation ─────────────────────────────────────────────────────────────

/** A single violated rule */
export interface ValidationIssue {
  property: string;
  rule: string;
  message: string;
}

/** Result of vCard validation */
export interface ValidationResult {
  valid: boolean;
  errors: ValidationIssue[];
}
