/**
 * Vcard — the vCard v4 container class (RFC 6350)
 *
 * Holds an ordered, immutable list of properties plus accessors for the
 * well-known ones, and the entry points for parsing and generating text.
 */

import type { DateAndOrTime, StructuredName, ValidationResult } from './types.js';
import { ParseError } from './errors.js';
import type { Property } from './property.js';
import { parseCards, type ParserChecks, type ParseWarning } from './parser.js';
import { serializeVcard, type GenerateOptions } from './generator.js';
import { assertValid, SUPPORTED_VERSION, validate } from './validator.js';
import { mediaTypeError } from './media-type.js';
import { languageTagError } from './language-tag.js';

// ── Options ────────────────────────────────────────────────────────────────

export interface ParseOptions {
  /**
   * Overwrite decoded binary data with zeros when a parse fails, and on
   * {@link Vcard.release}.
   * Default: true
   */
  zeroize?: boolean;
  /** Validate MEDIATYPE parameters as MIME media types */
  mediaTypes?: boolean;
  /** Validate LANGUAGE parameters and language-tag values as BCP 47 tags */
  languageTags?: boolean;
  /** Called for every warning as it is raised */
  onWarning?: (warning: ParseWarning) => void;
}

export interface VcardOptions {
  /** See {@link ParseOptions.zeroize} */
  zeroize?: boolean;
  warnings?: readonly ParseWarning[];
}

function checksFor(options: ParseOptions): ParserChecks {
  const checks: ParserChecks = {};
  if (options.mediaTypes) checks.mediaType = mediaTypeError;
  if (options.languageTags) checks.languageTag = languageTagError;
  return checks;
}

const byPref = (a: Property, b: Property): number => (a.pref ?? 100) - (b.pref ?? 100);

// ── Vcard class ────────────────────────────────────────────────────────────

/**
 * A vCard v4 object.
 *
 * Usage:
 * ```ts
 * // Parse
 * const [vcard] = Vcard.parse(text);
 * vcard.displayName;
 *
 * // Build
 * const card = new VcardBuilder().formattedName('Alice Example').email('alice@example.com').build();
 * card.toText();
 * ```
 */
export class Vcard {
  /** Properties in input or insertion order, VERSION included */
  readonly properties: readonly Property[];
  /** Warnings raised while parsing this card */
  readonly warnings: readonly ParseWarning[];
  private readonly zeroize: boolean;

  constructor(properties: Iterable<Property>, options: VcardOptions = {}) {
    this.properties = Object.freeze([...properties]);
    this.warnings = Object.freeze([...(options.warnings ?? [])]);
    this.zeroize = options.zeroize ?? true;
    Object.freeze(this);
  }

  // ── Factory methods ─────────────────────────────────────────────────────

  /**
   * Parse one or more vCards from text.
   * Each card is validated as soon as its END:VCARD is read.
   *
   * @returns Array of Vcard instances (empty if the input has no content lines)
   * @throws VcardError subclass for the first problem found
   */
  static parse(text: string, options: ParseOptions = {}): Vcard[] {
    const zeroize = options.zeroize ?? true;
    const cards: Vcard[] = [];
    try {
      for (const parsed of parseCards(text, { zeroize, onWarning: options.onWarning, checks: checksFor(options) })) {
        const card = new Vcard(parsed.properties, { zeroize, warnings: parsed.warnings });
        cards.push(card);
        assertValid(card.properties);
      }
    } catch (err) {
      for (const card of cards) card.release();
      throw err;
    }
    return cards;
  }

  /**
   * Parse the first vCard from text.
   * @throws ParseError if no vCard is found
   */
  static parseOne(text: string, options?: ParseOptions): Vcard {
    const [first] = Vcard.parse(text, options);
    if (!first) throw new ParseError('UnexpectedEnd', 'No vCard found in input');
    return first;
  }

  // ── Property access ─────────────────────────────────────────────────────

  /** All properties with the given name (case-insensitive) */
  get(name: string): Property[] {
    const key = name.toUpperCase();
    return this.properties.filter(p => p.key === key);
  }

  /** First property with the given name */
  first(name: string): Property | undefined {
    const key = name.toUpperCase();
    return this.properties.find(p => p.key === key);
  }

  // ── Convenience accessors ───────────────────────────────────────────────

  get version(): string {
    return this.first('VERSION')?.text ?? SUPPORTED_VERSION;
  }

  get formattedNames(): string[] {
    return this.get('FN').map(p => p.text);
  }

  /**
   * Get the primary (most preferred or first) formatted name string.
   */
  get displayName(): string {
    return this.get('FN').sort(byPref)[0]?.text ?? '';
  }

  /** Structured name from N */
  get name(): StructuredName | undefined {
    const value = this.first('N')?.value;
    return value?.kind === 'name' ? value.value : undefined;
  }

  /** BDAY as a date and/or time, or as free text when VALUE=text */
  get birthday(): DateAndOrTime | string | undefined {
    const value = this.first('BDAY')?.value;
    if (value?.kind === 'date-and-or-time') return value.values[0];
    if (value?.kind === 'text') return value.value;
    return undefined;
  }

  /**
   * Get the primary email address string.
   */
  get primaryEmail(): string | undefined {
    return this.get('EMAIL').sort(byPref)[0]?.text;
  }

  /**
   * Get the primary telephone string (a `tel:` URI when VALUE=uri).
   */
  get primaryTel(): string | undefined {
    return this.get('TEL').sort(byPref)[0]?.text;
  }

  /** Properties carrying inline binary data */
  get binaries(): Property[] {
    return this.properties.filter(p => p.value.kind === 'binary');
  }

  // ── Generation ──────────────────────────────────────────────────────────

  /**
   * Generate RFC 6350-compliant vCard text.
   * Uses strict CRLF line endings and 75-octet line folding.
   *
   * @throws ValidationError if the vCard is invalid (e.g. missing FN)
   */
  toText(options?: GenerateOptions): string {
    return serializeVcard(this.properties, options);
  }

  toString(): string {
    return this.toText();
  }

  // ── Validation ──────────────────────────────────────────────────────────

  /**
   * Validate this vCard against RFC 6350 occurrence rules.
   * Returns a result object rather than throwing.
   */
  validate(): ValidationResult {
    return validate(this.properties);
  }

  // ── Release ─────────────────────────────────────────────────────────────

  /** Zero every decoded binary payload, unless zeroize was turned off */
  release(): void {
    if (!this.zeroize) return;
    for (const prop of this.properties) prop.release();
  }
}
