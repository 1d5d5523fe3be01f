/**
 * rfc6350-vcard — strict vCard v4 (RFC 6350) parsing and generation
 *
 * @example
 * ```ts
 * import { parse, VcardBuilder } from 'rfc6350-vcard';
 *
 * // Parse
 * const [contact] = parse(vcardText);
 * console.log(contact.displayName);    // 'Alice Example'
 * console.log(contact.primaryEmail);   // 'alice@example.com'
 *
 * // Build
 * const card = new VcardBuilder()
 *   .formattedName('Bob Builder')
 *   .email('bob@example.com')
 *   .build();
 * const text = card.toText();          // CRLF, folded at 75 octets
 * ```
 */

import { Vcard, type ParseOptions } from './vcard.js';
import type { GenerateOptions } from './generator.js';

// ── Main classes ───────────────────────────────────────────────────────────
export { Vcard, type ParseOptions, type VcardOptions } from './vcard.js';
export { VcardBuilder } from './builder.js';
export { Property, normalizeParameters, type ParameterInit } from './property.js';

// ── Errors ─────────────────────────────────────────────────────────────────
export {
  VcardError,
  LexError,
  ParseError,
  CharsetError,
  ValueError,
  ValidationError,
  type ParseErrorCode,
  type ErrorLocation,
} from './errors.js';

// ── Types ──────────────────────────────────────────────────────────────────
export type * from './types.js';

// ── Lexer and parser ───────────────────────────────────────────────────────
export { tokenize, unfold, unfoldLines, type Token, type TokenKind } from './lexer.js';
export {
  parseCards,
  parseContentLine,
  type ParsedCard,
  type ParserChecks,
  type ParserConfig,
  type ParseWarning,
} from './parser.js';

// ── Values ─────────────────────────────────────────────────────────────────
export {
  parseValue,
  formatValue,
  effectiveType,
  decodeBase64,
  encodeBase64,
  type ValueChecks,
  type ValueContext,
} from './values.js';
export {
  parseDate,
  parseTime,
  parseDateTime,
  parseDateAndOrTime,
  parseTimestamp,
  parseUtcOffset,
  formatDate,
  formatTime,
  formatDateTime,
  formatDateAndOrTime,
  formatTimestamp,
  formatUtcOffset,
  toJsDate,
  fromJsDate,
} from './datetime.js';
export { isUri, uriSyntaxError } from './uri.js';
export { definitionOf, registeredProperties, type PropertyDefinition } from './definitions.js';

// ── Validation and generation ──────────────────────────────────────────────
export { validate, assertValid, findViolations, countOccurrences, SUPPORTED_VERSION } from './validator.js';
export { foldLine, serializeParameters, serializeProperty, serializeVcard, type GenerateOptions } from './generator.js';

// ── Escape utilities ───────────────────────────────────────────────────────
export {
  escapeText,
  unescapeText,
  parseStructured,
  parseList,
  parseStructuredList,
  encodeParamValue,
  decodeParamValue,
  quoteParamValue,
} from './escape.js';

// ── Adapters ───────────────────────────────────────────────────────────────
export { parseMediaType, mediaTypeOf, formatMediaType, type MediaType } from './media-type.js';
export { parseLanguageTag, languageTagOf, type LanguageTag, type LanguageTagExtension } from './language-tag.js';
export { toJCard, fromJCard, type JCard, type JCardProperty, type JCardParameters, type JCardValue } from './jcard.js';

// ── Convenience functions ──────────────────────────────────────────────────

/**
 * Parse every vCard in the text.
 * @throws VcardError subclass for the first problem found
 */
export function parse(text: string, options?: ParseOptions): Vcard[] {
  return Vcard.parse(text, options);
}

/** Parse the first vCard in the text */
export function parseOne(text: string, options?: ParseOptions): Vcard {
  return Vcard.parseOne(text, options);
}

/** Serialize one or more vCards, concatenated */
export function stringify(cards: Vcard | readonly Vcard[], options?: GenerateOptions): string {
  const list = cards instanceof Vcard ? [cards] : cards;
  return list.map(card => card.toText(options)).join('');
}
