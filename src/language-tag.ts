/**
 * BCP 47 language tags (RFC 5646 section 2.1) for LANGUAGE parameters and
 * language-tag values.
 *
 * Only well-formedness is checked; subtags are not looked up in the IANA
 * registry.
 */

import { ValueError } from './errors.js';
import type { Property } from './property.js';

export interface LanguageTagExtension {
  readonly singleton: string;
  readonly subtags: readonly string[];
}

export interface LanguageTag {
  /** The tag as written */
  readonly tag: string;
  /** Primary language subtag; empty for a private-use-only tag */
  readonly language: string;
  readonly extlang: readonly string[];
  readonly script?: string;
  readonly region?: string;
  readonly variants: readonly string[];
  readonly extensions: readonly LanguageTagExtension[];
  readonly privateUse: readonly string[];
  /** Registered irregular or regular grandfathered tag */
  readonly grandfathered?: boolean;
}

// RFC 5646 section 2.2.8
const GRANDFATHERED = new Set([
  'en-gb-oed',
  'i-ami',
  'i-bnn',
  'i-default',
  'i-enochian',
  'i-hak',
  'i-klingon',
  'i-lux',
  'i-mingo',
  'i-navajo',
  'i-pwn',
  'i-tao',
  'i-tay',
  'i-tsu',
  'sgn-be-fr',
  'sgn-be-nl',
  'sgn-ch-de',
  'art-lojban',
  'cel-gaulish',
  'no-bok',
  'no-nyn',
  'zh-guoyu',
  'zh-hakka',
  'zh-min',
  'zh-min-nan',
  'zh-xiang',
]);

const ALPHA = /^[A-Za-z]+$/;
const DIGIT = /^[0-9]+$/;
const ALPHANUM = /^[A-Za-z0-9]+$/;

const isAlpha = (s: string, min: number, max = min): boolean => ALPHA.test(s) && s.length >= min && s.length <= max;
const isVariant = (s: string): boolean =>
  ALPHANUM.test(s) && ((s.length >= 5 && s.length <= 8) || (s.length === 4 && /^[0-9]/.test(s)));
const isRegion = (s: string): boolean => isAlpha(s, 2) || (DIGIT.test(s) && s.length === 3);

function privateUse(subtags: string[], from: number): string[] | string {
  const rest = subtags.slice(from);
  if (rest.length === 0) return 'private use needs at least one subtag';
  const bad = rest.find(s => !ALPHANUM.test(s) || s.length > 8);
  return bad === undefined ? rest : `invalid private use subtag "${bad}"`;
}

function parse(tag: string): LanguageTag | string {
  if (tag === '') return 'empty tag';
  const lower = tag.toLowerCase();
  const base = { tag, extlang: [], variants: [], extensions: [], privateUse: [] };

  if (GRANDFATHERED.has(lower)) return { ...base, language: lower, grandfathered: true };

  const subtags = tag.split('-');
  if (subtags.some(s => s === '')) return 'empty subtag';

  if (subtags[0]?.toLowerCase() === 'x') {
    const pu = privateUse(subtags, 1);
    return typeof pu === 'string' ? pu : { ...base, language: '', privateUse: pu };
  }

  let i = 0;
  const at = (): string => subtags[i] ?? '';

  const language = at();
  if (!isAlpha(language, 2, 8) || language.length === 4) return `invalid language subtag "${language}"`;
  i++;

  const extlang: string[] = [];
  if (language.length <= 3) {
    while (extlang.length < 3 && isAlpha(at(), 3)) extlang.push(subtags[i++] ?? '');
  }

  let script: string | undefined;
  if (isAlpha(at(), 4)) script = subtags[i++];

  let region: string | undefined;
  if (isRegion(at())) region = subtags[i++];

  const variants: string[] = [];
  while (i < subtags.length && isVariant(at())) variants.push(subtags[i++] ?? '');

  const extensions: LanguageTagExtension[] = [];
  const singletons = new Set<string>();
  while (i < subtags.length && /^[0-9A-WYZa-wyz]$/.test(at())) {
    const singleton = at().toLowerCase();
    if (singletons.has(singleton)) return `duplicate extension "${singleton}"`;
    singletons.add(singleton);
    i++;
    const ext: string[] = [];
    while (i < subtags.length && ALPHANUM.test(at()) && at().length >= 2 && at().length <= 8) ext.push(subtags[i++] ?? '');
    if (ext.length === 0) return `extension "${singleton}" has no subtags`;
    extensions.push({ singleton, subtags: ext });
  }

  let pu: string[] = [];
  if (at().toLowerCase() === 'x') {
    const result = privateUse(subtags, i + 1);
    if (typeof result === 'string') return result;
    pu = result;
    i = subtags.length;
  }

  if (i < subtags.length) return `unexpected subtag "${at()}"`;

  return {
    tag,
    language: language.toLowerCase(),
    extlang: extlang.map(s => s.toLowerCase()),
    ...(script !== undefined ? { script } : {}),
    ...(region !== undefined ? { region } : {}),
    variants,
    extensions,
    privateUse: pu,
  };
}

/** Why a string is not a well-formed language tag, or undefined if it is one */
export function languageTagError(value: string): string | undefined {
  const result = parse(value);
  return typeof result === 'string' ? result : undefined;
}

/** @throws ValueError when the tag is not well formed */
export function parseLanguageTag(value: string): LanguageTag {
  const result = parse(value);
  if (typeof result === 'string') throw new ValueError(`Invalid language tag "${value}": ${result}`, undefined, value);
  return result;
}

/**
 * Language of a property: the value of a LANG property, otherwise its
 * LANGUAGE parameter.
 */
export function languageTagOf(property: Property): LanguageTag | undefined {
  if (property.value.kind === 'language-tag') return parseLanguageTag(property.value.value);
  const param = property.language;
  return param === undefined ? undefined : parseLanguageTag(param);
}
