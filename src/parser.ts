/**
 * vCard v4 parser — RFC 6350
 *
 * Design goals:
 *   - Strict: the first malformed line aborts the parse with a typed error
 *   - Non-logging: recoverable oddities are reported as ParseWarnings
 *   - Lazy: cards are yielded one at a time as their END line is reached
 */

import type { ParameterMap, RawProperty } from './types.js';
import { CharsetError, ParseError, ValueError } from './errors.js';
import { decodeParamValue } from './escape.js';
import { tokenize, unfold, type Token } from './lexer.js';
import { definitionOf, isExtensionName, toValueType } from './definitions.js';
import { parseValue, type ValueChecks } from './values.js';
import { Property } from './property.js';

// ── Parse Warnings ─────────────────────────────────────────────────────────

export interface ParseWarning {
  /** Content line number (1-based, after unfolding) */
  line?: number;
  message: string;
}

/** Checks switched on by parse options and supplied by the adapters */
export interface ParserChecks extends ValueChecks {
  /** Returns why a MEDIATYPE value is not acceptable, or undefined */
  mediaType?: (value: string) => string | undefined;
}

export interface ParserConfig {
  /** Zero decoded binary data of a card abandoned by an error */
  zeroize?: boolean;
  onWarning?: (warning: ParseWarning) => void;
  checks?: ParserChecks;
}

type Warn = (message: string, line?: number) => void;

// ── Token cursor ───────────────────────────────────────────────────────────

/** Walks the tokens of one content line */
class LineCursor {
  private pos = 0;

  constructor(
    private readonly tokens: readonly Token[],
    readonly line: number,
  ) {}

  peek(): Token | undefined {
    return this.tokens[this.pos];
  }

  next(): Token | undefined {
    return this.tokens[this.pos++];
  }

  /** Every remaining token's text, concatenated */
  rest(): string {
    const text = this.tokens
      .slice(this.pos)
      .map(t => t.text)
      .join('');
    this.pos = this.tokens.length;
    return text;
  }

  fail(code: ParseError['code'], message: string, token?: Token, property?: string): ParseError {
    return new ParseError(code, message, property, { line: this.line, offset: token?.offset });
  }
}

// ── Parameter parsing ──────────────────────────────────────────────────────

/**
 * Parse `key ["=" value *("," value)]` after a `;`.
 * A bare key is the historical TYPE shorthand.
 */
function parseParameter(
  cursor: LineCursor,
  params: Map<string, string[]>,
  property: string,
  warn: Warn,
): void {
  const keyToken = cursor.next();
  if (keyToken?.kind !== 'word') {
    throw cursor.fail('MalformedParameter', `Expected a parameter name on ${property}`, keyToken, property);
  }

  let key = keyToken.text.toUpperCase();
  let values: string[];

  if (cursor.peek()?.kind === 'equals') {
    cursor.next();
    values = parseParameterValues(cursor, property, key);
  } else {
    warn(`Bare parameter "${keyToken.text}" on ${property} read as TYPE=${keyToken.text}`, cursor.line);
    values = [keyToken.text];
    key = 'TYPE';
  }

  const existing = params.get(key);
  if (existing) existing.push(...values);
  else params.set(key, values);
}

function parseParameterValues(cursor: LineCursor, property: string, key: string): string[] {
  const values: string[] = [];
  for (;;) {
    let value = '';
    let quoted = false;
    let token = cursor.peek();

    if (token?.kind === 'quoted') {
      value = token.text;
      quoted = true;
      cursor.next();
    } else {
      // Unquoted: SAFE-CHAR runs, which may include "." and "="
      while (token && (token.kind === 'word' || token.kind === 'text' || token.kind === 'dot' || token.kind === 'equals')) {
        value += token.text;
        cursor.next();
        token = cursor.peek();
      }
    }
    values.push(decodeParamValue(value));

    token = cursor.peek();
    if (token?.kind === 'comma') {
      cursor.next();
      continue;
    }
    if (token?.kind === 'semicolon' || token?.kind === 'colon') return values;
    if (token === undefined) throw cursor.fail('MissingColon', `Missing ":" after parameters of ${property}`, token, property);
    throw cursor.fail(
      'MalformedParameter',
      quoted
        ? `Unexpected text after quoted ${key} value on ${property}`
        : `Unexpected "${token.text}" in ${key} value on ${property}`,
      token,
      property,
    );
  }
}

/** Per-parameter rules applied once a line's parameters are complete */
function checkParameters(
  params: Map<string, string[]>,
  property: string,
  line: number,
  warn: Warn,
  checks: ParserChecks,
): ParameterMap {
  const location = { line };
  const malformed = (message: string): ParseError =>
    new ParseError('MalformedParameter', message, property, location);

  const charset = params.get('CHARSET');
  if (charset) {
    const bad = charset.find(c => c.toUpperCase() !== 'UTF-8');
    if (bad !== undefined) throw new CharsetError(bad, property, location);
    params.delete('CHARSET');
    warn(`CHARSET=UTF-8 on ${property} discarded`, line);
  }

  const pref = params.get('PREF');
  if (pref) {
    const n = pref.length === 1 && /^\d{1,3}$/.test(pref[0] ?? '') ? parseInt(pref[0] ?? '', 10) : NaN;
    if (!(n >= 1 && n <= 100)) throw malformed(`PREF on ${property} must be an integer from 1 to 100`);
  }

  for (const pid of params.get('PID') ?? []) {
    if (!/^\d+(?:\.\d+)?$/.test(pid)) throw malformed(`Invalid PID value "${pid}" on ${property}`);
  }

  const value = params.get('VALUE');
  if (value) {
    if (value.length !== 1 || toValueType(value[0] ?? '') === undefined) {
      throw malformed(`Invalid VALUE "${value.join(',')}" on ${property}`);
    }
  }

  const reject = (param: string, reason: string | undefined, fragment: string): void => {
    if (reason) throw new ValueError(`Invalid ${param} "${fragment}" on ${property}: ${reason}`, property, fragment, location);
  };
  if (checks.mediaType) {
    for (const m of params.get('MEDIATYPE') ?? []) reject('MEDIATYPE', checks.mediaType(m), m);
  }
  if (checks.languageTag) {
    for (const l of params.get('LANGUAGE') ?? []) reject('LANGUAGE', checks.languageTag(l), l);
  }

  return params;
}

// ── Content line parsing ───────────────────────────────────────────────────

/**
 * Parse the tokens of one content line into a RawProperty.
 *
 * Format: [group.]name[;param=value...]:value
 */
function parseLineTokens(tokens: readonly Token[], line: number, warn: Warn, checks: ParserChecks): RawProperty {
  const cursor = new LineCursor(tokens, line);

  if (!tokens.some(t => t.kind === 'colon')) {
    throw cursor.fail('MissingColon', 'Content line has no ":" separating name and value', tokens[0]);
  }

  let first = cursor.next();
  if (first?.kind === 'colon' || first?.kind === 'semicolon' || first?.kind === 'dot') {
    throw cursor.fail('EmptyName', 'Content line has an empty property name', first);
  }
  if (first?.kind !== 'word') {
    throw cursor.fail('UnexpectedToken', `Unexpected "${first?.text ?? ''}" where a property name was expected`, first);
  }

  let group: string | undefined;
  if (cursor.peek()?.kind === 'dot') {
    group = first.text;
    cursor.next();
    first = cursor.next();
    if (first?.kind !== 'word') {
      throw cursor.fail('EmptyName', `Group "${group}" is not followed by a property name`, first);
    }
  }
  const name = first.text;

  const params = new Map<string, string[]>();
  for (;;) {
    const token = cursor.next();
    if (token?.kind === 'colon') break;
    if (token?.kind === 'semicolon') {
      parseParameter(cursor, params, name, warn);
      continue;
    }
    throw cursor.fail('UnexpectedToken', `Unexpected "${token?.text ?? ''}" after property name ${name}`, token, name);
  }

  const parameters = checkParameters(params, name, line, warn, checks);
  const raw: RawProperty = { name, parameters, value: cursor.rest(), line };
  if (group !== undefined) raw.group = group;
  return raw;
}

/**
 * Parse a single (unfolded) content line into a RawProperty.
 * The value is returned still escaped.
 */
export function parseContentLine(line: string, config: ParserConfig = {}): RawProperty {
  const tokens = [...tokenize(line)].filter(t => t.kind !== 'newline');
  return parseLineTokens(tokens, 1, toWarn(config), config.checks ?? {});
}

/** Group a token stream into the token lists of its non-empty lines */
function* lines(tokens: Iterable<Token>): Generator<{ line: number; tokens: Token[] }, void, undefined> {
  let current: Token[] = [];
  for (const token of tokens) {
    if (token.kind !== 'newline') {
      current.push(token);
      continue;
    }
    if (current.length > 0) yield { line: token.line, tokens: current };
    current = [];
  }
  const last = current[0];
  if (last) yield { line: last.line, tokens: current };
}

function toWarn(config: ParserConfig): Warn {
  return (message, line) => config.onWarning?.(line === undefined ? { message } : { line, message });
}

// ── vCard block parsing ────────────────────────────────────────────────────

/** One BEGIN:VCARD … END:VCARD block, typed but not yet validated */
export interface ParsedCard {
  properties: Property[];
  warnings: ParseWarning[];
  /** Line of the BEGIN:VCARD delimiter */
  line: number;
}

function isDelimiter(raw: RawProperty, keyword: 'BEGIN' | 'END'): boolean {
  return raw.name.toUpperCase() === keyword;
}

function toProperty(raw: RawProperty, warn: Warn, checks: ParserChecks): Property {
  const { name, parameters, line } = raw;
  if (!definitionOf(name) && !isExtensionName(name)) {
    warn(`Unregistered property ${name} stored as text`, line);
  }
  try {
    const value = parseValue(raw.value, {
      name,
      params: parameters,
      warn: message => warn(message, line),
      checks,
    });
    const prop = new Property(name, value, parameters, raw.group);
    // the property holds its own copy of decoded bytes
    if (value.kind === 'binary') value.data.fill(0);
    return prop;
  } catch (err) {
    if (err instanceof ValueError && err.line === undefined) {
      throw new ValueError(err.message, err.property ?? name, err.fragment, { line });
    }
    throw err;
  }
}

/**
 * Parse vCard text into its blocks, lazily, in input order.
 *
 * Fails fast: the first lexical, grammar or value error is thrown and no
 * further block is read.
 */
export function* parseCards(input: string, config: ParserConfig = {}): Generator<ParsedCard, void, undefined> {
  const checks = config.checks ?? {};
  let card: ParsedCard | undefined;

  try {
    for (const { line, tokens } of lines(tokenize(unfold(input)))) {
      const cardWarnings = card?.warnings;
      const warn: Warn = (message, at) => {
        const warning: ParseWarning = at === undefined ? { message } : { line: at, message };
        cardWarnings?.push(warning);
        config.onWarning?.(warning);
      };
      const raw = parseLineTokens(tokens, line, warn, checks);

      if (isDelimiter(raw, 'BEGIN')) {
        if (raw.value.toUpperCase() !== 'VCARD') {
          throw new ParseError('UnexpectedToken', `Unsupported component BEGIN:${raw.value}`, 'BEGIN', { line });
        }
        if (card) throw new ParseError('UnexpectedToken', 'Nested BEGIN:VCARD', 'BEGIN', { line });
        card = { properties: [], warnings: [], line };
        continue;
      }

      if (!card) {
        throw new ParseError('UnexpectedToken', `${raw.name} outside BEGIN:VCARD … END:VCARD`, raw.name, { line });
      }

      if (isDelimiter(raw, 'END')) {
        if (raw.value.toUpperCase() !== 'VCARD') {
          throw new ParseError('UnexpectedToken', `END:${raw.value} does not close BEGIN:VCARD`, 'END', { line });
        }
        const done = card;
        card = undefined;
        yield done;
        continue;
      }

      card.properties.push(toProperty(raw, warn, checks));
    }

    if (card) {
      throw new ParseError('UnexpectedEnd', `vCard opened on line ${card.line} has no END:VCARD`, undefined, {
        line: card.line,
      });
    }
  } catch (err) {
    if (config.zeroize && card) {
      for (const prop of card.properties) prop.release();
    }
    throw err;
  }
}
