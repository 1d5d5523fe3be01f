/**
 * Tests for rfc6350-vcard
 * Uses Node.js built-in test runner.
 */

import { test, describe } from 'node:test';
import assert from 'node:assert/strict';

import {
  Vcard,
  VcardError,
  ParseError,
  ValidationError,
  ValueError,
  VcardBuilder,
  parse,
  parseOne,
  stringify,
  toJsDate,
  type ParseWarning,
} from '../index.js';

// ── Helper ─────────────────────────────────────────────────────────────────

/** Sample vCard v4 text for testing */
const SAMPLE_V4 = [
  'BEGIN:VCARD',
  'VERSION:4.0',
  'FN:Alice Example',
  'N:Example;Alice;Marie;;Dr.',
  'EMAIL;TYPE=work:alice@example.com',
  'EMAIL;TYPE=home;PREF=1:alice@personal.net',
  'TEL;VALUE=uri;TYPE=cell:tel:+1-555-123-4567',
  'ADR;TYPE=work:;;123 Main St;Springfield;IL;62701;USA',
  'ORG:Example Corp;Engineering',
  'TITLE:Software Engineer',
  'BDAY:19900315',
  'GENDER:F',
  'NICKNAME:Ali,Ally',
  'CATEGORIES:friend,colleague',
  'UID:urn:uuid:f81d4fae-7dec-11d0-a765-00a0c91e6bf6',
  'NOTE:This is a test\\nWith a newline',
  'REV:20240101T120000Z',
  'END:VCARD',
].join('\r\n');

/** Sample v3 vCard */
const SAMPLE_V3 = [
  'BEGIN:VCARD',
  'VERSION:3.0',
  'FN:Bob Smith',
  'N:Smith;Bob;;;',
  'EMAIL;TYPE=INTERNET:bob@example.org',
  'END:VCARD',
].join('\r\n');

const minimal = (...lines: string[]): string =>
  ['BEGIN:VCARD', 'VERSION:4.0', ...lines, 'END:VCARD', ''].join('\r\n');

// ── End to end ─────────────────────────────────────────────────────────────

describe('End to end', () => {
  const TEXT = 'BEGIN:VCARD\r\nVERSION:4.0\r\nFN:J. Doe\r\nN:Doe;J.;;;\r\nEND:VCARD\r\n';

  test('a minimal card parses to FN and a structured name', () => {
    const cards = parse(TEXT);
    assert.equal(cards.length, 1);
    const [vc] = cards;
    assert.ok(vc);
    assert.equal(vc.displayName, 'J. Doe');
    assert.deepEqual(vc.name, {
      familyNames: ['Doe'],
      givenNames: ['J.'],
      additionalNames: [],
      honorificPrefixes: [],
      honorificSuffixes: [],
    });
  });

  test('and re-serializes to identical text', () => {
    assert.equal(parseOne(TEXT).toText(), TEXT);
  });

  test('a full card re-serializes to identical text', () => {
    assert.equal(parseOne(SAMPLE_V4).toText(), SAMPLE_V4 + '\r\n');
  });
});

// ── Parsing ────────────────────────────────────────────────────────────────

describe('Parsing', () => {
  const vc = parseOne(SAMPLE_V4);

  test('parse() returns an array of Vcards', () => {
    const cards = parse(SAMPLE_V4);
    assert.equal(cards.length, 1);
    assert.ok(cards[0] instanceof Vcard);
  });

  test('properties keep their input order', () => {
    assert.deepEqual(
      vc.properties.slice(0, 4).map(p => p.name),
      ['VERSION', 'FN', 'N', 'EMAIL'],
    );
  });

  test('FN is parsed correctly', () => {
    assert.deepEqual(vc.formattedNames, ['Alice Example']);
    assert.equal(vc.version, '4.0');
  });

  test('EMAIL properties are parsed with types', () => {
    const emails = vc.get('email');
    assert.equal(emails.length, 2);
    assert.deepEqual(emails[0]?.type, ['work']);
    assert.deepEqual(emails[1]?.type, ['home']);
    assert.equal(emails[1]?.pref, 1);
  });

  test('primaryEmail returns most preferred email', () => {
    assert.equal(vc.primaryEmail, 'alice@personal.net');
  });

  test('TEL with VALUE=uri is a URI', () => {
    assert.deepEqual(vc.first('TEL')?.value, { kind: 'uri', value: 'tel:+1-555-123-4567' });
    assert.equal(vc.primaryTel, 'tel:+1-555-123-4567');
    assert.equal(vc.first('TEL')?.valueType, 'uri');
  });

  test('ADR is parsed as structured address', () => {
    assert.deepEqual(vc.first('ADR')?.value, {
      kind: 'address',
      value: {
        postOfficeBox: [],
        extendedAddress: [],
        streetAddress: ['123 Main St'],
        locality: ['Springfield'],
        region: ['IL'],
        postalCode: ['62701'],
        countryName: ['USA'],
      },
    });
  });

  test('ORG is parsed with units', () => {
    assert.deepEqual(vc.first('ORG')?.value, { kind: 'organization', value: { name: 'Example Corp', units: ['Engineering'] } });
    assert.equal(vc.first('ORG')?.text, 'Example Corp, Engineering');
  });

  test('BDAY is parsed as a date', () => {
    assert.deepEqual(vc.birthday, { date: { year: 1990, month: 3, day: 15 } });
  });

  test('GENDER is parsed', () => {
    assert.deepEqual(vc.first('GENDER')?.value, { kind: 'gender', value: { sex: 'F' } });
  });

  test('NICKNAME and CATEGORIES are lists', () => {
    assert.deepEqual(vc.first('NICKNAME')?.value, { kind: 'text-list', values: ['Ali', 'Ally'] });
    assert.equal(vc.first('CATEGORIES')?.text, 'friend, colleague');
  });

  test('NOTE with escaped newline is unescaped', () => {
    assert.equal(vc.first('NOTE')?.text, 'This is a test\nWith a newline');
  });

  test('UID is a URI', () => {
    assert.deepEqual(vc.first('UID')?.value, { kind: 'uri', value: 'urn:uuid:f81d4fae-7dec-11d0-a765-00a0c91e6bf6' });
  });

  test('REV is parsed as a timestamp', () => {
    const rev = vc.first('REV')?.value;
    assert.equal(rev?.kind, 'timestamp');
    if (rev?.kind === 'timestamp') {
      const [at] = rev.values;
      assert.ok(at);
      assert.equal(toJsDate(at)?.toISOString(), '2024-01-01T12:00:00.000Z');
    }
  });

  test('a v3 vCard is rejected', () => {
    assert.throws(() => parse(SAMPLE_V3), { name: 'ValidationError', rule: 'supported-version' });
  });

  test('multiple vCards in one string', () => {
    const cards = parse(SAMPLE_V4 + '\r\n' + minimal('FN:Second'));
    assert.equal(cards.length, 2);
    assert.equal(cards[1]?.displayName, 'Second');
  });

  test('LF-only line endings are accepted', () => {
    assert.equal(parseOne('BEGIN:VCARD\nVERSION:4.0\nFN:Alice\nEND:VCARD\n').displayName, 'Alice');
  });

  test('folded lines are unfolded during parsing', () => {
    const vc2 = parseOne(minimal('FN:x', 'NOTE:This is a long\r\n  note'));
    assert.equal(vc2.first('NOTE')?.text, 'This is a long note');
  });

  test('empty input returns empty array', () => {
    assert.deepEqual(parse(''), []);
  });

  test('parseOne() throws on empty input', () => {
    assert.throws(() => parseOne(''), (err: unknown) => {
      assert.ok(err instanceof ParseError);
      assert.equal(err.code, 'UnexpectedEnd');
      assert.equal(err.message, 'No vCard found in input');
      return true;
    });
  });

  test('every failure is a VcardError', () => {
    for (const text of ['FN', minimal('NOTE:a\\q'), minimal('BDAY:x'), minimal('FN;CHARSET=latin1:x'), minimal()]) {
      assert.throws(() => parse(text), VcardError);
    }
  });

  test('a later invalid card fails the whole parse', () => {
    assert.throws(() => parse(minimal('FN:ok') + minimal('NOTE:no name')), {
      name: 'ValidationError',
      property: 'FN',
    });
  });
});

// ── Accessors ──────────────────────────────────────────────────────────────

describe('Accessors', () => {
  const vc = parseOne(minimal('FN;PREF=2:Bee', 'FN;PREF=1:Ay', 'BDAY;VALUE=text:circa 1800'));

  test('displayName follows PREF', () => {
    assert.deepEqual(vc.formattedNames, ['Bee', 'Ay']);
    assert.equal(vc.displayName, 'Ay');
  });

  test('birthday may be text', () => {
    assert.equal(vc.birthday, 'circa 1800');
  });

  test('absent properties are undefined', () => {
    assert.equal(vc.name, undefined);
    assert.equal(vc.primaryEmail, undefined);
    assert.equal(vc.first('ORG'), undefined);
    assert.deepEqual(vc.get('ORG'), []);
  });

  test('cards and their properties are frozen', () => {
    assert.ok(Object.isFrozen(vc));
    assert.ok(Object.isFrozen(vc.properties));
    assert.ok(Object.isFrozen(vc.properties[0]));
  });
});

// ── Generation ─────────────────────────────────────────────────────────────

describe('Generation', () => {
  const vc = parseOne(minimal('FN:Test User'));

  test('generated output is framed by BEGIN and END', () => {
    const out = vc.toString();
    assert.ok(out.startsWith('BEGIN:VCARD\r\nVERSION:4.0\r\n'));
    assert.ok(out.endsWith('END:VCARD\r\n'));
  });

  test('generated output uses CRLF line endings', () => {
    const lines = vc.toText().split('\n');
    for (let i = 0; i < lines.length - 1; i++) {
      assert.ok(lines[i]?.endsWith('\r'), `Line ${i} missing \\r`);
    }
  });

  test('round-trip preserves parameters and values', () => {
    const original = parseOne(SAMPLE_V4);
    const again = parseOne(original.toText());
    assert.deepEqual(
      again.properties.map(p => [p.name, [...p.params], p.value]),
      original.properties.map(p => [p.name, [...p.params], p.value]),
    );
  });

  test('a quoted parameter value is quoted again', () => {
    const line = 'TEL;VALUE=uri;TYPE="work,voice";PREF=1:tel:+1-418-656-9254;ext=102';
    assert.ok(parseOne(minimal('FN:x', line)).toText().includes(line + '\r\n'));
  });

  test('CHARSET is never written', () => {
    const out = parseOne(minimal('FN;CHARSET=UTF-8:x')).toText();
    assert.ok(out.includes('\r\nFN:x\r\n'));
  });

  test('stringify() works with single Vcard', () => {
    assert.equal(stringify(vc), vc.toText());
  });

  test('stringify() works with array of Vcards', () => {
    const other = parseOne(minimal('FN:Other'));
    assert.equal(stringify([vc, other]), vc.toText() + other.toText());
  });
});

// ── Binary data ────────────────────────────────────────────────────────────

describe('Binary data', () => {
  const PHOTO = 'PHOTO;MEDIATYPE=image/png;ENCODING=b:iVBORw0KGgo=';

  test('decodes to the original bytes', () => {
    const vc = parseOne(minimal('FN:x', PHOTO));
    const [photo] = vc.binaries;
    assert.equal(photo?.value.kind, 'binary');
    if (photo?.value.kind === 'binary') {
      assert.deepEqual([...photo.value.data], [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
    }
  });

  test('re-encodes to identical Base64 text', () => {
    assert.ok(parseOne(minimal('FN:x', PHOTO)).toText().includes(PHOTO + '\r\n'));
  });

  test('release() zeroes the decoded data', () => {
    const vc = parseOne(minimal('FN:x', PHOTO));
    vc.release();
    const value = vc.binaries[0]?.value;
    assert.ok(value?.kind === 'binary' && value.data.every(b => b === 0));
  });

  test('release() leaves the data alone when zeroize is off', () => {
    const vc = parseOne(minimal('FN:x', PHOTO), { zeroize: false });
    vc.release();
    const value = vc.binaries[0]?.value;
    assert.ok(value?.kind === 'binary' && value.data[0] === 0x89);
  });

  test('release() never touches bytes the caller still holds', () => {
    const bytes = Uint8Array.of(1, 2, 3);
    const vc = new Vcard([
      ...parseOne(minimal('FN:x')).properties,
      ...new VcardBuilder().formattedName('y').photo(bytes).build().binaries,
    ]);
    vc.release();
    assert.deepEqual([...bytes], [1, 2, 3]);
    const value = vc.binaries[0]?.value;
    assert.ok(value?.kind === 'binary' && value.data.every(b => b === 0));
  });
});

// ── Parse options ──────────────────────────────────────────────────────────

describe('Parse options', () => {
  test('onWarning sees every warning; the card keeps them', () => {
    const seen: ParseWarning[] = [];
    const vc = parseOne(minimal('FN:x', 'FOO:bar'), { onWarning: w => seen.push(w) });
    assert.deepEqual(seen, [{ line: 4, message: 'Unregistered property FOO stored as text' }]);
    assert.deepEqual(vc.warnings, seen);
  });

  test('mediaTypes checks MEDIATYPE', () => {
    const text = minimal('FN:x', 'PHOTO;MEDIATYPE=image:http://example.com/a.png');
    assert.equal(parseOne(text).first('PHOTO')?.mediatype, 'image');
    assert.throws(() => parseOne(text, { mediaTypes: true }), {
      name: 'ValueError',
      message: 'Invalid MEDIATYPE "image" on PHOTO: missing "/" between type and subtype',
    });
  });

  test('languageTags checks LANGUAGE and LANG', () => {
    assert.throws(() => parseOne(minimal('FN;LANGUAGE=en-:x'), { languageTags: true }), {
      message: 'Invalid LANGUAGE "en-" on FN: empty subtag',
    });
    const lang = minimal('FN:x', 'LANG:en-a');
    assert.equal(parseOne(lang).first('LANG')?.text, 'en-a');
    assert.throws(
      () => parseOne(lang, { languageTags: true }),
      (err: unknown) =>
        err instanceof ValueError && err.message === 'Invalid language tag "en-a": extension "a" has no subtags',
    );
  });
});

// ── Validation ─────────────────────────────────────────────────────────────

describe('Validation', () => {
  test('validate() passes for a complete vCard', () => {
    assert.deepEqual(parseOne(SAMPLE_V4).validate(), { valid: true, errors: [] });
  });

  test('a parsed card without FN is refused', () => {
    assert.throws(() => parse(minimal('NOTE:x')), (err: unknown) => {
      assert.ok(err instanceof ValidationError);
      assert.equal(err.message, 'FN must occur at least once (found 0)');
      return true;
    });
  });

  test('toText() can skip validation', () => {
    const vc = new Vcard([]);
    assert.throws(() => vc.toText(), ValidationError);
    assert.equal(vc.toText({ validate: false }), 'BEGIN:VCARD\r\nVERSION:4.0\r\nEND:VCARD\r\n');
  });
});
