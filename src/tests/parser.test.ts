/**
 * Tests for content line and vCard block parsing
 */

import { test, describe } from 'node:test';
import assert from 'node:assert/strict';

import { CharsetError, ParseError, ValueError, parseCards, parseContentLine, type ParseWarning } from '../index.js';

const card = (...lines: string[]): string => ['BEGIN:VCARD', 'VERSION:4.0', ...lines, 'END:VCARD'].join('\r\n');

// ── Content lines ──────────────────────────────────────────────────────────

describe('Content lines', () => {
  test('group, name, parameters and value are separated', () => {
    assert.deepEqual(parseContentLine('item1.EMAIL;TYPE=work;PREF=1:alice@example.com'), {
      group: 'item1',
      name: 'EMAIL',
      parameters: new Map([
        ['TYPE', ['work']],
        ['PREF', ['1']],
      ]),
      value: 'alice@example.com',
      line: 1,
    });
  });

  test('the name keeps its original case; parameter names are upper-cased', () => {
    const raw = parseContentLine('email;type=home:bob@example.com');
    assert.equal(raw.name, 'email');
    assert.deepEqual([...raw.parameters.keys()], ['TYPE']);
  });

  test('the value stays escaped', () => {
    assert.equal(parseContentLine('NOTE:a\\,b\\nc').value, 'a\\,b\\nc');
  });

  test('a comma list gives several parameter values', () => {
    assert.deepEqual(parseContentLine('EMAIL;TYPE=work,home:x').parameters.get('TYPE'), ['work', 'home']);
  });

  test('a repeated parameter is merged', () => {
    assert.deepEqual(parseContentLine('EMAIL;TYPE=work;TYPE=home:x').parameters.get('TYPE'), ['work', 'home']);
  });

  test('a quoted value is one value even when it contains commas', () => {
    assert.deepEqual(parseContentLine('TEL;TYPE="work,voice":x').parameters.get('TYPE'), ['work,voice']);
  });

  test('caret sequences in parameter values are decoded', () => {
    const raw = parseContentLine(`ADR;LABEL="Main St^nFloor ^'2^' ^^":;;;;;;`);
    assert.deepEqual(raw.parameters.get('LABEL'), ['Main St\nFloor "2" ^']);
  });

  test('a bare parameter is read as TYPE with a warning', () => {
    const warnings: ParseWarning[] = [];
    const raw = parseContentLine('TEL;CELL:+1-555-0100', { onWarning: w => warnings.push(w) });
    assert.deepEqual(raw.parameters.get('TYPE'), ['CELL']);
    assert.deepEqual(warnings, [{ line: 1, message: 'Bare parameter "CELL" on TEL read as TYPE=CELL' }]);
  });

  test('CHARSET=UTF-8 is discarded with a warning', () => {
    const warnings: ParseWarning[] = [];
    const raw = parseContentLine('FN;CHARSET=utf-8:Jane', { onWarning: w => warnings.push(w) });
    assert.equal(raw.parameters.has('CHARSET'), false);
    assert.deepEqual(warnings, [{ line: 1, message: 'CHARSET=UTF-8 on FN discarded' }]);
  });

  test('any other CHARSET is a CharsetError', () => {
    assert.throws(
      () => parseContentLine('FN;CHARSET=ISO-8859-1:Jane'),
      (err: unknown) => {
        assert.ok(err instanceof CharsetError);
        assert.equal(err.charset, 'ISO-8859-1');
        assert.equal(err.property, 'FN');
        assert.equal(err.message, 'Unsupported CHARSET "ISO-8859-1" on FN; only UTF-8 is accepted');
        return true;
      },
    );
  });
});

// ── Grammar errors ─────────────────────────────────────────────────────────

describe('Grammar errors', () => {
  const code = (line: string, expected: ParseError['code']): void => {
    assert.throws(
      () => parseContentLine(line),
      (err: unknown) => err instanceof ParseError && err.code === expected,
    );
  };

  test('a line without a colon is MissingColon', () => {
    code('FN', 'MissingColon');
  });

  test('a line that starts with ":" is EmptyName', () => {
    code(':Jane', 'EmptyName');
  });

  test('a line that starts with ";" is EmptyName', () => {
    code(';TYPE=work:x', 'EmptyName');
  });

  test('a group without a name is EmptyName', () => {
    code('item1.:x', 'EmptyName');
  });

  test('a quoted string where the name belongs is UnexpectedToken', () => {
    code('"FN":x', 'UnexpectedToken');
  });

  test('text after the name is UnexpectedToken', () => {
    assert.throws(() => parseContentLine('FN x:y'), {
      name: 'ParseError',
      code: 'UnexpectedToken',
      message: 'Unexpected " " after property name FN',
    });
  });

  test('a parameter without a name is MalformedParameter', () => {
    code('EMAIL;=x:y', 'MalformedParameter');
  });

  test('text glued to a parameter value is MalformedParameter', () => {
    assert.throws(() => parseContentLine('EMAIL;TYPE=a"b":x'), {
      name: 'ParseError',
      code: 'MalformedParameter',
      message: 'Unexpected "b" in TYPE value on EMAIL',
    });
  });

  test('PREF must lie between 1 and 100', () => {
    code('EMAIL;PREF=0:x', 'MalformedParameter');
    code('EMAIL;PREF=101:x', 'MalformedParameter');
    assert.deepEqual(parseContentLine('EMAIL;PREF=100:x').parameters.get('PREF'), ['100']);
  });

  test('PID must be digits with an optional source id', () => {
    code('EMAIL;PID=1.a:x', 'MalformedParameter');
    assert.deepEqual(parseContentLine('EMAIL;PID=1.1,2:x').parameters.get('PID'), ['1.1', '2']);
  });

  test('VALUE must name a single value type', () => {
    assert.throws(() => parseContentLine('BDAY;VALUE=bogus:x'), {
      code: 'MalformedParameter',
      message: 'Invalid VALUE "bogus" on BDAY',
    });
    code('BDAY;VALUE=text,uri:x', 'MalformedParameter');
  });

  test('errors carry the line and offset', () => {
    assert.throws(() => parseContentLine('FN x:y'), { line: 1, offset: 2 });
  });

  test('enabled checks reject parameter values', () => {
    const checks = { mediaType: (v: string) => (v.includes('/') ? undefined : 'no subtype') };
    assert.throws(() => parseContentLine('PHOTO;MEDIATYPE=image:http://example.com/a.png', { checks }), {
      name: 'ValueError',
      message: 'Invalid MEDIATYPE "image" on PHOTO: no subtype',
    });
    assert.deepEqual(
      parseContentLine('PHOTO;MEDIATYPE=image/png:http://example.com/a.png', { checks }).parameters.get('MEDIATYPE'),
      ['image/png'],
    );
  });
});

// ── Blocks ─────────────────────────────────────────────────────────────────

describe('vCard blocks', () => {
  test('each block becomes a card of typed properties', () => {
    const [parsed] = [...parseCards(card('FN:J. Doe'))];
    assert.ok(parsed);
    assert.equal(parsed.line, 1);
    assert.deepEqual(
      parsed.properties.map(p => p.name),
      ['VERSION', 'FN'],
    );
    assert.deepEqual(parsed.properties[1]?.value, { kind: 'text', value: 'J. Doe' });
  });

  test('BEGIN and END are matched case-insensitively', () => {
    assert.equal([...parseCards('begin:vcard\r\nVERSION:4.0\r\nFN:x\r\nend:VCard\r\n')].length, 1);
  });

  test('cards are yielded before later input is read', () => {
    const cards = parseCards(card('FN:First') + '\r\n' + card('FN:Second', 'NOTE:bad\\q'));
    const first = cards.next();
    assert.equal(first.done, false);
    if (!first.done) assert.equal(first.value.properties[1]?.text, 'First');
    assert.throws(() => cards.next(), { name: 'LexError' });
  });

  test('warnings are collected per card', () => {
    const [parsed] = [...parseCards(card('FN:x', 'FOO:bar', 'X-FOO:baz'))];
    assert.deepEqual(parsed?.warnings, [{ line: 4, message: 'Unregistered property FOO stored as text' }]);
  });

  test('content outside a block is UnexpectedToken', () => {
    assert.throws(() => [...parseCards('FN:x')], {
      code: 'UnexpectedToken',
      message: 'FN outside BEGIN:VCARD … END:VCARD',
    });
  });

  test('a nested BEGIN is UnexpectedToken', () => {
    assert.throws(() => [...parseCards('BEGIN:VCARD\r\nBEGIN:VCARD\r\n')], {
      code: 'UnexpectedToken',
      message: 'Nested BEGIN:VCARD',
      line: 2,
    });
  });

  test('another component is UnexpectedToken', () => {
    assert.throws(() => [...parseCards('BEGIN:VCALENDAR\r\nEND:VCALENDAR\r\n')], {
      code: 'UnexpectedToken',
      message: 'Unsupported component BEGIN:VCALENDAR',
    });
  });

  test('a missing END is UnexpectedEnd', () => {
    assert.throws(() => [...parseCards('BEGIN:VCARD\r\nVERSION:4.0\r\nFN:x\r\n')], {
      code: 'UnexpectedEnd',
      message: 'vCard opened on line 1 has no END:VCARD',
    });
  });

  test('a value error is reported with its line', () => {
    assert.throws(
      () => [...parseCards(card('FN:x', 'BDAY:notadate'))],
      (err: unknown) => {
        assert.ok(err instanceof ValueError);
        assert.equal(err.property, 'BDAY');
        assert.equal(err.line, 4);
        assert.equal(err.message, 'Invalid date-and-or-time value "notadate"');
        return true;
      },
    );
  });

  test('empty input yields no cards', () => {
    assert.deepEqual([...parseCards('')], []);
    assert.deepEqual([...parseCards('\r\n\r\n')], []);
  });
});
