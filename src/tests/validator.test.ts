/**
 * Tests for occurrence rules
 */

import { test, describe } from 'node:test';
import assert from 'node:assert/strict';

import {
  Property,
  ValidationError,
  assertValid,
  countOccurrences,
  findViolations,
  validate,
  type ParameterInit,
} from '../index.js';

const text = (name: string, value: string, params?: ParameterInit): Property =>
  new Property(name, { kind: 'text', value }, params);

const VERSION = text('VERSION', '4.0');
const FN = text('FN', 'Jane Doe');

describe('Occurrence rules', () => {
  test('VERSION and FN are enough', () => {
    assert.deepEqual(validate([VERSION, FN]), { valid: true, errors: [] });
  });

  test('FN must occur at least once', () => {
    assert.deepEqual(validate([VERSION]).errors, [
      { property: 'FN', rule: 'one-or-more', message: 'FN must occur at least once (found 0)' },
    ]);
  });

  test('VERSION must occur exactly once', () => {
    assert.deepEqual(findViolations([FN]), [
      { property: 'VERSION', rule: 'exactly-one', message: 'VERSION must occur exactly once (found 0)' },
    ]);
    assert.deepEqual(findViolations([VERSION, VERSION, FN]), [
      { property: 'VERSION', rule: 'exactly-one', message: 'VERSION must occur exactly once (found 2)' },
    ]);
  });

  test('only VERSION 4.0 is supported', () => {
    assert.deepEqual(findViolations([text('VERSION', '3.0'), FN]), [
      { property: 'VERSION', rule: 'supported-version', message: 'VERSION must be 4.0, got "3.0"' },
    ]);
  });

  test('zero-or-one properties may not repeat', () => {
    assert.deepEqual(findViolations([VERSION, FN, text('N', 'a'), text('N', 'b')]), [
      { property: 'N', rule: 'zero-or-one', message: 'N must not occur more than once (found 2)' },
    ]);
  });

  test('birthdays, anniversaries and revisions may repeat', () => {
    const bday = new Property('BDAY', { kind: 'date-and-or-time', values: [{ date: { month: 2, day: 3 } }] });
    const anniversary = new Property('ANNIVERSARY', { kind: 'text', value: 'spring' }, { VALUE: 'text' });
    const rev = new Property('REV', {
      kind: 'timestamp',
      values: [{ date: { year: 2024, month: 1, day: 2 }, time: { hour: 3, minute: 4, second: 5, zone: 'Z' } }],
    });
    assert.deepEqual(findViolations([VERSION, FN, bday, bday, anniversary, anniversary, rev, rev]), []);
  });

  test('instances sharing an ALTID count once', () => {
    const ja = text('N', '', { ALTID: '1', LANGUAGE: 'ja' });
    const en = text('N', '', { ALTID: '1', LANGUAGE: 'en' });
    assert.equal(countOccurrences([ja, en], 'N'), 1);
    assert.equal(validate([VERSION, FN, ja, en]).valid, true);
  });

  test('different ALTIDs count separately', () => {
    const a = text('KIND', 'individual', { ALTID: '1' });
    const b = text('KIND', 'individual', { ALTID: '2' });
    assert.equal(countOccurrences([a, b], 'KIND'), 2);
  });

  test('violations are listed VERSION first, then in registry order', () => {
    const uid = text('UID', 'a');
    assert.deepEqual(
      findViolations([uid, uid]).map(i => i.property),
      ['VERSION', 'FN', 'UID'],
    );
  });

  test('unregistered properties carry no rule', () => {
    const extra = text('X-FOO', 'bar');
    assert.equal(validate([VERSION, FN, extra, extra]).valid, true);
  });

  test('names are matched case-insensitively', () => {
    assert.equal(validate([text('version', '4.0'), text('fn', 'x')]).valid, true);
  });
});

describe('MEMBER', () => {
  const member = new Property('MEMBER', { kind: 'uri', value: 'urn:uuid:03a0e51f-d1aa-4385-8a53-e29025acd8af' });

  test('is allowed when KIND is group', () => {
    assert.equal(validate([VERSION, text('KIND', 'group'), FN, member]).valid, true);
  });

  test('is rejected for any other KIND', () => {
    assert.deepEqual(findViolations([VERSION, text('KIND', 'individual'), FN, member]), [
      { property: 'MEMBER', rule: 'member-requires-group', message: 'MEMBER is only allowed when KIND is group' },
    ]);
    assert.equal(validate([VERSION, FN, member]).valid, false);
  });
});

describe('assertValid', () => {
  test('throws the first violation', () => {
    assert.throws(
      () => assertValid([VERSION]),
      (err: unknown) => {
        assert.ok(err instanceof ValidationError);
        assert.equal(err.property, 'FN');
        assert.equal(err.rule, 'one-or-more');
        assert.equal(err.message, 'FN must occur at least once (found 0)');
        return true;
      },
    );
  });

  test('returns quietly for a valid card', () => {
    assert.doesNotThrow(() => assertValid([VERSION, FN]));
  });
});
