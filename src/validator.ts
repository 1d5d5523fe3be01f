/**
 * Occurrence rules for one complete vCard (RFC 6350 section 6).
 *
 * Property instances that share an ALTID value are alternative
 * representations of one property and count as a single occurrence
 * (section 5.4). Unregistered names carry no occurrence rule.
 */

import type { Cardinality, ValidationIssue, ValidationResult } from './types.js';
import { ValidationError } from './errors.js';
import { registeredProperties } from './definitions.js';
import type { Property } from './property.js';

export const SUPPORTED_VERSION = '4.0';

/** Occurrences of a property, with ALTID groups counted once */
export function countOccurrences(properties: readonly Property[], key: string): number {
  const altids = new Set<string>();
  let count = 0;
  for (const prop of properties) {
    if (prop.key !== key) continue;
    const altid = prop.altid;
    if (altid === undefined) count++;
    else altids.add(altid);
  }
  return count + altids.size;
}

const RULE_TEXT: Record<Cardinality, string> = {
  'exactly-one': 'must occur exactly once',
  'zero-or-one': 'must not occur more than once',
  'one-or-more': 'must occur at least once',
  'zero-or-more': '',
};

function breaks(cardinality: Cardinality, count: number): boolean {
  switch (cardinality) {
    case 'exactly-one':
      return count !== 1;
    case 'zero-or-one':
      return count > 1;
    case 'one-or-more':
      return count < 1;
    case 'zero-or-more':
      return false;
  }
}

/** Every rule the properties violate, VERSION first */
export function findViolations(properties: readonly Property[]): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const defs = registeredProperties().sort((a, b) => Number(b.name === 'VERSION') - Number(a.name === 'VERSION'));

  for (const prop of properties) {
    if (prop.key === 'VERSION' && prop.text !== SUPPORTED_VERSION) {
      issues.push({
        property: 'VERSION',
        rule: 'supported-version',
        message: `VERSION must be ${SUPPORTED_VERSION}, got "${prop.text}"`,
      });
    }
  }

  for (const def of defs) {
    const count = countOccurrences(properties, def.name);
    if (breaks(def.cardinality, count)) {
      issues.push({
        property: def.name,
        rule: def.cardinality,
        message: `${def.name} ${RULE_TEXT[def.cardinality]} (found ${count})`,
      });
    }
  }

  if (properties.some(p => p.key === 'MEMBER')) {
    const kind = properties.find(p => p.key === 'KIND');
    if (kind?.text.toLowerCase() !== 'group') {
      issues.push({
        property: 'MEMBER',
        rule: 'member-requires-group',
        message: 'MEMBER is only allowed when KIND is group',
      });
    }
  }

  return issues;
}

export function validate(properties: readonly Property[]): ValidationResult {
  const errors = findViolations(properties);
  return { valid: errors.length === 0, errors };
}

/** @throws ValidationError for the first violated rule */
export function assertValid(properties: readonly Property[]): void {
  const [issue] = findViolations(properties);
  if (issue) throw new ValidationError(issue.message, issue.property, issue.rule);
}
