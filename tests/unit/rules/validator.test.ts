/**
 * Row Validator Tests
 *
 * @see src/services/rules/validator.ts
 */

import { describe, it, expect } from 'vitest';
import { validateRow } from '../../../src/services/rules/validator.js';
import { customersConfig, makeRow } from '../helpers.js';

describe('validateRow', () => {
  const { rules } = customersConfig();

  it('returns an empty list for a valid row', () => {
    const row = makeRow(1, {
      customer_code: 'C001',
      name: 'Alice',
      email: 'alice@example.com',
      credit_limit: '500',
    });
    expect(validateRow(row, rules)).toEqual([]);
  });

  it('runs every rule and reports failures in declaration order', () => {
    const row = makeRow(4, {
      customer_code: '',
      name: null,
      email: 'broken',
      credit_limit: '-1',
    });
    expect(validateRow(row, rules).map((f) => [f.kind, f.field_name])).toEqual([
      ['REQUIRED', 'customer_code'],
      ['REQUIRED', 'name'],
      ['FORMAT', 'email'],
      ['RANGE', 'credit_limit'],
    ]);
  });

  it('is deterministic', () => {
    const row = makeRow(2, { customer_code: 'C2', name: '', email: 'x@', credit_limit: 'lots' });
    const first = validateRow(row, rules);
    expect(validateRow(row, rules)).toEqual(first);
    expect(first.map((f) => f.kind)).toEqual(['REQUIRED', 'FORMAT', 'UNKNOWN']);
  });

  it('returns an empty list when there are no rules', () => {
    expect(validateRow(makeRow(1, {}), [])).toEqual([]);
  });
});
