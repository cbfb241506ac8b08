/**
 * Rule Engine Tests
 *
 * @see src/services/rules/engine.ts
 */

import { describe, it, expect } from 'vitest';
import { evaluate } from '../../../src/services/rules/engine.js';
import { compilePattern } from '../../../src/utils/validation.js';
import { FORMAT_PRESETS, type FormatRule, type RangeRule } from '../../../src/models/validation-rule.js';
import { makeRow } from '../helpers.js';

function formatRule(field: string, pattern: string, message?: string): FormatRule {
  return {
    kind: 'FORMAT',
    field,
    pattern,
    regex: compilePattern(pattern),
    ...(message !== undefined ? { message } : {}),
  };
}

describe('evaluate', () => {
  describe('REQUIRED', () => {
    const rule = { kind: 'REQUIRED', field: 'code' } as const;

    it('passes a present value', () => {
      expect(evaluate(rule, makeRow(1, { code: 'C1' }))).toBeNull();
    });

    it('fails a missing key', () => {
      expect(evaluate(rule, makeRow(1, {}))).toEqual({
        kind: 'REQUIRED',
        message: 'code is required',
        field_name: 'code',
        field_value: null,
      });
    });

    it('fails an explicit null', () => {
      expect(evaluate(rule, makeRow(1, { code: null }))?.kind).toBe('REQUIRED');
    });

    it('fails a whitespace-only value and keeps the raw value', () => {
      expect(evaluate(rule, makeRow(1, { code: '   ' }))).toEqual({
        kind: 'REQUIRED',
        message: 'code is required',
        field_name: 'code',
        field_value: '   ',
      });
    });

    it('uses the configured message', () => {
      const custom = { ...rule, message: 'a customer code is mandatory' };
      expect(evaluate(custom, makeRow(1, { code: '' }))?.message).toBe('a customer code is mandatory');
    });
  });

  describe('FORMAT', () => {
    const email = formatRule('email', FORMAT_PRESETS.email);

    it('passes a matching value', () => {
      expect(evaluate(email, makeRow(1, { email: 'alice@example.com' }))).toBeNull();
    });

    it('fails a non-matching value', () => {
      expect(evaluate(email, makeRow(2, { email: 'not-an-email' }))).toEqual({
        kind: 'FORMAT',
        message: 'email does not match expected pattern',
        field_name: 'email',
        field_value: 'not-an-email',
      });
    });

    it('treats a blank value as absent', () => {
      expect(evaluate(email, makeRow(1, { email: '' }))).toBeNull();
      expect(evaluate(email, makeRow(1, {}))).toBeNull();
    });

    it('matches the whole value, not a substring', () => {
      const status = formatRule('status', 'pending|shipped');
      expect(evaluate(status, makeRow(1, { status: 'shipped' }))).toBeNull();
      expect(evaluate(status, makeRow(1, { status: 'unshipped' }))?.kind).toBe('FORMAT');
      expect(evaluate(status, makeRow(1, { status: 'pending!' }))?.kind).toBe('FORMAT');
    });

    it('checks iso dates against month and day bounds', () => {
      const date = formatRule('d', FORMAT_PRESETS.iso_date);
      expect(evaluate(date, makeRow(1, { d: '2024-02-29' }))).toBeNull();
      expect(evaluate(date, makeRow(1, { d: '2024-13-01' }))?.kind).toBe('FORMAT');
      expect(evaluate(date, makeRow(1, { d: '2024-1-01' }))?.kind).toBe('FORMAT');
    });

    it('uses the configured message', () => {
      const status = formatRule('status', 'a|b', 'status must be a or b');
      expect(evaluate(status, makeRow(1, { status: 'c' }))?.message).toBe('status must be a or b');
    });
  });

  describe('RANGE', () => {
    const rule: RangeRule = { kind: 'RANGE', field: 'amount', min: 0, max: 100 };

    it('includes both bounds', () => {
      expect(evaluate(rule, makeRow(1, { amount: '0' }))).toBeNull();
      expect(evaluate(rule, makeRow(1, { amount: '100' }))).toBeNull();
      expect(evaluate(rule, makeRow(1, { amount: '100.0' }))).toBeNull();
    });

    it('fails below the minimum', () => {
      expect(evaluate(rule, makeRow(1, { amount: '-0.01' }))).toEqual({
        kind: 'RANGE',
        message: 'amount must be at least 0',
        field_name: 'amount',
        field_value: '-0.01',
      });
    });

    it('fails above the maximum', () => {
      expect(evaluate(rule, makeRow(1, { amount: '100.5' }))?.message).toBe('amount must be at most 100');
    });

    it('checks only the configured bound', () => {
      const minOnly: RangeRule = { kind: 'RANGE', field: 'amount', min: 10 };
      expect(evaluate(minOnly, makeRow(1, { amount: '1e9' }))).toBeNull();
      expect(evaluate(minOnly, makeRow(1, { amount: '9' }))?.kind).toBe('RANGE');
    });

    it('accepts surrounding whitespace', () => {
      expect(evaluate(rule, makeRow(1, { amount: ' 42 ' }))).toBeNull();
    });

    it('reports a non-numeric value as UNKNOWN', () => {
      expect(evaluate(rule, makeRow(3, { amount: 'abc' }))).toEqual({
        kind: 'UNKNOWN',
        message: 'amount must be numeric for range validation',
        field_name: 'amount',
        field_value: 'abc',
      });
    });

    it('treats a blank value as absent', () => {
      expect(evaluate(rule, makeRow(1, { amount: ' ' }))).toBeNull();
    });
  });

  describe('LENGTH', () => {
    const rule = { kind: 'LENGTH', field: 'name', max: 5 } as const;

    it('passes at the limit', () => {
      expect(evaluate(rule, makeRow(1, { name: 'abcde' }))).toBeNull();
    });

    it('fails past the limit', () => {
      expect(evaluate(rule, makeRow(1, { name: 'abcdef' }))).toEqual({
        kind: 'LENGTH',
        message: 'name must be at most 5 characters',
        field_name: 'name',
        field_value: 'abcdef',
      });
    });

    it('counts code points', () => {
      // Five emoji, each two UTF-16 units
      expect(evaluate(rule, makeRow(1, { name: '😀😀😀😀😀' }))).toBeNull();
    });
  });

  describe('DUPLICATE', () => {
    it('always passes', () => {
      expect(evaluate({ kind: 'DUPLICATE', field: 'code' }, makeRow(1, { code: 'C1' }))).toBeNull();
    });
  });

  describe('unexpected failures', () => {
    it('reports a throwing check as UNKNOWN', () => {
      const rule: FormatRule = {
        kind: 'FORMAT',
        field: 'code',
        pattern: 'x',
        regex: Object.assign(compilePattern('x'), {
          test: (): boolean => {
            throw new Error('regex engine failure');
          },
        }),
      };
      expect(evaluate(rule, makeRow(1, { code: 'y' }))).toEqual({
        kind: 'UNKNOWN',
        message: 'FORMAT check on code failed: regex engine failure',
        field_name: 'code',
        field_value: 'y',
      });
    });
  });

  it('is deterministic', () => {
    const rule: RangeRule = { kind: 'RANGE', field: 'n', max: 3 };
    const row = makeRow(1, { n: '4' });
    expect(evaluate(rule, row)).toEqual(evaluate(rule, row));
  });
});
