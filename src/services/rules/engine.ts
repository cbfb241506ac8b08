/**
 * Rule Engine
 *
 * Evaluates one validation rule against one row. Pure: the outcome depends
 * only on the rule and the row. DUPLICATE always passes here because it is
 * decided by the target table's unique index at load time.
 *
 * @module services/rules/engine
 */

import { getField, isBlank, type Row } from '../../models/row.js';
import type {
  FormatRule,
  LengthRule,
  RangeRule,
  RequiredRule,
  ValidationRule,
} from '../../models/validation-rule.js';
import type { RuleFailure } from '../../models/validation-error.js';

const NUMERIC_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

function fail(
  rule: ValidationRule,
  defaultMessage: string,
  value: string | null
): RuleFailure {
  return {
    kind: rule.kind,
    message: rule.message ?? defaultMessage,
    field_name: rule.field,
    field_value: value,
  };
}

function evaluateRequired(rule: RequiredRule, row: Row): RuleFailure | null {
  const value = getField(row, rule.field);
  return isBlank(value) ? fail(rule, `${rule.field} is required`, value) : null;
}

function evaluateFormat(rule: FormatRule, row: Row): RuleFailure | null {
  const value = getField(row, rule.field);
  if (value === null || isBlank(value)) return null;
  return rule.regex.test(value)
    ? null
    : fail(rule, `${rule.field} does not match expected pattern`, value);
}

function evaluateRange(rule: RangeRule, row: Row): RuleFailure | null {
  const value = getField(row, rule.field);
  if (value === null || isBlank(value)) return null;

  const trimmed = value.trim();
  if (!NUMERIC_PATTERN.test(trimmed)) {
    return {
      kind: 'UNKNOWN',
      message: `${rule.field} must be numeric for range validation`,
      field_name: rule.field,
      field_value: value,
    };
  }

  const n = Number(trimmed);
  if (rule.min !== undefined && n < rule.min) {
    return fail(rule, `${rule.field} must be at least ${String(rule.min)}`, value);
  }
  if (rule.max !== undefined && n > rule.max) {
    return fail(rule, `${rule.field} must be at most ${String(rule.max)}`, value);
  }
  return null;
}

function evaluateLength(rule: LengthRule, row: Row): RuleFailure | null {
  const value = getField(row, rule.field);
  if (value === null || isBlank(value)) return null;
  // Code points, so a character outside the BMP counts once
  return [...value].length > rule.max
    ? fail(rule, `${rule.field} must be at most ${String(rule.max)} characters`, value)
    : null;
}

/**
 * Evaluate a rule against a row.
 *
 * @returns null when the row passes, otherwise the failure. Anything thrown
 * during evaluation is reported as an UNKNOWN failure for the rule's field.
 */
export function evaluate(rule: ValidationRule, row: Row): RuleFailure | null {
  try {
    switch (rule.kind) {
      case 'REQUIRED':
        return evaluateRequired(rule, row);
      case 'FORMAT':
        return evaluateFormat(rule, row);
      case 'RANGE':
        return evaluateRange(rule, row);
      case 'LENGTH':
        return evaluateLength(rule, row);
      case 'DUPLICATE':
        return null;
    }
  } catch (error) {
    return {
      kind: 'UNKNOWN',
      message: `${rule.kind} check on ${rule.field} failed: ${error instanceof Error ? error.message : String(error)}`,
      field_name: rule.field,
      field_value: getField(row, rule.field),
    };
  }
}
