/**
 * Row Validator
 *
 * Applies a table's full ordered rule set to one row. Every rule runs; a
 * failure does not stop the rules after it.
 *
 * @module services/rules/validator
 */

import type { Row } from '../../models/row.js';
import type { ValidationRule } from '../../models/validation-rule.js';
import type { RuleFailure } from '../../models/validation-error.js';
import { evaluate } from './engine.js';

/**
 * Validate a row.
 *
 * @returns failures in rule declaration order; empty for a valid row
 */
export function validateRow(row: Row, rules: readonly ValidationRule[]): RuleFailure[] {
  const failures: RuleFailure[] = [];
  for (const rule of rules) {
    const failure = evaluate(rule, row);
    if (failure !== null) {
      failures.push(failure);
    }
  }
  return failures;
}
