/**
 * Validation error records - the error ledger.
 *
 * A RuleFailure is what the rule engine produces; the orchestrator stamps it
 * with the file id and row number to obtain a ValidationErrorRecord.
 */

import type { ValidationErrorKind } from './validation-rule.js';

export interface RuleFailure {
  kind: ValidationErrorKind;
  message: string;
  field_name: string | null;
  /** Raw value, kept for diagnosis */
  field_value: string | null;
}

export interface ValidationErrorRecord extends RuleFailure {
  /** UUID v4 identifier */
  id: string;
  source_file_id: string;
  /** Run that produced the error */
  run_id: string;
  row_number: number;
  /** ISO 8601 */
  created_at: string;
}

/**
 * Stamp a rule failure with its provenance
 */
export function toErrorRecord(
  failure: RuleFailure,
  id: string,
  sourceFileId: string,
  runId: string,
  rowNumber: number,
  createdAt: string
): ValidationErrorRecord {
  return {
    id,
    source_file_id: sourceFileId,
    run_id: runId,
    row_number: rowNumber,
    kind: failure.kind,
    message: failure.message,
    field_name: failure.field_name,
    field_value: failure.field_value,
    created_at: createdAt,
  };
}
