/**
 * Row conversion functions for DatabaseService
 *
 * Converts database row objects to domain model interfaces.
 */

import {
  SOURCE_FILE_STATUSES,
  SUPPORTED_FILE_TYPES,
  type SourceFile,
} from '../../../models/source-file.js';
import { VALIDATION_ERROR_KINDS } from '../../../models/validation-rule.js';
import type { ValidationErrorRecord } from '../../../models/validation-error.js';
import type { LoadResult, LoadResultStatus } from '../../../models/load-result.js';
import type { LoadResultRow, SourceFileRow, ValidationErrorRow } from './types.js';

const VALID_LOAD_RESULT_STATUSES: readonly LoadResultStatus[] = ['completed', 'failed'];

/**
 * Check a stored string against a closed set of values at runtime.
 * Throws on a value outside the set instead of passing corrupt data on.
 */
function validateEnum<T extends string>(
  value: string,
  validValues: readonly T[],
  fieldName: string,
  id: string
): T {
  const match = validValues.find((v) => v === value);
  if (match === undefined) {
    throw new Error(
      `Invalid ${fieldName} "${value}" in record ${id}. Valid values: ${validValues.join(', ')}`
    );
  }
  return match;
}

export function rowToSourceFile(row: SourceFileRow): SourceFile {
  return {
    id: row.id,
    file_path: row.file_path,
    file_name: row.file_name,
    file_type: validateEnum(row.file_type, SUPPORTED_FILE_TYPES, 'file_type', row.id),
    file_size: row.file_size,
    file_hash: row.file_hash,
    status: validateEnum(row.status, SOURCE_FILE_STATUSES, 'status', row.id),
    target_table: row.target_table,
    row_count: row.row_count,
    rows_loaded: row.rows_loaded,
    rows_rejected: row.rows_rejected,
    error_message: row.error_message,
    uploaded_at: row.uploaded_at,
    processing_started_at: row.processing_started_at,
    processed_at: row.processed_at,
  };
}

export function rowToValidationError(row: ValidationErrorRow): ValidationErrorRecord {
  return {
    id: row.id,
    source_file_id: row.source_file_id,
    run_id: row.run_id,
    row_number: row.row_number,
    kind: validateEnum(row.kind, VALIDATION_ERROR_KINDS, 'kind', row.id),
    message: row.message,
    field_name: row.field_name,
    field_value: row.field_value,
    created_at: row.created_at,
  };
}

export function rowToLoadResult(row: LoadResultRow): LoadResult {
  return {
    run_id: row.run_id,
    source_file_id: row.source_file_id,
    target_table: row.target_table,
    rows_attempted: row.rows_attempted,
    rows_loaded: row.rows_loaded,
    rows_rejected: row.rows_rejected,
    status: validateEnum(row.status, VALID_LOAD_RESULT_STATUSES, 'status', row.run_id),
    failure_reason: row.failure_reason,
    batches_committed: row.batches_committed,
    started_at: row.started_at,
    completed_at: row.completed_at,
    duration_ms: row.duration_ms,
  };
}
