/**
 * Type definitions for DatabaseService
 *
 * Contains all interfaces, enums, and row types used by the database service.
 */

import type { SourceFileStatus } from '../../../models/source-file.js';
import type { ValidationErrorKind } from '../../../models/validation-rule.js';

/**
 * Database statistics interface
 */
export interface DatabaseStats {
  name: string;
  total_source_files: number;
  source_files_by_status: Record<SourceFileStatus, number>;
  total_rows_loaded: number;
  total_rows_rejected: number;
  total_validation_errors: number;
  errors_by_kind: Record<ValidationErrorKind, number>;
  total_load_results: number;
  target_tables: string[];
  storage_size_bytes: number;
}

/**
 * Source file list options
 */
export interface ListSourceFilesOptions {
  status?: SourceFileStatus;
  limit?: number;
  offset?: number;
}

/**
 * Validation error list options
 */
export interface ListValidationErrorsOptions {
  kind?: ValidationErrorKind;
  limit?: number;
  offset?: number;
}

/**
 * Error codes for database operations
 */
export enum DatabaseErrorCode {
  DATABASE_NOT_FOUND = 'DATABASE_NOT_FOUND',
  DATABASE_ALREADY_EXISTS = 'DATABASE_ALREADY_EXISTS',
  DATABASE_LOCKED = 'DATABASE_LOCKED',
  SOURCE_FILE_NOT_FOUND = 'SOURCE_FILE_NOT_FOUND',
  INVALID_STATUS_TRANSITION = 'INVALID_STATUS_TRANSITION',
  FOREIGN_KEY_VIOLATION = 'FOREIGN_KEY_VIOLATION',
  UNIQUE_VIOLATION = 'UNIQUE_VIOLATION',
  SCHEMA_MISMATCH = 'SCHEMA_MISMATCH',
  TARGET_TABLE_MISMATCH = 'TARGET_TABLE_MISMATCH',
  PERMISSION_DENIED = 'PERMISSION_DENIED',
  INVALID_NAME = 'INVALID_NAME',
  INVALID_IDENTIFIER = 'INVALID_IDENTIFIER',
}

/**
 * Custom error class for database operations
 */
export class DatabaseError extends Error {
  constructor(
    message: string,
    public readonly code: DatabaseErrorCode,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'DatabaseError';
  }
}

/**
 * A target-table insert hit a unique index.
 *
 * `index` is the position of the offending row in the rows handed to
 * insertTargetRows; everything before it was inserted within the same
 * (rolled back) statement sequence.
 */
export class UniqueConstraintViolation extends DatabaseError {
  constructor(
    public readonly table: string,
    public readonly column: string,
    public readonly index: number,
    cause?: unknown
  ) {
    super(
      `UNIQUE constraint failed: ${table}.${column} (row ${String(index)} of batch)`,
      DatabaseErrorCode.UNIQUE_VIOLATION,
      cause
    );
    this.name = 'UniqueConstraintViolation';
  }
}

/**
 * Database row type for source files
 */
export interface SourceFileRow {
  id: string;
  file_path: string;
  file_name: string;
  file_type: string;
  file_size: number;
  file_hash: string;
  status: string;
  target_table: string | null;
  row_count: number | null;
  rows_loaded: number;
  rows_rejected: number;
  error_message: string | null;
  uploaded_at: string;
  processing_started_at: string | null;
  processed_at: string | null;
}

/**
 * Database row type for validation errors
 */
export interface ValidationErrorRow {
  id: string;
  source_file_id: string;
  run_id: string;
  row_number: number;
  kind: string;
  message: string;
  field_name: string | null;
  field_value: string | null;
  created_at: string;
}

/**
 * Database row type for load results
 */
export interface LoadResultRow {
  run_id: string;
  source_file_id: string;
  target_table: string;
  rows_attempted: number;
  rows_loaded: number;
  rows_rejected: number;
  status: string;
  failure_reason: string | null;
  batches_committed: number;
  started_at: string;
  completed_at: string;
  duration_ms: number;
}
