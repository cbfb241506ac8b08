/**
 * Storage Service Module
 *
 * Database lifecycle, migrations and storage operations for the pipeline.
 */

export {
  initializeDatabase,
  checkSchemaVersion,
  migrateToLatest,
  getCurrentSchemaVersion,
  verifySchema,
  MigrationError,
} from './migrations/index.js';

export {
  DatabaseService,
  DatabaseError,
  DatabaseErrorCode,
  UniqueConstraintViolation,
  coerceValue,
  type ColumnValue,
  type TargetRow,
  type NewSourceFile,
  type DatabaseStats,
  type ListSourceFilesOptions,
  type ListValidationErrorsOptions,
} from './database/index.js';
