/**
 * Database Module - Public API
 */

export { MigrationError } from '../migrations/index.js';

export type {
  DatabaseStats,
  ListSourceFilesOptions,
  ListValidationErrorsOptions,
} from './types.js';
export { DatabaseErrorCode, DatabaseError, UniqueConstraintViolation } from './types.js';

export { DatabaseService } from './service.js';

export type { NewSourceFile } from './source-file-operations.js';
export { coerceValue, type ColumnValue, type TargetRow } from './target-table-operations.js';
