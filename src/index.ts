/**
 * tabular-ingest
 *
 * Validation-and-load pipeline for CSV and JSON files. Rows are checked
 * against per-table rules, valid rows are bulk loaded into SQLite target
 * tables and every rejected row leaves an entry in the error ledger.
 *
 * Logging goes to stderr.
 *
 * @module index
 */

export * from './models/index.js';

export {
  DatabaseService,
  DatabaseError,
  DatabaseErrorCode,
  MigrationError,
  type DatabaseStats,
  type ListSourceFilesOptions,
  type ListValidationErrorsOptions,
} from './services/storage/index.js';

export { evaluate, validateRow } from './services/rules/index.js';

export {
  FatalParseError,
  RowSource,
  createRowSource,
  fileSource,
  bufferSource,
  detectDelimiter,
  detectTableConfig,
  type ByteSource,
  type ParseErrorCode,
  type ParseWarning,
  type ScanResult,
} from './services/parsing/index.js';

export {
  BatchLoader,
  FatalStoreError,
  type BatchLoaderOptions,
  type FlushOutcome,
} from './services/loading/index.js';

export * from './services/pipeline/index.js';

export {
  InputValidationError,
  compileTableConfig,
  loadTableConfig,
  loadTableConfigs,
} from './utils/validation.js';
export { loadIngestSettings, type IngestSettings } from './utils/config.js';
export { hashFile, computeHash } from './utils/hash.js';
