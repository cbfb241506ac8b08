/**
 * SQL Schema Definitions for Tabular Ingest
 *
 * Contains the pipeline's own tables, indexes and database configuration.
 * Target tables are not listed here: they are declared by table
 * configuration and created on demand (see database/target-table-operations.ts).
 *
 * @module migrations/schema-definitions
 */

/** Current schema version */
export const SCHEMA_VERSION = 1;

/**
 * Database configuration pragmas for performance and safety
 */
export const DATABASE_PRAGMAS = [
  'PRAGMA journal_mode = WAL',
  'PRAGMA foreign_keys = ON',
  'PRAGMA synchronous = NORMAL',
  'PRAGMA cache_size = -64000',
  'PRAGMA wal_autocheckpoint = 1000',
  'PRAGMA busy_timeout = 30000',
] as const;

/**
 * Schema version table - tracks migration state
 */
export const CREATE_SCHEMA_VERSION_TABLE = `
CREATE TABLE IF NOT EXISTS schema_version (
  id INTEGER PRIMARY KEY CHECK (id = 1),
  version INTEGER NOT NULL,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
)
`;

/**
 * Database metadata table - database info
 */
export const CREATE_DATABASE_METADATA_TABLE = `
CREATE TABLE IF NOT EXISTS database_metadata (
  id INTEGER PRIMARY KEY CHECK (id = 1),
  database_name TEXT NOT NULL,
  database_version TEXT NOT NULL,
  description TEXT,
  created_at TEXT NOT NULL,
  last_modified_at TEXT NOT NULL
)
`;

/**
 * Source files - one row per registered input file and its run lifecycle
 */
export const CREATE_SOURCE_FILES_TABLE = `
CREATE TABLE IF NOT EXISTS source_files (
  id TEXT PRIMARY KEY,
  file_path TEXT NOT NULL,
  file_name TEXT NOT NULL,
  file_type TEXT NOT NULL CHECK (file_type IN ('csv', 'json')),
  file_size INTEGER NOT NULL CHECK (file_size >= 0),
  file_hash TEXT NOT NULL,
  status TEXT NOT NULL DEFAULT 'uploaded' CHECK (status IN ('uploaded', 'processing', 'completed', 'failed')),
  target_table TEXT,
  row_count INTEGER,
  rows_loaded INTEGER NOT NULL DEFAULT 0,
  rows_rejected INTEGER NOT NULL DEFAULT 0,
  error_message TEXT,
  uploaded_at TEXT NOT NULL,
  processing_started_at TEXT,
  processed_at TEXT
)
`;

/**
 * Validation errors - append-only error ledger, one row per failed check
 */
export const CREATE_VALIDATION_ERRORS_TABLE = `
CREATE TABLE IF NOT EXISTS validation_errors (
  id TEXT PRIMARY KEY,
  source_file_id TEXT NOT NULL,
  run_id TEXT NOT NULL,
  row_number INTEGER NOT NULL CHECK (row_number >= 1),
  kind TEXT NOT NULL CHECK (kind IN ('REQUIRED', 'FORMAT', 'RANGE', 'LENGTH', 'DUPLICATE', 'UNKNOWN')),
  message TEXT NOT NULL,
  field_name TEXT,
  field_value TEXT,
  created_at TEXT NOT NULL,
  FOREIGN KEY (source_file_id) REFERENCES source_files(id)
)
`;

/**
 * Load results - one summary per source file, replaced on restart
 */
export const CREATE_LOAD_RESULTS_TABLE = `
CREATE TABLE IF NOT EXISTS load_results (
  run_id TEXT PRIMARY KEY,
  source_file_id TEXT NOT NULL UNIQUE,
  target_table TEXT NOT NULL,
  rows_attempted INTEGER NOT NULL CHECK (rows_attempted >= 0),
  rows_loaded INTEGER NOT NULL CHECK (rows_loaded >= 0),
  rows_rejected INTEGER NOT NULL CHECK (rows_rejected >= 0),
  status TEXT NOT NULL CHECK (status IN ('completed', 'failed')),
  failure_reason TEXT,
  batches_committed INTEGER NOT NULL DEFAULT 0,
  started_at TEXT NOT NULL,
  completed_at TEXT NOT NULL,
  duration_ms INTEGER NOT NULL,
  CHECK (rows_attempted = rows_loaded + rows_rejected),
  FOREIGN KEY (source_file_id) REFERENCES source_files(id)
)
`;

/**
 * All required indexes
 */
export const CREATE_INDEXES = [
  'CREATE INDEX IF NOT EXISTS idx_source_files_status ON source_files(status)',
  'CREATE INDEX IF NOT EXISTS idx_source_files_file_hash ON source_files(file_hash)',
  'CREATE INDEX IF NOT EXISTS idx_validation_errors_file_row ON validation_errors(source_file_id, row_number)',
  'CREATE INDEX IF NOT EXISTS idx_validation_errors_kind ON validation_errors(kind)',
  'CREATE INDEX IF NOT EXISTS idx_load_results_target_table ON load_results(target_table)',
] as const;

/**
 * Table definitions for creating tables in dependency order
 */
export const TABLE_DEFINITIONS = [
  { name: 'database_metadata', sql: CREATE_DATABASE_METADATA_TABLE },
  { name: 'source_files', sql: CREATE_SOURCE_FILES_TABLE },
  { name: 'validation_errors', sql: CREATE_VALIDATION_ERRORS_TABLE },
  { name: 'load_results', sql: CREATE_LOAD_RESULTS_TABLE },
] as const;

/**
 * Required tables for schema verification
 */
export const REQUIRED_TABLES = [
  'schema_version',
  'database_metadata',
  'source_files',
  'validation_errors',
  'load_results',
] as const;

/**
 * Required indexes for schema verification
 */
export const REQUIRED_INDEXES = [
  'idx_source_files_status',
  'idx_source_files_file_hash',
  'idx_validation_errors_file_row',
  'idx_validation_errors_kind',
  'idx_load_results_target_table',
] as const;
