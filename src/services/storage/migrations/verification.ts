/**
 * Schema Verification Functions
 *
 * @module migrations/verification
 */

import type Database from 'better-sqlite3';
import { REQUIRED_TABLES, REQUIRED_INDEXES } from './schema-definitions.js';

// Columns most likely to be missing from a partially written schema
const REQUIRED_COLUMNS: Record<string, string[]> = {
  source_files: ['id', 'file_path', 'file_type', 'file_hash', 'status', 'rows_loaded', 'rows_rejected'],
  validation_errors: ['id', 'source_file_id', 'row_number', 'kind', 'message'],
  load_results: ['run_id', 'source_file_id', 'rows_attempted', 'rows_loaded', 'rows_rejected', 'status'],
};

/**
 * Verify all required tables, indexes and columns exist
 */
export function verifySchema(db: Database.Database): {
  valid: boolean;
  missingTables: string[];
  missingIndexes: string[];
  missingColumns: string[];
} {
  const missingTables: string[] = [];
  const missingIndexes: string[] = [];
  const missingColumns: string[] = [];

  const exists = db.prepare(`SELECT name FROM sqlite_master WHERE type = ? AND name = ?`);

  for (const tableName of REQUIRED_TABLES) {
    if (!exists.get('table', tableName)) {
      missingTables.push(tableName);
    }
  }

  for (const indexName of REQUIRED_INDEXES) {
    if (!exists.get('index', indexName)) {
      missingIndexes.push(indexName);
    }
  }

  for (const [table, requiredCols] of Object.entries(REQUIRED_COLUMNS)) {
    if (!exists.get('table', table)) {
      continue;
    }
    const columns = db.prepare(`PRAGMA table_info(${table})`).all() as Array<{ name: string }>;
    const columnNames = new Set(columns.map((c) => c.name));
    for (const col of requiredCols) {
      if (!columnNames.has(col)) {
        missingColumns.push(`Table "${table}" is missing required column: ${col}`);
      }
    }
  }

  return {
    valid: missingTables.length === 0 && missingIndexes.length === 0 && missingColumns.length === 0,
    missingTables,
    missingIndexes,
    missingColumns,
  };
}
