/**
 * Statistics operations for DatabaseService
 */

import Database from 'better-sqlite3';
import { statSync } from 'fs';
import { VALIDATION_ERROR_KINDS, type ValidationErrorKind } from '../../../models/validation-rule.js';
import { RESERVED_TABLE_NAMES } from '../../../utils/validation.js';
import type { DatabaseStats } from './types.js';
import { listTargetTables } from './target-table-operations.js';

/**
 * Get database statistics
 */
export function getStats(db: Database.Database, name: string, path: string): DatabaseStats {
  const fileStats = db
    .prepare(
      `
    SELECT
      COUNT(*) FILTER (WHERE status = 'uploaded') as uploaded,
      COUNT(*) FILTER (WHERE status = 'processing') as processing,
      COUNT(*) FILTER (WHERE status = 'completed') as completed,
      COUNT(*) FILTER (WHERE status = 'failed') as failed,
      COUNT(*) as total,
      COALESCE(SUM(rows_loaded), 0) as rows_loaded,
      COALESCE(SUM(rows_rejected), 0) as rows_rejected
    FROM source_files
  `
    )
    .get() as {
    uploaded: number;
    processing: number;
    completed: number;
    failed: number;
    total: number;
    rows_loaded: number;
    rows_rejected: number;
  };

  const kindRows = db
    .prepare(`SELECT kind, COUNT(*) as count FROM validation_errors GROUP BY kind`)
    .all() as Array<{ kind: string; count: number }>;

  const errorsByKind: Record<ValidationErrorKind, number> = {
    REQUIRED: 0,
    FORMAT: 0,
    RANGE: 0,
    LENGTH: 0,
    DUPLICATE: 0,
    UNKNOWN: 0,
  };
  let totalErrors = 0;
  for (const row of kindRows) {
    const kind = VALIDATION_ERROR_KINDS.find((k) => k === row.kind);
    if (kind !== undefined) errorsByKind[kind] = row.count;
    totalErrors += row.count;
  }

  const loadResults = db.prepare('SELECT COUNT(*) as count FROM load_results').get() as {
    count: number;
  };

  return {
    name,
    total_source_files: fileStats.total,
    source_files_by_status: {
      uploaded: fileStats.uploaded,
      processing: fileStats.processing,
      completed: fileStats.completed,
      failed: fileStats.failed,
    },
    total_rows_loaded: fileStats.rows_loaded,
    total_rows_rejected: fileStats.rows_rejected,
    total_validation_errors: totalErrors,
    errors_by_kind: errorsByKind,
    total_load_results: loadResults.count,
    target_tables: listTargetTables(db, RESERVED_TABLE_NAMES),
    storage_size_bytes: statSync(path).size,
  };
}

/**
 * Touch the metadata modification timestamp
 */
export function updateMetadataModified(db: Database.Database): void {
  db.prepare('UPDATE database_metadata SET last_modified_at = ? WHERE id = 1').run(
    new Date().toISOString()
  );
}
