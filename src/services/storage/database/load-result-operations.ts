/**
 * Load result operations for DatabaseService
 *
 * One summary per source file: a restart deletes the previous one before the
 * new run writes its own.
 */

import Database from 'better-sqlite3';
import type { LoadResult } from '../../../models/load-result.js';
import type { LoadResultRow } from './types.js';
import { runWithForeignKeyCheck } from './helpers.js';
import { rowToLoadResult } from './converters.js';

export function insertLoadResult(db: Database.Database, result: LoadResult): void {
  const stmt = db.prepare(`
    INSERT INTO load_results (
      run_id, source_file_id, target_table, rows_attempted, rows_loaded, rows_rejected,
      status, failure_reason, batches_committed, started_at, completed_at, duration_ms
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `);

  runWithForeignKeyCheck(
    stmt,
    [
      result.run_id,
      result.source_file_id,
      result.target_table,
      result.rows_attempted,
      result.rows_loaded,
      result.rows_rejected,
      result.status,
      result.failure_reason,
      result.batches_committed,
      result.started_at,
      result.completed_at,
      result.duration_ms,
    ],
    `inserting load result: source file "${result.source_file_id}" does not exist`
  );
}

export function getLoadResult(db: Database.Database, sourceFileId: string): LoadResult | null {
  const row = db.prepare('SELECT * FROM load_results WHERE source_file_id = ?').get(sourceFileId) as
    | LoadResultRow
    | undefined;
  return row ? rowToLoadResult(row) : null;
}

export function deleteLoadResultByFile(db: Database.Database, sourceFileId: string): number {
  return db.prepare('DELETE FROM load_results WHERE source_file_id = ?').run(sourceFileId).changes;
}
