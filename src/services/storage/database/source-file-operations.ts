/**
 * Source file operations for DatabaseService
 *
 * Registration, lookup and the run lifecycle of source files. Every status
 * change is a conditional UPDATE so that two runs cannot both claim a file.
 */

import Database from 'better-sqlite3';
import {
  SOURCE_FILE_STATUSES,
  STATUS_TRANSITIONS,
  type SourceFile,
  type SourceFileStatus,
} from '../../../models/source-file.js';
import {
  DatabaseError,
  DatabaseErrorCode,
  type ListSourceFilesOptions,
  type SourceFileRow,
} from './types.js';
import { rowToSourceFile } from './converters.js';

export type NewSourceFile = Pick<
  SourceFile,
  'id' | 'file_path' | 'file_name' | 'file_type' | 'file_size' | 'file_hash'
>;

/** Statuses from which a run may start */
const STARTABLE_STATUSES: readonly SourceFileStatus[] = SOURCE_FILE_STATUSES.filter((s) =>
  STATUS_TRANSITIONS[s].includes('processing')
);

/**
 * Insert a newly registered source file with status 'uploaded'
 */
export function insertSourceFile(
  db: Database.Database,
  file: NewSourceFile,
  updateMetadataModified: () => void
): SourceFile {
  const uploaded_at = new Date().toISOString();

  db.prepare(
    `
    INSERT INTO source_files (
      id, file_path, file_name, file_type, file_size, file_hash, status, uploaded_at
    ) VALUES (?, ?, ?, ?, ?, ?, 'uploaded', ?)
  `
  ).run(
    file.id,
    file.file_path,
    file.file_name,
    file.file_type,
    file.file_size,
    file.file_hash,
    uploaded_at
  );

  updateMetadataModified();
  return requireSourceFile(db, file.id);
}

export function getSourceFile(db: Database.Database, id: string): SourceFile | null {
  const row = db.prepare('SELECT * FROM source_files WHERE id = ?').get(id) as
    | SourceFileRow
    | undefined;
  return row ? rowToSourceFile(row) : null;
}

/**
 * @throws DatabaseError SOURCE_FILE_NOT_FOUND
 */
export function requireSourceFile(db: Database.Database, id: string): SourceFile {
  const file = getSourceFile(db, id);
  if (!file) {
    throw new DatabaseError(`Source file "${id}" not found`, DatabaseErrorCode.SOURCE_FILE_NOT_FOUND);
  }
  return file;
}

/**
 * List source files, newest first
 */
export function listSourceFiles(
  db: Database.Database,
  options?: ListSourceFilesOptions
): SourceFile[] {
  const conditions: string[] = [];
  const params: unknown[] = [];

  if (options?.status) {
    conditions.push('status = ?');
    params.push(options.status);
  }

  const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
  params.push(options?.limit ?? 50, options?.offset ?? 0);

  const rows = db
    .prepare(`SELECT * FROM source_files ${where} ORDER BY uploaded_at DESC, id DESC LIMIT ? OFFSET ?`)
    .all(...params) as SourceFileRow[];
  return rows.map(rowToSourceFile);
}

/**
 * Claim a file for a new run: uploaded|failed -> processing.
 *
 * Resets the counters and failure fields of any earlier run. The target
 * table may be null when it is chosen from the file's headers later on.
 *
 * @throws DatabaseError SOURCE_FILE_NOT_FOUND or INVALID_STATUS_TRANSITION
 */
export function beginProcessing(
  db: Database.Database,
  id: string,
  targetTable: string | null,
  startedAt: string,
  updateMetadataModified: () => void
): void {
  const placeholders = STARTABLE_STATUSES.map(() => '?').join(', ');
  const result = db
    .prepare(
      `
    UPDATE source_files
    SET status = 'processing', target_table = ?, processing_started_at = ?,
        row_count = NULL, rows_loaded = 0, rows_rejected = 0,
        error_message = NULL, processed_at = NULL
    WHERE id = ? AND status IN (${placeholders})
  `
    )
    .run(targetTable, startedAt, id, ...STARTABLE_STATUSES);

  if (result.changes === 0) {
    const current = requireSourceFile(db, id);
    throw new DatabaseError(
      `Cannot start processing source file "${id}": status is ${current.status}`,
      DatabaseErrorCode.INVALID_STATUS_TRANSITION
    );
  }

  updateMetadataModified();
}

function updateProcessing(db: Database.Database, id: string, column: string, value: string | number): void {
  const result = db
    .prepare(`UPDATE source_files SET ${column} = ? WHERE id = ? AND status = 'processing'`)
    .run(value, id);
  if (result.changes === 0) {
    requireSourceFile(db, id);
    throw new DatabaseError(
      `Source file "${id}" is not processing`,
      DatabaseErrorCode.INVALID_STATUS_TRANSITION
    );
  }
}

export function setRowCount(db: Database.Database, id: string, rowCount: number): void {
  updateProcessing(db, id, 'row_count', rowCount);
}

/** Record the table chosen for a run that started without one */
export function setTargetTable(db: Database.Database, id: string, targetTable: string): void {
  updateProcessing(db, id, 'target_table', targetTable);
}

/**
 * Persist the running counters of an active run
 */
export function updateProgress(
  db: Database.Database,
  id: string,
  rowsLoaded: number,
  rowsRejected: number
): void {
  const result = db
    .prepare(
      `UPDATE source_files SET rows_loaded = ?, rows_rejected = ? WHERE id = ? AND status = 'processing'`
    )
    .run(rowsLoaded, rowsRejected, id);
  if (result.changes === 0) {
    requireSourceFile(db, id);
    throw new DatabaseError(
      `Source file "${id}" is not processing`,
      DatabaseErrorCode.INVALID_STATUS_TRANSITION
    );
  }
}

/**
 * End a run: processing -> completed|failed
 *
 * @throws DatabaseError SOURCE_FILE_NOT_FOUND or INVALID_STATUS_TRANSITION
 */
export function finishProcessing(
  db: Database.Database,
  id: string,
  status: 'completed' | 'failed',
  errorMessage: string | null,
  processedAt: string,
  updateMetadataModified: () => void
): void {
  const result = db
    .prepare(
      `
    UPDATE source_files
    SET status = ?, error_message = ?, processed_at = ?
    WHERE id = ? AND status = 'processing'
  `
    )
    .run(status, errorMessage, processedAt, id);

  if (result.changes === 0) {
    const current = requireSourceFile(db, id);
    throw new DatabaseError(
      `Cannot move source file "${id}" from ${current.status} to ${status}`,
      DatabaseErrorCode.INVALID_STATUS_TRANSITION
    );
  }

  updateMetadataModified();
}

/**
 * Files stuck in 'processing' since before the cutoff
 */
export function findStaleProcessing(db: Database.Database, startedBefore: string): SourceFile[] {
  const rows = db
    .prepare(
      `
    SELECT * FROM source_files
    WHERE status = 'processing' AND processing_started_at < ?
    ORDER BY processing_started_at ASC
  `
    )
    .all(startedBefore) as SourceFileRow[];
  return rows.map(rowToSourceFile);
}
