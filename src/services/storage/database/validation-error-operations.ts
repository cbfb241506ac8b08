/**
 * Validation error operations for DatabaseService
 *
 * The error ledger is append-only during a run. It is only ever cleared as a
 * whole for one source file, when that file is restarted.
 */

import Database from 'better-sqlite3';
import type { ValidationErrorRecord } from '../../../models/validation-error.js';
import type { ValidationErrorKind } from '../../../models/validation-rule.js';
import type { ListValidationErrorsOptions, ValidationErrorRow } from './types.js';
import { runWithForeignKeyCheck } from './helpers.js';
import { rowToValidationError } from './converters.js';

/**
 * Append error records in the order given
 */
export function insertValidationErrors(
  db: Database.Database,
  records: readonly ValidationErrorRecord[]
): number {
  if (records.length === 0) return 0;

  const stmt = db.prepare(`
    INSERT INTO validation_errors (
      id, source_file_id, run_id, row_number, kind, message, field_name, field_value, created_at
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
  `);

  for (const r of records) {
    runWithForeignKeyCheck(
      stmt,
      [
        r.id,
        r.source_file_id,
        r.run_id,
        r.row_number,
        r.kind,
        r.message,
        r.field_name,
        r.field_value,
        r.created_at,
      ],
      `inserting validation error: source file "${r.source_file_id}" does not exist`
    );
  }
  return records.length;
}

/**
 * Errors for one file in row order (insertion order within a row)
 */
export function getValidationErrors(
  db: Database.Database,
  sourceFileId: string,
  options?: ListValidationErrorsOptions
): ValidationErrorRecord[] {
  const params: unknown[] = [sourceFileId];
  let sql = 'SELECT * FROM validation_errors WHERE source_file_id = ?';

  if (options?.kind) {
    sql += ' AND kind = ?';
    params.push(options.kind);
  }

  sql += ' ORDER BY row_number ASC, rowid ASC';

  if (options?.limit !== undefined) {
    sql += ' LIMIT ? OFFSET ?';
    params.push(options.limit, options.offset ?? 0);
  } else if (options?.offset) {
    sql += ' LIMIT -1 OFFSET ?';
    params.push(options.offset);
  }

  const rows = db.prepare(sql).all(...params) as ValidationErrorRow[];
  return rows.map(rowToValidationError);
}

export function countValidationErrors(
  db: Database.Database,
  sourceFileId: string,
  kind?: ValidationErrorKind
): number {
  const row = (
    kind
      ? db
          .prepare('SELECT COUNT(*) as count FROM validation_errors WHERE source_file_id = ? AND kind = ?')
          .get(sourceFileId, kind)
      : db
          .prepare('SELECT COUNT(*) as count FROM validation_errors WHERE source_file_id = ?')
          .get(sourceFileId)
  ) as { count: number };
  return row.count;
}

export function deleteValidationErrorsByFile(db: Database.Database, sourceFileId: string): number {
  return db.prepare('DELETE FROM validation_errors WHERE source_file_id = ?').run(sourceFileId)
    .changes;
}
