/**
 * Target table operations for DatabaseService
 *
 * Target tables are declared by table configuration, not by migrations.
 * Each carries the configured columns plus provenance columns, and one
 * UNIQUE index per DUPLICATE rule so that duplicate keys are detected by the
 * store against its actual contents.
 */

import Database from 'better-sqlite3';
import type { ColumnType, TableConfig } from '../../../models/table-config.js';
import { columnForField } from '../../../models/table-config.js';
import { DatabaseError, DatabaseErrorCode, UniqueConstraintViolation } from './types.js';
import { parseUniqueViolation, quoteIdentifier } from './helpers.js';

/** A value bound into a target column */
export type ColumnValue = string | number | null;

/**
 * One row ready for insertion: values follow `config.columns` order
 */
export interface TargetRow {
  source_row_number: number;
  values: ColumnValue[];
}

const INTEGER_PATTERN = /^[+-]?\d+$/;
const REAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Convert a raw field value for a column of the given type.
 *
 * Blank becomes NULL. Numeric columns take a number when the text is one,
 * otherwise the raw text is stored unchanged.
 */
export function coerceValue(value: string | null, type: ColumnType): ColumnValue {
  if (value === null) return null;
  const trimmed = value.trim();
  if (trimmed === '') return null;

  if (type === 'INTEGER' && INTEGER_PATTERN.test(trimmed)) {
    const n = Number(trimmed);
    return Number.isSafeInteger(n) ? n : value;
  }
  if (type === 'REAL' && REAL_PATTERN.test(trimmed)) {
    const n = Number(trimmed);
    return Number.isFinite(n) ? n : value;
  }
  return value;
}

export function targetTableExists(db: Database.Database, table: string): boolean {
  return (
    db.prepare(`SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?`).get(table) !==
    undefined
  );
}

/**
 * Create the target table and its indexes if missing.
 *
 * @throws DatabaseError TARGET_TABLE_MISMATCH if an existing table lacks a configured column
 */
export function ensureTargetTable(db: Database.Database, config: TableConfig): void {
  const table = quoteIdentifier(config.table);

  if (targetTableExists(db, config.table)) {
    const existing = db.prepare(`PRAGMA table_info(${table})`).all() as Array<{ name: string }>;
    const names = new Set(existing.map((c) => c.name.toLowerCase()));
    const missing = config.columns.filter((c) => !names.has(c.column.toLowerCase()));
    if (missing.length > 0) {
      throw new DatabaseError(
        `Target table "${config.table}" is missing configured columns: ${missing.map((c) => c.column).join(', ')}`,
        DatabaseErrorCode.TARGET_TABLE_MISMATCH
      );
    }
  } else {
    const columnDefs = config.columns.map((c) => `  ${quoteIdentifier(c.column)} ${c.type}`);
    db.exec(`
      CREATE TABLE IF NOT EXISTS ${table} (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
      ${columnDefs.join(',\n      ')},
        source_file_id TEXT NOT NULL REFERENCES source_files(id),
        source_row_number INTEGER NOT NULL,
        loaded_at TEXT NOT NULL
      )
    `);
  }

  db.exec(
    `CREATE INDEX IF NOT EXISTS ${quoteIdentifier(`idx_${config.table}_source_file`)} ON ${table}(source_file_id, source_row_number)`
  );

  for (const rule of config.rules) {
    if (rule.kind !== 'DUPLICATE') continue;
    const column = columnForField(config, rule.field);
    if (column === null) continue;
    db.exec(
      `CREATE UNIQUE INDEX IF NOT EXISTS ${quoteIdentifier(`uq_${config.table}_${column}`)} ON ${table}(${quoteIdentifier(column)})`
    );
  }
}

/**
 * Insert rows in order with one prepared statement.
 *
 * Not transactional on its own: callers wrap it in a transaction so that a
 * thrown error leaves nothing behind.
 *
 * @throws UniqueConstraintViolation naming the position of the offending row
 */
export function insertTargetRows(
  db: Database.Database,
  config: TableConfig,
  sourceFileId: string,
  rows: readonly TargetRow[],
  loadedAt: string
): number {
  if (rows.length === 0) return 0;

  const columns = config.columns.map((c) => quoteIdentifier(c.column));
  const placeholders = columns.map(() => '?').join(', ');
  const stmt = db.prepare(`
    INSERT INTO ${quoteIdentifier(config.table)} (${columns.join(', ')}, source_file_id, source_row_number, loaded_at)
    VALUES (${placeholders}, ?, ?, ?)
  `);

  rows.forEach((row, index) => {
    try {
      stmt.run(...row.values, sourceFileId, row.source_row_number, loadedAt);
    } catch (error) {
      const violation = parseUniqueViolation(error);
      if (violation) {
        throw new UniqueConstraintViolation(violation.table, violation.column, index, error);
      }
      throw error;
    }
  });
  return rows.length;
}

/**
 * Remove every row a source file loaded into a table
 */
export function purgeTargetRows(db: Database.Database, table: string, sourceFileId: string): number {
  if (!targetTableExists(db, table)) return 0;
  return db
    .prepare(`DELETE FROM ${quoteIdentifier(table)} WHERE source_file_id = ?`)
    .run(sourceFileId).changes;
}

export function countTargetRows(db: Database.Database, table: string, sourceFileId?: string): number {
  if (!targetTableExists(db, table)) return 0;
  const row = (
    sourceFileId === undefined
      ? db.prepare(`SELECT COUNT(*) as count FROM ${quoteIdentifier(table)}`).get()
      : db
          .prepare(`SELECT COUNT(*) as count FROM ${quoteIdentifier(table)} WHERE source_file_id = ?`)
          .get(sourceFileId)
  ) as { count: number };
  return row.count;
}

/**
 * Target tables present in the database: tables other than the pipeline's
 * own that carry a source_file_id column
 */
export function listTargetTables(db: Database.Database, reserved: readonly string[]): string[] {
  const tables = db
    .prepare(
      `SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name`
    )
    .all() as Array<{ name: string }>;
  return tables
    .map((t) => t.name)
    .filter((name) => !reserved.includes(name))
    .filter((name) => {
      const cols = db.prepare(`PRAGMA table_info(${quoteIdentifier(name)})`).all() as Array<{
        name: string;
      }>;
      return cols.some((c) => c.name === 'source_file_id');
    });
}
