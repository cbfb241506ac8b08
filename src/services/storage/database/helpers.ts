/**
 * Helper functions for DatabaseService
 *
 * Contains utility functions for validation, path resolution,
 * and constraint error handling.
 */

import Database from 'better-sqlite3';
import { join } from 'path';
import { DEFAULT_DATABASES_PATH } from '../../../utils/config.js';
import { IDENTIFIER_PATTERN } from '../../../utils/validation.js';
import { DatabaseError, DatabaseErrorCode } from './types.js';

/**
 * Default storage path for databases
 */
export const DEFAULT_STORAGE_PATH =
  process.env.TABULAR_INGEST_DATABASES_PATH ?? DEFAULT_DATABASES_PATH;

/**
 * Valid database name pattern: alphanumeric, underscores, hyphens
 */
const VALID_NAME_PATTERN = /^[a-zA-Z0-9_-]+$/;

/**
 * Validate database name format
 */
export function validateName(name: string): void {
  if (!name) {
    throw new DatabaseError('Database name is required', DatabaseErrorCode.INVALID_NAME);
  }
  if (!VALID_NAME_PATTERN.test(name)) {
    throw new DatabaseError(
      `Invalid database name "${name}". Only alphanumeric characters, underscores, and hyphens are allowed.`,
      DatabaseErrorCode.INVALID_NAME
    );
  }
}

/**
 * Get full database path
 */
export function getDatabasePath(name: string, storagePath?: string): string {
  const basePath = storagePath ?? DEFAULT_STORAGE_PATH;
  return join(basePath, `${name}.db`);
}

/**
 * Quote a table or column name for interpolation into SQL.
 *
 * @throws DatabaseError if the name is not a plain identifier
 */
export function quoteIdentifier(name: string): string {
  if (!IDENTIFIER_PATTERN.test(name)) {
    throw new DatabaseError(`Invalid SQL identifier "${name}"`, DatabaseErrorCode.INVALID_IDENTIFIER);
  }
  return `"${name}"`;
}

/**
 * Run a statement, converting SQLite FK constraint errors to DatabaseError.
 *
 * @param context - Error context message (e.g., "inserting validation error: source file does not exist")
 */
export function runWithForeignKeyCheck(
  stmt: Database.Statement,
  params: unknown[],
  context: string
): Database.RunResult {
  try {
    return stmt.run(...params);
  } catch (error) {
    if (error instanceof Error && error.message.includes('FOREIGN KEY constraint failed')) {
      throw new DatabaseError(
        `Foreign key violation ${context}`,
        DatabaseErrorCode.FOREIGN_KEY_VIOLATION,
        error
      );
    }
    throw error;
  }
}

/**
 * Table and column named by a SQLite unique-constraint failure, or null if the
 * error is something else.
 */
export function parseUniqueViolation(error: unknown): { table: string; column: string } | null {
  if (!(error instanceof Error)) return null;
  const match = /UNIQUE constraint failed: (\w+)\.(\w+)/.exec(error.message);
  if (!match?.[1] || !match[2]) return null;
  return { table: match[1], column: match[2] };
}
