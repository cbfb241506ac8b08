/**
 * Database Migration Operations
 *
 * @module migrations/operations
 */

import type Database from 'better-sqlite3';
import { MigrationError } from './types.js';
import { SCHEMA_VERSION } from './schema-definitions.js';
import {
  configurePragmas,
  createTables,
  createIndexes,
  initializeDatabaseMetadata,
  initializeSchemaVersion,
} from './schema-helpers.js';

/**
 * Read the stored schema version; 0 for a database that was never initialized
 *
 * @throws MigrationError if the version cannot be read
 */
export function checkSchemaVersion(db: Database.Database): number {
  try {
    const tableExists = db
      .prepare(
        `
      SELECT name FROM sqlite_master
      WHERE type = 'table' AND name = 'schema_version'
    `
      )
      .get();

    if (!tableExists) {
      return 0;
    }

    const row = db.prepare('SELECT version FROM schema_version WHERE id = ?').get(1) as
      | { version: number }
      | undefined;

    return row?.version ?? 0;
  } catch (error) {
    throw new MigrationError('Failed to check schema version', 'query', 'schema_version', error);
  }
}

/**
 * Schema version this build writes
 */
export function getCurrentSchemaVersion(): number {
  return SCHEMA_VERSION;
}

/**
 * Initialize the database with all tables, indexes, and configuration
 *
 * Idempotent. The schema version is stamped last, inside the same
 * transaction, so an interrupted init leaves version 0 and re-runs cleanly.
 *
 * @throws MigrationError if any operation fails
 */
export function initializeDatabase(
  db: Database.Database,
  name?: string,
  description?: string
): void {
  // Pragmas cannot change inside a transaction
  configurePragmas(db);

  const initTransaction = db.transaction(() => {
    createTables(db);
    createIndexes(db);
    initializeDatabaseMetadata(db, name, description ?? null);
    initializeSchemaVersion(db);
  });

  initTransaction();
}

/**
 * Bring a database to the current schema version
 *
 * @throws MigrationError if the database is newer than this build supports
 */
export function migrateToLatest(db: Database.Database): void {
  const currentVersion = checkSchemaVersion(db);

  if (currentVersion === 0) {
    initializeDatabase(db);
    return;
  }

  if (currentVersion > SCHEMA_VERSION) {
    throw new MigrationError(
      `Database schema version (${String(currentVersion)}) is newer than supported version (${String(SCHEMA_VERSION)}). ` +
        'Please update the application.',
      'version_check',
      undefined
    );
  }
}
