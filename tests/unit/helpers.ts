/**
 * Shared test helpers
 *
 * Temporary directories, throwaway databases and table configurations used
 * across the unit tests.
 */

import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import Database from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';
import { DatabaseService } from '../../src/services/storage/index.js';
import { compileTableConfig } from '../../src/utils/validation.js';
import type { TableConfig } from '../../src/models/table-config.js';
import type { Row } from '../../src/models/row.js';
import type { SourceFile } from '../../src/models/source-file.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TEST DIRECTORY MANAGEMENT
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Create a temporary directory. Prefixes must be listed in global-teardown.ts.
 */
export function createTestDir(prefix: string): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function cleanupTestDir(testDir: string): void {
  try {
    rmSync(testDir, { recursive: true, force: true });
  } catch {
    // Ignore cleanup errors
  }
}

export function createUniqueDatabaseName(prefix: string): string {
  return `${prefix}-${String(Date.now())}-${Math.random().toString(36).slice(2)}`;
}

export function createFreshDatabase(testDir: string, prefix: string): DatabaseService {
  return DatabaseService.create(createUniqueDatabaseName(prefix), undefined, testDir);
}

export function safeCloseDatabase(dbService: DatabaseService | undefined): void {
  if (dbService) {
    try {
      dbService.close();
    } catch {
      // Ignore close errors
    }
  }
}

/**
 * Run a read-only query on a second connection to the store's file
 */
export function queryStore(dbService: DatabaseService, sql: string): unknown[] {
  const db = new Database(dbService.getPath(), { readonly: true });
  try {
    return db.prepare(sql).all();
  } finally {
    db.close();
  }
}

/**
 * Write a file into the test directory and return its absolute path
 */
export function writeTestFile(testDir: string, name: string, content: string): string {
  const filePath = join(testDir, name);
  writeFileSync(filePath, content);
  return filePath;
}

// ═══════════════════════════════════════════════════════════════════════════════
// TEST DATA FACTORIES
// ═══════════════════════════════════════════════════════════════════════════════

export function makeRow(rowNumber: number, fields: Record<string, string | null>): Row {
  return { row_number: rowNumber, fields };
}

/**
 * Register a source file record without touching the filesystem
 */
export function insertTestSourceFile(
  db: DatabaseService,
  overrides: Partial<Pick<SourceFile, 'file_type' | 'file_name' | 'file_path'>> = {}
): SourceFile {
  const id = uuidv4();
  return db.insertSourceFile({
    id,
    file_path: overrides.file_path ?? `/test/${id}.csv`,
    file_name: overrides.file_name ?? `${id}.csv`,
    file_type: overrides.file_type ?? 'csv',
    file_size: 128,
    file_hash: `sha256:${'0'.repeat(64)}`,
  });
}

/**
 * Customers table: code, name, email, credit limit
 */
export function customersConfig(overrides: Record<string, unknown> = {}): TableConfig {
  return compileTableConfig({
    table: 'customers',
    batch_size: 100,
    columns: [
      { column: 'customer_code' },
      { column: 'name' },
      { column: 'email' },
      { column: 'credit_limit', type: 'REAL' },
    ],
    rules: [
      { kind: 'REQUIRED', field: 'customer_code' },
      { kind: 'REQUIRED', field: 'name' },
      { kind: 'FORMAT', field: 'email', preset: 'email' },
      { kind: 'RANGE', field: 'credit_limit', min: 0, max: 100000 },
      { kind: 'DUPLICATE', field: 'customer_code' },
    ],
    ...overrides,
  });
}

export const CUSTOMERS_HEADER = 'customer_code,name,email,credit_limit';

export { DatabaseService, uuidv4 };
