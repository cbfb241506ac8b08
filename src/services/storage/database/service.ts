/**
 * DatabaseService class for all database operations
 *
 * Owns one better-sqlite3 connection and delegates to the per-entity
 * operation modules. Uses prepared statements with bound parameters.
 */

import Database from 'better-sqlite3';
import type { SourceFile } from '../../../models/source-file.js';
import type { ValidationErrorRecord } from '../../../models/validation-error.js';
import type { ValidationErrorKind } from '../../../models/validation-rule.js';
import type { LoadResult } from '../../../models/load-result.js';
import type { TableConfig } from '../../../models/table-config.js';
import type {
  DatabaseStats,
  ListSourceFilesOptions,
  ListValidationErrorsOptions,
} from './types.js';
import { createDatabase, openDatabase, databaseExists } from './static-operations.js';
import { getStats, updateMetadataModified } from './stats-operations.js';
import * as fileOps from './source-file-operations.js';
import type { NewSourceFile } from './source-file-operations.js';
import * as errorOps from './validation-error-operations.js';
import * as resultOps from './load-result-operations.js';
import * as targetOps from './target-table-operations.js';
import type { TargetRow } from './target-table-operations.js';

/**
 * DatabaseService class for all database operations
 */
export class DatabaseService {
  private db: Database.Database;
  private readonly name: string;
  private readonly path: string;

  private constructor(db: Database.Database, name: string, path: string) {
    this.db = db;
    this.name = name;
    this.path = path;
  }

  static create(name: string, description?: string, storagePath?: string): DatabaseService {
    const result = createDatabase(name, description, storagePath);
    return new DatabaseService(result.db, result.name, result.path);
  }

  static open(name: string, storagePath?: string): DatabaseService {
    const result = openDatabase(name, storagePath);
    return new DatabaseService(result.db, result.name, result.path);
  }

  /**
   * Open the named database, creating it first if it does not exist
   */
  static openOrCreate(name: string, storagePath?: string): DatabaseService {
    return databaseExists(name, storagePath)
      ? DatabaseService.open(name, storagePath)
      : DatabaseService.create(name, undefined, storagePath);
  }

  getStats(): DatabaseStats {
    return getStats(this.db, this.name, this.path);
  }

  close(): void {
    try {
      this.db.pragma('optimize');
    } catch (error) {
      console.error(
        '[DatabaseService] pragma optimize failed:',
        error instanceof Error ? error.message : String(error)
      );
    }
    this.db.close();
  }

  getPath(): string {
    return this.path;
  }

  /**
   * Run fn in a transaction. Nested calls become savepoints, so an inner
   * failure rolls back only the inner work.
   */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  // ==================== SOURCE FILE OPERATIONS ====================

  insertSourceFile(file: NewSourceFile): SourceFile {
    return fileOps.insertSourceFile(this.db, file, () => {
      updateMetadataModified(this.db);
    });
  }

  getSourceFile(id: string): SourceFile | null {
    return fileOps.getSourceFile(this.db, id);
  }

  listSourceFiles(options?: ListSourceFilesOptions): SourceFile[] {
    return fileOps.listSourceFiles(this.db, options);
  }

  beginProcessing(id: string, targetTable: string | null, startedAt: string): void {
    fileOps.beginProcessing(this.db, id, targetTable, startedAt, () => {
      updateMetadataModified(this.db);
    });
  }

  setRowCount(id: string, rowCount: number): void {
    fileOps.setRowCount(this.db, id, rowCount);
  }

  setTargetTable(id: string, targetTable: string): void {
    fileOps.setTargetTable(this.db, id, targetTable);
  }

  updateProgress(id: string, rowsLoaded: number, rowsRejected: number): void {
    fileOps.updateProgress(this.db, id, rowsLoaded, rowsRejected);
  }

  finishProcessing(
    id: string,
    status: 'completed' | 'failed',
    errorMessage: string | null,
    processedAt: string
  ): void {
    fileOps.finishProcessing(this.db, id, status, errorMessage, processedAt, () => {
      updateMetadataModified(this.db);
    });
  }

  findStaleProcessing(startedBefore: string): SourceFile[] {
    return fileOps.findStaleProcessing(this.db, startedBefore);
  }

  // ==================== VALIDATION ERROR OPERATIONS ====================

  insertValidationErrors(records: readonly ValidationErrorRecord[]): number {
    return errorOps.insertValidationErrors(this.db, records);
  }

  getValidationErrors(
    sourceFileId: string,
    options?: ListValidationErrorsOptions
  ): ValidationErrorRecord[] {
    return errorOps.getValidationErrors(this.db, sourceFileId, options);
  }

  countValidationErrors(sourceFileId: string, kind?: ValidationErrorKind): number {
    return errorOps.countValidationErrors(this.db, sourceFileId, kind);
  }

  // ==================== LOAD RESULT OPERATIONS ====================

  insertLoadResult(result: LoadResult): void {
    resultOps.insertLoadResult(this.db, result);
  }

  getLoadResult(sourceFileId: string): LoadResult | null {
    return resultOps.getLoadResult(this.db, sourceFileId);
  }

  // ==================== TARGET TABLE OPERATIONS ====================

  ensureTargetTable(config: TableConfig): void {
    targetOps.ensureTargetTable(this.db, config);
  }

  insertTargetRows(
    config: TableConfig,
    sourceFileId: string,
    rows: readonly TargetRow[],
    loadedAt: string
  ): number {
    return targetOps.insertTargetRows(this.db, config, sourceFileId, rows, loadedAt);
  }

  countTargetRows(table: string, sourceFileId?: string): number {
    return targetOps.countTargetRows(this.db, table, sourceFileId);
  }

  // ==================== RESTART ====================

  /**
   * Delete everything an earlier run of a file wrote: its error ledger, its
   * load result and its rows in the given target tables. Atomic.
   */
  clearRunOutputs(
    sourceFileId: string,
    tables: readonly string[]
  ): { errors: number; loadResults: number; rows: number } {
    return this.transaction(() => {
      const errors = errorOps.deleteValidationErrorsByFile(this.db, sourceFileId);
      const loadResults = resultOps.deleteLoadResultByFile(this.db, sourceFileId);
      let rows = 0;
      for (const table of new Set(tables)) {
        rows += targetOps.purgeTargetRows(this.db, table, sourceFileId);
      }
      return { errors, loadResults, rows };
    });
  }
}
