/**
 * Batch Loader
 *
 * Accumulates accepted rows and bulk inserts them into the target table,
 * tagging each record with its source file and source row number.
 *
 * A unique-key violation never aborts a batch. The offending row is taken
 * out as a DUPLICATE error and the remainder is retried without it. After
 * `maxIsolationRetries` exclusions, or once the remainder is down to
 * `rowByRowThreshold` rows, the remainder is inserted one row at a time.
 * Any other store error is fatal.
 *
 * The loader holds no connection: the store is passed to every flush.
 *
 * @module services/loading/batch-loader
 */

import { getField, type Row } from '../../models/row.js';
import type { RuleFailure } from '../../models/validation-error.js';
import { fieldForColumn, type TableConfig } from '../../models/table-config.js';
import {
  UniqueConstraintViolation,
  coerceValue,
  type DatabaseService,
  type TargetRow,
} from '../storage/index.js';
import { FatalStoreError } from './errors.js';

export interface BatchLoaderOptions {
  maxIsolationRetries: number;
  rowByRowThreshold: number;
}

export const DEFAULT_BATCH_LOADER_OPTIONS: BatchLoaderOptions = {
  maxIsolationRetries: 5,
  rowByRowThreshold: 8,
};

export interface DuplicateRejection {
  row_number: number;
  failure: RuleFailure;
}

export interface FlushOutcome {
  attempted: number;
  loaded: number;
  /** In ascending row order */
  duplicates: DuplicateRejection[];
  isolation_retries: number;
  row_by_row: boolean;
}

interface PendingRow {
  row: Row;
  target: TargetRow;
}

export class BatchLoader {
  private batch: PendingRow[] = [];
  private readonly options: BatchLoaderOptions;

  constructor(
    private readonly config: TableConfig,
    private readonly sourceFileId: string,
    options: Partial<BatchLoaderOptions> = {}
  ) {
    this.options = { ...DEFAULT_BATCH_LOADER_OPTIONS, ...options };
  }

  get size(): number {
    return this.batch.length;
  }

  isFull(): boolean {
    return this.batch.length >= this.config.batch_size;
  }

  add(row: Row): void {
    this.batch.push({
      row,
      target: {
        source_row_number: row.row_number,
        values: this.config.columns.map((c) => coerceValue(getField(row, c.field), c.type)),
      },
    });
  }

  /**
   * Insert the current batch and start a new one.
   *
   * @throws FatalStoreError on any store error other than a unique-key violation
   */
  flush(store: DatabaseService): FlushOutcome {
    const pending = this.batch;
    this.batch = [];

    const outcome: FlushOutcome = {
      attempted: pending.length,
      loaded: 0,
      duplicates: [],
      isolation_retries: 0,
      row_by_row: false,
    };
    if (pending.length === 0) return outcome;

    const loadedAt = new Date().toISOString();
    let remaining = pending;

    while (remaining.length > 0) {
      if (
        remaining.length <= this.options.rowByRowThreshold ||
        outcome.isolation_retries >= this.options.maxIsolationRetries
      ) {
        outcome.row_by_row = true;
        this.insertRowByRow(store, remaining, loadedAt, outcome);
        break;
      }

      try {
        const rows = remaining.map((p) => p.target);
        store.transaction(() =>
          store.insertTargetRows(this.config, this.sourceFileId, rows, loadedAt)
        );
        outcome.loaded += remaining.length;
        break;
      } catch (error) {
        const offending = error instanceof UniqueConstraintViolation ? remaining[error.index] : undefined;
        if (!(error instanceof UniqueConstraintViolation) || offending === undefined) {
          throw this.toFatal(error);
        }
        outcome.duplicates.push(this.duplicateOf(offending.row, error.column));
        remaining = remaining.filter((p) => p !== offending);
        outcome.isolation_retries += 1;
      }
    }

    if (outcome.row_by_row && outcome.isolation_retries >= this.options.maxIsolationRetries) {
      console.error(
        `[BatchLoader] ${this.config.table}: isolation retry cap (${String(this.options.maxIsolationRetries)}) reached, finished batch row by row`
      );
    }

    outcome.duplicates.sort((a, b) => a.row_number - b.row_number);
    return outcome;
  }

  private insertRowByRow(
    store: DatabaseService,
    rows: readonly PendingRow[],
    loadedAt: string,
    outcome: FlushOutcome
  ): void {
    for (const pending of rows) {
      try {
        store.transaction(() =>
          store.insertTargetRows(this.config, this.sourceFileId, [pending.target], loadedAt)
        );
        outcome.loaded += 1;
      } catch (error) {
        if (!(error instanceof UniqueConstraintViolation)) {
          throw this.toFatal(error);
        }
        outcome.duplicates.push(this.duplicateOf(pending.row, error.column));
      }
    }
  }

  private duplicateOf(row: Row, column: string): DuplicateRejection {
    const field = fieldForColumn(this.config, column) ?? column;
    const value = getField(row, field);
    const rule = this.config.rules.find((r) => r.kind === 'DUPLICATE' && r.field === field);
    return {
      row_number: row.row_number,
      failure: {
        kind: 'DUPLICATE',
        message: rule?.message ?? `Duplicate value for ${field}: ${value ?? ''}`,
        field_name: field,
        field_value: value,
      },
    };
  }

  private toFatal(error: unknown): FatalStoreError {
    if (error instanceof FatalStoreError) return error;
    return new FatalStoreError(
      `Store failure loading into ${this.config.table}: ${error instanceof Error ? error.message : String(error)}`,
      error
    );
  }
}
