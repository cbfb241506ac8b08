/**
 * Pipeline Orchestrator
 *
 * Complete run: SourceFile -> scan -> validate -> load -> LoadResult -> status
 *
 * A run claims its file (uploaded|failed -> processing) before the first row
 * is parsed, clears whatever an earlier run of the same file wrote, and then
 * streams rows through the validator into the batch loader. Work is committed
 * at checkpoints: whenever the loader's batch is full, the error buffer
 * reaches the batch size, or the input ends. One checkpoint is one
 * transaction holding the batch, the errors of the rows it covers (in row
 * order) and the running counters, so a fatal error or cancellation never
 * leaves half a checkpoint behind.
 *
 * @module services/pipeline/orchestrator
 */

import * as fs from 'fs';
import * as path from 'path';
import { setImmediate as yieldToEventLoop } from 'timers/promises';
import { v4 as uuidv4 } from 'uuid';
import type { SourceFile, SourceFileType } from '../../models/source-file.js';
import { isSupportedFileType } from '../../models/source-file.js';
import type { LoadResult } from '../../models/load-result.js';
import type { TableConfig } from '../../models/table-config.js';
import { toErrorRecord, type ValidationErrorRecord } from '../../models/validation-error.js';
import type { ValidationErrorKind } from '../../models/validation-rule.js';
import { hashFile } from '../../utils/hash.js';
import {
  InputValidationError,
  ListSourceFilesInput,
  ListValidationErrorsInput,
  ProcessFilesInput,
  validateInput,
} from '../../utils/validation.js';
import type { IngestSettings } from '../../utils/config.js';
import {
  DatabaseError,
  DatabaseErrorCode,
  type DatabaseService,
  type DatabaseStats,
} from '../storage/index.js';
import { validateRow } from '../rules/index.js';
import {
  FatalParseError,
  createRowSource,
  fileSource,
  type ByteSource,
  type ParseWarning,
} from '../parsing/index.js';
import { BatchLoader } from '../loading/index.js';
import { PipelineError, RunCancelledError, type PipelineErrorCategory } from './errors.js';

export type PipelineSettings = Pick<
  IngestSettings,
  'maxConcurrentRuns' | 'maxIsolationRetries' | 'rowByRowThreshold' | 'maxFileSizeMb' | 'staleRunMinutes'
>;

export const DEFAULT_PIPELINE_SETTINGS: PipelineSettings = {
  maxConcurrentRuns: 3,
  maxIsolationRetries: 5,
  rowByRowThreshold: 8,
  maxFileSizeMb: 100,
  staleRunMinutes: 30,
};

export interface RegisterOptions {
  /** Declared type; taken from the file extension when absent */
  fileType?: SourceFileType;
}

export interface ProcessOptions {
  /** Bytes to read instead of the stored file_path */
  source?: ByteSource;
}

export interface RunProgress {
  run_id: string;
  source_file_id: string;
  /** Null until a resolver has picked the table */
  target_table: string | null;
  /** Null until the scan has counted the rows */
  row_count: number | null;
  /** Committed counters */
  rows_attempted: number;
  rows_loaded: number;
  rows_rejected: number;
  batches_committed: number;
  started_at: string;
  cancel_requested: boolean;
}

export interface RunSummary {
  run_id: string;
  source_file_id: string;
  target_table: string | null;
  status: 'completed' | 'failed';
  row_count: number | null;
  rows_attempted: number;
  rows_loaded: number;
  rows_rejected: number;
  batches_committed: number;
  duration_ms: number;
  warnings: ParseWarning[];
  error: { category: PipelineErrorCategory; message: string } | null;
  /** Null when the run failed before any row was processed */
  load_result: LoadResult | null;
}

export interface FileRunOutcome {
  source_file_id: string;
  success: boolean;
  summary: RunSummary | null;
  error: string | null;
}

export interface BatchRunResult {
  completed: number;
  failed: number;
  total_duration_ms: number;
  results: FileRunOutcome[];
}

/**
 * Picks the table configuration for a file once its headers are known.
 * Called inside the run, so a failure here fails the run.
 */
export type ConfigResolver = (file: SourceFile, headers: readonly string[]) => TableConfig;

interface ActiveRun {
  controller: AbortController;
  progress: RunProgress;
}

/** Checkpoint state that has not been committed yet */
interface PendingWork {
  errors: ValidationErrorRecord[];
  rejectedRows: number;
}

export class PipelineOrchestrator {
  private readonly settings: PipelineSettings;
  private readonly active = new Map<string, ActiveRun>();

  constructor(
    private readonly store: DatabaseService,
    settings: Partial<PipelineSettings> = {}
  ) {
    this.settings = { ...DEFAULT_PIPELINE_SETTINGS, ...settings };
  }

  // ==================== SOURCE FILES ====================

  /**
   * Register an upload: status 'uploaded', content hash, declared type.
   *
   * @throws InputValidationError for a missing, unsupported or oversized file
   */
  async registerSourceFile(filePath: string, options: RegisterOptions = {}): Promise<SourceFile> {
    const absolute = path.resolve(filePath);

    let stats: fs.Stats;
    try {
      stats = await fs.promises.stat(absolute);
    } catch (error) {
      throw new InputValidationError(
        `Cannot read source file ${absolute}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
    if (!stats.isFile()) {
      throw new InputValidationError(`Source path is not a file: ${absolute}`);
    }

    const fileType = options.fileType ?? path.extname(absolute).slice(1).toLowerCase();
    if (!isSupportedFileType(fileType)) {
      throw new InputValidationError(
        `Unsupported file type "${fileType}" for ${path.basename(absolute)}: expected csv or json`
      );
    }

    const maxBytes = this.settings.maxFileSizeMb * 1024 * 1024;
    if (stats.size > maxBytes) {
      throw new InputValidationError(
        `${path.basename(absolute)} is ${String(stats.size)} bytes; the limit is ${String(this.settings.maxFileSizeMb)} MB`
      );
    }

    return this.store.insertSourceFile({
      id: uuidv4(),
      file_path: absolute,
      file_name: path.basename(absolute),
      file_type: fileType,
      file_size: stats.size,
      file_hash: await hashFile(absolute),
    });
  }

  getSourceFile(id: string): SourceFile | null {
    return this.store.getSourceFile(id);
  }

  listSourceFiles(options: unknown = {}): SourceFile[] {
    return this.store.listSourceFiles(validateInput(ListSourceFilesInput, options));
  }

  // ==================== RUNS ====================

  /**
   * Run one file through the pipeline.
   *
   * A fatal parse error, fatal store error, resolver failure or cancellation
   * ends the run as 'failed' and is reported in the summary rather than
   * thrown.
   *
   * @throws DatabaseError when the file is unknown or cannot start a run
   * @throws PipelineError when the failure itself cannot be recorded
   */
  async processFile(
    fileId: string,
    config: TableConfig | ConfigResolver,
    options: ProcessOptions = {}
  ): Promise<RunSummary> {
    const file = this.store.getSourceFile(fileId);
    if (!file) {
      throw new DatabaseError(`Source file "${fileId}" not found`, DatabaseErrorCode.SOURCE_FILE_NOT_FOUND);
    }
    if (this.active.has(fileId)) {
      throw new DatabaseError(
        `Source file "${fileId}" already has an active run`,
        DatabaseErrorCode.INVALID_STATUS_TRANSITION
      );
    }

    const startTime = Date.now();
    const startedAt = new Date(startTime).toISOString();
    const previousTable = file.target_table;
    const fixed = typeof config === 'function' ? null : config;
    this.store.beginProcessing(fileId, fixed?.table ?? null, startedAt);

    const run: ActiveRun = {
      controller: new AbortController(),
      progress: {
        run_id: uuidv4(),
        source_file_id: fileId,
        target_table: fixed?.table ?? null,
        row_count: null,
        rows_attempted: 0,
        rows_loaded: 0,
        rows_rejected: 0,
        batches_committed: 0,
        started_at: startedAt,
        cancel_requested: false,
      },
    };
    this.active.set(fileId, run);
    console.error(
      `[Pipeline] Run ${run.progress.run_id} started: ${file.file_name} -> ${fixed?.table ?? '(from headers)'}`
    );

    let warnings: ParseWarning[] = [];
    let table: TableConfig | null = null;
    let loading = false;
    try {
      const cleared = this.store.clearRunOutputs(
        fileId,
        [previousTable, fixed?.table].filter((t): t is string => typeof t === 'string')
      );
      if (cleared.errors + cleared.loadResults + cleared.rows > 0) {
        console.error(
          `[Pipeline] Cleared earlier run of ${fileId}: ${String(cleared.rows)} rows, ${String(cleared.errors)} errors`
        );
      }

      const source = options.source ?? fileSource(file.file_path);
      let rowSource = createRowSource(source, file.file_type, { delimiter: fixed?.delimiter });
      let scan = await rowSource.scan();

      if (typeof config === 'function') {
        table = config(file, scan.headers);
        console.error(`[Pipeline] Resolved table ${table.table} for ${file.file_name}`);
        this.store.setTargetTable(fileId, table.table);
        run.progress.target_table = table.table;
        if (table.table !== previousTable) {
          this.store.clearRunOutputs(fileId, [table.table]);
        }
        if (file.file_type === 'csv' && table.delimiter !== undefined && table.delimiter !== scan.delimiter) {
          rowSource = createRowSource(source, file.file_type, { delimiter: table.delimiter });
          scan = await rowSource.scan();
        }
      } else {
        table = config;
      }
      this.store.ensureTargetTable(table);

      warnings = scan.warnings;
      for (const warning of warnings) {
        console.error(`[Parser] ${file.file_name}: ${warning.message}`);
      }
      this.store.setRowCount(fileId, scan.row_count);
      run.progress.row_count = scan.row_count;

      loading = true;
      const loader = new BatchLoader(table, fileId, {
        maxIsolationRetries: this.settings.maxIsolationRetries,
        rowByRowThreshold: this.settings.rowByRowThreshold,
      });
      const pending: PendingWork = { errors: [], rejectedRows: 0 };

      for await (const row of rowSource.rows()) {
        const failures = validateRow(row, table.rules);
        if (failures.length > 0) {
          const createdAt = new Date().toISOString();
          for (const failure of failures) {
            pending.errors.push(
              toErrorRecord(failure, uuidv4(), fileId, run.progress.run_id, row.row_number, createdAt)
            );
          }
          pending.rejectedRows += 1;
        } else {
          loader.add(row);
        }

        if (loader.isFull() || pending.errors.length >= table.batch_size) {
          this.checkpoint(run, loader, pending);
          await yieldToEventLoop();
        }
      }
      this.checkpoint(run, loader, pending);

      const loadResult = this.buildLoadResult(run, table.table, 'completed', null, startTime);
      this.store.transaction(() => {
        this.store.insertLoadResult(loadResult);
        this.store.finishProcessing(fileId, 'completed', null, loadResult.completed_at);
      });
      console.error(
        `[Pipeline] Run ${run.progress.run_id} completed: ${String(loadResult.rows_loaded)} loaded, ${String(loadResult.rows_rejected)} rejected in ${String(loadResult.duration_ms)}ms`
      );
      return this.summarize(run, 'completed', warnings, null, loadResult);
    } catch (error) {
      const failure = PipelineError.fromUnknown(error);
      // A parse failure happens before any row is processed: no LoadResult
      const loadResult =
        loading && table !== null && !(error instanceof FatalParseError)
          ? this.buildLoadResult(run, table.table, 'failed', failure.message, startTime)
          : null;
      this.recordFailure(fileId, failure, loadResult);
      console.error(`[Pipeline] Run ${run.progress.run_id} failed (${failure.category}): ${failure.message}`);
      return this.summarize(run, 'failed', warnings, failure, loadResult);
    } finally {
      this.active.delete(fileId);
    }
  }

  /**
   * Run several files, at most `maxConcurrent` at a time. One file's failure
   * does not stop the others.
   */
  async processFiles(
    fileIds: string[],
    config: TableConfig | ConfigResolver,
    options: { maxConcurrent?: number } = {}
  ): Promise<BatchRunResult> {
    const input = validateInput(ProcessFilesInput, {
      file_ids: fileIds,
      max_concurrent: options.maxConcurrent,
    });
    const maxConcurrent = input.max_concurrent ?? this.settings.maxConcurrentRuns;
    const startTime = Date.now();
    const results: FileRunOutcome[] = [];

    for (let i = 0; i < input.file_ids.length; i += maxConcurrent) {
      const slice = input.file_ids.slice(i, i + maxConcurrent);
      const sliceResults = await Promise.all(slice.map((id) => this.runOne(id, config)));
      results.push(...sliceResults);
    }

    const completed = results.filter((r) => r.success).length;
    return {
      completed,
      failed: results.length - completed,
      total_duration_ms: Date.now() - startTime,
      results,
    };
  }

  /**
   * Request cancellation of an active run. Takes effect at the next
   * checkpoint; work committed before it stays.
   *
   * @returns false when the file has no active run
   */
  cancel(fileId: string, reason = 'Run cancelled'): boolean {
    const run = this.active.get(fileId);
    if (!run) return false;
    run.progress.cancel_requested = true;
    run.controller.abort(reason);
    return true;
  }

  getRunProgress(fileId: string): RunProgress | null {
    const run = this.active.get(fileId);
    return run ? { ...run.progress } : null;
  }

  /**
   * Mark runs left in 'processing' longer than the stale threshold as failed,
   * which makes them eligible for restart. Runs active in this process are
   * left alone.
   *
   * @returns ids of the recovered files
   */
  recoverStaleRuns(now: Date = new Date()): string[] {
    const cutoff = new Date(now.getTime() - this.settings.staleRunMinutes * 60_000).toISOString();
    const recovered: string[] = [];

    for (const file of this.store.findStaleProcessing(cutoff)) {
      if (this.active.has(file.id)) continue;
      console.error(
        `[Pipeline] Recovering stale run of ${file.id} (processing since ${file.processing_started_at ?? 'unknown'})`
      );
      this.store.finishProcessing(
        file.id,
        'failed',
        `Run abandoned: processing since ${file.processing_started_at ?? 'unknown'}`,
        now.toISOString()
      );
      recovered.push(file.id);
    }

    if (recovered.length > 0) {
      console.error(`[Pipeline] Recovered ${String(recovered.length)} stale run(s)`);
    }
    return recovered;
  }

  // ==================== QUERIES ====================

  getValidationErrors(fileId: string, options: unknown = {}): ValidationErrorRecord[] {
    return this.store.getValidationErrors(fileId, validateInput(ListValidationErrorsInput, options));
  }

  countValidationErrors(fileId: string, kind?: ValidationErrorKind): number {
    return this.store.countValidationErrors(fileId, kind);
  }

  getLoadResult(fileId: string): LoadResult | null {
    return this.store.getLoadResult(fileId);
  }

  getStats(): DatabaseStats {
    return this.store.getStats();
  }

  // ==================== INTERNALS ====================

  private async runOne(fileId: string, config: TableConfig | ConfigResolver): Promise<FileRunOutcome> {
    try {
      const summary = await this.processFile(fileId, config);
      return {
        source_file_id: fileId,
        success: summary.status === 'completed',
        summary,
        error: summary.error?.message ?? null,
      };
    } catch (error) {
      return {
        source_file_id: fileId,
        success: false,
        summary: null,
        error: error instanceof Error ? error.message : String(error),
      };
    }
  }

  /**
   * Commit the loader's batch and the buffered errors in one transaction.
   *
   * @throws RunCancelledError when cancellation has been requested
   * @throws FatalStoreError from the loader; nothing of this checkpoint is kept
   */
  private checkpoint(run: ActiveRun, loader: BatchLoader, pending: PendingWork): void {
    const { signal } = run.controller;
    if (signal.aborted) {
      throw new RunCancelledError(
        run.progress.source_file_id,
        typeof signal.reason === 'string' ? signal.reason : 'Run cancelled'
      );
    }
    if (loader.size === 0 && pending.errors.length === 0) return;

    const fileId = run.progress.source_file_id;
    const committed = this.store.transaction(() => {
      const flush = loader.flush(this.store);
      const createdAt = new Date().toISOString();
      const records = [
        ...pending.errors,
        ...flush.duplicates.map((d) =>
          toErrorRecord(d.failure, uuidv4(), fileId, run.progress.run_id, d.row_number, createdAt)
        ),
      ].sort((a, b) => a.row_number - b.row_number);
      this.store.insertValidationErrors(records);

      const loaded = run.progress.rows_loaded + flush.loaded;
      const rejected = run.progress.rows_rejected + pending.rejectedRows + flush.duplicates.length;
      this.store.updateProgress(fileId, loaded, rejected);
      return { loaded, rejected };
    });

    run.progress.rows_loaded = committed.loaded;
    run.progress.rows_rejected = committed.rejected;
    run.progress.rows_attempted = committed.loaded + committed.rejected;
    run.progress.batches_committed += 1;
    pending.errors = [];
    pending.rejectedRows = 0;
  }

  private buildLoadResult(
    run: ActiveRun,
    targetTable: string,
    status: LoadResult['status'],
    failureReason: string | null,
    startTime: number
  ): LoadResult {
    const completedAt = Date.now();
    return {
      run_id: run.progress.run_id,
      source_file_id: run.progress.source_file_id,
      target_table: targetTable,
      rows_attempted: run.progress.rows_loaded + run.progress.rows_rejected,
      rows_loaded: run.progress.rows_loaded,
      rows_rejected: run.progress.rows_rejected,
      status,
      failure_reason: failureReason,
      batches_committed: run.progress.batches_committed,
      started_at: run.progress.started_at,
      completed_at: new Date(completedAt).toISOString(),
      duration_ms: completedAt - startTime,
    };
  }

  private recordFailure(fileId: string, failure: PipelineError, loadResult: LoadResult | null): void {
    try {
      this.store.transaction(() => {
        if (loadResult) this.store.insertLoadResult(loadResult);
        this.store.finishProcessing(fileId, 'failed', failure.message, new Date().toISOString());
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[Pipeline] Could not record failure of ${fileId}: ${message}`);
      throw new PipelineError('STORE_ERROR', `Could not record failure of ${fileId}: ${message}`, {
        runFailure: failure.message,
      });
    }
  }

  private summarize(
    run: ActiveRun,
    status: RunSummary['status'],
    warnings: ParseWarning[],
    failure: PipelineError | null,
    loadResult: LoadResult | null
  ): RunSummary {
    return {
      run_id: run.progress.run_id,
      source_file_id: run.progress.source_file_id,
      target_table: run.progress.target_table,
      status,
      row_count: run.progress.row_count,
      rows_attempted: run.progress.rows_loaded + run.progress.rows_rejected,
      rows_loaded: run.progress.rows_loaded,
      rows_rejected: run.progress.rows_rejected,
      batches_committed: run.progress.batches_committed,
      duration_ms: loadResult?.duration_ms ?? Date.now() - Date.parse(run.progress.started_at),
      warnings,
      error: failure ? { category: failure.category, message: failure.message } : null,
      load_result: loadResult,
    };
  }
}

