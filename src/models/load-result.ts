/**
 * LoadResult - the summary written once per run.
 *
 * Invariant at completion: rows_attempted === rows_loaded + rows_rejected.
 */

export type LoadResultStatus = 'completed' | 'failed';

export interface LoadResult {
  /** Run identifier (UUID v4) */
  run_id: string;
  source_file_id: string;
  target_table: string;
  rows_attempted: number;
  rows_loaded: number;
  rows_rejected: number;
  status: LoadResultStatus;
  /** Fatal error or cancellation reason; null when completed */
  failure_reason: string | null;
  batches_committed: number;
  started_at: string;
  completed_at: string;
  duration_ms: number;
}
