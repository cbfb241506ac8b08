/**
 * SourceFile interfaces for the ingestion pipeline
 *
 * A SourceFile is one uploaded artifact. It is the provenance root for every
 * loaded record and every validation error produced from it.
 */

/**
 * Lifecycle status of a source file
 */
export const SOURCE_FILE_STATUSES = ['uploaded', 'processing', 'completed', 'failed'] as const;

export type SourceFileStatus = (typeof SOURCE_FILE_STATUSES)[number];

/**
 * Supported declared file types
 */
export const SUPPORTED_FILE_TYPES = ['csv', 'json'] as const;

export type SourceFileType = (typeof SUPPORTED_FILE_TYPES)[number];

/**
 * Allowed status transitions. `failed -> processing` is the restart path;
 * `completed` is terminal.
 */
export const STATUS_TRANSITIONS: Readonly<Record<SourceFileStatus, readonly SourceFileStatus[]>> = {
  uploaded: ['processing'],
  processing: ['completed', 'failed'],
  completed: [],
  failed: ['processing'],
};

export function isSupportedFileType(value: string): value is SourceFileType {
  return SUPPORTED_FILE_TYPES.some((t) => t === value);
}

/**
 * Represents one uploaded file
 */
export interface SourceFile {
  /** UUID v4 identifier */
  id: string;

  /** Absolute path of the stored upload */
  file_path: string;

  /** Original filename */
  file_name: string;

  /** Declared type */
  file_type: SourceFileType;

  /** Size in bytes */
  file_size: number;

  /** SHA-256 of the file content (format: 'sha256:...') */
  file_hash: string;

  status: SourceFileStatus;

  /** Table the latest run loaded into */
  target_table: string | null;

  /** Data rows found by the parser; set once framing has been verified */
  row_count: number | null;

  /** Running counters, updated at every batch boundary */
  rows_loaded: number;
  rows_rejected: number;

  /** Set on fatal failure */
  error_message: string | null;

  /** ISO 8601 */
  uploaded_at: string;
  processing_started_at: string | null;
  processed_at: string | null;
}
