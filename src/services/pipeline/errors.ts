/**
 * Pipeline error classification
 *
 * Every failure a run can end in is reduced to a PipelineError with a
 * category, so callers and the CLI can tell failure modes apart without
 * matching on messages.
 *
 * @module services/pipeline/errors
 */

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

export type PipelineErrorCategory =
  | 'PARSE_ERROR'
  | 'STORE_ERROR'
  | 'CANCELLED'
  | 'VALIDATION_ERROR'
  | 'DATABASE_ERROR'
  | 'SOURCE_FILE_NOT_FOUND'
  | 'INVALID_STATUS_TRANSITION'
  | 'CONFIGURATION_ERROR'
  | 'INTERNAL_ERROR';

const VALID_CATEGORIES: ReadonlySet<string> = new Set<PipelineErrorCategory>([
  'PARSE_ERROR',
  'STORE_ERROR',
  'CANCELLED',
  'VALIDATION_ERROR',
  'DATABASE_ERROR',
  'SOURCE_FILE_NOT_FOUND',
  'INVALID_STATUS_TRANSITION',
  'CONFIGURATION_ERROR',
  'INTERNAL_ERROR',
]);

export function isValidCategory(value: string): value is PipelineErrorCategory {
  return VALID_CATEGORIES.has(value);
}

/**
 * Error class name -> category
 */
const ERROR_NAME_TO_CATEGORY: Record<string, PipelineErrorCategory> = {
  FatalParseError: 'PARSE_ERROR',
  FatalStoreError: 'STORE_ERROR',
  RunCancelledError: 'CANCELLED',
  InputValidationError: 'VALIDATION_ERROR',
  ZodError: 'VALIDATION_ERROR',
  DatabaseError: 'DATABASE_ERROR',
  MigrationError: 'DATABASE_ERROR',
  UniqueConstraintViolation: 'DATABASE_ERROR',
};

/**
 * DatabaseError codes that deserve their own category
 */
const DATABASE_CODE_TO_CATEGORY: Record<string, PipelineErrorCategory> = {
  SOURCE_FILE_NOT_FOUND: 'SOURCE_FILE_NOT_FOUND',
  INVALID_STATUS_TRANSITION: 'INVALID_STATUS_TRANSITION',
  TARGET_TABLE_MISMATCH: 'CONFIGURATION_ERROR',
  INVALID_IDENTIFIER: 'CONFIGURATION_ERROR',
};

function readCode(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CLASSES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * A run was stopped by a cancellation request. Batches committed before the
 * request stay committed.
 */
export class RunCancelledError extends Error {
  constructor(
    public readonly sourceFileId: string,
    public readonly reason: string = 'Run cancelled'
  ) {
    super(reason);
    this.name = 'RunCancelledError';
  }
}

export class PipelineError extends Error {
  public readonly category: PipelineErrorCategory;
  public readonly details?: Record<string, unknown>;

  constructor(category: PipelineErrorCategory, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'PipelineError';
    this.category = category;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PipelineError);
    }
  }

  /**
   * Classify a caught value
   */
  static fromUnknown(
    error: unknown,
    defaultCategory: PipelineErrorCategory = 'INTERNAL_ERROR'
  ): PipelineError {
    if (error instanceof PipelineError) {
      return error;
    }

    if (error instanceof Error) {
      const code = readCode(error);
      const byCode =
        error.name === 'DatabaseError' && code !== undefined ? DATABASE_CODE_TO_CATEGORY[code] : undefined;
      const category = byCode ?? ERROR_NAME_TO_CATEGORY[error.name] ?? defaultCategory;

      return new PipelineError(category, error.message, {
        originalName: error.name,
        ...(code && { errorCode: code }),
      });
    }

    return new PipelineError(defaultCategory, String(error), {
      originalValue: error,
    });
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      message: this.message,
      details: this.details,
    };
  }
}
