/**
 * Dry-run validation over the head of a file. Nothing is written.
 *
 * @module services/pipeline/preview
 */

import type { SourceFileType } from '../../models/source-file.js';
import type { TableConfig } from '../../models/table-config.js';
import type { RuleFailure } from '../../models/validation-error.js';
import { PreviewInput, validateInput } from '../../utils/validation.js';
import { validateRow } from '../rules/index.js';
import { createRowSource, type ByteSource } from '../parsing/index.js';

/** Errors returned with a preview */
export const PREVIEW_ERROR_LIMIT = 10;

export interface PreviewError extends RuleFailure {
  row_number: number;
}

export interface PreviewResult {
  sample_size: number;
  valid_rows: number;
  error_rows: number;
  /** Percentage of sampled rows with at least one error */
  error_rate: number;
  sample_errors: PreviewError[];
}

/**
 * Validate up to `sampleSize` rows.
 *
 * DUPLICATE rules depend on the target table and are not checked here.
 *
 * @throws FatalParseError when the sampled part of the file is malformed
 */
export async function previewValidation(
  source: ByteSource,
  fileType: SourceFileType,
  config: TableConfig,
  options: { sampleSize?: number } = {}
): Promise<PreviewResult> {
  const { sample_size: limit } = validateInput(PreviewInput, { sample_size: options.sampleSize });
  const rows = createRowSource(source, fileType, { delimiter: config.delimiter });

  let sampled = 0;
  let errorRows = 0;
  const sampleErrors: PreviewError[] = [];

  for await (const row of rows) {
    sampled += 1;

    const failures = validateRow(row, config.rules);
    if (failures.length > 0) {
      errorRows += 1;
      for (const failure of failures.slice(0, PREVIEW_ERROR_LIMIT - sampleErrors.length)) {
        sampleErrors.push({ row_number: row.row_number, ...failure });
      }
    }

    if (sampled >= limit) break;
  }

  return {
    sample_size: sampled,
    valid_rows: sampled - errorRows,
    error_rows: errorRows,
    error_rate: sampled === 0 ? 0 : (errorRows / sampled) * 100,
    sample_errors: sampleErrors,
  };
}
