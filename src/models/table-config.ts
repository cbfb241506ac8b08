/**
 * Target table configuration
 *
 * Parsed and compiled from JSON by utils/validation.ts.
 */

import type { ValidationRule } from './validation-rule.js';

export type ColumnType = 'TEXT' | 'INTEGER' | 'REAL';

export interface ColumnMapping {
  /** Target column name */
  column: string;
  /** Source field name */
  field: string;
  type: ColumnType;
}

export interface TableConfig {
  /** Target table name */
  table: string;
  /** Maximum rows per bulk insert */
  batch_size: number;
  /** Ordered; order is the order errors are reported within a row */
  rules: ValidationRule[];
  columns: ColumnMapping[];
  /** CSV delimiter; detected from the file when absent */
  delimiter?: string;
}

/** Columns every target table carries for provenance */
export const PROVENANCE_COLUMNS = ['id', 'source_file_id', 'source_row_number', 'loaded_at'] as const;

/**
 * Source fields the configuration refers to, in first-seen order
 */
export function configuredFields(config: TableConfig): string[] {
  const seen = new Set<string>();
  for (const c of config.columns) seen.add(c.field);
  for (const r of config.rules) seen.add(r.field);
  return [...seen];
}

/**
 * Column a source field loads into, if any
 */
export function columnForField(config: TableConfig, field: string): string | null {
  return config.columns.find((c) => c.field === field)?.column ?? null;
}

/**
 * Source field loaded into a column, if any
 */
export function fieldForColumn(config: TableConfig, column: string): string | null {
  return config.columns.find((c) => c.column.toLowerCase() === column.toLowerCase())?.field ?? null;
}
