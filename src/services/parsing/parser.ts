/**
 * File Parser - restartable row sources over CSV and JSON input
 *
 * A RowSource is lazy: nothing is read until it is scanned or iterated, and
 * every iteration is a fresh pass from the first byte. `scan()` makes one
 * full pass without handing out rows, so a caller can reject a file with
 * broken framing before it has processed any of it.
 *
 * @module services/parsing/parser
 */

import type { Row } from '../../models/row.js';
import type { SourceFileType } from '../../models/source-file.js';
import { readPrefix, type ByteSource } from './byte-source.js';
import { parseCsvRows, type ParseContext } from './csv-parser.js';
import { parseJsonRows } from './json-parser.js';
import { DELIMITER_SAMPLE_BYTES, detectDelimiter } from './delimiter.js';
import type { ParseWarning } from './errors.js';

export interface ScanResult {
  row_count: number;
  headers: string[];
  /** CSV only */
  delimiter: string | null;
  warnings: ParseWarning[];
}

export interface RowSourceOptions {
  /** CSV delimiter; detected from the input when absent */
  delimiter?: string;
}

export class RowSource implements AsyncIterable<Row> {
  private resolvedDelimiter: string | null;
  private scanResult: ScanResult | null = null;

  constructor(
    readonly source: ByteSource,
    readonly fileType: SourceFileType,
    options: RowSourceOptions = {}
  ) {
    this.resolvedDelimiter = options.delimiter ?? null;
  }

  /**
   * Delimiter used for CSV passes; null for JSON
   */
  async delimiter(): Promise<string | null> {
    if (this.fileType !== 'csv') return null;
    if (this.resolvedDelimiter === null) {
      this.resolvedDelimiter = detectDelimiter(await readPrefix(this.source, DELIMITER_SAMPLE_BYTES));
    }
    return this.resolvedDelimiter;
  }

  /**
   * One full pass: verifies framing, counts rows and collects warnings.
   * The result is cached.
   *
   * @throws FatalParseError
   */
  async scan(): Promise<ScanResult> {
    if (this.scanResult) return this.scanResult;

    const context: ParseContext = { headers: [], warnings: [] };
    let rowCount = 0;
    for await (const _row of this.pass(context)) {
      rowCount += 1;
    }

    this.scanResult = {
      row_count: rowCount,
      headers: context.headers,
      delimiter: await this.delimiter(),
      warnings: context.warnings,
    };
    return this.scanResult;
  }

  /**
   * A fresh pass over the input
   */
  async *rows(context: ParseContext = { headers: [], warnings: [] }): AsyncGenerator<Row> {
    yield* this.pass(context);
  }

  [Symbol.asyncIterator](): AsyncIterator<Row> {
    return this.rows();
  }

  private async *pass(context: ParseContext): AsyncGenerator<Row> {
    if (this.fileType === 'json') {
      yield* parseJsonRows(this.source, context);
      return;
    }
    const delimiter = await this.delimiter();
    yield* parseCsvRows(this.source, delimiter ?? ',', context);
  }
}

export function createRowSource(
  source: ByteSource,
  fileType: SourceFileType,
  options?: RowSourceOptions
): RowSource {
  return new RowSource(source, fileType, options);
}
