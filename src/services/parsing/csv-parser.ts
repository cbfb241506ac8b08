/**
 * CSV row parser on csv-parse
 *
 * The first record is the header. Each later record is one Row, numbered from
 * 1 in file order; blank lines are skipped and consume no number. A record
 * shorter than the header leaves the missing fields absent (null). A longer
 * one has its extra fields dropped with a warning.
 *
 * @module services/parsing/csv-parser
 */

import { parse, CsvError } from 'csv-parse';
import { Readable } from 'stream';
import type { FieldValue, Row } from '../../models/row.js';
import type { ByteSource } from './byte-source.js';
import { FatalParseError, type ParseWarning } from './errors.js';

/**
 * Filled in as a pass runs
 */
export interface ParseContext {
  headers: string[];
  warnings: ParseWarning[];
}

function toStringArray(record: unknown): string[] {
  if (!Array.isArray(record)) {
    throw new FatalParseError('CSV parser produced a non-array record', 'MALFORMED_CSV');
  }
  return record.map((v: unknown) => (typeof v === 'string' ? v : String(v)));
}

function readHeader(values: string[]): string[] {
  const headers = values.map((v) => v.trim());
  const seen = new Set<string>();
  headers.forEach((name, i) => {
    if (name === '') {
      throw new FatalParseError(`CSV header column ${String(i + 1)} is empty`, 'EMPTY_HEADER');
    }
    if (seen.has(name)) {
      throw new FatalParseError(`CSV header repeats column "${name}"`, 'DUPLICATE_HEADER');
    }
    seen.add(name);
  });
  return headers;
}

function toRow(
  rowNumber: number,
  headers: readonly string[],
  values: readonly string[],
  context: ParseContext
): Row {
  if (values.length > headers.length) {
    context.warnings.push({
      row_number: rowNumber,
      message: `Row ${String(rowNumber)} has ${String(values.length)} fields, expected ${String(headers.length)}; extra fields dropped`,
    });
  }
  const fields = Object.fromEntries(
    headers.map((name, i): [string, FieldValue] => [name, values[i] ?? null])
  );
  return { row_number: rowNumber, fields };
}

function toFatal(error: unknown, sourceName: string, nextRow: number): FatalParseError {
  if (error instanceof FatalParseError) return error;
  if (error instanceof CsvError) {
    return new FatalParseError(
      `Malformed CSV in ${sourceName} at data row ${String(nextRow)}: ${error.message}`,
      'MALFORMED_CSV',
      nextRow,
      error
    );
  }
  return new FatalParseError(
    `Failed to read ${sourceName}: ${error instanceof Error ? error.message : String(error)}`,
    'READ_FAILED',
    undefined,
    error
  );
}

/**
 * Stream rows from a CSV source. One call is one pass over the input.
 *
 * @throws FatalParseError on malformed quoting, a missing, empty or repeated
 * header name, or a read failure
 */
export async function* parseCsvRows(
  source: ByteSource,
  delimiter: string,
  context: ParseContext
): AsyncGenerator<Row> {
  const parser = parse({
    delimiter,
    bom: true,
    relax_column_count: true,
    skip_empty_lines: true,
  });
  const input = Readable.from(source.open());
  input.on('error', (error: Error) => parser.destroy(error));
  input.pipe(parser);

  let headers: string[] | null = null;
  let rowNumber = 0;

  try {
    for await (const record of parser) {
      const values = toStringArray(record);
      if (headers === null) {
        headers = readHeader(values);
        context.headers = headers;
        continue;
      }
      rowNumber += 1;
      yield toRow(rowNumber, headers, values, context);
    }
  } catch (error) {
    throw toFatal(error, source.name, rowNumber + 1);
  } finally {
    input.destroy();
  }

  if (headers === null) {
    throw new FatalParseError(`CSV input ${source.name} has no header row`, 'MISSING_HEADER');
  }
}
