/**
 * CSV parsing tests
 *
 * @see src/services/parsing/csv-parser.ts
 * @see src/services/parsing/parser.ts
 */

import { describe, it, expect } from 'vitest';
import {
  FatalParseError,
  bufferSource,
  createRowSource,
  type RowSource,
} from '../../../src/services/parsing/index.js';
import type { Row } from '../../../src/models/row.js';

function csv(content: string, delimiter?: string): RowSource {
  return createRowSource(bufferSource(content, 'data.csv'), 'csv', delimiter ? { delimiter } : {});
}

async function collect(source: RowSource): Promise<Row[]> {
  const rows: Row[] = [];
  for await (const row of source) rows.push(row);
  return rows;
}

async function parseFailure(source: RowSource): Promise<FatalParseError> {
  try {
    await source.scan();
  } catch (error) {
    if (error instanceof FatalParseError) return error;
    throw error;
  }
  throw new Error('expected a FatalParseError');
}

describe('CSV parsing', () => {
  it('numbers data rows from 1 and keys fields by header', async () => {
    expect(await collect(csv('code,name\nC1,Alice\nC2,Bob\n'))).toEqual([
      { row_number: 1, fields: { code: 'C1', name: 'Alice' } },
      { row_number: 2, fields: { code: 'C2', name: 'Bob' } },
    ]);
  });

  it('strips a UTF-8 byte order mark', async () => {
    const rows = await collect(csv('\uFEFFcode,name\nC1,Alice\n'));
    expect(rows[0]?.fields).toEqual({ code: 'C1', name: 'Alice' });
  });

  it('skips blank lines without consuming row numbers', async () => {
    const rows = await collect(csv('code\nC1\n\n\nC2\n'));
    expect(rows.map((r) => [r.row_number, r.fields.code])).toEqual([
      [1, 'C1'],
      [2, 'C2'],
    ]);
  });

  it('marks fields missing from a short record as absent', async () => {
    const rows = await collect(csv('a,b,c\n1,2\n'));
    expect(rows[0]?.fields).toEqual({ a: '1', b: '2', c: null });
  });

  it('keeps empty fields as empty strings', async () => {
    const rows = await collect(csv('a,b\n,2\n'));
    expect(rows[0]?.fields).toEqual({ a: '', b: '2' });
  });

  it('drops extra fields with a warning', async () => {
    const source = csv('a,b\n1,2,3\n4,5\n');
    const scan = await source.scan();
    expect(scan.warnings).toEqual([
      { row_number: 1, message: 'Row 1 has 3 fields, expected 2; extra fields dropped' },
    ]);
    const rows = await collect(source);
    expect(rows[0]?.fields).toEqual({ a: '1', b: '2' });
  });

  it('handles quoted delimiters, quotes and newlines', async () => {
    const rows = await collect(csv('a,b\n"x, y","say ""hi""\nagain"\n'));
    expect(rows).toEqual([{ row_number: 1, fields: { a: 'x, y', b: 'say "hi"\nagain' } }]);
  });

  it('trims header names but not values', async () => {
    const source = csv(' code , name \n C1 ,Alice\n');
    expect((await source.scan()).headers).toEqual(['code', 'name']);
    expect((await collect(source))[0]?.fields).toEqual({ code: ' C1 ', name: 'Alice' });
  });

  it('accepts a header with no data rows', async () => {
    const scan = await csv('a,b\n').scan();
    expect(scan.row_count).toBe(0);
    expect(scan.headers).toEqual(['a', 'b']);
  });

  describe('delimiters', () => {
    it('detects a semicolon delimiter', async () => {
      const source = csv('a;b\n1;2\n');
      expect(await source.delimiter()).toBe(';');
      expect((await collect(source))[0]?.fields).toEqual({ a: '1', b: '2' });
    });

    it('detects a tab delimiter', async () => {
      const source = csv('a\tb\n1\t2\n');
      expect(await source.delimiter()).toBe('\t');
    });

    it('uses a configured delimiter over detection', async () => {
      const source = csv('a|b;c\n1|2;3\n', '|');
      expect(await source.delimiter()).toBe('|');
      expect((await collect(source))[0]?.fields).toEqual({ a: '1', 'b;c': '2;3' });
    });
  });

  describe('fatal framing errors', () => {
    it('rejects an unterminated quote', async () => {
      const error = await parseFailure(csv('a,b\n1,"oops\n2,3\n'));
      expect(error.code).toBe('MALFORMED_CSV');
      expect(error.message).toMatch(/^Malformed CSV in data\.csv at data row 1: /);
    });

    it('rejects an empty header name', async () => {
      const error = await parseFailure(csv('a,,c\n1,2,3\n'));
      expect(error.code).toBe('EMPTY_HEADER');
      expect(error.message).toBe('CSV header column 2 is empty');
    });

    it('rejects a repeated header name', async () => {
      const error = await parseFailure(csv('a,b,a\n1,2,3\n'));
      expect(error.code).toBe('DUPLICATE_HEADER');
      expect(error.message).toBe('CSV header repeats column "a"');
    });

    it('rejects empty input', async () => {
      const error = await parseFailure(csv(''));
      expect(error.code).toBe('MISSING_HEADER');
      expect(error.message).toBe('CSV input data.csv has no header row');
    });
  });

  describe('RowSource', () => {
    it('counts rows in the scan and caches the result', async () => {
      const source = csv('a\n1\n2\n3\n');
      const scan = await source.scan();
      expect(scan.row_count).toBe(3);
      expect(scan.delimiter).toBe(',');
      expect(await source.scan()).toBe(scan);
    });

    it('starts every iteration from the first row', async () => {
      const source = csv('a\n1\n2\n');
      const first = await collect(source);
      const second = await collect(source);
      expect(second).toEqual(first);
      expect(second).toHaveLength(2);
    });
  });
});
