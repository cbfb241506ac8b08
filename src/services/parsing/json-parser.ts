/**
 * JSON row parser
 *
 * The input must be an array of objects; element i is row i + 1. Strings are
 * kept as they are, numbers keep their source text, booleans become their
 * string form, null becomes absent, and nested objects or arrays become
 * canonical JSON with sorted keys.
 *
 * @module services/parsing/json-parser
 */

import { isLosslessNumber, parse as parseLossless } from 'lossless-json';
import type { FieldValue, Row } from '../../models/row.js';
import { readAll, type ByteSource } from './byte-source.js';
import { FatalParseError } from './errors.js';
import type { ParseContext } from './csv-parser.js';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !isLosslessNumber(value);
}

/**
 * Serialize with object keys sorted at every level
 */
export function canonicalJson(value: unknown): string {
  if (isLosslessNumber(value)) return value.value;
  if (Array.isArray(value)) {
    return `[${value.map((v: unknown) => canonicalJson(v)).join(',')}]`;
  }
  if (isPlainObject(value)) {
    const entries = Object.keys(value)
      .sort()
      .map((k) => `${JSON.stringify(k)}:${canonicalJson(value[k])}`);
    return `{${entries.join(',')}}`;
  }
  return JSON.stringify(value);
}

export function toFieldValue(value: unknown): FieldValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string') return value;
  if (isLosslessNumber(value)) return value.value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return canonicalJson(value);
}

/**
 * Rows from a JSON source. The whole document is checked before the first
 * row is produced.
 *
 * @throws FatalParseError on invalid JSON, a non-array root or a non-object element
 */
export async function* parseJsonRows(
  source: ByteSource,
  context: ParseContext
): AsyncGenerator<Row> {
  let text: string;
  try {
    text = (await readAll(source)).toString('utf-8');
  } catch (error) {
    throw new FatalParseError(
      `Failed to read ${source.name}: ${error instanceof Error ? error.message : String(error)}`,
      'READ_FAILED',
      undefined,
      error
    );
  }
  if (text.charCodeAt(0) === 0xfeff) {
    text = text.slice(1);
  }

  let parsed: unknown;
  try {
    parsed = parseLossless(text);
  } catch (error) {
    throw new FatalParseError(
      `Invalid JSON in ${source.name}: ${error instanceof Error ? error.message : String(error)}`,
      'INVALID_JSON',
      undefined,
      error
    );
  }

  if (!Array.isArray(parsed)) {
    throw new FatalParseError(`JSON root of ${source.name} must be an array of objects`, 'NOT_AN_ARRAY');
  }

  const records: Array<Record<string, unknown>> = [];
  const headers = new Set<string>();
  parsed.forEach((element: unknown, i: number) => {
    if (!isPlainObject(element)) {
      throw new FatalParseError(
        `JSON element ${String(i + 1)} of ${source.name} is not an object`,
        'NOT_AN_OBJECT',
        i + 1
      );
    }
    for (const key of Object.keys(element)) headers.add(key);
    records.push(element);
  });
  context.headers = [...headers];

  for (const [i, record] of records.entries()) {
    yield {
      row_number: i + 1,
      fields: Object.fromEntries(
        Object.entries(record).map(([k, v]): [string, FieldValue] => [k, toFieldValue(v)])
      ),
    };
  }
}
