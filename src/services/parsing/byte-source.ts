/**
 * Byte sources - restartable input for the parsers
 *
 * A ByteSource can be opened any number of times; each open() starts again
 * from the first byte.
 *
 * @module services/parsing/byte-source
 */

import * as fs from 'fs';
import * as path from 'path';
import { Readable } from 'stream';

export interface ByteSource {
  /** Label used in log lines and error messages */
  readonly name: string;
  open(): AsyncIterable<Buffer | string>;
}

/**
 * A file on disk, streamed on every open
 */
export function fileSource(filePath: string): ByteSource {
  return {
    name: path.basename(filePath),
    open: () => fs.createReadStream(filePath),
  };
}

/**
 * In-memory content
 */
export function bufferSource(content: Buffer | string, name = 'buffer'): ByteSource {
  const buf = typeof content === 'string' ? Buffer.from(content, 'utf-8') : content;
  return {
    name,
    open: () => Readable.from([buf]),
  };
}

/**
 * Read up to `maxBytes` from the start of a source as UTF-8 text
 */
export async function readPrefix(source: ByteSource, maxBytes: number): Promise<string> {
  const chunks: Buffer[] = [];
  let total = 0;
  for await (const chunk of source.open()) {
    const buf = typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : chunk;
    chunks.push(buf);
    total += buf.length;
    if (total >= maxBytes) break;
  }
  // A multi-byte character cut at the boundary decodes to U+FFFD, which no
  // delimiter candidate matches
  return Buffer.concat(chunks).subarray(0, maxBytes).toString('utf-8');
}

/**
 * Read a whole source into memory
 */
export async function readAll(source: ByteSource): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of source.open()) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : chunk);
  }
  return Buffer.concat(chunks);
}
