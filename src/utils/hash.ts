/**
 * SHA-256 Content Hashing for Source Files
 *
 * All hashes use the format: 'sha256:' + 64-character lowercase hex string.
 *
 * @module utils/hash
 */

import crypto from 'crypto';
import fs from 'fs';
import path from 'path';

const HASH_PREFIX = 'sha256:';

const HASH_PATTERN = /^sha256:[a-f0-9]{64}$/;

/**
 * Compute SHA-256 hash of content
 *
 * @example
 * computeHash('hello')
 * // Returns: 'sha256:2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824'
 */
export function computeHash(content: string | Buffer): string {
  return HASH_PREFIX + crypto.createHash('sha256').update(content).digest('hex');
}

/**
 * Compute SHA-256 hash of a file by streaming it
 *
 * @param filePath - Absolute path to file
 * @throws Error if the path is relative, missing, unreadable or not a regular file
 */
export async function hashFile(filePath: string): Promise<string> {
  if (!path.isAbsolute(filePath)) {
    throw new Error(`Path must be absolute: ${filePath}`);
  }

  try {
    await fs.promises.access(filePath, fs.constants.R_OK);
  } catch (error) {
    const code = error instanceof Error && 'code' in error ? error.code : undefined;
    if (code === 'ENOENT') {
      throw new Error(`File not found: ${filePath}`);
    }
    if (code === 'EACCES') {
      throw new Error(`Permission denied: ${filePath}`);
    }
    throw new Error(
      `Cannot access file: ${filePath} - ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const stats = await fs.promises.stat(filePath);
  if (!stats.isFile()) {
    throw new Error(`Path is not a file: ${filePath}`);
  }

  return new Promise((resolve, reject) => {
    const hash = crypto.createHash('sha256');
    const stream = fs.createReadStream(filePath);

    stream.on('data', (chunk: string | Buffer) => {
      hash.update(chunk);
    });

    stream.on('end', () => {
      resolve(HASH_PREFIX + hash.digest('hex'));
    });

    stream.on('error', (error: NodeJS.ErrnoException) => {
      stream.destroy();
      reject(new Error(`Error reading file: ${filePath} - ${error.message}`));
    });
  });
}

/**
 * True if the value is 'sha256:' followed by 64 lowercase hex chars
 */
export function isValidHashFormat(hash: string): boolean {
  return HASH_PATTERN.test(hash);
}
