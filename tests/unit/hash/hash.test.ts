/**
 * Content hashing tests
 *
 * @see src/utils/hash.ts
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import path from 'path';
import { computeHash, hashFile, isValidHashFormat } from '../../../src/utils/hash.js';
import { cleanupTestDir, createTestDir, writeTestFile } from '../helpers.js';

describe('computeHash', () => {
  it('computes the known hash of a string', () => {
    expect(computeHash('hello')).toBe(
      'sha256:2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824'
    );
  });

  it('handles empty input', () => {
    expect(computeHash('')).toBe(
      'sha256:e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855'
    );
  });

  it('hashes a Buffer like the equivalent string', () => {
    expect(computeHash(Buffer.from('a,b\n1,2\n'))).toBe(computeHash('a,b\n1,2\n'));
  });
});

describe('isValidHashFormat', () => {
  it('accepts the prefixed lowercase form only', () => {
    expect(isValidHashFormat(computeHash('x'))).toBe(true);
    expect(isValidHashFormat(`sha256:${'A'.repeat(64)}`)).toBe(false);
    expect(isValidHashFormat('a'.repeat(64))).toBe(false);
    expect(isValidHashFormat(`sha256:${'a'.repeat(63)}`)).toBe(false);
  });
});

describe('hashFile', () => {
  let testDir: string;
  let filePath: string;
  const content = 'customer_code,name\nC1,Alice\n';

  beforeAll(() => {
    testDir = createTestDir('test-hash-');
    filePath = writeTestFile(testDir, 'customers.csv', content);
  });

  afterAll(() => {
    cleanupTestDir(testDir);
  });

  it('hashes the file content', async () => {
    expect(await hashFile(filePath)).toBe(computeHash(content));
  });

  it('rejects a missing file', async () => {
    const missing = path.join(testDir, 'missing.csv');
    await expect(hashFile(missing)).rejects.toThrow(`File not found: ${missing}`);
  });

  it('rejects a relative path', async () => {
    await expect(hashFile('customers.csv')).rejects.toThrow('Path must be absolute: customers.csv');
  });

  it('rejects a directory', async () => {
    await expect(hashFile(testDir)).rejects.toThrow(`Path is not a file: ${testDir}`);
  });
});
