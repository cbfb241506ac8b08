/**
 * Command line tests
 *
 * Drives runCli in process with a temporary database directory and table
 * configuration directory.
 *
 * @see src/cli.ts
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import { runCli } from '../../src/cli.js';
import { PipelineOrchestrator } from '../../src/services/pipeline/index.js';
import { DatabaseService } from '../../src/services/storage/index.js';
import { CUSTOMERS_HEADER, cleanupTestDir, createTestDir, writeTestFile } from './helpers.js';

const ENV_KEYS = ['TABULAR_INGEST_DATABASES_PATH', 'TABULAR_INGEST_TABLE_CONFIG_DIR'] as const;

const CUSTOMERS_TABLE = {
  table: 'customers',
  columns: [
    { column: 'customer_code' },
    { column: 'name' },
    { column: 'email' },
    { column: 'credit_limit', type: 'REAL' },
  ],
  rules: [
    { kind: 'REQUIRED', field: 'customer_code' },
    { kind: 'FORMAT', field: 'email', preset: 'email' },
    { kind: 'DUPLICATE', field: 'customer_code' },
  ],
};

const VALID_CSV = [
  CUSTOMERS_HEADER,
  'C001,Alice,alice@example.com,500',
  'C002,Bob,not-an-email,100',
  'C003,Carol,carol@example.com,200',
].join('\n');

interface CliRun {
  code: number;
  output: unknown;
}

describe('runCli', () => {
  let testDir: string;
  const saved = new Map(ENV_KEYS.map((k) => [k, process.env[k]]));

  beforeEach(() => {
    testDir = createTestDir('test-cli-');
    const configDir = join(testDir, 'tables');
    mkdirSync(configDir);
    writeFileSync(join(configDir, 'customers.json'), JSON.stringify(CUSTOMERS_TABLE));
    process.env.TABULAR_INGEST_DATABASES_PATH = join(testDir, 'databases');
    process.env.TABULAR_INGEST_TABLE_CONFIG_DIR = configDir;
  });

  afterEach(() => {
    for (const [key, value] of saved) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
    vi.restoreAllMocks();
    cleanupTestDir(testDir);
  });

  async function run(...argv: string[]): Promise<CliRun> {
    let text = '';
    const code = await runCli(argv, {
      stdout: (chunk) => {
        text += chunk;
      },
    });
    return { code, output: JSON.parse(text) };
  }

  function field(value: unknown, key: string): unknown {
    return typeof value === 'object' && value !== null && key in value
      ? Object.entries(value).find(([k]) => k === key)?.[1]
      : undefined;
  }

  it('processes a file into the named table', async () => {
    const filePath = writeTestFile(testDir, 'customers.csv', VALID_CSV);
    const { code, output } = await run('process', filePath, '--db', 'crm', '--table', 'customers');

    expect(code).toBe(0);
    expect(output).toMatchObject({
      target_table: 'customers',
      status: 'completed',
      rows_loaded: 2,
      rows_rejected: 1,
    });
  });

  it('detects the table from the headers', async () => {
    const filePath = writeTestFile(testDir, 'customers.csv', VALID_CSV);
    const { code, output } = await run('process', filePath, '--db', 'crm');
    expect(code).toBe(0);
    expect(field(output, 'target_table')).toBe('customers');
  });

  it('hands the orchestrator and file id to the caller', async () => {
    const filePath = writeTestFile(testDir, 'customers.csv', VALID_CSV);
    const onOrchestrator = vi.fn();
    await runCli(['process', filePath, '--db', 'crm', '--table', 'customers'], {
      stdout: () => undefined,
      onOrchestrator,
    });
    expect(onOrchestrator).toHaveBeenCalledTimes(1);
    expect(onOrchestrator.mock.calls[0]?.[0]).toBeInstanceOf(PipelineOrchestrator);
    expect(typeof onOrchestrator.mock.calls[0]?.[1]).toBe('string');
  });

  it('lists the errors of a processed file', async () => {
    const filePath = writeTestFile(testDir, 'customers.csv', VALID_CSV);
    const processed = await run('process', filePath, '--db', 'crm', '--table', 'customers');
    const fileId = field(processed.output, 'source_file_id');
    expect(typeof fileId).toBe('string');
    if (typeof fileId !== 'string') return;

    const { code, output } = await run('errors', fileId, '--db', 'crm', '--kind', 'FORMAT');
    expect(code).toBe(0);
    expect(output).toMatchObject({
      source_file_id: fileId,
      total: 1,
      errors: [{ row_number: 2, kind: 'FORMAT', field_name: 'email', field_value: 'not-an-email' }],
    });
  });

  it('exits 1 for a failed run and reprocesses after a fix', async () => {
    const filePath = writeTestFile(testDir, 'customers.csv', `${CUSTOMERS_HEADER}\nC001,"Alice\n`);
    const failed = await run('process', filePath, '--db', 'crm', '--table', 'customers');
    expect(failed.code).toBe(1);
    expect(field(failed.output, 'status')).toBe('failed');
    expect(field(field(failed.output, 'error'), 'category')).toBe('PARSE_ERROR');

    const fileId = field(failed.output, 'source_file_id');
    if (typeof fileId !== 'string') throw new Error('missing source_file_id');
    writeFileSync(filePath, VALID_CSV);

    const retried = await run('reprocess', fileId, '--db', 'crm', '--table', 'customers');
    expect(retried.code).toBe(0);
    expect(field(retried.output, 'rows_loaded')).toBe(2);
  });

  it('fails a malformed file when the table is detected from its headers', async () => {
    const filePath = writeTestFile(testDir, 'broken.csv', `${CUSTOMERS_HEADER}\nC001,"Alice\n`);
    const { code, output } = await run('process', filePath, '--db', 'crm');
    expect(code).toBe(1);
    expect(output).toMatchObject({ status: 'failed', target_table: null, rows_loaded: 0 });
    expect(field(field(output, 'error'), 'category')).toBe('PARSE_ERROR');

    const fileId = field(output, 'source_file_id');
    if (typeof fileId !== 'string') throw new Error('missing source_file_id');
    const store = DatabaseService.open('crm', join(testDir, 'databases'));
    try {
      const stored = store.getSourceFile(fileId);
      expect(stored?.status).toBe('failed');
      expect(stored?.error_message).toBe(field(field(output, 'error'), 'message'));
    } finally {
      store.close();
    }

    writeFileSync(filePath, VALID_CSV);
    const retried = await run('reprocess', fileId, '--db', 'crm', '--table', 'customers');
    expect(retried.code).toBe(0);
  });

  it('fails the file when no table matches its headers', async () => {
    const filePath = writeTestFile(testDir, 'other.csv', 'sku,qty\nA1,3\n');
    const { code, output } = await run('process', filePath, '--db', 'crm', '--table', 'auto');
    expect(code).toBe(1);
    expect(field(output, 'status')).toBe('failed');
    expect(field(output, 'error')).toEqual({
      category: 'VALIDATION_ERROR',
      message: 'No table configuration matches the file headers: sku, qty',
    });
    expect(typeof field(output, 'source_file_id')).toBe('string');
  });

  it('previews without writing anything', async () => {
    const filePath = writeTestFile(testDir, 'customers.csv', VALID_CSV);
    const { code, output } = await run('preview', filePath, '--table', 'customers', '--rows', '2');
    expect(code).toBe(0);
    expect(output).toEqual({
      sample_size: 2,
      valid_rows: 1,
      error_rows: 1,
      error_rate: 50,
      sample_errors: [
        {
          row_number: 2,
          kind: 'FORMAT',
          message: 'email does not match expected pattern',
          field_name: 'email',
          field_value: 'not-an-email',
        },
      ],
    });
  });

  it('reports stats and recovers nothing on a fresh database', async () => {
    const stats = await run('stats', '--db', 'crm');
    expect(stats.code).toBe(0);
    expect(field(stats.output, 'total_source_files')).toBe(0);

    const recovered = await run('recover', '--db', 'crm');
    expect(recovered).toEqual({ code: 0, output: { recovered: [] } });
  });

  describe('failures', () => {
    it.each([
      [['bogus'], 'VALIDATION_ERROR', /^Unknown command "bogus"/],
      [['stats'], 'VALIDATION_ERROR', /^--db is required$/],
      [['preview', 'x.csv', '--table', 'nope'], 'VALIDATION_ERROR', /^Unknown table "nope"\. Configured tables: customers$/],
      [['preview', 'x.dat', '--table', 'customers'], 'VALIDATION_ERROR', /^Cannot tell the type of x\.dat; pass --type$/],
      [['errors', 'missing-id', '--db', 'crm'], 'VALIDATION_ERROR', /^Source file "missing-id" not found$/],
      [['preview', 'x.csv', '--table', 'customers', '--rows', 'ten'], 'VALIDATION_ERROR', /^--rows must be an integer, got "ten"$/],
    ])('%j fails with %s', async (argv, category, message) => {
      const { code, output } = await run(...argv);
      expect(code).toBe(1);
      expect(field(output, 'success')).toBe(false);
      const error = field(output, 'error');
      expect(field(error, 'category')).toBe(category);
      expect(field(error, 'message')).toMatch(message);
    });
  });
});
