/**
 * Runtime Settings
 *
 * Settings come from TABULAR_INGEST_* environment variables (optionally loaded
 * from a .env file by the CLI), then explicit overrides, and are validated by
 * a zod schema.
 *
 * @module utils/config
 */

import { z } from 'zod';
import * as os from 'os';
import * as path from 'path';

export const DEFAULT_DATABASES_PATH = path.join(os.homedir(), '.tabular-ingest', 'databases');

export const IngestSettingsSchema = z.object({
  databasesPath: z.string().min(1).default(DEFAULT_DATABASES_PATH),
  tableConfigDir: z.string().min(1).default('./config/tables'),
  // Used when a table configuration omits batch_size
  batchSize: z.number().int().min(1).max(10000).default(500),
  maxConcurrentRuns: z.number().int().min(1).max(64).default(3),
  maxIsolationRetries: z.number().int().min(0).max(1000).default(5),
  rowByRowThreshold: z.number().int().min(1).max(10000).default(8),
  maxFileSizeMb: z.number().int().min(1).default(100),
  staleRunMinutes: z.number().int().min(1).default(30),
});

export type IngestSettings = z.infer<typeof IngestSettingsSchema>;

function parseIntEnv(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return undefined;
  const parsed = parseInt(raw, 10);
  if (Number.isNaN(parsed) || String(parsed) !== raw.trim()) {
    throw new Error(`Invalid numeric env var ${name}: "${raw}"`);
  }
  return parsed;
}

function stringEnv(name: string): string | undefined {
  const raw = process.env[name];
  return raw === undefined || raw === '' ? undefined : raw;
}

/**
 * Load settings from the environment.
 *
 * Environment variables:
 *   TABULAR_INGEST_DATABASES_PATH       : database directory (default: ~/.tabular-ingest/databases)
 *   TABULAR_INGEST_TABLE_CONFIG_DIR     : table configuration directory (default: ./config/tables)
 *   TABULAR_INGEST_BATCH_SIZE           : default batch size (default: 500)
 *   TABULAR_INGEST_MAX_CONCURRENT_RUNS  : files processed at once (default: 3)
 *   TABULAR_INGEST_MAX_ISOLATION_RETRIES: duplicate isolation retries per batch (default: 5)
 *   TABULAR_INGEST_ROW_BY_ROW_THRESHOLD : remainder size that switches to row-by-row insert (default: 8)
 *   TABULAR_INGEST_MAX_FILE_SIZE_MB     : largest accepted source file (default: 100)
 *   TABULAR_INGEST_STALE_RUN_MINUTES    : age after which a processing run is abandoned (default: 30)
 *
 * @throws Error on a malformed numeric variable
 * @throws ZodError when a value is out of range
 */
export function loadIngestSettings(overrides?: Partial<IngestSettings>): IngestSettings {
  const envConfig = {
    databasesPath: stringEnv('TABULAR_INGEST_DATABASES_PATH'),
    tableConfigDir: stringEnv('TABULAR_INGEST_TABLE_CONFIG_DIR'),
    batchSize: parseIntEnv('TABULAR_INGEST_BATCH_SIZE'),
    maxConcurrentRuns: parseIntEnv('TABULAR_INGEST_MAX_CONCURRENT_RUNS'),
    maxIsolationRetries: parseIntEnv('TABULAR_INGEST_MAX_ISOLATION_RETRIES'),
    rowByRowThreshold: parseIntEnv('TABULAR_INGEST_ROW_BY_ROW_THRESHOLD'),
    maxFileSizeMb: parseIntEnv('TABULAR_INGEST_MAX_FILE_SIZE_MB'),
    staleRunMinutes: parseIntEnv('TABULAR_INGEST_STALE_RUN_MINUTES'),
  };

  return IngestSettingsSchema.parse({ ...envConfig, ...overrides });
}
