/**
 * tabular-ingest command line
 *
 * Every command prints one JSON document to stdout. Logs go to stderr.
 *
 * @module cli
 */

import * as path from 'path';
import { parseArgs } from 'util';
import { DatabaseService } from './services/storage/index.js';
import {
  PipelineError,
  PipelineOrchestrator,
  previewValidation,
  type ConfigResolver,
} from './services/pipeline/index.js';
import { detectTableConfig, fileSource } from './services/parsing/index.js';
import { isSupportedFileType, type SourceFileType } from './models/source-file.js';
import type { TableConfig } from './models/table-config.js';
import { loadIngestSettings, type IngestSettings } from './utils/config.js';
import {
  ErrorKindEnum,
  FileTypeEnum,
  InputValidationError,
  loadTableConfigs,
} from './utils/validation.js';

export const USAGE = `Usage: tabular-ingest <command> [options]

Commands:
  process <file> --db <name> [--table <name>|auto] [--type csv|json]
  reprocess <file-id> --db <name> --table <name>
  preview <file> --table <name> [--rows N] [--type csv|json]
  errors <file-id> --db <name> [--kind KIND] [--limit N]
  recover --db <name>
  stats --db <name>`;

export interface CliIO {
  stdout: (text: string) => void;
  /** Called with the orchestrator once a run can be cancelled */
  onOrchestrator?: (orchestrator: PipelineOrchestrator, fileId: string) => void;
}

const OPTIONS = {
  db: { type: 'string' },
  table: { type: 'string' },
  type: { type: 'string' },
  rows: { type: 'string' },
  kind: { type: 'string' },
  limit: { type: 'string' },
} as const;

function requireOption(value: string | undefined, name: string): string {
  if (value === undefined || value === '') {
    throw new InputValidationError(`--${name} is required`);
  }
  return value;
}

function requirePositional(positionals: string[], label: string): string {
  const value = positionals[1];
  if (value === undefined) {
    throw new InputValidationError(`${positionals[0] ?? 'command'}: missing <${label}>`);
  }
  return value;
}

function parseCount(raw: string | undefined, name: string): number | undefined {
  if (raw === undefined) return undefined;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed)) {
    throw new InputValidationError(`--${name} must be an integer, got "${raw}"`);
  }
  return parsed;
}

function parseFileType(raw: string | undefined): SourceFileType | undefined {
  if (raw === undefined) return undefined;
  const parsed = FileTypeEnum.safeParse(raw);
  if (!parsed.success) {
    throw new InputValidationError(`--type must be csv or json, got "${raw}"`);
  }
  return parsed.data;
}

function pickConfig(configs: Map<string, TableConfig>, table: string): TableConfig {
  const config = configs.get(table);
  if (!config) {
    const known = [...configs.keys()].join(', ') || '(none)';
    throw new InputValidationError(`Unknown table "${table}". Configured tables: ${known}`);
  }
  return config;
}

/**
 * A named table, or a resolver that detects it from the file's headers once
 * the run has started
 */
function tableChoice(
  configs: Map<string, TableConfig>,
  table: string | undefined
): TableConfig | ConfigResolver {
  if (table !== undefined && table !== 'auto') return pickConfig(configs, table);
  return (_file, headers) => detectTableConfig(headers, configs.values());
}

function withStore<T>(
  settings: IngestSettings,
  name: string,
  fn: (store: DatabaseService) => Promise<T>
): Promise<T> {
  const store = DatabaseService.openOrCreate(name, settings.databasesPath);
  console.error(`[CLI] Using database ${store.getPath()}`);
  return fn(store).finally(() => store.close());
}

/**
 * Run one command.
 *
 * @returns process exit code
 */
export async function runCli(argv: string[], io: CliIO): Promise<number> {
  const print = (value: unknown): void => io.stdout(`${JSON.stringify(value, null, 2)}\n`);

  try {
    const { values, positionals } = parseArgs({ args: argv, options: OPTIONS, allowPositionals: true });
    const command = positionals[0];
    if (command === undefined) {
      throw new InputValidationError(USAGE);
    }

    const settings = loadIngestSettings();
    const orchestratorSettings = {
      maxConcurrentRuns: settings.maxConcurrentRuns,
      maxIsolationRetries: settings.maxIsolationRetries,
      rowByRowThreshold: settings.rowByRowThreshold,
      maxFileSizeMb: settings.maxFileSizeMb,
      staleRunMinutes: settings.staleRunMinutes,
    };

    switch (command) {
      case 'process': {
        const filePath = requirePositional(positionals, 'file');
        const fileType = parseFileType(values.type);
        const configs = loadTableConfigs(settings.tableConfigDir, settings.batchSize);
        const config = tableChoice(configs, values.table);
        return await withStore(settings, requireOption(values.db, 'db'), async (store) => {
          const orchestrator = new PipelineOrchestrator(store, orchestratorSettings);
          const file = await orchestrator.registerSourceFile(filePath, { fileType });
          io.onOrchestrator?.(orchestrator, file.id);
          const summary = await orchestrator.processFile(file.id, config);
          print(summary);
          return summary.status === 'completed' ? 0 : 1;
        });
      }

      case 'reprocess': {
        const fileId = requirePositional(positionals, 'file-id');
        const configs = loadTableConfigs(settings.tableConfigDir, settings.batchSize);
        const config = pickConfig(configs, requireOption(values.table, 'table'));
        return await withStore(settings, requireOption(values.db, 'db'), async (store) => {
          const orchestrator = new PipelineOrchestrator(store, orchestratorSettings);
          io.onOrchestrator?.(orchestrator, fileId);
          const summary = await orchestrator.processFile(fileId, config);
          print(summary);
          return summary.status === 'completed' ? 0 : 1;
        });
      }

      case 'preview': {
        const filePath = requirePositional(positionals, 'file');
        const configs = loadTableConfigs(settings.tableConfigDir, settings.batchSize);
        const config = pickConfig(configs, requireOption(values.table, 'table'));
        const extension = path.extname(filePath).slice(1).toLowerCase();
        const fileType =
          parseFileType(values.type) ?? (isSupportedFileType(extension) ? extension : undefined);
        if (fileType === undefined) {
          throw new InputValidationError(`Cannot tell the type of ${filePath}; pass --type`);
        }
        print(
          await previewValidation(fileSource(filePath), fileType, config, {
            sampleSize: parseCount(values.rows, 'rows'),
          })
        );
        return 0;
      }

      case 'errors': {
        const fileId = requirePositional(positionals, 'file-id');
        const kind = values.kind === undefined ? undefined : ErrorKindEnum.parse(values.kind);
        return await withStore(settings, requireOption(values.db, 'db'), async (store) => {
          const orchestrator = new PipelineOrchestrator(store, orchestratorSettings);
          if (!orchestrator.getSourceFile(fileId)) {
            throw new InputValidationError(`Source file "${fileId}" not found`);
          }
          print({
            source_file_id: fileId,
            total: orchestrator.countValidationErrors(fileId, kind),
            errors: orchestrator.getValidationErrors(fileId, {
              kind,
              limit: parseCount(values.limit, 'limit'),
            }),
          });
          return 0;
        });
      }

      case 'recover': {
        return await withStore(settings, requireOption(values.db, 'db'), async (store) => {
          const recovered = new PipelineOrchestrator(store, orchestratorSettings).recoverStaleRuns();
          print({ recovered });
          return 0;
        });
      }

      case 'stats': {
        return await withStore(settings, requireOption(values.db, 'db'), async (store) => {
          print(new PipelineOrchestrator(store, orchestratorSettings).getStats());
          return 0;
        });
      }

      default:
        throw new InputValidationError(`Unknown command "${command}"\n\n${USAGE}`);
    }
  } catch (error) {
    const failure = PipelineError.fromUnknown(error);
    console.error(`[CLI] ${failure.category}: ${failure.message}`);
    print({ success: false, error: { category: failure.category, message: failure.message } });
    return 1;
  }
}
