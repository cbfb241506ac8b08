/**
 * Tabular Ingest - Zod Validation Schemas
 *
 * Input validation for table configuration files and operation inputs.
 * Rule configuration is validated and compiled here, at configuration-load
 * time, so that rule evaluation never meets a malformed rule.
 *
 * @module utils/validation
 */

import { z } from 'zod';
import * as fs from 'fs';
import * as path from 'path';
import {
  FORMAT_PRESETS,
  type FormatPreset,
  type ValidationRule,
} from '../models/validation-rule.js';
import type { ColumnMapping, TableConfig } from '../models/table-config.js';
import { PROVENANCE_COLUMNS } from '../models/table-config.js';
import { SOURCE_FILE_STATUSES, SUPPORTED_FILE_TYPES } from '../models/source-file.js';

// ═══════════════════════════════════════════════════════════════════════════════
// CUSTOM ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Thrown when a configuration or operation input fails validation
 */
export class InputValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InputValidationError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @param schema - Zod schema to validate against
 * @param input - Input value to validate
 * @returns Validated and typed input data
 * @throws InputValidationError listing every issue as `path: message`
 */
export function validateInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const errors = result.error.errors.map((e) => {
      const issuePath = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${issuePath}${e.message}`;
    });
    throw new InputValidationError(errors.join('; '));
  }
  return result.data;
}

/**
 * SQL identifier: letters, digits and underscores, not starting with a digit
 */
export const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** Tables owned by the pipeline itself */
export const RESERVED_TABLE_NAMES: readonly string[] = [
  'source_files',
  'validation_errors',
  'load_results',
  'schema_version',
  'database_metadata',
];

/**
 * Anchor a pattern so it must match the whole value
 */
export function compilePattern(pattern: string): RegExp {
  return new RegExp(`^(?:${pattern})$`);
}

// ═══════════════════════════════════════════════════════════════════════════════
// SHARED ENUMS AND BASE SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const FileTypeEnum = z.enum(SUPPORTED_FILE_TYPES);

export const SourceFileStatusEnum = z.enum(SOURCE_FILE_STATUSES);

export const ErrorKindEnum = z.enum(['REQUIRED', 'FORMAT', 'RANGE', 'LENGTH', 'DUPLICATE', 'UNKNOWN']);

const Identifier = z
  .string()
  .min(1, 'Identifier is required')
  .max(63, 'Identifier must be 63 characters or less')
  .regex(
    IDENTIFIER_PATTERN,
    'Identifier must contain only letters, digits and underscores, and not start with a digit'
  );

const FieldName = z.string().min(1, 'Field name is required');

const Message = z.string().min(1, 'Message must not be empty').optional();

// ═══════════════════════════════════════════════════════════════════════════════
// RULE CONFIGURATION SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

const RequiredRuleConfig = z
  .object({ kind: z.literal('REQUIRED'), field: FieldName, message: Message })
  .strict();

const FormatRuleConfig = z
  .object({
    kind: z.literal('FORMAT'),
    field: FieldName,
    pattern: z.string().min(1, 'Pattern must not be empty').optional(),
    preset: z.enum(['email', 'phone', 'iso_date']).optional(),
    message: Message,
  })
  .strict();

const RangeRuleConfig = z
  .object({
    kind: z.literal('RANGE'),
    field: FieldName,
    min: z.number().finite().optional(),
    max: z.number().finite().optional(),
    message: Message,
  })
  .strict();

const LengthRuleConfig = z
  .object({
    kind: z.literal('LENGTH'),
    field: FieldName,
    max: z.number().int().min(1, 'Maximum length must be at least 1'),
    message: Message,
  })
  .strict();

const DuplicateRuleConfig = z
  .object({ kind: z.literal('DUPLICATE'), field: FieldName, message: Message })
  .strict();

/**
 * One configured rule. UNKNOWN is deliberately absent: it is an outcome only.
 */
export const RuleConfig = z.discriminatedUnion('kind', [
  RequiredRuleConfig,
  FormatRuleConfig,
  RangeRuleConfig,
  LengthRuleConfig,
  DuplicateRuleConfig,
]);

export type RuleConfigInput = z.infer<typeof RuleConfig>;

// ═══════════════════════════════════════════════════════════════════════════════
// TABLE CONFIGURATION SCHEMA
// ═══════════════════════════════════════════════════════════════════════════════

const ColumnConfig = z
  .object({
    column: Identifier,
    /** Defaults to the column name */
    field: FieldName.optional(),
    type: z.enum(['TEXT', 'INTEGER', 'REAL']).default('TEXT'),
  })
  .strict();

export const TableConfigInput = z
  .object({
    table: Identifier,
    batch_size: z
      .number()
      .int()
      .min(1, 'batch_size must be at least 1')
      .max(10000, 'batch_size must be 10000 or less')
      .optional(),
    delimiter: z.string().length(1, 'delimiter must be a single character').optional(),
    columns: z.array(ColumnConfig).min(1, 'At least one column is required'),
    rules: z.array(RuleConfig).default([]),
  })
  .strict()
  .superRefine((cfg, ctx) => {
    if (
      RESERVED_TABLE_NAMES.includes(cfg.table.toLowerCase()) ||
      cfg.table.toLowerCase().startsWith('sqlite_')
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['table'],
        message: `"${cfg.table}" is reserved`,
      });
    }

    const provenance: readonly string[] = PROVENANCE_COLUMNS;
    const seenColumns = new Set<string>();
    cfg.columns.forEach((col, i) => {
      const lower = col.column.toLowerCase();
      if (provenance.includes(lower)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['columns', i, 'column'],
          message: `"${col.column}" collides with a provenance column`,
        });
      }
      if (seenColumns.has(lower)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['columns', i, 'column'],
          message: `Duplicate column "${col.column}"`,
        });
      }
      seenColumns.add(lower);
    });

    const mappedFields = new Set(cfg.columns.map((c) => c.field ?? c.column));

    cfg.rules.forEach((rule, i) => {
      switch (rule.kind) {
        case 'FORMAT': {
          if ((rule.pattern === undefined) === (rule.preset === undefined)) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              path: ['rules', i],
              message: 'FORMAT rule needs exactly one of "pattern" or "preset"',
            });
          } else if (rule.pattern !== undefined) {
            try {
              compilePattern(rule.pattern);
            } catch (error) {
              ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['rules', i, 'pattern'],
                message: `Invalid pattern: ${error instanceof Error ? error.message : String(error)}`,
              });
            }
          }
          break;
        }
        case 'RANGE': {
          if (rule.min === undefined && rule.max === undefined) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              path: ['rules', i],
              message: 'RANGE rule needs "min", "max" or both',
            });
          } else if (rule.min !== undefined && rule.max !== undefined && rule.min > rule.max) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              path: ['rules', i],
              message: `RANGE min (${rule.min}) is greater than max (${rule.max})`,
            });
          }
          break;
        }
        case 'DUPLICATE': {
          if (!mappedFields.has(rule.field)) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              path: ['rules', i, 'field'],
              message: `DUPLICATE field "${rule.field}" is not mapped to a column`,
            });
          }
          break;
        }
        default:
          break;
      }
    });
  });

export type TableConfigInputType = z.input<typeof TableConfigInput>;

// ═══════════════════════════════════════════════════════════════════════════════
// COMPILATION
// ═══════════════════════════════════════════════════════════════════════════════

function compileRule(rule: RuleConfigInput): ValidationRule {
  const base = rule.message !== undefined ? { message: rule.message } : {};
  switch (rule.kind) {
    case 'REQUIRED':
      return { kind: 'REQUIRED', field: rule.field, ...base };
    case 'FORMAT': {
      const pattern =
        rule.preset !== undefined ? FORMAT_PRESETS[rule.preset satisfies FormatPreset] : rule.pattern;
      if (pattern === undefined) {
        throw new InputValidationError(`FORMAT rule for "${rule.field}" has no pattern`);
      }
      return { kind: 'FORMAT', field: rule.field, pattern, regex: compilePattern(pattern), ...base };
    }
    case 'RANGE':
      return {
        kind: 'RANGE',
        field: rule.field,
        ...(rule.min !== undefined ? { min: rule.min } : {}),
        ...(rule.max !== undefined ? { max: rule.max } : {}),
        ...base,
      };
    case 'LENGTH':
      return { kind: 'LENGTH', field: rule.field, max: rule.max, ...base };
    case 'DUPLICATE':
      return { kind: 'DUPLICATE', field: rule.field, ...base };
  }
}

/**
 * Validate raw configuration and compile it into a TableConfig.
 *
 * @param input - Parsed JSON (or an equivalent object literal)
 * @param defaultBatchSize - Used when the configuration omits batch_size
 * @throws InputValidationError on any schema or cross-field violation
 */
export function compileTableConfig(input: unknown, defaultBatchSize = 500): TableConfig {
  const cfg = validateInput(TableConfigInput, input);
  const columns: ColumnMapping[] = cfg.columns.map((c) => ({
    column: c.column,
    field: c.field ?? c.column,
    type: c.type,
  }));
  return {
    table: cfg.table,
    batch_size: cfg.batch_size ?? defaultBatchSize,
    rules: cfg.rules.map(compileRule),
    columns,
    ...(cfg.delimiter !== undefined ? { delimiter: cfg.delimiter } : {}),
  };
}

/**
 * Load and compile one table configuration file
 */
export function loadTableConfig(filePath: string, defaultBatchSize?: number): TableConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new InputValidationError(
      `Cannot read table config ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  try {
    return compileTableConfig(raw, defaultBatchSize);
  } catch (error) {
    if (error instanceof InputValidationError) {
      throw new InputValidationError(`${path.basename(filePath)}: ${error.message}`);
    }
    throw error;
  }
}

/**
 * Load every *.json table configuration in a directory, keyed by table name
 */
export function loadTableConfigs(dir: string, defaultBatchSize?: number): Map<string, TableConfig> {
  if (!fs.existsSync(dir) || !fs.statSync(dir).isDirectory()) {
    throw new InputValidationError(`Table config directory not found: ${dir}`);
  }
  const configs = new Map<string, TableConfig>();
  const files = fs
    .readdirSync(dir)
    .filter((f) => f.endsWith('.json'))
    .sort();
  for (const file of files) {
    const config = loadTableConfig(path.join(dir, file), defaultBatchSize);
    if (configs.has(config.table)) {
      throw new InputValidationError(`Table "${config.table}" is configured more than once (${file})`);
    }
    configs.set(config.table, config);
  }
  return configs;
}

// ═══════════════════════════════════════════════════════════════════════════════
// OPERATION INPUT SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const ListSourceFilesInput = z.object({
  status: SourceFileStatusEnum.optional(),
  limit: z.number().int().min(1).max(1000).default(50),
  offset: z.number().int().min(0).default(0),
});

export const ListValidationErrorsInput = z.object({
  kind: ErrorKindEnum.optional(),
  limit: z.number().int().min(1).max(10000).optional(),
  offset: z.number().int().min(0).default(0),
});

export const ProcessFilesInput = z.object({
  file_ids: z.array(z.string().min(1)).min(1, 'At least one file id is required'),
  max_concurrent: z.number().int().min(1).max(64).optional(),
});

export const PreviewInput = z.object({
  sample_size: z.number().int().min(1).max(100000).default(100),
});
