/**
 * Validation rule model
 *
 * Rules are a closed union tagged by `kind`. They are built from JSON
 * configuration by utils/validation.ts, which compiles patterns up front so a
 * malformed rule is rejected before any row is read.
 */

/** Kinds a rule may be configured with */
export const RULE_KINDS = ['REQUIRED', 'FORMAT', 'RANGE', 'LENGTH', 'DUPLICATE'] as const;

export type RuleKind = (typeof RULE_KINDS)[number];

/** Kinds a validation error may carry. UNKNOWN is an outcome, never configured. */
export type ValidationErrorKind = RuleKind | 'UNKNOWN';

export const VALIDATION_ERROR_KINDS: readonly ValidationErrorKind[] = [...RULE_KINDS, 'UNKNOWN'];

interface RuleBase {
  /** Source field the rule is bound to */
  field: string;
  /** Replaces the default error message */
  message?: string;
}

export interface RequiredRule extends RuleBase {
  kind: 'REQUIRED';
}

export interface FormatRule extends RuleBase {
  kind: 'FORMAT';
  /** Source pattern as configured (or the preset's pattern) */
  pattern: string;
  /** Anchored form of `pattern`, compiled at config load */
  regex: RegExp;
}

export interface RangeRule extends RuleBase {
  kind: 'RANGE';
  min?: number;
  max?: number;
}

export interface LengthRule extends RuleBase {
  kind: 'LENGTH';
  max: number;
}

/** Declares a unique key; enforced by the target table at load time */
export interface DuplicateRule extends RuleBase {
  kind: 'DUPLICATE';
}

export type ValidationRule = RequiredRule | FormatRule | RangeRule | LengthRule | DuplicateRule;

/**
 * Named FORMAT patterns
 */
export const FORMAT_PRESETS = {
  email: '[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\\.[a-zA-Z]{2,}',
  phone: '\\+?[\\d\\s-]{10,20}',
  iso_date: '\\d{4}-(0[1-9]|1[0-2])-(0[1-9]|[12]\\d|3[01])',
} as const;

export type FormatPreset = keyof typeof FORMAT_PRESETS;
