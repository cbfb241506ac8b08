/**
 * Tabular Ingest - Data Models
 *
 * Barrel export for all model interfaces.
 */

// Source file models
export * from './source-file.js';

// Row model
export * from './row.js';

// Validation rule models
export * from './validation-rule.js';

// Error ledger models
export * from './validation-error.js';

// Run summary
export * from './load-result.js';

// Table configuration
export * from './table-config.js';
