/**
 * Pipeline Module
 *
 * @module services/pipeline
 */

export {
  PipelineError,
  RunCancelledError,
  isValidCategory,
  type PipelineErrorCategory,
} from './errors.js';
export {
  PipelineOrchestrator,
  DEFAULT_PIPELINE_SETTINGS,
  type PipelineSettings,
  type RegisterOptions,
  type ProcessOptions,
  type RunProgress,
  type RunSummary,
  type FileRunOutcome,
  type BatchRunResult,
  type ConfigResolver,
} from './orchestrator.js';
export {
  previewValidation,
  PREVIEW_ERROR_LIMIT,
  type PreviewError,
  type PreviewResult,
} from './preview.js';
