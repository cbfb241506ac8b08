/**
 * Loading Module
 *
 * @module services/loading
 */

export { FatalStoreError } from './errors.js';
export {
  BatchLoader,
  DEFAULT_BATCH_LOADER_OPTIONS,
  type BatchLoaderOptions,
  type DuplicateRejection,
  type FlushOutcome,
} from './batch-loader.js';
