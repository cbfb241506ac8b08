/**
 * Loading errors
 *
 * @module services/loading/errors
 */

/**
 * The store failed for a reason other than a unique-key violation. The batch
 * in flight is not committed; batches committed before it stay.
 */
export class FatalStoreError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'FatalStoreError';
  }
}
