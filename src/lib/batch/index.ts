/**
 * Batch Module
 *
 * Provides:
 * - Recursive document discovery by extension or exact file name
 * - Sequential rendering with per-document outcomes
 * - Retryable / non-retryable failure summary
 */

export {
  BatchRunner,
  createBatchRunner,
  discoverDocuments,
  type BatchOutcome,
  type BatchSummary,
  type DiscoverOptions,
  type RenderFn,
} from './runner.js';
