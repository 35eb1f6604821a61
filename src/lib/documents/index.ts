/**
 * Documents Module
 *
 * Provides:
 * - Served root validation
 * - Root-relative document resolution with path-safety checks
 * - Server URL construction
 */

export {
  resolveServedRoot,
  resolveTargetDocument,
  isWithinRoot,
  toDocumentUrl,
  type TargetDocument,
} from './target.js';
