/**
 * Orchestrator Module
 *
 * Provides:
 * - End-to-end render of one document to PNG
 * - Scoped acquisition with reverse-order release on every exit path
 * - Global deadline and per-phase timings
 * - Rendering of in-memory HTML strings
 */

export {
  Orchestrator,
  createOrchestrator,
  renderDocument,
  type RenderOptions,
  type RenderResult,
  type RenderStatus,
  type RenderWarning,
  type WarningCode,
  type OrchestratorDeps,
  type ServerLike,
} from './orchestrator.js';

export { renderHtml } from './html.js';

export {
  ResourceScope,
  describeReleaseFailure,
  type ReleaseFailure,
} from './scope.js';
