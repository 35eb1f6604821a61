/**
 * Readiness Module
 *
 * Provides:
 * - Explicit readiness state machine with a transition table
 * - Library, container and render-signal probes for a chart library profile
 * - One-shot forced-redraw escalation
 * - Image and final-settle waits before capture
 */

export {
  ReadinessDetector,
  createReadinessDetector,
  type ReadinessReport,
  type ReadinessSnapshot,
  type SnapshotLabel,
  type EscalationReport,
} from './detector.js';

export {
  ReadinessState,
  ReadinessStateMachine,
  canTransition,
  classifyContainers,
  isTerminal,
  type ReadinessTransition,
} from './machine.js';

export {
  createProbeScripts,
  isContainerRendered,
  LibraryProbeSchema,
  ContainerSignalsSchema,
  RenderStatusSchema,
  ForceRenderResultSchema,
  type ProbeScripts,
  type LibraryProbe,
  type ContainerSignals,
  type ForceRenderResult,
} from './probes.js';

export {
  settleAssets,
  HAS_IMAGES_SCRIPT,
  type AssetSettleReport,
} from './assets.js';
