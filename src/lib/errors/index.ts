/**
 * Errors Module
 *
 * Provides:
 * - One error class per named failure kind
 * - Retryable / non-retryable classification
 * - Phase-tagged diagnostics for CLI output
 */

export {
  ChartshotError,
  PortInUseError,
  ServerDidNotStartError,
  ServerUnreachableError,
  SessionOpenError,
  InvalidServedRootError,
  DocumentNotFoundError,
  DocumentOutsideServedRootError,
  NavigationTimeoutError,
  NavigationError,
  EvaluationError,
  SelectorTimeoutError,
  CaptureError,
  RenderTimeoutError,
  isChartshotError,
  errorMessage,
  describeError,
  systemErrorCode,
  type RenderPhase,
  type ErrorCode,
} from './errors.js';
