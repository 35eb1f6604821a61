/**
 * Render Errors
 *
 * Named failure kinds for every phase of the render pipeline. Batch callers
 * branch on `code` and `retryable` rather than on message text.
 */

// ============================================================================
// Types
// ============================================================================

export type RenderPhase =
  | 'input'
  | 'server'
  | 'probe'
  | 'session'
  | 'navigation'
  | 'readiness'
  | 'capture'
  | 'deadline';

export type ErrorCode =
  | 'PORT_IN_USE'
  | 'SERVER_DID_NOT_START'
  | 'SERVER_UNREACHABLE'
  | 'SESSION_OPEN_FAILED'
  | 'INVALID_SERVED_ROOT'
  | 'DOCUMENT_NOT_FOUND'
  | 'DOCUMENT_OUTSIDE_SERVED_ROOT'
  | 'NAVIGATION_TIMEOUT'
  | 'NAVIGATION_FAILED'
  | 'EVALUATION_FAILED'
  | 'SELECTOR_TIMEOUT'
  | 'CAPTURE_FAILED'
  | 'RENDER_TIMEOUT';

interface ErrorDetails {
  cause?: unknown;
}

// ============================================================================
// Base
// ============================================================================

export abstract class ChartshotError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly phase: RenderPhase;
  /** Whether the same call may succeed if simply tried again */
  abstract readonly retryable: boolean;

  constructor(message: string, details: ErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = new.target.name;
  }
}

// ============================================================================
// Acquisition
// ============================================================================

export class PortInUseError extends ChartshotError {
  readonly code = 'PORT_IN_USE';
  readonly phase = 'server';
  readonly retryable = true;

  constructor(readonly port: number, details?: ErrorDetails) {
    super(`Port ${port} is already in use`, details);
  }
}

export class ServerDidNotStartError extends ChartshotError {
  readonly code = 'SERVER_DID_NOT_START';
  readonly phase = 'server';
  readonly retryable = true;
}

export class ServerUnreachableError extends ChartshotError {
  readonly code = 'SERVER_UNREACHABLE';
  readonly phase = 'probe';
  readonly retryable = true;

  constructor(readonly url: string, details?: ErrorDetails) {
    super(`Content server at ${url} could not be reached`, details);
  }
}

export class SessionOpenError extends ChartshotError {
  readonly code = 'SESSION_OPEN_FAILED';
  readonly phase = 'session';
  readonly retryable = true;
}

// ============================================================================
// Input
// ============================================================================

export class InvalidServedRootError extends ChartshotError {
  readonly code = 'INVALID_SERVED_ROOT';
  readonly phase = 'input';
  readonly retryable = false;

  constructor(readonly rootDir: string, reason: string, details?: ErrorDetails) {
    super(`Served root ${rootDir} ${reason}`, details);
  }
}

export class DocumentNotFoundError extends ChartshotError {
  readonly code = 'DOCUMENT_NOT_FOUND';
  readonly phase = 'input';
  readonly retryable = false;

  constructor(readonly documentPath: string, details?: ErrorDetails) {
    super(`Document not found: ${documentPath}`, details);
  }
}

export class DocumentOutsideServedRootError extends ChartshotError {
  readonly code = 'DOCUMENT_OUTSIDE_SERVED_ROOT';
  readonly phase = 'input';
  readonly retryable = false;

  constructor(readonly documentPath: string, readonly rootDir: string) {
    super(`Document ${documentPath} is not inside served root ${rootDir}`);
  }
}

// ============================================================================
// Page primitives
// ============================================================================

export class NavigationTimeoutError extends ChartshotError {
  readonly code = 'NAVIGATION_TIMEOUT';
  readonly phase = 'navigation';
  readonly retryable = true;

  constructor(readonly url: string, readonly condition: string, readonly timeoutMs: number, details?: ErrorDetails) {
    super(`Timed out after ${timeoutMs}ms waiting for ${condition} on ${url}`, details);
  }
}

export class NavigationError extends ChartshotError {
  readonly code = 'NAVIGATION_FAILED';
  readonly phase = 'navigation';
  readonly retryable = false;
}

export class EvaluationError extends ChartshotError {
  readonly code = 'EVALUATION_FAILED';
  readonly phase = 'readiness';
  readonly retryable = false;
  readonly timedOut: boolean;

  constructor(message: string, details: ErrorDetails & { timedOut?: boolean } = {}) {
    super(message, details);
    this.timedOut = details.timedOut ?? false;
  }
}

export class SelectorTimeoutError extends ChartshotError {
  readonly code = 'SELECTOR_TIMEOUT';
  readonly phase = 'readiness';
  readonly retryable = false;

  constructor(readonly selector: string, readonly timeoutMs: number, details?: ErrorDetails) {
    super(`Timed out after ${timeoutMs}ms waiting for selector ${selector}`, details);
  }
}

// ============================================================================
// Capture & deadline
// ============================================================================

export class CaptureError extends ChartshotError {
  readonly code = 'CAPTURE_FAILED';
  readonly phase = 'capture';
  readonly retryable = false;

  constructor(readonly outputPath: string, reason: string, details?: ErrorDetails) {
    super(`Could not write ${outputPath}: ${reason}`, details);
  }
}

export class RenderTimeoutError extends ChartshotError {
  readonly code = 'RENDER_TIMEOUT';
  readonly phase = 'deadline';
  readonly retryable = true;

  constructor(readonly timeoutMs: number, readonly activePhase: string) {
    super(`Render exceeded ${timeoutMs}ms (during ${activePhase})`);
  }
}

// ============================================================================
// Helpers
// ============================================================================

export function isChartshotError(error: unknown): error is ChartshotError {
  return error instanceof ChartshotError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * One-line diagnostic naming the phase that failed.
 */
export function describeError(error: unknown): string {
  if (isChartshotError(error)) {
    const hint = error.retryable ? 'retryable' : 'not retryable';
    return `[${error.phase}] ${error.code}: ${error.message} (${hint})`;
  }
  return `[unknown] ${errorMessage(error)}`;
}

/**
 * Node system error code (EADDRINUSE, ENOENT, ...), if any.
 */
export function systemErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
