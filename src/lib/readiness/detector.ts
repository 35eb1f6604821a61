/**
 * Readiness Detector
 *
 * Observes an opaque, script-driven chart render through DOM polling only.
 * The library gives no completion callback, so completion is inferred from
 * structural signals per container (canvas, svg or a marks subtree), with a
 * single forced-redraw escalation when the initial settle window is not
 * enough.
 *
 * Timeouts inside the detector are never fatal: a page that does not
 * converge ends in `timed-out` and is still captured.
 */

import type { z } from 'zod';
import type { ReadinessPolicy } from '../config/index.js';
import { EvaluationError, SelectorTimeoutError, errorMessage, isChartshotError } from '../errors/index.js';
import { createLogger, type Logger } from '../logging/index.js';
import type { RenderSession } from '../session/index.js';
import {
  ReadinessState,
  ReadinessStateMachine,
  type ReadinessTransition,
} from './machine.js';
import {
  createProbeScripts,
  isContainerRendered,
  ForceRenderResultSchema,
  LibraryProbeSchema,
  RenderStatusSchema,
  type ContainerSignals,
  type ForceRenderResult,
  type LibraryProbe,
  type ProbeScripts,
} from './probes.js';

// ============================================================================
// Types
// ============================================================================

export type SnapshotLabel = 'initial' | 'post-escalation';

export interface ReadinessSnapshot {
  label: SnapshotLabel;
  containers: ContainerSignals[];
  rendered: number;
  total: number;
  /** Set when the status probe itself failed */
  error?: string;
}

export interface EscalationReport {
  result: ForceRenderResult | null;
  error?: string;
}

export interface ReadinessReport {
  state: ReadinessState;
  library: (LibraryProbe & { name: string }) | null;
  transitions: ReadinessTransition[];
  snapshots: ReadinessSnapshot[];
  escalation: EscalationReport | null;
  /** Recoverable waits that expired on the way */
  timeouts: string[];
  elapsedMs: number;
}

// ============================================================================
// Readiness Detector
// ============================================================================

export class ReadinessDetector {
  private scripts: ProbeScripts;
  private machine: ReadinessStateMachine;
  private snapshots: ReadinessSnapshot[] = [];
  private timeouts: string[] = [];
  private escalation: EscalationReport | null = null;
  private library: (LibraryProbe & { name: string }) | null = null;
  private started = false;

  constructor(
    private session: RenderSession,
    private policy: ReadinessPolicy,
    private logger: Logger = createLogger('Readiness')
  ) {
    this.scripts = createProbeScripts(policy.library);
    this.machine = new ReadinessStateMachine((t) =>
      this.logger.debug(`${t.from} → ${t.to}`, { at: t.at, reason: t.reason })
    );
  }

  /**
   * Run the detector to a terminal state. One detector serves one render
   * attempt.
   */
  async detect(): Promise<ReadinessReport> {
    if (this.started) {
      throw new Error('ReadinessDetector.detect() may only run once per render attempt');
    }
    this.started = true;
    const startedAt = Date.now();

    await this.run();

    const report: ReadinessReport = {
      state: this.machine.state,
      library: this.library,
      transitions: this.machine.transitions,
      snapshots: [...this.snapshots],
      escalation: this.escalation,
      timeouts: [...this.timeouts],
      elapsedMs: Date.now() - startedAt,
    };

    if (report.state === ReadinessState.TimedOut) {
      this.logger.warn(`Charts did not finish rendering after escalation (${this.describeLastSnapshot()})`);
    } else {
      this.logger.info(`✓ Readiness: ${report.state} in ${report.elapsedMs}ms`);
    }
    return report;
  }

  private async run(): Promise<void> {
    const { library: profile } = this.policy;

    const probe = await this.probeLibrary();
    if (!probe.hasGlobal && !probe.hasScriptTag) {
      this.machine.transition(ReadinessState.FullyRendered, `no ${profile.name} on page`);
      return;
    }
    this.library = { ...probe, name: profile.name };
    this.machine.transition(
      ReadinessState.LibraryDetected,
      probe.hasGlobal ? `${profile.globalSymbol} defined` : `${profile.name} script tag present`
    );

    if (!probe.hasGlobal) {
      await this.recoverable(`library global ${profile.globalSymbol}`, () =>
        this.session.waitForFunction(this.scripts.libraryReady, this.policy.libraryTimeoutMs)
      );
    }

    const attached = await this.recoverable(`container ${profile.containerSelector}`, () =>
      this.session.waitForSelector(profile.containerSelector, 'attached', this.policy.containerTimeoutMs)
    );
    if (attached) {
      this.machine.transition(ReadinessState.ContainersFound, `${profile.containerSelector} attached`);
    }

    await this.session.wait(this.policy.initialSettleMs);
    this.machine.advance(await this.snapshot('initial'), 'initial settle');
    if (this.machine.state === ReadinessState.FullyRendered) return;

    await this.escalate();

    const finalState = this.machine.advance(await this.snapshot('post-escalation'), 'after forced redraw');
    if (finalState !== ReadinessState.FullyRendered) {
      this.machine.transition(ReadinessState.TimedOut, 'not fully rendered after escalation');
    }
  }

  // --------------------------------------------------------------------------
  // Phases
  // --------------------------------------------------------------------------

  private async probeLibrary(): Promise<LibraryProbe> {
    try {
      return await this.evaluateParsed(this.scripts.library, LibraryProbeSchema);
    } catch (error) {
      if (!(error instanceof EvaluationError)) throw error;
      // An unreadable page is treated as chart-free rather than stalling
      this.logger.warn(`Library probe failed: ${error.message}`);
      return { hasGlobal: false, hasScriptTag: false };
    }
  }

  /**
   * Forced redraw. Runs at most once per detector.
   */
  private async escalate(): Promise<void> {
    if (this.escalation !== null) {
      throw new Error('Escalation already ran for this render attempt');
    }
    const escalation: EscalationReport = { result: null };
    this.escalation = escalation;
    this.logger.debug('Escalating: forcing chart redraw');

    try {
      escalation.result = await this.evaluateParsed(this.scripts.forceRender, ForceRenderResultSchema);
      this.logger.debug('Forced redraw', escalation.result);
    } catch (error) {
      if (!(error instanceof EvaluationError)) throw error;
      escalation.error = error.message;
      this.logger.warn(`Forced redraw failed: ${error.message}`);
    }

    await this.session.wait(this.policy.escalationSettleMs);
  }

  private async snapshot(label: SnapshotLabel): Promise<ContainerSignals[]> {
    let containers: ContainerSignals[] = [];
    let failure: string | undefined;

    try {
      containers = await this.evaluateParsed(this.scripts.status, RenderStatusSchema);
    } catch (error) {
      if (!(error instanceof EvaluationError)) throw error;
      failure = error.message;
    }

    const snapshot: ReadinessSnapshot = {
      label,
      containers,
      rendered: containers.filter(isContainerRendered).length,
      total: containers.length,
      ...(failure === undefined ? {} : { error: failure }),
    };
    this.snapshots.push(snapshot);
    this.logger.debug(`Snapshot ${label}`, snapshot);
    return containers;
  }

  // --------------------------------------------------------------------------
  // Helpers
  // --------------------------------------------------------------------------

  private async evaluateParsed<T extends z.ZodTypeAny>(script: string, schema: T): Promise<z.infer<T>> {
    const value = await this.session.evaluate(script);
    const parsed = schema.safeParse(value);
    if (!parsed.success) {
      throw new EvaluationError(`Unexpected probe result: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  /**
   * Run a bounded wait whose expiry is a signal, not a failure. Resolves
   * false when it expired.
   */
  private async recoverable(label: string, wait: () => Promise<void>): Promise<boolean> {
    try {
      await wait();
      return true;
    } catch (error) {
      if (error instanceof SelectorTimeoutError || error instanceof EvaluationError) {
        this.timeouts.push(label);
        this.logger.debug(`Wait for ${label} expired`, { reason: errorMessage(error) });
        return false;
      }
      if (isChartshotError(error)) {
        this.logger.warn(`Wait for ${label} failed: ${error.message}`);
      }
      throw error;
    }
  }

  private describeLastSnapshot(): string {
    const last = this.snapshots[this.snapshots.length - 1];
    if (!last) return 'no snapshot';
    return `${last.rendered}/${last.total} containers rendered`;
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createReadinessDetector(
  session: RenderSession,
  policy: ReadinessPolicy,
  logger?: Logger
): ReadinessDetector {
  return new ReadinessDetector(session, policy, logger);
}
