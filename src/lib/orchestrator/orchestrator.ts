/**
 * Render Orchestrator
 *
 * Turns one HTML document into one PNG:
 *
 *   resolve → server → probe → session → navigate → readiness → assets → capture
 *
 * Every render owns a fresh content server and browser session. Both are
 * released on every exit path, session first, then server.
 */

import { resolve } from 'path';
import { createCapturer, resolveOutputPath, type CaptureResult } from '../capture/index.js';
import { DEFAULT_POLICY, type RenderPolicy } from '../config/index.js';
import { resolveTargetDocument, toDocumentUrl, type TargetDocument } from '../documents/index.js';
import {
  NavigationTimeoutError,
  RenderTimeoutError,
  SessionOpenError,
  errorMessage,
  isChartshotError,
} from '../errors/index.js';
import { createLogger, PhaseTimer, type Logger, type LogSink } from '../logging/index.js';
import {
  createReadinessDetector,
  settleAssets,
  ReadinessState,
  type AssetSettleReport,
  type ReadinessReport,
} from '../readiness/index.js';
import { createContentServer, probeServer, type ContentServerConfig, type ServerHandle } from '../server/index.js';
import {
  openPlaywrightSession,
  type ConsoleMessage,
  type RenderSession,
  type SessionFactory,
} from '../session/index.js';
import { ResourceScope, describeReleaseFailure } from './scope.js';

// ============================================================================
// Types
// ============================================================================

export interface RenderOptions {
  /** Defaults to the document path with a .png extension */
  outputPath?: string;
  /** Served root; defaults to the policy root, then the working directory */
  root?: string;
  viewportWidth?: number;
  /** Preferred server port; 0 picks any free port */
  port?: number;
  debug?: boolean;
}

export type RenderStatus = 'ok' | 'degraded';

export type WarningCode =
  | 'server-probe-status'
  | 'network-idle-timeout'
  | 'readiness-timed-out'
  | 'image-wait'
  | 'release-failed';

export interface RenderWarning {
  code: WarningCode;
  message: string;
}

export interface RenderResult {
  documentPath: string;
  outputPath: string;
  url: string;
  /** `degraded` when readiness timed out and the capture is best-effort */
  status: RenderStatus;
  readiness: ReadinessReport;
  assets: AssetSettleReport;
  capture: CaptureResult;
  warnings: RenderWarning[];
  timings: Record<string, number>;
  consoleMessages: ConsoleMessage[];
}

export interface ServerLike {
  start(): Promise<ServerHandle>;
  shutdown(): Promise<void>;
}

export interface OrchestratorDeps {
  createServer?: (config: ContentServerConfig) => ServerLike;
  openSession?: SessionFactory;
  logSink?: LogSink;
}

// ============================================================================
// Orchestrator
// ============================================================================

export class Orchestrator {
  private policy: RenderPolicy;
  private createServer: (config: ContentServerConfig) => ServerLike;
  private openSession: SessionFactory;
  private logSink?: LogSink;

  constructor(policy: RenderPolicy = DEFAULT_POLICY, deps: OrchestratorDeps = {}) {
    this.policy = policy;
    this.createServer = deps.createServer ?? createContentServer;
    this.openSession = deps.openSession ?? openPlaywrightSession;
    this.logSink = deps.logSink;
  }

  /**
   * Render a document to PNG. Resolves for `ok` and `degraded` outcomes;
   * rejects with a named ChartshotError for fatal ones.
   */
  async render(documentPath: string, options: RenderOptions = {}): Promise<RenderResult> {
    const logger = createLogger('Render', { debug: options.debug, sink: this.logSink });
    const timer = new PhaseTimer(logger);
    const root = resolve(options.root ?? this.policy.root ?? process.cwd());

    // Path checks come before any acquisition
    const target = await timer.measure('resolve', () => resolveTargetDocument(root, documentPath));
    const outputPath = resolveOutputPath(target.absolutePath, options.outputPath);
    logger.info(`📸 ${target.relativePath} → ${outputPath}`);

    const scope = new ResourceScope((failure) =>
      logger.warn(`Late release of ${describeReleaseFailure(failure)}`)
    );
    const warnings: RenderWarning[] = [];
    const pipeline = this.runPipeline(target, root, outputPath, options, { scope, timer, logger, warnings });

    let result: RenderResult | undefined;
    let thrown: unknown;
    try {
      result = await withDeadline(pipeline, this.policy.renderTimeoutMs, () => timer.activePhase);
      return result;
    } catch (error) {
      thrown = error;
      logger.error(`Render failed during ${isChartshotError(error) ? error.phase : timer.activePhase}`, error);
      throw error;
    } finally {
      const failures = await timer.measure('teardown', async () => {
        const released = await scope.release();
        // A pipeline that lost the deadline may still be acquiring; anything
        // it registers from here on is released on the spot
        await pipeline.then(
          () => undefined,
          (error: unknown) => {
            if (error !== thrown) logger.debug('Abandoned render settled', { reason: errorMessage(error) });
          }
        );
        return released;
      });
      for (const failure of failures) {
        const message = `Could not release ${describeReleaseFailure(failure)}`;
        logger.warn(message);
        result?.warnings.push({ code: 'release-failed', message });
      }
      if (result) {
        result.timings = timer.getTimings();
        logger.debug('Timings', result.timings);
      }
    }
  }

  private async runPipeline(
    target: TargetDocument,
    root: string,
    outputPath: string,
    options: RenderOptions,
    ctx: PipelineContext
  ): Promise<RenderResult> {
    const { scope, timer, logger, warnings } = ctx;
    const { server: serverPolicy, browser, navigation } = this.policy;

    const handle = await timer.measure('server', async () => {
      const server = this.createServer({
        rootDir: root,
        port: options.port ?? serverPolicy.port,
        host: serverPolicy.host,
        probeAttempts: serverPolicy.probeAttempts,
        probeIntervalMs: serverPolicy.probeIntervalMs,
        probeTimeoutMs: serverPolicy.probeTimeoutMs,
        logger: logger.child('Server'),
      });
      const started = await server.start();
      await scope.defer('content server', () => server.shutdown());
      if (scope.isClosed) throw new Error('Content server started after teardown');
      return started;
    });

    await timer.measure('probe', async () => {
      const status = await probeServer(handle.baseUrl, serverPolicy.probeTimeoutMs);
      if (status !== 200) {
        warnings.push({ code: 'server-probe-status', message: `Server root answered ${status}` });
        logger.warn(`Server root answered ${status}`);
      }
    });

    const session = await timer.measure('session', async () => {
      let opened: RenderSession;
      try {
        opened = await this.openSession({
          headless: browser.headless,
          args: browser.args,
          viewport: { width: options.viewportWidth ?? browser.viewport.width, height: browser.viewport.height },
          deviceScaleFactor: browser.deviceScaleFactor,
        }, logger.child('Session'));
      } catch (error) {
        if (error instanceof SessionOpenError) throw error;
        throw new SessionOpenError(`Could not open a browser session: ${errorMessage(error)}`, { cause: error });
      }
      await scope.defer('render session', () => opened.close());
      if (scope.isClosed) throw new Error('Render session opened after teardown');
      return opened;
    });

    const url = toDocumentUrl(handle.baseUrl, target.relativePath);
    logger.debug(`Loading ${url}`);

    await timer.measure('navigate', async () => {
      await session.navigate(url, { waitUntil: 'domcontentloaded', timeout: navigation.structuralTimeoutMs });
      try {
        await session.waitForLoadState('networkidle', navigation.networkIdleTimeoutMs);
      } catch (error) {
        if (!(error instanceof NavigationTimeoutError)) throw error;
        const message = `Network still busy after ${navigation.networkIdleTimeoutMs}ms; continuing`;
        warnings.push({ code: 'network-idle-timeout', message });
        logger.warn(message);
      }
    });

    const readiness = await timer.measure('readiness', () =>
      createReadinessDetector(session, this.policy.readiness, logger.child('Readiness')).detect()
    );
    if (readiness.state === ReadinessState.TimedOut) {
      warnings.push({
        code: 'readiness-timed-out',
        message: 'Charts did not report complete rendering; capture is best-effort',
      });
    }

    const assets = await timer.measure('assets', () =>
      settleAssets(session, this.policy.assets, logger.child('Readiness'))
    );
    if (assets.hasImages && !assets.imagesVisible) {
      warnings.push({ code: 'image-wait', message: `Images not visible: ${assets.imageWaitError ?? 'unknown'}` });
    }

    const capture = await timer.measure('capture', () =>
      createCapturer({ width: options.viewportWidth ?? browser.viewport.width }, logger.child('Capture')).capture(
        session,
        outputPath
      )
    );

    const consoleMessages = session.consoleMessages();
    for (const message of consoleMessages) {
      logger.debug(`Page ${message.type}: ${message.text}`);
    }

    return {
      documentPath: target.absolutePath,
      outputPath: capture.outputPath,
      url,
      status: readiness.state === ReadinessState.TimedOut ? 'degraded' : 'ok',
      readiness,
      assets,
      capture,
      warnings,
      timings: {},
      consoleMessages,
    };
  }
}

interface PipelineContext {
  scope: ResourceScope;
  timer: PhaseTimer;
  logger: Logger;
  warnings: RenderWarning[];
}

/**
 * Race `work` against a global deadline. The losing pipeline keeps running
 * until its resources are torn down underneath it; its outcome is ignored.
 */
async function withDeadline<T>(work: Promise<T>, timeoutMs: number, activePhase: () => string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new RenderTimeoutError(timeoutMs, activePhase())), timeoutMs);
  });
  try {
    return await Promise.race([work, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createOrchestrator(policy?: RenderPolicy, deps?: OrchestratorDeps): Orchestrator {
  return new Orchestrator(policy, deps);
}

/**
 * Quick render function
 */
export async function renderDocument(
  documentPath: string,
  options: RenderOptions = {},
  policy?: RenderPolicy
): Promise<RenderResult> {
  return new Orchestrator(policy).render(documentPath, options);
}
