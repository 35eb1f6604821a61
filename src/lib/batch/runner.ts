/**
 * Batch Rendering
 *
 * Render every report document under a set of directories, one after
 * another. Each document gets its own server and browser session; a failure
 * is recorded and the batch moves on.
 */

import { readdir, stat } from 'fs/promises';
import { basename, extname, join, resolve } from 'path';
import { describeError, errorMessage, isChartshotError, type ErrorCode } from '../errors/index.js';
import { createLogger, type Logger } from '../logging/index.js';
import type { RenderOptions, RenderResult } from '../orchestrator/index.js';

// ============================================================================
// Types
// ============================================================================

export interface DiscoverOptions {
  /** Only files with exactly this name (e.g. `report_dashboard.html`) */
  fileName?: string;
  /** Extensions to collect when no fileName is given */
  extensions?: string[];
}

export type BatchOutcome =
  | { documentPath: string; status: 'rendered' | 'degraded'; outputPath: string; warnings: string[]; durationMs: number }
  | { documentPath: string; status: 'failed'; error: { code: ErrorCode | 'UNKNOWN'; message: string; retryable: boolean }; durationMs: number };

export interface BatchSummary {
  total: number;
  rendered: number;
  degraded: number;
  failed: number;
  /** Failed documents that may succeed on a second run */
  retryable: string[];
  outcomes: BatchOutcome[];
  startedAt: string;
  finishedAt: string;
}

export type RenderFn = (documentPath: string, options: RenderOptions) => Promise<RenderResult>;

// ============================================================================
// Discovery
// ============================================================================

/**
 * Walk directories (or accept files directly) and collect documents, sorted.
 */
export async function discoverDocuments(paths: string[], options: DiscoverOptions = {}): Promise<string[]> {
  const extensions = (options.extensions ?? ['.html', '.htm']).map(ext => ext.toLowerCase());
  const matches = (file: string) =>
    options.fileName ? basename(file) === options.fileName : extensions.includes(extname(file).toLowerCase());

  const found = new Set<string>();

  const walk = async (dir: string): Promise<void> => {
    const entries = await readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const full = join(dir, entry.name);
      if (entry.isDirectory()) {
        if (entry.name === 'node_modules' || entry.name.startsWith('.')) continue;
        await walk(full);
      } else if (entry.isFile() && matches(entry.name)) {
        found.add(full);
      }
    }
  };

  for (const path of paths) {
    const absolute = resolve(path);
    const stats = await stat(absolute);
    if (stats.isDirectory()) {
      await walk(absolute);
    } else if (stats.isFile()) {
      found.add(absolute);
    }
  }

  return [...found].sort();
}

// ============================================================================
// Batch Runner
// ============================================================================

export class BatchRunner {
  private logger: Logger;

  constructor(
    private render: RenderFn,
    private options: RenderOptions = {},
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger('Batch', { debug: options.debug });
  }

  async run(documents: string[]): Promise<BatchSummary> {
    const startedAt = new Date().toISOString();
    const outcomes: BatchOutcome[] = [];

    for (const [index, documentPath] of documents.entries()) {
      this.logger.info(`(${index + 1}/${documents.length}) ${documentPath}`);
      outcomes.push(await this.renderOne(documentPath));
    }

    const summary: BatchSummary = {
      total: outcomes.length,
      rendered: outcomes.filter(o => o.status === 'rendered').length,
      degraded: outcomes.filter(o => o.status === 'degraded').length,
      failed: outcomes.filter(o => o.status === 'failed').length,
      retryable: outcomes.flatMap(o => (o.status === 'failed' && o.error.retryable ? [o.documentPath] : [])),
      outcomes,
      startedAt,
      finishedAt: new Date().toISOString(),
    };

    this.logger.info(
      `Done: ${summary.rendered} rendered, ${summary.degraded} degraded, ${summary.failed} failed`
    );
    return summary;
  }

  private async renderOne(documentPath: string): Promise<BatchOutcome> {
    const startTime = Date.now();
    try {
      const result = await this.render(documentPath, { ...this.options, outputPath: undefined });
      return {
        documentPath,
        status: result.status === 'ok' ? 'rendered' : 'degraded',
        outputPath: result.outputPath,
        warnings: result.warnings.map(w => w.message),
        durationMs: Date.now() - startTime,
      };
    } catch (error) {
      this.logger.error(`✗ ${describeError(error)}`);
      return {
        documentPath,
        status: 'failed',
        error: isChartshotError(error)
          ? { code: error.code, message: error.message, retryable: error.retryable }
          : { code: 'UNKNOWN', message: errorMessage(error), retryable: false },
        durationMs: Date.now() - startTime,
      };
    }
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createBatchRunner(render: RenderFn, options?: RenderOptions, logger?: Logger): BatchRunner {
  return new BatchRunner(render, options, logger);
}
