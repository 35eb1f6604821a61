/**
 * Full-page Capture
 *
 * Re-measures the rendered document after readiness has settled, sizes the
 * viewport to exactly that height and writes a full-page PNG.
 */

import { stat } from 'fs/promises';
import { dirname, extname, join, basename, resolve } from 'path';
import { z } from 'zod';
import { CaptureError, EvaluationError, errorMessage, systemErrorCode } from '../errors/index.js';
import { createLogger, type Logger } from '../logging/index.js';
import type { RenderSession } from '../session/index.js';

// ============================================================================
// Types
// ============================================================================

export interface CaptureOptions {
  /** Viewport width for the capture; defaults to the session's current width */
  width?: number;
}

export interface CaptureResult {
  outputPath: string;
  width: number;
  resolvedViewportHeight: number;
  capturedAt: string;
}

export const SCROLL_HEIGHT_SCRIPT = 'document.documentElement.scrollHeight';

const HeightSchema = z.number().finite().nonnegative();

// ============================================================================
// Output paths
// ============================================================================

/**
 * The explicit output path, else the document path with a .png extension in
 * the same directory.
 */
export function resolveOutputPath(documentPath: string, outputPath?: string): string {
  if (outputPath) return resolve(outputPath);

  const absolute = resolve(documentPath);
  const stem = basename(absolute, extname(absolute));
  return join(dirname(absolute), `${stem}.png`);
}

// ============================================================================
// Capturer
// ============================================================================

export class Capturer {
  private width: number | undefined;
  private logger: Logger;

  constructor(options: CaptureOptions = {}, logger: Logger = createLogger('Capture')) {
    this.width = options.width;
    this.logger = logger;
  }

  async capture(session: RenderSession, outputPath: string): Promise<CaptureResult> {
    const target = resolve(outputPath);
    await this.ensureParentDir(target);

    const height = await this.measureHeight(session, target);
    const width = this.width ?? session.viewportSize().width;

    try {
      await session.setViewportSize({ width, height });
    } catch (error) {
      throw new CaptureError(target, `could not resize viewport to ${width}x${height}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    this.logger.debug(`Viewport resized to ${width}x${height}`);

    try {
      await session.screenshot(target, true);
    } catch (error) {
      throw new CaptureError(target, errorMessage(error), { cause: error });
    }

    this.logger.info(`✓ Captured ${width}x${height} → ${target}`);
    return {
      outputPath: target,
      width,
      resolvedViewportHeight: height,
      capturedAt: new Date().toISOString(),
    };
  }

  // --------------------------------------------------------------------------
  // Helpers
  // --------------------------------------------------------------------------

  private async ensureParentDir(target: string): Promise<void> {
    const parent = dirname(target);
    try {
      const stats = await stat(parent);
      if (!stats.isDirectory()) {
        throw new CaptureError(target, `${parent} is not a directory`);
      }
    } catch (error) {
      if (error instanceof CaptureError) throw error;
      const reason = systemErrorCode(error) === 'ENOENT' ? `${parent} does not exist` : errorMessage(error);
      throw new CaptureError(target, reason, { cause: error });
    }
  }

  private async measureHeight(session: RenderSession, target: string): Promise<number> {
    let value: unknown;
    try {
      value = await session.evaluate(SCROLL_HEIGHT_SCRIPT);
    } catch (error) {
      if (!(error instanceof EvaluationError)) throw error;
      throw new CaptureError(target, `could not measure page height: ${error.message}`, { cause: error });
    }

    const parsed = HeightSchema.safeParse(value);
    if (!parsed.success) {
      throw new CaptureError(target, `page height was not a number: ${String(value)}`);
    }
    return Math.max(1, Math.ceil(parsed.data));
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createCapturer(options?: CaptureOptions, logger?: Logger): Capturer {
  return new Capturer(options, logger);
}
