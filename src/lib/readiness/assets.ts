/**
 * Asset settling after chart readiness: wait for images, then a final pause
 * so late layout (fonts, image decode) lands before capture.
 */

import type { AssetPolicy } from '../config/index.js';
import { EvaluationError, SelectorTimeoutError } from '../errors/index.js';
import type { Logger } from '../logging/index.js';
import type { RenderSession } from '../session/index.js';

export interface AssetSettleReport {
  hasImages: boolean;
  imagesVisible: boolean;
  /** Why the image wait was cut short, if it was */
  imageWaitError?: string;
}

export const HAS_IMAGES_SCRIPT = `document.querySelector('img') !== null`;

export async function settleAssets(
  session: RenderSession,
  policy: AssetPolicy,
  logger: Logger
): Promise<AssetSettleReport> {
  const report: AssetSettleReport = { hasImages: false, imagesVisible: false };

  try {
    report.hasImages = (await session.evaluate(HAS_IMAGES_SCRIPT)) === true;
  } catch (error) {
    if (!(error instanceof EvaluationError)) throw error;
    report.imageWaitError = error.message;
  }

  if (report.hasImages) {
    logger.debug('Page has images, waiting for one to be visible');
    try {
      await session.waitForSelector('img', 'visible', policy.imageTimeoutMs);
      report.imagesVisible = true;
    } catch (error) {
      if (!(error instanceof SelectorTimeoutError || error instanceof EvaluationError)) throw error;
      report.imageWaitError = error.message;
      logger.debug('Image wait expired', { reason: error.message });
    }
  }

  await session.wait(policy.finalSettleMs);
  return report;
}
