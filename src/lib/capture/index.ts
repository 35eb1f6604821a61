/**
 * Capture Module
 *
 * Provides:
 * - Output path derivation (document path with .png extension)
 * - Viewport re-measure and resize to the full document height
 * - Full-page PNG capture with I/O failures surfaced as CaptureError
 */

export {
  Capturer,
  createCapturer,
  resolveOutputPath,
  SCROLL_HEIGHT_SCRIPT,
  type CaptureOptions,
  type CaptureResult,
} from './capturer.js';
