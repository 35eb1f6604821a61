/**
 * Session Module
 *
 * Provides:
 * - Browser-independent RenderSession interface
 * - Playwright (Chromium) implementation
 * - Timeout mapping onto named, recoverable errors
 * - Console error capture
 */

export {
  PlaywrightSession,
  openPlaywrightSession,
} from './playwright-session.js';

export type {
  RenderSession,
  SessionFactory,
  SessionOptions,
  NavigateOptions,
  LoadCondition,
  SelectorState,
  ViewportSize,
  ConsoleMessage,
} from './types.js';
