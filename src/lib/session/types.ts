/**
 * Render Session Types
 *
 * The browser seam. Readiness detection, capture and orchestration talk to
 * this interface only, never to Playwright directly.
 */

import type { Logger } from '../logging/index.js';

export type LoadCondition = 'domcontentloaded' | 'load' | 'networkidle';

export type SelectorState = 'attached' | 'detached' | 'visible' | 'hidden';

export interface ViewportSize {
  width: number;
  height: number;
}

export interface NavigateOptions {
  waitUntil: LoadCondition;
  timeout: number;
}

export interface ConsoleMessage {
  type: 'error' | 'warning';
  text: string;
  location?: string;
}

export interface SessionOptions {
  headless: boolean;
  args: string[];
  viewport: ViewportSize;
  deviceScaleFactor: number;
}

export interface RenderSession {
  readonly closed: boolean;

  /** Fails with NavigationTimeoutError or NavigationError */
  navigate(url: string, options: NavigateOptions): Promise<void>;
  /** Fails with NavigationTimeoutError */
  waitForLoadState(state: LoadCondition, timeout: number): Promise<void>;
  /** Evaluates a script expression in the page; fails with EvaluationError */
  evaluate(script: string): Promise<unknown>;
  /** Polls until the expression is truthy; fails with EvaluationError (timedOut) */
  waitForFunction(script: string, timeout: number): Promise<void>;
  /** Fails with SelectorTimeoutError */
  waitForSelector(selector: string, state: SelectorState, timeout: number): Promise<void>;
  /** Fixed settle delay */
  wait(ms: number): Promise<void>;
  setViewportSize(size: ViewportSize): Promise<void>;
  viewportSize(): ViewportSize;
  screenshot(path: string, fullPage?: boolean): Promise<void>;
  consoleMessages(): ConsoleMessage[];
  /** Terminal; releases the browser even after failed operations */
  close(): Promise<void>;
}

export type SessionFactory = (options: SessionOptions, logger?: Logger) => Promise<RenderSession>;
