/**
 * Playwright Render Session
 *
 * One Chromium process, one context, one page. Playwright timeouts are
 * mapped onto the named errors so callers can treat them as recoverable.
 */

import { chromium, errors, type Browser, type BrowserContext, type Page } from 'playwright';
import {
  EvaluationError,
  NavigationError,
  NavigationTimeoutError,
  SelectorTimeoutError,
  SessionOpenError,
  errorMessage,
} from '../errors/index.js';
import { createLogger, type Logger } from '../logging/index.js';
import type {
  ConsoleMessage,
  LoadCondition,
  NavigateOptions,
  RenderSession,
  SelectorState,
  SessionOptions,
  ViewportSize,
} from './types.js';

function isTimeout(error: unknown): boolean {
  return error instanceof errors.TimeoutError;
}

// ============================================================================
// Playwright Session
// ============================================================================

export class PlaywrightSession implements RenderSession {
  private messages: ConsoleMessage[] = [];
  private isClosed = false;
  private currentUrl = 'about:blank';

  private constructor(
    private browser: Browser,
    private context: BrowserContext,
    private page: Page,
    private viewport: ViewportSize,
    private logger: Logger
  ) {
    this.page.on('console', (msg) => {
      const type = msg.type();
      if (type === 'error' || type === 'warning') {
        this.messages.push({ type, text: msg.text(), location: msg.location().url });
      }
    });

    this.page.on('pageerror', (error) => {
      this.messages.push({ type: 'error', text: error.message });
    });
  }

  /**
   * Launch the browser and open the page
   */
  static async open(options: SessionOptions, logger: Logger = createLogger('Session')): Promise<PlaywrightSession> {
    logger.debug('Launching browser...', { headless: options.headless, args: options.args });

    let browser: Browser;
    try {
      browser = await chromium.launch({ headless: options.headless, args: options.args });
    } catch (error) {
      throw new SessionOpenError(`Could not launch Chromium: ${errorMessage(error)}`, { cause: error });
    }

    try {
      const context = await browser.newContext({
        viewport: options.viewport,
        deviceScaleFactor: options.deviceScaleFactor,
      });
      const page = await context.newPage();
      return new PlaywrightSession(browser, context, page, { ...options.viewport }, logger);
    } catch (error) {
      await browser.close();
      throw new SessionOpenError(`Could not open a page: ${errorMessage(error)}`, { cause: error });
    }
  }

  get closed(): boolean {
    return this.isClosed;
  }

  async navigate(url: string, options: NavigateOptions): Promise<void> {
    this.currentUrl = url;
    try {
      await this.page.goto(url, { waitUntil: options.waitUntil, timeout: options.timeout });
    } catch (error) {
      if (isTimeout(error)) {
        throw new NavigationTimeoutError(url, options.waitUntil, options.timeout, { cause: error });
      }
      throw new NavigationError(`Could not load ${url}: ${errorMessage(error)}`, { cause: error });
    }
  }

  async waitForLoadState(state: LoadCondition, timeout: number): Promise<void> {
    try {
      await this.page.waitForLoadState(state, { timeout });
    } catch (error) {
      if (isTimeout(error)) {
        throw new NavigationTimeoutError(this.currentUrl, state, timeout, { cause: error });
      }
      throw new NavigationError(`Waiting for ${state} failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  async evaluate(script: string): Promise<unknown> {
    try {
      const value: unknown = await this.page.evaluate(script);
      return value;
    } catch (error) {
      throw new EvaluationError(`Script evaluation failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  async waitForFunction(script: string, timeout: number): Promise<void> {
    try {
      const handle = await this.page.waitForFunction(script, undefined, { timeout });
      await handle.dispose();
    } catch (error) {
      throw new EvaluationError(`Waiting for ${script} failed: ${errorMessage(error)}`, {
        cause: error,
        timedOut: isTimeout(error),
      });
    }
  }

  async waitForSelector(selector: string, state: SelectorState, timeout: number): Promise<void> {
    try {
      await this.page.waitForSelector(selector, { state, timeout });
    } catch (error) {
      if (isTimeout(error)) {
        throw new SelectorTimeoutError(selector, timeout, { cause: error });
      }
      throw new EvaluationError(`Waiting for ${selector} failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  async wait(ms: number): Promise<void> {
    if (ms > 0) {
      await this.page.waitForTimeout(ms);
    }
  }

  async setViewportSize(size: ViewportSize): Promise<void> {
    await this.page.setViewportSize(size);
    this.viewport = { ...size };
  }

  viewportSize(): ViewportSize {
    return this.page.viewportSize() ?? { ...this.viewport };
  }

  async screenshot(path: string, fullPage: boolean = true): Promise<void> {
    await this.page.screenshot({ path, fullPage, type: 'png' });
  }

  consoleMessages(): ConsoleMessage[] {
    return [...this.messages];
  }

  /**
   * Close the context, then the browser; the browser is closed even when
   * closing the context fails.
   */
  async close(): Promise<void> {
    if (this.isClosed) return;
    this.isClosed = true;

    try {
      await this.context.close();
    } finally {
      await this.browser.close();
      this.logger.debug('Browser closed');
    }
  }
}

// ============================================================================
// Factory
// ============================================================================

export async function openPlaywrightSession(
  options: SessionOptions,
  logger?: Logger
): Promise<RenderSession> {
  return PlaywrightSession.open(options, logger);
}
