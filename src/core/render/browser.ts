// src/core/render/browser.ts
import { chromium, errors, type Browser, type ElementHandle, type Page } from 'playwright';
import { ScrapeError, ErrorCode, describeError } from '../errors.js';
import type { BrowserSession, RenderedBrowser, SessionElement, SessionOptions } from './types.js';

export interface BrowserOptions {
  headless?: boolean;
}

export class PlaywrightBrowser implements RenderedBrowser {
  constructor(private options: BrowserOptions = {}) {}

  async open(options: SessionOptions): Promise<BrowserSession> {
    let browser: Browser;
    try {
      browser = await chromium.launch({ headless: this.options.headless ?? true });
    } catch (error) {
      throw new ScrapeError(
        ErrorCode.RENDER_FAILED,
        `Failed to launch browser: ${describeError(error)}`,
        'Run `pagesift install-browsers` to download Chromium'
      );
    }

    try {
      const context = await browser.newContext({
        viewport: options.viewport,
        userAgent: options.userAgent,
      });
      const page = await context.newPage();
      return new PlaywrightSession(browser, page);
    } catch (error) {
      await browser.close();
      throw error;
    }
  }
}

export class PlaywrightSession implements BrowserSession {
  constructor(
    private browser: Browser,
    private page: Page
  ) {}

  async navigate(url: string, timeoutMs: number): Promise<void> {
    try {
      await this.page.goto(url, { waitUntil: 'networkidle', timeout: timeoutMs });
    } catch (error) {
      if (error instanceof errors.TimeoutError) {
        throw new ScrapeError(ErrorCode.RENDER_TIMEOUT, `Timeout: ${error.message}`);
      }
      throw error;
    }
  }

  async query(selector: string): Promise<SessionElement[]> {
    const handles = await this.page.$$(selector);
    return handles.map(handle => wrapHandle(handle));
  }

  async queryFirst(selector: string): Promise<SessionElement | null> {
    const handle = await this.page.$(selector);
    return handle ? wrapHandle(handle) : null;
  }

  async evaluate(script: string): Promise<void> {
    await this.page.evaluate(script);
  }

  async wait(ms: number): Promise<void> {
    await this.page.waitForTimeout(ms);
  }

  async waitForNetworkIdle(timeoutMs: number): Promise<void> {
    await this.page.waitForLoadState('networkidle', { timeout: timeoutMs });
  }

  currentUrl(): string {
    return this.page.url();
  }

  async content(): Promise<string> {
    return this.page.content();
  }

  async close(): Promise<void> {
    await this.browser.close();
  }
}

function wrapHandle(handle: ElementHandle): SessionElement {
  return {
    click: async (timeoutMs: number) => {
      await handle.click({ timeout: timeoutMs });
    },
  };
}

/**
 * Open a session, hand it to `work`, and close it on every exit path.
 * A failing close is logged rather than masking the work's own outcome.
 */
export async function withBrowserSession<T>(
  browser: RenderedBrowser,
  options: SessionOptions,
  work: (session: BrowserSession) => Promise<T>
): Promise<T> {
  const session = await browser.open(options);
  try {
    return await work(session);
  } finally {
    await session.close().catch((error: unknown) => {
      console.error(`[WARN] Failed to close browser session: ${describeError(error)}`);
    });
  }
}
