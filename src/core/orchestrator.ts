// src/core/orchestrator.ts
import { HttpStaticFetcher, type StaticFetcher } from './fetch/static-fetcher.js';
import { PlaywrightBrowser, withBrowserSession } from './render/browser.js';
import { InteractionSimulator } from './render/interaction.js';
import type { RenderedBrowser } from './render/types.js';
import { explainRenderingNeed, type RenderingSignal } from './detect/rendering.js';
import { loadDocument } from './extract/dom.js';
import { emptyMeta, extractMeta } from './extract/meta.js';
import { extractSections } from './extract/sections.js';
import { ScrapeContext } from './context.js';
import { isValidUrl } from './url.js';
import { ScrapeError, ErrorCode, describeError, toErrorRecord } from './errors.js';
import {
  DEFAULT_USER_AGENT,
  DEFAULT_VIEWPORT,
  NAVIGATION_TIMEOUT,
  STATIC_FETCH_TIMEOUT,
} from './config/constants.js';
import type { ScrapeResult, Scraper } from './types/index.js';

export interface ScrapeOptions {
  staticTimeoutMs?: number;
  navigationTimeoutMs?: number;
  headless?: boolean;
  userAgent?: string;
  verbose?: boolean;
}

export interface ScrapeDependencies {
  fetcher?: StaticFetcher;
  browser?: RenderedBrowser;
}

export const RENDERING_NOTE = 'Static content insufficient, using JS rendering';

/**
 * Single entry point of the engine: static fetch, decide whether the page
 * needs a browser, render and interact if so, then extract sections.
 *
 * Pipeline failures never escape; they become error records on a partial
 * result. Only an invalid URL is thrown, before any network activity.
 */
export class ScrapeOrchestrator implements Scraper {
  private fetcher: StaticFetcher;
  private browser: RenderedBrowser;

  constructor(
    dependencies: ScrapeDependencies = {},
    private options: ScrapeOptions = {}
  ) {
    const userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.fetcher = dependencies.fetcher ?? new HttpStaticFetcher(userAgent);
    this.browser = dependencies.browser ?? new PlaywrightBrowser({ headless: options.headless });
  }

  async scrape(url: string): Promise<ScrapeResult> {
    if (!isValidUrl(url)) {
      throw new ScrapeError(
        ErrorCode.INVALID_URL,
        'URL must start with http:// or https://',
        'Include the scheme, for example https://example.com'
      );
    }

    const context = new ScrapeContext(url);

    // Fetch static
    let html: string;
    try {
      html = await this.fetcher.fetch(url, this.options.staticTimeoutMs ?? STATIC_FETCH_TIMEOUT);
    } catch (error) {
      context.addError(toErrorRecord(error, 'fetch'));
      return this.partial(context);
    }

    // Detect
    let signal: RenderingSignal | null;
    try {
      signal = explainRenderingNeed(loadDocument(html));
    } catch (error) {
      context.addError(toErrorRecord(parseFailure(error), 'scrape'));
      return this.partial(context);
    }

    if (signal) {
      context.strategy = 'rendered';
      context.addError(
        toErrorRecord(new ScrapeError(ErrorCode.RENDERING_REQUIRED, RENDERING_NOTE), 'detection')
      );
      this.info(`Rendering required for ${url} (${signal})`);

      // Render
      try {
        html = await this.render(url, context);
      } catch (error) {
        context.addError(toErrorRecord(error, 'render'));
        return this.partial(context);
      }
    }

    // Extract
    try {
      const $ = loadDocument(html);
      const meta = extractMeta($);
      const sections = extractSections($, url);
      this.info(`Extracted ${sections.length} sections from ${url} (${context.strategy})`);
      return context.toResult(meta, sections);
    } catch (error) {
      context.addError(
        toErrorRecord(new ScrapeError(ErrorCode.EXTRACT_FAILED, describeError(error)), 'scrape')
      );
      return this.partial(context);
    }
  }

  private async render(url: string, context: ScrapeContext): Promise<string> {
    return withBrowserSession(
      this.browser,
      {
        viewport: { ...DEFAULT_VIEWPORT },
        userAgent: this.options.userAgent ?? DEFAULT_USER_AGENT,
      },
      session => {
        const simulator = new InteractionSimulator(session, context, {
          navigationTimeout: this.options.navigationTimeoutMs ?? NAVIGATION_TIMEOUT,
          verbose: this.options.verbose,
        });
        return simulator.run(url);
      }
    );
  }

  private partial(context: ScrapeContext): ScrapeResult {
    return context.toResult(emptyMeta(), []);
  }

  private info(message: string): void {
    if (this.options.verbose) {
      console.error(`[INFO] ${message}`);
    }
  }
}

function parseFailure(error: unknown): ScrapeError {
  return new ScrapeError(ErrorCode.EXTRACT_FAILED, `Failed to parse page: ${describeError(error)}`);
}
