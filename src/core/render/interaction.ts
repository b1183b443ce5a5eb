// src/core/render/interaction.ts
import { attempt } from '../attempt.js';
import { describeError, isRenderTimeout } from '../errors.js';
import type { ScrapeContext } from '../context.js';
import type { BrowserSession, SessionElement } from './types.js';
import {
  CLICK_TIMEOUT,
  LOAD_MORE_SETTLE_DELAY,
  MAX_LOAD_MORE_CLICKS,
  MAX_SCROLLS,
  MAX_TAB_CLICKS,
  NAVIGATION_SETTLE_DELAY,
  NAVIGATION_TIMEOUT,
  PAGINATION_CLICK_TIMEOUT,
  PAGINATION_DEPTH,
  PAGINATION_IDLE_TIMEOUT,
  PAGINATION_SETTLE_DELAY,
  SCROLL_SETTLE_DELAY,
  TAB_SETTLE_DELAY,
} from '../config/constants.js';
import {
  LOAD_MORE_SELECTORS,
  NEXT_PAGE_SELECTORS,
  NOISE_SELECTORS,
  TAB_SELECTORS,
} from '../config/selectors.js';

export interface InteractionOptions {
  navigationTimeout?: number;
  verbose?: boolean;
}

const SCROLL_TO_BOTTOM = 'window.scrollTo(0, document.body.scrollHeight)';

/**
 * Drives a rendered page to reveal content hidden behind tabs, "load more"
 * buttons and pagination, recording what it did on the scrape context.
 */
export class InteractionSimulator {
  constructor(
    private session: BrowserSession,
    private context: ScrapeContext,
    private options: InteractionOptions = {}
  ) {}

  async run(url: string): Promise<string> {
    await this.navigate(url);
    await this.removeNoise();
    await this.clickTabs();
    await this.clickLoadMore();
    await this.paginate();

    // Whatever happened above, extraction works on the current DOM.
    return this.session.content();
  }

  async navigate(url: string): Promise<void> {
    try {
      await this.session.navigate(url, this.options.navigationTimeout ?? NAVIGATION_TIMEOUT);
    } catch (error) {
      if (!isRenderTimeout(error)) {
        throw error;
      }
      this.context.recordError('render', describeError(error));
    }

    await this.wait(NAVIGATION_SETTLE_DELAY);
  }

  async removeNoise(): Promise<void> {
    for (const selector of NOISE_SELECTORS) {
      const script = `document.querySelectorAll(${JSON.stringify(selector)}).forEach((el) => el.remove());`;
      const removed = await attempt(() => this.session.evaluate(script));
      if (!removed.ok) {
        this.debug(`Noise removal failed for ${selector}: ${describeError(removed.error)}`);
      }
    }
  }

  /**
   * Click through the first tab group found. Only a selector matching more
   * than one element counts as a tab group.
   */
  async clickTabs(): Promise<void> {
    for (const selector of TAB_SELECTORS) {
      const found = await attempt(() => this.session.query(selector));
      if (!found.ok || found.value.length <= 1) {
        continue;
      }

      const tabs = found.value.slice(0, MAX_TAB_CLICKS);
      for (const [index, tab] of tabs.entries()) {
        const clicked = await attempt(() => tab.click(CLICK_TIMEOUT));
        if (!clicked.ok) {
          this.debug(`Tab click failed for ${selector}[${index}]: ${describeError(clicked.error)}`);
          continue;
        }
        await this.wait(TAB_SETTLE_DELAY);
        this.context.recordClick(`${selector}[${index}]`);
      }
      return;
    }
  }

  async clickLoadMore(): Promise<void> {
    for (const selector of LOAD_MORE_SELECTORS) {
      for (let round = 0; round < MAX_LOAD_MORE_CLICKS; round++) {
        const found = await attempt(() => this.session.queryFirst(selector));
        if (!found.ok || !found.value) {
          break;
        }

        const button = found.value;
        const clicked = await attempt(() => button.click(CLICK_TIMEOUT));
        if (!clicked.ok) {
          this.debug(`Load-more click failed for ${selector}: ${describeError(clicked.error)}`);
          break;
        }
        await this.wait(LOAD_MORE_SETTLE_DELAY);
        this.context.recordClick(selector);
      }
    }
  }

  /**
   * Follow "next" links up to the pagination depth, then fall back to
   * scrolling when that did not reach enough pages.
   */
  async paginate(): Promise<void> {
    let currentUrl = this.session.currentUrl();
    let progressed = false;

    for (let depth = 0; depth < PAGINATION_DEPTH; depth++) {
      const next = await this.findNextControl();
      if (!next) {
        break;
      }

      const clicked = await attempt(() => next.click(PAGINATION_CLICK_TIMEOUT));
      if (!clicked.ok) {
        this.debug(`Pagination click failed: ${describeError(clicked.error)}`);
        break;
      }

      const idle = await attempt(() => this.session.waitForNetworkIdle(PAGINATION_IDLE_TIMEOUT));
      if (!idle.ok) {
        this.debug(`Network did not settle after pagination: ${describeError(idle.error)}`);
      }

      const nextUrl = this.session.currentUrl();
      if (nextUrl === currentUrl || !this.context.visitPage(nextUrl)) {
        break;
      }

      currentUrl = nextUrl;
      progressed = true;
      await this.wait(PAGINATION_SETTLE_DELAY);
    }

    if (!progressed || this.context.pageCount < PAGINATION_DEPTH) {
      await this.scroll();
    }
  }

  /**
   * Scroll to the bottom a fixed number of times. Growth of the page is not
   * measured; every issued scroll is counted.
   */
  async scroll(): Promise<void> {
    for (let i = 0; i < MAX_SCROLLS; i++) {
      const scrolled = await attempt(() => this.session.evaluate(SCROLL_TO_BOTTOM));
      if (!scrolled.ok) {
        this.debug(`Scroll ${i + 1} failed: ${describeError(scrolled.error)}`);
        continue;
      }
      this.context.recordScroll();
      await this.wait(SCROLL_SETTLE_DELAY);
    }
  }

  private async findNextControl(): Promise<SessionElement | null> {
    for (const selector of NEXT_PAGE_SELECTORS) {
      const found = await attempt(() => this.session.queryFirst(selector));
      if (found.ok && found.value) {
        this.debug(`Next-page control matched ${selector}`);
        return found.value;
      }
    }
    return null;
  }

  private async wait(ms: number): Promise<void> {
    const waited = await attempt(() => this.session.wait(ms));
    if (!waited.ok) {
      this.debug(`Wait of ${ms}ms interrupted: ${describeError(waited.error)}`);
    }
  }

  private debug(message: string): void {
    if (this.options.verbose) {
      console.error(`[DEBUG] ${message}`);
    }
  }
}
