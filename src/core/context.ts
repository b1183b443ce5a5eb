// src/core/context.ts
import type {
  ErrorPhase,
  Interactions,
  Meta,
  ScrapeErrorRecord,
  ScrapeResult,
  ScrapeStrategy,
  Section,
} from './types/index.js';

/**
 * Everything one scrape call accumulates while it runs. Each call creates
 * its own context; it is never shared between requests.
 */
export class ScrapeContext {
  readonly url: string;
  strategy: ScrapeStrategy = 'static';

  private clicks: string[] = [];
  private scrolls = 0;
  private pages: string[];
  private errors: ScrapeErrorRecord[] = [];

  constructor(url: string) {
    this.url = url;
    this.pages = [url];
  }

  recordClick(identifier: string): void {
    this.clicks.push(identifier);
  }

  recordScroll(): void {
    this.scrolls++;
  }

  /** Add a page to the visit list. Returns false if it was already there. */
  visitPage(url: string): boolean {
    if (this.pages.includes(url)) {
      return false;
    }
    this.pages.push(url);
    return true;
  }

  get pageCount(): number {
    return this.pages.length;
  }

  recordError(phase: ErrorPhase, message: string): void {
    this.errors.push({ message, phase });
  }

  addError(record: ScrapeErrorRecord): void {
    this.errors.push({ ...record });
  }

  interactions(): Interactions {
    return {
      clicks: [...this.clicks],
      scrolls: this.scrolls,
      pages: [...this.pages],
    };
  }

  toResult(meta: Meta, sections: Section[]): ScrapeResult {
    return {
      url: this.url,
      scrapedAt: new Date().toISOString(),
      meta: { ...meta },
      sections: [...sections],
      interactions: this.interactions(),
      errors: this.errors.map(error => ({ ...error })),
    };
  }
}
