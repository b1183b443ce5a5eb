// src/core/render/types.ts

export interface SessionOptions {
  viewport: { width: number; height: number };
  userAgent: string;
}

export interface SessionElement {
  click(timeoutMs: number): Promise<void>;
}

/**
 * A single headless page owned by one scrape. Failures surface as rejected
 * promises; navigation timeouts reject with a RENDER_TIMEOUT ScrapeError.
 */
export interface BrowserSession {
  navigate(url: string, timeoutMs: number): Promise<void>;
  query(selector: string): Promise<SessionElement[]>;
  queryFirst(selector: string): Promise<SessionElement | null>;
  evaluate(script: string): Promise<void>;
  wait(ms: number): Promise<void>;
  waitForNetworkIdle(timeoutMs: number): Promise<void>;
  currentUrl(): string;
  content(): Promise<string>;
  close(): Promise<void>;
}

export interface RenderedBrowser {
  open(options: SessionOptions): Promise<BrowserSession>;
}
