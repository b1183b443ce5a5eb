// src/core/fetch/static-fetcher.ts
import { DEFAULT_USER_AGENT } from '../config/constants.js';
import { ErrorCode, ScrapeError, describeError } from '../errors.js';

export interface StaticFetcher {
  /** Resolve with the response body, or reject with a FETCH_FAILED ScrapeError. */
  fetch(url: string, timeoutMs: number): Promise<string>;
}

export class HttpStaticFetcher implements StaticFetcher {
  constructor(private userAgent: string = DEFAULT_USER_AGENT) {}

  async fetch(url: string, timeoutMs: number): Promise<string> {
    let response: Response;
    try {
      response = await fetch(url, {
        redirect: 'follow',
        signal: AbortSignal.timeout(timeoutMs),
        headers: {
          'User-Agent': this.userAgent,
          Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
        },
      });
    } catch (error) {
      const timedOut = error instanceof Error && error.name === 'TimeoutError';
      throw new ScrapeError(
        ErrorCode.FETCH_FAILED,
        timedOut ? `Request timed out after ${timeoutMs}ms` : describeError(error),
        'Check that the site is reachable from this machine'
      );
    }

    if (!response.ok) {
      throw new ScrapeError(
        ErrorCode.FETCH_FAILED,
        `HTTP ${response.status} ${response.statusText} for url '${response.url || url}'`
      );
    }

    return response.text();
  }
}
