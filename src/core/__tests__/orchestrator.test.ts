// src/core/__tests__/orchestrator.test.ts
import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { RENDERING_NOTE, ScrapeOrchestrator } from '../orchestrator.js';
import { ErrorCode, ScrapeError } from '../errors.js';
import { emptyMeta } from '../extract/meta.js';
import { DEFAULT_USER_AGENT } from '../config/constants.js';
import { HttpStaticFetcher } from '../fetch/static-fetcher.js';
import { classifySection } from '../extract/classifier.js';
import * as rendering from '../detect/rendering.js';
import * as sectionExtractor from '../extract/sections.js';
import { FakeBrowser, FakeFetcher, FakeSession } from '../../testing/fakes.js';

const URL_UNDER_TEST = 'https://example.com/';

const STATIC_PAGE = `<html lang="en"><head><title>Docs</title></head><body>
  <main><h1>Guide</h1><p>${'text '.repeat(60)}</p></main>
</body></html>`;

const APP_SHELL = '<html><head><title>Shell</title></head><body><div id="root"></div></body></html>';

const RENDERED_PAGE = `<html lang="fr"><head><title>Rendered</title></head><body>
  <header><h1>Welcome</h1></header>
  <section><h2>Team</h2><p>Small crew</p></section>
</body></html>`;

const DETECTION_RECORD = { message: RENDERING_NOTE, phase: 'detection' };

describe('ScrapeOrchestrator', () => {
  let consoleSpy: jest.SpiedFunction<typeof console.error>;

  beforeEach(() => {
    consoleSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('extracts a content-rich page without a browser', async () => {
    const fetcher = new FakeFetcher(STATIC_PAGE);
    const browser = new FakeBrowser(new Error('browser should stay closed'));

    const result = await new ScrapeOrchestrator({ fetcher, browser }).scrape(URL_UNDER_TEST);

    expect(fetcher.calls).toEqual([{ url: URL_UNDER_TEST, timeoutMs: 30000 }]);
    expect(browser.opened).toEqual([]);
    expect(result.url).toBe(URL_UNDER_TEST);
    expect(result.meta).toEqual({ title: 'Docs', description: '', language: 'en', canonical: null });
    expect(result.sections.map(section => [section.id, section.label])).toEqual([['section-0', 'Guide']]);
    expect(result.interactions).toEqual({ clicks: [], scrolls: 0, pages: [URL_UNDER_TEST] });
    expect(result.errors).toEqual([]);
  });

  it('renders pages whose static markup is too thin', async () => {
    const session = new FakeSession(RENDERED_PAGE);
    const browser = new FakeBrowser(session);

    const result = await new ScrapeOrchestrator({
      fetcher: new FakeFetcher(APP_SHELL),
      browser,
    }).scrape(URL_UNDER_TEST);

    expect(browser.opened).toEqual([
      { viewport: { width: 1920, height: 1080 }, userAgent: DEFAULT_USER_AGENT },
    ]);
    expect(session.navigations).toEqual([URL_UNDER_TEST]);
    expect(session.closed).toBe(1);
    expect(result.meta.title).toBe('Rendered');
    expect(result.meta.language).toBe('fr');
    expect(result.sections.map(section => section.id)).toEqual(['hero-0', 'section-1']);
    expect(result.interactions).toEqual({ clicks: [], scrolls: 3, pages: [URL_UNDER_TEST] });
    expect(result.errors).toEqual([DETECTION_RECORD]);
  });

  it('returns a partial result when the static fetch fails', async () => {
    const failure = new ScrapeError(
      ErrorCode.FETCH_FAILED,
      "HTTP 404 Not Found for url 'https://example.com/missing'"
    );

    const result = await new ScrapeOrchestrator({
      fetcher: new FakeFetcher(failure),
      browser: new FakeBrowser(new FakeSession()),
    }).scrape('https://example.com/missing');

    expect(result.meta).toEqual(emptyMeta());
    expect(result.sections).toEqual([]);
    expect(result.interactions.pages).toEqual(['https://example.com/missing']);
    expect(result.errors).toEqual([
      { message: "HTTP 404 Not Found for url 'https://example.com/missing'", phase: 'fetch' },
    ]);
  });

  it('keeps going after a navigation timeout', async () => {
    const session = new FakeSession(RENDERED_PAGE);
    session.navigateError = new ScrapeError(
      ErrorCode.RENDER_TIMEOUT,
      'Timeout: page.goto: Timeout 30000ms exceeded.'
    );

    const result = await new ScrapeOrchestrator({
      fetcher: new FakeFetcher(APP_SHELL),
      browser: new FakeBrowser(session),
    }).scrape(URL_UNDER_TEST);

    expect(result.sections).toHaveLength(2);
    expect(result.errors).toEqual([
      DETECTION_RECORD,
      { message: 'Timeout: page.goto: Timeout 30000ms exceeded.', phase: 'render' },
    ]);
  });

  it('returns no sections when the browser cannot start', async () => {
    const result = await new ScrapeOrchestrator({
      fetcher: new FakeFetcher(APP_SHELL),
      browser: new FakeBrowser(
        new ScrapeError(
          ErrorCode.RENDER_FAILED,
          'Failed to launch browser: missing executable',
          'Run `pagesift install-browsers` to download Chromium'
        )
      ),
    }).scrape(URL_UNDER_TEST);

    expect(result.meta).toEqual(emptyMeta());
    expect(result.sections).toEqual([]);
    expect(result.errors).toEqual([
      DETECTION_RECORD,
      {
        message:
          'Failed to launch browser: missing executable (Run `pagesift install-browsers` to download Chromium)',
        phase: 'render',
      },
    ]);
  });

  it('closes the browser when rendering fails', async () => {
    const session = new FakeSession(RENDERED_PAGE);
    session.navigateError = new Error('net::ERR_CONNECTION_RESET');

    const result = await new ScrapeOrchestrator({
      fetcher: new FakeFetcher(APP_SHELL),
      browser: new FakeBrowser(session),
    }).scrape(URL_UNDER_TEST);

    expect(session.closed).toBe(1);
    expect(result.sections).toEqual([]);
    expect(result.errors).toEqual([
      DETECTION_RECORD,
      { message: 'net::ERR_CONNECTION_RESET', phase: 'render' },
    ]);
  });

  it('returns a placeholder section when the rendered page is still empty', async () => {
    const result = await new ScrapeOrchestrator({
      fetcher: new FakeFetcher(APP_SHELL),
      browser: new FakeBrowser(new FakeSession('<html><body></body></html>')),
    }).scrape(URL_UNDER_TEST);

    expect(result.sections.map(section => [section.id, section.type, section.label])).toEqual([
      ['unknown-0', 'unknown', 'Content'],
    ]);
  });

  it('rejects invalid URLs before any network activity', async () => {
    const fetcher = new FakeFetcher(STATIC_PAGE);
    const scraping = new ScrapeOrchestrator({ fetcher }).scrape('ftp://example.com');

    await expect(scraping).rejects.toBeInstanceOf(ScrapeError);
    await expect(scraping).rejects.toMatchObject({
      code: ErrorCode.INVALID_URL,
      message: 'URL must start with http:// or https://',
      suggestion: 'Include the scheme, for example https://example.com',
    });
    expect(fetcher.calls).toEqual([]);
  });

  it('passes the configured static timeout to the fetcher', async () => {
    const fetcher = new FakeFetcher(STATIC_PAGE);

    await new ScrapeOrchestrator({ fetcher }, { staticTimeoutMs: 5000 }).scrape(URL_UNDER_TEST);

    expect(fetcher.calls).toEqual([{ url: URL_UNDER_TEST, timeoutMs: 5000 }]);
  });

  it('logs the rendering decision when verbose', async () => {
    await new ScrapeOrchestrator(
      { fetcher: new FakeFetcher(APP_SHELL), browser: new FakeBrowser(new FakeSession(RENDERED_PAGE)) },
      { verbose: true }
    ).scrape(URL_UNDER_TEST);

    expect(consoleSpy).toHaveBeenCalledWith(
      '[INFO] Rendering required for https://example.com/ (sparse-body)'
    );
  });

  it('returns a partial result when the connection fails', async () => {
    jest.spyOn(globalThis, 'fetch').mockRejectedValue(new TypeError('fetch failed'));

    const result = await new ScrapeOrchestrator({
      fetcher: new HttpStaticFetcher(),
      browser: new FakeBrowser(new FakeSession()),
    }).scrape(URL_UNDER_TEST);

    expect(result.meta.title).toBe('');
    expect(result.sections).toEqual([]);
    expect(result.errors).toEqual([
      { message: 'fetch failed (Check that the site is reachable from this machine)', phase: 'fetch' },
    ]);
  });

  it('returns a partial result when the page cannot be examined', async () => {
    jest.spyOn(rendering, 'explainRenderingNeed').mockImplementation(() => {
      throw new RangeError('Maximum call stack size exceeded');
    });
    const browser = new FakeBrowser(new FakeSession(RENDERED_PAGE));

    const result = await new ScrapeOrchestrator({
      fetcher: new FakeFetcher(STATIC_PAGE),
      browser,
    }).scrape(URL_UNDER_TEST);

    expect(browser.opened).toEqual([]);
    expect(result.meta).toEqual(emptyMeta());
    expect(result.sections).toEqual([]);
    expect(result.errors).toEqual([
      { message: 'Failed to parse page: Maximum call stack size exceeded', phase: 'scrape' },
    ]);
  });

  it('returns a partial result when extraction fails', async () => {
    jest.spyOn(sectionExtractor, 'extractSections').mockImplementation(() => {
      throw new Error('boom');
    });

    const result = await new ScrapeOrchestrator({
      fetcher: new FakeFetcher(STATIC_PAGE),
    }).scrape(URL_UNDER_TEST);

    expect(result.meta).toEqual(emptyMeta());
    expect(result.sections).toEqual([]);
    expect(result.errors).toEqual([{ message: 'boom', phase: 'scrape' }]);
  });

  it('resolves for very deeply nested pages', async () => {
    const depth = 20000;
    const html = `<html><body>${'<div>'.repeat(depth)}${'x'.repeat(300)}${'</div>'.repeat(depth)}</body></html>`;

    const result = await new ScrapeOrchestrator({
      fetcher: new FakeFetcher(html),
      browser: new FakeBrowser(new FakeSession()),
    }).scrape(URL_UNDER_TEST);

    expect(result.url).toBe(URL_UNDER_TEST);
    expect(result.interactions.pages).toEqual([URL_UNDER_TEST]);
  });

  it('classifies extracted sections the same way twice', async () => {
    const result = await new ScrapeOrchestrator({
      fetcher: new FakeFetcher(STATIC_PAGE),
    }).scrape(URL_UNDER_TEST);
    const [section] = result.sections;

    const first = classifySection('main', section.content.headings, section.content.text);
    const second = classifySection('main', section.content.headings, section.content.text);

    expect(first).toEqual({ type: section.type, label: section.label });
    expect(second).toEqual(first);
  });
});
