// src/core/config/selectors.ts

// Cookie banners, modals and popups that sit on top of the page and swallow clicks.
export const NOISE_SELECTORS = [
  '[id*="cookie"]',
  '[class*="cookie"]',
  '[id*="banner"]',
  '[class*="banner"]',
  '[id*="modal"]',
  '[class*="modal"]',
  '[id*="popup"]',
  '[class*="popup"]',
  '[role="dialog"]',
  '.newsletter-popup',
  '#onetrust-banner-sdk',
] as const;

export const TAB_SELECTORS = [
  '[role="tab"]',
  'button[aria-controls]',
  '.tab',
  '[data-tab]',
] as const;

// `:has-text()` is a Playwright selector extension, these only run inside the browser.
export const LOAD_MORE_SELECTORS = [
  'button:has-text("Load more")',
  'button:has-text("Show more")',
  'button:has-text("See more")',
  '[class*="load-more"]',
  '[class*="show-more"]',
] as const;

export const NEXT_PAGE_SELECTORS = [
  'a:has-text("Next")',
  'a:has-text("next")',
  '[rel="next"]',
  '.pagination a:last-child',
  'a[aria-label*="next" i]',
] as const;

/** Markup fragments left behind by client-side framework mounts. */
export const SPA_FINGERPRINTS = [
  'id="root"',
  'id="__next"',
  'id="app"',
  'data-reactroot',
  'ng-app',
] as const;

export const SPA_ROOT_SELECTORS = ['#root', '#__next', '#app'] as const;

export const SEMANTIC_TAGS = [
  'header',
  'nav',
  'main',
  'section',
  'article',
  'aside',
  'footer',
] as const;
