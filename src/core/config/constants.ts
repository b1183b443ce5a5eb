// src/core/config/constants.ts
export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';
export const DEFAULT_VIEWPORT = { width: 1920, height: 1080 } as const;

export const STATIC_FETCH_TIMEOUT = 30000; // 30 seconds
export const NAVIGATION_TIMEOUT = 30000;
export const NAVIGATION_SETTLE_DELAY = 2000;

export const CLICK_TIMEOUT = 2000;
export const TAB_SETTLE_DELAY = 1000;
export const LOAD_MORE_SETTLE_DELAY = 1500;
export const MAX_TAB_CLICKS = 3;
export const MAX_LOAD_MORE_CLICKS = 3;

export const PAGINATION_DEPTH = 3;
export const PAGINATION_CLICK_TIMEOUT = 3000;
export const PAGINATION_IDLE_TIMEOUT = 5000;
export const PAGINATION_SETTLE_DELAY = 1000;
export const MAX_SCROLLS = 3;
export const SCROLL_SETTLE_DELAY = 2000;

// Rendering heuristic
export const MIN_BODY_TEXT_LENGTH = 200;
export const MIN_APP_ROOT_TEXT_LENGTH = 100;

// Section extraction
export const RAW_HTML_LIMIT = 1000;
export const MAX_FALLBACK_DIVS = 10;
export const MIN_FALLBACK_DIV_TEXT_LENGTH = 50;
export const LABEL_WORD_COUNT = 7;

export const DEFAULT_SERVER_HOST = '127.0.0.1';
export const DEFAULT_SERVER_PORT = 8000;
