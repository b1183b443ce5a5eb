// src/core/url.ts

export function isValidUrl(urlString: string): boolean {
  if (!/^https?:\/\//.test(urlString)) {
    return false;
  }
  try {
    const url = new URL(urlString);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * Resolve an href/src against the page it came from.
 * Returns null when the value is empty, cannot be parsed, or is a script URL.
 */
export function resolveUrl(value: string | undefined, baseUrl: string): string | null {
  const trimmed = value?.trim();
  if (!trimmed) {
    return null;
  }
  try {
    const url = new URL(trimmed, baseUrl);
    if (url.protocol === 'javascript:') {
      return null;
    }
    return url.href;
  } catch {
    return null;
  }
}
