// src/core/detect/rendering.ts
import { visibleText, type ParsedDocument } from '../extract/dom.js';
import { MIN_APP_ROOT_TEXT_LENGTH, MIN_BODY_TEXT_LENGTH } from '../config/constants.js';
import { SPA_FINGERPRINTS, SPA_ROOT_SELECTORS } from '../config/selectors.js';

export type RenderingSignal = 'missing-body' | 'sparse-body' | 'empty-app-root';

export interface RenderingThresholds {
  minBodyText: number;
  minAppRootText: number;
  fingerprints: readonly string[];
  appRootSelectors: readonly string[];
}

export const DEFAULT_RENDERING_THRESHOLDS: RenderingThresholds = {
  minBodyText: MIN_BODY_TEXT_LENGTH,
  minAppRootText: MIN_APP_ROOT_TEXT_LENGTH,
  fingerprints: SPA_FINGERPRINTS,
  appRootSelectors: SPA_ROOT_SELECTORS,
};

/**
 * Name the first rule saying the static document is not enough, or null
 * when the static parse can be used as is.
 *
 * This is a guess: a false answer in either direction only costs a wasted
 * browser launch or a thinner result.
 */
export function explainRenderingNeed(
  $: ParsedDocument,
  thresholds: RenderingThresholds = DEFAULT_RENDERING_THRESHOLDS
): RenderingSignal | null {
  const body = $('body').first();
  if (body.length === 0) {
    return 'missing-body';
  }

  if (visibleText(body[0]).length < thresholds.minBodyText) {
    return 'sparse-body';
  }

  const markup = $.html();
  if (thresholds.fingerprints.some(fingerprint => markup.includes(fingerprint))) {
    // Only the mount containers are re-checked, not every fingerprint.
    for (const selector of thresholds.appRootSelectors) {
      const root = $(selector).first();
      if (root.length > 0 && visibleText(root[0]).length < thresholds.minAppRootText) {
        return 'empty-app-root';
      }
    }
  }

  return null;
}

export function needsRendering(
  $: ParsedDocument,
  thresholds: RenderingThresholds = DEFAULT_RENDERING_THRESHOLDS
): boolean {
  return explainRenderingNeed($, thresholds) !== null;
}
