// src/core/extract/meta.ts
import { normalizeText, type ParsedDocument } from './dom.js';
import type { Meta } from '../types/index.js';

export const DEFAULT_LANGUAGE = 'en';

export function emptyMeta(): Meta {
  return { title: '', description: '', language: DEFAULT_LANGUAGE, canonical: null };
}

export function extractMeta($: ParsedDocument): Meta {
  return {
    title: pickText([
      $('title').first().text(),
      $('meta[property="og:title"]').attr('content') || '',
    ]),
    description: pickText([
      $('meta[name="description"]').attr('content') || '',
      $('meta[property="og:description"]').attr('content') || '',
    ]),
    language: $('html').attr('lang')?.trim() || DEFAULT_LANGUAGE,
    canonical: $('link[rel="canonical"]').attr('href')?.trim() || null,
  };
}

function pickText(candidates: string[]): string {
  for (const candidate of candidates) {
    const value = normalizeText(candidate);
    if (value) return value;
  }
  return '';
}
