// src/core/extract/classifier.ts
import { LABEL_WORD_COUNT } from '../config/constants.js';
import type { SectionType } from '../types/index.js';

const TAG_TYPES: Partial<Record<string, SectionType>> = {
  header: 'hero',
  nav: 'nav',
  footer: 'footer',
};

// Checked in order; the first family with a hit wins.
const KEYWORD_TYPES: ReadonlyArray<[SectionType, readonly string[]]> = [
  ['pricing', ['pricing', 'price', '$', 'plan']],
  ['faq', ['faq', 'question', 'answer']],
  ['grid', ['grid', 'gallery']],
];

export function determineSectionType(tagName: string, text: string): SectionType {
  const byTag = TAG_TYPES[tagName.toLowerCase()];
  if (byTag) {
    return byTag;
  }

  const lowered = text.toLowerCase();
  for (const [type, keywords] of KEYWORD_TYPES) {
    if (keywords.some(keyword => lowered.includes(keyword))) {
      return type;
    }
  }

  return 'section';
}

export function generateLabel(headings: string[], text: string, type: SectionType): string {
  if (headings.length > 0) {
    return headings[0];
  }

  const words = text.split(/\s+/).filter(Boolean);
  if (words.length > 0) {
    const label = words.slice(0, LABEL_WORD_COUNT).join(' ');
    return words.length > LABEL_WORD_COUNT ? `${label}...` : label;
  }

  return titleCase(type);
}

export function classifySection(
  tagName: string,
  headings: string[],
  text: string
): { type: SectionType; label: string } {
  const type = determineSectionType(tagName, text);
  return { type, label: generateLabel(headings, text, type) };
}

function titleCase(value: string): string {
  return value.replace(/\b[a-z]/g, char => char.toUpperCase());
}
