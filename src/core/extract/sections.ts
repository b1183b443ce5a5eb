// src/core/extract/sections.ts
import { isTag, type Element } from 'domhandler';
import { visibleText, type ParsedDocument } from './dom.js';
import { classifySection } from './classifier.js';
import { resolveUrl } from '../url.js';
import { SEMANTIC_TAGS } from '../config/selectors.js';
import {
  MAX_FALLBACK_DIVS,
  MIN_FALLBACK_DIV_TEXT_LENGTH,
  RAW_HTML_LIMIT,
} from '../config/constants.js';
import type { ImageItem, LinkItem, Section, SectionContent, Table } from '../types/index.js';

interface Candidate {
  element: Element;
  tagName: string;
}

/**
 * One way of carving a page into sections. Tiers are tried in order and
 * the first one that keeps anything wins.
 */
interface ExtractionTier {
  candidates($: ParsedDocument): Candidate[];
  keep(content: SectionContent, candidate: Candidate): boolean;
}

export const EXTRACTION_TIERS: ExtractionTier[] = [
  {
    candidates: $ =>
      SEMANTIC_TAGS.flatMap(tagName =>
        $(tagName).toArray().map(element => ({ element, tagName }))
      ),
    keep: content => content.text.length > 0,
  },
  {
    candidates: $ =>
      $('body > div')
        .slice(0, MAX_FALLBACK_DIVS)
        .toArray()
        .map(element => ({ element, tagName: 'div' })),
    keep: content => content.text.length > MIN_FALLBACK_DIV_TEXT_LENGTH,
  },
  {
    candidates: $ =>
      $('body')
        .first()
        .toArray()
        .map(element => ({ element, tagName: 'body' })),
    keep: (content, candidate) =>
      content.text.length > 0 || candidate.element.children.some(isTag),
  },
];

export function extractSections($: ParsedDocument, sourceUrl: string): Section[] {
  for (const tier of EXTRACTION_TIERS) {
    const sections: Section[] = [];

    for (const candidate of tier.candidates($)) {
      const content = extractContent($, candidate.element, sourceUrl);
      if (!tier.keep(content, candidate)) {
        continue;
      }
      sections.push(buildSection($, candidate, content, sourceUrl, sections.length));
    }

    if (sections.length > 0) {
      return sections;
    }
  }

  return [createPlaceholderSection(sourceUrl)];
}

export function extractContent(
  $: ParsedDocument,
  element: Element,
  sourceUrl: string
): SectionContent {
  const root = $(element);

  const headings: string[] = [];
  root.find('h1, h2, h3, h4, h5, h6').each((_, heading) => {
    const text = visibleText(heading);
    if (text) headings.push(text);
  });

  const links: LinkItem[] = [];
  root.find('a').each((_, anchor) => {
    const href = resolveUrl($(anchor).attr('href'), sourceUrl);
    if (href) {
      links.push({ text: visibleText(anchor), href });
    }
  });

  const images: ImageItem[] = [];
  root.find('img').each((_, img) => {
    const node = $(img);
    const src = resolveUrl(node.attr('src')?.trim() || node.attr('data-src'), sourceUrl);
    if (src) {
      images.push({ src, alt: node.attr('alt') ?? '' });
    }
  });

  const lists: string[][] = [];
  root.find('ul, ol').each((_, list) => {
    const items = $(list)
      .find('li')
      .toArray()
      .map(item => visibleText(item))
      .filter(Boolean);
    if (items.length > 0) lists.push(items);
  });

  const tables: Table[] = [];
  root.find('table').each((_, table) => {
    const rows = $(table)
      .find('tr')
      .toArray()
      .map(row => $(row).children('td, th').toArray().map(cell => visibleText(cell)))
      .filter(row => row.length > 0);
    if (rows.length > 0) tables.push(rows);
  });

  return {
    headings,
    text: visibleText(element),
    links,
    images,
    lists,
    tables,
  };
}

export function truncateHtml(html: string, limit: number = RAW_HTML_LIMIT): { rawHtml: string; truncated: boolean } {
  if (html.length > limit) {
    // Never split a surrogate pair.
    const code = html.charCodeAt(limit - 1);
    const end = code >= 0xd800 && code <= 0xdbff ? limit - 1 : limit;
    return { rawHtml: `${html.slice(0, end)}...`, truncated: true };
  }
  return { rawHtml: html, truncated: false };
}

function buildSection(
  $: ParsedDocument,
  candidate: Candidate,
  content: SectionContent,
  sourceUrl: string,
  index: number
): Section {
  const { type, label } = classifySection(candidate.tagName, content.headings, content.text);
  const { rawHtml, truncated } = truncateHtml($.html(candidate.element));

  return {
    id: `${type}-${index}`,
    type,
    label,
    sourceUrl,
    content,
    rawHtml,
    truncated,
  };
}

export function createPlaceholderSection(sourceUrl: string): Section {
  return {
    id: 'unknown-0',
    type: 'unknown',
    label: 'Content',
    sourceUrl,
    content: {
      headings: [],
      text: '',
      links: [],
      images: [],
      lists: [],
      tables: [],
    },
    rawHtml: '',
    truncated: false,
  };
}
