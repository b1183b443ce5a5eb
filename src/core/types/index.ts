// src/core/types/index.ts
export type SectionType =
  | 'hero'
  | 'nav'
  | 'footer'
  | 'pricing'
  | 'faq'
  | 'grid'
  | 'section'
  | 'unknown';

export type ErrorPhase = 'fetch' | 'detection' | 'render' | 'scrape';

export type ScrapeStrategy = 'static' | 'rendered';

export interface LinkItem {
  text: string;
  href: string;
}

export interface ImageItem {
  src: string;
  alt: string;
}

/** One row of cell strings. */
export type TableRow = string[];

export type Table = TableRow[];

export interface SectionContent {
  headings: string[];
  text: string;
  links: LinkItem[];
  images: ImageItem[];
  lists: string[][];
  tables: Table[];
}

export interface Section {
  id: string;
  type: SectionType;
  label: string;
  sourceUrl: string;
  content: SectionContent;
  rawHtml: string;
  truncated: boolean;
}

export interface Meta {
  title: string;
  description: string;
  language: string;
  canonical: string | null;
}

export interface Interactions {
  clicks: string[];
  scrolls: number;
  /** Distinct URLs in visit order; the first entry is the requested URL. */
  pages: string[];
}

export interface ScrapeErrorRecord {
  message: string;
  phase: ErrorPhase;
}

export interface ScrapeResult {
  url: string;
  scrapedAt: string;
  meta: Meta;
  sections: Section[];
  interactions: Interactions;
  errors: ScrapeErrorRecord[];
}

export interface Scraper {
  scrape(url: string): Promise<ScrapeResult>;
}
