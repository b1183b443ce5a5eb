// src/core/extract/dom.ts
import * as cheerio from 'cheerio';
import { isTag, isText, type AnyNode } from 'domhandler';

export type ParsedDocument = cheerio.CheerioAPI;

const HIDDEN_TAGS = new Set(['script', 'style', 'noscript', 'template']);

// Block-level boundaries become spaces so "<li>a</li><li>b</li>" reads "a b".
const BLOCK_TAGS = new Set([
  'address', 'article', 'aside', 'blockquote', 'br', 'dd', 'details', 'div',
  'dl', 'dt', 'fieldset', 'figcaption', 'figure', 'footer', 'form',
  'h1', 'h2', 'h3', 'h4', 'h5', 'h6', 'header', 'hr', 'li', 'main', 'nav',
  'ol', 'p', 'pre', 'section', 'summary', 'table', 'td', 'th', 'tr', 'ul',
]);

export function loadDocument(html: string): ParsedDocument {
  return cheerio.load(html);
}

export function normalizeText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Text a reader would see: script-like elements are skipped and whitespace
 * is collapsed.
 */
export function visibleText(node: AnyNode): string {
  const parts: string[] = [];
  // Strings on the stack are block separators waiting for their element's
  // children to be emitted. Walking with a stack keeps deep pages off the
  // call stack.
  const stack: Array<AnyNode | string> = [node];

  while (stack.length > 0) {
    const item = stack.pop();
    if (item === undefined) break;

    if (typeof item === 'string') {
      parts.push(item);
      continue;
    }
    if (isText(item)) {
      parts.push(item.data);
      continue;
    }
    if (!isTag(item)) {
      continue;
    }

    const tagName = item.tagName.toLowerCase();
    if (HIDDEN_TAGS.has(tagName)) {
      continue;
    }

    if (BLOCK_TAGS.has(tagName)) {
      parts.push(' ');
      stack.push(' ');
    }
    for (let i = item.children.length - 1; i >= 0; i--) {
      stack.push(item.children[i]);
    }
  }

  return normalizeText(parts.join(''));
}
