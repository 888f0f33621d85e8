/**
 * Content Cleaner Module
 *
 * Strips structural boilerplate from a legacy page and isolates the main content.
 *
 * Steps:
 * 1. Select a main-content anchor (role/id, <main>, wrapper class, body, whole document)
 * 2. Remove script, style, nav, header, footer, iframe and noscript subtrees
 * 3. Remove descendants whose class or id carries a boilerplate marker
 * 4. Collapse elements left without visible text
 *
 * Cleaning is idempotent: feeding the output html back in removes nothing further.
 */

import * as cheerio from 'cheerio';
import type { Cheerio, CheerioAPI } from 'cheerio';
import { hasChildren, isTag, isText, type AnyNode, type Element } from 'domhandler';
import type { CleanedContent } from '../types/index.js';

// ============================================================================
// Constants
// ============================================================================

/**
 * Main-content anchors by priority. The last entry stands for the whole document.
 */
const ANCHOR_SELECTORS: ReadonlyArray<string> = [
  'main#main',
  '[role="main"]',
  '#main-content',
  '#main',
  'main',
  '.contentWrapper',
  '.content-wrapper',
  '#content',
  'body',
  'html',
];

const STRUCTURAL_TAGS = 'script, style, nav, header, footer, iframe, noscript';

/**
 * Class/id substrings that mark non-content markup (matched lowercase)
 */
export const BOILERPLATE_PATTERNS: ReadonlyArray<string> = [
  'nav',
  'menu',
  'sidebar',
  'breadcrumb',
  'cookie',
  'popup',
  'modal',
  'advertisement',
  'ad-',
  'share',
  'social',
  'search',
  'login',
  'signup',
  'toggler',
  'utilitybar',
  'alertbar',
];

/** Elements kept even when they carry no text */
const EMPTY_EXEMPT_TAGS = new Set(['br', 'hr', 'img', 'td', 'th']);

/** Elements whose text never counts as visible */
const INVISIBLE_TAGS = new Set(['head', 'title', 'script', 'style', 'noscript', 'template']);

export interface CleanOptions {
  /** Remove elements left without visible text (default: true) */
  collapseEmpty?: boolean;
  /** Point every image at images/<filename> (default: false) */
  rewriteImages?: boolean;
}

// ============================================================================
// Helpers
// ============================================================================

function selectAnchor($: CheerioAPI): Cheerio<Element> | null {
  for (const selector of ANCHOR_SELECTORS) {
    const found = $(selector)
      .filter((_, node): node is Element => isTag(node))
      .first();
    if (found.length > 0) {
      return found;
    }
  }
  return null;
}

function matchesBoilerplate(element: Element): boolean {
  const classAttr = (element.attribs['class'] ?? '').toLowerCase();
  const idAttr = (element.attribs['id'] ?? '').toLowerCase();
  if (!classAttr && !idAttr) {
    return false;
  }
  return BOILERPLATE_PATTERNS.some(
    (pattern) => classAttr.includes(pattern) || idAttr.includes(pattern)
  );
}

function collapseEmptyElements($: CheerioAPI, anchor: Cheerio<Element>): void {
  // Reverse document order visits children before their parents
  const elements = anchor.find('*').toArray().reverse();
  for (const element of elements) {
    if (EMPTY_EXEMPT_TAGS.has(element.name)) {
      continue;
    }
    const node = $(element);
    if (node.find('img').length > 0) {
      continue;
    }
    if (node.text().trim().length === 0) {
      node.remove();
    }
  }
}

/**
 * Map an image reference to images/<filename>, dropping query and fragment
 */
export function toLocalImagePath(src: string): string {
  const withoutQuery = src.split(/[?#]/)[0] ?? '';
  const filename = withoutQuery.split(/[\\/]/).pop() ?? '';
  return filename ? `images/${filename}` : src;
}

function rewriteImagesIn($: CheerioAPI, scope: Cheerio<AnyNode>): void {
  scope.find('img[src]').each((_, element) => {
    const src = element.attribs['src'] ?? '';
    $(element).attr('src', toLocalImagePath(src));
  });
}

/**
 * Rewrite every img[src] of an html fragment to images/<filename>
 */
export function rewriteImageSources(html: string): string {
  const $ = cheerio.load(html, {}, false);
  rewriteImagesIn($, $.root());
  return $.html();
}

/**
 * Collect visible text from a set of nodes, joining text nodes with single spaces
 */
export function extractVisibleText(nodes: ReadonlyArray<AnyNode>): string {
  const parts: string[] = [];

  const visit = (node: AnyNode): void => {
    if (isText(node)) {
      const value = node.data.trim();
      if (value) {
        parts.push(value);
      }
      return;
    }
    if (isTag(node) && INVISIBLE_TAGS.has(node.name)) {
      return;
    }
    if (hasChildren(node)) {
      for (const child of node.children) {
        visit(child);
      }
    }
  };

  for (const node of nodes) {
    visit(node);
  }

  return parts.join(' ').replace(/\s+/g, ' ').trim();
}

// ============================================================================
// Main Cleaner Function
// ============================================================================

/**
 * Clean a document and return its content subtree and visible text
 *
 * @param html - Raw or previously cleaned markup
 * @param options - Cleaning options
 */
export function cleanDocument(html: string, options: CleanOptions = {}): CleanedContent {
  const collapseEmpty = options.collapseEmpty ?? true;
  const $ = cheerio.load(html);
  const anchor = selectAnchor($);

  if (!anchor) {
    return { html: '', text: '' };
  }

  anchor.find(STRUCTURAL_TAGS).remove();

  anchor
    .find('*')
    .filter((_, element) => matchesBoilerplate(element))
    .remove();

  if (collapseEmpty) {
    collapseEmptyElements($, anchor);
  }

  if (options.rewriteImages) {
    rewriteImagesIn($, anchor);
  }

  return {
    html: $.html(anchor),
    text: extractVisibleText(anchor.toArray()),
  };
}

/**
 * Read the <title> text of a document, whitespace collapsed
 */
export function extractTitle($: CheerioAPI): string {
  return $('title').first().text().replace(/\s+/g, ' ').trim();
}
