/**
 * Page Aggregator Module
 *
 * Folds classified page records into the fixed canonical page set: twelve slots
 * plus the additional_content overflow list. Records are folded in discovery
 * order, so a slot's content reads in the same order its sources were found.
 */

import {
  CANONICAL_PAGE_TYPES,
  OVERFLOW_PAGE_TYPE,
  type CanonicalPageType,
  type CanonicalPages,
  type EventHighlight,
  type PageRecord,
  type PageSlot,
} from '../types/index.js';

// ============================================================================
// Constants
// ============================================================================

/** Joins the contributions of several records within one slot */
export const SECTION_BREAK = '\n\n---\n\n';

export const MAX_EVENT_HIGHLIGHTS = 5;

const FULL_MONTHS =
  'January|February|March|April|May|June|July|August|September|October|November|December';
const SHORT_MONTHS = 'Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Sept|Oct|Nov|Dec';

/** Tried in order; the first pattern found on a line supplies the date */
const DATE_PATTERNS: ReadonlyArray<RegExp> = [
  /\b\d{1,2}\/\d{1,2}\/\d{4}\b/,
  /\b\d{1,2}-\d{1,2}-\d{4}\b/,
  /\b\d{4}-\d{2}-\d{2}\b/,
  new RegExp(`\\b(?:${FULL_MONTHS})\\s+\\d{1,2},\\s*\\d{4}\\b`),
  new RegExp(`\\b(?:${SHORT_MONTHS})\\.?\\s+\\d{1,2},\\s*\\d{4}\\b`),
];

const DEFAULT_EVENT_TITLE = 'Event';

// ============================================================================
// Helpers
// ============================================================================

/**
 * A fresh page set with every slot present and empty
 */
export function createEmptyPages(): CanonicalPages {
  const emptySlot = (): PageSlot => ({ content: '', sources: [] });
  return {
    home: { content: '', sources: [], hero: { title: '' }, events: [] },
    about: emptySlot(),
    government: emptySlot(),
    departments: emptySlot(),
    services: emptySlot(),
    news: emptySlot(),
    events: emptySlot(),
    contact: emptySlot(),
    documents: emptySlot(),
    employment: emptySlot(),
    faqs: emptySlot(),
    accessibility: emptySlot(),
    additional_content: [],
  };
}

/**
 * Split slot content back into its per-record contributions
 */
export function splitSections(content: string): string[] {
  return content
    .split(SECTION_BREAK)
    .map((section) => section.trim())
    .filter((section) => section.length > 0);
}

function findDate(line: string): RegExpExecArray | null {
  for (const pattern of DATE_PATTERNS) {
    const match = pattern.exec(line);
    if (match) {
      return match;
    }
  }
  return null;
}

function toEventTitle(line: string, date: string): string {
  const title = line
    .replace(date, ' ')
    .replace(/!?\[([^\]]*)\]\([^)]*\)/g, '$1')
    .replace(/\\([\\`*_{}[\]()#+\-.!|])/g, '$1')
    .replace(/^[\s>#*+-]+/, '')
    .replace(/[*_`]/g, '')
    .replace(/\s+/g, ' ')
    .replace(/^[\s\-–—:|,.]+|[\s\-–—:|,]+$/g, '')
    .trim();
  return title || DEFAULT_EVENT_TITLE;
}

/**
 * Find up to `limit` dated lines in markdown content
 */
export function extractEventHighlights(
  content: string,
  limit: number = MAX_EVENT_HIGHLIGHTS
): EventHighlight[] {
  const events: EventHighlight[] = [];
  for (const line of content.split('\n')) {
    if (events.length >= limit) {
      break;
    }
    const match = findDate(line);
    if (match) {
      events.push({ date: match[0], title: toEventTitle(line, match[0]) });
    }
  }
  return events;
}

// ============================================================================
// Main Aggregation Function
// ============================================================================

/**
 * Fold page records into the canonical page set
 *
 * The input array is not mutated. Empty contributions are listed in `sources`
 * but add no section to the slot content.
 */
export function aggregatePages(records: ReadonlyArray<PageRecord>): CanonicalPages {
  const pages = createEmptyPages();
  const contributions = new Map<CanonicalPageType, string[]>();

  const ordered = [...records].sort((a, b) => a.order - b.order);

  for (const record of ordered) {
    const pageType = record.pageType;

    if (pageType === OVERFLOW_PAGE_TYPE) {
      pages.additional_content.push({
        title: record.title,
        content: record.content,
        source: record.sourceId,
      });
      continue;
    }

    pages[pageType].sources.push(record.sourceId);

    if (pageType === 'home' && !pages.home.hero.title) {
      pages.home.hero.title = record.title;
    }

    const content = record.content.trim();
    if (content) {
      const parts = contributions.get(pageType) ?? [];
      parts.push(content);
      contributions.set(pageType, parts);
    }
  }

  for (const pageType of CANONICAL_PAGE_TYPES) {
    pages[pageType].content = (contributions.get(pageType) ?? []).join(SECTION_BREAK);
  }

  pages.home.events = extractEventHighlights(pages.home.content);

  return pages;
}
