/**
 * Page Classifier Module
 *
 * Assigns each document to exactly one canonical page type, or to the
 * additional_content overflow bucket.
 *
 * Tiers, first match wins:
 * 1. Path hint (directory segments of the source path)
 * 2. Filename keywords (stem, case-insensitive substring)
 * 3. Title keywords (same rule list as filenames)
 * 4. Content keyword scoring (whole words) above a threshold
 * 5. additional_content
 *
 * Every table below is an ordered array evaluated top to bottom. Classification
 * is a pure function of its input; no earlier result influences a later one.
 */

import {
  OVERFLOW_PAGE_TYPE,
  type CanonicalPageType,
  type ClassificationResult,
} from '../types/index.js';

// ============================================================================
// Type Definitions
// ============================================================================

export interface ClassifierInput {
  /** File name including extension, e.g. "about.html" */
  filename: string;
  /** Source path relative to the site root, e.g. "home/news/item.html" */
  path: string;
  title: string;
  /** Visible text of the cleaned content */
  text: string;
}

export interface ClassifierOptions {
  /** Minimum content score that must be exceeded (default: 3) */
  contentScoreThreshold?: number;
}

export interface KeywordRule {
  keywords: ReadonlyArray<string>;
  pageType: CanonicalPageType;
}

export interface PathHint {
  segment: string;
  pageType: CanonicalPageType;
}

// ============================================================================
// Rule Tables
// ============================================================================

export const DEFAULT_CONTENT_SCORE_THRESHOLD = 3;

/**
 * Directory hints, matched against "/<dir>/" of the normalized source path
 */
export const PATH_HINTS: ReadonlyArray<PathHint> = [
  { segment: '/home/news/', pageType: 'news' },
  { segment: '/news/', pageType: 'news' },
  { segment: '/announcements/', pageType: 'news' },
  { segment: '/events/', pageType: 'events' },
  { segment: '/calendar/', pageType: 'events' },
  { segment: '/departments/', pageType: 'departments' },
  { segment: '/services/', pageType: 'services' },
  { segment: '/government/', pageType: 'government' },
  { segment: '/documents/', pageType: 'documents' },
  { segment: '/forms/', pageType: 'documents' },
  { segment: '/employment/', pageType: 'employment' },
  { segment: '/jobs/', pageType: 'employment' },
  { segment: '/faq/', pageType: 'faqs' },
  { segment: '/faqs/', pageType: 'faqs' },
];

/**
 * Keyword rules shared by the filename and title tiers
 */
export const KEYWORD_RULES: ReadonlyArray<KeywordRule> = [
  { keywords: ['index', 'home', 'default'], pageType: 'home' },
  { keywords: ['about', 'history', 'welcome', 'resident'], pageType: 'about' },
  {
    keywords: ['government', 'mayor', 'council', 'official', 'committee', 'commission', 'leadership'],
    pageType: 'government',
  },
  { keywords: ['department', 'division'], pageType: 'departments' },
  {
    keywords: ['service', 'permit', 'waste', 'trash', 'recycling', 'utilit', 'emergency'],
    pageType: 'services',
  },
  { keywords: ['news', 'announcement', 'press', 'blog', 'article'], pageType: 'news' },
  { keywords: ['event', 'calendar', 'meeting'], pageType: 'events' },
  { keywords: ['contact'], pageType: 'contact' },
  {
    keywords: [
      'document',
      'form',
      'download',
      'ordinance',
      'resolution',
      'budget',
      'financial',
      'right-to-know',
    ],
    pageType: 'documents',
  },
  { keywords: ['job', 'employ', 'career'], pageType: 'employment' },
  { keywords: ['faq', 'question'], pageType: 'faqs' },
  { keywords: ['accessib', 'ada-', 'section-508'], pageType: 'accessibility' },
];

/**
 * Content scoring candidates. Listing order breaks ties.
 */
export const CONTENT_KEYWORDS: ReadonlyArray<KeywordRule> = [
  { keywords: ['mayor', 'council', 'borough', 'commissioner'], pageType: 'government' },
  { keywords: ['permit', 'license', 'utility', 'trash', 'recycling'], pageType: 'services' },
  { keywords: ['news', 'announcement', 'press release'], pageType: 'news' },
  { keywords: ['event', 'meeting', 'calendar'], pageType: 'events' },
  { keywords: ['phone', 'email', 'address'], pageType: 'contact' },
  { keywords: ['ordinance', 'resolution', 'pdf', 'download'], pageType: 'documents' },
  { keywords: ['employment', 'job opening', 'salary', 'applicant'], pageType: 'employment' },
  { keywords: ['frequently asked', 'question'], pageType: 'faqs' },
  { keywords: ['accessibility', 'screen reader', 'wcag'], pageType: 'accessibility' },
];

// ============================================================================
// Tier Helpers
// ============================================================================

function normalizePath(path: string): string {
  const posix = path.replace(/\\/g, '/').toLowerCase();
  const lastSlash = posix.lastIndexOf('/');
  const directory = lastSlash >= 0 ? posix.slice(0, lastSlash + 1) : '';
  return `/${directory.replace(/^\/+/, '')}`;
}

function fileStem(filename: string): string {
  const base = filename.replace(/\\/g, '/').split('/').pop() ?? '';
  return base.replace(/\.[^.]*$/, '').toLowerCase();
}

function matchKeywordRules(
  value: string
): { pageType: CanonicalPageType; keyword: string } | null {
  if (!value) {
    return null;
  }
  for (const rule of KEYWORD_RULES) {
    for (const keyword of rule.keywords) {
      if (value.includes(keyword)) {
        return { pageType: rule.pageType, keyword };
      }
    }
  }
  return null;
}

/**
 * Count whole-word occurrences of a keyword; a trailing plural "s" still counts,
 * so "events" scores for "event" while "prevent" and "newsletter" do not.
 */
function countOccurrences(haystack: string, needle: string): number {
  if (!needle) {
    return 0;
  }
  const escaped = needle.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return haystack.match(new RegExp(`\\b${escaped}s?\\b`, 'g'))?.length ?? 0;
}

/**
 * Score each content candidate, in candidate order
 */
export function scoreContent(
  text: string
): Array<{ pageType: CanonicalPageType; score: number }> {
  const lowered = text.toLowerCase();
  return CONTENT_KEYWORDS.map((rule) => ({
    pageType: rule.pageType,
    score: rule.keywords.reduce(
      (total, keyword) => total + countOccurrences(lowered, keyword),
      0
    ),
  }));
}

// ============================================================================
// Main Classifier Function
// ============================================================================

/**
 * Classify a document into a canonical page type
 */
export function classifyPage(
  input: ClassifierInput,
  options: ClassifierOptions = {}
): ClassificationResult {
  const threshold = options.contentScoreThreshold ?? DEFAULT_CONTENT_SCORE_THRESHOLD;

  // Tier 1: authoring structure
  const directory = normalizePath(input.path);
  for (const hint of PATH_HINTS) {
    if (directory.includes(hint.segment)) {
      return { pageType: hint.pageType, tier: 'path', matched: hint.segment };
    }
  }

  // Tier 2: filename
  const byFilename = matchKeywordRules(fileStem(input.filename));
  if (byFilename) {
    return { pageType: byFilename.pageType, tier: 'filename', matched: byFilename.keyword };
  }

  // Tier 3: title
  const byTitle = matchKeywordRules(input.title.toLowerCase());
  if (byTitle) {
    return { pageType: byTitle.pageType, tier: 'title', matched: byTitle.keyword };
  }

  // Tier 4: content keyword concentration
  let best: { pageType: CanonicalPageType; score: number } | null = null;
  for (const candidate of scoreContent(input.text)) {
    if (!best || candidate.score > best.score) {
      best = candidate;
    }
  }
  if (best && best.score > threshold) {
    return { pageType: best.pageType, tier: 'content', matched: `score:${best.score}` };
  }

  return { pageType: OVERFLOW_PAGE_TYPE, tier: 'default', matched: null };
}
