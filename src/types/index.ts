/**
 * Core type definitions for the municipal site converter
 *
 * This module exports all shared types used across the pipeline.
 */

/**
 * Unique identifier for a conversion run
 * Format: run_<16 hex chars>
 */
export type RunId = string;

// ============================================================================
// Canonical Page Types
// ============================================================================

/**
 * The twelve canonical page slots, in navigation order.
 * This order is also the tie-break order wherever types compete.
 */
export const CANONICAL_PAGE_TYPES = [
  'home',
  'about',
  'government',
  'departments',
  'services',
  'news',
  'events',
  'contact',
  'documents',
  'employment',
  'faqs',
  'accessibility',
] as const;

export type CanonicalPageType = (typeof CANONICAL_PAGE_TYPES)[number];

/**
 * Overflow bucket for documents without a canonical home
 */
export const OVERFLOW_PAGE_TYPE = 'additional_content';

export type PageType = CanonicalPageType | typeof OVERFLOW_PAGE_TYPE;

/**
 * Human-readable titles used for navigation and page headings
 */
export const PAGE_TITLES: Readonly<Record<CanonicalPageType, string>> = {
  home: 'Home',
  about: 'About',
  government: 'Government',
  departments: 'Departments',
  services: 'Services',
  news: 'News',
  events: 'Events',
  contact: 'Contact',
  documents: 'Documents',
  employment: 'Employment',
  faqs: 'FAQs',
  accessibility: 'Accessibility',
};

export function isCanonicalPageType(value: string): value is CanonicalPageType {
  return (CANONICAL_PAGE_TYPES as readonly string[]).includes(value);
}

// ============================================================================
// Documents and Records
// ============================================================================

/**
 * One raw input file
 */
export interface SourceDocument {
  /** POSIX path relative to the source root, e.g. "news/index.html" */
  sourceId: string;
  absolutePath: string;
  /** Discovery order index (ascending sourceId) */
  order: number;
  raw: string;
}

/**
 * A document after boilerplate removal
 */
export interface CleanedContent {
  /** Serialized content subtree */
  html: string;
  /** Visible text, text nodes joined by single spaces */
  text: string;
}

/**
 * Which classifier tier produced a page type
 */
export type ClassificationTier = 'path' | 'filename' | 'title' | 'content' | 'default';

export interface ClassificationResult {
  pageType: PageType;
  tier: ClassificationTier;
  /** Keyword or path hint that matched, null for the default tier */
  matched: string | null;
}

/**
 * Classification result for one document. Never mutated after creation.
 */
export interface PageRecord {
  order: number;
  sourceId: string;
  pageType: PageType;
  title: string;
  /** Normalized markdown */
  content: string;
  /** Visible text of the cleaned content */
  text: string;
  classification: ClassificationResult;
}

// ============================================================================
// Site Metadata
// ============================================================================

export interface ContactInfo {
  phone: string;
  fax: string;
  email: string;
  address: string;
  hours: string;
}

export const SOCIAL_PLATFORMS = [
  'facebook',
  'twitter',
  'instagram',
  'youtube',
  'linkedin',
  'nextdoor',
] as const;

export type SocialPlatform = (typeof SOCIAL_PLATFORMS)[number];

export type SocialLinks = Partial<Record<SocialPlatform, string>>;

/**
 * Site-wide facts. Each field is write-once during extraction.
 */
export interface SiteMetadata {
  name: string;
  logo: string;
  contact: ContactInfo;
  social: SocialLinks;
}

// ============================================================================
// Canonical Site
// ============================================================================

export interface PageSlot {
  content: string;
  /** Source ids of every record merged into this slot, in discovery order */
  sources: string[];
}

export interface EventHighlight {
  date: string;
  title: string;
}

export interface HomeSlot extends PageSlot {
  hero: { title: string };
  events: EventHighlight[];
}

export interface OverflowEntry {
  title: string;
  content: string;
  source: string;
}

export type CanonicalSlots = {
  [K in CanonicalPageType]: K extends 'home' ? HomeSlot : PageSlot;
};

/**
 * Twelve named slots plus the overflow list
 */
export type CanonicalPages = CanonicalSlots & {
  additional_content: OverflowEntry[];
};

/**
 * The canonical structured record written as site.json
 */
export interface SiteRecord {
  metadata: SiteMetadata;
  pages: CanonicalPages;
  generated_at: string;
  source: string;
}

// ============================================================================
// Layouts
// ============================================================================

export const LAYOUT_IDS = ['a', 'b', 'c', 'd', 'e'] as const;

export type LayoutId = (typeof LAYOUT_IDS)[number];

export type LayoutAssignment = Record<CanonicalPageType, LayoutId>;

// ============================================================================
// Storage
// ============================================================================

/**
 * Metadata describing one written output artifact
 */
export interface ArtifactMetadata {
  path: string;
  createdAt: string;
  contentType: string;
  size: number;
  checksum: string;
}

/**
 * Output adapter interface for generated files
 */
export interface OutputAdapter {
  write(path: string, content: string | Buffer, contentType?: string): Promise<ArtifactMetadata>;
  read(path: string): Promise<{ content: string | Buffer; metadata: ArtifactMetadata }>;
  exists(path: string): Promise<boolean>;
  list(): Promise<ArtifactMetadata[]>;
}

// ============================================================================
// Results
// ============================================================================

/**
 * Validation result
 */
export interface ValidationResult {
  valid: boolean;
  errors: Array<{
    field: string;
    message: string;
    severity: 'error' | 'warning';
  }>;
  warnings: Array<{
    field: string;
    message: string;
  }>;
}

/**
 * Module result wrapper for operations that can fail
 */
export interface ModuleResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: {
    code: string;
    message: string;
    details?: unknown;
  };
  metadata: {
    runId: RunId;
    module: string;
    timestamp: string;
    duration?: number;
  };
}
