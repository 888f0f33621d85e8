/**
 * Site Record Validator Module
 *
 * Validates a SiteRecord before it is rendered, whether it comes straight from
 * a conversion or from a hand-edited site.json.
 *
 * Hard constraints (errors):
 * 1. The record matches the schema: metadata, all twelve slots, overflow list
 * 2. The home slot lists at most five event highlights
 * 3. Every source id appears in exactly one slot or overflow entry
 *
 * Quality checks (warnings):
 * - Empty canonical slots
 * - Missing site name or contact channels
 * - generated_at that is not an ISO-8601 timestamp
 */

import { z } from 'zod';
import { MAX_EVENT_HIGHLIGHTS } from '../aggregator/index.js';
import {
  CANONICAL_PAGE_TYPES,
  SOCIAL_PLATFORMS,
  type SiteRecord,
  type SocialLinks,
  type ValidationResult,
} from '../types/index.js';

// ============================================================================
// Schema
// ============================================================================

const SlotSchema = z.object({
  content: z.string(),
  sources: z.array(z.string()),
});

const HomeSlotSchema = SlotSchema.extend({
  hero: z.object({ title: z.string() }),
  events: z.array(z.object({ date: z.string(), title: z.string() })),
});

const SocialSchema = z.object({
  facebook: z.string().optional(),
  twitter: z.string().optional(),
  instagram: z.string().optional(),
  youtube: z.string().optional(),
  linkedin: z.string().optional(),
  nextdoor: z.string().optional(),
});

export const SiteRecordSchema = z.object({
  metadata: z.object({
    name: z.string(),
    logo: z.string(),
    contact: z.object({
      phone: z.string(),
      fax: z.string(),
      email: z.string(),
      address: z.string(),
      hours: z.string(),
    }),
    social: SocialSchema,
  }),
  pages: z.object({
    home: HomeSlotSchema,
    about: SlotSchema,
    government: SlotSchema,
    departments: SlotSchema,
    services: SlotSchema,
    news: SlotSchema,
    events: SlotSchema,
    contact: SlotSchema,
    documents: SlotSchema,
    employment: SlotSchema,
    faqs: SlotSchema,
    accessibility: SlotSchema,
    additional_content: z.array(
      z.object({ title: z.string(), content: z.string(), source: z.string() })
    ),
  }),
  generated_at: z.string(),
  source: z.string(),
});

type ParsedSiteRecord = z.output<typeof SiteRecordSchema>;

/**
 * Validation result carrying the typed record when it is structurally valid
 */
export interface SiteRecordValidation extends ValidationResult {
  record: SiteRecord | null;
}

// ============================================================================
// Helpers
// ============================================================================

function compactSocial(social: ParsedSiteRecord['metadata']['social']): SocialLinks {
  const links: SocialLinks = {};
  for (const platform of SOCIAL_PLATFORMS) {
    const url = social[platform];
    if (url) {
      links[platform] = url;
    }
  }
  return links;
}

function toSiteRecord(parsed: ParsedSiteRecord): SiteRecord {
  return {
    ...parsed,
    metadata: { ...parsed.metadata, social: compactSocial(parsed.metadata.social) },
  };
}

/**
 * Find source ids claimed by more than one slot or overflow entry
 */
export function findDuplicateSources(record: SiteRecord): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  const claim = (source: string): void => {
    if (seen.has(source)) {
      duplicates.add(source);
    }
    seen.add(source);
  };

  for (const pageType of CANONICAL_PAGE_TYPES) {
    record.pages[pageType].sources.forEach(claim);
  }
  record.pages.additional_content.forEach((entry) => claim(entry.source));

  return Array.from(duplicates);
}

// ============================================================================
// Main Validation Function
// ============================================================================

/**
 * Validate a site record
 *
 * @param input - Parsed JSON of unknown shape
 */
export function validateSiteRecord(input: unknown): SiteRecordValidation {
  const errors: ValidationResult['errors'] = [];
  const warnings: ValidationResult['warnings'] = [];

  const parseResult = SiteRecordSchema.safeParse(input);
  if (!parseResult.success) {
    for (const issue of parseResult.error.errors) {
      errors.push({
        field: issue.path.join('.') || '(root)',
        message: issue.message,
        severity: 'error',
      });
    }
    return { valid: false, errors, warnings, record: null };
  }

  const record = toSiteRecord(parseResult.data);

  if (record.pages.home.events.length > MAX_EVENT_HIGHLIGHTS) {
    errors.push({
      field: 'pages.home.events',
      message: `pages.home.events exceeds maximum of ${MAX_EVENT_HIGHLIGHTS} items`,
      severity: 'error',
    });
  }

  for (const source of findDuplicateSources(record)) {
    errors.push({
      field: 'pages',
      message: `Source ${source} is assigned to more than one page`,
      severity: 'error',
    });
  }

  for (const pageType of CANONICAL_PAGE_TYPES) {
    if (!record.pages[pageType].content.trim()) {
      warnings.push({ field: `pages.${pageType}`, message: 'Page has no content' });
    }
  }

  if (!record.metadata.name.trim()) {
    warnings.push({ field: 'metadata.name', message: 'Site name is missing' });
  }

  const { phone, email, address } = record.metadata.contact;
  if (!phone && !email && !address) {
    warnings.push({ field: 'metadata.contact', message: 'No contact channel was found' });
  }

  if (Number.isNaN(Date.parse(record.generated_at))) {
    warnings.push({ field: 'generated_at', message: 'generated_at is not an ISO-8601 timestamp' });
  }

  const valid = errors.length === 0;
  return { valid, errors, warnings, record: valid ? record : null };
}
