/**
 * Metadata Extractor Module
 *
 * Derives site-wide facts (name, logo, contact channels, social links) from a
 * bounded, ordered prefix of documents.
 *
 * Each document yields a MetadataCandidate. Candidates are folded in scan order
 * with a keep-first merge per field, so a field populated by an earlier document
 * is never overwritten by a later one. Missing fields stay empty strings; render
 * defaults are applied downstream.
 */

import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { extractTitle, extractVisibleText } from '../cleaner/index.js';
import { defaultLogger, errorMessage, type Logger } from '../observability/index.js';
import {
  SOCIAL_PLATFORMS,
  type ContactInfo,
  type SiteMetadata,
  type SocialLinks,
  type SocialPlatform,
  type SourceDocument,
} from '../types/index.js';

// ============================================================================
// Type Definitions
// ============================================================================

/**
 * Everything a single document can contribute to the site metadata
 */
export interface MetadataCandidate {
  titleName: string;
  logoAltName: string;
  logo: string;
  contact: ContactInfo;
  social: SocialLinks;
}

export interface SiteMetadataOptions {
  /** Number of documents scanned after the entry document (default: 5) */
  scanLimit?: number;
  /** Distinguished document scanned before all others, e.g. the root index.html */
  entryDocument?: SourceDocument | null;
  /** Folder or domain used to derive a name when no document provides one */
  fallbackName?: string;
  logger?: Logger;
}

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_METADATA_SCAN_LIMIT = 5;

const TITLE_SUFFIX_PATTERN =
  /\s*[-|:–—]\s*(?:home(?:\s*page)?|welcome|official\s+(?:web\s*)?site|official\s+website)\b.*$/i;
const TITLE_PREFIX_PATTERN = /^welcome\s+to\s+(?:the\s+)?/i;
const GENERIC_TITLES = new Set(['home', 'home page', 'welcome', 'index', 'untitled']);

const LOGO_MARKER = /logo|seal/i;
const LOGO_WORDS = /\b(?:official\s+)?(?:logo|seal)\b/gi;

const PHONE_DIGITS = String.raw`\(?\d{3}\)?[-.\s]?\d{3}[-.\s]?\d{4}`;
const LABELED_PHONE_PATTERN = new RegExp(String.raw`(?:Phone|Tel|Telephone)\s*:\s*(${PHONE_DIGITS})`, 'i');
const LABELED_FAX_PATTERN = new RegExp(String.raw`Fax\s*:\s*(${PHONE_DIGITS})`, 'i');
const LABELED_FAX_SEGMENT = new RegExp(String.raw`Fax\s*:\s*${PHONE_DIGITS}`, 'gi');
const PHONE_PATTERN = new RegExp(PHONE_DIGITS);

const EMAIL_PATTERN = /[\w.-]+@[\w.-]+\.\w+/;

const ADDRESS_PATTERN =
  /\d+\s+[\w\s.]+?\s(?:Street|St|Avenue|Ave|Road|Rd|Boulevard|Blvd|Drive|Dr|Lane|Ln|Way|Court|Ct|Place|Pl|Circle|Cir|Pike|Highway|Hwy)\.?,?\s+[\w\s]+?,\s*[A-Z]{2}\s+\d{5}(?:-\d{4})?/;

const HOURS_PATTERN =
  /\b(?:Monday|Mon)\b[\s\S]*?\d{1,2}(?::\d{2})?\s*(?:AM|PM|a\.m\.|p\.m\.)[\s\S]*?\d{1,2}(?::\d{2})?\s*(?:AM|PM|a\.m\.|p\.m\.)/i;
const MAX_HOURS_LENGTH = 200;

const SOCIAL_HOSTS: ReadonlyArray<{ platform: SocialPlatform; hosts: ReadonlyArray<string> }> = [
  { platform: 'facebook', hosts: ['facebook.com', 'fb.com'] },
  { platform: 'twitter', hosts: ['twitter.com', 'x.com'] },
  { platform: 'instagram', hosts: ['instagram.com'] },
  { platform: 'youtube', hosts: ['youtube.com', 'youtu.be'] },
  { platform: 'linkedin', hosts: ['linkedin.com'] },
  { platform: 'nextdoor', hosts: ['nextdoor.com'] },
];

export const DEFAULT_SITE_NAME_FALLBACK = 'Unknown Municipality';

// ============================================================================
// Empty Values and Merge
// ============================================================================

export function emptyContact(): ContactInfo {
  return { phone: '', fax: '', email: '', address: '', hours: '' };
}

export function emptyCandidate(): MetadataCandidate {
  return { titleName: '', logoAltName: '', logo: '', contact: emptyContact(), social: {} };
}

/**
 * Keep the current value unless it is still empty
 */
export function keepFirst(current: string, next: string): string {
  return current ? current : next;
}

function mergeSocial(current: SocialLinks, next: SocialLinks): SocialLinks {
  const merged: SocialLinks = { ...current };
  for (const platform of SOCIAL_PLATFORMS) {
    const url = keepFirst(current[platform] ?? '', next[platform] ?? '');
    if (url) {
      merged[platform] = url;
    }
  }
  return merged;
}

/**
 * Fold one candidate into the accumulator. Pure: returns a new object.
 */
export function mergeMetadata(
  accumulator: MetadataCandidate,
  next: MetadataCandidate
): MetadataCandidate {
  return {
    titleName: keepFirst(accumulator.titleName, next.titleName),
    logoAltName: keepFirst(accumulator.logoAltName, next.logoAltName),
    logo: keepFirst(accumulator.logo, next.logo),
    contact: {
      phone: keepFirst(accumulator.contact.phone, next.contact.phone),
      fax: keepFirst(accumulator.contact.fax, next.contact.fax),
      email: keepFirst(accumulator.contact.email, next.contact.email),
      address: keepFirst(accumulator.contact.address, next.contact.address),
      hours: keepFirst(accumulator.contact.hours, next.contact.hours),
    },
    social: mergeSocial(accumulator.social, next.social),
  };
}

// ============================================================================
// Field Extractors
// ============================================================================

/**
 * Trim "- Home", "| Welcome", ": Official Site" style suffixes from a title
 */
export function deriveNameFromTitle(title: string): string {
  const name = title
    .replace(/\s+/g, ' ')
    .trim()
    .replace(TITLE_SUFFIX_PATTERN, '')
    .replace(TITLE_PREFIX_PATTERN, '')
    .trim();
  return GENERIC_TITLES.has(name.toLowerCase()) ? '' : name;
}

/**
 * Turn a folder name or domain into a display name
 * "www.ridge-township.org" -> "Ridge Township"
 */
export function deriveNameFromSource(source: string): string {
  const base =
    source
      .replace(/^[a-z]+:\/\//i, '')
      .replace(/[\\/]+$/, '')
      .split(/[\\/]/)
      .pop() ?? '';
  const host = base.replace(/^www\./i, '');
  const withoutTld = host.includes('.') ? host.slice(0, host.lastIndexOf('.')) : host;
  return withoutTld
    .split(/[-_.\s]+/)
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

function firstGroup(pattern: RegExp, text: string): string {
  const match = pattern.exec(text);
  return match?.[1]?.trim() ?? '';
}

function firstMatch(pattern: RegExp, text: string): string {
  const match = pattern.exec(text);
  return match?.[0]?.trim() ?? '';
}

function extractHours(text: string): string {
  const hours = firstMatch(HOURS_PATTERN, text).replace(/\s+/g, ' ');
  return hours.length < MAX_HOURS_LENGTH ? hours : '';
}

function detectSocialPlatform(href: string): SocialPlatform | null {
  let hostname: string;
  try {
    hostname = new URL(href).hostname.toLowerCase().replace(/^www\./, '');
  } catch {
    return null;
  }
  for (const entry of SOCIAL_HOSTS) {
    if (entry.hosts.some((host) => hostname === host || hostname.endsWith(`.${host}`))) {
      return entry.platform;
    }
  }
  return null;
}

function extractSocialLinks($: CheerioAPI): SocialLinks {
  const social: SocialLinks = {};
  $('a[href]').each((_, element) => {
    const raw = (element.attribs['href'] ?? '').trim();
    // Protocol-relative links ("//facebook.com/town") are stored as https
    const href = raw.startsWith('//') ? `https:${raw}` : raw;
    const platform = detectSocialPlatform(href);
    if (platform && !social[platform]) {
      social[platform] = href;
    }
  });
  return social;
}

function extractLogo($: CheerioAPI): { logo: string; altName: string } {
  for (const element of $('img').toArray()) {
    const src = (element.attribs['src'] ?? '').trim();
    const alt = (element.attribs['alt'] ?? '').trim();
    const className = element.attribs['class'] ?? '';
    if (!src) {
      continue;
    }
    if ([src, alt, className].some((value) => LOGO_MARKER.test(value))) {
      const altName = alt
        .replace(LOGO_WORDS, '')
        .replace(/\s+/g, ' ')
        .replace(/^[\s\-|:]+|[\s\-|:]+$/g, '')
        .trim();
      return { logo: src, altName: altName.length >= 3 ? altName : '' };
    }
  }
  return { logo: '', altName: '' };
}

function extractContact($: CheerioAPI): ContactInfo {
  const footer = $('footer#footer').first().length > 0 ? $('footer#footer').first() : $('footer').first();
  const footerText = footer.length > 0 ? extractVisibleText(footer.toArray()) : '';
  const pageText = extractVisibleText($.root().toArray());

  const phone =
    firstGroup(LABELED_PHONE_PATTERN, footerText) ||
    firstGroup(LABELED_PHONE_PATTERN, pageText) ||
    firstMatch(PHONE_PATTERN, pageText.replace(LABELED_FAX_SEGMENT, ' '));

  const fax = firstGroup(LABELED_FAX_PATTERN, footerText) || firstGroup(LABELED_FAX_PATTERN, pageText);

  return {
    phone,
    fax,
    email: firstMatch(EMAIL_PATTERN, footerText) || firstMatch(EMAIL_PATTERN, pageText),
    address: firstMatch(ADDRESS_PATTERN, footerText) || firstMatch(ADDRESS_PATTERN, pageText),
    hours: extractHours(footerText) || extractHours(pageText),
  };
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Extract every metadata field one document can provide
 */
export function extractDocumentMetadata(html: string): MetadataCandidate {
  const $ = cheerio.load(html);
  const { logo, altName } = extractLogo($);

  return {
    titleName: deriveNameFromTitle(extractTitle($)),
    logoAltName: altName,
    logo,
    contact: extractContact($),
    social: extractSocialLinks($),
  };
}

/**
 * Resolve a folded candidate into final site metadata
 */
export function resolveSiteMetadata(
  candidate: MetadataCandidate,
  fallbackName: string = ''
): SiteMetadata {
  const name =
    candidate.titleName ||
    candidate.logoAltName ||
    deriveNameFromSource(fallbackName) ||
    DEFAULT_SITE_NAME_FALLBACK;

  return {
    name,
    logo: candidate.logo,
    contact: { ...candidate.contact },
    social: { ...candidate.social },
  };
}

/**
 * Fold the entry document and the first `scanLimit` documents, in the given order,
 * into site metadata
 */
export function extractSiteMetadata(
  documents: ReadonlyArray<SourceDocument>,
  options: SiteMetadataOptions = {}
): SiteMetadata {
  const logger = options.logger ?? defaultLogger;
  const scanLimit = options.scanLimit ?? DEFAULT_METADATA_SCAN_LIMIT;
  const entry = options.entryDocument ?? null;

  const prefix = documents
    .filter((document) => !entry || document.sourceId !== entry.sourceId)
    .slice(0, scanLimit);
  const scanned = entry ? [entry, ...prefix] : prefix;

  const folded = scanned.reduce<MetadataCandidate>((accumulator, document) => {
    try {
      return mergeMetadata(accumulator, extractDocumentMetadata(document.raw));
    } catch (error) {
      logger.warn('Metadata extraction failed for document', {
        source: document.sourceId,
        error: errorMessage(error),
      });
      return accumulator;
    }
  }, emptyCandidate());

  logger.debug('Site metadata extracted', {
    scanned: scanned.map((document) => document.sourceId),
  });

  return resolveSiteMetadata(folded, options.fallbackName ?? '');
}
