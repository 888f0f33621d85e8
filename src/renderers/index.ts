/**
 * Renderers Module
 *
 * The SiteRecord is the only canonical artifact. Every HTML page is a view
 * derived from it.
 *
 * Responsibilities:
 * - Layout resolution: default assignment per page type, per-run overrides
 * - Layout fragments A-E
 * - Full page documents (header, navigation, footer, layout switcher)
 * - The index.html redirect
 *
 * All functions here are pure: no I/O, inputs are never mutated, and every
 * metadata string is HTML-escaped before it reaches the markup.
 */

import { splitSections } from '../aggregator/index.js';
import { toLocalImagePath } from '../cleaner/index.js';
import { markdownToHtml } from '../markdown/index.js';
import {
  CANONICAL_PAGE_TYPES,
  LAYOUT_IDS,
  PAGE_TITLES,
  SOCIAL_PLATFORMS,
  isCanonicalPageType,
  type CanonicalPageType,
  type EventHighlight,
  type LayoutAssignment,
  type LayoutId,
  type SiteMetadata,
  type SiteRecord,
  type SocialPlatform,
} from '../types/index.js';

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_LAYOUT_MAP: Readonly<LayoutAssignment> = {
  home: 'd',
  about: 'a',
  government: 'b',
  departments: 'c',
  services: 'c',
  news: 'c',
  events: 'c',
  contact: 'b',
  documents: 'e',
  employment: 'e',
  faqs: 'e',
  accessibility: 'a',
};

/** Layout used for page types without a default assignment */
export const FALLBACK_LAYOUT: LayoutId = 'a';

export const DEFAULT_SITE_NAME = 'Municipal Website';

export const EMPTY_PAGE_NOTICE = '*No content found for this page.*';

export const MAX_FEATURED_EVENTS = 3;

export const STYLESHEET_FILE = 'style.css';
export const SWITCHER_SCRIPT_FILE = 'layout_switcher.js';

const SOCIAL_LABELS: Readonly<Record<SocialPlatform, string>> = {
  facebook: 'Facebook',
  twitter: 'X (Twitter)',
  instagram: 'Instagram',
  youtube: 'YouTube',
  linkedin: 'LinkedIn',
  nextdoor: 'Nextdoor',
};

const SAFE_SCHEMES = new Set(['http:', 'https:', 'mailto:', 'tel:']);

// ============================================================================
// Type Definitions
// ============================================================================

/**
 * Per-run layout overrides, keyed by page type. Values are unchecked input.
 */
export type LayoutOverrides = Readonly<Record<string, string>>;

export interface LayoutResolution {
  layout: LayoutId;
  /** The override that was asked for, if any */
  requested: string | null;
  /** True when the requested override or the page type was not recognized */
  fallback: boolean;
}

/**
 * Everything a layout fragment needs
 */
export interface LayoutInput {
  pageType: CanonicalPageType;
  /** Slot content as markdown, never empty */
  content: string;
  metadata: SiteMetadata;
  heroTitle: string;
  events: ReadonlyArray<EventHighlight>;
}

export interface RenderPageOptions {
  layout: LayoutId;
  /** Year printed in the copyright line */
  year: number;
  /** Point the logo at images/<filename> */
  rewriteImages?: boolean;
}

// ============================================================================
// Escaping
// ============================================================================

/**
 * Escape HTML special characters
 */
export function escapeHtml(text: string): string {
  const escapeMap: Record<string, string> = {
    '&': '&amp;',
    '<': '&lt;',
    '>': '&gt;',
    '"': '&quot;',
    "'": '&#039;',
  };
  return text.replace(/[&<>"']/g, (char) => escapeMap[char] ?? char);
}

/**
 * Escape a URL for an href/src attribute. Relative references pass through;
 * absolute ones must use a known-safe scheme.
 */
export function sanitizeUrl(url: string): string {
  const trimmed = url.trim();
  const scheme = /^([a-z][a-z0-9+.-]*:)/i.exec(trimmed);
  if (scheme?.[1] && !SAFE_SCHEMES.has(scheme[1].toLowerCase())) {
    return '#';
  }
  return escapeHtml(trimmed);
}

// ============================================================================
// Layout Resolution
// ============================================================================

export function isLayoutId(value: string): value is LayoutId {
  return (LAYOUT_IDS as readonly string[]).includes(value);
}

/**
 * Pick the layout for a page type. An override that is not a known layout id
 * falls back to the type's default; a type without a default gets layout A.
 */
export function resolveLayout(pageType: string, overrides: LayoutOverrides = {}): LayoutResolution {
  const requested = overrides[pageType] ?? null;
  const normalized = requested?.trim().toLowerCase() ?? null;
  const fallbackLayout = isCanonicalPageType(pageType) ? DEFAULT_LAYOUT_MAP[pageType] : FALLBACK_LAYOUT;

  if (normalized !== null && isLayoutId(normalized)) {
    return { layout: normalized, requested, fallback: false };
  }

  return {
    layout: fallbackLayout,
    requested,
    fallback: requested !== null || !isCanonicalPageType(pageType),
  };
}

// ============================================================================
// Layout Fragments
// ============================================================================

function renderLayoutA(input: LayoutInput): string {
  return `<div class="layout layout-a" data-layout="a">
  <div class="content-wrapper single-column">
${markdownToHtml(input.content)}
  </div>
</div>`;
}

function telHref(phone: string): string {
  return `tel:${phone.replace(/[^\d+]/g, '')}`;
}

function renderInfoCard(kind: string, heading: string, bodyHtml: string): string {
  return `    <div class="sidebar-card" data-type="${kind}">
      <h3>${heading}</h3>
      <p>${bodyHtml}</p>
    </div>`;
}

function renderSidebarCards(metadata: SiteMetadata): string {
  const { address, phone, fax, email, hours } = metadata.contact;
  const cards: string[] = [];

  if (address) {
    cards.push(renderInfoCard('address', 'Address', escapeHtml(address)));
  }
  if (phone) {
    cards.push(
      renderInfoCard('phone', 'Phone', `<a href="${sanitizeUrl(telHref(phone))}">${escapeHtml(phone)}</a>`)
    );
  }
  if (fax) {
    cards.push(renderInfoCard('fax', 'Fax', escapeHtml(fax)));
  }
  if (email) {
    cards.push(
      renderInfoCard('email', 'Email', `<a href="${sanitizeUrl(`mailto:${email}`)}">${escapeHtml(email)}</a>`)
    );
  }
  if (hours) {
    cards.push(renderInfoCard('hours', 'Hours', escapeHtml(hours)));
  }

  if (cards.length === 0) {
    return renderInfoCard('placeholder', 'Additional information', 'Contact details are not available.');
  }
  return cards.join('\n');
}

function renderLayoutB(input: LayoutInput): string {
  return `<div class="layout layout-b" data-layout="b">
  <div class="content-wrapper two-column">
    <div class="main-content">
${markdownToHtml(input.content)}
    </div>
    <aside class="info-cards">
${renderSidebarCards(input.metadata)}
    </aside>
  </div>
</div>`;
}

function renderLayoutC(input: LayoutInput): string {
  const cards = splitSections(input.content)
    .map((section) => `    <section class="card">\n${markdownToHtml(section)}\n    </section>`)
    .join('\n');

  return `<div class="layout layout-c" data-layout="c">
  <div class="content-wrapper card-grid">
${cards}
  </div>
</div>`;
}

function renderEventCards(events: ReadonlyArray<EventHighlight>): string {
  const featured = events.slice(0, MAX_FEATURED_EVENTS);
  if (featured.length === 0) {
    return '';
  }

  const cards = featured
    .map(
      (event) => `      <div class="featured-card" data-type="event">
        <span class="featured-date">${escapeHtml(event.date)}</span>
        <h3>${escapeHtml(event.title)}</h3>
      </div>`
    )
    .join('\n');

  return `
  <section class="featured-section" data-type="events">
    <h2>Upcoming Events</h2>
    <div class="featured-grid">
${cards}
    </div>
  </section>`;
}

function renderLayoutD(input: LayoutInput): string {
  const heroTitle = input.heroTitle || input.metadata.name || DEFAULT_SITE_NAME;

  return `<div class="layout layout-d" data-layout="d">
  <section class="hero-section" data-type="hero">
    <h2 class="hero-title">${escapeHtml(heroTitle)}</h2>
  </section>
  <div class="hero-content">
${markdownToHtml(input.content)}
  </div>${renderEventCards(input.events)}
</div>`;
}

function renderLayoutE(input: LayoutInput): string {
  return `<div class="layout layout-e" data-layout="e">
  <div class="content-wrapper compact-list">
${markdownToHtml(input.content)}
  </div>
</div>`;
}

/**
 * Render a page body with the given layout
 */
export function renderLayout(layout: LayoutId, input: LayoutInput): string {
  switch (layout) {
    case 'a':
      return renderLayoutA(input);
    case 'b':
      return renderLayoutB(input);
    case 'c':
      return renderLayoutC(input);
    case 'd':
      return renderLayoutD(input);
    case 'e':
      return renderLayoutE(input);
    default:
      return renderLayoutA(input);
  }
}

// ============================================================================
// Page Documents
// ============================================================================

/**
 * Markdown shown for a slot that received no content
 */
export function emptyPageContent(pageType: CanonicalPageType): string {
  return `# ${PAGE_TITLES[pageType]}\n\n${EMPTY_PAGE_NOTICE}`;
}

function renderNavigation(active: CanonicalPageType): string {
  return CANONICAL_PAGE_TYPES.map((pageType) => {
    const current = pageType === active ? ' class="active" aria-current="page"' : '';
    return `      <li><a href="${pageType}.html"${current}>${PAGE_TITLES[pageType]}</a></li>`;
  }).join('\n');
}

function renderFooterContact(metadata: SiteMetadata): string {
  const { phone, email, address, hours } = metadata.contact;
  const lines: string[] = [];

  if (address) {
    lines.push(`        <p>${escapeHtml(address)}</p>`);
  }
  if (phone) {
    lines.push(`        <p>Phone: ${escapeHtml(phone)}</p>`);
  }
  if (email) {
    lines.push(`        <p><a href="${sanitizeUrl(`mailto:${email}`)}">${escapeHtml(email)}</a></p>`);
  }

  const sections: string[] = [];
  if (lines.length > 0) {
    sections.push(`      <div class="footer-section">
        <h4>Contact Information</h4>
${lines.join('\n')}
      </div>`);
  }
  if (hours) {
    sections.push(`      <div class="footer-section">
        <h4>Office Hours</h4>
        <p>${escapeHtml(hours)}</p>
      </div>`);
  }
  return sections.join('\n');
}

function renderSocialLinks(metadata: SiteMetadata): string {
  const links = SOCIAL_PLATFORMS.flatMap((platform) => {
    const url = metadata.social[platform];
    return url
      ? [`        <li><a href="${sanitizeUrl(url)}" rel="noopener">${SOCIAL_LABELS[platform]}</a></li>`]
      : [];
  });
  if (links.length === 0) {
    return '';
  }
  return `      <ul class="social-links">
${links.join('\n')}
      </ul>`;
}

function renderLayoutSwitcher(current: LayoutId): string {
  const buttons = LAYOUT_IDS.map((layout) => {
    const active = layout === current ? ' active' : '';
    return `      <button type="button" class="layout-btn${active}" data-layout="${layout}">${layout.toUpperCase()}</button>`;
  }).join('\n');

  return `  <div class="layout-switcher">
    <h4>View Layout:</h4>
    <div class="layout-buttons">
${buttons}
    </div>
  </div>`;
}

/**
 * Render the complete HTML document for one canonical page
 */
export function renderPage(
  pageType: CanonicalPageType,
  record: SiteRecord,
  options: RenderPageOptions
): string {
  const { metadata, pages } = record;
  const slot = pages[pageType];
  const siteName = metadata.name || DEFAULT_SITE_NAME;
  const content = slot.content.trim() ? slot.content : emptyPageContent(pageType);

  const fragment = renderLayout(options.layout, {
    pageType,
    content,
    metadata,
    heroTitle: pageType === 'home' ? pages.home.hero.title : '',
    events: pageType === 'home' ? pages.home.events : [],
  });

  const logoSrc = metadata.logo && options.rewriteImages ? toLocalImagePath(metadata.logo) : metadata.logo;
  const logo = logoSrc
    ? `\n      <img src="${sanitizeUrl(logoSrc)}" alt="${escapeHtml(siteName)} logo" class="logo">`
    : '';

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${PAGE_TITLES[pageType]} - ${escapeHtml(siteName)}</title>
  <link rel="stylesheet" href="${STYLESHEET_FILE}">
</head>
<body data-page="${pageType}" data-layout="${options.layout}">
  <header>
    <div class="site-title">${logo}
      <h1>${escapeHtml(siteName)}</h1>
    </div>
  </header>

  <nav>
    <ul>
${renderNavigation(pageType)}
    </ul>
  </nav>

  <main>
${fragment}
  </main>

  <footer>
    <div class="footer-info">
${renderFooterContact(metadata)}
${renderSocialLinks(metadata)}
    </div>
    <p class="copyright">&copy; ${options.year} ${escapeHtml(siteName)}. All rights reserved.</p>
  </footer>

${renderLayoutSwitcher(options.layout)}

  <script src="${SWITCHER_SCRIPT_FILE}"></script>
</body>
</html>
`;
}

/**
 * index.html: send visitors to the home page
 */
export function renderRedirectIndex(): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta http-equiv="refresh" content="0; url=home.html">
  <title>Redirecting</title>
  <link rel="canonical" href="home.html">
</head>
<body>
  <p><a href="home.html">Continue to the home page</a></p>
</body>
</html>
`;
}
