/**
 * Markdown Normalizer Module
 *
 * Converts cleaned content markup to normalized markdown, and markdown back to
 * HTML when pages are rendered.
 */

import TurndownService from 'turndown';
import { Marked } from 'marked';

// ============================================================================
// Turndown Setup
// ============================================================================

function escapeCell(value: string): string {
  return value.replace(/\s+/g, ' ').trim().replace(/\|/g, '\\|');
}

/**
 * Render an HTML table as a GFM pipe table. The first row is the header.
 * Cell markup goes through the same service, so links and images survive.
 */
function tableToMarkdown(table: ParentNode, service: TurndownService): string {
  const rows = Array.from(table.querySelectorAll('tr'))
    .map((row) =>
      Array.from(row.querySelectorAll('th, td')).map((cell) =>
        escapeCell(service.turndown(cell.innerHTML))
      )
    )
    .filter((cells) => cells.length > 0);

  const [header, ...body] = rows;
  if (!header) {
    return '';
  }

  const width = Math.max(...rows.map((cells) => cells.length));
  const pad = (cells: string[]): string[] =>
    cells.concat(Array.from({ length: width - cells.length }, () => ''));
  const toRow = (cells: string[]): string => `| ${pad(cells).join(' | ')} |`;

  return [toRow(header), toRow(Array.from({ length: width }, () => '---')), ...body.map(toRow)].join(
    '\n'
  );
}

function createTurndownService(): TurndownService {
  const service = new TurndownService({
    headingStyle: 'atx',
    bulletListMarker: '-',
    codeBlockStyle: 'fenced',
    emDelimiter: '*',
    strongDelimiter: '**',
  });

  service.addRule('pipeTable', {
    filter: 'table',
    replacement: (_content, node) => {
      const table = tableToMarkdown(node, service);
      return table ? `\n\n${table}\n\n` : '';
    },
  });

  return service;
}

const turndownService = createTurndownService();

// ============================================================================
// Marked Setup
// ============================================================================

function escapeMarkup(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#039;');
}

// Raw HTML in markdown is shown as text, never emitted as markup
const markdownParser = new Marked({
  gfm: true,
  renderer: {
    html: (html: string) => escapeMarkup(html),
  },
});

// ============================================================================
// Public API
// ============================================================================

/**
 * Tidy converted markdown: strip trailing spaces per line, cap blank runs at one
 * blank line, trim the whole string
 */
export function normalizeMarkdown(markdown: string): string {
  return markdown
    .replace(/\r\n?/g, '\n')
    .replace(/[ \t]+$/gm, '')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

/**
 * Convert cleaned content markup to normalized markdown
 */
export function toMarkdown(html: string): string {
  if (!html.trim()) {
    return '';
  }
  return normalizeMarkdown(turndownService.turndown(html));
}

/**
 * Render markdown to HTML for page bodies. Raw HTML embedded in the markdown is
 * escaped.
 */
export function markdownToHtml(markdown: string): string {
  return markdownParser.parser(markdownParser.lexer(markdown));
}
