/**
 * Unit tests for the Page Aggregator Module
 */

import { describe, test, expect } from '@jest/globals';
import {
  SECTION_BREAK,
  aggregatePages,
  createEmptyPages,
  extractEventHighlights,
  splitSections,
} from '../../src/aggregator/index.js';
import { CANONICAL_PAGE_TYPES, type PageRecord, type PageType } from '../../src/types/index.js';

function record(order: number, sourceId: string, pageType: PageType, content: string, title = ''): PageRecord {
  return {
    order,
    sourceId,
    pageType,
    title,
    content,
    text: content,
    classification: { pageType, tier: 'filename', matched: pageType },
  };
}

describe('Page Aggregator Module', () => {
  describe('createEmptyPages()', () => {
    test('should create every canonical slot empty', () => {
      const pages = createEmptyPages();

      for (const pageType of CANONICAL_PAGE_TYPES) {
        expect(pages[pageType].content).toBe('');
        expect(pages[pageType].sources).toEqual([]);
      }
      expect(pages.home.hero).toEqual({ title: '' });
      expect(pages.home.events).toEqual([]);
      expect(pages.additional_content).toEqual([]);
    });
  });

  describe('aggregatePages()', () => {
    test('should join contributions in discovery order with a section break', () => {
      const pages = aggregatePages([
        record(2, 'history.html', 'about', '## History'),
        record(0, 'about.html', 'about', '# About'),
      ]);

      expect(pages.about.content).toBe(`# About${SECTION_BREAK}## History`);
      expect(pages.about.sources).toEqual(['about.html', 'history.html']);
    });

    test('should list empty contributions as sources without adding a section', () => {
      const pages = aggregatePages([
        record(0, 'faq.html', 'faqs', '   '),
        record(1, 'faq-2.html', 'faqs', 'Q and A'),
      ]);

      expect(pages.faqs.content).toBe('Q and A');
      expect(pages.faqs.sources).toEqual(['faq.html', 'faq-2.html']);
    });

    test('should append overflow records to additional_content', () => {
      const pages = aggregatePages([
        record(3, 'misc/page7.html', 'additional_content', 'Lorem ipsum', 'Update'),
      ]);

      expect(pages.additional_content).toEqual([
        { title: 'Update', content: 'Lorem ipsum', source: 'misc/page7.html' },
      ]);
      expect(pages.about.sources).toEqual([]);
    });

    test('should take the hero title from the first titled home record', () => {
      const pages = aggregatePages([
        record(0, 'default.html', 'home', 'Old home', ''),
        record(1, 'index.html', 'home', 'Welcome\n\n- 03/15/2025 Council Meeting', 'Welcome to Ridgefield'),
        record(2, 'home.html', 'home', 'More', 'Second Title'),
      ]);

      expect(pages.home.hero.title).toBe('Welcome to Ridgefield');
      expect(pages.home.events).toEqual([{ date: '03/15/2025', title: 'Council Meeting' }]);
    });

    test('should not mutate the input', () => {
      const records = [record(1, 'b.html', 'news', 'B'), record(0, 'a.html', 'news', 'A')];
      aggregatePages(records);

      expect(records.map((entry) => entry.sourceId)).toEqual(['b.html', 'a.html']);
    });

    test('should produce identical output for identical input', () => {
      const records = [record(0, 'a.html', 'news', 'A'), record(1, 'b.html', 'events', 'B')];

      expect(aggregatePages(records)).toEqual(aggregatePages(records));
    });
  });

  describe('splitSections()', () => {
    test('should return each non-empty contribution', () => {
      expect(splitSections(`One${SECTION_BREAK}Two`)).toEqual(['One', 'Two']);
      expect(splitSections('')).toEqual([]);
    });
  });

  describe('extractEventHighlights()', () => {
    test('should find dated lines in every supported format', () => {
      const content = [
        '- 03/15/2025 Council Meeting',
        'Plain line',
        '- Spring Cleanup - April 5, 2025',
        '- 2025-05-01: Farmers Market',
      ].join('\n');

      expect(extractEventHighlights(content)).toEqual([
        { date: '03/15/2025', title: 'Council Meeting' },
        { date: 'April 5, 2025', title: 'Spring Cleanup' },
        { date: '2025-05-01', title: 'Farmers Market' },
      ]);
    });

    test('should accept abbreviated months', () => {
      expect(extractEventHighlights('Sept. 9, 2025 Fall Festival')).toEqual([
        { date: 'Sept. 9, 2025', title: 'Fall Festival' },
      ]);
    });

    test('should fall back to a generic title', () => {
      expect(extractEventHighlights('**01/02/2025**')).toEqual([{ date: '01/02/2025', title: 'Event' }]);
    });

    test('should stop at the limit', () => {
      const content = Array.from({ length: 7 }, (_, index) => `1/${index + 1}/2025 Meeting`).join('\n');

      expect(extractEventHighlights(content)).toHaveLength(5);
      expect(extractEventHighlights(content, 2).map((event) => event.date)).toEqual(['1/1/2025', '1/2/2025']);
    });
  });
});
