/**
 * Unit tests for the Site Record Validator Module
 */

import { describe, test, expect } from '@jest/globals';
import { createEmptyPages } from '../../src/aggregator/index.js';
import { CANONICAL_PAGE_TYPES, type SiteRecord } from '../../src/types/index.js';
import { findDuplicateSources, validateSiteRecord } from '../../src/validator/index.js';

const createRecord = (): SiteRecord => {
  const pages = createEmptyPages();
  for (const pageType of CANONICAL_PAGE_TYPES) {
    pages[pageType].content = `# ${pageType}`;
    pages[pageType].sources = [`${pageType}.html`];
  }
  return {
    metadata: {
      name: 'Ridgefield',
      logo: '',
      contact: { phone: '555-111-2222', fax: '', email: '', address: '', hours: '' },
      social: {},
    },
    pages,
    generated_at: '2025-01-02T03:04:05.000Z',
    source: '/mirror/ridgefield',
  };
};

describe('Site Record Validator Module', () => {
  describe('validateSiteRecord()', () => {
    test('should accept a complete record without warnings', () => {
      const result = validateSiteRecord(createRecord());

      expect(result.valid).toBe(true);
      expect(result.errors).toEqual([]);
      expect(result.warnings).toEqual([]);
      expect(result.record?.metadata.name).toBe('Ridgefield');
    });

    test('should accept a record that went through JSON', () => {
      const result = validateSiteRecord(JSON.parse(JSON.stringify(createRecord())));

      expect(result.valid).toBe(true);
    });

    test('should report schema violations with their field path', () => {
      const input = {
        ...createRecord(),
        metadata: { logo: '', contact: createRecord().metadata.contact, social: {} },
      };

      const result = validateSiteRecord(input);

      expect(result.valid).toBe(false);
      expect(result.record).toBeNull();
      expect(result.errors).toEqual([{ field: 'metadata.name', message: 'Required', severity: 'error' }]);
    });

    test('should report a non-object at the root', () => {
      const result = validateSiteRecord('not a record');

      expect(result.errors[0]?.field).toBe('(root)');
    });

    test('should reject more than five event highlights', () => {
      const record = createRecord();
      record.pages.home.events = Array.from({ length: 6 }, (_, index) => ({
        date: `1/${index + 1}/2025`,
        title: 'Meeting',
      }));

      const result = validateSiteRecord(record);

      expect(result.valid).toBe(false);
      expect(result.errors).toEqual([
        {
          field: 'pages.home.events',
          message: 'pages.home.events exceeds maximum of 5 items',
          severity: 'error',
        },
      ]);
    });

    test('should reject a source assigned to two pages', () => {
      const record = createRecord();
      record.pages.additional_content.push({ title: 'Dup', content: '', source: 'news.html' });

      const result = validateSiteRecord(record);

      expect(result.errors.map((error) => error.message)).toEqual([
        'Source news.html is assigned to more than one page',
      ]);
    });

    test('should warn about empty pages and missing contact details', () => {
      const record = createRecord();
      record.pages.faqs.content = '  ';
      record.metadata.name = '';
      record.metadata.contact.phone = '';
      record.generated_at = 'yesterday';

      const result = validateSiteRecord(record);

      expect(result.valid).toBe(true);
      expect(result.warnings).toEqual([
        { field: 'pages.faqs', message: 'Page has no content' },
        { field: 'metadata.name', message: 'Site name is missing' },
        { field: 'metadata.contact', message: 'No contact channel was found' },
        { field: 'generated_at', message: 'generated_at is not an ISO-8601 timestamp' },
      ]);
    });

    test('should drop undefined social entries', () => {
      const record = createRecord();
      record.metadata.social = { facebook: 'https://facebook.com/ridgefield' };

      expect(validateSiteRecord(record).record?.metadata.social).toEqual({
        facebook: 'https://facebook.com/ridgefield',
      });
    });
  });

  describe('findDuplicateSources()', () => {
    test('should list each duplicated source once', () => {
      const record = createRecord();
      record.pages.about.sources.push('home.html', 'home.html');

      expect(findDuplicateSources(record)).toEqual(['home.html']);
    });
  });
});
