/**
 * Unit tests for the Metadata Extractor Module
 */

import { describe, test, expect } from '@jest/globals';
import {
  deriveNameFromSource,
  deriveNameFromTitle,
  emptyCandidate,
  extractDocumentMetadata,
  extractSiteMetadata,
  mergeMetadata,
  type MetadataCandidate,
} from '../../src/metadata/index.js';
import { silentLogger } from '../../src/observability/index.js';
import type { SocialLinks, SourceDocument } from '../../src/types/index.js';

const FULL_PAGE = `<html><head><title>Borough of Ridgefield - Home</title></head><body>
<header><img src="/images/borough-seal.png" alt="Borough of Ridgefield Seal"></header>
<main><p>Welcome</p></main>
<footer id="footer">
  <p>123 Main Street<br>Ridgefield, PA 17301</p>
  <p>Phone: (717) 555-0100</p>
  <p>Fax: 717-555-0199</p>
  <p>Email: clerk@ridgefield.example.org</p>
  <p>Office Hours: Monday - Friday 8:00 AM - 4:30 PM</p>
  <a href="https://www.facebook.com/ridgefieldboro">Facebook</a>
  <a href="https://twitter.com/ridgefield">Twitter</a>
</footer>
</body></html>`;

function doc(sourceId: string, raw: string, order = 0): SourceDocument {
  return { sourceId, absolutePath: `/site/${sourceId}`, order, raw };
}

function candidate(overrides: Partial<MetadataCandidate['contact']>, social: SocialLinks = {}): MetadataCandidate {
  const base = emptyCandidate();
  return { ...base, contact: { ...base.contact, ...overrides }, social };
}

describe('Metadata Extractor Module', () => {
  describe('extractDocumentMetadata()', () => {
    test('should extract every field a page provides', () => {
      const metadata = extractDocumentMetadata(FULL_PAGE);

      expect(metadata.titleName).toBe('Borough of Ridgefield');
      expect(metadata.logoAltName).toBe('Borough of Ridgefield');
      expect(metadata.logo).toBe('/images/borough-seal.png');
      expect(metadata.contact).toEqual({
        phone: '(717) 555-0100',
        fax: '717-555-0199',
        email: 'clerk@ridgefield.example.org',
        address: '123 Main Street Ridgefield, PA 17301',
        hours: 'Monday - Friday 8:00 AM - 4:30 PM',
      });
      expect(metadata.social).toEqual({
        facebook: 'https://www.facebook.com/ridgefieldboro',
        twitter: 'https://twitter.com/ridgefield',
      });
    });

    test('should fall back to an unlabeled phone number outside fax labels', () => {
      const metadata = extractDocumentMetadata(
        '<body><p>Fax: 555-000-1111</p><p>Call 555-222-3333 today</p></body>'
      );

      expect(metadata.contact.phone).toBe('555-222-3333');
      expect(metadata.contact.fax).toBe('555-000-1111');
    });

    test('should reject an hours match that runs too long', () => {
      const metadata = extractDocumentMetadata(
        `<body><p>Monday ${'closed for renovation '.repeat(12)} 8 AM to 5 PM</p></body>`
      );

      expect(metadata.contact.hours).toBe('');
    });

    test('should leave missing fields empty', () => {
      const metadata = extractDocumentMetadata('<body><p>Nothing to see</p></body>');

      expect(metadata).toEqual(emptyCandidate());
    });

    test('should ignore links that are not social platforms', () => {
      const metadata = extractDocumentMetadata(
        '<body><a href="https://example.org/facebook">Not it</a><a href="/youtube">Local</a></body>'
      );

      expect(metadata.social).toEqual({});
    });

    test('should keep protocol-relative social links as https', () => {
      const metadata = extractDocumentMetadata(
        '<body><a href="//www.facebook.com/ridgeborough">Facebook</a><a href="//instagram.com/ridgeborough">Instagram</a></body>'
      );

      expect(metadata.social).toEqual({
        facebook: 'https://www.facebook.com/ridgeborough',
        instagram: 'https://instagram.com/ridgeborough',
      });
    });
  });

  describe('deriveNameFromTitle()', () => {
    test('should trim common suffixes and prefixes', () => {
      expect(deriveNameFromTitle('Oakmont | Official Site')).toBe('Oakmont');
      expect(deriveNameFromTitle('Welcome to the Village of Oakmont')).toBe('Village of Oakmont');
      expect(deriveNameFromTitle('Township News')).toBe('Township News');
    });

    test('should reject generic titles', () => {
      expect(deriveNameFromTitle('Home')).toBe('');
    });
  });

  describe('deriveNameFromSource()', () => {
    test('should turn a mirrored domain folder into a display name', () => {
      expect(deriveNameFromSource('/var/mirror/www.ridge-township.org')).toBe('Ridge Township');
      expect(deriveNameFromSource('https://www.oakmont.gov/')).toBe('Oakmont');
      expect(deriveNameFromSource('lower_paxton')).toBe('Lower Paxton');
    });
  });

  describe('mergeMetadata()', () => {
    test('should keep the first non-empty value of each field', () => {
      const first = candidate({ phone: '555-111-2222' });
      const second = candidate({ phone: '555-333-4444', email: 'b@example.org' });

      const merged = mergeMetadata(mergeMetadata(emptyCandidate(), first), second);

      expect(merged.contact.phone).toBe('555-111-2222');
      expect(merged.contact.email).toBe('b@example.org');
    });

    test('should merge social links per platform', () => {
      const first = candidate({}, { facebook: 'https://facebook.com/first' });
      const second = candidate({}, { facebook: 'https://facebook.com/second', youtube: 'https://youtube.com/c/town' });

      expect(mergeMetadata(first, second).social).toEqual({
        facebook: 'https://facebook.com/first',
        youtube: 'https://youtube.com/c/town',
      });
    });

    test('should not mutate the accumulator', () => {
      const accumulator = emptyCandidate();
      mergeMetadata(accumulator, candidate({ phone: '555-111-2222' }));

      expect(accumulator.contact.phone).toBe('');
    });
  });

  describe('extractSiteMetadata()', () => {
    const pageA = doc('a.html', '<body><p>Phone: 555-111-2222</p></body>', 0);
    const pageB = doc('b.html', '<body><p>Phone: 555-333-4444</p></body>', 1);

    test('should let the first scanned document win', () => {
      const forward = extractSiteMetadata([pageA, pageB], { logger: silentLogger });
      const reverse = extractSiteMetadata([pageB, pageA], { logger: silentLogger });

      expect(forward.contact.phone).toBe('555-111-2222');
      expect(reverse.contact.phone).toBe('555-333-4444');
    });

    test('should scan the entry document before the others', () => {
      const about = doc('about.html', '<html><head><title>Oakmont History Society</title></head></html>');
      const index = doc('index.html', '<html><head><title>Village of Oakmont</title></head></html>', 1);

      const metadata = extractSiteMetadata([about, index], {
        entryDocument: index,
        logger: silentLogger,
      });

      expect(metadata.name).toBe('Village of Oakmont');
    });

    test('should only scan the first scanLimit documents', () => {
      const plain = (id: string, order: number) => doc(id, '<body><p>No contact</p></body>', order);
      const documents = [plain('1.html', 0), plain('2.html', 1), doc('3.html', '<p>Phone: 555-999-0000</p>', 2)];

      expect(extractSiteMetadata(documents, { scanLimit: 2, logger: silentLogger }).contact.phone).toBe('');
      expect(extractSiteMetadata(documents, { scanLimit: 3, logger: silentLogger }).contact.phone).toBe(
        '555-999-0000'
      );
    });

    test('should derive the name from the fallback when no page names the site', () => {
      const metadata = extractSiteMetadata([doc('page.html', '<body><p>x</p></body>')], {
        fallbackName: '/var/mirror/www.ridge-township.org',
        logger: silentLogger,
      });

      expect(metadata.name).toBe('Ridge Township');
    });

    test('should use the placeholder name when nothing else is known', () => {
      const metadata = extractSiteMetadata([doc('page.html', '<body><p>x</p></body>')], {
        logger: silentLogger,
      });

      expect(metadata.name).toBe('Unknown Municipality');
      expect(metadata.logo).toBe('');
    });
  });
});
