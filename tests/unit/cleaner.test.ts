/**
 * Unit tests for the Content Cleaner Module
 */

import { describe, test, expect } from '@jest/globals';
import * as cheerio from 'cheerio';
import {
  cleanDocument,
  extractTitle,
  extractVisibleText,
  rewriteImageSources,
  toLocalImagePath,
} from '../../src/cleaner/index.js';

const PAGE_WITH_CHROME =
  '<html><head><title>Town Hall</title><script>var tracking = 1;</script></head><body>' +
  '<header>Site header</header><nav>Menu</nav>' +
  '<main id="main"><h1>Welcome</h1><div class="sidebar-widget">Quick links</div>' +
  '<p>Town news here.</p><div class="share-buttons">Share this</div></main>' +
  '<footer>Footer text</footer></body></html>';

describe('Content Cleaner Module', () => {
  describe('cleanDocument()', () => {
    test('should isolate the main anchor and strip boilerplate', () => {
      const cleaned = cleanDocument(PAGE_WITH_CHROME);

      expect(cleaned.html).toBe('<main id="main"><h1>Welcome</h1><p>Town news here.</p></main>');
      expect(cleaned.text).toBe('Welcome Town news here.');
    });

    test('should prefer role="main" over a bare <main> element', () => {
      const cleaned = cleanDocument(
        '<body><main><p>Plain main</p></main><div role="main"><p>Role main</p></div></body>'
      );

      expect(cleaned.text).toBe('Role main');
    });

    test('should take the first element when an anchor selector matches several', () => {
      const cleaned = cleanDocument('<body><main><p>First</p></main><main><p>Second</p></main></body>');

      expect(cleaned.html).toBe('<main><p>First</p></main>');
      expect(cleaned.text).toBe('First');
    });

    test('should fall back to the body when no anchor matches', () => {
      const cleaned = cleanDocument('<html><body><div><p>Hello</p></div></body></html>');

      expect(cleaned.html).toBe('<body><div><p>Hello</p></div></body>');
      expect(cleaned.text).toBe('Hello');
    });

    test('should remove structural tags inside the anchor', () => {
      const cleaned = cleanDocument(
        '<body><div id="content"><nav>Skip</nav><p>Body copy</p><iframe src="x"></iframe></div></body>'
      );

      expect(cleaned.html).toBe('<div id="content"><p>Body copy</p></div>');
    });

    test('should match boilerplate markers case-insensitively on class and id', () => {
      const cleaned = cleanDocument(
        '<body><div class="MainMenu">Items</div><div id="Cookie-Banner">Accept</div><p>Kept</p></body>'
      );

      expect(cleaned.text).toBe('Kept');
    });

    test('should collapse empty elements innermost first', () => {
      const cleaned = cleanDocument(
        '<body><div><span></span></div><p>Keep</p><p><img src="a.png"></p><br></body>'
      );

      expect(cleaned.html).toBe('<body><p>Keep</p><p><img src="a.png"></p><br></body>');
    });

    test('should keep empty elements when collapsing is disabled', () => {
      const cleaned = cleanDocument('<body><div></div><p>x</p></body>', { collapseEmpty: false });

      expect(cleaned.html).toBe('<body><div></div><p>x</p></body>');
    });

    test('should be idempotent', () => {
      const once = cleanDocument(PAGE_WITH_CHROME);
      const twice = cleanDocument(once.html);

      expect(twice.html).toBe(once.html);
      expect(twice.text).toBe(once.text);
    });

    test('should rewrite image sources when asked', () => {
      const cleaned = cleanDocument(
        '<body><p>Seal<img src="https://cdn.example.com/media/logo.png?v=3"></p></body>',
        { rewriteImages: true }
      );

      expect(cleaned.html).toBe('<body><p>Seal<img src="images/logo.png"></p></body>');
    });

    test('should return empty text for an empty document', () => {
      expect(cleanDocument('').text).toBe('');
    });
  });

  describe('toLocalImagePath()', () => {
    test('should keep only the file name under images/', () => {
      expect(toLocalImagePath('/a/b/c.jpg#top')).toBe('images/c.jpg');
      expect(toLocalImagePath('seal.gif?size=large')).toBe('images/seal.gif');
    });

    test('should leave a reference without a file name untouched', () => {
      expect(toLocalImagePath('')).toBe('');
    });
  });

  describe('rewriteImageSources()', () => {
    test('should rewrite every image of a fragment and be idempotent', () => {
      const once = rewriteImageSources('<p><img src="../pics/seal.gif?x=1"></p>');

      expect(once).toBe('<p><img src="images/seal.gif"></p>');
      expect(rewriteImageSources(once)).toBe(once);
    });
  });

  describe('extractVisibleText()', () => {
    test('should join text nodes with single spaces and skip scripts', () => {
      const $ = cheerio.load('<div>One<script>track()</script><span>Two\n\n  Three</span></div>');

      expect(extractVisibleText($('div').toArray())).toBe('One Two Three');
    });
  });

  describe('extractTitle()', () => {
    test('should collapse whitespace in the title', () => {
      const $ = cheerio.load('<html><head><title>\n  Borough   Office \n</title></head></html>');

      expect(extractTitle($)).toBe('Borough Office');
    });
  });
});
