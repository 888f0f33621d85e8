/**
 * Unit tests for the Markdown Normalizer Module
 */

import { describe, test, expect } from '@jest/globals';
import { markdownToHtml, normalizeMarkdown, toMarkdown } from '../../src/markdown/index.js';

describe('Markdown Normalizer Module', () => {
  describe('toMarkdown()', () => {
    test('should convert headings and paragraphs to ATX markdown', () => {
      expect(toMarkdown('<h1>About Us</h1><p>Founded 1890</p>')).toBe('# About Us\n\nFounded 1890');
    });

    test('should use ** for strong and * for emphasis', () => {
      expect(toMarkdown('<p><strong>Bold</strong> and <em>soft</em></p>')).toBe('**Bold** and *soft*');
    });

    test('should keep links and images', () => {
      expect(toMarkdown('<p><a href="https://example.org/x">Visit</a></p>')).toBe(
        '[Visit](https://example.org/x)'
      );
      expect(toMarkdown('<p><img src="images/a.png" alt="Town hall"></p>')).toBe(
        '![Town hall](images/a.png)'
      );
    });

    test('should use dash bullets for lists', () => {
      expect(toMarkdown('<ul><li>Trash</li><li>Recycling</li></ul>')).toBe('-   Trash\n-   Recycling');
    });

    test('should render tables as pipe tables with a header separator', () => {
      const html =
        '<table><tr><th>Name</th><th>Phone</th></tr><tr><td>Clerk</td><td>555-0100</td></tr></table>';

      expect(toMarkdown(html)).toBe('| Name | Phone |\n| --- | --- |\n| Clerk | 555-0100 |');
    });

    test('should escape pipes and pad short rows', () => {
      const html = '<table><tr><td>A|B</td><td>C</td></tr><tr><td>D</td></tr></table>';

      expect(toMarkdown(html)).toBe('| A\\|B | C |\n| --- | --- |\n| D |  |');
    });

    test('should keep links and images inside table cells', () => {
      const html =
        '<table><tr><th>Doc</th><th>Map</th></tr>' +
        '<tr><td><a href="/files/budget-2024.pdf">2024 Budget</a></td><td><img src="map.png" alt="Ward map"></td></tr></table>';

      expect(toMarkdown(html)).toBe(
        '| Doc | Map |\n| --- | --- |\n| [2024 Budget](/files/budget-2024.pdf) | ![Ward map](map.png) |'
      );
    });

    test('should return an empty string for blank input', () => {
      expect(toMarkdown('   ')).toBe('');
    });
  });

  describe('normalizeMarkdown()', () => {
    test('should strip trailing whitespace and collapse blank runs', () => {
      expect(normalizeMarkdown('a  \n\n\n\nb\t\n')).toBe('a\n\nb');
    });

    test('should convert CRLF line endings', () => {
      expect(normalizeMarkdown('one\r\ntwo\r\n')).toBe('one\ntwo');
    });
  });

  describe('markdownToHtml()', () => {
    test('should render headings and paragraphs', () => {
      expect(markdownToHtml('# Title\n\nText')).toBe('<h1>Title</h1>\n<p>Text</p>\n');
    });

    test('should render emphasis', () => {
      expect(markdownToHtml('*No content found for this page.*')).toBe(
        '<p><em>No content found for this page.</em></p>\n'
      );
    });

    test('should escape inline HTML instead of emitting it', () => {
      expect(markdownToHtml('Type <img src=x onerror=alert(1)> to test')).toBe(
        '<p>Type &lt;img src=x onerror=alert(1)&gt; to test</p>\n'
      );
    });

    test('should escape block HTML instead of emitting it', () => {
      const html = markdownToHtml('<script>alert(1)</script>');

      expect(html).not.toContain('<script>');
      expect(html).toContain('&lt;script&gt;alert(1)&lt;/script&gt;');
    });

    test('should escape markup that was entity-encoded text in the source page', () => {
      const markdown = toMarkdown('<p>Type &lt;img src=x onerror=alert(1)&gt; to test</p>');

      expect(markdownToHtml(markdown)).toBe('<p>Type &lt;img src=x onerror=alert(1)&gt; to test</p>\n');
    });
  });
});
