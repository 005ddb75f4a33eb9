/**
 * Unit tests for suffix guessing
 */

import { guessSuffix } from '../src/utils/formatSniffer';

describe('guessSuffix', () => {
  describe('Content-Type', () => {
    test('should map application/pdf to .pdf', () => {
      expect(guessSuffix({ contentType: 'application/pdf' })).toBe('.pdf');
    });

    test('should map text/html with parameters to .html', () => {
      expect(guessSuffix({ contentType: 'Text/HTML; charset=UTF-8' })).toBe('.html');
    });

    test('should ignore unknown content types', () => {
      expect(guessSuffix({ contentType: 'application/octet-stream' })).toBe('');
    });

    test('should not resolve object built-ins as content types', () => {
      expect(guessSuffix({ url: 'https://example.com/doc.html', contentType: 'constructor' })).toBe('.html');
      expect(guessSuffix({ contentType: '__proto__' })).toBe('');
      expect(guessSuffix({ contentType: 'toString; charset=utf-8' })).toBe('');
    });
  });

  describe('URL path', () => {
    test('should use the path suffix', () => {
      expect(guessSuffix({ url: 'https://example.com/files/report.pdf' })).toBe('.pdf');
    });

    test('should treat .htm as .html', () => {
      expect(guessSuffix({ url: 'https://example.com/index.HTM' })).toBe('.html');
    });

    test('should ignore query string and fragment', () => {
      expect(guessSuffix({ url: 'https://example.com/page.html?download=1#top' })).toBe('.html');
      expect(guessSuffix({ url: 'https://example.com/page?name=file.pdf' })).toBe('');
    });

    test('should handle relative paths', () => {
      expect(guessSuffix({ url: 'docs/manual.pdf?v=2' })).toBe('.pdf');
    });

    test('should return empty suffix for unknown extensions', () => {
      expect(guessSuffix({ url: 'https://example.com/archive.zip' })).toBe('');
      expect(guessSuffix({})).toBe('');
    });
  });

  describe('Precedence', () => {
    test('should prefer content-type over URL suffix', () => {
      expect(
        guessSuffix({ url: 'https://example.com/doc.html', contentType: 'application/pdf' })
      ).toBe('.pdf');
    });

    test('should fall back to URL when content-type is unknown', () => {
      expect(guessSuffix({ url: 'https://example.com/doc.html', contentType: 'text/plain' })).toBe('.html');
    });

    test('should be deterministic for the same input', () => {
      const input = { url: 'https://example.com/a.htm', contentType: null };
      expect(guessSuffix(input)).toBe(guessSuffix(input));
    });
  });
});
