import { describe, it, expect } from 'vitest';
import { normalizePage, normalizePageText, toLines } from '../normalizers/PageTextNormalizer.js';

describe('normalizePageText', () => {
  it('joins words hyphenated across a line break', () => {
    expect(normalizePageText('archi-\ntecture')).toBe('architecture');
  });

  it('joins chained hyphenations and ignores trailing spaces after the hyphen', () => {
    expect(normalizePageText('archi-  \ntec-\nture')).toBe('architecture');
  });

  it('leaves hyphens that are not between letters', () => {
    expect(normalizePageText('1990-\n1995')).toBe('1990-\n1995');
    expect(normalizePageText('alpha\n-beta')).toBe('alpha\n-beta');
  });

  it('unifies line terminators', () => {
    expect(normalizePageText('a\r\nb\rc')).toBe('a\nb\nc');
  });

  it('collapses runs of blank lines to a single blank line', () => {
    expect(normalizePageText('first\n\n\n\nsecond')).toBe('first\n\nsecond');
  });

  it('strips trailing whitespace on every line and around the page', () => {
    expect(normalizePageText('  line one   \nline two  \n\n')).toBe('line one\nline two');
  });

  it('returns an empty string for missing or whitespace-only text', () => {
    expect(normalizePageText(undefined)).toBe('');
    expect(normalizePageText(null)).toBe('');
    expect(normalizePageText('   \n  ')).toBe('');
  });

  it('is idempotent', () => {
    const samples = [
      'archi-  \ntec-\nture',
      'Header\r\n\r\n\r\n\r\nBody line   \nsoft-\nware',
      '1.125 Architecting Software Systems\n\n\n12 units  ',
      '  -\n-\n',
    ];
    for (const sample of samples) {
      const once = normalizePageText(sample);
      expect(normalizePageText(once)).toBe(once);
    }
  });
});

describe('normalizePage', () => {
  it('keeps page identity and marks the text as directly extracted', () => {
    expect(normalizePage({ documentId: 'doc-1', pageIndex: 4, text: 'soft-\nware' })).toEqual({
      documentId: 'doc-1',
      pageIndex: 4,
      text: 'software',
      ocrApplied: false,
    });
  });
});

describe('toLines', () => {
  it('returns no lines for empty text', () => {
    expect(toLines('')).toEqual([]);
  });

  it('splits on line breaks, keeping blank lines', () => {
    expect(toLines('a\n\nb')).toEqual(['a', '', 'b']);
  });
});
