import { describe, it, expect } from 'vitest';
import { CatalogHtmlExtractor } from '../CatalogHtmlExtractor.js';

describe('CatalogHtmlExtractor', () => {
  const extractor = new CatalogHtmlExtractor();

  it('emits block text line by line without page chrome', () => {
    const html = `
      <html><body>
        <header><p>Site header</p></header>
        <nav><ul><li>Home</li></ul></nav>
        <main>
          <h3>6.100A Introduction to CS Programming</h3>
          <p>Prereq: None<br>U (Fall, Spring)<br/>12 units</p>
          <p>Presents an
             introduction.</p>
          <script>var ignored = 1;</script>
        </main>
        <footer><p>Footer text</p></footer>
      </body></html>`;

    expect(extractor.extractPages(html, 'current-1')).toEqual([
      {
        documentId: 'current-1',
        pageIndex: 1,
        text: [
          '6.100A Introduction to CS Programming',
          'Prereq: None',
          'U (Fall, Spring)',
          '12 units',
          'Presents an introduction.',
        ].join('\n'),
      },
    ]);
  });

  it('emits nested block elements once', () => {
    const html = '<body><ul><li><p>Nested item</p></li></ul></body>';
    expect(extractor.extractPages(html, 'doc-1')[0].text).toBe('Nested item');
  });

  it('reads course block markup', () => {
    const html = `
      <body><div id="content">
        <div class="courseblock">
          <p class="courseblocktitle"><strong>CS 2500. Fundamentals. (4 Hours)</strong></p>
          <p class="courseblockdesc">Introduces design.</p>
        </div>
      </div></body>`;

    expect(extractor.extractPages(html, 'neu-1')[0].text).toBe('CS 2500. Fundamentals. (4 Hours)\nIntroduces design.');
  });

  it('returns a single empty page for markup without text', () => {
    expect(extractor.extractPages('<html><body></body></html>', 'empty')).toEqual([
      { documentId: 'empty', pageIndex: 1, text: '' },
    ]);
  });
});
