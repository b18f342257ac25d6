/**
 * CatalogHtmlExtractor - Turn a rendered catalog page into engine input
 *
 * Emits the text of block-level elements one per line, in document order,
 * after removing page chrome. Nested matches are emitted once, through the
 * outermost matching element.
 */

import * as cheerio from 'cheerio';
import type { RawPage } from '../../services/catalog-extraction/types/Page.js';
import { logger } from '../../utils/logger.js';

const BLOCK_SELECTOR = [
  'h1', 'h2', 'h3', 'h4', 'h5', 'h6',
  'p', 'li', 'dt', 'dd',
  '.courseblocktitle', '.courseblockdesc', '.courseblockextra',
].join(', ');

const CONTENT_SELECTORS: cheerio.SelectorType[] = ['#content', 'main', '.page_content', 'article'];

/**
 * Lines of one block element. Only `<br>` breaks a line; source whitespace is collapsed.
 */
function blockLines(innerHtml: string): string[] {
  return innerHtml
    .split(/<br\s*\/?>/i)
    .map(fragment => cheerio.load(fragment, null, false).root().text().replace(/\s+/g, ' ').trim())
    .filter(line => line.length > 0);
}

export class CatalogHtmlExtractor {
  private readonly boilerplateSelectors: string[];

  constructor(config: { boilerplateSelectors?: string[] } = {}) {
    this.boilerplateSelectors = config.boilerplateSelectors || [
      'nav',
      'header',
      'footer',
      '.navigation',
      '.sidebar',
      '.menu',
      '.skip-link',
      '[role="navigation"]',
      '[role="banner"]',
      '[role="contentinfo"]',
      'script',
      'style',
      'noscript',
    ];
  }

  /**
   * Extract one page of line-oriented text from catalog HTML
   */
  extractPages(htmlContent: string, documentId: string): RawPage[] {
    const $ = cheerio.load(htmlContent);

    for (const selector of this.boilerplateSelectors) {
      $(selector).remove();
    }

    let container = $('body');
    for (const selector of CONTENT_SELECTORS) {
      const candidate = $(selector).first();
      if (candidate.length > 0) {
        container = candidate;
        break;
      }
    }

    const lines: string[] = [];
    container.find(BLOCK_SELECTOR).each((_, el) => {
      const node = $(el);
      if (node.parents(BLOCK_SELECTOR).length > 0) {
        return;
      }
      lines.push(...blockLines(node.html() ?? ''));
    });

    logger.debug({ documentId, lineCount: lines.length }, 'Catalog HTML extraction completed');

    return [{ documentId, pageIndex: 1, text: lines.join('\n') }];
  }
}
