/**
 * OCR Fallback Selector
 *
 * Decides per page whether directly extracted text is dense enough to trust.
 * Sparse pages are treated as scanned-only and replaced by re-normalized OCR
 * output; when OCR cannot be obtained the sparse text is kept and the page is
 * reported as degraded.
 */

import type { NormalizedPage } from '../types/Page.js';
import type { OcrGateway } from './OcrGateway.js';
import { normalizePageText } from '../normalizers/PageTextNormalizer.js';
import { catalogDegradedPages, catalogOcrPages } from '../../../utils/metrics.js';
import { createChildLogger } from '../../../utils/logger.js';

const log = createChildLogger({ component: 'OcrFallbackSelector' });

export const DEFAULT_MIN_TEXT_CHARS = 200;

export type DegradedReason = 'no_provider' | 'disabled' | 'provider_failed';

export type PageResolution =
  | { outcome: 'dense'; page: NormalizedPage }
  | { outcome: 'ocr'; page: NormalizedPage }
  | { outcome: 'degraded'; page: NormalizedPage; reason: DegradedReason };

export interface OcrFallbackOptions {
  minTextChars: number;
  enabled: boolean;
  gateway?: OcrGateway;
}

/**
 * Number of non-whitespace characters
 */
export function countDenseChars(text: string): number {
  return text.replace(/\s+/g, '').length;
}

export function isLikelyScannedOnly(text: string, minTextChars: number): boolean {
  return countDenseChars(text) < minTextChars;
}

export class OcrFallbackSelector {
  constructor(private readonly options: OcrFallbackOptions) {}

  async resolvePage(page: NormalizedPage): Promise<PageResolution> {
    if (!isLikelyScannedOnly(page.text, this.options.minTextChars)) {
      return { outcome: 'dense', page };
    }

    const { gateway } = this.options;
    if (!this.options.enabled) {
      return this.degrade(page, 'disabled');
    }
    if (!gateway) {
      return this.degrade(page, 'no_provider');
    }

    try {
      log.info({ documentId: page.documentId, pageIndex: page.pageIndex }, 'Low-density page, requesting OCR');
      const ocrText = await gateway.recognize(page.documentId, page.pageIndex);
      catalogOcrPages.inc({ provider: gateway.providerName });
      return {
        outcome: 'ocr',
        page: {
          documentId: page.documentId,
          pageIndex: page.pageIndex,
          text: normalizePageText(ocrText),
          ocrApplied: true,
        },
      };
    } catch (error) {
      log.warn(
        {
          documentId: page.documentId,
          pageIndex: page.pageIndex,
          error: error instanceof Error ? error.message : String(error),
        },
        'OCR failed for low-density page, keeping extracted text'
      );
      return this.degrade(page, 'provider_failed');
    }
  }

  private degrade(page: NormalizedPage, reason: DegradedReason): PageResolution {
    if (reason !== 'provider_failed') {
      log.warn(
        { documentId: page.documentId, pageIndex: page.pageIndex, reason },
        'Page looks scanned but OCR is not available, keeping extracted text (may be empty)'
      );
    }
    catalogDegradedPages.inc({ reason });
    return { outcome: 'degraded', page, reason };
  }
}
