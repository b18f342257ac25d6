/**
 * OCR Gateway
 *
 * Single entry point to the external OCR collaborator for one engine.
 * Bounds in-flight OCR calls with its own limiter (separate from document
 * fan-out). Concurrent requests for the same page share one provider call;
 * nothing is kept once the call settles, so a later run sees fresh text.
 */

import type { IOcrProvider } from '../interfaces/IOcrProvider.js';
import { pLimit, type LimitFunction } from '../../../utils/concurrency.js';
import { OcrUnavailableError } from '../../../types/errors.js';
import { createChildLogger } from '../../../utils/logger.js';

const log = createChildLogger({ component: 'OcrGateway' });

// Pages slower than this are logged; scanned catalog pages are usually a few seconds.
const SLOW_PAGE_MS = 10000;

export class OcrGateway {
  private readonly limit: LimitFunction;
  private readonly inFlight = new Map<string, Promise<string>>();

  constructor(
    private readonly provider: IOcrProvider,
    concurrency: number
  ) {
    this.limit = pLimit(concurrency);
  }

  get providerName(): string {
    return this.provider.name;
  }

  /**
   * Recognize one page through the provider.
   *
   * @throws {OcrUnavailableError} when the provider call fails
   */
  recognize(documentId: string, pageIndex: number): Promise<string> {
    const key = `${documentId}:${pageIndex}`;
    const shared = this.inFlight.get(key);
    if (shared) {
      log.debug({ documentId, pageIndex }, 'Joining in-flight OCR request');
      return shared;
    }

    const pending = this.limit(() => this.callProvider(documentId, pageIndex))
      .catch((error: unknown) => {
        throw new OcrUnavailableError(
          this.provider.name,
          error instanceof Error ? error.message : String(error),
          { documentId, pageIndex }
        );
      })
      .finally(() => {
        this.inFlight.delete(key);
      });
    this.inFlight.set(key, pending);
    return pending;
  }

  get pendingCount(): number {
    return this.inFlight.size;
  }

  private async callProvider(documentId: string, pageIndex: number): Promise<string> {
    const startTime = Date.now();
    const text = await this.provider.recognizePage(documentId, pageIndex);
    const processingTime = Date.now() - startTime;

    if (processingTime > SLOW_PAGE_MS) {
      log.warn({ documentId, pageIndex, processingTime }, 'OCR processing exceeded 10 seconds for one page');
    }

    return typeof text === 'string' ? text : '';
  }
}
