import { describe, it, expect, beforeEach } from 'vitest';
import { OcrFallbackSelector, countDenseChars, isLikelyScannedOnly } from '../ocr/OcrFallbackSelector.js';
import { OcrGateway } from '../ocr/OcrGateway.js';
import type { IOcrProvider } from '../interfaces/IOcrProvider.js';
import type { NormalizedPage } from '../types/Page.js';
import { OcrUnavailableError } from '../../../types/errors.js';

/**
 * In-process OCR provider returning canned text, optionally failing the first N calls
 */
class FakeOcrProvider implements IOcrProvider {
  readonly name = 'fake-ocr';
  readonly calls: string[] = [];

  constructor(
    private readonly text: string,
    private failuresLeft: number = 0
  ) {}

  async recognizePage(documentId: string, pageIndex: number): Promise<string> {
    this.calls.push(`${documentId}:${pageIndex}`);
    if (this.failuresLeft > 0) {
      this.failuresLeft--;
      throw new Error('backend unreachable');
    }
    return this.text;
  }
}

function page(text: string): NormalizedPage {
  return { documentId: 'scan-1', pageIndex: 2, text, ocrApplied: false };
}

describe('density check', () => {
  it('counts non-whitespace characters', () => {
    expect(countDenseChars('a b\nc\t')).toBe(3);
  });

  it('flags pages below the threshold', () => {
    expect(isLikelyScannedOnly('abc', 4)).toBe(true);
    expect(isLikelyScannedOnly('abcd', 4)).toBe(false);
  });
});

describe('OcrFallbackSelector', () => {
  let provider: FakeOcrProvider;

  beforeEach(() => {
    provider = new FakeOcrProvider('archi-\ntecture notes');
  });

  it('keeps dense pages without calling OCR', async () => {
    const selector = new OcrFallbackSelector({ minTextChars: 10, enabled: true, gateway: new OcrGateway(provider, 2) });
    const dense = page('x'.repeat(50));

    const resolution = await selector.resolvePage(dense);

    expect(resolution).toEqual({ outcome: 'dense', page: dense });
    expect(provider.calls).toEqual([]);
  });

  it('replaces sparse text with normalized OCR output', async () => {
    const selector = new OcrFallbackSelector({ minTextChars: 10, enabled: true, gateway: new OcrGateway(provider, 2) });

    const resolution = await selector.resolvePage(page(''));

    expect(resolution).toEqual({
      outcome: 'ocr',
      page: { documentId: 'scan-1', pageIndex: 2, text: 'architecture notes', ocrApplied: true },
    });
    expect(provider.calls).toEqual(['scan-1:2']);
  });

  it('degrades when no provider is configured', async () => {
    const selector = new OcrFallbackSelector({ minTextChars: 10, enabled: true });
    const sparse = page('1.125');

    expect(await selector.resolvePage(sparse)).toEqual({ outcome: 'degraded', page: sparse, reason: 'no_provider' });
  });

  it('degrades without calling the provider when OCR is disabled', async () => {
    const selector = new OcrFallbackSelector({ minTextChars: 10, enabled: false, gateway: new OcrGateway(provider, 2) });
    const sparse = page('');

    expect(await selector.resolvePage(sparse)).toEqual({ outcome: 'degraded', page: sparse, reason: 'disabled' });
    expect(provider.calls).toEqual([]);
  });

  it('degrades when the provider fails', async () => {
    const failing = new FakeOcrProvider('unused', 1);
    const selector = new OcrFallbackSelector({ minTextChars: 10, enabled: true, gateway: new OcrGateway(failing, 2) });
    const sparse = page('');

    expect(await selector.resolvePage(sparse)).toEqual({ outcome: 'degraded', page: sparse, reason: 'provider_failed' });
  });
});

describe('OcrGateway', () => {
  it('shares one provider call between concurrent requests for a page', async () => {
    const provider = new FakeOcrProvider('page text');
    const gateway = new OcrGateway(provider, 1);

    const [a, b] = await Promise.all([gateway.recognize('scan-1', 1), gateway.recognize('scan-1', 1)]);

    expect(a).toBe('page text');
    expect(b).toBe('page text');
    expect(provider.calls).toEqual(['scan-1:1']);
  });

  it('keeps nothing once a request settles', async () => {
    const provider = new FakeOcrProvider('page text');
    const gateway = new OcrGateway(provider, 2);

    for (let pageIndex = 1; pageIndex <= 50; pageIndex++) {
      await gateway.recognize('scan-1', pageIndex);
    }
    await gateway.recognize('scan-1', 1);

    expect(gateway.pendingCount).toBe(0);
    expect(provider.calls).toHaveLength(51);
  });

  it('wraps provider failures and allows a retry', async () => {
    const provider = new FakeOcrProvider('page text', 1);
    const gateway = new OcrGateway(provider, 1);

    await expect(gateway.recognize('scan-1', 1)).rejects.toBeInstanceOf(OcrUnavailableError);
    await expect(gateway.recognize('scan-1', 1)).resolves.toBe('page text');
    expect(provider.calls).toEqual(['scan-1:1', 'scan-1:1']);
  });

  it('exposes the provider name', () => {
    expect(new OcrGateway(new FakeOcrProvider(''), 1).providerName).toBe('fake-ocr');
  });
});
