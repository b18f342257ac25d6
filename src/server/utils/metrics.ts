import { Registry, Counter, Histogram } from 'prom-client';

/**
 * Prometheus metrics registry
 */
export const metricsRegistry = new Registry();

/**
 * Page Metrics
 */
export const catalogPagesProcessed = new Counter({
  name: 'catalog_pages_processed_total',
  help: 'Total number of catalog pages normalized',
  labelNames: ['source_format'],
  registers: [metricsRegistry],
});

export const catalogOcrPages = new Counter({
  name: 'catalog_ocr_pages_total',
  help: 'Total number of pages whose text was replaced by OCR output',
  labelNames: ['provider'],
  registers: [metricsRegistry],
});

export const catalogDegradedPages = new Counter({
  name: 'catalog_degraded_pages_total',
  help: 'Total number of low-density pages kept without OCR',
  labelNames: ['reason'], // 'no_provider', 'disabled', 'provider_failed'
  registers: [metricsRegistry],
});

/**
 * Record Metrics
 */
export const catalogRejectedBlocks = new Counter({
  name: 'catalog_rejected_blocks_total',
  help: 'Total number of course blocks dropped by validation',
  labelNames: ['source_format', 'reason'],
  registers: [metricsRegistry],
});

export const catalogDuplicateRecords = new Counter({
  name: 'catalog_duplicate_records_total',
  help: 'Total number of course records dropped as duplicates',
  registers: [metricsRegistry],
});

export const catalogRecordsEmitted = new Counter({
  name: 'catalog_records_emitted_total',
  help: 'Total number of course records emitted after deduplication',
  registers: [metricsRegistry],
});

export const catalogDocumentDuration = new Histogram({
  name: 'catalog_document_duration_seconds',
  help: 'Duration of single-document extraction in seconds',
  labelNames: ['source_format', 'status'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 5, 30, 120],
  registers: [metricsRegistry],
});
