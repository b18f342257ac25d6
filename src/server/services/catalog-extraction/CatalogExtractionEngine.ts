/**
 * Catalog Extraction Engine - Main entry point of the catalog extraction layer
 *
 * Turns paginated catalog text into deduplicated course records:
 * page normalization, OCR fallback for sparse scanned pages, segmentation
 * into course blocks, field extraction and record normalization.
 */

import { randomUUID } from 'crypto';
import type { IOcrProvider } from './interfaces/IOcrProvider.js';
import type { CatalogDocumentInput } from './types/CatalogDocumentInput.js';
import type { NormalizedPage } from './types/Page.js';
import type { SourceFormat } from './types/SourceFormat.js';
import type { CourseRecord } from './types/CourseRecord.js';
import {
  emptyDiagnostics,
  type DocumentExtractionResult,
  type DocumentFailure,
  type ExtractionDiagnostics,
  type ExtractionRunResult,
} from './types/ExtractionResult.js';
import { catalogDocumentInputSchema } from './contracts/schemas.js';
import { normalizePage } from './normalizers/PageTextNormalizer.js';
import { OcrGateway } from './ocr/OcrGateway.js';
import { OcrFallbackSelector } from './ocr/OcrFallbackSelector.js';
import { segmentPages } from './segmentation/SegmentationStateMachine.js';
import { FieldExtractor } from './fields/FieldExtractor.js';
import { buildCourseRecord } from './records/RecordNormalizer.js';
import { CourseRecordDeduplicator } from './deduplicators/CourseRecordDeduplicator.js';
import { DEFAULT_SOURCE_PROFILES, type SourceProfile, type SourceProfileMap } from './profiles/sourceProfiles.js';
import { getEnv } from '../../config/env.js';
import { InputUnavailableError } from '../../types/errors.js';
import { mapWithConcurrency } from '../../utils/concurrency.js';
import { createChildLogger, runContext } from '../../utils/logger.js';
import {
  catalogDocumentDuration,
  catalogDuplicateRecords,
  catalogPagesProcessed,
  catalogRecordsEmitted,
  catalogRejectedBlocks,
} from '../../utils/metrics.js';

const log = createChildLogger({ component: 'CatalogExtractionEngine' });

/**
 * Configuration for CatalogExtractionEngine. Unset values come from the environment.
 */
export interface CatalogExtractionEngineConfig {
  /** OCR collaborator; without one, sparse scanned pages are kept as degraded */
  ocrProvider?: IOcrProvider;
  ocrEnabled?: boolean;
  /** Non-whitespace characters below which a scanned page is sent to OCR */
  minTextChars?: number;
  ocrConcurrency?: number;
  documentConcurrency?: number;
  /** Replace the profile of one or more source formats */
  profiles?: Partial<Record<SourceFormat, SourceProfile>>;
}

type DocumentOutcome =
  | { ok: true; result: DocumentExtractionResult }
  | { ok: false; failure: DocumentFailure };

function documentIdOf(input: unknown): string {
  if (typeof input === 'object' && input !== null && 'documentId' in input && typeof input.documentId === 'string') {
    return input.documentId;
  }
  return '<unknown>';
}

function mergeDiagnostics(target: ExtractionDiagnostics, source: ExtractionDiagnostics): void {
  target.pagesProcessed += source.pagesProcessed;
  target.ocrPages += source.ocrPages;
  target.degradedPages += source.degradedPages;
  target.blocksSegmented += source.blocksSegmented;
  target.rejectedBlocks += source.rejectedBlocks;
}

export class CatalogExtractionEngine {
  private readonly profiles: SourceProfileMap;
  private readonly ocrSelector: OcrFallbackSelector;
  private readonly documentConcurrency: number;

  constructor(config: CatalogExtractionEngineConfig = {}) {
    const env = getEnv();

    const ocrConcurrency = config.ocrConcurrency ?? env.CATALOG_OCR_CONCURRENCY;
    const gateway = config.ocrProvider ? new OcrGateway(config.ocrProvider, ocrConcurrency) : undefined;

    this.ocrSelector = new OcrFallbackSelector({
      minTextChars: config.minTextChars ?? env.CATALOG_OCR_MIN_TEXT_CHARS,
      enabled: config.ocrEnabled ?? env.CATALOG_OCR_ENABLED,
      ...(gateway && { gateway }),
    });
    this.documentConcurrency = config.documentConcurrency ?? env.CATALOG_DOCUMENT_CONCURRENCY;
    this.profiles = { ...DEFAULT_SOURCE_PROFILES, ...config.profiles };
  }

  /**
   * Extract course records from one document, before cross-document deduplication
   *
   * @throws {InputUnavailableError} when the document has no pages, a page has
   * no text, or the input is otherwise malformed
   */
  async extractDocument(input: CatalogDocumentInput): Promise<DocumentExtractionResult> {
    const startTime = Date.now();

    const parsed = catalogDocumentInputSchema.safeParse(input);
    if (!parsed.success) {
      catalogDocumentDuration.observe({ source_format: 'unknown', status: 'failed' }, (Date.now() - startTime) / 1000);
      const reason = parsed.error.issues.map(issue => `${issue.path.join('.') || 'input'}: ${issue.message}`).join('; ');
      throw new InputUnavailableError(documentIdOf(input), reason, { issues: parsed.error.issues });
    }

    const document = parsed.data;
    const profile = this.profiles[document.sourceFormat];
    const diagnostics = emptyDiagnostics();

    log.debug(
      { documentId: document.documentId, sourceFormat: document.sourceFormat, pageCount: document.pages.length },
      'Starting document extraction'
    );

    const pages = await this.resolvePages(document, profile, diagnostics);

    const segmentation = segmentPages(pages, profile.grammar, document.documentId);
    diagnostics.blocksSegmented = segmentation.blocks.length + segmentation.discarded.length;
    diagnostics.rejectedBlocks += segmentation.discarded.length;
    if (segmentation.discarded.length > 0) {
      catalogRejectedBlocks.inc({ source_format: profile.format, reason: 'empty_title' }, segmentation.discarded.length);
    }

    const fieldExtractor = new FieldExtractor(profile.fieldSteps);
    const records: CourseRecord[] = [];
    for (const block of segmentation.blocks) {
      const built = buildCourseRecord(block, fieldExtractor.extract(block.bodyLines), profile.grammar);
      if (built.ok) {
        records.push(built.record);
      } else {
        diagnostics.rejectedBlocks++;
        catalogRejectedBlocks.inc({ source_format: profile.format, reason: built.reason });
        log.debug(
          { documentId: document.documentId, identifier: block.identifier, reason: built.reason },
          'Course block rejected'
        );
      }
    }

    const durationSeconds = (Date.now() - startTime) / 1000;
    catalogDocumentDuration.observe({ source_format: profile.format, status: 'success' }, durationSeconds);

    log.info(
      {
        documentId: document.documentId,
        sourceFormat: profile.format,
        pages: diagnostics.pagesProcessed,
        ocrPages: diagnostics.ocrPages,
        degradedPages: diagnostics.degradedPages,
        blocks: diagnostics.blocksSegmented,
        droppedLines: segmentation.droppedLines,
        records: records.length,
        rejected: diagnostics.rejectedBlocks,
        durationSeconds,
      },
      'Document extraction completed'
    );

    return { documentId: document.documentId, sourceFormat: profile.format, records, diagnostics };
  }

  /**
   * Extract and deduplicate records from many documents.
   *
   * Documents run concurrently; an unavailable document is recorded in
   * `failures` and does not stop the others. Records keep the input order of
   * their documents, and the first occurrence of a course wins.
   */
  async run(inputs: readonly CatalogDocumentInput[]): Promise<ExtractionRunResult> {
    const runId = randomUUID();

    return runContext.run({ runId }, async () => {
      log.info({ documentCount: inputs.length, concurrency: this.documentConcurrency }, 'Starting extraction run');

      const outcomes = await mapWithConcurrency(inputs, this.documentConcurrency, (input) =>
        this.extractSafely(input)
      );

      const diagnostics = emptyDiagnostics();
      const deduplicator = new CourseRecordDeduplicator();
      const failures: DocumentFailure[] = [];

      for (const outcome of outcomes) {
        if (outcome.ok) {
          mergeDiagnostics(diagnostics, outcome.result.diagnostics);
          deduplicator.addAll(outcome.result.records);
        } else {
          failures.push(outcome.failure);
        }
      }

      const records = deduplicator.records;
      diagnostics.duplicateRecords = deduplicator.duplicates;
      diagnostics.recordsEmitted = records.length;
      diagnostics.failedDocuments = failures.length;

      catalogDuplicateRecords.inc(diagnostics.duplicateRecords);
      catalogRecordsEmitted.inc(diagnostics.recordsEmitted);

      log.info({ ...diagnostics }, 'Extraction run completed');

      return { records, diagnostics, failures };
    });
  }

  private async extractSafely(input: CatalogDocumentInput): Promise<DocumentOutcome> {
    try {
      return { ok: true, result: await this.extractDocument(input) };
    } catch (error) {
      if (error instanceof InputUnavailableError) {
        log.warn({ documentId: error.documentId, error: error.message }, 'Document skipped, input unavailable');
        return { ok: false, failure: { documentId: error.documentId, error } };
      }
      throw error;
    }
  }

  /**
   * Normalize pages in page order and, for profiles that allow it, route
   * sparse pages through OCR
   */
  private async resolvePages(
    document: CatalogDocumentInput,
    profile: SourceProfile,
    diagnostics: ExtractionDiagnostics
  ): Promise<NormalizedPage[]> {
    const sorted = [...document.pages].sort((a, b) => a.pageIndex - b.pageIndex);

    const resolved = await Promise.all(
      sorted.map(async (raw) => {
        const page = normalizePage(raw);
        if (!profile.ocrFallback) {
          return page;
        }
        const resolution = await this.ocrSelector.resolvePage(page);
        if (resolution.outcome === 'ocr') {
          diagnostics.ocrPages++;
        } else if (resolution.outcome === 'degraded') {
          diagnostics.degradedPages++;
        }
        return resolution.page;
      })
    );

    diagnostics.pagesProcessed = resolved.length;
    catalogPagesProcessed.inc({ source_format: profile.format }, resolved.length);
    return resolved;
  }
}
