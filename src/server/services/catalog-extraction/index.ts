/**
 * Catalog Extraction Layer - Main exports
 */

// Main service
export { CatalogExtractionEngine } from './CatalogExtractionEngine.js';
export type { CatalogExtractionEngineConfig } from './CatalogExtractionEngine.js';

// Interfaces
export type { IOcrProvider } from './interfaces/IOcrProvider.js';
export type { IHeaderGrammar, HeaderMatch } from './interfaces/IHeaderGrammar.js';
export type { IFieldExtractionStep, FieldStepResult, FieldCapture, CarvedField } from './interfaces/IFieldExtractionStep.js';

// Pipeline stages
export { normalizePageText, normalizePage } from './normalizers/PageTextNormalizer.js';
export { OcrGateway } from './ocr/OcrGateway.js';
export { OcrFallbackSelector, isLikelyScannedOnly, DEFAULT_MIN_TEXT_CHARS } from './ocr/OcrFallbackSelector.js';
export type { PageResolution, DegradedReason, OcrFallbackOptions } from './ocr/OcrFallbackSelector.js';
export { segmentPages, transition, flush, INITIAL_STATE } from './segmentation/SegmentationStateMachine.js';
export type { SegmentationState, SegmentationResult } from './segmentation/SegmentationStateMachine.js';
export { scannedEraGrammar, currentEraGrammar, creditHourGrammar } from './segmentation/headerGrammars.js';
export { FieldExtractor } from './fields/FieldExtractor.js';
export {
  buildCourseRecord,
  canonicalIdentifier,
  canonicalTitle,
  parseCredits,
  parseUnits,
  subjectPrefix,
} from './records/RecordNormalizer.js';
export type { RecordBuildResult, RejectionReason } from './records/RecordNormalizer.js';
export { CourseRecordDeduplicator, dedupKey } from './deduplicators/CourseRecordDeduplicator.js';
export type { DedupKey } from './deduplicators/CourseRecordDeduplicator.js';
export { DEFAULT_SOURCE_PROFILES } from './profiles/sourceProfiles.js';
export type { SourceProfile, SourceProfileMap } from './profiles/sourceProfiles.js';

// HTML input
export { CatalogHtmlExtractor } from '../../extraction/html/CatalogHtmlExtractor.js';

// Contracts
export { catalogDocumentInputSchema, courseRecordObjectSchema } from './contracts/schemas.js';
export type { CourseRecordObject } from './contracts/schemas.js';
export { serializeCourseRecords, serializeCourseRecordsJson } from './contracts/serializer.js';

// Metrics
export { metricsRegistry } from '../../utils/metrics.js';

// Types
export type { RawPage, NormalizedPage } from './types/Page.js';
export { SOURCE_FORMATS } from './types/SourceFormat.js';
export type { SourceFormat } from './types/SourceFormat.js';
export type { CatalogDocumentInput } from './types/CatalogDocumentInput.js';
export type { RawCourseBlock, CourseHeader } from './types/CourseBlock.js';
export type { CourseRecord, ExtractedFields, CreditRange } from './types/CourseRecord.js';
export type {
  ExtractionDiagnostics,
  ExtractionRunResult,
  DocumentExtractionResult,
  DocumentFailure,
} from './types/ExtractionResult.js';
