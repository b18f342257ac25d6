import type { CourseRecord } from './CourseRecord.js';
import type { SourceFormat } from './SourceFormat.js';
import type { AppError } from '../../../types/errors.js';

/**
 * Run-level counters. Only fatal input problems are reported as errors;
 * everything else shows up here.
 */
export interface ExtractionDiagnostics {
  pagesProcessed: number;
  ocrPages: number;
  degradedPages: number;
  blocksSegmented: number;
  rejectedBlocks: number;
  duplicateRecords: number;
  recordsEmitted: number;
  failedDocuments: number;
}

export function emptyDiagnostics(): ExtractionDiagnostics {
  return {
    pagesProcessed: 0,
    ocrPages: 0,
    degradedPages: 0,
    blocksSegmented: 0,
    rejectedBlocks: 0,
    duplicateRecords: 0,
    recordsEmitted: 0,
    failedDocuments: 0,
  };
}

/**
 * Output of a single document before cross-document deduplication
 */
export interface DocumentExtractionResult {
  documentId: string;
  sourceFormat: SourceFormat;
  records: CourseRecord[];
  diagnostics: ExtractionDiagnostics;
}

export interface DocumentFailure {
  documentId: string;
  error: AppError;
}

/**
 * Output of a full engine run
 */
export interface ExtractionRunResult {
  records: CourseRecord[];
  diagnostics: ExtractionDiagnostics;
  failures: DocumentFailure[];
}
