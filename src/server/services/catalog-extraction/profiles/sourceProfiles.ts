/**
 * Source profiles
 *
 * Everything format-specific lives here. The engine picks a profile by
 * `sourceFormat` and otherwise runs the same pipeline for every document.
 */

import type { IFieldExtractionStep } from '../interfaces/IFieldExtractionStep.js';
import type { IHeaderGrammar } from '../interfaces/IHeaderGrammar.js';
import type { SourceFormat } from '../types/SourceFormat.js';
import { creditHourGrammar, currentEraGrammar, scannedEraGrammar } from '../segmentation/headerGrammars.js';
import {
  CREDIT_HOUR_FIELD_STEPS,
  CURRENT_ERA_FIELD_STEPS,
  SCANNED_ERA_FIELD_STEPS,
} from '../fields/FieldExtractor.js';

export interface SourceProfile {
  readonly format: SourceFormat;
  readonly grammar: IHeaderGrammar;
  readonly fieldSteps: readonly IFieldExtractionStep[];
  /** Whether sparse pages are sent to OCR */
  readonly ocrFallback: boolean;
}

export type SourceProfileMap = Readonly<Record<SourceFormat, SourceProfile>>;

export const DEFAULT_SOURCE_PROFILES: SourceProfileMap = {
  'scanned-era': {
    format: 'scanned-era',
    grammar: scannedEraGrammar,
    fieldSteps: SCANNED_ERA_FIELD_STEPS,
    ocrFallback: true,
  },
  'current-era': {
    format: 'current-era',
    grammar: currentEraGrammar,
    fieldSteps: CURRENT_ERA_FIELD_STEPS,
    ocrFallback: false,
  },
  'credit-hour': {
    format: 'credit-hour',
    grammar: creditHourGrammar,
    fieldSteps: CREDIT_HOUR_FIELD_STEPS,
    ocrFallback: false,
  },
};
