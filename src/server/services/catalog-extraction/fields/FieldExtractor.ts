/**
 * Field Extractor
 *
 * Runs an ordered list of subtractive steps over a block body. A field is
 * captured at most once; the residual left after the last step is the
 * description.
 */

import type { CarvedField, IFieldExtractionStep } from '../interfaces/IFieldExtractionStep.js';
import type { ExtractedFields } from '../types/CourseRecord.js';
import {
  adminLineFilter,
  dropNoiseLines,
  labelledInstructorsStep,
  levelTermStep,
  prereqStep,
  residualCleanup,
  standaloneInstructorsStep,
  subjectMeetsWithStep,
  unitsStep,
} from './fieldSteps.js';

export const SCANNED_ERA_FIELD_STEPS: readonly IFieldExtractionStep[] = [
  dropNoiseLines,
  prereqStep,
  levelTermStep,
  unitsStep,
  labelledInstructorsStep,
  adminLineFilter,
  residualCleanup,
];

export const CURRENT_ERA_FIELD_STEPS: readonly IFieldExtractionStep[] = [
  dropNoiseLines,
  prereqStep,
  levelTermStep,
  unitsStep,
  labelledInstructorsStep,
  standaloneInstructorsStep,
  subjectMeetsWithStep,
  adminLineFilter,
  residualCleanup,
];

export const CREDIT_HOUR_FIELD_STEPS: readonly IFieldExtractionStep[] = SCANNED_ERA_FIELD_STEPS;

export class FieldExtractor {
  constructor(private readonly steps: readonly IFieldExtractionStep[]) {}

  extract(bodyLines: readonly string[]): ExtractedFields {
    return this.extractText(bodyLines.join('\n'));
  }

  extractText(body: string): ExtractedFields {
    const captured = new Map<CarvedField, string>();
    let residual = body;

    for (const step of this.steps) {
      const result = step.apply(residual);
      residual = result.residual;
      if (result.capture && !captured.has(result.capture.field)) {
        captured.set(result.capture.field, result.capture.value);
      }
    }

    const prereq = captured.get('prereq');
    const levelTerm = captured.get('levelTerm');
    const units = captured.get('units');
    const instructors = captured.get('instructors');

    return {
      description: residual.replace(/\s+/g, ' ').trim(),
      ...(prereq !== undefined && { prereq }),
      ...(levelTerm !== undefined && { levelTerm }),
      ...(units !== undefined && { units }),
      ...(instructors !== undefined && { instructors }),
    };
  }
}
