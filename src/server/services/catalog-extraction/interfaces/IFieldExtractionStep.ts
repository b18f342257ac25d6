export type CarvedField = 'prereq' | 'levelTerm' | 'units' | 'instructors';

export interface FieldCapture {
  field: CarvedField;
  value: string;
}

/**
 * Outcome of one step. When `capture` is set, the matched span is already
 * gone from `residual`.
 */
export interface FieldStepResult {
  residual: string;
  capture?: FieldCapture;
}

/**
 * One step of the ordered, subtractive field pipeline
 */
export interface IFieldExtractionStep {
  readonly name: string;
  apply(residual: string): FieldStepResult;
}
