/**
 * One page's untouched extracted text, as delivered by the document source.
 * `pageIndex` is 1-based.
 */
export interface RawPage {
  readonly documentId: string;
  readonly pageIndex: number;
  readonly text: string;
}

/**
 * Page text after layout repair. `ocrApplied` is true when the text was
 * substituted by OCR output.
 */
export interface NormalizedPage {
  readonly documentId: string;
  readonly pageIndex: number;
  readonly text: string;
  readonly ocrApplied: boolean;
}
