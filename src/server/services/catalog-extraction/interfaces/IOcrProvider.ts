/**
 * External OCR collaborator. Converts one page of a scanned document to text;
 * rendering and recognition happen outside the engine.
 */
export interface IOcrProvider {
  readonly name: string;

  /**
   * @param pageIndex - 1-based page index within the document
   * @throws when the backend is unreachable or recognition fails
   */
  recognizePage(documentId: string, pageIndex: number): Promise<string>;
}
