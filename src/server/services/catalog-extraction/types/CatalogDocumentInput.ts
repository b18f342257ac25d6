import type { RawPage } from './Page.js';
import type { SourceFormat } from './SourceFormat.js';

/**
 * One document as handed over by the document-source collaborator.
 * Pages are fed to segmentation in ascending `pageIndex` order.
 */
export interface CatalogDocumentInput {
  readonly documentId: string;
  readonly sourceFormat: SourceFormat;
  readonly pages: readonly RawPage[];
}
