/**
 * Parsed pieces of a detected header line, tagged with the page it sits on
 */
export interface CourseHeader {
  readonly identifier: string;
  readonly titleFragment: string;
  /** Credits carried on the header line itself (credit-hour catalogs only) */
  readonly creditsFragment?: string;
  readonly pageIndex: number;
}

/**
 * Lines accumulated between one header and the next (or end of document)
 */
export interface RawCourseBlock {
  readonly identifier: string;
  readonly title: string;
  readonly creditsFragment?: string;
  readonly bodyLines: readonly string[];
  readonly sourceDocumentId: string;
  readonly startPage: number;
}
