/**
 * Fields carved out of a block body by the field extractor
 */
export interface ExtractedFields {
  readonly description: string;
  readonly prereq?: string;
  readonly levelTerm?: string;
  /** Unit/credit token as found, e.g. `12 units`, `3-2-7 units`, `4 SH` */
  readonly units?: string;
  readonly instructors?: string;
}

/**
 * Numeric credit range; both ends are null when the token is absent or unparseable
 */
export interface CreditRange {
  readonly min: number | null;
  readonly max: number | null;
}

/**
 * Final structured course unit.
 *
 * `identifier` and `title` are never empty, and `creditsMin <= creditsMax`
 * whenever both are set. Absent optional values are `null`.
 */
export interface CourseRecord {
  readonly identifier: string;
  /** Subject/department prefix of the identifier */
  readonly subject: string;
  readonly title: string;
  readonly description: string;
  readonly creditsRaw: string | null;
  readonly creditsMin: number | null;
  readonly creditsMax: number | null;
  readonly prereq: string | null;
  readonly levelTerm: string | null;
  readonly instructors: string | null;
  readonly sourceDocumentId: string;
  readonly startPage: number;
}
