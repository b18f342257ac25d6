/**
 * Result of matching one line against a header grammar
 */
export interface HeaderMatch {
  identifier: string;
  titleFragment: string;
  creditsFragment?: string;
}

/**
 * Source-specific header grammar. The segmentation state machine is
 * source-agnostic and only calls `match`.
 */
export interface IHeaderGrammar {
  readonly name: string;

  /**
   * @returns the captured header pieces, or null when the line is not a header
   */
  match(line: string): HeaderMatch | null;
}
