// ============================================================
// SOURCE LOCATION
// ============================================================

export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

/** Location of the first character of a standalone input */
export const START_LOCATION: SourceLocation = Object.freeze({
  line: 1,
  column: 1,
  offset: 0,
});
