// ============================================================
// SOURCE LOCATION
// ============================================================

/** Line is 1-based, col is 0-based */
export interface SourceLocation {
  readonly line: number;
  readonly col: number;
}
