/**
 * Source Locations
 * Positions and half-open ranges shared by tokens, AST nodes and errors
 */

/**
 * A cursor position in source text.
 * `line` and `column` are 1-based; `offset` is the 0-based UTF-16 index.
 */
export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

/** Range from `start` (inclusive) to `end` (exclusive) */
export interface SourceSpan {
  readonly start: SourceLocation;
  readonly end: SourceLocation;
}

/** Location of the first character of any source */
export const SOURCE_START: SourceLocation = { line: 1, column: 1, offset: 0 };

export function spanBetween(
  start: SourceLocation,
  end: SourceLocation
): SourceSpan {
  return { start, end };
}
