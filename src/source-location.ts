// ============================================================
// SOURCE LOCATION
// ============================================================

export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

export interface SourceSpan {
  readonly start: SourceLocation;
  readonly end: SourceLocation;
}

/**
 * Convert a UTF-16 offset into a 1-based line and column.
 * Columns count code points, so a surrogate pair is one column.
 * Offsets past the end of the source clamp to the end.
 */
export function locationAt(source: string, offset: number): SourceLocation {
  const clamped = Math.max(0, Math.min(offset, source.length));
  let line = 1;
  let lineStart = 0;

  for (let i = 0; i < clamped; i++) {
    if (source.charCodeAt(i) === 0x0a) {
      line++;
      lineStart = i + 1;
    }
  }

  const column = Array.from(source.slice(lineStart, clamped)).length + 1;
  return { line, column, offset: clamped };
}

/** Span covering [start, end) of the source */
export function spanBetween(
  source: string,
  start: number,
  end: number
): SourceSpan {
  return { start: locationAt(source, start), end: locationAt(source, end) };
}

/** Full text of the given 1-based line, without its newline */
export function lineContent(source: string, line: number): string {
  return source.split('\n')[line - 1] ?? '';
}
