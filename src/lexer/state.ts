/**
 * Scanner State
 * Tracks the cursor position in the input during tokenization
 */

export interface ScannerState {
  readonly source: string;
  /** UTF-16 index of the next unit */
  pos: number;
}

export function createScannerState(source: string): ScannerState {
  return { source, pos: 0 };
}

export function isAtEnd(state: ScannerState): boolean {
  return state.pos >= state.source.length;
}

/** Next unit (one code point) without consuming it; '' at end of input */
export function peekUnit(state: ScannerState): string {
  const code = state.source.codePointAt(state.pos);
  return code === undefined ? '' : String.fromCodePoint(code);
}

/** Consume one unit and return it */
export function advanceUnit(state: ScannerState): string {
  const unit = peekUnit(state);
  state.pos += unit.length;
  return unit;
}
