/**
 * Scanner
 * Mode-dependent classification of the next input unit
 */

import { advanceUnit, isAtEnd, type ScannerState } from './state.js';

export const ESCAPE = '\\';
export const FUNCTION_OPEN = '{';
export const ARGUMENT_SEPARATOR = ',';
export const FUNCTION_CLOSE = '}';

/** Units whose structural meaning an escape suppresses */
const ESCAPABLE: ReadonlySet<string> = new Set([
  ESCAPE,
  FUNCTION_OPEN,
  ARGUMENT_SEPARATOR,
  FUNCTION_CLOSE,
]);

/**
 * Scanning context:
 * - top: no function open; only `{` is structural
 * - name: reading a function name; only `,` and `}` are structural, no escapes
 * - argument: inside a function body; `{`, `,` and `}` are structural
 */
export type ScanMode = 'top' | 'name' | 'argument';

export type ScanUnit =
  | { readonly kind: 'end'; readonly offset: number }
  | { readonly kind: 'dangling-escape'; readonly offset: number }
  | { readonly kind: 'open' | 'separator' | 'close'; readonly offset: number }
  | { readonly kind: 'literal'; readonly value: string; readonly offset: number }
  | {
      readonly kind: 'escape';
      /** The escaped unit */
      readonly value: string;
      readonly offset: number;
      readonly escapeOffset: number;
      /** True when the escaped unit is one of `\ { , }` */
      readonly structural: boolean;
    };

export function isEscapable(unit: string): boolean {
  return ESCAPABLE.has(unit);
}

/**
 * Classify and consume the next unit.
 * An escape consumes two units; everything else consumes one.
 */
export function scanUnit(state: ScannerState, mode: ScanMode): ScanUnit {
  const offset = state.pos;
  if (isAtEnd(state)) {
    return { kind: 'end', offset };
  }

  const unit = advanceUnit(state);

  if (mode === 'name') {
    if (unit === ARGUMENT_SEPARATOR) return { kind: 'separator', offset };
    if (unit === FUNCTION_CLOSE) return { kind: 'close', offset };
    return { kind: 'literal', value: unit, offset };
  }

  if (unit === ESCAPE) {
    if (isAtEnd(state)) {
      return { kind: 'dangling-escape', offset: state.pos };
    }
    const escapedOffset = state.pos;
    const escaped = advanceUnit(state);
    return {
      kind: 'escape',
      value: escaped,
      offset: escapedOffset,
      escapeOffset: offset,
      structural: isEscapable(escaped),
    };
  }

  if (unit === FUNCTION_OPEN) return { kind: 'open', offset };

  if (mode === 'argument') {
    if (unit === ARGUMENT_SEPARATOR) return { kind: 'separator', offset };
    if (unit === FUNCTION_CLOSE) return { kind: 'close', offset };
  }

  return { kind: 'literal', value: unit, offset };
}
