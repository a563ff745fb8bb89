/**
 * Tokenizer
 * Single-pass state machine turning nested calls into a flat token sequence
 */

import { ResourceLimitError, TokenizeError } from '../error-classes.js';
import { locationAt } from '../source-location.js';
import type { Diagnostic, DiagnosticKind } from './diagnostics.js';
import { scanUnit, ESCAPE, type ScanMode } from './scanner.js';
import { createScannerState } from './state.js';
import { TokenBuffer, type Token } from './tokens.js';

/** Nesting bound applied when the caller sets none */
export const DEFAULT_MAX_DEPTH = 1024;

// ============================================================
// OPTIONS AND RESULTS
// ============================================================

/** Event emitted after a `{` pushes a new frame */
export interface FunctionOpenEvent {
  /** Index of the placeholder function token */
  index: number;
  offset: number;
  /** Stack depth including the new frame */
  depth: number;
}

/** Event emitted after a function's fields are back-patched and its frame popped */
export interface FunctionCloseEvent {
  index: number;
  name: string;
  numArgs: number;
  delta: number;
  /** Stack depth after the pop */
  depth: number;
}

export interface TokenizerCallbacks {
  onFunctionOpen?: ((event: FunctionOpenEvent) => void) | undefined;
  onFunctionClose?: ((event: FunctionCloseEvent) => void) | undefined;
  /** Called once when the call fails, before the result is returned */
  onDiagnostic?: ((diagnostic: Diagnostic) => void) | undefined;
}

export interface TokenizeOptions {
  /** Maximum number of simultaneously open functions */
  maxDepth?: number | undefined;
  observability?: TokenizerCallbacks | undefined;
}

export type TokenizeResult =
  | { readonly ok: true; readonly tokens: readonly Token[] }
  | { readonly ok: false; readonly diagnostic: Diagnostic };

// ============================================================
// FRAMES
// ============================================================

/** Bookkeeping for one open, unclosed function */
interface OpenFunctionFrame {
  readonly functionIndex: number;
  /** Offset of the `{` */
  readonly offset: number;
  readonly nameStart: number;
  scanningName: boolean;
  argCount: number;
  lastEndArgIndex: number | undefined;
}

function scanModeOf(frame: OpenFunctionFrame | undefined): ScanMode {
  if (frame === undefined) return 'top';
  return frame.scanningName ? 'name' : 'argument';
}

function resolveMaxDepth(maxDepth: number | undefined): number {
  if (maxDepth === undefined) return DEFAULT_MAX_DEPTH;
  if (!Number.isInteger(maxDepth) || maxDepth < 1) {
    throw new RangeError(`maxDepth must be a positive integer, got ${maxDepth}`);
  }
  return maxDepth;
}

// ============================================================
// TOKENIZE
// ============================================================

/**
 * Tokenize a complete input.
 *
 * Returns the token sequence, or the single diagnostic that stopped the scan.
 * Exceeding `maxDepth` throws ResourceLimitError instead of producing a diagnostic.
 */
export function tokenize(
  source: string,
  options?: TokenizeOptions
): TokenizeResult {
  const maxDepth = resolveMaxDepth(options?.maxDepth);
  const callbacks = options?.observability;
  const state = createScannerState(source);
  const buffer = new TokenBuffer();
  const frames: OpenFunctionFrame[] = [];

  const fail = (kind: DiagnosticKind, offset: number): TokenizeResult => {
    const diagnostic: Diagnostic = { offset, kind };
    callbacks?.onDiagnostic?.(diagnostic);
    return { ok: false, diagnostic };
  };

  const closeArgument = (frame: OpenFunctionFrame, offset: number): void => {
    const index = buffer.append({ type: 'end-arg', offset, delta: undefined });
    if (frame.lastEndArgIndex === undefined) {
      buffer.patchFunction(frame.functionIndex, {
        firstArgDelta: index - frame.functionIndex,
      });
    } else {
      buffer.patchEndArg(frame.lastEndArgIndex, index - frame.lastEndArgIndex);
    }
    frame.argCount++;
    frame.lastEndArgIndex = index;
  };

  const closeFunction = (frame: OpenFunctionFrame): void => {
    frames.pop();
    const delta = buffer.length - frame.functionIndex;
    buffer.patchFunction(frame.functionIndex, {
      numArgs: frame.argCount,
      delta,
    });
    const token = buffer.at(frame.functionIndex);
    callbacks?.onFunctionClose?.({
      index: frame.functionIndex,
      name: token?.type === 'function' ? token.name : '',
      numArgs: frame.argCount,
      delta,
      depth: frames.length,
    });
  };

  const finishName = (frame: OpenFunctionFrame, end: number): void => {
    buffer.patchFunction(frame.functionIndex, {
      name: source.slice(frame.nameStart, end),
    });
    frame.scanningName = false;
  };

  for (;;) {
    const frame = frames[frames.length - 1];
    const unit = scanUnit(state, scanModeOf(frame));

    switch (unit.kind) {
      case 'end': {
        if (frame === undefined) {
          return { ok: true, tokens: buffer.finish() };
        }
        if (frame.scanningName) {
          return fail('UnterminatedFunctionName', unit.offset);
        }
        // The outermost open frame is the earliest unmatched `{`
        return fail('UnclosedFunction', frames[0]?.offset ?? frame.offset);
      }

      case 'dangling-escape':
        return fail('DanglingEscape', unit.offset);

      case 'literal':
        // Name units are sliced from the source when the name ends
        if (frame?.scanningName !== true) {
          buffer.append({
            type: 'character',
            offset: unit.offset,
            value: unit.value,
          });
        }
        break;

      case 'escape':
        if (unit.structural) {
          buffer.append({
            type: 'character',
            offset: unit.escapeOffset,
            value: unit.value,
          });
        } else {
          buffer.append({
            type: 'character',
            offset: unit.escapeOffset,
            value: ESCAPE,
          });
          buffer.append({
            type: 'character',
            offset: unit.offset,
            value: unit.value,
          });
        }
        break;

      case 'open': {
        if (frames.length >= maxDepth) {
          throw new ResourceLimitError(maxDepth, locationAt(source, unit.offset));
        }
        const functionIndex = buffer.appendFunctionPlaceholder(
          unit.offset,
          unit.offset + 1
        );
        frames.push({
          functionIndex,
          offset: unit.offset,
          nameStart: unit.offset + 1,
          scanningName: true,
          argCount: 0,
          lastEndArgIndex: undefined,
        });
        callbacks?.onFunctionOpen?.({
          index: functionIndex,
          offset: unit.offset,
          depth: frames.length,
        });
        break;
      }

      case 'separator':
      case 'close': {
        // Top-level mode never yields these
        if (frame === undefined) {
          throw new Error(`Internal error: ${unit.kind} outside a function`);
        }
        if (frame.scanningName) {
          finishName(frame, unit.offset);
          if (unit.kind === 'close') {
            closeFunction(frame);
          }
          break;
        }
        closeArgument(frame, unit.offset);
        if (unit.kind === 'close') {
          closeFunction(frame);
        }
        break;
      }
    }
  }
}

/**
 * Tokenize, throwing TokenizeError on a syntax diagnostic.
 */
export function tokenizeOrThrow(
  source: string,
  options?: TokenizeOptions
): readonly Token[] {
  const result = tokenize(source, options);
  if (!result.ok) {
    throw new TokenizeError(
      result.diagnostic,
      locationAt(source, result.diagnostic.offset)
    );
  }
  return result.tokens;
}
