/**
 * Lexer Module
 * Converts brace-call expressions into flat, delta-addressed tokens
 */

export type { Diagnostic, DiagnosticKind } from './diagnostics.js';
export { DIAGNOSTIC_ERROR_IDS } from './diagnostics.js';
export {
  ARGUMENT_SEPARATOR,
  ESCAPE,
  FUNCTION_CLOSE,
  FUNCTION_OPEN,
  isEscapable,
  scanUnit,
  type ScanMode,
  type ScanUnit,
} from './scanner.js';
export { createScannerState, type ScannerState } from './state.js';
export {
  TokenBuffer,
  type CharacterToken,
  type EndArgToken,
  type FunctionToken,
  type Token,
  type TokenType,
} from './tokens.js';
export {
  DEFAULT_MAX_DEPTH,
  tokenize,
  tokenizeOrThrow,
  type FunctionCloseEvent,
  type FunctionOpenEvent,
  type TokenizeOptions,
  type TokenizeResult,
  type TokenizerCallbacks,
} from './tokenizer.js';
