/**
 * Flatcall Module
 * Exports the tokenizer, token navigation, serialization and error types
 */

export {
  DEFAULT_MAX_DEPTH,
  DIAGNOSTIC_ERROR_IDS,
  TokenBuffer,
  tokenize,
  tokenizeOrThrow,
  type FunctionCloseEvent,
  type FunctionOpenEvent,
  type TokenizeOptions,
  type TokenizeResult,
  type TokenizerCallbacks,
} from './lexer/index.js';
export {
  argumentEnds,
  argumentRanges,
  checkTokenSequence,
  subtreeEnd,
  topLevelIndices,
  type TokenRange,
} from './navigate.js';
export { serializeTokens } from './serialize.js';
export {
  describeDiagnostic,
  formatDiagnostic,
  renderCaretUnderline,
  type DiagnosticReport,
  type FormatOptions,
  type OutputFormat,
} from './cli-error-formatter.js';
export * from './types.js';
