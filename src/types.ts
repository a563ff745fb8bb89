/**
 * Flatcall Types
 * Shared source-location, error and token types
 */

export type { SourceLocation, SourceSpan } from './source-location.js';
export { locationAt, lineContent, spanBetween } from './source-location.js';

export {
  ERROR_ID_PATTERN,
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorExample,
  type ErrorRegistry,
} from './error-registry.js';

export {
  ConfigError,
  FlatcallError,
  ResourceLimitError,
  TokenizeError,
  type FlatcallErrorData,
} from './error-classes.js';

export type {
  CharacterToken,
  EndArgToken,
  FunctionToken,
  Token,
  TokenType,
} from './lexer/tokens.js';
export type { Diagnostic, DiagnosticKind } from './lexer/diagnostics.js';
