/**
 * Tokenizer Diagnostics
 * Closed set of syntax failure kinds paired with an input offset
 */

export type DiagnosticKind =
  | 'UnterminatedFunctionName'
  | 'UnclosedFunction'
  | 'DanglingEscape';

export interface Diagnostic {
  /** UTF-16 offset into the input */
  readonly offset: number;
  readonly kind: DiagnosticKind;
}

/** Registry error ID reported for each diagnostic kind */
export const DIAGNOSTIC_ERROR_IDS = {
  UnterminatedFunctionName: 'FLAT-L001',
  UnclosedFunction: 'FLAT-L002',
  DanglingEscape: 'FLAT-L003',
} as const satisfies Record<DiagnosticKind, string>;
