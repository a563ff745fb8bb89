/**
 * CLI Error Formatter
 * Format tokenizer diagnostics for human-readable, JSON, or compact output
 */

import { ERROR_REGISTRY } from './error-registry.js';
import {
  DIAGNOSTIC_ERROR_IDS,
  type Diagnostic,
  type DiagnosticKind,
} from './lexer/diagnostics.js';
import {
  lineContent,
  spanBetween,
  type SourceSpan,
} from './source-location.js';

// ============================================================
// PUBLIC TYPES
// ============================================================

export type OutputFormat = 'human' | 'json' | 'compact';

export const OUTPUT_FORMATS: readonly OutputFormat[] = [
  'human',
  'json',
  'compact',
];

export function isOutputFormat(value: unknown): value is OutputFormat {
  return value === 'human' || value === 'json' || value === 'compact';
}

/** A diagnostic resolved against its source text */
export interface DiagnosticReport {
  readonly errorId: string;
  readonly kind: DiagnosticKind;
  readonly message: string;
  readonly span: SourceSpan;
  /** Full text of the line the span starts on */
  readonly line: string;
  readonly help?: string | undefined;
}

export interface FormatOptions {
  readonly format: OutputFormat;
  /** Adds the registry resolution as a help line */
  readonly verbose: boolean;
}

// ============================================================
// REPORTS
// ============================================================

/**
 * Resolve a diagnostic against the source it came from.
 * An unclosed function underlines its `{`; end-of-input failures point one past the last unit.
 */
export function describeDiagnostic(
  diagnostic: Diagnostic,
  source: string
): DiagnosticReport {
  const errorId = DIAGNOSTIC_ERROR_IDS[diagnostic.kind];
  const definition = ERROR_REGISTRY.get(errorId);
  const width =
    diagnostic.kind === 'UnclosedFunction' && diagnostic.offset < source.length
      ? 1
      : 0;
  const span = spanBetween(
    source,
    diagnostic.offset,
    diagnostic.offset + width
  );

  return {
    errorId,
    kind: diagnostic.kind,
    message: definition?.messageTemplate ?? diagnostic.kind,
    span,
    line: lineContent(source, span.start.line),
    help: definition?.resolution,
  };
}

// ============================================================
// FORMATTING
// ============================================================

/**
 * Format a diagnostic report.
 *
 * - Human format: multi-line with source line and caret underline
 * - JSON format: LSP Diagnostic compatible
 * - Compact format: single line for CI output
 *
 * @throws {TypeError} Unknown format
 */
export function formatDiagnostic(
  report: DiagnosticReport,
  options: FormatOptions
): string {
  switch (options.format) {
    case 'human':
      return formatHuman(report, options);
    case 'json':
      return formatJson(report, options);
    case 'compact':
      return formatCompact(report);
    default:
      throw new TypeError(`Unknown format: ${String(options.format)}`);
  }
}

/**
 * Output format:
 * ```
 * error[FLAT-L002]: Function opened here was never closed with "}"
 *   --> 1:1
 *    |
 *  1 | {hi,ab
 *    | ^
 *    |
 * ```
 */
function formatHuman(report: DiagnosticReport, options: FormatOptions): string {
  const lines: string[] = [];
  const { start } = report.span;

  lines.push(`error[${report.errorId}]: ${report.message}`);
  lines.push(`  --> ${start.line}:${start.column}`);

  const lineNumStr = String(start.line);
  const padding = ' '.repeat(lineNumStr.length);
  lines.push(` ${padding} |`);
  lines.push(` ${lineNumStr} | ${report.line}`);
  lines.push(` ${padding} | ${renderCaretUnderline(report.span, report.line)}`);
  lines.push(` ${padding} |`);

  if (options.verbose && report.help) {
    lines.push(` ${padding} = help: ${report.help}`);
  }

  return lines.join('\n');
}

function formatJson(report: DiagnosticReport, options: FormatOptions): string {
  const { start, end } = report.span;
  const diagnostic: {
    errorId: string;
    kind: DiagnosticKind;
    severity: number;
    message: string;
    range: {
      start: { line: number; character: number };
      end: { line: number; character: number };
    };
    source: string;
    code: string;
    help?: string;
  } = {
    errorId: report.errorId,
    kind: report.kind,
    severity: 1, // LSP: 1 = Error
    message: report.message,
    // LSP lines and characters are 0-based
    range: {
      start: { line: start.line - 1, character: start.column - 1 },
      end: { line: end.line - 1, character: end.column - 1 },
    },
    source: 'flatcall',
    code: report.errorId,
  };

  if (options.verbose && report.help) {
    diagnostic.help = report.help;
  }

  return JSON.stringify(diagnostic, null, 2);
}

function formatCompact(report: DiagnosticReport): string {
  const { start } = report.span;
  return `[${report.errorId}] ${report.message} at ${start.line}:${start.column}`;
}

// ============================================================
// CARET UNDERLINE
// ============================================================

/**
 * Render caret underline for a span.
 *
 * - Empty or single-unit span: single ^
 * - Multi-unit same line: ^^^^^ (length = span width)
 * - Multi-line: carets to the end of the first line
 *
 * @throws {RangeError} Invalid span (start after end)
 */
export function renderCaretUnderline(
  span: SourceSpan,
  lineContent: string
): string {
  if (
    span.start.line > span.end.line ||
    (span.start.line === span.end.line && span.start.column > span.end.column)
  ) {
    throw new RangeError('Span start must precede end');
  }

  const startColumn = span.start.column;
  const endColumn =
    span.start.line === span.end.line
      ? span.end.column
      : Array.from(lineContent).length + 1;

  const padding = ' '.repeat(startColumn - 1);
  const carets = '^'.repeat(Math.max(1, endColumn - startColumn));

  return padding + carets;
}
