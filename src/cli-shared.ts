/**
 * CLI Shared Utilities
 * Common formatting functions for the flatcall CLI
 */

import { readFileSync } from 'node:fs';
import {
  describeDiagnostic,
  formatDiagnostic,
  type FormatOptions,
  type OutputFormat,
} from './cli-error-formatter.js';
import { FlatcallError, TokenizeError } from './error-classes.js';
import type { Token } from './lexer/tokens.js';

/**
 * Render one token as a single line: index, type, fields, then `@offset`.
 *
 * @example
 * formatToken({ type: 'end-arg', offset: 4, delta: 2 }, 2)
 * // Returns: "2 end-arg next=+2 @4"
 */
export function formatToken(token: Token, index: number): string {
  switch (token.type) {
    case 'function': {
      const firstArg =
        token.firstArgDelta === undefined ? '-' : `+${token.firstArgDelta}`;
      return `${index} function ${JSON.stringify(token.name)} args=${token.numArgs} end=+${token.delta} first=${firstArg} @${token.offset}`;
    }
    case 'character':
      return `${index} character ${JSON.stringify(token.value)} @${token.offset}`;
    case 'end-arg': {
      const next = token.delta === undefined ? '-' : `+${token.delta}`;
      return `${index} end-arg next=${next} @${token.offset}`;
    }
  }
}

/** Absent deltas are written as null so every token field appears in JSON */
function absentAsNull(_key: string, value: unknown): unknown {
  return value === undefined ? null : value;
}

/** Render a token sequence for stdout in the given format */
export function formatTokens(
  tokens: readonly Token[],
  format: OutputFormat
): string {
  if (format === 'json') {
    return JSON.stringify(tokens, absentAsNull, 2);
  }
  if (format === 'compact') {
    return tokens.map((token, index) => formatToken(token, index)).join('; ');
  }
  return tokens.map((token, index) => formatToken(token, index)).join('\n');
}

/**
 * Format error for stderr output
 *
 * @param err - The error to format
 * @param source - Input text, used to place diagnostics in context
 */
export function formatError(
  err: Error,
  source: string | undefined,
  options: FormatOptions
): string {
  if (err instanceof TokenizeError && source !== undefined) {
    return formatDiagnostic(describeDiagnostic(err.diagnostic, source), options);
  }

  if (err instanceof FlatcallError) {
    return `error[${err.errorId}]: ${err.message}`;
  }

  if ('code' in err && err.code === 'ENOENT' && 'path' in err) {
    return `File not found: ${String(err.path)}`;
  }

  return err.message;
}

/**
 * Package version read from package.json next to src/ or dist/
 */
export function readVersion(): string {
  const packageJsonPath = new URL('../package.json', import.meta.url);
  const packageJson: unknown = JSON.parse(
    readFileSync(packageJsonPath, 'utf-8')
  );
  if (
    typeof packageJson === 'object' &&
    packageJson !== null &&
    'version' in packageJson &&
    typeof packageJson.version === 'string'
  ) {
    return packageJson.version;
  }
  return '0.0.0';
}
