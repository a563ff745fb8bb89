/**
 * CLI Error Explanation
 * Renders a registry entry for --explain and replays each of its examples
 * through the tokenizer (or the config validator) to show what flatcall
 * actually reports on it.
 */

import * as yaml from 'yaml';
import { CONFIG_FILE_NAME, parseConfig } from './cli-config.js';
import {
  describeDiagnostic,
  renderCaretUnderline,
} from './cli-error-formatter.js';
import { ConfigError, ResourceLimitError } from './error-classes.js';
import {
  ERROR_ID_PATTERN,
  ERROR_REGISTRY,
  type ErrorDefinition,
  type ErrorExample,
} from './error-registry.js';
import { tokenize, type TokenizeResult } from './lexer/tokenizer.js';

const INDENT = '    ';

/** Outcome of tokenizing an example input, as caret and summary lines */
function replayInput(example: ErrorExample): string[] {
  let result: TokenizeResult;
  try {
    result = tokenize(example.code, { maxDepth: example.maxDepth });
  } catch (err) {
    if (!(err instanceof ResourceLimitError)) throw err;
    const lines: string[] = [];
    if (err.location) {
      lines.push(' '.repeat(err.location.column - 1) + '^');
    }
    lines.push(`= ${err.message}`);
    return lines;
  }

  if (result.ok) {
    return [`= no error (${result.tokens.length} tokens)`];
  }

  const report = describeDiagnostic(result.diagnostic, example.code);
  const { start } = report.span;
  return [
    renderCaretUnderline(report.span, report.line),
    `= ${result.diagnostic.kind} at ${start.line}:${start.column}`,
  ];
}

/** Outcome of validating an example configuration document */
function replayConfig(example: ErrorExample): string[] {
  try {
    parseConfig(yaml.parse(example.code), CONFIG_FILE_NAME);
  } catch (err) {
    if (err instanceof ConfigError) return [`= ${err.message}`];
    throw err;
  }
  return ['= no error'];
}

function replayExample(
  definition: ErrorDefinition,
  example: ErrorExample
): string[] {
  return definition.category === 'config'
    ? replayConfig(example)
    : replayInput(example);
}

/**
 * Render full error documentation for the --explain command.
 *
 * @param errorId - Error identifier (format: FLAT-{category}{3-digit})
 * @returns Formatted documentation, or null if errorId is invalid or unknown
 *
 * @example
 * explainError("FLAT-L003")
 * // Returns: category, message, cause, resolution and each example
 * // followed by the caret and diagnostic it produces
 */
export function explainError(errorId: string): string | null {
  if (!ERROR_ID_PATTERN.test(errorId)) {
    return null;
  }

  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    return null;
  }

  const sections: string[] = [
    `${definition.errorId}: ${definition.description}`,
    `Category: ${definition.category}`,
    `Message: ${definition.messageTemplate}`,
    '',
  ];

  if (definition.cause) {
    sections.push('Cause:', `  ${definition.cause}`, '');
  }

  if (definition.resolution) {
    sections.push('Resolution:', `  ${definition.resolution}`, '');
  }

  const examples = definition.examples ?? [];
  if (examples.length > 0) {
    sections.push('Examples:');
    for (const example of examples) {
      sections.push(`  ${example.description}`, '');
      for (const line of example.code.split('\n')) {
        sections.push(INDENT + line);
      }
      for (const line of replayExample(definition, example)) {
        sections.push(INDENT + line);
      }
      sections.push('');
    }
  }

  return sections.join('\n').trimEnd();
}
