#!/usr/bin/env node
/**
 * flatcall CLI - Tokenize brace-call expressions from the command line
 *
 * Usage:
 *   flatcall <file>
 *   flatcall -e '{upper,abc}'
 *   echo '{f,a,b}' | flatcall -
 *   flatcall --explain FLAT-L002
 */

import * as fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { loadConfig } from './cli-config.js';
import { isOutputFormat, type OutputFormat } from './cli-error-formatter.js';
import { explainError } from './cli-explain.js';
import { formatError, formatTokens, readVersion } from './cli-shared.js';
import { TokenizeError } from './error-classes.js';
import {
  tokenizeOrThrow,
  type TokenizerCallbacks,
} from './lexer/tokenizer.js';

// ============================================================
// ARGUMENTS
// ============================================================

export type InputSource =
  | { readonly kind: 'file'; readonly path: string }
  | { readonly kind: 'inline'; readonly text: string }
  | { readonly kind: 'stdin' };

export type ParsedArgs =
  | { readonly mode: 'help' }
  | { readonly mode: 'version' }
  | { readonly mode: 'explain'; readonly errorId: string }
  | {
      readonly mode: 'tokenize';
      readonly input: InputSource;
      readonly format: OutputFormat | undefined;
      readonly maxDepth: number | undefined;
      readonly configPath: string | undefined;
      readonly trace: boolean;
      readonly verbose: boolean;
    };

const VALUE_FLAGS = ['-e', '--format', '--max-depth', '--config', '--explain'];
const BOOLEAN_FLAGS = [
  '--help',
  '-h',
  '--version',
  '-v',
  '--trace',
  '--verbose',
];

/**
 * Parse command-line arguments into structured command
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 * @throws {Error} Unknown option, missing or invalid flag value
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const values = new Map<string, string>();
  const flags = new Set<string>();
  const positionals: string[] = [];

  // A value flag consumes the next argument, so `-e -h` tokenizes "-h"
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    if (VALUE_FLAGS.includes(arg)) {
      const value = argv[i + 1];
      if (value === undefined) {
        throw new Error(`Missing value after ${arg}`);
      }
      values.set(arg, value);
      i++;
    } else if (BOOLEAN_FLAGS.includes(arg)) {
      flags.add(arg);
    } else if (arg.startsWith('-') && arg !== '-') {
      throw new Error(`Unknown option: ${arg}`);
    } else {
      positionals.push(arg);
    }
  }

  if (flags.has('--help') || flags.has('-h')) {
    return { mode: 'help' };
  }
  if (flags.has('--version') || flags.has('-v')) {
    return { mode: 'version' };
  }

  const errorId = values.get('--explain');
  if (errorId !== undefined) {
    return { mode: 'explain', errorId };
  }

  const formatValue = values.get('--format');
  if (formatValue !== undefined && !isOutputFormat(formatValue)) {
    throw new Error(
      `Invalid --format value: ${formatValue}. Must be one of: human, json, compact`
    );
  }

  let maxDepth: number | undefined;
  const depthValue = values.get('--max-depth');
  if (depthValue !== undefined) {
    maxDepth = Number(depthValue);
    if (!Number.isInteger(maxDepth) || maxDepth < 1) {
      throw new Error('--max-depth must be a positive integer');
    }
  }

  const inline = values.get('-e');
  let input: InputSource;
  if (inline !== undefined) {
    if (positionals.length > 0) {
      throw new Error('Cannot combine -e with an input file');
    }
    input = { kind: 'inline', text: inline };
  } else {
    const [first, ...rest] = positionals;
    if (first === undefined) {
      return { mode: 'help' };
    }
    if (rest.length > 0) {
      throw new Error(`Unexpected argument: ${rest[0]}`);
    }
    input = first === '-' ? { kind: 'stdin' } : { kind: 'file', path: first };
  }

  return {
    mode: 'tokenize',
    input,
    format: formatValue,
    maxDepth,
    configPath: values.get('--config'),
    trace: flags.has('--trace'),
    verbose: flags.has('--verbose'),
  };
}

// ============================================================
// EXECUTION
// ============================================================

/** Process boundary of the CLI, replaced in tests */
export interface CliIO {
  readonly cwd: string;
  stdout(text: string): void;
  stderr(text: string): void;
  readFile(path: string): string;
  readStdin(): string;
}

export const EXIT_OK = 0;
export const EXIT_DIAGNOSTIC = 1;
export const EXIT_FAILURE = 2;

const HELP = `flatcall - tokenize brace-call expressions

Usage:
  flatcall <file>              Tokenize a file
  flatcall -e <expression>     Tokenize an inline expression
  flatcall -                   Tokenize stdin
  flatcall --explain <ID>      Explain an error ID (e.g. FLAT-L002)

Options:
  --format <human|json|compact>  Output format (default: human)
  --max-depth <n>                Maximum function nesting depth
  --config <path>                Configuration file (default: ./.flatcall.yaml)
  --trace                        Log function open/close events to stderr
  --verbose                      Include resolution hints in diagnostics
  -h, --help                     Show this help message
  -v, --version                  Show version information`;

function readInput(input: InputSource, io: CliIO): string {
  switch (input.kind) {
    case 'inline':
      return input.text;
    case 'stdin':
      return io.readStdin();
    case 'file':
      return io.readFile(input.path);
  }
}

function traceCallbacks(io: CliIO): TokenizerCallbacks {
  return {
    onFunctionOpen: (event) =>
      io.stderr(
        `trace: open #${event.index} at ${event.offset} depth=${event.depth}`
      ),
    onFunctionClose: (event) =>
      io.stderr(
        `trace: close #${event.index} ${JSON.stringify(event.name)} args=${event.numArgs} end=+${event.delta} depth=${event.depth}`
      ),
    onDiagnostic: (diagnostic) =>
      io.stderr(`trace: ${diagnostic.kind} at ${diagnostic.offset}`),
  };
}

/**
 * Run the CLI and return its exit code.
 *
 * Exit codes: 0 tokenized, 1 syntax diagnostic, 2 usage, configuration,
 * resource or I/O failure.
 */
export function runCli(argv: readonly string[], io: CliIO): number {
  let format: OutputFormat = 'human';
  let verbose = false;
  let source: string | undefined;

  try {
    const command = parseArgs(argv);

    if (command.mode === 'help') {
      io.stdout(HELP);
      return EXIT_OK;
    }
    if (command.mode === 'version') {
      io.stdout(`flatcall ${readVersion()}`);
      return EXIT_OK;
    }
    if (command.mode === 'explain') {
      const doc = explainError(command.errorId);
      if (doc === null) {
        io.stderr(`Unknown error ID: ${command.errorId}`);
        return EXIT_FAILURE;
      }
      io.stdout(doc);
      return EXIT_OK;
    }

    const config = loadConfig(io.cwd, command.configPath);
    format = command.format ?? config.format ?? 'human';
    verbose = command.verbose;

    source = readInput(command.input, io);
    const tokens = tokenizeOrThrow(source, {
      maxDepth: command.maxDepth ?? config.maxDepth,
      observability: command.trace ? traceCallbacks(io) : undefined,
    });

    io.stdout(formatTokens(tokens, format));
    return EXIT_OK;
  } catch (err) {
    if (!(err instanceof Error)) {
      io.stderr(String(err));
      return EXIT_FAILURE;
    }
    io.stderr(formatError(err, source, { format, verbose }));
    return err instanceof TokenizeError ? EXIT_DIAGNOSTIC : EXIT_FAILURE;
  }
}

/**
 * Entry point for the flatcall binary
 */
function main(): void {
  const io: CliIO = {
    cwd: process.cwd(),
    stdout: (text) => console.log(text),
    stderr: (text) => console.error(text),
    readFile: (path) => fs.readFileSync(path, 'utf-8'),
    readStdin: () => fs.readFileSync(0, 'utf-8'),
  };
  process.exitCode = runCli(process.argv.slice(2), io);
}

// Only run when executed directly, not when imported by tests
const entry = process.argv[1];
if (
  entry !== undefined &&
  fs.existsSync(entry) &&
  fs.realpathSync(entry) === fileURLToPath(import.meta.url)
) {
  main();
}
