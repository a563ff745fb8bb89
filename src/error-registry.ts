/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'lexer' | 'resource' | 'config';

/**
 * Example demonstrating an error condition.
 * Used by `flatcall --explain` to show common scenarios.
 */
export interface ErrorExample {
  /** Description of the example scenario */
  readonly description: string;
  /** Example input demonstrating the error */
  readonly code: string;
  /** Depth bound the example is tokenized with */
  readonly maxDepth?: number | undefined;
}

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: FLAT-{category letter}{3-digit} (e.g., FLAT-L001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Human-readable description */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  readonly cause?: string | undefined;
  readonly resolution?: string | undefined;
  readonly examples?: readonly ErrorExample[] | undefined;
}

/** Pattern every registered error ID follows */
export const ERROR_ID_PATTERN = /^FLAT-[LXC]\d{3}$/;

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Registry of all error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: readonly ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      idMap.set(def.errorId, def);
    }

    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

const ERROR_DEFINITIONS: readonly ErrorDefinition[] = [
  // Lexer Errors (FLAT-L0xx)
  {
    errorId: 'FLAT-L001',
    category: 'lexer',
    description: 'Unterminated function name',
    messageTemplate: 'Function name was not terminated by "," or "}"',
    cause:
      'Input ended while a function name opened by "{" was still being read.',
    resolution:
      'End the name with "," to start the arguments, or with "}" for a call without arguments.',
    examples: [
      { description: 'Name runs to the end of the input', code: '{upper' },
      { description: 'Nested call whose name is cut off', code: '{f,{g' },
    ],
  },
  {
    errorId: 'FLAT-L002',
    category: 'lexer',
    description: 'Unclosed function',
    messageTemplate: 'Function opened here was never closed with "}"',
    cause:
      'Input ended inside the arguments of at least one function. The outermost open function is reported.',
    resolution:
      'Add the missing "}" characters, or escape a literal "{" as "\\{".',
    examples: [
      { description: 'Missing closing brace', code: '{pad,abc' },
      { description: 'Inner call closed, outer call not', code: '{f,{g,x}' },
    ],
  },
  {
    errorId: 'FLAT-L003',
    category: 'lexer',
    description: 'Dangling escape',
    messageTemplate: 'Escape character "\\" at end of input has nothing to escape',
    cause: 'The last character of the input is an unescaped backslash.',
    resolution: 'Write "\\\\" for a literal backslash, or remove it.',
    examples: [{ description: 'Trailing backslash', code: 'path\\' }],
  },

  // Resource Errors (FLAT-X0xx)
  {
    errorId: 'FLAT-X001',
    category: 'resource',
    description: 'Nesting depth exceeded',
    messageTemplate: 'Function nesting deeper than {limit} levels',
    cause: 'More functions are open at once than the configured maximum depth.',
    resolution:
      'Flatten the expression, or raise maxDepth in the tokenizer options or .flatcall.yaml.',
    examples: [
      { description: 'Depth 3 with maxDepth 2', code: '{a,{b,{c}}}', maxDepth: 2 },
    ],
  },

  // Configuration Errors (FLAT-C0xx)
  {
    errorId: 'FLAT-C001',
    category: 'config',
    description: 'Invalid configuration',
    messageTemplate: 'Invalid configuration in {path}: {reason}',
    cause: 'The configuration file is not valid YAML or has a bad value.',
    resolution:
      'maxDepth must be a positive integer and format one of human, json, compact.',
    examples: [{ description: 'Negative depth', code: 'maxDepth: -1' }],
  },
];

/**
 * Global error registry instance.
 * Read-only singleton initialized at module load.
 */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing placeholders with context values.
 *
 * Placeholder format: {varName}
 * Missing context values render as empty string.
 * Non-string values are coerced via String().
 * Invalid templates (unclosed braces) return template unchanged.
 *
 * @example
 * renderMessage("Function nesting deeper than {limit} levels", { limit: 8 })
 * // Returns: "Function nesting deeper than 8 levels"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{') {
      let j = i + 1;
      while (j < template.length && template.charAt(j) !== '}') {
        j++;
      }

      if (j >= template.length) {
        return template;
      }

      const value = context[template.slice(i + 1, j)];
      if (value !== undefined) {
        result += String(value);
      }

      i = j + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
