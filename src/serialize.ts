/**
 * Token Serializer
 * Reconstructs source text that tokenizes back to the same structure
 */

import {
  ARGUMENT_SEPARATOR,
  ESCAPE,
  FUNCTION_CLOSE,
  FUNCTION_OPEN,
  isEscapable,
} from './lexer/scanner.js';
import type { Token } from './lexer/tokens.js';

/**
 * Serialize tokens in one pass.
 *
 * Every `\ { , }` character value is escaped, so offsets of the
 * re-tokenized output differ from the original wherever an escape is added.
 */
export function serializeTokens(tokens: readonly Token[]): string {
  let out = '';

  for (const token of tokens) {
    switch (token.type) {
      case 'function':
        out += FUNCTION_OPEN + token.name;
        out += token.numArgs === 0 ? FUNCTION_CLOSE : ARGUMENT_SEPARATOR;
        break;
      case 'character':
        out += isEscapable(token.value) ? ESCAPE + token.value : token.value;
        break;
      case 'end-arg':
        out += token.delta === undefined ? FUNCTION_CLOSE : ARGUMENT_SEPARATOR;
        break;
    }
  }

  return out;
}
