/**
 * Token Navigation
 * Consumer-side helpers that walk a token sequence by index + delta only
 */

import type { EndArgToken, FunctionToken, Token } from './lexer/tokens.js';

/** Half-open range [start, end) of token indices */
export interface TokenRange {
  readonly start: number;
  readonly end: number;
}

function tokenAt(tokens: readonly Token[], index: number): Token {
  const token = tokens[index];
  if (token === undefined) {
    throw new RangeError(
      `Token index ${index} out of range (length ${tokens.length})`
    );
  }
  return token;
}

function functionAt(tokens: readonly Token[], index: number): FunctionToken {
  const token = tokenAt(tokens, index);
  if (token.type !== 'function') {
    throw new TypeError(`Expected function token at ${index}, got ${token.type}`);
  }
  return token;
}

function endArgAt(tokens: readonly Token[], index: number): EndArgToken {
  const token = tokenAt(tokens, index);
  if (token.type !== 'end-arg') {
    throw new TypeError(`Expected end-arg token at ${index}, got ${token.type}`);
  }
  return token;
}

/** Index one past the subtree starting at `index` */
export function subtreeEnd(tokens: readonly Token[], index: number): number {
  const token = tokenAt(tokens, index);
  return token.type === 'function' ? index + token.delta : index + 1;
}

/** Indices of the end-arg chain of the function at `index`, in argument order */
export function argumentEnds(
  tokens: readonly Token[],
  index: number
): number[] {
  const fn = functionAt(tokens, index);
  const ends: number[] = [];
  if (fn.firstArgDelta === undefined) return ends;

  let current = index + fn.firstArgDelta;
  for (;;) {
    const endArg = endArgAt(tokens, current);
    ends.push(current);
    if (endArg.delta === undefined) return ends;
    if (endArg.delta < 1) {
      throw new RangeError(`End-arg delta at ${current} does not advance`);
    }
    current += endArg.delta;
  }
}

/** Content range of each argument of the function at `index` */
export function argumentRanges(
  tokens: readonly Token[],
  index: number
): TokenRange[] {
  const ranges: TokenRange[] = [];
  let start = index + 1;
  for (const end of argumentEnds(tokens, index)) {
    ranges.push({ start, end });
    start = end + 1;
  }
  return ranges;
}

/** Indices of tokens not owned by any function */
export function topLevelIndices(tokens: readonly Token[]): number[] {
  const indices: number[] = [];
  let index = 0;
  while (index < tokens.length) {
    indices.push(index);
    index = subtreeEnd(tokens, index);
  }
  return indices;
}

// ============================================================
// SEQUENCE CHECK
// ============================================================

/**
 * Check the delta invariants of a sequence.
 * Returns one message per violation; empty for a well-formed sequence.
 *
 * A function's source span runs from its `{` through the `}` that closed
 * it: the last end-arg's offset, or the end of the name without arguments.
 * The token after the subtree must start past that `}`.
 */
export function checkTokenSequence(tokens: readonly Token[]): string[] {
  const violations: string[] = [];
  let previousOffset = -1;

  const checkFollower = (index: number, end: number, closeOffset: number) => {
    const follower = tokens[end];
    if (follower !== undefined && follower.offset <= closeOffset) {
      violations.push(
        `function ${index}: token ${end} at offset ${follower.offset} is inside the span ending at ${closeOffset}`
      );
    }
  };

  tokens.forEach((token, index) => {
    if (token.offset < previousOffset) {
      violations.push(`token ${index}: offset ${token.offset} decreases`);
    }
    previousOffset = token.offset;

    if (token.type !== 'function') return;

    const end = index + token.delta;
    if (token.delta < 1 || end > tokens.length) {
      violations.push(`function ${index}: delta ${token.delta} out of range`);
      return;
    }
    if ((token.firstArgDelta === undefined) !== (token.numArgs === 0)) {
      violations.push(
        `function ${index}: firstArgDelta must be absent iff numArgs is 0`
      );
      return;
    }
    if (token.firstArgDelta === undefined) {
      if (token.delta !== 1) {
        violations.push(`function ${index}: no arguments but delta ${token.delta}`);
        return;
      }
      checkFollower(index, end, token.nameOffset + token.name.length);
      return;
    }

    let count = 0;
    let current = index + token.firstArgDelta;
    for (;;) {
      const link = tokens[current];
      if (current >= end || link?.type !== 'end-arg') {
        violations.push(`function ${index}: end-arg chain leaves its subtree at ${current}`);
        return;
      }
      count++;
      if (link.delta === undefined) break;
      if (link.delta < 1) {
        violations.push(`end-arg ${current}: delta ${link.delta} does not advance`);
        return;
      }
      current += link.delta;
    }
    if (count !== token.numArgs) {
      violations.push(
        `function ${index}: numArgs ${token.numArgs} but chain has ${count}`
      );
    }
    if (current !== end - 1) {
      violations.push(`function ${index}: last end-arg ${current} is not at ${end - 1}`);
      return;
    }
    const last = tokens[current];
    if (last !== undefined) {
      checkFollower(index, end, last.offset);
    }
  });

  return violations;
}
