/**
 * Lexer Tests: Tokenizer
 * Token shapes, offsets and delta back-patching for successful inputs
 */

import { describe, expect, it } from 'vitest';
import { tokenize, type Token } from '../../src/index.js';

function tokensOf(source: string): readonly Token[] {
  const result = tokenize(source);
  if (!result.ok) {
    throw new Error(`unexpected diagnostic ${result.diagnostic.kind}`);
  }
  return result.tokens;
}

describe('Lexer: Tokenizer', () => {
  describe('Literal text', () => {
    it('emits one character token per unit', () => {
      expect(tokensOf('abc')).toEqual([
        { type: 'character', offset: 0, value: 'a' },
        { type: 'character', offset: 1, value: 'b' },
        { type: 'character', offset: 2, value: 'c' },
      ]);
    });

    it('returns an empty sequence for empty input', () => {
      expect(tokensOf('')).toEqual([]);
    });

    it('treats top-level , and } as literals', () => {
      expect(tokensOf('a,b}').map((t) => t.type)).toEqual([
        'character',
        'character',
        'character',
        'character',
      ]);
      expect(tokensOf('a,b}')[1]).toEqual({
        type: 'character',
        offset: 1,
        value: ',',
      });
    });

    it('keeps a surrogate pair as one unit', () => {
      expect(tokensOf('{f,😀}')).toEqual([
        {
          type: 'function',
          offset: 0,
          name: 'f',
          nameOffset: 1,
          numArgs: 1,
          delta: 3,
          firstArgDelta: 2,
        },
        { type: 'character', offset: 3, value: '😀' },
        { type: 'end-arg', offset: 5, delta: undefined },
      ]);
    });
  });

  describe('Functions without arguments', () => {
    it('tokenizes {} as one function with an empty name', () => {
      expect(tokensOf('{}')).toEqual([
        {
          type: 'function',
          offset: 0,
          name: '',
          nameOffset: 1,
          numArgs: 0,
          delta: 1,
          firstArgDelta: undefined,
        },
      ]);
    });

    it('tokenizes {test} with its name', () => {
      const [fn] = tokensOf('{test}');
      expect(fn).toEqual({
        type: 'function',
        offset: 0,
        name: 'test',
        nameOffset: 1,
        numArgs: 0,
        delta: 1,
        firstArgDelta: undefined,
      });
    });

    it('tokenizes adjacent calls independently', () => {
      expect(tokensOf('{a}{b}')).toEqual([
        {
          type: 'function',
          offset: 0,
          name: 'a',
          nameOffset: 1,
          numArgs: 0,
          delta: 1,
          firstArgDelta: undefined,
        },
        {
          type: 'function',
          offset: 3,
          name: 'b',
          nameOffset: 4,
          numArgs: 0,
          delta: 1,
          firstArgDelta: undefined,
        },
      ]);
    });
  });

  describe('Arguments', () => {
    it('tokenizes {test,abc}', () => {
      expect(tokensOf('{test,abc}')).toEqual([
        {
          type: 'function',
          offset: 0,
          name: 'test',
          nameOffset: 1,
          numArgs: 1,
          delta: 5,
          firstArgDelta: 4,
        },
        { type: 'character', offset: 6, value: 'a' },
        { type: 'character', offset: 7, value: 'b' },
        { type: 'character', offset: 8, value: 'c' },
        { type: 'end-arg', offset: 9, delta: undefined },
      ]);
    });

    it('links sibling arguments in {f,a,b}', () => {
      expect(tokensOf('{f,a,b}')).toEqual([
        {
          type: 'function',
          offset: 0,
          name: 'f',
          nameOffset: 1,
          numArgs: 2,
          delta: 5,
          firstArgDelta: 2,
        },
        { type: 'character', offset: 3, value: 'a' },
        { type: 'end-arg', offset: 4, delta: 2 },
        { type: 'character', offset: 5, value: 'b' },
        { type: 'end-arg', offset: 6, delta: undefined },
      ]);
    });

    it('counts a trailing empty argument in {f,}', () => {
      expect(tokensOf('{f,}')).toEqual([
        {
          type: 'function',
          offset: 0,
          name: 'f',
          nameOffset: 1,
          numArgs: 1,
          delta: 2,
          firstArgDelta: 1,
        },
        { type: 'end-arg', offset: 3, delta: undefined },
      ]);
    });

    it('counts an empty name with one empty argument in {,}', () => {
      expect(tokensOf('{,}')).toEqual([
        {
          type: 'function',
          offset: 0,
          name: '',
          nameOffset: 1,
          numArgs: 1,
          delta: 2,
          firstArgDelta: 1,
        },
        { type: 'end-arg', offset: 2, delta: undefined },
      ]);
    });

    it('chains consecutive empty arguments in {f,,}', () => {
      expect(tokensOf('{f,,}')).toEqual([
        {
          type: 'function',
          offset: 0,
          name: 'f',
          nameOffset: 1,
          numArgs: 2,
          delta: 3,
          firstArgDelta: 1,
        },
        { type: 'end-arg', offset: 3, delta: 1 },
        { type: 'end-arg', offset: 4, delta: undefined },
      ]);
    });
  });

  describe('Nesting', () => {
    it('resolves an inner call before the outer argument continues', () => {
      const tokens = tokensOf('{outer,{inner,a,b},1,2}z');
      expect(tokens).toHaveLength(12);
      expect(tokens[0]).toEqual({
        type: 'function',
        offset: 0,
        name: 'outer',
        nameOffset: 1,
        numArgs: 3,
        delta: 11,
        firstArgDelta: 6,
      });
      expect(tokens[1]).toEqual({
        type: 'function',
        offset: 7,
        name: 'inner',
        nameOffset: 8,
        numArgs: 2,
        delta: 5,
        firstArgDelta: 2,
      });
      expect(tokens.slice(2)).toEqual([
        { type: 'character', offset: 14, value: 'a' },
        { type: 'end-arg', offset: 15, delta: 2 },
        { type: 'character', offset: 16, value: 'b' },
        { type: 'end-arg', offset: 17, delta: undefined },
        { type: 'end-arg', offset: 18, delta: 2 },
        { type: 'character', offset: 19, value: '1' },
        { type: 'end-arg', offset: 20, delta: 2 },
        { type: 'character', offset: 21, value: '2' },
        { type: 'end-arg', offset: 22, delta: undefined },
        { type: 'character', offset: 23, value: 'z' },
      ]);
    });

    it('accepts { inside a name as a literal name unit', () => {
      const [fn] = tokensOf('{a{b}');
      expect(fn).toMatchObject({ type: 'function', name: 'a{b', numArgs: 0 });
    });
  });

  describe('Escapes', () => {
    it('resolves escaped structural units to one character at the escape offset', () => {
      expect(tokensOf(',\\{{a,\\,}')).toEqual([
        { type: 'character', offset: 0, value: ',' },
        { type: 'character', offset: 1, value: '{' },
        {
          type: 'function',
          offset: 3,
          name: 'a',
          nameOffset: 4,
          numArgs: 1,
          delta: 3,
          firstArgDelta: 2,
        },
        { type: 'character', offset: 6, value: ',' },
        { type: 'end-arg', offset: 8, delta: undefined },
      ]);
    });

    it('passes non-escapable units through as two characters', () => {
      expect(tokensOf('\\a\\n\\{')).toEqual([
        { type: 'character', offset: 0, value: '\\' },
        { type: 'character', offset: 1, value: 'a' },
        { type: 'character', offset: 2, value: '\\' },
        { type: 'character', offset: 3, value: 'n' },
        { type: 'character', offset: 4, value: '{' },
      ]);
    });

    it('does not open a function for \\{ at top level', () => {
      expect(tokensOf('\\{a')).toEqual([
        { type: 'character', offset: 0, value: '{' },
        { type: 'character', offset: 2, value: 'a' },
      ]);
    });

    it('keeps an escaped } inside an argument', () => {
      expect(tokensOf('{f,\\}}')).toEqual([
        {
          type: 'function',
          offset: 0,
          name: 'f',
          nameOffset: 1,
          numArgs: 1,
          delta: 3,
          firstArgDelta: 2,
        },
        { type: 'character', offset: 3, value: '}' },
        { type: 'end-arg', offset: 5, delta: undefined },
      ]);
    });

    it('takes the escape character verbatim inside a name', () => {
      const tokens = tokensOf('{a\\b,x}');
      expect(tokens[0]).toMatchObject({ name: 'a\\b', numArgs: 1 });
      expect(tokens[1]).toEqual({ type: 'character', offset: 5, value: 'x' });
    });
  });

  describe('Result', () => {
    it('returns a frozen sequence of frozen tokens', () => {
      const tokens = tokensOf('{f,a}');
      expect(Object.isFrozen(tokens)).toBe(true);
      expect(tokens.every((token) => Object.isFrozen(token))).toBe(true);
    });
  });
});
