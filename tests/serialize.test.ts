/**
 * Serializer Tests
 */

import { describe, expect, it } from 'vitest';
import { serializeTokens, tokenizeOrThrow } from '../src/index.js';

describe('serializeTokens', () => {
  it('reproduces plain calls unchanged', () => {
    expect(serializeTokens(tokenizeOrThrow('{}'))).toBe('{}');
    expect(serializeTokens(tokenizeOrThrow('{f,}'))).toBe('{f,}');
    expect(serializeTokens(tokenizeOrThrow('x{f,a,{g}}y'))).toBe('x{f,a,{g}}y');
  });

  it('escapes every structural character value', () => {
    expect(serializeTokens(tokenizeOrThrow('\\a{f,\\,x,{g}}'))).toBe(
      '\\\\a{f,\\,x,{g}}'
    );
  });

  it('escapes top-level , and } that were literal without an escape', () => {
    expect(serializeTokens(tokenizeOrThrow('a,b}'))).toBe('a\\,b\\}');
  });

  it('writes names verbatim', () => {
    expect(serializeTokens(tokenizeOrThrow('{a{\\b,x}'))).toBe('{a{\\b,x}');
  });
});
