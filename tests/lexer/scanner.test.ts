/**
 * Lexer Tests: Scanner
 * Unit classification per scan mode
 */

import { describe, expect, it } from 'vitest';
import { createScannerState, scanUnit } from '../../src/lexer/index.js';

describe('Lexer: Scanner', () => {
  describe('Structural units by mode', () => {
    it('opens a function on { outside names', () => {
      expect(scanUnit(createScannerState('{'), 'top')).toEqual({
        kind: 'open',
        offset: 0,
      });
      expect(scanUnit(createScannerState('{'), 'argument')).toEqual({
        kind: 'open',
        offset: 0,
      });
    });

    it('treats , and } as literals at top level', () => {
      expect(scanUnit(createScannerState(','), 'top')).toEqual({
        kind: 'literal',
        value: ',',
        offset: 0,
      });
      expect(scanUnit(createScannerState('}'), 'top')).toEqual({
        kind: 'literal',
        value: '}',
        offset: 0,
      });
    });

    it('classifies , and } as structural inside arguments', () => {
      expect(scanUnit(createScannerState(','), 'argument')).toEqual({
        kind: 'separator',
        offset: 0,
      });
      expect(scanUnit(createScannerState('}'), 'argument')).toEqual({
        kind: 'close',
        offset: 0,
      });
    });

    it('only recognizes , and } while scanning a name', () => {
      expect(scanUnit(createScannerState('{'), 'name')).toEqual({
        kind: 'literal',
        value: '{',
        offset: 0,
      });
      expect(scanUnit(createScannerState('\\,'), 'name')).toEqual({
        kind: 'literal',
        value: '\\',
        offset: 0,
      });
      expect(scanUnit(createScannerState('}'), 'name')).toEqual({
        kind: 'close',
        offset: 0,
      });
    });
  });

  describe('Escapes', () => {
    it('consumes the escape and the escaped unit together', () => {
      const state = createScannerState('\\{x');
      expect(scanUnit(state, 'argument')).toEqual({
        kind: 'escape',
        value: '{',
        offset: 1,
        escapeOffset: 0,
        structural: true,
      });
      expect(state.pos).toBe(2);
    });

    it('marks escapes of ordinary units as non-structural', () => {
      expect(scanUnit(createScannerState('\\a'), 'top')).toEqual({
        kind: 'escape',
        value: 'a',
        offset: 1,
        escapeOffset: 0,
        structural: false,
      });
    });

    it('reports a dangling escape at the input length', () => {
      expect(scanUnit(createScannerState('\\'), 'top')).toEqual({
        kind: 'dangling-escape',
        offset: 1,
      });
    });
  });

  describe('End of input', () => {
    it('returns end without advancing', () => {
      const state = createScannerState('a');
      scanUnit(state, 'top');
      expect(scanUnit(state, 'top')).toEqual({ kind: 'end', offset: 1 });
      expect(state.pos).toBe(1);
    });

    it('advances past a surrogate pair in one step', () => {
      const state = createScannerState('😀x');
      expect(scanUnit(state, 'top')).toEqual({
        kind: 'literal',
        value: '😀',
        offset: 0,
      });
      expect(state.pos).toBe(2);
    });
  });
});
