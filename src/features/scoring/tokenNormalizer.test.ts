import { describe, it, expect } from 'vitest';
import {
  partialTokenSetRatio,
  partialTokenSortRatio,
  sortTokens,
  tokenize,
  tokenSetParts,
  tokenSetRatio,
  tokenSortRatio,
} from './tokenNormalizer';
import { createReorderedPair } from '@/__tests__/factories/pairFactory';

describe('tokenNormalizer', () => {
  describe('1. Tokens', () => {
    it('should split on any whitespace run', () => {
      expect(tokenize('  new\tyork \n mets ')).toEqual(['new', 'york', 'mets']);
      expect(tokenize('   ')).toEqual([]);
    });

    it('should sort and rejoin tokens', () => {
      expect(sortTokens('  york new  mets ')).toBe('mets new york');
      expect(sortTokens('')).toBe('');
    });

    it('should sort by code point so astral tokens follow fullwidth ones', () => {
      expect(sortTokens('𠀀 ｚa')).toBe('ｚa 𠀀');
      expect(sortTokens('𠀀a a')).toBe('a 𠀀a');
    });
  });

  describe('2. Token sort', () => {
    it('should ignore token order', () => {
      const { s1, s2 } = createReorderedPair();
      expect(tokenSortRatio(s1, s2)).toBe(100);
    });

    it('should score astral and fullwidth tokens in code-point order', () => {
      // "ｚa 𠀀" vs "a 𠀀a": shared run "a 𠀀", 2·3 / 8
      expect(tokenSortRatio('𠀀 ｚa', '𠀀a a')).toBe(75);
    });

    it('should use partial ratio for the partial variant', () => {
      expect(partialTokenSortRatio('bear fuzzy', 'was a fuzzy bear here')).toBe(100);
    });
  });

  describe('3. Token set parts', () => {
    it('should split shared and extra tokens', () => {
      expect(tokenSetParts('a b c', 'b a d d')).toEqual({
        sect: 'a b',
        combined1: 'a b c',
        combined2: 'a b d',
      });
    });

    it('should not leave a leading space when nothing is shared', () => {
      expect(tokenSetParts('x', 'y')).toEqual({ sect: '', combined1: 'x', combined2: 'y' });
    });
  });

  describe('4. Token set', () => {
    it('should short-circuit equal and empty inputs', () => {
      expect(tokenSetRatio('same', 'same')).toBe(100);
      expect(tokenSetRatio('', '')).toBe(100);
      expect(tokenSetRatio('', 'a')).toBe(0);
      expect(partialTokenSetRatio('a', '')).toBe(0);
    });

    it('should ignore repeated tokens where token sort penalizes them', () => {
      const s1 = 'new york mets';
      const s2 = 'new new york york mets mets';
      const set = tokenSetRatio(s1, s2);
      const sorted = tokenSortRatio(s1, s2);
      expect(set).toBe(100);
      expect(sorted).toBeLessThan(100);
      expect(set).toBeGreaterThanOrEqual(sorted);
    });

    it('should score a subset of tokens as a full match', () => {
      expect(tokenSetRatio('fuzzy was a bear', 'fuzzy fuzzy was a bear')).toBe(100);
      expect(partialTokenSetRatio('mets', 'new york mets')).toBe(100);
    });

    it('should score 0 for disjoint single tokens', () => {
      expect(tokenSetRatio('abc', 'xyz')).toBe(0);
    });
  });
});
