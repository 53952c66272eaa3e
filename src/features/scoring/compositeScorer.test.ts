import { describe, it, expect } from 'vitest';
import { wRatio } from './compositeScorer';
import { samplePairs } from '@/__tests__/factories/pairFactory';

describe('compositeScorer', () => {
  describe('1. Validation', () => {
    it('should score 0 when either side is empty', () => {
      expect(wRatio('', 'abc')).toBe(0);
      expect(wRatio('abc', '')).toBe(0);
      expect(wRatio('', '')).toBe(0);
    });
  });

  describe('2. Comparable lengths', () => {
    it('should score identical strings 100', () => {
      expect(wRatio('new york mets', 'new york mets')).toBe(100);
    });

    it('should cap token-only matches at 95', () => {
      // base ratio 91, token sort/set 100 × 0.95
      expect(wRatio('fuzzy wuzzy was a bear', 'wuzzy fuzzy was a bear')).toBe(95);
    });

    it('should score unrelated short strings low', () => {
      expect(wRatio('atlanta falcons', 'new york jets')).toBeLessThan(50);
    });
  });

  describe('3. Different lengths', () => {
    it('should scale partial matches by 0.9', () => {
      expect(wRatio('fuzzy', 'the fuzzy bear was here')).toBe(90);
    });

    it('should scale partial matches by 0.6 beyond 8× the length', () => {
      expect(wRatio('ab', 'ab cd ef gh ij kl')).toBe(60);
    });
  });

  describe('4. Bounds', () => {
    it('should stay within 0–100', () => {
      for (const { s1, s2 } of samplePairs()) {
        const score = wRatio(s1, s2);
        expect(score).toBeGreaterThanOrEqual(0);
        expect(score).toBeLessThanOrEqual(100);
      }
    });
  });
});
