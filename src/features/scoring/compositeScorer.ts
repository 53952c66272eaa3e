import type { AlignerOptions } from '@/features/alignment/sequenceMatcher';
import { validateString } from '@/features/preprocess/fullProcess';
import { partialRatio, ratio } from './ratioEngine';
import { roundHalfEven } from './rounding';
import {
  partialTokenSetRatio,
  partialTokenSortRatio,
  tokenSetRatio,
  tokenSortRatio,
} from './tokenNormalizer';

/** Token-based scores never beat an exact-order match. */
const UNBASE_SCALE = 0.95;
/** Length ratio from which partial heuristics are used. */
const PARTIAL_MIN_LENGTH_RATIO = 1.5;
/** Length ratio above which partial scores are discounted harder. */
const LONG_PARTIAL_LENGTH_RATIO = 8;
const PARTIAL_SCALE = 0.9;
const LONG_PARTIAL_SCALE = 0.6;

/**
 * Weighted ratio: the best of the base ratio and the token / partial heuristics, each
 * discounted so only a true full match scores 100.
 *
 * - Comparable lengths (ratio < 1.5): token sort and token set, ×0.95
 * - One string ≥ 1.5× the other: partial, partial token sort and partial token set,
 *   scaled by 0.9 (0.6 when > 8× the other); token variants also ×0.95
 */
export function wRatio(s1: string, s2: string, options: AlignerOptions = {}): number {
  if (!validateString(s1) || !validateString(s2)) return 0;

  const base = ratio(s1, s2, options);
  const len1 = Array.from(s1).length;
  const len2 = Array.from(s2).length;
  const lenRatio = Math.max(len1, len2) / Math.min(len1, len2);

  if (lenRatio < PARTIAL_MIN_LENGTH_RATIO) {
    const tsor = tokenSortRatio(s1, s2, options) * UNBASE_SCALE;
    const tser = tokenSetRatio(s1, s2, options) * UNBASE_SCALE;
    return roundHalfEven(Math.max(base, tsor, tser));
  }

  const partialScale = lenRatio > LONG_PARTIAL_LENGTH_RATIO ? LONG_PARTIAL_SCALE : PARTIAL_SCALE;
  const partial = partialRatio(s1, s2, options) * partialScale;
  const ptsor = partialTokenSortRatio(s1, s2, options) * UNBASE_SCALE * partialScale;
  const ptser = partialTokenSetRatio(s1, s2, options) * UNBASE_SCALE * partialScale;
  return roundHalfEven(Math.max(base, partial, ptsor, ptser));
}
