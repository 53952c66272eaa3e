import type { AlignerOptions } from '@/features/alignment/sequenceMatcher';
import { wRatio } from '@/features/scoring/compositeScorer';
import { partialRatio, ratio } from '@/features/scoring/ratioEngine';
import {
  partialTokenSetRatio,
  partialTokenSortRatio,
  tokenSetRatio,
  tokenSortRatio,
} from '@/features/scoring/tokenNormalizer';
import type { ScorerBackend } from './types';

export const REFERENCE_BACKEND = 'reference';

/** The pure alignment implementation, with aligner options fixed at construction. */
export function createReferenceBackend(options: AlignerOptions = {}): ScorerBackend {
  const aligner: AlignerOptions = { autojunk: options.autojunk ?? true };
  return {
    name: REFERENCE_BACKEND,
    ratio: (s1, s2) => ratio(s1, s2, aligner),
    partialRatio: (s1, s2) => partialRatio(s1, s2, aligner),
    tokenSortRatio: (s1, s2) => tokenSortRatio(s1, s2, aligner),
    partialTokenSortRatio: (s1, s2) => partialTokenSortRatio(s1, s2, aligner),
    tokenSetRatio: (s1, s2) => tokenSetRatio(s1, s2, aligner),
    partialTokenSetRatio: (s1, s2) => partialTokenSetRatio(s1, s2, aligner),
    wRatio: (s1, s2) => wRatio(s1, s2, aligner),
  };
}
