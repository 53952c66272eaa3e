import {
  compareCodePoints,
  getMatchingBlocks,
  similarity,
  toSymbols,
  type AlignerOptions,
} from '@/features/alignment/sequenceMatcher';
import { toScore } from './rounding';

/** Candidate windows above this are exact substring matches up to float residue. */
const PARTIAL_EXACT_THRESHOLD = 0.995;

/**
 * Full-string similarity score, 0–100. Symmetric: the pair is aligned shorter first
 * (code-point smaller first on equal length), so argument order never picks the tie-break.
 */
export function ratio(s1: string, s2: string, options: AlignerOptions = {}): number {
  if (s1 === s2) return 100;
  if (s1.length === 0 || s2.length === 0) return 0;

  const a = toSymbols(s1);
  const b = toSymbols(s2);
  const swap = a.length > b.length || (a.length === b.length && compareCodePoints(s1, s2) > 0);
  return toScore(swap ? similarity(b, a, options) : similarity(a, b, options));
}

/**
 * Best ratio of the shorter string against an equal-length window of the longer one.
 * Every matching block suggests one window: the one that lines the block up in both strings.
 *
 * e.g. shorter = "abcd", longer = "XXXbcdeEEE" → block (1, 3, 3) → score of "abcd" vs "Xbcd"
 */
export function partialRatio(s1: string, s2: string, options: AlignerOptions = {}): number {
  if (s1 === s2) return 100;
  if (s1.length === 0 || s2.length === 0) return 0;

  const a = toSymbols(s1);
  const b = toSymbols(s2);
  const [shorter, longer] = a.length <= b.length ? [a, b] : [b, a];

  let best = 0;
  for (const block of getMatchingBlocks(shorter, longer, options)) {
    const start = Math.max(block.bIndex - block.aIndex, 0);
    const window = longer.slice(start, start + shorter.length);
    const r = similarity(shorter, window, options);
    if (r > PARTIAL_EXACT_THRESHOLD) return 100;
    if (r > best) best = r;
  }
  return toScore(best);
}
