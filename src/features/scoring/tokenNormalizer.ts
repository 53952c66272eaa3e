import { compareCodePoints, type AlignerOptions } from '@/features/alignment/sequenceMatcher';
import { validateString } from '@/features/preprocess/fullProcess';
import { partialRatio, ratio } from './ratioEngine';

type PairScorer = (s1: string, s2: string, options?: AlignerOptions) => number;

export function tokenize(s: string): string[] {
  return s.split(/\s+/).filter((t) => t.length > 0);
}

function joinSorted(tokens: Iterable<string>): string {
  return Array.from(tokens).sort(compareCodePoints).join(' ');
}

/** Tokens sorted and re-joined with single spaces. */
export function sortTokens(s: string): string {
  return joinSorted(tokenize(s)).trim();
}

// Token sort: alphabetize tokens on both sides so word order stops mattering.
function tokenSort(s1: string, s2: string, scorer: PairScorer, options: AlignerOptions): number {
  return scorer(sortTokens(s1), sortTokens(s2), options);
}

export function tokenSortRatio(s1: string, s2: string, options: AlignerOptions = {}): number {
  return tokenSort(s1, s2, ratio, options);
}

export function partialTokenSortRatio(s1: string, s2: string, options: AlignerOptions = {}): number {
  return tokenSort(s1, s2, partialRatio, options);
}

export interface TokenSetParts {
  /** Sorted shared tokens. */
  sect: string;
  /** sect followed by the sorted tokens only s1 has. */
  combined1: string;
  /** sect followed by the sorted tokens only s2 has. */
  combined2: string;
}

export function tokenSetParts(s1: string, s2: string): TokenSetParts {
  const tokens1 = new Set(tokenize(s1));
  const tokens2 = new Set(tokenize(s2));

  const intersection = [...tokens1].filter((t) => tokens2.has(t));
  const diff1to2 = [...tokens1].filter((t) => !tokens2.has(t));
  const diff2to1 = [...tokens2].filter((t) => !tokens1.has(t));

  const sect = joinSorted(intersection);
  return {
    sect: sect.trim(),
    combined1: `${sect} ${joinSorted(diff1to2)}`.trim(),
    combined2: `${sect} ${joinSorted(diff2to1)}`.trim(),
  };
}

/**
 * Token set: compare the shared vocabulary against each side's full vocabulary,
 * so extra or repeated tokens on one side cost less than in a plain ratio.
 */
function tokenSet(s1: string, s2: string, scorer: PairScorer, options: AlignerOptions): number {
  if (s1 === s2) return 100;
  if (!validateString(s1) || !validateString(s2)) return 0;

  const { sect, combined1, combined2 } = tokenSetParts(s1, s2);
  return Math.max(
    scorer(sect, combined1, options),
    scorer(sect, combined2, options),
    scorer(combined1, combined2, options)
  );
}

export function tokenSetRatio(s1: string, s2: string, options: AlignerOptions = {}): number {
  return tokenSet(s1, s2, ratio, options);
}

export function partialTokenSetRatio(s1: string, s2: string, options: AlignerOptions = {}): number {
  return tokenSet(s1, s2, partialRatio, options);
}
