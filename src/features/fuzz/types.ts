/** Anything a scorer accepts. null / undefined score 0. */
export type FuzzInput = string | number | bigint | boolean | null | undefined;

export interface FuzzOptions {
  /** Drop non-ASCII characters during processing. Default true. */
  forceAscii?: boolean;
  /**
   * Normalize inputs (strip punctuation, lowercase, trim) and score 0 when nothing is left.
   * Pass false when inputs were already processed with `fullProcess`. Default true.
   */
  fullProcess?: boolean;
}

/** Unicode variants never fold to ASCII. */
export type UnicodeFuzzOptions = Omit<FuzzOptions, 'forceAscii'>;

export type PairScore = (s1: FuzzInput, s2: FuzzInput) => number;
export type ProcessedPairScore = (s1: FuzzInput, s2: FuzzInput, options?: FuzzOptions) => number;
export type UnicodePairScore = (s1: FuzzInput, s2: FuzzInput, options?: UnicodeFuzzOptions) => number;

export interface Fuzz {
  /** Name of the backend the functions are bound to. */
  readonly backend: string;
  ratio: PairScore;
  partialRatio: PairScore;
  tokenSortRatio: ProcessedPairScore;
  partialTokenSortRatio: ProcessedPairScore;
  tokenSetRatio: ProcessedPairScore;
  partialTokenSetRatio: ProcessedPairScore;
  QRatio: ProcessedPairScore;
  UQRatio: UnicodePairScore;
  WRatio: ProcessedPairScore;
  UWRatio: UnicodePairScore;
}
