/**
 * Primitive scorers over already-coerced strings. Any implementation must give the same
 * score as the reference backend for every input pair.
 */
export interface ScorerBackend {
  readonly name: string;
  ratio(s1: string, s2: string): number;
  partialRatio(s1: string, s2: string): number;
  tokenSortRatio(s1: string, s2: string): number;
  partialTokenSortRatio(s1: string, s2: string): number;
  tokenSetRatio(s1: string, s2: string): number;
  partialTokenSetRatio(s1: string, s2: string): number;
  wRatio(s1: string, s2: string): number;
}
