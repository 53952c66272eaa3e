import { getScorerBackend } from '@/features/backend';
import { createFuzz } from '@/features/fuzz/fuzz';
import { loadConfig } from '@/lib/config';

/** Bound once, from the environment, when the module is first loaded. */
const fuzz = createFuzz(getScorerBackend(loadConfig()));

export const backend = fuzz.backend;
export const {
  ratio,
  partialRatio,
  tokenSortRatio,
  partialTokenSortRatio,
  tokenSetRatio,
  partialTokenSetRatio,
  QRatio,
  UQRatio,
  WRatio,
  UWRatio,
} = fuzz;

export { createFuzz } from '@/features/fuzz/fuzz';
export type {
  Fuzz,
  FuzzInput,
  FuzzOptions,
  UnicodeFuzzOptions,
} from '@/features/fuzz/types';
export { createReferenceBackend, getScorerBackend, REFERENCE_BACKEND } from '@/features/backend';
export type { ScorerBackend } from '@/features/backend';
export { getMatchingBlocks, toSymbols } from '@/features/alignment/sequenceMatcher';
export type { AlignerOptions, MatchingBlock } from '@/features/alignment/sequenceMatcher';
export { fullProcess, validateString } from '@/features/preprocess/fullProcess';
export { roundHalfEven } from '@/features/scoring/rounding';
export { loadConfig, type FuzzConfig } from '@/lib/config';
export { ConfigError, InvalidInputError, describeError } from '@/lib/errors';
