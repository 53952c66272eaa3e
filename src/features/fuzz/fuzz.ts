/**
 * Public scoring API. Each entry point runs the same guards, in order:
 * null check → coercion → optional full processing (with validation) → backend primitive.
 */
import type { ScorerBackend } from '@/features/backend/types';
import { coerceToText, fullProcess, validateString } from '@/features/preprocess/fullProcess';
import type { Fuzz, FuzzInput, FuzzOptions, ProcessedPairScore } from './types';

interface ResolvedOptions {
  forceAscii: boolean;
  fullProcess: boolean;
}

function resolveOptions(options: FuzzOptions = {}): ResolvedOptions {
  return {
    forceAscii: options.forceAscii ?? true,
    fullProcess: options.fullProcess ?? true,
  };
}

function prepare(value: string | number | bigint | boolean, opts: ResolvedOptions): string {
  return opts.fullProcess ? fullProcess(value, { forceAscii: opts.forceAscii }) : coerceToText(value);
}

/** Build the public API over one backend. */
export function createFuzz(backend: ScorerBackend): Fuzz {
  const raw =
    (primitive: (s1: string, s2: string) => number) =>
    (s1: FuzzInput, s2: FuzzInput): number => {
      if (s1 == null || s2 == null) return 0;
      return primitive(coerceToText(s1), coerceToText(s2));
    };

  // Token family: an input that processes to nothing scores 0 instead of reaching the aligner.
  const processed =
    (primitive: (s1: string, s2: string) => number): ProcessedPairScore =>
    (s1, s2, options) => {
      if (s1 == null || s2 == null) return 0;
      const opts = resolveOptions(options);
      const p1 = prepare(s1, opts);
      const p2 = prepare(s2, opts);
      if (opts.fullProcess && (!validateString(p1) || !validateString(p2))) return 0;
      return primitive(p1, p2);
    };

  const QRatio: ProcessedPairScore = (s1, s2, options) => {
    if (s1 == null || s2 == null) return 0;
    const opts = resolveOptions(options);
    const p1 = prepare(s1, opts);
    const p2 = prepare(s2, opts);
    if (!validateString(p1) || !validateString(p2)) return 0;
    return backend.ratio(p1, p2);
  };

  const WRatio: ProcessedPairScore = (s1, s2, options) => {
    if (s1 == null || s2 == null) return 0;
    const opts = resolveOptions(options);
    return backend.wRatio(prepare(s1, opts), prepare(s2, opts));
  };

  return {
    backend: backend.name,
    ratio: raw((s1, s2) => backend.ratio(s1, s2)),
    partialRatio: raw((s1, s2) => backend.partialRatio(s1, s2)),
    tokenSortRatio: processed((s1, s2) => backend.tokenSortRatio(s1, s2)),
    partialTokenSortRatio: processed((s1, s2) => backend.partialTokenSortRatio(s1, s2)),
    tokenSetRatio: processed((s1, s2) => backend.tokenSetRatio(s1, s2)),
    partialTokenSetRatio: processed((s1, s2) => backend.partialTokenSetRatio(s1, s2)),
    QRatio,
    UQRatio: (s1, s2, options = {}) => QRatio(s1, s2, { ...options, forceAscii: false }),
    WRatio,
    UWRatio: (s1, s2, options = {}) => WRatio(s1, s2, { ...options, forceAscii: false }),
  };
}
