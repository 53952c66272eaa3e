/**
 * Longest-matching-block alignment (Ratcliff/Obershelp) over code-point sequences.
 * Pure functions, no shared state: every call builds its own index.
 */

/** A run of `size` symbols common to `a[aIndex..]` and `b[bIndex..]`. */
export interface MatchingBlock {
  aIndex: number;
  bIndex: number;
  size: number;
}

export interface AlignerOptions {
  /**
   * Ignore "popular" symbols of `b` when locating candidate runs. Applies only when `b`
   * has at least AUTOJUNK_MIN_LENGTH symbols; a symbol is popular when it occurs more than
   * floor(len(b) / 100) + 1 times. Default true.
   */
  autojunk?: boolean;
}

export const AUTOJUNK_MIN_LENGTH = 200;

/** Symbol → ascending positions in `b`. */
export type SymbolIndex = Map<string, number[]>;

/** Split into code points so astral characters count as one symbol. */
export function toSymbols(s: string): string[] {
  return Array.from(s);
}

/** Order strings by Unicode code point, not UTF-16 code unit. */
export function compareCodePoints(x: string, y: string): number {
  let i = 0;
  while (i < x.length && i < y.length) {
    const cx = x.codePointAt(i) ?? 0;
    const cy = y.codePointAt(i) ?? 0;
    if (cx !== cy) return cx - cy;
    i += cx > 0xffff ? 2 : 1;
  }
  return x.length - y.length;
}

export function buildSymbolIndex(b: readonly string[], autojunk = true): SymbolIndex {
  const index: SymbolIndex = new Map();
  b.forEach((symbol, j) => {
    const positions = index.get(symbol);
    if (positions) positions.push(j);
    else index.set(symbol, [j]);
  });

  const n = b.length;
  if (autojunk && n >= AUTOJUNK_MIN_LENGTH) {
    const threshold = Math.floor(n / 100) + 1;
    for (const [symbol, positions] of index) {
      if (positions.length > threshold) index.delete(symbol);
    }
  }
  return index;
}

/**
 * Longest common run of a[alo:ahi] and b[blo:bhi]. Ties go to the run starting earliest
 * in `a`, then earliest in `b`. Popular symbols are absent from the index, so the best run
 * is then widened over them on both ends.
 */
export function findLongestMatch(
  a: readonly string[],
  b: readonly string[],
  index: SymbolIndex,
  alo: number,
  ahi: number,
  blo: number,
  bhi: number
): MatchingBlock {
  let bestI = alo;
  let bestJ = blo;
  let bestSize = 0;

  // runLengths.get(j) = length of the run ending at a[i - 1] and b[j]
  let runLengths = new Map<number, number>();
  for (let i = alo; i < ahi; i++) {
    const next = new Map<number, number>();
    for (const j of index.get(a[i]) ?? []) {
      if (j < blo) continue;
      if (j >= bhi) break;
      const k = (runLengths.get(j - 1) ?? 0) + 1;
      next.set(j, k);
      if (k > bestSize) {
        bestI = i - k + 1;
        bestJ = j - k + 1;
        bestSize = k;
      }
    }
    runLengths = next;
  }

  while (bestI > alo && bestJ > blo && a[bestI - 1] === b[bestJ - 1]) {
    bestI--;
    bestJ--;
    bestSize++;
  }
  while (bestI + bestSize < ahi && bestJ + bestSize < bhi && a[bestI + bestSize] === b[bestJ + bestSize]) {
    bestSize++;
  }

  return { aIndex: bestI, bIndex: bestJ, size: bestSize };
}

type Range = [alo: number, ahi: number, blo: number, bhi: number];

/**
 * All maximal matching blocks of `a` and `b`, ordered by position with adjacent blocks
 * merged, followed by the sentinel { aIndex: len(a), bIndex: len(b), size: 0 }.
 */
export function getMatchingBlocks(
  a: readonly string[],
  b: readonly string[],
  options: AlignerOptions = {}
): MatchingBlock[] {
  const index = buildSymbolIndex(b, options.autojunk ?? true);
  const found: MatchingBlock[] = [];
  const pending: Range[] = [[0, a.length, 0, b.length]];

  while (pending.length > 0) {
    const range = pending.pop();
    if (!range) break;
    const [alo, ahi, blo, bhi] = range;
    const match = findLongestMatch(a, b, index, alo, ahi, blo, bhi);
    if (match.size === 0) continue;

    found.push(match);
    const { aIndex: i, bIndex: j, size: k } = match;
    if (alo < i && blo < j) pending.push([alo, i, blo, j]);
    if (i + k < ahi && j + k < bhi) pending.push([i + k, ahi, j + k, bhi]);
  }

  found.sort((x, y) => x.aIndex - y.aIndex || x.bIndex - y.bIndex || x.size - y.size);

  const blocks: MatchingBlock[] = [];
  for (const block of found) {
    const last = blocks[blocks.length - 1];
    if (last && last.aIndex + last.size === block.aIndex && last.bIndex + last.size === block.bIndex) {
      last.size += block.size;
    } else {
      blocks.push({ ...block });
    }
  }
  blocks.push({ aIndex: a.length, bIndex: b.length, size: 0 });
  return blocks;
}

/**
 * Base similarity 2·M / T in [0, 1], where M is the number of matched symbols and
 * T the combined length. Two empty sequences are identical (1.0).
 */
export function similarity(a: readonly string[], b: readonly string[], options: AlignerOptions = {}): number {
  const total = a.length + b.length;
  if (total === 0) return 1;
  const matches = getMatchingBlocks(a, b, options).reduce((sum, block) => sum + block.size, 0);
  return (2 * matches) / total;
}
