/**
 * Round to the nearest integer, ties to even (12.5 → 12, 13.5 → 14).
 * Scores are computed as 100 × a ratio of small integers, so exact .5 ties do occur.
 */
export function roundHalfEven(x: number): number {
  const floor = Math.floor(x);
  const diff = x - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

/** Fraction in [0, 1] → integer score in [0, 100]. */
export function toScore(fraction: number): number {
  return roundHalfEven(100 * fraction);
}
