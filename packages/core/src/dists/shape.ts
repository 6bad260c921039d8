import type { RankSpec, Shape } from './distribution.js';

/**
 * Output shape for a distribution of `rank`, replicated across `numEnv`
 * parallel environments when set.
 *
 * - rank 0 -> [] (scalar), or [E]
 * - rank N -> [N], or [E, N]
 * - rank 'any' -> `size` verbatim, or [E, ...size]
 */
export function finalShape(
  rank: RankSpec,
  numEnv?: number,
  size?: number | Shape
): number[] {
  let base: number[];
  if (rank === 'any') {
    if (size === undefined) {
      base = [];
    } else {
      base = typeof size === 'number' ? [size] : [...size];
    }
  } else {
    base = rank > 0 ? [rank] : [];
  }
  return numEnv === undefined ? base : [numEnv, ...base];
}
