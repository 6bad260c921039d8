/**
 * Suggestion helpers attached to errors before they are presented.
 * Pure functions, no state.
 */

import { DISTRIBUTION_NAMES } from '../dists/catalog.js';

/**
 * Approximate edit distance: positional character differences plus the
 * absolute length delta. Good enough for small typos.
 */
export function calculateDistance(a: string, b: string): number {
  const longer = a.length > b.length ? a : b;
  const shorter = a.length > b.length ? b : a;
  if (longer.length === 0) return shorter.length;
  if (shorter.length === 0) return longer.length;

  let distance = Math.abs(a.length - b.length);
  for (let i = 0; i < shorter.length; i++) {
    if (shorter[i] !== longer[i]) distance++;
  }
  return distance;
}

/**
 * Return up to 3 close matches for a misspelt string.
 */
export function didYouMean(
  input: string,
  validOptions: readonly string[],
  maxDistance = 3
): string[] {
  return validOptions
    .map((option) => ({
      option,
      distance: calculateDistance(input, option),
    }))
    .filter(({ distance }) => distance <= maxDistance)
    .sort((a, b) => a.distance - b.distance)
    .slice(0, 3)
    .map(({ option }) => option);
}

export function suggestDistributionNames(name: string): string[] {
  const matches = didYouMean(name, DISTRIBUTION_NAMES);
  if (matches.length === 0) {
    return [
      `Use one of the catalog kinds (uniform, gaussian, discrete, ...) with an optional _1d/_2d/_3d suffix`,
    ];
  }
  return matches.map((match) => `Did you mean '${match}'?`);
}
