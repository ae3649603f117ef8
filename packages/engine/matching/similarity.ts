// Normalized string similarity for fuzzy keyword matching

import { distance } from 'fastest-levenshtein';

/**
 * Levenshtein ratio: 1 - distance / longer length.
 * Symmetric, in [0, 1]; two empty strings are identical (1).
 */
export function similarityRatio(a: string, b: string): number {
  const longest = Math.max(a.length, b.length);
  if (longest === 0) return 1;
  return 1 - distance(a, b) / longest;
}
