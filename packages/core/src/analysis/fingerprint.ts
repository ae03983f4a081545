/**
 * Fingerprint Generator
 *
 * Structural fingerprints are sets of 3-shingles over node types, so two
 * files that differ only in names or formatting share the same set.
 */

import type { Fingerprint } from './types.js';

export const SHINGLE_SIZE = 3;

/**
 * Build the shingle set, or null when there are too few tokens to compare.
 */
export function createFingerprint(tokens: readonly string[]): Fingerprint | null {
  if (tokens.length < SHINGLE_SIZE) {
    return null;
  }

  const shingles = new Set<string>();
  for (let i = 0; i + SHINGLE_SIZE <= tokens.length; i++) {
    shingles.add(tokens.slice(i, i + SHINGLE_SIZE).join('-'));
  }
  return shingles;
}

/**
 * |A ∩ B| / |A ∪ B|, or 0 when both sets are empty.
 */
export function jaccardSimilarity(a: Fingerprint, b: Fingerprint): number {
  const [smaller, larger] = a.size <= b.size ? [a, b] : [b, a];

  let intersection = 0;
  for (const shingle of smaller) {
    if (larger.has(shingle)) {
      intersection++;
    }
  }

  const union = a.size + b.size - intersection;
  return union === 0 ? 0 : intersection / union;
}
