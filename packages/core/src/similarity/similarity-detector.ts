/**
 * Similarity Detector
 *
 * Pairwise fingerprint comparison across one batch. Both members of a
 * pair above the threshold are flagged with a note naming the other;
 * fingerprints are dropped from everything that leaves this stage.
 */

import { jaccardSimilarity } from '../analysis/fingerprint.js';
import type { AnalysisStatus, ComparedResult, Fingerprint } from '../analysis/types.js';

export const DEFAULT_SIMILARITY_THRESHOLD = 0.85;

/**
 * Minimal shape the detector needs from a result.
 */
export interface Comparable {
  name: string;
  fingerprint: Fingerprint | null;
  notes: string[];
  status: AnalysisStatus;
}

export interface SimilarPair {
  /** Indices into the compared batch, first < second */
  first: number;
  second: number;
  similarity: number;
}

export function duplicateNote(similarity: number, otherName: string): string {
  return `Possible duplicate: ${Math.round(similarity * 100)}% structural overlap with ${otherName}`;
}

/**
 * Every unordered pair with both fingerprints whose similarity is strictly
 * above the threshold.
 */
export function findSimilarPairs(
  fingerprints: ReadonlyArray<Fingerprint | null>,
  threshold: number = DEFAULT_SIMILARITY_THRESHOLD
): SimilarPair[] {
  const pairs: SimilarPair[] = [];

  for (let i = 0; i < fingerprints.length; i++) {
    const a = fingerprints[i];
    if (!a) continue;
    for (let j = i + 1; j < fingerprints.length; j++) {
      const b = fingerprints[j];
      if (!b) continue;
      const similarity = jaccardSimilarity(a, b);
      if (similarity > threshold) {
        pairs.push({ first: i, second: j, similarity });
      }
    }
  }

  return pairs;
}

/**
 * Flag near-duplicates and strip fingerprints. The input is not mutated.
 */
export function detectSimilarity<T extends Comparable>(
  results: readonly T[],
  threshold: number = DEFAULT_SIMILARITY_THRESHOLD
): Array<ComparedResult<T>> {
  const notes = results.map(r => [...r.notes]);
  const flagged = new Set<number>();

  if (results.length >= 2) {
    const pairs = findSimilarPairs(
      results.map(r => r.fingerprint),
      threshold
    );

    for (const { first, second, similarity } of pairs) {
      const a = results[first];
      const b = results[second];
      if (!a || !b) continue;
      addNote(notes[first], duplicateNote(similarity, b.name));
      addNote(notes[second], duplicateNote(similarity, a.name));
      flagged.add(first);
      flagged.add(second);
    }
  }

  return results.map((result, index) => {
    const { fingerprint: _consumed, ...rest } = result;
    return {
      ...rest,
      notes: notes[index] ?? [],
      status: flagged.has(index) ? 'FLAG' : result.status,
    };
  });
}

function addNote(target: string[] | undefined, note: string): void {
  if (target && !target.includes(note)) {
    target.push(note);
  }
}
