import { describe, it, expect } from 'vitest';
import { createFingerprint, jaccardSimilarity } from '../fingerprint.js';

describe('createFingerprint', () => {
  it('returns null below three tokens', () => {
    expect(createFingerprint([])).toBeNull();
    expect(createFingerprint(['call', 'identifier'])).toBeNull();
  });

  it('builds unique 3-shingles', () => {
    const fingerprint = createFingerprint(['a', 'b', 'c', 'a', 'b', 'c']);
    expect(fingerprint).not.toBeNull();
    expect([...(fingerprint ?? [])].sort()).toEqual(['a-b-c', 'b-c-a', 'c-a-b']);
  });

  it('yields a single shingle for exactly three tokens', () => {
    expect([...(createFingerprint(['for_statement', 'identifier', 'call']) ?? [])]).toEqual([
      'for_statement-identifier-call',
    ]);
  });
});

describe('jaccardSimilarity', () => {
  it('divides intersection by union', () => {
    expect(jaccardSimilarity(new Set(['a', 'b', 'c']), new Set(['b', 'c', 'd']))).toBe(0.5);
  });

  it('is symmetric', () => {
    const a = new Set(['a', 'b', 'c', 'd', 'e']);
    const b = new Set(['c', 'd', 'e', 'f']);
    expect(jaccardSimilarity(a, b)).toBe(jaccardSimilarity(b, a));
    expect(jaccardSimilarity(a, b)).toBe(0.5);
  });

  it('is 1 for identical sets and 0 for disjoint ones', () => {
    expect(jaccardSimilarity(new Set(['x', 'y']), new Set(['y', 'x']))).toBe(1);
    expect(jaccardSimilarity(new Set(['x']), new Set(['y']))).toBe(0);
  });

  it('is 0 when both sets are empty', () => {
    expect(jaccardSimilarity(new Set(), new Set())).toBe(0);
  });
});
