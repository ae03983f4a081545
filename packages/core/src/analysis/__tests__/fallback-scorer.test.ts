import { describe, it, expect } from 'vitest';
import { scoreFallback } from '../fallback-scorer.js';
import { SCORE_LIMITS, type ScoreBreakdown } from '../types.js';
import { makeFeatures } from './fixtures.js';

function expectInRange(score: ScoreBreakdown): void {
  expect(score.logic).toBeGreaterThanOrEqual(0);
  expect(score.logic).toBeLessThanOrEqual(SCORE_LIMITS.logic);
  expect(score.algorithm).toBeGreaterThanOrEqual(0);
  expect(score.algorithm).toBeLessThanOrEqual(SCORE_LIMITS.algorithm);
  expect(score.style).toBeGreaterThanOrEqual(0);
  expect(score.style).toBeLessThanOrEqual(SCORE_LIMITS.style);
  expect(score.optimization).toBeGreaterThanOrEqual(0);
  expect(score.optimization).toBeLessThanOrEqual(SCORE_LIMITS.optimization);
  expect(score.total).toBe(score.logic + score.algorithm + score.style + score.optimization);
}

describe('scoreFallback', () => {
  it('gives base credit to trivial code', () => {
    expect(scoreFallback(makeFeatures(), 1, 0)).toEqual({
      total: 38,
      logic: 15,
      algorithm: 10,
      style: 6,
      optimization: 7,
    });
  });

  it('caps every sub-score', () => {
    const features = makeFeatures({
      functions: 2,
      classDefined: true,
      recursion: true,
      loops: 3,
      conditionals: 2,
      maxLoopDepth: 2,
      nestedLoops: true,
      dataStructures: { sequence: true, mapping: false, set: true, pair: false, deque: false },
      hints: { swap: false, halving: false, memo: true, matrix: false },
    });

    expect(scoreFallback(features, 6, 3)).toEqual({
      total: 93,
      logic: 40,
      algorithm: 35,
      style: 10,
      optimization: 8,
    });
  });

  it('limits the complexity bonus to 10', () => {
    expect(scoreFallback(makeFeatures(), 40, 5).algorithm).toBe(40);
    expect(scoreFallback(makeFeatures(), 40, 0).algorithm).toBe(20);
  });

  it('never lowers the algorithm score when a tag is added', () => {
    const features = makeFeatures({ loops: 1, conditionals: 1 });

    for (let tags = 0; tags < 6; tags++) {
      const before = scoreFallback(features, 3, tags).algorithm;
      const after = scoreFallback(features, 3, tags + 1).algorithm;
      if (tags * 8 + 8 <= 20) {
        expect(after).toBeGreaterThan(before);
      } else {
        expect(after).toBeGreaterThanOrEqual(before);
      }
    }
  });

  it('stays within range for a spread of inputs', () => {
    for (const complexity of [0, 1, 5, 30]) {
      for (const tags of [0, 1, 4, 9]) {
        expectInRange(scoreFallback(makeFeatures({ functions: tags, loops: complexity }), complexity, tags));
      }
    }
  });
});
