/**
 * Shared builders for analysis tests
 */

import type { FeatureSummary } from '../types.js';

export function makeFeatures(overrides: Partial<FeatureSummary> = {}): FeatureSummary {
  return {
    loops: 0,
    conditionals: 0,
    functions: 0,
    maxLoopDepth: 0,
    nestedLoops: false,
    recursion: false,
    classDefined: false,
    dataStructures: { sequence: false, mapping: false, set: false, pair: false, deque: false },
    functionNames: [],
    referencedNames: [],
    imports: [],
    hints: { swap: false, halving: false, memo: false, matrix: false },
    ...overrides,
  };
}
