/**
 * Fallback Scorer
 *
 * Deterministic score used whenever the reviewer cannot grade. Each
 * sub-score starts from a base, earns fixed bonuses and is capped at its
 * limit; the total is always the sum of the four.
 */

import { SCORE_LIMITS, type FeatureSummary, type ScoreBreakdown } from './types.js';

/** Per-label bonus and its cap inside the algorithm sub-score */
const TAG_BONUS = 8;
const TAG_BONUS_CAP = 20;
const COMPLEXITY_BONUS_CAP = 10;

export function scoreFallback(features: FeatureSummary, complexity: number, tagCount: number): ScoreBreakdown {
  const ds = features.dataStructures;

  let logic = 15;
  if (features.functions > 0) logic += 8;
  if (features.classDefined) logic += 5;
  if (features.recursion) logic += 6;
  if (features.loops > 0) logic += 4;
  if (features.conditionals > 0) logic += 2;
  logic = Math.min(logic, SCORE_LIMITS.logic);

  let algorithm = 10;
  algorithm += Math.min(tagCount * TAG_BONUS, TAG_BONUS_CAP);
  algorithm += Math.min(Math.max(complexity - 1, 0), COMPLEXITY_BONUS_CAP);
  algorithm = Math.min(algorithm, SCORE_LIMITS.algorithm);

  let style = 6;
  if (features.functions >= 2) style += 2;
  if (ds.sequence || ds.mapping || ds.set || ds.pair || ds.deque) style += 2;
  style = Math.min(style, SCORE_LIMITS.style);

  let optimization = 5;
  if (!features.nestedLoops) optimization += 2;
  if (ds.set || ds.mapping) optimization += 2;
  if (features.hints.memo) optimization += 1;
  optimization = Math.min(optimization, SCORE_LIMITS.optimization);

  return {
    total: logic + algorithm + style + optimization,
    logic,
    algorithm,
    style,
    optimization,
  };
}
