/**
 * Result Merger
 *
 * Combines a file's analysis with its review outcome. A FLAG from
 * analysis always survives; PASS/FAIL needs both a score and criteria.
 */

import type { AnalysisResult, AnalysisStatus } from 'gradekit-core';
import type { ReviewOutcome } from '../review/types.js';
import type { FingerprintedResult } from './types.js';

export function resolveStatus(
  analysisStatus: AnalysisStatus,
  review: Pick<ReviewOutcome, 'totalScore' | 'hasRubric'>,
  passScoreThreshold: number
): AnalysisStatus {
  if (analysisStatus === 'FLAG') {
    return 'FLAG';
  }
  if (review.totalScore === null || !review.hasRubric) {
    return 'PENDING';
  }
  return review.totalScore >= passScoreThreshold ? 'PASS' : 'FAIL';
}

export function mergeReview(
  analysis: AnalysisResult,
  review: ReviewOutcome,
  passScoreThreshold: number
): FingerprintedResult {
  return {
    name: analysis.name,
    valid: true,
    status: resolveStatus(analysis.status, review, passScoreThreshold),
    totalScore: review.totalScore,
    breakdown: review.breakdown,
    hasRubric: review.hasRubric,
    aiScored: review.aiScored,
    algorithms: analysis.algorithms,
    detectedAlgorithm: review.detectedAlgorithm,
    complexity: analysis.complexity,
    maxLoopDepth: analysis.maxLoopDepth,
    runtimeMs: analysis.runtimeMs,
    strengths: review.strengths,
    weaknesses: review.weaknesses,
    reasoning: review.reasoning,
    improvement: review.improvement,
    complexityAnalysis: review.complexityAnalysis,
    notes: [...analysis.notes, ...review.notes],
    fingerprint: analysis.fingerprint,
  };
}

/**
 * Graded form of a file that failed to parse or tripped the safety scan.
 */
export function gradeInvalid(analysis: AnalysisResult): FingerprintedResult {
  return {
    name: analysis.name,
    valid: false,
    status: analysis.status,
    totalScore: 0,
    breakdown: null,
    hasRubric: false,
    aiScored: false,
    algorithms: [],
    detectedAlgorithm: null,
    complexity: 0,
    maxLoopDepth: 0,
    runtimeMs: analysis.runtimeMs,
    strengths: '',
    weaknesses: '',
    reasoning: '',
    improvement: '',
    complexityAnalysis: '',
    notes: [...analysis.notes],
    fingerprint: null,
  };
}
