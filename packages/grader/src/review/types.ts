/**
 * Review Types
 */

import type { ScoreBreakdown } from 'gradekit-core';

/**
 * Problem metadata from the problem bank. Only `rubric` and
 * `requirements` drive grading; everything else is carried along.
 */
export interface RubricData {
  title?: string | undefined;
  rubric?: unknown;
  requirements?: unknown;
  [key: string]: unknown;
}

/**
 * What the review step contributes to a graded result.
 */
export interface ReviewOutcome {
  totalScore: number | null;
  breakdown: ScoreBreakdown | null;
  hasRubric: boolean;
  /** true when the external reviewer produced this outcome */
  aiScored: boolean;
  detectedAlgorithm: string | null;
  strengths: string;
  weaknesses: string;
  reasoning: string;
  improvement: string;
  complexityAnalysis: string;
  notes: string[];
}

export interface ReviewRequestOptions {
  /** Aborts the call when it fires */
  signal?: AbortSignal;
}

/**
 * A text-generation backend for code reviews.
 */
export interface ReviewModel {
  readonly name: string;
  generate(prompt: string, options?: ReviewRequestOptions): Promise<string>;
}

export function hasContent(value: unknown): boolean {
  if (value === undefined || value === null || value === false) return false;
  if (typeof value === 'string') return value.trim().length > 0;
  if (Array.isArray(value)) return value.length > 0;
  if (typeof value === 'object') return Object.keys(value).length > 0;
  return true;
}

/**
 * Whether the problem carries grading criteria (a rubric or at least
 * requirements).
 */
export function hasGradingCriteria(rubric: RubricData | null): boolean {
  return rubric !== null && (hasContent(rubric.rubric) || hasContent(rubric.requirements));
}

/**
 * Render a rubric field for a prompt.
 */
export function criteriaText(value: unknown): string {
  return typeof value === 'string' ? value.trim() : JSON.stringify(value, null, 2);
}
