/**
 * External Review Adapter
 *
 * Sends one review request per file and turns the reply into a
 * ReviewOutcome. Every reviewer failure ends in the fallback outcome; the
 * adapter never throws.
 */

import {
  Errors,
  SCORE_LIMITS,
  createLogger,
  errorMessage,
  isGradeKitError,
  type AnalysisResult,
  type Logger,
  type ScoreBreakdown,
} from 'gradekit-core';
import { buildReviewPrompt } from './prompt-builder.js';
import { ReviewResponseSchema, type ReviewResponse } from './schema.js';
import { hasGradingCriteria, type ReviewModel, type ReviewOutcome, type RubricData } from './types.js';

export const NO_CRITERIA_NOTE = 'No grading criteria configured for this problem.';

export interface ReviewAdapterOptions {
  /** null runs every review on the fallback path */
  model: ReviewModel | null;
  /** Timeout for one reviewer call in milliseconds */
  timeoutMs: number;
  logger?: Logger;
}

// ============================================
// Response Parsing
// ============================================

/**
 * Remove a surrounding markdown code fence, if any.
 */
export function stripCodeFences(raw: string): string {
  const trimmed = raw.trim();
  if (!trimmed.startsWith('```')) {
    return trimmed;
  }
  return trimmed.replace(/^```(?:json)?\s*/i, '').replace(/\s*```$/, '').trim();
}

/**
 * Clamp a reviewer-supplied score into [0, max]. Anything that is not a
 * number or a numeric string becomes 0.
 */
export function clampScore(value: unknown, max: number): number {
  const numeric =
    typeof value === 'number' ? value : typeof value === 'string' && value.trim() !== '' ? Number(value) : NaN;
  if (!Number.isFinite(numeric)) {
    return 0;
  }
  return Math.min(Math.max(Math.trunc(numeric), 0), max);
}

function commentary(response: ReviewResponse, emptyReasoning: string, emptyImprovement: string) {
  return {
    detectedAlgorithm: response.detected_algo ?? null,
    strengths: response.strengths ?? '',
    weaknesses: response.weaknesses ?? '',
    reasoning: response.reasoning_feedback ?? emptyReasoning,
    improvement: response.improvement_feedback ?? emptyImprovement,
    complexityAnalysis: response.complexity_analysis ?? '',
  };
}

/**
 * Parse a raw reviewer reply.
 *
 * @throws GradeKitError (REVIEWER_UNAVAILABLE) when the reply is not the expected JSON
 */
export function parseReviewResponse(raw: string): ReviewOutcome {
  let data: unknown;
  try {
    data = JSON.parse(stripCodeFences(raw));
  } catch (error) {
    throw Errors.reviewerUnavailable(`malformed JSON in response: ${errorMessage(error)}`, error);
  }

  const parsed = ReviewResponseSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw Errors.reviewerUnavailable(`unexpected response shape${where}: ${issue?.message ?? 'invalid'}`);
  }

  const response = parsed.data;

  if (response.has_rubric !== true || response.total_score === null || response.total_score === undefined) {
    return {
      totalScore: null,
      breakdown: null,
      hasRubric: false,
      aiScored: true,
      ...commentary(response, 'No commentary provided.', 'No suggestions provided.'),
      notes: [],
    };
  }

  const scores = response.breakdown;
  const breakdown: ScoreBreakdown = {
    total: clampScore(response.total_score, SCORE_LIMITS.total),
    logic: clampScore(scores?.logic_score, SCORE_LIMITS.logic),
    algorithm: clampScore(scores?.algorithm_score, SCORE_LIMITS.algorithm),
    style: clampScore(scores?.style_score, SCORE_LIMITS.style),
    optimization: clampScore(scores?.optimization_score, SCORE_LIMITS.optimization),
  };

  return {
    totalScore: breakdown.total,
    breakdown,
    hasRubric: true,
    aiScored: true,
    ...commentary(response, '', ''),
    notes: [],
  };
}

// ============================================
// Fallback
// ============================================

/**
 * Outcome used when the reviewer is absent or failed.
 */
export function fallbackOutcome(analysis: AnalysisResult, rubric: RubricData | null): ReviewOutcome {
  if (hasGradingCriteria(rubric)) {
    return {
      totalScore: analysis.fallbackScore?.total ?? null,
      breakdown: analysis.fallbackScore,
      hasRubric: true,
      aiScored: false,
      detectedAlgorithm: null,
      strengths: '',
      weaknesses: '',
      reasoning: 'Scored from the structure of the code (static analysis).',
      improvement: '',
      complexityAnalysis: '',
      notes: [],
    };
  }

  return {
    totalScore: null,
    breakdown: null,
    hasRubric: false,
    aiScored: false,
    detectedAlgorithm: null,
    strengths: '',
    weaknesses: '',
    reasoning: 'No problem bank is connected; the code was analysed for structure only and not scored.',
    improvement: '',
    complexityAnalysis: '',
    notes: [NO_CRITERIA_NOTE],
  };
}

// ============================================
// Adapter
// ============================================

export class ReviewAdapter {
  private readonly model: ReviewModel | null;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: ReviewAdapterOptions) {
    this.model = options.model;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger ?? createLogger('review');
  }

  get enabled(): boolean {
    return this.model !== null;
  }

  async review(code: string, analysis: AnalysisResult, rubric: RubricData | null): Promise<ReviewOutcome> {
    if (!this.model) {
      return fallbackOutcome(analysis, rubric);
    }

    try {
      const raw = await this.generate(this.model, buildReviewPrompt(code, analysis, rubric));
      return parseReviewResponse(raw);
    } catch (error) {
      const failure = isGradeKitError(error) ? error : Errors.reviewerUnavailable(errorMessage(error), error);
      this.logger.warn(`${analysis.name}: ${failure.message}`);
      return fallbackOutcome(analysis, rubric);
    }
  }

  private async generate(model: ReviewModel, prompt: string): Promise<string> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(Errors.reviewerUnavailable(`no response within ${this.timeoutMs} ms`));
      }, this.timeoutMs);
    });

    try {
      return await Promise.race([model.generate(prompt, { signal: controller.signal }), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
