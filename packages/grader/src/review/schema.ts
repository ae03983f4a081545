/**
 * Reviewer response and rubric payload schemas
 */

import { z } from 'zod';

/** Scores may come back as numbers, numeric strings or null */
const ScoreValue = z.union([z.number(), z.string(), z.null()]).optional();

/** Feedback fields are sometimes returned as bullet arrays */
const FeedbackText = z
  .union([z.string(), z.array(z.string())])
  .transform(value => (Array.isArray(value) ? value.join('\n') : value))
  .optional();

export const ReviewResponseSchema = z.object({
  has_rubric: z.boolean().nullable().optional(),
  total_score: ScoreValue,
  breakdown: z
    .object({
      logic_score: ScoreValue,
      algorithm_score: ScoreValue,
      style_score: ScoreValue,
      optimization_score: ScoreValue,
    })
    .nullable()
    .optional(),
  detected_algo: z.string().nullable().optional(),
  strengths: FeedbackText,
  weaknesses: FeedbackText,
  reasoning_feedback: FeedbackText,
  improvement_feedback: FeedbackText,
  complexity_analysis: FeedbackText,
});

export type ReviewResponse = z.infer<typeof ReviewResponseSchema>;

export const RubricDataSchema = z
  .object({
    title: z.string().optional(),
    rubric: z.unknown().optional(),
    requirements: z.unknown().optional(),
  })
  .passthrough();
