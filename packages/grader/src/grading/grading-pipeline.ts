/**
 * Grading Pipeline
 *
 * The per-file unit of work: analyze, look up the rubric, review, merge.
 * Invalid files skip the lookup and the review.
 */

import { createLogger, type Logger, type SourceUnit } from 'gradekit-core';
import type { AnalysisExecutor } from '../execution/analysis-executor.js';
import type { ReviewAdapter } from '../review/review-adapter.js';
import type { RubricSource } from '../rubric/rubric-source.js';
import { gradeInvalid, mergeReview } from './result-merger.js';
import type { FingerprintedResult } from './types.js';

export interface GradingPipelineOptions {
  executor: AnalysisExecutor;
  rubrics: RubricSource;
  reviewer: ReviewAdapter;
  passScoreThreshold: number;
  logger?: Logger;
}

export class GradingPipeline {
  private readonly executor: AnalysisExecutor;
  private readonly rubrics: RubricSource;
  private readonly reviewer: ReviewAdapter;
  private readonly passScoreThreshold: number;
  private readonly logger: Logger;

  constructor(options: GradingPipelineOptions) {
    this.executor = options.executor;
    this.rubrics = options.rubrics;
    this.reviewer = options.reviewer;
    this.passScoreThreshold = options.passScoreThreshold;
    this.logger = options.logger ?? createLogger('pipeline');
  }

  /**
   * Grade one file. The rubric is looked up by topic when one is given,
   * by file name otherwise.
   */
  async grade(unit: SourceUnit, topic?: string): Promise<FingerprintedResult> {
    const analysis = await this.executor.analyze(unit);

    if (!analysis.valid) {
      this.logger.warn(`Analysis failed for '${unit.name}': ${analysis.notes.join('; ')}`);
      return gradeInvalid(analysis);
    }

    const rubric = await this.rubrics.fetch(topic || unit.name);
    const review = await this.reviewer.review(unit.text, analysis, rubric);

    return mergeReview(analysis, review, this.passScoreThreshold);
  }
}
