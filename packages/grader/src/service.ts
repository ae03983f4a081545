/**
 * Grading Service Factory
 *
 * Wires configuration into a ready JobOrchestrator. Each collaborator can
 * be replaced through overrides, which is how tests and the CLI swap in
 * fakes or a worker pool.
 */

import { Errors, createLogger, type Logger } from 'gradekit-core';
import { InlineAnalysisExecutor, type AnalysisExecutor } from './execution/analysis-executor.js';
import { GradingPipeline } from './grading/grading-pipeline.js';
import { BackgroundTaskRunner } from './jobs/background-tasks.js';
import { JobOrchestrator } from './jobs/job-orchestrator.js';
import { JobStore } from './jobs/job-store.js';
import { NotificationDispatcher } from './jobs/notification-dispatcher.js';
import { Semaphore } from './jobs/semaphore.js';
import { JsonScoreStore } from './persistence/json-score-store.js';
import type { ResultRepository } from './persistence/types.js';
import { GeminiReviewModel } from './review/gemini-review-model.js';
import { ReviewAdapter } from './review/review-adapter.js';
import type { ReviewModel } from './review/types.js';
import { HttpRubricSource, StaticRubricSource, type RubricSource } from './rubric/rubric-source.js';
import { validateConfig, type GraderConfig } from './config.js';

export interface GradingServiceOverrides {
  executor?: AnalysisExecutor;
  /** null disables the external reviewer even when a key is configured */
  reviewModel?: ReviewModel | null;
  rubrics?: RubricSource;
  repository?: ResultRepository;
  dispatcher?: NotificationDispatcher;
  store?: JobStore;
  /** Start the periodic job sweep (default: true) */
  startReaper?: boolean;
  logger?: Logger;
}

export interface GradingService {
  config: GraderConfig;
  orchestrator: JobOrchestrator;
  store: JobStore;
  repository: ResultRepository;
}

function createReviewModel(config: GraderConfig): ReviewModel | null {
  if (!config.geminiApiKey) {
    return null;
  }
  return new GeminiReviewModel({
    apiKey: config.geminiApiKey,
    model: config.reviewModel,
    temperature: config.reviewTemperature,
    topP: config.reviewTopP,
    topK: config.reviewTopK,
    maxOutputTokens: config.reviewMaxOutputTokens,
  });
}

function createRubricSource(config: GraderConfig, logger: Logger): RubricSource {
  if (!config.rubricApiUrl) {
    return new StaticRubricSource(null);
  }
  return new HttpRubricSource({
    baseUrl: config.rubricApiUrl,
    apiKey: config.rubricApiKey,
    timeoutMs: config.rubricTimeoutMs,
    logger: logger.child('rubric'),
  });
}

/**
 * Build a grading service from a partial configuration.
 *
 * @throws GradeKitError INVALID_CONFIG listing every rejected field
 */
export function createGradingService(
  config: Partial<GraderConfig> = {},
  overrides: GradingServiceOverrides = {}
): GradingService {
  const validation = validateConfig(config);
  if (!validation.valid) {
    throw Errors.invalidConfig(validation.errors.map(e => `${e.field} ${e.message}`));
  }
  const resolved = validation.config;
  const logger = overrides.logger ?? createLogger('grader');

  const reviewModel = overrides.reviewModel !== undefined ? overrides.reviewModel : createReviewModel(resolved);
  if (!reviewModel) {
    logger.warn('No reviewer configured; scores come from static analysis only');
  }

  const executor = overrides.executor ?? new InlineAnalysisExecutor();
  const pipeline = new GradingPipeline({
    executor,
    rubrics: overrides.rubrics ?? createRubricSource(resolved, logger),
    reviewer: new ReviewAdapter({
      model: reviewModel,
      timeoutMs: resolved.reviewTimeoutMs,
      logger: logger.child('review'),
    }),
    passScoreThreshold: resolved.passScoreThreshold,
    logger: logger.child('pipeline'),
  });

  const store = overrides.store ?? new JobStore({ ttlMs: resolved.jobTtlMs, logger: logger.child('jobs') });
  if (overrides.startReaper ?? true) {
    store.startReaper(resolved.reaperIntervalMs);
  }

  const repository =
    overrides.repository ?? new JsonScoreStore({ dir: resolved.scoresDir, logger: logger.child('scores') });

  const orchestrator = new JobOrchestrator({
    store,
    pipeline,
    limiter: new Semaphore(resolved.maxConcurrency),
    tasks: new BackgroundTaskRunner(logger.child('tasks')),
    dispatcher:
      overrides.dispatcher ??
      new NotificationDispatcher({
        maxAttempts: resolved.webhookMaxAttempts,
        timeoutMs: resolved.webhookTimeoutMs,
        backoffUnitMs: resolved.webhookBackoffUnitMs,
        logger: logger.child('webhook'),
      }),
    repository,
    similarityThreshold: resolved.similarityThreshold,
    executor,
    logger: logger.child('orchestrator'),
  });

  return { config: resolved, orchestrator, store, repository };
}
