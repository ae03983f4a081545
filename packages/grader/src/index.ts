/**
 * gradekit-grader - Grading jobs for submitted Python sources
 *
 * - Review: Gemini review model, prompt building and reply parsing
 * - Grading: per-file pipeline and result merging
 * - Jobs: concurrency limiter, job store, orchestration and webhooks
 * - Persistence: JSON score store
 */

export const VERSION = '0.1.0';

// Configuration exports
export {
  DEFAULT_GRADER_CONFIG,
  validateConfig,
  mergeConfig,
  configFromEnv,
  type GraderConfig,
  type ConfigValidationError,
  type ConfigValidationResult,
} from './config.js';

// Review exports
export type { RubricData, ReviewOutcome, ReviewModel, ReviewRequestOptions } from './review/types.js';
export { hasGradingCriteria } from './review/types.js';
export { ReviewResponseSchema, RubricDataSchema, type ReviewResponse } from './review/schema.js';
export { buildReviewPrompt, summarizeAnalysis } from './review/prompt-builder.js';
export { GeminiReviewModel, type GeminiReviewModelOptions } from './review/gemini-review-model.js';
export {
  ReviewAdapter,
  parseReviewResponse,
  fallbackOutcome,
  stripCodeFences,
  clampScore,
  NO_CRITERIA_NOTE,
  type ReviewAdapterOptions,
} from './review/review-adapter.js';

// Rubric exports
export {
  HttpRubricSource,
  StaticRubricSource,
  problemIdOf,
  type RubricSource,
  type HttpRubricSourceOptions,
} from './rubric/rubric-source.js';

// Grading exports
export type { GradedResult, FingerprintedResult, GradingRequest } from './grading/types.js';
export { resolveStatus, mergeReview, gradeInvalid } from './grading/result-merger.js';
export { GradingPipeline, type GradingPipelineOptions } from './grading/grading-pipeline.js';

// Execution exports
export { InlineAnalysisExecutor, type AnalysisExecutor } from './execution/analysis-executor.js';
export { WorkerPoolExecutor, type WorkerPoolOptions } from './execution/worker-pool-executor.js';

// Job exports
export type { Job, JobStatus, JobSummary, JobUpdate } from './jobs/types.js';
export { Semaphore, type Release } from './jobs/semaphore.js';
export { JobStore, type JobStoreOptions } from './jobs/job-store.js';
export { BackgroundTaskRunner } from './jobs/background-tasks.js';
export {
  NotificationDispatcher,
  COMPLETION_EVENT,
  type CompletionPayload,
  type NotificationDispatcherOptions,
  type FetchFn,
  type SleepFn,
} from './jobs/notification-dispatcher.js';
export {
  JobOrchestrator,
  decorateName,
  averageScore,
  DEFAULT_STUDENT,
  EMPTY_SUBMISSION_ERROR,
  type JobOrchestratorOptions,
} from './jobs/job-orchestrator.js';

// Persistence exports
export type { ResultRepository, ScoreRecord, ScoreStats } from './persistence/types.js';
export {
  JsonScoreStore,
  parseStudentInfo,
  recordFileName,
  type JsonScoreStoreOptions,
} from './persistence/json-score-store.js';

// Service exports
export { createGradingService, type GradingService, type GradingServiceOverrides } from './service.js';
