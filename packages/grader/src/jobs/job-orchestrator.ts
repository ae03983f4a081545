/**
 * Job Orchestrator
 *
 * Accepts grading requests, runs them as background jobs and records
 * their lifecycle in the job store:
 *
 *   pending -> processing -> completed | failed
 *
 * Every file of every job runs its pipeline under one shared limiter.
 * Similarity detection waits for the whole batch.
 */

import { Errors, createLogger, detectSimilarity, errorMessage, type Logger } from 'gradekit-core';
import type { AnalysisExecutor } from '../execution/analysis-executor.js';
import type { GradingPipeline } from '../grading/grading-pipeline.js';
import type { GradedResult, GradingRequest } from '../grading/types.js';
import type { ResultRepository } from '../persistence/types.js';
import type { BackgroundTaskRunner } from './background-tasks.js';
import type { JobStore } from './job-store.js';
import type { NotificationDispatcher } from './notification-dispatcher.js';
import type { Semaphore } from './semaphore.js';
import type { Job, JobSummary } from './types.js';

export const DEFAULT_STUDENT = 'Anonymous';
export const EMPTY_SUBMISSION_ERROR = 'No valid source files found in submission.';

export interface JobOrchestratorOptions {
  store: JobStore;
  pipeline: GradingPipeline;
  limiter: Semaphore;
  tasks: BackgroundTaskRunner;
  dispatcher: NotificationDispatcher;
  repository: ResultRepository;
  similarityThreshold: number;
  /** Closed on shutdown */
  executor?: AnalysisExecutor;
  logger?: Logger;
}

/**
 * Prefix a result name with the submitter unless it already carries one.
 */
export function decorateName(student: string, name: string): string {
  return name.includes(' | ') ? name : `${student} | ${name}`;
}

function roundToTenth(value: number): number {
  return Math.round(value * 10) / 10;
}

export function averageScore(results: readonly GradedResult[]): number | null {
  const scores = results
    .map(result => result.totalScore)
    .filter((score): score is number => score !== null);
  if (scores.length === 0) {
    return null;
  }
  return roundToTenth(scores.reduce((sum, score) => sum + score, 0) / scores.length);
}

export class JobOrchestrator {
  private readonly options: JobOrchestratorOptions;
  private readonly logger: Logger;
  private closed = false;

  constructor(options: JobOrchestratorOptions) {
    this.options = options;
    this.logger = options.logger ?? createLogger('orchestrator');
  }

  get accepting(): boolean {
    return !this.closed;
  }

  // ============================================
  // Submission & Queries
  // ============================================

  /**
   * Register a job and start it in the background.
   * Returns the pending snapshot without waiting for the run.
   */
  submit(request: GradingRequest): Job {
    if (this.closed) {
      throw Errors.shutdown();
    }

    const { store, tasks } = this.options;
    store.sweep();

    const job = store.create(request.student || DEFAULT_STUDENT);
    this.logger.info(`Job ${job.id} accepted: ${request.units.length} file(s) from ${job.student}`);

    tasks.spawn(`job ${job.id}`, () => this.run(job.id, job.student, request));
    return job;
  }

  getJob(id: string): Job | null {
    return this.options.store.get(id);
  }

  /**
   * @throws GradeKitError JOB_NOT_FOUND when the job is unknown or expired
   */
  requireJob(id: string): Job {
    const job = this.getJob(id);
    if (!job) {
      throw Errors.jobNotFound(id);
    }
    return job;
  }

  /**
   * Submit and wait for the job, including its notification.
   */
  async gradeNow(request: GradingRequest): Promise<Job> {
    const job = this.submit(request);
    await this.drain();
    return this.requireJob(job.id);
  }

  // ============================================
  // Lifecycle
  // ============================================

  /**
   * Wait for every running job and pending notification.
   */
  async drain(): Promise<void> {
    await this.options.tasks.drain();
  }

  async shutdown(): Promise<void> {
    this.options.store.stopReaper();
    this.closed = true;
    await this.drain();
    await this.options.executor?.close();
    this.logger.debug('Orchestrator stopped');
  }

  // ============================================
  // Job Run
  // ============================================

  private async run(jobId: string, student: string, request: GradingRequest): Promise<void> {
    const { store } = this.options;
    const started = performance.now();
    store.update(jobId, { status: 'processing' });

    try {
      if (request.units.length === 0) {
        store.update(jobId, { status: 'failed', error: EMPTY_SUBMISSION_ERROR });
        this.logger.warn(`Job ${jobId} failed: ${EMPTY_SUBMISSION_ERROR}`);
        return;
      }

      const results = await this.gradeAll(student, request);
      const persistedCount = await this.persist(jobId, results, request.assignmentCode);

      const summary: JobSummary = {
        fileCount: results.length,
        avgScore: averageScore(results),
        elapsedSeconds: roundToTenth((performance.now() - started) / 1000),
        persistedCount,
      };

      store.update(jobId, { status: 'completed', results, summary });
      this.logger.info(
        `Job ${jobId} completed: ${summary.fileCount} file(s), avg ${summary.avgScore ?? 'n/a'}, ${summary.elapsedSeconds}s`
      );

      const callbackUrl = request.callbackUrl;
      if (callbackUrl) {
        this.options.tasks.spawn(`notify ${jobId}`, async () => {
          await this.options.dispatcher.deliver(callbackUrl, jobId, results, summary);
        });
      }
    } catch (error) {
      const message = errorMessage(error);
      store.update(jobId, { status: 'failed', error: message });
      this.logger.error(Errors.jobFailed(`Job ${jobId} failed: ${message}`).message);
    }
  }

  private async gradeAll(student: string, request: GradingRequest): Promise<GradedResult[]> {
    const { pipeline, limiter, similarityThreshold } = this.options;

    const graded = await Promise.all(
      request.units.map(unit => limiter.run(() => pipeline.grade(unit, request.topic)))
    );

    return detectSimilarity(graded, similarityThreshold).map(result => ({
      ...result,
      name: decorateName(student, result.name),
    }));
  }

  private async persist(jobId: string, results: GradedResult[], assignmentCode?: string): Promise<number> {
    try {
      const ids = await this.options.repository.saveBatch(results, assignmentCode);
      return ids.length;
    } catch (error) {
      this.logger.error(Errors.persistenceFailed(`job ${jobId}: ${errorMessage(error)}`, error).message);
      return 0;
    }
  }
}
