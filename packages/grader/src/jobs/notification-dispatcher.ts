/**
 * Notification Dispatcher
 *
 * Posts job completion payloads to a callback URL with a bounded number
 * of attempts and exponential backoff. Delivery failure is logged and
 * reported as false, never thrown.
 */

import { setTimeout as delay } from 'node:timers/promises';
import { Errors, createLogger, errorMessage, type Logger } from 'gradekit-core';
import type { GradedResult } from '../grading/types.js';
import type { JobSummary } from './types.js';

export const COMPLETION_EVENT = 'grading_completed';

export interface CompletionPayload {
  event: typeof COMPLETION_EVENT;
  job_id: string;
  results: GradedResult[];
  summary: JobSummary;
}

export type FetchFn = typeof fetch;
export type SleepFn = (ms: number) => Promise<void>;

export interface NotificationDispatcherOptions {
  maxAttempts?: number;
  /** Timeout of a single attempt in milliseconds */
  timeoutMs?: number;
  /** Failed attempt n waits 2^n units before the next one */
  backoffUnitMs?: number;
  fetch?: FetchFn;
  sleep?: SleepFn;
  logger?: Logger;
}

export class NotificationDispatcher {
  private readonly maxAttempts: number;
  private readonly timeoutMs: number;
  private readonly backoffUnitMs: number;
  private readonly fetchFn: FetchFn;
  private readonly sleep: SleepFn;
  private readonly logger: Logger;

  constructor(options: NotificationDispatcherOptions = {}) {
    this.maxAttempts = options.maxAttempts ?? 3;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.backoffUnitMs = options.backoffUnitMs ?? 1000;
    this.fetchFn = options.fetch ?? fetch;
    this.sleep = options.sleep ?? (async ms => {
      await delay(ms);
    });
    this.logger = options.logger ?? createLogger('webhook');
  }

  /**
   * Deliver a completion payload. Resolves true on the first 2xx reply.
   */
  async deliver(url: string, jobId: string, results: GradedResult[], summary: JobSummary): Promise<boolean> {
    const payload: CompletionPayload = {
      event: COMPLETION_EVENT,
      job_id: jobId,
      results,
      summary,
    };
    const body = JSON.stringify(payload);
    let lastFailure = 'no attempt made';

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        const response = await this.fetchFn(url, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body,
          signal: AbortSignal.timeout(this.timeoutMs),
        });

        if (response.ok) {
          this.logger.info(`Webhook sent to '${url}' (attempt ${attempt})`);
          return true;
        }
        lastFailure = `HTTP ${response.status}`;
      } catch (error) {
        lastFailure = errorMessage(error);
      }

      this.logger.warn(`Webhook attempt ${attempt}/${this.maxAttempts} to '${url}' failed: ${lastFailure}`);

      if (attempt < this.maxAttempts) {
        await this.sleep(2 ** attempt * this.backoffUnitMs);
      }
    }

    this.logger.error(Errors.deliveryFailed(url, `${lastFailure} after ${this.maxAttempts} attempts`).message);
    return false;
  }
}
