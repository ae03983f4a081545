/**
 * Job Store & Reaper
 *
 * In-memory table of grading jobs keyed by id. Entries live for a fixed
 * TTL from creation, whatever their status. Readers get deep copies;
 * writers replace whole records.
 */

import { randomUUID } from 'node:crypto';
import { createLogger, type Logger } from 'gradekit-core';
import type { Job, JobUpdate } from './types.js';

export interface JobStoreOptions {
  ttlMs: number;
  /** Clock in epoch milliseconds (default: Date.now) */
  now?: () => number;
  logger?: Logger;
}

export class JobStore {
  private readonly jobs = new Map<string, Job>();
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;
  private reaper: NodeJS.Timeout | null = null;

  constructor(options: JobStoreOptions) {
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? createLogger('job-store');
  }

  /** Entries currently held, expired or not */
  get size(): number {
    return this.jobs.size;
  }

  create(student: string): Job {
    const job: Job = {
      id: randomUUID(),
      status: 'pending',
      createdAt: this.now(),
      student,
    };
    this.jobs.set(job.id, job);
    return structuredClone(job);
  }

  /**
   * Snapshot of a job, or null when unknown or expired.
   */
  get(id: string): Job | null {
    const job = this.jobs.get(id);
    if (!job) {
      return null;
    }
    if (this.isExpired(job)) {
      this.jobs.delete(id);
      return null;
    }
    return structuredClone(job);
  }

  /**
   * Replace a job with the given fields applied. Returns the new
   * snapshot, or null when the job is gone.
   */
  update(id: string, changes: JobUpdate): Job | null {
    const current = this.jobs.get(id);
    if (!current) {
      return null;
    }
    const next: Job = { ...current, ...structuredClone(changes) };
    this.jobs.set(id, next);
    return structuredClone(next);
  }

  /**
   * Remove every job older than the TTL. Returns how many were removed.
   */
  sweep(): number {
    let removed = 0;
    for (const [id, job] of this.jobs) {
      if (this.isExpired(job)) {
        this.jobs.delete(id);
        removed++;
      }
    }
    if (removed > 0) {
      this.logger.debug(`Reclaimed ${removed} expired job(s)`);
    }
    return removed;
  }

  /**
   * Sweep periodically. The timer does not keep the process alive.
   */
  startReaper(intervalMs: number): void {
    this.stopReaper();
    this.reaper = setInterval(() => this.sweep(), intervalMs);
    this.reaper.unref();
  }

  stopReaper(): void {
    if (this.reaper) {
      clearInterval(this.reaper);
      this.reaper = null;
    }
  }

  private isExpired(job: Job): boolean {
    return this.now() - job.createdAt > this.ttlMs;
  }
}
