/**
 * Job Types
 */

import type { GradedResult } from '../grading/types.js';

export type JobStatus = 'pending' | 'processing' | 'completed' | 'failed';

export interface JobSummary {
  fileCount: number;
  /** Mean of the numeric scores, one decimal; null when nothing was scored */
  avgScore: number | null;
  elapsedSeconds: number;
  persistedCount: number;
}

export interface Job {
  id: string;
  status: JobStatus;
  /** Epoch milliseconds */
  createdAt: number;
  student: string;
  results?: GradedResult[];
  summary?: JobSummary;
  error?: string;
}

export type JobUpdate = Partial<Omit<Job, 'id' | 'createdAt' | 'student'>>;
