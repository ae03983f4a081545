/**
 * Persistence Types
 */

import type { AnalysisStatus, ScoreBreakdown } from 'gradekit-core';
import type { GradedResult } from '../grading/types.js';

/**
 * Durable sink for finished results.
 */
export interface ResultRepository {
  /**
   * Store a batch and return the ids assigned to the records that were
   * written. Records that fail to write are left out of the returned ids.
   */
  saveBatch(results: GradedResult[], assignmentCode?: string): Promise<number[]>;
}

export interface ScoreRecord {
  id: number;
  studentId: string;
  studentName: string;
  assignmentCode: string | null;
  filename: string;
  totalScore: number | null;
  breakdown: ScoreBreakdown | null;
  algorithms: string[];
  complexity: number;
  status: AnalysisStatus;
  reasoning: string;
  improvement: string;
  notes: string[];
  aiScored: boolean;
  runtimeMs: number;
  /** ISO timestamp */
  submittedAt: string;
}

export interface ScoreStats {
  totalSubmissions: number;
  avgScore: number;
  maxScore: number;
  minScore: number;
  passed: number;
  failed: number;
  flagged: number;
}
