/**
 * Grading Types
 */

import type { AnalysisStatus, Fingerprint, ScoreBreakdown, SourceUnit } from 'gradekit-core';

/**
 * Final per-file record: persisted, returned and sent to webhooks.
 */
export interface GradedResult {
  name: string;
  valid: boolean;
  status: AnalysisStatus;
  /** null when no numeric grade was given */
  totalScore: number | null;
  breakdown: ScoreBreakdown | null;
  hasRubric: boolean;
  aiScored: boolean;
  algorithms: string[];
  detectedAlgorithm: string | null;
  complexity: number;
  maxLoopDepth: number;
  runtimeMs: number;
  strengths: string;
  weaknesses: string;
  reasoning: string;
  improvement: string;
  complexityAnalysis: string;
  notes: string[];
}

/**
 * A graded result that has not been through similarity detection yet.
 */
export interface FingerprintedResult extends GradedResult {
  fingerprint: Fingerprint | null;
}

export interface GradingRequest {
  units: SourceUnit[];
  /** Problem key for rubric lookup; each file's name is used otherwise */
  topic?: string | undefined;
  /** Submitter identity used to decorate result names */
  student?: string | undefined;
  assignmentCode?: string | undefined;
  /** Webhook notified when the job completes */
  callbackUrl?: string | undefined;
}
