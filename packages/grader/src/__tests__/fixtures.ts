/**
 * Shared builders and fakes for grader tests
 */

import type { AnalysisExecutor } from '../execution/analysis-executor.js';
import type { GradedResult } from '../grading/types.js';
import type { ResultRepository } from '../persistence/types.js';
import type { ReviewModel, ReviewRequestOptions } from '../review/types.js';
import type { AnalysisResult, FeatureSummary, SourceUnit } from 'gradekit-core';

export function makeFeatureSummary(overrides: Partial<FeatureSummary> = {}): FeatureSummary {
  return {
    loops: 1,
    conditionals: 2,
    functions: 1,
    maxLoopDepth: 1,
    nestedLoops: false,
    recursion: false,
    classDefined: false,
    dataStructures: { sequence: true, mapping: false, set: false, pair: false, deque: false },
    functionNames: ['binary_search'],
    referencedNames: ['arr', 'target'],
    imports: [],
    hints: { swap: false, halving: true, memo: false, matrix: false },
    ...overrides,
  };
}

export function makeAnalysis(overrides: Partial<AnalysisResult> = {}): AnalysisResult {
  return {
    name: 'search.py',
    valid: true,
    algorithms: ['Binary Search', 'Iterative Logic'],
    complexity: 4,
    maxLoopDepth: 1,
    fingerprint: new Set(['a-b-c', 'b-c-d']),
    fallbackScore: { total: 77, logic: 29, algorithm: 33, style: 8, optimization: 7 },
    notes: [],
    status: 'PENDING',
    features: makeFeatureSummary(),
    runtimeMs: 1.5,
    ...overrides,
  };
}

export function makeGraded(overrides: Partial<GradedResult> = {}): GradedResult {
  return {
    name: 'S01 - Alice Smith | search.py',
    valid: true,
    status: 'PASS',
    totalScore: 77,
    breakdown: { total: 77, logic: 29, algorithm: 33, style: 8, optimization: 7 },
    hasRubric: true,
    aiScored: false,
    algorithms: ['Binary Search'],
    detectedAlgorithm: null,
    complexity: 4,
    maxLoopDepth: 1,
    runtimeMs: 1.5,
    strengths: '',
    weaknesses: '',
    reasoning: 'Scored from the structure of the code (static analysis).',
    improvement: '',
    complexityAnalysis: '',
    notes: [],
    ...overrides,
  };
}

/**
 * Review model replying from a script. A reply that is an Error is thrown.
 */
export class ScriptedReviewModel implements ReviewModel {
  readonly name = 'scripted';
  readonly prompts: string[] = [];
  readonly signals: Array<AbortSignal | undefined> = [];

  constructor(private readonly reply: (prompt: string) => string | Error) {}

  async generate(prompt: string, options: ReviewRequestOptions = {}): Promise<string> {
    this.prompts.push(prompt);
    this.signals.push(options.signal);
    const reply = this.reply(prompt);
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }
}

/**
 * Executor answering from a table keyed by file name, tracking how many
 * analyses overlap.
 */
export class TableExecutor implements AnalysisExecutor {
  active = 0;
  peak = 0;
  closed = false;

  constructor(private readonly table: Record<string, AnalysisResult | Error>) {}

  async analyze(unit: SourceUnit): Promise<AnalysisResult> {
    this.active++;
    this.peak = Math.max(this.peak, this.active);
    try {
      await new Promise<void>(resolve => setTimeout(resolve, 5));
      const entry = this.table[unit.name];
      if (entry instanceof Error) {
        throw entry;
      }
      return entry ?? makeAnalysis({ name: unit.name });
    } finally {
      this.active--;
    }
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export class RecordingRepository implements ResultRepository {
  readonly batches: Array<{ results: GradedResult[]; assignmentCode: string | undefined }> = [];

  constructor(private readonly failure: Error | null = null) {}

  async saveBatch(results: GradedResult[], assignmentCode?: string): Promise<number[]> {
    if (this.failure) {
      throw this.failure;
    }
    this.batches.push({ results, assignmentCode });
    return results.map((_, index) => index + 1);
  }
}
