/**
 * Analysis Executors
 *
 * Where the CPU-bound tree walk of a file runs. The inline executor
 * stays on the main thread but yields first; the worker pool executor
 * moves the walk onto worker threads.
 */

import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import { StaticAnalyzer, type AnalysisResult, type SourceUnit } from 'gradekit-core';

export interface AnalysisExecutor {
  analyze(unit: SourceUnit): Promise<AnalysisResult>;
  /** Release threads or other resources held by the executor */
  close(): Promise<void>;
}

export class InlineAnalysisExecutor implements AnalysisExecutor {
  constructor(private readonly analyzer: StaticAnalyzer = new StaticAnalyzer()) {}

  async analyze(unit: SourceUnit): Promise<AnalysisResult> {
    await yieldToEventLoop();
    return this.analyzer.analyze(unit);
  }

  async close(): Promise<void> {
    // nothing held
  }
}
