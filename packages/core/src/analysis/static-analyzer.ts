/**
 * Static Analyzer
 *
 * Runs the per-file pipeline: parse, safety scan, feature extraction,
 * classification, fingerprinting and fallback scoring. Malformed or
 * unsafe files come back as invalid results rather than exceptions.
 */

import { performance } from 'node:perf_hooks';
import { Errors } from '../infrastructure/errors.js';
import { PythonSourceParser } from '../parsers/tree-sitter/python-source-parser.js';
import { classifyAlgorithms } from './algorithm-classifier.js';
import { scoreFallback } from './fallback-scorer.js';
import { cyclomaticComplexity, extractFeatures } from './feature-extractor.js';
import { createFingerprint } from './fingerprint.js';
import { scanForViolations } from './safety-scanner.js';
import type { AnalysisResult, AnalysisStatus, SourceUnit } from './types.js';

export const SECURITY_VIOLATION_NOTE = 'Security violation';

export interface StaticAnalyzerOptions {
  /** Parser to reuse; one is created lazily otherwise */
  parser?: PythonSourceParser;
}

/**
 * Result for a file that never reached feature extraction.
 */
export function invalidAnalysis(
  name: string,
  notes: string[],
  status: Extract<AnalysisStatus, 'FAIL' | 'FLAG'>,
  runtimeMs: number = 0
): AnalysisResult {
  return {
    name,
    valid: false,
    algorithms: [],
    complexity: 0,
    maxLoopDepth: 0,
    fingerprint: null,
    fallbackScore: null,
    notes,
    status,
    features: null,
    runtimeMs,
  };
}

export class StaticAnalyzer {
  private readonly parser: PythonSourceParser;

  constructor(options: StaticAnalyzerOptions = {}) {
    this.parser = options.parser ?? new PythonSourceParser();
  }

  analyze(unit: SourceUnit): AnalysisResult {
    const start = performance.now();
    const elapsed = (): number => Math.round(performance.now() - start);

    const parsed = this.parser.parse(unit.text);
    if (!parsed.success) {
      const { line, message } = parsed.error;
      return invalidAnalysis(unit.name, [Errors.parse(line, message).message], 'FAIL', elapsed());
    }

    const root = parsed.tree.rootNode;

    const violations = scanForViolations(root);
    if (violations.length > 0) {
      return invalidAnalysis(unit.name, [SECURITY_VIOLATION_NOTE, ...violations], 'FLAG', elapsed());
    }

    const { nodeTokens, ...features } = extractFeatures(root);
    const complexity = cyclomaticComplexity(features);
    const algorithms = classifyAlgorithms(features);

    return {
      name: unit.name,
      valid: true,
      algorithms,
      complexity,
      maxLoopDepth: features.maxLoopDepth,
      fingerprint: createFingerprint(nodeTokens),
      fallbackScore: scoreFallback(features, complexity, algorithms.length),
      notes: [],
      status: 'PENDING',
      features,
      runtimeMs: elapsed(),
    };
  }
}
