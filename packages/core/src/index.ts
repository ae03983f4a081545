/**
 * gradekit-core - Static analysis engine for submitted Python sources
 *
 * - Parsers: tree-sitter loading and a Python parse wrapper
 * - Analysis: safety scan, feature extraction, classification,
 *   fingerprints and fallback scores
 * - Similarity: near-duplicate detection across a batch
 * - Infrastructure: logging and structured errors
 */

// Export version
export const VERSION = '0.1.0';

// Analysis exports
export type {
  SourceUnit,
  DataStructureUsage,
  AlgorithmHints,
  FeatureRecord,
  FeatureSummary,
  Fingerprint,
  ScoreBreakdown,
  AnalysisStatus,
  AnalysisResult,
  ComparedResult,
} from './analysis/types.js';
export { SCORE_LIMITS } from './analysis/types.js';
export { extractFeatures, cyclomaticComplexity } from './analysis/feature-extractor.js';
export { scanForViolations, FORBIDDEN_MODULES, FORBIDDEN_CALLS } from './analysis/safety-scanner.js';
export { classifyAlgorithms, NAME_LABELS, STACK_QUEUE_OPERATIONS } from './analysis/algorithm-classifier.js';
export { createFingerprint, jaccardSimilarity, SHINGLE_SIZE } from './analysis/fingerprint.js';
export { scoreFallback } from './analysis/fallback-scorer.js';
export {
  StaticAnalyzer,
  invalidAnalysis,
  SECURITY_VIOLATION_NOTE,
  type StaticAnalyzerOptions,
} from './analysis/static-analyzer.js';

// Similarity exports
export {
  detectSimilarity,
  findSimilarPairs,
  duplicateNote,
  DEFAULT_SIMILARITY_THRESHOLD,
  type Comparable,
  type SimilarPair,
} from './similarity/similarity-detector.js';

// Tree-sitter exports
export {
  isTreeSitterAvailable,
  createPythonParser,
  getLoadingError,
} from './parsers/tree-sitter/loader.js';
export {
  PythonSourceParser,
  type PythonParseResult,
  type SourceParseError,
} from './parsers/tree-sitter/python-source-parser.js';
export type { TreeSitterNode, TreeSitterTree } from './parsers/tree-sitter/types.js';

// Infrastructure exports
export {
  Logger,
  createLogger,
  createSilentLogger,
  isLogLevel,
  type LogLevel,
  type LogSink,
  type LoggerOptions,
} from './infrastructure/logger.js';
export {
  GradeKitError,
  GradeKitErrorCode,
  Errors,
  errorMessage,
  isGradeKitError,
  type RecoveryHint,
  type GradeKitErrorDetails,
} from './infrastructure/errors.js';
