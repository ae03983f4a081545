/**
 * Analysis Types
 *
 * Shapes produced by the static analysis of one submitted Python file.
 */

// ============================================
// Input
// ============================================

/**
 * One submitted file after upstream extraction.
 */
export interface SourceUnit {
  readonly name: string;
  readonly text: string;
}

// ============================================
// Features
// ============================================

/**
 * Which collection kinds the code builds or imports.
 */
export interface DataStructureUsage {
  /** List literals and list comprehensions */
  sequence: boolean;
  /** Dictionary literals and comprehensions */
  mapping: boolean;
  /** Set literals and comprehensions */
  set: boolean;
  /** Tuples and tuple-shaped targets */
  pair: boolean;
  /** Anything imported from a collections-like module */
  deque: boolean;
}

/**
 * Structural hints that point at well-known techniques.
 */
export interface AlgorithmHints {
  /** `a, b = b, a` */
  swap: boolean;
  /** `// 2` or `>> 1` inside a loop */
  halving: boolean;
  /** An assignment target named like a memo table */
  memo: boolean;
  /** `grid[i][j]` */
  matrix: boolean;
}

/**
 * Everything the feature extractor learns from one tree.
 */
export interface FeatureRecord {
  loops: number;
  conditionals: number;
  functions: number;
  maxLoopDepth: number;
  nestedLoops: boolean;
  recursion: boolean;
  classDefined: boolean;
  dataStructures: DataStructureUsage;
  /** Declared function names, lowercased, in source order */
  functionNames: string[];
  /** Referenced identifiers, lowercased, in visit order */
  referencedNames: string[];
  /** Imported module names, sorted and unique */
  imports: string[];
  hints: AlgorithmHints;
  /** Node-type sequence, consumed by the fingerprint generator only */
  nodeTokens: string[];
}

/**
 * The part of a FeatureRecord that leaves the analyzer.
 */
export type FeatureSummary = Omit<FeatureRecord, 'nodeTokens'>;

/**
 * Set of 3-shingles over node-type tokens.
 */
export type Fingerprint = ReadonlySet<string>;

// ============================================
// Scores
// ============================================

export interface ScoreBreakdown {
  total: number;
  logic: number;
  algorithm: number;
  style: number;
  optimization: number;
}

/** Upper bound of every score field; every lower bound is 0 */
export const SCORE_LIMITS: Readonly<ScoreBreakdown> = {
  total: 100,
  logic: 40,
  algorithm: 40,
  style: 10,
  optimization: 10,
};

// ============================================
// Results
// ============================================

export type AnalysisStatus = 'PENDING' | 'PASS' | 'FAIL' | 'FLAG';

export interface AnalysisResult {
  name: string;
  /** false when the source failed to parse or tripped the safety scan */
  valid: boolean;
  /** Sorted, unique labels */
  algorithms: string[];
  complexity: number;
  maxLoopDepth: number;
  fingerprint: Fingerprint | null;
  fallbackScore: ScoreBreakdown | null;
  notes: string[];
  status: AnalysisStatus;
  features: FeatureSummary | null;
  /** Wall-clock time spent analysing, in milliseconds */
  runtimeMs: number;
}

/**
 * An analysis result once its fingerprint has been consumed.
 */
export type ComparedResult<T extends { fingerprint: Fingerprint | null }> = Omit<T, 'fingerprint'>;
