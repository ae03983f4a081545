/**
 * Grader Configuration
 *
 * Configuration types and defaults for the grading service, with
 * validation, merging and environment loading.
 */

// ============================================
// Configuration Interface
// ============================================

export interface GraderConfig {
  /** Gemini API key; null disables the external reviewer (default: null) */
  geminiApiKey: string | null;

  /** Gemini model name (default: 'gemini-2.0-flash') */
  reviewModel: string;

  /** Sampling temperature for reviews (default: 0.1) */
  reviewTemperature: number;

  /** Nucleus sampling for reviews (default: 0.95) */
  reviewTopP: number;

  /** Top-k sampling for reviews (default: 40) */
  reviewTopK: number;

  /** Output token limit for one review (default: 4096) */
  reviewMaxOutputTokens: number;

  /** Timeout for one reviewer call in milliseconds (default: 60000) */
  reviewTimeoutMs: number;

  /** Base URL of the problem bank; null disables rubric lookup (default: null) */
  rubricApiUrl: string | null;

  /** Value of the x-api-key header sent to the problem bank (default: null) */
  rubricApiKey: string | null;

  /** Timeout for one rubric lookup in milliseconds (default: 10000) */
  rubricTimeoutMs: number;

  /** Minimum total score that passes (default: 50) */
  passScoreThreshold: number;

  /** Jaccard similarity above which two files are flagged (default: 0.85) */
  similarityThreshold: number;

  /** Unit pipelines allowed to run at once across all jobs (default: 50) */
  maxConcurrency: number;

  /** Age after which a job is forgotten, in milliseconds (default: 1 hour) */
  jobTtlMs: number;

  /** Interval of the periodic job sweep in milliseconds (default: 1 hour) */
  reaperIntervalMs: number;

  /** Delivery attempts per webhook (default: 3) */
  webhookMaxAttempts: number;

  /** Timeout of one webhook attempt in milliseconds (default: 10000) */
  webhookTimeoutMs: number;

  /** Backoff unit in milliseconds; attempt n waits 2^n units (default: 1000) */
  webhookBackoffUnitMs: number;

  /** Directory of the JSON score store (default: 'scores') */
  scoresDir: string;
}

// ============================================
// Default Configuration
// ============================================

export const DEFAULT_GRADER_CONFIG: Readonly<GraderConfig> = {
  geminiApiKey: null,
  reviewModel: 'gemini-2.0-flash',
  reviewTemperature: 0.1,
  reviewTopP: 0.95,
  reviewTopK: 40,
  reviewMaxOutputTokens: 4096,
  reviewTimeoutMs: 60_000,
  rubricApiUrl: null,
  rubricApiKey: null,
  rubricTimeoutMs: 10_000,
  passScoreThreshold: 50,
  similarityThreshold: 0.85,
  maxConcurrency: 50,
  jobTtlMs: 3_600_000,
  reaperIntervalMs: 3_600_000,
  webhookMaxAttempts: 3,
  webhookTimeoutMs: 10_000,
  webhookBackoffUnitMs: 1000,
  scoresDir: 'scores',
};

// ============================================
// Configuration Validation
// ============================================

export interface ConfigValidationError {
  /** Field that failed validation */
  field: keyof GraderConfig;
  /** Error message */
  message: string;
  /** The invalid value */
  value: unknown;
}

export interface ConfigValidationResult {
  valid: boolean;
  errors: ConfigValidationError[];
  /** Defaults overlaid with every field that passed validation */
  config: GraderConfig;
}

type NumericField = {
  [K in keyof GraderConfig]: GraderConfig[K] extends number ? K : never;
}[keyof GraderConfig];

type OptionalStringField = 'geminiApiKey' | 'rubricApiUrl' | 'rubricApiKey';

interface NumberRule {
  min: number;
  max?: number;
  integer?: boolean;
  /** Whether min itself is rejected */
  exclusiveMin?: boolean;
}

const NUMBER_RULES: Record<NumericField, NumberRule> = {
  reviewTemperature: { min: 0, max: 2 },
  reviewTopP: { min: 0, max: 1 },
  reviewTopK: { min: 1, integer: true },
  reviewMaxOutputTokens: { min: 1, integer: true },
  reviewTimeoutMs: { min: 0, exclusiveMin: true },
  rubricTimeoutMs: { min: 0, exclusiveMin: true },
  passScoreThreshold: { min: 0, max: 100 },
  similarityThreshold: { min: 0, max: 1 },
  maxConcurrency: { min: 1, integer: true },
  jobTtlMs: { min: 0, exclusiveMin: true },
  reaperIntervalMs: { min: 0, exclusiveMin: true },
  webhookMaxAttempts: { min: 1, max: 10, integer: true },
  webhookTimeoutMs: { min: 0, exclusiveMin: true },
  webhookBackoffUnitMs: { min: 0 },
};

function describeRule(rule: NumberRule): string {
  const kind = rule.integer ? 'an integer' : 'a number';
  const lower = rule.exclusiveMin ? `greater than ${rule.min}` : `at least ${rule.min}`;
  return rule.max === undefined ? `must be ${kind} ${lower}` : `must be ${kind} ${lower} and at most ${rule.max}`;
}

function checkNumber(value: unknown, rule: NumberRule): value is number {
  if (typeof value !== 'number' || !Number.isFinite(value)) return false;
  if (rule.integer && !Number.isInteger(value)) return false;
  if (rule.exclusiveMin ? value <= rule.min : value < rule.min) return false;
  return rule.max === undefined || value <= rule.max;
}

function isNumericField(field: string): field is NumericField {
  return field in NUMBER_RULES;
}

/**
 * Validate a partial grader configuration.
 */
export function validateConfig(config: Partial<GraderConfig>): ConfigValidationResult {
  const errors: ConfigValidationError[] = [];
  const normalized: GraderConfig = { ...DEFAULT_GRADER_CONFIG };

  for (const field of Object.keys(NUMBER_RULES)) {
    if (!isNumericField(field)) continue;
    const value = config[field];
    if (value === undefined) continue;

    const rule = NUMBER_RULES[field];
    if (checkNumber(value, rule)) {
      normalized[field] = value;
    } else {
      errors.push({ field, message: describeRule(rule), value });
    }
  }

  const optionalStrings: OptionalStringField[] = ['geminiApiKey', 'rubricApiUrl', 'rubricApiKey'];
  for (const field of optionalStrings) {
    const value = config[field];
    if (value === undefined) continue;
    if (value === null || (typeof value === 'string' && value.length > 0)) {
      normalized[field] = value;
    } else {
      errors.push({ field, message: 'must be a non-empty string or null', value });
    }
  }

  if (config.rubricApiUrl) {
    try {
      new URL(config.rubricApiUrl);
    } catch {
      errors.push({ field: 'rubricApiUrl', message: 'must be an absolute URL', value: config.rubricApiUrl });
      normalized.rubricApiUrl = DEFAULT_GRADER_CONFIG.rubricApiUrl;
    }
  }

  if (config.reviewModel !== undefined) {
    if (typeof config.reviewModel !== 'string' || config.reviewModel.trim() === '') {
      errors.push({ field: 'reviewModel', message: 'must be a non-empty string', value: config.reviewModel });
    } else {
      normalized.reviewModel = config.reviewModel;
    }
  }

  if (config.scoresDir !== undefined) {
    if (typeof config.scoresDir !== 'string' || config.scoresDir.trim() === '') {
      errors.push({ field: 'scoresDir', message: 'must be a non-empty path', value: config.scoresDir });
    } else {
      normalized.scoresDir = config.scoresDir;
    }
  }

  return {
    valid: errors.length === 0,
    errors,
    config: normalized,
  };
}

/**
 * Merge partial configuration with defaults.
 */
export function mergeConfig(config: Partial<GraderConfig>): GraderConfig {
  return {
    ...DEFAULT_GRADER_CONFIG,
    ...config,
  };
}

/**
 * Create configuration from environment variables.
 *
 * Environment variables:
 * - GEMINI_API_KEY: reviewer credential
 * - GRADEKIT_REVIEW_MODEL: Gemini model name
 * - GRADEKIT_RUBRIC_URL / GRADEKIT_RUBRIC_API_KEY: problem bank
 * - GRADEKIT_PASS_THRESHOLD: number
 * - GRADEKIT_SIMILARITY_THRESHOLD: number between 0 and 1
 * - GRADEKIT_MAX_CONCURRENCY: number
 * - GRADEKIT_JOB_TTL_MS: number (milliseconds)
 * - GRADEKIT_SCORES_DIR: path
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<GraderConfig> {
  const config: Partial<GraderConfig> = {};

  const apiKey = env['GEMINI_API_KEY'];
  if (apiKey) {
    config.geminiApiKey = apiKey;
  }

  const model = env['GRADEKIT_REVIEW_MODEL'];
  if (model) {
    config.reviewModel = model;
  }

  const rubricUrl = env['GRADEKIT_RUBRIC_URL'];
  if (rubricUrl) {
    config.rubricApiUrl = rubricUrl;
  }

  const rubricKey = env['GRADEKIT_RUBRIC_API_KEY'];
  if (rubricKey) {
    config.rubricApiKey = rubricKey;
  }

  const passThreshold = env['GRADEKIT_PASS_THRESHOLD'];
  if (passThreshold !== undefined) {
    const parsed = parseFloat(passThreshold);
    if (!isNaN(parsed)) {
      config.passScoreThreshold = parsed;
    }
  }

  const similarity = env['GRADEKIT_SIMILARITY_THRESHOLD'];
  if (similarity !== undefined) {
    const parsed = parseFloat(similarity);
    if (!isNaN(parsed)) {
      config.similarityThreshold = parsed;
    }
  }

  const concurrency = env['GRADEKIT_MAX_CONCURRENCY'];
  if (concurrency !== undefined) {
    const parsed = parseInt(concurrency, 10);
    if (!isNaN(parsed)) {
      config.maxConcurrency = parsed;
    }
  }

  const ttl = env['GRADEKIT_JOB_TTL_MS'];
  if (ttl !== undefined) {
    const parsed = parseInt(ttl, 10);
    if (!isNaN(parsed)) {
      config.jobTtlMs = parsed;
    }
  }

  const scoresDir = env['GRADEKIT_SCORES_DIR'];
  if (scoresDir) {
    config.scoresDir = scoresDir;
  }

  return config;
}
