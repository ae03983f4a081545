/**
 * Structured errors
 *
 * Every failure gradekit raises carries a stable code, optional details
 * and a recovery hint for whoever reads the log or the job snapshot.
 */

export enum GradeKitErrorCode {
  // Per-unit conditions
  PARSE_ERROR = 'PARSE_ERROR',
  SAFETY_VIOLATION = 'SAFETY_VIOLATION',

  // Collaborator failures
  REVIEWER_UNAVAILABLE = 'REVIEWER_UNAVAILABLE',
  PERSISTENCE_FAILURE = 'PERSISTENCE_FAILURE',
  DELIVERY_FAILURE = 'DELIVERY_FAILURE',

  // Job scope
  JOB_FAILURE = 'JOB_FAILURE',
  JOB_NOT_FOUND = 'JOB_NOT_FOUND',
  SERVICE_SHUTDOWN = 'SERVICE_SHUTDOWN',

  // Caller errors
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
  INVALID_CONFIG = 'INVALID_CONFIG',
}

export interface RecoveryHint {
  suggestion: string;
  retryAfterMs?: number;
}

export interface GradeKitErrorDetails {
  code: GradeKitErrorCode;
  message: string;
  details?: Record<string, unknown> | undefined;
  recovery?: RecoveryHint | undefined;
  cause?: unknown;
}

export class GradeKitError extends Error {
  public readonly code: GradeKitErrorCode;
  public readonly details?: Record<string, unknown> | undefined;
  public readonly recovery?: RecoveryHint | undefined;

  constructor(errorDetails: GradeKitErrorDetails) {
    super(errorDetails.message, errorDetails.cause !== undefined ? { cause: errorDetails.cause } : undefined);
    this.name = 'GradeKitError';
    this.code = errorDetails.code;
    this.details = errorDetails.details;
    this.recovery = errorDetails.recovery;
  }

  /**
   * Plain object form for logs and JSON output
   */
  toJSON(): { code: GradeKitErrorCode; message: string; details?: Record<string, unknown> | undefined; recovery?: RecoveryHint | undefined } {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
      recovery: this.recovery,
    };
  }
}

/**
 * Extract a human-readable message from anything thrown.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Check whether a value is a GradeKitError, optionally with a given code.
 */
export function isGradeKitError(error: unknown, code?: GradeKitErrorCode): error is GradeKitError {
  return error instanceof GradeKitError && (code === undefined || error.code === code);
}

/**
 * Error factory functions for common errors
 */
export const Errors = {
  parse(line: number, message: string): GradeKitError {
    return new GradeKitError({
      code: GradeKitErrorCode.PARSE_ERROR,
      message: `Syntax error at line ${line}: ${message}`,
      details: { line },
    });
  },

  safetyViolation(violations: string[]): GradeKitError {
    return new GradeKitError({
      code: GradeKitErrorCode.SAFETY_VIOLATION,
      message: `Security violation: ${violations.join('; ')}`,
      details: { violations },
    });
  },

  reviewerUnavailable(reason: string, cause?: unknown): GradeKitError {
    return new GradeKitError({
      code: GradeKitErrorCode.REVIEWER_UNAVAILABLE,
      message: `Reviewer unavailable: ${reason}`,
      cause,
      recovery: {
        suggestion: 'Check GEMINI_API_KEY and network access; grading continues with fallback scores',
      },
    });
  },

  persistenceFailed(reason: string, cause?: unknown): GradeKitError {
    return new GradeKitError({
      code: GradeKitErrorCode.PERSISTENCE_FAILURE,
      message: `Failed to persist results: ${reason}`,
      cause,
    });
  },

  deliveryFailed(url: string, reason: string): GradeKitError {
    return new GradeKitError({
      code: GradeKitErrorCode.DELIVERY_FAILURE,
      message: `Webhook delivery to '${url}' failed: ${reason}`,
      details: { url },
    });
  },

  jobFailed(message: string): GradeKitError {
    return new GradeKitError({
      code: GradeKitErrorCode.JOB_FAILURE,
      message,
    });
  },

  jobNotFound(jobId: string): GradeKitError {
    return new GradeKitError({
      code: GradeKitErrorCode.JOB_NOT_FOUND,
      message: `Grading job not found: ${jobId}`,
      details: { jobId },
      recovery: {
        suggestion: 'Jobs expire after their TTL; finished results remain in the score store',
      },
    });
  },

  shutdown(): GradeKitError {
    return new GradeKitError({
      code: GradeKitErrorCode.SERVICE_SHUTDOWN,
      message: 'Grading service is shutting down and no longer accepts submissions',
    });
  },

  invalidArgument(param: string, reason: string): GradeKitError {
    return new GradeKitError({
      code: GradeKitErrorCode.INVALID_ARGUMENT,
      message: `Invalid argument '${param}': ${reason}`,
      details: { param, reason },
    });
  },

  invalidConfig(problems: string[]): GradeKitError {
    return new GradeKitError({
      code: GradeKitErrorCode.INVALID_CONFIG,
      message: `Invalid configuration: ${problems.join('; ')}`,
      details: { problems },
    });
  },
};
