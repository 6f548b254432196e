/**
 * Screening Error Types
 *
 * Error codes and response structures for the screening pipeline.
 * Extends the shared AppError from src/shared/errors/types.ts
 */

import { AppError, ErrorCategory, ErrorSeverity } from '../../shared/errors/types';
import type { ValidationError } from '../../shared/validation/types';

export type { ValidationError };

/**
 * Screening error codes
 */
export enum ScreeningErrorCode {
  // Caller errors
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
  AGGREGATION_INPUT_ERROR = 'AGGREGATION_INPUT_ERROR',
  RESUME_NOT_FOUND = 'RESUME_NOT_FOUND',

  // Oracle faults
  ORACLE_PARSE_ERROR = 'ORACLE_PARSE_ERROR',
  ORACLE_THROTTLED = 'ORACLE_THROTTLED',
  ORACLE_TIMEOUT = 'ORACLE_TIMEOUT',

  // Other collaborators
  EMBEDDING_FAILED = 'EMBEDDING_FAILED',
  VECTOR_INDEX_FAILED = 'VECTOR_INDEX_FAILED',
  STORAGE_ERROR = 'STORAGE_ERROR',

  // General
  REQUEST_CANCELLED = 'REQUEST_CANCELLED',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR'
}

/**
 * Error response structure for external communication
 */
export interface ErrorResponse {
  error: ScreeningErrorCode;
  message: string;
  details?: string;
  timestamp: string;
  request_id?: string;
  validation_errors?: ValidationError[];
  retryable?: boolean;
  suggested_action?: string;
}

/**
 * Screening-specific error class
 */
export class ScreeningError extends AppError {
  public readonly code: ScreeningErrorCode;
  public readonly validationErrors?: ValidationError[];
  public readonly retryable: boolean;

  constructor(
    code: ScreeningErrorCode,
    userMessage: string,
    technicalDetails: string,
    options?: {
      category?: ErrorCategory;
      severity?: ErrorSeverity;
      context?: Record<string, unknown>;
      validationErrors?: ValidationError[];
      retryable?: boolean;
      suggestedAction?: string;
    }
  ) {
    super({
      category: options?.category || ErrorCategory.UNEXPECTED,
      severity: options?.severity || ErrorSeverity.MEDIUM,
      userMessage,
      technicalDetails,
      timestamp: new Date(),
      context: options?.context,
      recoverable: options?.retryable ?? false,
      suggestedAction: options?.suggestedAction
    });

    this.name = 'ScreeningError';
    this.code = code;
    this.validationErrors = options?.validationErrors;
    this.retryable = options?.retryable ?? false;
  }

  /**
   * Convert to error response format
   */
  toErrorResponse(requestId?: string): ErrorResponse {
    return {
      error: this.code,
      message: this.userMessage,
      details: this.technicalDetails,
      timestamp: this.timestamp.toISOString(),
      request_id: requestId,
      validation_errors: this.validationErrors,
      retryable: this.retryable,
      suggested_action: this.suggestedAction
    };
  }
}

/**
 * True when the error is a ScreeningError with one of the given codes
 */
export function isScreeningError(
  error: unknown,
  ...codes: ScreeningErrorCode[]
): error is ScreeningError {
  return error instanceof ScreeningError && (codes.length === 0 || codes.includes(error.code));
}

/**
 * Factory functions for common error types
 */
export class ScreeningErrorFactory {
  /**
   * Malformed or out-of-range input to a pure function
   */
  static invalidArgument(
    field: string,
    message: string,
    received?: unknown
  ): ScreeningError {
    return new ScreeningError(
      ScreeningErrorCode.INVALID_ARGUMENT,
      `Invalid argument: ${field}`,
      message,
      {
        category: ErrorCategory.VALIDATION,
        severity: ErrorSeverity.MEDIUM,
        validationErrors: [{ field, message, received }],
        retryable: false,
        suggestedAction: 'Check input format and required fields'
      }
    );
  }

  /**
   * Input that failed schema validation, with one entry per issue
   */
  static invalidInput(
    subject: string,
    validationErrors: ValidationError[]
  ): ScreeningError {
    return new ScreeningError(
      ScreeningErrorCode.INVALID_ARGUMENT,
      `Invalid argument: ${subject}`,
      validationErrors.map(e => `${e.field || '(root)'}: ${e.message}`).join('; '),
      {
        category: ErrorCategory.VALIDATION,
        severity: ErrorSeverity.MEDIUM,
        validationErrors,
        retryable: false,
        suggestedAction: 'Check input format and required fields'
      }
    );
  }

  /**
   * Inputs to the score aggregator that contradict each other
   */
  static aggregationInput(
    reason: string,
    context?: Record<string, unknown>
  ): ScreeningError {
    return new ScreeningError(
      ScreeningErrorCode.AGGREGATION_INPUT_ERROR,
      'Score aggregation inputs are inconsistent',
      reason,
      {
        category: ErrorCategory.VALIDATION,
        severity: ErrorSeverity.HIGH,
        context,
        retryable: false,
        suggestedAction: 'Ensure every skill score belongs to exactly one job requirement'
      }
    );
  }

  /**
   * Oracle response that is not valid JSON or does not match its schema
   */
  static oracleParse(
    promptKind: string,
    reason: string,
    validationErrors?: ValidationError[]
  ): ScreeningError {
    return new ScreeningError(
      ScreeningErrorCode.ORACLE_PARSE_ERROR,
      `Oracle returned an unusable ${promptKind} response`,
      reason,
      {
        category: ErrorCategory.EXTERNAL_SERVICE,
        severity: ErrorSeverity.MEDIUM,
        context: { promptKind },
        validationErrors,
        retryable: true,
        suggestedAction: 'Will retry with a stricter prompt'
      }
    );
  }

  /**
   * Oracle rejected the request because of rate limits
   */
  static oracleThrottled(
    details: string
  ): ScreeningError {
    return new ScreeningError(
      ScreeningErrorCode.ORACLE_THROTTLED,
      'Oracle rate limit exceeded',
      details,
      {
        category: ErrorCategory.EXTERNAL_SERVICE,
        severity: ErrorSeverity.MEDIUM,
        retryable: true,
        suggestedAction: 'Wait before retrying'
      }
    );
  }

  /**
   * Oracle did not answer in time
   */
  static oracleTimeout(
    timeoutMs: number,
    details?: string
  ): ScreeningError {
    return new ScreeningError(
      ScreeningErrorCode.ORACLE_TIMEOUT,
      'Oracle call timed out',
      details ?? `No response received within ${timeoutMs}ms`,
      {
        category: ErrorCategory.EXTERNAL_SERVICE,
        severity: ErrorSeverity.HIGH,
        context: { timeoutMs },
        retryable: true,
        suggestedAction: 'Retry the operation or increase the timeout'
      }
    );
  }

  /**
   * Embedding call failed
   */
  static embeddingFailed(
    reason: string
  ): ScreeningError {
    return new ScreeningError(
      ScreeningErrorCode.EMBEDDING_FAILED,
      'Embedding request failed',
      reason,
      {
        category: ErrorCategory.EXTERNAL_SERVICE,
        severity: ErrorSeverity.HIGH,
        retryable: true
      }
    );
  }

  /**
   * Vector index call failed
   */
  static vectorIndexFailed(
    operation: string,
    reason: string
  ): ScreeningError {
    return new ScreeningError(
      ScreeningErrorCode.VECTOR_INDEX_FAILED,
      `Vector index ${operation} failed`,
      reason,
      {
        category: ErrorCategory.EXTERNAL_SERVICE,
        severity: ErrorSeverity.HIGH,
        context: { operation },
        retryable: true
      }
    );
  }

  /**
   * Persistence failure
   */
  static storage(
    operation: string,
    reason: string
  ): ScreeningError {
    return new ScreeningError(
      ScreeningErrorCode.STORAGE_ERROR,
      `Storage ${operation} failed`,
      reason,
      {
        category: ErrorCategory.STORAGE,
        severity: ErrorSeverity.HIGH,
        context: { operation },
        retryable: false,
        suggestedAction: 'Check the database path and permissions'
      }
    );
  }

  /**
   * Scoring requested for a resume that was never ingested
   */
  static resumeNotFound(
    resumeId: string
  ): ScreeningError {
    return new ScreeningError(
      ScreeningErrorCode.RESUME_NOT_FOUND,
      'Resume not found',
      `Resume with id ${resumeId} has not been ingested`,
      {
        category: ErrorCategory.VALIDATION,
        severity: ErrorSeverity.MEDIUM,
        context: { resumeId },
        retryable: false,
        suggestedAction: 'Ingest the resume before scoring it'
      }
    );
  }

  /**
   * Caller abandoned the request
   */
  static cancelled(
    operation: string
  ): ScreeningError {
    return new ScreeningError(
      ScreeningErrorCode.REQUEST_CANCELLED,
      `${operation} was cancelled`,
      'Abort signal received before all work completed',
      {
        category: ErrorCategory.CANCELLED,
        severity: ErrorSeverity.LOW,
        retryable: false
      }
    );
  }

  /**
   * Configuration value out of range
   */
  static configurationError(
    field: string,
    reason: string
  ): ScreeningError {
    return new ScreeningError(
      ScreeningErrorCode.CONFIGURATION_ERROR,
      'Configuration error',
      `Invalid configuration for ${field}: ${reason}`,
      {
        category: ErrorCategory.CONFIGURATION,
        severity: ErrorSeverity.CRITICAL,
        context: { field },
        retryable: false,
        suggestedAction: 'Check configuration settings'
      }
    );
  }
}
