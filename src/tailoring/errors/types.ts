/**
 * Tailoring Error Types
 *
 * Failure taxonomy of the orchestration core. Extends the shared AppError
 * so every failure carries a category, severity and user-facing message.
 */

import { AppError, ErrorCategory, ErrorSeverity } from '../../shared/errors/types';
import { ProviderError } from '../../shared/llm/errors';
import type { TaskType } from '../types';

/**
 * Failure kinds surfaced on a failed GenerationResult
 */
export enum TailoringErrorKind {
  /** Every eligible model is circuit-open, or none supports the task */
  PROVIDER_UNAVAILABLE = 'ProviderUnavailable',
  /** Ledger admission denied and no cheaper model fits */
  BUDGET_EXCEEDED = 'BudgetExceeded',
  /** A provider call timed out or errored */
  PROVIDER_CALL_FAILED = 'ProviderCallFailed',
  /** Empty or malformed source content */
  INVALID_INPUT = 'InvalidInput',
  /** A cache entry exists but cannot be decoded */
  INTERNAL_CACHE_INCONSISTENCY = 'InternalCacheInconsistency',
  /** The caller aborted the request */
  CANCELLED = 'Cancelled',
  /** Storage or programming fault outside the taxonomy above */
  INTERNAL = 'InternalError'
}

/**
 * Error response structure for the task layer above the core
 */
export interface ErrorResponse {
  error: TailoringErrorKind;
  message: string;
  details: string;
  timestamp: string;
  request_id?: string;
  retryable: boolean;
  suggested_action?: string;
}

/**
 * Orchestration error
 */
export class TailoringError extends AppError {
  public readonly kind: TailoringErrorKind;
  public readonly retryable: boolean;

  constructor(
    kind: TailoringErrorKind,
    userMessage: string,
    technicalDetails: string,
    options?: {
      category?: ErrorCategory;
      severity?: ErrorSeverity;
      context?: Record<string, unknown>;
      retryable?: boolean;
      suggestedAction?: string;
      cause?: unknown;
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

    this.name = 'TailoringError';
    this.kind = kind;
    this.retryable = options?.retryable ?? false;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }

  /**
   * Convert to error response format
   */
  toErrorResponse(requestId?: string): ErrorResponse {
    return {
      error: this.kind,
      message: this.userMessage,
      details: this.technicalDetails,
      timestamp: this.timestamp.toISOString(),
      request_id: requestId,
      retryable: this.retryable,
      suggested_action: this.suggestedAction
    };
  }
}

/**
 * Factory functions for each failure kind
 */
export class TailoringErrorFactory {
  static providerUnavailable(taskType: TaskType, details: string): TailoringError {
    return new TailoringError(
      TailoringErrorKind.PROVIDER_UNAVAILABLE,
      `No model is currently available for ${taskType.replace('_', ' ')}`,
      details,
      {
        category: ErrorCategory.PROVIDER,
        severity: ErrorSeverity.HIGH,
        context: { taskType },
        retryable: true,
        suggestedAction: 'Model providers are recovering. Resubmit the request in a minute.'
      }
    );
  }

  static budgetExceeded(
    principalId: string,
    tier: string,
    estimatedCostUsd: number,
    remainingUsd: number
  ): TailoringError {
    return new TailoringError(
      TailoringErrorKind.BUDGET_EXCEEDED,
      'Daily usage budget exceeded',
      `Estimated cost $${estimatedCostUsd.toFixed(6)} exceeds remaining $${remainingUsd.toFixed(6)} for tier "${tier}"`,
      {
        category: ErrorCategory.BUDGET,
        severity: ErrorSeverity.MEDIUM,
        context: { principalId, tier, estimatedCostUsd, remainingUsd },
        retryable: false,
        suggestedAction: 'Daily spending resets at midnight UTC.'
      }
    );
  }

  static providerCallFailed(error: ProviderError): TailoringError {
    return new TailoringError(
      TailoringErrorKind.PROVIDER_CALL_FAILED,
      `Model call failed: ${error.userMessage}`,
      `${error.modelId}: ${error.technicalDetails}`,
      {
        category: ErrorCategory.PROVIDER,
        severity: ErrorSeverity.HIGH,
        context: { modelId: error.modelId, providerErrorKind: error.kind, status: error.status },
        retryable: true,
        suggestedAction: error.kind === 'rate_limit'
          ? 'The provider is rate limiting requests. Resubmit shortly.'
          : 'Resubmit the request.',
        cause: error
      }
    );
  }

  static invalidInput(field: string, message: string): TailoringError {
    return new TailoringError(
      TailoringErrorKind.INVALID_INPUT,
      message,
      `Invalid input: ${field}`,
      {
        category: ErrorCategory.VALIDATION,
        severity: ErrorSeverity.LOW,
        context: { field },
        retryable: false,
        suggestedAction: 'Correct the input and submit a new request.'
      }
    );
  }

  static cacheInconsistency(namespace: string, contentHash: string, details: string): TailoringError {
    return new TailoringError(
      TailoringErrorKind.INTERNAL_CACHE_INCONSISTENCY,
      'A cached result could not be read and was discarded',
      details,
      {
        category: ErrorCategory.CACHE,
        severity: ErrorSeverity.MEDIUM,
        context: { namespace, contentHash },
        retryable: true
      }
    );
  }

  static cancelled(stage: string): TailoringError {
    return new TailoringError(
      TailoringErrorKind.CANCELLED,
      'The request was cancelled',
      `Cancelled during ${stage}`,
      {
        category: ErrorCategory.CANCELLED,
        severity: ErrorSeverity.LOW,
        context: { stage },
        retryable: false
      }
    );
  }

  static internal(error: unknown): TailoringError {
    const details = error instanceof AppError
      ? error.technicalDetails
      : error instanceof Error ? error.message : String(error);
    return new TailoringError(
      TailoringErrorKind.INTERNAL,
      error instanceof AppError ? error.userMessage : 'An internal error occurred',
      details,
      {
        category: error instanceof AppError ? error.category : ErrorCategory.UNEXPECTED,
        severity: ErrorSeverity.CRITICAL,
        retryable: false,
        cause: error
      }
    );
  }
}

export function isTailoringError(error: unknown, kind?: TailoringErrorKind): error is TailoringError {
  return error instanceof TailoringError && (kind === undefined || error.kind === kind);
}
