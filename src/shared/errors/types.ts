/**
 * Error Types
 *
 * Type definitions for error categories and error structures.
 * Shared by the provider adapters, persistence layer and tailoring core.
 */

/**
 * Error categories for different types of failures
 */
export enum ErrorCategory {
  PROVIDER = 'PROVIDER',
  BUDGET = 'BUDGET',
  CACHE = 'CACHE',
  STORAGE = 'STORAGE',
  VALIDATION = 'VALIDATION',
  CANCELLED = 'CANCELLED',
  UNEXPECTED = 'UNEXPECTED'
}

/**
 * Error severity levels
 */
export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

/**
 * Structured error information
 */
export interface ErrorInfo {
  category: ErrorCategory;
  severity: ErrorSeverity;
  userMessage: string;
  technicalDetails: string;
  timestamp: Date;
  context?: Record<string, unknown>;
  recoverable: boolean;
  suggestedAction?: string;
}

/**
 * Custom error class with additional context
 */
export class AppError extends Error {
  public readonly category: ErrorCategory;
  public readonly severity: ErrorSeverity;
  public readonly userMessage: string;
  public readonly technicalDetails: string;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;
  public readonly recoverable: boolean;
  public readonly suggestedAction?: string;

  constructor(info: ErrorInfo) {
    super(info.userMessage);
    this.name = 'AppError';
    this.category = info.category;
    this.severity = info.severity;
    this.userMessage = info.userMessage;
    this.technicalDetails = info.technicalDetails;
    this.timestamp = info.timestamp;
    this.context = info.context;
    this.recoverable = info.recoverable;
    this.suggestedAction = info.suggestedAction;
  }

  /**
   * Flatten into the structured record kept by the error log
   */
  toInfo(): ErrorInfo {
    return {
      category: this.category,
      severity: this.severity,
      userMessage: this.userMessage,
      technicalDetails: this.technicalDetails,
      timestamp: this.timestamp,
      context: this.context,
      recoverable: this.recoverable,
      suggestedAction: this.suggestedAction
    };
  }
}
