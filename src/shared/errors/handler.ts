/**
 * Error Handler
 *
 * Storage error construction, logging and wrapping of fallible operations.
 * Orchestration failures use TailoringErrorFactory instead.
 */

import { AppError, ErrorCategory, ErrorSeverity } from './types';
import { ErrorLogger } from './logger';

/**
 * Error handler class for managing errors throughout the application
 */
export class ErrorHandler {
  /**
   * Create a storage error
   */
  static createStorageError(
    message: string,
    technicalDetails: string,
    context?: Record<string, unknown>
  ): AppError {
    return new AppError({
      category: ErrorCategory.STORAGE,
      severity: ErrorSeverity.HIGH,
      userMessage: message,
      technicalDetails,
      timestamp: new Date(),
      context,
      recoverable: false,
      suggestedAction: 'Please check the database path and permissions and try again.'
    });
  }

  /**
   * Log an error with technical details
   */
  static logError(error: AppError | Error): void {
    ErrorLogger.logError(error);
  }

  /**
   * Wrap a synchronous operation with error handling
   */
  static handle<T>(
    operation: () => T,
    errorFactory: (error: unknown) => AppError
  ): T {
    try {
      return operation();
    } catch (error) {
      const appError = error instanceof AppError ? error : errorFactory(error);
      this.logError(appError);
      throw appError;
    }
  }
}
