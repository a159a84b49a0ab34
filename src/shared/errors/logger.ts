/**
 * Error Logger
 *
 * Keeps a bounded in-memory history of recent errors for diagnostics
 * and forwards each one to the structured application log.
 */

import { ErrorInfo, AppError, ErrorCategory, ErrorSeverity } from './types';
import { createComponentLogger, serializeError } from '../../backend/logger';

const log = createComponentLogger('errors');

/**
 * Error logger class for managing error logs
 */
export class ErrorLogger {
  private static logs: ErrorInfo[] = [];
  private static maxLogs = 1000;

  /**
   * Log an error with technical details
   */
  static logError(error: AppError | Error): void {
    const errorInfo: ErrorInfo = error instanceof AppError
      ? error.toInfo()
      : {
          category: ErrorCategory.UNEXPECTED,
          severity: ErrorSeverity.CRITICAL,
          userMessage: 'An unexpected error occurred',
          technicalDetails: error.message,
          timestamp: new Date(),
          recoverable: false
        };

    this.logs.push(errorInfo);

    // Keep only the most recent logs
    if (this.logs.length > this.maxLogs) {
      this.logs = this.logs.slice(-this.maxLogs);
    }

    const fields = {
      category: errorInfo.category,
      severity: errorInfo.severity,
      details: errorInfo.technicalDetails,
      context: errorInfo.context,
      err: serializeError(error)
    };

    if (errorInfo.severity === ErrorSeverity.LOW || errorInfo.severity === ErrorSeverity.MEDIUM) {
      log.warn(fields, errorInfo.userMessage);
    } else {
      log.error(fields, errorInfo.userMessage);
    }
  }

  /**
   * Get all logged errors
   */
  static getLogs(): ErrorInfo[] {
    return [...this.logs];
  }

  /**
   * Clear error logs
   */
  static clearLogs(): void {
    this.logs = [];
  }
}
