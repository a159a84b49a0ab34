/**
 * Provider Errors
 *
 * Classification of failures raised by model provider calls.
 */

import { AppError, ErrorCategory, ErrorSeverity } from '../errors/types';

export type ProviderErrorKind = 'transport' | 'malformed_response' | 'rate_limit' | 'timeout';

const USER_MESSAGES: Record<ProviderErrorKind, string> = {
  transport: 'The model provider could not be reached',
  malformed_response: 'The model provider returned an unreadable response',
  rate_limit: 'The model provider is rate limiting requests',
  timeout: 'The model provider timed out'
};

/**
 * Failure of a single provider call
 */
export class ProviderError extends AppError {
  public readonly kind: ProviderErrorKind;
  public readonly modelId: string;
  public readonly status?: number;

  constructor(
    kind: ProviderErrorKind,
    modelId: string,
    technicalDetails: string,
    options: { status?: number; cause?: unknown } = {}
  ) {
    super({
      category: ErrorCategory.PROVIDER,
      severity: kind === 'malformed_response' ? ErrorSeverity.MEDIUM : ErrorSeverity.HIGH,
      userMessage: USER_MESSAGES[kind],
      technicalDetails,
      timestamp: new Date(),
      context: { modelId, kind, status: options.status },
      recoverable: true
    });
    this.name = 'ProviderError';
    this.kind = kind;
    this.modelId = modelId;
    this.status = options.status;
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}
