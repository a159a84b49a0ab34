/**
 * Validator Utilities
 *
 * Turns Zod failures into field-level errors and one-line summaries for
 * error details and logs.
 */

import { z } from 'zod';

export interface FieldError {
  /** Dotted path into the value; empty for the value itself */
  field: string;
  message: string;
}

export interface ValidationResult {
  isValid: boolean;
  errors: FieldError[];
}

/**
 * Converts Zod validation errors to ValidationResult
 */
export function zodErrorToValidationResult(error: z.ZodError): ValidationResult {
  const errors: FieldError[] = error.errors.map(err => ({
    field: err.path.join('.'),
    message: err.message
  }));

  return {
    isValid: false,
    errors
  };
}

/**
 * Render validation errors as a single line for logs and error details
 */
export function formatValidationErrors(result: ValidationResult): string {
  return result.errors
    .map(e => (e.field ? `${e.field}: ${e.message}` : e.message))
    .join('; ');
}
