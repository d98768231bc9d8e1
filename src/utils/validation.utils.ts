/**
 * @fileoverview Zod-based validation helpers and shared primitive schemas.
 *
 * validate() turns a schema failure into a VALIDATION AppError plus a flat issue list,
 * so callers branch on a result union instead of catching ZodError.
 */

import { z, ZodError } from 'zod';
import { AppError, ErrorCode, fromZodError } from './error.utils';

// ============================================================================
// VALIDATION RESULT TYPES
// ============================================================================

export interface ValidationIssue {
  path: string;
  message: string;
  code: string;
}

export interface ValidationSuccess<T> {
  success: true;
  data: T;
}

export interface ValidationFailure {
  success: false;
  error: AppError;
  issues: ValidationIssue[];
}

export type ValidationResult<T> = ValidationSuccess<T> | ValidationFailure;

// ============================================================================
// CORE VALIDATION FUNCTIONS
// ============================================================================

/**
 * Validate data against a schema
 *
 * @param code - error code of the failure, VALIDATION unless given
 */
export function validate<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown,
  code: ErrorCode = ErrorCode.VALIDATION
): ValidationResult<z.output<S>> {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return {
    success: false,
    error: fromZodError(result.error, code),
    issues: result.error.issues.map(issue => ({
      path: issue.path.join('.'),
      message: issue.message,
      code: issue.code
    }))
  };
}

// ============================================================================
// COMMON VALIDATION SCHEMAS
// ============================================================================

export const URLSchema = z.string().url('Invalid URL format');

export const EmailSchema = z.string().email('Invalid email format');

export const PortSchema = z.number()
  .int('Port must be an integer')
  .min(1, 'Port must be at least 1')
  .max(65535, 'Port must be at most 65535');

// ============================================================================
// ERROR FORMATTING
// ============================================================================

/**
 * Format validation errors for display, one `path: message` per line
 */
export function formatValidationErrors(error: ZodError): string {
  const messages = error.issues.map(issue => {
    const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return `${path}${issue.message}`;
  });

  return messages.join('\n');
}
