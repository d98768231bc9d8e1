/**
 * @fileoverview Structured error handling with typed error codes, contextual metadata
 * and user-facing message generation.
 *
 * Every failure the fleet monitor can surface is an AppError carrying an ErrorCode, so
 * callers branch on `code` instead of on message text. The HTTP layer maps codes to
 * status codes; the watcher and notification dispatcher log them.
 *
 * Error Categories:
 * - General: UNKNOWN, VALIDATION, NETWORK, TIMEOUT
 * - Printer: UNKNOWN_PRINTER, PRINTER_CONNECTION, PRINTER_TIMEOUT, PRINTER_OFFLINE
 * - Protocol: PROTOCOL_MALFORMED_RESPONSE
 * - Camera: CAMERA_UNAVAILABLE
 * - Notifications: NOTIFICATION_DELIVERY
 * - Configuration: CONFIG_INVALID, CONFIG_LOAD_FAILED
 * - Access: AUTH_REQUIRED
 */

import { ZodError } from 'zod';

// ============================================================================
// ERROR TYPES
// ============================================================================

export enum ErrorCode {
  // General errors
  UNKNOWN = 'UNKNOWN',
  VALIDATION = 'VALIDATION',
  NETWORK = 'NETWORK',
  TIMEOUT = 'TIMEOUT',

  // Printer errors
  UNKNOWN_PRINTER = 'UNKNOWN_PRINTER',
  PRINTER_CONNECTION = 'PRINTER_CONNECTION',
  PRINTER_TIMEOUT = 'PRINTER_TIMEOUT',
  PRINTER_OFFLINE = 'PRINTER_OFFLINE',

  // Wire protocol errors
  PROTOCOL_MALFORMED_RESPONSE = 'PROTOCOL_MALFORMED_RESPONSE',

  // Camera errors
  CAMERA_UNAVAILABLE = 'CAMERA_UNAVAILABLE',

  // Notification errors
  NOTIFICATION_DELIVERY = 'NOTIFICATION_DELIVERY',

  // Configuration errors
  CONFIG_INVALID = 'CONFIG_INVALID',
  CONFIG_LOAD_FAILED = 'CONFIG_LOAD_FAILED',

  // Access errors
  AUTH_REQUIRED = 'AUTH_REQUIRED'
}

// ============================================================================
// CUSTOM ERROR CLASS
// ============================================================================

/**
 * Enhanced error class with structured context
 */
export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly context?: Record<string, unknown>;
  public readonly timestamp: Date;
  public readonly originalError?: Error;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    context?: Record<string, unknown>,
    originalError?: Error
  ) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.context = context;
    this.timestamp = new Date();
    this.originalError = originalError;

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AppError);
    }
  }

  /**
   * Convert to plain object for serialization
   */
  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      timestamp: this.timestamp,
      stack: this.stack,
      originalError: this.originalError ? {
        name: this.originalError.name,
        message: this.originalError.message,
        stack: this.originalError.stack
      } : undefined
    };
  }
}

// ============================================================================
// ERROR FACTORIES
// ============================================================================

/**
 * Create error from Zod validation error
 */
export function fromZodError(error: ZodError, code: ErrorCode = ErrorCode.VALIDATION): AppError {
  const issues = error.issues.map(issue => ({
    path: issue.path.join('.'),
    message: issue.message,
    code: issue.code
  }));

  return new AppError(
    'Validation failed',
    code,
    { issues },
    error
  );
}

/**
 * Create error for an id that is not in the registry
 */
export function unknownPrinterError(printerId: string): AppError {
  return new AppError(`unknown printer ${printerId}`, ErrorCode.UNKNOWN_PRINTER, { printerId });
}

/**
 * Create error for a failed connect, write or read
 */
export function connectionError(
  message: string,
  context?: Record<string, unknown>,
  originalError?: Error
): AppError {
  return new AppError(message, ErrorCode.PRINTER_CONNECTION, context, originalError);
}

/**
 * Create timeout error
 */
export function timeoutError(
  operation: string,
  timeoutMs: number,
  code: ErrorCode = ErrorCode.TIMEOUT
): AppError {
  return new AppError(
    `Operation timed out after ${timeoutMs}ms`,
    code,
    { operation, timeoutMs }
  );
}

/**
 * Create error for a printer whose status refresh failed
 */
export function offlineError(printerId: string, cause?: Error): AppError {
  return new AppError(
    'Printer unreachable or offline',
    ErrorCode.PRINTER_OFFLINE,
    { printerId },
    cause
  );
}

/**
 * Create error for a response body that does not follow the wire grammar
 */
export function protocolError(message: string, context?: Record<string, unknown>): AppError {
  return new AppError(message, ErrorCode.PROTOCOL_MALFORMED_RESPONSE, context);
}

/**
 * Create camera error
 */
export function cameraUnavailableError(
  message: string,
  context?: Record<string, unknown>,
  originalError?: Error
): AppError {
  return new AppError(message, ErrorCode.CAMERA_UNAVAILABLE, context, originalError);
}

/**
 * Create error for a single failed notification destination
 */
export function notificationDeliveryError(
  destination: string,
  originalError?: Error
): AppError {
  return new AppError(
    `Failed to deliver notification to ${destination}`,
    ErrorCode.NOTIFICATION_DELIVERY,
    { destination },
    originalError
  );
}

// ============================================================================
// ERROR HANDLING UTILITIES
// ============================================================================

/**
 * Check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Check if error is an AppError with the given code
 */
export function hasErrorCode(error: unknown, code: ErrorCode): error is AppError {
  return isAppError(error) && error.code === code;
}

/**
 * Convert unknown error to AppError
 */
export function toAppError(error: unknown, defaultCode: ErrorCode = ErrorCode.UNKNOWN): AppError {
  if (isAppError(error)) {
    return error;
  }

  if (error instanceof ZodError) {
    return fromZodError(error);
  }

  if (error instanceof Error) {
    return new AppError(
      error.message,
      defaultCode,
      undefined,
      error
    );
  }

  if (typeof error === 'string') {
    return new AppError(error, defaultCode);
  }

  return new AppError(
    'An unknown error occurred',
    defaultCode,
    { error }
  );
}

/**
 * Normalize an unknown thrown value to an Error instance
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
