/**
 * Custom error classes for the application
 * These errors provide safe, non-PII error messages for callers
 */

export interface SafeErrorDetails {
  code: string;
  message: string;
}

/**
 * Base application error with safe error details
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly isOperational: boolean;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.isOperational = true;
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Get safe error details (no sensitive info)
   */
  toSafeError(): SafeErrorDetails {
    return {
      code: this.code,
      message: this.message,
    };
  }
}

/**
 * External service error (insight provider)
 */
export class ExternalServiceError extends AppError {
  public readonly service: string;
  public readonly originalError: Error | undefined;

  constructor(service: string, message: string, originalError?: Error) {
    super(`${service} error: ${message}`, 'EXTERNAL_SERVICE_ERROR');
    this.name = 'ExternalServiceError';
    this.service = service;
    this.originalError = originalError;
  }
}

/**
 * Invalid or incomplete runtime configuration
 */
export class ConfigurationError extends AppError {
  public readonly fields: Readonly<Record<string, string[]>>;

  constructor(message: string, fields: Record<string, string[]> = {}) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
    this.fields = fields;
  }
}

/**
 * Check if an error is an operational error (expected) vs programming error
 */
export function isOperationalError(error: unknown): error is AppError {
  return error instanceof AppError && error.isOperational;
}

/**
 * Convert unknown error to safe error details
 */
export function toSafeErrorResponse(error: unknown): SafeErrorDetails {
  if (isOperationalError(error)) {
    return error.toSafeError();
  }

  // Messages of unexpected errors may carry record values
  return {
    code: 'INTERNAL_ERROR',
    message: 'An unexpected error occurred',
  };
}
