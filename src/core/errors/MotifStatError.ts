/**
 * Core error handling system for motifstat
 *
 * Provides consistent error handling across the pipeline with:
 * - Structured error codes for different error categories
 * - Context preservation for debugging
 * - Proper stack trace handling
 */

/**
 * Error codes covering every failure the pipeline can raise
 */
export enum ErrorCode {
  // Data errors
  INVALID_DATA = 'INVALID_DATA',
  INSUFFICIENT_DATA = 'INSUFFICIENT_DATA',

  // Configuration errors
  INVALID_CONFIG = 'INVALID_CONFIG',

  // User errors
  INVALID_INPUT = 'INVALID_INPUT',
  CANCELLED = 'CANCELLED',

  // Resource errors
  RESOURCE_LIMIT = 'RESOURCE_LIMIT',

  // System errors
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * Error class for motifstat with structured error codes and context
 *
 * @example
 * ```typescript
 * throw new MotifStatError(
 *   ErrorCode.INVALID_CONFIG,
 *   'minLength must not exceed maxLength',
 *   { minLength: 8, maxLength: 6 }
 * );
 * ```
 */
export class MotifStatError extends Error {
  /**
   * @param code - Structured error code for categorization
   * @param message - Human-readable error message
   * @param context - Optional context object for debugging
   */
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'MotifStatError';

    // V8 engines (Node.js/Chrome) only
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MotifStatError);
    }
  }

  /**
   * Formatted representation including code, message and context
   */
  toString(): string {
    const contextStr = this.context ? ` Context: ${JSON.stringify(this.context)}` : '';
    return `${this.name} [${this.code}]: ${this.message}${contextStr}`;
  }

  /**
   * Check if this error matches a specific error code
   */
  is(code: ErrorCode): boolean {
    return this.code === code;
  }

  /**
   * Check if this error is in a category of error codes
   */
  isOneOf(codes: ErrorCode[]): boolean {
    return codes.includes(this.code);
  }
}

/**
 * Type guard to check if an error is a MotifStatError
 */
export function isMotifStatError(error: unknown): error is MotifStatError {
  return error instanceof MotifStatError;
}

/**
 * Wrap an unknown thrown value as a MotifStatError
 */
export function wrapError(
  error: unknown,
  code: ErrorCode = ErrorCode.INTERNAL_ERROR
): MotifStatError {
  if (isMotifStatError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const context =
    error instanceof Error ? { originalStack: error.stack } : { originalError: error };

  return new MotifStatError(code, message, context);
}
