/**
 * Core error handling system for simpson-tree
 *
 * Every failure in the core is structural: a column outside its domain,
 * split parameters outside theirs, or a split that cannot conserve width
 * and area for the given heights. None of them is retried or patched up
 * with a fallback value; they are reported with enough context to find
 * the offending pair.
 */

/**
 * Error codes covering all error categories
 */
export enum ErrorCode {
  // Data errors
  INVALID_COLUMN = 'INVALID_COLUMN',
  INVALID_INPUT = 'INVALID_INPUT',

  // Configuration errors
  INVALID_PARAMETERS = 'INVALID_PARAMETERS',
  INVALID_DEPTH = 'INVALID_DEPTH',

  // Algorithm errors
  INFEASIBLE_SPLIT = 'INFEASIBLE_SPLIT',
}

/**
 * Error class with a structured error code and debugging context
 *
 * @example
 * ```typescript
 * throw new SimpsonError(
 *   ErrorCode.INVALID_DEPTH,
 *   'Depth must be a non-negative integer',
 *   { depth: -1 }
 * );
 * ```
 */
export class SimpsonError extends Error {
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
    this.name = 'SimpsonError';

    // Keep the constructor frames out of the stack in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Formatted representation including code and context
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
 * A column's height or width lies outside (0, 1]
 */
export class DomainError extends SimpsonError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(ErrorCode.INVALID_COLUMN, message, context);
    this.name = 'DomainError';
  }
}

/**
 * Split parameters violate 0 < a < b < 1 or 0 < c < d < 1
 */
export class ParameterError extends SimpsonError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(ErrorCode.INVALID_PARAMETERS, message, context);
    this.name = 'ParameterError';
  }
}

/**
 * A split cannot conserve width and area for the given heights and parameters
 */
export class InfeasibleSplitError extends SimpsonError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(ErrorCode.INFEASIBLE_SPLIT, message, context);
    this.name = 'InfeasibleSplitError';
  }
}

/**
 * Type guard to check if an error is a SimpsonError
 */
export function isSimpsonError(error: unknown): error is SimpsonError {
  return error instanceof SimpsonError;
}
