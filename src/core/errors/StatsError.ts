/**
 * Core error handling for the two-sample statistics package
 *
 * Every failure raised by the calculators carries:
 * - a structured error code for the failure category
 * - a context record naming the sample and the condition that failed
 */

/**
 * Error codes for every failure category the package raises
 */
export enum ErrorCode {
  // Input errors
  INVALID_INPUT = 'INVALID_INPUT',
  DEGENERATE_INPUT = 'DEGENERATE_INPUT',

  // Configuration errors
  INVALID_CONFIG = 'INVALID_CONFIG',

  // System errors
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export type ErrorContext = Record<string, unknown>;

/**
 * Base error class with a structured code and optional context
 *
 * @example
 * ```typescript
 * throw new StatsError(
 *   ErrorCode.INVALID_CONFIG,
 *   'significanceLevel must lie strictly between 0 and 1',
 *   { significanceLevel: 1.5 }
 * );
 * ```
 */
export class StatsError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly context?: ErrorContext
  ) {
    super(message);
    this.name = 'StatsError';

    Error.captureStackTrace(this, new.target);
  }

  /**
   * Code, message and context on one line
   */
  toString(): string {
    const contextStr = this.context ? ` Context: ${JSON.stringify(this.context)}` : '';
    return `${this.name} [${this.code}]: ${this.message}${contextStr}`;
  }

  is(code: ErrorCode): boolean {
    return this.code === code;
  }

  isOneOf(codes: ErrorCode[]): boolean {
    return codes.includes(this.code);
  }
}

/**
 * Malformed input: a sample that is too short, samples of mismatched length,
 * non-finite values or text that does not parse as numbers.
 */
export class InvalidInputError extends StatsError {
  constructor(message: string, context?: ErrorContext) {
    super(ErrorCode.INVALID_INPUT, message, context);
    this.name = 'InvalidInputError';
  }
}

/**
 * Well-formed input whose computation hits a zero denominator
 * (a constant sample, or two constant samples in a t-test).
 */
export class DegenerateInputError extends StatsError {
  constructor(message: string, context?: ErrorContext) {
    super(ErrorCode.DEGENERATE_INPUT, message, context);
    this.name = 'DegenerateInputError';
  }
}

export function isStatsError(error: unknown): error is StatsError {
  return error instanceof StatsError;
}

/**
 * Wrap an unknown thrown value as a StatsError
 * Useful for catch blocks where the error type is unknown
 */
export function wrapError(error: unknown, code: ErrorCode = ErrorCode.INTERNAL_ERROR): StatsError {
  if (isStatsError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const context =
    error instanceof Error ? { originalStack: error.stack } : { originalError: error };

  return new StatsError(code, message, context);
}
