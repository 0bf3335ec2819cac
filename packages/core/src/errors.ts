/**
 * Custom error classes for the interception engine
 *
 * Configuration problems are raised while the application is being
 * assembled (registering components and aspects), never from inside a call.
 * Failures thrown by a target or by advice propagate as the original value;
 * the engine only creates its own error when several `afterFinally` advice
 * entries fail on the same call.
 *
 * Usage:
 * ```typescript
 * try {
 *   engine.registerAspect(declaration);
 * } catch (error) {
 *   if (error instanceof ConfigurationError && error.reason === 'DUPLICATE_ASPECT') {
 *     // Two aspects share a name
 *   }
 * }
 * ```
 */

/**
 * Base error class for all engine errors
 */
export class InterceptionError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'InterceptionError';
  }
}

export type ConfigurationErrorReason =
  | 'MALFORMED_PATTERN'
  | 'UNKNOWN_COMPONENT'
  | 'UNKNOWN_OPERATION'
  | 'DUPLICATE_ASPECT'
  | 'DUPLICATE_COMPONENT'
  | 'INVALID_ORDER'
  | 'INVALID_ADVICE'
  | 'INVALID_NAME';

/**
 * Error thrown at assembly time for invalid declarations
 */
export class ConfigurationError extends InterceptionError {
  public readonly reason: ConfigurationErrorReason;

  constructor(reason: ConfigurationErrorReason, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigurationError';
    this.reason = reason;
  }
}

/**
 * Error thrown when more than one `afterFinally` advice fails during a single call
 */
export class AdviceFailures extends InterceptionError {
  /** Every failure, in the order the advice ran */
  public readonly failures: readonly unknown[];

  constructor(message: string, failures: readonly unknown[]) {
    super(message, { cause: failures[0] });
    this.name = 'AdviceFailures';
    this.failures = failures;
  }
}

/**
 * Error thrown by guard aspects when a call is not permitted
 */
export class AccessDeniedError extends InterceptionError {
  /** Formatted signature of the refused operation */
  public readonly operation: string;

  constructor(message: string, operation: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'AccessDeniedError';
    this.operation = operation;
  }
}

/**
 * Error thrown by the retry aspect once its attempts are used up
 */
export class RetryExhaustedError extends InterceptionError {
  public readonly attempts: number;

  constructor(message: string, attempts: number, options?: ErrorOptions) {
    super(message, options);
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
  }
}

/**
 * Type guard to check if an error is an InterceptionError
 */
export function isInterceptionError(error: unknown): error is InterceptionError {
  return error instanceof InterceptionError;
}

/**
 * Extract a readable message from any thrown value
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
