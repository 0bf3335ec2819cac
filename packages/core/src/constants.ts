/**
 * Shared constants used across the engine
 *
 * This file centralizes ordering sentinels and log prefixes
 * so aspects and the demo package agree on them.
 */

/**
 * Order given to aspects that declare none. Larger than any explicit order,
 * so unordered aspects run after every ordered one.
 */
export const LOWEST_PRECEDENCE = Number.MAX_SAFE_INTEGER;

/**
 * Smallest accepted explicit order (runs first).
 */
export const HIGHEST_PRECEDENCE = Number.MIN_SAFE_INTEGER;

/**
 * Default attempt budget for the retry aspect
 */
export const DEFAULT_RETRY_ATTEMPTS = 3;

/**
 * Separator between a component's qualified name and an operation name in cache keys
 */
export const SIGNATURE_KEY_SEPARATOR = '#';

/**
 * Log prefixes for consistent logging
 */
export const LOG_PREFIX = {
  engine: '[Joinpoint]',
  log: '[Log]',
  timing: '[Timing]',
  retry: '[Retry]',
  guard: '[Guard]',
  bookstore: '[Bookstore]',
} as const;
