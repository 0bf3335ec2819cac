/**
 * Retry aspect - re-runs a failing call through its continuation
 *
 * Each attempt starts from the arguments the aspect itself received, so
 * advice further in cannot leak rewritten arguments into the next attempt.
 * Failures rejected by `retryOn` propagate unchanged; once the attempts are
 * used up a RetryExhaustedError is thrown with the last failure as its cause.
 */

import { DEFAULT_RETRY_ATTEMPTS, LOG_PREFIX } from '../constants.js';
import { ConfigurationError, RetryExhaustedError, getErrorMessage } from '../errors.js';
import { formatSignature } from '../signature.js';
import type { AspectDeclaration, EngineLogger, PointcutRule } from '../types.js';

export interface RetryAspectOptions {
  name?: string;
  pointcut: PointcutRule;
  order?: number;
  /** Total attempts, including the first call */
  attempts?: number;
  retryOn?: (failure: unknown) => boolean;
  logger?: EngineLogger;
}

export function createRetryAspect(options: RetryAspectOptions): AspectDeclaration {
  const name = options.name ?? 'Retry';
  const attempts = options.attempts ?? DEFAULT_RETRY_ATTEMPTS;
  const retryOn = options.retryOn ?? (() => true);
  const logger = options.logger ?? console;

  if (!Number.isInteger(attempts) || attempts < 1) {
    throw new ConfigurationError('INVALID_ADVICE', `Aspect "${name}": attempts must be a positive integer, got ${attempts}`);
  }

  return {
    name,
    order: options.order,
    pointcut: options.pointcut,
    advice: [
      {
        kind: 'around',
        behavior: (context, proceed) => {
          const args = [...context.args];
          let lastFailure: unknown;

          for (let attempt = 1; attempt <= attempts; attempt++) {
            try {
              return proceed(args);
            } catch (failure) {
              if (!retryOn(failure)) {
                throw failure;
              }
              lastFailure = failure;
              if (attempt < attempts) {
                logger.warn(`${LOG_PREFIX.retry} ${formatSignature(context.signature)} attempt ${attempt}/${attempts} failed: ${getErrorMessage(failure)}`);
              }
            }
          }

          throw new RetryExhaustedError(
            `${formatSignature(context.signature)} failed after ${attempts} attempts`,
            attempts,
            { cause: lastFailure }
          );
        },
      },
    ],
  };
}
