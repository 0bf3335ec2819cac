/**
 * Logging aspect - logs entry, return and failure of every selected operation
 *
 * Arguments, results and error messages are redacted unless `redact: false`.
 */

import { LOG_PREFIX } from '../constants.js';
import { getErrorMessage } from '../errors.js';
import { formatSignature } from '../signature.js';
import type { AspectDeclaration, EngineLogger, PointcutRule } from '../types.js';
import { formatForLog, redactText } from './redaction.js';

export interface LoggingAspectOptions {
  name?: string;
  pointcut: PointcutRule;
  order?: number;
  logger?: EngineLogger;
  redact?: boolean;
}

export function createLoggingAspect(options: LoggingAspectOptions): AspectDeclaration {
  const logger = options.logger ?? console;
  const redact = options.redact ?? true;

  return {
    name: options.name ?? 'Logging',
    order: options.order,
    pointcut: options.pointcut,
    advice: [
      {
        kind: 'before',
        behavior: (context) => {
          logger.log(`${LOG_PREFIX.log} ${formatSignature(context.signature)} called with ${formatForLog(context.args, redact)}`);
        },
      },
      {
        kind: 'afterReturning',
        behavior: (context, result) => {
          logger.log(`${LOG_PREFIX.log} ${formatSignature(context.signature)} returned ${formatForLog(result, redact)}`);
        },
      },
      {
        kind: 'afterThrowing',
        behavior: (context, failure) => {
          const message = getErrorMessage(failure);
          logger.error(`${LOG_PREFIX.log} ${formatSignature(context.signature)} threw ${redact ? redactText(message) : message}`);
        },
      },
    ],
  };
}
