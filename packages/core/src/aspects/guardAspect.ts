/**
 * Guard aspect - refuses calls that fail a check before the target runs
 */

import { LOG_PREFIX } from '../constants.js';
import { AccessDeniedError } from '../errors.js';
import type { InvocationContext } from '../invocationContext.js';
import { formatSignature } from '../signature.js';
import type { AspectDeclaration, EngineLogger, PointcutRule } from '../types.js';

export interface GuardAspectOptions {
  name?: string;
  pointcut: PointcutRule;
  order?: number;
  check: (context: InvocationContext) => boolean;
  /** Message for the AccessDeniedError */
  describe?: (context: InvocationContext) => string;
  /** Denials are logged as warnings when set */
  logger?: EngineLogger;
}

export function createGuardAspect(options: GuardAspectOptions): AspectDeclaration {
  return {
    name: options.name ?? 'Guard',
    order: options.order,
    pointcut: options.pointcut,
    advice: [
      {
        kind: 'before',
        behavior: (context) => {
          if (options.check(context)) {
            return;
          }

          const operation = formatSignature(context.signature);
          const message = options.describe?.(context) ?? `Access denied to ${operation}`;
          options.logger?.warn(`${LOG_PREFIX.guard} ${message}`);
          throw new AccessDeniedError(message, operation);
        },
      },
    ],
  };
}
