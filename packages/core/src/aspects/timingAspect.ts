/**
 * Timing aspect - measures how long each selected call takes, successful or not
 */

import { LOG_PREFIX } from '../constants.js';
import { formatSignature } from '../signature.js';
import type { AspectDeclaration, EngineLogger, OperationSignature, PointcutRule } from '../types.js';

export interface TimingReport {
  signature: OperationSignature;
  durationMs: number;
  outcome: 'returned' | 'threw';
}

export interface TimingAspectOptions {
  name?: string;
  pointcut: PointcutRule;
  order?: number;
  /** Receives every measurement. Defaults to a log line. */
  onTiming?: (report: TimingReport) => void;
  logger?: EngineLogger;
  /** Clock in milliseconds */
  now?: () => number;
}

export function createTimingAspect(options: TimingAspectOptions): AspectDeclaration {
  const logger = options.logger ?? console;
  const now = options.now ?? Date.now;

  const onTiming = options.onTiming ?? ((report: TimingReport) => {
    const operation = formatSignature(report.signature);
    if (report.outcome === 'returned') {
      logger.log(`${LOG_PREFIX.timing} ${operation} completed in ${report.durationMs}ms`);
    } else {
      logger.log(`${LOG_PREFIX.timing} ${operation} failed after ${report.durationMs}ms`);
    }
  });

  return {
    name: options.name ?? 'Timing',
    order: options.order,
    pointcut: options.pointcut,
    advice: [
      {
        kind: 'around',
        behavior: (context, proceed) => {
          const start = now();
          let outcome: TimingReport['outcome'] = 'threw';
          try {
            const result = proceed();
            outcome = 'returned';
            return result;
          } finally {
            onTiming({ signature: context.signature, durationMs: now() - start, outcome });
          }
        },
      },
    ],
  };
}
