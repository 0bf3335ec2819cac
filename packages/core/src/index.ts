/**
 * Main entry point for @joinpoint/core
 *
 * This package attaches cross-cutting behavior (logging, access checks,
 * timing, retries) to selected method calls by substituting proxies for the
 * operations a pointcut selects.
 */

// Types
export * from './types.js';

// Constants
export {
  LOWEST_PRECEDENCE,
  HIGHEST_PRECEDENCE,
  DEFAULT_RETRY_ATTEMPTS,
  LOG_PREFIX,
} from './constants.js';

// Errors
export {
  InterceptionError,
  ConfigurationError,
  AdviceFailures,
  AccessDeniedError,
  RetryExhaustedError,
  isInterceptionError,
  getErrorMessage,
  type ConfigurationErrorReason,
} from './errors.js';

// Configuration
export {
  configureEngineDefaults,
  getEngineDefaults,
  resetEngineDefaults,
  resolveEngineConfig,
  type EngineConfig,
  type EngineOptions,
} from './config/engineConfig.js';

// Signatures
export { createSignature, formatSignature, signatureKey } from './signature.js';

// Pointcuts
export {
  withinPackage,
  named,
  withParameters,
  allOf,
  anyOf,
  not,
  validatePointcut,
} from './pointcut/pointcutRules.js';
export { matches } from './pointcut/matchPointcut.js';

// Engine
export { InvocationContext } from './invocationContext.js';
export { AdviceRegistry } from './adviceRegistry.js';
export { composeChain, describeEntry } from './chain/composeChain.js';
export { ProxyFactory, type AdviceResolver } from './proxyFactory.js';
export { InterceptionEngine, type ComponentHandle } from './interceptionEngine.js';

// Aspects
export { aspect, AspectBuilder } from './aspects/aspectBuilder.js';
export { createLoggingAspect, type LoggingAspectOptions } from './aspects/loggingAspect.js';
export { createTimingAspect, type TimingAspectOptions, type TimingReport } from './aspects/timingAspect.js';
export { createRetryAspect, type RetryAspectOptions } from './aspects/retryAspect.js';
export { createGuardAspect, type GuardAspectOptions } from './aspects/guardAspect.js';
export { formatForLog, redactText, redactValue, isSensitiveKey } from './aspects/redaction.js';
