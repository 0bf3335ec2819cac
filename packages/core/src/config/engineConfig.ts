/**
 * Engine configuration
 *
 * Defaults come from the environment when the module loads and can be
 * changed process-wide with configureEngineDefaults(). Options passed to an
 * InterceptionEngine override the defaults for that engine only.
 *
 * Environment:
 * - `JOINPOINT_VERBOSE=true` logs assembly events (registrations, cache invalidation)
 */

import type { EngineLogger } from '../types.js';

export interface EngineConfig {
  /** Log assembly events through `logger` */
  verbose: boolean;
  logger: EngineLogger;
}

export type EngineOptions = Partial<EngineConfig>;

function readDefaultsFromEnv(): EngineConfig {
  return {
    verbose: process.env.JOINPOINT_VERBOSE === 'true',
    logger: console,
  };
}

let engineDefaults: EngineConfig = readDefaultsFromEnv();

/**
 * Change the defaults used by engines created afterwards
 */
export function configureEngineDefaults(options: EngineOptions): void {
  engineDefaults = resolveEngineConfig(options);
}

/**
 * Get the current defaults
 */
export function getEngineDefaults(): EngineConfig {
  return { ...engineDefaults };
}

/**
 * Re-read the defaults from the environment
 */
export function resetEngineDefaults(): void {
  engineDefaults = readDefaultsFromEnv();
}

/**
 * Merge per-engine options over the current defaults
 */
export function resolveEngineConfig(options: EngineOptions = {}): EngineConfig {
  return {
    verbose: options.verbose ?? engineDefaults.verbose,
    logger: options.logger ?? engineDefaults.logger,
  };
}
