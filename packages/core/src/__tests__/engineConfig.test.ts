import { describe, test, expect, afterEach } from '@jest/globals';
import {
  configureEngineDefaults,
  getEngineDefaults,
  resetEngineDefaults,
  resolveEngineConfig,
} from '../config/engineConfig.js';
import { InterceptionEngine } from '../interceptionEngine.js';
import type { EngineLogger } from '../types.js';

function createCaptureLogger(): { logger: EngineLogger; messages: string[] } {
  const messages: string[] = [];
  return {
    messages,
    logger: {
      log: (message) => messages.push(message),
      warn: (message) => messages.push(message),
      error: (message) => messages.push(message),
    },
  };
}

class Shelf {
  count(): number {
    return 0;
  }
}

describe('Engine configuration', () => {
  afterEach(() => {
    delete process.env.JOINPOINT_VERBOSE;
    resetEngineDefaults();
  });

  test('1.1 Should read verbose from the environment', () => {
    process.env.JOINPOINT_VERBOSE = 'true';
    resetEngineDefaults();
    expect(getEngineDefaults().verbose).toBe(true);

    process.env.JOINPOINT_VERBOSE = 'yes';
    resetEngineDefaults();
    expect(getEngineDefaults().verbose).toBe(false);
  });

  test('1.2 Should default to console logging', () => {
    expect(getEngineDefaults().logger).toBe(console);
  });

  test('1.3 Should apply configured defaults to engines created afterwards', () => {
    const { logger, messages } = createCaptureLogger();
    configureEngineDefaults({ verbose: true, logger });

    new InterceptionEngine().registerComponent('library.Shelf', new Shelf());

    expect(messages).toEqual(['[Joinpoint] Registered component library.Shelf (1 operations)']);
  });

  test('1.4 Should let engine options override the defaults field by field', () => {
    const { logger } = createCaptureLogger();
    configureEngineDefaults({ verbose: true, logger });

    const resolved = resolveEngineConfig({ verbose: false });

    expect(resolved.verbose).toBe(false);
    expect(resolved.logger).toBe(logger);
  });

  test('1.5 Should hand out copies of the defaults', () => {
    const defaults = getEngineDefaults();
    defaults.verbose = !defaults.verbose;

    expect(getEngineDefaults().verbose).toBe(!defaults.verbose);
  });
});
