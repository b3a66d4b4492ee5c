import { createMockLogger, type MockLogger } from '@prompty/logger/mock';
import { createEngine, type Engine, type EngineOptions } from '../src/index';
import type { Resolver } from '../src/resolvers/types';

export interface TestEngine {
  engine: Engine;
  logger: MockLogger;
}

/**
 * Engine with a mock logger so tests can assert log calls and stay quiet
 */
export function createTestEngine(options: EngineOptions = {}): TestEngine {
  const logger = createMockLogger();
  const engine = createEngine({ logger, env: {}, ...options });
  return { engine, logger };
}

/**
 * Resolver built from a plain function, with no attribute checks
 */
export function resolverOf(tagName: string, resolve: Resolver['resolve'], acceptsContent = false): Resolver {
  return {
    tagName,
    acceptsContent,
    validate: () => {},
    resolve,
  };
}

/**
 * Manually advanced millisecond clock
 */
export function createFakeClock(start = 0): { now: () => number; advance: (ms: number) => void } {
  let current = start;
  return {
    now: () => current,
    advance: (ms) => {
      current += ms;
    },
  };
}
