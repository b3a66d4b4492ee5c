/** Mock logger for testing */

import { vi, type Mock } from 'vitest';
import type { Logger } from './types.js';

type LogMethod = (event_type: string, metadata?: Record<string, unknown>) => void;

export interface MockLogger extends Logger {
  child: Mock<(metadata: Record<string, unknown>) => MockLogger>;
  debug: Mock<LogMethod>;
  info: Mock<LogMethod>;
  warn: Mock<LogMethod>;
  error: Mock<LogMethod>;
  fatal: Mock<LogMethod>;
  flush: Mock<() => Promise<void>>;
}

/**
 * Creates a mock logger for testing with Vitest spy functions.
 * All methods are no-ops but can be asserted against in tests.
 *
 * @example
 * ```typescript
 * import { createMockLogger } from '@prompty/logger/mock';
 *
 * const logger = createMockLogger();
 * const engine = createEngine({ logger });
 *
 * await engine.execute('{~prompty.var name="x" onerror="log" /~}');
 *
 * expect(logger.warn).toHaveBeenCalledTimes(1);
 * ```
 */
export function createMockLogger(): MockLogger {
  return {
    // child() returns a fresh mock that also has spy functions
    child: vi.fn((_metadata: Record<string, unknown>) => createMockLogger()),
    debug: vi.fn<LogMethod>(),
    info: vi.fn<LogMethod>(),
    warn: vi.fn<LogMethod>(),
    error: vi.fn<LogMethod>(),
    fatal: vi.fn<LogMethod>(),
    flush: vi.fn(async (): Promise<void> => undefined),
  };
}
