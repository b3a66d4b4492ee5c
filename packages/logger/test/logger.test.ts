import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createLogger, createMemorySink, type MemorySink } from '../src/index.js';
import { createMockLogger } from '../src/mock.js';
import { clearLogs, getAllLogs, getLastLog, getLogCount } from './helpers.js';

describe('logger', () => {
  let sink: MemorySink;

  beforeEach(() => {
    sink = createMemorySink();
  });

  afterEach(() => {
    clearLogs(sink);
    vi.restoreAllMocks();
  });

  describe('log levels', () => {
    it('debug logs only to console, not handed to the sink', async () => {
      const logger = createLogger({ sink, silent: true, environment: 'test' });

      logger.debug('debug_event', { foo: 'bar' });
      await logger.flush();

      expect(getLogCount(sink)).toBe(0);
    });

    it('info logs reach the sink', async () => {
      const logger = createLogger({ sink, silent: true });

      logger.info('info_event', { foo: 'bar' });
      await logger.flush();

      expect(getLogCount(sink)).toBe(1);

      const log = getLastLog(sink);
      expect(log?.level).toBe('info');
      expect(log?.event_type).toBe('info_event');
      expect(log?.metadata).toEqual({ foo: 'bar' });
    });

    it('warn and error logs reach the sink', async () => {
      const logger = createLogger({ sink, silent: true });

      logger.warn('warn_event', { issue: 'slow_render' });
      logger.error('error_event', { error: 'validation_failed' });
      await logger.flush();

      expect(getAllLogs(sink).map((l) => l.level)).toEqual(['warn', 'error']);
    });

    it('fatal logs are flushed without an explicit call', async () => {
      const logger = createLogger({ sink, silent: true });

      logger.fatal('fatal_event', { critical: true });
      await new Promise((resolve) => setTimeout(resolve, 10));

      const log = getLastLog(sink);
      expect(log?.level).toBe('fatal');
      expect(log?.event_type).toBe('fatal_event');
    });
  });

  describe('buffering', () => {
    it('buffers logs until flush is called', async () => {
      const logger = createLogger({ sink, silent: true });

      logger.info('event_1');
      logger.info('event_2');
      expect(getLogCount(sink)).toBe(0);

      await logger.flush();
      expect(getLogCount(sink)).toBe(2);
    });

    it('auto-flushes at buffer threshold', async () => {
      const logger = createLogger({ sink, bufferSize: 3, silent: true });

      logger.info('event_1');
      logger.info('event_2');
      expect(getLogCount(sink)).toBe(0);

      logger.info('event_3');
      await new Promise((resolve) => setTimeout(resolve, 10));

      expect(getLogCount(sink)).toBe(3);
    });

    it('flush is idempotent when buffer is empty', async () => {
      const logger = createLogger({ sink, silent: true });

      await logger.flush();
      await logger.flush();

      expect(getLogCount(sink)).toBe(0);
    });

    it('reports sink failures on the console instead of throwing', async () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      const logger = createLogger({
        sink: {
          write() {
            throw new Error('sink offline');
          },
        },
        silent: true,
      });

      logger.info('event');
      await expect(logger.flush()).resolves.toBeUndefined();
      expect(errorSpy).toHaveBeenCalledTimes(1);
    });
  });

  describe('child loggers', () => {
    it('child inherits parent metadata', async () => {
      const logger = createLogger({ sink, silent: true });
      const child = logger.child({ requestId: 'req_123' });

      child.info('child_event', { action: 'render' });
      await child.flush();

      expect(getLastLog(sink)?.metadata).toEqual({
        requestId: 'req_123',
        action: 'render',
      });
    });

    it('child metadata overwrites parent when keys conflict', async () => {
      const logger = createLogger({ sink, silent: true });
      const grandchild = logger.child({ key: 'parent_value' }).child({ key: 'child_value' });

      grandchild.info('conflict_event');
      await grandchild.flush();

      expect(getLastLog(sink)?.metadata.key).toBe('child_value');
    });

    it('siblings have isolated metadata', async () => {
      const logger = createLogger({ sink, silent: true });
      const child1 = logger.child({ branch: 'a' });
      const child2 = logger.child({ branch: 'b' });

      child1.info('event_a');
      child2.info('event_b');
      await child1.flush();
      await child2.flush();

      const logs = getAllLogs(sink);
      expect(logs).toHaveLength(2);
      expect(logs[0].metadata).toEqual({ branch: 'a' });
      expect(logs[1].metadata).toEqual({ branch: 'b' });
    });
  });

  describe('metadata', () => {
    it('handles empty metadata', async () => {
      const logger = createLogger({ sink, silent: true });

      logger.info('event_no_metadata');
      await logger.flush();

      expect(getLastLog(sink)?.metadata).toEqual({});
    });

    it('flattens Error values, keeping stacks outside production', async () => {
      const logger = createLogger({ sink, silent: true, environment: 'test' });
      const prodLogger = createLogger({ sink, silent: true, environment: 'production' });
      const error = new TypeError('bad input');

      logger.error('failed', { error });
      prodLogger.error('failed', { error });
      await logger.flush();
      await prodLogger.flush();

      const [withStack, withoutStack] = getAllLogs(sink);
      expect(withStack.metadata.error).toEqual({
        name: 'TypeError',
        message: 'bad input',
        stack: error.stack,
      });
      expect(withoutStack.metadata.error).toEqual({ name: 'TypeError', message: 'bad input' });
    });
  });

  describe('log entry structure', () => {
    it('generates unique ULIDs for each log', async () => {
      const logger = createLogger({ sink, silent: true });

      logger.info('event_1');
      logger.info('event_2');
      await logger.flush();

      const logs = getAllLogs(sink);
      expect(logs[0].id).not.toBe(logs[1].id);
      expect(logs[0].id).toMatch(/^[0-9A-HJKMNP-TV-Z]{26}$/);
    });

    it('includes timestamps', async () => {
      const logger = createLogger({ sink, silent: true });
      const before = Date.now();

      logger.info('timed_event');
      await logger.flush();

      const after = Date.now();
      const log = getLastLog(sink);
      expect(log?.timestamp).toBeGreaterThanOrEqual(before);
      expect(log?.timestamp).toBeLessThanOrEqual(after);
    });

    it('writes one JSON line per entry to the console', () => {
      const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
      const logger = createLogger({ consoleOnly: true });

      logger.warn('console_event', { foo: 'bar' });

      expect(logSpy).toHaveBeenCalledTimes(1);
      const [line] = logSpy.mock.calls[0];
      expect(typeof line).toBe('string');
      const parsed: unknown = JSON.parse(String(line));
      expect(parsed).toMatchObject({
        level: 'warn',
        event_type: 'console_event',
        metadata: { foo: 'bar' },
      });
    });
  });

  describe('console-only mode', () => {
    it('does not hand entries to a sink when consoleOnly is true', async () => {
      const logger = createLogger({ sink, consoleOnly: true, silent: true });

      logger.info('console_event');
      logger.error('console_error');
      await logger.flush();

      expect(getLogCount(sink)).toBe(0);
    });

    it('throws if sink is missing when consoleOnly is false', () => {
      expect(() => {
        createLogger({ consoleOnly: false });
      }).toThrow('LoggerConfig.sink is required when consoleOnly is false');
    });

    it('does not require a sink when consoleOnly is true', () => {
      expect(() => {
        const logger = createLogger({ consoleOnly: true, silent: true });
        logger.info('test');
      }).not.toThrow();
    });
  });

  describe('environment-aware logging', () => {
    it('development environment skips debug messages', async () => {
      const logger = createLogger({ sink, silent: true, environment: 'development' });
      logger.debug('debug_message');
      logger.info('info_message');
      logger.warn('warn_message');
      await logger.flush();

      expect(getAllLogs(sink).map((l) => l.level)).toEqual(['info', 'warn']);
    });

    it('production environment only keeps warnings and above', async () => {
      const logger = createLogger({ sink, silent: true, environment: 'production' });
      logger.debug('debug_message');
      logger.info('info_message');
      logger.warn('warn_message');
      logger.error('error_message');
      await logger.flush();

      expect(getAllLogs(sink).map((l) => l.level)).toEqual(['warn', 'error']);
    });

    it('uses environment-specific buffer sizes', async () => {
      const testLogger = createLogger({ sink, silent: true, environment: 'test' });
      for (let i = 0; i < 60; i++) {
        testLogger.info(`test_${i}`);
      }
      expect(getLogCount(sink)).toBe(0); // buffer size 1000

      const prodLogger = createLogger({ sink, silent: true, environment: 'production' });
      for (let i = 0; i < 60; i++) {
        prodLogger.warn(`prod_${i}`);
      }
      await new Promise((resolve) => setTimeout(resolve, 10));
      expect(getLogCount(sink)).toBe(50); // auto-flushed at 50
    });
  });
});

describe('createMockLogger', () => {
  it('records calls without output', () => {
    const logger = createMockLogger();

    logger.warn('tag_error', { tag: 'prompty.var' });

    expect(logger.warn).toHaveBeenCalledWith('tag_error', { tag: 'prompty.var' });
  });

  it('child returns another mock logger', () => {
    const logger = createMockLogger();
    const child = logger.child({ scope: 'include' });

    child.info('nested');

    expect(logger.child).toHaveBeenCalledTimes(1);
    expect(child.info).toHaveBeenCalledWith('nested');
    expect(logger.info).not.toHaveBeenCalled();
  });
});
