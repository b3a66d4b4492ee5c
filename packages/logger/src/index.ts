export { createLogger } from './logger.js';
export { createMemorySink } from './sink.js';
export type { MemorySink } from './sink.js';
export type {
  Environment,
  EnvironmentConfig,
  LogEntry,
  Logger,
  LoggerConfig,
  LogLevel,
  LogSink,
} from './types.js';
