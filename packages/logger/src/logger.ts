/** Structured JSON logger with an optional buffered sink */

import { ulid } from 'ulid';
import type {
  Environment,
  EnvironmentConfig,
  LogEntry,
  Logger,
  LoggerConfig,
  LogLevel,
  LogSink,
} from './types.js';

/** Environment-specific configurations */
const ENVIRONMENT_CONFIGS: Record<Environment, EnvironmentConfig> = {
  test: {
    minLevel: 'debug', // Log everything in tests
    includeStackTraces: true,
    bufferSize: 1000,
  },
  development: {
    minLevel: 'info',
    includeStackTraces: true,
    bufferSize: 50,
  },
  production: {
    minLevel: 'warn', // Only warnings and errors
    includeStackTraces: false,
    bufferSize: 50,
  },
};

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

class LoggerImpl implements Logger {
  protected metadata: Record<string, unknown>;
  private buffer: LogEntry[] = [];
  private sink?: LogSink;
  private bufferSize: number;
  private consoleOnly: boolean;
  private silent: boolean;
  private environment: Environment;
  private envConfig: EnvironmentConfig;

  constructor(config: LoggerConfig, parentMetadata: Record<string, unknown> = {}) {
    this.metadata = parentMetadata;
    this.sink = config.sink;
    this.consoleOnly = config.consoleOnly ?? false;
    this.silent = config.silent ?? false;
    this.environment = config.environment ?? 'development';
    this.envConfig = ENVIRONMENT_CONFIGS[this.environment];
    this.bufferSize = config.bufferSize ?? this.envConfig.bufferSize;

    if (!this.consoleOnly && !this.sink) {
      throw new Error('LoggerConfig.sink is required when consoleOnly is false');
    }
  }

  child(metadata: Record<string, unknown>): Logger {
    return new LoggerImpl(
      {
        sink: this.sink,
        bufferSize: this.bufferSize,
        consoleOnly: this.consoleOnly,
        silent: this.silent,
        environment: this.environment,
      },
      { ...this.metadata, ...metadata },
    );
  }

  debug(event_type: string, metadata?: Record<string, unknown>): void {
    this.log('debug', event_type, metadata);
  }

  info(event_type: string, metadata?: Record<string, unknown>): void {
    this.log('info', event_type, metadata);
  }

  warn(event_type: string, metadata?: Record<string, unknown>): void {
    this.log('warn', event_type, metadata);
  }

  error(event_type: string, metadata?: Record<string, unknown>): void {
    this.log('error', event_type, metadata);
  }

  fatal(event_type: string, metadata?: Record<string, unknown>): void {
    this.log('fatal', event_type, metadata);
    // Fatal logs flush immediately (don't wait for batch)
    this.flush().catch((err: unknown) => {
      console.error('Failed to flush fatal log:', err);
    });
  }

  private log(level: LogLevel, event_type: string, metadata?: Record<string, unknown>): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.envConfig.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      id: ulid(),
      level,
      event_type,
      metadata: this.serializeMetadata({ ...this.metadata, ...metadata }),
      timestamp: Date.now(),
    };

    if (!this.silent) {
      this.logToConsole(entry);
    }

    // debug never reaches the sink
    if (!this.consoleOnly && level !== 'debug') {
      this.buffer.push(entry);

      if (this.buffer.length >= this.bufferSize) {
        this.flush().catch((err: unknown) => {
          console.error('Failed to auto-flush logs:', err);
        });
      }
    }
  }

  async flush(): Promise<void> {
    if (this.consoleOnly || !this.sink || this.buffer.length === 0) {
      return;
    }

    const toFlush = [...this.buffer];
    this.buffer = [];

    try {
      await this.sink.write(toFlush);
    } catch (err) {
      // Sink failures must not break the caller
      console.error('Failed to flush logs to sink:', err, {
        entries: toFlush.length,
      });
    }
  }

  /**
   * Error instances do not survive JSON.stringify, so flatten them.
   */
  private serializeMetadata(metadata: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(metadata)) {
      if (value instanceof Error) {
        result[key] = {
          name: value.name,
          message: value.message,
          ...(this.envConfig.includeStackTraces && value.stack ? { stack: value.stack } : {}),
        };
      } else {
        result[key] = value;
      }
    }
    return result;
  }

  protected logToConsole(entry: LogEntry): void {
    const logData = {
      level: entry.level,
      event_type: entry.event_type,
      metadata: entry.metadata,
      timestamp: new Date(entry.timestamp).toISOString(),
    };
    console.log(JSON.stringify(logData));
  }
}

export function createLogger(config: LoggerConfig): Logger {
  return new LoggerImpl(config);
}
