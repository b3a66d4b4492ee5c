export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export type Environment = 'test' | 'development' | 'production';

export interface EnvironmentConfig {
  minLevel: LogLevel;
  includeStackTraces: boolean;
  bufferSize: number;
}

export interface LogEntry {
  id: string;
  level: LogLevel;
  event_type: string;
  message?: string;
  metadata: Record<string, unknown>;
  timestamp: number;
}

/**
 * Destination for buffered log entries.
 */
export interface LogSink {
  write(entries: LogEntry[]): void | Promise<void>;
}

export interface Logger {
  /**
   * Create a child logger with additional metadata merged in.
   * Child loggers inherit all parent metadata.
   */
  child(metadata: Record<string, unknown>): Logger;

  /**
   * Log at debug level (console only, never handed to the sink)
   */
  debug(event_type: string, metadata?: Record<string, unknown>): void;

  /**
   * Log at info level
   */
  info(event_type: string, metadata?: Record<string, unknown>): void;

  /**
   * Log at warn level
   */
  warn(event_type: string, metadata?: Record<string, unknown>): void;

  /**
   * Log at error level
   */
  error(event_type: string, metadata?: Record<string, unknown>): void;

  /**
   * Log at fatal level (flushes immediately)
   */
  fatal(event_type: string, metadata?: Record<string, unknown>): void;

  /**
   * Hand buffered log entries to the sink
   */
  flush(): Promise<void>;
}

export interface LoggerConfig {
  sink?: LogSink;
  bufferSize?: number;
  consoleOnly?: boolean;
  /** Suppress console output (entries still reach the sink) */
  silent?: boolean;
  environment?: Environment;
}
