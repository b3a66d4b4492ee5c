import type { LogEntry, LogSink } from './types.js';

export interface MemorySink extends LogSink {
  readonly entries: readonly LogEntry[];
  clear(): void;
}

/**
 * Sink that keeps flushed entries in memory, in flush order.
 */
export function createMemorySink(): MemorySink {
  const entries: LogEntry[] = [];
  return {
    get entries() {
      return entries;
    },
    write(batch: LogEntry[]): void {
      entries.push(...batch);
    },
    clear(): void {
      entries.length = 0;
    },
  };
}
