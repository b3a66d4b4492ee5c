import type { MemorySink } from '../src/sink.js';
import type { LogEntry } from '../src/types.js';

export function getLogCount(sink: MemorySink): number {
  return sink.entries.length;
}

export function getLastLog(sink: MemorySink): LogEntry | null {
  return sink.entries[sink.entries.length - 1] ?? null;
}

export function getAllLogs(sink: MemorySink): LogEntry[] {
  return [...sink.entries];
}

export function clearLogs(sink: MemorySink): void {
  sink.clear();
}
