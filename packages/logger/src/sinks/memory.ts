import type { LogEntry, LogLevel, Sink } from '../logger.js';

/**
 * Keeps every entry in an array, unbuffered.
 * Meant for tests and for hosts that forward entries themselves.
 */
export class MemorySink implements Sink {
  readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  flush(): void {
    // entries are stored as they arrive
  }

  byLevel(level: LogLevel): LogEntry[] {
    return this.entries.filter((entry) => entry.level === level);
  }

  clear(): void {
    this.entries.length = 0;
  }
}
