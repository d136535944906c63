import type { LogEntry, Sink } from './logger.js';

export interface BufferedSinkOptions {
  maxBuffer?: number;
}

/**
 * Base class for sinks that queue entries and write them on the next turn of the
 * event loop. Subclasses implement `writeEntry(entry)`.
 *
 * When the queue is full the oldest entry is dropped; the next drain reports how
 * many were lost before writing the rest.
 */
export abstract class BufferedSink implements Sink {
  private queue: LogEntry[] = [];
  private drainScheduled = false;
  private droppedCount = 0;
  private readonly maxBuffer: number;

  constructor(options?: BufferedSinkOptions) {
    this.maxBuffer = options?.maxBuffer ?? 1000;
  }

  protected abstract writeEntry(entry: LogEntry): void;

  write(entry: LogEntry): void {
    if (this.queue.length >= this.maxBuffer) {
      this.droppedCount++;
      this.queue.shift();
    }
    this.queue.push(entry);

    if (!this.drainScheduled) {
      this.drainScheduled = true;
      setImmediate(() => this.drain());
    }
  }

  /** Write everything queued so far, synchronously. */
  flush(): void {
    this.drain();
  }

  private drain(): void {
    const entries = this.queue;
    const dropped = this.droppedCount;
    this.queue = [];
    this.drainScheduled = false;
    this.droppedCount = 0;

    if (dropped > 0) {
      this.writeEntry({
        level: 'warn',
        category: 'logger',
        timestamp: new Date(),
        msg: `Dropped ${String(dropped)} log entries (buffer overflow)`,
      });
    }

    for (const entry of entries) {
      this.writeEntry(entry);
    }
  }
}
