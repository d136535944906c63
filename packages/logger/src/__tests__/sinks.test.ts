import { afterEach, describe, expect, it, vi } from 'vitest';

import { BufferedSink } from '../buffered-sink.js';
import type { LogEntry } from '../logger.js';
import { ConsoleSink } from '../sinks/console.js';
import { MemorySink } from '../sinks/memory.js';

function entry(msg: string, overrides: Partial<LogEntry> = {}): LogEntry {
  return { level: 'info', category: 'test', timestamp: new Date(2024, 0, 1, 9, 5, 7), msg, ...overrides };
}

class CollectingSink extends BufferedSink {
  readonly written: LogEntry[] = [];

  protected writeEntry(logEntry: LogEntry): void {
    this.written.push(logEntry);
  }
}

describe('BufferedSink', () => {
  it('should defer writes to the next tick', async () => {
    const sink = new CollectingSink();

    sink.write(entry('queued'));
    expect(sink.written).toHaveLength(0);

    await new Promise((resolve) => setTimeout(resolve, 10));

    expect(sink.written.map((e) => e.msg)).toEqual(['queued']);
  });

  it('should write synchronously on flush', () => {
    const sink = new CollectingSink();

    sink.write(entry('one'));
    sink.write(entry('two'));
    sink.flush();

    expect(sink.written.map((e) => e.msg)).toEqual(['one', 'two']);
  });

  it('should drop the oldest entries and report the count', () => {
    const sink = new CollectingSink({ maxBuffer: 2 });

    for (const msg of ['m1', 'm2', 'm3', 'm4']) {
      sink.write(entry(msg));
    }
    sink.flush();

    expect(sink.written.map((e) => e.msg)).toEqual(['Dropped 2 log entries (buffer overflow)', 'm3', 'm4']);
    expect(sink.written[0]?.level).toBe('warn');
  });
});

describe('ConsoleSink', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should format time, padded level, category and context', () => {
    const sink = new ConsoleSink();

    expect(sink.format(entry('decoded', { category: 'CurrencyCodec', context: { code: 'EUR' } }))).toBe(
      '[09:05:07] INFO  [CurrencyCodec] decoded {code="EUR"}'
    );
  });

  it('should wrap the level in ANSI colour codes when enabled', () => {
    const sink = new ConsoleSink({ color: true });

    expect(sink.format(entry('careful', { level: 'warn' }))).toBe('[09:05:07] \x1b[33mWARN \x1b[0m [test] careful');
  });

  it('should route levels to the matching console method', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const sink = new ConsoleSink();

    sink.write(entry('plain'));
    sink.write(entry('careful', { level: 'warn' }));
    sink.write(entry('broken', { level: 'error' }));
    sink.flush();

    expect(log).toHaveBeenCalledWith('[09:05:07] INFO  [test] plain');
    expect(warn).toHaveBeenCalledWith('[09:05:07] WARN  [test] careful');
    expect(error).toHaveBeenCalledWith('[09:05:07] ERROR [test] broken');
  });
});

describe('MemorySink', () => {
  it('should keep entries until cleared', () => {
    const sink = new MemorySink();

    sink.write(entry('kept'));
    sink.flush();
    expect(sink.entries).toHaveLength(1);

    sink.clear();
    expect(sink.entries).toHaveLength(0);
  });
});
