import { BufferedSink, type BufferedSinkOptions } from '../buffered-sink.js';
import type { LogEntry, LogLevel } from '../logger.js';

export interface ConsoleSinkOptions extends BufferedSinkOptions {
  color?: boolean;
}

const ANSI_COLORS: Record<LogLevel, string> = {
  trace: '\x1b[90m',
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};

const ANSI_RESET = '\x1b[0m';

/**
 * Writes entries to the console as
 * `[HH:MM:SS] LEVEL [category] message {key=value, ...}`.
 */
export class ConsoleSink extends BufferedSink {
  private readonly color: boolean;

  constructor(options?: ConsoleSinkOptions) {
    super(options);
    this.color = options?.color ?? false;
  }

  /** Render an entry as a single console line, without colour codes when colour is off. */
  format(entry: LogEntry): string {
    const context = entry.context ? ` ${formatContext(entry.context)}` : '';
    return `${formatTime(entry.timestamp)} ${this.formatLevel(entry.level)} [${entry.category}] ${entry.msg}${context}`;
  }

  protected writeEntry(entry: LogEntry): void {
    const line = this.format(entry);

    if (entry.level === 'error') {
      console.error(line);
    } else if (entry.level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }

  private formatLevel(level: LogLevel): string {
    const padded = level.toUpperCase().padEnd(5);
    return this.color ? `${ANSI_COLORS[level]}${padded}${ANSI_RESET}` : padded;
  }
}

function formatTime(timestamp: Date): string {
  const parts = [timestamp.getHours(), timestamp.getMinutes(), timestamp.getSeconds()];
  return `[${parts.map((part) => String(part).padStart(2, '0')).join(':')}]`;
}

function formatContext(context: Record<string, unknown>): string {
  const pairs = Object.entries(context).map(([key, value]) => `${key}=${JSON.stringify(value)}`);
  return `{${pairs.join(', ')}}`;
}
