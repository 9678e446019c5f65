import pc from 'picocolors';

import { BufferedSink } from '../buffered-sink.js';
import type { LogEntry, LogLevel } from '../logger.js';

export interface ConsoleSinkOptions {
  color?: boolean;
}

const levelColors: Record<LogLevel, (text: string) => string> = {
  trace: pc.gray,
  debug: pc.cyan,
  info: pc.green,
  warn: pc.yellow,
  error: pc.red,
};

/**
 * Human-readable sink. Everything goes to stderr so stdout stays reserved for
 * command output (including `--json` responses).
 *
 * Format: [HH:MM:SS] LEVEL [category] message {key=value}
 */
export class ConsoleSink extends BufferedSink {
  private readonly color: boolean;

  constructor(options?: ConsoleSinkOptions) {
    super();
    this.color = options?.color ?? false;
  }

  protected writeEntry(entry: LogEntry): void {
    const context = entry.context ? ` ${formatContext(entry.context)}` : '';
    console.error(`${formatTime(entry.timestamp)} ${this.formatLevel(entry.level)} [${entry.category}] ${entry.msg}${context}`);
  }

  private formatLevel(level: LogLevel): string {
    const label = level.toUpperCase().padEnd(5);
    return this.color ? levelColors[level](label) : label;
  }
}

function formatTime(timestamp: Date): string {
  const parts = [timestamp.getHours(), timestamp.getMinutes(), timestamp.getSeconds()].map((n) =>
    String(n).padStart(2, '0')
  );
  return `[${parts.join(':')}]`;
}

function formatContext(context: Record<string, unknown>): string {
  const pairs = Object.entries(context).map(([key, value]) => `${key}=${JSON.stringify(value)}`);
  return `{${pairs.join(', ')}}`;
}
