import { appendFileSync, chmodSync, existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

import { BufferedSink } from '../buffered-sink.js';
import type { LogEntry } from '../logger.js';

export interface FileSinkOptions {
  path: string;
}

/**
 * JSON-lines sink. The log file is owner-only (0600) because wallet paths and
 * addresses end up in it.
 */
export class FileSink extends BufferedSink {
  readonly path: string;

  constructor(options: FileSinkOptions) {
    super();
    mkdirSync(dirname(options.path), { recursive: true, mode: 0o700 });
    this.path = options.path;
  }

  protected writeEntry(entry: LogEntry): void {
    const line = JSON.stringify({
      timestamp: entry.timestamp.toISOString(),
      level: entry.level,
      category: entry.category,
      msg: entry.msg,
      ...(entry.context ? { context: entry.context } : {}),
    });
    const created = !existsSync(this.path);
    appendFileSync(this.path, line + '\n', { encoding: 'utf8', mode: 0o600 });
    if (created) {
      chmodSync(this.path, 0o600);
    }
  }
}
