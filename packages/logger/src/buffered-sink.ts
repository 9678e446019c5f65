import { scrubEntry, type LogEntry, type Sink } from './logger.js';

/**
 * Sink base that queues entries and writes them on the next tick.
 *
 * Registered secrets are scrubbed when the queue drains, so a password or
 * phrase registered after an entry was logged is still kept out of the sink.
 * The CLI calls `flush()` before it exits.
 */
export abstract class BufferedSink implements Sink {
  private queue: LogEntry[] = [];
  private pending = false;

  protected abstract writeEntry(entry: LogEntry): void;

  write(entry: LogEntry): void {
    this.queue.push(entry);
    if (!this.pending) {
      this.pending = true;
      setImmediate(() => this.flush());
    }
  }

  flush(): void {
    const entries = this.queue;
    this.queue = [];
    this.pending = false;

    for (const entry of entries) {
      this.writeEntry(scrubEntry(entry));
    }
  }
}
