export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

export interface LogEntry {
  level: LogLevel;
  category: string;
  timestamp: Date;
  msg: string;
  context?: Record<string, unknown>;
}

export interface Sink {
  write(entry: LogEntry): void;
  flush(): void;
}

export interface Logger {
  trace(msg: string): void;
  trace(obj: Record<string, unknown>, msg: string): void;
  debug(msg: string): void;
  debug(obj: Record<string, unknown>, msg: string): void;
  info(msg: string): void;
  info(obj: Record<string, unknown>, msg: string): void;
  warn(msg: string): void;
  warn(obj: Record<string, unknown>, msg: string): void;
  error(msg: string): void;
  error(obj: Record<string, unknown>, msg: string): void;
}

export interface LoggerConfig {
  level?: LogLevel;
  sinks?: Sink[];
}

export const REDACTED = '[REDACTED]';

const levelOrder: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

// Key names that hold a phrase, password or signing key themselves; `sharedMnemonicPath` does not.
const SECRET_KEY_PATTERN = /(?:mnemonic|password|passphrase|phrase|skey|private_?key|secret|seed)$/i;

const MIN_SECRET_LENGTH = 4;

const secretValues = new Set<string>();

export function isSecretKey(key: string): boolean {
  return SECRET_KEY_PATTERN.test(key);
}

/**
 * Remember a value that must never reach a sink, such as a password or a
 * recovery phrase. Sinks replace it wherever it shows up when they flush.
 */
export function registerSecret(value: string): void {
  const trimmed = value.trim();
  if (trimmed.length >= MIN_SECRET_LENGTH) {
    secretValues.add(trimmed);
  }
}

export function scrubSecrets(text: string): string {
  let scrubbed = text;
  for (const secret of secretValues) {
    scrubbed = scrubbed.split(secret).join(REDACTED);
  }
  return scrubbed;
}

function scrubValue(value: unknown): unknown {
  if (typeof value === 'string') return scrubSecrets(value);
  if (Array.isArray(value)) return value.map((item: unknown) => scrubValue(item));
  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(Object.entries(value).map(([key, item]) => [key, scrubValue(item)]));
  }
  return value;
}

/** Copy of the entry with registered secrets replaced in the message and context. */
export function scrubEntry(entry: LogEntry): LogEntry {
  if (secretValues.size === 0) return entry;

  const scrubbed: LogEntry = { ...entry, msg: scrubSecrets(entry.msg) };
  if (entry.context) {
    scrubbed.context = Object.fromEntries(Object.entries(entry.context).map(([key, item]) => [key, scrubValue(item)]));
  }
  return scrubbed;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Serialize a context object for the sinks.
 *
 * Values under secret-looking keys are replaced with `[REDACTED]` at any depth.
 * Errors become `{ name, message, stack }`, bigints become strings and repeated
 * object references become `[Circular]`.
 */
export function serializeContext(obj: Record<string, unknown>): Record<string, unknown> {
  const seen = new WeakSet<object>();

  const replacer = (key: string, value: unknown): unknown => {
    if (key !== '' && isSecretKey(key)) {
      return REDACTED;
    }

    if (value instanceof Error) {
      return {
        name: value.name,
        message: value.message,
        stack: value.stack,
      };
    }

    if (typeof value === 'bigint') {
      return value.toString();
    }

    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) {
        return '[Circular]';
      }
      seen.add(value);
    }

    return value;
  };

  try {
    const parsed: unknown = JSON.parse(JSON.stringify(obj, replacer));
    if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
    return { value: parsed };
  } catch {
    return { error: '[unserializable]' };
  }
}

class CategoryLogger implements Logger {
  constructor(private readonly category: string) {}

  trace(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.log('trace', msgOrObj, maybeMsg);
  }

  debug(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.log('debug', msgOrObj, maybeMsg);
  }

  info(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.log('info', msgOrObj, maybeMsg);
  }

  warn(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.log('warn', msgOrObj, maybeMsg);
  }

  error(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.log('error', msgOrObj, maybeMsg);
  }

  private log(level: LogLevel, msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    if (levelOrder[level] < levelOrder[state.level]) return;

    const entry: LogEntry =
      typeof msgOrObj === 'string'
        ? { level, category: this.category, timestamp: new Date(), msg: msgOrObj }
        : {
            level,
            category: this.category,
            timestamp: new Date(),
            msg: maybeMsg ?? '',
            context: serializeContext(msgOrObj),
          };

    for (const sink of state.sinks) {
      sink.write(entry);
    }
  }
}

let state: Required<LoggerConfig> = {
  level: 'info',
  sinks: [],
};

const loggers = new Map<string, Logger>();

export function initLogger(config: LoggerConfig): void {
  state = {
    level: config.level ?? 'info',
    sinks: config.sinks ?? [],
  };
}

export function getLogger(category: string): Logger {
  const cached = loggers.get(category);
  if (cached) return cached;

  const logger = new CategoryLogger(category);
  loggers.set(category, logger);
  return logger;
}

export function flushLoggers(): void {
  for (const sink of state.sinks) {
    sink.flush();
  }
}
