import { createWriteStream, type WriteStream } from 'node:fs';
import { getEnv } from '../config/env.js';

// --- Types ---

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  msg: string;
  timestamp: string;
  service: string;
  submission?: number;
  worker?: number;
  [key: string]: unknown;
}

/** Destination for formatted log lines. */
export interface LogSink {
  write(entry: LogEntry, line: string): void;
  close?(): Promise<void>;
}

export interface LoggerOptions {
  level?: LogLevel;
  service?: string;
  sinks?: LogSink[];
}

// --- Log level ordering ---

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// --- Secret redaction ---

const SENSITIVE_KEYS = new Set([
  'password',
  'passwd',
  'secret',
  'token',
  'api_key',
  'apiKey',
  'authorization',
  'cookie',
  'session',
  'credential',
]);

const SENSITIVE_PATTERNS = [
  /(?:sk|pk|key|token|secret|password)[_-]?[a-zA-Z0-9]{16,}/g,
  /(?:eyJ)[a-zA-Z0-9._-]{20,}/g, // JWTs
  /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g, // Email addresses
];

function redactValue(key: string, value: unknown): unknown {
  if (typeof value === 'string') {
    const lowerKey = key.toLowerCase();
    for (const sensitive of SENSITIVE_KEYS) {
      if (lowerKey.includes(sensitive.toLowerCase())) {
        return '[REDACTED]';
      }
    }
    let redacted = value;
    for (const pattern of SENSITIVE_PATTERNS) {
      redacted = redacted.replace(pattern, '[REDACTED]');
    }
    return redacted;
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function redactObject(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (isRecord(value)) {
      result[key] = redactObject(value);
    } else if (Array.isArray(value)) {
      result[key] = value.map((item: unknown) =>
        isRecord(item) ? redactObject(item) : redactValue(key, item),
      );
    } else {
      result[key] = redactValue(key, value);
    }
  }
  return result;
}

// --- Sinks ---

export class ConsoleLogSink implements LogSink {
  write(entry: LogEntry, line: string): void {
    switch (entry.level) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'debug':
        console.debug(line);
        break;
      default:
        console.log(line);
    }
  }
}

/**
 * Appends one JSON line per entry. Opened on construction, flushed on close().
 * A file that cannot be opened or written disables this sink only: the
 * failure is reported once on stderr and the other sinks keep logging.
 */
export class FileLogSink implements LogSink {
  private stream: WriteStream | null;
  private failed = false;

  constructor(readonly path: string) {
    const stream = createWriteStream(path, { flags: 'a' });
    stream.on('error', (err) => {
      this.stream = null;
      if (this.failed) return;
      this.failed = true;
      console.error(`[formpilot] Could not write log file ${path}: ${err.message}`);
    });
    this.stream = stream;
  }

  write(_entry: LogEntry, line: string): void {
    this.stream?.write(`${line}\n`);
  }

  close(): Promise<void> {
    const stream = this.stream;
    this.stream = null;
    if (!stream || stream.destroyed) return Promise.resolve();
    return new Promise((resolve) => {
      stream.once('close', () => resolve());
      stream.end();
    });
  }
}

export class MemoryLogSink implements LogSink {
  readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  find(msg: string): LogEntry | undefined {
    return this.entries.find((e) => e.msg === msg);
  }

  byLevel(level: LogLevel): LogEntry[] {
    return this.entries.filter((e) => e.level === level);
  }
}

// --- Logger class ---

export class Logger {
  private level: LogLevel;
  private service: string;
  private sinks: LogSink[];
  private context: Record<string, unknown>;

  constructor(opts: LoggerOptions = {}) {
    const env = getEnv();
    this.level =
      opts.level ?? env.FORMPILOT_LOG_LEVEL ?? (env.NODE_ENV === 'production' ? 'info' : 'debug');
    this.service = opts.service ?? 'formpilot';
    this.sinks = opts.sinks ?? [new ConsoleLogSink()];
    this.context = {};
  }

  /** Shares this logger's sinks; closing a child closes them too. */
  child(bindings: Record<string, unknown>): Logger {
    const child = new Logger({
      level: this.level,
      service: this.service,
      sinks: this.sinks,
    });
    child.context = { ...this.context, ...bindings };
    return child;
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    this.log('debug', msg, data);
  }

  info(msg: string, data?: Record<string, unknown>): void {
    this.log('info', msg, data);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    this.log('warn', msg, data);
  }

  error(msg: string, data?: Record<string, unknown>): void {
    this.log('error', msg, data);
  }

  async close(): Promise<void> {
    await Promise.all(this.sinks.map((sink) => sink.close?.()));
  }

  private log(level: LogLevel, msg: string, data?: Record<string, unknown>): void {
    if (LOG_LEVEL_ORDER[level] < LOG_LEVEL_ORDER[this.level]) return;

    const entry: LogEntry = {
      level,
      msg,
      timestamp: new Date().toISOString(),
      service: this.service,
      ...this.context,
      ...(data ? redactObject(data) : {}),
    };

    const line = JSON.stringify(entry);
    for (const sink of this.sinks) {
      sink.write(entry, line);
    }
  }
}

/** Console plus an append-mode file, the pair a batch run writes to. */
export function createBatchLogger(opts: { level?: LogLevel; file?: string } = {}): Logger {
  const sinks: LogSink[] = [new ConsoleLogSink()];
  if (opts.file) sinks.push(new FileLogSink(opts.file));
  return new Logger({ level: opts.level, sinks });
}
