/**
 * Logging
 *
 * Level-filtered logger with a context tag. Entries go to one or more sinks:
 * the in-memory ring buffer backs the log pane of the interactive UI, the
 * file sink keeps a plain-text trail across the session.
 */

import fs from 'node:fs';
import path from 'node:path';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

const LEVEL_ORDER: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  context: string;
  message: string;
}

export interface LogSink {
  write(entry: LogEntry): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  const normalized = (value ?? '').trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : fallback;
}

/** Pane format: `HH:MM:SS.mmm LEVEL [context] message` (UTC). */
export function formatLogEntry(entry: LogEntry): string {
  const time = entry.timestamp.toISOString().slice(11, 23);
  return `${time} ${entry.level.toUpperCase().padEnd(5)} [${entry.context}] ${entry.message}`;
}

function formatPlain(entry: LogEntry): string {
  return `${entry.timestamp.toISOString()} [${entry.level.toUpperCase()}] [${entry.context}] ${entry.message}`;
}

/**
 * Keeps the newest `capacity` entries.
 */
export class LogBuffer implements LogSink {
  private readonly items: LogEntry[] = [];

  constructor(private readonly capacity = 500) {}

  write(entry: LogEntry): void {
    this.items.push(entry);
    if (this.items.length > this.capacity) {
      this.items.splice(0, this.items.length - this.capacity);
    }
  }

  entries(): readonly LogEntry[] {
    return this.items;
  }

  tail(count: number): LogEntry[] {
    if (count <= 0) return [];
    return this.items.slice(-count);
  }
}

/**
 * Appends plain lines to a file. The first write failure disables the sink
 * and is handed to `onFailure`.
 */
export class FileLogSink implements LogSink {
  private disabled = false;

  constructor(
    private readonly filePath: string,
    private readonly onFailure?: (error: unknown) => void
  ) {}

  write(entry: LogEntry): void {
    if (this.disabled) return;
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.appendFileSync(this.filePath, `${formatPlain(entry)}\n`, 'utf-8');
    } catch (error) {
      this.disabled = true;
      this.onFailure?.(error);
    }
  }
}

function formatData(data: unknown): string {
  if (data instanceof Error) return data.message;
  if (typeof data === 'string') return data;
  try {
    return JSON.stringify(data);
  } catch {
    return String(data);
  }
}

export interface LoggerOptions {
  level: LogLevel;
  sinks: LogSink[];
  context?: string;
  now?: () => Date;
}

export class Logger {
  private readonly context: string;
  private readonly now: () => Date;

  constructor(private readonly options: Readonly<LoggerOptions>) {
    this.context = options.context ?? 'app';
    this.now = options.now ?? (() => new Date());
  }

  /** Same level and sinks, different context tag. */
  child(context: string): Logger {
    return new Logger({ ...this.options, context });
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.options.level];
  }

  trace(message: string, data?: unknown): void {
    this.log('trace', message, data);
  }

  debug(message: string, data?: unknown): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log('warn', message, data);
  }

  error(message: string, error?: unknown): void {
    this.log('error', message, error);
  }

  private log(level: LogLevel, message: string, data: unknown): void {
    if (!this.isEnabled(level)) return;
    const entry: LogEntry = {
      timestamp: this.now(),
      level,
      context: this.context,
      message: data === undefined ? message : `${message}: ${formatData(data)}`,
    };
    for (const sink of this.options.sinks) {
      sink.write(entry);
    }
  }
}

export interface SessionLoggerOptions {
  level: LogLevel;
  capacity: number;
  file?: string;
}

/**
 * Logger for a session: everything lands in the returned buffer, and in
 * `file` when one is given. A broken log file is reported once, in the buffer.
 */
export function createSessionLogger(options: SessionLoggerOptions): { logger: Logger; buffer: LogBuffer } {
  const buffer = new LogBuffer(options.capacity);
  const sinks: LogSink[] = [buffer];
  if (options.file) {
    const filePath = options.file;
    sinks.push(
      new FileLogSink(filePath, (error) => {
        buffer.write({
          timestamp: new Date(),
          level: 'warn',
          context: 'log',
          message: `Disabled log file ${filePath}: ${formatData(error)}`,
        });
      })
    );
  }
  return { logger: new Logger({ level: options.level, sinks }), buffer };
}
