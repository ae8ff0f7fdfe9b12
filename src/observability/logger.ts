export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export type LogContext = Record<string, unknown>;

export interface LogEntry {
  ts: string; // ISO timestamp
  level: LogLevel;
  msg: string;
  [key: string]: unknown;
}

export interface LoggerOptions {
  level: LogLevel;
  json: boolean; // If false, use human-readable format
  sink?: (line: string) => void; // Defaults to stderr
}

/**
 * What pipeline components accept. Both Logger and its children satisfy it.
 */
export interface LoggerLike {
  debug(msg: string, context?: LogContext): void;
  info(msg: string, context?: LogContext): void;
  warn(msg: string, context?: LogContext): void;
  error(msg: string, context?: LogContext): void;
  child(context: LogContext): LoggerLike;
  time(label: string, context?: LogContext): () => number;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

export class Logger implements LoggerLike {
  private readonly level: LogLevel;
  private readonly json: boolean;
  private readonly sink: (line: string) => void;

  constructor(options: LoggerOptions) {
    this.level = options.level;
    this.json = options.json;
    this.sink = options.sink ?? (line => process.stderr.write(line + '\n'));
  }

  isEnabled(level: LogLevel): boolean {
    return level !== 'silent' && LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.level];
  }

  format(level: LogLevel, msg: string, context?: LogContext): string {
    const entry: LogEntry = {
      ts: new Date().toISOString(),
      level,
      msg,
      ...context,
    };

    if (this.json) {
      return JSON.stringify(entry, errorReplacer);
    }

    const levelStr = level.toUpperCase().padEnd(5);
    const contextStr = context && Object.keys(context).length > 0
      ? ` ${JSON.stringify(context, errorReplacer)}`
      : '';
    return `[${entry.ts}] ${levelStr} ${msg}${contextStr}`;
  }

  private write(level: LogLevel, msg: string, context?: LogContext): void {
    if (!this.isEnabled(level)) return;
    this.sink(this.format(level, msg, context));
  }

  debug(msg: string, context?: LogContext): void {
    this.write('debug', msg, context);
  }

  info(msg: string, context?: LogContext): void {
    this.write('info', msg, context);
  }

  warn(msg: string, context?: LogContext): void {
    this.write('warn', msg, context);
  }

  error(msg: string, context?: LogContext): void {
    this.write('error', msg, context);
  }

  child(context: LogContext): LoggerLike {
    return new ChildLogger(this, context);
  }

  time(label: string, context?: LogContext): () => number {
    return startTimer(this, label, context);
  }
}

// Time an operation; the returned callback logs the duration at debug
function startTimer(logger: LoggerLike, label: string, context?: LogContext): () => number {
  const start = performance.now();
  return () => {
    const durationMs = Math.round(performance.now() - start);
    logger.debug(`${label} completed`, { ...context, durationMs });
    return durationMs;
  };
}

class ChildLogger implements LoggerLike {
  constructor(
    private parent: LoggerLike,
    private context: LogContext
  ) {}

  debug(msg: string, context?: LogContext): void {
    this.parent.debug(msg, { ...this.context, ...context });
  }

  info(msg: string, context?: LogContext): void {
    this.parent.info(msg, { ...this.context, ...context });
  }

  warn(msg: string, context?: LogContext): void {
    this.parent.warn(msg, { ...this.context, ...context });
  }

  error(msg: string, context?: LogContext): void {
    this.parent.error(msg, { ...this.context, ...context });
  }

  child(context: LogContext): LoggerLike {
    return new ChildLogger(this, context);
  }

  time(label: string, context?: LogContext): () => number {
    return startTimer(this, label, context);
  }
}

// Errors have no enumerable fields, so JSON.stringify would print {}
function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

export function createLogger(options: LoggerOptions): Logger {
  return new Logger(options);
}

export const silentLogger: LoggerLike = new Logger({ level: 'silent', json: false, sink: () => undefined });
