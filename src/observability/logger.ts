export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export interface LogEntry {
  ts: string; // ISO timestamp
  level: LogLevel;
  msg: string;
  [key: string]: unknown;
}

export interface LoggerOptions {
  level: LogLevel;
  json: boolean; // If false, use human-readable format
  write?: (line: string) => void; // defaults to stderr
}

// What the parser needs from a logger; both Logger and its children satisfy it
export interface LogTarget {
  debug(msg: string, context?: Record<string, unknown>): void;
  info(msg: string, context?: Record<string, unknown>): void;
  warn(msg: string, context?: Record<string, unknown>): void;
  error(msg: string, context?: Record<string, unknown>): void;
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

export class Logger implements LogTarget {
  private level: LogLevel;
  private readonly json: boolean;
  private readonly sink: (line: string) => void;

  constructor(options: LoggerOptions) {
    this.level = options.level;
    this.json = options.json;
    this.sink = options.write ?? ((line) => process.stderr.write(line + '\n'));
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.level];
  }

  private formatMessage(level: LogLevel, msg: string, context?: Record<string, unknown>): string {
    const entry: LogEntry = {
      ts: new Date().toISOString(),
      level,
      msg,
      ...context,
    };

    if (this.json) {
      return JSON.stringify(entry);
    }

    const levelStr = level.toUpperCase().padEnd(5);
    const contextStr = context ? ` ${JSON.stringify(context)}` : '';
    return `[${entry.ts}] ${levelStr} ${msg}${contextStr}`;
  }

  private write(level: LogLevel, msg: string, context?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) return;
    this.sink(this.formatMessage(level, msg, context));
  }

  debug(msg: string, context?: Record<string, unknown>): void {
    this.write('debug', msg, context);
  }

  info(msg: string, context?: Record<string, unknown>): void {
    this.write('info', msg, context);
  }

  warn(msg: string, context?: Record<string, unknown>): void {
    this.write('warn', msg, context);
  }

  error(msg: string, context?: Record<string, unknown>): void {
    this.write('error', msg, context);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  // Create a child logger with additional context
  child(context: Record<string, unknown>): ChildLogger {
    return new ChildLogger(this, context);
  }
}

export class ChildLogger implements LogTarget {
  constructor(
    private parent: LogTarget,
    private context: Record<string, unknown>
  ) {}

  debug(msg: string, context?: Record<string, unknown>): void {
    this.parent.debug(msg, { ...this.context, ...context });
  }

  info(msg: string, context?: Record<string, unknown>): void {
    this.parent.info(msg, { ...this.context, ...context });
  }

  warn(msg: string, context?: Record<string, unknown>): void {
    this.parent.warn(msg, { ...this.context, ...context });
  }

  error(msg: string, context?: Record<string, unknown>): void {
    this.parent.error(msg, { ...this.context, ...context });
  }

  child(context: Record<string, unknown>): ChildLogger {
    return new ChildLogger(this, context);
  }
}

// Global logger instance
let globalLogger: Logger | null = null;

export function createLogger(options: LoggerOptions): Logger {
  globalLogger = new Logger(options);
  return globalLogger;
}

export function getLogger(): Logger {
  if (!globalLogger) {
    // Default logger for early use
    globalLogger = new Logger({ level: 'info', json: false });
  }
  return globalLogger;
}

export const logger: LogTarget = {
  debug: (msg, context) => getLogger().debug(msg, context),
  info: (msg, context) => getLogger().info(msg, context),
  warn: (msg, context) => getLogger().warn(msg, context),
  error: (msg, context) => getLogger().error(msg, context),
};
