/**
 * Leveled logger used across the client.
 */

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  silent: 5,
};

export interface LoggerOptions {
  /** Minimum log level (default: 'silent') */
  level?: LogLevel;
  /** Prefix for all log messages */
  prefix?: string;
  /** Include timestamps (default: true) */
  timestamps?: boolean;
  /** Custom log handler (default: console) */
  handler?: LogHandler;
}

export interface LogEntry {
  level: Exclude<LogLevel, 'silent'>;
  message: string;
  data?: unknown;
  timestamp: string;
  prefix?: string;
}

export type LogHandler = (entry: LogEntry) => void;

const CONSOLE_METHODS: Record<LogEntry['level'], (...args: unknown[]) => void> = {
  trace: (...args) => console.debug(...args),
  debug: (...args) => console.debug(...args),
  info: (...args) => console.info(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
};

/** Formats an entry as `<timestamp> [prefix] LEVEL message` */
export function formatEntry(entry: LogEntry): string {
  return [
    entry.timestamp,
    entry.prefix ? `[${entry.prefix}]` : '',
    entry.level.toUpperCase(),
    entry.message,
  ]
    .filter(Boolean)
    .join(' ');
}

const defaultHandler: LogHandler = (entry) => {
  const write = CONSOLE_METHODS[entry.level];
  if (entry.data !== undefined) {
    write(formatEntry(entry), entry.data);
  } else {
    write(formatEntry(entry));
  }
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

export class Logger {
  private level: LogLevel;
  private readonly prefix?: string;
  private readonly timestamps: boolean;
  private readonly handler: LogHandler;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'silent';
    this.prefix = options.prefix;
    this.timestamps = options.timestamps ?? true;
    this.handler = options.handler ?? defaultHandler;
  }

  /** Create a child logger with additional prefix */
  child(prefix: string): Logger {
    return new Logger({
      level: this.level,
      prefix: this.prefix ? `${this.prefix}:${prefix}` : prefix,
      timestamps: this.timestamps,
      handler: this.handler,
    });
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return level !== 'silent' && LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private log(level: LogEntry['level'], message: string, data?: unknown): void {
    if (!this.isLevelEnabled(level)) return;

    this.handler({
      level,
      message,
      data,
      timestamp: this.timestamps ? new Date().toISOString() : '',
      prefix: this.prefix,
    });
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

  error(message: string, data?: unknown): void {
    this.log('error', message, data);
  }
}

/** Global logger instance */
let globalLogger = new Logger({ prefix: 'isabelle' });

export function getLogger(): Logger {
  return globalLogger;
}

export function setGlobalLogger(logger: Logger): void {
  globalLogger = logger;
}

export function createLogger(options: LoggerOptions): Logger {
  return new Logger(options);
}
