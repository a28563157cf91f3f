/**
 * Leveled logging for the CLI. Everything goes to stderr so stdout only
 * carries the `move` lines.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  message: string;
  context?: string;
  data?: Record<string, unknown>;
  error?: Error;
}

export interface LoggerOptions {
  minLevel?: LogLevel;
  color?: boolean;
  maxLogs?: number;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

export class Logger {
  private logs: LogEntry[] = [];
  private maxLogs: number;
  private minLevel: LogLevel;
  private color: boolean;

  constructor(options: LoggerOptions = {}) {
    this.minLevel = options.minLevel ?? 'warn';
    this.color = options.color ?? Boolean(process.stderr.isTTY);
    this.maxLogs = options.maxLogs ?? 1000;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.minLevel);
  }

  formatMessage(entry: LogEntry): string {
    const timestamp = entry.timestamp.toISOString();
    const level = entry.level.toUpperCase().padEnd(5);
    const context = entry.context ? ` [${entry.context}]` : '';

    let message = `${timestamp} ${level}${context} ${entry.message}`;

    if (entry.data && Object.keys(entry.data).length > 0) {
      message += '\n  ' + JSON.stringify(entry.data, null, 2).split('\n').join('\n  ');
    }

    if (entry.error) {
      message += `\n  Error: ${entry.error.message}`;
      if (this.minLevel === 'debug' && entry.error.stack) {
        message += `\n  Stack: ${entry.error.stack}`;
      }
    }

    return message;
  }

  private getConsoleColor(level: LogLevel): string {
    const colors: Record<LogLevel, string> = {
      debug: '\x1b[36m',    // Cyan
      info: '\x1b[32m',     // Green
      warn: '\x1b[33m',     // Yellow
      error: '\x1b[31m'     // Red
    };
    return colors[level];
  }

  private log(entry: LogEntry): void {
    if (!this.shouldLog(entry.level)) return;

    this.logs.push(entry);
    if (this.logs.length > this.maxLogs) {
      this.logs = this.logs.slice(-this.maxLogs);
    }

    const formatted = this.color
      ? `${this.getConsoleColor(entry.level)}${this.formatMessage(entry)}\x1b[0m`
      : this.formatMessage(entry);

    if (entry.level === 'warn') {
      console.warn(formatted);
    } else {
      console.error(formatted);
    }
  }

  debug(message: string, data?: Record<string, unknown>, context?: string): void {
    this.log({ timestamp: new Date(), level: 'debug', message, data, context });
  }

  info(message: string, data?: Record<string, unknown>, context?: string): void {
    this.log({ timestamp: new Date(), level: 'info', message, data, context });
  }

  warn(message: string, data?: Record<string, unknown>, context?: string): void {
    this.log({ timestamp: new Date(), level: 'warn', message, data, context });
  }

  error(message: string, error?: Error, context?: string): void {
    this.log({
      timestamp: new Date(),
      level: 'error',
      message,
      error,
      context
    });
  }

  getLogs(level?: LogLevel): LogEntry[] {
    return level ? this.logs.filter(log => log.level === level) : this.logs;
  }

  clear(): void {
    this.logs = [];
  }

  getMinLevel(): LogLevel {
    return this.minLevel;
  }

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }
}

// Singleton instance
export const logger = new Logger({
  minLevel: isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'warn',
});

/**
 * Base class for every error the tool raises
 */
export class AppError extends Error {
  constructor(
    message: string,
    public code: string = 'UNKNOWN_ERROR',
    public statusCode: number = 1,
    public context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): { name: string; message: string; code: string; statusCode: number; context?: Record<string, unknown> } {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      context: this.context,
    };
  }
}

/**
 * Normalize anything thrown into an AppError and log it
 */
export function handleError(error: unknown, context?: string): AppError {
  if (error instanceof AppError) {
    logger.error(error.message, error, context);
    return error;
  }

  if (error instanceof Error) {
    const appError = new AppError(error.message, 'INTERNAL_ERROR', 1);
    logger.error(error.message, error, context);
    return appError;
  }

  const appError = new AppError(String(error), 'UNKNOWN_ERROR', 1);
  logger.error(String(error), undefined, context);
  return appError;
}
