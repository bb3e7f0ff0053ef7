/**
 * Logging for the watchdog.
 *
 * Console output in pretty or JSON-lines form, optionally mirrored to an
 * activity log file, plus no-op and in-memory loggers for tests.
 */

import { appendFileSync, mkdirSync } from 'fs';
import * as path from 'path';

// ============================================================================
// Logging
// ============================================================================

/**
 * Log levels in order of severity.
 */
export enum LogLevel {
  Trace = 0,
  Debug = 1,
  Info = 2,
  Warn = 3,
  Error = 4,
}

/**
 * Level names accepted in configuration.
 */
export type LogLevelName = 'trace' | 'debug' | 'info' | 'warn' | 'error';

const LEVELS_BY_NAME: Record<LogLevelName, LogLevel> = {
  trace: LogLevel.Trace,
  debug: LogLevel.Debug,
  info: LogLevel.Info,
  warn: LogLevel.Warn,
  error: LogLevel.Error,
};

export function parseLogLevel(name: LogLevelName): LogLevel {
  return LEVELS_BY_NAME[name];
}

/**
 * Logger interface.
 */
export interface Logger {
  trace(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  context?: Record<string, unknown>;
  format?: 'json' | 'pretty';
  /** Every line is also appended to this file */
  filePath?: string;
}

/**
 * Console logger implementation.
 */
export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly context: Record<string, unknown>;
  private readonly format: 'json' | 'pretty';
  private readonly filePath?: string;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.level = options.level ?? LogLevel.Info;
    this.context = options.context ?? {};
    this.format = options.format ?? 'pretty';
    this.filePath = options.filePath;
    if (this.filePath) {
      mkdirSync(path.dirname(this.filePath), { recursive: true });
    }
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Trace, message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Debug, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Info, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Warn, message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Error, message, context);
  }

  child(context: Record<string, unknown>): Logger {
    return new ConsoleLogger({
      level: this.level,
      context: { ...this.context, ...context },
      format: this.format,
      filePath: this.filePath,
    });
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (level < this.level) return;

    const line = formatLine(this.format, new Date(), level, message, {
      ...this.context,
      ...context,
    });
    console.log(line);

    if (this.filePath) {
      appendFileSync(this.filePath, `${line}\n`, 'utf-8');
    }
  }
}

/**
 * Render one log line.
 */
export function formatLine(
  format: 'json' | 'pretty',
  time: Date,
  level: LogLevel,
  message: string,
  context: Record<string, unknown>
): string {
  const timestamp = time.toISOString();
  const levelName = LogLevel[level].toUpperCase();

  if (format === 'json') {
    return JSON.stringify({ timestamp, level: levelName, message, ...context });
  }

  const contextStr = Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : '';
  return `${timestamp} | ${levelName} | ${message}${contextStr}`;
}

/**
 * No-op logger for testing or disabled logging.
 */
export class NoopLogger implements Logger {
  trace(_message: string, _context?: Record<string, unknown>): void { /* noop */ }
  debug(_message: string, _context?: Record<string, unknown>): void { /* noop */ }
  info(_message: string, _context?: Record<string, unknown>): void { /* noop */ }
  warn(_message: string, _context?: Record<string, unknown>): void { /* noop */ }
  error(_message: string, _context?: Record<string, unknown>): void { /* noop */ }
  child(_context: Record<string, unknown>): Logger { return this; }
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  context: Record<string, unknown>;
  timestamp: Date;
}

/**
 * In-memory logger for testing.
 */
export class InMemoryLogger implements Logger {
  private logs: LogEntry[] = [];
  private readonly context: Record<string, unknown>;

  constructor(context: Record<string, unknown> = {}) {
    this.context = context;
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.addLog(LogLevel.Trace, message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.addLog(LogLevel.Debug, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.addLog(LogLevel.Info, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.addLog(LogLevel.Warn, message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.addLog(LogLevel.Error, message, context);
  }

  child(context: Record<string, unknown>): Logger {
    const child = new InMemoryLogger({ ...this.context, ...context });
    // Share the logs array
    child.logs = this.logs;
    return child;
  }

  getLogs(): LogEntry[] {
    return [...this.logs];
  }

  getLogsByLevel(level: LogLevel): LogEntry[] {
    return this.logs.filter((log) => log.level === level);
  }

  hasMessage(fragment: string): boolean {
    return this.logs.some((log) => log.message.includes(fragment));
  }

  clear(): void {
    this.logs.length = 0;
  }

  private addLog(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    this.logs.push({
      level,
      message,
      context: { ...this.context, ...context },
      timestamp: new Date(),
    });
  }
}
