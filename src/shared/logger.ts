/**
 * Logger module for reelsort
 * Provides consistent logging with timestamps and log levels
 * Shared across all modules, with an optional plain-text file sink
 */

import { dirname, join } from 'node:path';
import { format } from 'node:util';
import fse from 'fs-extra';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LOG_LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m', // Gray
  info: '\x1b[36m', // Cyan
  warn: '\x1b[33m', // Yellow
  error: '\x1b[31m', // Red
};

const RESET_COLOR = '\x1b[0m';

/** Destination for uncoloured log lines */
export interface LogSink {
  write(line: string): void;
}

/** Shared mutable state of a logger and all of its children */
interface LoggerState {
  level: LogLevel;
  sink: LogSink | null;
}

export interface LoggerOptions {
  level?: LogLevel;
  useColors?: boolean;
  prefix?: string;
  sink?: LogSink | null;
}

export class Logger {
  private state: LoggerState;
  private useColors: boolean;
  private prefix: string;

  constructor(options: LoggerOptions = {}, state?: LoggerState) {
    this.state = state ?? { level: options.level ?? 'info', sink: options.sink ?? null };
    this.useColors = options.useColors ?? process.stdout.isTTY === true;
    this.prefix = options.prefix ?? '';
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.state.level];
  }

  private formatTimestamp(): string {
    const now = new Date();
    return now.toISOString().replace('T', ' ').replace('Z', '');
  }

  private formatMessage(level: LogLevel, message: string, colored: boolean): string {
    const timestamp = this.formatTimestamp();
    const levelStr = level.toUpperCase().padEnd(5);
    const prefix = this.prefix ? `[${this.prefix}] ` : '';

    if (colored) {
      const color = LOG_LEVEL_COLORS[level];
      return `${color}[${timestamp}] ${levelStr}${RESET_COLOR} ${prefix}${message}`;
    }

    return `[${timestamp}] ${levelStr} ${prefix}${message}`;
  }

  private log(level: LogLevel, message: string, ...args: unknown[]): void {
    if (!this.shouldLog(level)) return;

    const formattedMessage = this.formatMessage(level, message, this.useColors);
    const output = level === 'error' ? console.error : console.log;

    if (args.length > 0) {
      output(formattedMessage, ...args);
    } else {
      output(formattedMessage);
    }

    if (this.state.sink) {
      this.state.sink.write(format(this.formatMessage(level, message, false), ...args));
    }
  }

  debug(message: string, ...args: unknown[]): void {
    this.log('debug', message, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    this.log('info', message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.log('warn', message, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    this.log('error', message, ...args);
  }

  /** Create a child logger with a prefix; level and sink stay shared with the parent */
  child(prefix: string): Logger {
    const newPrefix = this.prefix ? `${this.prefix}:${prefix}` : prefix;
    return new Logger({ useColors: this.useColors, prefix: newPrefix }, this.state);
  }

  /** Set the log level */
  setLevel(level: LogLevel): void {
    this.state.level = level;
  }

  /** Get the current log level */
  getLevel(): LogLevel {
    return this.state.level;
  }

  /** Attach (or detach, with null) the file sink */
  setSink(sink: LogSink | null): void {
    this.state.sink = sink;
  }
}

//═══════════════════════════════════════════════════════════════════════════════
// FILE SINK
//═══════════════════════════════════════════════════════════════════════════════

/** Timestamped log filename, e.g. reelsort-20240315-093000.log */
export function buildLogFileName(date: Date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `reelsort-${day}-${time}.log`;
}

/**
 * Resolve the log file path from an explicit file or a directory
 * An explicit file wins over a directory
 */
export function resolveLogFilePath(logFile?: string, logDir?: string): string | undefined {
  if (logFile) return logFile;
  if (logDir) return join(logDir, buildLogFileName());
  return undefined;
}

/** Append-only file sink; creates the parent directory on first use */
export function createFileSink(filePath: string): LogSink {
  fse.ensureDirSync(dirname(filePath));
  return {
    write(line: string): void {
      fse.appendFileSync(filePath, `${line}\n`);
    },
  };
}

// Global logger instance
let globalLogger: Logger | null = null;

export function getLogger(): Logger {
  if (!globalLogger) {
    globalLogger = new Logger();
  }
  return globalLogger;
}
