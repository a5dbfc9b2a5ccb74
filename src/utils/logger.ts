/**
 * Structured logging infrastructure.
 *
 * A Logger is created per generation run and handed to each component.
 * Console output is colored; extra sinks (e.g. the run's log file) receive
 * every record that passes the level filter.
 */
import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export interface LogRecord {
  level: Exclude<LogLevel, 'silent'>;
  message: string;
  data?: Record<string, unknown>;
  timestamp: Date;
}

export interface LogSink {
  write(record: LogRecord): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  prefix?: string;
  /** Print to the console (default true) */
  console?: boolean;
  sinks?: LogSink[];
}

/**
 * Appends `timestamp - LEVEL - message` lines to a log file.
 */
export class FileLogSink implements LogSink {
  constructor(private readonly filePath: string) {
    mkdirSync(dirname(filePath), { recursive: true });
  }

  write(record: LogRecord): void {
    let line = `${record.timestamp.toISOString()} - ${record.level.toUpperCase()} - ${record.message}`;
    if (record.data) {
      line += ` ${JSON.stringify(record.data)}`;
    }
    appendFileSync(this.filePath, `${line}\n`, 'utf-8');
  }
}

/**
 * Leveled logger with optional prefix and sinks.
 */
class Logger {
  private level: LogLevel;
  private prefix: string;
  private useConsole: boolean;
  private sinks: LogSink[];

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.prefix = options.prefix ?? '';
    this.useConsole = options.console ?? true;
    this.sinks = options.sinks ? [...options.sinks] : [];
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  setPrefix(prefix: string): void {
    this.prefix = prefix;
  }

  addSink(sink: LogSink): void {
    this.sinks.push(sink);
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private formatMessage(message: string): string {
    return this.prefix ? `[${this.prefix}] ${message}` : message;
  }

  private emit(level: LogRecord['level'], message: string, data?: Record<string, unknown>): void {
    const record: LogRecord = { level, message: this.formatMessage(message), data, timestamp: new Date() };
    for (const sink of this.sinks) {
      sink.write(record);
    }
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('debug')) return;
    this.emit('debug', message, data);
    if (!this.useConsole) return;
    console.log(chalk.gray(`[DEBUG] ${this.formatMessage(message)}`));
    if (data) {
      console.log(chalk.gray(JSON.stringify(data, null, 2)));
    }
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('info')) return;
    this.emit('info', message, data);
    if (!this.useConsole) return;
    console.log(chalk.blue(`[INFO] ${this.formatMessage(message)}`));
    if (data) {
      console.log(chalk.blue(JSON.stringify(data, null, 2)));
    }
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('warn')) return;
    this.emit('warn', message, data);
    if (!this.useConsole) return;
    console.warn(chalk.yellow(`[WARN] ${this.formatMessage(message)}`));
    if (data) {
      console.warn(chalk.yellow(JSON.stringify(data, null, 2)));
    }
  }

  error(message: string, error?: Error | Record<string, unknown>): void {
    if (!this.shouldLog('error')) return;
    const data = error instanceof Error ? { error: error.message } : error;
    this.emit('error', message, data);
    if (!this.useConsole) return;
    console.error(chalk.red(`[ERROR] ${this.formatMessage(message)}`));
    if (error) {
      if (error instanceof Error) {
        console.error(chalk.red(error.stack || error.message));
      } else {
        console.error(chalk.red(JSON.stringify(error, null, 2)));
      }
    }
  }

  /**
   * Log a success message (always shown unless silent).
   */
  success(message: string): void {
    if (!this.shouldLog('info')) return;
    this.emit('info', message);
    if (!this.useConsole) return;
    console.log(chalk.green(`✓ ${message}`));
  }

  /**
   * Log a failure message (always shown unless silent).
   */
  fail(message: string): void {
    if (!this.shouldLog('info')) return;
    this.emit('error', message);
    if (!this.useConsole) return;
    console.log(chalk.red(`✗ ${message}`));
  }

  /**
   * Create a child logger with a prefix. Sinks are shared with the parent.
   */
  child(prefix: string): Logger {
    const child = new Logger({ level: this.level, console: this.useConsole });
    child.sinks = this.sinks;
    child.prefix = this.prefix ? `${this.prefix}:${prefix}` : prefix;
    return child;
  }
}

/**
 * Build the logger for one generation run.
 */
export function createRunLogger(options: { logFile?: string; level?: LogLevel; console?: boolean } = {}): Logger {
  const sinks = options.logFile ? [new FileLogSink(options.logFile)] : [];
  return new Logger({ level: options.level ?? 'info', console: options.console ?? true, sinks });
}

// Default CLI logger for messages outside a run
export const logger = new Logger();

export { Logger };
