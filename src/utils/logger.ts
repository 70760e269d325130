/**
 * Logging Utility
 *
 * Structured JSON logging for the generator. Entries go to stderr so that
 * command output on stdout (e.g. `inspect --json`) stays machine-readable.
 */

import chalk from 'chalk';
import type { LogLevel } from '../contracts/types.js';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  data?: unknown;
  error?: { message: string; stack?: string; name: string } | unknown;
}

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && (LEVELS as readonly string[]).includes(value);
}

export class Logger {
  private logLevel: LogLevel;
  private sink: (line: string) => void;

  constructor(level?: string, sink: (line: string) => void = (line) => console.error(line)) {
    this.logLevel = isLogLevel(level) ? level : 'info';
    this.sink = sink;
  }

  setLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  getLevel(): LogLevel {
    return this.logLevel;
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
    this.log('error', message, undefined, error);
  }

  private log(level: LogLevel, message: string, data?: unknown, error?: unknown): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
    };

    if (data !== undefined) {
      entry.data = data;
    }

    if (error !== undefined) {
      entry.error = error instanceof Error ? {
        message: error.message,
        stack: error.stack,
        name: error.name,
      } : error;
    }

    this.sink(this.colorizeLog(level, JSON.stringify(entry)));
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.logLevel);
  }

  private colorizeLog(level: LogLevel, message: string): string {
    const colors = {
      debug: chalk.cyan,
      info: chalk.green,
      warn: chalk.yellow,
      error: chalk.red,
    };

    return colors[level](message);
  }
}

export const logger = new Logger(process.env.TABLEWRIGHT_LOG_LEVEL);
