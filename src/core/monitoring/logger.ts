/**
 * Structured logging utility for the work-order store and CLI
 */

import * as fs from 'fs';
import * as path from 'path';

export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  error?: Error;
}

const LEVEL_NAMES = ['ERROR', 'WARN', 'INFO', 'DEBUG'];

export function parseLogLevel(value: string | undefined): LogLevel {
  switch (value?.toUpperCase()) {
    case 'ERROR':
      return LogLevel.ERROR;
    case 'WARN':
      return LogLevel.WARN;
    case 'DEBUG':
      return LogLevel.DEBUG;
    default:
      return LogLevel.INFO;
  }
}

export class Logger {
  private static instance: Logger;
  private logLevel: LogLevel;
  private logFile?: string;

  private constructor() {
    this.logLevel = parseLogLevel(process.env.WORKORDER_LOG_LEVEL);

    // Mirror to a file in debug mode or when one is named
    if (this.logLevel === LogLevel.DEBUG || process.env.WORKORDER_LOG_FILE) {
      this.logFile =
        process.env.WORKORDER_LOG_FILE ||
        path.join(process.env.HOME || '.', '.workorder', 'logs', 'workorder.log');
      this.ensureLogDirectory();
    }
  }

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  getLevel(): LogLevel {
    return this.logLevel;
  }

  setLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  private ensureLogDirectory(): void {
    if (this.logFile) {
      const logDir = path.dirname(this.logFile);
      if (!fs.existsSync(logDir)) {
        fs.mkdirSync(logDir, { recursive: true });
      }
    }
  }

  private writeLog(entry: LogEntry): void {
    if (this.logFile) {
      const logLine =
        JSON.stringify({
          ...entry,
          level: LEVEL_NAMES[entry.level],
          error: entry.error
            ? { message: entry.error.message, stack: entry.error.stack }
            : undefined,
        }) + '\n';
      try {
        fs.appendFileSync(this.logFile, logLine);
      } catch {
        // Logging the failure would recurse into this writer
      }
    }

    if (entry.level > this.logLevel) return;

    const levelName = LEVEL_NAMES[entry.level] || 'UNKNOWN';
    const consoleMessage = `[${entry.timestamp}] ${levelName}: ${entry.message}`;

    if (entry.level === LogLevel.ERROR) {
      console.error(consoleMessage);
      if (entry.error) {
        console.error(entry.error.stack);
      }
    } else if (entry.level === LogLevel.WARN) {
      console.warn(consoleMessage);
    } else {
      console.log(consoleMessage);
    }
  }

  error(
    message: string,
    error?: Error,
    context?: Record<string, unknown>
  ): void {
    this.writeLog({
      timestamp: new Date().toISOString(),
      level: LogLevel.ERROR,
      message,
      context,
      error,
    });
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.writeLog({
      timestamp: new Date().toISOString(),
      level: LogLevel.WARN,
      message,
      context,
    });
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.writeLog({
      timestamp: new Date().toISOString(),
      level: LogLevel.INFO,
      message,
      context,
    });
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.writeLog({
      timestamp: new Date().toISOString(),
      level: LogLevel.DEBUG,
      message,
      context,
    });
  }
}

export const logger = Logger.getInstance();
