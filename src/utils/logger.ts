/**
 * Logger utility for the drafting pipeline
 * Provides consistent logging interface across the application
 *
 * Everything is written to stderr: stdout is reserved for the machine-readable
 * run summary printed by the CLI.
 */

import { Console } from 'console';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

interface LogMessage {
  level: LogLevel;
  message: string;
  timestamp: string;
  data?: unknown;
  error?: unknown;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && (LEVELS as string[]).includes(value);
}

class Logger {
  private logLevel: LogLevel;
  private readonly sink = new Console({ stdout: process.stderr, stderr: process.stderr });

  constructor() {
    // Default to 'info' if LOG_LEVEL env var is not set
    const fromEnv = process.env.LOG_LEVEL?.toLowerCase();
    this.logLevel = isLogLevel(fromEnv) ? fromEnv : 'info';
  }

  setLevel(level: LogLevel) {
    this.logLevel = level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.logLevel);
  }

  private formatLog(level: LogLevel, message: string, data?: unknown): LogMessage {
    return {
      level,
      message,
      timestamp: new Date().toISOString(),
      data
    };
  }

  private output(logMessage: LogMessage) {
    const { level, message, timestamp, data, error } = logMessage;
    const prefix = `[${timestamp}] [${level.toUpperCase()}]`;

    switch (level) {
      case 'debug':
        this.sink.debug(prefix, message, data ?? '');
        break;
      case 'info':
        this.sink.info(prefix, message, data ?? '');
        break;
      case 'warn':
        this.sink.warn(prefix, message, data ?? '');
        break;
      case 'error':
        this.sink.error(prefix, message, data ?? '', error ?? '');
        break;
    }
  }

  debug(message: string, data?: unknown) {
    if (this.shouldLog('debug')) {
      this.output(this.formatLog('debug', message, data));
    }
  }

  info(message: string, data?: unknown) {
    if (this.shouldLog('info')) {
      this.output(this.formatLog('info', message, data));
    }
  }

  warn(message: string, data?: unknown) {
    if (this.shouldLog('warn')) {
      this.output(this.formatLog('warn', message, data));
    }
  }

  error(message: string, error?: unknown, data?: unknown) {
    if (this.shouldLog('error')) {
      const logMessage = this.formatLog('error', message, data);
      logMessage.error = error;
      this.output(logMessage);
    }
  }
}

// Export singleton instance
export const logger = new Logger();
