import { v4 as uuidv4 } from 'uuid';
import { Logger, LogLevel, Output } from '../types';
import { LOG_LEVELS } from './constants';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  meta?: unknown;
  sessionId?: string;
  component?: string;
}

export interface LoggerConfig {
  level: LogLevel;
  enableConsole: boolean;
  sessionId?: string;
  component?: string;
}

const LEVEL_ORDER: LogLevel[] = ['ERROR', 'WARN', 'INFO', 'DEBUG'];

export function isLogLevel(value: string): value is LogLevel {
  const levels: readonly string[] = Object.values(LOG_LEVELS);
  return levels.includes(value);
}

function shouldLog(configured: LogLevel, level: LogLevel): boolean {
  return LEVEL_ORDER.indexOf(level) <= LEVEL_ORDER.indexOf(configured);
}

/**
 * Structured logger writing to stderr-backed console methods.
 * Each CLI run gets its own session id so log lines of one run can be grouped.
 */
export class EnhancedLogger implements Logger {
  private readonly config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = {
      level: 'INFO',
      enableConsole: true,
      sessionId: uuidv4(),
      ...config
    };
  }

  error(message: string, meta?: unknown): void {
    this.log('ERROR', message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.log('WARN', message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.log('INFO', message, meta);
  }

  debug(message: string, meta?: unknown): void {
    this.log('DEBUG', message, meta);
  }

  private log(level: LogLevel, message: string, meta?: unknown): void {
    if (!shouldLog(this.config.level, level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      meta,
      sessionId: this.config.sessionId,
      component: this.config.component
    };

    if (this.config.enableConsole) {
      this.logToConsole(entry);
    }
  }

  private logToConsole(entry: LogEntry): void {
    const prefix = `[${entry.level}] ${entry.timestamp}`;
    const suffix = entry.component ? ` [${entry.component}]` : '';
    const metaStr = entry.meta !== undefined ? ` ${JSON.stringify(entry.meta)}` : '';

    // stderr only: stdout carries the report
    console.error(`${prefix}${suffix} ${entry.message}${metaStr}`);
  }

  public createChildLogger(component: string): EnhancedLogger {
    return new EnhancedLogger({
      ...this.config,
      component
    });
  }
}

/**
 * Simple console logger, used by tests to silence output
 */
export class ConsoleLogger implements Logger {
  private readonly logLevel: LogLevel;

  constructor(logLevel: LogLevel = 'INFO') {
    this.logLevel = logLevel;
  }

  error(message: string, meta?: unknown): void {
    if (shouldLog(this.logLevel, 'ERROR')) {
      console.error(`[ERROR] ${message}`, meta !== undefined ? JSON.stringify(meta, null, 2) : '');
    }
  }

  warn(message: string, meta?: unknown): void {
    if (shouldLog(this.logLevel, 'WARN')) {
      console.warn(`[WARN] ${message}`, meta !== undefined ? JSON.stringify(meta, null, 2) : '');
    }
  }

  info(message: string, meta?: unknown): void {
    if (shouldLog(this.logLevel, 'INFO')) {
      console.info(`[INFO] ${message}`, meta !== undefined ? JSON.stringify(meta, null, 2) : '');
    }
  }

  debug(message: string, meta?: unknown): void {
    if (shouldLog(this.logLevel, 'DEBUG')) {
      console.debug(`[DEBUG] ${message}`, meta !== undefined ? JSON.stringify(meta, null, 2) : '');
    }
  }
}

/**
 * Report output on stdout
 */
export const consoleOutput: Output = {
  log(line = ''): void {
    console.log(line);
  },
  write(text: string): void {
    process.stdout.write(text);
  }
};
