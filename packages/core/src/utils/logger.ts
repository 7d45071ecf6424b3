/**
 * Logger - Leveled logging for the bridge
 *
 * Writes every entry to stderr so the MCP server's stdout stays a clean
 * JSON-RPC channel, and optionally appends the same lines to a file.
 *
 * @packageDocumentation
 */

import * as fs from 'fs';
import * as path from 'path';

/**
 * Log level enumeration.
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

/**
 * Log level name mapping.
 */
const LOG_LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.SILENT]: 'SILENT',
};

export const LOG_LEVEL_BY_NAME = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
} as const;
export type LogLevelName = keyof typeof LOG_LEVEL_BY_NAME;

/**
 * Logger configuration options.
 */
export interface LoggerConfig {
  /** Log level threshold */
  level: LogLevel;
  /** Component name shown in each line, e.g. "locks" */
  scope?: string;
  /** Append entries to this file as well */
  file?: string;
  /** Where console output goes (default: process.stderr) */
  write?: (line: string) => void;
  /** Timestamp source (default: Date.now) */
  clock?: () => number;
}

/**
 * Provides leveled logging with optional file output.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ level: LogLevel.INFO, scope: 'cli' });
 * logger.info('Opened database', { path: '/tmp/bridge.db' });
 * logger.child('locks').debug('Lock acquired');
 * ```
 */
export class Logger {
  private readonly config: LoggerConfig;
  private fileReady = false;

  constructor(config: LoggerConfig) {
    this.config = config;
  }

  get level(): LogLevel {
    return this.config.level;
  }

  /**
   * Creates a logger sharing this one's settings under a nested scope.
   */
  public child(scope: string): Logger {
    const nested = this.config.scope ? `${this.config.scope}:${scope}` : scope;
    return new Logger({ ...this.config, scope: nested });
  }

  public debug(message: string, data?: unknown): void {
    this.log(LogLevel.DEBUG, message, data);
  }

  public info(message: string, data?: unknown): void {
    this.log(LogLevel.INFO, message, data);
  }

  public warn(message: string, data?: unknown): void {
    this.log(LogLevel.WARN, message, data);
  }

  /**
   * Logs an error message.
   * @param error - Optional error object; its stack is included
   */
  public error(message: string, error?: unknown): void {
    this.log(LogLevel.ERROR, message, error);
  }

  /**
   * Formats one entry. Exposed for tests.
   */
  public format(level: LogLevel, message: string, data?: unknown): string {
    const timestamp = new Date((this.config.clock ?? Date.now)()).toISOString();
    const scope = this.config.scope ? ` [${this.config.scope}]` : '';
    let entry = `[${timestamp}] [${LOG_LEVEL_NAMES[level]}]${scope} ${message}`;

    if (data !== undefined) {
      if (data instanceof Error) {
        entry += `\n  Error: ${data.message}`;
        if (data.stack && this.config.level === LogLevel.DEBUG) {
          entry += `\n  Stack: ${data.stack}`;
        }
      } else if (typeof data === 'object' && data !== null) {
        entry += ` ${JSON.stringify(data)}`;
      } else {
        entry += ` ${String(data)}`;
      }
    }

    return entry;
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    if (level < this.config.level) return;

    const entry = this.format(level, message, data);
    const write = this.config.write ?? ((line: string) => process.stderr.write(line));
    write(entry + '\n');

    if (this.config.file) {
      this.writeToFile(this.config.file, entry + '\n');
    }
  }

  /**
   * Appends synchronously: CLI invocations exit right after their command.
   */
  private writeToFile(file: string, content: string): void {
    if (!this.fileReady) {
      fs.mkdirSync(path.dirname(file), { recursive: true });
      this.fileReady = true;
    }
    fs.appendFileSync(file, content);
  }
}

/**
 * Logger that discards everything; the default for repositories built in tests.
 */
export function createSilentLogger(): Logger {
  return new Logger({ level: LogLevel.SILENT });
}
