/**
 * Structured Logger Module
 *
 * Configurable logging with severity levels and an optional JSON output.
 * Context objects pass through {@link redactSensitiveData} before they are
 * written, so keys, tokens and passwords never reach a log line.
 *
 * @packageDocumentation
 */

import { redactSensitiveData } from '../security/masking.js';

/**
 * Log severity levels
 */
export enum LogLevel {
  /** No logging */
  SILENT = 0,
  /** Error messages only */
  ERROR = 1,
  /** Errors and warnings */
  WARN = 2,
  /** Errors, warnings, and info messages */
  INFO = 3,
  /** All messages including debug */
  DEBUG = 4,
}

export type LogLevelName = Exclude<keyof typeof LogLevel, 'SILENT'>;

/**
 * Log entry structure for JSON output
 */
export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevelName;
  /** Logger prefix, e.g. `PrivacyKit:KeyVault` */
  logger: string;
  message: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    code?: string;
    stack?: string;
  };
}

/**
 * Receives formatted lines instead of the console
 */
export type LogSink = (level: LogLevel, line: string) => void;

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Minimum log level to output (default: INFO) */
  level?: LogLevel;
  /** Output as JSON (default: false) */
  json?: boolean;
  /** Include timestamps in text output (default: true) */
  timestamps?: boolean;
  /** Logger name prefix (default: 'PrivacyKit') */
  prefix?: string;
  /** Redact sensitive context fields (default: true) */
  redact?: boolean;
  /** Output destination (default: console) */
  sink?: LogSink;
}

const consoleSink: LogSink = (level, line) => {
  if (level === LogLevel.ERROR) {
    console.error(line);
  } else if (level === LogLevel.WARN) {
    console.warn(line);
  } else {
    console.log(line);
  }
};

const DEFAULT_CONFIG: Required<LoggerConfig> = {
  level: LogLevel.INFO,
  json: false,
  timestamps: true,
  prefix: 'PrivacyKit',
  redact: true,
  sink: consoleSink,
};

/**
 * Structured Logger
 *
 * @example
 * ```typescript
 * const logger = new Logger({ level: LogLevel.DEBUG, json: true });
 *
 * logger.info('Consent recorded', { policyVersion: '1.0.0' });
 * logger.error('Key rotation failed', { slot: 'app_encryption_key' }, err);
 * ```
 */
export class Logger {
  private readonly config: Required<LoggerConfig>;

  constructor(config: LoggerConfig = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: Record<string, unknown>, error?: Error): void {
    this.log(LogLevel.WARN, message, context, error);
  }

  error(message: string, context?: Record<string, unknown>, error?: Error): void {
    this.log(LogLevel.ERROR, message, context, error);
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (level > this.config.level || level === LogLevel.SILENT) {
      return;
    }

    const levelName = LogLevel[level] as LogLevelName;
    const timestamp = new Date().toISOString();
    const safeContext =
      context && Object.keys(context).length > 0 ? this.prepareContext(context) : undefined;

    let line: string;

    if (this.config.json) {
      const entry: LogEntry = {
        timestamp,
        level: levelName,
        logger: this.config.prefix,
        message,
      };

      if (safeContext) {
        entry.context = safeContext;
      }

      if (error) {
        entry.error = {
          name: error.name,
          message: error.message,
          code: readCode(error),
          stack: error.stack,
        };
      }

      line = JSON.stringify(entry);
    } else {
      const parts: string[] = [];

      if (this.config.timestamps) {
        parts.push(`[${timestamp}]`);
      }

      parts.push(`[${this.config.prefix}]`);
      parts.push(`[${levelName}]`);
      parts.push(message);

      if (safeContext) {
        parts.push(JSON.stringify(safeContext));
      }

      if (error) {
        parts.push(`(${error.name}: ${error.message})`);
      }

      line = parts.join(' ');
    }

    this.config.sink(level, line);
  }

  private prepareContext(context: Record<string, unknown>): Record<string, unknown> {
    if (!this.config.redact) {
      return context;
    }
    return redactSensitiveData(context);
  }

  /**
   * Create a child logger with additional context prefix
   */
  child(prefix: string): Logger {
    return new Logger({
      ...this.config,
      prefix: `${this.config.prefix}:${prefix}`,
    });
  }

  getLevel(): LogLevel {
    return this.config.level;
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return level !== LogLevel.SILENT && level <= this.config.level;
  }
}

function readCode(error: Error): string | undefined {
  const code: unknown = Reflect.get(error, 'code');
  return typeof code === 'string' ? code : undefined;
}

/**
 * Parses a level name (case-insensitive) into a LogLevel
 */
export function parseLogLevel(name: string): LogLevel | undefined {
  switch (name.trim().toUpperCase()) {
    case 'SILENT':
      return LogLevel.SILENT;
    case 'ERROR':
      return LogLevel.ERROR;
    case 'WARN':
      return LogLevel.WARN;
    case 'INFO':
      return LogLevel.INFO;
    case 'DEBUG':
      return LogLevel.DEBUG;
    default:
      return undefined;
  }
}

export function createLogger(config?: LoggerConfig): Logger {
  return new Logger(config);
}

/**
 * Logger used when a service is constructed without one
 */
export const defaultLogger = new Logger();
