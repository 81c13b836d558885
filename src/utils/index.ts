/**
 * Utilities Module
 *
 * @packageDocumentation
 */

export { LogLevel, Logger, createLogger, defaultLogger, parseLogLevel } from './logger.js';

export type { LogEntry, LoggerConfig, LogLevelName, LogSink } from './logger.js';

export { ok, err, isOk, unwrapOr } from './result.js';

export type { Ok, Err, Result } from './result.js';

export { SerialQueue } from './serial-queue.js';
