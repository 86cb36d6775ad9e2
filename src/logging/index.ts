/**
 * Structured logging module.
 *
 * @packageDocumentation
 */

export { LOG_THRESHOLDS, Logger, createLogger, isValidLogThreshold } from './logger.js';
export type { LogEntry, LogLevel, LogThreshold, LoggerOptions } from './logger.js';
