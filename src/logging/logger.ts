/**
 * Structured logging for mixture operations.
 *
 * Emits JSON-lines entries to stderr by default. Entries below the
 * configured threshold are dropped.
 *
 * @packageDocumentation
 */

/**
 * Log levels supported by the logger.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Minimum level to emit, or 'silent' to emit nothing.
 */
export type LogThreshold = LogLevel | 'silent';

/**
 * Array of valid thresholds for validation, least to most severe.
 */
export const LOG_THRESHOLDS: readonly LogThreshold[] = [
  'debug',
  'info',
  'warn',
  'error',
  'silent',
] as const;

/**
 * Checks if a value is a valid LogThreshold.
 *
 * @param value - The value to check.
 * @returns True if the value is a valid LogThreshold.
 */
export function isValidLogThreshold(value: string): value is LogThreshold {
  return LOG_THRESHOLDS.some((threshold) => threshold === value);
}

/**
 * Structured log entry.
 */
export interface LogEntry {
  /** ISO 8601 timestamp of the log entry. */
  readonly timestamp: string;
  /** Log level. */
  readonly level: LogLevel;
  /** Name of the object that produced the entry. */
  readonly source: string;
  /** Event type or identifier. */
  readonly event: string;
  /** Additional structured data. */
  readonly data?: Record<string, unknown>;
}

/**
 * Options for creating a logger.
 */
export interface LoggerOptions {
  /** Name of the emitting object (e.g., the mixture name). */
  source: string;
  /** Minimum level to emit (default: 'warn'). */
  threshold?: LogThreshold;
  /** Function to get current timestamp (injectable for testing). */
  now?: () => Date;
  /** Receives each formatted line (default: write to stderr). */
  write?: (line: string) => void;
}

/**
 * JSON-lines logger.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ source: 'mix_01', threshold: 'debug' });
 * logger.warn('mole_fraction_out_of_range', { component: 'water' });
 * ```
 */
export class Logger {
  private readonly source: string;
  private readonly threshold: LogThreshold;
  private readonly now: () => Date;
  private readonly write: (line: string) => void;

  constructor(options: LoggerOptions) {
    this.source = options.source;
    this.threshold = options.threshold ?? 'warn';
    this.now = options.now ?? ((): Date => new Date());
    this.write =
      options.write ??
      ((line: string): void => {
        process.stderr.write(line);
      });
  }

  /**
   * Gets the configured threshold.
   *
   * @returns The minimum level emitted.
   */
  getThreshold(): LogThreshold {
    return this.threshold;
  }

  /**
   * Creates a logger with the same settings for another source.
   *
   * @param source - Name of the new source.
   * @returns A logger sharing threshold, clock and sink.
   */
  child(source: string): Logger {
    return new Logger({ source, threshold: this.threshold, now: this.now, write: this.write });
  }

  debug(event: string, data?: Record<string, unknown>): void {
    this.log('debug', event, data);
  }

  info(event: string, data?: Record<string, unknown>): void {
    this.log('info', event, data);
  }

  warn(event: string, data?: Record<string, unknown>): void {
    this.log('warn', event, data);
  }

  error(event: string, data?: Record<string, unknown>): void {
    this.log('error', event, data);
  }

  /**
   * Checks whether a level passes the threshold.
   *
   * @param level - Level to check.
   * @returns True if entries at this level are emitted.
   */
  isEnabled(level: LogLevel): boolean {
    return LOG_THRESHOLDS.indexOf(level) >= LOG_THRESHOLDS.indexOf(this.threshold);
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const base = {
      timestamp: this.now().toISOString(),
      level,
      source: this.source,
      event,
    };
    const entry: LogEntry = data === undefined ? base : { ...base, data };

    this.write(JSON.stringify(entry) + '\n');
  }
}

/**
 * Creates a structured logger.
 *
 * @param options - Logger configuration options.
 * @returns A configured Logger instance.
 */
export function createLogger(options: LoggerOptions): Logger {
  return new Logger(options);
}
