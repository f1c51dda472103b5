/**
 * Structured logging utility for the build pipeline.
 *
 * Every component logs through a {@link Logger}, which writes one JSON object
 * per line to stderr so that stdout stays free for the CLI's own output.
 *
 * @packageDocumentation
 */

/**
 * Severity level for log entries.
 *
 * - `debug`: Detailed diagnostic information
 * - `info`: Normal progress through the pipeline
 * - `warn`: Recoverable problems (parse fallbacks, failed validations)
 * - `error`: Failures that abandon an operation
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * All log levels in ascending order of severity.
 */
export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'] as const;

/**
 * Checks if a string is a valid LogLevel.
 *
 * @param value - The string to check.
 * @returns True if the value is a valid LogLevel.
 */
export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.includes(value as LogLevel);
}

/**
 * Represents a structured log entry with timestamp and metadata.
 */
export interface LogEntry {
  /**
   * ISO 8601 timestamp when the log entry was created.
   * @example "2024-01-15T10:30:00.000Z"
   */
  readonly timestamp: string;

  /** Severity level of the log entry. */
  readonly level: LogLevel;

  /**
   * Name of the component that generated this log entry.
   * @example "Orchestrator"
   */
  readonly component: string;

  /**
   * Short snake_case name of the logged event.
   * @example "phase_started"
   */
  readonly event: string;

  /**
   * Additional structured data associated with the log entry.
   * @example { phase: "validating", retryCount: 1 }
   */
  readonly data?: Record<string, unknown>;
}

/**
 * Destination for serialized log lines.
 */
export type LogSink = (line: string) => void;

/**
 * Configuration options for creating a Logger instance.
 */
export interface LoggerOptions {
  /** Name of the component using this logger. */
  readonly component: string;

  /**
   * Minimum level that is written. Entries below it are dropped.
   * @defaultValue 'info'
   */
  readonly level?: LogLevel | undefined;

  /**
   * Where serialized lines go.
   * @defaultValue writes to process.stderr
   */
  readonly sink?: LogSink | undefined;
}

const defaultSink: LogSink = (line) => {
  process.stderr.write(line + '\n');
};

/**
 * Structured logger that outputs JSON-formatted log entries.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'Orchestrator', level: 'debug' });
 * logger.info('phase_started', { phase: 'planning' });
 * const child = logger.child('Planner');
 * child.warn('record_parse_fallback', { preview: '...' });
 * ```
 */
export class Logger {
  private readonly component: string;
  private readonly level: LogLevel;
  private readonly sink: LogSink;

  /**
   * Creates a new Logger instance.
   * @param options - Configuration options for the logger.
   */
  constructor(options: LoggerOptions) {
    this.component = options.component;
    this.level = options.level ?? 'info';
    this.sink = options.sink ?? defaultSink;
  }

  /**
   * Creates a logger for another component that shares this logger's level and sink.
   *
   * @param component - Name of the child component.
   * @returns A new Logger.
   */
  child(component: string): Logger {
    return new Logger({ component, level: this.level, sink: this.sink });
  }

  /**
   * Logs a debug-level message.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  debug(event: string, data?: Record<string, unknown>): void {
    this.log('debug', event, data);
  }

  /**
   * Logs an info-level message.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  info(event: string, data?: Record<string, unknown>): void {
    this.log('info', event, data);
  }

  /**
   * Logs a warning-level message.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  warn(event: string, data?: Record<string, unknown>): void {
    this.log('warn', event, data);
  }

  /**
   * Logs an error-level message.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  error(event: string, data?: Record<string, unknown>): void {
    this.log('error', event, data);
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(this.level)) {
      return;
    }

    const base: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.component,
      event,
    };
    const entry: LogEntry = data !== undefined ? { ...base, data } : base;

    let line: string;
    try {
      line = JSON.stringify(entry);
    } catch (error) {
      // Circular structures and BigInt values still produce exactly one line
      line = JSON.stringify({
        ...base,
        serializationError: error instanceof Error ? error.message : String(error),
        originalData: '[unserializable]',
      });
    }

    this.sink(line);
  }
}

/**
 * Logger that discards every entry.
 */
export const silentLogger = new Logger({
  component: 'silent',
  sink: () => {
    // discard
  },
});
