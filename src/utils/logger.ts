/**
 * Structured logging for pipeline components.
 *
 * Every entry is a single JSON line written to stderr so pipeline output on
 * stdout stays machine-readable.
 *
 * @packageDocumentation
 */

/**
 * Severity level for log entries.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * A structured log entry.
 */
export interface LogEntry {
  /** ISO 8601 timestamp. */
  readonly timestamp: string;
  readonly level: LogLevel;
  /**
   * Component that produced the entry.
   * @example "WorkflowEngine"
   */
  readonly component: string;
  /**
   * Short snake_case event name.
   * @example "stage_completed"
   */
  readonly event: string;
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
   * Whether debug-level logging is enabled.
   * @defaultValue false
   */
  readonly debugMode?: boolean;
  /** Line sink. Defaults to process.stderr. */
  readonly sink?: LogSink;
  /** Clock used for timestamps. */
  readonly now?: () => Date;
}

const defaultSink: LogSink = (line) => {
  process.stderr.write(line);
};

/**
 * Structured logger that outputs JSON-formatted entries.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'WorkflowEngine' });
 * logger.info('phase_started', { phase: 'scope' });
 * ```
 */
export class Logger {
  private readonly component: string;
  private readonly debugMode: boolean;
  private readonly sink: LogSink;
  private readonly now: () => Date;

  /**
   * Creates a new Logger instance.
   * @param options - Configuration options for the logger.
   */
  constructor(options: LoggerOptions) {
    this.component = options.component;
    this.debugMode = options.debugMode ?? false;
    this.sink = options.sink ?? defaultSink;
    this.now = options.now ?? ((): Date => new Date());
  }

  /**
   * Creates a logger for another component sharing this logger's sink,
   * clock and debug setting.
   *
   * @param component - Name of the child component.
   * @returns The child logger.
   */
  child(component: string): Logger {
    return new Logger({
      component,
      debugMode: this.debugMode,
      sink: this.sink,
      now: this.now,
    });
  }

  /**
   * Logs a debug-level message. No-op unless debugMode is enabled.
   */
  debug(event: string, data?: Record<string, unknown>): void {
    if (!this.debugMode) {
      return;
    }
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

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    const entry: LogEntry =
      data !== undefined
        ? { timestamp: this.now().toISOString(), level, component: this.component, event, data }
        : { timestamp: this.now().toISOString(), level, component: this.component, event };

    let line: string;
    try {
      line = JSON.stringify(entry);
    } catch (error) {
      // Cycles and BigInt values still produce exactly one line.
      line = JSON.stringify({
        timestamp: entry.timestamp,
        level,
        component: this.component,
        event,
        serializationError: error instanceof Error ? error.message : String(error),
        originalData: '[unserializable]',
      });
    }

    this.sink(line + '\n');
  }
}

/**
 * Logger that discards everything. Used as the default where a component
 * is constructed without one.
 */
export function createSilentLogger(component = 'silent'): Logger {
  return new Logger({
    component,
    sink: () => {
      // discarded
    },
  });
}
