/**
 * Structured logging utility.
 *
 * Writes one JSON object per line to stderr, keeping stdout free for command
 * output such as `lazymc config show`.
 *
 * @packageDocumentation
 */

/**
 * Severity level for log entries.
 *
 * - `debug`: Detailed diagnostic information, only written in debug mode
 * - `info`: Normal operation, e.g. which configuration source was used
 * - `warn`: Conditions that don't prevent startup but may need attention
 * - `error`: Failures
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Represents a structured log entry with timestamp and metadata.
 */
export interface LogEntry {
  /**
   * ISO 8601 timestamp when the log entry was created.
   * @example "2024-01-15T10:30:00.000Z"
   */
  readonly timestamp: string;

  readonly level: LogLevel;

  /**
   * Name of the component that generated this log entry.
   * @example "config"
   */
  readonly component: string;

  /**
   * Short snake_case event name.
   * @example "config_version_outdated"
   */
  readonly event: string;

  /**
   * Additional structured data. Error values are reduced to name and message.
   * @example { path: "/srv/mc/lazymc.toml" }
   */
  readonly data?: Record<string, unknown>;
}

/**
 * Destination for serialized log lines.
 */
export interface LogSink {
  write(line: string): unknown;
}

/**
 * Configuration options for creating a Logger instance.
 */
export interface LoggerOptions {
  /**
   * Name of the component using this logger.
   */
  readonly component: string;

  /**
   * Whether debug-level logging is enabled.
   * @defaultValue false
   */
  readonly debugMode?: boolean;

  /**
   * Where lines are written.
   * @defaultValue process.stderr
   */
  readonly sink?: LogSink;
}

function replaceErrors(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

/**
 * Structured logger that outputs JSON-formatted log entries.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'config', debugMode: true });
 * logger.info('config_file_not_found', { path: 'lazymc.toml' });
 * ```
 */
export class Logger {
  private readonly component: string;
  private readonly debugMode: boolean;
  private readonly sink: LogSink;

  /**
   * Creates a new Logger instance.
   * @param options - Configuration options for the logger.
   */
  constructor(options: LoggerOptions) {
    this.component = options.component;
    this.debugMode = options.debugMode ?? false;
    this.sink = options.sink ?? process.stderr;
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
      data === undefined
        ? { timestamp: new Date().toISOString(), level, component: this.component, event }
        : { timestamp: new Date().toISOString(), level, component: this.component, event, data };

    this.sink.write(JSON.stringify(entry, replaceErrors) + '\n');
  }
}

/**
 * Default logger for the configuration loader.
 */
export const logger = new Logger({
  component: 'config',
  debugMode: process.env.LAZYMC_DEBUG === '1',
});
