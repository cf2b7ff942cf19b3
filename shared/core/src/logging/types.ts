/**
 * Logger Type Definitions
 *
 * The ILogger interface decouples the engine from the logging library.
 * Engine classes take an ILogger in their constructor so tests can inject a
 * RecordingLogger or NullLogger instead of mocking modules.
 */

/**
 * Log level union type for type-safe level checking.
 */
export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace'];

/**
 * Metadata object that can be attached to log entries.
 */
export type LogMeta = Record<string, unknown>;

/**
 * Core logger interface.
 *
 * @example
 * ```typescript
 * class LoopScanner {
 *   constructor(private logger: ILogger) {}
 *
 *   scan() {
 *     this.logger.info('Scan started', { pools: 4 });
 *   }
 * }
 *
 * // Production
 * new LoopScanner(getLogger('loop-scanner'));
 *
 * // Test
 * new LoopScanner(new RecordingLogger());
 * ```
 */
export interface ILogger {
  fatal(msg: string, meta?: LogMeta): void;
  error(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  debug(msg: string, meta?: LogMeta): void;
  trace?(msg: string, meta?: LogMeta): void;

  /**
   * Create a child logger with additional context.
   * The context is merged into every log entry from the child.
   */
  child(bindings: LogMeta): ILogger;

  /**
   * Check if a given log level is enabled.
   * Useful for skipping expensive metadata construction.
   */
  isLevelEnabled?(level: LogLevel): boolean;
}

/**
 * Configuration for logger creation.
 */
export interface LoggerConfig {
  /**
   * Module name for log identification.
   */
  name: string;

  /**
   * Minimum log level to output.
   * @default process.env.LOG_LEVEL || 'info'
   */
  level?: LogLevel;

  /**
   * Enable pretty printing (development mode).
   * @default process.env.NODE_ENV === 'development'
   */
  pretty?: boolean;

  /**
   * Additional context to include in every log entry.
   */
  bindings?: LogMeta;
}
