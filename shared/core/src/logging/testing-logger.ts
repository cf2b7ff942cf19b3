/**
 * Testing Logger Implementations
 *
 * 1. RecordingLogger - Captures all logs in memory for assertions
 * 2. NullLogger - Silently discards all logs
 *
 * These remove the need for jest.mock() on the logging module.
 *
 * @example
 * ```typescript
 * const logger = new RecordingLogger();
 * const arbitrator = new Arbitrator({ pools, initialAssets: ['A'], logger });
 * arbitrator.getLoops([3]);
 * expect(logger.getErrors()).toHaveLength(0);
 * ```
 */

import type { ILogger, LogLevel, LogMeta } from './types';

// =============================================================================
// Log Entry Types
// =============================================================================

export interface LogEntry {
  level: LogLevel;
  msg: string;
  meta?: LogMeta;
  timestamp: number;
  /** Child logger bindings (if from a child logger) */
  bindings?: LogMeta;
}

// =============================================================================
// RecordingLogger
// =============================================================================

/**
 * A logger that captures all log entries in memory for testing assertions.
 * Child loggers share the parent's entry list.
 */
export class RecordingLogger implements ILogger {
  private logs: LogEntry[] = [];
  private readonly bindings: LogMeta;

  constructor(bindings?: LogMeta) {
    this.bindings = bindings || {};
  }

  fatal(msg: string, meta?: LogMeta): void {
    this.record('fatal', msg, meta);
  }

  error(msg: string, meta?: LogMeta): void {
    this.record('error', msg, meta);
  }

  warn(msg: string, meta?: LogMeta): void {
    this.record('warn', msg, meta);
  }

  info(msg: string, meta?: LogMeta): void {
    this.record('info', msg, meta);
  }

  debug(msg: string, meta?: LogMeta): void {
    this.record('debug', msg, meta);
  }

  trace(msg: string, meta?: LogMeta): void {
    this.record('trace', msg, meta);
  }

  child(bindings: LogMeta): ILogger {
    const child = new RecordingLogger({ ...this.bindings, ...bindings });
    child.logs = this.logs;
    return child;
  }

  isLevelEnabled(_level: LogLevel): boolean {
    return true;
  }

  // =========================================================================
  // Recording & Assertion Helpers
  // =========================================================================

  private record(level: LogLevel, msg: string, meta?: LogMeta): void {
    this.logs.push({
      level,
      msg,
      meta: meta ? { ...meta } : undefined,
      timestamp: Date.now(),
      bindings: Object.keys(this.bindings).length > 0 ? { ...this.bindings } : undefined,
    });
  }

  getAllLogs(): ReadonlyArray<LogEntry> {
    return [...this.logs];
  }

  getLogs(level: LogLevel): ReadonlyArray<LogEntry> {
    return this.logs.filter(log => log.level === level);
  }

  getErrors(): ReadonlyArray<LogEntry> {
    return this.getLogs('error');
  }

  getWarnings(): ReadonlyArray<LogEntry> {
    return this.getLogs('warn');
  }

  /**
   * Check if any log at `level` has a message matching `pattern`.
   */
  hasLogMatching(level: LogLevel, pattern: string | RegExp): boolean {
    return this.getLogs(level).some(log => {
      if (typeof pattern === 'string') {
        return log.msg.includes(pattern);
      }
      return pattern.test(log.msg);
    });
  }

  /**
   * Check if any log at `level` carries all of the given metadata values.
   */
  hasLogWithMeta(level: LogLevel, meta: LogMeta): boolean {
    return this.getLogs(level).some(log => {
      const logMeta = log.meta;
      if (!logMeta) return false;
      return Object.entries(meta).every(([key, value]) => logMeta[key] === value);
    });
  }

  getLastLogAt(level: LogLevel): LogEntry | undefined {
    const logsAtLevel = this.getLogs(level);
    return logsAtLevel[logsAtLevel.length - 1];
  }

  /**
   * Clear all captured logs. Call in beforeEach().
   */
  clear(): void {
    this.logs.length = 0;
  }

  get count(): number {
    return this.logs.length;
  }
}

// =============================================================================
// NullLogger
// =============================================================================

/**
 * A logger that silently discards all log entries.
 */
export class NullLogger implements ILogger {
  fatal(_msg: string, _meta?: LogMeta): void { /* noop */ }
  error(_msg: string, _meta?: LogMeta): void { /* noop */ }
  warn(_msg: string, _meta?: LogMeta): void { /* noop */ }
  info(_msg: string, _meta?: LogMeta): void { /* noop */ }
  debug(_msg: string, _meta?: LogMeta): void { /* noop */ }
  trace(_msg: string, _meta?: LogMeta): void { /* noop */ }

  child(_bindings: LogMeta): ILogger {
    return this;
  }

  isLevelEnabled(_level: LogLevel): boolean {
    return false;
  }
}
