/**
 * Pino Logger Implementation
 *
 * - Singleton caching per module name
 * - JSON output by default, pino-pretty when NODE_ENV=development
 * - Child logger support for contextual logging
 */

import pino, { Logger as PinoLoggerType, LoggerOptions } from 'pino';
import { LOG_LEVELS } from './types';
import type { ILogger, LoggerConfig, LogLevel, LogMeta } from './types';

// =============================================================================
// Singleton Cache
// =============================================================================

const loggerCache = new Map<string, ILogger>();

/**
 * Reset all cached loggers.
 * Used for testing.
 */
export function resetLoggerCache(): void {
  loggerCache.clear();
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && LOG_LEVELS.some(level => level === value);
}

// =============================================================================
// Pino Logger Wrapper
// =============================================================================

/**
 * Adapts Pino to the ILogger interface (message first, metadata second).
 */
class PinoLoggerWrapper implements ILogger {
  constructor(private readonly pino: PinoLoggerType) {}

  fatal(msg: string, meta?: LogMeta): void {
    if (meta) {
      this.pino.fatal(meta, msg);
    } else {
      this.pino.fatal(msg);
    }
  }

  error(msg: string, meta?: LogMeta): void {
    if (meta) {
      this.pino.error(meta, msg);
    } else {
      this.pino.error(msg);
    }
  }

  warn(msg: string, meta?: LogMeta): void {
    if (meta) {
      this.pino.warn(meta, msg);
    } else {
      this.pino.warn(msg);
    }
  }

  info(msg: string, meta?: LogMeta): void {
    if (meta) {
      this.pino.info(meta, msg);
    } else {
      this.pino.info(msg);
    }
  }

  debug(msg: string, meta?: LogMeta): void {
    if (meta) {
      this.pino.debug(meta, msg);
    } else {
      this.pino.debug(msg);
    }
  }

  trace(msg: string, meta?: LogMeta): void {
    if (meta) {
      this.pino.trace(meta, msg);
    } else {
      this.pino.trace(msg);
    }
  }

  child(bindings: LogMeta): ILogger {
    return new PinoLoggerWrapper(this.pino.child(bindings));
  }

  isLevelEnabled(level: LogLevel): boolean {
    return this.pino.isLevelEnabled(level);
  }
}

// =============================================================================
// Factory Functions
// =============================================================================

/**
 * Create a Pino logger instance.
 *
 * Calling with the same name returns the same instance.
 *
 * @example
 * ```typescript
 * const logger = createPinoLogger('arbitrator');
 * const verbose = createPinoLogger({ name: 'loop-pool', level: 'debug' });
 * ```
 */
export function createPinoLogger(config: string | LoggerConfig): ILogger {
  const normalizedConfig: LoggerConfig = typeof config === 'string'
    ? { name: config }
    : config;

  const { name, level, pretty, bindings } = normalizedConfig;

  const cached = loggerCache.get(name);
  if (cached) {
    return bindings ? cached.child(bindings) : cached;
  }

  const envLevel = process.env.LOG_LEVEL;
  const logLevel: LogLevel = level ?? (isLogLevel(envLevel) ? envLevel : 'info');

  // LOG_FORMAT=json forces JSON output even in development
  const usePretty = pretty ?? (process.env.LOG_FORMAT !== 'json' && process.env.NODE_ENV === 'development');

  const options: LoggerOptions = {
    name,
    level: logLevel,
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
    base: {
      service: name,
      pid: process.pid,
    },
  };

  if (usePretty) {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss',
        ignore: 'pid,hostname,service',
      },
    };
  }

  const logger = new PinoLoggerWrapper(pino(options));
  loggerCache.set(name, logger);

  // Children are not cached
  return bindings ? logger.child(bindings) : logger;
}

/**
 * Get a logger by name (alias for createPinoLogger with caching).
 * Preferred for DI defaults.
 */
export function getLogger(name: string): ILogger {
  return createPinoLogger(name);
}
