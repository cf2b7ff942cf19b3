/**
 * Logging Module
 *
 * Production code uses createPinoLogger() / getLogger().
 * Tests use RecordingLogger or NullLogger.
 */

export type {
  ILogger,
  LoggerConfig,
  LogLevel,
  LogMeta,
} from './types';
export { LOG_LEVELS } from './types';

export {
  createPinoLogger,
  getLogger,
  resetLoggerCache,
} from './pino-logger';

export {
  RecordingLogger,
  NullLogger,
} from './testing-logger';
export type { LogEntry } from './testing-logger';
