/**
 * Logging Module
 *
 * Production code: createLogger() (cached pino loggers).
 * Tests: RecordingLogger to assert on output, NullLogger to silence it.
 */

export type {
  ILogger,
  LoggerConfig,
  LogLevel,
  LogMeta,
  ServiceLogger,
} from './types';

export {
  createLogger,
  createPinoLogger,
  resetLoggerCache,
} from './pino-logger';

export {
  RecordingLogger,
  NullLogger,
} from './testing-logger';
export type { LogEntry } from './testing-logger';
