/**
 * Logger Type Definitions
 *
 * Defines the ILogger interface that decouples the codebase from the
 * logging library. Components take an ILogger (or the narrower
 * ServiceLogger) through their constructor so tests can inject a
 * RecordingLogger instead of mocking modules.
 */

/**
 * Log level union type for type-safe level checking.
 */
export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

/**
 * Metadata object that can be attached to log entries.
 */
export type LogMeta = Record<string, unknown>;

/**
 * Minimal logger interface for dependency injection in components that
 * only need the four basic levels.
 *
 * @example
 * ```typescript
 * class ProbeScheduler {
 *   constructor(private logger: ServiceLogger) {}
 * }
 *
 * // Production
 * new ProbeScheduler(createLogger('probe-scheduler'));
 *
 * // Test
 * new ProbeScheduler(new RecordingLogger());
 * ```
 */
export interface ServiceLogger {
  info: (message: string, meta?: LogMeta) => void;
  warn: (message: string, meta?: LogMeta) => void;
  error: (message: string, meta?: LogMeta) => void;
  debug: (message: string, meta?: LogMeta) => void;
}

/**
 * Core logger interface.
 *
 * All logging implementations (Pino, RecordingLogger, NullLogger) implement
 * this interface.
 */
export interface ILogger {
  /**
   * Log a fatal error (system is unusable).
   */
  fatal(msg: string, meta?: LogMeta): void;

  /**
   * Log an error (operation failed).
   */
  error(msg: string, meta?: LogMeta): void;

  /**
   * Log a warning (potential problem).
   */
  warn(msg: string, meta?: LogMeta): void;

  /**
   * Log informational message (normal operation).
   */
  info(msg: string, meta?: LogMeta): void;

  /**
   * Log debug message (diagnostic information).
   */
  debug(msg: string, meta?: LogMeta): void;

  /**
   * Log trace message (fine-grained debugging).
   */
  trace?(msg: string, meta?: LogMeta): void;

  /**
   * Create a child logger with additional context.
   * The context is merged into every log entry from the child.
   *
   * @example
   * ```typescript
   * const serviceLogger = logger.child({ serviceId: 'checkout' });
   * serviceLogger.info('Evaluating'); // { serviceId: 'checkout', msg: 'Evaluating' }
   * ```
   */
  child(bindings: LogMeta): ILogger;

  /**
   * Check if a given log level is enabled.
   */
  isLevelEnabled?(level: LogLevel): boolean;
}

/**
 * Configuration for logger creation.
 */
export interface LoggerConfig {
  /**
   * Component name for log identification.
   */
  name: string;

  /**
   * Minimum log level to output.
   * @default 'info'
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
