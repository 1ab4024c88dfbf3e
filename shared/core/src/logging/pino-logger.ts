/**
 * Pino Logger Implementation
 *
 * - Per-name caching so components share one pino instance
 * - JSON output for production, pino-pretty for development
 * - Redaction of credentials carried in override signals and webhook config
 * - Child logger support for per-service / per-region context
 */

import pino, { Logger as PinoLoggerType, LoggerOptions } from 'pino';
import type { ILogger, LoggerConfig, LogLevel, LogMeta } from './types';

// =============================================================================
// Singleton Cache
// =============================================================================

/**
 * Cache for logger instances to prevent duplicate creation.
 * Key: component name, Value: logger instance
 */
const loggerCache = new Map<string, ILogger>();

/**
 * Reset all cached loggers.
 * Used for testing and service shutdown.
 */
export function resetLoggerCache(): void {
  loggerCache.clear();
}

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace'];

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Fields never written in clear text.
 */
const REDACT_PATHS = [
  'apiKey', '*.apiKey',
  'credential', '*.credential',
  'token', '*.token',
  'authorization', '*.authorization',
  'secret', '*.secret',
  'password', '*.password',
  'webhookUrl', '*.webhookUrl',
];

// =============================================================================
// Pino Logger Wrapper
// =============================================================================

/**
 * Adapts Pino's (meta, msg) argument order to ILogger's (msg, meta).
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
 * Uses singleton caching - calling with the same name returns the same instance.
 *
 * @example
 * ```typescript
 * const logger = createPinoLogger('failover-coordinator');
 *
 * const verbose = createPinoLogger({ name: 'probe-scheduler', level: 'debug' });
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
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
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
 * Project-wide entry point used as the default logger of every component.
 */
export function createLogger(name: string): ILogger {
  return createPinoLogger(name);
}
