/**
 * Testing Logger Implementations
 *
 * - RecordingLogger keeps every entry in memory for assertions
 * - NullLogger drops everything
 *
 * Inject these through constructors instead of jest.mock()-ing the logging module.
 *
 * @example
 * ```typescript
 * const logger = new RecordingLogger();
 * const detector = new FailureDetector({ ...deps, logger });
 * detector.evaluate(sample);
 * expect(logger.hasLogMatching('info', /suspected_degraded/)).toBe(true);
 * ```
 */

import type { ILogger, LogLevel, LogMeta } from './types';

export interface LogEntry {
  level: LogLevel;
  msg: string;
  meta?: LogMeta;
  timestamp: number;
  /** Bindings of the child logger that wrote the entry */
  bindings?: LogMeta;
}

// =============================================================================
// RecordingLogger
// =============================================================================

export class RecordingLogger implements ILogger {
  private entries: LogEntry[];
  private readonly bindings: LogMeta;

  constructor(bindings: LogMeta = {}, entries: LogEntry[] = []) {
    this.bindings = bindings;
    this.entries = entries;
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

  /**
   * Children write into the parent's entry list so a test holding the
   * root logger sees everything.
   */
  child(bindings: LogMeta): ILogger {
    return new RecordingLogger({ ...this.bindings, ...bindings }, this.entries);
  }

  isLevelEnabled(_level: LogLevel): boolean {
    return true;
  }

  private record(level: LogLevel, msg: string, meta?: LogMeta): void {
    this.entries.push({
      level,
      msg,
      meta: meta ? { ...meta } : undefined,
      timestamp: Date.now(),
      bindings: Object.keys(this.bindings).length > 0 ? { ...this.bindings } : undefined,
    });
  }

  getAllLogs(): ReadonlyArray<LogEntry> {
    return [...this.entries];
  }

  getLogs(level: LogLevel): ReadonlyArray<LogEntry> {
    return this.entries.filter(entry => entry.level === level);
  }

  getErrors(): ReadonlyArray<LogEntry> {
    return this.getLogs('error');
  }

  getWarnings(): ReadonlyArray<LogEntry> {
    return this.getLogs('warn');
  }

  hasLogMatching(level: LogLevel, pattern: string | RegExp): boolean {
    return this.getLogs(level).some(entry =>
      typeof pattern === 'string' ? entry.msg.includes(pattern) : pattern.test(entry.msg)
    );
  }

  /**
   * True when some entry at `level` carries every key/value of `meta`.
   */
  hasLogWithMeta(level: LogLevel, meta: LogMeta): boolean {
    return this.getLogs(level).some(entry => {
      const recorded = entry.meta;
      if (!recorded) return false;
      return Object.entries(meta).every(([key, value]) => recorded[key] === value);
    });
  }

  getLastLog(): LogEntry | undefined {
    return this.entries[this.entries.length - 1];
  }

  clear(): void {
    this.entries.length = 0;
  }

  get count(): number {
    return this.entries.length;
  }
}

// =============================================================================
// NullLogger
// =============================================================================

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
