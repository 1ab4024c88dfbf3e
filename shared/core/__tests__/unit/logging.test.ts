/**
 * Logging Unit Tests
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import {
  NullLogger,
  RecordingLogger,
  createLogger,
  resetLoggerCache
} from '@regionguard/core';

describe('RecordingLogger', () => {
  let logger: RecordingLogger;

  beforeEach(() => {
    logger = new RecordingLogger();
  });

  it('records entries by level', () => {
    logger.info('probe ok', { regionId: 'us-east' });
    logger.warn('probe slow');
    logger.error('probe failed');

    expect(logger.count).toBe(3);
    expect(logger.getWarnings().map(entry => entry.msg)).toEqual(['probe slow']);
    expect(logger.getErrors().map(entry => entry.msg)).toEqual(['probe failed']);
    expect(logger.hasLogWithMeta('info', { regionId: 'us-east' })).toBe(true);
    expect(logger.getLastLog()?.msg).toBe('probe failed');
  });

  it('children share the parent entry list and carry bindings', () => {
    const child = logger.child({ serviceId: 'checkout' });
    child.info('evaluating');

    expect(logger.getAllLogs()).toHaveLength(1);
    expect(logger.getAllLogs()[0].bindings).toEqual({ serviceId: 'checkout' });
  });

  it('matches messages by string or pattern', () => {
    logger.info('Region us-east degraded');

    expect(logger.hasLogMatching('info', 'degraded')).toBe(true);
    expect(logger.hasLogMatching('info', /^Region \S+ degraded$/)).toBe(true);
    expect(logger.hasLogMatching('warn', 'degraded')).toBe(false);
  });

  it('clear() empties the shared list', () => {
    const child = logger.child({ a: 1 });
    child.info('x');
    logger.clear();

    expect(logger.count).toBe(0);
  });
});

describe('NullLogger', () => {
  it('returns itself as child and reports levels disabled', () => {
    const logger = new NullLogger();

    expect(logger.child({ a: 1 })).toBe(logger);
    expect(logger.isLevelEnabled('error')).toBe(false);
  });
});

describe('createLogger()', () => {
  beforeEach(() => {
    resetLoggerCache();
  });

  it('caches loggers by name', () => {
    expect(createLogger('failover-coordinator')).toBe(createLogger('failover-coordinator'));
  });

  it('honours LOG_LEVEL', () => {
    const logger = createLogger('level-check');

    expect(logger.isLevelEnabled?.('error')).toBe(true);
    expect(logger.isLevelEnabled?.('info')).toBe(false);
  });
});
