import { describe, it, expect } from '@jest/globals';
import { TimeoutError } from '../../src/index';

describe('TimeoutError', () => {
  it('formats the message from operation and timeout', () => {
    const err = new TimeoutError('probe checkout/us-east', 2000);
    expect(err.message).toBe('Timeout: probe checkout/us-east exceeded 2000ms');
    expect(err.operation).toBe('probe checkout/us-east');
    expect(err.timeoutMs).toBe(2000);
    expect(err.name).toBe('TimeoutError');
  });

  it('appends the component when given', () => {
    const err = new TimeoutError('promote_database', 30000, 'failover-executor');
    expect(err.message).toBe('Timeout: promote_database exceeded 30000ms in failover-executor');
    expect(err.component).toBe('failover-executor');
  });

  it('is instanceof Error and TimeoutError', () => {
    const err = new TimeoutError('op', 1);
    expect(err).toBeInstanceOf(Error);
    expect(err).toBeInstanceOf(TimeoutError);
  });
});
