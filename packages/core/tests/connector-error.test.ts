import { describe, expect, it } from 'vitest';
import { ConnectorError, wrapError } from '../src/errors/connector-error.js';

describe('ConnectorError', () => {
  it('serializes to log fields', () => {
    const error = new ConnectorError({
      code: 'CONNECTION_FAILED',
      message: 'PostgreSQL connection failed: timeout',
      handle: 'postgresql',
      suggestion: 'Check host and port.',
    });

    expect(error.toJSON()).toEqual({
      error: 'PostgreSQL connection failed: timeout',
      code: 'CONNECTION_FAILED',
      handle: 'postgresql',
      suggestion: 'Check host and port.',
      context: undefined,
    });
  });
});

describe('wrapError', () => {
  it('passes a ConnectorError through', () => {
    const original = new ConnectorError({ code: 'TIMEOUT', message: 'slow' });

    expect(wrapError(original, 'WRITE_FAILED')).toBe(original);
  });

  it('wraps anything else with the given code and keeps the cause', () => {
    const cause = new Error('deadlock detected');
    const wrapped = wrapError(cause, 'WRITE_FAILED', 'mysql');

    expect(wrapped).toMatchObject({ code: 'WRITE_FAILED', message: 'deadlock detected', handle: 'mysql' });
    expect(wrapped.cause).toBe(cause);
  });

  it('stringifies non-Error values', () => {
    expect(wrapError('socket hang up').message).toBe('socket hang up');
  });
});
