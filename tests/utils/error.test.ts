import { describe, expect, it } from 'vitest';
import {
  AvailabilityError,
  ErrorCodes,
  formatErrorForMCP,
  invalidDateFormatError,
  invalidRangeError,
  wrapError,
} from '../../src/utils/error.js';

describe('wrapError', () => {
  it('passes AvailabilityError through untouched', () => {
    const original = invalidRangeError('05/06/2025', '01/06/2025');
    expect(wrapError(original, { operation: 'ignored' })).toBe(original);
  });

  it('wraps plain errors with context', () => {
    const cause = new Error('socket hang up');
    const wrapped = wrapError(cause, { provider: 'google', sourceId: 'google-primary', operation: 'fetchEvents' });

    expect(wrapped.code).toBe(ErrorCodes.INTERNAL_ERROR);
    expect(wrapped.message).toBe('fetchEvents: socket hang up');
    expect(wrapped.provider).toBe('google');
    expect(wrapped.sourceId).toBe('google-primary');
    expect(wrapped.cause).toBe(cause);
  });

  it('wraps strings and unknown values', () => {
    expect(wrapError('nope').message).toBe('nope');
    expect(wrapError(42).message).toBe('An unexpected error occurred');
  });
});

describe('formatErrorForMCP', () => {
  it('lists code and details', () => {
    expect(formatErrorForMCP(invalidDateFormatError('2025-06-02'))).toBe(
      [
        "Error: Invalid date format '2025-06-02'. Please use DD/MM/YYYY, DD-MM-YYYY, DD/MM/YY, or DD-MM-YY.",
        'Code: INVALID_DATE_FORMAT',
        'Details: {"value":"2025-06-02"}',
      ].join('\n')
    );
  });

  it('leaves out details it does not have', () => {
    const error = new AvailabilityError('Rate limit exceeded', ErrorCodes.RATE_LIMITED, {
      provider: 'google',
      retryable: true,
      retryAfter: 60,
    });

    expect(formatErrorForMCP(error)).toBe('Error: Rate limit exceeded\nCode: RATE_LIMITED');
  });
});

describe('AvailabilityError', () => {
  it('serializes for logs', () => {
    const error = new AvailabilityError('Token expired', ErrorCodes.AUTH_EXPIRED, { provider: 'google' });

    expect(error.toJSON()).toEqual({
      error: true,
      code: 'AUTH_EXPIRED',
      message: 'Token expired',
      provider: 'google',
      sourceId: undefined,
      retryable: false,
      retryAfter: undefined,
      details: undefined,
    });
    expect(error.name).toBe('AvailabilityError');
  });
});
