/**
 * Error handling utilities for whenfree
 */

import type { ProviderType } from '../types/index.js';

/**
 * Error codes used throughout the application
 */
export const ErrorCodes = {
  // Query errors
  INVALID_DATE_FORMAT: 'INVALID_DATE_FORMAT',
  INVALID_DATE_RANGE: 'INVALID_DATE_RANGE',
  INVALID_TIMEZONE: 'INVALID_TIMEZONE',
  INVALID_INPUT: 'INVALID_INPUT',

  // Event errors
  MALFORMED_EVENT: 'MALFORMED_EVENT',

  // Authentication errors
  AUTH_EXPIRED: 'AUTH_EXPIRED',
  AUTH_FAILED: 'AUTH_FAILED',
  AUTH_MISSING: 'AUTH_MISSING',

  // Provider errors
  PROVIDER_UNAVAILABLE: 'PROVIDER_UNAVAILABLE',
  PROVIDER_NOT_CONFIGURED: 'PROVIDER_NOT_CONFIGURED',
  CALENDAR_NOT_FOUND: 'CALENDAR_NOT_FOUND',
  PERMISSION_DENIED: 'PERMISSION_DENIED',
  RATE_LIMITED: 'RATE_LIMITED',

  // Internal errors
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Custom error class for whenfree
 */
export class AvailabilityError extends Error {
  public readonly code: ErrorCode;
  public readonly provider?: ProviderType;
  public readonly sourceId?: string;
  public readonly retryable: boolean;
  public readonly retryAfter?: number;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode,
    options?: {
      provider?: ProviderType;
      sourceId?: string;
      retryable?: boolean;
      retryAfter?: number;
      details?: Record<string, unknown>;
      cause?: Error;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = 'AvailabilityError';
    this.code = code;
    this.provider = options?.provider;
    this.sourceId = options?.sourceId;
    this.retryable = options?.retryable ?? false;
    this.retryAfter = options?.retryAfter;
    this.details = options?.details;
  }

  /**
   * Convert to a JSON-serializable object for logs
   */
  toJSON(): Record<string, unknown> {
    return {
      error: true,
      code: this.code,
      message: this.message,
      provider: this.provider,
      sourceId: this.sourceId,
      retryable: this.retryable,
      retryAfter: this.retryAfter,
      details: this.details,
    };
  }
}

/**
 * Create an invalid date format error
 */
export function invalidDateFormatError(value: string): AvailabilityError {
  return new AvailabilityError(
    `Invalid date format '${value}'. Please use DD/MM/YYYY, DD-MM-YYYY, DD/MM/YY, or DD-MM-YY.`,
    ErrorCodes.INVALID_DATE_FORMAT,
    { details: { value } }
  );
}

/**
 * Create an invalid date range error (end before start)
 */
export function invalidRangeError(start: string, end: string): AvailabilityError {
  return new AvailabilityError(
    `Invalid date range: end date ${end} is before start date ${start}`,
    ErrorCodes.INVALID_DATE_RANGE,
    { details: { start, end } }
  );
}

/**
 * Create an unknown timezone error
 */
export function invalidTimezoneError(timezone: string): AvailabilityError {
  return new AvailabilityError(
    `Unknown timezone: ${timezone}`,
    ErrorCodes.INVALID_TIMEZONE,
    { details: { timezone } }
  );
}

/**
 * Create a malformed event error
 */
export function malformedEventError(
  reason: string,
  details?: Record<string, unknown>
): AvailabilityError {
  return new AvailabilityError(`Malformed event: ${reason}`, ErrorCodes.MALFORMED_EVENT, {
    details,
  });
}

/**
 * Create an invalid input error
 */
export function invalidInputError(
  message: string,
  details?: Record<string, unknown>
): AvailabilityError {
  return new AvailabilityError(message, ErrorCodes.INVALID_INPUT, { details });
}

/**
 * Create a configuration error
 */
export function configurationError(
  message: string,
  details?: Record<string, unknown>
): AvailabilityError {
  return new AvailabilityError(message, ErrorCodes.CONFIGURATION_ERROR, { details });
}

/**
 * Wrap an unknown error as AvailabilityError
 */
export function wrapError(
  error: unknown,
  context?: {
    provider?: ProviderType;
    sourceId?: string;
    operation?: string;
  }
): AvailabilityError {
  if (error instanceof AvailabilityError) {
    return error;
  }

  const message =
    error instanceof Error
      ? error.message
      : typeof error === 'string'
        ? error
        : 'An unexpected error occurred';

  return new AvailabilityError(
    context?.operation ? `${context.operation}: ${message}` : message,
    ErrorCodes.INTERNAL_ERROR,
    {
      provider: context?.provider,
      sourceId: context?.sourceId,
      cause: error instanceof Error ? error : undefined,
    }
  );
}

/**
 * Format an AvailabilityError for MCP response
 */
export function formatErrorForMCP(error: AvailabilityError): string {
  const lines: string[] = [];

  lines.push(`Error: ${error.message}`);
  lines.push(`Code: ${error.code}`);

  if (error.details) {
    lines.push(`Details: ${JSON.stringify(error.details)}`);
  }

  return lines.join('\n');
}
