/**
 * Google Calendar API client wrapper
 * Read-only: calendar metadata and event listing
 */

import { google, calendar_v3 } from 'googleapis';
import type { OAuth2Client } from 'google-auth-library';
import { AvailabilityError, ErrorCodes } from '../../utils/error.js';

type Calendar = calendar_v3.Calendar;
type Event = calendar_v3.Schema$Event;

/**
 * Shape of the errors googleapis rejects with
 */
interface GoogleApiErrorLike {
  code?: number | string;
  errors?: Array<{ reason?: string; message?: string }>;
  message?: string;
}

function isGoogleApiError(error: unknown): error is GoogleApiErrorLike {
  return typeof error === 'object' && error !== null && ('code' in error || 'errors' in error);
}

/**
 * Calendar name and native timezone
 */
export interface GoogleCalendarInfo {
  id: string;
  summary: string;
  timeZone: string;
}

/**
 * Google Calendar API client wrapper
 */
export class GoogleCalendarClient {
  private calendar: Calendar;

  constructor(auth: OAuth2Client) {
    this.calendar = google.calendar({ version: 'v3', auth });
  }

  /**
   * Get a calendar's name and timezone
   */
  async getCalendar(calendarId: string): Promise<GoogleCalendarInfo> {
    try {
      const response = await this.calendar.calendars.get({ calendarId });
      return {
        id: response.data.id ?? calendarId,
        summary: response.data.summary ?? calendarId,
        timeZone: response.data.timeZone ?? 'UTC',
      };
    } catch (error) {
      throw this.handleApiError(error, 'getCalendar', calendarId);
    }
  }

  /**
   * List events overlapping [timeMin, timeMax), recurring events expanded
   */
  async listEvents(params: {
    calendarId: string;
    timeMin: string;
    timeMax: string;
  }): Promise<Event[]> {
    try {
      const events: Event[] = [];
      let pageToken: string | undefined;

      do {
        const response = await this.calendar.events.list({
          calendarId: params.calendarId,
          timeMin: params.timeMin,
          timeMax: params.timeMax,
          singleEvents: true,
          orderBy: 'startTime',
          maxResults: 250,
          pageToken,
        });

        if (response.data.items) {
          events.push(...response.data.items);
        }
        pageToken = response.data.nextPageToken ?? undefined;
      } while (pageToken);

      return events;
    } catch (error) {
      throw this.handleApiError(error, 'listEvents', params.calendarId);
    }
  }

  /**
   * Convert Google API errors to our error format
   */
  private handleApiError(error: unknown, operation: string, calendarId?: string): never {
    if (!isGoogleApiError(error)) {
      throw new AvailabilityError(
        `${operation} failed: ${error instanceof Error ? error.message : String(error)}`,
        ErrorCodes.PROVIDER_UNAVAILABLE,
        { provider: 'google', cause: error instanceof Error ? error : undefined }
      );
    }

    const statusCode = typeof error.code === 'number' ? error.code : Number(error.code);
    const reason = error.errors?.[0]?.reason;
    const message = error.message ?? 'Unknown error';

    switch (statusCode) {
      case 401:
        throw new AvailabilityError(
          `Authentication failed: ${message}`,
          ErrorCodes.AUTH_FAILED,
          { provider: 'google' }
        );

      case 403:
        if (reason === 'rateLimitExceeded' || reason === 'userRateLimitExceeded') {
          throw new AvailabilityError(
            'Rate limit exceeded',
            ErrorCodes.RATE_LIMITED,
            { provider: 'google', retryable: true, retryAfter: 60 }
          );
        }
        throw new AvailabilityError(
          `Permission denied: ${message}`,
          ErrorCodes.PERMISSION_DENIED,
          { provider: 'google' }
        );

      case 404:
        throw new AvailabilityError(
          calendarId ? `Calendar not found: ${calendarId}` : 'Resource not found',
          ErrorCodes.CALENDAR_NOT_FOUND,
          { provider: 'google', details: { calendarId } }
        );

      case 429:
        throw new AvailabilityError(
          'Too many requests',
          ErrorCodes.RATE_LIMITED,
          { provider: 'google', retryable: true, retryAfter: 60 }
        );

      default:
        throw new AvailabilityError(
          `${operation} failed: ${message}`,
          ErrorCodes.PROVIDER_UNAVAILABLE,
          {
            provider: 'google',
            retryable: !Number.isNaN(statusCode) && statusCode >= 500,
            details: { statusCode, reason },
          }
        );
    }
  }
}
