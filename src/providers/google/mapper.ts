/**
 * Google Calendar data mapping
 * Converts Google Calendar API events into source events
 */

import type { calendar_v3 } from 'googleapis';
import type { SourceEvent } from '../../types/index.js';
import type { GoogleCalendarInfo } from './client.js';

type GoogleEvent = calendar_v3.Schema$Event;
type GoogleEventDateTime = calendar_v3.Schema$EventDateTime;

export const UNTITLED_EVENT = 'Untitled Event';

/**
 * Date or datetime string of one boundary; empty when Google sent neither
 */
function boundaryValue(value: GoogleEventDateTime | undefined): string {
  return value?.dateTime ?? value?.date ?? '';
}

/**
 * Cancelled instances still come back from the API for expanded series
 */
export function isCancelled(event: GoogleEvent): boolean {
  return event.status === 'cancelled';
}

/**
 * Map a Google event to a source event
 *
 * All-day events carry `date` (end exclusive); timed events carry
 * `dateTime` with an offset. The event's own timezone wins over the
 * calendar's when set.
 */
export function mapGoogleEvent(event: GoogleEvent, calendar: GoogleCalendarInfo): SourceEvent {
  const isAllDay = Boolean(event.start?.date) && !event.start?.dateTime;

  return {
    id: event.id ?? undefined,
    calendarId: calendar.id,
    calendarName: calendar.summary,
    title: event.summary || UNTITLED_EVENT,
    start: boundaryValue(event.start),
    end: boundaryValue(event.end),
    sourceTimezone: event.start?.timeZone ?? calendar.timeZone,
    isAllDay,
  };
}
