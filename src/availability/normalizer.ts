/**
 * Event normalization
 * Converts raw per-calendar events into UTC busy intervals.
 */

import { DateTime } from 'luxon';
import type { BusyInterval, EventWarning, SourceEvent } from '../types/index.js';
import { AvailabilityError, ErrorCodes, malformedEventError } from '../utils/error.js';
import { isValidTimezone } from '../utils/datetime.js';

const ALL_DAY_FORMAT = 'yyyy-MM-dd';

function eventDetails(event: SourceEvent): Record<string, unknown> {
  return {
    calendarId: event.calendarId,
    eventId: event.id,
    title: event.title,
    start: event.start,
    end: event.end,
  };
}

/**
 * Parse one boundary of an event in its source timezone
 */
function parseBoundary(event: SourceEvent, value: string, which: 'start' | 'end'): DateTime {
  // All-day dates may arrive as full datetimes from some sources; keep the date part
  const dt = event.isAllDay
    ? DateTime.fromFormat(value.slice(0, ALL_DAY_FORMAT.length), ALL_DAY_FORMAT, {
        zone: event.sourceTimezone,
      })
    : DateTime.fromISO(value, { zone: event.sourceTimezone });

  if (!dt.isValid) {
    throw malformedEventError(`unparseable ${which} "${value}"`, eventDetails(event));
  }
  return dt;
}

/**
 * Normalize a source event to a busy interval in UTC
 *
 * All-day events cover local midnight to midnight in the source timezone;
 * an end date equal to the start date counts as a single day.
 *
 * @throws AvailabilityError MALFORMED_EVENT
 */
export function normalizeEvent(event: SourceEvent): BusyInterval {
  if (!isValidTimezone(event.sourceTimezone)) {
    throw malformedEventError(
      `unknown timezone "${event.sourceTimezone}"`,
      eventDetails(event)
    );
  }

  const start = parseBoundary(event, event.start, 'start');
  let end = parseBoundary(event, event.end, 'end');

  if (end.toMillis() < start.toMillis()) {
    throw malformedEventError('end is before start', eventDetails(event));
  }

  if (event.isAllDay && end.toMillis() === start.toMillis()) {
    end = start.plus({ days: 1 });
  }

  return {
    range: { start: start.toUTC(), end: end.toUTC() },
    contributors: [event],
  };
}

export interface NormalizeResult {
  intervals: BusyInterval[];
  warnings: EventWarning[];
}

/**
 * Normalize a batch of events, dropping malformed ones with a warning
 */
export function normalizeEvents(events: readonly SourceEvent[]): NormalizeResult {
  const intervals: BusyInterval[] = [];
  const warnings: EventWarning[] = [];

  for (const event of events) {
    try {
      intervals.push(normalizeEvent(event));
    } catch (error) {
      if (!(error instanceof AvailabilityError) || error.code !== ErrorCodes.MALFORMED_EVENT) {
        throw error;
      }
      warnings.push({
        calendarId: event.calendarId,
        calendarName: event.calendarName,
        eventId: event.id,
        title: event.title,
        message: error.message,
      });
    }
  }

  return { intervals, warnings };
}
