import { DateTime } from 'luxon';
import type { BusyInterval, SourceEvent, TimeRange } from '../src/types/index.js';
import { AvailabilityError } from '../src/utils/error.js';

export const utc = (iso: string): DateTime => DateTime.fromISO(iso, { zone: 'utc' });

export const range = (start: string, end: string): TimeRange => ({
  start: utc(start),
  end: utc(end),
});

/** ISO pair in UTC, without zero milliseconds */
export const isoRange = (r: TimeRange): [string | null, string | null] => [
  r.start.toUTC().toISO({ suppressMilliseconds: true }),
  r.end.toUTC().toISO({ suppressMilliseconds: true }),
];

export function sourceEvent(overrides: Partial<SourceEvent> = {}): SourceEvent {
  return {
    id: 'evt-1',
    calendarId: 'work',
    calendarName: 'Work',
    title: 'Meeting',
    start: '2025-06-02T09:00:00Z',
    end: '2025-06-02T10:00:00Z',
    sourceTimezone: 'UTC',
    isAllDay: false,
    ...overrides,
  };
}

export function busy(start: string, end: string, title = 'Meeting', calendarId = 'work'): BusyInterval {
  return {
    range: range(start, end),
    contributors: [sourceEvent({ id: `${calendarId}-${title}`, title, calendarId, start, end })],
  };
}

/** Run fn and return what it threw */
export function captureError(fn: () => unknown): AvailabilityError {
  try {
    fn();
  } catch (error) {
    if (error instanceof AvailabilityError) return error;
    throw error;
  }
  throw new Error('Expected an AvailabilityError to be thrown');
}
