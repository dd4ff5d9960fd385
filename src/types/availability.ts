/**
 * Availability data types
 * All ranges are half-open [start, end) and stored in UTC
 */

import type { DateTime } from 'luxon';

/**
 * An absolute point in time, always held in the UTC zone
 */
export type Instant = DateTime;

/**
 * A half-open time range [start, end)
 * A zero-length range is valid and denotes no time
 */
export interface TimeRange {
  start: Instant;
  end: Instant;
}

/**
 * A raw event as handed over by a calendar source
 *
 * Timed events carry ISO 8601 datetimes; strings without an offset are
 * wall-clock times in `sourceTimezone`. All-day events carry `yyyy-MM-dd`
 * dates with an exclusive end date.
 */
export interface SourceEvent {
  /** Provider event ID, when known */
  id?: string;
  calendarId: string;
  calendarName: string;
  title: string;
  start: string;
  end: string;
  /** IANA timezone of the calendar (or of the event, when it sets one) */
  sourceTimezone: string;
  isAllDay: boolean;
}

/**
 * A busy period derived from one or more source events
 */
export interface BusyInterval {
  range: TimeRange;
  /** Events that fed into this interval, first-seen order, no duplicates */
  contributors: SourceEvent[];
}

/**
 * A gap in the busy timeline, inside the search bound
 */
export interface FreeInterval {
  range: TimeRange;
}

/**
 * Local time of day in HH:mm format (24-hour); "24:00" marks end of day
 */
export type LocalTime = string;

/**
 * A local time-of-day window restricting where free time is searched
 */
export interface HoursFilter {
  start: LocalTime;
  end: LocalTime;
  /** Optional break cut out of the window (e.g. lunch) */
  midDayBreak?: {
    start: LocalTime;
    end: LocalTime;
  };
}

export type HoursPolicy = 'work' | 'personal' | 'all';

/**
 * free: only free slots
 * busy: only busy slots
 * both: one interleaved timeline
 * both-split: busy section followed by free section
 */
export type OutputMode = 'free' | 'busy' | 'both' | 'both-split';

export type DayOfWeek =
  | 'monday'
  | 'tuesday'
  | 'wednesday'
  | 'thursday'
  | 'friday'
  | 'saturday'
  | 'sunday';

/**
 * Which calendar days a query covers
 * Explicit dates use DD/MM/YYYY, DD/MM/YY, DD-MM-YYYY or DD-MM-YY
 */
export type DateSelector =
  | { kind: 'today' }
  | { kind: 'tomorrow' }
  | { kind: 'next-week' }
  | { kind: 'next-two-weeks' }
  | { kind: 'date'; date: string }
  | { kind: 'date-range'; start: string; end: string };

/**
 * Fully parsed query for one availability run
 */
export interface AvailabilityQuery {
  date: DateSelector;
  hours: HoursPolicy;
  /** Skip Saturdays and Sundays */
  workDaysOnly: boolean;
  output: OutputMode;
  showEventNames: boolean;
  /** IANA zone for the report; the configured default when omitted */
  outputTimezone?: string;
}

/**
 * Concrete range a query resolves to, with one bucket per calendar day
 */
export interface TimeWindow {
  range: TimeRange;
  days: TimeRange[];
  timezone: string;
}

export type DisplayKind = 'busy' | 'free';

/**
 * A single line of the availability report
 */
export interface DisplayRecord {
  kind: DisplayKind;
  /** Range converted to the output timezone */
  range: TimeRange;
  durationMinutes: number;
  /** Event titles, when event names were requested */
  label?: string;
}

/**
 * Records that start on the same local day
 */
export interface DayGroup {
  /** yyyy-MM-dd in the output timezone */
  date: string;
  records: DisplayRecord[];
}

/**
 * An event dropped by the normalizer
 */
export interface EventWarning {
  calendarId: string;
  calendarName: string;
  eventId?: string;
  title: string;
  message: string;
}
