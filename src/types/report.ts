/**
 * Availability report types
 * Returned by the availability service for one query
 */

import type {
  AvailabilityQuery,
  DisplayRecord,
  EventWarning,
  TimeWindow,
} from './availability.js';
import type { SourceError } from './provider.js';

/**
 * Busy-interval count per calendar, before merging
 */
export interface CalendarSummary {
  calendarId: string;
  calendarName: string;
  timezone: string;
  eventCount: number;
}

export interface AvailabilityTotals {
  busyMinutes: number;
  freeMinutes: number;
}

/**
 * Full availability report
 */
export interface AvailabilityReport {
  query: AvailabilityQuery;
  /** Window the query resolved to, in the resolver's timezone */
  window: TimeWindow;
  /** Zone every record is expressed in */
  timezone: string;
  /** Ordered display records */
  records: DisplayRecord[];
  totals: AvailabilityTotals;
  calendars: CalendarSummary[];
  /** Events dropped as malformed */
  warnings: EventWarning[];
  /** Sources or calendars that could not be read */
  errors: SourceError[];
}
