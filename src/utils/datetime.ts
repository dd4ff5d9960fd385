/**
 * Date/Time utilities using Luxon
 */

import { DateTime, Duration, IANAZone } from 'luxon';
import type { LocalTime, TimeRange } from '../types/index.js';
import { invalidInputError, invalidTimezoneError } from './error.js';

/**
 * Check whether a string names a known IANA timezone
 */
export function isValidTimezone(timezone: string): boolean {
  return IANAZone.isValidZone(timezone);
}

/**
 * Throw INVALID_TIMEZONE unless the zone is known
 */
export function assertTimezone(timezone: string): void {
  if (!isValidTimezone(timezone)) {
    throw invalidTimezoneError(timezone);
  }
}

/**
 * All IANA timezones the runtime knows, sorted
 */
export function listTimezones(): string[] {
  return [...Intl.supportedValuesOf('timeZone')].sort();
}

/**
 * Convert a Luxon DateTime to ISO string
 */
export function toISOString(dt: DateTime): string {
  const iso = dt.toISO();
  if (iso === null) {
    throw invalidInputError(`Cannot format invalid datetime: ${dt.invalidReason ?? 'unknown'}`);
  }
  return iso;
}

/**
 * Minutes after midnight for an HH:mm local time
 */
export function localTimeToMinutes(time: LocalTime): number {
  const [hours = 0, minutes = 0] = time.split(':').map(Number);
  return hours * 60 + minutes;
}

/**
 * The instant a local time of day falls on, for the day `day` is in
 *
 * "24:00" resolves to the next local midnight. Times skipped by a DST
 * gap are pushed forward by Luxon.
 */
export function atLocalTime(day: DateTime, time: LocalTime): DateTime {
  const midnight = day.startOf('day');
  const total = localTimeToMinutes(time);
  if (total >= 24 * 60) {
    return midnight.plus({ days: 1 }).startOf('day');
  }
  return midnight.set({ hour: Math.floor(total / 60), minute: total % 60 });
}

/**
 * Length of a range in milliseconds
 */
export function rangeMillis(range: TimeRange): number {
  return range.end.toMillis() - range.start.toMillis();
}

/**
 * Length of a range in whole minutes (rounded)
 */
export function durationMinutes(range: TimeRange): number {
  return Math.round(rangeMillis(range) / 60_000);
}

/**
 * Strict half-open overlap: ranges that only touch do not overlap
 */
export function rangesOverlap(a: TimeRange, b: TimeRange): boolean {
  return (
    a.start.toMillis() < b.end.toMillis() && b.start.toMillis() < a.end.toMillis()
  );
}

/**
 * Saturday or Sunday in the DateTime's own zone
 */
export function isWeekend(dt: DateTime): boolean {
  return dt.weekday >= 6;
}

/**
 * Format datetime for display (e.g. "2025-06-01 14:00 UTC")
 */
export function formatDateTime(dt: DateTime): string {
  return dt.setLocale('en-US').toFormat('yyyy-MM-dd HH:mm ZZZZ');
}

/**
 * Format a range for display (e.g. "2025-06-01 09:00 UTC to 2025-06-01 10:00 UTC")
 */
export function formatTimeRange(range: TimeRange): string {
  return `${formatDateTime(range.start)} to ${formatDateTime(range.end)}`;
}

/**
 * Format duration for display (e.g. "2 hours 30 minutes")
 */
export function formatDuration(minutes: number): string {
  const { hours, minutes: rest } = Duration.fromObject({ minutes: Math.round(minutes) })
    .shiftTo('hours', 'minutes')
    .toObject();
  const h = hours ?? 0;
  const m = rest ?? 0;

  const minutePart = `${m} minute${m !== 1 ? 's' : ''}`;
  if (h === 0) {
    return minutePart;
  }
  const hourPart = `${h} hour${h !== 1 ? 's' : ''}`;
  return m === 0 ? hourPart : `${hourPart} ${minutePart}`;
}
