/**
 * Time window resolution
 * Turns a date selector into a concrete UTC range plus per-day buckets.
 * Day boundaries are local midnights in the resolver's timezone.
 */

import { DateTime } from 'luxon';
import type { DateSelector, DayOfWeek, TimeRange, TimeWindow } from '../types/index.js';
import { invalidDateFormatError, invalidRangeError } from '../utils/error.js';
import { assertTimezone, isWeekend } from '../utils/datetime.js';

/**
 * Luxon weekday numbers (1 = Monday, 7 = Sunday)
 */
const WEEKDAY_NUMBERS: Record<DayOfWeek, number> = {
  monday: 1,
  tuesday: 2,
  wednesday: 3,
  thursday: 4,
  friday: 5,
  saturday: 6,
  sunday: 7,
};

/**
 * Accepted explicit date formats, four-digit years first
 */
const DATE_FORMATS = ['d/M/yyyy', 'd/M/yy', 'd-M-yyyy', 'd-M-yy'];

export interface ResolveWindowOptions {
  /** First day of the week for "next-week"; defaults to Monday */
  weekStart?: DayOfWeek;
  /** Drop Saturday and Sunday buckets */
  workDaysOnly?: boolean;
}

/**
 * Parse DD/MM/YYYY, DD/MM/YY, DD-MM-YYYY or DD-MM-YY as local midnight
 */
export function parseLocalDate(value: string, timezone: string): DateTime {
  const trimmed = value.trim();
  for (const format of DATE_FORMATS) {
    const dt = DateTime.fromFormat(trimmed, format, { zone: timezone });
    if (dt.isValid) {
      return dt.startOf('day');
    }
  }
  throw invalidDateFormatError(value);
}

/**
 * Parse the "start,end" form into a date-range selector
 */
export function parseDateRange(value: string): DateSelector {
  const parts = value.split(',').map(part => part.trim());
  const [start, end] = parts;
  if (parts.length !== 2 || !start || !end) {
    throw invalidDateFormatError(value);
  }
  return { kind: 'date-range', start, end };
}

/**
 * Start of the local day `days` after `first`
 *
 * Snaps back to midnight: where a DST change skips midnight, `first` is
 * 01:00 and plain day arithmetic would carry that hour forward.
 */
function localDayStart(first: DateTime, days: number): DateTime {
  return first.plus({ days }).startOf('day');
}

/**
 * Consecutive calendar-day buckets starting at a local midnight
 */
function dayBuckets(first: DateTime, count: number): Array<{ local: DateTime; range: TimeRange }> {
  const buckets: Array<{ local: DateTime; range: TimeRange }> = [];
  for (let i = 0; i < count; i++) {
    const local = localDayStart(first, i);
    buckets.push({
      local,
      range: {
        start: local.toUTC(),
        end: localDayStart(first, i + 1).toUTC(),
      },
    });
  }
  return buckets;
}

/**
 * First local midnight and number of days a selector covers
 */
function selectorSpan(
  selector: DateSelector,
  today: DateTime,
  timezone: string,
  weekStart: DayOfWeek
): { first: DateTime; count: number } {
  switch (selector.kind) {
    case 'today':
      return { first: today, count: 1 };

    case 'tomorrow':
      return { first: localDayStart(today, 1), count: 1 };

    case 'next-week': {
      // Today being the week start means next week's, not today
      const ahead = (WEEKDAY_NUMBERS[weekStart] - today.weekday + 7) % 7 || 7;
      return { first: localDayStart(today, ahead), count: 7 };
    }

    case 'next-two-weeks':
      return { first: today, count: 14 };

    case 'date':
      return { first: parseLocalDate(selector.date, timezone), count: 1 };

    case 'date-range': {
      const start = parseLocalDate(selector.start, timezone);
      const end = parseLocalDate(selector.end, timezone);
      if (end.toMillis() < start.toMillis()) {
        throw invalidRangeError(selector.start, selector.end);
      }
      return { first: start, count: Math.round(end.diff(start, 'days').days) + 1 };
    }
  }
}

/**
 * Resolve a date selector against a reference instant
 *
 * @throws AvailabilityError INVALID_DATE_FORMAT, INVALID_DATE_RANGE or INVALID_TIMEZONE
 */
export function resolveTimeWindow(
  selector: DateSelector,
  referenceNow: DateTime,
  timezone: string,
  options: ResolveWindowOptions = {}
): TimeWindow {
  assertTimezone(timezone);

  const today = referenceNow.setZone(timezone).startOf('day');
  const { first, count } = selectorSpan(selector, today, timezone, options.weekStart ?? 'monday');

  const days = dayBuckets(first, count)
    .filter(bucket => !options.workDaysOnly || !isWeekend(bucket.local))
    .map(bucket => bucket.range);

  return {
    range: {
      start: first.toUTC(),
      end: localDayStart(first, count).toUTC(),
    },
    days,
    timezone,
  };
}
