/**
 * Free-slot derivation
 * Computes the complement of the busy timeline inside the hours windows.
 */

import type { DateTime } from 'luxon';
import type { BusyInterval, FreeInterval, HoursFilter, TimeRange } from '../types/index.js';
import { assertTimezone, atLocalTime, rangeMillis, rangesOverlap } from '../utils/datetime.js';

export interface SearchWindowOptions {
  /** Zone whose calendar days and local times the hours filter uses */
  timezone: string;
  /** No filter means whole days */
  hours?: HoursFilter | null;
}

export interface FreeSlotOptions extends SearchWindowOptions {
  /** Gaps shorter than this are dropped; equal length is kept */
  minDurationMinutes: number;
}

function laterOf(a: DateTime, b: DateTime): DateTime {
  return a.toMillis() >= b.toMillis() ? a : b;
}

function earlierOf(a: DateTime, b: DateTime): DateTime {
  return a.toMillis() <= b.toMillis() ? a : b;
}

/**
 * Intersection of two ranges, or null when they share no time
 */
function intersect(a: TimeRange, b: TimeRange): TimeRange | null {
  const start = laterOf(a.start, b.start);
  const end = earlierOf(a.end, b.end);
  return start.toMillis() < end.toMillis() ? { start, end } : null;
}

/**
 * Hours window for one local day, with the break cut out
 */
function dayWindows(day: DateTime, hours: HoursFilter | null | undefined): TimeRange[] {
  if (!hours) {
    return [{ start: day.startOf('day'), end: day.plus({ days: 1 }).startOf('day') }];
  }

  const start = atLocalTime(day, hours.start);
  const end = atLocalTime(day, hours.end);
  if (!hours.midDayBreak) {
    return [{ start, end }];
  }

  return [
    { start, end: atLocalTime(day, hours.midDayBreak.start) },
    { start: atLocalTime(day, hours.midDayBreak.end), end },
  ];
}

/**
 * Split search bounds into the windows free time may fall in
 *
 * Every bound is cut at local midnights of `timezone`, then intersected
 * with that day's hours. Returned windows are sorted, non-empty and in UTC.
 */
export function buildSearchWindows(
  bounds: readonly TimeRange[],
  options: SearchWindowOptions
): TimeRange[] {
  assertTimezone(options.timezone);

  const windows: TimeRange[] = [];
  for (const bound of bounds) {
    let day = bound.start.setZone(options.timezone).startOf('day');

    while (day.toMillis() < bound.end.toMillis()) {
      for (const candidate of dayWindows(day, options.hours)) {
        const window = intersect(candidate, bound);
        if (window) {
          windows.push({ start: window.start.toUTC(), end: window.end.toUTC() });
        }
      }
      day = day.plus({ days: 1 }).startOf('day');
    }
  }

  return windows.sort((a, b) => a.start.toMillis() - b.start.toMillis());
}

/**
 * Gaps in a window not covered by any busy interval
 * Busy intervals must be merged and sorted.
 */
function gapsInWindow(window: TimeRange, busy: readonly BusyInterval[]): TimeRange[] {
  const gaps: TimeRange[] = [];
  let cursor = window.start;

  for (const interval of busy) {
    if (interval.range.end.toMillis() <= cursor.toMillis()) continue;
    if (interval.range.start.toMillis() >= window.end.toMillis()) break;

    if (interval.range.start.toMillis() > cursor.toMillis()) {
      gaps.push({ start: cursor, end: interval.range.start });
    }
    cursor = laterOf(cursor, interval.range.end);
  }

  if (cursor.toMillis() < window.end.toMillis()) {
    gaps.push({ start: cursor, end: window.end });
  }
  return gaps;
}

/**
 * Free intervals inside `bounds`, given merged busy intervals
 *
 * @example
 * ```typescript
 * const free = deriveFreeSlots(merged, window.days, {
 *   timezone: 'Europe/London',
 *   hours: { start: '09:00', end: '17:00' },
 *   minDurationMinutes: 30,
 * });
 * ```
 */
export function deriveFreeSlots(
  busy: readonly BusyInterval[],
  bounds: readonly TimeRange[],
  options: FreeSlotOptions
): FreeInterval[] {
  const minMillis = options.minDurationMinutes * 60_000;
  const free: FreeInterval[] = [];

  for (const window of buildSearchWindows(bounds, options)) {
    for (const gap of gapsInWindow(window, busy)) {
      if (rangeMillis(gap) >= minMillis) {
        free.push({ range: { start: gap.start.toUTC(), end: gap.end.toUTC() } });
      }
    }
  }

  return free;
}

/**
 * Restrict busy intervals to the search windows, keeping contributors
 */
export function clipBusyToWindows(
  busy: readonly BusyInterval[],
  windows: readonly TimeRange[]
): BusyInterval[] {
  const clipped: BusyInterval[] = [];

  for (const window of windows) {
    for (const interval of busy) {
      if (!rangesOverlap(interval.range, window)) continue;
      const range = intersect(interval.range, window);
      if (range) {
        clipped.push({
          range: { start: range.start.toUTC(), end: range.end.toUTC() },
          contributors: interval.contributors,
        });
      }
    }
  }

  return clipped.sort((a, b) => a.range.start.toMillis() - b.range.start.toMillis());
}
