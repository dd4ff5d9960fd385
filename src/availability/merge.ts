/**
 * Interval merge engine
 * Coalesces busy intervals from every calendar into one sorted timeline.
 * All intervals are half-open [start, end).
 */

import type { BusyInterval, SourceEvent } from '../types/index.js';

/**
 * Total order on intervals: start, then end, then source identity
 */
function compareIntervals(a: BusyInterval, b: BusyInterval): number {
  const startDiff = a.range.start.toMillis() - b.range.start.toMillis();
  if (startDiff !== 0) return startDiff;

  const endDiff = a.range.end.toMillis() - b.range.end.toMillis();
  if (endDiff !== 0) return endDiff;

  return compareText(contributorKey(a), contributorKey(b));
}

function contributorKey(interval: BusyInterval): string {
  const first = interval.contributors[0];
  return first ? `${first.calendarId}\u0000${first.title}\u0000${first.id ?? ''}` : '';
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Append contributors not already present, keeping first-seen order
 */
function unionContributors(target: SourceEvent[], incoming: readonly SourceEvent[]): void {
  for (const event of incoming) {
    if (!target.includes(event)) {
      target.push(event);
    }
  }
}

/**
 * Merges overlapping or touching busy intervals
 *
 * Empty intervals are dropped. Intervals that share only an endpoint
 * ([9, 10) and [10, 11)) merge into one. The result is sorted, and every
 * adjacent pair satisfies `a.end < b.start`. Input is not mutated.
 *
 * @example
 * ```typescript
 * const merged = mergeBusyIntervals([standup, planning, lunch]);
 * // standup [09:00, 09:30) and planning [09:30, 10:30) become [09:00, 10:30)
 * ```
 */
export function mergeBusyIntervals(intervals: readonly BusyInterval[]): BusyInterval[] {
  const sorted = intervals
    .filter(interval => interval.range.start.toMillis() < interval.range.end.toMillis())
    .sort(compareIntervals);

  const merged: BusyInterval[] = [];
  let current: BusyInterval | undefined;

  for (const next of sorted) {
    if (current && next.range.start.toMillis() <= current.range.end.toMillis()) {
      if (next.range.end.toMillis() > current.range.end.toMillis()) {
        current.range.end = next.range.end;
      }
      unionContributors(current.contributors, next.contributors);
      continue;
    }

    current = {
      range: { start: next.range.start, end: next.range.end },
      contributors: [...next.contributors],
    };
    merged.push(current);
  }

  return merged;
}
