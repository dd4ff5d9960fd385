/**
 * Presentation formatter
 * Turns busy and free intervals into ordered display records.
 */

import type {
  AvailabilityTotals,
  BusyInterval,
  DayGroup,
  DisplayRecord,
  FreeInterval,
  OutputMode,
  TimeRange,
} from '../types/index.js';
import { assertTimezone, durationMinutes } from '../utils/datetime.js';

export interface FormatOptions {
  output: OutputMode;
  showEventNames: boolean;
  /** IANA zone the records are rendered in */
  timezone: string;
}

function toZone(range: TimeRange, timezone: string): TimeRange {
  return {
    start: range.start.setZone(timezone),
    end: range.end.setZone(timezone),
  };
}

/**
 * Distinct contributor titles, first-seen order
 */
export function contributorLabel(interval: BusyInterval): string {
  const titles: string[] = [];
  for (const event of interval.contributors) {
    if (!titles.includes(event.title)) {
      titles.push(event.title);
    }
  }
  return titles.join(', ');
}

function busyRecord(interval: BusyInterval, options: FormatOptions): DisplayRecord {
  const record: DisplayRecord = {
    kind: 'busy',
    range: toZone(interval.range, options.timezone),
    durationMinutes: durationMinutes(interval.range),
  };
  if (options.showEventNames) {
    record.label = contributorLabel(interval);
  }
  return record;
}

function freeRecord(interval: FreeInterval, options: FormatOptions): DisplayRecord {
  return {
    kind: 'free',
    range: toZone(interval.range, options.timezone),
    durationMinutes: durationMinutes(interval.range),
  };
}

function byStart(a: DisplayRecord, b: DisplayRecord): number {
  return a.range.start.toMillis() - b.range.start.toMillis();
}

/**
 * Build display records for the requested output mode
 *
 * - `free` / `busy`: one kind only
 * - `both`: one chronological timeline; a busy record sorts before a free
 *   record starting at the same instant
 * - `both-split`: all busy records, then all free records
 */
export function formatAvailability(
  busy: readonly BusyInterval[],
  free: readonly FreeInterval[],
  options: FormatOptions
): DisplayRecord[] {
  assertTimezone(options.timezone);

  const busyRecords = busy.map(interval => busyRecord(interval, options)).sort(byStart);
  const freeRecords = free.map(interval => freeRecord(interval, options)).sort(byStart);

  switch (options.output) {
    case 'busy':
      return busyRecords;
    case 'free':
      return freeRecords;
    case 'both-split':
      return [...busyRecords, ...freeRecords];
    case 'both':
      // Stable sort keeps busy ahead of free on equal starts
      return [...busyRecords, ...freeRecords].sort(byStart);
  }
}

/**
 * Group records by the local date they start on
 * Group order follows first appearance, so split output keeps its sections.
 */
export function groupRecordsByDay(records: readonly DisplayRecord[]): DayGroup[] {
  const groups: DayGroup[] = [];
  const byDate = new Map<string, DayGroup>();

  for (const record of records) {
    const date = record.range.start.toFormat('yyyy-MM-dd');
    let group = byDate.get(date);
    if (!group) {
      group = { date, records: [] };
      byDate.set(date, group);
      groups.push(group);
    }
    group.records.push(record);
  }

  return groups;
}

/**
 * Total busy and free minutes across records
 */
export function summarizeRecords(records: readonly DisplayRecord[]): AvailabilityTotals {
  let busyMinutes = 0;
  let freeMinutes = 0;
  for (const record of records) {
    if (record.kind === 'busy') {
      busyMinutes += record.durationMinutes;
    } else {
      freeMinutes += record.durationMinutes;
    }
  }
  return { busyMinutes, freeMinutes };
}
