import { describe, expect, it } from 'vitest';
import {
  buildSearchWindows,
  clipBusyToWindows,
  deriveFreeSlots,
} from '../../src/availability/free-slots.js';
import { resolveTimeWindow } from '../../src/availability/window.js';
import { rangeMillis } from '../../src/utils/datetime.js';
import { busy, isoRange, range, utc } from '../helpers.js';

const workDay = range('2025-06-02T09:00:00Z', '2025-06-02T17:00:00Z');

describe('deriveFreeSlots', () => {
  it('reports the gap between edge meetings', () => {
    const free = deriveFreeSlots(
      [
        busy('2025-06-02T09:00:00Z', '2025-06-02T09:05:00Z'),
        busy('2025-06-02T16:58:00Z', '2025-06-02T17:00:00Z'),
      ],
      [workDay],
      { timezone: 'UTC', minDurationMinutes: 30 }
    );
    expect(free.map(slot => isoRange(slot.range))).toEqual([
      ['2025-06-02T09:05:00Z', '2025-06-02T16:58:00Z'],
    ]);
  });

  it('drops gaps shorter than the minimum and keeps gaps of exactly the minimum', () => {
    const free = deriveFreeSlots(
      [
        busy('2025-06-02T09:20:00Z', '2025-06-02T10:00:00Z'),
        busy('2025-06-02T10:30:00Z', '2025-06-02T11:00:00Z'),
      ],
      [range('2025-06-02T09:00:00Z', '2025-06-02T12:00:00Z')],
      { timezone: 'UTC', minDurationMinutes: 30 }
    );
    expect(free.map(slot => isoRange(slot.range))).toEqual([
      ['2025-06-02T10:00:00Z', '2025-06-02T10:30:00Z'],
      ['2025-06-02T11:00:00Z', '2025-06-02T12:00:00Z'],
    ]);
  });

  it('does not join short gaps around a tiny meeting', () => {
    const free = deriveFreeSlots(
      [busy('2025-06-02T09:20:00Z', '2025-06-02T09:25:00Z')],
      [range('2025-06-02T09:00:00Z', '2025-06-02T09:45:00Z')],
      { timezone: 'UTC', minDurationMinutes: 30 }
    );
    expect(free).toEqual([]);
  });

  it('returns nothing when the bound is fully booked', () => {
    const free = deriveFreeSlots(
      [busy('2025-06-02T08:00:00Z', '2025-06-02T18:00:00Z')],
      [workDay],
      { timezone: 'UTC', minDurationMinutes: 30 }
    );
    expect(free).toEqual([]);
  });

  it('returns the whole bound when nothing is booked', () => {
    const free = deriveFreeSlots([], [workDay], { timezone: 'UTC', minDurationMinutes: 30 });
    expect(free.map(slot => isoRange(slot.range))).toEqual([
      ['2025-06-02T09:00:00Z', '2025-06-02T17:00:00Z'],
    ]);
  });

  it('applies work hours per local day', () => {
    const window = resolveTimeWindow(
      { kind: 'date-range', start: '02/06/2025', end: '03/06/2025' },
      utc('2025-06-01T12:00:00Z'),
      'Europe/London'
    );
    const free = deriveFreeSlots([], window.days, {
      timezone: 'Europe/London',
      hours: { start: '09:00', end: '17:00' },
      minDurationMinutes: 30,
    });
    expect(free.map(slot => isoRange(slot.range))).toEqual([
      ['2025-06-02T08:00:00Z', '2025-06-02T16:00:00Z'],
      ['2025-06-03T08:00:00Z', '2025-06-03T16:00:00Z'],
    ]);
  });

  it('leaves out the mid-day break', () => {
    const free = deriveFreeSlots(
      [busy('2025-06-02T11:00:00Z', '2025-06-02T12:30:00Z')],
      [range('2025-06-02T00:00:00Z', '2025-06-03T00:00:00Z')],
      {
        timezone: 'UTC',
        hours: { start: '09:00', end: '17:00', midDayBreak: { start: '12:00', end: '13:00' } },
        minDurationMinutes: 30,
      }
    );
    expect(free.map(slot => isoRange(slot.range))).toEqual([
      ['2025-06-02T09:00:00Z', '2025-06-02T11:00:00Z'],
      ['2025-06-02T13:00:00Z', '2025-06-02T17:00:00Z'],
    ]);
  });

  it('splits multi-day bounds at local midnight', () => {
    const free = deriveFreeSlots(
      [],
      [range('2025-06-02T20:00:00Z', '2025-06-03T04:00:00Z')],
      { timezone: 'UTC', minDurationMinutes: 30 }
    );
    expect(free.map(slot => isoRange(slot.range))).toEqual([
      ['2025-06-02T20:00:00Z', '2025-06-03T00:00:00Z'],
      ['2025-06-03T00:00:00Z', '2025-06-03T04:00:00Z'],
    ]);
  });

  it('accounts for every minute of the bound', () => {
    const merged = [
      busy('2025-06-02T08:30:00Z', '2025-06-02T09:10:00Z'),
      busy('2025-06-02T11:00:00Z', '2025-06-02T11:20:00Z'),
      busy('2025-06-02T16:45:00Z', '2025-06-02T18:00:00Z'),
    ];
    const options = { timezone: 'UTC', minDurationMinutes: 0 };
    const windows = buildSearchWindows([workDay], options);

    const busyMillis = clipBusyToWindows(merged, windows)
      .map(interval => rangeMillis(interval.range))
      .reduce((sum, ms) => sum + ms, 0);
    const freeMillis = deriveFreeSlots(merged, [workDay], options)
      .map(slot => rangeMillis(slot.range))
      .reduce((sum, ms) => sum + ms, 0);

    expect(busyMillis + freeMillis).toBe(rangeMillis(workDay));
  });
});

describe('buildSearchWindows', () => {
  it('runs to the next midnight for a 24:00 end', () => {
    const windows = buildSearchWindows(
      [range('2025-06-02T00:00:00Z', '2025-06-03T00:00:00Z')],
      { timezone: 'UTC', hours: { start: '20:00', end: '24:00' } }
    );
    expect(windows.map(isoRange)).toEqual([['2025-06-02T20:00:00Z', '2025-06-03T00:00:00Z']]);
  });

  it('cuts whole days at local midnight after a skipped midnight', () => {
    // 7 September 01:00 to 9 September 00:00 in Santiago
    const windows = buildSearchWindows(
      [range('2025-09-07T04:00:00Z', '2025-09-09T03:00:00Z')],
      { timezone: 'America/Santiago' }
    );
    expect(windows.map(isoRange)).toEqual([
      ['2025-09-07T04:00:00Z', '2025-09-08T03:00:00Z'],
      ['2025-09-08T03:00:00Z', '2025-09-09T03:00:00Z'],
    ]);
  });

  it('clips hours to the bound', () => {
    const windows = buildSearchWindows(
      [range('2025-06-02T10:00:00Z', '2025-06-02T15:00:00Z')],
      { timezone: 'UTC', hours: { start: '09:00', end: '17:00' } }
    );
    expect(windows.map(isoRange)).toEqual([['2025-06-02T10:00:00Z', '2025-06-02T15:00:00Z']]);
  });
});

describe('clipBusyToWindows', () => {
  it('trims busy time to the windows and keeps contributors', () => {
    const interval = busy('2025-06-02T08:00:00Z', '2025-06-02T10:00:00Z', 'Early review');
    const clipped = clipBusyToWindows([interval], [workDay]);

    expect(clipped.map(item => isoRange(item.range))).toEqual([
      ['2025-06-02T09:00:00Z', '2025-06-02T10:00:00Z'],
    ]);
    expect(clipped[0]?.contributors).toBe(interval.contributors);
  });

  it('drops busy time outside every window', () => {
    const clipped = clipBusyToWindows(
      [busy('2025-06-02T18:00:00Z', '2025-06-02T19:00:00Z')],
      [workDay]
    );
    expect(clipped).toEqual([]);
  });
});
