import { describe, expect, it } from 'vitest';
import { normalizeEvent, normalizeEvents } from '../../src/availability/normalizer.js';
import { ErrorCodes } from '../../src/utils/error.js';
import { captureError, isoRange, sourceEvent } from '../helpers.js';

describe('normalizeEvent', () => {
  it('converts offset timestamps to UTC', () => {
    const interval = normalizeEvent(
      sourceEvent({
        start: '2025-06-01T14:00:00-04:00',
        end: '2025-06-01T15:00:00-04:00',
        sourceTimezone: 'America/New_York',
      })
    );
    expect(isoRange(interval.range)).toEqual(['2025-06-01T18:00:00Z', '2025-06-01T19:00:00Z']);
  });

  it('reads wall-clock times in the source timezone', () => {
    const interval = normalizeEvent(
      sourceEvent({
        start: '2025-06-01T19:30:00',
        end: '2025-06-01T20:00:00',
        sourceTimezone: 'Europe/London',
      })
    );
    expect(isoRange(interval.range)).toEqual(['2025-06-01T18:30:00Z', '2025-06-01T19:00:00Z']);
  });

  it('applies the offset in force at each instant across a DST change', () => {
    // Clocks go back at 02:00 local on 2 November 2025
    const interval = normalizeEvent(
      sourceEvent({
        start: '2025-11-02T00:30:00',
        end: '2025-11-02T03:00:00',
        sourceTimezone: 'America/New_York',
      })
    );
    expect(isoRange(interval.range)).toEqual(['2025-11-02T04:30:00Z', '2025-11-02T08:00:00Z']);
  });

  it('spans local midnight to midnight for all-day events', () => {
    // 10 March 2025 is already on daylight time in Los Angeles
    const interval = normalizeEvent(
      sourceEvent({
        start: '2025-03-10',
        end: '2025-03-11',
        sourceTimezone: 'America/Los_Angeles',
        isAllDay: true,
      })
    );
    expect(isoRange(interval.range)).toEqual(['2025-03-10T07:00:00Z', '2025-03-11T07:00:00Z']);
  });

  it('uses standard time for an all-day event before the DST change', () => {
    const interval = normalizeEvent(
      sourceEvent({
        start: '2025-03-08',
        end: '2025-03-09',
        sourceTimezone: 'America/Los_Angeles',
        isAllDay: true,
      })
    );
    expect(isoRange(interval.range)).toEqual(['2025-03-08T08:00:00Z', '2025-03-09T08:00:00Z']);
  });

  it('treats an all-day end equal to the start as one day', () => {
    const interval = normalizeEvent(
      sourceEvent({ start: '2025-06-02', end: '2025-06-02', isAllDay: true })
    );
    expect(isoRange(interval.range)).toEqual(['2025-06-02T00:00:00Z', '2025-06-03T00:00:00Z']);
  });

  it('keeps sub-minute precision', () => {
    const interval = normalizeEvent(
      sourceEvent({ start: '2025-06-02T09:00:00.250Z', end: '2025-06-02T09:00:45Z' })
    );
    expect(interval.range.end.toMillis() - interval.range.start.toMillis()).toBe(44_750);
  });

  it('records the event as the only contributor', () => {
    const event = sourceEvent();
    expect(normalizeEvent(event).contributors).toEqual([event]);
  });

  it('accepts a zero-length event', () => {
    const interval = normalizeEvent(
      sourceEvent({ start: '2025-06-02T09:00:00Z', end: '2025-06-02T09:00:00Z' })
    );
    expect(interval.range.start.toMillis()).toBe(interval.range.end.toMillis());
  });

  it('rejects an end before the start', () => {
    const error = captureError(() =>
      normalizeEvent(sourceEvent({ start: '2025-06-02T10:00:00Z', end: '2025-06-02T09:00:00Z' }))
    );
    expect(error.code).toBe(ErrorCodes.MALFORMED_EVENT);
    expect(error.message).toBe('Malformed event: end is before start');
  });

  it('rejects an unparseable boundary', () => {
    const error = captureError(() => normalizeEvent(sourceEvent({ start: 'not-a-date' })));
    expect(error.message).toBe('Malformed event: unparseable start "not-a-date"');
  });

  it('rejects an unknown source timezone', () => {
    const error = captureError(() => normalizeEvent(sourceEvent({ sourceTimezone: 'Nowhere/City' })));
    expect(error.code).toBe(ErrorCodes.MALFORMED_EVENT);
    expect(error.message).toBe('Malformed event: unknown timezone "Nowhere/City"');
  });
});

describe('normalizeEvents', () => {
  it('drops malformed events with a warning and keeps the rest', () => {
    const good = sourceEvent({ id: 'good' });
    const bad = sourceEvent({
      id: 'bad',
      calendarId: 'home',
      calendarName: 'Home',
      title: 'Broken',
      start: '2025-06-02T12:00:00Z',
      end: '2025-06-02T11:00:00Z',
    });

    const result = normalizeEvents([good, bad]);

    expect(result.intervals).toHaveLength(1);
    expect(result.intervals[0]?.contributors).toEqual([good]);
    expect(result.warnings).toEqual([
      {
        calendarId: 'home',
        calendarName: 'Home',
        eventId: 'bad',
        title: 'Broken',
        message: 'Malformed event: end is before start',
      },
    ]);
  });

  it('returns nothing for no events', () => {
    expect(normalizeEvents([])).toEqual({ intervals: [], warnings: [] });
  });
});
