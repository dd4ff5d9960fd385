/**
 * Availability Service
 * Fetches every calendar source and runs the availability engine
 */

import { DateTime } from 'luxon';
import type {
  AvailabilityQuery,
  AvailabilityReport,
  CalendarSource,
  CalendarSummary,
  SourceError,
  SourceEvent,
  TimeRange,
} from '../types/index.js';
import {
  buildSearchWindows,
  clipBusyToWindows,
  deriveFreeSlots,
  formatAvailability,
  mergeBusyIntervals,
  normalizeEvents,
  resolveTimeWindow,
  summarizeRecords,
} from '../availability/index.js';
import type { SourceRegistry } from '../providers/index.js';
import { assertTimezone, formatTimeRange } from '../utils/datetime.js';
import { hoursForPolicy, type DefaultsConfig } from '../utils/config.js';
import { silentLogger, type Logger } from '../utils/logger.js';

/**
 * Events gathered from all sources before the engine runs
 */
interface CollectedEvents {
  events: SourceEvent[];
  calendars: CalendarSummary[];
  errors: SourceError[];
}

/**
 * Availability Service
 * Combines busy time across calendars into one free/busy report
 */
export class AvailabilityService {
  private logger: Logger;

  constructor(
    private registry: SourceRegistry,
    private defaults: DefaultsConfig,
    logger?: Logger
  ) {
    this.logger = logger ?? silentLogger;
  }

  /**
   * Compute availability for a query
   *
   * Date and timezone errors are thrown before any source is contacted.
   * Sources that fail are listed in `errors`; the rest still count.
   */
  async getAvailability(
    query: AvailabilityQuery,
    referenceNow: DateTime = DateTime.utc()
  ): Promise<AvailabilityReport> {
    const outputTimezone = query.outputTimezone ?? this.defaults.timezone;
    assertTimezone(outputTimezone);

    const window = resolveTimeWindow(query.date, referenceNow, this.defaults.timezone, {
      weekStart: this.defaults.weekStart,
      workDaysOnly: query.workDaysOnly,
    });

    this.logger.debug(`Resolved window ${formatTimeRange(window.range)} (${window.days.length} day(s))`);

    const collected = await this.collectEvents(this.registry.getConnected(), window.range);

    const { intervals, warnings } = normalizeEvents(collected.events);
    for (const warning of warnings) {
      this.logger.warn(`Skipping event in ${warning.calendarName}: ${warning.message}`);
    }

    const merged = mergeBusyIntervals(intervals);
    const hours = hoursForPolicy(query.hours, this.defaults);
    const searchWindows = buildSearchWindows(window.days, { timezone: outputTimezone, hours });
    const busy = clipBusyToWindows(merged, searchWindows);
    const free = deriveFreeSlots(merged, window.days, {
      timezone: outputTimezone,
      hours,
      minDurationMinutes: this.defaults.minimumSlotDurationMinutes,
    });

    this.logger.debug(
      `${collected.events.length} event(s), ${merged.length} merged busy, ` +
        `${busy.length} busy in hours, ${free.length} free`
    );

    const records = formatAvailability(busy, free, {
      output: query.output,
      showEventNames: query.showEventNames,
      timezone: outputTimezone,
    });

    return {
      query,
      window,
      timezone: outputTimezone,
      records,
      totals: summarizeRecords(records),
      calendars: collected.calendars,
      warnings,
      errors: collected.errors,
    };
  }

  /**
   * Query each source in parallel
   */
  private async collectEvents(
    sources: CalendarSource[],
    range: TimeRange
  ): Promise<CollectedEvents> {
    const results = await Promise.allSettled(sources.map(source => source.fetchEvents(range)));

    const collected: CollectedEvents = { events: [], calendars: [], errors: [] };

    results.forEach((result, index) => {
      const source = sources[index];
      if (!source) return;

      if (result.status === 'rejected') {
        const message = result.reason instanceof Error ? result.reason.message : 'Unknown error';
        this.logger.warn(`Failed to fetch events from ${source.displayName}: ${message}`);
        collected.errors.push({
          provider: source.providerType,
          sourceId: source.sourceId,
          message,
        });
        return;
      }

      for (const calendar of result.value.calendars) {
        collected.events.push(...calendar.events);
        collected.calendars.push({
          calendarId: calendar.calendarId,
          calendarName: calendar.calendarName,
          timezone: calendar.timezone,
          eventCount: calendar.events.length,
        });
      }
      collected.errors.push(...result.value.errors);
    });

    return collected;
  }
}

/**
 * Singleton service instance
 */
let serviceInstance: AvailabilityService | null = null;

/**
 * Get or create the availability service
 */
export function getAvailabilityService(
  registry: SourceRegistry,
  defaults: DefaultsConfig,
  logger?: Logger
): AvailabilityService {
  if (!serviceInstance) {
    serviceInstance = new AvailabilityService(registry, defaults, logger);
  }
  return serviceInstance;
}

/**
 * Reset the service (for testing)
 */
export function resetAvailabilityService(): void {
  serviceInstance = null;
}
