/**
 * get_availability Tool
 * Free/busy report across every connected calendar
 */

import { DateTime } from 'luxon';
import type { AvailabilityReport, DisplayRecord, OutputMode } from '../types/index.js';
import type { AvailabilityService } from '../services/availability-service.js';
import { toAvailabilityQuery, type GetAvailabilityInput } from '../schemas/tool-inputs.js';
import { groupRecordsByDay } from '../availability/formatter.js';
import { formatDuration } from '../utils/datetime.js';

/**
 * Execute get_availability tool
 */
export async function executeGetAvailability(
  input: GetAvailabilityInput,
  availabilityService: AvailabilityService,
  referenceNow: DateTime = DateTime.utc()
): Promise<AvailabilityReport> {
  return availabilityService.getAvailability(toAvailabilityQuery(input), referenceNow);
}

const EMPTY_MESSAGES: Record<OutputMode, string> = {
  free: 'No free time in the selected range.',
  busy: 'No busy time in the selected range.',
  both: 'No free or busy time in the selected range.',
  'both-split': 'No free or busy time in the selected range.',
};

/**
 * One report line, e.g. "   🔴 Busy 09:00 - 10:30 (1 hour 30 minutes): Standup"
 */
export function formatRecordLine(record: DisplayRecord): string {
  const icon = record.kind === 'busy' ? '🔴 Busy' : '🟢 Free';
  const time = `${record.range.start.toFormat('HH:mm')} - ${record.range.end.toFormat('HH:mm')}`;
  const label = record.label ? `: ${record.label}` : '';
  return `   ${icon} ${time} (${formatDuration(record.durationMinutes)})${label}`;
}

/**
 * Format result for MCP response
 */
export function formatAvailabilityResult(report: AvailabilityReport): string {
  const lines: string[] = [];
  const { window } = report;
  const firstDay = window.range.start.setZone(window.timezone);
  const lastDay = window.range.end.setZone(window.timezone).minus({ days: 1 });

  lines.push('**Availability**');
  lines.push(`(Times shown in ${report.timezone})`);
  lines.push(
    firstDay.hasSame(lastDay, 'day')
      ? `Date: ${firstDay.toFormat('yyyy-MM-dd')}`
      : `Dates: ${firstDay.toFormat('yyyy-MM-dd')} to ${lastDay.toFormat('yyyy-MM-dd')}`
  );
  lines.push('');

  if (report.records.length === 0) {
    lines.push(EMPTY_MESSAGES[report.query.output]);
    lines.push('');
  }

  for (const group of groupRecordsByDay(report.records)) {
    const day = DateTime.fromFormat(group.date, 'yyyy-MM-dd', { zone: report.timezone });
    lines.push(`**${day.setLocale('en-US').toFormat('EEE, MMM d')}:**`);
    for (const record of group.records) {
      lines.push(formatRecordLine(record));
    }
    lines.push('');
  }

  const totals: string[] = [];
  if (report.query.output !== 'free') totals.push(`busy ${formatDuration(report.totals.busyMinutes)}`);
  if (report.query.output !== 'busy') totals.push(`free ${formatDuration(report.totals.freeMinutes)}`);
  lines.push(`**Total:** ${totals.join(', ')}`);

  // Per-calendar breakdown
  if (report.calendars.length > 1) {
    lines.push('');
    lines.push('**Calendars:**');
    for (const calendar of report.calendars) {
      lines.push(
        `   ${calendar.calendarName} (${calendar.timezone}): ${calendar.eventCount} event(s)`
      );
    }
  }

  if (report.warnings.length > 0) {
    lines.push('');
    lines.push('⚠️ **Skipped events:**');
    for (const warning of report.warnings) {
      lines.push(`   - ${warning.calendarName}: "${warning.title}" (${warning.message})`);
    }
  }

  if (report.errors.length > 0) {
    lines.push('');
    lines.push('⚠️ **Errors:**');
    for (const error of report.errors) {
      const where = error.calendarId ? `${error.sourceId}/${error.calendarId}` : error.sourceId;
      lines.push(`   - ${where}: ${error.message}`);
    }
  }

  return lines.join('\n');
}
