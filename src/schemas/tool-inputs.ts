/**
 * Zod schemas for MCP tool inputs
 */

import { z } from 'zod';
import type { AvailabilityQuery, DateSelector } from '../types/index.js';
import { parseDateRange } from '../availability/window.js';
import {
  HoursPolicySchema,
  OutputModeSchema,
  RelativeDateSchema,
  TimezoneSchema,
} from './common.js';

// ─────────────────────────────────────────────────────────────────────────────
// get_availability
// ─────────────────────────────────────────────────────────────────────────────

export const GetAvailabilityInputSchema = z
  .object({
    when: RelativeDateSchema.optional()
      .describe('Relative day selection (default: today)'),
    date: z.string().min(1).optional()
      .describe('Specific date: DD/MM/YYYY, DD/MM/YY, DD-MM-YYYY or DD-MM-YY'),
    dateRange: z.string().min(1).optional()
      .describe('Inclusive date range "start,end", e.g. "01/06/2025,07/06/2025"'),
    hours: HoursPolicySchema.optional().default('personal')
      .describe('Only search for free time in work hours, personal hours (default), or all day'),
    workDays: z.boolean().optional().default(false)
      .describe('Skip Saturdays and Sundays'),
    output: OutputModeSchema.optional().default('both')
      .describe('free, busy, both (one timeline) or both-split (busy then free)'),
    showEventNames: z.boolean().optional().default(false)
      .describe('Show event titles on busy slots'),
    timezone: TimezoneSchema.optional()
      .describe('IANA timezone for the report (default: configured timezone)'),
  })
  .refine(
    (input) => [input.when, input.date, input.dateRange].filter(v => v !== undefined).length <= 1,
    { message: 'Use only one of when, date or dateRange', path: ['when'] }
  );

export type GetAvailabilityInput = z.infer<typeof GetAvailabilityInputSchema>;

/**
 * Date selector an input asks for
 */
export function toDateSelector(input: GetAvailabilityInput): DateSelector {
  if (input.date !== undefined) {
    return { kind: 'date', date: input.date };
  }
  if (input.dateRange !== undefined) {
    return parseDateRange(input.dateRange);
  }
  return { kind: input.when ?? 'today' };
}

/**
 * Turn validated tool input into an engine query
 */
export function toAvailabilityQuery(input: GetAvailabilityInput): AvailabilityQuery {
  return {
    date: toDateSelector(input),
    hours: input.hours,
    workDaysOnly: input.workDays,
    output: input.output,
    showEventNames: input.showEventNames,
    outputTimezone: input.timezone,
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// list_timezones
// ─────────────────────────────────────────────────────────────────────────────

export const ListTimezonesInputSchema = z.object({
  filter: z.string().optional()
    .describe('Case-insensitive substring, e.g. "america" or "london"'),
});

export type ListTimezonesInput = z.infer<typeof ListTimezonesInputSchema>;
