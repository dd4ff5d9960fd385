/**
 * Common Zod schemas shared across configuration and tool definitions
 */

import { z } from 'zod';
import { IANAZone } from 'luxon';
import { localTimeToMinutes } from '../utils/datetime.js';

/**
 * Day of week enum
 */
export const DayOfWeekSchema = z.enum([
  'monday',
  'tuesday',
  'wednesday',
  'thursday',
  'friday',
  'saturday',
  'sunday',
]);

/**
 * IANA timezone name (e.g. "America/New_York")
 */
export const TimezoneSchema = z.string().refine(
  (val) => IANAZone.isValidZone(val),
  { message: 'Must be a valid IANA timezone name' }
);

/**
 * Local time of day, HH:mm (24-hour); 24:00 marks end of day
 */
export const LocalTimeSchema = z
  .string()
  .regex(/^(([01]\d|2[0-3]):[0-5]\d|24:00)$/, 'Must be in HH:mm format');

/**
 * Hours filter schema: window must be non-empty, break must sit inside it
 */
export const HoursFilterSchema = z
  .object({
    start: LocalTimeSchema,
    end: LocalTimeSchema,
    midDayBreak: z
      .object({
        start: LocalTimeSchema,
        end: LocalTimeSchema,
      })
      .optional(),
  })
  .refine(
    (hours) => localTimeToMinutes(hours.start) < localTimeToMinutes(hours.end),
    { message: 'Start must be before end', path: ['end'] }
  )
  .refine(
    (hours) => {
      if (!hours.midDayBreak) return true;
      const breakStart = localTimeToMinutes(hours.midDayBreak.start);
      const breakEnd = localTimeToMinutes(hours.midDayBreak.end);
      return (
        breakStart < breakEnd &&
        breakStart >= localTimeToMinutes(hours.start) &&
        breakEnd <= localTimeToMinutes(hours.end)
      );
    },
    { message: 'Break must be a non-empty range inside the hours', path: ['midDayBreak'] }
  );

/**
 * Hours policy enum
 */
export const HoursPolicySchema = z.enum(['work', 'personal', 'all']);

/**
 * Output mode enum
 */
export const OutputModeSchema = z.enum(['free', 'busy', 'both', 'both-split']);

/**
 * Relative date selector keywords
 */
export const RelativeDateSchema = z.enum(['today', 'tomorrow', 'next-week', 'next-two-weeks']);
