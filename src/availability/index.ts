/**
 * Availability engine exports
 */

export { resolveTimeWindow, parseLocalDate, parseDateRange } from './window.js';
export type { ResolveWindowOptions } from './window.js';

export { normalizeEvent, normalizeEvents } from './normalizer.js';
export type { NormalizeResult } from './normalizer.js';

export { mergeBusyIntervals } from './merge.js';

export { buildSearchWindows, deriveFreeSlots, clipBusyToWindows } from './free-slots.js';
export type { SearchWindowOptions, FreeSlotOptions } from './free-slots.js';

export {
  formatAvailability,
  contributorLabel,
  groupRecordsByDay,
  summarizeRecords,
} from './formatter.js';
export type { FormatOptions } from './formatter.js';
