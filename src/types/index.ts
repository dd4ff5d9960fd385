/**
 * Type exports for whenfree
 */

// Availability types
export type {
  Instant,
  TimeRange,
  SourceEvent,
  BusyInterval,
  FreeInterval,
  LocalTime,
  HoursFilter,
  HoursPolicy,
  OutputMode,
  DayOfWeek,
  DateSelector,
  AvailabilityQuery,
  TimeWindow,
  DisplayKind,
  DisplayRecord,
  DayGroup,
  EventWarning,
} from './availability.js';

// Report types
export type {
  CalendarSummary,
  AvailabilityTotals,
  AvailabilityReport,
} from './report.js';

// Provider types
export type {
  ProviderType,
  BaseProviderConfig,
  GoogleProviderConfig,
  ProviderConfig,
  CalendarEvents,
  SourceFetchResult,
  CalendarSource,
  SourceError,
} from './provider.js';
