/**
 * Calendar source configuration and interface types
 */

import type { SourceEvent, TimeRange } from './availability.js';

export type ProviderType = 'google';

/**
 * Base configuration for all calendar sources
 */
export interface BaseProviderConfig {
  /** Unique identifier for this source instance */
  id: string;
  /** Provider type */
  type: ProviderType;
  /** Display name for this source */
  name: string;
  /** Whether this source is enabled */
  enabled: boolean;
  /** Calendars to read from this account */
  calendarIds: string[];
}

/**
 * Google Calendar source configuration
 */
export interface GoogleProviderConfig extends BaseProviderConfig {
  type: 'google';
  /** OAuth client ID */
  clientId?: string;
  /** OAuth client secret */
  clientSecret?: string;
  /** OAuth redirect URI */
  redirectUri?: string;
  /** Pre-authorized credentials */
  credentials?: {
    accessToken: string;
    refreshToken: string;
    tokenExpiry?: string;
  };
}

export type ProviderConfig = GoogleProviderConfig;

/**
 * Events of one calendar within a fetched range
 */
export interface CalendarEvents {
  calendarId: string;
  calendarName: string;
  /** Native IANA timezone of the calendar */
  timezone: string;
  events: SourceEvent[];
}

/**
 * Interface every calendar source implements
 * Sources own authentication, paging and recurrence expansion.
 */
export interface CalendarSource {
  readonly sourceId: string;
  readonly providerType: ProviderType;
  readonly displayName: string;

  connect(): Promise<void>;
  disconnect(): Promise<void>;
  isConnected(): boolean;

  /**
   * Fetch every configured calendar's events overlapping the range
   */
  fetchEvents(range: TimeRange): Promise<SourceFetchResult>;
}

/**
 * Calendars read by one source, plus the ones that failed
 */
export interface SourceFetchResult {
  calendars: CalendarEvents[];
  errors: SourceError[];
}

/**
 * A calendar (or whole source) that could not be read
 */
export interface SourceError {
  provider: ProviderType | 'unknown';
  sourceId: string;
  calendarId?: string;
  message: string;
}
