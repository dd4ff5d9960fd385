/**
 * Google Calendar source implementation
 */

import type { OAuth2Client } from 'google-auth-library';
import type {
  CalendarEvents,
  GoogleProviderConfig,
  SourceError,
  SourceFetchResult,
  TimeRange,
} from '../../types/index.js';
import { BaseCalendarSource } from '../base.js';
import { AvailabilityError, ErrorCodes } from '../../utils/error.js';
import type { Logger } from '../../utils/logger.js';
import { toISOString } from '../../utils/datetime.js';
import { createOAuth2Client, ensureValidCredentials } from './auth.js';
import { GoogleCalendarClient } from './client.js';
import { isCancelled, mapGoogleEvent } from './mapper.js';

/**
 * Google Calendar source
 * Reads every configured calendar id of one Google account.
 */
export class GoogleCalendarSource extends BaseCalendarSource {
  private oauth2Client: OAuth2Client;
  private client: GoogleCalendarClient | null = null;

  constructor(config: GoogleProviderConfig, logger?: Logger) {
    super(config, logger);
    this.oauth2Client = createOAuth2Client(config);
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Connection Lifecycle
  // ─────────────────────────────────────────────────────────────────────────────

  async connect(): Promise<void> {
    this.logger.info(`Connecting to Google Calendar (${this.displayName})...`);

    try {
      await ensureValidCredentials(this.oauth2Client);
      this.client = new GoogleCalendarClient(this.oauth2Client);
      this._connected = true;
      this.logger.info(`Connected to Google Calendar (${this.displayName})`);
    } catch (error) {
      this._connected = false;
      throw this.wrapError(error, 'connect');
    }
  }

  async disconnect(): Promise<void> {
    this.client = null;
    await super.disconnect();
  }

  private getClient(): GoogleCalendarClient {
    if (!this.client) {
      throw new AvailabilityError(
        'Google Calendar client not initialized. Call connect() first.',
        ErrorCodes.PROVIDER_NOT_CONFIGURED,
        { provider: 'google', sourceId: this.sourceId }
      );
    }
    return this.client;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Events
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Read a single calendar's metadata and events
   */
  private async fetchCalendar(calendarId: string, range: TimeRange): Promise<CalendarEvents> {
    const client = this.getClient();
    const info = await client.getCalendar(calendarId);
    const events = await client.listEvents({
      calendarId,
      timeMin: toISOString(range.start),
      timeMax: toISOString(range.end),
    });

    const kept = events.filter(event => !isCancelled(event));
    this.logger.debug(
      `Fetched ${kept.length} event(s) from ${info.summary} (${calendarId})`
    );

    return {
      calendarId: info.id,
      calendarName: info.summary,
      timezone: info.timeZone,
      events: kept.map(event => mapGoogleEvent(event, info)),
    };
  }

  async fetchEvents(range: TimeRange): Promise<SourceFetchResult> {
    return this.executeWithErrorHandling('fetchEvents', async () => {
      // Refresh an expired token once, before the per-calendar fan-out
      await ensureValidCredentials(this.oauth2Client);

      const calendarIds = this.calendarIds;

      // Query each calendar in parallel
      const results = await Promise.allSettled(
        calendarIds.map(calendarId => this.fetchCalendar(calendarId, range))
      );

      const calendars: CalendarEvents[] = [];
      const errors: SourceError[] = [];

      results.forEach((result, index) => {
        if (result.status === 'fulfilled') {
          calendars.push(result.value);
          return;
        }

        const message =
          result.reason instanceof Error ? result.reason.message : 'Unknown error';
        this.logger.warn(`Failed to read calendar ${calendarIds[index]}: ${message}`);
        errors.push({
          provider: 'google',
          sourceId: this.sourceId,
          calendarId: calendarIds[index],
          message,
        });
      });

      return { calendars, errors };
    });
  }
}
