import { vi } from 'vitest';
import type {
  CalendarEvents,
  CalendarSource,
  SourceFetchResult,
  TimeRange,
} from '../../src/types/index.js';

/**
 * In-memory calendar source returning canned calendars
 */
export class FakeSource implements CalendarSource {
  readonly providerType = 'google' as const;
  readonly fetchEvents = vi.fn(
    async (_range: TimeRange): Promise<SourceFetchResult> => ({
      calendars: this.calendars,
      errors: [],
    })
  );

  private connected = true;

  constructor(
    readonly sourceId: string,
    readonly displayName: string,
    private calendars: CalendarEvents[] = []
  ) {}

  async connect(): Promise<void> {
    this.connected = true;
  }

  async disconnect(): Promise<void> {
    this.connected = false;
  }

  isConnected(): boolean {
    return this.connected;
  }
}
