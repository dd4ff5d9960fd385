/**
 * Abstract base class for calendar sources
 * Every source implementation extends this class
 */

import type {
  CalendarSource,
  ProviderConfig,
  ProviderType,
  SourceFetchResult,
  TimeRange,
} from '../types/index.js';
import { AvailabilityError, ErrorCodes, wrapError } from '../utils/error.js';
import { silentLogger, type Logger } from '../utils/logger.js';

/**
 * Abstract base class for all calendar sources
 */
export abstract class BaseCalendarSource implements CalendarSource {
  protected _connected: boolean = false;
  protected logger: Logger;

  constructor(
    protected readonly config: ProviderConfig,
    logger?: Logger
  ) {
    this.logger = logger ?? silentLogger;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Identity (from config)
  // ─────────────────────────────────────────────────────────────────────────────

  get sourceId(): string {
    return this.config.id;
  }

  get providerType(): ProviderType {
    return this.config.type;
  }

  get displayName(): string {
    return this.config.name;
  }

  get calendarIds(): string[] {
    return this.config.calendarIds;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Connection Lifecycle
  // ─────────────────────────────────────────────────────────────────────────────

  abstract connect(): Promise<void>;

  async disconnect(): Promise<void> {
    this._connected = false;
    this.logger.info(`Disconnected from ${this.displayName}`);
  }

  isConnected(): boolean {
    return this._connected;
  }

  protected ensureConnected(): void {
    if (!this._connected) {
      throw new AvailabilityError(
        `Source ${this.displayName} is not connected`,
        ErrorCodes.PROVIDER_NOT_CONFIGURED,
        { provider: this.providerType, sourceId: this.sourceId }
      );
    }
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Events
  // ─────────────────────────────────────────────────────────────────────────────

  abstract fetchEvents(range: TimeRange): Promise<SourceFetchResult>;

  // ─────────────────────────────────────────────────────────────────────────────
  // Helper Methods
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Wrap errors with source context
   */
  protected wrapError(error: unknown, operation: string): AvailabilityError {
    return wrapError(error, {
      provider: this.providerType,
      sourceId: this.sourceId,
      operation,
    });
  }

  /**
   * Run an API operation on a connected source, wrapping failures
   */
  protected async executeWithErrorHandling<T>(
    operation: string,
    fn: () => Promise<T>
  ): Promise<T> {
    this.ensureConnected();
    try {
      return await fn();
    } catch (error) {
      throw this.wrapError(error, operation);
    }
  }
}
