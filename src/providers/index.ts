/**
 * Calendar source registry and factory
 */

import type { CalendarSource, ProviderConfig } from '../types/index.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { GoogleCalendarSource } from './google/index.js';

export { BaseCalendarSource } from './base.js';
export { GoogleCalendarSource } from './google/index.js';

/**
 * Create a source instance for a configuration
 */
export function createSource(config: ProviderConfig, logger?: Logger): CalendarSource {
  switch (config.type) {
    case 'google':
      return new GoogleCalendarSource(config, logger);
  }
}

/**
 * Registry for calendar sources
 */
export class SourceRegistry {
  private sources: Map<string, CalendarSource> = new Map();
  private logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? silentLogger;
  }

  /**
   * Register an existing source instance
   */
  register(source: CalendarSource): void {
    this.sources.set(source.sourceId, source);
    this.logger.info(`Registered source: ${source.sourceId}`);
  }

  get(sourceId: string): CalendarSource | undefined {
    return this.sources.get(sourceId);
  }

  getAll(): CalendarSource[] {
    return Array.from(this.sources.values());
  }

  getConnected(): CalendarSource[] {
    return this.getAll().filter(s => s.isConnected());
  }

  get count(): number {
    return this.sources.size;
  }

  /**
   * Connect all registered sources; failures are reported, not thrown
   */
  async connectAll(): Promise<{ success: string[]; failed: Array<{ id: string; error: string }> }> {
    const success: string[] = [];
    const failed: Array<{ id: string; error: string }> = [];

    await Promise.all(
      this.getAll().map(async source => {
        try {
          await source.connect();
          success.push(source.sourceId);
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          failed.push({ id: source.sourceId, error: message });
          this.logger.error(`Failed to connect ${source.sourceId}: ${message}`);
        }
      })
    );

    return { success, failed };
  }

  async disconnectAll(): Promise<void> {
    await Promise.all(
      this.getAll().map(async source => {
        try {
          await source.disconnect();
        } catch (error) {
          this.logger.error(`Failed to disconnect ${source.sourceId}:`, error);
        }
      })
    );
  }

  /**
   * Disconnect and forget every source (for testing)
   */
  async clear(): Promise<void> {
    await this.disconnectAll();
    this.sources.clear();
  }
}

/**
 * Build a registry from configuration and connect every enabled source
 */
export async function initializeSources(
  configs: ProviderConfig[],
  logger: Logger = silentLogger
): Promise<SourceRegistry> {
  const registry = new SourceRegistry(logger);

  for (const config of configs) {
    if (config.enabled) {
      logger.info(`Initializing ${config.type} source ${config.id}...`);
      registry.register(createSource(config, logger));
    }
  }

  const { success } = await registry.connectAll();
  logger.info(`${success.length} source(s) connected`);
  if (success.length === 0) {
    logger.warn('No sources connected. Check your configuration.');
  }

  return registry;
}
