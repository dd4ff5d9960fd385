/**
 * list_timezones Tool
 */

import type { ListTimezonesInput } from '../schemas/tool-inputs.js';
import { listTimezones } from '../utils/datetime.js';

/**
 * Execute list_timezones tool
 */
export function executeListTimezones(input: ListTimezonesInput): string[] {
  const zones = listTimezones();
  const filter = input.filter?.trim().toLowerCase();
  if (!filter) return zones;
  return zones.filter(zone => zone.toLowerCase().includes(filter));
}

/**
 * Format result for MCP response
 */
export function formatListTimezonesResult(zones: string[], input: ListTimezonesInput): string {
  if (zones.length === 0) {
    return `No timezones match "${input.filter ?? ''}".`;
  }
  return [`**Timezones (${zones.length}):**`, ...zones].join('\n');
}
