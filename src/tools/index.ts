/**
 * MCP Tool Registry
 * Exports all tool implementations and registration function
 */

// Tool implementations
export * from './get-availability.js';
export * from './list-timezones.js';

// Re-export schemas for convenience
export {
  GetAvailabilityInputSchema,
  ListTimezonesInputSchema,
} from '../schemas/tool-inputs.js';

import { DateTime } from 'luxon';
import type { ZodTypeAny } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { AvailabilityService } from '../services/availability-service.js';
import {
  GetAvailabilityInputSchema,
  ListTimezonesInputSchema,
} from '../schemas/tool-inputs.js';
import { executeGetAvailability, formatAvailabilityResult } from './get-availability.js';
import { executeListTimezones, formatListTimezonesResult } from './list-timezones.js';

/**
 * JSON Schema for a tool input; MCP requires an object schema at the top
 */
function toInputSchema(schema: ZodTypeAny) {
  return { ...zodToJsonSchema(schema), type: 'object' as const };
}

/**
 * Tool definitions for MCP registration
 */
export const toolDefinitions = [
  {
    name: 'get_availability',
    description:
      'Show free and busy time across all connected calendars, merged into one timeline. ' +
      'Pick the days with when, date or dateRange, restrict free time to work or personal hours, ' +
      'and optionally show event names or convert to another timezone.',
    inputSchema: toInputSchema(GetAvailabilityInputSchema),
  },
  {
    name: 'list_timezones',
    description: 'List the IANA timezone names accepted by the timezone option, optionally filtered by a substring.',
    inputSchema: toInputSchema(ListTimezonesInputSchema),
  },
];

/**
 * Tool handler function type
 */
export type ToolHandler = (args: unknown) => Promise<{ content: Array<{ type: 'text'; text: string }> }>;

/**
 * Create tool handlers with injected services
 *
 * `clock` supplies the reference "now" for relative dates.
 */
export function createToolHandlers(
  availabilityService: AvailabilityService,
  clock: () => DateTime = () => DateTime.utc()
): Record<string, ToolHandler> {
  return {
    get_availability: async (args) => {
      const input = GetAvailabilityInputSchema.parse(args);
      const result = await executeGetAvailability(input, availabilityService, clock());
      return { content: [{ type: 'text', text: formatAvailabilityResult(result) }] };
    },

    list_timezones: async (args) => {
      const input = ListTimezonesInputSchema.parse(args);
      const result = executeListTimezones(input);
      return { content: [{ type: 'text', text: formatListTimezonesResult(result, input) }] };
    },
  };
}
