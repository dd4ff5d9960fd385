#!/usr/bin/env node
/**
 * whenfree MCP Server
 * Main entry point for the Model Context Protocol server
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';

import { getConfig } from './utils/config.js';
import { AvailabilityError, formatErrorForMCP } from './utils/error.js';
import { createLogger } from './utils/logger.js';
import { initializeSources, type SourceRegistry } from './providers/index.js';
import { getAvailabilityService } from './services/index.js';
import { toolDefinitions, createToolHandlers } from './tools/index.js';

/**
 * Create and configure the MCP server
 */
async function createServer(): Promise<{ server: Server; registry: SourceRegistry }> {
  const config = getConfig();
  const logger = createLogger(config.server.logLevel);

  // Connect calendar sources
  const registry = await initializeSources(config.providers, logger);

  // Create services and tool handlers
  const availabilityService = getAvailabilityService(registry, config.defaults, logger);
  const toolHandlers = createToolHandlers(availabilityService);

  const server = new Server(
    {
      name: config.server.name,
      version: config.server.version,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  // Register tool list handler
  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: toolDefinitions.map(tool => ({
        name: tool.name,
        description: tool.description,
        inputSchema: tool.inputSchema,
      })),
    };
  });

  // Register tool call handler
  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    const handler = toolHandlers[name];
    if (!handler) {
      return {
        content: [
          {
            type: 'text',
            text: `Unknown tool: ${name}. Available tools: ${Object.keys(toolHandlers).join(', ')}`,
          },
        ],
        isError: true,
      };
    }

    try {
      return await handler(args ?? {});
    } catch (error) {
      logger.error(
        `Error executing tool ${name}:`,
        error instanceof AvailabilityError ? error.toJSON() : error
      );

      // Handle Zod validation errors
      if (error instanceof z.ZodError) {
        const issues = error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
        return {
          content: [{ type: 'text', text: `Validation error: ${issues}` }],
          isError: true,
        };
      }

      if (error instanceof AvailabilityError) {
        return {
          content: [{ type: 'text', text: formatErrorForMCP(error) }],
          isError: true,
        };
      }

      const message = error instanceof Error ? error.message : 'Unknown error';
      return {
        content: [{ type: 'text', text: `Error: ${message}` }],
        isError: true,
      };
    }
  });

  return { server, registry };
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const logger = createLogger(getConfig().server.logLevel);
  logger.info('Starting whenfree MCP server...');

  const { server, registry } = await createServer();
  const transport = new StdioServerTransport();

  await server.connect(transport);
  logger.info('Server running on stdio transport');

  // Handle graceful shutdown
  const shutdown = async (): Promise<void> => {
    logger.info('Shutting down...');
    await registry.disconnectAll();
    await server.close();
    process.exit(0);
  };

  process.on('SIGINT', () => {
    void shutdown();
  });
  process.on('SIGTERM', () => {
    void shutdown();
  });
}

// Run the server
main().catch((error) => {
  console.error('[whenfree] [ERROR] Failed to start server:', error);
  process.exit(1);
});
