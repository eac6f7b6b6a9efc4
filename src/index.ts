#!/usr/bin/env node

/**
 * Sprint Progress MCP Server
 *
 * Reconciles Clockify time entries against a sprint's task plan and reports
 * spent vs estimated hours per task.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import { logger } from './utils/logger.js';
import { getConfig } from './config/index.js';
import { handleToolCall, getToolDefinitions } from './tools/index.js';

let server: Server | null = null;

async function main(): Promise<void> {
  // Config errors surface at startup
  const config = getConfig();
  logger.setLevel(config.logLevel);

  logger.info('Starting Sprint Progress MCP Server', {
    tasksFile: config.tasks.filePath,
    sheet: config.tasks.sheetName,
    sprintStart: new Date(config.sprint.startOfSprint * 1000).toISOString(),
    sprintDays: config.sprint.sprintDays,
    logLevel: config.logLevel,
  });

  server = new Server(
    {
      name: 'sprint-progress-mcp',
      version: '0.1.0',
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: getToolDefinitions(),
    };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    logger.debug(`Tool call: ${name}`, args);

    try {
      const result = await handleToolCall(name, args ?? {});
      return {
        content: [
          {
            type: 'text',
            text: JSON.stringify(result, null, 2),
          },
        ],
        isError: !result.success,
      };
    } catch (error) {
      logger.error(`Tool error: ${name}`, error);
      return {
        content: [
          {
            type: 'text',
            text: JSON.stringify({
              success: false,
              error: error instanceof Error ? error.message : String(error),
            }),
          },
        ],
        isError: true,
      };
    }
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info('Server connected with stdio transport');
}

// Graceful shutdown handler
async function shutdown(): Promise<void> {
  logger.info('Shutting down...');
  if (server) {
    await server.close();
  }
  logger.info('Shutdown complete');
  process.exit(0);
}

function onSignal(): void {
  shutdown().catch((error: unknown) => {
    logger.error('Shutdown failed', error);
    process.exit(1);
  });
}

process.on('SIGINT', onSignal);
process.on('SIGTERM', onSignal);

main().catch((error: unknown) => {
  logger.error('Fatal error', error);
  process.exit(1);
});
