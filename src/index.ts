#!/usr/bin/env node

/**
 * timeledger MCP server
 *
 * Billable time tracking over a local SQLite file, exposed as MCP tools on
 * stdio. At most one time entry is open at any time; a timer left running
 * by a previous run is picked up again on start.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import { logger } from './utils/logger.js';
import { isFatalError } from './utils/errors.js';
import { getConfig } from './config/index.js';
import { handleToolCall, getToolDefinitions } from './tools/index.js';
import { closeContext, createContext, type AppContext } from './services/context.js';

let context: AppContext | null = null;

async function main(): Promise<void> {
  const config = getConfig();
  logger.setLevel(config.logLevel);

  logger.info('Starting timeledger MCP server', {
    dbPath: config.dbPath,
    logLevel: config.logLevel,
  });

  const ctx = createContext(config);
  context = ctx;

  const status = ctx.timer.status();
  logger.info('Store ready', {
    profileId: ctx.state.currentProfileId,
    timer: status.state,
    elapsedSeconds: status.elapsedSeconds,
  });

  // Create MCP server
  const server = new Server(
    {
      name: 'timeledger-mcp',
      version: '0.1.0',
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  // Register tool listing handler
  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: getToolDefinitions(),
    };
  });

  // Register tool call handler
  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    logger.debug(`Tool call: ${name}`, args);

    try {
      const result = await handleToolCall(name, args ?? {}, ctx);
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
      if (isFatalError(error)) {
        fail(error);
      }
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

// The open entry, if any, stays open and is recovered on the next start
function shutdown(): void {
  logger.info('Shutting down...');
  if (context) {
    closeContext(context);
    context = null;
  }
  logger.info('Shutdown complete');
  process.exit(0);
}

function fail(error: unknown): void {
  logger.error('Fatal error', error);
  if (context) {
    closeContext(context);
    context = null;
  }
  process.exit(1);
}

// Register shutdown handlers
process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

// Run the server
main().catch(fail);
