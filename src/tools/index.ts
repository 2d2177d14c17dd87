/**
 * Tool registration and dispatch
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ToolResult } from '../types/index.js';
import type { AppContext } from '../services/context.js';
import type { ToolHandler } from './shared.js';

// Import tool handlers
import {
  timerStartTool,
  timerStartHandler,
  timerStopTool,
  timerStopHandler,
  timerToggleTool,
  timerToggleHandler,
  timerStatusTool,
  timerStatusHandler,
} from './timer.js';
import {
  profileSelectTool,
  profileSelectHandler,
  profileCreateTool,
  profileCreateHandler,
  profileUpdateTool,
  profileUpdateHandler,
  profileDeleteTool,
  profileDeleteHandler,
  profileListTool,
  profileListHandler,
} from './profiles.js';
import {
  projectCreateTool,
  projectCreateHandler,
  projectUpdateTool,
  projectUpdateHandler,
  projectDeleteTool,
  projectDeleteHandler,
  projectListTool,
  projectListHandler,
} from './projects.js';
import {
  serviceCreateTool,
  serviceCreateHandler,
  serviceUpdateTool,
  serviceUpdateHandler,
  serviceDeleteTool,
  serviceDeleteHandler,
  serviceListTool,
  serviceListHandler,
  profileServiceAddTool,
  profileServiceAddHandler,
  profileServiceRemoveTool,
  profileServiceRemoveHandler,
  profileServiceListTool,
  profileServiceListHandler,
} from './services.js';
import {
  todoAddTool,
  todoAddHandler,
  todoCompleteTool,
  todoCompleteHandler,
  todoDeleteTool,
  todoDeleteHandler,
  todoListTool,
  todoListHandler,
} from './todos.js';
import {
  entryListTool,
  entryListHandler,
  entryAddTool,
  entryAddHandler,
  entryUpdateTool,
  entryUpdateHandler,
  entryDeleteTool,
  entryDeleteHandler,
} from './entries.js';
import { exportTool, exportHandler } from './export.js';
import {
  reportWeeklyTool,
  reportWeeklyHandler,
  reportProgressTool,
  reportProgressHandler,
  reportBillingTool,
  reportBillingHandler,
} from './reports.js';

// Tool registry
const tools: Map<string, Tool> = new Map();
const handlers: Map<string, ToolHandler> = new Map();

function register(tool: Tool, handler: ToolHandler): void {
  tools.set(tool.name, tool);
  handlers.set(tool.name, handler);
}

/**
 * Register all tools
 */
export function registerTools(): void {
  // Timer
  register(timerStartTool, timerStartHandler);
  register(timerStopTool, timerStopHandler);
  register(timerToggleTool, timerToggleHandler);
  register(timerStatusTool, timerStatusHandler);

  // Profiles
  register(profileSelectTool, profileSelectHandler);
  register(profileCreateTool, profileCreateHandler);
  register(profileUpdateTool, profileUpdateHandler);
  register(profileDeleteTool, profileDeleteHandler);
  register(profileListTool, profileListHandler);

  // Projects
  register(projectCreateTool, projectCreateHandler);
  register(projectUpdateTool, projectUpdateHandler);
  register(projectDeleteTool, projectDeleteHandler);
  register(projectListTool, projectListHandler);

  // Service catalog and profile services
  register(serviceCreateTool, serviceCreateHandler);
  register(serviceUpdateTool, serviceUpdateHandler);
  register(serviceDeleteTool, serviceDeleteHandler);
  register(serviceListTool, serviceListHandler);
  register(profileServiceAddTool, profileServiceAddHandler);
  register(profileServiceRemoveTool, profileServiceRemoveHandler);
  register(profileServiceListTool, profileServiceListHandler);

  // Todos
  register(todoAddTool, todoAddHandler);
  register(todoCompleteTool, todoCompleteHandler);
  register(todoDeleteTool, todoDeleteHandler);
  register(todoListTool, todoListHandler);

  // Time entries
  register(entryListTool, entryListHandler);
  register(entryAddTool, entryAddHandler);
  register(entryUpdateTool, entryUpdateHandler);
  register(entryDeleteTool, entryDeleteHandler);
  register(exportTool, exportHandler);

  // Reports
  register(reportWeeklyTool, reportWeeklyHandler);
  register(reportProgressTool, reportProgressHandler);
  register(reportBillingTool, reportBillingHandler);
}

/**
 * Get all tool definitions
 */
export function getToolDefinitions(): Tool[] {
  if (tools.size === 0) {
    registerTools();
  }
  return Array.from(tools.values());
}

/**
 * Handle a tool call
 */
export async function handleToolCall(
  name: string,
  args: Record<string, unknown>,
  ctx: AppContext
): Promise<ToolResult> {
  if (handlers.size === 0) {
    registerTools();
  }

  const handler = handlers.get(name);
  if (!handler) {
    return {
      success: false,
      error: `Unknown tool: ${name}`,
      code: 'UNKNOWN_TOOL',
    };
  }

  return handler(args, ctx);
}

export type { ToolHandler } from './shared.js';
