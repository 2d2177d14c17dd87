/**
 * Todo tools for profiles, projects and profile services
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { TodoKind, ToolResult } from '../types/index.js';
import type { AppContext } from '../services/context.js';
import {
  TODO_KINDS,
  addTodo,
  deleteTodo,
  listTodos,
  setTodoCompleted,
} from '../services/store/index.js';
import { idSchema, invalidInput, toolFailure } from './shared.js';

const kindSchema = z.enum(TODO_KINDS);

// A todo change is a change of its parent's collection
function notifyParent(ctx: AppContext, kind: TodoKind): void {
  if (kind === 'profile_service') {
    ctx.state.notifyServicesUpdated();
  } else {
    ctx.state.notifyProfilesUpdated();
  }
}

const addSchema = z.object({
  kind: kindSchema,
  parent_id: idSchema,
  text: z.string(),
});

const completeSchema = z.object({
  kind: kindSchema,
  todo_id: idSchema,
  completed: z.boolean().optional().default(true),
});

const deleteSchema = z.object({
  kind: kindSchema,
  todo_id: idSchema,
});

const listSchema = z.object({
  kind: kindSchema,
  parent_id: idSchema,
  open_only: z.boolean().optional().default(false),
});

const kindProperty = {
  type: 'string',
  enum: [...TODO_KINDS],
  description: 'What the todo belongs to',
};

export const todoAddTool: Tool = {
  name: 'todo_add',
  description: 'Add a todo to a profile, project or profile service.',
  inputSchema: {
    type: 'object',
    properties: {
      kind: kindProperty,
      parent_id: { type: 'number', description: 'Id of the profile, project or profile service' },
      text: { type: 'string' },
    },
    required: ['kind', 'parent_id', 'text'],
  },
};

export const todoCompleteTool: Tool = {
  name: 'todo_complete',
  description: 'Mark a todo done (or not done with completed: false).',
  inputSchema: {
    type: 'object',
    properties: {
      kind: kindProperty,
      todo_id: { type: 'number' },
      completed: { type: 'boolean', description: 'Default: true' },
    },
    required: ['kind', 'todo_id'],
  },
};

export const todoDeleteTool: Tool = {
  name: 'todo_delete',
  description: 'Delete a todo.',
  inputSchema: {
    type: 'object',
    properties: {
      kind: kindProperty,
      todo_id: { type: 'number' },
    },
    required: ['kind', 'todo_id'],
  },
};

export const todoListTool: Tool = {
  name: 'todo_list',
  description: 'List todos of a profile, project or profile service, oldest first.',
  inputSchema: {
    type: 'object',
    properties: {
      kind: kindProperty,
      parent_id: { type: 'number' },
      open_only: { type: 'boolean', description: 'Hide completed todos' },
    },
    required: ['kind', 'parent_id'],
  },
};

export async function todoAddHandler(
  args: Record<string, unknown>,
  ctx: AppContext
): Promise<ToolResult> {
  const parseResult = addSchema.safeParse(args);
  if (!parseResult.success) {
    return invalidInput(parseResult.error);
  }
  const input = parseResult.data;

  try {
    const todo = addTodo(ctx.db, input.kind, input.parent_id, input.text, ctx.now());
    notifyParent(ctx, input.kind);
    return { success: true, data: { todo } };
  } catch (error) {
    return toolFailure(error);
  }
}

export async function todoCompleteHandler(
  args: Record<string, unknown>,
  ctx: AppContext
): Promise<ToolResult> {
  const parseResult = completeSchema.safeParse(args);
  if (!parseResult.success) {
    return invalidInput(parseResult.error);
  }
  const input = parseResult.data;

  try {
    const todo = setTodoCompleted(ctx.db, input.kind, input.todo_id, input.completed);
    notifyParent(ctx, input.kind);
    return { success: true, data: { todo } };
  } catch (error) {
    return toolFailure(error);
  }
}

export async function todoDeleteHandler(
  args: Record<string, unknown>,
  ctx: AppContext
): Promise<ToolResult> {
  const parseResult = deleteSchema.safeParse(args);
  if (!parseResult.success) {
    return invalidInput(parseResult.error);
  }
  const input = parseResult.data;

  try {
    deleteTodo(ctx.db, input.kind, input.todo_id);
    notifyParent(ctx, input.kind);
    return { success: true, data: { deleted: input.todo_id } };
  } catch (error) {
    return toolFailure(error);
  }
}

export async function todoListHandler(
  args: Record<string, unknown>,
  ctx: AppContext
): Promise<ToolResult> {
  const parseResult = listSchema.safeParse(args);
  if (!parseResult.success) {
    return invalidInput(parseResult.error);
  }
  const input = parseResult.data;

  try {
    const todos = listTodos(ctx.db, input.kind, input.parent_id).filter(
      (todo) => !input.open_only || !todo.completed
    );
    return { success: true, data: { todos, count: todos.length } };
  } catch (error) {
    return toolFailure(error);
  }
}
