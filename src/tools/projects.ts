/**
 * Project tools: create, update, delete, list
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ToolResult } from '../types/index.js';
import type { AppContext } from '../services/context.js';
import {
  createProject,
  deleteProject,
  listProjects,
  updateProject,
  type UpdateProjectInput,
} from '../services/store/index.js';
import { ValidationError } from '../utils/errors.js';
import { parseTimeInput } from '../utils/format.js';
import { logger } from '../utils/logger.js';
import {
  idSchema,
  invalidInput,
  resolveProfileId,
  timestampArg,
  toEpochSeconds,
  toolFailure,
} from './shared.js';

const fieldsSchema = z.object({
  estimate: z.string().nullable().optional(),
  service_id: idSchema.nullable().optional(),
  deadline: timestampArg.nullable().optional(),
  start_date: timestampArg.nullable().optional(),
  invoice_sent: z.boolean().optional(),
  invoice_paid: z.boolean().optional(),
  notes: z.string().nullable().optional(),
});

const createSchema = fieldsSchema.extend({
  profile_id: idSchema.optional(),
  name: z.string(),
});

const updateSchema = fieldsSchema.extend({
  project_id: idSchema,
  name: z.string().optional(),
});

const deleteSchema = z.object({
  project_id: idSchema,
});

const listSchema = z.object({
  profile_id: idSchema.optional(),
  all_profiles: z.boolean().optional().default(false),
});

const fieldProperties = {
  estimate: { type: 'string', description: 'Estimated time as HH:MM or whole hours' },
  service_id: { type: ['number', 'null'], description: 'Billable service of the project' },
  deadline: {
    oneOf: [{ type: 'number' }, { type: 'string' }, { type: 'null' }],
    description: 'Epoch seconds or "YYYY-MM-DD HH:MM:SS"',
  },
  start_date: {
    oneOf: [{ type: 'number' }, { type: 'string' }, { type: 'null' }],
    description: 'Epoch seconds or "YYYY-MM-DD HH:MM:SS"',
  },
  invoice_sent: { type: 'boolean' },
  invoice_paid: { type: 'boolean' },
  notes: { type: 'string' },
};

export const projectCreateTool: Tool = {
  name: 'project_create',
  description: 'Create a project under a profile, optionally linked to a billable service.',
  inputSchema: {
    type: 'object',
    properties: {
      profile_id: { type: 'number', description: 'Defaults to the selected profile' },
      name: { type: 'string' },
      ...fieldProperties,
    },
    required: ['name'],
  },
};

export const projectUpdateTool: Tool = {
  name: 'project_update',
  description: 'Update project fields. Only given fields change; null clears a field.',
  inputSchema: {
    type: 'object',
    properties: {
      project_id: { type: 'number' },
      name: { type: 'string' },
      ...fieldProperties,
    },
    required: ['project_id'],
  },
};

export const projectDeleteTool: Tool = {
  name: 'project_delete',
  description: 'Delete a project and its todos. Its time entries are kept without a project.',
  inputSchema: {
    type: 'object',
    properties: {
      project_id: { type: 'number' },
    },
    required: ['project_id'],
  },
};

export const projectListTool: Tool = {
  name: 'project_list',
  description: 'List projects of a profile (or of all profiles), newest first.',
  inputSchema: {
    type: 'object',
    properties: {
      profile_id: { type: 'number', description: 'Defaults to the selected profile' },
      all_profiles: { type: 'boolean', description: 'List projects of every profile' },
    },
  },
};

function optionalTimestamp(
  value: number | string | null | undefined,
  field: string
): number | null | undefined {
  if (value === undefined || value === null) return value;
  return toEpochSeconds(value, field);
}

function toProjectFields(input: z.infer<typeof fieldsSchema>): Omit<UpdateProjectInput, 'name'> {
  let estimatedSeconds: number | null | undefined = input.estimate === null ? null : undefined;
  if (input.estimate) {
    const seconds = parseTimeInput(input.estimate);
    if (seconds === null) {
      throw new ValidationError(`estimate: expected HH:MM or whole hours, got "${input.estimate}"`);
    }
    estimatedSeconds = seconds;
  }

  return {
    estimatedSeconds,
    serviceId: input.service_id,
    deadlineTs: optionalTimestamp(input.deadline, 'deadline'),
    startDateTs: optionalTimestamp(input.start_date, 'start_date'),
    invoiceSent: input.invoice_sent,
    invoicePaid: input.invoice_paid,
    notes: input.notes,
  };
}

export async function projectCreateHandler(
  args: Record<string, unknown>,
  ctx: AppContext
): Promise<ToolResult> {
  const parseResult = createSchema.safeParse(args);
  if (!parseResult.success) {
    return invalidInput(parseResult.error);
  }
  const input = parseResult.data;

  try {
    const project = createProject(
      ctx.db,
      {
        profileId: resolveProfileId(ctx, input.profile_id),
        name: input.name,
        ...toProjectFields(input),
      },
      ctx.now()
    );
    ctx.state.notifyProfilesUpdated();
    logger.info(`Project created: ${project.name}`, { projectId: project.id });
    return { success: true, data: { project } };
  } catch (error) {
    return toolFailure(error);
  }
}

export async function projectUpdateHandler(
  args: Record<string, unknown>,
  ctx: AppContext
): Promise<ToolResult> {
  const parseResult = updateSchema.safeParse(args);
  if (!parseResult.success) {
    return invalidInput(parseResult.error);
  }
  const input = parseResult.data;

  try {
    const project = updateProject(ctx.db, input.project_id, {
      name: input.name,
      ...toProjectFields(input),
    });
    ctx.state.notifyProfilesUpdated();
    return { success: true, data: { project } };
  } catch (error) {
    return toolFailure(error);
  }
}

export async function projectDeleteHandler(
  args: Record<string, unknown>,
  ctx: AppContext
): Promise<ToolResult> {
  const parseResult = deleteSchema.safeParse(args);
  if (!parseResult.success) {
    return invalidInput(parseResult.error);
  }
  const { project_id } = parseResult.data;

  try {
    deleteProject(ctx.db, project_id);

    // A running entry may have lost its project
    ctx.state.refreshActiveEntry();
    ctx.state.notifyProfilesUpdated();
    ctx.state.notifyEntriesUpdated();
    return { success: true, data: { deleted: project_id } };
  } catch (error) {
    return toolFailure(error);
  }
}

export async function projectListHandler(
  args: Record<string, unknown>,
  ctx: AppContext
): Promise<ToolResult> {
  const parseResult = listSchema.safeParse(args);
  if (!parseResult.success) {
    return invalidInput(parseResult.error);
  }
  const input = parseResult.data;

  try {
    const projects = input.all_profiles
      ? listProjects(ctx.db)
      : listProjects(ctx.db, { profileId: resolveProfileId(ctx, input.profile_id) });
    return { success: true, data: { projects, count: projects.length } };
  } catch (error) {
    return toolFailure(error);
  }
}
