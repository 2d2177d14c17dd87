/**
 * Profile tools: select, create, update, delete, list
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ToolResult } from '../types/index.js';
import type { AppContext } from '../services/context.js';
import {
  createProfile,
  deleteProfile,
  listProfiles,
  requireProfile,
  updateProfile,
  type UpdateProfileInput,
} from '../services/store/index.js';
import { ValidationError } from '../utils/errors.js';
import { parseTimeInput } from '../utils/format.js';
import { logger } from '../utils/logger.js';
import { idSchema, invalidInput, toolFailure } from './shared.js';

const contactSchema = z.object({
  color: z.string().nullable().optional(),
  target: z.string().nullable().optional(),
  company: z.string().nullable().optional(),
  contact_person: z.string().nullable().optional(),
  email: z.string().nullable().optional(),
  phone: z.string().nullable().optional(),
  business_address: z.string().nullable().optional(),
  notes: z.string().nullable().optional(),
});

const selectSchema = z.object({
  profile_id: idSchema.nullable(),
});

const createSchema = contactSchema.extend({
  name: z.string(),
});

const updateSchema = contactSchema.extend({
  profile_id: idSchema,
  name: z.string().optional(),
  archived: z.boolean().optional(),
});

const deleteSchema = z.object({
  profile_id: idSchema,
});

const listSchema = z.object({
  include_archived: z.boolean().optional().default(false),
});

const contactProperties = {
  color: { type: 'string', description: 'Display color, e.g. #3b82f6' },
  target: { type: 'string', description: 'Target time as HH:MM or whole hours' },
  company: { type: 'string' },
  contact_person: { type: 'string' },
  email: { type: 'string' },
  phone: { type: 'string' },
  business_address: { type: 'string' },
  notes: { type: 'string' },
};

export const profileSelectTool: Tool = {
  name: 'profile_select',
  description: 'Select the current profile (null clears the selection). The choice survives restarts.',
  inputSchema: {
    type: 'object',
    properties: {
      profile_id: { type: ['number', 'null'], description: 'Profile id' },
    },
    required: ['profile_id'],
  },
};

export const profileCreateTool: Tool = {
  name: 'profile_create',
  description: 'Create a profile (client). Names are unique.',
  inputSchema: {
    type: 'object',
    properties: {
      name: { type: 'string', description: 'Profile name' },
      ...contactProperties,
    },
    required: ['name'],
  },
};

export const profileUpdateTool: Tool = {
  name: 'profile_update',
  description: 'Update profile fields, or archive/unarchive it. Only given fields change.',
  inputSchema: {
    type: 'object',
    properties: {
      profile_id: { type: 'number' },
      name: { type: 'string' },
      archived: { type: 'boolean' },
      ...contactProperties,
    },
    required: ['profile_id'],
  },
};

export const profileDeleteTool: Tool = {
  name: 'profile_delete',
  description:
    'Delete a profile with its projects, entries, services and todos. A running timer of that profile disappears with it.',
  inputSchema: {
    type: 'object',
    properties: {
      profile_id: { type: 'number' },
    },
    required: ['profile_id'],
  },
};

export const profileListTool: Tool = {
  name: 'profile_list',
  description: 'List profiles by name.',
  inputSchema: {
    type: 'object',
    properties: {
      include_archived: { type: 'boolean', description: 'Include archived profiles (default: false)' },
    },
  },
};

function parseTarget(target: string | null | undefined): number | null | undefined {
  if (target === undefined || target === null) return target;
  const seconds = parseTimeInput(target);
  if (seconds === null) {
    throw new ValidationError(`target: expected HH:MM or whole hours, got "${target}"`);
  }
  return seconds;
}

// Undefined fields are left untouched by the store
function toProfileFields(
  input: z.infer<typeof contactSchema>
): Omit<UpdateProfileInput, 'name' | 'archived'> {
  return {
    color: input.color,
    targetSeconds: parseTarget(input.target),
    company: input.company,
    contactPerson: input.contact_person,
    email: input.email,
    phone: input.phone,
    businessAddress: input.business_address,
    notes: input.notes,
  };
}

export async function profileSelectHandler(
  args: Record<string, unknown>,
  ctx: AppContext
): Promise<ToolResult> {
  const parseResult = selectSchema.safeParse(args);
  if (!parseResult.success) {
    return invalidInput(parseResult.error);
  }

  try {
    const { profile_id } = parseResult.data;
    ctx.state.selectProfile(profile_id);
    return {
      success: true,
      data: {
        profile: profile_id === null ? null : requireProfile(ctx.db, profile_id),
      },
    };
  } catch (error) {
    return toolFailure(error);
  }
}

export async function profileCreateHandler(
  args: Record<string, unknown>,
  ctx: AppContext
): Promise<ToolResult> {
  const parseResult = createSchema.safeParse(args);
  if (!parseResult.success) {
    return invalidInput(parseResult.error);
  }
  const input = parseResult.data;

  try {
    const profile = createProfile(ctx.db, { name: input.name, ...toProfileFields(input) });
    ctx.state.notifyProfilesUpdated();
    logger.info(`Profile created: ${profile.name}`, { profileId: profile.id });
    return { success: true, data: { profile } };
  } catch (error) {
    return toolFailure(error);
  }
}

export async function profileUpdateHandler(
  args: Record<string, unknown>,
  ctx: AppContext
): Promise<ToolResult> {
  const parseResult = updateSchema.safeParse(args);
  if (!parseResult.success) {
    return invalidInput(parseResult.error);
  }
  const input = parseResult.data;

  try {
    const profile = updateProfile(ctx.db, input.profile_id, {
      name: input.name,
      archived: input.archived,
      ...toProfileFields(input),
    });
    ctx.state.notifyProfilesUpdated();
    return { success: true, data: { profile } };
  } catch (error) {
    return toolFailure(error);
  }
}

export async function profileDeleteHandler(
  args: Record<string, unknown>,
  ctx: AppContext
): Promise<ToolResult> {
  const parseResult = deleteSchema.safeParse(args);
  if (!parseResult.success) {
    return invalidInput(parseResult.error);
  }
  const { profile_id } = parseResult.data;

  try {
    deleteProfile(ctx.db, profile_id);

    // The cascade may have removed the open entry and the selection
    ctx.state.refreshActiveEntry();
    ctx.state.reconcileProfile();
    ctx.state.notifyProfilesUpdated();
    ctx.state.notifyEntriesUpdated();

    logger.info(`Profile deleted: ${profile_id}`);
    return { success: true, data: { deleted: profile_id } };
  } catch (error) {
    return toolFailure(error);
  }
}

export async function profileListHandler(
  args: Record<string, unknown>,
  ctx: AppContext
): Promise<ToolResult> {
  const parseResult = listSchema.safeParse(args);
  if (!parseResult.success) {
    return invalidInput(parseResult.error);
  }

  try {
    const profiles = listProfiles(ctx.db, { includeArchived: parseResult.data.include_archived });
    return {
      success: true,
      data: {
        profiles,
        selected_profile_id: ctx.state.currentProfileId,
        count: profiles.length,
      },
    };
  } catch (error) {
    return toolFailure(error);
  }
}
