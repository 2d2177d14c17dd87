/**
 * Time entry tools: list, add, update, delete
 *
 * Edits go straight to the store; StateCore is refreshed afterwards so an
 * edit or delete of the running entry reaches the timer.
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ToolResult } from '../types/index.js';
import type { AppContext } from '../services/context.js';
import {
  addManualEntry,
  deleteEntries,
  entryDuration,
  listEntries,
  updateEntry,
} from '../services/store/index.js';
import { formatDuration } from '../utils/format.js';
import { logger } from '../utils/logger.js';
import {
  idSchema,
  invalidInput,
  resolveProfileId,
  timestampArg,
  toEpochSeconds,
  toolFailure,
} from './shared.js';

const listSchema = z.object({
  profile_id: idSchema.optional(),
  project_id: idSchema.optional(),
  all_profiles: z.boolean().optional().default(false),
  from: timestampArg.optional(),
  to: timestampArg.optional(),
  limit: z.number().int().positive().optional(),
});

const addSchema = z.object({
  profile_id: idSchema.optional(),
  project_id: idSchema.nullable().optional(),
  start: timestampArg,
  end: timestampArg,
  note: z.string().optional(),
  tags: z.array(z.string()).optional(),
});

const updateSchema = z.object({
  entry_id: idSchema,
  profile_id: idSchema.optional(),
  project_id: idSchema.nullable().optional(),
  start: timestampArg.optional(),
  end: timestampArg.nullable().optional(),
  note: z.string().optional(),
  tags: z.array(z.string()).optional(),
});

const deleteSchema = z.object({
  entry_ids: z.array(idSchema).min(1, 'At least one entry id is required'),
});

const timestampProperty = {
  oneOf: [{ type: 'number' }, { type: 'string' }],
  description: 'Epoch seconds or "YYYY-MM-DD HH:MM:SS" (local time)',
};

export const entryListTool: Tool = {
  name: 'entry_list',
  description: 'List time entries, newest first, with durations. Open entries count up to now.',
  inputSchema: {
    type: 'object',
    properties: {
      profile_id: { type: 'number', description: 'Defaults to the selected profile' },
      project_id: { type: 'number' },
      all_profiles: { type: 'boolean', description: 'Ignore the profile filter' },
      from: { ...timestampProperty, description: 'Entries starting at or after this time' },
      to: { ...timestampProperty, description: 'Entries starting at or before this time' },
      limit: { type: 'number' },
    },
  },
};

export const entryAddTool: Tool = {
  name: 'entry_add',
  description: 'Record a finished time entry after the fact.',
  inputSchema: {
    type: 'object',
    properties: {
      profile_id: { type: 'number', description: 'Defaults to the selected profile' },
      project_id: { type: ['number', 'null'] },
      start: timestampProperty,
      end: timestampProperty,
      note: { type: 'string' },
      tags: {
        type: 'array',
        items: { type: 'string' },
        description: 'Tags for the entry; a tag must not contain a comma',
      },
    },
    required: ['start', 'end'],
  },
};

export const entryUpdateTool: Tool = {
  name: 'entry_update',
  description:
    'Edit a time entry. end: null re-opens it, which fails with CONFLICT while another entry is open.',
  inputSchema: {
    type: 'object',
    properties: {
      entry_id: { type: 'number' },
      profile_id: { type: 'number' },
      project_id: { type: ['number', 'null'] },
      start: timestampProperty,
      end: { oneOf: [{ type: 'number' }, { type: 'string' }, { type: 'null' }] },
      note: { type: 'string' },
      tags: {
        type: 'array',
        items: { type: 'string' },
        description: 'Tags for the entry; a tag must not contain a comma',
      },
    },
    required: ['entry_id'],
  },
};

export const entryDeleteTool: Tool = {
  name: 'entry_delete',
  description: 'Delete one or more time entries. Deleting the running entry stops the timer.',
  inputSchema: {
    type: 'object',
    properties: {
      entry_ids: { type: 'array', items: { type: 'number' } },
    },
    required: ['entry_ids'],
  },
};

function afterEntriesChanged(ctx: AppContext): void {
  ctx.state.refreshActiveEntry();
  ctx.state.notifyEntriesUpdated();
}

export async function entryListHandler(
  args: Record<string, unknown>,
  ctx: AppContext
): Promise<ToolResult> {
  const parseResult = listSchema.safeParse(args);
  if (!parseResult.success) {
    return invalidInput(parseResult.error);
  }
  const input = parseResult.data;

  try {
    const now = ctx.now();
    const entries = listEntries(ctx.db, {
      profileId: input.all_profiles ? undefined : resolveProfileId(ctx, input.profile_id),
      projectId: input.project_id,
      from: input.from === undefined ? undefined : toEpochSeconds(input.from, 'from'),
      to: input.to === undefined ? undefined : toEpochSeconds(input.to, 'to'),
      limit: input.limit,
    }).map((entry) => {
      const duration = entryDuration(entry, now);
      return { ...entry, duration_seconds: duration, duration_formatted: formatDuration(duration) };
    });

    const total = entries.reduce((sum, entry) => sum + entry.duration_seconds, 0);
    return {
      success: true,
      data: {
        entries,
        count: entries.length,
        total_seconds: total,
        total_formatted: formatDuration(total),
      },
    };
  } catch (error) {
    return toolFailure(error);
  }
}

export async function entryAddHandler(
  args: Record<string, unknown>,
  ctx: AppContext
): Promise<ToolResult> {
  const parseResult = addSchema.safeParse(args);
  if (!parseResult.success) {
    return invalidInput(parseResult.error);
  }
  const input = parseResult.data;

  try {
    const entry = addManualEntry(ctx.db, {
      profileId: resolveProfileId(ctx, input.profile_id),
      projectId: input.project_id,
      startTs: toEpochSeconds(input.start, 'start'),
      endTs: toEpochSeconds(input.end, 'end'),
      note: input.note,
      tags: input.tags,
    });
    afterEntriesChanged(ctx);

    logger.info('Manual entry added', { entryId: entry.id, profileId: entry.profileId });
    return { success: true, data: { entry } };
  } catch (error) {
    return toolFailure(error);
  }
}

export async function entryUpdateHandler(
  args: Record<string, unknown>,
  ctx: AppContext
): Promise<ToolResult> {
  const parseResult = updateSchema.safeParse(args);
  if (!parseResult.success) {
    return invalidInput(parseResult.error);
  }
  const input = parseResult.data;

  try {
    const entry = updateEntry(ctx.db, input.entry_id, {
      profileId: input.profile_id,
      projectId: input.project_id,
      startTs: input.start === undefined ? undefined : toEpochSeconds(input.start, 'start'),
      endTs:
        input.end === undefined || input.end === null ? input.end : toEpochSeconds(input.end, 'end'),
      note: input.note,
      tags: input.tags,
    });
    afterEntriesChanged(ctx);
    return { success: true, data: { entry } };
  } catch (error) {
    return toolFailure(error);
  }
}

export async function entryDeleteHandler(
  args: Record<string, unknown>,
  ctx: AppContext
): Promise<ToolResult> {
  const parseResult = deleteSchema.safeParse(args);
  if (!parseResult.success) {
    return invalidInput(parseResult.error);
  }
  const { entry_ids } = parseResult.data;

  try {
    const deleted = deleteEntries(ctx.db, entry_ids);
    afterEntriesChanged(ctx);

    logger.info(`Deleted ${deleted} time entries`);
    return { success: true, data: { deleted, requested: entry_ids.length } };
  } catch (error) {
    return toolFailure(error);
  }
}
