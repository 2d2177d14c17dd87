/**
 * timer_start / timer_stop / timer_toggle / timer_status
 *
 * Thin wrappers over TimerEngine. Starting for an explicit profile also
 * selects it, so the next call without profile_id targets the same client.
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ToolResult } from '../types/index.js';
import type { AppContext } from '../services/context.js';
import { formatDuration } from '../utils/format.js';
import {
  idSchema,
  invalidInput,
  resolveProfileId,
  timestampArg,
  toEpochSeconds,
  toolFailure,
} from './shared.js';

const startSchema = z.object({
  profile_id: idSchema.optional(),
  project_id: idSchema.nullable().optional(),
  note: z.string().optional(),
  tags: z.array(z.string()).optional(),
  switch: z.boolean().optional().default(false),
});

const stopSchema = z.object({
  end: timestampArg.optional(),
});

const toggleSchema = startSchema.omit({ switch: true });

const startProperties = {
  profile_id: {
    type: 'number',
    description: 'Profile to track (defaults to the selected profile)',
  },
  project_id: {
    type: ['number', 'null'],
    description: 'Project of that profile (optional)',
  },
  note: {
    type: 'string',
    description: 'What is being worked on',
  },
  tags: {
    type: 'array',
    items: { type: 'string' },
    description: 'Tags for the entry; a tag must not contain a comma',
  },
};

export const timerStartTool: Tool = {
  name: 'timer_start',
  description:
    'Start tracking time. Fails with ALREADY_RUNNING while another timer runs, unless switch is true, which stops the running timer first.',
  inputSchema: {
    type: 'object',
    properties: {
      ...startProperties,
      switch: {
        type: 'boolean',
        description: 'Stop a running timer before starting (default: false)',
      },
    },
  },
};

export const timerStopTool: Tool = {
  name: 'timer_stop',
  description: 'Stop the running timer. Fails with NO_ACTIVE_ENTRY when nothing runs.',
  inputSchema: {
    type: 'object',
    properties: {
      end: {
        oneOf: [{ type: 'number' }, { type: 'string' }],
        description: 'End time: epoch seconds or "YYYY-MM-DD HH:MM:SS" (defaults to now)',
      },
    },
  },
};

export const timerToggleTool: Tool = {
  name: 'timer_toggle',
  description: 'Stop the timer if it runs, otherwise start it.',
  inputSchema: {
    type: 'object',
    properties: startProperties,
  },
};

export const timerStatusTool: Tool = {
  name: 'timer_status',
  description: 'Report whether a timer runs, the open entry and the elapsed time.',
  inputSchema: {
    type: 'object',
    properties: {},
  },
};

function selectIfGiven(ctx: AppContext, profileId: number | undefined): number {
  const id = resolveProfileId(ctx, profileId);
  if (profileId !== undefined) {
    ctx.state.selectProfile(profileId);
  }
  return id;
}

export async function timerStartHandler(
  args: Record<string, unknown>,
  ctx: AppContext
): Promise<ToolResult> {
  const parseResult = startSchema.safeParse(args);
  if (!parseResult.success) {
    return invalidInput(parseResult.error);
  }
  const input = parseResult.data;

  try {
    const profileId = selectIfGiven(ctx, input.profile_id);
    const options = { projectId: input.project_id, note: input.note, tags: input.tags };
    const entry = input.switch
      ? ctx.timer.switchTo(profileId, options)
      : ctx.timer.start(profileId, options);

    return {
      success: true,
      data: { entry, message: `Timer started for profile ${profileId}` },
    };
  } catch (error) {
    return toolFailure(error);
  }
}

export async function timerStopHandler(
  args: Record<string, unknown>,
  ctx: AppContext
): Promise<ToolResult> {
  const parseResult = stopSchema.safeParse(args);
  if (!parseResult.success) {
    return invalidInput(parseResult.error);
  }

  try {
    const { end } = parseResult.data;
    const endTs = end === undefined ? undefined : toEpochSeconds(end, 'end');
    const entry = ctx.timer.stop(endTs);
    const duration = (entry.endTs ?? entry.startTs) - entry.startTs;

    return {
      success: true,
      data: {
        entry,
        duration_seconds: duration,
        duration_formatted: formatDuration(duration),
        message: `Timer stopped after ${formatDuration(duration)}`,
      },
    };
  } catch (error) {
    return toolFailure(error);
  }
}

export async function timerToggleHandler(
  args: Record<string, unknown>,
  ctx: AppContext
): Promise<ToolResult> {
  const parseResult = toggleSchema.safeParse(args);
  if (!parseResult.success) {
    return invalidInput(parseResult.error);
  }
  const input = parseResult.data;

  try {
    // Stopping needs no profile selection
    const profileId = ctx.state.refreshActiveEntry()?.profileId ?? selectIfGiven(ctx, input.profile_id);
    const result = ctx.timer.toggle(profileId, {
      projectId: input.project_id,
      note: input.note,
      tags: input.tags,
    });

    return {
      success: true,
      data: { action: result.action, entry: result.entry },
    };
  } catch (error) {
    return toolFailure(error);
  }
}

export async function timerStatusHandler(
  _args: Record<string, unknown>,
  ctx: AppContext
): Promise<ToolResult> {
  try {
    const status = ctx.timer.status();
    return {
      success: true,
      data: {
        state: status.state,
        entry: status.entry,
        elapsed_seconds: status.elapsedSeconds,
        elapsed_formatted: formatDuration(status.elapsedSeconds),
        profile_id: ctx.state.currentProfileId,
      },
    };
  } catch (error) {
    return toolFailure(error);
  }
}
