/**
 * report_weekly / report_progress / report_billing
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ToolResult } from '../types/index.js';
import type { AppContext } from '../services/context.js';
import { billingSummary, profileProgress, weeklySummary } from '../services/reports/index.js';
import { formatDuration } from '../utils/format.js';
import { idSchema, invalidInput, resolveProfileId, toolFailure } from './shared.js';

const profileSchema = z.object({
  profile_id: idSchema.optional(),
});

const weeklySchema = z.object({
  limit: z.number().int().positive().optional(),
});

export const reportWeeklyTool: Tool = {
  name: 'report_weekly',
  description: 'Tracked time per calendar week (Monday-based) over closed entries, newest week first.',
  inputSchema: {
    type: 'object',
    properties: {
      limit: { type: 'number', description: 'Number of weeks to return' },
    },
  },
};

export const reportProgressTool: Tool = {
  name: 'report_progress',
  description: 'Time tracked for a profile against its target. A running entry counts up to now.',
  inputSchema: {
    type: 'object',
    properties: {
      profile_id: { type: 'number', description: 'Defaults to the selected profile' },
    },
  },
};

export const reportBillingTool: Tool = {
  name: 'report_billing',
  description: 'Billable amount per project of a profile, from the hourly rate of its service.',
  inputSchema: {
    type: 'object',
    properties: {
      profile_id: { type: 'number', description: 'Defaults to the selected profile' },
    },
  },
};

export async function reportWeeklyHandler(
  args: Record<string, unknown>,
  ctx: AppContext
): Promise<ToolResult> {
  const parseResult = weeklySchema.safeParse(args);
  if (!parseResult.success) {
    return invalidInput(parseResult.error);
  }
  const { limit } = parseResult.data;

  try {
    const weeks = weeklySummary(ctx.db);
    return {
      success: true,
      data: { weeks: limit === undefined ? weeks : weeks.slice(0, limit) },
    };
  } catch (error) {
    return toolFailure(error);
  }
}

export async function reportProgressHandler(
  args: Record<string, unknown>,
  ctx: AppContext
): Promise<ToolResult> {
  const parseResult = profileSchema.safeParse(args);
  if (!parseResult.success) {
    return invalidInput(parseResult.error);
  }

  try {
    const progress = profileProgress(
      ctx.db,
      resolveProfileId(ctx, parseResult.data.profile_id),
      ctx.now()
    );
    return {
      success: true,
      data: {
        ...progress,
        target_formatted:
          progress.targetSeconds === null ? null : formatDuration(progress.targetSeconds),
        percent: progress.ratio === null ? null : Math.round(progress.ratio * 100),
      },
    };
  } catch (error) {
    return toolFailure(error);
  }
}

export async function reportBillingHandler(
  args: Record<string, unknown>,
  ctx: AppContext
): Promise<ToolResult> {
  const parseResult = profileSchema.safeParse(args);
  if (!parseResult.success) {
    return invalidInput(parseResult.error);
  }

  try {
    const summary = billingSummary(
      ctx.db,
      resolveProfileId(ctx, parseResult.data.profile_id),
      ctx.now()
    );
    return { success: true, data: summary };
  } catch (error) {
    return toolFailure(error);
  }
}
