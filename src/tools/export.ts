/**
 * entries_export - write time entries to a CSV or JSON file
 */

import { z } from 'zod';
import { isAbsolute, resolve } from 'path';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ToolResult } from '../types/index.js';
import type { AppContext } from '../services/context.js';
import { EXPORT_FORMATS, exportEntries } from '../services/export/index.js';
import { idSchema, invalidInput, toolFailure } from './shared.js';

const inputSchema = z.object({
  format: z.enum(EXPORT_FORMATS).optional().default('csv'),
  output_path: z.string().min(1, 'Output path is required'),
  profile_id: idSchema.optional(),
  project_id: idSchema.optional(),
});

export const exportTool: Tool = {
  name: 'entries_export',
  description: `Export time entries to a file. CSV columns: profile, project, start, end, duration, note, tags. JSON: an array of entry records. Without filters every entry is exported; open entries are measured up to now.`,
  inputSchema: {
    type: 'object',
    properties: {
      format: {
        type: 'string',
        enum: [...EXPORT_FORMATS],
        description: 'Output format (default: csv)',
      },
      output_path: {
        type: 'string',
        description: 'File to write; relative paths resolve against the data directory',
      },
      profile_id: { type: 'number', description: 'Only this profile' },
      project_id: { type: 'number', description: 'Only this project' },
    },
    required: ['output_path'],
  },
};

export async function exportHandler(
  args: Record<string, unknown>,
  ctx: AppContext
): Promise<ToolResult> {
  const parseResult = inputSchema.safeParse(args);
  if (!parseResult.success) {
    return invalidInput(parseResult.error);
  }
  const input = parseResult.data;

  try {
    const outputPath = isAbsolute(input.output_path)
      ? input.output_path
      : resolve(ctx.config.dataDir, input.output_path);

    const result = await exportEntries(
      ctx.db,
      {
        format: input.format,
        outputPath,
        profileId: input.profile_id,
        projectId: input.project_id,
      },
      ctx.now()
    );

    return {
      success: true,
      data: {
        format: result.format,
        output_path: result.outputPath,
        entry_count: result.entryCount,
        message: `Exported ${result.entryCount} entries to ${result.outputPath}`,
      },
    };
  } catch (error) {
    return toolFailure(error);
  }
}
