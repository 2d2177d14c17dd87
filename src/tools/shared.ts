/**
 * Helpers shared by tool handlers
 */

import { z } from 'zod';
import type { AppContext } from '../services/context.js';
import type { ToolError, ToolResult } from '../types/index.js';
import { describeError, isFatalError, ValidationError } from '../utils/errors.js';
import { parseTimestamp } from '../utils/format.js';

export type ToolHandler = (args: Record<string, unknown>, ctx: AppContext) => Promise<ToolResult>;

export const idSchema = z.number().int().positive();

// Epoch seconds, or "YYYY-MM-DD HH:MM:SS" in local time
export const timestampArg = z.union([z.number().int().nonnegative(), z.string()]);

export function invalidInput(error: z.ZodError): ToolError {
  return {
    success: false,
    error: error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '),
    code: 'VALIDATION_ERROR',
  };
}

/**
 * Convert a thrown error into a tool error. Fatal errors are not results.
 */
export function toolFailure(error: unknown): ToolError {
  if (isFatalError(error)) {
    throw error;
  }
  return { success: false, ...describeError(error) };
}

export function toEpochSeconds(value: number | string, field: string): number {
  if (typeof value === 'number') return value;
  const ts = parseTimestamp(value);
  if (ts === null) {
    throw new ValidationError(`${field}: expected epoch seconds or "YYYY-MM-DD HH:MM:SS"`);
  }
  return ts;
}

/**
 * An explicit profile id, else the selected profile
 */
export function resolveProfileId(ctx: AppContext, profileId: number | undefined): number {
  const id = profileId ?? ctx.state.currentProfileId;
  if (id === null) {
    throw new ValidationError('No profile selected; pass profile_id or call profile_select');
  }
  return id;
}
