/**
 * Service catalog tools and services attached to profiles
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ToolResult } from '../types/index.js';
import type { AppContext } from '../services/context.js';
import {
  addProfileService,
  createService,
  deleteProfileService,
  deleteService,
  listProfileServices,
  listServices,
  updateService,
} from '../services/store/index.js';
import { ValidationError } from '../utils/errors.js';
import { formatRate, parseRateInput, parseTimeInput } from '../utils/format.js';
import { logger } from '../utils/logger.js';
import { idSchema, invalidInput, resolveProfileId, toolFailure } from './shared.js';

// "85,50", "85.50 €" or a number of euros
const rateArg = z.union([z.string(), z.number().nonnegative()]);

const createSchema = z.object({
  name: z.string(),
  rate: rateArg,
  estimate: z.string().nullable().optional(),
});

const updateSchema = z.object({
  service_id: idSchema,
  name: z.string().optional(),
  rate: rateArg.optional(),
  estimate: z.string().nullable().optional(),
});

const serviceIdSchema = z.object({
  service_id: idSchema,
});

const attachSchema = z.object({
  profile_id: idSchema.optional(),
  service_id: idSchema,
  notes: z.string().nullable().optional(),
});

const detachSchema = z.object({
  profile_service_id: idSchema,
});

const profileSchema = z.object({
  profile_id: idSchema.optional(),
});

const rateProperty = {
  oneOf: [{ type: 'string' }, { type: 'number' }],
  description: 'Hourly rate: "85,50", "85.50 €" or a number of euros',
};

const estimateProperty = {
  type: 'string',
  description: 'Estimated time as HH:MM or whole hours',
};

export const serviceCreateTool: Tool = {
  name: 'service_create',
  description: 'Add a billable service with an hourly rate to the catalog.',
  inputSchema: {
    type: 'object',
    properties: {
      name: { type: 'string' },
      rate: rateProperty,
      estimate: estimateProperty,
    },
    required: ['name', 'rate'],
  },
};

export const serviceUpdateTool: Tool = {
  name: 'service_update',
  description: 'Rename a service or change its rate or estimate.',
  inputSchema: {
    type: 'object',
    properties: {
      service_id: { type: 'number' },
      name: { type: 'string' },
      rate: rateProperty,
      estimate: estimateProperty,
    },
    required: ['service_id'],
  },
};

export const serviceDeleteTool: Tool = {
  name: 'service_delete',
  description: 'Remove a service. Projects keep existing without it; profile attachments are removed.',
  inputSchema: {
    type: 'object',
    properties: {
      service_id: { type: 'number' },
    },
    required: ['service_id'],
  },
};

export const serviceListTool: Tool = {
  name: 'service_list',
  description: 'List the service catalog by name.',
  inputSchema: {
    type: 'object',
    properties: {},
  },
};

export const profileServiceAddTool: Tool = {
  name: 'profile_service_add',
  description: 'Attach a catalog service to a profile.',
  inputSchema: {
    type: 'object',
    properties: {
      profile_id: { type: 'number', description: 'Defaults to the selected profile' },
      service_id: { type: 'number' },
      notes: { type: 'string' },
    },
    required: ['service_id'],
  },
};

export const profileServiceRemoveTool: Tool = {
  name: 'profile_service_remove',
  description: 'Detach a service from a profile, with its todos.',
  inputSchema: {
    type: 'object',
    properties: {
      profile_service_id: { type: 'number' },
    },
    required: ['profile_service_id'],
  },
};

export const profileServiceListTool: Tool = {
  name: 'profile_service_list',
  description: 'List the services attached to a profile.',
  inputSchema: {
    type: 'object',
    properties: {
      profile_id: { type: 'number', description: 'Defaults to the selected profile' },
    },
  },
};

export function toRateCents(rate: string | number): number {
  if (typeof rate === 'number') {
    return Math.round(rate * 100);
  }
  const cents = parseRateInput(rate);
  if (cents === null) {
    throw new ValidationError(`rate: cannot parse "${rate}"`);
  }
  return cents;
}

function toEstimateSeconds(estimate: string | null | undefined): number | null | undefined {
  if (estimate === undefined || estimate === null) return estimate;
  const seconds = parseTimeInput(estimate);
  if (seconds === null) {
    throw new ValidationError(`estimate: expected HH:MM or whole hours, got "${estimate}"`);
  }
  return seconds;
}

export async function serviceCreateHandler(
  args: Record<string, unknown>,
  ctx: AppContext
): Promise<ToolResult> {
  const parseResult = createSchema.safeParse(args);
  if (!parseResult.success) {
    return invalidInput(parseResult.error);
  }
  const input = parseResult.data;

  try {
    const service = createService(ctx.db, {
      name: input.name,
      rateCents: toRateCents(input.rate),
      estimatedSeconds: toEstimateSeconds(input.estimate),
    });
    ctx.state.notifyServicesUpdated();
    logger.info(`Service created: ${service.name}`, { serviceId: service.id });

    return {
      success: true,
      data: { service, rate_formatted: formatRate(service.rateCents) },
    };
  } catch (error) {
    return toolFailure(error);
  }
}

export async function serviceUpdateHandler(
  args: Record<string, unknown>,
  ctx: AppContext
): Promise<ToolResult> {
  const parseResult = updateSchema.safeParse(args);
  if (!parseResult.success) {
    return invalidInput(parseResult.error);
  }
  const input = parseResult.data;

  try {
    const service = updateService(ctx.db, input.service_id, {
      name: input.name,
      rateCents: input.rate === undefined ? undefined : toRateCents(input.rate),
      estimatedSeconds: toEstimateSeconds(input.estimate),
    });
    ctx.state.notifyServicesUpdated();

    return {
      success: true,
      data: { service, rate_formatted: formatRate(service.rateCents) },
    };
  } catch (error) {
    return toolFailure(error);
  }
}

export async function serviceDeleteHandler(
  args: Record<string, unknown>,
  ctx: AppContext
): Promise<ToolResult> {
  const parseResult = serviceIdSchema.safeParse(args);
  if (!parseResult.success) {
    return invalidInput(parseResult.error);
  }
  const { service_id } = parseResult.data;

  try {
    deleteService(ctx.db, service_id);
    ctx.state.notifyServicesUpdated();
    return { success: true, data: { deleted: service_id } };
  } catch (error) {
    return toolFailure(error);
  }
}

export async function serviceListHandler(
  _args: Record<string, unknown>,
  ctx: AppContext
): Promise<ToolResult> {
  try {
    const services = listServices(ctx.db).map((service) => ({
      ...service,
      rate_formatted: formatRate(service.rateCents),
    }));
    return { success: true, data: { services, count: services.length } };
  } catch (error) {
    return toolFailure(error);
  }
}

export async function profileServiceAddHandler(
  args: Record<string, unknown>,
  ctx: AppContext
): Promise<ToolResult> {
  const parseResult = attachSchema.safeParse(args);
  if (!parseResult.success) {
    return invalidInput(parseResult.error);
  }
  const input = parseResult.data;

  try {
    const profileService = addProfileService(
      ctx.db,
      {
        profileId: resolveProfileId(ctx, input.profile_id),
        serviceId: input.service_id,
        notes: input.notes,
      },
      ctx.now()
    );
    ctx.state.notifyServicesUpdated();
    return { success: true, data: { profile_service: profileService } };
  } catch (error) {
    return toolFailure(error);
  }
}

export async function profileServiceRemoveHandler(
  args: Record<string, unknown>,
  ctx: AppContext
): Promise<ToolResult> {
  const parseResult = detachSchema.safeParse(args);
  if (!parseResult.success) {
    return invalidInput(parseResult.error);
  }
  const { profile_service_id } = parseResult.data;

  try {
    deleteProfileService(ctx.db, profile_service_id);
    ctx.state.notifyServicesUpdated();
    return { success: true, data: { deleted: profile_service_id } };
  } catch (error) {
    return toolFailure(error);
  }
}

export async function profileServiceListHandler(
  args: Record<string, unknown>,
  ctx: AppContext
): Promise<ToolResult> {
  const parseResult = profileSchema.safeParse(args);
  if (!parseResult.success) {
    return invalidInput(parseResult.error);
  }

  try {
    const profileId = resolveProfileId(ctx, parseResult.data.profile_id);
    const profileServices = listProfileServices(ctx.db, profileId);
    return {
      success: true,
      data: { profile_id: profileId, profile_services: profileServices, count: profileServices.length },
    };
  } catch (error) {
    return toolFailure(error);
  }
}
