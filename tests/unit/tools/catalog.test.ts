/**
 * Tests for profile, service, project and todo tools
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../../../src/utils/logger.js', () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

import { handleToolCall } from '../../../src/tools/index.js';
import { closeContext, type AppContext } from '../../../src/services/context.js';
import { createProfile, createService, getEntry } from '../../../src/services/store/index.js';
import type { ToolResult } from '../../../src/types/index.js';
import { FakeClock, T0, createTestContext } from '../../helpers.js';

describe('catalog tools', () => {
  let ctx: AppContext;

  function call(name: string, args: Record<string, unknown> = {}): Promise<ToolResult> {
    return handleToolCall(name, args, ctx);
  }

  beforeEach(() => {
    ctx = createTestContext({ clock: new FakeClock() });
  });

  afterEach(() => {
    closeContext(ctx);
  });

  describe('profiles', () => {
    it('creates a profile and announces it', async () => {
      const updates = vi.fn();
      ctx.state.on('profilesUpdated', updates);

      expect(
        await call('profile_create', { name: 'Acme', target: '10:00', email: 'billing@example.com' })
      ).toMatchObject({
        success: true,
        data: {
          profile: { id: 1, name: 'Acme', targetSeconds: 36_000, email: 'billing@example.com' },
        },
      });
      expect(updates).toHaveBeenCalledTimes(1);
    });

    it('reports bad targets and duplicate names', async () => {
      expect(await call('profile_create', { name: 'Acme', target: 'soon' })).toEqual({
        success: false,
        error: 'target: expected HH:MM or whole hours, got "soon"',
        code: 'VALIDATION_ERROR',
      });

      await call('profile_create', { name: 'Acme' });
      expect(await call('profile_create', { name: 'Acme' })).toEqual({
        success: false,
        error: 'Profile already exists: Acme',
        code: 'UNIQUE_CONSTRAINT',
      });
    });

    it('selects, archives and lists profiles', async () => {
      await call('profile_create', { name: 'Acme' });
      await call('profile_create', { name: 'Globex' });

      expect(await call('profile_select', { profile_id: 2 })).toMatchObject({
        success: true,
        data: { profile: { id: 2, name: 'Globex' } },
      });
      await call('profile_update', { profile_id: 1, archived: true });

      expect(await call('profile_list')).toMatchObject({
        success: true,
        data: { profiles: [{ name: 'Globex' }], selected_profile_id: 2, count: 1 },
      });
      expect(await call('profile_list', { include_archived: true })).toMatchObject({
        data: { count: 2 },
      });

      expect(await call('profile_select', { profile_id: null })).toEqual({
        success: true,
        data: { profile: null },
      });
      expect(ctx.state.currentProfileId).toBeNull();
    });

    it('stops the timer when the running profile is deleted', async () => {
      const acme = createProfile(ctx.db, { name: 'Acme' });
      await call('timer_start', { profile_id: acme.id });
      const changes = vi.fn();
      ctx.state.on('activeEntryChanged', changes);

      expect(await call('profile_delete', { profile_id: acme.id })).toEqual({
        success: true,
        data: { deleted: acme.id },
      });
      expect(changes).toHaveBeenCalledWith(null);
      expect(ctx.timer.currentState).toBe('idle');
      expect(ctx.timer.isTicking).toBe(false);
      expect(ctx.state.currentProfileId).toBeNull();
    });

    it('reports deleting an unknown profile', async () => {
      expect(await call('profile_delete', { profile_id: 7 })).toEqual({
        success: false,
        error: 'Profile not found: 7',
        code: 'NOT_FOUND',
      });
    });
  });

  describe('services', () => {
    it('parses rates into cents', async () => {
      expect(await call('service_create', { name: 'Consulting', rate: '85,50', estimate: '1:30' })).toEqual({
        success: true,
        data: {
          service: { id: 1, name: 'Consulting', rateCents: 8_550, estimatedSeconds: 5_400 },
          rate_formatted: '85,50 €',
        },
      });
      expect(await call('service_create', { name: 'Audit', rate: 120 })).toMatchObject({
        data: { service: { rateCents: 12_000 }, rate_formatted: '120,00 €' },
      });
      expect(await call('service_create', { name: 'Bad', rate: 'abc' })).toEqual({
        success: false,
        error: 'rate: cannot parse "abc"',
        code: 'VALIDATION_ERROR',
      });
    });

    it('lists and updates services', async () => {
      await call('service_create', { name: 'Support', rate: '50' });
      await call('service_create', { name: 'Audit', rate: '120' });
      await call('service_update', { service_id: 1, rate: '55,5' });

      expect(await call('service_list')).toMatchObject({
        success: true,
        data: {
          services: [
            { name: 'Audit', rate_formatted: '120,00 €' },
            { name: 'Support', rateCents: 5_550, rate_formatted: '55,50 €' },
          ],
          count: 2,
        },
      });
    });

    it('attaches services to the selected profile', async () => {
      const acme = createProfile(ctx.db, { name: 'Acme' });
      const hosting = createService(ctx.db, { name: 'Hosting', rateCents: 2_000 });

      expect(await call('profile_service_add', { service_id: hosting.id })).toMatchObject({
        success: false,
        code: 'VALIDATION_ERROR',
      });

      ctx.state.selectProfile(acme.id);
      expect(await call('profile_service_add', { service_id: hosting.id, notes: 'monthly' })).toMatchObject({
        success: true,
        data: {
          profile_service: { id: 1, profileId: acme.id, serviceName: 'Hosting', notes: 'monthly', createdTs: T0 },
        },
      });
      expect(await call('profile_service_list')).toMatchObject({
        data: { profile_id: acme.id, count: 1 },
      });

      await call('profile_service_remove', { profile_service_id: 1 });
      expect(await call('profile_service_list')).toMatchObject({ data: { count: 0 } });
    });
  });

  describe('projects', () => {
    beforeEach(() => {
      ctx.state.selectProfile(createProfile(ctx.db, { name: 'Acme' }).id);
      createService(ctx.db, { name: 'Consulting', rateCents: 8_550 });
    });

    it('creates projects for the selected profile', async () => {
      expect(
        await call('project_create', {
          name: 'Website',
          service_id: 1,
          estimate: '2',
          deadline: 1_710_000_000,
          invoice_sent: true,
        })
      ).toMatchObject({
        success: true,
        data: {
          project: {
            id: 1,
            profileId: 1,
            serviceName: 'Consulting',
            estimatedSeconds: 7_200,
            deadlineTs: 1_710_000_000,
            invoiceSent: true,
            createdTs: T0,
          },
        },
      });
      expect(await call('project_list')).toMatchObject({ data: { count: 1 } });
    });

    it('updates and clears project fields', async () => {
      await call('project_create', { name: 'Website', estimate: '2', notes: 'draft' });

      expect(await call('project_update', { project_id: 1, estimate: null, notes: null })).toMatchObject({
        success: true,
        data: { project: { estimatedSeconds: null, notes: null } },
      });
      expect(await call('project_update', { project_id: 1, estimate: 'two' })).toMatchObject({
        success: false,
        code: 'VALIDATION_ERROR',
      });
    });

    it('detaches the running entry from a deleted project', async () => {
      await call('project_create', { name: 'Website' });
      await call('timer_start', { project_id: 1 });

      expect(await call('project_delete', { project_id: 1 })).toEqual({
        success: true,
        data: { deleted: 1 },
      });
      expect(ctx.state.activeEntry?.projectId).toBeNull();
      expect(getEntry(ctx.db, 1)?.endTs).toBeNull();
      expect(ctx.timer.currentState).toBe('running');
    });
  });

  describe('todos', () => {
    it('adds, completes, lists and deletes todos', async () => {
      createProfile(ctx.db, { name: 'Acme' });

      expect(await call('todo_add', { kind: 'profile', parent_id: 1, text: 'Send contract' })).toEqual({
        success: true,
        data: {
          todo: { id: 1, kind: 'profile', parentId: 1, text: 'Send contract', completed: false, createdTs: T0 },
        },
      });
      await call('todo_add', { kind: 'profile', parent_id: 1, text: 'Chase invoice' });

      expect(await call('todo_complete', { kind: 'profile', todo_id: 1 })).toMatchObject({
        data: { todo: { completed: true } },
      });
      expect(await call('todo_list', { kind: 'profile', parent_id: 1, open_only: true })).toMatchObject({
        data: { todos: [{ text: 'Chase invoice' }], count: 1 },
      });
      expect(await call('todo_delete', { kind: 'profile', todo_id: 2 })).toEqual({
        success: true,
        data: { deleted: 2 },
      });
      expect(await call('todo_list', { kind: 'profile', parent_id: 1 })).toMatchObject({
        data: { count: 1 },
      });
    });

    it('announces todo changes on the parent collection', async () => {
      const acme = createProfile(ctx.db, { name: 'Acme' });
      const hosting = createService(ctx.db, { name: 'Hosting', rateCents: 2_000 });
      ctx.state.selectProfile(acme.id);
      await call('profile_service_add', { service_id: hosting.id });

      const profiles = vi.fn();
      const services = vi.fn();
      ctx.state.on('profilesUpdated', profiles);
      ctx.state.on('servicesUpdated', services);

      await call('todo_add', { kind: 'profile', parent_id: acme.id, text: 'a' });
      await call('todo_add', { kind: 'profile_service', parent_id: 1, text: 'b' });
      await call('todo_complete', { kind: 'profile_service', todo_id: 1 });

      expect(profiles).toHaveBeenCalledTimes(1);
      expect(services).toHaveBeenCalledTimes(2);
    });

    it('rejects unknown kinds and parents', async () => {
      expect(await call('todo_add', { kind: 'invoice', parent_id: 1, text: 'x' })).toMatchObject({
        success: false,
        code: 'VALIDATION_ERROR',
      });
      expect(await call('todo_add', { kind: 'project', parent_id: 5, text: 'x' })).toEqual({
        success: false,
        error: 'Project not found: 5',
        code: 'NOT_FOUND',
      });
    });
  });
});
