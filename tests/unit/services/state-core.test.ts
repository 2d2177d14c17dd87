/**
 * Tests for the state cache and its change events
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../../../src/utils/logger.js', () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

import { StateCore, entriesEqual } from '../../../src/services/state/state-core.js';
import { MemorySettingsStore } from '../../../src/config/settings.js';
import {
  closeEntry,
  createDatabase,
  createProfile,
  deleteProfile,
  openEntry,
  updateEntry,
  type Db,
} from '../../../src/services/store/index.js';
import { NotFoundError, ReentrantMutationError } from '../../../src/utils/errors.js';
import type { TimeEntry } from '../../../src/types/index.js';

const entry: TimeEntry = {
  id: 1,
  profileId: 1,
  projectId: null,
  startTs: 100,
  endTs: null,
  note: '',
  tags: ['a'],
};

describe('entriesEqual', () => {
  it('compares entries field by field', () => {
    expect(entriesEqual(null, null)).toBe(true);
    expect(entriesEqual(entry, null)).toBe(false);
    expect(entriesEqual(entry, { ...entry, tags: ['a'] })).toBe(true);
    expect(entriesEqual(entry, { ...entry, tags: ['b'] })).toBe(false);
    expect(entriesEqual(entry, { ...entry, note: 'x' })).toBe(false);
  });
});

describe('StateCore', () => {
  let db: Db;
  let settings: MemorySettingsStore;
  let state: StateCore;
  let acmeId: number;

  beforeEach(() => {
    db = createDatabase(':memory:');
    settings = new MemorySettingsStore();
    state = new StateCore(db, settings);
    acmeId = createProfile(db, { name: 'Acme' }).id;
  });

  afterEach(() => {
    db.close();
  });

  describe('profile selection', () => {
    it('selects, persists and announces a profile once', () => {
      const changes: Array<number | null> = [];
      state.on('profileChanged', (id) => changes.push(id));

      state.selectProfile(acmeId);
      state.selectProfile(acmeId);

      expect(state.currentProfileId).toBe(acmeId);
      expect(settings.load()).toEqual({ last_profile_id: acmeId });
      expect(changes).toEqual([acmeId]);
    });

    it('refuses unknown profiles', () => {
      expect(() => state.selectProfile(42)).toThrow(NotFoundError);
      expect(state.currentProfileId).toBeNull();
    });

    it('restores the persisted profile', () => {
      const restored = new StateCore(db, new MemorySettingsStore({ last_profile_id: acmeId }));
      expect(restored.restoreProfile()).toBe(acmeId);
      expect(restored.currentProfileId).toBe(acmeId);
    });

    it('ignores a persisted profile that no longer exists', () => {
      const restored = new StateCore(db, new MemorySettingsStore({ last_profile_id: 42 }));
      expect(restored.restoreProfile()).toBeNull();
    });

    it('works without settings storage', () => {
      const bare = new StateCore(db);
      expect(bare.restoreProfile()).toBeNull();
      bare.selectProfile(acmeId);
      expect(bare.currentProfileId).toBe(acmeId);
    });

    it('drops the selection when the profile is deleted', () => {
      const changes: Array<number | null> = [];
      state.selectProfile(acmeId);
      state.on('profileChanged', (id) => changes.push(id));

      deleteProfile(db, acmeId);
      state.reconcileProfile();
      state.reconcileProfile();

      expect(state.currentProfileId).toBeNull();
      expect(settings.load()).toEqual({ last_profile_id: null });
      expect(changes).toEqual([null]);
    });
  });

  describe('refreshActiveEntry', () => {
    it('emits only when the open entry changes', () => {
      const seen: Array<TimeEntry | null> = [];
      state.on('activeEntryChanged', (e) => seen.push(e));

      expect(state.refreshActiveEntry()).toBeNull();
      const opened = openEntry(db, { profileId: acmeId }, 100);
      state.refreshActiveEntry();
      state.refreshActiveEntry();
      updateEntry(db, opened.id, { note: 'edited' });
      state.refreshActiveEntry();
      closeEntry(db, opened.id, 200);
      state.refreshActiveEntry();

      expect(seen).toEqual([opened, { ...opened, note: 'edited' }, null]);
      expect(state.activeEntry).toBeNull();
    });
  });

  describe('notifications', () => {
    it('delivers collection events in subscription order', () => {
      const calls: string[] = [];
      state.on('entriesUpdated', () => calls.push('entries-1'));
      state.on('entriesUpdated', () => calls.push('entries-2'));
      state.on('profilesUpdated', () => calls.push('profiles'));
      const unsubscribe = state.on('servicesUpdated', () => calls.push('services'));

      state.notifyEntriesUpdated();
      state.notifyProfilesUpdated();
      unsubscribe();
      state.notifyServicesUpdated();

      expect(calls).toEqual(['entries-1', 'entries-2', 'profiles']);
    });

    it('refuses mutations from inside a handler', () => {
      const inside: boolean[] = [];
      state.on('entriesUpdated', () => {
        inside.push(state.isNotifying);
        state.selectProfile(acmeId);
      });

      expect(() => state.notifyEntriesUpdated()).toThrow(ReentrantMutationError);
      expect(() => state.notifyEntriesUpdated()).toThrow(
        "Re-entrant state mutation: selectProfile called while delivering 'entriesUpdated'"
      );
      expect(inside).toEqual([true, true]);
      expect(state.isNotifying).toBe(false);
      expect(state.currentProfileId).toBeNull();
    });
  });
});
