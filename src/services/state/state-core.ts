/**
 * StateCore: cached current profile and active entry, plus change events
 *
 * The store stays the only source of truth; this is a read-through cache
 * with a single writer. Events fire synchronously, in subscription order,
 * and only when the cached value actually changed. Observers must not call
 * back into a mutating method while an event is being delivered: such a call
 * throws ReentrantMutationError.
 */

import { EventHub, type EventHandler, type Unsubscribe } from './event-hub.js';
import { findOpenEntry, getProfile, requireProfile, type Db } from '../store/index.js';
import { ReentrantMutationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { SettingsStorage } from '../../config/settings.js';
import type { TimeEntry } from '../../types/index.js';

export interface StateEvents {
  profileChanged: number | null;
  activeEntryChanged: TimeEntry | null;
  entriesUpdated: undefined;
  profilesUpdated: undefined;
  servicesUpdated: undefined;
}

export type StateEventName = keyof StateEvents;

/**
 * Field-by-field equality of two cached entries
 */
export function entriesEqual(a: TimeEntry | null, b: TimeEntry | null): boolean {
  if (a === b) return true;
  if (a === null || b === null) return false;
  return (
    a.id === b.id &&
    a.profileId === b.profileId &&
    a.projectId === b.projectId &&
    a.startTs === b.startTs &&
    a.endTs === b.endTs &&
    a.note === b.note &&
    a.tags.length === b.tags.length &&
    a.tags.every((tag, i) => tag === b.tags[i])
  );
}

export class StateCore {
  private readonly events = new EventHub<StateEvents>();
  private profileId: number | null = null;
  private entry: TimeEntry | null = null;

  constructor(
    private readonly db: Db,
    private readonly settings?: SettingsStorage
  ) {}

  get currentProfileId(): number | null {
    return this.profileId;
  }

  get activeEntry(): TimeEntry | null {
    return this.entry;
  }

  /**
   * True while an event is being delivered to observers
   */
  get isNotifying(): boolean {
    return this.events.isDispatching;
  }

  on<K extends StateEventName>(event: K, handler: EventHandler<StateEvents[K]>): Unsubscribe {
    return this.events.on(event, handler);
  }

  off<K extends StateEventName>(event: K, handler: EventHandler<StateEvents[K]>): void {
    this.events.off(event, handler);
  }

  /**
   * Throw if called from inside an event handler
   */
  assertWritable(operation: string): void {
    if (this.events.isDispatching) {
      throw new ReentrantMutationError(operation, this.events.currentEvent ?? 'unknown');
    }
  }

  /**
   * Select a profile (or clear the selection with null)
   */
  selectProfile(profileId: number | null): void {
    this.assertWritable('selectProfile');

    if (profileId !== null) {
      requireProfile(this.db, profileId);
    }
    if (profileId === this.profileId) {
      return;
    }

    if (this.settings) {
      this.settings.save({ ...this.settings.load(), last_profile_id: profileId });
    }
    this.profileId = profileId;
    logger.debug('Profile selected', { profileId });
    this.events.emit('profileChanged', profileId);
  }

  /**
   * Re-select the profile persisted by a previous run, if it still exists
   */
  restoreProfile(): number | null {
    this.assertWritable('restoreProfile');
    const lastId = this.settings?.load().last_profile_id ?? null;

    if (lastId !== null && getProfile(this.db, lastId)) {
      this.selectProfile(lastId);
    } else if (lastId !== null) {
      logger.info(`Last selected profile ${lastId} no longer exists`);
    }
    return this.profileId;
  }

  /**
   * Drop the selection if the selected profile was deleted
   */
  reconcileProfile(): void {
    this.assertWritable('reconcileProfile');
    if (this.profileId !== null && !getProfile(this.db, this.profileId)) {
      this.selectProfile(null);
    }
  }

  /**
   * Re-read the open entry from the store. Emits activeEntryChanged only
   * when the cached value differs.
   */
  refreshActiveEntry(): TimeEntry | null {
    this.assertWritable('refreshActiveEntry');

    const entry = findOpenEntry(this.db);
    if (!entriesEqual(entry, this.entry)) {
      this.entry = entry;
      this.events.emit('activeEntryChanged', entry);
    }
    return this.entry;
  }

  notifyEntriesUpdated(): void {
    this.assertWritable('notifyEntriesUpdated');
    this.events.emit('entriesUpdated', undefined);
  }

  notifyProfilesUpdated(): void {
    this.assertWritable('notifyProfilesUpdated');
    this.events.emit('profilesUpdated', undefined);
  }

  notifyServicesUpdated(): void {
    this.assertWritable('notifyServicesUpdated');
    this.events.emit('servicesUpdated', undefined);
  }
}
