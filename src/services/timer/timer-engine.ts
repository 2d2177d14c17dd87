/**
 * TimerEngine: the only component that opens and closes time entries
 *
 * Two states, derived from StateCore's cached active entry:
 *   idle    - no open entry
 *   running - exactly one open entry, system-wide
 *
 * Every transition re-reads the open entry from the store, then writes, then
 * updates StateCore (refresh + notify). A start never returns an entry it did
 * not open: one that loses a race against another process fails with
 * AlreadyRunningError.
 */

import { EventHub, type EventHandler, type Unsubscribe } from '../state/event-hub.js';
import type { StateCore } from '../state/state-core.js';
import { closeEntry, openEntry, type Db } from '../store/index.js';
import {
  AlreadyRunningError,
  ConflictError,
  InvalidStateError,
  NoActiveEntryError,
  NotFoundError,
  ReentrantMutationError,
} from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { nowSeconds } from '../../utils/format.js';
import type { TimeEntry } from '../../types/index.js';

export type TimerState = 'idle' | 'running';

export interface TimerEvents {
  elapsedTick: number;
  timerStarted: TimeEntry;
  timerStopped: TimeEntry;
}

export interface StartOptions {
  projectId?: number | null | undefined;
  note?: string | undefined;
  tags?: string[] | undefined;
}

export interface TimerEngineOptions {
  /** Tick cadence while running */
  tickIntervalMs?: number;
  /** Wall clock in epoch seconds */
  now?: () => number;
}

export interface TimerStatus {
  state: TimerState;
  entry: TimeEntry | null;
  elapsedSeconds: number;
}

export type ToggleResult =
  | { action: 'started'; entry: TimeEntry }
  | { action: 'stopped'; entry: TimeEntry };

export const DEFAULT_TICK_INTERVAL_MS = 1000;

export class TimerEngine {
  private readonly events = new EventHub<TimerEvents>();
  private readonly tickIntervalMs: number;
  private readonly now: () => number;
  private readonly unsubscribeState: Unsubscribe;
  private ticker: ReturnType<typeof setInterval> | null = null;
  private disposed = false;

  // Highest elapsed value reported for the current entry
  private lastElapsed = 0;
  private lastElapsedEntryId: number | null = null;

  constructor(
    private readonly db: Db,
    private readonly state: StateCore,
    options: TimerEngineOptions = {}
  ) {
    this.tickIntervalMs = options.tickIntervalMs ?? DEFAULT_TICK_INTERVAL_MS;
    this.now = options.now ?? nowSeconds;

    this.unsubscribeState = state.on('activeEntryChanged', (entry) => this.syncTicker(entry));

    // Resume an entry left open by a previous run
    const recovered = state.refreshActiveEntry();
    this.syncTicker(recovered);
    if (recovered) {
      logger.info('Recovered running timer', { entryId: recovered.id, startTs: recovered.startTs });
    }
  }

  get currentState(): TimerState {
    return this.state.activeEntry ? 'running' : 'idle';
  }

  get isTicking(): boolean {
    return this.ticker !== null;
  }

  on<K extends keyof TimerEvents>(event: K, handler: EventHandler<TimerEvents[K]>): Unsubscribe {
    return this.events.on(event, handler);
  }

  off<K extends keyof TimerEvents>(event: K, handler: EventHandler<TimerEvents[K]>): void {
    this.events.off(event, handler);
  }

  /**
   * Open a new entry for a profile. Only valid while idle.
   */
  start(profileId: number, options: StartOptions = {}): TimeEntry {
    this.assertWritable('start');
    if (this.state.refreshActiveEntry()) {
      throw new AlreadyRunningError();
    }

    let entry: TimeEntry;
    try {
      entry = openEntry(
        this.db,
        { profileId, projectId: options.projectId, note: options.note, tags: options.tags },
        this.now()
      );
    } catch (error) {
      if (error instanceof ConflictError) {
        // Lost a race to another writer; stay idle
        throw new AlreadyRunningError({ cause: error });
      }
      throw error;
    }

    this.state.refreshActiveEntry();
    this.state.notifyEntriesUpdated();

    logger.info('Timer started', { entryId: entry.id, profileId, projectId: entry.projectId });
    this.events.emit('timerStarted', entry);
    return entry;
  }

  /**
   * Close the running entry, by default at the current time. Only valid
   * while running.
   */
  stop(endTs?: number): TimeEntry {
    this.assertWritable('stop');
    const active = this.state.refreshActiveEntry();
    if (!active) {
      throw new NoActiveEntryError();
    }

    // A clock that went backward must not produce an end before the start
    const end = endTs ?? Math.max(this.now(), active.startTs + this.lastElapsedFor(active));

    let entry: TimeEntry;
    try {
      entry = closeEntry(this.db, active.id, end);
    } catch (error) {
      if (error instanceof NotFoundError || error instanceof InvalidStateError) {
        // Closed or deleted elsewhere: resync before reporting
        this.state.refreshActiveEntry();
      }
      throw error;
    }

    this.state.refreshActiveEntry();
    this.state.notifyEntriesUpdated();

    logger.info('Timer stopped', {
      entryId: entry.id,
      profileId: entry.profileId,
      durationSeconds: end - entry.startTs,
    });
    this.events.emit('timerStopped', entry);
    return entry;
  }

  /**
   * Stop if running, start otherwise. The state is re-read from the store and
   * acted on in the same synchronous turn, so nothing can interleave.
   */
  toggle(profileId: number, options: StartOptions = {}): ToggleResult {
    this.assertWritable('toggle');
    if (this.state.refreshActiveEntry()) {
      return { action: 'stopped', entry: this.stop() };
    }
    return { action: 'started', entry: this.start(profileId, options) };
  }

  /**
   * Stop whatever is running and start tracking the given profile
   */
  switchTo(profileId: number, options: StartOptions = {}): TimeEntry {
    this.assertWritable('switchTo');
    if (this.state.refreshActiveEntry()) {
      this.stop();
    }
    return this.start(profileId, options);
  }

  /**
   * Seconds since the running entry started; 0 while idle. Never decreases
   * for the same entry, even if the wall clock moves backward.
   */
  elapsedSeconds(): number {
    const active = this.state.activeEntry;
    if (!active) {
      return 0;
    }

    const raw = this.now() - active.startTs;
    const last = this.lastElapsedFor(active);
    if (raw > last) {
      this.lastElapsed = raw;
      return raw;
    }
    return last;
  }

  /**
   * Current state, re-read from the store unless called from an observer
   */
  status(): TimerStatus {
    if (!this.state.isNotifying && !this.events.isDispatching) {
      this.state.refreshActiveEntry();
    }
    return {
      state: this.currentState,
      entry: this.state.activeEntry,
      elapsedSeconds: this.elapsedSeconds(),
    };
  }

  /**
   * Cancel ticking and detach from StateCore. The open entry, if any, stays
   * open and is recovered on the next start.
   */
  dispose(): void {
    this.disposed = true;
    this.stopTicker();
    this.unsubscribeState();
    this.events.clear();
  }

  // Observers of either hub must not start or stop the timer
  private assertWritable(operation: string): void {
    this.state.assertWritable(operation);
    if (this.events.isDispatching) {
      throw new ReentrantMutationError(operation, this.events.currentEvent ?? 'unknown');
    }
  }

  private lastElapsedFor(entry: TimeEntry): number {
    if (this.lastElapsedEntryId !== entry.id) {
      this.lastElapsedEntryId = entry.id;
      this.lastElapsed = 0;
    }
    return this.lastElapsed;
  }

  private syncTicker(entry: TimeEntry | null): void {
    if (entry && !this.ticker && !this.disposed) {
      this.ticker = setInterval(() => this.tick(), this.tickIntervalMs);
      this.ticker.unref();
    } else if (!entry) {
      this.stopTicker();
    }
  }

  private stopTicker(): void {
    if (this.ticker) {
      clearInterval(this.ticker);
      this.ticker = null;
    }
  }

  private tick(): void {
    if (!this.state.activeEntry) {
      this.stopTicker();
      return;
    }
    const seconds = this.elapsedSeconds();
    logger.debug('Tick', { seconds });
    this.events.emit('elapsedTick', seconds);
  }
}
