/**
 * Application context: one database, one StateCore, one TimerEngine
 */

import { createDatabase, type Db } from './store/index.js';
import { StateCore } from './state/state-core.js';
import { TimerEngine } from './timer/timer-engine.js';
import { FileSettingsStore, type SettingsStorage } from '../config/settings.js';
import { nowSeconds } from '../utils/format.js';
import { logger } from '../utils/logger.js';
import type { TimeLedgerConfig } from '../types/index.js';

export interface AppContext {
  config: TimeLedgerConfig;
  db: Db;
  state: StateCore;
  timer: TimerEngine;
  /** Wall clock in epoch seconds */
  now: () => number;
}

export interface ContextOptions {
  settings?: SettingsStorage;
  now?: () => number;
}

/**
 * Open the store, restore the last profile and recover a running timer
 */
export function createContext(config: TimeLedgerConfig, options: ContextOptions = {}): AppContext {
  const now = options.now ?? nowSeconds;
  const db = createDatabase(config.dbPath, { busyTimeoutMs: config.busyTimeoutMs });

  try {
    const state = new StateCore(db, options.settings ?? new FileSettingsStore(config.dataDir));
    state.restoreProfile();
    const timer = new TimerEngine(db, state, { tickIntervalMs: config.tickIntervalMs, now });

    logger.debug('Context ready', {
      dbPath: config.dbPath,
      profileId: state.currentProfileId,
      timer: timer.currentState,
    });
    return { config, db, state, timer, now };
  } catch (error) {
    db.close();
    throw error;
  }
}

/**
 * Stop ticking and close the database. A running entry stays open.
 */
export function closeContext(ctx: AppContext): void {
  ctx.timer.dispose();
  if (ctx.db.open) {
    ctx.db.close();
  }
}
