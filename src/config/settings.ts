/**
 * Persisted user settings (settings.json in the data directory)
 */

import { z } from 'zod';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';
import { logger } from '../utils/logger.js';
import { StorageError } from '../utils/errors.js';

export const SETTINGS_FILE = 'settings.json';

const settingsSchema = z.object({
  last_profile_id: z.number().int().positive().nullable().default(null),
});

export type AppSettings = z.infer<typeof settingsSchema>;

/**
 * Minimal key/value persistence StateCore depends on
 */
export interface SettingsStorage {
  load(): AppSettings;
  save(settings: AppSettings): void;
}

export function defaultSettings(): AppSettings {
  return { last_profile_id: null };
}

export class FileSettingsStore implements SettingsStorage {
  readonly path: string;

  constructor(dataDir: string) {
    this.path = join(dataDir, SETTINGS_FILE);
  }

  /**
   * Missing or unreadable files fall back to defaults
   */
  load(): AppSettings {
    if (!existsSync(this.path)) {
      return defaultSettings();
    }

    try {
      const raw: unknown = JSON.parse(readFileSync(this.path, 'utf-8'));
      const result = settingsSchema.safeParse(raw);
      if (result.success) {
        return result.data;
      }
      logger.warn(`Ignoring invalid settings file ${this.path}`, result.error.issues);
    } catch (error) {
      logger.warn(`Cannot read settings file ${this.path}`, error);
    }
    return defaultSettings();
  }

  save(settings: AppSettings): void {
    try {
      mkdirSync(dirname(this.path), { recursive: true });
      writeFileSync(this.path, JSON.stringify(settings, null, 2), 'utf-8');
    } catch (error) {
      throw new StorageError(`Cannot write settings file ${this.path}`, { cause: error });
    }
  }
}

/**
 * In-process settings, for tests and ephemeral databases
 */
export class MemorySettingsStore implements SettingsStorage {
  private settings: AppSettings;

  constructor(initial: Partial<AppSettings> = {}) {
    this.settings = { ...defaultSettings(), ...initial };
  }

  load(): AppSettings {
    return { ...this.settings };
  }

  save(settings: AppSettings): void {
    this.settings = { ...settings };
  }
}
