/**
 * Schema definition and forward-only migrations
 *
 * Each step is keyed by the version it produces. Opening a database applies
 * every step above the recorded version inside one transaction: either the
 * schema reaches SCHEMA_VERSION or it stays exactly where it was.
 */

import type Database from 'better-sqlite3';
import { logger } from '../../utils/logger.js';
import { MigrationError } from '../../utils/errors.js';

export interface Migration {
  version: number;
  description: string;
  up(db: Database.Database): void;
}

export const MIGRATIONS: readonly Migration[] = [
  {
    version: 1,
    description: 'profiles and time entries',
    up(db) {
      db.exec(`
        CREATE TABLE IF NOT EXISTS profiles (
          id INTEGER PRIMARY KEY,
          name TEXT NOT NULL UNIQUE,
          color TEXT,
          archived INTEGER NOT NULL DEFAULT 0
        );

        CREATE TABLE IF NOT EXISTS time_entries (
          id INTEGER PRIMARY KEY,
          profile_id INTEGER NOT NULL REFERENCES profiles(id) ON DELETE CASCADE,
          start_ts INTEGER NOT NULL,
          end_ts INTEGER,
          note TEXT,
          tags TEXT
        );

        CREATE INDEX IF NOT EXISTS idx_entries_profile_start ON time_entries(profile_id, start_ts);
        CREATE INDEX IF NOT EXISTS idx_entries_end ON time_entries(end_ts);
      `);
    },
  },
  {
    version: 2,
    description: 'profile target seconds',
    up(db) {
      db.exec('ALTER TABLE profiles ADD COLUMN target_seconds INTEGER;');
    },
  },
  {
    version: 4,
    description: 'profile contact details and profile todos',
    up(db) {
      db.exec(`
        ALTER TABLE profiles ADD COLUMN company TEXT;
        ALTER TABLE profiles ADD COLUMN contact_person TEXT;
        ALTER TABLE profiles ADD COLUMN email TEXT;
        ALTER TABLE profiles ADD COLUMN phone TEXT;
        ALTER TABLE profiles ADD COLUMN notes TEXT;

        CREATE TABLE IF NOT EXISTS profile_todos (
          id INTEGER PRIMARY KEY,
          profile_id INTEGER NOT NULL REFERENCES profiles(id) ON DELETE CASCADE,
          text TEXT NOT NULL,
          completed INTEGER NOT NULL DEFAULT 0,
          created_ts INTEGER NOT NULL DEFAULT (strftime('%s','now'))
        );
        CREATE INDEX IF NOT EXISTS idx_todos_profile ON profile_todos(profile_id);
      `);
    },
  },
  {
    version: 13,
    description: 'services, projects, project links on entries, single open entry index',
    up(db) {
      db.exec(`
        ALTER TABLE profiles ADD COLUMN business_address TEXT;

        -- Catalog of billable services; hourly rate in cents
        CREATE TABLE IF NOT EXISTS services (
          id INTEGER PRIMARY KEY,
          name TEXT NOT NULL UNIQUE,
          rate_cents INTEGER NOT NULL,
          estimated_seconds INTEGER
        );

        CREATE TABLE IF NOT EXISTS profile_services (
          id INTEGER PRIMARY KEY,
          profile_id INTEGER NOT NULL REFERENCES profiles(id) ON DELETE CASCADE,
          service_id INTEGER NOT NULL REFERENCES services(id) ON DELETE CASCADE,
          notes TEXT,
          created_ts INTEGER NOT NULL DEFAULT (strftime('%s','now'))
        );
        CREATE INDEX IF NOT EXISTS idx_profile_services_profile ON profile_services(profile_id);

        CREATE TABLE IF NOT EXISTS profile_service_todos (
          id INTEGER PRIMARY KEY,
          profile_service_id INTEGER NOT NULL REFERENCES profile_services(id) ON DELETE CASCADE,
          text TEXT NOT NULL,
          completed INTEGER NOT NULL DEFAULT 0,
          created_ts INTEGER NOT NULL DEFAULT (strftime('%s','now'))
        );
        CREATE INDEX IF NOT EXISTS idx_profile_service_todos_service
          ON profile_service_todos(profile_service_id);

        CREATE TABLE IF NOT EXISTS projects (
          id INTEGER PRIMARY KEY,
          profile_id INTEGER NOT NULL REFERENCES profiles(id) ON DELETE CASCADE,
          name TEXT NOT NULL,
          estimated_seconds INTEGER,
          service_id INTEGER REFERENCES services(id) ON DELETE SET NULL,
          deadline_ts INTEGER,
          start_date_ts INTEGER,
          invoice_sent INTEGER NOT NULL DEFAULT 0,
          invoice_paid INTEGER NOT NULL DEFAULT 0,
          notes TEXT,
          created_ts INTEGER NOT NULL DEFAULT (strftime('%s','now'))
        );
        CREATE INDEX IF NOT EXISTS idx_projects_profile ON projects(profile_id);

        CREATE TABLE IF NOT EXISTS project_todos (
          id INTEGER PRIMARY KEY,
          project_id INTEGER NOT NULL REFERENCES projects(id) ON DELETE CASCADE,
          text TEXT NOT NULL,
          completed INTEGER NOT NULL DEFAULT 0,
          created_ts INTEGER NOT NULL DEFAULT (strftime('%s','now'))
        );
        CREATE INDEX IF NOT EXISTS idx_project_todos_project ON project_todos(project_id);

        ALTER TABLE time_entries
          ADD COLUMN project_id INTEGER REFERENCES projects(id) ON DELETE SET NULL;

        -- Older builds could leave several open entries behind. Keep the most
        -- recent one open and close the rest where the next entry began.
        UPDATE time_entries
        SET end_ts = COALESCE(
          (SELECT MIN(n.start_ts) FROM time_entries n WHERE n.start_ts > time_entries.start_ts),
          start_ts
        )
        WHERE end_ts IS NULL
          AND id <> (
            SELECT o.id FROM time_entries o
            WHERE o.end_ts IS NULL
            ORDER BY o.start_ts DESC, o.id DESC
            LIMIT 1
          );

        CREATE UNIQUE INDEX IF NOT EXISTS idx_time_entries_single_open
          ON time_entries((end_ts IS NULL)) WHERE end_ts IS NULL;
      `);
    },
  },
];

// Schema version for migrations
export const SCHEMA_VERSION = 13;

/**
 * Highest version recorded in schema_version, 0 for a fresh database
 */
export function getSchemaVersion(db: Database.Database): number {
  const hasVersionTable = db
    .prepare<[], { name: string }>(
      "SELECT name FROM sqlite_master WHERE type='table' AND name='schema_version'"
    )
    .get();

  if (!hasVersionTable) {
    return 0;
  }

  const row = db
    .prepare<[], { version: number }>(
      'SELECT version FROM schema_version ORDER BY version DESC LIMIT 1'
    )
    .get();
  return row?.version ?? 0;
}

/**
 * Bring the schema up to the newest version in `migrations`
 */
export function initializeSchema(
  db: Database.Database,
  migrations: readonly Migration[] = MIGRATIONS
): number {
  const currentVersion = getSchemaVersion(db);
  const targetVersion = migrations.reduce((max, m) => Math.max(max, m.version), 0);

  if (currentVersion > targetVersion) {
    throw new MigrationError(
      `Database schema version ${currentVersion} is newer than supported version ${targetVersion}`,
      currentVersion
    );
  }

  if (currentVersion < targetVersion) {
    logger.debug(`Migrating database from version ${currentVersion} to ${targetVersion}`);
    runMigrations(db, currentVersion, migrations);
  }

  return targetVersion;
}

/**
 * Apply every migration above `fromVersion` as a single transaction
 */
export function runMigrations(
  db: Database.Database,
  fromVersion: number,
  migrations: readonly Migration[] = MIGRATIONS
): void {
  const pending = [...migrations]
    .filter((m) => m.version > fromVersion)
    .sort((a, b) => a.version - b.version);

  db.exec('BEGIN IMMEDIATE');

  let step: Migration | undefined;
  try {
    db.exec('CREATE TABLE IF NOT EXISTS schema_version (version INTEGER PRIMARY KEY);');
    const record = db.prepare<[number]>('INSERT OR REPLACE INTO schema_version (version) VALUES (?)');

    for (step of pending) {
      logger.debug(`Applying migration ${step.version}: ${step.description}`);
      step.up(db);
      record.run(step.version);
    }

    db.exec('COMMIT');
    logger.debug('Database migration completed');
  } catch (error) {
    if (db.inTransaction) {
      db.exec('ROLLBACK');
    }
    logger.error('Database migration failed', error);
    throw new MigrationError(
      `Migration to version ${step?.version ?? '?'} failed; schema left at version ${fromVersion}`,
      fromVersion,
      { cause: error }
    );
  }
}
