/**
 * SQLite connection, transactions and error translation
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import type { z } from 'zod';
import { initializeSchema } from './schema.js';
import { logger } from '../../utils/logger.js';
import {
  ConflictError,
  StorageError,
  TimeLedgerError,
  UniqueConstraintError,
  ValidationError,
} from '../../utils/errors.js';

export type Db = Database.Database;

export type SqlValue = string | number | bigint | null;

export interface DatabaseOptions {
  busyTimeoutMs?: number;
}

// Partial unique index backing the single-open-entry invariant
export const SINGLE_OPEN_INDEX = 'idx_time_entries_single_open';

/**
 * Read the SQLite result code off a thrown value, if it has one
 */
export function sqliteCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Map driver errors onto the error taxonomy. Domain errors pass through.
 */
export function translateError(error: unknown): TimeLedgerError {
  if (error instanceof TimeLedgerError) {
    return error;
  }

  const code = sqliteCode(error);
  const message = error instanceof Error ? error.message : String(error);

  if (code === 'SQLITE_CONSTRAINT_UNIQUE' || code === 'SQLITE_CONSTRAINT_PRIMARYKEY') {
    if (message.includes(SINGLE_OPEN_INDEX) || message.includes('time_entries.end_ts')) {
      return new ConflictError('Another time entry is already open', 'CONFLICT', { cause: error });
    }
    const column = message.split(':').pop()?.trim() ?? 'record';
    return new UniqueConstraintError(column, 'duplicate value', { cause: error });
  }

  if (code === 'SQLITE_CONSTRAINT_FOREIGNKEY') {
    return new ValidationError('Referenced record does not exist');
  }

  if (code?.startsWith('SQLITE_CONSTRAINT')) {
    return new ValidationError(message);
  }

  return new StorageError(`Storage failure: ${message}`, { cause: error });
}

/**
 * Run a mutation inside a BEGIN IMMEDIATE transaction.
 *
 * IMMEDIATE takes the write lock up front, so a second process checking the
 * open-entry invariant waits for (or fails against) the first one instead of
 * both reading "no open entry" and inserting.
 */
export function mutate<T>(db: Db, fn: () => T): T {
  try {
    return db.transaction(fn).immediate();
  } catch (error) {
    throw translateError(error);
  }
}

/**
 * Run a read, mapping driver failures to StorageError
 */
export function read<T>(fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    throw translateError(error);
  }
}

/**
 * Validate input with a zod schema, raising ValidationError on failure
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new ValidationError(issues.join('; '), issues);
  }
  return result.data;
}

export function toSqlValue(value: unknown): SqlValue {
  if (value === undefined || value === null) return null;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'number' || typeof value === 'string' || typeof value === 'bigint') {
    return value;
  }
  throw new ValidationError(`Unsupported value type: ${typeof value}`);
}

/**
 * Build "col = ?, col = ?" from the patch keys that are present.
 * A null value clears the column; undefined leaves it alone.
 */
export function buildAssignments<K extends string>(
  columns: ReadonlyArray<readonly [K, string]>,
  patch: Partial<Record<K, unknown>>
): { sql: string; params: SqlValue[] } {
  const sets: string[] = [];
  const params: SqlValue[] = [];

  for (const [key, column] of columns) {
    const value = patch[key];
    if (value !== undefined) {
      sets.push(`${column} = ?`);
      params.push(toSqlValue(value));
    }
  }

  return { sql: sets.join(', '), params };
}

/**
 * Open (creating if needed) and migrate the database
 */
export function createDatabase(dbPath: string, options: DatabaseOptions = {}): Db {
  const inMemory = dbPath === ':memory:';
  logger.info(`Opening database at: ${dbPath}`);

  let db: Db;
  try {
    if (!inMemory) {
      mkdirSync(dirname(dbPath), { recursive: true });
    }
    db = new Database(dbPath);
  } catch (error) {
    throw new StorageError(`Cannot open database at ${dbPath}`, { cause: error });
  }

  try {
    if (!inMemory) {
      db.pragma('journal_mode = WAL');
    }
    db.pragma('foreign_keys = ON');
    db.pragma(`busy_timeout = ${Math.max(0, Math.floor(options.busyTimeoutMs ?? 5000))}`);

    initializeSchema(db);
  } catch (error) {
    db.close();
    throw error instanceof TimeLedgerError ? error : translateError(error);
  }

  return db;
}
