/**
 * Tests for transactions, error translation and the file-backed database
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { rmSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';

vi.mock('../../../../src/utils/logger.js', () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

import {
  createDatabase,
  createProfile,
  mutate,
  parseInput,
  translateError,
  type Db,
} from '../../../../src/services/store/index.js';
import { buildAssignments } from '../../../../src/services/store/database.js';
import {
  ConflictError,
  NotFoundError,
  StorageError,
  UniqueConstraintError,
  ValidationError,
} from '../../../../src/utils/errors.js';
import { makeTempDir } from '../../../helpers.js';

function countProfiles(db: Db): number {
  return db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM profiles').get()?.n ?? -1;
}

describe('mutate', () => {
  let db: Db;

  beforeEach(() => {
    db = createDatabase(':memory:');
  });

  afterEach(() => {
    db.close();
  });

  it('commits the result of the function', () => {
    const id = mutate(db, () =>
      Number(db.prepare("INSERT INTO profiles (name) VALUES ('Acme')").run().lastInsertRowid)
    );
    expect(id).toBe(1);
    expect(countProfiles(db)).toBe(1);
  });

  it('rolls back and wraps driver-independent failures', () => {
    expect(() =>
      mutate(db, () => {
        db.prepare("INSERT INTO profiles (name) VALUES ('Acme')").run();
        throw new Error('halfway');
      })
    ).toThrow(StorageError);
    expect(countProfiles(db)).toBe(0);
  });

  it('passes domain errors through unchanged', () => {
    const error = new NotFoundError('Profile', 9);
    expect(() =>
      mutate(db, () => {
        throw error;
      })
    ).toThrow(error);
  });

  it('maps a foreign key failure to ValidationError', () => {
    expect(() =>
      mutate(db, () =>
        db.prepare('INSERT INTO time_entries (profile_id, start_ts) VALUES (999, 1)').run()
      )
    ).toThrow(ValidationError);
  });
});

describe('translateError', () => {
  let db: Db;

  beforeEach(() => {
    db = createDatabase(':memory:');
    createProfile(db, { name: 'Acme' });
  });

  afterEach(() => {
    db.close();
  });

  function capture(fn: () => void): unknown {
    try {
      fn();
    } catch (error) {
      return error;
    }
    return undefined;
  }

  it('maps the single-open index to ConflictError', () => {
    db.prepare('INSERT INTO time_entries (profile_id, start_ts) VALUES (1, 100)').run();
    const raw = capture(() =>
      db.prepare('INSERT INTO time_entries (profile_id, start_ts) VALUES (1, 200)').run()
    );

    const error = translateError(raw);
    expect(error).toBeInstanceOf(ConflictError);
    expect(error.code).toBe('CONFLICT');
    expect(error.cause).toBe(raw);
  });

  it('maps other unique violations to UniqueConstraintError', () => {
    const raw = capture(() => db.prepare("INSERT INTO profiles (name) VALUES ('Acme')").run());
    const error = translateError(raw);
    expect(error).toBeInstanceOf(UniqueConstraintError);
    expect(error.code).toBe('UNIQUE_CONSTRAINT');
  });

  it('maps NOT NULL violations to ValidationError', () => {
    const raw = capture(() => db.prepare('INSERT INTO profiles (name) VALUES (NULL)').run());
    expect(translateError(raw)).toBeInstanceOf(ValidationError);
  });

  it('maps anything else to StorageError', () => {
    const raw = capture(() => db.prepare('SELECT * FROM no_such_table').all());
    const error = translateError(raw);
    expect(error).toBeInstanceOf(StorageError);
    expect(error.message).toMatch(/^Storage failure: no such table: no_such_table/);
  });
});

describe('helpers', () => {
  it('builds assignments from present keys only', () => {
    const columns = [
      ['name', 'name'],
      ['archived', 'archived'],
      ['color', 'color'],
    ] as const;

    expect(buildAssignments(columns, { name: 'Acme', archived: true, color: undefined })).toEqual({
      sql: 'name = ?, archived = ?',
      params: ['Acme', 1],
    });
    expect(buildAssignments(columns, { color: null })).toEqual({
      sql: 'color = ?',
      params: [null],
    });
    expect(buildAssignments(columns, {})).toEqual({ sql: '', params: [] });
  });

  it('raises ValidationError with every issue', () => {
    const schema = z.object({ name: z.string(), rate: z.number() });
    try {
      parseInput(schema, { name: 1 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      expect(error instanceof ValidationError && error.issues).toEqual([
        'name: Expected string, received number',
        'rate: Required',
      ]);
    }
  });
});

describe('file database', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('creates the directory and uses WAL', () => {
    const db = createDatabase(join(dir, 'nested', 'ledger.sqlite'), { busyTimeoutMs: 250 });

    expect(db.pragma('journal_mode', { simple: true })).toBe('wal');
    expect(db.pragma('busy_timeout', { simple: true })).toBe(250);
    db.close();
  });

  it('keeps data across connections', () => {
    const path = join(dir, 'ledger.sqlite');
    const first = createDatabase(path);
    createProfile(first, { name: 'Acme' });
    first.close();

    const second = createDatabase(path);
    expect(countProfiles(second)).toBe(1);
    second.close();
  });
});
