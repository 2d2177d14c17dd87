/**
 * Time entry storage
 *
 * An entry is open while end_ts is NULL. At most one entry in the whole
 * database is open at any time: openEntry checks inside an IMMEDIATE
 * transaction, and the partial unique index idx_time_entries_single_open
 * backs the check for writers that bypass it.
 */

import { z } from 'zod';
import { mutate, parseInput, read, type Db, type SqlValue } from './database.js';
import { requireProfile } from './profiles.js';
import { requireProject } from './projects.js';
import {
  ConflictError,
  InvalidStateError,
  NotFoundError,
  StorageError,
  ValidationError,
} from '../../utils/errors.js';
import { joinTags, nowSeconds, parseTags } from '../../utils/format.js';
import type { TimeEntry, TimeEntryDetails } from '../../types/index.js';

interface EntryRow {
  id: number;
  profile_id: number;
  project_id: number | null;
  start_ts: number;
  end_ts: number | null;
  note: string | null;
  tags: string | null;
}

interface EntryDetailsRow extends EntryRow {
  profile_name: string;
  profile_color: string | null;
  project_name: string | null;
}

const timestamp = z.number().int().nonnegative();
// Stored comma separated, so a tag cannot hold a comma itself
const tagsSchema = z
  .array(z.string().refine((tag) => !tag.includes(','), 'Tags must not contain commas'))
  .optional();

const openEntrySchema = z.object({
  profileId: z.number().int().positive(),
  projectId: z.number().int().positive().nullable().optional(),
  note: z.string().optional(),
  tags: tagsSchema,
});

const manualEntrySchema = openEntrySchema
  .extend({ startTs: timestamp, endTs: timestamp })
  .refine((e) => e.endTs >= e.startTs, { message: 'End must not be before start', path: ['endTs'] });

const updateEntrySchema = z.object({
  profileId: z.number().int().positive().optional(),
  projectId: z.number().int().positive().nullable().optional(),
  startTs: timestamp.optional(),
  endTs: timestamp.nullable().optional(),
  note: z.string().optional(),
  tags: tagsSchema,
});

export type OpenEntryInput = z.input<typeof openEntrySchema>;
export type ManualEntryInput = z.input<typeof manualEntrySchema>;
export type UpdateEntryInput = z.input<typeof updateEntrySchema>;

export interface EntryFilter {
  profileId?: number | undefined;
  projectId?: number | undefined;
  /** Inclusive lower bound on start_ts */
  from?: number | undefined;
  /** Inclusive upper bound on start_ts */
  to?: number | undefined;
  limit?: number | undefined;
}

function toEntry(row: EntryRow): TimeEntry {
  return {
    id: row.id,
    profileId: row.profile_id,
    projectId: row.project_id,
    startTs: row.start_ts,
    endTs: row.end_ts,
    note: row.note ?? '',
    tags: parseTags(row.tags),
  };
}

function toEntryDetails(row: EntryDetailsRow): TimeEntryDetails {
  return {
    ...toEntry(row),
    profileName: row.profile_name,
    profileColor: row.profile_color,
    projectName: row.project_name,
  };
}

function selectOpenRows(db: Db): EntryRow[] {
  return db
    .prepare<[], EntryRow>(
      'SELECT * FROM time_entries WHERE end_ts IS NULL ORDER BY start_ts DESC, id DESC'
    )
    .all();
}

/**
 * A project, when given, must exist and belong to the entry's profile
 */
function checkProject(db: Db, profileId: number, projectId: number | null | undefined): void {
  if (projectId == null) return;
  const project = requireProject(db, projectId);
  if (project.profileId !== profileId) {
    throw new ValidationError(`Project ${projectId} does not belong to profile ${profileId}`);
  }
}

export function getEntry(db: Db, id: number): TimeEntry | null {
  return read(() => {
    const row = db.prepare<[number], EntryRow>('SELECT * FROM time_entries WHERE id = ?').get(id);
    return row ? toEntry(row) : null;
  });
}

export function requireEntry(db: Db, id: number): TimeEntry {
  const entry = getEntry(db, id);
  if (!entry) {
    throw new NotFoundError('TimeEntry', id);
  }
  return entry;
}

/**
 * The open entry, or null. More than one open entry means the store was
 * written behind our back and is reported rather than papered over.
 */
export function findOpenEntry(db: Db): TimeEntry | null {
  return read(() => {
    const rows = selectOpenRows(db);
    if (rows.length > 1) {
      throw new StorageError(
        `Invariant violated: ${rows.length} open time entries (${rows.map((r) => r.id).join(', ')})`
      );
    }
    const [row] = rows;
    return row ? toEntry(row) : null;
  });
}

/**
 * Open a new entry starting at `now`
 */
export function openEntry(db: Db, input: OpenEntryInput, now: number = nowSeconds()): TimeEntry {
  const data = parseInput(openEntrySchema, input);

  return mutate(db, () => {
    const [open] = selectOpenRows(db);
    if (open) {
      throw new ConflictError(`Time entry ${open.id} is already open`);
    }

    requireProfile(db, data.profileId);
    checkProject(db, data.profileId, data.projectId);

    const result = db
      .prepare(
        `INSERT INTO time_entries (profile_id, project_id, start_ts, end_ts, note, tags)
         VALUES (?, ?, ?, NULL, ?, ?)`
      )
      .run(
        data.profileId,
        data.projectId ?? null,
        now,
        data.note ?? '',
        joinTags(data.tags ?? [])
      );
    return requireEntry(db, Number(result.lastInsertRowid));
  });
}

/**
 * Close an open entry at `endTs`
 */
export function closeEntry(db: Db, entryId: number, endTs: number): TimeEntry {
  const end = parseInput(timestamp, endTs);

  return mutate(db, () => {
    const entry = requireEntry(db, entryId);
    if (entry.endTs !== null) {
      throw new InvalidStateError(`Time entry ${entryId} is already closed`);
    }
    if (end < entry.startTs) {
      throw new ValidationError(
        `End ${end} is before start ${entry.startTs} for time entry ${entryId}`
      );
    }

    db.prepare('UPDATE time_entries SET end_ts = ? WHERE id = ?').run(end, entryId);
    return requireEntry(db, entryId);
  });
}

/**
 * Record a finished interval after the fact
 */
export function addManualEntry(db: Db, input: ManualEntryInput): TimeEntry {
  const data = parseInput(manualEntrySchema, input);

  return mutate(db, () => {
    requireProfile(db, data.profileId);
    checkProject(db, data.profileId, data.projectId);

    const result = db
      .prepare(
        `INSERT INTO time_entries (profile_id, project_id, start_ts, end_ts, note, tags)
         VALUES (?, ?, ?, ?, ?, ?)`
      )
      .run(
        data.profileId,
        data.projectId ?? null,
        data.startTs,
        data.endTs,
        data.note ?? '',
        joinTags(data.tags ?? [])
      );
    return requireEntry(db, Number(result.lastInsertRowid));
  });
}

/**
 * Edit an entry. Re-opening a closed entry (endTs: null) is refused while
 * another entry is open.
 */
export function updateEntry(db: Db, id: number, patch: UpdateEntryInput): TimeEntry {
  const data = parseInput(updateEntrySchema, patch);

  return mutate(db, () => {
    const current = requireEntry(db, id);
    const next: TimeEntry = {
      ...current,
      profileId: data.profileId ?? current.profileId,
      projectId: data.projectId !== undefined ? data.projectId : current.projectId,
      startTs: data.startTs ?? current.startTs,
      endTs: data.endTs !== undefined ? data.endTs : current.endTs,
      note: data.note ?? current.note,
      tags: data.tags ?? current.tags,
    };

    if (next.endTs !== null && next.endTs < next.startTs) {
      throw new ValidationError('End must not be before start');
    }

    if (next.endTs === null && current.endTs !== null) {
      const [open] = selectOpenRows(db);
      if (open) {
        throw new ConflictError(`Time entry ${open.id} is already open`);
      }
    }

    if (next.profileId !== current.profileId) {
      requireProfile(db, next.profileId);
    }
    checkProject(db, next.profileId, next.projectId);

    db.prepare(
      `UPDATE time_entries
       SET profile_id = ?, project_id = ?, start_ts = ?, end_ts = ?, note = ?, tags = ?
       WHERE id = ?`
    ).run(
      next.profileId,
      next.projectId,
      next.startTs,
      next.endTs,
      next.note,
      joinTags(next.tags),
      id
    );
    return requireEntry(db, id);
  });
}

export function deleteEntry(db: Db, id: number): void {
  mutate(db, () => {
    const result = db.prepare('DELETE FROM time_entries WHERE id = ?').run(id);
    if (result.changes === 0) {
      throw new NotFoundError('TimeEntry', id);
    }
  });
}

/**
 * Delete several entries in one transaction; returns how many were removed
 */
export function deleteEntries(db: Db, ids: readonly number[]): number {
  if (ids.length === 0) return 0;

  const placeholders = ids.map(() => '?').join(',');
  return mutate(
    db,
    () => db.prepare(`DELETE FROM time_entries WHERE id IN (${placeholders})`).run(...ids).changes
  );
}

/**
 * Entries joined with profile and project names, newest first
 */
export function listEntries(db: Db, filter: EntryFilter = {}): TimeEntryDetails[] {
  const clauses: string[] = [];
  const params: SqlValue[] = [];

  if (filter.profileId !== undefined) {
    clauses.push('e.profile_id = ?');
    params.push(filter.profileId);
  }
  if (filter.projectId !== undefined) {
    clauses.push('e.project_id = ?');
    params.push(filter.projectId);
  }
  if (filter.from !== undefined) {
    clauses.push('e.start_ts >= ?');
    params.push(filter.from);
  }
  if (filter.to !== undefined) {
    clauses.push('e.start_ts <= ?');
    params.push(filter.to);
  }

  const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
  let sql = `
    SELECT e.*, p.name AS profile_name, p.color AS profile_color, proj.name AS project_name
    FROM time_entries e
    JOIN profiles p ON p.id = e.profile_id
    LEFT JOIN projects proj ON proj.id = e.project_id
    ${where}
    ORDER BY e.start_ts DESC, e.id DESC
  `;
  if (filter.limit !== undefined) {
    sql += ' LIMIT ?';
    params.push(filter.limit);
  }

  return read(() =>
    db
      .prepare<SqlValue[], EntryDetailsRow>(sql)
      .all(...params)
      .map(toEntryDetails)
  );
}

/**
 * Seconds covered by an entry; open entries run until `now`
 */
export function entryDuration(entry: Pick<TimeEntry, 'startTs' | 'endTs'>, now: number): number {
  return Math.max(0, (entry.endTs ?? now) - entry.startTs);
}
