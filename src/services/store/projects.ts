/**
 * Project storage
 */

import { z } from 'zod';
import { buildAssignments, mutate, parseInput, read, type Db } from './database.js';
import { requireProfile } from './profiles.js';
import { requireService } from './services.js';
import { NotFoundError, ValidationError } from '../../utils/errors.js';
import { nowSeconds } from '../../utils/format.js';
import type { ProjectDetails } from '../../types/index.js';

interface ProjectRow {
  id: number;
  profile_id: number;
  name: string;
  estimated_seconds: number | null;
  service_id: number | null;
  deadline_ts: number | null;
  start_date_ts: number | null;
  invoice_sent: number;
  invoice_paid: number;
  notes: string | null;
  created_ts: number;
  profile_name: string;
  service_name: string | null;
  rate_cents: number | null;
}

const optionalSeconds = z.number().int().nonnegative().nullable().optional();
const optionalTimestamp = z.number().int().nullable().optional();

const projectFields = {
  name: z.string().trim().min(1, 'Name is required'),
  estimatedSeconds: optionalSeconds,
  serviceId: z.number().int().positive().nullable().optional(),
  deadlineTs: optionalTimestamp,
  startDateTs: optionalTimestamp,
  invoiceSent: z.boolean().optional(),
  invoicePaid: z.boolean().optional(),
  notes: z.string().nullable().optional(),
};

const createProjectSchema = z.object({
  profileId: z.number().int().positive(),
  ...projectFields,
});

const updateProjectSchema = z.object(projectFields).partial();

export type CreateProjectInput = z.input<typeof createProjectSchema>;
export type UpdateProjectInput = z.input<typeof updateProjectSchema>;

const PROJECT_COLUMNS = [
  ['name', 'name'],
  ['estimatedSeconds', 'estimated_seconds'],
  ['serviceId', 'service_id'],
  ['deadlineTs', 'deadline_ts'],
  ['startDateTs', 'start_date_ts'],
  ['invoiceSent', 'invoice_sent'],
  ['invoicePaid', 'invoice_paid'],
  ['notes', 'notes'],
] as const;

const SELECT_PROJECT = `
  SELECT p.*, s.name AS service_name, s.rate_cents, prof.name AS profile_name
  FROM projects p
  LEFT JOIN services s ON s.id = p.service_id
  JOIN profiles prof ON prof.id = p.profile_id
`;

function toProject(row: ProjectRow): ProjectDetails {
  return {
    id: row.id,
    profileId: row.profile_id,
    name: row.name,
    estimatedSeconds: row.estimated_seconds,
    serviceId: row.service_id,
    deadlineTs: row.deadline_ts,
    startDateTs: row.start_date_ts,
    invoiceSent: row.invoice_sent === 1,
    invoicePaid: row.invoice_paid === 1,
    notes: row.notes,
    createdTs: row.created_ts,
    profileName: row.profile_name,
    serviceName: row.service_name,
    rateCents: row.rate_cents,
  };
}

export function getProject(db: Db, id: number): ProjectDetails | null {
  return read(() => {
    const row = db.prepare<[number], ProjectRow>(`${SELECT_PROJECT} WHERE p.id = ?`).get(id);
    return row ? toProject(row) : null;
  });
}

export function requireProject(db: Db, id: number): ProjectDetails {
  const project = getProject(db, id);
  if (!project) {
    throw new NotFoundError('Project', id);
  }
  return project;
}

export function listProjects(db: Db, options: { profileId?: number } = {}): ProjectDetails[] {
  return read(() => {
    if (options.profileId !== undefined) {
      return db
        .prepare<[number], ProjectRow>(
          `${SELECT_PROJECT} WHERE p.profile_id = ? ORDER BY p.created_ts DESC, p.id DESC`
        )
        .all(options.profileId)
        .map(toProject);
    }
    return db
      .prepare<[], ProjectRow>(`${SELECT_PROJECT} ORDER BY p.created_ts DESC, p.id DESC`)
      .all()
      .map(toProject);
  });
}

export function createProject(
  db: Db,
  input: CreateProjectInput,
  now: number = nowSeconds()
): ProjectDetails {
  const data = parseInput(createProjectSchema, input);

  return mutate(db, () => {
    requireProfile(db, data.profileId);
    if (data.serviceId != null) {
      requireService(db, data.serviceId);
    }

    const result = db
      .prepare(
        `INSERT INTO projects (profile_id, name, estimated_seconds, service_id, deadline_ts,
           start_date_ts, invoice_sent, invoice_paid, notes, created_ts)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        data.profileId,
        data.name,
        data.estimatedSeconds ?? null,
        data.serviceId ?? null,
        data.deadlineTs ?? null,
        data.startDateTs ?? null,
        data.invoiceSent ? 1 : 0,
        data.invoicePaid ? 1 : 0,
        data.notes ?? null,
        now
      );
    return requireProject(db, Number(result.lastInsertRowid));
  });
}

export function updateProject(db: Db, id: number, patch: UpdateProjectInput): ProjectDetails {
  const data = parseInput(updateProjectSchema, patch);

  return mutate(db, () => {
    requireProject(db, id);
    if (data.serviceId != null) {
      requireService(db, data.serviceId);
    }

    const { sql, params } = buildAssignments(PROJECT_COLUMNS, data);
    if (!sql) {
      throw new ValidationError('No fields to update');
    }
    db.prepare(`UPDATE projects SET ${sql} WHERE id = ?`).run(...params, id);
    return requireProject(db, id);
  });
}

/**
 * Delete a project. Its todos go with it; entries keep their row with the
 * project cleared.
 */
export function deleteProject(db: Db, id: number): void {
  mutate(db, () => {
    const result = db.prepare('DELETE FROM projects WHERE id = ?').run(id);
    if (result.changes === 0) {
      throw new NotFoundError('Project', id);
    }
  });
}
