/**
 * Service catalog storage
 */

import { z } from 'zod';
import { buildAssignments, mutate, parseInput, read, type Db } from './database.js';
import { NotFoundError, UniqueConstraintError, ValidationError } from '../../utils/errors.js';
import type { Service } from '../../types/index.js';

interface ServiceRow {
  id: number;
  name: string;
  rate_cents: number;
  estimated_seconds: number | null;
}

const createServiceSchema = z.object({
  name: z.string().trim().min(1, 'Name is required'),
  // Integer cents only: no floating point money
  rateCents: z.number().int('Rate must be whole cents').nonnegative(),
  estimatedSeconds: z.number().int().nonnegative().nullable().optional(),
});

const updateServiceSchema = createServiceSchema.partial();

export type CreateServiceInput = z.input<typeof createServiceSchema>;
export type UpdateServiceInput = z.input<typeof updateServiceSchema>;

const SERVICE_COLUMNS = [
  ['name', 'name'],
  ['rateCents', 'rate_cents'],
  ['estimatedSeconds', 'estimated_seconds'],
] as const;

function toService(row: ServiceRow): Service {
  return {
    id: row.id,
    name: row.name,
    rateCents: row.rate_cents,
    estimatedSeconds: row.estimated_seconds,
  };
}

function assertNameAvailable(db: Db, name: string, exceptId = 0): void {
  const existing = db
    .prepare<[string, number], { id: number }>('SELECT id FROM services WHERE name = ? AND id <> ?')
    .get(name, exceptId);
  if (existing) {
    throw new UniqueConstraintError('Service', name);
  }
}

export function getService(db: Db, id: number): Service | null {
  return read(() => {
    const row = db.prepare<[number], ServiceRow>('SELECT * FROM services WHERE id = ?').get(id);
    return row ? toService(row) : null;
  });
}

export function requireService(db: Db, id: number): Service {
  const service = getService(db, id);
  if (!service) {
    throw new NotFoundError('Service', id);
  }
  return service;
}

export function listServices(db: Db): Service[] {
  return read(() =>
    db.prepare<[], ServiceRow>('SELECT * FROM services ORDER BY name').all().map(toService)
  );
}

export function createService(db: Db, input: CreateServiceInput): Service {
  const data = parseInput(createServiceSchema, input);

  return mutate(db, () => {
    assertNameAvailable(db, data.name);
    const result = db
      .prepare('INSERT INTO services (name, rate_cents, estimated_seconds) VALUES (?, ?, ?)')
      .run(data.name, data.rateCents, data.estimatedSeconds ?? null);
    return requireService(db, Number(result.lastInsertRowid));
  });
}

export function updateService(db: Db, id: number, patch: UpdateServiceInput): Service {
  const data = parseInput(updateServiceSchema, patch);

  return mutate(db, () => {
    requireService(db, id);
    if (data.name !== undefined) {
      assertNameAvailable(db, data.name, id);
    }

    const { sql, params } = buildAssignments(SERVICE_COLUMNS, data);
    if (!sql) {
      throw new ValidationError('No fields to update');
    }
    db.prepare(`UPDATE services SET ${sql} WHERE id = ?`).run(...params, id);
    return requireService(db, id);
  });
}

/**
 * Delete a service. Projects keep their row with the service cleared;
 * profile attachments of the service are removed.
 */
export function deleteService(db: Db, id: number): void {
  mutate(db, () => {
    const result = db.prepare('DELETE FROM services WHERE id = ?').run(id);
    if (result.changes === 0) {
      throw new NotFoundError('Service', id);
    }
  });
}
