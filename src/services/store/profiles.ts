/**
 * Profile storage
 */

import { z } from 'zod';
import { buildAssignments, mutate, parseInput, read, type Db } from './database.js';
import { NotFoundError, UniqueConstraintError, ValidationError } from '../../utils/errors.js';
import type { Profile } from '../../types/index.js';

interface ProfileRow {
  id: number;
  name: string;
  color: string | null;
  archived: number;
  target_seconds: number | null;
  company: string | null;
  contact_person: string | null;
  email: string | null;
  phone: string | null;
  business_address: string | null;
  notes: string | null;
}

const optionalText = z.string().nullable().optional();

const profileFields = {
  color: optionalText,
  targetSeconds: z.number().int().nonnegative().nullable().optional(),
  company: optionalText,
  contactPerson: optionalText,
  email: optionalText,
  phone: optionalText,
  businessAddress: optionalText,
  notes: optionalText,
};

const nameSchema = z.string().trim().min(1, 'Name is required');

const createProfileSchema = z.object({ name: nameSchema, ...profileFields });

const updateProfileSchema = z.object({
  name: nameSchema.optional(),
  archived: z.boolean().optional(),
  ...profileFields,
});

export type CreateProfileInput = z.input<typeof createProfileSchema>;
export type UpdateProfileInput = z.input<typeof updateProfileSchema>;

const PROFILE_COLUMNS = [
  ['name', 'name'],
  ['color', 'color'],
  ['archived', 'archived'],
  ['targetSeconds', 'target_seconds'],
  ['company', 'company'],
  ['contactPerson', 'contact_person'],
  ['email', 'email'],
  ['phone', 'phone'],
  ['businessAddress', 'business_address'],
  ['notes', 'notes'],
] as const;

function toProfile(row: ProfileRow): Profile {
  return {
    id: row.id,
    name: row.name,
    color: row.color,
    archived: row.archived === 1,
    targetSeconds: row.target_seconds,
    company: row.company,
    contactPerson: row.contact_person,
    email: row.email,
    phone: row.phone,
    businessAddress: row.business_address,
    notes: row.notes,
  };
}

function assertNameAvailable(db: Db, name: string, exceptId = 0): void {
  const existing = db
    .prepare<[string, number], { id: number }>('SELECT id FROM profiles WHERE name = ? AND id <> ?')
    .get(name, exceptId);
  if (existing) {
    throw new UniqueConstraintError('Profile', name);
  }
}

export function getProfile(db: Db, id: number): Profile | null {
  return read(() => {
    const row = db.prepare<[number], ProfileRow>('SELECT * FROM profiles WHERE id = ?').get(id);
    return row ? toProfile(row) : null;
  });
}

export function requireProfile(db: Db, id: number): Profile {
  const profile = getProfile(db, id);
  if (!profile) {
    throw new NotFoundError('Profile', id);
  }
  return profile;
}

export function listProfiles(db: Db, options: { includeArchived?: boolean } = {}): Profile[] {
  const includeArchived = options.includeArchived ? 1 : 0;
  return read(() =>
    db
      .prepare<[number], ProfileRow>('SELECT * FROM profiles WHERE (? OR archived = 0) ORDER BY name')
      .all(includeArchived)
      .map(toProfile)
  );
}

export function createProfile(db: Db, input: CreateProfileInput): Profile {
  const data = parseInput(createProfileSchema, input);

  return mutate(db, () => {
    assertNameAvailable(db, data.name);
    const result = db
      .prepare(
        `INSERT INTO profiles (name, color, archived, target_seconds, company, contact_person,
           email, phone, business_address, notes)
         VALUES (?, ?, 0, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        data.name,
        data.color ?? null,
        data.targetSeconds ?? null,
        data.company ?? null,
        data.contactPerson ?? null,
        data.email ?? null,
        data.phone ?? null,
        data.businessAddress ?? null,
        data.notes ?? null
      );
    return requireProfile(db, Number(result.lastInsertRowid));
  });
}

export function updateProfile(db: Db, id: number, patch: UpdateProfileInput): Profile {
  const data = parseInput(updateProfileSchema, patch);

  return mutate(db, () => {
    requireProfile(db, id);
    if (data.name !== undefined) {
      assertNameAvailable(db, data.name, id);
    }

    const { sql, params } = buildAssignments(PROFILE_COLUMNS, data);
    if (!sql) {
      throw new ValidationError('No fields to update');
    }
    db.prepare(`UPDATE profiles SET ${sql} WHERE id = ?`).run(...params, id);
    return requireProfile(db, id);
  });
}

export function setProfileArchived(db: Db, id: number, archived: boolean): Profile {
  return updateProfile(db, id, { archived });
}

/**
 * Delete a profile. Projects, entries, todos and attached services go with it.
 */
export function deleteProfile(db: Db, id: number): void {
  mutate(db, () => {
    const result = db.prepare('DELETE FROM profiles WHERE id = ?').run(id);
    if (result.changes === 0) {
      throw new NotFoundError('Profile', id);
    }
  });
}
