/**
 * Services attached to profiles
 */

import { z } from 'zod';
import { mutate, parseInput, read, type Db } from './database.js';
import { requireProfile } from './profiles.js';
import { requireService } from './services.js';
import { NotFoundError } from '../../utils/errors.js';
import { nowSeconds } from '../../utils/format.js';
import type { ProfileServiceDetails } from '../../types/index.js';

interface ProfileServiceRow {
  id: number;
  profile_id: number;
  service_id: number;
  notes: string | null;
  created_ts: number;
  service_name: string;
  rate_cents: number;
  estimated_seconds: number | null;
}

const addProfileServiceSchema = z.object({
  profileId: z.number().int().positive(),
  serviceId: z.number().int().positive(),
  notes: z.string().nullable().optional(),
});

export type AddProfileServiceInput = z.input<typeof addProfileServiceSchema>;

const SELECT_PROFILE_SERVICE = `
  SELECT ps.*, s.name AS service_name, s.rate_cents, s.estimated_seconds
  FROM profile_services ps
  JOIN services s ON s.id = ps.service_id
`;

function toProfileService(row: ProfileServiceRow): ProfileServiceDetails {
  return {
    id: row.id,
    profileId: row.profile_id,
    serviceId: row.service_id,
    notes: row.notes,
    createdTs: row.created_ts,
    serviceName: row.service_name,
    rateCents: row.rate_cents,
    estimatedSeconds: row.estimated_seconds,
  };
}

export function getProfileService(db: Db, id: number): ProfileServiceDetails | null {
  return read(() => {
    const row = db
      .prepare<[number], ProfileServiceRow>(`${SELECT_PROFILE_SERVICE} WHERE ps.id = ?`)
      .get(id);
    return row ? toProfileService(row) : null;
  });
}

export function requireProfileService(db: Db, id: number): ProfileServiceDetails {
  const profileService = getProfileService(db, id);
  if (!profileService) {
    throw new NotFoundError('ProfileService', id);
  }
  return profileService;
}

export function listProfileServices(db: Db, profileId: number): ProfileServiceDetails[] {
  return read(() =>
    db
      .prepare<[number], ProfileServiceRow>(
        `${SELECT_PROFILE_SERVICE} WHERE ps.profile_id = ? ORDER BY ps.created_ts DESC, ps.id DESC`
      )
      .all(profileId)
      .map(toProfileService)
  );
}

export function addProfileService(
  db: Db,
  input: AddProfileServiceInput,
  now: number = nowSeconds()
): ProfileServiceDetails {
  const data = parseInput(addProfileServiceSchema, input);

  return mutate(db, () => {
    requireProfile(db, data.profileId);
    requireService(db, data.serviceId);
    const result = db
      .prepare(
        'INSERT INTO profile_services (profile_id, service_id, notes, created_ts) VALUES (?, ?, ?, ?)'
      )
      .run(data.profileId, data.serviceId, data.notes ?? null, now);
    return requireProfileService(db, Number(result.lastInsertRowid));
  });
}

export function updateProfileServiceNotes(
  db: Db,
  id: number,
  notes: string | null
): ProfileServiceDetails {
  return mutate(db, () => {
    const result = db.prepare('UPDATE profile_services SET notes = ? WHERE id = ?').run(notes, id);
    if (result.changes === 0) {
      throw new NotFoundError('ProfileService', id);
    }
    return requireProfileService(db, id);
  });
}

export function deleteProfileService(db: Db, id: number): void {
  mutate(db, () => {
    const result = db.prepare('DELETE FROM profile_services WHERE id = ?').run(id);
    if (result.changes === 0) {
      throw new NotFoundError('ProfileService', id);
    }
  });
}
