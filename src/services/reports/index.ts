/**
 * Aggregations over tracked time
 */

import { listEntries, read, requireProfile, entryDuration, type Db } from '../store/index.js';
import { formatDuration, formatRate } from '../../utils/format.js';

export interface WeekSummary {
  year: number;
  week: number;
  weekStartTs: number;
  weekEndTs: number;
  totalSeconds: number;
  totalFormatted: string;
}

export interface ProfileProgress {
  profileId: number;
  trackedSeconds: number;
  targetSeconds: number | null;
  /** tracked / target, 0..1+, null without a target */
  ratio: number | null;
  trackedFormatted: string;
}

export interface BillingLine {
  projectId: number;
  projectName: string;
  serviceName: string;
  rateCents: number;
  trackedSeconds: number;
  amountCents: number;
  amountFormatted: string;
}

export interface BillingSummary {
  profileId: number;
  lines: BillingLine[];
  totalCents: number;
  totalFormatted: string;
}

interface WeekRow {
  year: string;
  week_number: string;
  week_start_ts: number;
  week_end_ts: number;
  total_seconds: number;
}

interface BillingRow {
  project_id: number;
  project_name: string;
  service_name: string;
  rate_cents: number;
}

/**
 * Closed entries grouped by calendar week (weeks start on Monday), newest first
 */
export function weeklySummary(db: Db): WeekSummary[] {
  const rows = read(() =>
    db
      .prepare<[], WeekRow>(
        `SELECT
           strftime('%Y', start_ts, 'unixepoch') AS year,
           strftime('%W', start_ts, 'unixepoch') AS week_number,
           MIN(start_ts) AS week_start_ts,
           MAX(end_ts) AS week_end_ts,
           SUM(end_ts - start_ts) AS total_seconds
         FROM time_entries
         WHERE end_ts IS NOT NULL
         GROUP BY year, week_number
         ORDER BY year DESC, week_number DESC`
      )
      .all()
  );

  return rows.map((row) => ({
    year: parseInt(row.year, 10),
    week: parseInt(row.week_number, 10),
    weekStartTs: row.week_start_ts,
    weekEndTs: row.week_end_ts,
    totalSeconds: row.total_seconds,
    totalFormatted: formatDuration(row.total_seconds),
  }));
}

/**
 * Time tracked for a profile against its target; an open entry counts up to `now`
 */
export function profileProgress(db: Db, profileId: number, now: number): ProfileProgress {
  const profile = requireProfile(db, profileId);
  const trackedSeconds = listEntries(db, { profileId }).reduce(
    (sum, entry) => sum + entryDuration(entry, now),
    0
  );

  return {
    profileId,
    trackedSeconds,
    targetSeconds: profile.targetSeconds,
    ratio:
      profile.targetSeconds && profile.targetSeconds > 0
        ? trackedSeconds / profile.targetSeconds
        : null,
    trackedFormatted: formatDuration(trackedSeconds),
  };
}

/**
 * Billable amount per project whose linked service carries a rate
 */
export function billingSummary(db: Db, profileId: number, now: number): BillingSummary {
  requireProfile(db, profileId);

  const projects = read(() =>
    db
      .prepare<[number], BillingRow>(
        `SELECT p.id AS project_id, p.name AS project_name, s.name AS service_name, s.rate_cents
         FROM projects p
         JOIN services s ON s.id = p.service_id
         WHERE p.profile_id = ?
         ORDER BY p.name`
      )
      .all(profileId)
  );

  const lines = projects.map((project): BillingLine => {
    const trackedSeconds = listEntries(db, { profileId, projectId: project.project_id }).reduce(
      (sum, entry) => sum + entryDuration(entry, now),
      0
    );
    // Integer cents: round once, at the line level
    const amountCents = Math.round((trackedSeconds * project.rate_cents) / 3600);
    return {
      projectId: project.project_id,
      projectName: project.project_name,
      serviceName: project.service_name,
      rateCents: project.rate_cents,
      trackedSeconds,
      amountCents,
      amountFormatted: formatRate(amountCents),
    };
  });

  const totalCents = lines.reduce((sum, line) => sum + line.amountCents, 0);
  return { profileId, lines, totalCents, totalFormatted: formatRate(totalCents) };
}
