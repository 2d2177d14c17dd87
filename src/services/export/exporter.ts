/**
 * Export of time entries to CSV and JSON
 *
 * Rendering is a pure function of an entry snapshot and a reference time
 * (open entries are measured up to it). Only exportEntries touches disk.
 */

import { dirname } from 'path';
import { mkdir, writeFile } from 'fs/promises';
import { listEntries, entryDuration, type Db } from '../store/index.js';
import { formatDuration, formatExportTimestamp, joinTags } from '../../utils/format.js';
import { logger } from '../../utils/logger.js';
import type { TimeEntryDetails } from '../../types/index.js';

/**
 * Export format options
 */
export type ExportFormat = 'csv' | 'json';

export const EXPORT_FORMATS = ['csv', 'json'] as const satisfies readonly ExportFormat[];

export const CSV_HEADER = ['profile', 'project', 'start', 'end', 'duration', 'note', 'tags'] as const;

// Shown in the project column when an entry has no project
export const NO_PROJECT = '—';

/**
 * Export options
 */
export interface ExportOptions {
  format: ExportFormat;
  /** File to write */
  outputPath: string;
  profileId?: number | undefined;
  projectId?: number | undefined;
}

export interface ExportResult {
  format: ExportFormat;
  outputPath: string;
  entryCount: number;
}

/**
 * One JSON export record
 */
export interface ExportedEntry {
  id: number;
  profile_id: number;
  profile: string;
  project_id: number | null;
  project: string | null;
  start_ts: number;
  end_ts: number | null;
  duration_sec: number;
  note: string;
  tags: string;
}

/**
 * Quote a CSV field when it contains a delimiter, quote or line break
 */
export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function entriesToCsv(entries: readonly TimeEntryDetails[], now: number): string {
  const lines = [CSV_HEADER.join(',')];

  for (const entry of entries) {
    const fields = [
      entry.profileName,
      entry.projectName ?? NO_PROJECT,
      formatExportTimestamp(entry.startTs),
      entry.endTs === null ? '' : formatExportTimestamp(entry.endTs),
      formatDuration(entryDuration(entry, now)),
      entry.note,
      joinTags(entry.tags),
    ];
    lines.push(fields.map(escapeCsvField).join(','));
  }

  return `${lines.join('\r\n')}\r\n`;
}

export function toExportedEntry(entry: TimeEntryDetails, now: number): ExportedEntry {
  return {
    id: entry.id,
    profile_id: entry.profileId,
    profile: entry.profileName,
    project_id: entry.projectId,
    project: entry.projectName,
    start_ts: entry.startTs,
    end_ts: entry.endTs,
    duration_sec: entryDuration(entry, now),
    note: entry.note,
    tags: joinTags(entry.tags),
  };
}

export function entriesToJson(entries: readonly TimeEntryDetails[], now: number): string {
  return JSON.stringify(
    entries.map((entry) => toExportedEntry(entry, now)),
    null,
    2
  );
}

export function renderEntries(
  entries: readonly TimeEntryDetails[],
  format: ExportFormat,
  now: number
): string {
  switch (format) {
    case 'csv':
      return entriesToCsv(entries, now);
    case 'json':
      return entriesToJson(entries, now);
  }
}

/**
 * Query entries and write them to a file
 */
export async function exportEntries(
  db: Db,
  options: ExportOptions,
  now: number
): Promise<ExportResult> {
  const entries = listEntries(db, { profileId: options.profileId, projectId: options.projectId });
  const content = renderEntries(entries, options.format, now);

  await mkdir(dirname(options.outputPath), { recursive: true });
  await writeFile(options.outputPath, content, 'utf-8');

  logger.info(`Exported ${entries.length} entries to ${options.outputPath}`, {
    format: options.format,
  });

  return { format: options.format, outputPath: options.outputPath, entryCount: entries.length };
}
