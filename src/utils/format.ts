/**
 * Formatting and parsing for durations, money and timestamps
 */

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Current wall-clock time in whole epoch seconds
 */
export function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

/**
 * Format seconds as HH:MM:SS (hours are not wrapped at 24)
 */
export function formatDuration(seconds: number): string {
  const total = Math.max(0, Math.floor(seconds));
  const h = Math.floor(total / 3600);
  const m = Math.floor((total % 3600) / 60);
  const s = total % 60;
  return `${pad2(h)}:${pad2(m)}:${pad2(s)}`;
}

/**
 * Parse "HH:MM" or a whole number of hours into seconds.
 * Returns null for anything else.
 */
export function parseTimeInput(text: string): number | null {
  const trimmed = text.trim();
  if (!trimmed) return null;

  const match = trimmed.match(/^(\d+)(?::(\d+))?$/);
  if (!match) return null;

  const hours = parseInt(match[1] ?? '0', 10);
  const minutes = match[2] === undefined ? 0 : parseInt(match[2], 10);
  if (minutes >= 60) return null;
  return hours * 3600 + minutes * 60;
}

/**
 * Parse a currency amount into integer cents.
 * Accepts "85", "85,5", "85,50", "85.50" and a trailing or leading "€".
 */
export function parseRateInput(text: string): number | null {
  const norm = text.replace(/[\s€]/g, '').replace('.', ',');
  if (!norm) return null;

  const match = norm.match(/^(\d*)(?:,(\d*))?$/);
  if (!match || (!match[1] && !match[2])) return null;

  const euros = match[1] ? parseInt(match[1], 10) : 0;
  // Pad or truncate the fraction to two digits
  const cents = parseInt(`${match[2] ?? ''}00`.slice(0, 2), 10);
  return euros * 100 + cents;
}

/**
 * Format integer cents as "85,50 €"
 */
export function formatRate(cents: number): string {
  const sign = cents < 0 ? '-' : '';
  const abs = Math.abs(Math.trunc(cents));
  return `${sign}${Math.floor(abs / 100)},${pad2(abs % 100)} €`;
}

/**
 * Format an epoch-seconds timestamp as "YYYY-MM-DD HH:MM:SS" in local time
 */
export function formatTimestamp(ts: number): string {
  const d = new Date(ts * 1000);
  return (
    `${d.getFullYear()}-${pad2(d.getMonth() + 1)}-${pad2(d.getDate())} ` +
    `${pad2(d.getHours())}:${pad2(d.getMinutes())}:${pad2(d.getSeconds())}`
  );
}

/**
 * Format an epoch-seconds timestamp as "[DD.MM.YY] - HH:MM" in local time
 */
export function formatExportTimestamp(ts: number): string {
  const d = new Date(ts * 1000);
  const year = pad2(d.getFullYear() % 100);
  return `[${pad2(d.getDate())}.${pad2(d.getMonth() + 1)}.${year}] - ${pad2(d.getHours())}:${pad2(d.getMinutes())}`;
}

/**
 * Parse "YYYY-MM-DD HH:MM:SS" (local time) into epoch seconds
 */
export function parseTimestamp(text: string): number | null {
  const match = text.trim().match(/^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/);
  if (!match) return null;

  const [, y, mo, d, h, mi, s] = match.map((part) => parseInt(part, 10));
  if (
    y === undefined ||
    mo === undefined ||
    d === undefined ||
    h === undefined ||
    mi === undefined ||
    s === undefined
  ) {
    return null;
  }

  const date = new Date(y, mo - 1, d, h, mi, s);
  // Reject rollovers such as 2024-02-31
  if (date.getMonth() !== mo - 1 || date.getDate() !== d) return null;
  return Math.floor(date.getTime() / 1000);
}

/**
 * Tags are stored as a comma separated string
 */
export function parseTags(csv: string | null | undefined): string[] {
  if (!csv) return [];
  return csv
    .split(',')
    .map((tag) => tag.trim())
    .filter(Boolean);
}

export function joinTags(tags: readonly string[]): string {
  return tags
    .map((tag) => tag.trim())
    .filter(Boolean)
    .join(',');
}
