/**
 * Tests for duration, money and timestamp formatting
 */

import { describe, it, expect } from 'vitest';
import {
  formatDuration,
  formatExportTimestamp,
  formatRate,
  formatTimestamp,
  joinTags,
  parseRateInput,
  parseTags,
  parseTimeInput,
  parseTimestamp,
} from '../../../src/utils/format.js';

function localSeconds(...parts: [number, number, number, number, number, number?]): number {
  const [y, mo, d, h, mi, s = 0] = parts;
  return Math.floor(new Date(y, mo, d, h, mi, s).getTime() / 1000);
}

describe('formatDuration', () => {
  it('formats seconds as HH:MM:SS', () => {
    expect(formatDuration(0)).toBe('00:00:00');
    expect(formatDuration(3661)).toBe('01:01:01');
    expect(formatDuration(59.9)).toBe('00:00:59');
  });

  it('does not wrap hours at a day', () => {
    expect(formatDuration(90000)).toBe('25:00:00');
  });

  it('clamps negative values to zero', () => {
    expect(formatDuration(-5)).toBe('00:00:00');
  });
});

describe('parseTimeInput', () => {
  it('parses HH:MM and whole hours', () => {
    expect(parseTimeInput('2:30')).toBe(9000);
    expect(parseTimeInput('8')).toBe(28800);
    expect(parseTimeInput(' 01:05 ')).toBe(3900);
  });

  it('rejects invalid input', () => {
    expect(parseTimeInput('')).toBeNull();
    expect(parseTimeInput('abc')).toBeNull();
    expect(parseTimeInput('1:60')).toBeNull();
    expect(parseTimeInput('1.5')).toBeNull();
  });
});

describe('parseRateInput', () => {
  it('parses comma and dot decimals into cents', () => {
    expect(parseRateInput('85,50')).toBe(8550);
    expect(parseRateInput('85.5')).toBe(8550);
    expect(parseRateInput('0,05')).toBe(5);
  });

  it('accepts a currency sign and whitespace', () => {
    expect(parseRateInput('85 €')).toBe(8500);
    expect(parseRateInput('€ 12,00')).toBe(1200);
  });

  it('truncates extra fraction digits', () => {
    expect(parseRateInput('12,345')).toBe(1234);
  });

  it('rejects empty or non-numeric input', () => {
    expect(parseRateInput('')).toBeNull();
    expect(parseRateInput('€')).toBeNull();
    expect(parseRateInput(',')).toBeNull();
    expect(parseRateInput('abc')).toBeNull();
  });
});

describe('formatRate', () => {
  it('formats cents with a comma and euro sign', () => {
    expect(formatRate(8550)).toBe('85,50 €');
    expect(formatRate(5)).toBe('0,05 €');
    expect(formatRate(0)).toBe('0,00 €');
    expect(formatRate(-150)).toBe('-1,50 €');
  });
});

describe('timestamps', () => {
  it('formats export timestamps in local time', () => {
    expect(formatExportTimestamp(localSeconds(2024, 2, 5, 9, 7))).toBe('[05.03.24] - 09:07');
  });

  it('parses and formats YYYY-MM-DD HH:MM:SS in local time', () => {
    const ts = parseTimestamp('2024-03-05 09:07:30');
    expect(ts).toBe(localSeconds(2024, 2, 5, 9, 7, 30));
    expect(formatTimestamp(localSeconds(2024, 2, 5, 9, 7, 30))).toBe('2024-03-05 09:07:30');
  });

  it('rejects malformed and rolled-over dates', () => {
    expect(parseTimestamp('2024-02-31 00:00:00')).toBeNull();
    expect(parseTimestamp('2024-03-05')).toBeNull();
    expect(parseTimestamp('yesterday')).toBeNull();
  });
});

describe('tags', () => {
  it('splits, trims and drops empty tags', () => {
    expect(parseTags('a, b,,c ')).toEqual(['a', 'b', 'c']);
    expect(parseTags(null)).toEqual([]);
    expect(parseTags('')).toEqual([]);
  });

  it('joins trimmed tags and drops empty ones', () => {
    expect(joinTags(['x', ' z ', ''])).toBe('x,z');
    expect(joinTags([])).toBe('');
  });
});
