import { describe, it, expect } from 'vitest';
import { parseDate, parseDueDate, dateToDueIso } from '../../src/parsers/date-parser.js';

/** Create a fixed "today" date for deterministic tests */
function today(y: number, m: number, d: number): Date {
  return new Date(y, m - 1, d);
}

describe('parseDate', () => {
  const fixed = today(2026, 2, 8); // Sunday Feb 8 2026

  it('returns null for empty/null/undefined', () => {
    expect(parseDate(null)).toBeNull();
    expect(parseDate(undefined)).toBeNull();
    expect(parseDate('')).toBeNull();
    expect(parseDate('  ')).toBeNull();
  });

  // --- Named dates ---

  it('parses "today" and "now"', () => {
    expect(parseDate('today', fixed)).toBe('2026-02-08');
    expect(parseDate('now', fixed)).toBe('2026-02-08');
  });

  it('parses "tomorrow"', () => {
    expect(parseDate('tomorrow', fixed)).toBe('2026-02-09');
  });

  it('parses "yesterday"', () => {
    expect(parseDate('yesterday', fixed)).toBe('2026-02-07');
  });

  it('parses "next_week"', () => {
    expect(parseDate('next_week', fixed)).toBe('2026-02-15');
    expect(parseDate('nextweek', fixed)).toBe('2026-02-15');
  });

  it('is case-insensitive', () => {
    expect(parseDate('TODAY', fixed)).toBe('2026-02-08');
    expect(parseDate('Tomorrow', fixed)).toBe('2026-02-09');
  });

  // --- Relative dates ---

  it('parses +Nd for days', () => {
    expect(parseDate('+3d', fixed)).toBe('2026-02-11');
    expect(parseDate('+1d', fixed)).toBe('2026-02-09');
  });

  it('parses +Nw for weeks', () => {
    expect(parseDate('+2w', fixed)).toBe('2026-02-22');
  });

  it('parses +Nm for months', () => {
    expect(parseDate('+1m', fixed)).toBe('2026-03-08');
    expect(parseDate('+3m', fixed)).toBe('2026-05-08');
  });

  // --- Day of week ---

  it('parses day-of-week names (next occurrence)', () => {
    expect(parseDate('mon', fixed)).toBe('2026-02-09');
    expect(parseDate('friday', fixed)).toBe('2026-02-13');
  });

  it('returns next week when day-of-week matches today', () => {
    expect(parseDate('sunday', fixed)).toBe('2026-02-15');
  });

  // --- Month + day ---

  it('parses monthDD format', () => {
    expect(parseDate('mar15', fixed)).toBe('2026-03-15');
  });

  it('rolls to next year if month+day is past', () => {
    expect(parseDate('jan1', fixed)).toBe('2027-01-01');
  });

  it('keeps a month+day that falls on today in this year', () => {
    expect(parseDate('feb8', fixed)).toBe('2026-02-08');
  });

  it('returns null for unknown month names', () => {
    expect(parseDate('abc12', fixed)).toBeNull();
  });

  it('returns null for invalid month+day', () => {
    expect(parseDate('feb30', fixed)).toBeNull();
  });

  // --- ISO format ---

  it('parses yyyy-MM-dd', () => {
    expect(parseDate('2026-03-01', fixed)).toBe('2026-03-01');
  });

  it('returns null for invalid ISO dates', () => {
    expect(parseDate('2026-13-01', fixed)).toBeNull();
    expect(parseDate('2026-02-30', fixed)).toBeNull();
    expect(parseDate('not-a-date', fixed)).toBeNull();
  });

  it('does not modify the reference date', () => {
    const now = new Date(2026, 1, 8, 15, 30);
    parseDate('tomorrow', now);
    expect(now.getHours()).toBe(15);
    expect(now.getMinutes()).toBe(30);
  });
});

describe('parseDueDate', () => {
  it('returns local midnight of the parsed day as an ISO timestamp', () => {
    const due = parseDueDate('+1d', today(2026, 2, 8));
    expect(due).toBe(new Date(2026, 1, 9).toISOString());
    expect(due).toBe(dateToDueIso('2026-02-09'));
  });

  it('returns null for unreadable input', () => {
    expect(parseDueDate('whenever', today(2026, 2, 8))).toBeNull();
  });
});
