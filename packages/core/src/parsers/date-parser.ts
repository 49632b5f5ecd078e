/**
 * Human-friendly due dates.
 *
 * Each rule maps a lowercase input to a calendar day relative to local
 * midnight of `now`; the first rule that yields a day wins. Results are
 * yyyy-MM-dd strings in local time.
 *
 *   today, now, tomorrow, yesterday, next_week
 *   +3d, +2w, +1m
 *   mon .. sunday          next occurrence, never today
 *   jan15 .. dec31         this year, or next year once passed
 *   2026-03-01
 */

type DateRule = (input: string, today: Date) => Date | null;

const WEEKDAYS = ['sun', 'mon', 'tue', 'wed', 'thu', 'fri', 'sat'] as const;
const WEEKDAY_NAMES = ['sunday', 'monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday'] as const;
const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'] as const;

const NAMED_OFFSETS: ReadonlyMap<string, number> = new Map([
  ['today', 0],
  ['now', 0],
  ['tomorrow', 1],
  ['yesterday', -1],
  ['next_week', 7],
  ['nextweek', 7],
]);

const RELATIVE_RE = /^\+(\d+)([dwm])$/;
const MONTH_DAY_RE = /^([a-z]{3})(\d{1,2})$/;
const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

/** Format a Date as yyyy-MM-dd (local time) */
export function formatDate(d: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`;
}

/** Add days to a date (returns new Date) */
export function addDays(d: Date, n: number): Date {
  return new Date(d.getFullYear(), d.getMonth(), d.getDate() + n);
}

/** The local calendar day, or null when the parts overflow (feb30, 2026-13-01) */
function calendarDay(year: number, month: number, day: number): Date | null {
  const d = new Date(year, month, day);
  return d.getFullYear() === year && d.getMonth() === month && d.getDate() === day ? d : null;
}

const named: DateRule = (input, today) => {
  const offset = NAMED_OFFSETS.get(input);
  return offset === undefined ? null : addDays(today, offset);
};

const relative: DateRule = (input, today) => {
  const match = RELATIVE_RE.exec(input);
  if (!match) return null;
  const [, count = '0', unit] = match;
  const n = Number(count);
  if (unit === 'm') return new Date(today.getFullYear(), today.getMonth() + n, today.getDate());
  return addDays(today, unit === 'w' ? n * 7 : n);
};

const weekday: DateRule = (input, today) => {
  const short = WEEKDAYS.findIndex(d => d === input);
  const target = short >= 0 ? short : WEEKDAY_NAMES.findIndex(d => d === input);
  if (target < 0) return null;
  const ahead = (target - today.getDay() + 7) % 7;
  return addDays(today, ahead === 0 ? 7 : ahead);
};

const monthDay: DateRule = (input, today) => {
  const match = MONTH_DAY_RE.exec(input);
  if (!match) return null;
  const [, name, day = ''] = match;
  const month = MONTHS.findIndex(m => m === name);
  if (month < 0) return null;

  const thisYear = calendarDay(today.getFullYear(), month, Number(day));
  if (!thisYear) return null;
  return thisYear < today ? calendarDay(today.getFullYear() + 1, month, Number(day)) : thisYear;
};

const isoDate: DateRule = input => {
  const match = ISO_DATE_RE.exec(input);
  if (!match) return null;
  const [, year = '', month = '', day = ''] = match;
  return calendarDay(Number(year), Number(month) - 1, Number(day));
};

const RULES: readonly DateRule[] = [named, relative, weekday, monthDay, isoDate];

/**
 * Parse a human-friendly date string into yyyy-MM-dd format.
 * Returns null if the input can't be parsed.
 *
 * @param now - Reference time; only its local calendar day is used.
 */
export function parseDate(input: string | null | undefined, now: Date = new Date()): string | null {
  const normalized = input?.trim().toLowerCase();
  if (!normalized) return null;

  const today = addDays(now, 0);
  for (const rule of RULES) {
    const day = rule(normalized, today);
    if (day) return formatDate(day);
  }
  return null;
}

/** Local midnight of a yyyy-MM-dd date, as an ISO timestamp */
export function dateToDueIso(date: string): string {
  return new Date(date + 'T00:00:00').toISOString();
}

/** Parse user input straight into a due-date timestamp, or null */
export function parseDueDate(input: string, now?: Date): string | null {
  const date = parseDate(input, now);
  return date ? dateToDueIso(date) : null;
}
