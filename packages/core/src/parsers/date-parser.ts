/**
 * Parses human-friendly due dates.
 * Supports: today, tomorrow, yesterday, relative (+3d/+2w/+1m),
 * day-of-week names (mon-sunday), month+day (jan15), yyyy-MM-dd,
 * and full ISO-8601 timestamps.
 */

const RELATIVE_RE = /^\+(\d+)([dwm])$/;
const MONTH_DAY_RE = /^(jan|feb|mar|apr|may|jun|jul|aug|sep|oct|nov|dec)(\d{1,2})$/;
const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}$/;
const ISO_TIMESTAMP_RE = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}/;

const DAY_MAP: Readonly<Record<string, number>> = {
  sun: 0, sunday: 0,
  mon: 1, monday: 1,
  tue: 2, tuesday: 2,
  wed: 3, wednesday: 3,
  thu: 4, thursday: 4,
  fri: 5, friday: 5,
  sat: 6, saturday: 6,
};

const MONTH_MAP: Readonly<Record<string, number>> = {
  jan: 0, feb: 1, mar: 2, apr: 3,
  may: 4, jun: 5, jul: 6, aug: 7,
  sep: 8, oct: 9, nov: 10, dec: 11,
};

/** Format a Date as yyyy-MM-dd (local) */
function formatDate(d: Date): string {
  const y = d.getFullYear();
  const m = String(d.getMonth() + 1).padStart(2, '0');
  const day = String(d.getDate()).padStart(2, '0');
  return `${y}-${m}-${day}`;
}

/** Add days to a date (returns new Date) */
function addDays(d: Date, n: number): Date {
  const r = new Date(d);
  r.setDate(r.getDate() + n);
  return r;
}

function addMonths(d: Date, n: number): Date {
  const r = new Date(d);
  r.setMonth(r.getMonth() + n);
  return r;
}

function startOfDay(d: Date): Date {
  return new Date(d.getFullYear(), d.getMonth(), d.getDate());
}

function tryParseRelative(input: string, today: Date): Date | null {
  const m = RELATIVE_RE.exec(input);
  const amount = m?.[1];
  if (amount === undefined) return null;

  const count = parseInt(amount, 10);
  switch (m?.[2]) {
    case 'd': return addDays(today, count);
    case 'w': return addDays(today, count * 7);
    case 'm': return addMonths(today, count);
    default: return null;
  }
}

function tryParseDayOfWeek(input: string, today: Date): Date | null {
  const target = Object.hasOwn(DAY_MAP, input) ? DAY_MAP[input] : undefined;
  if (target === undefined) return null;

  let daysUntil = (target - today.getDay() + 7) % 7;
  if (daysUntil === 0) daysUntil = 7; // same weekday means next week
  return addDays(today, daysUntil);
}

function tryParseMonthDay(input: string, today: Date): Date | null {
  const m = MONTH_DAY_RE.exec(input);
  const monthName = m?.[1];
  const dayText = m?.[2];
  if (monthName === undefined || dayText === undefined) return null;

  const month = MONTH_MAP[monthName];
  if (month === undefined) return null;
  const day = parseInt(dayText, 10);
  const candidate = new Date(today.getFullYear(), month, day);
  if (candidate.getMonth() !== month || candidate.getDate() !== day) {
    return null; // e.g. feb30
  }

  // Already past this year: next occurrence
  if (candidate < today) candidate.setFullYear(candidate.getFullYear() + 1);
  return candidate;
}

function tryParseStandard(input: string): Date | null {
  if (!ISO_DATE_RE.test(input)) return null;

  const d = new Date(`${input}T00:00:00`);
  if (Number.isNaN(d.getTime())) return null;

  // Rejects rollovers like 2026-02-30
  return formatDate(d) === input ? d : null;
}

/** Resolve a date expression to local midnight of that day, or null */
function resolveDay(input: string, now: Date): Date | null {
  const today = startOfDay(now);
  const normalized = input.toLowerCase();

  switch (normalized) {
    case 'today': return today;
    case 'tomorrow': return addDays(today, 1);
    case 'yesterday': return addDays(today, -1);
    default:
      return tryParseRelative(normalized, today)
        ?? tryParseDayOfWeek(normalized, today)
        ?? tryParseMonthDay(normalized, today)
        ?? tryParseStandard(input);
  }
}

/**
 * Parse a due date into the ISO-8601 timestamp the store keeps.
 * Date expressions resolve to local midnight; a full timestamp passes through normalised.
 * Returns null if the input can't be parsed.
 *
 * @param input - e.g. "today", "+3d", "friday", "jan15", "2026-03-01", "2026-03-01T09:00Z"
 * @param now - Override "today" for testing. Defaults to the current date.
 */
export function parseDueDate(input: string | null | undefined, now: Date = new Date()): string | null {
  const trimmed = input?.trim();
  if (!trimmed) return null;

  if (ISO_TIMESTAMP_RE.test(trimmed)) {
    const ms = Date.parse(trimmed);
    return Number.isNaN(ms) ? null : new Date(ms).toISOString();
  }

  const day = resolveDay(trimmed, now);
  return day ? day.toISOString() : null;
}
