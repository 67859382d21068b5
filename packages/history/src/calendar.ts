/** Calendar dates are ISO `YYYY-MM-DD` strings; they order lexicographically. */
export type CalendarDate = string;

export interface DailyWindow {
  date: CalendarDate;
  /** Inclusive, epoch ms. */
  startMillis: number;
  /** Exclusive, epoch ms. */
  endMillis: number;
}

const DAY_MS = 86_400_000;
/** Largest magnitude a `Date` accepts; anything beyond is an invalid time value. */
export const MAX_EPOCH_MS = 8.64e15;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat("en-CA", {
      timeZone,
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
      hourCycle: "h23",
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
}

interface WallClock {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

function wallClock(epochMs: number, timeZone: string): WallClock {
  const fields: Record<string, number> = {};
  for (const part of formatterFor(timeZone).formatToParts(new Date(epochMs))) {
    if (part.type !== "literal") fields[part.type] = Number(part.value);
  }
  return {
    year: fields.year ?? 0,
    month: fields.month ?? 0,
    day: fields.day ?? 0,
    hour: fields.hour ?? 0,
    minute: fields.minute ?? 0,
    second: fields.second ?? 0,
  };
}

export function isRepresentableTime(epochMs: number): boolean {
  return Number.isFinite(epochMs) && Math.abs(epochMs) <= MAX_EPOCH_MS;
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    formatterFor(timeZone);
    return true;
  } catch {
    return false;
  }
}

export function isCalendarDate(value: string): boolean {
  const m = ISO_DATE.exec(value);
  if (!m) return false;
  const [y, mo, d] = [Number(m[1]), Number(m[2]), Number(m[3])];
  const probe = new Date(Date.UTC(y, mo - 1, d));
  return probe.getUTCFullYear() === y && probe.getUTCMonth() === mo - 1 && probe.getUTCDate() === d;
}

function parts(date: CalendarDate): [number, number, number] {
  const m = ISO_DATE.exec(date);
  if (!m || !isCalendarDate(date)) {
    throw new RangeError(`Not a calendar date (YYYY-MM-DD): ${date}`);
  }
  return [Number(m[1]), Number(m[2]), Number(m[3])];
}

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  const [y, m, d] = parts(date);
  const shifted = new Date(Date.UTC(y, m - 1, d) + days * DAY_MS);
  return `${pad(shifted.getUTCFullYear(), 4)}-${pad(shifted.getUTCMonth() + 1)}-${pad(shifted.getUTCDate())}`;
}

/** Calendar date of an instant as seen on a wall clock in `timeZone`. */
export function dateInZone(epochMs: number, timeZone: string): CalendarDate {
  const c = wallClock(epochMs, timeZone);
  return `${pad(c.year, 4)}-${pad(c.month)}-${pad(c.day)}`;
}

/** `hour * 60 + minute` on the wall clock of `timeZone`, in [0, 1439]. */
export function minuteOfDay(epochMs: number, timeZone: string): number {
  const c = wallClock(epochMs, timeZone);
  return c.hour * 60 + c.minute;
}

/** Zone offset from UTC at an instant, in ms (positive east of Greenwich). */
function offsetAt(epochMs: number, timeZone: string): number {
  const c = wallClock(epochMs, timeZone);
  const asUtc = Date.UTC(c.year, c.month - 1, c.day, c.hour, c.minute, c.second);
  return asUtc - (epochMs - (epochMs % 1000));
}

/**
 * First instant of `date` in `timeZone`. Where a DST jump skips midnight this
 * is the first wall-clock time that exists on that day.
 */
export function midnightMillis(date: CalendarDate, timeZone: string): number {
  const [y, m, d] = parts(date);
  const naive = Date.UTC(y, m - 1, d);
  const first = offsetAt(naive, timeZone);
  let candidate = naive - first;
  const second = offsetAt(candidate, timeZone);
  if (second !== first) {
    candidate = naive - second;
    // Midnight fell in a gap: neither offset lands on the date itself.
    if (dateInZone(candidate, timeZone) !== date) {
      candidate = naive - Math.min(first, second);
    }
  }
  return candidate;
}

export function dailyWindow(date: CalendarDate, timeZone: string): DailyWindow {
  return {
    date,
    startMillis: midnightMillis(date, timeZone),
    endMillis: midnightMillis(addDays(date, 1), timeZone),
  };
}

export function systemTimeZone(): string {
  return Intl.DateTimeFormat().resolvedOptions().timeZone;
}

/** `HH:MM` for a minute-of-day. */
export function formatMinuteOfDay(minute: number): string {
  return `${pad(Math.floor(minute / 60))}:${pad(minute % 60)}`;
}
