import type { DateRange, SchoolYear } from "./types.js";

const ONE_HOUR_MS = 60 * 60 * 1000;

export interface ClockTime {
  hours: number;
  minutes: number;
}

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

function buildLocalDate(
  year: number,
  month: number,
  day: number,
  hours = 0,
  minutes = 0,
  seconds = 0,
): Date | null {
  if (hours > 23 || minutes > 59 || seconds > 59) {
    return null;
  }
  const date = new Date(year, month - 1, day, hours, minutes, seconds, 0);
  // Rejects overflow such as 20250231.
  if (
    date.getFullYear() !== year ||
    date.getMonth() !== month - 1 ||
    date.getDate() !== day
  ) {
    return null;
  }
  return date;
}

/** `yyyyMMdd` as a number or string, at local midnight. */
export function parseCompactDate(value: string | number): Date | null {
  const text = String(value).trim();
  const match = /^(\d{4})(\d{2})(\d{2})$/.exec(text);
  if (!match) {
    return null;
  }
  return buildLocalDate(Number(match[1]), Number(match[2]), Number(match[3]));
}

/** `HHmm` (also `Hmm`, as numbers like 805 lose the leading zero) or `HH:mm[:ss]`. */
export function parseCompactTime(value: string | number): ClockTime | null {
  const text = String(value).trim();

  const compact = /^(\d{1,2})(\d{2})$/.exec(text);
  const clock = /^(\d{1,2}):(\d{2})(?::\d{2})?$/.exec(text);
  const match = compact ?? clock;
  if (!match) {
    return null;
  }

  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (hours > 23 || minutes > 59) {
    return null;
  }
  return { hours, minutes };
}

/** `yyyyMMddHHmm`. */
export function parseCompactDateTime(value: string | number): Date | null {
  const text = String(value).trim();
  const match = /^(\d{4})(\d{2})(\d{2})(\d{2})(\d{2})$/.exec(text);
  if (!match) {
    return null;
  }
  return buildLocalDate(
    Number(match[1]),
    Number(match[2]),
    Number(match[3]),
    Number(match[4]),
    Number(match[5]),
  );
}

export function parseIsoDate(value: string): Date | null {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value.trim());
  if (!match) {
    return null;
  }
  return buildLocalDate(Number(match[1]), Number(match[2]), Number(match[3]));
}

/**
 * `yyyy-MM-ddTHH:mm[:ss[.SSS]]`, optionally zoned. Without a zone the value
 * is read as local time, which `Date.parse` does not guarantee for every form.
 */
export function parseIsoDateTime(value: string): Date | null {
  const match =
    /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?$/.exec(
      value.trim(),
    );
  if (!match) {
    return null;
  }

  const local = buildLocalDate(
    Number(match[1]),
    Number(match[2]),
    Number(match[3]),
    Number(match[4]),
    Number(match[5]),
    Number(match[6] ?? "0"),
  );
  if (!local || !match[7]) {
    return local;
  }

  const zoned = new Date(value.trim());
  return Number.isNaN(zoned.getTime()) ? null : zoned;
}

/**
 * Parses any accepted date encoding. Compact forms are tried before ISO ones,
 * since legacy servers send them far more often.
 */
export function parseDateValue(value: unknown): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : new Date(value.getTime());
  }
  if (typeof value === "number") {
    if (!Number.isInteger(value) || value < 0) {
      return null;
    }
    const compact = parseCompactDateTime(value) ?? parseCompactDate(value);
    if (compact) {
      return compact;
    }
    // Epoch milliseconds, as some REST views send them.
    return value >= 1_000_000_000_000 ? new Date(value) : null;
  }
  if (typeof value !== "string") {
    return null;
  }

  const text = value.trim();
  if (text === "") {
    return null;
  }
  return (
    parseCompactDateTime(text) ??
    parseCompactDate(text) ??
    parseIsoDateTime(text) ??
    parseIsoDate(text)
  );
}

/**
 * Calendar day of a date field. A time part (`2025-01-08T00:00:00Z`) is
 * cut off first, so a zone never moves the day.
 */
export function parseCalendarDay(value: unknown): Date | null {
  if (typeof value === "string") {
    const timeStart = value.indexOf("T");
    return parseDateValue(timeStart > 0 ? value.slice(0, timeStart) : value);
  }
  return parseDateValue(value);
}

/** Reads a time-of-day from either a compact/clock time or a full date-time. */
export function parseTimeValue(value: unknown): ClockTime | null {
  if (typeof value === "number" || typeof value === "string") {
    const time = parseCompactTime(value);
    if (time) {
      return time;
    }
  }
  if (typeof value === "string" && /[T ]\d{2}:\d{2}/.test(value)) {
    const dateTime = parseIsoDateTime(value);
    if (dateTime) {
      return { hours: dateTime.getHours(), minutes: dateTime.getMinutes() };
    }
  }
  return null;
}

export function combineDateAndTime(date: Date, time: ClockTime): Date {
  return new Date(
    date.getFullYear(),
    date.getMonth(),
    date.getDate(),
    time.hours,
    time.minutes,
    0,
    0,
  );
}

export function addHours(date: Date, hours: number): Date {
  return new Date(date.getTime() + hours * ONE_HOUR_MS);
}

export function startOfDay(date: Date): Date {
  const copy = new Date(date);
  copy.setHours(0, 0, 0, 0);
  return copy;
}

export function formatCompactDate(date: Date): string {
  return `${date.getFullYear()}${pad2(date.getMonth() + 1)}${pad2(date.getDate())}`;
}

export function formatIsoDate(date: Date): string {
  return `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
}

export function formatIsoDateTime(date: Date): string {
  return `${formatIsoDate(date)}T${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
}

export function formatClockTime(time: ClockTime): string {
  return `${pad2(time.hours)}:${pad2(time.minutes)}`;
}

function toDate(value: string | Date): Date {
  const parsed =
    typeof value === "string" ? parseDateValue(value) : new Date(value);
  if (!parsed || Number.isNaN(parsed.getTime())) {
    throw new Error(`Invalid date format provided: ${String(value)}`);
  }
  return parsed;
}

// Helper methods for easier date range creation
export function createDateRange(
  fromValue: string | Date,
  toValue: string | Date,
): DateRange {
  const from = startOfDay(toDate(fromValue));
  const to = toDate(toValue);
  to.setHours(23, 59, 59, 999);

  if (to.getTime() < from.getTime()) {
    throw new Error("To date must not be before from date");
  }

  return { from, to };
}

export function createSingleDayRange(date: string | Date): DateRange {
  const target = toDate(date);
  const from = startOfDay(target);
  const to = new Date(target);
  to.setHours(23, 59, 59, 999);
  return { from, to };
}

export function createWeekDateRange(startDate?: string | Date): DateRange {
  const start = startOfDay(startDate ? toDate(startDate) : new Date());

  const end = new Date(start);
  end.setDate(end.getDate() + 6); // 7 days total
  end.setHours(23, 59, 59, 999);

  return { from: start, to: end };
}

/** September to August, the usual school year when the server cannot tell. */
export function defaultSchoolYear(today: Date = new Date()): SchoolYear {
  const startYear =
    today.getMonth() >= 8 ? today.getFullYear() : today.getFullYear() - 1;
  return {
    id: 0,
    name: `${startYear}/${startYear + 1}`,
    startDate: new Date(startYear, 8, 1),
    endDate: new Date(startYear + 1, 7, 31),
  };
}
