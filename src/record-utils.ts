import {
  addHours,
  combineDateAndTime,
  parseCalendarDay,
  parseCompactDateTime,
  parseDateValue,
  parseIsoDateTime,
  parseTimeValue,
  startOfDay,
} from "./date-utils.js";

// Typed probing over payloads whose shape depends on the server version.

export type UnknownRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function pickValue(record: UnknownRecord, keys: readonly string[]): unknown {
  for (const key of keys) {
    const value = record[key];
    if (value !== undefined && value !== null) {
      return value;
    }
  }
  return undefined;
}

export function pickString(
  record: UnknownRecord,
  keys: readonly string[],
): string | undefined {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === "string" && value.trim() !== "") {
      return value;
    }
  }
  return undefined;
}

/** Accepts numbers and numeric strings, since ids arrive as either. */
export function pickNumber(
  record: UnknownRecord,
  keys: readonly string[],
): number | undefined {
  for (const key of keys) {
    const value = toNumber(record[key]);
    if (value !== undefined) {
      return value;
    }
  }
  return undefined;
}

export function toNumber(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "string" && /^-?\d+(\.\d+)?$/.test(value.trim())) {
    return Number(value.trim());
  }
  return undefined;
}

export function pickBoolean(
  record: UnknownRecord,
  keys: readonly string[],
): boolean | undefined {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === "boolean") {
      return value;
    }
    if (value === "true" || value === 1) {
      return true;
    }
    if (value === "false" || value === 0) {
      return false;
    }
  }
  return undefined;
}

export function pickArray(
  record: UnknownRecord,
  keys: readonly string[],
): unknown[] | undefined {
  for (const key of keys) {
    const value = record[key];
    if (Array.isArray(value)) {
      return value;
    }
  }
  return undefined;
}

export function pickRecord(
  record: UnknownRecord,
  keys: readonly string[],
): UnknownRecord | undefined {
  for (const key of keys) {
    const value = record[key];
    if (isRecord(value)) {
      return value;
    }
  }
  return undefined;
}

export function recordsOf(value: unknown): UnknownRecord[] {
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

export function stringsOf(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter(
    (item): item is string => typeof item === "string" && item.trim() !== "",
  );
}

/** Finds the first array in a payload under any of the given dotted paths. */
export function locateArray(
  payload: unknown,
  paths: readonly string[],
): unknown[] | undefined {
  if (Array.isArray(payload)) {
    return payload;
  }
  if (!isRecord(payload)) {
    return undefined;
  }

  for (const path of paths) {
    let current: unknown = payload;
    for (const segment of path.split(".")) {
      current = isRecord(current) ? current[segment] : undefined;
    }
    if (Array.isArray(current)) {
      return current;
    }
  }
  return undefined;
}

/** The value of a single-key object, when that value is an array. */
export function soleArray(payload: unknown): unknown[] | undefined {
  if (!isRecord(payload)) {
    return undefined;
  }
  const values = Object.values(payload);
  const only: unknown = values[0];
  return values.length === 1 && Array.isArray(only) ? only : undefined;
}

export interface SpanKeys {
  date: readonly string[];
  start: readonly string[];
  end: readonly string[];
}

export interface TimeSpan {
  start: Date;
  end: Date;
  /** `explicit`: a start time was found; `date-only`: only a day; `defaulted`: nothing usable. */
  source: "explicit" | "date-only" | "defaulted";
}

function pointInTime(raw: unknown, day: Date | null, now: Date): Date | null {
  if (raw === undefined) {
    return null;
  }
  if (typeof raw === "string" || typeof raw === "number") {
    const full =
      parseCompactDateTime(raw) ??
      (typeof raw === "string" ? parseIsoDateTime(raw) : null);
    if (full) {
      return full;
    }
  }
  const time = parseTimeValue(raw);
  if (time) {
    return combineDateAndTime(day ?? now, time);
  }
  return parseDateValue(raw);
}

/**
 * Start and end of a record from whichever date and time fields it has.
 * End falls back to one hour after start; with no date or time at all the
 * span is the hour starting now.
 */
export function resolveTimeSpan(
  record: UnknownRecord,
  keys: SpanKeys,
  now: Date = new Date(),
): TimeSpan {
  const day = parseCalendarDay(pickValue(record, keys.date));

  let start = pointInTime(pickValue(record, keys.start), day, now);
  let source: TimeSpan["source"] = "explicit";
  if (!start && day) {
    start = startOfDay(day);
    source = "date-only";
  }
  if (!start) {
    return { start: new Date(now), end: addHours(now, 1), source: "defaulted" };
  }

  let end = pointInTime(pickValue(record, keys.end), start, now);
  if (!end || end.getTime() < start.getTime()) {
    end = addHours(start, 1);
  }
  return { start, end, source };
}
