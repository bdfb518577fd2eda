import { logger } from "./logger.js";
import type { DateRange, Timetable } from "./types.js";

export interface CacheStoreResult {
  ok: boolean;
  reason?: string;
}

/**
 * Offline copy of timetables. Implementations may fail at will: the
 * session logs failures and carries on.
 */
export interface TimetableCache {
  loadCached(tenantUserId: string, range: DateRange): Promise<Timetable | null>;
  store(tenantUserId: string, timetable: Timetable): Promise<CacheStoreResult>;
}

export class NoopTimetableCache implements TimetableCache {
  async loadCached(_tenantUserId: string, _range: DateRange): Promise<Timetable | null> {
    return null;
  }

  async store(_tenantUserId: string, _timetable: Timetable): Promise<CacheStoreResult> {
    return { ok: true };
  }
}

function covers(timetable: Timetable, range: DateRange): boolean {
  return (
    timetable.displayableStartDate.getTime() <= range.from.getTime() &&
    timetable.displayableEndDate.getTime() >= range.to.getTime()
  );
}

/**
 * Keeps every stored timetable per user and answers a range from the first
 * one that covers it, trimmed to the periods inside the range.
 */
export class InMemoryTimetableCache implements TimetableCache {
  private entries: Map<string, Timetable[]> = new Map();

  constructor(private readonly maxEntriesPerUser = 8) {}

  async loadCached(tenantUserId: string, range: DateRange): Promise<Timetable | null> {
    const stored = this.entries.get(tenantUserId) ?? [];
    const hit = stored.find((timetable) => covers(timetable, range));
    if (!hit) {
      logger.debug(`[CACHE] Miss for ${tenantUserId}`);
      return null;
    }

    return {
      displayableStartDate: range.from,
      displayableEndDate: range.to,
      periods: hit.periods.filter(
        (period) =>
          period.startDateTime.getTime() <= range.to.getTime() &&
          period.endDateTime.getTime() >= range.from.getTime(),
      ),
    };
  }

  async store(tenantUserId: string, timetable: Timetable): Promise<CacheStoreResult> {
    if (timetable.displayableEndDate.getTime() < timetable.displayableStartDate.getTime()) {
      return { ok: false, reason: "Timetable range ends before it starts" };
    }

    const stored = [timetable, ...(this.entries.get(tenantUserId) ?? [])];
    this.entries.set(tenantUserId, stored.slice(0, this.maxEntriesPerUser));
    return { ok: true };
  }
}
