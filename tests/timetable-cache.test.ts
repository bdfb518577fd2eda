import { describe, expect, it } from "vitest";
import { InMemoryTimetableCache, NoopTimetableCache } from "../src/timetable-cache.js";
import { PeriodState, type Period, type Timetable } from "../src/types.js";

function period(id: number, day: number): Period {
  return {
    id,
    lessonId: id,
    startDateTime: new Date(2025, 2, day, 8, 0),
    endDateTime: new Date(2025, 2, day, 8, 45),
    foreColor: "#000000",
    backColor: "#FFFFFF",
    innerForeColor: "#000000",
    innerBackColor: "#FFFFFF",
    text: { lesson: `Lesson ${id}` },
    elements: [],
    can: new Set(),
    is: new Set([PeriodState.REGULAR]),
  };
}

const week: Timetable = {
  displayableStartDate: new Date(2025, 2, 10),
  displayableEndDate: new Date(2025, 2, 14, 23, 59, 59, 999),
  periods: [period(1, 10), period(2, 12), period(3, 14)],
};

describe("NoopTimetableCache", () => {
  it("never has anything and accepts every write", async () => {
    const cache = new NoopTimetableCache();
    expect(await cache.store("user", week)).toEqual({ ok: true });
    expect(
      await cache.loadCached("user", { from: week.displayableStartDate, to: week.displayableEndDate }),
    ).toBeNull();
  });
});

describe("InMemoryTimetableCache", () => {
  it("answers a range inside a stored timetable", async () => {
    const cache = new InMemoryTimetableCache();
    await cache.store("user", week);

    const day = { from: new Date(2025, 2, 12), to: new Date(2025, 2, 12, 23, 59, 59, 999) };
    const cached = await cache.loadCached("user", day);

    expect(cached?.displayableStartDate).toEqual(day.from);
    expect(cached?.periods.map((entry) => entry.id)).toEqual([2]);
  });

  it("misses ranges it does not cover and other users", async () => {
    const cache = new InMemoryTimetableCache();
    await cache.store("user", week);

    expect(
      await cache.loadCached("user", { from: new Date(2025, 2, 14), to: new Date(2025, 2, 16) }),
    ).toBeNull();
    expect(
      await cache.loadCached("other", { from: new Date(2025, 2, 10), to: new Date(2025, 2, 11) }),
    ).toBeNull();
  });

  it("refuses a timetable that ends before it starts", async () => {
    const cache = new InMemoryTimetableCache();
    expect(
      await cache.store("user", {
        ...week,
        displayableEndDate: new Date(2025, 2, 1),
      }),
    ).toEqual({ ok: false, reason: "Timetable range ends before it starts" });
  });

  it("keeps a bounded number of timetables per user", async () => {
    const cache = new InMemoryTimetableCache(1);
    await cache.store("user", week);
    await cache.store("user", {
      displayableStartDate: new Date(2025, 2, 17),
      displayableEndDate: new Date(2025, 2, 21),
      periods: [],
    });

    expect(
      await cache.loadCached("user", { from: new Date(2025, 2, 10), to: new Date(2025, 2, 11) }),
    ).toBeNull();
  });
});
