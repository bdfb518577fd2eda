import { describe, expect, it } from "vitest";
import {
  createDateRange,
  createSingleDayRange,
  createWeekDateRange,
  combineDateAndTime,
  defaultSchoolYear,
  formatCompactDate,
  formatIsoDateTime,
  parseCalendarDay,
  parseCompactDate,
  parseCompactTime,
  parseDateValue,
  parseIsoDateTime,
  parseTimeValue,
} from "../src/date-utils.js";

describe("parseCompactDate", () => {
  it("reads yyyyMMdd numbers and strings at local midnight", () => {
    expect(parseCompactDate(20250310)).toEqual(new Date(2025, 2, 10));
    expect(parseCompactDate("20250310")).toEqual(new Date(2025, 2, 10));
  });

  it("rejects overflowing days", () => {
    expect(parseCompactDate(20250231)).toBeNull();
  });
});

describe("parseCompactTime", () => {
  it("reads times that lost their leading zero", () => {
    expect(parseCompactTime(805)).toEqual({ hours: 8, minutes: 5 });
    expect(parseCompactTime("1345")).toEqual({ hours: 13, minutes: 45 });
    expect(parseCompactTime("07:30:00")).toEqual({ hours: 7, minutes: 30 });
  });

  it("rejects impossible times", () => {
    expect(parseCompactTime(2460)).toBeNull();
  });
});

describe("parseDateValue", () => {
  it("tries compact forms before ISO ones", () => {
    expect(parseDateValue(202503100815)).toEqual(new Date(2025, 2, 10, 8, 15));
    expect(parseDateValue("2025-03-10")).toEqual(new Date(2025, 2, 10));
    expect(parseDateValue("2025-03-10T08:15")).toEqual(new Date(2025, 2, 10, 8, 15));
  });

  it("reads large numbers as epoch milliseconds", () => {
    expect(parseDateValue(1741594500000)).toEqual(new Date(1741594500000));
  });

  it("returns null for unreadable values", () => {
    expect(parseDateValue("next tuesday")).toBeNull();
    expect(parseDateValue(null)).toBeNull();
    expect(parseDateValue(12.5)).toBeNull();
  });
});

describe("parseCalendarDay", () => {
  it("ignores the time and zone of a date field", () => {
    expect(parseCalendarDay("2025-01-08T23:30:00-05:00")).toEqual(new Date(2025, 0, 8));
    expect(parseCalendarDay("2025-01-08T00:00:00Z")).toEqual(new Date(2025, 0, 8));
  });

  it("reads plain dates as before", () => {
    expect(parseCalendarDay(20250108)).toEqual(new Date(2025, 0, 8));
    expect(parseCalendarDay("2025-01-08")).toEqual(new Date(2025, 0, 8));
  });
});

describe("compact and ISO date-times", () => {
  it("name the same instant", () => {
    const day = parseCompactDate("20250108");
    const time = parseCompactTime("0805");
    if (!day || !time) {
      throw new Error("compact values did not parse");
    }

    expect(combineDateAndTime(day, time).getTime()).toBe(
      parseIsoDateTime("2025-01-08T08:05:00")?.getTime(),
    );
  });
});

describe("parseIsoDateTime", () => {
  it("honours an explicit zone", () => {
    expect(parseIsoDateTime("2025-03-10T08:15:00Z")).toEqual(
      new Date(Date.UTC(2025, 2, 10, 8, 15)),
    );
  });
});

describe("parseTimeValue", () => {
  it("takes the time of day from a full date-time", () => {
    expect(parseTimeValue("2025-03-10T09:40")).toEqual({ hours: 9, minutes: 40 });
  });
});

describe("date ranges", () => {
  it("covers whole days", () => {
    const range = createDateRange("2025-03-10", "2025-03-12");
    expect(range.from).toEqual(new Date(2025, 2, 10));
    expect(range.to).toEqual(new Date(2025, 2, 12, 23, 59, 59, 999));
  });

  it("rejects a range that ends before it starts", () => {
    expect(() => createDateRange("2025-03-12", "2025-03-10")).toThrow(
      "To date must not be before from date",
    );
  });

  it("builds single days and weeks", () => {
    expect(createSingleDayRange("20250310")).toEqual({
      from: new Date(2025, 2, 10),
      to: new Date(2025, 2, 10, 23, 59, 59, 999),
    });
    expect(createWeekDateRange("2025-03-10").to).toEqual(
      new Date(2025, 2, 16, 23, 59, 59, 999),
    );
  });

  it("formats dates for the wire", () => {
    const date = new Date(2025, 2, 10, 8, 5, 9);
    expect(formatCompactDate(date)).toBe("20250310");
    expect(formatIsoDateTime(date)).toBe("2025-03-10T08:05:09");
  });
});

describe("defaultSchoolYear", () => {
  it("runs from September to August", () => {
    expect(defaultSchoolYear(new Date(2025, 2, 10))).toEqual({
      id: 0,
      name: "2024/2025",
      startDate: new Date(2024, 8, 1),
      endDate: new Date(2025, 7, 31),
    });
    expect(defaultSchoolYear(new Date(2025, 8, 1)).name).toBe("2025/2026");
  });
});
