import { describe, expect, it } from "vitest";

import {
  addDays,
  dailyWindow,
  dateInZone,
  formatMinuteOfDay,
  isCalendarDate,
  isValidTimeZone,
  midnightMillis,
  minuteOfDay,
} from "../src/calendar.js";

const HOUR = 3_600_000;

describe("addDays", () => {
  it("moves across month and year ends", () => {
    expect(addDays("2024-03-20", -14)).toBe("2024-03-06");
    expect(addDays("2024-02-28", 1)).toBe("2024-02-29");
    expect(addDays("2023-12-31", 1)).toBe("2024-01-01");
    expect(addDays("2024-03-01", -1)).toBe("2024-02-29");
  });

  it("rejects strings that are not calendar dates", () => {
    expect(() => addDays("2024-02-30", 1)).toThrow(RangeError);
  });
});

describe("isCalendarDate", () => {
  it("accepts only real YYYY-MM-DD dates", () => {
    expect(isCalendarDate("2024-02-29")).toBe(true);
    expect(isCalendarDate("2023-02-29")).toBe(false);
    expect(isCalendarDate("2024-2-3")).toBe(false);
    expect(isCalendarDate("yesterday")).toBe(false);
  });
});

describe("day windows", () => {
  it("spans exactly one UTC day in UTC", () => {
    expect(dailyWindow("2024-03-20", "UTC")).toEqual({
      date: "2024-03-20",
      startMillis: Date.UTC(2024, 2, 20),
      endMillis: Date.UTC(2024, 2, 21),
    });
  });

  it("starts at local midnight in a zone behind UTC", () => {
    expect(midnightMillis("2024-03-20", "America/New_York")).toBe(Date.UTC(2024, 2, 20, 4));
  });

  it("is 23 hours long on a spring-forward day", () => {
    const window = dailyWindow("2024-03-31", "Europe/London");
    expect(window.startMillis).toBe(Date.UTC(2024, 2, 31, 0));
    expect(window.endMillis).toBe(Date.UTC(2024, 2, 31, 23));
    expect(window.endMillis - window.startMillis).toBe(23 * HOUR);
  });

  it("is 25 hours long on a fall-back day", () => {
    const window = dailyWindow("2024-11-03", "America/New_York");
    expect(window.startMillis).toBe(Date.UTC(2024, 10, 3, 4));
    expect(window.endMillis).toBe(Date.UTC(2024, 10, 4, 5));
    expect(window.endMillis - window.startMillis).toBe(25 * HOUR);
  });

  it("starts at the first existing time when the clocks skip midnight", () => {
    // São Paulo jumped from 00:00 straight to 01:00 on this date.
    const start = midnightMillis("2018-11-04", "America/Sao_Paulo");
    expect(start).toBe(Date.UTC(2018, 10, 4, 3));
    expect(dateInZone(start, "America/Sao_Paulo")).toBe("2018-11-04");
    expect(minuteOfDay(start, "America/Sao_Paulo")).toBe(60);
    expect(midnightMillis("2018-11-05", "America/Sao_Paulo") - start).toBe(23 * HOUR);
  });
});

describe("wall-clock conversion", () => {
  it("derives minute-of-day in the given zone", () => {
    const instant = Date.UTC(2024, 2, 20, 13, 45, 30);
    expect(minuteOfDay(instant, "UTC")).toBe(825);
    expect(minuteOfDay(instant, "Asia/Kolkata")).toBe(1155);
  });

  it("derives the calendar date in the given zone", () => {
    const instant = Date.UTC(2024, 2, 20, 23, 30);
    expect(dateInZone(instant, "UTC")).toBe("2024-03-20");
    expect(dateInZone(instant, "Asia/Tokyo")).toBe("2024-03-21");
  });

  it("formats minutes as HH:MM", () => {
    expect(formatMinuteOfDay(0)).toBe("00:00");
    expect(formatMinuteOfDay(75)).toBe("01:15");
    expect(formatMinuteOfDay(1439)).toBe("23:59");
  });

  it("recognises unknown zones", () => {
    expect(isValidTimeZone("Europe/London")).toBe(true);
    expect(isValidTimeZone("Not/AZone")).toBe(false);
  });
});
