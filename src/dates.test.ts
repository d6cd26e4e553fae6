import { describe, it, expect } from "vitest";
import {
  addDays,
  addMonths,
  addYears,
  ageOn,
  compactDate,
  compactTimestamp,
  daysBetween,
  endOfMonth,
  firstOfMonth,
  isIsoDate,
  parseIsoDate,
} from "./dates";

describe("parseIsoDate", () => {
  it("parses to UTC midnight", () => {
    expect(parseIsoDate("2024-03-15").toISOString()).toBe("2024-03-15T00:00:00.000Z");
  });

  it("rejects malformed and impossible dates", () => {
    expect(() => parseIsoDate("03/15/2024")).toThrow("expected YYYY-MM-DD");
    expect(() => parseIsoDate("2023-02-30")).toThrow("Invalid date: 2023-02-30");
  });
});

describe("date arithmetic", () => {
  it("adds days across month and leap boundaries", () => {
    expect(addDays("2024-02-28", 1)).toBe("2024-02-29");
    expect(addDays("2024-03-01", -1)).toBe("2024-02-29");
    expect(addDays("2023-12-31", 1)).toBe("2024-01-01");
  });

  it("clamps month arithmetic to the end of the month", () => {
    expect(addMonths("2024-01-31", 1)).toBe("2024-02-29");
    expect(addMonths("2024-03-31", -1)).toBe("2024-02-29");
    expect(addYears("2024-02-29", 1)).toBe("2025-02-28");
  });

  it("finds month bounds", () => {
    expect(firstOfMonth("2024-02-17")).toBe("2024-02-01");
    expect(endOfMonth("2024-02-17")).toBe("2024-02-29");
    expect(endOfMonth("2023-12-05")).toBe("2023-12-31");
  });

  it("counts signed days", () => {
    expect(daysBetween("2024-01-01", "2024-12-31")).toBe(365);
    expect(daysBetween("2024-01-10", "2024-01-01")).toBe(-9);
  });
});

describe("ageOn", () => {
  it("counts completed years", () => {
    expect(ageOn("1980-06-15", "2024-06-14")).toBe(43);
    expect(ageOn("1980-06-15", "2024-06-15")).toBe(44);
  });
});

describe("compact formats", () => {
  it("drops hyphens", () => {
    expect(compactDate("2024-03-05")).toBe("20240305");
  });

  it("splits a timestamp in UTC", () => {
    expect(compactTimestamp(new Date("2024-03-05T09:07:45Z"))).toEqual({
      date: "20240305",
      time: "0907",
      seconds: "45",
    });
  });
});

describe("isIsoDate", () => {
  it("accepts real dates only", () => {
    expect(isIsoDate("2024-02-29")).toBe(true);
    expect(isIsoDate("2023-02-29")).toBe(false);
    expect(isIsoDate("2024-2-1")).toBe(false);
  });
});
