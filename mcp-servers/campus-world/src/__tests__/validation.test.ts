import { describe, it, expect } from "vitest";
import {
  compareWorldTime, formatSimDate, matchesCreditFilter, parseClock, parseCreditFilter, parseEventTime,
  parseSimDate, parseTimeRange, parseWorldTime, validateEmailAddress, validatePopularity,
} from "../validation.js";
import { timePrompt } from "../world/clock.js";
import { hashString32, SeededRng } from "../rng.js";

describe("clock parsing", () => {
  it("converts HH:MM to minutes", () => {
    expect(parseClock("09:30")).toBe(570);
    expect(parseClock("9:05")).toBe(545);
  });

  it("accepts 24:00 only as an exact end of day", () => {
    expect(parseClock("24:00")).toBe(1440);
    expect(parseClock("24:01")).toBeNull();
    expect(parseClock("10:60")).toBeNull();
  });

  it("parses a time range and rejects empty or reversed ones", () => {
    expect(parseTimeRange("14:00-16:00")).toEqual({ start: 840, end: 960 });
    expect(parseTimeRange("16:00-14:00")).toBeNull();
    expect(parseTimeRange("14:00-14:00")).toBeNull();
    expect(parseTimeRange("14:00")).toBeNull();
  });
});

describe("simulated dates", () => {
  it("parses dates case-insensitively and renders the canonical label", () => {
    const date = parseSimDate("week 1 saturday");
    expect(date).toEqual({ week: 1, day: "Saturday" });
    expect(date && formatSimDate(date)).toBe("Week 1, Saturday");
  });

  it("rejects unknown day names", () => {
    expect(parseSimDate("Week 1, Funday")).toBeNull();
  });

  it("parses event times", () => {
    expect(parseEventTime("Week 1, Monday, 14:00-16:00")).toEqual({
      date: { week: 1, day: "Monday" },
      range: { start: 840, end: 960 },
    });
    expect(parseEventTime("Week 1, Monday")).toBeNull();
  });

  it("parses world times and orders them", () => {
    const a = parseWorldTime("Week 2, Friday, 9:05");
    expect(a).toEqual({ week: 2, day: "Friday", time: "09:05" });
    expect(parseWorldTime("Week 1, Monday, 24:00")).toBeNull();

    const b = parseWorldTime("Week 2, Saturday, 08:00");
    const c = parseWorldTime("Week 3, Monday, 07:00");
    if (!a || !b || !c) throw new Error("unparsed");
    expect(compareWorldTime(a, b)).toBeLessThan(0);
    expect(compareWorldTime(c, b)).toBeGreaterThan(0);
    expect(compareWorldTime(a, a)).toBe(0);
  });
});

describe("credit filters", () => {
  it("parses comparison strings and bare numbers", () => {
    expect(parseCreditFilter("<=3")).toEqual({ op: "<=", value: 3 });
    expect(parseCreditFilter(">2")).toEqual({ op: ">", value: 2 });
    expect(parseCreditFilter("4")).toEqual({ op: "=", value: 4 });
    expect(parseCreditFilter(4)).toEqual({ op: "=", value: 4 });
    expect(parseCreditFilter("lots")).toBeNull();
  });

  it("matches credits", () => {
    expect(matchesCreditFilter(3, { op: "<=", value: 3 })).toBe(true);
    expect(matchesCreditFilter(4, { op: "<=", value: 3 })).toBe(false);
    expect(matchesCreditFilter(2, { op: ">", value: 2 })).toBe(false);
  });
});

describe("misc validators", () => {
  it("checks popularity bounds", () => {
    expect(validatePopularity(0)).toBe(true);
    expect(validatePopularity(100)).toBe(true);
    expect(validatePopularity(101)).toBe(false);
    expect(validatePopularity(50.5)).toBe(false);
  });

  it("checks email addresses", () => {
    expect(validateEmailAddress("advisor@campus.edu")).toBe(true);
    expect(validateEmailAddress("advisor")).toBe(false);
  });

  it("renders the 12-hour time prompt", () => {
    expect(timePrompt("14:05")).toBe("System Prompt: It is now 2:05 PM.");
    expect(timePrompt("00:30")).toBe("System Prompt: It is now 12:30 AM.");
    expect(timePrompt("12:00")).toBe("System Prompt: It is now 12:00 PM.");
  });
});

describe("seeded rng", () => {
  it("hashes deterministically", () => {
    expect(hashString32("abc")).toBe(hashString32("abc"));
    expect(hashString32("abc")).not.toBe(hashString32("abd"));
    expect(hashString32("")).toBe(2166136261);
  });

  it("replays the same stream for the same seed", () => {
    const a = new SeededRng(42);
    const b = new SeededRng(42);
    const left = [a.next(), a.next(), a.int(1, 6), a.nextFloat()];
    const right = [b.next(), b.next(), b.int(1, 6), b.nextFloat()];
    expect(left).toEqual(right);
  });

  it("keeps ints in range and samples distinct items", () => {
    const rng = new SeededRng(7);
    for (let i = 0; i < 200; i++) {
      const n = rng.int(3, 5);
      expect(n).toBeGreaterThanOrEqual(3);
      expect(n).toBeLessThanOrEqual(5);
    }
    const picked = rng.sample(["a", "b", "c", "d"], 3);
    expect(new Set(picked).size).toBe(3);
    expect(rng.sample(["a"], 3)).toEqual(["a"]);
  });
});
