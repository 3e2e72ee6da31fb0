import { describe, expect, it } from "vitest";

import { addDays, atTime, formatLocalIso, parseTimestamp } from "./time.js";

describe("formatLocalIso", () => {
  it("writes local wall-clock time without an offset", () => {
    expect(formatLocalIso(new Date(2026, 0, 5, 7, 3, 9))).toBe("2026-01-05T07:03:09");
  });
});

describe("addDays", () => {
  it("crosses month boundaries", () => {
    expect(formatLocalIso(addDays(new Date(2026, 1, 28, 10, 0), 1))).toBe("2026-03-01T10:00:00");
  });
});

describe("atTime", () => {
  it("sets hours and minutes and clears seconds", () => {
    expect(formatLocalIso(atTime(new Date(2026, 1, 28, 10, 15, 42), 9, 30))).toBe("2026-02-28T09:30:00");
  });
});

describe("parseTimestamp", () => {
  it("reads local timestamps back exactly", () => {
    const parsed = parseTimestamp("2026-03-01T09:00:00");
    expect(parsed && formatLocalIso(parsed)).toBe("2026-03-01T09:00:00");
  });

  it("reads a bare date as local midnight", () => {
    const parsed = parseTimestamp("2026-03-01");
    expect(parsed && formatLocalIso(parsed)).toBe("2026-03-01T00:00:00");
  });

  it("rejects text that is not a timestamp", () => {
    expect(parseTimestamp("tomorrow")).toBeNull();
    expect(parseTimestamp("2026-13-45T99:00:00")).toBeNull();
  });
});
