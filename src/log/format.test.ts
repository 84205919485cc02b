import { describe, it, expect } from "vitest";
import { assertTimeFormat, DEFAULT_TIME_FORMAT, formatLine } from "./format";

describe("formatLine", () => {
  it("renders time, level and message with the default pattern", () => {
    const d = new Date(2026, 2, 14, 9, 5, 3, 7);
    expect(formatLine(d, DEFAULT_TIME_FORMAT, "Info", "hello")).toBe("[2026-03-14 09:05:03.007 AM] [Info] hello");
  });

  it("uses a 12-hour clock with PM in the default pattern", () => {
    const d = new Date(2026, 2, 14, 21, 30, 0, 450);
    expect(formatLine(d, DEFAULT_TIME_FORMAT, "Warning", "late")).toBe("[2026-03-14 09:30:00.450 PM] [Warning] late");
  });

  it("honours a custom pattern and keeps an empty message", () => {
    const d = new Date(2026, 2, 14, 21, 30, 0, 450);
    expect(formatLine(d, "HH:mm:ss", "Important", "")).toBe("[21:30:00] [Important] ");
  });
});

describe("assertTimeFormat", () => {
  it("accepts date-fns patterns", () => {
    expect(() => assertTimeFormat("yyyy-MM-dd HH:mm")).not.toThrow();
  });

  it("rejects patterns date-fns cannot render", () => {
    expect(() => assertTimeFormat("hh:mm:ss.fff tt")).toThrow(RangeError);
  });
});
