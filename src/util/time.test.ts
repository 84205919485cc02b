import { describe, it, expect } from "vitest";
import { localDayKey } from "./time";

describe("localDayKey", () => {
  it("keys by the local calendar day", () => {
    expect(localDayKey(new Date(2026, 2, 14, 23, 59, 59))).toBe("2026-03-14");
    expect(localDayKey(new Date(2026, 2, 15, 0, 0, 0))).toBe("2026-03-15");
  });
});
