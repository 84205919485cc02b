import { describe, it, expect } from "vitest";
import { isLogLevel, LOG_LEVELS } from "./levels";

describe("isLogLevel", () => {
  it("accepts every level name", () => {
    expect(LOG_LEVELS.every((l) => isLogLevel(l))).toBe(true);
  });

  it("is case-sensitive and rejects unknown names", () => {
    expect(isLogLevel("info")).toBe(false);
    expect(isLogLevel("Fatal")).toBe(false);
  });
});
