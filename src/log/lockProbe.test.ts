import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { EXCLUSIVE_RDWR, isContentionError, isFileLocked } from "./lockProbe";

function errno(code: string): Error {
  return Object.assign(new Error(code), { code });
}

describe("isContentionError", () => {
  it("recognises sharing and busy errors", () => {
    expect(isContentionError(errno("EBUSY"))).toBe(true);
    expect(isContentionError(errno("EAGAIN"))).toBe(true);
  });

  it("treats every other failure as not contended", () => {
    expect(isContentionError(errno("ENOENT"))).toBe(false);
    expect(isContentionError(errno("EACCES"))).toBe(false);
    expect(isContentionError(new Error("plain"))).toBe(false);
    expect(isContentionError({ code: "EBUSY" })).toBe(false);
    expect(isContentionError("EBUSY")).toBe(false);
  });
});

describe("isFileLocked", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "dedup-probe-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("reports a missing file as unlocked", async () => {
    await expect(isFileLocked(path.join(dir, "absent.log"))).resolves.toBe(false);
  });

  it("reports a free file as unlocked and leaves it untouched", async () => {
    const file = path.join(dir, "free.log");
    fs.writeFileSync(file, "kept\n");
    await expect(isFileLocked(file)).resolves.toBe(false);
    expect(fs.readFileSync(file, "utf8")).toBe("kept\n");
  });

  it("opens the file for exclusive read/write", async () => {
    const file = path.join(dir, "held.log");
    fs.writeFileSync(file, "");
    const open = vi.spyOn(fs.promises, "open");
    await isFileLocked(file);
    expect(open).toHaveBeenCalledWith(file, EXCLUSIVE_RDWR);
    expect(EXCLUSIVE_RDWR & fs.constants.O_RDWR).toBe(fs.constants.O_RDWR);
    expect(EXCLUSIVE_RDWR & fs.constants.O_CREAT).toBe(0);
  });

  it("reports a file as locked when the open hits a sharing violation", async () => {
    vi.spyOn(fs.promises, "open").mockRejectedValue(errno("EBUSY"));
    await expect(isFileLocked(path.join(dir, "held.log"))).resolves.toBe(true);
  });

  it("reports a directory as unlocked", async () => {
    await expect(isFileLocked(dir)).resolves.toBe(false);
  });
});
