import fs from "fs";

const CONTENTION_CODES = new Set(["EBUSY", "EAGAIN", "EWOULDBLOCK"]);

// libuv takes UV_FS_O_EXLOCK as "deny sharing" on Windows (and O_EXLOCK on
// macOS). Elsewhere it is 0 or absent and the open is a plain O_RDWR.
const EXLOCK =
  "UV_FS_O_EXLOCK" in fs.constants && typeof fs.constants.UV_FS_O_EXLOCK === "number"
    ? fs.constants.UV_FS_O_EXLOCK
    : 0;

export const EXCLUSIVE_RDWR = fs.constants.O_RDWR | EXLOCK;

export type LockProbe = (file: string) => Promise<boolean>;

export function isContentionError(err: unknown): boolean {
  if (!(err instanceof Error) || !("code" in err)) return false;
  return typeof err.code === "string" && CONTENTION_CODES.has(err.code);
}

/**
 * Best-effort check whether another handle holds `file`: try to open it for
 * exclusive read/write. Only a sharing/contention error counts; a missing
 * file or a permission problem reports "not locked" and is left to the write.
 */
export async function isFileLocked(file: string): Promise<boolean> {
  try {
    const handle = await fs.promises.open(file, EXCLUSIVE_RDWR);
    await handle.close();
    return false;
  } catch (err) {
    return isContentionError(err);
  }
}
