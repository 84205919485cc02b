import path from "path";
import { performance } from "perf_hooks";
import { consoleLogger, logger } from "../util/logger";
import { sleep } from "../util/sleep";
import { localDayKey } from "../util/time";
import { appendLine, appendLineSync } from "./append";
import { assertTimeFormat, DEFAULT_TIME_FORMAT, formatLine } from "./format";
import { DedupHistory } from "./history";
import type { LogLevel } from "./levels";
import { isFileLocked, type LockProbe } from "./lockProbe";
import {
  autoLogDir,
  autoLogName,
  defaultBaseDir,
  defaultProgramName,
  resolveAutoLogFile,
  type AutoNaming
} from "./naming";

export const DEFAULT_MAX_HISTORY = 50;
export const DEFAULT_STALE_MS = 30 * 60_000;
export const DEFAULT_DEFERRED_RETRIES = 100;
export const DEFERRED_RETRY_MS = 10;

export type WriteFailureListener = (message: string, error: Error) => void;

export type DedupFileLoggerOptions = {
  /** Target file. Empty or omitted: dated file under `baseDir`, rotated daily. */
  logFilePath?: string;
  /** date-fns pattern for the line timestamp. */
  timeFormat?: string;
  maxHistory?: number;
  staleMs?: number;
  baseDir?: string;
  programName?: string;
  /** Wall clock for the line timestamp and the rotation day. */
  clock?: () => Date;
  /**
   * Milliseconds for the stale window, independent of the wall clock.
   * Defaults to `performance.now()`, or to `clock` when only that is given.
   */
  elapsed?: () => number;
  /** Receives the formatted line of every "None" write. */
  echo?: (line: string) => void;
  lockProbe?: LockProbe;
};

type PendingLine = { file: string; line: string };

/**
 * Appends `[time] [Level] message` lines to a text file, skipping any
 * message/level pair already written within the stale window.
 *
 * `dispose()` does not wait for writes already in flight; await `flush()`
 * after it when the file must be quiet.
 */
export class DedupFileLogger {
  private readonly history: DedupHistory;
  private readonly timeFormat: string;
  private readonly naming: AutoNaming | null;
  private readonly clock: () => Date;
  private readonly elapsed: () => number;
  private readonly echo: (line: string) => void;
  private readonly lockProbe: LockProbe;
  private readonly failureListeners = new Set<WriteFailureListener>();
  private readonly inFlight = new Set<Promise<void>>();

  private logFilePath: string;
  private rotationDay = "";
  private disposed = false;

  constructor(options: DedupFileLoggerOptions = {}) {
    const maxHistory = options.maxHistory ?? DEFAULT_MAX_HISTORY;
    const staleMs = options.staleMs ?? DEFAULT_STALE_MS;
    if (!Number.isInteger(maxHistory) || maxHistory < 0) {
      throw new RangeError(`maxHistory must be a non-negative integer, got ${maxHistory}`);
    }
    if (!Number.isFinite(staleMs) || staleMs < 0) {
      throw new RangeError(`staleMs must be a non-negative number, got ${staleMs}`);
    }
    this.timeFormat = options.timeFormat || DEFAULT_TIME_FORMAT;
    assertTimeFormat(this.timeFormat);

    this.history = new DedupHistory(maxHistory, staleMs);
    const clock = options.clock;
    this.clock = clock ?? (() => new Date());
    this.elapsed = options.elapsed ?? (clock ? () => clock().getTime() : () => performance.now());
    this.echo = options.echo ?? ((line) => consoleLogger.info(line));
    this.lockProbe = options.lockProbe ?? isFileLocked;

    if (options.logFilePath) {
      this.naming = null;
      this.logFilePath = options.logFilePath;
    } else {
      this.naming = {
        baseDir: options.baseDir ?? defaultBaseDir(),
        programName: options.programName ?? defaultProgramName()
      };
      const today = this.clock();
      this.rotationDay = localDayKey(today);
      this.logFilePath = resolveAutoLogFile(this.naming, today);
    }
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  get isAutoNamed(): boolean {
    return this.naming !== null;
  }

  get historySize(): number {
    return this.history.size;
  }

  /** Blocks until the line is appended (or the attempt failed). */
  write(message: string, level: LogLevel = "Info") {
    const pending = this.prepare(message, level);
    if (!pending) return;
    try {
      appendLineSync(pending.file, pending.line);
    } catch (err) {
      this.fail(message, err);
    }
  }

  /** Always resolves; failures go to `onWriteFailure` listeners. */
  writeAsync(message: string, level: LogLevel = "Info"): Promise<void> {
    return this.track(() => this.writeInternal(message, level));
  }

  /**
   * Fire and forget. Waits in `DEFERRED_RETRY_MS` steps, at most `retries`
   * probes, for the target file to stop being locked, then writes regardless.
   */
  writeDeferred(message: string, level: LogLevel = "Info", retries = DEFAULT_DEFERRED_RETRIES) {
    void this.track(async () => {
      for (let attempt = 0; attempt < retries; attempt++) {
        if (!(await this.isLocked(this.logFilePath))) break;
        await sleep(DEFERRED_RETRY_MS);
      }
      await this.writeInternal(message, level);
    });
  }

  /** Resolves once every write started through `writeAsync`/`writeDeferred` has settled. */
  async flush(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight);
    }
  }

  clearHistory() {
    this.history.clear();
  }

  getLogPath(): string {
    if (this.naming) return autoLogDir(this.naming, this.clock());
    return path.dirname(this.logFilePath);
  }

  getLogName(): string {
    if (this.naming) return autoLogName(this.naming, this.clock());
    return this.logFilePath;
  }

  onWriteFailure(listener: WriteFailureListener): () => void {
    this.failureListeners.add(listener);
    return () => {
      this.failureListeners.delete(listener);
    };
  }

  dispose() {
    if (this.disposed) return;
    this.disposed = true;
    this.history.clear();
  }

  private async writeInternal(message: string, level: LogLevel): Promise<void> {
    const pending = this.prepare(message, level);
    if (!pending) return;
    try {
      await appendLine(pending.file, pending.line);
    } catch (err) {
      this.fail(message, err);
    }
  }

  /**
   * Everything before the file I/O. Runs without yielding, so rotation and
   * the history check-and-insert happen as one unit between concurrent writes.
   */
  private prepare(message: string, level: LogLevel): PendingLine | undefined {
    try {
      const now = this.clock();
      if (level === "None") {
        this.echo(formatLine(now, this.timeFormat, level, message));
        return undefined;
      }
      if (this.disposed) return undefined;

      this.checkRotation(now);
      if (!this.history.admit(message, level, this.elapsed())) return undefined;

      return { file: this.logFilePath, line: formatLine(now, this.timeFormat, level, message) };
    } catch (err) {
      this.fail(message, err);
      return undefined;
    }
  }

  private checkRotation(now: Date) {
    if (!this.naming) return;
    const day = localDayKey(now);
    if (day === this.rotationDay) return;

    this.rotationDay = day;
    this.logFilePath = resolveAutoLogFile(this.naming, now);
    logger.debug({ logFile: this.logFilePath }, "Log file rotated");
  }

  private async isLocked(file: string): Promise<boolean> {
    try {
      return await this.lockProbe(file);
    } catch (err) {
      logger.debug({ err, file }, "Lock probe failed; treating file as unlocked");
      return false;
    }
  }

  private track(run: () => Promise<void>): Promise<void> {
    const task: Promise<void> = run().finally(() => {
      this.inFlight.delete(task);
    });
    this.inFlight.add(task);
    return task;
  }

  private fail(message: string, err: unknown) {
    const error = err instanceof Error ? err : new Error(String(err));
    logger.debug({ err: error, logFile: this.logFilePath }, "Log write failed");

    for (const listener of this.failureListeners) {
      try {
        listener(message, error);
      } catch (listenerErr) {
        logger.warn({ err: listenerErr }, "Write failure listener threw");
      }
    }
  }
}
