import type { LogLevel } from "./levels";

export type LogEntry = {
  readonly message: string;
  readonly level: LogLevel;
  readonly acceptedAt: number; // ms from the writer's elapsed timer, not the display time
};

/**
 * Recently accepted entries, oldest first, used only to detect repeats.
 *
 * An entry leaves the queue once it is `staleMs` old or when the queue grows
 * past `maxEntries`. Either limit at 0 turns suppression off.
 */
export class DedupHistory {
  private buffer: LogEntry[] = [];

  constructor(
    private readonly maxEntries = 50,
    private readonly staleMs = 30 * 60_000
  ) {}

  get size(): number {
    return this.buffer.length;
  }

  list(): readonly LogEntry[] {
    return this.buffer.slice();
  }

  prune(now: number) {
    while (this.buffer.length > 0) {
      const oldest = this.buffer[0];
      if (now - oldest.acceptedAt < this.staleMs && this.buffer.length <= this.maxEntries) break;
      this.buffer.shift();
    }
  }

  has(message: string, level: LogLevel): boolean {
    return this.buffer.some((e) => e.message === message && e.level === level);
  }

  /**
   * Prune, test for a duplicate and record the entry as one step.
   * Returns false when the pair is already held and must not be written.
   */
  admit(message: string, level: LogLevel, now: number): boolean {
    this.prune(now);
    if (this.has(message, level)) return false;

    this.buffer.push({ message, level, acceptedAt: now });
    if (this.buffer.length > this.maxEntries) {
      this.buffer.splice(0, this.buffer.length - this.maxEntries);
    }
    return true;
  }

  clear() {
    this.buffer = [];
  }
}
