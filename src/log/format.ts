import { format } from "date-fns";
import type { LogLevel } from "./levels";

// date-fns spelling of "yyyy-MM-dd hh:mm:ss.fff tt"
export const DEFAULT_TIME_FORMAT = "yyyy-MM-dd hh:mm:ss.SSS a";

export function formatLine(date: Date, timeFormat: string, level: LogLevel, message: string): string {
  return `[${format(date, timeFormat)}] [${level}] ${message}`;
}

export function assertTimeFormat(timeFormat: string) {
  try {
    format(new Date(0), timeFormat);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new RangeError(`Invalid time format "${timeFormat}": ${reason}`);
  }
}
