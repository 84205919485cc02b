export const LOG_LEVELS = [
  "None",
  "Debug",
  "Verbose",
  "Info",
  "Warning",
  "Error",
  "Success",
  "Important"
] as const;

// "None" skips history and the file and goes to the console sink only
export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((l) => l === value);
}
