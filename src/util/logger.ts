import pino from "pino";

const LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type DiagLevel = (typeof LEVELS)[number];

// Unknown values fall back to "info" so a host's own LOG_LEVEL never breaks the import.
export function diagLevel(value = process.env.LOG_LEVEL): DiagLevel {
  return LEVELS.find((l) => l === value) ?? "info";
}

export function prettyEnabled(value = process.env.LOG_PRETTY): boolean {
  return value !== "false" && value !== "0";
}

function buildDiagnostics() {
  const level = diagLevel();
  if (!prettyEnabled() || level === "silent") {
    return pino({ name: "dedup-file-log", level });
  }
  return pino({
    name: "dedup-file-log",
    level,
    transport: {
      target: "pino-pretty",
      options: { colorize: true }
    }
  });
}

// Fixed at "info": LOG_LEVEL tunes diagnostics, never the "None" console lines.
function buildConsole() {
  if (!prettyEnabled()) {
    return pino({ level: "info", base: null }, process.stdout);
  }
  return pino({
    level: "info",
    base: null,
    transport: {
      target: "pino-pretty",
      options: { colorize: true, destination: 1, ignore: "time,level" }
    }
  });
}

// Diagnostics of the writer itself (failures, fallbacks), never the log file.
export const logger = buildDiagnostics();

// Sink for lines written at the "None" level: the formatted line only.
export const consoleLogger = buildConsole();
