import { z } from "zod";
import { DEFAULT_TIME_FORMAT } from "./log/format";
import type { DedupFileLoggerOptions } from "./log/writer";

const EnvSchema = z.object({
  // empty path -> date-based file name with daily rotation
  DEDUP_LOG_FILE: z.string().default(""),
  DEDUP_LOG_TIME_FORMAT: z.string().min(1).default(DEFAULT_TIME_FORMAT),
  DEDUP_LOG_MAX_HISTORY: z.coerce.number().int().nonnegative().default(50),
  DEDUP_LOG_STALE_MS: z.coerce.number().int().nonnegative().default(30 * 60_000),
  DEDUP_LOG_BASE_DIR: z.string().optional()
});

export type Config = {
  writer: DedupFileLoggerOptions;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const e = EnvSchema.parse(env);
  return {
    writer: {
      logFilePath: e.DEDUP_LOG_FILE,
      timeFormat: e.DEDUP_LOG_TIME_FORMAT,
      maxHistory: e.DEDUP_LOG_MAX_HISTORY,
      staleMs: e.DEDUP_LOG_STALE_MS,
      // blank counts as unset so .env templates can leave it empty
      baseDir: e.DEDUP_LOG_BASE_DIR || undefined
    }
  };
}
