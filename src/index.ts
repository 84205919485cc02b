export {
  DedupFileLogger,
  DEFAULT_DEFERRED_RETRIES,
  DEFAULT_MAX_HISTORY,
  DEFAULT_STALE_MS,
  DEFERRED_RETRY_MS
} from "./log/writer";
export type { DedupFileLoggerOptions, WriteFailureListener } from "./log/writer";
export { LOG_LEVELS, isLogLevel } from "./log/levels";
export type { LogLevel } from "./log/levels";
export { DedupHistory } from "./log/history";
export type { LogEntry } from "./log/history";
export { DEFAULT_TIME_FORMAT, formatLine } from "./log/format";
export { autoLogDir, autoLogName, resolveAutoLogFile } from "./log/naming";
export type { AutoNaming } from "./log/naming";
export { isFileLocked, isContentionError } from "./log/lockProbe";
export type { LockProbe } from "./log/lockProbe";
