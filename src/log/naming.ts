import fs from "fs";
import path from "path";
import { format } from "date-fns";
import { logger } from "../util/logger";

export type AutoNaming = {
  baseDir: string;
  programName: string;
};

const LAST_RESORT_FILE = "Application.log";

function entryScript(): string | undefined {
  return process.argv[1] || undefined;
}

export function defaultProgramName(): string {
  const script = entryScript();
  return script ? path.parse(script).name || "Application" : "Application";
}

export function defaultBaseDir(): string {
  const script = entryScript();
  return script ? path.dirname(path.resolve(script)) : process.cwd();
}

export function autoLogDir(naming: AutoNaming, date: Date): string {
  return path.join(naming.baseDir, "Logs", format(date, "yyyy"), format(date, "MM-MMMM"));
}

export function autoLogName(naming: AutoNaming, date: Date): string {
  return path.join(autoLogDir(naming, date), `${naming.programName}_${format(date, "dd")}.log`);
}

function inWorkingDir(name: string): string {
  if (!name) throw new Error("Empty program name");
  return path.join(process.cwd(), `${name}.log`);
}

/**
 * Create today's directory and return the dated file in it. When that is not
 * possible the file moves to the working directory, named after the program,
 * then after `process.title`. Never throws.
 */
export function resolveAutoLogFile(naming: AutoNaming, date: Date): string {
  try {
    fs.mkdirSync(autoLogDir(naming, date), { recursive: true });
    return autoLogName(naming, date);
  } catch (err) {
    logger.debug({ err, baseDir: naming.baseDir }, "Log directory unavailable; using working directory");
  }

  const identities: Array<() => string> = [() => naming.programName, () => process.title];
  for (const identity of identities) {
    try {
      return inWorkingDir(identity());
    } catch (err) {
      logger.debug({ err }, "Fallback log name unavailable");
    }
  }
  return LAST_RESORT_FILE;
}
