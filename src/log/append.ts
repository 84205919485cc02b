import fs from "fs";
import { EOL } from "os";

// "a" = O_APPEND|O_CREAT: other processes keep reading and writing the file.
// Each line goes out in a single write so concurrent appends never tear.

export function appendLineSync(file: string, line: string) {
  const fd = fs.openSync(file, "a");
  try {
    fs.writeSync(fd, `${line}${EOL}`, null, "utf8");
  } finally {
    fs.closeSync(fd);
  }
}

export async function appendLine(file: string, line: string): Promise<void> {
  const handle = await fs.promises.open(file, "a");
  try {
    await handle.write(`${line}${EOL}`, null, "utf8");
  } finally {
    await handle.close();
  }
}
