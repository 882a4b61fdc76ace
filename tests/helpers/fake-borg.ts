import { writeFile } from "node:fs/promises";
import * as path from "node:path";

/**
 * Write an executable shell script standing in for the borg binary
 */
export async function writeFakeBorg(dir: string, name: string, body: string): Promise<string> {
  const file = path.join(dir, name);
  await writeFile(file, `#!/bin/sh\n${body}\n`, { mode: 0o755 });
  return file;
}

export const logLine = (levelname: string, message: string): string =>
  JSON.stringify({ type: "log_message", time: 1, levelname, name: "borg", message });
