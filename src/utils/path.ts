/**
 * Path validation and manipulation utilities
 */

import { access } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";

/**
 * Check if a file path is within an allowed directory.
 * Prevents path traversal attacks.
 */
export function isPathWithinDir(filePath: string, allowedDir: string): boolean {
  const normalizedPath = path.resolve(filePath);
  const normalizedDir = path.resolve(allowedDir);

  return (
    normalizedPath.startsWith(normalizedDir + path.sep) ||
    normalizedPath === normalizedDir
  );
}

/**
 * Expand a leading `~` to the current user's home directory
 */
export function expandHome(filePath: string, home: string = os.homedir()): string {
  if (filePath === "~") return home;
  if (filePath.startsWith("~/")) return path.join(home, filePath.slice(2));
  return filePath;
}

export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Temporary locations get no reserved free space: a `tmp` path part, or
 * macOS's per-user temp under /private/var.
 */
export function isScratchPath(filePath: string): boolean {
  const resolved = path.resolve(filePath);
  if (resolved.startsWith("/private/var/")) return true;
  return resolved.split(path.sep).includes("tmp");
}
