/**
 * Per-repository exclusion pattern files
 */

import { mkdir, readFile, unlink, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { ValidationError, isNodeError } from "../../errors";
import { isValidRepositoryName } from "../../utils/naming";

export const EXCLUSIONS_SUFFIX = "_excludes.txt";

export class ExclusionsFiles {
  constructor(readonly dir: string) {}

  pathFor(repoName: string): string {
    if (!isValidRepositoryName(repoName)) {
      throw new ValidationError(`Invalid repository name: ${repoName}`, "name", repoName);
    }
    return path.join(this.dir, `${repoName}${EXCLUSIONS_SUFFIX}`);
  }

  /** Non-empty, trimmed pattern lines; empty when no file exists */
  async read(repoName: string): Promise<string[]> {
    try {
      const content = await readFile(this.pathFor(repoName), "utf-8");
      return content
        .split(/\r?\n/)
        .map((line) => line.trim())
        .filter((line) => line !== "");
    } catch (err) {
      if (isNodeError(err) && err.code === "ENOENT") return [];
      throw err;
    }
  }

  async exists(repoName: string): Promise<boolean> {
    try {
      await readFile(this.pathFor(repoName));
      return true;
    } catch (err) {
      if (isNodeError(err) && err.code === "ENOENT") return false;
      throw err;
    }
  }

  async write(repoName: string, patterns: string[]): Promise<string> {
    const file = this.pathFor(repoName);
    const cleaned = patterns.map((pattern) => pattern.trim()).filter((pattern) => pattern !== "");
    await mkdir(this.dir, { recursive: true });
    await writeFile(file, cleaned.length > 0 ? `${cleaned.join("\n")}\n` : "", "utf-8");
    return file;
  }

  async add(repoName: string, pattern: string): Promise<string[]> {
    const trimmed = pattern.trim();
    if (trimmed === "") {
      throw new ValidationError("Exclusion pattern cannot be empty", "pattern", pattern);
    }
    const patterns = [...(await this.read(repoName)), trimmed];
    await this.write(repoName, patterns);
    return patterns;
  }

  /**
   * Remove the pattern on a 1-based line and return the remaining patterns
   */
  async remove(repoName: string, lineNumber: number): Promise<string[]> {
    if (!(await this.exists(repoName))) {
      throw new ValidationError(`No exclusions file for ${repoName}`, "exclusions", repoName);
    }
    const patterns = await this.read(repoName);
    if (!Number.isInteger(lineNumber) || lineNumber < 1 || lineNumber > patterns.length) {
      throw new ValidationError(
        `Invalid line number ${lineNumber}; the file has ${patterns.length} patterns`,
        "lineNumber",
        lineNumber,
      );
    }
    patterns.splice(lineNumber - 1, 1);
    await this.write(repoName, patterns);
    return patterns;
  }

  /**
   * Delete the file. Returns false when there was nothing to delete.
   */
  async delete(repoName: string): Promise<boolean> {
    try {
      await unlink(this.pathFor(repoName));
      return true;
    } catch (err) {
      if (isNodeError(err) && err.code === "ENOENT") return false;
      throw err;
    }
  }
}
