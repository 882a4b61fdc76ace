/**
 * Default configuration values
 */

import * as os from "node:os";
import * as path from "node:path";
import type { BorgmateConfig } from "../types";
import { expandHome } from "../utils/path";

export const CONFIG_FILE_NAMES = ["borgmate.yaml", "borgmate.yml", "borgmate.json"];

/**
 * Root of borgmate's own state: database, secrets, exclusion lists
 */
export function resolveHomeDir(env: NodeJS.ProcessEnv = process.env): string {
  const fromEnv = env.BORGMATE_HOME?.trim();
  if (fromEnv) return path.resolve(expandHome(fromEnv));
  return path.join(os.homedir(), ".borgmate");
}

/**
 * Defaults for every section. Paths left empty are derived from
 * `paths.homeDir` once the final home directory is known.
 */
export function defaultConfig(homeDir: string) {
  return {
    offline: false,
    database: {
      path: "",
    },
    aws: {
      reposTable: "borgmate-repos",
      archivesTable: "borgmate-archives",
      statsTable: "borgmate-s3-stats",
      s3Bucket: "",
      region: "us-west-1",
      maxAttempts: 5,
    },
    borg: {
      executablePath: "borg",
      compression: "zstd,6",
      checkpointInterval: 900,
      storageQuota: "100G",
      additionalFreeSpace: "2G",
      retention: {
        keepDaily: 7,
        keepWeekly: 4,
        keepMonthly: 6,
        keepYearly: 0,
      },
    },
    paths: {
      homeDir,
      passphrasesDir: "",
      exclusionsDir: "",
      legacyDataDir: "",
    },
  } satisfies BorgmateConfig;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects, with source overriding target
 */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}
