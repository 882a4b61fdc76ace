/**
 * Environment variable overrides
 */

import { ConfigurationError } from "../errors";
import { isPlainObject } from "./defaults";

type OverrideKind = "string" | "number" | "boolean";

interface EnvOverride {
  path: readonly [string, string] | readonly [string];
  kind: OverrideKind;
}

export const ENV_OVERRIDES: Record<string, EnvOverride> = {
  BORGMATE_OFFLINE: { path: ["offline"], kind: "boolean" },
  BORGMATE_DB_PATH: { path: ["database", "path"], kind: "string" },
  BORGMATE_REPOS_TABLE: { path: ["aws", "reposTable"], kind: "string" },
  BORGMATE_ARCHIVES_TABLE: { path: ["aws", "archivesTable"], kind: "string" },
  BORGMATE_STATS_TABLE: { path: ["aws", "statsTable"], kind: "string" },
  BORGMATE_S3_BUCKET: { path: ["aws", "s3Bucket"], kind: "string" },
  BORGMATE_AWS_REGION: { path: ["aws", "region"], kind: "string" },
  BORGMATE_BORG_PATH: { path: ["borg", "executablePath"], kind: "string" },
  BORGMATE_COMPRESSION: { path: ["borg", "compression"], kind: "string" },
  BORGMATE_CHECKPOINT_INTERVAL: { path: ["borg", "checkpointInterval"], kind: "number" },
  BORGMATE_STORAGE_QUOTA: { path: ["borg", "storageQuota"], kind: "string" },
};

const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);
const FALSE_VALUES = new Set(["0", "false", "no", "off"]);

export function parseBoolean(raw: string, envName: string): boolean {
  const normalized = raw.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  throw new ConfigurationError(`${envName} must be a boolean, got "${raw}"`, envName);
}

function parseValue(raw: string, kind: OverrideKind, envName: string): string | number | boolean {
  switch (kind) {
    case "boolean":
      return parseBoolean(raw, envName);
    case "number": {
      const value = Number(raw.trim());
      if (raw.trim() === "" || !Number.isFinite(value)) {
        throw new ConfigurationError(`${envName} must be a number, got "${raw}"`, envName);
      }
      return value;
    }
    case "string":
      return raw;
  }
}

/**
 * Build a partial config object from BORGMATE_* variables. Empty
 * variables are ignored.
 */
export function envOverrides(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [envName, override] of Object.entries(ENV_OVERRIDES)) {
    const raw = env[envName];
    if (raw === undefined || raw === "") continue;

    const value = parseValue(raw, override.kind, envName);
    const [section, key] = override.path;

    if (key === undefined) {
      result[section] = value;
      continue;
    }

    const existing = result[section];
    const sectionObject: Record<string, unknown> = isPlainObject(existing) ? { ...existing } : {};
    sectionObject[key] = value;
    result[section] = sectionObject;
  }

  return result;
}
