/**
 * Configuration validation
 */

import { ConfigurationError } from "../errors";
import type { BorgmateConfig } from "../types";
import { isPlainObject } from "./defaults";

function section(c: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = c[key];
  if (!isPlainObject(value)) {
    throw new ConfigurationError(`Config must have a '${key}' section`, key);
  }
  return value;
}

function requireString(value: unknown, key: string, allowEmpty = false): string {
  if (typeof value !== "string" || (!allowEmpty && value.trim() === "")) {
    throw new ConfigurationError(`${key} must be a non-empty string`, key);
  }
  return value;
}

function optionalString(value: unknown, key: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  return requireString(value, key);
}

function requireBoolean(value: unknown, key: string): boolean {
  if (typeof value !== "boolean") {
    throw new ConfigurationError(`${key} must be a boolean`, key);
  }
  return value;
}

function requireCount(value: unknown, key: string, min = 0): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value < min) {
    throw new ConfigurationError(`${key} must be an integer >= ${min}`, key);
  }
  return value;
}

// borg accepts sizes like 100G, 512M, 2T
const SIZE_PATTERN = /^\d+(\.\d+)?[KMGTP]?$/;

function requireSize(value: unknown, key: string): string {
  const size = requireString(value, key);
  if (!SIZE_PATTERN.test(size)) {
    throw new ConfigurationError(`${key} must be a size such as 100G, got "${size}"`, key);
  }
  return size;
}

type Validators = {
  [K in keyof BorgmateConfig]: (c: Record<string, unknown>) => BorgmateConfig[K];
};

const validators: Validators = {
  offline: (c) => requireBoolean(c.offline, "offline"),

  database: (c) => {
    const db = section(c, "database");
    return { path: requireString(db.path, "database.path", true) };
  },

  aws: (c) => {
    const aws = section(c, "aws");
    return {
      reposTable: requireString(aws.reposTable, "aws.reposTable"),
      archivesTable: requireString(aws.archivesTable, "aws.archivesTable"),
      statsTable: requireString(aws.statsTable, "aws.statsTable"),
      s3Bucket: requireString(aws.s3Bucket, "aws.s3Bucket", true),
      region: requireString(aws.region, "aws.region"),
      endpoint: optionalString(aws.endpoint, "aws.endpoint"),
      maxAttempts: requireCount(aws.maxAttempts, "aws.maxAttempts", 1),
    };
  },

  borg: (c) => {
    const borg = section(c, "borg");
    const retention = section(borg, "retention");
    const timeoutMs = borg.timeoutMs;
    return {
      executablePath: requireString(borg.executablePath, "borg.executablePath"),
      compression: requireString(borg.compression, "borg.compression"),
      checkpointInterval: requireCount(borg.checkpointInterval, "borg.checkpointInterval", 1),
      storageQuota: requireSize(borg.storageQuota, "borg.storageQuota"),
      additionalFreeSpace: requireSize(borg.additionalFreeSpace, "borg.additionalFreeSpace"),
      retention: {
        keepDaily: requireCount(retention.keepDaily, "borg.retention.keepDaily"),
        keepWeekly: requireCount(retention.keepWeekly, "borg.retention.keepWeekly"),
        keepMonthly: requireCount(retention.keepMonthly, "borg.retention.keepMonthly"),
        keepYearly: requireCount(retention.keepYearly, "borg.retention.keepYearly"),
      },
      passphrase: optionalString(borg.passphrase, "borg.passphrase"),
      newPassphrase: optionalString(borg.newPassphrase, "borg.newPassphrase"),
      timeoutMs:
        timeoutMs === undefined || timeoutMs === null
          ? undefined
          : requireCount(timeoutMs, "borg.timeoutMs", 1),
    };
  },

  paths: (c) => {
    const paths = section(c, "paths");
    return {
      homeDir: requireString(paths.homeDir, "paths.homeDir"),
      passphrasesDir: requireString(paths.passphrasesDir, "paths.passphrasesDir", true),
      exclusionsDir: requireString(paths.exclusionsDir, "paths.exclusionsDir", true),
      legacyDataDir: requireString(paths.legacyDataDir, "paths.legacyDataDir", true),
    };
  },
};

/**
 * Validate a merged configuration object and return it typed
 */
export function validateConfig(config: unknown): BorgmateConfig {
  if (!isPlainObject(config)) {
    throw new ConfigurationError("Config must be an object");
  }

  return {
    offline: validators.offline(config),
    database: validators.database(config),
    aws: validators.aws(config),
    borg: validators.borg(config),
    paths: validators.paths(config),
  };
}
