/**
 * Retention policy resolution
 */

import { ValidationError } from "../../errors";
import type { RepositoryRecord, RetentionConfig, RetentionPolicy } from "../../types";

export type RetentionOverride = Partial<Record<keyof RetentionPolicy, number | null>>;

export interface ResolvedRetention {
  policy: RetentionPolicy;
  /** Non-fatal findings, e.g. a policy that never prunes */
  warnings: string[];
}

const CADENCES = ["daily", "weekly", "monthly", "yearly"] as const;

export function defaultPolicy(config: RetentionConfig): RetentionPolicy {
  return {
    daily: config.keepDaily,
    weekly: config.keepWeekly,
    monthly: config.keepMonthly,
    yearly: config.keepYearly,
  };
}

export function repositoryOverride(repo: RepositoryRecord): RetentionOverride {
  return {
    daily: repo.retention_keep_daily,
    weekly: repo.retention_keep_weekly,
    monthly: repo.retention_keep_monthly,
    yearly: repo.retention_keep_yearly,
  };
}

/**
 * Merge a repository's override onto the global defaults, cadence by
 * cadence. Absent and null override values fall back to the default.
 */
export function resolveRetentionPolicy(
  override: RetentionOverride,
  defaults: RetentionPolicy,
): ResolvedRetention {
  const policy: RetentionPolicy = { ...defaults };

  for (const cadence of CADENCES) {
    const value = override[cadence] ?? defaults[cadence];
    if (!Number.isInteger(value) || value < 0) {
      throw new ValidationError(
        `Retention keep-${cadence} must be a non-negative integer, got ${value}`,
        `retention.${cadence}`,
        value,
      );
    }
    policy[cadence] = value;
  }

  const warnings: string[] = [];
  if (CADENCES.every((cadence) => policy[cadence] === 0)) {
    warnings.push("Retention policy keeps nothing; archives will never be pruned");
  }

  return { policy, warnings };
}
