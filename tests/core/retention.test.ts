import { describe, expect, test } from "vitest";
import { defaultPolicy, repositoryOverride, resolveRetentionPolicy } from "../../src/core/retention";
import { completeRepository } from "../../src/db/mappers";
import { ValidationError } from "../../src/errors";
import { repositoryInsert } from "../helpers/fixtures";

const defaults = { daily: 7, weekly: 4, monthly: 6, yearly: 0 };

describe("retention policy", () => {
  test("an override replaces only the cadences it sets", () => {
    const { policy, warnings } = resolveRetentionPolicy({ daily: 3 }, defaults);

    expect(policy).toEqual({ daily: 3, weekly: 4, monthly: 6, yearly: 0 });
    expect(warnings).toEqual([]);
  });

  test("null override values fall back to the defaults", () => {
    const { policy } = resolveRetentionPolicy({ daily: null, yearly: 2 }, defaults);

    expect(policy).toEqual({ daily: 7, weekly: 4, monthly: 6, yearly: 2 });
  });

  test("an explicit zero is kept", () => {
    expect(resolveRetentionPolicy({ monthly: 0 }, defaults).policy.monthly).toBe(0);
  });

  test("warns when the policy keeps nothing", () => {
    const { warnings } = resolveRetentionPolicy({ daily: 0, weekly: 0, monthly: 0 }, defaults);

    expect(warnings).toEqual(["Retention policy keeps nothing; archives will never be pruned"]);
  });

  test("rejects negative and fractional values", () => {
    expect(() => resolveRetentionPolicy({ weekly: -1 }, defaults)).toThrow(
      "Retention keep-weekly must be a non-negative integer, got -1",
    );
    expect(() => resolveRetentionPolicy({ daily: 1.5 }, defaults)).toThrow(ValidationError);
  });

  test("does not modify the defaults", () => {
    resolveRetentionPolicy({ daily: 1 }, defaults);

    expect(defaults.daily).toBe(7);
  });

  test("reads defaults from config and overrides from a repository record", () => {
    const repo = completeRepository(
      repositoryInsert({ retention_keep_weekly: 2 }),
      "2025-01-01T00:00:00.000Z",
    );

    const { policy } = resolveRetentionPolicy(
      repositoryOverride(repo),
      defaultPolicy({ keepDaily: 10, keepWeekly: 5, keepMonthly: 12, keepYearly: 1 }),
    );

    expect(policy).toEqual({ daily: 10, weekly: 2, monthly: 12, yearly: 1 });
  });
});
