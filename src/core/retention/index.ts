/**
 * Retention module exports
 */

export {
  defaultPolicy,
  repositoryOverride,
  type ResolvedRetention,
  resolveRetentionPolicy,
  type RetentionOverride,
} from "./policy";
