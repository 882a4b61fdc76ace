/**
 * Core module exports
 */

// Orchestrator
export {
  type CreateRepositoryParams,
  type CreateRepositoryResult,
  createOrchestrator,
  type DailyBackupOptions,
  type DailyBackupResult,
  type DeleteRepositoryOptions,
  type DeleteRepositoryResult,
  ExclusionsFiles,
  type OperationResult,
  Orchestrator,
  type OrchestratorDeps,
  type RestoreRepositoryOptions,
  type RestoreRepositoryResult,
  type StepEventHandler,
  type StepWarning,
  type WorkflowOptions,
} from "./orchestrator";

// Passphrases
export {
  migratePassphrases,
  type PassphraseMigrationOutcome,
  type PassphraseSource,
  PassphraseStore,
  type ResolvedPassphrase,
} from "./passphrase";

// Retention
export {
  defaultPolicy,
  repositoryOverride,
  type ResolvedRetention,
  resolveRetentionPolicy,
  type RetentionOverride,
} from "./retention";
