/**
 * Orchestrator module exports
 */

export { EXCLUSIONS_SUFFIX, ExclusionsFiles } from "./exclusions";
export { createOrchestrator } from "./factory";
export {
  type CreateRepositoryParams,
  type CreateRepositoryResult,
  type DailyBackupOptions,
  type DailyBackupResult,
  type DeleteRepositoryOptions,
  type DeleteRepositoryResult,
  type OperationResult,
  Orchestrator,
  type OrchestratorDeps,
  type RestoreRepositoryOptions,
  type RestoreRepositoryResult,
  type StepEventHandler,
  type StepWarning,
  type WorkflowOptions,
} from "./orchestrator";
