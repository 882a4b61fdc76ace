/**
 * Engine module exports
 */

// Arguments
export { assertOperand, buildArgs, pruneArgs } from "./args";
// Client
export { type BackupEngine, BorgClient, createBorgClient, settle } from "./client";
// Events
export { classifyExitCode, describeEvent, isWarningLevel, parseEventLine } from "./events";
// Operations
export {
  type ArchiveSummary,
  drain,
  parseJsonOutput,
  readArchiveContents,
  readArchiveInfo,
  readArchiveList,
  readRepoInfo,
  runToCompletion,
} from "./operations";
// Process
export {
  KILL_GRACE_MS,
  type ProcessExit,
  type ProcessResult,
  type ProcessSpec,
  type RunningProcess,
  startProcess,
} from "./process";
