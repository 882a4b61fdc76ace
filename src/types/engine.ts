/**
 * Backup engine invocation and result types
 */

import type { ExitClassification } from "../errors";
import type { EngineLogEvent } from "../engine/schemas";

export interface RetentionPolicy {
  daily: number;
  weekly: number;
  monthly: number;
  yearly: number;
}

export interface EngineClientOptions {
  executablePath: string;
  compression: string;
  checkpointInterval: number;
  storageQuota: string;
  timeoutMs?: number;
}

export interface ExtractOptions {
  dryRun?: boolean;
  sparse?: boolean;
  stripComponents?: number;
  /** Include patterns, passed as --pattern=+<p> */
  patterns?: string[];
  excludes?: string[];
  /** Paths inside the archive to restrict extraction to */
  paths?: string[];
}

export type EngineInvocation =
  | { subcommand: "init"; repoPath: string }
  | { subcommand: "set-config"; repoPath: string; key: string; value: string }
  | {
      subcommand: "create-archive";
      repoPath: string;
      archiveName: string;
      backupTarget: string;
      excludeFrom?: string;
    }
  | { subcommand: "prune"; repoPath: string; retention: RetentionPolicy }
  | { subcommand: "compact"; repoPath: string }
  | { subcommand: "check"; repoPath: string; verifyData?: boolean }
  | { subcommand: "info"; repoPath: string; archiveName?: string }
  | { subcommand: "list-archives"; repoPath: string }
  | { subcommand: "list-archive-contents"; repoPath: string; archiveName: string }
  | {
      subcommand: "extract";
      repoPath: string;
      archiveName: string;
      destination: string;
      options?: ExtractOptions;
    }
  | { subcommand: "delete-archive"; repoPath: string; archiveName: string; dryRun?: boolean }
  | { subcommand: "delete-repository"; repoPath: string; dryRun?: boolean }
  | { subcommand: "export-key"; repoPath: string; outputPath: string; paper?: boolean };

export type EngineSubcommand = EngineInvocation["subcommand"];

/** A stderr line that was not a recognised structured record */
export interface RawLineEvent {
  type: "raw";
  line: string;
}

export type EngineEvent = EngineLogEvent | RawLineEvent;

export interface RunOptions {
  passphrase?: string;
  signal?: AbortSignal;
  /** Overrides the client-wide timeout for this invocation */
  timeoutMs?: number;
}

export interface EngineOutcome {
  exitCode: number;
  classification: Exclude<ExitClassification, "fatal">;
  /** Log messages at WARNING or above */
  warnings: string[];
  stdout: string;
  stderrLines: string[];
}

export type EventHandler = (event: EngineEvent) => void;
