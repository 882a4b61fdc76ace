/**
 * Workflow orchestration over the engine, metadata store and remote mirror
 */

import * as os from "node:os";
import * as path from "node:path";
import { mkdir, rm, stat } from "node:fs/promises";
import {
  BorgmateError,
  ConfigurationError,
  EngineError,
  ValidationError,
  WorkflowError,
  errorMessage,
} from "../../errors";
import {
  type ArchiveSummary,
  type BackupEngine,
  readArchiveContents,
  readArchiveInfo,
  readArchiveList,
  readRepoInfo,
  runToCompletion,
} from "../../engine";
import type {
  ArchiveContentEntry,
  ArchiveRecord,
  BorgmateConfig,
  EngineEvent,
  EngineInvocation,
  EngineOutcome,
  ExtractOptions,
  MetadataStore,
  RemoteObjectStore,
  RemoteResult,
  RepoArchive,
  RepoInfo,
  RepositoryRecord,
  RetentionPolicy,
  S3StatsCacheEntry,
} from "../../types";
import { scoped } from "../../utils/logger";
import { archiveNameToIso, generateArchiveName, isValidRepositoryName } from "../../utils/naming";
import { isScratchPath, pathExists } from "../../utils/path";
import {
  migratePassphrases,
  migrateRepositoryPassphrase,
  needsPassphraseMigration,
  type PassphraseMigrationOutcome,
  type PassphraseSource,
  type PassphraseStore,
} from "../passphrase";
import {
  defaultPolicy,
  repositoryOverride,
  resolveRetentionPolicy,
  type RetentionOverride,
} from "../retention";
import { ExclusionsFiles } from "./exclusions";

const log = scoped("orchestrator");

export interface StepWarning {
  step: string;
  message: string;
}

export type StepEventHandler = (step: string, event: EngineEvent) => void;

export interface WorkflowOptions {
  /** Overrides every other passphrase source */
  passphrase?: string;
  signal?: AbortSignal;
  onEvent?: StepEventHandler;
}

export interface OrchestratorDeps {
  config: BorgmateConfig;
  engine: BackupEngine;
  store: MetadataStore;
  remote: RemoteObjectStore | null;
  passphrases: PassphraseStore;
  hostname?: string;
  platform?: string;
  clock?: () => Date;
}

export interface CreateRepositoryParams extends WorkflowOptions {
  name: string;
  path: string;
  backupTarget: string;
  retention?: RetentionOverride;
}

export interface CreateRepositoryResult {
  repository: RepositoryRecord;
  passphraseFile: string;
  passphraseSource: PassphraseSource;
  warnings: StepWarning[];
}

export interface DailyBackupOptions extends WorkflowOptions {
  /** Skip the remote mirror step even when a remote is configured */
  skipSync?: boolean;
}

export interface DailyBackupResult {
  repository: RepositoryRecord;
  archiveName: string;
  archive: ArchiveRecord | null;
  retention: RetentionPolicy;
  pruned: boolean;
  synced: boolean;
  warnings: StepWarning[];
  durationMs: number;
}

export interface DeleteRepositoryOptions extends WorkflowOptions {
  dryRun?: boolean;
}

export interface DeleteRepositoryResult {
  name: string;
  dryRun: boolean;
  compacted: boolean;
  exclusionsRemoved: boolean;
  warnings: StepWarning[];
}

export interface RestoreRepositoryOptions extends WorkflowOptions {
  force?: boolean;
}

export interface RestoreRepositoryResult {
  repository: RepositoryRecord;
  replacedLocal: boolean;
  warnings: StepWarning[];
}

export interface OperationResult {
  warnings: StepWarning[];
}

interface WorkflowContext {
  workflow: string;
  passphrase: string;
  signal?: AbortSignal;
  onEvent?: StepEventHandler;
  warnings: StepWarning[];
}

type StepContext = Pick<WorkflowContext, "workflow" | "signal">;

export class Orchestrator {
  readonly config: BorgmateConfig;
  readonly exclusions: ExclusionsFiles;
  private readonly engine: BackupEngine;
  private readonly store: MetadataStore;
  private readonly remote: RemoteObjectStore | null;
  private readonly passphrases: PassphraseStore;
  private readonly hostname: string;
  private readonly platform: string;
  private readonly clock: () => Date;

  constructor(deps: OrchestratorDeps) {
    this.config = deps.config;
    this.engine = deps.engine;
    this.store = deps.store;
    this.remote = deps.remote;
    this.passphrases = deps.passphrases;
    this.hostname = deps.hostname ?? os.hostname();
    this.platform = deps.platform ?? os.type();
    this.clock = deps.clock ?? (() => new Date());
    this.exclusions = new ExclusionsFiles(deps.config.paths.exclusionsDir);
  }

  private now(): string {
    return this.clock().toISOString();
  }

  // Step plumbing

  private warn(warnings: StepWarning[], step: string, message: string): void {
    log.warn(`${step}: ${message}`);
    warnings.push({ step, message });
  }

  /**
   * Run one workflow step. Validation and configuration errors pass
   * through as they are; anything else aborts the workflow as a
   * WorkflowError naming the step.
   */
  private async step<T>(ctx: StepContext, step: string, fn: () => Promise<T>): Promise<T> {
    if (ctx.signal?.aborted) {
      throw new WorkflowError(ctx.workflow, step, new BorgmateError("Cancelled"));
    }
    log.debug(`${ctx.workflow}: ${step}`);
    try {
      return await fn();
    } catch (err) {
      if (
        err instanceof ValidationError ||
        err instanceof ConfigurationError ||
        err instanceof WorkflowError
      ) {
        throw err;
      }
      throw new WorkflowError(ctx.workflow, step, err);
    }
  }

  /**
   * Run an engine subcommand as a step. Warning exits are recorded and
   * the workflow continues unless the step is strict.
   */
  private async engineStep(
    ctx: WorkflowContext,
    step: string,
    invocation: EngineInvocation,
    strict = false,
  ): Promise<EngineOutcome> {
    const outcome = await this.step(ctx, step, () =>
      runToCompletion(
        this.engine,
        invocation,
        { passphrase: ctx.passphrase, signal: ctx.signal },
        ctx.onEvent ? (event) => ctx.onEvent?.(step, event) : undefined,
      ),
    );

    if (outcome.classification === "warning" && strict) {
      throw new WorkflowError(
        ctx.workflow,
        step,
        new EngineError(`${invocation.subcommand} exited with code ${outcome.exitCode}`, {
          classification: "warning",
          kind: "exit",
          subcommand: invocation.subcommand,
          exitCode: outcome.exitCode,
          command: [],
          stdout: outcome.stdout,
          stderr: outcome.stderrLines.join("\n"),
        }),
      );
    }

    for (const message of outcome.warnings) {
      this.warn(ctx.warnings, step, message);
    }
    if (outcome.classification === "warning" && outcome.warnings.length === 0) {
      this.warn(ctx.warnings, step, `completed with exit code ${outcome.exitCode}`);
    }
    return outcome;
  }

  private async context(
    workflow: string,
    repo: RepositoryRecord,
    options: WorkflowOptions,
    warnings: StepWarning[],
  ): Promise<WorkflowContext> {
    const resolved = await this.step({ workflow, signal: options.signal }, "passphrase", () =>
      this.passphrases.resolveExisting(repo, options.passphrase),
    );
    log.debug(`Using ${resolved.source} passphrase for ${repo.name}`);
    return {
      workflow,
      passphrase: resolved.value,
      signal: options.signal,
      onEvent: options.onEvent,
      warnings,
    };
  }

  /**
   * Load a repository by name, moving a stored legacy passphrase into its
   * file on the way. A failed move is a warning; the stored value still
   * resolves.
   */
  private async loadRepository(
    workflow: string,
    name: string,
    warnings: StepWarning[],
    signal?: AbortSignal,
  ): Promise<RepositoryRecord> {
    const repo = await this.step({ workflow, signal }, "resolve", () => this.store.get({ name }));
    if (!needsPassphraseMigration(repo)) {
      return repo;
    }
    try {
      const migrated = await migrateRepositoryPassphrase(this.store, this.passphrases, repo);
      log.info(`Moved stored passphrase for ${name} to ${migrated.passphrase_file_path}`);
      return migrated;
    } catch (err) {
      this.warn(warnings, "passphrase-migration", `Could not migrate stored passphrase: ${errorMessage(err)}`);
      return repo;
    }
  }

  private requireLocal(repo: RepositoryRecord, action: string): void {
    if (repo.hostname !== this.hostname) {
      throw new ValidationError(
        `Repository ${repo.name} lives on ${repo.hostname}; ${action} must run on that host`,
        "hostname",
        repo.hostname,
      );
    }
  }

  private requireRemote(): RemoteObjectStore {
    if (!this.remote) {
      throw new ConfigurationError("No S3 bucket configured for remote sync", "aws.s3Bucket");
    }
    return this.remote;
  }

  private async refreshMetadata(ctx: WorkflowContext, repoPath: string): Promise<string> {
    const info = await this.step(ctx, "info", () =>
      readRepoInfo(this.engine, repoPath, { passphrase: ctx.passphrase, signal: ctx.signal }),
    );
    return JSON.stringify(info);
  }

  // Repository workflows

  /**
   * Initialise a new engine repository and register it
   */
  async createRepository(params: CreateRepositoryParams): Promise<CreateRepositoryResult> {
    const workflow = "create_repository";
    const warnings: StepWarning[] = [];
    const repoPath = path.resolve(params.path);

    if (!isValidRepositoryName(params.name)) {
      throw new ValidationError(`Invalid repository name: ${params.name}`, "name", params.name);
    }
    if (params.backupTarget.trim() === "") {
      throw new ValidationError("Backup target is required", "backupTarget", params.backupTarget);
    }
    const retention = resolveRetentionPolicy(params.retention ?? {}, defaultPolicy(this.config.borg.retention));
    for (const message of retention.warnings) {
      this.warn(warnings, "retention", message);
    }

    const stepCtx = { workflow, signal: params.signal };
    await this.step(stepCtx, "validate", async () => {
      if (await this.store.find({ name: params.name })) {
        throw new ValidationError(`Repository ${params.name} already exists`, "name", params.name);
      }
      if (await this.store.find({ path: repoPath, hostname: this.hostname })) {
        throw new ValidationError(
          `A repository is already registered at ${repoPath} on ${this.hostname}`,
          "path",
          repoPath,
        );
      }
      if (await pathExists(repoPath)) {
        const info = await stat(repoPath);
        if (!info.isDirectory()) {
          throw new ValidationError(`${repoPath} is a file, not a directory`, "path", repoPath);
        }
      }
    });
    await this.step(stepCtx, "prepare", () => mkdir(repoPath, { recursive: true }));

    const resolved = await this.step(stepCtx, "passphrase", () =>
      this.passphrases.resolveNew(params.name, params.passphrase),
    );
    if (resolved.source === "generated") {
      this.warn(warnings, "passphrase", `Generated a new passphrase for ${params.name}; back it up`);
    }
    const passphraseFile = await this.step(stepCtx, "passphrase", () =>
      this.passphrases.save(params.name, resolved.value),
    );

    const ctx: WorkflowContext = {
      workflow,
      passphrase: resolved.value,
      signal: params.signal,
      onEvent: params.onEvent,
      warnings,
    };

    await this.engineStep(ctx, "init", { subcommand: "init", repoPath }, true);

    const freeSpace = this.config.borg.additionalFreeSpace;
    if (freeSpace !== "0" && isScratchPath(repoPath)) {
      log.debug(`Not reserving free space for temporary location ${repoPath}`);
    } else if (freeSpace !== "0") {
      await this.engineStep(ctx, "set-config", {
        subcommand: "set-config",
        repoPath,
        key: "additional_free_space",
        value: freeSpace,
      });
    }

    const metadata = await this.refreshMetadata(ctx, repoPath);

    const repository = await this.step(ctx, "persist", () =>
      this.store.create({
        name: params.name,
        path: repoPath,
        backup_target: path.resolve(params.backupTarget),
        hostname: this.hostname,
        os_platform: this.platform,
        retention_keep_daily: params.retention?.daily ?? null,
        retention_keep_weekly: params.retention?.weekly ?? null,
        retention_keep_monthly: params.retention?.monthly ?? null,
        retention_keep_yearly: params.retention?.yearly ?? null,
        passphrase_file_path: passphraseFile,
        passphrase_migrated: true,
        metadata_json: metadata,
      }),
    );

    log.info(`Created repository ${repository.name} at ${repository.path}`);
    return { repository, passphraseFile, passphraseSource: resolved.source, warnings };
  }

  /**
   * Create an archive, prune by the resolved retention policy, compact,
   * record the run and optionally mirror the repository.
   */
  async dailyBackup(name: string, options: DailyBackupOptions = {}): Promise<DailyBackupResult> {
    const workflow = "daily_backup";
    const startTime = Date.now();
    const warnings: StepWarning[] = [];

    const repo = await this.loadRepository(workflow, name, warnings, options.signal);
    const ctx = await this.context(workflow, repo, options, warnings);

    const { policy, warnings: retentionWarnings } = await this.step(ctx, "retention", async () =>
      resolveRetentionPolicy(repositoryOverride(repo), defaultPolicy(this.config.borg.retention)),
    );
    for (const message of retentionWarnings) {
      this.warn(warnings, "retention", message);
    }

    const archiveName = generateArchiveName(this.clock());
    const excludeFile = this.exclusions.pathFor(repo.name);
    const excludeFrom = (await pathExists(excludeFile)) ? excludeFile : undefined;

    await this.engineStep(ctx, "create-archive", {
      subcommand: "create-archive",
      repoPath: repo.path,
      archiveName,
      backupTarget: repo.backup_target,
      excludeFrom,
    });

    const archive = await this.recordArchive(ctx, repo, archiveName);

    // borg refuses to prune without at least one keep rule
    const pruned = Object.values(policy).some((keep) => keep > 0);
    if (pruned) {
      await this.engineStep(ctx, "prune", { subcommand: "prune", repoPath: repo.path, retention: policy });
    }

    await this.engineStep(ctx, "compact", { subcommand: "compact", repoPath: repo.path });

    const metadata = await this.refreshMetadata(ctx, repo.path);
    let updated = await this.step(ctx, "persist", () =>
      this.store.update({ ...repo, last_backup: this.now(), metadata_json: metadata }),
    );

    let synced = false;
    if (this.remote && !options.skipSync) {
      const result = await this.syncToRemote(this.remote, updated, warnings);
      updated = result.repository;
      synced = result.synced;
    }

    const durationMs = Date.now() - startTime;
    log.info(`Daily backup of ${name} finished with ${warnings.length} warnings`);
    return { repository: updated, archiveName, archive, retention: policy, pruned, synced, warnings, durationMs };
  }

  private async recordArchive(
    ctx: WorkflowContext,
    repo: RepositoryRecord,
    archiveName: string,
  ): Promise<ArchiveRecord | null> {
    let summary: ArchiveSummary;
    try {
      summary = await readArchiveInfo(this.engine, repo.path, archiveName, {
        passphrase: ctx.passphrase,
        signal: ctx.signal,
      });
    } catch (err) {
      this.warn(ctx.warnings, "record-archive", `Could not read archive info: ${errorMessage(err)}`);
      return null;
    }

    const archive: ArchiveRecord = {
      repo_name: repo.name,
      archive_id: summary.id,
      name: summary.name,
      iso_timestamp: archiveNameToIso(summary.name) ?? this.now(),
      hostname: summary.hostname ?? this.hostname,
      original_size: summary.originalSize,
      compressed_size: summary.compressedSize,
      deduplicated_size: summary.deduplicatedSize,
    };
    await this.step(ctx, "record-archive", () => this.store.putArchive(archive));
    return archive;
  }

  /**
   * Mirror a repository. Failures become warnings; the local state that
   * led here is never rolled back.
   */
  private async syncToRemote(
    remote: RemoteObjectStore,
    repo: RepositoryRecord,
    warnings: StepWarning[],
  ): Promise<{ repository: RepositoryRecord; synced: boolean }> {
    let result: RemoteResult;
    try {
      result = await remote.sync(repo);
    } catch (err) {
      this.warn(warnings, "sync", `Remote sync failed: ${errorMessage(err)}`);
      return { repository: repo, synced: false };
    }
    if (!result.ok) {
      this.warn(warnings, "sync", `Remote sync failed: ${result.error.message}`);
      return { repository: repo, synced: false };
    }

    let updated: RepositoryRecord;
    try {
      updated = await this.store.update({ ...repo, last_s3_sync: this.now() });
    } catch (err) {
      this.warn(warnings, "sync", `Could not record sync time: ${errorMessage(err)}`);
      return { repository: repo, synced: true };
    }

    try {
      await this.refreshRemoteStats(repo.name);
    } catch (err) {
      this.warn(warnings, "sync", `Could not refresh remote stats: ${errorMessage(err)}`);
    }
    return { repository: updated, synced: true };
  }

  /**
   * Delete an engine repository and everything recorded about it
   */
  async deleteRepository(
    name: string,
    options: DeleteRepositoryOptions = {},
  ): Promise<DeleteRepositoryResult> {
    const workflow = "delete_repository";
    const warnings: StepWarning[] = [];
    const dryRun = options.dryRun ?? false;

    const repo = await this.loadRepository(workflow, name, warnings, options.signal);
    this.requireLocal(repo, "deletion");
    const ctx = await this.context(workflow, repo, options, warnings);

    await this.engineStep(ctx, "delete-repository", {
      subcommand: "delete-repository",
      repoPath: repo.path,
      dryRun,
    });

    if (dryRun) {
      return { name, dryRun, compacted: false, exclusionsRemoved: false, warnings };
    }

    let compacted = false;
    if (await pathExists(repo.path)) {
      // Partial deletion: reclaim what was freed, then refuse to forget it
      await this.engineStep(ctx, "compact", { subcommand: "compact", repoPath: repo.path });
      compacted = true;
      if (await pathExists(repo.path)) {
        throw new WorkflowError(
          workflow,
          "delete-repository",
          new BorgmateError(`Repository still exists at ${repo.path} after deletion`),
        );
      }
    }

    await this.step(ctx, "forget", () => this.store.delete(name));

    let exclusionsRemoved = false;
    try {
      exclusionsRemoved = await this.exclusions.delete(name);
    } catch (err) {
      this.warn(warnings, "exclusions", `Could not remove exclusions file: ${errorMessage(err)}`);
    }

    log.info(`Deleted repository ${name}`);
    return { name, dryRun, compacted, exclusionsRemoved, warnings };
  }

  /**
   * Download a repository from the remote mirror and re-register it on
   * this host
   */
  async restoreRepository(
    name: string,
    options: RestoreRepositoryOptions = {},
  ): Promise<RestoreRepositoryResult> {
    const workflow = "restore_repository";
    const warnings: StepWarning[] = [];
    const remote = this.requireRemote();
    const stepCtx = { workflow, signal: options.signal };

    const repo = await this.step(stepCtx, "resolve", () => this.store.get({ name }));

    const existsLocally = await pathExists(repo.path);
    if (existsLocally && !options.force) {
      throw new ValidationError(
        `Repository ${name} already exists at ${repo.path}; pass force to replace it`,
        "path",
        repo.path,
      );
    }
    if (existsLocally) {
      await this.step(stepCtx, "remove-local", () => rm(repo.path, { recursive: true, force: true }));
      log.info(`Removed local copy at ${repo.path}`);
    }

    await this.step(stepCtx, "fetch", async () => {
      const result = await remote.fetch(repo, repo.path);
      if (!result.ok) throw result.error;
    });

    let metadata = repo.metadata_json;
    try {
      const ctx = await this.context(workflow, repo, options, warnings);
      metadata = await this.refreshMetadata(ctx, repo.path);
    } catch (err) {
      this.warn(warnings, "info", `Restored repository could not be inspected: ${errorMessage(err)}`);
    }

    const repository = await this.step(stepCtx, "register", () =>
      this.store.update({
        ...repo,
        hostname: this.hostname,
        os_platform: this.platform,
        metadata_json: metadata,
      }),
    );

    log.info(`Restored repository ${name} to ${repo.path}`);
    return { repository, replacedLocal: existsLocally, warnings };
  }

  // Queries

  getRepository(name: string): Promise<RepositoryRecord> {
    return this.store.get({ name });
  }

  findRepositoryByPath(repoPath: string, hostname: string = this.hostname): Promise<RepositoryRecord | null> {
    return this.store.find({ path: path.resolve(repoPath), hostname });
  }

  listRepositories(): Promise<RepositoryRecord[]> {
    return this.store.listAll();
  }

  getArchiveRecords(name: string): Promise<ArchiveRecord[]> {
    return this.store.listArchives(name);
  }

  getRemoteStats(name: string): Promise<S3StatsCacheEntry | null> {
    return this.store.getCache(name);
  }

  async repositoryInfo(name: string, options: WorkflowOptions = {}): Promise<RepoInfo> {
    const repo = await this.store.get({ name });
    const resolved = await this.passphrases.resolveExisting(repo, options.passphrase);
    return readRepoInfo(this.engine, repo.path, { passphrase: resolved.value, signal: options.signal });
  }

  async listArchives(name: string, options: WorkflowOptions = {}): Promise<RepoArchive[]> {
    const repo = await this.store.get({ name });
    const resolved = await this.passphrases.resolveExisting(repo, options.passphrase);
    return readArchiveList(this.engine, repo.path, { passphrase: resolved.value, signal: options.signal });
  }

  async listArchiveContents(
    name: string,
    archiveName: string,
    options: WorkflowOptions = {},
  ): Promise<ArchiveContentEntry[]> {
    const repo = await this.store.get({ name });
    const resolved = await this.passphrases.resolveExisting(repo, options.passphrase);
    return readArchiveContents(this.engine, repo.path, archiveName, {
      passphrase: resolved.value,
      signal: options.signal,
    });
  }

  // Archive operations

  async extractArchive(
    name: string,
    archiveName: string,
    destination: string,
    options: WorkflowOptions & { extract?: ExtractOptions } = {},
  ): Promise<OperationResult> {
    const warnings: StepWarning[] = [];
    const repo = await this.loadRepository("extract_archive", name, warnings, options.signal);
    const ctx = await this.context("extract_archive", repo, options, warnings);
    const target = path.resolve(destination);
    await this.step(ctx, "prepare", () => mkdir(target, { recursive: true }));
    await this.engineStep(ctx, "extract", {
      subcommand: "extract",
      repoPath: repo.path,
      archiveName,
      destination: target,
      options: options.extract,
    });
    return { warnings };
  }

  async deleteArchive(
    name: string,
    archiveName: string,
    options: WorkflowOptions & { dryRun?: boolean } = {},
  ): Promise<OperationResult> {
    const warnings: StepWarning[] = [];
    const repo = await this.loadRepository("delete_archive", name, warnings, options.signal);
    this.requireLocal(repo, "archive deletion");
    const ctx = await this.context("delete_archive", repo, options, warnings);

    await this.engineStep(ctx, "delete-archive", {
      subcommand: "delete-archive",
      repoPath: repo.path,
      archiveName,
      dryRun: options.dryRun,
    });
    if (options.dryRun) {
      return { warnings };
    }

    await this.engineStep(ctx, "compact", { subcommand: "compact", repoPath: repo.path });
    const metadata = await this.refreshMetadata(ctx, repo.path);
    await this.step(ctx, "persist", () => this.store.update({ ...repo, metadata_json: metadata }));
    return { warnings };
  }

  async exportKey(
    name: string,
    options: WorkflowOptions & { outputPath?: string; paper?: boolean } = {},
  ): Promise<{ outputPath: string; warnings: StepWarning[] }> {
    const warnings: StepWarning[] = [];
    const repo = await this.loadRepository("export_key", name, warnings, options.signal);
    const ctx = await this.context("export_key", repo, options, warnings);
    const outputPath = path.resolve(
      options.outputPath ?? path.join(this.config.paths.homeDir, `${name}-encrypted-key-backup.txt`),
    );
    await this.engineStep(ctx, "export-key", {
      subcommand: "export-key",
      repoPath: repo.path,
      outputPath,
      paper: options.paper,
    });
    return { outputPath, warnings };
  }

  async checkRepository(
    name: string,
    options: WorkflowOptions & { verifyData?: boolean } = {},
  ): Promise<OperationResult> {
    const warnings: StepWarning[] = [];
    const repo = await this.loadRepository("check_repository", name, warnings, options.signal);
    const ctx = await this.context("check_repository", repo, options, warnings);
    await this.engineStep(ctx, "check", {
      subcommand: "check",
      repoPath: repo.path,
      verifyData: options.verifyData,
    });
    return { warnings };
  }

  // Remote mirror

  async syncRepository(name: string): Promise<{ synced: boolean; warnings: StepWarning[] }> {
    const remote = this.requireRemote();
    const warnings: StepWarning[] = [];
    const repo = await this.store.get({ name });
    const result = await this.syncToRemote(remote, repo, warnings);
    return { synced: result.synced, warnings };
  }

  async refreshRemoteStats(name: string): Promise<S3StatsCacheEntry> {
    const remote = this.requireRemote();
    const stats = await remote.stats(name);
    const entry: S3StatsCacheEntry = { repo_name: name, ...stats, cached_at: this.now() };
    await this.store.putCache(entry);
    return entry;
  }

  // Exclusions

  async getExclusions(name: string): Promise<string[]> {
    await this.store.get({ name });
    return this.exclusions.read(name);
  }

  async setExclusions(name: string, patterns: string[]): Promise<string> {
    await this.store.get({ name });
    return this.exclusions.write(name, patterns);
  }

  async addExclusion(name: string, pattern: string): Promise<string[]> {
    await this.store.get({ name });
    return this.exclusions.add(name, pattern);
  }

  async removeExclusion(name: string, lineNumber: number): Promise<string[]> {
    await this.store.get({ name });
    return this.exclusions.remove(name, lineNumber);
  }

  // Passphrases

  migratePassphrases(names?: string[]): Promise<PassphraseMigrationOutcome[]> {
    return migratePassphrases(this.store, this.passphrases, names);
  }

  close(): Promise<void> {
    return this.store.close();
  }
}
