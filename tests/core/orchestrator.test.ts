import { readFile, stat, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { Orchestrator } from "../../src/core/orchestrator/orchestrator";
import { ValidationError, WorkflowError } from "../../src/errors";
import type { EngineEvent, RemoteObjectStore } from "../../src/types";
import { setLogLevel } from "../../src/utils/logger";
import { isScratchPath } from "../../src/utils/path";
import { repositoryInsert } from "../helpers/fixtures";
import { ARCHIVE_NAME, createHarness, type Harness, NOW } from "../helpers/harness";

async function rejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error("Expected the promise to reject");
}

// Test repositories live under the OS temp dir; treat them as permanent
vi.mock("../../src/utils/path", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../../src/utils/path")>();
  return { ...actual, isScratchPath: vi.fn(() => false) };
});

setLogLevel("error");

describe("Orchestrator.createRepository", () => {
  let h: Harness;

  beforeEach(async () => {
    h = await createHarness();
  });

  afterEach(async () => {
    await h.dispose();
  });

  test("initialises, configures and registers the repository", async () => {
    const repoPath = h.repoPath("docs");
    const target = path.join(h.tempDir, "target");

    const result = await h.orchestrator.createRepository({
      name: "docs",
      path: repoPath,
      backupTarget: target,
      passphrase: "test-secret",
    });

    expect(h.engine.subcommands()).toEqual(["init", "set-config", "info"]);
    expect(h.engine.invocations[1]).toEqual({
      subcommand: "set-config",
      repoPath,
      key: "additional_free_space",
      value: "2G",
    });
    expect(h.engine.passphrases).toEqual(["test-secret", "test-secret", "test-secret"]);

    expect(result.passphraseSource).toBe("explicit");
    expect(result.passphraseFile).toBe(path.join(h.config.paths.passphrasesDir, "docs.key"));
    expect(result.warnings).toEqual([]);
    expect(await readFile(result.passphraseFile, "utf-8")).toBe("test-secret");
    expect((await stat(result.passphraseFile)).mode & 0o777).toBe(0o600);

    const stored = await h.store.get({ name: "docs" });
    expect(stored.path).toBe(repoPath);
    expect(stored.backup_target).toBe(target);
    expect(stored.hostname).toBe("host-a");
    expect(stored.os_platform).toBe("Linux");
    expect(stored.passphrase).toBeNull();
    expect(stored.passphrase_migrated).toBe(true);
    expect(stored.passphrase_file_path).toBe(result.passphraseFile);
    expect(stored.metadata_json).not.toBeNull();
    expect(JSON.parse(stored.metadata_json ?? "{}").encryption.mode).toBe("repokey");
  });

  test("generates and saves a passphrase when none is supplied", async () => {
    const result = await h.orchestrator.createRepository({
      name: "docs",
      path: h.repoPath("docs"),
      backupTarget: path.join(h.tempDir, "target"),
    });

    expect(result.passphraseSource).toBe("generated");
    expect(result.warnings).toEqual([
      { step: "passphrase", message: "Generated a new passphrase for docs; back it up" },
    ]);
    const saved = await readFile(result.passphraseFile, "utf-8");
    expect(saved.length).toBeGreaterThan(0);
    expect(h.engine.passphrases[0]).toBe(saved);
  });

  test("stores a per-repository retention override", async () => {
    await h.orchestrator.createRepository({
      name: "docs",
      path: h.repoPath("docs"),
      backupTarget: path.join(h.tempDir, "target"),
      passphrase: "test-secret",
      retention: { daily: 14, monthly: 12 },
    });

    const stored = await h.store.get({ name: "docs" });
    expect(stored.retention_keep_daily).toBe(14);
    expect(stored.retention_keep_weekly).toBeNull();
    expect(stored.retention_keep_monthly).toBe(12);
    expect(stored.retention_keep_yearly).toBeNull();
  });

  test("skips set-config when no extra free space is reserved", async () => {
    await h.variant({ additionalFreeSpace: "0" }).createRepository({
      name: "docs",
      path: h.repoPath("docs"),
      backupTarget: path.join(h.tempDir, "target"),
      passphrase: "test-secret",
    });

    expect(h.engine.subcommands()).toEqual(["init", "info"]);
  });

  test("reserves no free space in a temporary location", async () => {
    vi.mocked(isScratchPath).mockReturnValueOnce(true);

    await h.orchestrator.createRepository({
      name: "docs",
      path: h.repoPath("docs"),
      backupTarget: path.join(h.tempDir, "target"),
      passphrase: "test-secret",
    });

    expect(isScratchPath).toHaveBeenCalledWith(h.repoPath("docs"));
    expect(h.engine.subcommands()).toEqual(["init", "info"]);
  });

  test("creates missing parent directories before init", async () => {
    const repoPath = path.join(h.tempDir, "nested", "deeper", "docs");
    h.engine.on("init", () => ({}));

    await h.orchestrator.createRepository({
      name: "docs",
      path: repoPath,
      backupTarget: path.join(h.tempDir, "target"),
      passphrase: "test-secret",
    });

    expect((await stat(repoPath)).isDirectory()).toBe(true);
    expect(h.engine.subcommands()).toEqual(["init", "set-config", "info"]);
  });

  test("rejects an invalid name before touching the engine", async () => {
    const err = await rejection(
      h.orchestrator.createRepository({
        name: "bad name",
        path: h.repoPath("bad"),
        backupTarget: path.join(h.tempDir, "target"),
        passphrase: "test-secret",
      }),
    );

    expect(err).toBeInstanceOf(ValidationError);
    expect(h.engine.invocations).toEqual([]);
  });

  test("rejects a name that is already registered", async () => {
    await h.seed("docs");

    const err = await rejection(
      h.orchestrator.createRepository({
        name: "docs",
        path: h.repoPath("other"),
        backupTarget: path.join(h.tempDir, "target"),
        passphrase: "test-secret",
      }),
    );

    expect(err).toBeInstanceOf(ValidationError);
    expect(err).toMatchObject({ message: "Repository docs already exists", field: "name" });
    expect(h.engine.invocations).toEqual([]);
  });

  test("rejects a path already registered on this host", async () => {
    await h.seed("docs");

    const err = await rejection(
      h.orchestrator.createRepository({
        name: "docs-2",
        path: h.repoPath("docs"),
        backupTarget: path.join(h.tempDir, "target"),
        passphrase: "test-secret",
      }),
    );

    expect(err).toBeInstanceOf(ValidationError);
    expect(err).toMatchObject({ field: "path" });
  });

  test("a fatal init leaves no record behind", async () => {
    h.engine.on("init", () => ({ exitCode: 2 }));

    const err = await rejection(
      h.orchestrator.createRepository({
        name: "docs",
        path: h.repoPath("docs"),
        backupTarget: path.join(h.tempDir, "target"),
        passphrase: "test-secret",
      }),
    );

    expect(err).toBeInstanceOf(WorkflowError);
    expect(err).toMatchObject({
      workflow: "create_repository",
      step: "init",
      stderr: "Repository is locked",
      message: 'create_repository failed at step "init": borg init failed with exit code 2',
    });
    expect(h.engine.subcommands()).toEqual(["init"]);
    expect(await h.store.find({ name: "docs" })).toBeNull();
  });

  test("treats a warning exit from init as a failure", async () => {
    h.engine.on("init", () => ({ exitCode: 1 }));

    const err = await rejection(
      h.orchestrator.createRepository({
        name: "docs",
        path: h.repoPath("docs"),
        backupTarget: path.join(h.tempDir, "target"),
        passphrase: "test-secret",
      }),
    );

    expect(err).toBeInstanceOf(WorkflowError);
    expect(err).toMatchObject({
      step: "init",
      message: 'create_repository failed at step "init": init exited with code 1',
    });
    expect(await h.store.find({ name: "docs" })).toBeNull();
  });
});

describe("Orchestrator.dailyBackup", () => {
  let h: Harness;

  beforeEach(async () => {
    h = await createHarness();
    await h.seed("docs");
  });

  afterEach(async () => {
    await h.dispose();
  });

  test("archives, prunes, compacts, records and syncs", async () => {
    await writeFile(path.join(h.repoPath("docs"), "config"), "cfg");

    const result = await h.orchestrator.dailyBackup("docs");

    expect(h.engine.subcommands()).toEqual(["create-archive", "info", "prune", "compact", "info"]);
    expect(h.engine.invocations[0]).toEqual({
      subcommand: "create-archive",
      repoPath: h.repoPath("docs"),
      archiveName: ARCHIVE_NAME,
      backupTarget: path.join(h.tempDir, "target"),
    });
    expect(h.engine.invocations[2]).toEqual({
      subcommand: "prune",
      repoPath: h.repoPath("docs"),
      retention: { daily: 7, weekly: 4, monthly: 6, yearly: 0 },
    });

    const expectedArchive = {
      repo_name: "docs",
      archive_id: `id-${ARCHIVE_NAME}`,
      name: ARCHIVE_NAME,
      iso_timestamp: NOW,
      hostname: "host-a",
      original_size: 1000,
      compressed_size: 600,
      deduplicated_size: 200,
    };
    expect(result.archiveName).toBe(ARCHIVE_NAME);
    expect(result.archive).toEqual(expectedArchive);
    expect(await h.store.listArchives("docs")).toEqual([expectedArchive]);

    expect(result.pruned).toBe(true);
    expect(result.synced).toBe(true);
    expect(result.warnings).toEqual([]);
    expect(result.repository.last_backup).toBe(NOW);
    expect(result.repository.last_s3_sync).toBe(NOW);

    expect(h.bucket.uploads).toEqual(["docs/config"]);
    const cache = await h.store.getCache("docs");
    expect(cache).toMatchObject({ repo_name: "docs", total_size_bytes: 3, object_count: 1, cached_at: NOW });
  });

  test("continues after a warning exit and reports the warnings", async () => {
    h.engine.on("create-archive", () => ({
      exitCode: 1,
      warnings: ["/home/me/docs/a.txt: file changed while we backed it up"],
    }));

    const result = await h.orchestrator.dailyBackup("docs", { skipSync: true });

    expect(h.engine.subcommands()).toEqual(["create-archive", "info", "prune", "compact", "info"]);
    expect(result.warnings).toEqual([
      { step: "create-archive", message: "/home/me/docs/a.txt: file changed while we backed it up" },
    ]);
    expect(result.repository.last_backup).toBe(NOW);
  });

  test("records a bare warning exit code", async () => {
    h.engine.on("compact", () => ({ exitCode: 1 }));

    const result = await h.orchestrator.dailyBackup("docs", { skipSync: true });

    expect(result.warnings).toEqual([{ step: "compact", message: "completed with exit code 1" }]);
  });

  test("stops at a fatal archive step without pruning", async () => {
    h.engine.on("create-archive", () => ({ exitCode: 2 }));

    const err = await rejection(h.orchestrator.dailyBackup("docs"));

    expect(err).toBeInstanceOf(WorkflowError);
    expect(err).toMatchObject({ workflow: "daily_backup", step: "create-archive" });
    expect(h.engine.subcommands()).toEqual(["create-archive"]);
    const stored = await h.store.get({ name: "docs" });
    expect(stored.last_backup).toBeNull();
    expect(await h.store.listArchives("docs")).toEqual([]);
    expect(h.bucket.uploads).toEqual([]);
  });

  test("passes the exclusions file when one exists", async () => {
    await h.orchestrator.addExclusion("docs", "*.tmp");

    await h.orchestrator.dailyBackup("docs", { skipSync: true });

    expect(h.engine.invocations[0]).toMatchObject({
      subcommand: "create-archive",
      excludeFrom: path.join(h.config.paths.exclusionsDir, "docs_excludes.txt"),
    });
  });

  test("skips prune when the policy keeps nothing", async () => {
    const orchestrator = h.variant({
      retention: { keepDaily: 0, keepWeekly: 0, keepMonthly: 0, keepYearly: 0 },
    });

    const result = await orchestrator.dailyBackup("docs", { skipSync: true });

    expect(result.pruned).toBe(false);
    expect(h.engine.subcommands()).toEqual(["create-archive", "info", "compact", "info"]);
    expect(result.warnings).toEqual([
      { step: "retention", message: "Retention policy keeps nothing; archives will never be pruned" },
    ]);
  });

  test("uses the repository's retention override", async () => {
    const repo = await h.store.get({ name: "docs" });
    await h.store.update({ ...repo, retention_keep_daily: 30, retention_keep_yearly: 2 });

    const result = await h.orchestrator.dailyBackup("docs", { skipSync: true });

    expect(result.retention).toEqual({ daily: 30, weekly: 4, monthly: 6, yearly: 2 });
  });

  test("downgrades a failed sync to a warning", async () => {
    h.bucket.failList = new Error("AccessDenied");

    const result = await h.orchestrator.dailyBackup("docs");

    expect(result.synced).toBe(false);
    expect(result.warnings).toEqual([{ step: "sync", message: "Remote sync failed: AccessDenied" }]);
    expect(result.repository.last_backup).toBe(NOW);
    expect(result.repository.last_s3_sync).toBeNull();
  });

  test("downgrades a remote that throws to a warning", async () => {
    const remote: RemoteObjectStore = {
      sync: async () => {
        throw new Error("socket hang up");
      },
      fetch: async () => ({ ok: true }),
      stats: async () => ({ total_size_bytes: 0, object_count: 0, last_modified: null }),
    };
    const orchestrator = new Orchestrator({
      config: h.config,
      engine: h.engine,
      store: h.store,
      remote,
      passphrases: h.passphrases,
      hostname: "host-a",
      platform: "Linux",
      clock: () => new Date(NOW),
    });

    const result = await orchestrator.dailyBackup("docs");

    expect(result.synced).toBe(false);
    expect(result.warnings).toEqual([{ step: "sync", message: "Remote sync failed: socket hang up" }]);
    expect(result.repository.last_backup).toBe(NOW);
  });

  test("honours skipSync", async () => {
    const result = await h.orchestrator.dailyBackup("docs", { skipSync: true });

    expect(result.synced).toBe(false);
    expect(h.bucket.uploads).toEqual([]);
    expect(await h.store.getCache("docs")).toBeNull();
  });

  test("does not sync without a remote", async () => {
    const result = await h.variant({ remote: false }).dailyBackup("docs");

    expect(result.synced).toBe(false);
    expect(result.repository.last_s3_sync).toBeNull();
  });

  test("fails at the resolve step for an unknown repository", async () => {
    const err = await rejection(h.orchestrator.dailyBackup("missing"));

    expect(err).toBeInstanceOf(WorkflowError);
    expect(err).toMatchObject({
      step: "resolve",
      message: 'daily_backup failed at step "resolve": Repository not found: missing',
    });
    expect(h.engine.invocations).toEqual([]);
  });

  test("moves a stored legacy passphrase into its file", async () => {
    await h.store.create(
      repositoryInsert({
        name: "legacy",
        path: h.repoPath("legacy"),
        backup_target: path.join(h.tempDir, "target"),
        passphrase: "test-secret",
        passphrase_migrated: false,
      }),
    );

    await h.orchestrator.dailyBackup("legacy", { skipSync: true });

    const stored = await h.store.get({ name: "legacy" });
    const keyFile = path.join(h.config.paths.passphrasesDir, "legacy.key");
    expect(stored.passphrase).toBeNull();
    expect(stored.passphrase_migrated).toBe(true);
    expect(stored.passphrase_file_path).toBe(keyFile);
    expect(await readFile(keyFile, "utf-8")).toBe("test-secret");
    expect(new Set(h.engine.passphrases)).toEqual(new Set(["test-secret"]));
  });

  test("forwards engine events tagged with their step", async () => {
    const event: EngineEvent = { type: "file_status", status: "A", path: "/home/me/docs/a.txt" };
    h.engine.on("create-archive", () => ({ events: [event] }));
    const seen: Array<[string, EngineEvent]> = [];

    await h.orchestrator.dailyBackup("docs", {
      skipSync: true,
      onEvent: (step, e) => seen.push([step, e]),
    });

    expect(seen).toEqual([["create-archive", event]]);
  });

  test("stops before the first step once aborted", async () => {
    const controller = new AbortController();
    controller.abort();

    const err = await rejection(h.orchestrator.dailyBackup("docs", { signal: controller.signal }));

    expect(err).toBeInstanceOf(WorkflowError);
    expect(err).toMatchObject({ step: "resolve", message: 'daily_backup failed at step "resolve": Cancelled' });
    expect(h.engine.invocations).toEqual([]);
  });
});
