import { mkdir, readFile, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import {
  ConfigurationError,
  RepositoryNotFoundError,
  ValidationError,
  WorkflowError,
} from "../../src/errors";
import { setLogLevel } from "../../src/utils/logger";
import { pathExists } from "../../src/utils/path";
import { archiveRecord, repositoryInsert } from "../helpers/fixtures";
import { ARCHIVE_NAME, createHarness, type Harness, NOW } from "../helpers/harness";

async function rejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error("Expected the promise to reject");
}

setLogLevel("error");

describe("Orchestrator.deleteRepository", () => {
  let h: Harness;

  beforeEach(async () => {
    h = await createHarness();
    await h.seed("docs");
  });

  afterEach(async () => {
    await h.dispose();
  });

  test("removes the repository, its records and its exclusions", async () => {
    await h.store.putArchive(archiveRecord());
    await h.store.putCache({
      repo_name: "docs",
      total_size_bytes: 10,
      object_count: 1,
      last_modified: null,
      cached_at: NOW,
    });
    await h.orchestrator.addExclusion("docs", "*.tmp");

    const result = await h.orchestrator.deleteRepository("docs");

    expect(result).toEqual({
      name: "docs",
      dryRun: false,
      compacted: false,
      exclusionsRemoved: true,
      warnings: [],
    });
    expect(h.engine.invocations).toEqual([
      { subcommand: "delete-repository", repoPath: h.repoPath("docs"), dryRun: false },
    ]);
    expect(await h.store.find({ name: "docs" })).toBeNull();
    expect(await h.store.listArchives("docs")).toEqual([]);
    expect(await h.store.getCache("docs")).toBeNull();
    expect(await pathExists(h.orchestrator.exclusions.pathFor("docs"))).toBe(false);
  });

  test("a missing exclusions file is not an error", async () => {
    const result = await h.orchestrator.deleteRepository("docs");

    expect(result.exclusionsRemoved).toBe(false);
    expect(result.warnings).toEqual([]);
  });

  test("a dry run changes nothing", async () => {
    const result = await h.orchestrator.deleteRepository("docs", { dryRun: true });

    expect(result).toEqual({
      name: "docs",
      dryRun: true,
      compacted: false,
      exclusionsRemoved: false,
      warnings: [],
    });
    expect(h.engine.invocations[0]).toMatchObject({ subcommand: "delete-repository", dryRun: true });
    expect(await h.store.find({ name: "docs" })).not.toBeNull();
    expect(await pathExists(h.repoPath("docs"))).toBe(true);
  });

  test("keeps the record when the repository survives deletion", async () => {
    h.engine.on("delete-repository", () => ({}));

    const err = await rejection(h.orchestrator.deleteRepository("docs"));

    expect(err).toBeInstanceOf(WorkflowError);
    expect(err).toMatchObject({
      step: "delete-repository",
      message: `delete_repository failed at step "delete-repository": Repository still exists at ${h.repoPath("docs")} after deletion`,
    });
    expect(h.engine.subcommands()).toEqual(["delete-repository", "compact"]);
    expect(await h.store.find({ name: "docs" })).not.toBeNull();
  });

  test("refuses to delete a repository registered on another host", async () => {
    await h.store.create(
      repositoryInsert({ name: "remote-docs", path: "/srv/remote-docs", hostname: "host-b" }),
    );

    const err = await rejection(h.orchestrator.deleteRepository("remote-docs"));

    expect(err).toBeInstanceOf(ValidationError);
    expect(err).toMatchObject({ field: "hostname", value: "host-b" });
    expect(h.engine.invocations).toEqual([]);
  });

  test("fails at the resolve step for an unknown repository", async () => {
    const err = await rejection(h.orchestrator.deleteRepository("missing"));

    expect(err).toBeInstanceOf(WorkflowError);
    expect(err).toMatchObject({ workflow: "delete_repository", step: "resolve" });
  });
});

describe("Orchestrator.restoreRepository", () => {
  let h: Harness;

  beforeEach(async () => {
    h = await createHarness();
    await h.seed("docs");
    h.bucket.put("docs/config", "[repository]");
    h.bucket.put("docs/data/0/1", "chunk");
  });

  afterEach(async () => {
    await h.dispose();
  });

  test("requires a configured remote", async () => {
    const err = await rejection(h.variant({ remote: false }).restoreRepository("docs"));

    expect(err).toBeInstanceOf(ConfigurationError);
    expect(err).toMatchObject({ configKey: "aws.s3Bucket" });
  });

  test("refuses to overwrite a local copy without force", async () => {
    await writeFile(path.join(h.repoPath("docs"), "local"), "keep");

    const err = await rejection(h.orchestrator.restoreRepository("docs"));

    expect(err).toBeInstanceOf(ValidationError);
    expect(err).toMatchObject({ field: "path" });
    expect(await readFile(path.join(h.repoPath("docs"), "local"), "utf-8")).toBe("keep");
    expect(await pathExists(path.join(h.repoPath("docs"), "config"))).toBe(false);
  });

  test("replaces the local copy and re-registers it on this host", async () => {
    const repo = await h.store.get({ name: "docs" });
    await h.store.update({ ...repo, hostname: "host-b", os_platform: "Darwin" });
    await writeFile(path.join(h.repoPath("docs"), "stale"), "old");

    const result = await h.orchestrator.restoreRepository("docs", { force: true });

    expect(result.replacedLocal).toBe(true);
    expect(result.warnings).toEqual([]);
    expect(result.repository.hostname).toBe("host-a");
    expect(result.repository.os_platform).toBe("Linux");
    expect(await pathExists(path.join(h.repoPath("docs"), "stale"))).toBe(false);
    expect(await readFile(path.join(h.repoPath("docs"), "config"), "utf-8")).toBe("[repository]");
    expect(await readFile(path.join(h.repoPath("docs"), "data", "0", "1"), "utf-8")).toBe("chunk");
    expect(h.engine.subcommands()).toEqual(["info"]);
  });

  test("restores without a passphrase and reports that info was skipped", async () => {
    const photos = h.repoPath("photos");
    await h.store.create(repositoryInsert({ name: "photos", path: photos, hostname: "host-b" }));
    h.bucket.put("photos/config", "[repository]");

    const result = await h.orchestrator.restoreRepository("photos");

    expect(result.replacedLocal).toBe(false);
    expect(result.repository.hostname).toBe("host-a");
    expect(await readFile(path.join(photos, "config"), "utf-8")).toBe("[repository]");
    expect(result.warnings).toHaveLength(1);
    expect(result.warnings[0]?.step).toBe("info");
    expect(result.warnings[0]?.message).toMatch(/^Restored repository could not be inspected: No passphrase found/);
    expect(h.engine.invocations).toEqual([]);
  });

  test("a failed download aborts before registering", async () => {
    const photos = h.repoPath("photos");
    await h.store.create(repositoryInsert({ name: "photos", path: photos, hostname: "host-b" }));
    h.bucket.failList = new Error("AccessDenied");

    const err = await rejection(h.orchestrator.restoreRepository("photos"));

    expect(err).toBeInstanceOf(WorkflowError);
    expect(err).toMatchObject({
      step: "fetch",
      message: 'restore_repository failed at step "fetch": AccessDenied',
    });
    expect((await h.store.get({ name: "photos" })).hostname).toBe("host-b");
  });
});

describe("Orchestrator operations", () => {
  let h: Harness;

  beforeEach(async () => {
    h = await createHarness();
    await h.seed("docs");
  });

  afterEach(async () => {
    await h.dispose();
  });

  test("deleteArchive compacts and refreshes metadata", async () => {
    await h.orchestrator.deleteArchive("docs", ARCHIVE_NAME);

    expect(h.engine.subcommands()).toEqual(["delete-archive", "compact", "info"]);
    expect(h.engine.invocations[0]).toEqual({
      subcommand: "delete-archive",
      repoPath: h.repoPath("docs"),
      archiveName: ARCHIVE_NAME,
    });
  });

  test("deleteArchive dry run stops after the engine call", async () => {
    await h.orchestrator.deleteArchive("docs", ARCHIVE_NAME, { dryRun: true });

    expect(h.engine.subcommands()).toEqual(["delete-archive"]);
  });

  test("exportKey defaults to a file in the home directory", async () => {
    const result = await h.orchestrator.exportKey("docs");

    const expected = path.join(h.config.paths.homeDir, "docs-encrypted-key-backup.txt");
    expect(result.outputPath).toBe(expected);
    expect(h.engine.invocations).toEqual([
      { subcommand: "export-key", repoPath: h.repoPath("docs"), outputPath: expected },
    ]);
  });

  test("checkRepository forwards verifyData", async () => {
    await h.orchestrator.checkRepository("docs", { verifyData: true });

    expect(h.engine.invocations).toEqual([
      { subcommand: "check", repoPath: h.repoPath("docs"), verifyData: true },
    ]);
  });

  test("extractArchive resolves the destination", async () => {
    const destination = path.join(h.tempDir, "restore");
    await mkdir(destination);

    await h.orchestrator.extractArchive("docs", ARCHIVE_NAME, destination, {
      extract: { stripComponents: 2 },
    });

    expect(h.engine.invocations).toEqual([
      {
        subcommand: "extract",
        repoPath: h.repoPath("docs"),
        archiveName: ARCHIVE_NAME,
        destination,
        options: { stripComponents: 2 },
      },
    ]);
  });

  test("extractArchive creates a destination that does not exist yet", async () => {
    const destination = path.join(h.tempDir, "restore", "2025-01-31");

    await h.orchestrator.extractArchive("docs", ARCHIVE_NAME, destination);

    expect(await pathExists(destination)).toBe(true);
    expect(h.engine.invocations[0]).toMatchObject({ subcommand: "extract", destination });
  });

  test("listArchives reads the engine's archive list", async () => {
    const archives = await h.orchestrator.listArchives("docs");

    expect(archives.map((archive) => archive.name)).toEqual([ARCHIVE_NAME]);
  });

  test("syncRepository and refreshRemoteStats update the cache", async () => {
    h.bucket.put("docs/old", "12345", new Date("2025-01-30T10:00:00.000Z"));

    const synced = await h.orchestrator.syncRepository("docs");

    expect(synced).toEqual({ synced: true, warnings: [] });
    expect((await h.store.get({ name: "docs" })).last_s3_sync).toBe(NOW);
    expect(await h.orchestrator.getRemoteStats("docs")).toEqual({
      repo_name: "docs",
      total_size_bytes: 5,
      object_count: 1,
      last_modified: "2025-01-30T10:00:00.000Z",
      cached_at: NOW,
    });
  });

  test("manages exclusion patterns line by line", async () => {
    await h.orchestrator.addExclusion("docs", "*.tmp");
    await h.orchestrator.addExclusion("docs", "  node_modules  ");

    expect(await h.orchestrator.getExclusions("docs")).toEqual(["*.tmp", "node_modules"]);
    expect(await h.orchestrator.removeExclusion("docs", 1)).toEqual(["node_modules"]);

    const file = await h.orchestrator.setExclusions("docs", ["a", "", "b"]);
    expect(await readFile(file, "utf-8")).toBe("a\nb\n");
  });

  test("exclusion commands require a registered repository", async () => {
    await expect(h.orchestrator.addExclusion("missing", "*.tmp")).rejects.toBeInstanceOf(
      RepositoryNotFoundError,
    );
  });

  test("migratePassphrases reports repositories already on key files as skipped", async () => {
    const outcomes = await h.orchestrator.migratePassphrases();

    expect(outcomes).toEqual([
      {
        name: "docs",
        status: "skipped",
        filePath: path.join(h.config.paths.passphrasesDir, "docs.key"),
        error: null,
      },
    ]);
  });
});
