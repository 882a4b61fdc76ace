import { mkdtemp, rm } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { openSqliteStore, type SqliteMetadataStore } from "../../src/db";
import { RepositoryNotFoundError, StorageError } from "../../src/errors";
import { archiveRecord, repositoryInsert, steppingClock } from "../helpers/fixtures";

describe("SqliteMetadataStore", () => {
  let tempDir: string;
  let dbPath: string;
  let store: SqliteMetadataStore;

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), "borgmate-store-test-"));
    dbPath = path.join(tempDir, "borgmate.db");
    store = await openSqliteStore({
      dbPath,
      legacy: { dataDir: path.join(tempDir, "data"), metadataDir: path.join(tempDir, ".metadata") },
      clock: steppingClock(),
    });
  });

  afterEach(async () => {
    await store.close();
    await rm(tempDir, { recursive: true, force: true });
  });

  describe("create", () => {
    test("fills defaults and timestamps", async () => {
      const created = await store.create(repositoryInsert());

      expect(created).toEqual({
        name: "docs",
        path: "/backups/docs",
        backup_target: "/home/me/docs",
        hostname: "host-a",
        os_platform: "Linux",
        last_backup: null,
        last_s3_sync: null,
        retention_keep_daily: null,
        retention_keep_weekly: null,
        retention_keep_monthly: null,
        retention_keep_yearly: null,
        passphrase: null,
        passphrase_file_path: null,
        passphrase_migrated: false,
        metadata_json: null,
        created_at: "2025-01-01T00:00:00.000Z",
        updated_at: "2025-01-01T00:00:00.000Z",
      });
    });

    test("rejects a duplicate name as a conflict", async () => {
      await store.create(repositoryInsert());

      const error = await store
        .create(repositoryInsert({ path: "/backups/other" }))
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(StorageError);
      expect(error instanceof StorageError && error.reason).toBe("conflict");
    });

    test("rejects the same path on the same host", async () => {
      await store.create(repositoryInsert());

      const error = await store.create(repositoryInsert({ name: "docs-2" })).catch((err: unknown) => err);

      expect(error instanceof StorageError && error.reason).toBe("conflict");
    });

    test("allows the same path on another host", async () => {
      await store.create(repositoryInsert());

      const other = await store.create(repositoryInsert({ name: "docs-b", hostname: "host-b" }));

      expect(other.hostname).toBe("host-b");
    });
  });

  describe("lookups", () => {
    test("finds repositories by name and by location", async () => {
      await store.create(repositoryInsert());

      expect((await store.get({ name: "docs" })).path).toBe("/backups/docs");
      expect((await store.get({ path: "/backups/docs", hostname: "host-a" })).name).toBe("docs");
      expect(await store.find({ path: "/backups/docs", hostname: "host-b" })).toBeNull();
    });

    test("get throws RepositoryNotFoundError for unknown names", async () => {
      await expect(store.get({ name: "missing" })).rejects.toBeInstanceOf(RepositoryNotFoundError);
    });

    test("listAll orders by name", async () => {
      await store.create(repositoryInsert({ name: "photos", path: "/backups/photos" }));
      await store.create(repositoryInsert({ name: "code", path: "/backups/code" }));
      await store.create(repositoryInsert());

      expect((await store.listAll()).map((r) => r.name)).toEqual(["code", "docs", "photos"]);
    });
  });

  describe("update", () => {
    test("keeps created_at and bumps updated_at", async () => {
      const created = await store.create(repositoryInsert());

      const updated = await store.update({
        ...created,
        last_backup: "2025-01-31T02:00:00.000Z",
        created_at: "1999-01-01T00:00:00.000Z",
      });

      expect(updated.created_at).toBe("2025-01-01T00:00:00.000Z");
      expect(updated.updated_at).toBe("2025-01-01T00:00:01.000Z");
      expect(await store.get({ name: "docs" })).toEqual(updated);
    });

    test("rejects taking over another repository's path as a conflict", async () => {
      await store.create(repositoryInsert());
      const photos = await store.create(repositoryInsert({ name: "photos", path: "/backups/photos" }));

      const error = await store.update({ ...photos, path: "/backups/docs" }).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(StorageError);
      expect(error instanceof StorageError && error.reason).toBe("conflict");
      expect((await store.get({ name: "photos" })).path).toBe("/backups/photos");
    });

    test("throws for a repository that does not exist", async () => {
      const created = await store.create(repositoryInsert());

      await expect(store.update({ ...created, name: "ghost" })).rejects.toBeInstanceOf(RepositoryNotFoundError);
    });
  });

  describe("delete", () => {
    test("removes the repository with its archives and stats cache", async () => {
      await store.create(repositoryInsert());
      await store.putArchive(archiveRecord());
      await store.putCache({
        repo_name: "docs",
        total_size_bytes: 10,
        object_count: 1,
        last_modified: null,
        cached_at: "2025-01-01T00:00:00.000Z",
      });

      await store.delete("docs");

      expect(await store.find({ name: "docs" })).toBeNull();
      expect(await store.listArchives("docs")).toEqual([]);
      expect(await store.getCache("docs")).toBeNull();
    });

    test("throws for an unknown repository", async () => {
      await expect(store.delete("missing")).rejects.toBeInstanceOf(RepositoryNotFoundError);
    });
  });

  describe("stats cache", () => {
    test("returns null when nothing is cached", async () => {
      expect(await store.getCache("docs")).toBeNull();
    });

    test("putCache replaces the previous entry", async () => {
      const entry = {
        repo_name: "docs",
        total_size_bytes: 10,
        object_count: 1,
        last_modified: null,
        cached_at: "2025-01-01T00:00:00.000Z",
      };
      await store.putCache(entry);
      await store.putCache({ ...entry, total_size_bytes: 20, object_count: 2 });

      expect(await store.getCache("docs")).toEqual({ ...entry, total_size_bytes: 20, object_count: 2 });
    });
  });

  describe("archives", () => {
    test("lists archives in timestamp order and upserts by id", async () => {
      await store.putArchive(
        archiveRecord({ archive_id: "b2", name: "2025-02-01_02:00:00", iso_timestamp: "2025-02-01T02:00:00.000Z" }),
      );
      await store.putArchive(archiveRecord());
      await store.putArchive(archiveRecord({ original_size: 5000 }));

      const archives = await store.listArchives("docs");

      expect(archives.map((a) => a.archive_id)).toEqual(["a1", "b2"]);
      expect(archives[0]?.original_size).toBe(5000);
    });
  });

  test("data survives closing and reopening the database", async () => {
    await store.create(repositoryInsert());
    await store.close();

    store = await openSqliteStore({
      dbPath,
      legacy: { dataDir: path.join(tempDir, "data"), metadataDir: path.join(tempDir, ".metadata") },
    });

    expect((await store.listAll()).map((r) => r.name)).toEqual(["docs"]);
  });
});
