import { chmod, mkdir, mkdtemp, readFile, rm, stat, writeFile } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { migratePassphrases, PassphraseStore } from "../../src/core/passphrase";
import { closeDatabase, openSqliteStore, type SqliteMetadataStore } from "../../src/db";
import { ValidationError } from "../../src/errors";
import { repositoryInsert } from "../helpers/fixtures";

describe("PassphraseStore", () => {
  let tempDir: string;
  let dir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), "borgmate-passphrase-test-"));
    dir = path.join(tempDir, "passphrases");
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(tempDir, { recursive: true, force: true });
  });

  describe("files", () => {
    test("save writes an owner-only file in an owner-only directory", async () => {
      const store = new PassphraseStore({ dir, env: {} });

      const file = await store.save("docs", "test-secret");

      expect(file).toBe(path.join(dir, "docs.key"));
      expect((await stat(file)).mode & 0o777).toBe(0o600);
      expect((await stat(dir)).mode & 0o777).toBe(0o700);
      expect(await readFile(file, "utf-8")).toBe("test-secret");
    });

    test("load trims the file and returns null when it is missing or empty", async () => {
      const store = new PassphraseStore({ dir, env: {} });
      await mkdir(dir, { recursive: true });
      await writeFile(path.join(dir, "docs.key"), "test-secret\n", { mode: 0o600 });
      await writeFile(path.join(dir, "empty.key"), "  \n", { mode: 0o600 });

      expect(await store.load("docs")).toBe("test-secret");
      expect(await store.load("empty")).toBeNull();
      expect(await store.load("missing")).toBeNull();
    });

    test("load still reads a file with loose permissions but warns", async () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      const store = new PassphraseStore({ dir, env: {} });
      const file = await store.save("docs", "test-secret");
      await chmod(file, 0o644);

      expect(await store.load("docs")).toBe("test-secret");
      expect(warn).toHaveBeenCalledTimes(1);
      expect(String(warn.mock.calls[0]?.[0])).toContain("has permissions 644, expected 600");
    });

    test("rejects names that are not valid repository names", () => {
      const store = new PassphraseStore({ dir, env: {} });

      expect(() => store.filePath("../etc/passwd")).toThrow(ValidationError);
    });
  });

  describe("resolveExisting", () => {
    const repo = { name: "docs", passphrase: null };

    test("an explicit value wins", async () => {
      const store = new PassphraseStore({ dir, env: { BORG_PASSPHRASE: "from-env" } });
      await store.save("docs", "from-file");

      expect(await store.resolveExisting(repo, "test-secret")).toEqual({
        value: "test-secret",
        source: "explicit",
      });
    });

    test("uses the environment until a passphrase file exists", async () => {
      const store = new PassphraseStore({ dir, env: { BORG_PASSPHRASE: "from-env" } });

      expect(await store.resolveExisting(repo)).toEqual({ value: "from-env", source: "environment" });

      await store.save("docs", "from-file");

      expect(await store.resolveExisting(repo)).toEqual({ value: "from-file", source: "file" });
    });

    test("prefers a legacy stored value over the environment", async () => {
      const store = new PassphraseStore({ dir, env: { BORG_PASSPHRASE: "from-env" } });

      expect(await store.resolveExisting({ name: "docs", passphrase: "legacy" })).toEqual({
        value: "legacy",
        source: "legacy",
      });
    });

    test("falls back to configuration, treating empty values as absent", async () => {
      const store = new PassphraseStore({ dir, env: { BORG_PASSPHRASE: "" }, configPassphrase: "from-config" });

      expect(await store.resolveExisting(repo, "")).toEqual({ value: "from-config", source: "config" });
    });

    test("throws when no source has a passphrase", async () => {
      const store = new PassphraseStore({ dir, env: {} });

      const error = await store.resolveExisting(repo).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ValidationError);
      expect(error instanceof ValidationError && error.field).toBe("passphrase");
    });
  });

  describe("resolveNew", () => {
    test("reads BORG_NEW_PASSPHRASE rather than BORG_PASSPHRASE", async () => {
      const store = new PassphraseStore({
        dir,
        env: { BORG_PASSPHRASE: "old", BORG_NEW_PASSPHRASE: "new" },
      });

      expect(await store.resolveNew("docs")).toEqual({ value: "new", source: "environment" });
    });

    test("uses the configured new-repository passphrase", async () => {
      const store = new PassphraseStore({ dir, env: {}, configNewPassphrase: "from-config" });

      expect(await store.resolveNew("docs")).toEqual({ value: "from-config", source: "config" });
    });

    test("generates a passphrase without saving it", async () => {
      const store = new PassphraseStore({ dir, env: {} });

      const resolved = await store.resolveNew("docs");

      expect(resolved.source).toBe("generated");
      expect(resolved.value).toHaveLength(43);
      expect(await store.load("docs")).toBeNull();
    });
  });
});

describe("migratePassphrases", () => {
  let tempDir: string;
  let store: SqliteMetadataStore;
  let passphrases: PassphraseStore;

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), "borgmate-passphrase-migrate-test-"));
    store = await openSqliteStore({
      dbPath: path.join(tempDir, "borgmate.db"),
      legacy: { dataDir: path.join(tempDir, "data"), metadataDir: path.join(tempDir, ".metadata") },
    });
    passphrases = new PassphraseStore({ dir: path.join(tempDir, "passphrases"), env: {} });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    closeDatabase();
    await rm(tempDir, { recursive: true, force: true });
  });

  test("moves stored passphrases into files and clears the records", async () => {
    await store.create(repositoryInsert({ passphrase: "test-secret" }));
    await store.create(
      repositoryInsert({ name: "photos", path: "/backups/photos", passphrase_migrated: true }),
    );

    const outcomes = await migratePassphrases(store, passphrases);

    const keyFile = path.join(tempDir, "passphrases", "docs.key");
    expect(outcomes).toEqual([
      { name: "docs", status: "migrated", filePath: keyFile, error: null },
      { name: "photos", status: "skipped", filePath: null, error: null },
    ]);
    expect(await readFile(keyFile, "utf-8")).toBe("test-secret");

    const docs = await store.get({ name: "docs" });
    expect(docs.passphrase).toBeNull();
    expect(docs.passphrase_file_path).toBe(keyFile);
    expect(docs.passphrase_migrated).toBe(true);
  });

  test("is idempotent", async () => {
    await store.create(repositoryInsert({ passphrase: "test-secret" }));
    await migratePassphrases(store, passphrases);

    const second = await migratePassphrases(store, passphrases);

    expect(second.map((o) => o.status)).toEqual(["skipped"]);
  });

  test("limits the run to the named repositories", async () => {
    await store.create(repositoryInsert({ passphrase: "test-secret" }));
    await store.create(repositoryInsert({ name: "photos", path: "/backups/photos", passphrase: "other" }));

    const outcomes = await migratePassphrases(store, passphrases, ["photos"]);

    expect(outcomes.map((o) => o.name)).toEqual(["photos"]);
    expect((await store.get({ name: "docs" })).passphrase).toBe("test-secret");
  });

  test("a repository that cannot be migrated keeps its stored passphrase", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    await store.create(repositoryInsert({ passphrase: "test-secret" }));
    // A file where the directory should be makes the write fail
    await writeFile(path.join(tempDir, "passphrases"), "");

    const outcomes = await migratePassphrases(store, passphrases);

    expect(outcomes[0]?.status).toBe("failed");
    expect((await store.get({ name: "docs" })).passphrase).toBe("test-secret");
  });
});
