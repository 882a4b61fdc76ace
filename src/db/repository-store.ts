/**
 * SQLite-backed metadata store
 */

import { RepositoryNotFoundError, StorageError, errorMessage } from "../errors";
import type {
  ArchiveRecord,
  MetadataStore,
  RepositoryInsert,
  RepositoryLookup,
  RepositoryRecord,
  S3StatsCacheEntry,
} from "../types";
import { describeLookup } from "../types";
import { pathExists } from "../utils/path";
import { closeDatabase, initDatabase, named, type Row, type SqliteDatabase } from "./connection";
import { ensureMigrated, type LegacySources } from "./legacy-migration";
import {
  completeRepository,
  laterTimestamp,
  parseArchiveRow,
  parseCacheRow,
  parseRepositoryRow,
  toRepositoryParams,
} from "./mappers";

const CONFLICT_PATTERN = /^(UNIQUE|PRIMARY KEY) constraint failed/;

export function toStorageError(err: unknown, operation: string): StorageError {
  if (err instanceof StorageError) return err;
  if (err instanceof Error && CONFLICT_PATTERN.test(err.message)) {
    return new StorageError(`${operation} conflicts with an existing record: ${err.message}`, "conflict", operation, err);
  }
  return new StorageError(`${operation} failed: ${errorMessage(err)}`, "backend", operation, err);
}

const REPOSITORY_COLUMNS = [
  "name",
  "path",
  "backup_target",
  "hostname",
  "os_platform",
  "last_backup",
  "last_s3_sync",
  "retention_keep_daily",
  "retention_keep_weekly",
  "retention_keep_monthly",
  "retention_keep_yearly",
  "passphrase",
  "passphrase_file_path",
  "passphrase_migrated",
  "metadata_json",
  "created_at",
  "updated_at",
] as const;

const INSERT_REPOSITORY = `
  INSERT INTO repositories (${REPOSITORY_COLUMNS.join(", ")})
  VALUES (${REPOSITORY_COLUMNS.map((c) => `@${c}`).join(", ")})
`;

const UPDATE_REPOSITORY = `
  UPDATE repositories SET ${REPOSITORY_COLUMNS.filter((c) => c !== "name" && c !== "created_at")
    .map((c) => `${c} = @${c}`)
    .join(", ")}
  WHERE name = @name
`;

export class SqliteMetadataStore implements MetadataStore {
  readonly backend = "sqlite" as const;

  constructor(
    private readonly db: SqliteDatabase,
    private readonly dbPath: string,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  private now(): string {
    return this.clock().toISOString();
  }

  private async read<T>(operation: string, fn: (db: SqliteDatabase) => T): Promise<T> {
    try {
      await this.db.reload();
      return fn(this.db);
    } catch (err) {
      throw toStorageError(err, operation);
    }
  }

  /**
   * Run the change in a transaction and write the file once it commits
   */
  private async write<T>(operation: string, fn: (db: SqliteDatabase) => T): Promise<T> {
    try {
      await this.db.reload();
      const result = this.db.transaction(() => fn(this.db));
      await this.db.persist();
      return result;
    } catch (err) {
      throw toStorageError(err, operation);
    }
  }

  private findRow(db: SqliteDatabase, lookup: RepositoryLookup): Row | undefined {
    if ("name" in lookup) {
      return db.queryOne("SELECT * FROM repositories WHERE name = ?", [lookup.name]);
    }
    return db.queryOne("SELECT * FROM repositories WHERE path = ? AND hostname = ?", [
      lookup.path,
      lookup.hostname,
    ]);
  }

  async create(repo: RepositoryInsert): Promise<RepositoryRecord> {
    return this.write("create", (db) => {
      const record = completeRepository(repo, this.now());
      db.execute(INSERT_REPOSITORY, named(toRepositoryParams(record)));
      const row = this.findRow(db, { name: record.name });
      if (!row) {
        throw new StorageError(`Failed to read back repository ${record.name}`, "backend", "create");
      }
      return parseRepositoryRow(row);
    });
  }

  async get(lookup: RepositoryLookup): Promise<RepositoryRecord> {
    const found = await this.find(lookup);
    if (!found) {
      throw new RepositoryNotFoundError(describeLookup(lookup), "get");
    }
    return found;
  }

  async find(lookup: RepositoryLookup): Promise<RepositoryRecord | null> {
    return this.read("get", (db) => {
      const row = this.findRow(db, lookup);
      return row ? parseRepositoryRow(row) : null;
    });
  }

  async listAll(): Promise<RepositoryRecord[]> {
    return this.read("list", (db) =>
      db.query("SELECT * FROM repositories ORDER BY name").map(parseRepositoryRow),
    );
  }

  async update(repo: RepositoryRecord): Promise<RepositoryRecord> {
    return this.write("update", (db) => {
      const row = this.findRow(db, { name: repo.name });
      if (!row) {
        throw new RepositoryNotFoundError(repo.name, "update");
      }
      const existing = parseRepositoryRow(row);
      const record: RepositoryRecord = {
        ...repo,
        created_at: existing.created_at,
        updated_at: laterTimestamp(this.now(), existing.created_at),
      };
      db.execute(UPDATE_REPOSITORY, named(toRepositoryParams(record)));
      return record;
    });
  }

  async delete(name: string): Promise<void> {
    await this.write("delete", (db) => {
      const removed = db.execute("DELETE FROM repositories WHERE name = ?", [name]);
      if (removed.changes === 0) {
        throw new RepositoryNotFoundError(name, "delete");
      }
      db.execute("DELETE FROM archives WHERE repo_name = ?", [name]);
      db.execute("DELETE FROM s3_stats_cache WHERE repo_name = ?", [name]);
    });
  }

  async getCache(name: string): Promise<S3StatsCacheEntry | null> {
    return this.read("get_cache", (db) => {
      const row = db.queryOne(
        `SELECT repo_name, total_size_bytes, object_count, last_modified, cached_at
         FROM s3_stats_cache WHERE repo_name = ?`,
        [name],
      );
      return row ? parseCacheRow(row) : null;
    });
  }

  async putCache(entry: S3StatsCacheEntry): Promise<void> {
    await this.write("put_cache", (db) => {
      db.execute(
        `INSERT INTO s3_stats_cache (repo_name, total_size_bytes, object_count, last_modified, cached_at)
         VALUES (@repo_name, @total_size_bytes, @object_count, @last_modified, @cached_at)
         ON CONFLICT(repo_name) DO UPDATE SET
           total_size_bytes = excluded.total_size_bytes,
           object_count = excluded.object_count,
           last_modified = excluded.last_modified,
           cached_at = excluded.cached_at`,
        named(entry),
      );
    });
  }

  async deleteCache(name: string): Promise<void> {
    await this.write("delete_cache", (db) => {
      db.execute("DELETE FROM s3_stats_cache WHERE repo_name = ?", [name]);
    });
  }

  async putArchive(archive: ArchiveRecord): Promise<void> {
    await this.write("put_archive", (db) => {
      db.execute(
        `INSERT INTO archives (repo_name, archive_id, name, iso_timestamp, hostname,
           original_size, compressed_size, deduplicated_size)
         VALUES (@repo_name, @archive_id, @name, @iso_timestamp, @hostname,
           @original_size, @compressed_size, @deduplicated_size)
         ON CONFLICT(archive_id) DO UPDATE SET
           name = excluded.name,
           iso_timestamp = excluded.iso_timestamp,
           hostname = excluded.hostname,
           original_size = excluded.original_size,
           compressed_size = excluded.compressed_size,
           deduplicated_size = excluded.deduplicated_size`,
        named(archive),
      );
    });
  }

  async listArchives(repoName: string): Promise<ArchiveRecord[]> {
    return this.read("list_archives", (db) =>
      db
        .query(
          `SELECT repo_name, archive_id, name, iso_timestamp, hostname,
             original_size, compressed_size, deduplicated_size
           FROM archives WHERE repo_name = ? ORDER BY iso_timestamp`,
          [repoName],
        )
        .map(parseArchiveRow),
    );
  }

  async deleteArchives(repoName: string): Promise<void> {
    await this.write("delete_archives", (db) => {
      db.execute("DELETE FROM archives WHERE repo_name = ?", [repoName]);
    });
  }

  async close(): Promise<void> {
    closeDatabase(this.dbPath);
  }
}

export interface SqliteStoreOptions {
  dbPath: string;
  legacy: LegacySources;
  clock?: () => Date;
}

/**
 * Open (creating if needed) the database file. A database created by this
 * call first receives any legacy flat-file metadata.
 */
export async function openSqliteStore(options: SqliteStoreOptions): Promise<SqliteMetadataStore> {
  const existedBefore = await pathExists(options.dbPath);
  const db = await initDatabase(options.dbPath);
  await ensureMigrated(db, existedBefore, options.legacy);
  return new SqliteMetadataStore(db, options.dbPath, options.clock);
}
