/**
 * Storage interface definitions
 */

import type {
  ArchiveRecord,
  RepositoryInsert,
  RepositoryLookup,
  RepositoryRecord,
  S3StatsCacheEntry,
} from "./database";

export type StorageBackend = "sqlite" | "dynamodb";

/**
 * Persistence for repository, archive and stats-cache records.
 *
 * Both backends honour the same contract: a call either fully persists
 * its change or throws a StorageError and leaves nothing observable.
 */
export interface MetadataStore {
  readonly backend: StorageBackend;

  /**
   * Insert a repository. Throws a conflict StorageError when the name or
   * the (path, hostname) pair is taken.
   */
  create(repo: RepositoryInsert): Promise<RepositoryRecord>;

  /**
   * Fetch a repository, throwing RepositoryNotFoundError when absent
   */
  get(lookup: RepositoryLookup): Promise<RepositoryRecord>;

  find(lookup: RepositoryLookup): Promise<RepositoryRecord | null>;

  listAll(): Promise<RepositoryRecord[]>;

  /**
   * Replace the stored record with the same name and bump updated_at
   */
  update(repo: RepositoryRecord): Promise<RepositoryRecord>;

  /**
   * Remove a repository together with its archive records
   */
  delete(name: string): Promise<void>;

  getCache(name: string): Promise<S3StatsCacheEntry | null>;
  putCache(entry: S3StatsCacheEntry): Promise<void>;
  deleteCache(name: string): Promise<void>;

  putArchive(archive: ArchiveRecord): Promise<void>;
  listArchives(repoName: string): Promise<ArchiveRecord[]>;
  deleteArchives(repoName: string): Promise<void>;

  close(): Promise<void>;
}

export type RemoteResult = { ok: true } | { ok: false; error: Error };

export interface RemoteStats {
  total_size_bytes: number;
  object_count: number;
  last_modified: string | null;
}

/**
 * Mirror of repository data in remote object storage
 */
export interface RemoteObjectStore {
  sync(repo: RepositoryRecord): Promise<RemoteResult>;
  fetch(repo: RepositoryRecord, destination: string): Promise<RemoteResult>;
  stats(repoName: string): Promise<RemoteStats>;
}
