/**
 * Metadata record type definitions
 */

export interface RepositoryRecord {
  name: string;
  path: string;
  backup_target: string;
  hostname: string;
  os_platform: string;
  last_backup: string | null;
  last_s3_sync: string | null;
  retention_keep_daily: number | null;
  retention_keep_weekly: number | null;
  retention_keep_monthly: number | null;
  retention_keep_yearly: number | null;
  /** Legacy in-storage secret, read only during passphrase migration */
  passphrase: string | null;
  passphrase_file_path: string | null;
  passphrase_migrated: boolean;
  metadata_json: string | null;
  created_at: string;
  updated_at: string;
}

export type RepositoryInsert = Pick<
  RepositoryRecord,
  "name" | "path" | "backup_target" | "hostname" | "os_platform"
> &
  Partial<Omit<RepositoryRecord, "name" | "path" | "backup_target" | "hostname" | "os_platform">>;

/** Repositories are addressed either by name or by location on a host */
export type RepositoryLookup = { name: string } | { path: string; hostname: string };

export interface ArchiveRecord {
  repo_name: string;
  archive_id: string;
  name: string;
  iso_timestamp: string;
  hostname: string;
  original_size: number;
  compressed_size: number;
  deduplicated_size: number;
}

export interface S3StatsCacheEntry {
  repo_name: string;
  total_size_bytes: number;
  object_count: number;
  last_modified: string | null;
  cached_at: string;
}

export interface Migration {
  version: number;
  name: string;
  description: string;
  up: string;
}

export function describeLookup(lookup: RepositoryLookup): string {
  return "name" in lookup ? lookup.name : `${lookup.path} on ${lookup.hostname}`;
}
