/**
 * Database row mapping utilities
 */

import { z } from "zod";
import type { ArchiveRecord, RepositoryInsert, RepositoryRecord, S3StatsCacheEntry } from "../types";

const text = z.string();
const nullableText = z.string().nullable();
const nullableCount = z.number().int().nullable();

const repositoryRowSchema = z.object({
  id: z.number(),
  name: text,
  path: text,
  backup_target: text,
  hostname: text,
  os_platform: text,
  last_backup: nullableText,
  last_s3_sync: nullableText,
  retention_keep_daily: nullableCount,
  retention_keep_weekly: nullableCount,
  retention_keep_monthly: nullableCount,
  retention_keep_yearly: nullableCount,
  passphrase: nullableText,
  passphrase_file_path: nullableText,
  passphrase_migrated: z.number(),
  metadata_json: nullableText,
  created_at: text,
  updated_at: text,
});

const archiveRowSchema = z.object({
  repo_name: text,
  archive_id: text,
  name: text,
  iso_timestamp: text,
  hostname: text,
  original_size: z.number(),
  compressed_size: z.number(),
  deduplicated_size: z.number(),
});

const cacheRowSchema = z.object({
  repo_name: text,
  total_size_bytes: z.number(),
  object_count: z.number(),
  last_modified: nullableText,
  cached_at: text,
});

export type RawRepositoryRow = z.infer<typeof repositoryRowSchema>;

/** Named parameters for insert and update statements */
export type RepositoryParams = Omit<RepositoryRecord, "passphrase_migrated"> & {
  passphrase_migrated: number;
};

export function parseRepositoryRow(row: unknown): RepositoryRecord {
  const { id: _id, passphrase_migrated, ...rest } = repositoryRowSchema.parse(row);
  return {
    ...rest,
    passphrase_migrated: passphrase_migrated !== 0,
  };
}

export function parseArchiveRow(row: unknown): ArchiveRecord {
  return archiveRowSchema.parse(row);
}

export function parseCacheRow(row: unknown): S3StatsCacheEntry {
  return cacheRowSchema.parse(row);
}

/**
 * Fill the optional columns of an insert with their defaults
 */
export function completeRepository(
  repo: RepositoryInsert,
  now: string,
): RepositoryRecord {
  return {
    name: repo.name,
    path: repo.path,
    backup_target: repo.backup_target,
    hostname: repo.hostname,
    os_platform: repo.os_platform,
    last_backup: repo.last_backup ?? null,
    last_s3_sync: repo.last_s3_sync ?? null,
    retention_keep_daily: repo.retention_keep_daily ?? null,
    retention_keep_weekly: repo.retention_keep_weekly ?? null,
    retention_keep_monthly: repo.retention_keep_monthly ?? null,
    retention_keep_yearly: repo.retention_keep_yearly ?? null,
    passphrase: repo.passphrase ?? null,
    passphrase_file_path: repo.passphrase_file_path ?? null,
    passphrase_migrated: repo.passphrase_migrated ?? false,
    metadata_json: repo.metadata_json ?? null,
    created_at: repo.created_at ?? now,
    updated_at: repo.updated_at ?? now,
  };
}

export function toRepositoryParams(repo: RepositoryRecord): RepositoryParams {
  return {
    ...repo,
    passphrase_migrated: repo.passphrase_migrated ? 1 : 0,
  };
}

/**
 * ISO timestamps compare lexically; keep updated_at from preceding created_at
 */
export function laterTimestamp(candidate: string, floor: string): string {
  return candidate < floor ? floor : candidate;
}
