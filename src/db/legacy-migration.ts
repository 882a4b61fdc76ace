/**
 * One-time import of legacy flat-file metadata into the database
 */

import { readdir, readFile } from "node:fs/promises";
import * as path from "node:path";
import { z } from "zod";
import { errorMessage, isNodeError } from "../errors";
import type { RepositoryRecord, S3StatsCacheEntry } from "../types";
import { scoped } from "../utils/logger";
import { named, type SqliteDatabase } from "./connection";
import { completeRepository, toRepositoryParams } from "./mappers";

const log = scoped("migration");

export interface LegacySources {
  /** Holds repositories/*.json and s3_stats_cache.json */
  dataDir: string;
  /** Older per-repository metadata directory */
  metadataDir: string;
}

export interface LegacyImportReport {
  repositories: number;
  caches: number;
  skipped: string[];
}

const legacyRepositorySchema = z.object({
  name: z.string().min(1),
  path: z.string().min(1),
  backup_target: z.string().min(1),
  hostname: z.string().min(1),
  os_platform: z.string().min(1),
  last_backup: z.string().nullish(),
  last_s3_sync: z.string().nullish(),
  metadata: z.unknown().optional(),
  passphrase: z.string().nullish(),
  passphrase_file_path: z.string().nullish(),
  passphrase_migrated: z.boolean().optional(),
});

const legacyCacheFileSchema = z.object({
  repos: z.record(z.unknown()).default({}),
});

const legacyCacheEntrySchema = z.object({
  total_size_bytes: z.number().int().nonnegative().default(0),
  object_count: z.number().int().nonnegative().default(0),
  last_modified: z.string().nullish(),
});

function toIsoOrNull(value: string | null | undefined): string | null {
  if (!value) return null;
  const time = Date.parse(value);
  return Number.isNaN(time) ? null : new Date(time).toISOString();
}

async function listJsonFiles(dir: string): Promise<string[]> {
  try {
    const entries = await readdir(dir);
    return entries
      .filter((entry) => entry.endsWith(".json"))
      .sort()
      .map((entry) => path.join(dir, entry));
  } catch (err) {
    if (isNodeError(err) && err.code === "ENOENT") return [];
    throw err;
  }
}

async function readJson(file: string): Promise<unknown> {
  return JSON.parse(await readFile(file, "utf-8"));
}

/**
 * Parse every legacy repository file. Files that fail to read or parse
 * are reported and skipped.
 */
export async function readLegacyRepositories(
  dirs: string[],
  now: string,
): Promise<{ records: RepositoryRecord[]; skipped: string[] }> {
  const records: RepositoryRecord[] = [];
  const skipped: string[] = [];

  for (const dir of dirs) {
    for (const file of await listJsonFiles(dir)) {
      try {
        const data = legacyRepositorySchema.parse(await readJson(file));
        records.push(
          completeRepository(
            {
              name: data.name,
              path: data.path,
              backup_target: data.backup_target,
              hostname: data.hostname,
              os_platform: data.os_platform,
              last_backup: toIsoOrNull(data.last_backup),
              last_s3_sync: toIsoOrNull(data.last_s3_sync),
              metadata_json:
                data.metadata === undefined || data.metadata === null
                  ? null
                  : JSON.stringify(data.metadata),
              passphrase: data.passphrase ?? null,
              passphrase_file_path: data.passphrase_file_path ?? null,
              passphrase_migrated: data.passphrase_migrated ?? false,
            },
            now,
          ),
        );
      } catch (err) {
        log.warn(`Skipping invalid repository file ${path.basename(file)}: ${errorMessage(err)}`);
        skipped.push(file);
      }
    }
  }

  return { records, skipped };
}

export async function readLegacyCache(
  file: string,
  now: string,
): Promise<{ entries: S3StatsCacheEntry[]; skipped: string[] }> {
  let raw: unknown;
  try {
    raw = await readJson(file);
  } catch (err) {
    if (isNodeError(err) && err.code === "ENOENT") {
      return { entries: [], skipped: [] };
    }
    log.warn(`Skipping invalid stats cache ${path.basename(file)}: ${errorMessage(err)}`);
    return { entries: [], skipped: [file] };
  }

  const parsed = legacyCacheFileSchema.safeParse(raw);
  if (!parsed.success) {
    log.warn(`Skipping invalid stats cache ${path.basename(file)}`);
    return { entries: [], skipped: [file] };
  }

  const entries: S3StatsCacheEntry[] = [];
  const skipped: string[] = [];
  for (const [repoName, value] of Object.entries(parsed.data.repos)) {
    const entry = legacyCacheEntrySchema.safeParse(value);
    if (!entry.success) {
      log.warn(`Skipping stats cache entry for ${repoName}`);
      skipped.push(`${file}#${repoName}`);
      continue;
    }
    entries.push({
      repo_name: repoName,
      total_size_bytes: entry.data.total_size_bytes,
      object_count: entry.data.object_count,
      last_modified: toIsoOrNull(entry.data.last_modified),
      cached_at: now,
    });
  }
  return { entries, skipped };
}

/**
 * Import legacy repositories and stats into an open database. Rows whose
 * name (or path on the same host) already exists are left alone, so
 * running the import twice adds nothing the second time.
 */
export async function importLegacyData(
  db: SqliteDatabase,
  sources: LegacySources,
  now: string = new Date().toISOString(),
): Promise<LegacyImportReport> {
  const repos = await readLegacyRepositories(
    [path.join(sources.dataDir, "repositories"), sources.metadataDir],
    now,
  );
  const cache = await readLegacyCache(path.join(sources.dataDir, "s3_stats_cache.json"), now);

  const insertRepo = `
    INSERT OR IGNORE INTO repositories (
      name, path, backup_target, hostname, os_platform, last_backup, last_s3_sync,
      retention_keep_daily, retention_keep_weekly, retention_keep_monthly, retention_keep_yearly,
      passphrase, passphrase_file_path, passphrase_migrated, metadata_json, created_at, updated_at
    ) VALUES (
      @name, @path, @backup_target, @hostname, @os_platform, @last_backup, @last_s3_sync,
      @retention_keep_daily, @retention_keep_weekly, @retention_keep_monthly, @retention_keep_yearly,
      @passphrase, @passphrase_file_path, @passphrase_migrated, @metadata_json, @created_at, @updated_at
    )
  `;
  const insertCache = `
    INSERT OR IGNORE INTO s3_stats_cache (repo_name, total_size_bytes, object_count, last_modified, cached_at)
    VALUES (@repo_name, @total_size_bytes, @object_count, @last_modified, @cached_at)
  `;

  const counts = db.transaction(() => {
    let repositories = 0;
    let caches = 0;
    for (const record of repos.records) {
      repositories += db.execute(insertRepo, named(toRepositoryParams(record))).changes;
    }
    for (const entry of cache.entries) {
      caches += db.execute(insertCache, named(entry)).changes;
    }
    return { repositories, caches };
  });

  if (counts.repositories > 0 || counts.caches > 0) {
    await db.persist();
  }

  const report: LegacyImportReport = {
    ...counts,
    skipped: [...repos.skipped, ...cache.skipped],
  };

  if (report.repositories > 0 || report.caches > 0) {
    log.info(
      `Imported ${report.repositories} repositories and ${report.caches} stats entries from legacy files`,
    );
  }

  return report;
}

/**
 * Run the legacy import for a database that did not exist before this
 * process opened it. An existing database is never touched.
 */
export async function ensureMigrated(
  db: SqliteDatabase,
  existedBefore: boolean,
  sources: LegacySources,
): Promise<LegacyImportReport | null> {
  if (existedBefore) return null;
  return importLegacyData(db, sources);
}
