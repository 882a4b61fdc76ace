import type { Migration } from "../../types/database";

export const migration: Migration = {
  version: 1,
  name: "initial",
  description: "Repositories, archives and remote stats cache",
  up: `
CREATE TABLE repositories (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL UNIQUE,
    path TEXT NOT NULL,
    backup_target TEXT NOT NULL,
    hostname TEXT NOT NULL,
    os_platform TEXT NOT NULL,
    last_backup TEXT,
    last_s3_sync TEXT,
    metadata_json TEXT,
    retention_keep_daily INTEGER CHECK (retention_keep_daily IS NULL OR retention_keep_daily >= 0),
    retention_keep_weekly INTEGER CHECK (retention_keep_weekly IS NULL OR retention_keep_weekly >= 0),
    retention_keep_monthly INTEGER CHECK (retention_keep_monthly IS NULL OR retention_keep_monthly >= 0),
    retention_keep_yearly INTEGER CHECK (retention_keep_yearly IS NULL OR retention_keep_yearly >= 0),
    passphrase TEXT,
    passphrase_file_path TEXT,
    passphrase_migrated INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    UNIQUE (path, hostname)
);

CREATE INDEX idx_repositories_hostname ON repositories(hostname);

CREATE TABLE archives (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    repo_name TEXT NOT NULL,
    archive_id TEXT NOT NULL UNIQUE,
    name TEXT NOT NULL,
    iso_timestamp TEXT NOT NULL,
    hostname TEXT NOT NULL,
    original_size INTEGER NOT NULL DEFAULT 0 CHECK (original_size >= 0),
    compressed_size INTEGER NOT NULL DEFAULT 0 CHECK (compressed_size >= 0),
    deduplicated_size INTEGER NOT NULL DEFAULT 0 CHECK (deduplicated_size >= 0),
    UNIQUE (repo_name, iso_timestamp)
);

CREATE INDEX idx_archives_hostname ON archives(hostname);

CREATE TABLE s3_stats_cache (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    repo_name TEXT NOT NULL UNIQUE,
    total_size_bytes INTEGER NOT NULL DEFAULT 0 CHECK (total_size_bytes >= 0),
    object_count INTEGER NOT NULL DEFAULT 0 CHECK (object_count >= 0),
    last_modified TEXT,
    cached_at TEXT NOT NULL
);
`,
};
