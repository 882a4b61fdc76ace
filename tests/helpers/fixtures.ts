import type { ArchiveRecord, RepositoryInsert } from "../../src/types";

/**
 * Clock that advances one second per call, starting at the given instant
 */
export function steppingClock(start = "2025-01-01T00:00:00.000Z"): () => Date {
  let current = Date.parse(start);
  return () => {
    const now = new Date(current);
    current += 1000;
    return now;
  };
}

export function repositoryInsert(overrides: Partial<RepositoryInsert> = {}): RepositoryInsert {
  return {
    name: "docs",
    path: "/backups/docs",
    backup_target: "/home/me/docs",
    hostname: "host-a",
    os_platform: "Linux",
    ...overrides,
  };
}

export function archiveRecord(overrides: Partial<ArchiveRecord> = {}): ArchiveRecord {
  return {
    repo_name: "docs",
    archive_id: "a1",
    name: "2025-01-31_02:00:00",
    iso_timestamp: "2025-01-31T02:00:00.000Z",
    hostname: "host-a",
    original_size: 1000,
    compressed_size: 600,
    deduplicated_size: 200,
    ...overrides,
  };
}
