import type { Migration } from "../../types/database";
import type { SqliteDatabase } from "../connection";

import { migration as m0001 } from "./0001_initial";

const migrations: Migration[] = [m0001];

export function getAllMigrations(): Migration[] {
  return [...migrations].sort((a, b) => a.version - b.version);
}

export function getLatestVersion(): number {
  const all = getAllMigrations();
  const lastMigration = all[all.length - 1];
  return lastMigration ? lastMigration.version : 0;
}

function hasVersionTable(database: SqliteDatabase): boolean {
  const row = database.queryOne(
    "SELECT name FROM sqlite_master WHERE type='table' AND name='schema_version'",
  );
  return row !== undefined;
}

export function getCurrentVersion(database: SqliteDatabase): number {
  if (!hasVersionTable(database)) {
    return 0;
  }
  const version = database.queryOne("SELECT MAX(version) as version FROM schema_version")?.version;
  return typeof version === "number" ? version : 0;
}

export function getPendingMigrations(currentVersion: number): Migration[] {
  return getAllMigrations().filter((m) => m.version > currentVersion);
}

/**
 * Apply every pending migration, each in its own transaction together
 * with its schema_version row
 */
export function runMigrations(database: SqliteDatabase): number {
  const pending = getPendingMigrations(getCurrentVersion(database));

  for (const migration of pending) {
    database.transaction(() => {
      database.exec(migration.up);
      database.execute("INSERT INTO schema_version (version) VALUES (?)", [migration.version]);
    });
  }

  return pending.length;
}

/**
 * Returns the number of migrations applied
 */
export function initializeDatabase(database: SqliteDatabase): number {
  // schema_version is created up front so a failed first migration leaves
  // a database that reports version 0
  database.exec(`
CREATE TABLE IF NOT EXISTS schema_version (
    version INTEGER PRIMARY KEY,
    applied_at TEXT DEFAULT (datetime('now'))
)`);

  return runMigrations(database);
}
