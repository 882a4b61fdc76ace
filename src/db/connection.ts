/**
 * Database connection management
 *
 * sql.js keeps the database in memory; every committed write is exported
 * back to the database file, and a file changed by another process is
 * reloaded before the next statement.
 */

import { mkdir, readFile, rename, stat, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import initSqlJs, { type Database, type ParamsObject, type SqlJsStatic, type SqlValue } from "sql.js";
import { errorMessage, isNodeError } from "../errors";
import { info, error as logError } from "../utils/logger";
import { getCurrentVersion, getLatestVersion, initializeDatabase } from "./migrations";

export type Row = ParamsObject;
export type SqlParams = SqlValue[] | ParamsObject;

export interface ExecuteResult {
  changes: number;
}

/**
 * Prefix each key with "@" so the object binds to `@column` placeholders
 */
export function named<T extends { [K in keyof T]: SqlValue }>(values: T): ParamsObject {
  return Object.fromEntries(
    Object.entries<SqlValue>(values).map(([key, value]: [string, SqlValue]) => [`@${key}`, value]),
  );
}

let sqlJs: Promise<SqlJsStatic> | null = null;

function loadSqlJs(): Promise<SqlJsStatic> {
  sqlJs ??= initSqlJs();
  return sqlJs;
}

async function fileMtime(path: string): Promise<number | null> {
  try {
    return (await stat(path)).mtimeMs;
  } catch (err) {
    if (isNodeError(err) && err.code === "ENOENT") return null;
    throw err;
  }
}

export class SqliteDatabase {
  private inTransaction = false;

  constructor(
    private readonly SQL: SqlJsStatic,
    private db: Database,
    readonly path: string,
    private syncedMtime: number | null,
  ) {}

  query(sql: string, params?: SqlParams): Row[] {
    const stmt = this.db.prepare(sql);
    try {
      if (params) {
        stmt.bind(params);
      }
      const rows: Row[] = [];
      while (stmt.step()) {
        rows.push(stmt.getAsObject());
      }
      return rows;
    } finally {
      stmt.free();
    }
  }

  queryOne(sql: string, params?: SqlParams): Row | undefined {
    return this.query(sql, params)[0];
  }

  execute(sql: string, params?: SqlParams): ExecuteResult {
    this.db.run(sql, params);
    return { changes: this.db.getRowsModified() };
  }

  exec(sql: string): void {
    this.db.exec(sql);
  }

  transaction<T>(fn: () => T): T {
    if (this.inTransaction) {
      return fn();
    }
    this.inTransaction = true;
    try {
      this.db.run("BEGIN TRANSACTION");
      const result = fn();
      this.db.run("COMMIT");
      return result;
    } catch (err) {
      this.db.run("ROLLBACK");
      throw err;
    } finally {
      this.inTransaction = false;
    }
  }

  /**
   * Pick up changes another process wrote to the file since our last sync
   */
  async reload(): Promise<void> {
    const mtime = await fileMtime(this.path);
    if (mtime === null || mtime === this.syncedMtime) {
      return;
    }
    const data = await readFile(this.path);
    this.db.close();
    this.db = new this.SQL.Database(data);
    this.syncedMtime = mtime;
  }

  /**
   * Write the in-memory database to its file through a temp file and rename
   */
  async persist(): Promise<void> {
    const tempPath = `${this.path}.${process.pid}.tmp`;
    try {
      await writeFile(tempPath, this.db.export());
      await rename(tempPath, this.path);
      this.syncedMtime = await fileMtime(this.path);
    } catch (err) {
      // Memory is now ahead of the file; the next reload restores the file
      this.syncedMtime = null;
      throw err;
    }
  }

  close(): void {
    this.db.close();
  }
}

// One connection per database file for the life of the process
const connections = new Map<string, SqliteDatabase>();

export async function initDatabase(dbPath: string): Promise<SqliteDatabase> {
  const key = resolve(dbPath);
  const existing = connections.get(key);
  if (existing) {
    return existing;
  }

  await mkdir(dirname(key), { recursive: true });

  const SQL = await loadSqlJs();
  const mtime = await fileMtime(key);
  const raw = mtime === null ? new SQL.Database() : new SQL.Database(await readFile(key));
  const db = new SqliteDatabase(SQL, raw, key, mtime);

  const currentVersion = getCurrentVersion(db);
  let applied: number;
  try {
    applied = initializeDatabase(db);
  } catch (err) {
    // Nothing was written, so the file still holds the previous version
    logError(`Migration failed: ${errorMessage(err)}`);
    db.close();
    throw new Error(`Database migration failed: ${errorMessage(err)}`, { cause: err });
  }

  if (applied > 0 || mtime === null) {
    await db.persist();
  }
  if (applied > 0 && currentVersion > 0) {
    info(`Migrations completed successfully (v${currentVersion} -> v${getLatestVersion()})`);
  }

  connections.set(key, db);
  return db;
}

export function closeDatabase(dbPath?: string): void {
  if (dbPath === undefined) {
    for (const db of connections.values()) {
      db.close();
    }
    connections.clear();
    return;
  }

  const key = resolve(dbPath);
  const db = connections.get(key);
  if (db) {
    db.close();
    connections.delete(key);
  }
}
