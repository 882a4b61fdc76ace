/**
 * Database module exports
 */

// Connection
export { closeDatabase, initDatabase, type SqliteDatabase } from "./connection";
// Legacy migration
export {
  ensureMigrated,
  importLegacyData,
  type LegacyImportReport,
  type LegacySources,
  readLegacyCache,
  readLegacyRepositories,
} from "./legacy-migration";
// Mappers
export {
  completeRepository,
  laterTimestamp,
  parseRepositoryRow,
  type RawRepositoryRow,
  toRepositoryParams,
} from "./mappers";
// Migrations
export {
  getAllMigrations,
  getCurrentVersion,
  getLatestVersion,
  getPendingMigrations,
} from "./migrations";
// Repository store
export {
  openSqliteStore,
  SqliteMetadataStore,
  type SqliteStoreOptions,
  toStorageError,
} from "./repository-store";
