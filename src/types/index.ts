/**
 * Centralized type exports for borgmate
 */

// Config types
export type {
  AwsConfig,
  BorgConfig,
  BorgmateConfig,
  DatabaseConfig,
  PathsConfig,
  RetentionConfig,
} from "./config";
// Database types
export type {
  ArchiveRecord,
  Migration,
  RepositoryInsert,
  RepositoryLookup,
  RepositoryRecord,
  S3StatsCacheEntry,
} from "./database";
export { describeLookup } from "./database";
// Engine types
export type {
  EngineClientOptions,
  EngineEvent,
  EngineInvocation,
  EngineOutcome,
  EngineSubcommand,
  EventHandler,
  ExtractOptions,
  RawLineEvent,
  RetentionPolicy,
  RunOptions,
} from "./engine";
export type {
  ArchiveContentEntry,
  ArchiveInfo,
  EngineLogEvent,
  LogLevelName,
  LogMessageEvent,
  RepoArchive,
  RepoInfo,
} from "../engine/schemas";
// Storage types
export type {
  MetadataStore,
  RemoteObjectStore,
  RemoteResult,
  RemoteStats,
  StorageBackend,
} from "./storage";
