/**
 * Storage module exports
 */

import * as path from "node:path";
import { openSqliteStore } from "../db";
import type { BorgmateConfig, MetadataStore, RemoteObjectStore } from "../types";
import { createDynamoStore } from "./dynamodb";
import { createS3Store } from "./s3";

export {
  ARCHIVE_ID_INDEX,
  backoffDelay,
  createDynamoStore,
  DEFAULT_RETRY,
  DocumentClientGateway,
  DynamoMetadataStore,
  type DynamoStoreTables,
  HOSTNAME_INDEX,
  type Item,
  isThrottlingError,
  itemToArchive,
  itemToRepository,
  type KeyCondition,
  NAME_INDEX,
  type RetryOptions,
  archiveToItem,
  repositoryToItem,
  type TableGateway,
  withRetry,
} from "./dynamodb";
export {
  buildObjectKey,
  createS3Store,
  isKeyWithinPrefix,
  type LocalFile,
  needsUpload,
  type ObjectBucket,
  type RemoteObject,
  S3Bucket,
  S3RemoteStore,
  summarizeObjects,
  walkFiles,
} from "./s3";

/**
 * Pick the metadata backend from the offline flag. Decided once; callers
 * hold on to the returned store for the life of the process.
 */
export async function createMetadataStore(config: BorgmateConfig): Promise<MetadataStore> {
  if (config.offline) {
    return openSqliteStore({
      dbPath: config.database.path,
      legacy: {
        dataDir: config.paths.legacyDataDir,
        metadataDir: path.join(config.paths.homeDir, ".metadata"),
      },
    });
  }
  return createDynamoStore(config.aws);
}

export function createRemoteStore(config: BorgmateConfig): RemoteObjectStore | null {
  return createS3Store(config.aws);
}
