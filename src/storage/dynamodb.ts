/**
 * DynamoDB-backed metadata store
 */

import { ConditionalCheckFailedException, DynamoDBClient } from "@aws-sdk/client-dynamodb";
import {
  DeleteCommand,
  DynamoDBDocumentClient,
  GetCommand,
  PutCommand,
  QueryCommand,
  ScanCommand,
} from "@aws-sdk/lib-dynamodb";
import { z } from "zod";
import { completeRepository, laterTimestamp } from "../db/mappers";
import { RepositoryNotFoundError, StorageError, errorMessage } from "../errors";
import type {
  ArchiveRecord,
  AwsConfig,
  MetadataStore,
  RepositoryInsert,
  RepositoryLookup,
  RepositoryRecord,
  S3StatsCacheEntry,
} from "../types";
import { describeLookup } from "../types";
import { scoped } from "../utils/logger";

const log = scoped("dynamodb");

export type Item = Record<string, unknown>;

export interface KeyCondition {
  attribute: string;
  value: string;
}

/**
 * The handful of table calls the store needs. Implementations throw the
 * SDK's own errors; retry and translation happen in the store.
 */
export interface TableGateway {
  get(table: string, key: Item): Promise<Item | null>;
  /**
   * Write an item. With `requireAbsent`, the write only happens when no
   * item has those attributes yet; returns false when that check fails.
   */
  put(table: string, item: Item, requireAbsent?: string[]): Promise<boolean>;
  delete(table: string, key: Item): Promise<void>;
  /** Every item matching the condition, following pagination */
  query(table: string, condition: KeyCondition, indexName?: string): Promise<Item[]>;
  scan(table: string): Promise<Item[]>;
  destroy(): void;
}

export const NAME_INDEX = "name_gsi";
export const ARCHIVE_ID_INDEX = "archive_id_gsi";
export const HOSTNAME_INDEX = "hostname_gsi";

export class DocumentClientGateway implements TableGateway {
  private readonly client: DynamoDBDocumentClient;

  constructor(options: { region: string; endpoint?: string }) {
    // Retries are driven by withRetry so attempts stay bounded by config
    const base = new DynamoDBClient({
      region: options.region,
      endpoint: options.endpoint,
      maxAttempts: 1,
    });
    this.client = DynamoDBDocumentClient.from(base, {
      marshallOptions: { removeUndefinedValues: true },
    });
  }

  async get(table: string, key: Item): Promise<Item | null> {
    const output = await this.client.send(new GetCommand({ TableName: table, Key: key }));
    return output.Item ?? null;
  }

  async put(table: string, item: Item, requireAbsent: string[] = []): Promise<boolean> {
    const names: Record<string, string> = {};
    requireAbsent.forEach((attribute, i) => {
      names[`#a${i}`] = attribute;
    });
    try {
      await this.client.send(
        new PutCommand({
          TableName: table,
          Item: item,
          ConditionExpression:
            requireAbsent.length > 0
              ? Object.keys(names)
                  .map((name) => `attribute_not_exists(${name})`)
                  .join(" AND ")
              : undefined,
          ExpressionAttributeNames: requireAbsent.length > 0 ? names : undefined,
        }),
      );
      return true;
    } catch (err) {
      if (err instanceof ConditionalCheckFailedException) {
        return false;
      }
      throw err;
    }
  }

  async delete(table: string, key: Item): Promise<void> {
    await this.client.send(new DeleteCommand({ TableName: table, Key: key }));
  }

  async query(table: string, condition: KeyCondition, indexName?: string): Promise<Item[]> {
    const items: Item[] = [];
    let startKey: Item | undefined;
    do {
      const output = await this.client.send(
        new QueryCommand({
          TableName: table,
          IndexName: indexName,
          KeyConditionExpression: "#k = :v",
          ExpressionAttributeNames: { "#k": condition.attribute },
          ExpressionAttributeValues: { ":v": condition.value },
          ExclusiveStartKey: startKey,
        }),
      );
      items.push(...(output.Items ?? []));
      startKey = output.LastEvaluatedKey;
    } while (startKey);
    return items;
  }

  async scan(table: string): Promise<Item[]> {
    const items: Item[] = [];
    let startKey: Item | undefined;
    do {
      const output = await this.client.send(
        new ScanCommand({ TableName: table, ExclusiveStartKey: startKey }),
      );
      items.push(...(output.Items ?? []));
      startKey = output.LastEvaluatedKey;
    } while (startKey);
    return items;
  }

  destroy(): void {
    this.client.destroy();
  }
}

// Retry

const THROTTLING_ERRORS = new Set([
  "ProvisionedThroughputExceededException",
  "ThrottlingException",
  "RequestLimitExceeded",
]);

export function isThrottlingError(err: unknown): boolean {
  return err instanceof Error && THROTTLING_ERRORS.has(err.name);
}

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
}

export const DEFAULT_RETRY: RetryOptions = {
  maxAttempts: 5,
  baseDelayMs: 100,
  maxDelayMs: 5000,
};

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export function backoffDelay(attempt: number, options: RetryOptions): number {
  return Math.min(options.maxDelayMs, options.baseDelayMs * 2 ** (attempt - 1));
}

/**
 * Run a table call, retrying throttling errors with capped exponential
 * backoff. Anything else becomes a StorageError on the first failure.
 */
export async function withRetry<T>(
  operation: string,
  fn: () => Promise<T>,
  options: RetryOptions = DEFAULT_RETRY,
): Promise<T> {
  const sleep = options.sleep ?? defaultSleep;
  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof StorageError) throw err;
      if (!isThrottlingError(err) || attempt >= options.maxAttempts) {
        const suffix = isThrottlingError(err) ? ` after ${attempt} attempts` : "";
        throw new StorageError(
          `${operation} failed${suffix}: ${errorMessage(err)}`,
          "backend",
          operation,
          err,
        );
      }
      const delay = backoffDelay(attempt, options);
      log.debug(`${operation} throttled, retrying in ${delay}ms (attempt ${attempt})`);
      await sleep(delay);
    }
  }
}

// Item mapping

const nullableString = z
  .string()
  .nullish()
  .transform((value) => value ?? null);
const nullableCount = z
  .number()
  .int()
  .nonnegative()
  .nullish()
  .transform((value) => value ?? null);
const size = z.number().nonnegative().default(0);

const repositoryItemSchema = z.object({
  repo_path: z.string(),
  hostname: z.string(),
  repo_name: z.string(),
  backup_target: z.string(),
  os_platform: z.string(),
  last_backup: nullableString,
  last_s3_sync: nullableString,
  retention_keep_daily: nullableCount,
  retention_keep_weekly: nullableCount,
  retention_keep_monthly: nullableCount,
  retention_keep_yearly: nullableCount,
  passphrase: nullableString,
  passphrase_file_path: nullableString,
  passphrase_migrated: z.boolean().default(false),
  metadata_json: nullableString,
  created_at: z.string(),
  updated_at: z.string(),
});

const archiveItemSchema = z.object({
  repo_name: z.string(),
  iso_timestamp: z.string(),
  archive_id: z.string(),
  archive_name: z.string(),
  hostname: z.string(),
  original_size: size,
  compressed_size: size,
  deduplicated_size: size,
});

const statsItemSchema = z.object({
  repo_name: z.string(),
  total_size_bytes: size,
  object_count: size,
  last_modified: nullableString,
  cached_at: z.string(),
});

function parseItem<T extends z.ZodTypeAny>(schema: T, item: Item, operation: string): z.infer<T> {
  const parsed = schema.safeParse(item);
  if (!parsed.success) {
    throw new StorageError(
      `${operation} read a malformed item: ${parsed.error.message}`,
      "backend",
      operation,
      parsed.error,
    );
  }
  return parsed.data;
}

export function repositoryToItem(repo: RepositoryRecord): Item {
  const { name, path, ...rest } = repo;
  return { repo_path: path, repo_name: name, ...rest };
}

export function itemToRepository(item: Item, operation: string): RepositoryRecord {
  const { repo_path, repo_name, ...rest } = parseItem(repositoryItemSchema, item, operation);
  return { name: repo_name, path: repo_path, ...rest };
}

export function archiveToItem(archive: ArchiveRecord): Item {
  const { name, ...rest } = archive;
  return { archive_name: name, ...rest };
}

export function itemToArchive(item: Item, operation: string): ArchiveRecord {
  const { archive_name, ...rest } = parseItem(archiveItemSchema, item, operation);
  return { name: archive_name, ...rest };
}

function repositoryKey(repo: { path: string; hostname: string }): Item {
  return { repo_path: repo.path, hostname: repo.hostname };
}

export interface DynamoStoreTables {
  repos: string;
  archives: string;
  stats: string;
}

export class DynamoMetadataStore implements MetadataStore {
  readonly backend = "dynamodb" as const;

  constructor(
    private readonly gateway: TableGateway,
    private readonly tables: DynamoStoreTables,
    private readonly retry: RetryOptions = DEFAULT_RETRY,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  private call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    return withRetry(operation, fn, this.retry);
  }

  private now(): string {
    return this.clock().toISOString();
  }

  private async findByName(name: string, operation: string): Promise<RepositoryRecord | null> {
    const items = await this.call(operation, () =>
      this.gateway.query(this.tables.repos, { attribute: "repo_name", value: name }, NAME_INDEX),
    );
    const first = items[0];
    return first ? itemToRepository(first, operation) : null;
  }

  private async findByLocation(
    location: { path: string; hostname: string },
    operation: string,
  ): Promise<RepositoryRecord | null> {
    const item = await this.call(operation, () =>
      this.gateway.get(this.tables.repos, repositoryKey(location)),
    );
    return item ? itemToRepository(item, operation) : null;
  }

  async create(repo: RepositoryInsert): Promise<RepositoryRecord> {
    const record = completeRepository(repo, this.now());

    if (await this.findByName(record.name, "create")) {
      throw new StorageError(`Repository name already in use: ${record.name}`, "conflict", "create");
    }

    const written = await this.call("create", () =>
      this.gateway.put(this.tables.repos, repositoryToItem(record), ["repo_path", "hostname"]),
    );
    if (!written) {
      throw new StorageError(
        `Repository path ${record.path} is already registered on ${record.hostname}`,
        "conflict",
        "create",
      );
    }

    log.debug(`Created repository ${record.name}`);
    return record;
  }

  async get(lookup: RepositoryLookup): Promise<RepositoryRecord> {
    const found = await this.find(lookup);
    if (!found) {
      throw new RepositoryNotFoundError(describeLookup(lookup), "get");
    }
    return found;
  }

  async find(lookup: RepositoryLookup): Promise<RepositoryRecord | null> {
    if ("name" in lookup) {
      return this.findByName(lookup.name, "get");
    }
    return this.findByLocation(lookup, "get");
  }

  async listAll(): Promise<RepositoryRecord[]> {
    const items = await this.call("list", () => this.gateway.scan(this.tables.repos));
    return items
      .map((item) => itemToRepository(item, "list"))
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  async update(repo: RepositoryRecord): Promise<RepositoryRecord> {
    const existing = await this.findByName(repo.name, "update");
    if (!existing) {
      throw new RepositoryNotFoundError(repo.name, "update");
    }

    const record: RepositoryRecord = {
      ...repo,
      created_at: existing.created_at,
      updated_at: laterTimestamp(this.now(), existing.created_at),
    };

    const moved = existing.path !== record.path || existing.hostname !== record.hostname;
    if (!moved) {
      await this.call("update", () => this.gateway.put(this.tables.repos, repositoryToItem(record)));
      return record;
    }

    // The key changed: claim the new location, then release the old one
    const written = await this.call("update", () =>
      this.gateway.put(this.tables.repos, repositoryToItem(record), ["repo_path", "hostname"]),
    );
    if (!written) {
      throw new StorageError(
        `Repository path ${record.path} is already registered on ${record.hostname}`,
        "conflict",
        "update",
      );
    }
    try {
      await this.call("update", () => this.gateway.delete(this.tables.repos, repositoryKey(existing)));
    } catch (err) {
      // Release the new location so the record is not left under two keys
      await this.call("update", () => this.gateway.delete(this.tables.repos, repositoryKey(record))).catch(
        (rollbackErr: unknown) => {
          log.warn(`Could not remove ${record.path} on ${record.hostname}: ${errorMessage(rollbackErr)}`);
        },
      );
      throw err;
    }
    return record;
  }

  async delete(name: string): Promise<void> {
    const existing = await this.findByName(name, "delete");
    if (!existing) {
      throw new RepositoryNotFoundError(name, "delete");
    }
    // The repository item goes last so a failed delete can be retried by name
    await this.deleteArchives(name);
    await this.deleteCache(name);
    await this.call("delete", () => this.gateway.delete(this.tables.repos, repositoryKey(existing)));
    log.debug(`Deleted repository ${name}`);
  }

  async getCache(name: string): Promise<S3StatsCacheEntry | null> {
    const item = await this.call("get_cache", () =>
      this.gateway.get(this.tables.stats, { repo_name: name }),
    );
    return item ? parseItem(statsItemSchema, item, "get_cache") : null;
  }

  async putCache(entry: S3StatsCacheEntry): Promise<void> {
    await this.call("put_cache", () => this.gateway.put(this.tables.stats, { ...entry }));
  }

  async deleteCache(name: string): Promise<void> {
    await this.call("delete_cache", () =>
      this.gateway.delete(this.tables.stats, { repo_name: name }),
    );
  }

  async putArchive(archive: ArchiveRecord): Promise<void> {
    await this.call("put_archive", () =>
      this.gateway.put(this.tables.archives, archiveToItem(archive)),
    );
  }

  async listArchives(repoName: string): Promise<ArchiveRecord[]> {
    const items = await this.call("list_archives", () =>
      this.gateway.query(this.tables.archives, { attribute: "repo_name", value: repoName }),
    );
    return items
      .map((item) => itemToArchive(item, "list_archives"))
      .sort((a, b) => a.iso_timestamp.localeCompare(b.iso_timestamp));
  }

  async deleteArchives(repoName: string): Promise<void> {
    const archives = await this.listArchives(repoName);
    for (const archive of archives) {
      await this.call("delete_archives", () =>
        this.gateway.delete(this.tables.archives, {
          repo_name: archive.repo_name,
          iso_timestamp: archive.iso_timestamp,
        }),
      );
    }
  }

  async close(): Promise<void> {
    this.gateway.destroy();
  }
}

export function createDynamoStore(aws: AwsConfig): DynamoMetadataStore {
  return new DynamoMetadataStore(
    new DocumentClientGateway({ region: aws.region, endpoint: aws.endpoint }),
    { repos: aws.reposTable, archives: aws.archivesTable, stats: aws.statsTable },
    { ...DEFAULT_RETRY, maxAttempts: aws.maxAttempts },
  );
}
