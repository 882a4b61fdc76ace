/**
 * S3 mirror of repository directories
 */

import { createReadStream, createWriteStream } from "node:fs";
import { mkdir, readdir, stat } from "node:fs/promises";
import * as path from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import {
  GetObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3Client,
} from "@aws-sdk/client-s3";
import { ValidationError, errorMessage } from "../errors";
import type { AwsConfig, RemoteObjectStore, RemoteResult, RemoteStats, RepositoryRecord } from "../types";
import { scoped } from "../utils/logger";
import { isPathWithinDir } from "../utils/path";

const log = scoped("s3");

export interface RemoteObject {
  key: string;
  size: number;
  lastModified: Date | null;
}

/**
 * Minimal bucket operations used by the mirror
 */
export interface ObjectBucket {
  readonly name: string;
  list(prefix: string): Promise<RemoteObject[]>;
  upload(key: string, filePath: string, size: number): Promise<void>;
  download(key: string, filePath: string): Promise<void>;
}

export class S3Bucket implements ObjectBucket {
  private readonly client: S3Client;

  constructor(
    readonly name: string,
    options: { region: string; endpoint?: string },
  ) {
    this.client = new S3Client({
      region: options.region,
      endpoint: options.endpoint,
      forcePathStyle: options.endpoint !== undefined,
    });
  }

  async list(prefix: string): Promise<RemoteObject[]> {
    const objects: RemoteObject[] = [];
    let token: string | undefined;
    do {
      const output = await this.client.send(
        new ListObjectsV2Command({ Bucket: this.name, Prefix: prefix, ContinuationToken: token }),
      );
      for (const entry of output.Contents ?? []) {
        if (!entry.Key) continue;
        objects.push({
          key: entry.Key,
          size: entry.Size ?? 0,
          lastModified: entry.LastModified ?? null,
        });
      }
      token = output.IsTruncated ? output.NextContinuationToken : undefined;
    } while (token);
    return objects;
  }

  async upload(key: string, filePath: string, size: number): Promise<void> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.name,
        Key: key,
        Body: createReadStream(filePath),
        ContentLength: size,
      }),
    );
  }

  async download(key: string, filePath: string): Promise<void> {
    const output = await this.client.send(new GetObjectCommand({ Bucket: this.name, Key: key }));
    const body = output.Body;
    if (!body) {
      throw new Error(`Empty response body for s3://${this.name}/${key}`);
    }
    if (body instanceof Readable) {
      await pipeline(body, createWriteStream(filePath));
      return;
    }
    await pipeline(Readable.from([await body.transformToByteArray()]), createWriteStream(filePath));
  }
}

export function buildObjectKey(repoName: string, relativePath: string): string {
  const normalized = relativePath.split(path.sep).join("/");
  return `${repoName}/${normalized}`;
}

export function isKeyWithinPrefix(key: string, prefix: string): boolean {
  const normalizedPrefix = prefix.endsWith("/") ? prefix : `${prefix}/`;
  return key.startsWith(normalizedPrefix);
}

/**
 * A local file is uploaded when the bucket lacks it or holds a different size
 */
export function needsUpload(localSize: number, remoteSize: number | undefined): boolean {
  return remoteSize === undefined || remoteSize !== localSize;
}

export function summarizeObjects(objects: RemoteObject[]): RemoteStats {
  let latest: Date | null = null;
  let total = 0;
  for (const object of objects) {
    total += object.size;
    if (object.lastModified && (!latest || object.lastModified > latest)) {
      latest = object.lastModified;
    }
  }
  return {
    total_size_bytes: total,
    object_count: objects.length,
    last_modified: latest ? latest.toISOString() : null,
  };
}

export interface LocalFile {
  relativePath: string;
  absolutePath: string;
  size: number;
}

export async function walkFiles(root: string, dir: string = root): Promise<LocalFile[]> {
  const files: LocalFile[] = [];
  const entries = await readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    const absolutePath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await walkFiles(root, absolutePath)));
    } else if (entry.isFile()) {
      const info = await stat(absolutePath);
      files.push({ relativePath: path.relative(root, absolutePath), absolutePath, size: info.size });
    }
  }
  return files.sort((a, b) => a.relativePath.localeCompare(b.relativePath));
}

function failed(err: unknown): RemoteResult {
  return { ok: false, error: err instanceof Error ? err : new Error(errorMessage(err)) };
}

export class S3RemoteStore implements RemoteObjectStore {
  constructor(private readonly bucket: ObjectBucket) {}

  async sync(repo: RepositoryRecord): Promise<RemoteResult> {
    try {
      const remote = new Map(
        (await this.bucket.list(`${repo.name}/`)).map((object) => [object.key, object.size]),
      );
      const local = await walkFiles(repo.path);

      let uploaded = 0;
      for (const file of local) {
        const key = buildObjectKey(repo.name, file.relativePath);
        if (!needsUpload(file.size, remote.get(key))) continue;
        log.debug(`Uploading s3://${this.bucket.name}/${key}`);
        await this.bucket.upload(key, file.absolutePath, file.size);
        uploaded++;
      }

      log.info(`Synced ${repo.name}: ${uploaded} of ${local.length} files uploaded`);
      return { ok: true };
    } catch (err) {
      log.error(`Sync of ${repo.name} to s3://${this.bucket.name} failed: ${errorMessage(err)}`);
      return failed(err);
    }
  }

  async fetch(repo: RepositoryRecord, destination: string): Promise<RemoteResult> {
    try {
      const prefix = `${repo.name}/`;
      const objects = await this.bucket.list(prefix);
      await mkdir(destination, { recursive: true });

      for (const object of objects) {
        if (!isKeyWithinPrefix(object.key, prefix) || object.key.endsWith("/")) continue;
        const target = path.join(destination, ...object.key.slice(prefix.length).split("/"));
        if (!isPathWithinDir(target, destination)) {
          throw new ValidationError(`Object key escapes destination: ${object.key}`, "key", object.key);
        }
        await mkdir(path.dirname(target), { recursive: true });
        await this.bucket.download(object.key, target);
      }

      log.info(`Fetched ${objects.length} objects for ${repo.name} into ${destination}`);
      return { ok: true };
    } catch (err) {
      log.error(`Fetch of ${repo.name} from s3://${this.bucket.name} failed: ${errorMessage(err)}`);
      return failed(err);
    }
  }

  async stats(repoName: string): Promise<RemoteStats> {
    return summarizeObjects(await this.bucket.list(`${repoName}/`));
  }
}

export function createS3Store(aws: AwsConfig): S3RemoteStore | null {
  if (!aws.s3Bucket) {
    return null;
  }
  return new S3RemoteStore(
    new S3Bucket(aws.s3Bucket, { region: aws.region, endpoint: aws.endpoint }),
  );
}
