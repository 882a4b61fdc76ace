import { readFile, writeFile } from "node:fs/promises";
import type { ObjectBucket, RemoteObject } from "../../src/storage/s3";

/**
 * In-process stand-in for an S3 bucket
 */
export class MemoryBucket implements ObjectBucket {
  readonly objects = new Map<string, { body: Buffer; lastModified: Date }>();
  readonly uploads: string[] = [];
  failList: Error | null = null;

  constructor(readonly name = "test-bucket") {}

  put(key: string, body: string, lastModified = new Date("2025-01-01T00:00:00.000Z")): void {
    this.objects.set(key, { body: Buffer.from(body), lastModified });
  }

  async list(prefix: string): Promise<RemoteObject[]> {
    if (this.failList) throw this.failList;
    return [...this.objects.entries()]
      .filter(([key]) => key.startsWith(prefix))
      .map(([key, object]) => ({ key, size: object.body.length, lastModified: object.lastModified }));
  }

  async upload(key: string, filePath: string): Promise<void> {
    this.uploads.push(key);
    this.objects.set(key, { body: await readFile(filePath), lastModified: new Date() });
  }

  async download(key: string, filePath: string): Promise<void> {
    const object = this.objects.get(key);
    if (!object) throw new Error(`NoSuchKey: ${key}`);
    await writeFile(filePath, object.body);
  }
}
