import { GetObjectCommand, PutObjectCommand, S3Client } from "@aws-sdk/client-s3";
import { Injectable, Logger } from "@nestjs/common";

import type { CacheObjectStorageConfig } from "../config.js";
import { SnapshotCacheStore } from "./snapshot.cache.js";

const SNAPSHOT_NAME = "audit-cache.json";

@Injectable()
export class S3CacheStore extends SnapshotCacheStore {
  protected readonly logger = new Logger(S3CacheStore.name);
  private readonly client: S3Client;
  private readonly bucket: string;
  private readonly key: string;

  constructor(config: CacheObjectStorageConfig, client?: S3Client) {
    super();
    if (!config.bucket) {
      throw new Error("S3 cache bucket must be configured");
    }
    this.bucket = config.bucket;
    this.key = this.buildKey(config.prefix);

    this.client = client ?? new S3Client({
      region: config.region ?? "us-east-1",
      endpoint: config.endpoint,
      forcePathStyle: Boolean(config.endpoint),
      credentials: config.accessKeyId && config.secretAccessKey
        ? {
          accessKeyId: config.accessKeyId,
          secretAccessKey: config.secretAccessKey,
        }
        : undefined,
    });
  }

  protected async readDocument(): Promise<string | undefined> {
    try {
      const response = await this.client.send(new GetObjectCommand({
        Bucket: this.bucket,
        Key: this.key,
      }));
      return await response.Body?.transformToString("utf-8");
    } catch (error) {
      if ((error as Error).name === "NoSuchKey") {
        return undefined;
      }
      throw error;
    }
  }

  protected async writeDocument(document: string): Promise<void> {
    await this.client.send(new PutObjectCommand({
      Bucket: this.bucket,
      Key: this.key,
      Body: document,
      ContentType: "application/json",
    }));
    this.logger.debug(`Wrote cache snapshot to ${this.describe()}`);
  }

  protected describe(): string {
    return `s3://${this.bucket}/${this.key}`;
  }

  private buildKey(prefix: string | undefined): string {
    const base = prefix ? `${prefix.replace(/\/$/, "")}/` : "";
    return `${base}${SNAPSHOT_NAME}`;
  }
}
