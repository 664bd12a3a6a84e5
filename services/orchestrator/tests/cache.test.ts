import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { GetObjectCommand, PutObjectCommand, S3Client } from "@aws-sdk/client-s3";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { FileCacheStore } from "../src/cache/file.cache.js";
import { auditCacheKey, digest, visionCacheKey } from "../src/cache/keys.js";
import { S3CacheStore } from "../src/cache/s3.cache.js";

describe("cache keys", () => {
  it("derives keys from content digests", () => {
    const abc = "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad";
    expect(digest("abc")).toBe(abc);
    expect(digest(Buffer.from("abc"))).toBe(abc);
    expect(visionCacheKey(abc)).toBe(`vision_${abc}`);
    expect(auditCacheKey(abc, "f00d")).toBe(`audit_${abc}_f00d`);
  });
});

describe("FileCacheStore", () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(path.join(tmpdir(), "audit-cache-"));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it("misses when no snapshot exists", async () => {
    const store = new FileCacheStore(path.join(directory, "cache.json"));
    await expect(store.get("vision_missing")).resolves.toBeUndefined();
  });

  it("persists a whole snapshot that survives a new instance", async () => {
    const filePath = path.join(directory, "nested", "cache.json");
    const writer = new FileCacheStore(filePath);
    await writer.put("vision_a", "first description");
    await writer.put("audit_a_b", '{"findings": []}');

    const snapshot = JSON.parse(await readFile(filePath, "utf-8"));
    expect(snapshot).toEqual({ vision_a: "first description", audit_a_b: '{"findings": []}' });

    const reader = new FileCacheStore(filePath);
    await expect(reader.get("vision_a")).resolves.toBe("first description");
  });

  it("keeps the last write for a key", async () => {
    const store = new FileCacheStore(path.join(directory, "cache.json"));
    await Promise.all([store.put("vision_a", "one"), store.put("vision_a", "two")]);
    await expect(new FileCacheStore(path.join(directory, "cache.json")).get("vision_a")).resolves.toBe("two");
  });

  it("treats a corrupt snapshot as empty and replaces it", async () => {
    const filePath = path.join(directory, "cache.json");
    await writeFile(filePath, "{ not json", "utf-8");
    const store = new FileCacheStore(filePath);
    await expect(store.get("vision_a")).resolves.toBeUndefined();

    await store.put("vision_a", "fresh");
    expect(JSON.parse(await readFile(filePath, "utf-8"))).toEqual({ vision_a: "fresh" });
  });

  it("deletes entries", async () => {
    const store = new FileCacheStore(path.join(directory, "cache.json"));
    await store.put("vision_a", "value");
    await expect(store.delete("vision_a")).resolves.toBe(true);
    await expect(store.delete("vision_a")).resolves.toBe(false);
    await expect(store.get("vision_a")).resolves.toBeUndefined();
  });
});

describe("S3CacheStore", () => {
  function fakeBucket() {
    const objects = new Map<string, string>();
    const send = vi.fn(async (command: unknown) => {
      if (command instanceof GetObjectCommand) {
        const body = objects.get(command.input.Key ?? "");
        if (body === undefined) {
          const error = new Error("The specified key does not exist.");
          error.name = "NoSuchKey";
          throw error;
        }
        return { Body: { transformToString: async () => body } };
      }
      if (command instanceof PutObjectCommand) {
        objects.set(command.input.Key ?? "", String(command.input.Body));
        return {};
      }
      throw new Error("unexpected command");
    });
    return { objects, send, client: { send } as unknown as S3Client };
  }

  it("requires a bucket", () => {
    expect(() => new S3CacheStore({})).toThrow(/bucket must be configured/);
  });

  it("stores the snapshot as one object under the prefix", async () => {
    const bucket = fakeBucket();
    const store = new S3CacheStore({ bucket: "audit-cache", prefix: "labs/" }, bucket.client);

    await expect(store.get("vision_a")).resolves.toBeUndefined();
    await store.put("vision_a", "description");

    expect(bucket.objects.get("labs/audit-cache.json")).toBe('{"vision_a":"description"}');

    const reader = new S3CacheStore({ bucket: "audit-cache", prefix: "labs" }, bucket.client);
    await expect(reader.get("vision_a")).resolves.toBe("description");
  });

  it("retries the snapshot read after a transport failure", async () => {
    const bucket = fakeBucket();
    bucket.send.mockRejectedValueOnce(new Error("socket hang up"));
    const store = new S3CacheStore({ bucket: "audit-cache" }, bucket.client);

    await expect(store.get("vision_a")).rejects.toThrow(/socket hang up/);
    await expect(store.get("vision_a")).resolves.toBeUndefined();
  });
});
