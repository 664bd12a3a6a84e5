import { Logger } from "@nestjs/common";
import { z } from "zod";

import type { CacheStore } from "./cache.store.js";

const snapshotSchema = z.record(z.string());

/**
 * A cache persisted as one flat `{ key: value }` JSON document. The document is read once
 * per process and rewritten whole on every change; writes are applied in call order.
 */
export abstract class SnapshotCacheStore implements CacheStore {
  protected abstract readonly logger: Logger;
  private snapshot?: Promise<Map<string, string>>;
  private pendingWrite: Promise<void> = Promise.resolve();

  /** Returns the serialized document, or undefined when none exists yet. */
  protected abstract readDocument(): Promise<string | undefined>;

  protected abstract writeDocument(document: string): Promise<void>;

  protected abstract describe(): string;

  async get(key: string): Promise<string | undefined> {
    const entries = await this.load();
    return entries.get(key);
  }

  async put(key: string, value: string): Promise<void> {
    const entries = await this.load();
    entries.set(key, value);
    await this.persist(entries);
  }

  async delete(key: string): Promise<boolean> {
    const entries = await this.load();
    if (!entries.delete(key)) {
      return false;
    }
    await this.persist(entries);
    return true;
  }

  private load(): Promise<Map<string, string>> {
    if (!this.snapshot) {
      this.snapshot = this.readSnapshot().catch((error: unknown) => {
        this.snapshot = undefined;
        throw error;
      });
    }
    return this.snapshot;
  }

  private async readSnapshot(): Promise<Map<string, string>> {
    const document = await this.readDocument();
    if (document === undefined) {
      return new Map();
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(document);
    } catch (error) {
      this.logger.warn(`Ignoring unreadable cache snapshot at ${this.describe()}: ${(error as Error).message}`);
      return new Map();
    }

    const result = snapshotSchema.safeParse(parsed);
    if (!result.success) {
      this.logger.warn(`Ignoring malformed cache snapshot at ${this.describe()}`);
      return new Map();
    }
    return new Map(Object.entries(result.data));
  }

  private persist(entries: Map<string, string>): Promise<void> {
    const write = this.pendingWrite.then(() =>
      this.writeDocument(JSON.stringify(Object.fromEntries(entries))),
    );
    // The chain only orders writes; the caller observes failures through `write`.
    this.pendingWrite = write.catch(() => undefined);
    return write;
  }
}
