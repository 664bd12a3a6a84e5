import { Injectable } from "@nestjs/common";

import type { CacheStore } from "./cache.store.js";

@Injectable()
export class DisabledCacheStore implements CacheStore {
  async get(): Promise<string | undefined> {
    return undefined;
  }

  async put(): Promise<void> {
    return;
  }

  async delete(): Promise<boolean> {
    return false;
  }
}
