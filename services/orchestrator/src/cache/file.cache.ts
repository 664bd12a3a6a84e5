import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";

import { Injectable, Logger } from "@nestjs/common";

import { SnapshotCacheStore } from "./snapshot.cache.js";

@Injectable()
export class FileCacheStore extends SnapshotCacheStore {
  protected readonly logger = new Logger(FileCacheStore.name);

  constructor(private readonly filePath: string) {
    super();
  }

  protected async readDocument(): Promise<string | undefined> {
    try {
      return await readFile(this.filePath, "utf-8");
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") {
        return undefined;
      }
      throw error;
    }
  }

  protected async writeDocument(document: string): Promise<void> {
    await mkdir(path.dirname(this.filePath), { recursive: true });
    const temporary = `${this.filePath}.${process.pid}.tmp`;
    await writeFile(temporary, document, "utf-8");
    await rename(temporary, this.filePath);
  }

  protected describe(): string {
    return this.filePath;
  }
}
