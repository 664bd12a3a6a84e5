import { Module } from "@nestjs/common";

import { DisabledCacheStore } from "./cache/disabled.cache.js";
import { FileCacheStore } from "./cache/file.cache.js";
import { InMemoryCacheStore } from "./cache/memory.cache.js";
import { S3CacheStore } from "./cache/s3.cache.js";
import type { CacheStore } from "./cache/cache.store.js";
import { InferenceClient } from "./clients/inference.client.js";
import { AuditController } from "./controllers/audit.controller.js";
import { CacheController } from "./controllers/cache.controller.js";
import { HealthController } from "./controllers/health.controller.js";
import { ReportController } from "./controllers/report.controller.js";
import type { AppConfig } from "./config.js";
import { loadConfig } from "./config.js";
import { InMemoryAuditRepository } from "./repository/memory.repository.js";
import { PostgresAuditRepository } from "./repository/postgres.repository.js";
import { AuditService } from "./services/audit.service.js";
import { APP_CONFIG, AUDIT_REPOSITORY, CACHE_STORE } from "./tokens.js";

const configProvider = {
  provide: APP_CONFIG,
  useFactory: () => loadConfig(),
};

const cacheProvider = {
  provide: CACHE_STORE,
  inject: [APP_CONFIG],
  useFactory: (config: AppConfig): CacheStore => {
    switch (config.cache.driver) {
      case "s3":
        return new S3CacheStore(config.cache.objectStorage);
      case "memory":
        return new InMemoryCacheStore();
      case "none":
        return new DisabledCacheStore();
      case "file":
        return new FileCacheStore(config.cache.filePath);
    }
  },
};

const repositoryProvider = {
  provide: AUDIT_REPOSITORY,
  inject: [APP_CONFIG],
  useFactory: async (config: AppConfig) => {
    if (config.database.url) {
      const repo = new PostgresAuditRepository(config.database.url);
      await repo.init();
      return repo;
    }
    return new InMemoryAuditRepository();
  },
};

@Module({
  imports: [],
  controllers: [AuditController, ReportController, CacheController, HealthController],
  providers: [
    configProvider,
    cacheProvider,
    repositoryProvider,
    AuditService,
    InferenceClient,
  ],
})
export class AppModule {}
