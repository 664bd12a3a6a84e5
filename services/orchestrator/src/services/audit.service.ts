import { Inject, Injectable, Logger } from "@nestjs/common";

import type { CacheStore } from "../cache/cache.store.js";
import { InferenceClient } from "../clients/inference.client.js";
import type { AppConfig } from "../config.js";
import type { AuditRequestDto } from "../dto/audit-request.dto.js";
import type { AuditResponseDto } from "../dto/audit-response.dto.js";
import { AuditPipeline } from "../pipeline.js";
import type { AuditRepository, StoredReport } from "../repository/audit.repository.js";
import { APP_CONFIG, AUDIT_REPOSITORY, CACHE_STORE } from "../tokens.js";
import type { AuditRecord } from "../types.js";

@Injectable()
export class AuditService {
  private readonly logger = new Logger(AuditService.name);
  private readonly pipeline: AuditPipeline;

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    @Inject(CACHE_STORE) private readonly cache: CacheStore,
    @Inject(AUDIT_REPOSITORY) private readonly repository: AuditRepository,
    @Inject(InferenceClient) inferenceClient: InferenceClient,
  ) {
    this.pipeline = new AuditPipeline(inferenceClient, cache, config.scoring);
  }

  async audit(request: AuditRequestDto): Promise<AuditResponseDto> {
    const { record, trace } = await this.pipeline.run({
      image: Buffer.from(request.image, "base64"),
      mimeType: request.mimeType ?? this.config.defaultMimeType,
      protocol: request.protocol,
    });

    const storedAt = await this.store(trace.auditId, record, request.metadata);
    this.logger.log(`Audit ${trace.auditId} completed with status ${record.status}`);

    return {
      auditId: trace.auditId,
      record,
      trace,
      storedAt: storedAt?.toISOString() ?? null,
    };
  }

  /** Persists the report; resolves undefined when the repository rejects it. */
  private async store(
    auditId: string,
    record: AuditRecord,
    metadata: Record<string, unknown> | undefined,
  ): Promise<Date | undefined> {
    const storedAt = new Date();
    try {
      await this.repository.save({ auditId, record, metadata, storedAt });
      return storedAt;
    } catch (error) {
      this.logger.error(`Failed to store report for audit ${auditId}: ${(error as Error).message}`);
      return undefined;
    }
  }

  async getReport(auditId: string): Promise<StoredReport | undefined> {
    return this.repository.find(auditId);
  }

  async invalidate(key: string): Promise<boolean> {
    const removed = await this.cache.delete(key);
    if (removed) {
      this.logger.log(`Invalidated cache entry ${key}`);
    }
    return removed;
  }
}
