import { Injectable, Logger, OnModuleDestroy } from "@nestjs/common";
import pg from "pg";
import type { Pool } from "pg";

import type { AuditRecord } from "../types.js";
import type { AuditRepository, StoredReport } from "./audit.repository.js";

type ReportRow = {
  audit_id: string;
  record: AuditRecord;
  metadata: Record<string, unknown> | null;
  stored_at: Date;
};

@Injectable()
export class PostgresAuditRepository implements AuditRepository, OnModuleDestroy {
  private readonly logger = new Logger(PostgresAuditRepository.name);
  private readonly pool: Pool;
  private initialized = false;

  constructor(databaseUrl: string) {
    this.pool = new pg.Pool({ connectionString: databaseUrl });
  }

  async init(): Promise<void> {
    if (this.initialized) {
      return;
    }
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS audit_reports (
        audit_id TEXT PRIMARY KEY,
        status TEXT NOT NULL,
        score INTEGER,
        record JSONB NOT NULL,
        metadata JSONB,
        stored_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);
    this.initialized = true;
    this.logger.log("Postgres audit repository ready");
  }

  async save(report: StoredReport): Promise<void> {
    if (!this.initialized) {
      await this.init();
    }
    await this.pool.query(
      `INSERT INTO audit_reports (audit_id, status, score, record, metadata, stored_at)
       VALUES ($1, $2, $3, $4::jsonb, $5::jsonb, $6)
       ON CONFLICT (audit_id) DO UPDATE SET
         status = EXCLUDED.status,
         score = EXCLUDED.score,
         record = EXCLUDED.record,
         metadata = EXCLUDED.metadata,
         stored_at = EXCLUDED.stored_at`,
      [
        report.auditId,
        report.record.status,
        report.record.score,
        JSON.stringify(report.record),
        report.metadata ? JSON.stringify(report.metadata) : null,
        report.storedAt,
      ],
    );
  }

  async find(auditId: string): Promise<StoredReport | undefined> {
    if (!this.initialized) {
      await this.init();
    }
    const result = await this.pool.query<ReportRow>(
      `SELECT audit_id, record, metadata, stored_at
       FROM audit_reports
       WHERE audit_id = $1`,
      [auditId],
    );
    const row = result.rows[0];
    if (!row) {
      return undefined;
    }
    return {
      auditId: row.audit_id,
      record: row.record,
      metadata: row.metadata ?? undefined,
      storedAt: row.stored_at,
    };
  }

  async onModuleDestroy(): Promise<void> {
    await this.pool.end();
  }
}
