import type { AuditRecord } from "../types.js";

export interface StoredReport {
  auditId: string;
  record: AuditRecord;
  metadata?: Record<string, unknown>;
  storedAt: Date;
}

export interface AuditRepository {
  save(report: StoredReport): Promise<void>;
  find(auditId: string): Promise<StoredReport | undefined>;
}
