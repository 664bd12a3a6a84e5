import { Injectable } from "@nestjs/common";

import type { AuditRepository, StoredReport } from "./audit.repository.js";

@Injectable()
export class InMemoryAuditRepository implements AuditRepository {
  private readonly store = new Map<string, StoredReport>();

  async save(report: StoredReport): Promise<void> {
    this.store.set(report.auditId, structuredClone(report));
  }

  async find(auditId: string): Promise<StoredReport | undefined> {
    const value = this.store.get(auditId);
    return value ? structuredClone(value) : undefined;
  }
}
