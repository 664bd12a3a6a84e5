import type { AuditRecord } from "../types.js";

export class ReportResponseDto {
  auditId!: string;
  record!: AuditRecord;
  metadata?: Record<string, unknown>;
  storedAt!: string;
}
