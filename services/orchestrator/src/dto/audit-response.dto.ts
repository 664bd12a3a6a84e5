import type { AuditTrace } from "../pipeline.js";
import type { AuditRecord } from "../types.js";

export class AuditResponseDto {
  auditId!: string;
  record!: AuditRecord;
  trace!: AuditTrace;
  /** Null when the report could not be persisted. */
  storedAt!: string | null;
}
