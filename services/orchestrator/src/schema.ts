import { z } from "zod";

import type { ChecklistStatus, Severity } from "./types.js";
import { CHECKLIST_STATUSES, SEVERITIES } from "./types.js";

const text = z.unknown().transform((value): string => {
  if (typeof value === "string") {
    return value.trim();
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return "";
});

function canonicalToken(value: unknown): string {
  return typeof value === "string" ? value.trim().toUpperCase().replace(/[\s-]+/g, "_") : "";
}

/** Severities outside the known scale carry no penalty and are never filtered. */
export function canonicalSeverity(value: unknown): Severity {
  const token = canonicalToken(value);
  return SEVERITIES.find((severity) => severity === token) ?? "UNCLASSIFIED";
}

export function canonicalChecklistStatus(value: unknown): ChecklistStatus {
  const token = canonicalToken(value);
  return CHECKLIST_STATUSES.find((status) => status === token) ?? "UNABLE_TO_ASSESS";
}

function listOf<T extends z.ZodTypeAny>(item: T) {
  return z.unknown().transform((value): Array<z.output<T>> => {
    if (!Array.isArray(value)) {
      return [];
    }
    return value.flatMap((entry) => {
      const parsed = item.safeParse(entry);
      return parsed.success ? [parsed.data] : [];
    });
  });
}

export const findingSchema = z.object({
  id: text,
  severity: z.unknown().transform(canonicalSeverity),
  category: text,
  observation: text,
  sop_requirement: text,
  discrepancy: text,
  impact: text,
  recommendation: text,
});

export const checklistItemSchema = z.object({
  criterion: text,
  status: z.unknown().transform(canonicalChecklistStatus),
  notes: text,
});

/**
 * Shape the reasoning call is asked to return. Its own `data_integrity_score` and
 * `overall_status` are deliberately absent: unknown keys are stripped.
 */
export const reasoningPayloadSchema = z.object({
  summary: text,
  findings: listOf(findingSchema),
  sop_compliance_checklist: listOf(checklistItemSchema),
  checklist: listOf(checklistItemSchema),
  risk_assessment: text,
  recommended_actions: listOf(z.string().min(1)),
});

export type ReasoningPayload = z.infer<typeof reasoningPayloadSchema>;
