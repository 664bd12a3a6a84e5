import { reasoningPayloadSchema } from "./schema.js";
import type { ChecklistItem, ExperimentType, Finding, VisionObservation } from "./types.js";
import { EXPERIMENT_TYPES } from "./types.js";

export type JsonObject = Record<string, unknown>;

export type ExtractionStrategy = (text: string) => JsonObject | undefined;

export interface NormalizedAudit {
  summary: string;
  findings: Finding[];
  checklist: ChecklistItem[];
  riskAssessment: string;
  recommendedActions: string[];
}

export type NormalizeResult =
  | { kind: "parsed"; audit: NormalizedAudit }
  | { kind: "unparseable"; raw: string };

const FENCED_BLOCK = /```(?:json)?\s*([\s\S]*?)\s*```/i;
const BRACED_SPAN = /\{[\s\S]*\}/;

const VISION_HEADER_LINES = 5;
const EXPERIMENT_TYPE_MARKER = /EXPERIMENT_TYPE\**\s*:\s*\**\s*([A-Za-z_]+)/i;
const IMAGE_QUALITY_MARKER = /IMAGE_QUALITY\**\s*:\s*\**\s*(\d{1,2})\b/i;

function parseObject(candidate: string): JsonObject | undefined {
  let value: unknown;
  try {
    value = JSON.parse(candidate);
  } catch {
    return undefined;
  }
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return undefined;
  }
  return { ...value };
}

export const parseWhole: ExtractionStrategy = (text) => parseObject(text.trim());

export const parseFenced: ExtractionStrategy = (text) => {
  const match = FENCED_BLOCK.exec(text);
  return match?.[1] !== undefined ? parseObject(match[1]) : undefined;
};

export const parseBraced: ExtractionStrategy = (text) => {
  const match = BRACED_SPAN.exec(text);
  return match ? parseObject(match[0]) : undefined;
};

export const EXTRACTION_STRATEGIES: readonly ExtractionStrategy[] = [parseWhole, parseFenced, parseBraced];

export function extractJsonObject(
  text: string,
  strategies: readonly ExtractionStrategy[] = EXTRACTION_STRATEGIES,
): JsonObject | undefined {
  for (const strategy of strategies) {
    const parsed = strategy(text);
    if (parsed) {
      return parsed;
    }
  }
  return undefined;
}

export function normalizeAuditResponse(raw: string): NormalizeResult {
  const extracted = extractJsonObject(raw);
  if (!extracted) {
    return { kind: "unparseable", raw };
  }

  const payload = reasoningPayloadSchema.parse(extracted);
  const checklist = payload.sop_compliance_checklist.length > 0
    ? payload.sop_compliance_checklist
    : payload.checklist;

  return {
    kind: "parsed",
    audit: {
      summary: payload.summary,
      findings: payload.findings.map((finding, index) => ({
        id: finding.id || `F${String(index + 1).padStart(3, "0")}`,
        severity: finding.severity,
        category: finding.category,
        observation: finding.observation,
        sopRequirement: finding.sop_requirement,
        discrepancy: finding.discrepancy,
        impact: finding.impact,
        recommendation: finding.recommendation,
      })),
      checklist,
      riskAssessment: payload.risk_assessment,
      recommendedActions: payload.recommended_actions,
    },
  };
}

function toExperimentType(value: string): ExperimentType {
  const upper = value.toUpperCase();
  return EXPERIMENT_TYPES.find((type) => type === upper) ?? "OTHER";
}

/**
 * Reads the optional `EXPERIMENT_TYPE:` and `IMAGE_QUALITY:` markers from the head of a
 * vision description. Either may be missing; neither absence is an error.
 */
export function parseVisionObservation(text: string): VisionObservation {
  const head = text.split(/\r?\n/).slice(0, VISION_HEADER_LINES);

  let experimentType: ExperimentType = "OTHER";
  let imageQuality: number | null = null;
  let typeSeen = false;
  let qualitySeen = false;

  for (const line of head) {
    const typeMatch = typeSeen ? null : EXPERIMENT_TYPE_MARKER.exec(line);
    if (typeMatch?.[1]) {
      experimentType = toExperimentType(typeMatch[1]);
      typeSeen = true;
    }
    const qualityMatch = qualitySeen ? null : IMAGE_QUALITY_MARKER.exec(line);
    if (qualityMatch?.[1]) {
      const quality = Number.parseInt(qualityMatch[1], 10);
      imageQuality = quality >= 1 && quality <= 10 ? quality : null;
      qualitySeen = true;
    }
  }

  return { experimentType, imageQuality, text };
}
