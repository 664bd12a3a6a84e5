import { readFileSync } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

import { z } from "zod";

import type { AuditRecord, ExperimentCheck, ExperimentType, Finding, VisionObservation } from "./types.js";
import { EXPERIMENT_TYPES } from "./types.js";

const experimentTypeSchema = z.enum(EXPERIMENT_TYPES);

const keywordTableSchema = z.object({
  protocolKeywords: z.array(z.object({ keyword: z.string().min(1), type: experimentTypeSchema })),
  descriptionKeywords: z.array(
    z.object({ type: experimentTypeSchema, keywords: z.array(z.string().min(1)).min(1) }),
  ),
});

export type KeywordTable = z.infer<typeof keywordTableSchema>;

const dataDir = path.join(path.dirname(fileURLToPath(import.meta.url)), "..", "data");

export function loadKeywordTable(fileName = "experiment-keywords.json"): KeywordTable {
  const raw = readFileSync(path.join(dataDir, fileName), "utf-8");
  return keywordTableSchema.parse(JSON.parse(raw));
}

export const KEYWORD_TABLE: KeywordTable = loadKeywordTable();

export const MISMATCH_CATEGORY = "Experiment Type Mismatch";

const MISMATCH_WORDING = /mismatch/i;

/** Experiment type a protocol expects, judged from its first non-blank line. */
export function expectedTypeForProtocol(
  protocol: string,
  table: KeywordTable = KEYWORD_TABLE,
): ExperimentType | null {
  const firstLine = protocol.trim().split(/\r?\n/)[0]?.toLowerCase() ?? "";
  const entry = table.protocolKeywords.find(({ keyword }) => firstLine.includes(keyword));
  return entry?.type ?? null;
}

export function classifyDescription(text: string, table: KeywordTable = KEYWORD_TABLE): ExperimentType {
  const lowered = text.toLowerCase();
  const entry = table.descriptionKeywords.find(({ keywords }) =>
    keywords.some((keyword) => lowered.includes(keyword)),
  );
  return entry?.type ?? "OTHER";
}

/**
 * An explicit tag from the vision call outranks description keywords. File names are
 * never consulted.
 */
export function detectExperimentType(
  observation: VisionObservation,
  table: KeywordTable = KEYWORD_TABLE,
): ExperimentType {
  if (observation.experimentType !== "OTHER") {
    return observation.experimentType;
  }
  return classifyDescription(observation.text, table);
}

export function detectMismatch(
  observation: VisionObservation,
  protocol: string,
  table: KeywordTable = KEYWORD_TABLE,
): ExperimentCheck {
  const detected = detectExperimentType(observation, table);
  const expected = expectedTypeForProtocol(protocol, table);
  return {
    detected,
    expected,
    mismatch: detected !== "OTHER" && expected !== null && detected !== expected,
  };
}

export function isMismatchFinding(finding: Finding): boolean {
  return MISMATCH_WORDING.test(finding.category);
}

export function buildMismatchFinding(check: ExperimentCheck): Finding {
  const expected = check.expected ?? "OTHER";
  return {
    id: "F000",
    severity: "CRITICAL",
    category: MISMATCH_CATEGORY,
    observation: `The image appears to show a ${check.detected} experiment.`,
    sopRequirement: `The selected protocol expects a ${expected} experiment.`,
    discrepancy: `Detected experiment type ${check.detected} does not match expected type ${expected}.`,
    impact: "The audit compares evidence against the wrong protocol, so its checklist results are not meaningful.",
    recommendation: "Select the protocol that matches the experiment shown, or upload the image for the selected protocol.",
  };
}

/**
 * Clamps a scored record when the experiment check found a mismatch. Runs after scoring;
 * unscored records (errors, unparseable output, low quality) pass through unchanged.
 */
export function applyMismatchOverride(
  record: AuditRecord,
  cap: number,
): AuditRecord {
  const { experiment } = record;
  if (!experiment.mismatch || record.score === null || record.status === "ERROR") {
    return record;
  }

  const findings = record.findings.some(isMismatchFinding)
    ? record.findings
    : [buildMismatchFinding(experiment), ...record.findings];

  return {
    ...record,
    score: Math.min(record.score, cap),
    status: "FAIL",
    findings,
  };
}
