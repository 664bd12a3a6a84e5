import { filterPhantomFindings } from "./findings.js";
import type { NormalizedAudit } from "./normalizer.js";
import type { ScoringPolicy } from "./policy.js";
import { scoreAudit } from "./policy.js";
import type { AuditRecord, ExperimentCheck, VisionObservation } from "./types.js";

export function scoredRecord(
  audit: NormalizedAudit,
  experiment: ExperimentCheck,
  policy: ScoringPolicy,
): AuditRecord {
  const findings = filterPhantomFindings(audit.findings);
  const { score, status } = scoreAudit(audit.checklist, findings, policy);
  return {
    score,
    status,
    summary: audit.summary,
    findings,
    checklist: audit.checklist,
    riskAssessment: audit.riskAssessment,
    recommendedActions: audit.recommendedActions,
    experiment,
  };
}

export function parseErrorRecord(raw: string, experiment: ExperimentCheck): AuditRecord {
  return {
    score: null,
    status: "PARSE_ERROR",
    summary: "The comparison returned a response that could not be read as a structured audit. The raw response is attached for manual review.",
    findings: [],
    checklist: [],
    riskAssessment: "Not assessed: the comparison output could not be parsed.",
    recommendedActions: ["Review the raw comparison output manually"],
    rawResponse: raw,
    experiment,
  };
}

export function errorRecord(reason: string, experiment: ExperimentCheck): AuditRecord {
  return {
    score: 0,
    status: "ERROR",
    summary: `Audit could not be completed: ${reason}`,
    findings: [],
    checklist: [],
    riskAssessment: "Unable to assess due to an inference service error.",
    recommendedActions: [
      "Check the inference service credentials",
      "Verify model availability",
      "Run the audit again",
    ],
    experiment,
  };
}

export function lowQualityRecord(observation: VisionObservation, experiment: ExperimentCheck): AuditRecord {
  return {
    score: null,
    status: "LOW_QUALITY",
    summary: `Image quality was rated ${observation.imageQuality ?? "unknown"}/10, too low for a reliable comparison against the protocol.`,
    findings: [],
    checklist: [],
    riskAssessment: "Not assessed: the image does not carry enough visual evidence.",
    recommendedActions: ["Retake the image with better focus, lighting and framing", "Run the audit again"],
    experiment,
  };
}
