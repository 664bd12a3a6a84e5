export const EXPERIMENT_TYPES = [
  "MTT_CELL_VIABILITY",
  "GEL_ELECTROPHORESIS",
  "HPLC_CHROMATOGRAPHY",
  "COLONY_COUNTING",
  "OTHER",
] as const;

export type ExperimentType = (typeof EXPERIMENT_TYPES)[number];

export const SEVERITIES = ["CRITICAL", "MAJOR", "MINOR", "OBSERVATION", "UNCLASSIFIED"] as const;

export type Severity = (typeof SEVERITIES)[number];

export const CHECKLIST_STATUSES = ["COMPLIANT", "NON_COMPLIANT", "UNABLE_TO_ASSESS"] as const;

export type ChecklistStatus = (typeof CHECKLIST_STATUSES)[number];

export type ScoredStatus = "PASS" | "INVESTIGATE" | "FAIL";

export type AuditStatus = ScoredStatus | "ERROR" | "PARSE_ERROR" | "LOW_QUALITY";

export interface VisionObservation {
  experimentType: ExperimentType;
  /** 1-10 as declared by the vision model; null when absent. */
  imageQuality: number | null;
  text: string;
}

export interface ChecklistItem {
  criterion: string;
  status: ChecklistStatus;
  notes: string;
}

export interface Finding {
  id: string;
  severity: Severity;
  category: string;
  observation: string;
  sopRequirement: string;
  discrepancy: string;
  impact: string;
  recommendation: string;
}

export interface ExperimentCheck {
  detected: ExperimentType;
  expected: ExperimentType | null;
  mismatch: boolean;
}

export interface AuditRecord {
  score: number | null;
  status: AuditStatus;
  summary: string;
  findings: Finding[];
  checklist: ChecklistItem[];
  riskAssessment: string;
  recommendedActions: string[];
  rawResponse?: string;
  experiment: ExperimentCheck;
}
