export type ExperimentType =
  | 'MTT_CELL_VIABILITY'
  | 'GEL_ELECTROPHORESIS'
  | 'HPLC_CHROMATOGRAPHY'
  | 'COLONY_COUNTING'
  | 'OTHER';

export type Severity = 'CRITICAL' | 'MAJOR' | 'MINOR' | 'OBSERVATION' | 'UNCLASSIFIED';

export type ChecklistStatus = 'COMPLIANT' | 'NON_COMPLIANT' | 'UNABLE_TO_ASSESS';

export type AuditStatus = 'PASS' | 'INVESTIGATE' | 'FAIL' | 'PARSE_ERROR' | 'ERROR' | 'LOW_QUALITY';

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

export interface ChecklistItem {
  criterion: string;
  status: ChecklistStatus;
  notes: string;
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

export interface AuditRequest {
  /** Base64-encoded image bytes. */
  image: string;
  mimeType?: string;
  protocol: string;
  metadata?: Record<string, unknown>;
}

export interface AuditTrace {
  auditId: string;
  imageDigest: string;
  protocolDigest: string;
  states: string[];
  visionCached: boolean;
  reasoningCached: boolean;
  visionError?: string;
}

export interface AuditResponse {
  auditId: string;
  record: AuditRecord;
  trace: AuditTrace;
  storedAt: string | null;
}

export interface ReportResponse {
  auditId: string;
  record: AuditRecord;
  metadata?: Record<string, unknown>;
  storedAt: string;
}
