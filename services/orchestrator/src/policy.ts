import { z } from "zod";

import type { ChecklistItem, Finding, ScoredStatus, Severity } from "./types.js";

export const scoringPolicySchema = z.object({
  unableToAssessCredit: z.number().min(0).max(1),
  neutralScore: z.number().int().min(0).max(100),
  severityPenalties: z.object({
    CRITICAL: z.number().nonnegative(),
    MAJOR: z.number().nonnegative(),
    MINOR: z.number().nonnegative(),
    OBSERVATION: z.number().nonnegative(),
    UNCLASSIFIED: z.number().nonnegative(),
  }),
  thresholds: z
    .object({
      pass: z.number().int().min(0).max(100),
      investigate: z.number().int().min(0).max(100),
    })
    .refine((value) => value.pass >= value.investigate, {
      message: "pass threshold must not be below investigate threshold",
    }),
  mismatchScoreCap: z.number().int().min(0).max(100),
  minimumImageQuality: z.number().int().min(0).max(10),
});

export type ScoringPolicy = z.infer<typeof scoringPolicySchema>;

export const scoringOverridesSchema = z
  .object({
    unableToAssessCredit: z.number(),
    neutralScore: z.number(),
    severityPenalties: z
      .object({
        CRITICAL: z.number(),
        MAJOR: z.number(),
        MINOR: z.number(),
        OBSERVATION: z.number(),
        UNCLASSIFIED: z.number(),
      })
      .partial()
      .strict(),
    thresholds: z.object({ pass: z.number(), investigate: z.number() }).partial().strict(),
    mismatchScoreCap: z.number(),
    minimumImageQuality: z.number(),
  })
  .partial()
  .strict();

export type ScoringPolicyOverrides = z.infer<typeof scoringOverridesSchema>;

// An unverifiable criterion earns a quarter of a compliant one: absence of evidence of
// compliance is read conservatively.
export const DEFAULT_SCORING_POLICY: ScoringPolicy = {
  unableToAssessCredit: 0.25,
  neutralScore: 50,
  severityPenalties: {
    CRITICAL: 15,
    MAJOR: 10,
    MINOR: 5,
    OBSERVATION: 2,
    UNCLASSIFIED: 0,
  },
  thresholds: {
    pass: 80,
    investigate: 50,
  },
  mismatchScoreCap: 15,
  minimumImageQuality: 4,
};

export const resolvePolicy = (partial: ScoringPolicyOverrides = {}): ScoringPolicy => {
  const defaults = DEFAULT_SCORING_POLICY;
  const merged: ScoringPolicy = {
    unableToAssessCredit: partial.unableToAssessCredit ?? defaults.unableToAssessCredit,
    neutralScore: partial.neutralScore ?? defaults.neutralScore,
    severityPenalties: { ...defaults.severityPenalties, ...partial.severityPenalties },
    thresholds: { ...defaults.thresholds, ...partial.thresholds },
    mismatchScoreCap: partial.mismatchScoreCap ?? defaults.mismatchScoreCap,
    minimumImageQuality: partial.minimumImageQuality ?? defaults.minimumImageQuality,
  };

  return scoringPolicySchema.parse(merged);
};

export interface ChecklistTally {
  compliant: number;
  nonCompliant: number;
  unable: number;
  total: number;
}

export interface ScoreResult {
  score: number;
  status: ScoredStatus;
}

export function tallyChecklist(checklist: readonly ChecklistItem[]): ChecklistTally {
  const tally = { compliant: 0, nonCompliant: 0, unable: 0 };
  for (const item of checklist) {
    switch (item.status) {
      case "COMPLIANT":
        tally.compliant += 1;
        break;
      case "NON_COMPLIANT":
        tally.nonCompliant += 1;
        break;
      case "UNABLE_TO_ASSESS":
        tally.unable += 1;
        break;
    }
  }
  return { ...tally, total: tally.compliant + tally.nonCompliant + tally.unable };
}

export function severityPenalty(severity: Severity, policy: ScoringPolicy): number {
  return policy.severityPenalties[severity];
}

export function statusForScore(score: number, policy: ScoringPolicy): ScoredStatus {
  if (score >= policy.thresholds.pass) {
    return "PASS";
  }
  if (score >= policy.thresholds.investigate) {
    return "INVESTIGATE";
  }
  return "FAIL";
}

/**
 * Scores an audit from its checklist tallies and (already filtered) findings. The
 * inference call's own score never enters this computation.
 */
export function scoreAudit(
  checklist: readonly ChecklistItem[],
  findings: readonly Finding[],
  policy: ScoringPolicy = DEFAULT_SCORING_POLICY,
): ScoreResult {
  const tally = tallyChecklist(checklist);
  if (tally.total === 0) {
    return { score: policy.neutralScore, status: statusForScore(policy.neutralScore, policy) };
  }

  // Multiply before dividing so exact halves stay exact and round up.
  const raw = ((tally.compliant + tally.unable * policy.unableToAssessCredit) * 100) / tally.total;
  const penalty = findings.reduce((sum, finding) => sum + severityPenalty(finding.severity, policy), 0);
  const score = clamp(Math.round(raw - penalty), 0, 100);

  return { score, status: statusForScore(score, policy) };
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
