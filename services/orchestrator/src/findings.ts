import type { Finding, Severity } from "./types.js";

const FILTERABLE_SEVERITIES: ReadonlySet<Severity> = new Set<Severity>(["MINOR", "OBSERVATION"]);

/**
 * Phrases that describe an inability to verify something from a still image rather
 * than a defect. Such statements belong in the checklist as UNABLE_TO_ASSESS.
 */
export const NON_SUBSTANTIVE_PATTERNS: readonly RegExp[] = [
  /\b(?:cannot|can ?not|could not|couldn't|unable to|not possible to|impossible to) (?:be )?(?:verif|assess|determin|confirm|evaluat|establish|ascertain)/i,
  /\b(?:not|cannot be) (?:verifiable|assessable|determinable|confirmable)\b/i,
  /\bnot (?:visible|discernible|apparent|shown|captured) (?:in|from) (?:the |a |this )?(?:static |still |single )?(?:image|photo|photograph|picture)/i,
  /\binsufficient (?:information|evidence|detail|data|resolution)\b/i,
  /\bno (?:information|evidence|data|documentation) (?:is )?(?:available|provided|visible)\b/i,
  /\bunable to assess\b/i,
  /\blimited (?:visual )?information\b/i,
];

function findingText(finding: Finding): string {
  return [finding.observation, finding.discrepancy, finding.impact].join(" ");
}

export function isPhantomFinding(finding: Finding): boolean {
  if (!FILTERABLE_SEVERITIES.has(finding.severity)) {
    return false;
  }
  const text = findingText(finding);
  return NON_SUBSTANTIVE_PATTERNS.some((pattern) => pattern.test(text));
}

/** CRITICAL and MAJOR findings always survive, whatever their wording. */
export function filterPhantomFindings(findings: readonly Finding[]): Finding[] {
  return findings.filter((finding) => !isPhantomFinding(finding));
}
