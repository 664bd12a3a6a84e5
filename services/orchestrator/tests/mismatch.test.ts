import { describe, expect, it } from "vitest";

import {
  MISMATCH_CATEGORY,
  applyMismatchOverride,
  classifyDescription,
  detectExperimentType,
  detectMismatch,
  expectedTypeForProtocol,
  loadKeywordTable,
} from "../src/mismatch.js";
import type { AuditRecord, ExperimentCheck } from "../src/types.js";

const MTT_PROTOCOL = "STANDARD OPERATING PROCEDURE: MTT Cell Viability Assay\nProtocol ID: SOP-CV-001";
const GEL_PROTOCOL = "\n  STANDARD OPERATING PROCEDURE: Agarose Gel Electrophoresis QC\nProtocol ID: SOP-GE-002";

const MISMATCH: ExperimentCheck = {
  detected: "GEL_ELECTROPHORESIS",
  expected: "MTT_CELL_VIABILITY",
  mismatch: true,
};

function scored(score: number, experiment: ExperimentCheck = MISMATCH): AuditRecord {
  return {
    score,
    status: score >= 80 ? "PASS" : "INVESTIGATE",
    summary: "Plate looks compliant.",
    findings: [
      {
        id: "F001",
        severity: "MINOR",
        category: "Documentation Gap",
        observation: "Label smudged",
        sopRequirement: "Plates labelled",
        discrepancy: "Label hard to read",
        impact: "Traceability reduced",
        recommendation: "Relabel",
      },
    ],
    checklist: [],
    riskAssessment: "Low",
    recommendedActions: [],
    experiment,
  };
}

describe("loadKeywordTable", () => {
  it("reads the ordered keyword tables from the data directory", () => {
    const table = loadKeywordTable();
    expect(table.protocolKeywords[0]).toEqual({ keyword: "mtt", type: "MTT_CELL_VIABILITY" });
    expect(table.descriptionKeywords.map((entry) => entry.type)).toEqual([
      "MTT_CELL_VIABILITY",
      "GEL_ELECTROPHORESIS",
      "HPLC_CHROMATOGRAPHY",
      "COLONY_COUNTING",
    ]);
  });
});

describe("expectedTypeForProtocol", () => {
  it("reads the first non-blank line", () => {
    expect(expectedTypeForProtocol(MTT_PROTOCOL)).toBe("MTT_CELL_VIABILITY");
    expect(expectedTypeForProtocol(GEL_PROTOCOL)).toBe("GEL_ELECTROPHORESIS");
    expect(expectedTypeForProtocol("HPLC Chromatography Analysis")).toBe("HPLC_CHROMATOGRAPHY");
    expect(expectedTypeForProtocol("Bacterial Colony Counting (CFU Assay)")).toBe("COLONY_COUNTING");
  });

  it("ignores keywords below the first line", () => {
    expect(expectedTypeForProtocol("Sterile bench checklist\nRecord MTT reagent lot numbers")).toBeNull();
  });
});

describe("classifyDescription", () => {
  it("matches per-type keywords", () => {
    expect(classifyDescription("A 96-well microplate with purple wells")).toBe("MTT_CELL_VIABILITY");
    expect(classifyDescription("An agarose slab with six lanes")).toBe("GEL_ELECTROPHORESIS");
    expect(classifyDescription("The chromatogram shows three peaks")).toBe("HPLC_CHROMATOGRAPHY");
    expect(classifyDescription("A petri dish with scattered growth")).toBe("COLONY_COUNTING");
    expect(classifyDescription("A bench with glassware")).toBe("OTHER");
  });

  it("takes the first type in table order", () => {
    expect(classifyDescription("Agarose residue next to a 96-well plate")).toBe("MTT_CELL_VIABILITY");
  });
});

describe("detectExperimentType", () => {
  it("prefers an explicit tag over description keywords", () => {
    expect(detectExperimentType({
      experimentType: "HPLC_CHROMATOGRAPHY",
      imageQuality: null,
      text: "agarose gel electrophoresis",
    })).toBe("HPLC_CHROMATOGRAPHY");
  });

  it("falls back to keywords when the tag is OTHER", () => {
    expect(detectExperimentType({ experimentType: "OTHER", imageQuality: 6, text: "Agarose gel, UV light" }))
      .toBe("GEL_ELECTROPHORESIS");
  });
});

describe("detectMismatch", () => {
  it("flags a confident type that differs from the protocol", () => {
    expect(detectMismatch(
      { experimentType: "GEL_ELECTROPHORESIS", imageQuality: 8, text: "Bands" },
      MTT_PROTOCOL,
    )).toEqual(MISMATCH);
  });

  it("does not flag matching, unknown or unexpected types", () => {
    expect(detectMismatch({ experimentType: "OTHER", imageQuality: null, text: "Purple wells in a 96-well plate" }, MTT_PROTOCOL))
      .toEqual({ detected: "MTT_CELL_VIABILITY", expected: "MTT_CELL_VIABILITY", mismatch: false });
    expect(detectMismatch({ experimentType: "OTHER", imageQuality: null, text: "A bench" }, MTT_PROTOCOL).mismatch)
      .toBe(false);
    expect(detectMismatch({ experimentType: "GEL_ELECTROPHORESIS", imageQuality: null, text: "" }, "Freezer log").mismatch)
      .toBe(false);
  });
});

describe("applyMismatchOverride", () => {
  it("clamps the score, fails the audit and prepends one mismatch finding", () => {
    const overridden = applyMismatchOverride(scored(90), 15);
    expect(overridden.score).toBe(15);
    expect(overridden.status).toBe("FAIL");
    expect(overridden.findings).toHaveLength(2);
    expect(overridden.findings[0]).toMatchObject({
      id: "F000",
      severity: "CRITICAL",
      category: MISMATCH_CATEGORY,
      discrepancy: "Detected experiment type GEL_ELECTROPHORESIS does not match expected type MTT_CELL_VIABILITY.",
    });
  });

  it("is idempotent", () => {
    const once = applyMismatchOverride(scored(90), 15);
    const twice = applyMismatchOverride(once, 15);
    expect(twice).toEqual(once);
    expect(twice.findings.filter((item) => item.category === MISMATCH_CATEGORY)).toHaveLength(1);
  });

  it("keeps a lower score and an existing mismatch finding", () => {
    const record = scored(10);
    record.findings[0] = { ...record.findings[0], category: "SOP Mismatch" };
    const overridden = applyMismatchOverride(record, 15);
    expect(overridden.score).toBe(10);
    expect(overridden.findings).toHaveLength(1);
  });

  it("leaves records without a mismatch or without a score untouched", () => {
    const clean = scored(90, { detected: "MTT_CELL_VIABILITY", expected: "MTT_CELL_VIABILITY", mismatch: false });
    expect(applyMismatchOverride(clean, 15)).toBe(clean);

    const unparsed: AuditRecord = { ...scored(0), score: null, status: "PARSE_ERROR" };
    expect(applyMismatchOverride(unparsed, 15)).toBe(unparsed);
  });
});
