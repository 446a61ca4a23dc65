import { describe, it, expect } from "vitest";
import { buildSnapshot } from "./modelSchema";
import { checkAssessmentReplay, type StoredAssessment } from "./replayConsistency";
import { buildTestModelRows } from "./testModel";

const snapshot = buildSnapshot(buildTestModelRows());

function stored(overrides: Partial<StoredAssessment> = {}): StoredAssessment {
  return {
    assessment_id: "a-1",
    version_id: "9.0.0",
    total_score: 14,
    tier: "GREEN",
    decision: "APPROVE_STANDARD",
    attributes: { ltv: 70, term_months: 40, crif_score: 600, age: 30 },
    ...overrides,
  };
}

describe("checkAssessmentReplay", () => {
  it("reports no mismatch when the replay reproduces the stored outcome", () => {
    expect(checkAssessmentReplay(snapshot, stored())).toEqual({ mismatch: false, skipped: false, differences: [] });
  });

  it("reports each diverging field", () => {
    const result = checkAssessmentReplay(snapshot, stored({ total_score: 26, tier: "BRIGHT_GREEN", decision: "AUTO_APPROVE" }));
    expect(result.mismatch).toBe(true);
    expect(result.differences).toEqual([
      { field: "total_score", stored: 26, replayed: 14 },
      { field: "tier", stored: "BRIGHT_GREEN", replayed: "GREEN" },
      { field: "decision", stored: "AUTO_APPROVE", replayed: "APPROVE_STANDARD" },
    ]);
  });

  it("compares stored bin choices when a breakdown is present", () => {
    const result = checkAssessmentReplay(
      snapshot,
      stored({
        factor_breakdown: [
          { factor_name: "LTV", bin_id: "LTV-1" },
          { factor_name: "Term", bin_id: "Term-2" },
          { factor_name: "CRIF", bin_id: "CRIF-2" },
        ],
      })
    );
    expect(result.differences).toEqual([{ field: "bin:CRIF", stored: "CRIF-2", replayed: "CRIF-1" }]);
  });

  it("skips assessments scored with another version", () => {
    expect(checkAssessmentReplay(snapshot, stored({ version_id: "8.0.0", total_score: 99 }))).toEqual({
      mismatch: false,
      skipped: true,
      differences: [],
    });
  });

  it("replays hard kills as a null score", () => {
    const result = checkAssessmentReplay(
      snapshot,
      stored({ attributes: { ltv: 70, term_months: 40, age: 16 }, total_score: null, tier: "RED", decision: "DECLINE" })
    );
    expect(result.mismatch).toBe(false);
  });
});
