import { describe, it, expect } from "vitest";
import { ConfigError } from "../errors";
import { buildSnapshot } from "./modelSchema";
import type { TierRecord } from "./modelVersion";
import { checkTierCoverage, classifyTier, orderTiersForScan } from "./tierClassifier";
import { buildTestModelRows } from "./testModel";

describe("classifyTier", () => {
  const snapshot = buildSnapshot(buildTestModelRows());

  it.each([
    [40, "BRIGHT_GREEN", "AUTO_APPROVE"],
    [25, "BRIGHT_GREEN", "AUTO_APPROVE"],
    [24, "GREEN", "APPROVE_STANDARD"],
    [14, "GREEN", "APPROVE_STANDARD"],
    [10, "GREEN", "APPROVE_STANDARD"],
    [9, "YELLOW", "MANUAL_REVIEW"],
    [0, "YELLOW", "MANUAL_REVIEW"],
    [-1, "RED", "DECLINE"],
    [-100, "RED", "DECLINE"],
  ])("score %d → %s", (score, tier, decision) => {
    const result = classifyTier(snapshot, score);
    expect(result.tier).toBe(tier);
    expect(result.decision).toBe(decision);
  });

  it("carries the tier's estimated PD", () => {
    expect(classifyTier(snapshot, 14).estimated_pd).toBe(0.035);
  });

  it("throws ConfigError when no tier covers the score", () => {
    const rows = buildTestModelRows();
    rows.tiers = rows.tiers.filter((t) => t.min_score != null);
    expect(() => classifyTier(buildSnapshot(rows), -1)).toThrow(ConfigError);
  });
});

describe("orderTiersForScan", () => {
  it("scans thresholds from the highest down and the catch-all last", () => {
    const tiers = buildTestModelRows().tiers.reverse();
    expect(orderTiersForScan(tiers).map((t) => t.tier_name)).toEqual(["BRIGHT_GREEN", "GREEN", "YELLOW", "RED"]);
  });
});

describe("checkTierCoverage", () => {
  function tiers(): TierRecord[] {
    return buildTestModelRows().tiers;
  }

  it("accepts the standard four tiers", () => {
    expect(checkTierCoverage(tiers())).toEqual([]);
  });

  it("reports a missing catch-all tier", () => {
    const t = tiers().map((x) => (x.tier_name === "RED" ? { ...x, min_score: -100 } : x));
    expect(checkTierCoverage(t)).toEqual(["missing catch-all tier (exactly one tier needs min_score = null)"]);
  });

  it("reports more than one catch-all tier", () => {
    const t = tiers().map((x) => (x.tier_name === "YELLOW" ? { ...x, min_score: null } : x));
    expect(checkTierCoverage(t)).toContain("more than one catch-all tier: YELLOW, RED");
  });

  it("reports thresholds that do not decrease with tier_order", () => {
    const t = tiers().map((x) => (x.tier_name === "GREEN" ? { ...x, min_score: 30 } : x));
    expect(checkTierCoverage(t)).toEqual([
      "tier GREEN (min_score 30) must have a lower min_score than BRIGHT_GREEN (min_score 25)",
    ]);
  });

  it("reports an empty tier set", () => {
    expect(checkTierCoverage([])).toEqual(["no tiers defined"]);
  });
});
