/**
 * Tier classification: the tier whose min_score is the greatest value ≤ total,
 * or the catch-all (min_score = null) when no threshold qualifies.
 */

import { ConfigError } from "../errors";
import type { ModelSnapshot, TierRecord } from "./modelVersion";

export type TierClassification = {
  tier: string;
  decision: string;
  estimated_pd: number | null;
};

type Tier = Readonly<TierRecord>;

/** Thresholded tiers from highest min_score to lowest, then the catch-all(s). */
export function orderTiersForScan(tiers: readonly Tier[]): Tier[] {
  return [...tiers].sort((a, b) => {
    if (a.min_score == null && b.min_score == null) return a.tier_order - b.tier_order;
    if (a.min_score == null) return 1;
    if (b.min_score == null) return -1;
    return b.min_score - a.min_score || a.tier_order - b.tier_order;
  });
}

export function classifyTier(snapshot: ModelSnapshot, totalScore: number): TierClassification {
  for (const tier of orderTiersForScan(snapshot.tiers)) {
    if (tier.min_score == null || totalScore >= tier.min_score) {
      return { tier: tier.tier_name, decision: tier.decision, estimated_pd: tier.estimated_pd };
    }
  }
  throw new ConfigError(`Model version ${snapshot.version.version_id} has no tier for score ${totalScore}`, {
    version_id: snapshot.version.version_id,
    total_score: totalScore,
  });
}

/**
 * Structural problems that would leave some score without exactly one tier.
 * Empty array = every real number maps to exactly one tier.
 */
export function checkTierCoverage(tiers: readonly Tier[]): string[] {
  const violations: string[] = [];
  if (tiers.length === 0) {
    violations.push("no tiers defined");
    return violations;
  }

  const names = new Set<string>();
  for (const t of tiers) {
    if (names.has(t.tier_name)) violations.push(`duplicate tier name ${t.tier_name}`);
    names.add(t.tier_name);
  }

  const catchAll = tiers.filter((t) => t.min_score == null);
  if (catchAll.length === 0) violations.push("missing catch-all tier (exactly one tier needs min_score = null)");
  if (catchAll.length > 1) {
    violations.push(`more than one catch-all tier: ${catchAll.map((t) => t.tier_name).join(", ")}`);
  }
  const maxOrder = Math.max(...tiers.map((t) => t.tier_order));
  for (const t of catchAll) {
    if (t.tier_order !== maxOrder || tiers.filter((x) => x.tier_order === maxOrder).length > 1) {
      violations.push(`catch-all tier ${t.tier_name} must have the highest tier_order`);
    }
  }

  // tier_order 1 is the best tier: ascending tier_order must mean strictly decreasing min_score.
  const thresholded = tiers.filter((t) => t.min_score != null).sort((a, b) => a.tier_order - b.tier_order);
  for (let i = 1; i < thresholded.length; i++) {
    const prev = thresholded[i - 1];
    const curr = thresholded[i];
    if (curr.tier_order === prev.tier_order) {
      violations.push(`tiers ${prev.tier_name} and ${curr.tier_name} share tier_order ${curr.tier_order}`);
    } else if (curr.min_score != null && prev.min_score != null && curr.min_score >= prev.min_score) {
      violations.push(
        `tier ${curr.tier_name} (min_score ${curr.min_score}) must have a lower min_score than ${prev.tier_name} (min_score ${prev.min_score})`
      );
    }
  }
  return violations;
}
