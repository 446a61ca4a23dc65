/**
 * Replay consistency: re-run a stored assessment against the version it was scored with and
 * report where the stored outcome diverges (e.g. a version edited outside governance, or a bug).
 * Only asserts when the snapshot is the stored version; other versions apply different calibrations.
 */

import { assessAttributes } from "./assessment";
import type { ApplicantAttributes, ModelSnapshot } from "./modelVersion";

export type StoredAssessment = {
  assessment_id: string;
  version_id: string;
  total_score: number | null;
  tier: string;
  decision: string;
  attributes: ApplicantAttributes;
  /** Optional stored breakdown; when present, bin choices are compared too. */
  factor_breakdown?: { factor_name: string; bin_id: string }[];
};

export type ReplayDifference = {
  field: "total_score" | "tier" | "decision" | `bin:${string}`;
  stored: string | number | null;
  replayed: string | number | null;
};

export type ReplayConsistencyResult = {
  mismatch: boolean;
  /** True when the snapshot is not the stored version, so nothing was compared. */
  skipped: boolean;
  differences: ReplayDifference[];
};

export function checkAssessmentReplay(snapshot: ModelSnapshot, stored: StoredAssessment): ReplayConsistencyResult {
  if (snapshot.version.version_id !== stored.version_id) {
    return { mismatch: false, skipped: true, differences: [] };
  }

  const replayed = assessAttributes(snapshot, stored.attributes, {
    assessmentId: stored.assessment_id,
    now: () => new Date(0),
  });

  const differences: ReplayDifference[] = [];
  if (replayed.total_score !== stored.total_score) {
    differences.push({ field: "total_score", stored: stored.total_score, replayed: replayed.total_score });
  }
  if (replayed.tier !== stored.tier) {
    differences.push({ field: "tier", stored: stored.tier, replayed: replayed.tier });
  }
  if (replayed.decision !== stored.decision) {
    differences.push({ field: "decision", stored: stored.decision, replayed: replayed.decision });
  }

  if (stored.factor_breakdown) {
    const replayedBins = new Map(replayed.factor_breakdown.map((f) => [f.factor_name, f.bin_id]));
    const names = new Set([...stored.factor_breakdown.map((f) => f.factor_name), ...replayedBins.keys()]);
    const storedBins = new Map(stored.factor_breakdown.map((f) => [f.factor_name, f.bin_id]));
    for (const name of names) {
      const before = storedBins.get(name) ?? null;
      const after = replayedBins.get(name) ?? null;
      if (before !== after) differences.push({ field: `bin:${name}`, stored: before, replayed: after });
    }
  }

  return { mismatch: differences.length > 0, skipped: false, differences };
}
