/**
 * Composite score = plain sum of the selected bins' raw_score over every enabled factor
 * whose party_scope covers the applicant's segment.
 * Factor weights are carried into the breakdown for reporting; they never scale the score.
 * Deterministic: the same snapshot and attributes always produce the same breakdown and total.
 */

import { isAbsent, selectBin } from "./factorBinner";
import type { ApplicantAttributes, AttributeValue, ModelSnapshot } from "./modelVersion";
import { applicantSegment, appliesToSegment } from "./partyScope";

/** Aggregation policy for the composite score. Weights are reporting metadata only. */
export const SCORE_AGGREGATION = "UNWEIGHTED_SUM" as const;

export type FactorScore = {
  factor_name: string;
  input_field: string;
  value: AttributeValue;
  bin_id: string;
  bin_label: string;
  raw_score: number;
  weight: number;
  risk_interpretation: string | null;
  used_missing_bin: boolean;
};

export type CompositeScore = {
  perFactor: FactorScore[];
  total: number;
};

export function scoreComposite(snapshot: ModelSnapshot, attributes: ApplicantAttributes): CompositeScore {
  const perFactor: FactorScore[] = [];
  let total = 0;
  const segment = applicantSegment(attributes);

  for (const factor of snapshot.factors) {
    if (!factor.enabled || !appliesToSegment(factor.party_scope, segment)) continue;
    const bins = snapshot.binsByFactor.get(factor.factor_name) ?? [];
    const value = attributes[factor.input_field] ?? null;
    const bin = selectBin(factor, bins, value);
    total += bin.raw_score;
    perFactor.push({
      factor_name: factor.factor_name,
      input_field: factor.input_field,
      value,
      bin_id: bin.id,
      bin_label: bin.bin_label,
      raw_score: bin.raw_score,
      weight: factor.weight,
      risk_interpretation: bin.risk_interpretation,
      used_missing_bin: bin.is_missing_bin && isAbsent(value),
    });
  }

  return { perFactor, total };
}
