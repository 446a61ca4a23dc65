import { SCORE_AGGREGATION } from "../scoring/compositeScorer";
import { isCatchAllBin, isNumericBin } from "../scoring/factorBinner";
import type { BinRecord, ModelSnapshot, PartyScope } from "../scoring/modelVersion";
import { describeCondition } from "../scoring/ruleCondition";
import { orderTiersForScan } from "../scoring/tierClassifier";

export type ModelCardSection = {
  heading: string;
  body?: string;
  bullets?: string[];
};

export function modelCardTitle(versionId: string): string {
  return `Leasing Risk Model ${versionId} - Model Card`;
}

export const disclaimerLines = [
  "Credit decision support. Scores and tiers are calibrated parameters, not fitted predictions; analyst review remains required for MANUAL_REVIEW outcomes.",
];

function formatScore(n: number): string {
  return n > 0 ? `+${n}` : String(n);
}

function formatPct(n: number | null): string {
  return n == null ? "n/a" : `${(n * 100).toFixed(1)}%`;
}

const SEGMENT_NAMES: Record<Exclude<PartyScope, "ALL">, string> = {
  B2C: "private applicants",
  B2B: "company applicants",
};

/** "[75, 85]", "(-inf, 75)", "= C", "any other value", "absent input". */
export function describeBinRange(bin: Readonly<BinRecord>): string {
  const parts: string[] = [];
  if (isNumericBin(bin)) {
    const lo = bin.lower_bound == null ? "(-inf" : `${bin.lower_inclusive ? "[" : "("}${bin.lower_bound}`;
    const hi = bin.upper_bound == null ? "+inf)" : `${bin.upper_bound}${bin.upper_inclusive ? "]" : ")"}`;
    parts.push(`${lo}, ${hi}`);
  } else if (bin.match_value != null) {
    parts.push(`= ${bin.match_value}`);
  } else if (isCatchAllBin(bin)) {
    parts.push("any other value");
  }
  if (bin.is_missing_bin) parts.push("absent input");
  return parts.join(" or ");
}

export function buildModelCardSections(snapshot: ModelSnapshot): ModelCardSection[] {
  const { version } = snapshot;
  const sections: ModelCardSection[] = [
    {
      heading: "Purpose",
      body:
        "This model scores leasing applications into risk tiers. Each enabled factor maps one applicant attribute to a calibrated bin; the bin's raw score is added to the composite. Hard-kill business rules are checked first and override any score.",
    },
    {
      heading: "Version",
      bullets: [
        `Version: ${version.version_id} (${version.status})`,
        `Description: ${version.description ?? "-"}`,
        `Created: ${version.created_at} by ${version.created_by}`,
        `Published: ${version.published_at ?? "-"} by ${version.published_by ?? "-"}`,
        `Cloned from: ${version.base_version_id ?? "none"}`,
      ],
    },
    {
      heading: "Score Construction",
      body: `Aggregation: ${SCORE_AGGREGATION}. The composite is the plain sum of the selected bins' raw scores over enabled factors. Factor weights are documentation only and never scale a score. Absent inputs score the factor's missing bin and are reported as defaults applied. A factor or rule scoped to private (B2C) or company (B2B) applicants applies to that segment only.`,
    },
  ];

  for (const factor of snapshot.factors) {
    const bins = snapshot.binsByFactor.get(factor.factor_name) ?? [];
    sections.push({
      heading: `Factor ${factor.display_order}: ${factor.factor_name}${factor.enabled ? "" : " (disabled)"}`,
      body: `${factor.description ?? ""} Input: ${factor.input_field}. Weight ${factor.weight}. Score range [${
        factor.score_range_min ?? "-"
      }, ${factor.score_range_max ?? "-"}].${
        factor.party_scope === "ALL" ? "" : ` Applies to ${SEGMENT_NAMES[factor.party_scope]} only.`
      }`.trim(),
      bullets: bins.map(
        (b) =>
          `${b.bin_label}: ${describeBinRange(b)} -> ${formatScore(b.raw_score)}${
            b.risk_interpretation ? ` (${b.risk_interpretation})` : ""
          }`
      ),
    });
  }

  sections.push({
    heading: "Risk Tiers",
    body: "Tiers are checked from the highest threshold down; the first threshold the score reaches wins, otherwise the catch-all applies.",
    bullets: orderTiersForScan(snapshot.tiers).map(
      (t) =>
        `${t.tier_name}: ${t.min_score == null ? "catch-all" : `score >= ${t.min_score}`} -> ${t.decision}, PD ${formatPct(
          t.estimated_pd
        )}`
    ),
  });

  sections.push({
    heading: "Business Rules",
    body: "Enabled rules run in rule code order before scoring. The first HARD match forces its tier and decision; SOFT matches are advisory. A rule whose field is absent does not fire.",
    bullets: snapshot.rules.map(
      (r) =>
        `${r.rule_code} ${r.rule_name} [${r.severity}${r.party_scope === "ALL" ? "" : `, ${r.party_scope} only`}${
          r.enabled ? "" : ", disabled"
        }]: ${describeCondition(r.condition)} -> ${
          r.forced_tier
        } / ${r.forced_decision}`
    ),
  });

  sections.push({
    heading: "Limitations",
    body:
      "Bin scores and tier thresholds are static calibration parameters. Dealer default rates and bureau scores are supplied by upstream systems; the model does not verify them.",
  });

  return sections;
}
