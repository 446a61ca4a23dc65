/**
 * Small hand-built model for unit tests: three factors, the four standard tiers and three rules.
 *   LTV  (ltv, nullable):          <75 → +8, [75, 95] → 0, >95 → −8, missing → −5
 *   Term (term_months):            ≤36 → +5, (36, 48] → +6, >48 → −3
 *   CRIF (crif_score, nullable):   ≥500 → 0, <500 → −6, missing → −5
 *   Tiers: BRIGHT_GREEN ≥25, GREEN ≥10, YELLOW ≥0, RED catch-all
 *   Rules: BR-01 age < 18 (HARD), BR-02 ltv > 120 (HARD), BR-09 ltv >= 90 (SOFT)
 */

import type {
  BinRecord,
  BusinessRuleRecord,
  FactorRecord,
  ModelVersionRows,
  TierRecord,
  VersionStatus,
} from "./modelVersion";

type BinShape = Partial<BinRecord> & Pick<BinRecord, "bin_label" | "raw_score">;

function factor(versionId: string, name: string, input: string, order: number, nullable: boolean): FactorRecord {
  return {
    id: name,
    version_id: versionId,
    factor_name: name,
    input_field: input,
    weight: 0.2,
    enabled: true,
    nullable,
    description: null,
    score_range_min: -10,
    score_range_max: 10,
    display_order: order,
    party_scope: "ALL",
  };
}

function bins(versionId: string, factorName: string, shapes: BinShape[]): BinRecord[] {
  return shapes.map((s, i) => ({
    id: `${factorName}-${i + 1}`,
    version_id: versionId,
    factor_name: factorName,
    bin_order: i + 1,
    lower_bound: null,
    upper_bound: null,
    lower_inclusive: true,
    upper_inclusive: true,
    match_value: null,
    is_missing_bin: false,
    risk_interpretation: null,
    ...s,
  }));
}

function tier(versionId: string, name: string, order: number, min: number | null, decision: string, pd: number): TierRecord {
  return {
    id: name,
    version_id: versionId,
    tier_name: name,
    tier_order: order,
    min_score: min,
    decision,
    estimated_pd: pd,
    color_hex: null,
    description: null,
  };
}

function rule(
  versionId: string,
  code: string,
  field: string,
  op: string,
  value: string,
  severity: "HARD" | "SOFT"
): BusinessRuleRecord {
  return {
    id: code,
    version_id: versionId,
    rule_code: code,
    rule_name: `${field} ${op} ${value}`,
    description: null,
    condition_field: field,
    condition_operator: op,
    condition_value: value,
    forced_tier: severity === "HARD" ? "RED" : "YELLOW",
    forced_decision: severity === "HARD" ? "DECLINE" : "MANUAL_REVIEW",
    severity,
    enabled: true,
    party_scope: "ALL",
  };
}

export function buildTestModelRows(versionId = "9.0.0", status: VersionStatus = "PUBLISHED"): ModelVersionRows {
  return {
    version: {
      version_id: versionId,
      description: "unit test model",
      status,
      created_at: "2026-01-01T00:00:00.000Z",
      created_by: "test",
      published_at: status === "DRAFT" ? null : "2026-01-02T00:00:00.000Z",
      published_by: status === "DRAFT" ? null : "test",
      base_version_id: null,
    },
    factors: [
      factor(versionId, "LTV", "ltv", 1, true),
      factor(versionId, "Term", "term_months", 2, false),
      factor(versionId, "CRIF", "crif_score", 3, true),
    ],
    bins: [
      ...bins(versionId, "LTV", [
        { bin_label: "<75%", upper_bound: 75, upper_inclusive: false, raw_score: 8 },
        { bin_label: "75-95%", lower_bound: 75, upper_bound: 95, raw_score: 0 },
        { bin_label: ">95%", lower_bound: 95, lower_inclusive: false, raw_score: -8 },
        { bin_label: "MISSING", is_missing_bin: true, raw_score: -5 },
      ]),
      ...bins(versionId, "Term", [
        { bin_label: "<=36m", upper_bound: 36, raw_score: 5 },
        { bin_label: "37-48m", lower_bound: 36, lower_inclusive: false, upper_bound: 48, raw_score: 6 },
        { bin_label: ">48m", lower_bound: 48, lower_inclusive: false, raw_score: -3 },
      ]),
      ...bins(versionId, "CRIF", [
        { bin_label: ">=500", lower_bound: 500, raw_score: 0 },
        { bin_label: "<500", upper_bound: 500, upper_inclusive: false, raw_score: -6 },
        { bin_label: "MISSING", is_missing_bin: true, raw_score: -5 },
      ]),
    ],
    tiers: [
      tier(versionId, "BRIGHT_GREEN", 1, 25, "AUTO_APPROVE", 0.015),
      tier(versionId, "GREEN", 2, 10, "APPROVE_STANDARD", 0.035),
      tier(versionId, "YELLOW", 3, 0, "MANUAL_REVIEW", 0.07),
      tier(versionId, "RED", 4, null, "DECLINE", 0.15),
    ],
    rules: [
      rule(versionId, "BR-01", "age", "<", "18", "HARD"),
      rule(versionId, "BR-02", "ltv", ">", "120", "HARD"),
      rule(versionId, "BR-09", "ltv", ">=", "90", "SOFT"),
    ],
  };
}

/**
 * Raw B2C application. Against the seed model it scores 32 (BRIGHT_GREEN):
 * LTV 75 (+4), term 48 (+6), age 39 (0), CRIF 720 (+8), Intrum 1 (+1), DSCR 5.03 (0),
 * permit C (+5), price 48k (+3), ZEK clean (+5), seasoned dealer 5% (0).
 */
export function buildSampleApplication() {
  return {
    request_id: "req-1",
    timestamp: "2026-03-01T09:00:00.000Z",
    customer: {
      customer_id: "cust-1",
      party_type: "B2C" as const,
      date_of_birth: "1986-03-02",
      permit_type: "C" as const,
      monthly_net_income: 6000,
      monthly_rent: 1500,
      monthly_insurance: 300,
      monthly_existing_obligations: 200,
      crif_score: 720,
      intrum_score: 1,
      zek_has_entries: false,
    },
    vehicle: { vehicle_price: 48000 },
    contract: { contract_id: "ctr-1", financed_amount: 36000, term_months: 48, monthly_payment: 500 },
    dealer: { dealer_id: "dealer-1", dealer_default_rate: 0.05, dealer_active_months: 24 },
  };
}
