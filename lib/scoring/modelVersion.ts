/**
 * Model version records and the immutable snapshot scoring runs against.
 * Record shapes mirror the calibration store rows (snake_case); a snapshot is one whole
 * version loaded at once, frozen and indexed for lookup by name / id.
 */

import type { RuleCondition } from "./ruleCondition";

export const VERSION_STATUSES = ["DRAFT", "PUBLISHED", "ARCHIVED"] as const;
export type VersionStatus = (typeof VERSION_STATUSES)[number];

export const RULE_OPERATORS = ["<", ">", "<=", ">=", "==", "!=", "IN"] as const;
export type RuleOperator = (typeof RULE_OPERATORS)[number];

export const RULE_SEVERITIES = ["HARD", "SOFT"] as const;
export type RuleSeverity = (typeof RULE_SEVERITIES)[number];

/** Applicant segment a factor or rule applies to. */
export const PARTY_SCOPES = ["ALL", "B2C", "B2B"] as const;
export type PartyScope = (typeof PARTY_SCOPES)[number];

export const AUDIT_ACTIONS = ["CREATED", "UPDATED", "PUBLISHED", "ARCHIVED"] as const;
export type AuditAction = (typeof AUDIT_ACTIONS)[number];

export type ModelVersionRecord = {
  version_id: string;
  description: string | null;
  status: VersionStatus;
  created_at: string;
  created_by: string;
  published_at: string | null;
  published_by: string | null;
  /** Version this draft was cloned from; null when built from scratch. */
  base_version_id: string | null;
};

export type FactorRecord = {
  id: string;
  version_id: string;
  factor_name: string;
  /** Applicant attribute the factor bins, e.g. "ltv" for LTV. */
  input_field: string;
  /** Reporting only; never multiplies the raw score. */
  weight: number;
  enabled: boolean;
  /** Input may be absent; requires exactly one missing bin when enabled. */
  nullable: boolean;
  description: string | null;
  score_range_min: number | null;
  score_range_max: number | null;
  display_order: number;
  party_scope: PartyScope;
};

export type BinRecord = {
  id: string;
  version_id: string;
  factor_name: string;
  bin_order: number;
  bin_label: string;
  lower_bound: number | null;
  upper_bound: number | null;
  lower_inclusive: boolean;
  upper_inclusive: boolean;
  match_value: string | null;
  is_missing_bin: boolean;
  raw_score: number;
  risk_interpretation: string | null;
};

export type TierRecord = {
  id: string;
  version_id: string;
  tier_name: string;
  tier_order: number;
  /** null only for the catch-all tier. */
  min_score: number | null;
  decision: string;
  estimated_pd: number | null;
  color_hex: string | null;
  description: string | null;
};

export type BusinessRuleRecord = {
  id: string;
  version_id: string;
  rule_code: string;
  rule_name: string;
  description: string | null;
  condition_field: string;
  condition_operator: string;
  condition_value: string;
  forced_tier: string;
  forced_decision: string;
  severity: RuleSeverity;
  enabled: boolean;
  party_scope: PartyScope;
};

export type AuditLogEntry = {
  id: string;
  version_id: string;
  action: AuditAction;
  table_name: string;
  record_id: string | null;
  field_name: string | null;
  old_value: string | null;
  new_value: string | null;
  changed_by: string;
  changed_at: string;
  change_reason: string | null;
};

/** Raw rows of one version, as stored. */
export type ModelVersionRows = {
  version: ModelVersionRecord;
  factors: FactorRecord[];
  bins: BinRecord[];
  tiers: TierRecord[];
  rules: BusinessRuleRecord[];
};

export type CompiledRule = BusinessRuleRecord & { condition: RuleCondition };

export type ModelSnapshot = {
  readonly version: Readonly<ModelVersionRecord>;
  /** Sorted by display_order. */
  readonly factors: readonly Readonly<FactorRecord>[];
  /** Sorted by tier_order. */
  readonly tiers: readonly Readonly<TierRecord>[];
  /** Sorted by rule_code. */
  readonly rules: readonly Readonly<CompiledRule>[];
  /** Bins per factor name, sorted by bin_order. */
  readonly binsByFactor: ReadonlyMap<string, readonly Readonly<BinRecord>[]>;
  readonly factorByName: ReadonlyMap<string, Readonly<FactorRecord>>;
  readonly binById: ReadonlyMap<string, Readonly<BinRecord>>;
  readonly tierByName: ReadonlyMap<string, Readonly<TierRecord>>;
  readonly ruleByCode: ReadonlyMap<string, Readonly<CompiledRule>>;
};

/** Attribute values the engine understands; dates arrive as ISO strings. */
export type AttributeValue = number | string | boolean | null;
export type ApplicantAttributes = Readonly<Record<string, AttributeValue | undefined>>;
