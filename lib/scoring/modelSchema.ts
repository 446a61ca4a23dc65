/**
 * Zod schemas for calibration store rows (untrusted input) and snapshot assembly.
 * A snapshot is built once per version: rows are validated, rule conditions compiled,
 * lists sorted into evaluation order and everything frozen.
 */

import { z } from "zod";
import { ConfigError } from "../errors";
import {
  AUDIT_ACTIONS,
  PARTY_SCOPES,
  RULE_SEVERITIES,
  VERSION_STATUSES,
  type BinRecord,
  type CompiledRule,
  type FactorRecord,
  type ModelSnapshot,
  type ModelVersionRows,
  type TierRecord,
} from "./modelVersion";
import { compileCondition } from "./ruleCondition";

const id = z.union([z.string().min(1), z.number()]).transform(String);
const num = z.coerce.number().refine(Number.isFinite, "must be a finite number");
const nullableNum = z
  .union([z.number(), z.string(), z.null()])
  .optional()
  .transform((v, ctx) => {
    if (v == null || v === "") return null;
    const n = Number(v);
    if (!Number.isFinite(n)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must be a finite number or null" });
      return z.NEVER;
    }
    return n;
  });
const nullableText = z.string().nullable().optional().transform((v) => v ?? null);
const timestamp = z.union([z.string(), z.date()]).transform((v) => (typeof v === "string" ? v : v.toISOString()));

export const modelVersionRowSchema = z.object({
  version_id: z.string().min(1),
  description: nullableText,
  status: z.enum(VERSION_STATUSES),
  created_at: timestamp,
  created_by: z.string().min(1),
  published_at: timestamp.nullable().optional().transform((v) => v ?? null),
  published_by: nullableText,
  base_version_id: nullableText,
});

export const factorRowSchema = z.object({
  id,
  version_id: z.string().min(1),
  factor_name: z.string().min(1),
  input_field: z.string().min(1),
  weight: num,
  enabled: z.boolean(),
  nullable: z.boolean().default(false),
  description: nullableText,
  score_range_min: nullableNum,
  score_range_max: nullableNum,
  display_order: z.coerce.number().int(),
  party_scope: z.enum(PARTY_SCOPES).default("ALL"),
});

export const binRowSchema = z.object({
  id,
  version_id: z.string().min(1),
  factor_name: z.string().min(1),
  bin_order: z.coerce.number().int(),
  bin_label: z.string().min(1),
  lower_bound: nullableNum,
  upper_bound: nullableNum,
  lower_inclusive: z.boolean().default(true),
  upper_inclusive: z.boolean().default(true),
  match_value: nullableText,
  is_missing_bin: z.boolean().default(false),
  raw_score: num,
  risk_interpretation: nullableText,
});

export const tierRowSchema = z.object({
  id,
  version_id: z.string().min(1),
  tier_name: z.string().min(1),
  tier_order: z.coerce.number().int(),
  min_score: nullableNum,
  decision: z.string().min(1),
  estimated_pd: nullableNum,
  color_hex: nullableText,
  description: nullableText,
});

export const businessRuleRowSchema = z.object({
  id,
  version_id: z.string().min(1),
  rule_code: z.string().min(1),
  rule_name: z.string().min(1),
  description: nullableText,
  condition_field: z.string().min(1),
  condition_operator: z.string().min(1),
  condition_value: z.string(),
  forced_tier: z.string().min(1).default("RED"),
  forced_decision: z.string().min(1).default("DECLINE"),
  severity: z.enum(RULE_SEVERITIES).default("HARD"),
  enabled: z.boolean().default(true),
  party_scope: z.enum(PARTY_SCOPES).default("ALL"),
});

export const auditLogRowSchema = z.object({
  id,
  version_id: z.string().min(1),
  action: z.enum(AUDIT_ACTIONS),
  table_name: z.string().min(1),
  record_id: nullableText,
  field_name: nullableText,
  old_value: nullableText,
  new_value: nullableText,
  changed_by: z.string().min(1),
  changed_at: timestamp,
  change_reason: nullableText,
});

export const modelVersionRowsSchema = z.object({
  version: modelVersionRowSchema,
  factors: z.array(factorRowSchema),
  bins: z.array(binRowSchema),
  tiers: z.array(tierRowSchema),
  rules: z.array(businessRuleRowSchema),
});

/** Validate raw rows of one version. Throws ConfigError listing every malformed field. */
export function parseModelVersionRows(raw: unknown): ModelVersionRows {
  const result = modelVersionRowsSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigError(`Malformed model version rows: ${issues.join("; ")}`, { issues });
  }
  return result.data;
}

function byNumber<T>(key: (t: T) => number): (a: T, b: T) => number {
  return (a, b) => key(a) - key(b);
}

function deepFreeze<T extends object>(obj: T): T {
  for (const value of Object.values(obj)) {
    if (value && typeof value === "object" && !Object.isFrozen(value)) deepFreeze(value);
  }
  return Object.freeze(obj);
}

/**
 * Assemble an immutable snapshot from validated rows.
 * Throws ConfigError when a rule condition cannot be compiled (unknown operator, bad literal).
 */
export function buildSnapshot(rows: ModelVersionRows): ModelSnapshot {
  const factors: FactorRecord[] = rows.factors.map((f) => ({ ...f })).sort(byNumber<FactorRecord>((f) => f.display_order));
  const tiers: TierRecord[] = rows.tiers.map((t) => ({ ...t })).sort(byNumber<TierRecord>((t) => t.tier_order));
  const bins: BinRecord[] = rows.bins.map((b) => ({ ...b }));

  const binsByFactor = new Map<string, BinRecord[]>();
  const binById = new Map<string, BinRecord>();
  for (const bin of bins) {
    const list = binsByFactor.get(bin.factor_name) ?? [];
    list.push(bin);
    binsByFactor.set(bin.factor_name, list);
    binById.set(bin.id, bin);
  }
  for (const list of binsByFactor.values()) list.sort(byNumber<BinRecord>((b) => b.bin_order));

  const errors: string[] = [];
  const rules: CompiledRule[] = [];
  for (const rule of rows.rules) {
    const compiled = compileCondition(rule.condition_field, rule.condition_operator, rule.condition_value);
    if (!compiled.ok) {
      errors.push(`rule ${rule.rule_code}: ${compiled.error}`);
      continue;
    }
    rules.push({ ...rule, condition: compiled.condition });
  }
  if (errors.length > 0) {
    throw new ConfigError(`Model version ${rows.version.version_id} has invalid rule conditions: ${errors.join("; ")}`, {
      version_id: rows.version.version_id,
      errors,
    });
  }
  rules.sort((a, b) => (a.rule_code < b.rule_code ? -1 : a.rule_code > b.rule_code ? 1 : 0));

  const snapshot: ModelSnapshot = {
    version: { ...rows.version },
    factors,
    tiers,
    rules,
    binsByFactor,
    factorByName: new Map(factors.map((f) => [f.factor_name, f])),
    binById,
    tierByName: new Map(tiers.map((t) => [t.tier_name, t])),
    ruleByCode: new Map(rules.map((r) => [r.rule_code, r])),
  };
  deepFreeze(snapshot.version);
  for (const list of [factors, tiers, rules, bins]) {
    for (const item of list) deepFreeze(item);
    Object.freeze(list);
  }
  for (const list of binsByFactor.values()) Object.freeze(list);
  return Object.freeze(snapshot);
}

/** Copy a snapshot back into plain rows (compiled conditions dropped) for cloning or diffing. */
export function snapshotToRows(snapshot: ModelSnapshot): ModelVersionRows {
  const bins: BinRecord[] = [];
  for (const list of snapshot.binsByFactor.values()) for (const b of list) bins.push({ ...b });
  return {
    version: { ...snapshot.version },
    factors: snapshot.factors.map((f) => ({ ...f })),
    bins,
    tiers: snapshot.tiers.map((t) => ({ ...t })),
    rules: snapshot.rules.map(({ condition: _condition, ...rule }) => rule),
  };
}
