/**
 * Calibration governance: draft creation, field edits and publish.
 *
 * Only DRAFT versions are editable (ImmutableVersionError otherwise). Every edit validates the
 * incoming values first (ValidationError, nothing written) and then writes the record together with
 * one UPDATED audit entry per field that actually changed. Publish validates the whole version,
 * swaps the published pointer with a compare-and-swap and writes the publish audit in one store call.
 * Operations on one version are serialized in-process by withVersionLock.
 */

import { z } from "zod";
import { ImmutableVersionError, NotFoundError, ValidationError } from "../errors";
import { createLogger } from "../logger";
import {
  binRowSchema,
  businessRuleRowSchema,
  factorRowSchema,
  modelVersionRowsSchema,
  tierRowSchema,
} from "../scoring/modelSchema";
import type { AuditLogEntry, ModelVersionRecord, ModelVersionRows } from "../scoring/modelVersion";
import { compileCondition } from "../scoring/ruleCondition";
import { buildAuditEntry, fieldChangeEntries, type AuditActor } from "./auditLog";
import type { CalibrationStore, CalibrationTable, EditableFields, TableRecords } from "./calibrationStore";
import { validateModelVersion } from "./publishValidation";
import { diffModelVersions } from "./versionDiff";
import { withVersionLock } from "./versionLock";

const log = createLogger("calibration");

const VERSION_TABLE = "model_versions";
const SEMVER = /^(\d+)\.(\d+)\.(\d+)$/;

const factorEditSchema = factorRowSchema.omit({ id: true, version_id: true, factor_name: true }).partial().strict();
const binEditSchema = binRowSchema.omit({ id: true, version_id: true, factor_name: true }).partial().strict();
const tierEditSchema = tierRowSchema.omit({ id: true, version_id: true, tier_name: true }).partial().strict();
const ruleEditSchema = businessRuleRowSchema.omit({ id: true, version_id: true, rule_code: true }).partial().strict();

export type FactorChanges = EditableFields<"scoring_factor_config">;
export type BinChanges = EditableFields<"scoring_factor_bins">;
export type TierChanges = EditableFields<"scoring_tier_thresholds">;
export type RuleChanges = EditableFields<"business_rules">;

/** Rows for a draft built from scratch; version_id on each record is overwritten. */
export type DraftContent = Omit<ModelVersionRows, "version">;

export type CreateDraftParams = {
  /** Version to clone; null builds from scratch (optionally from `content`). */
  baseVersionId: string | null;
  /** Defaults to the next free patch version above the highest existing one. */
  versionId?: string;
  description?: string | null;
  actor: string;
  reason?: string | null;
  content?: DraftContent;
};

export type PublishResult = {
  version_id: string;
  archived_version_id: string | null;
  changed_fields: number;
  audit_entries: number;
};

function issuesOf(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
}

function nowIso(): string {
  return new Date().toISOString();
}

/** Next patch version above the highest MAJOR.MINOR.PATCH id; "1.0.0" when there is none. */
export function nextPatchVersion(existingIds: readonly string[]): string {
  let best: [number, number, number] | null = null;
  for (const id of existingIds) {
    const m = SEMVER.exec(id);
    if (!m) continue;
    const v: [number, number, number] = [Number(m[1]), Number(m[2]), Number(m[3])];
    if (!best || v[0] > best[0] || (v[0] === best[0] && (v[1] > best[1] || (v[1] === best[1] && v[2] > best[2])))) {
      best = v;
    }
  }
  return best ? `${best[0]}.${best[1]}.${best[2] + 1}` : "1.0.0";
}

async function requireDraftRows(store: CalibrationStore, versionId: string): Promise<ModelVersionRows> {
  const version = await store.getVersion(versionId);
  if (!version) throw new NotFoundError("Model version", versionId);
  if (version.status !== "DRAFT") throw new ImmutableVersionError(versionId, version.status);
  const rows = await store.loadRows(versionId);
  if (!rows) throw new NotFoundError("Model version", versionId);
  return rows;
}

function withVersionId<R extends { version_id: string }>(records: readonly R[], versionId: string): R[] {
  return records.map((r) => ({ ...r, version_id: versionId }));
}

export async function createDraft(store: CalibrationStore, params: CreateDraftParams): Promise<ModelVersionRecord> {
  const existing = await store.listVersions();
  const versionId = params.versionId ?? nextPatchVersion(existing.map((v) => v.version_id));
  if (!SEMVER.test(versionId)) {
    throw new ValidationError([`version_id ${versionId} is not MAJOR.MINOR.PATCH`], "Invalid draft");
  }
  if (existing.some((v) => v.version_id === versionId)) {
    throw new ValidationError([`version_id ${versionId} already exists`], "Invalid draft");
  }

  let source: DraftContent = params.content ?? { factors: [], bins: [], tiers: [], rules: [] };
  if (params.baseVersionId != null) {
    const base = await store.loadRows(params.baseVersionId);
    if (!base) throw new NotFoundError("Model version", params.baseVersionId);
    source = base;
  }

  const at = nowIso();
  const candidate: ModelVersionRows = {
    version: {
      version_id: versionId,
      description: params.description ?? null,
      status: "DRAFT",
      created_at: at,
      created_by: params.actor,
      published_at: null,
      published_by: null,
      base_version_id: params.baseVersionId,
    },
    factors: withVersionId(source.factors, versionId),
    bins: withVersionId(source.bins, versionId),
    tiers: withVersionId(source.tiers, versionId),
    rules: withVersionId(source.rules, versionId),
  };
  const parsed = modelVersionRowsSchema.safeParse(candidate);
  if (!parsed.success) throw new ValidationError(issuesOf(parsed.error), "Invalid draft content");

  const audit = [
    buildAuditEntry(
      { actor: params.actor, at, reason: params.reason },
      {
        version_id: versionId,
        action: "CREATED",
        table_name: VERSION_TABLE,
        record_id: versionId,
        field_name: "base_version_id",
        old_value: null,
        new_value: params.baseVersionId,
      }
    ),
  ];
  await store.insertVersion(parsed.data, audit);
  log.info("draft created", { version_id: versionId, base_version_id: params.baseVersionId, actor: params.actor });
  return parsed.data.version;
}

type EditPlan<T extends CalibrationTable> = {
  table: T;
  versionId: string;
  recordId: string;
  changes: EditableFields<T>;
  find: (rows: ModelVersionRows) => TableRecords[T] | undefined;
  check: (merged: TableRecords[T], rows: ModelVersionRows) => string[];
  actor: string;
  reason?: string | null;
};

async function editRecord<T extends CalibrationTable>(store: CalibrationStore, plan: EditPlan<T>): Promise<AuditLogEntry[]> {
  return withVersionLock(plan.versionId, async () => {
    const rows = await requireDraftRows(store, plan.versionId);
    const record = plan.find(rows);
    if (!record) throw new NotFoundError(plan.table, `${plan.versionId}/${plan.recordId}`);

    const merged = { ...record };
    for (const [key, value] of Object.entries(plan.changes)) {
      if (value !== undefined) Object.assign(merged, { [key]: value });
    }
    const violations = plan.check(merged, rows);
    if (violations.length > 0) throw new ValidationError(violations, `Invalid ${plan.table} edit`);

    const who: AuditActor = { actor: plan.actor, at: nowIso(), reason: plan.reason };
    const entries = fieldChangeEntries(
      who,
      { version_id: plan.versionId, action: "UPDATED", table_name: plan.table, record_id: plan.recordId },
      record,
      plan.changes
    );
    if (entries.length === 0) return entries;

    await store.updateRecord(plan.versionId, plan.table, plan.recordId, plan.changes, entries);
    log.info("draft record updated", {
      version_id: plan.versionId,
      table: plan.table,
      record_id: plan.recordId,
      fields: entries.map((e) => e.field_name),
      actor: plan.actor,
    });
    return entries;
  });
}

function parseChanges<S extends z.ZodTypeAny>(schema: S, changes: unknown, table: CalibrationTable): z.output<S> {
  const result = schema.safeParse(changes);
  if (!result.success) throw new ValidationError(issuesOf(result.error), `Invalid ${table} edit`);
  return result.data;
}

export async function updateFactor(
  store: CalibrationStore,
  draftId: string,
  factorId: string,
  changes: FactorChanges,
  actor: string,
  reason?: string | null
): Promise<AuditLogEntry[]> {
  const parsed: FactorChanges = parseChanges(factorEditSchema, changes, "scoring_factor_config");
  return editRecord(store, {
    table: "scoring_factor_config",
    versionId: draftId,
    recordId: factorId,
    changes: parsed,
    find: (rows) => rows.factors.find((f) => f.id === factorId),
    check: (f) => {
      const violations: string[] = [];
      if (f.weight < 0 || f.weight > 1) violations.push(`weight ${f.weight} outside [0, 1]`);
      if (f.score_range_min != null && f.score_range_max != null && f.score_range_min > f.score_range_max) {
        violations.push(`score_range_min ${f.score_range_min} > score_range_max ${f.score_range_max}`);
      }
      return violations;
    },
    actor,
    reason,
  });
}

export async function updateBinFields(
  store: CalibrationStore,
  draftId: string,
  binId: string,
  changes: BinChanges,
  actor: string,
  reason?: string | null
): Promise<AuditLogEntry[]> {
  const parsed: BinChanges = parseChanges(binEditSchema, changes, "scoring_factor_bins");
  return editRecord(store, {
    table: "scoring_factor_bins",
    versionId: draftId,
    recordId: binId,
    changes: parsed,
    find: (rows) => rows.bins.find((b) => b.id === binId),
    check: (b, rows) => {
      const violations: string[] = [];
      if (b.lower_bound != null && b.upper_bound != null && b.lower_bound > b.upper_bound) {
        violations.push(`lower_bound ${b.lower_bound} > upper_bound ${b.upper_bound}`);
      }
      if (b.match_value != null && (b.lower_bound != null || b.upper_bound != null)) {
        violations.push("a bin is either numeric (bounds) or categorical (match_value), not both");
      }
      const siblings = rows.bins.filter((o) => o.factor_name === b.factor_name && o.id !== b.id);
      if (siblings.some((o) => o.bin_order === b.bin_order)) {
        violations.push(`bin_order ${b.bin_order} already used by factor ${b.factor_name}`);
      }
      return violations;
    },
    actor,
    reason,
  });
}

/** Recalibrate one bin's raw_score. */
export async function updateBin(
  store: CalibrationStore,
  draftId: string,
  binId: string,
  newScore: number,
  actor: string,
  reason?: string | null
): Promise<AuditLogEntry[]> {
  return updateBinFields(store, draftId, binId, { raw_score: newScore }, actor, reason);
}

export async function updateTier(
  store: CalibrationStore,
  draftId: string,
  tierId: string,
  changes: TierChanges,
  actor: string,
  reason?: string | null
): Promise<AuditLogEntry[]> {
  const parsed: TierChanges = parseChanges(tierEditSchema, changes, "scoring_tier_thresholds");
  return editRecord(store, {
    table: "scoring_tier_thresholds",
    versionId: draftId,
    recordId: tierId,
    changes: parsed,
    find: (rows) => rows.tiers.find((t) => t.id === tierId),
    check: (t) =>
      t.estimated_pd != null && (t.estimated_pd < 0 || t.estimated_pd > 1)
        ? [`estimated_pd ${t.estimated_pd} outside [0, 1]`]
        : [],
    actor,
    reason,
  });
}

export async function updateRule(
  store: CalibrationStore,
  draftId: string,
  ruleId: string,
  changes: RuleChanges,
  actor: string,
  reason?: string | null
): Promise<AuditLogEntry[]> {
  const parsed: RuleChanges = parseChanges(ruleEditSchema, changes, "business_rules");
  return editRecord(store, {
    table: "business_rules",
    versionId: draftId,
    recordId: ruleId,
    changes: parsed,
    find: (rows) => rows.rules.find((r) => r.id === ruleId),
    check: (r, rows) => {
      const violations: string[] = [];
      const compiled = compileCondition(r.condition_field, r.condition_operator, r.condition_value);
      if (!compiled.ok) violations.push(compiled.error);
      if (!rows.tiers.some((t) => t.tier_name === r.forced_tier)) {
        violations.push(`forced_tier ${r.forced_tier} is not a defined tier`);
      }
      return violations;
    },
    actor,
    reason,
  });
}

/** Delete a DRAFT. Its audit entries stay, plus one recording the discard. */
export async function discardDraft(
  store: CalibrationStore,
  draftId: string,
  actor: string,
  reason?: string | null
): Promise<void> {
  await withVersionLock(draftId, async () => {
    await requireDraftRows(store, draftId);
    const entry = buildAuditEntry(
      { actor, at: nowIso(), reason },
      {
        version_id: draftId,
        action: "ARCHIVED",
        table_name: VERSION_TABLE,
        record_id: draftId,
        field_name: "status",
        old_value: "DRAFT",
        new_value: "DISCARDED",
      }
    );
    await store.deleteDraft(draftId, [entry]);
    log.info("draft discarded", { version_id: draftId, actor });
  });
}

/**
 * Validate and publish a DRAFT. On any violation nothing is written and ValidationError lists them all.
 * Audit: one PUBLISHED entry per net changed field against the base version, one for the version itself,
 * and one ARCHIVED entry for the version it replaces.
 */
export async function publish(
  store: CalibrationStore,
  draftId: string,
  actor: string,
  reason?: string | null
): Promise<PublishResult> {
  return withVersionLock(draftId, async () => {
    // Every edit appends audit; the count pins the content that gets validated below.
    const expectedAuditCount = (await store.listAudit(draftId)).length;
    const rows = await requireDraftRows(store, draftId);

    const violations = validateModelVersion(rows);
    if (violations.length > 0) {
      log.warn("publish rejected", { version_id: draftId, violations: violations.length });
      throw new ValidationError(violations, `Model version ${draftId} cannot be published`);
    }

    const baseId = rows.version.base_version_id;
    const base = baseId ? await store.loadRows(baseId) : null;
    const changes = diffModelVersions(base, rows);
    const priorId = await store.getPublishedVersionId();

    const who: AuditActor = { actor, at: nowIso(), reason };
    const audit: AuditLogEntry[] = changes.map((c) =>
      buildAuditEntry(who, { version_id: draftId, action: "PUBLISHED", ...c })
    );
    audit.push(
      buildAuditEntry(who, {
        version_id: draftId,
        action: "PUBLISHED",
        table_name: VERSION_TABLE,
        record_id: draftId,
        field_name: "status",
        old_value: "DRAFT",
        new_value: "PUBLISHED",
      })
    );
    if (priorId) {
      audit.push(
        buildAuditEntry(who, {
          version_id: priorId,
          action: "ARCHIVED",
          table_name: VERSION_TABLE,
          record_id: priorId,
          field_name: "status",
          old_value: "PUBLISHED",
          new_value: "ARCHIVED",
        })
      );
    }

    const outcome = await store.publishVersion({
      versionId: draftId,
      expectedPublishedId: priorId,
      expectedAuditCount,
      actor,
      publishedAt: who.at,
      audit,
    });
    log.info("model version published", {
      version_id: draftId,
      archived_version_id: outcome.archivedVersionId,
      changed_fields: changes.length,
      actor,
    });
    return {
      version_id: draftId,
      archived_version_id: outcome.archivedVersionId,
      changed_fields: changes.length,
      audit_entries: audit.length,
    };
  });
}
