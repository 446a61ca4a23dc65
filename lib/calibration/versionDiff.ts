/**
 * Field-level diff between two versions' rows: what a draft changed relative to the version it was cloned from.
 * Records are matched by id within each table; added and removed records are reported once as a whole.
 */

import type { ModelVersionRows } from "../scoring/modelVersion";
import { formatAuditValue } from "./auditLog";
import { CALIBRATION_TABLES, type CalibrationTable } from "./calibrationStore";

export type VersionFieldChange = {
  table_name: CalibrationTable;
  record_id: string;
  /** null for a whole-record addition or removal. */
  field_name: string | null;
  old_value: string | null;
  new_value: string | null;
};

type Row = { id: string };

const IGNORED_FIELDS = new Set(["id", "version_id"]);

function tablesOf(rows: ModelVersionRows | null): Record<CalibrationTable, readonly Row[]> {
  return {
    scoring_factor_config: rows?.factors ?? [],
    scoring_factor_bins: rows?.bins ?? [],
    scoring_tier_thresholds: rows?.tiers ?? [],
    business_rules: rows?.rules ?? [],
  };
}

function diffRecords(table: CalibrationTable, before: readonly Row[], after: readonly Row[]): VersionFieldChange[] {
  const out: VersionFieldChange[] = [];
  const beforeById = new Map(before.map((r) => [r.id, r]));
  const afterById = new Map(after.map((r) => [r.id, r]));

  for (const [id, next] of afterById) {
    const prev = beforeById.get(id);
    if (!prev) {
      out.push({ table_name: table, record_id: id, field_name: null, old_value: null, new_value: JSON.stringify(next) });
      continue;
    }
    const prevFields = new Map<string, unknown>(Object.entries(prev));
    for (const [field, value] of Object.entries(next)) {
      if (IGNORED_FIELDS.has(field)) continue;
      const oldValue = formatAuditValue(prevFields.get(field));
      const newValue = formatAuditValue(value);
      if (oldValue !== newValue) {
        out.push({ table_name: table, record_id: id, field_name: field, old_value: oldValue, new_value: newValue });
      }
    }
  }
  for (const [id, prev] of beforeById) {
    if (!afterById.has(id)) {
      out.push({ table_name: table, record_id: id, field_name: null, old_value: JSON.stringify(prev), new_value: null });
    }
  }
  return out;
}

/** Net changes from `base` (null = empty model) to `next`, grouped by table then record id. */
export function diffModelVersions(base: ModelVersionRows | null, next: ModelVersionRows): VersionFieldChange[] {
  const before = tablesOf(base);
  const after = tablesOf(next);
  const out: VersionFieldChange[] = [];
  for (const table of CALIBRATION_TABLES) {
    const changes = diffRecords(table, before[table], after[table]);
    changes.sort((a, b) => a.record_id.localeCompare(b.record_id));
    out.push(...changes);
  }
  return out;
}

export type BinScoreDelta = {
  bin_id: string;
  factor_name: string;
  bin_label: string;
  /** null for a bin the base version did not have. */
  previous_score: number | null;
  current_score: number;
  delta: number | null;
};

/** Net raw_score change per bin; new bins first, then largest absolute move first. */
export function binScoreDeltas(base: ModelVersionRows | null, next: ModelVersionRows): BinScoreDelta[] {
  const prevById = new Map((base?.bins ?? []).map((b) => [b.id, b]));
  return next.bins
    .map((bin) => {
      const previous = prevById.get(bin.id)?.raw_score ?? null;
      return {
        bin_id: bin.id,
        factor_name: bin.factor_name,
        bin_label: bin.bin_label,
        previous_score: previous,
        current_score: bin.raw_score,
        delta: previous == null ? null : bin.raw_score - previous,
      };
    })
    .filter((d) => d.delta !== 0)
    .sort((a, b) => {
      if (a.delta == null || b.delta == null) return a.delta == null ? (b.delta == null ? 0 : -1) : 1;
      return Math.abs(b.delta) - Math.abs(a.delta);
    });
}
