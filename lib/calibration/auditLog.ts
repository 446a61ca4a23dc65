/**
 * Audit entry builders. Entries are append-only; values are stored as text
 * (numbers/booleans via String, null stays null) so every column type diffs the same way.
 */

import { randomUUID } from "crypto";
import type { AuditAction, AuditLogEntry } from "../scoring/modelVersion";

export type AuditActor = {
  actor: string;
  /** ISO timestamp shared by every entry of one operation. */
  at: string;
  reason?: string | null;
};

export type AuditTarget = {
  version_id: string;
  action: AuditAction;
  table_name: string;
  record_id?: string | null;
  field_name?: string | null;
  old_value?: unknown;
  new_value?: unknown;
};

export function formatAuditValue(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return JSON.stringify(value);
}

export function buildAuditEntry(who: AuditActor, target: AuditTarget): AuditLogEntry {
  return {
    id: randomUUID(),
    version_id: target.version_id,
    action: target.action,
    table_name: target.table_name,
    record_id: target.record_id ?? null,
    field_name: target.field_name ?? null,
    old_value: formatAuditValue(target.old_value),
    new_value: formatAuditValue(target.new_value),
    changed_by: who.actor,
    changed_at: who.at,
    change_reason: who.reason ?? null,
  };
}

/**
 * One entry per field whose value actually changes; unchanged (and undefined) fields emit nothing.
 * `current` is the record before the edit.
 */
export function fieldChangeEntries(
  who: AuditActor,
  target: { version_id: string; action: AuditAction; table_name: string; record_id: string },
  current: object,
  changes: object
): AuditLogEntry[] {
  const before = new Map<string, unknown>(Object.entries(current));
  const entries: AuditLogEntry[] = [];
  for (const [field, next] of Object.entries(changes)) {
    if (next === undefined) continue;
    const prev = before.get(field);
    if (formatAuditValue(prev) === formatAuditValue(next)) continue;
    entries.push(buildAuditEntry(who, { ...target, field_name: field, old_value: prev, new_value: next }));
  }
  return entries;
}
