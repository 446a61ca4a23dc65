import { describe, it, expect } from "vitest";
import { buildAuditEntry, fieldChangeEntries, formatAuditValue } from "./auditLog";

const who = { actor: "alice", at: "2026-03-01T10:00:00.000Z", reason: "quarterly recalibration" };

describe("formatAuditValue", () => {
  it("stores every value as text or null", () => {
    expect(formatAuditValue(null)).toBeNull();
    expect(formatAuditValue(undefined)).toBeNull();
    expect(formatAuditValue(-5)).toBe("-5");
    expect(formatAuditValue(false)).toBe("false");
    expect(formatAuditValue("B")).toBe("B");
    expect(formatAuditValue({ a: 1 })).toBe('{"a":1}');
  });
});

describe("buildAuditEntry", () => {
  it("fills actor, timestamp and reason", () => {
    const entry = buildAuditEntry(who, {
      version_id: "1.2.1",
      action: "UPDATED",
      table_name: "scoring_factor_bins",
      record_id: "LTV-1",
      field_name: "raw_score",
      old_value: 8,
      new_value: 10,
    });
    expect(entry).toMatchObject({
      version_id: "1.2.1",
      action: "UPDATED",
      table_name: "scoring_factor_bins",
      record_id: "LTV-1",
      field_name: "raw_score",
      old_value: "8",
      new_value: "10",
      changed_by: "alice",
      changed_at: "2026-03-01T10:00:00.000Z",
      change_reason: "quarterly recalibration",
    });
    expect(entry.id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it("defaults optional columns to null", () => {
    const entry = buildAuditEntry({ actor: "bob", at: who.at }, { version_id: "1.2.1", action: "CREATED", table_name: "model_versions" });
    expect(entry).toMatchObject({ record_id: null, field_name: null, old_value: null, new_value: null, change_reason: null });
  });
});

describe("fieldChangeEntries", () => {
  const target = { version_id: "1.2.1", action: "UPDATED" as const, table_name: "scoring_factor_bins", record_id: "LTV-1" };

  it("emits one entry per field that actually changes", () => {
    const entries = fieldChangeEntries(
      who,
      target,
      { raw_score: 8, bin_label: "<75%", upper_bound: 75 },
      { raw_score: 10, bin_label: "<75%", upper_bound: undefined }
    );
    expect(entries.map((e) => [e.field_name, e.old_value, e.new_value])).toEqual([["raw_score", "8", "10"]]);
  });

  it("records a change to null", () => {
    const entries = fieldChangeEntries(who, target, { risk_interpretation: "Low" }, { risk_interpretation: null });
    expect(entries.map((e) => [e.field_name, e.old_value, e.new_value])).toEqual([["risk_interpretation", "Low", null]]);
  });
});
