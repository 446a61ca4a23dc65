import { describe, it, expect } from "vitest";
import { buildSnapshot } from "./modelSchema";
import { evaluateBusinessRules } from "./businessRules";
import { buildTestModelRows } from "./testModel";

describe("evaluateBusinessRules", () => {
  const snapshot = buildSnapshot(buildTestModelRows());

  it("forces a hard kill when a HARD rule matches", () => {
    const result = evaluateBusinessRules(snapshot, { age: 16, ltv: 70 });
    expect(result.hard_kill).toEqual({
      rule_code: "BR-01",
      rule_name: "age < 18",
      severity: "HARD",
      condition: "age < 18",
      triggered_value: 16,
      forced_tier: "RED",
      forced_decision: "DECLINE",
    });
    expect(result.advisories).toEqual([]);
  });

  it("collects SOFT matches as advisories without forcing anything", () => {
    const result = evaluateBusinessRules(snapshot, { age: 30, ltv: 92 });
    expect(result.hard_kill).toBeNull();
    expect(result.advisories.map((r) => r.rule_code)).toEqual(["BR-09"]);
  });

  it("stops at the first HARD match in rule_code order", () => {
    const rows = buildTestModelRows();
    rows.rules = rows.rules.map((r) => (r.rule_code === "BR-09" ? { ...r, rule_code: "BR-00" } : r));
    const result = evaluateBusinessRules(buildSnapshot(rows), { age: 16, ltv: 130 });
    expect(result.advisories.map((r) => r.rule_code)).toEqual(["BR-00"]);
    expect(result.hard_kill?.rule_code).toBe("BR-01");
  });

  it("does not trigger a rule whose field is absent", () => {
    const result = evaluateBusinessRules(snapshot, { ltv: 80 });
    expect(result.hard_kill).toBeNull();
    expect(result.unresolved_fields).toEqual(["age"]);
  });

  it("treats a value the operator cannot compare as unresolved", () => {
    const result = evaluateBusinessRules(snapshot, { age: "sixteen", ltv: 80 });
    expect(result.hard_kill).toBeNull();
    expect(result.unresolved_fields).toEqual(["age"]);
  });

  it("applies a segment-scoped rule only to that segment", () => {
    const rows = buildTestModelRows();
    rows.rules = rows.rules.map((r) => (r.rule_code === "BR-01" ? { ...r, party_scope: "B2C" as const } : r));
    const scoped = buildSnapshot(rows);

    const company = evaluateBusinessRules(scoped, { party_type: "B2B", ltv: 80 });
    expect(company.hard_kill).toBeNull();
    expect(company.unresolved_fields).toEqual([]);

    const person = evaluateBusinessRules(scoped, { party_type: "B2C", age: 16, ltv: 80 });
    expect(person.hard_kill?.rule_code).toBe("BR-01");
    expect(evaluateBusinessRules(scoped, { age: 16, ltv: 80 }).hard_kill?.rule_code).toBe("BR-01");
  });

  it("skips disabled rules", () => {
    const rows = buildTestModelRows();
    rows.rules = rows.rules.map((r) => (r.rule_code === "BR-01" ? { ...r, enabled: false } : r));
    const result = evaluateBusinessRules(buildSnapshot(rows), { age: 16, ltv: 70 });
    expect(result.hard_kill).toBeNull();
  });
});
