/**
 * Business rule conditions as a small tagged expression, compiled once when a version is loaded.
 * condition_field / condition_operator / condition_value strings from the store become a typed
 * variant; unknown operators and non-numeric literals for ordering operators are rejected here,
 * never at evaluation time.
 */

import { RULE_OPERATORS, type AttributeValue, type RuleOperator } from "./modelVersion";

export type RuleLiteral = number | string | boolean;

export type RuleCondition =
  | { kind: "compare"; field: string; op: "<" | ">" | "<=" | ">="; value: number }
  | { kind: "equality"; field: string; op: "==" | "!="; value: RuleLiteral }
  | { kind: "membership"; field: string; values: RuleLiteral[] };

export type CompileResult =
  | { ok: true; condition: RuleCondition }
  | { ok: false; error: string };

export function isRuleOperator(op: string): op is RuleOperator {
  return RULE_OPERATORS.some((o) => o === op);
}

/** "18" → 18, "true" → true, anything else stays a trimmed string. */
export function parseLiteral(raw: string): RuleLiteral {
  const s = raw.trim();
  if (s === "true") return true;
  if (s === "false") return false;
  if (s !== "" && Number.isFinite(Number(s))) return Number(s);
  return s;
}

export function compileCondition(field: string, operator: string, rawValue: string): CompileResult {
  const f = field.trim();
  const op = operator.trim();
  if (!f) return { ok: false, error: "condition_field is empty" };
  if (!isRuleOperator(op)) return { ok: false, error: `unknown operator "${operator}"` };

  switch (op) {
    case "<":
    case ">":
    case "<=":
    case ">=": {
      const value = parseLiteral(rawValue);
      if (typeof value !== "number") {
        return { ok: false, error: `operator ${op} requires a numeric value, got "${rawValue}"` };
      }
      return { ok: true, condition: { kind: "compare", field: f, op, value } };
    }
    case "==":
    case "!=":
      if (rawValue.trim() === "") return { ok: false, error: `operator ${op} requires a value` };
      return { ok: true, condition: { kind: "equality", field: f, op, value: parseLiteral(rawValue) } };
    case "IN": {
      const values = rawValue
        .split(",")
        .map((v) => v.trim())
        .filter(Boolean)
        .map(parseLiteral);
      if (values.length === 0) return { ok: false, error: "operator IN requires at least one value" };
      return { ok: true, condition: { kind: "membership", field: f, values } };
    }
  }
}

function literalEquals(attr: AttributeValue, literal: RuleLiteral): boolean {
  if (typeof literal === "number") return typeof attr === "number" && attr === literal;
  if (typeof literal === "boolean") return typeof attr === "boolean" && attr === literal;
  return attr != null && String(attr) === literal;
}

/**
 * Evaluate a compiled condition against a present attribute value.
 * Returns null when the value's type cannot be compared (e.g. a string against "<").
 */
export function testCondition(condition: RuleCondition, value: Exclude<AttributeValue, null>): boolean | null {
  switch (condition.kind) {
    case "compare": {
      if (typeof value !== "number" || Number.isNaN(value)) return null;
      switch (condition.op) {
        case "<":
          return value < condition.value;
        case ">":
          return value > condition.value;
        case "<=":
          return value <= condition.value;
        case ">=":
          return value >= condition.value;
      }
      return null;
    }
    case "equality": {
      const eq = literalEquals(value, condition.value);
      return condition.op === "==" ? eq : !eq;
    }
    case "membership":
      return condition.values.some((lit) => literalEquals(value, lit));
  }
}

/** Human-readable form, e.g. "age < 18" or "permit_type IN (B, L)". */
export function describeCondition(condition: RuleCondition): string {
  switch (condition.kind) {
    case "compare":
    case "equality":
      return `${condition.field} ${condition.op} ${String(condition.value)}`;
    case "membership":
      return `${condition.field} IN (${condition.values.map(String).join(", ")})`;
  }
}
