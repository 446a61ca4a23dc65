/**
 * Business rule evaluation, run before scoring.
 * Enabled rules are checked in ascending rule_code order. The first HARD rule whose condition
 * holds ends evaluation and forces its tier/decision; SOFT matches are advisory only.
 * A rule whose field is absent does not trigger: missing data alone never forces a decline.
 * Rules scoped to the other applicant segment are skipped without being reported.
 */

import { MissingFieldError } from "../errors";
import { createLogger } from "../logger";
import type { ApplicantAttributes, AttributeValue, CompiledRule, ModelSnapshot, RuleSeverity } from "./modelVersion";
import { applicantSegment, appliesToSegment } from "./partyScope";
import { describeCondition, testCondition } from "./ruleCondition";

const log = createLogger("rules");

export type TriggeredRule = {
  rule_code: string;
  rule_name: string;
  severity: RuleSeverity;
  condition: string;
  triggered_value: AttributeValue;
  forced_tier: string;
  forced_decision: string;
};

export type RuleEvaluation = {
  hard_kill: TriggeredRule | null;
  advisories: TriggeredRule[];
  /** Fields rules needed but could not resolve (data-quality signal). */
  unresolved_fields: string[];
};

function resolveField(rule: Readonly<CompiledRule>, attributes: ApplicantAttributes): Exclude<AttributeValue, null> {
  const value = attributes[rule.condition.field];
  if (value == null || (typeof value === "number" && Number.isNaN(value))) {
    throw new MissingFieldError(rule.condition.field, rule.rule_code);
  }
  return value;
}

function toTriggered(rule: Readonly<CompiledRule>, value: AttributeValue): TriggeredRule {
  return {
    rule_code: rule.rule_code,
    rule_name: rule.rule_name,
    severity: rule.severity,
    condition: describeCondition(rule.condition),
    triggered_value: value,
    forced_tier: rule.forced_tier,
    forced_decision: rule.forced_decision,
  };
}

export function evaluateBusinessRules(snapshot: ModelSnapshot, attributes: ApplicantAttributes): RuleEvaluation {
  const advisories: TriggeredRule[] = [];
  const unresolved = new Set<string>();
  const segment = applicantSegment(attributes);

  for (const rule of snapshot.rules) {
    if (!rule.enabled || !appliesToSegment(rule.party_scope, segment)) continue;

    let value: Exclude<AttributeValue, null>;
    try {
      value = resolveField(rule, attributes);
    } catch (err) {
      if (!(err instanceof MissingFieldError)) throw err;
      unresolved.add(err.field);
      log.debug("rule field unresolved; treated as not triggered", {
        version_id: snapshot.version.version_id,
        rule_code: rule.rule_code,
        field: err.field,
      });
      continue;
    }

    const holds = testCondition(rule.condition, value);
    if (holds == null) {
      unresolved.add(rule.condition.field);
      log.warn("rule field has a type the operator cannot compare; treated as not triggered", {
        version_id: snapshot.version.version_id,
        rule_code: rule.rule_code,
        field: rule.condition.field,
        value_type: typeof value,
      });
      continue;
    }
    if (!holds) continue;

    const triggered = toTriggered(rule, value);
    if (rule.severity === "HARD") {
      return { hard_kill: triggered, advisories, unresolved_fields: [...unresolved] };
    }
    advisories.push(triggered);
  }

  return { hard_kill: null, advisories, unresolved_fields: [...unresolved] };
}
