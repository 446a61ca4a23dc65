/**
 * Assessment orchestrator: one request → one immutable result.
 *
 * States: RECEIVED → RULES_EVALUATED → SCORED → CLASSIFIED → FINALIZED, or
 * RECEIVED → RULES_EVALUATED → FINALIZED when a HARD rule fires (scoring skipped).
 * Business rules run first; a hard kill forces its tier/decision regardless of any score.
 * Structural errors (missing bin, unmatched value, no tier) abort the request: no partial result is emitted.
 * Private applicants also get the legacy A-E band, hard kill or not; it is reported, never decided on.
 */

import { randomUUID } from "crypto";
import { InvalidTransitionError } from "../errors";
import { createLogger } from "../logger";
import { buildApplicantAttributes } from "./applicantAttributes";
import { parseLeasingApplication } from "./applicationSchema";
import { evaluateBusinessRules, type TriggeredRule } from "./businessRules";
import { scoreComposite, type FactorScore } from "./compositeScorer";
import type { DscrResult } from "./dscrCalculator";
import { loadLegacyScorecard, scoreLegacy, type LegacyScorecard } from "./legacyScorecard";
import type { ModelResolver } from "./modelResolver";
import type { ApplicantAttributes, AttributeValue, ModelSnapshot } from "./modelVersion";
import { applicantSegment } from "./partyScope";
import { classifyTier } from "./tierClassifier";

const log = createLogger("assessment");

export const ASSESSMENT_STATES = ["RECEIVED", "RULES_EVALUATED", "SCORED", "CLASSIFIED", "FINALIZED"] as const;
export type AssessmentState = (typeof ASSESSMENT_STATES)[number];

export const ASSESSMENT_TRANSITIONS: Readonly<Record<AssessmentState, readonly AssessmentState[]>> = {
  RECEIVED: ["RULES_EVALUATED"],
  RULES_EVALUATED: ["SCORED", "FINALIZED"],
  SCORED: ["CLASSIFIED"],
  CLASSIFIED: ["FINALIZED"],
  FINALIZED: [],
};

export function canTransition(from: AssessmentState, to: AssessmentState): boolean {
  return ASSESSMENT_TRANSITIONS[from].includes(to);
}

export type StateTrail = {
  readonly current: AssessmentState;
  advance: (to: AssessmentState) => void;
  states: () => AssessmentState[];
};

/** Records the visited states; throws InvalidTransitionError on an edge outside the table. */
export function createStateTrail(): StateTrail {
  const trail: AssessmentState[] = ["RECEIVED"];
  return {
    get current() {
      return trail[trail.length - 1];
    },
    advance(to) {
      const from = trail[trail.length - 1];
      if (!canTransition(from, to)) throw new InvalidTransitionError(from, to);
      trail.push(to);
    },
    states: () => [...trail],
  };
}

export type DefaultApplied = {
  factor_name: string;
  input_field: string;
  bin_label: string;
  raw_score: number;
};

export type AssessmentResult = {
  readonly assessment_id: string;
  readonly request_id: string | null;
  readonly version_id: string;
  /** null when a hard-kill rule short-circuited scoring. */
  readonly total_score: number | null;
  readonly tier: string;
  readonly decision: string;
  readonly estimated_pd: number | null;
  readonly factor_breakdown: readonly Readonly<FactorScore>[];
  /** Every rule whose condition held, in evaluation order (the hard kill, if any, last). */
  readonly triggered_rules: readonly Readonly<TriggeredRule>[];
  /** SOFT matches only. */
  readonly advisory_flags: readonly Readonly<TriggeredRule>[];
  readonly override_note: string | null;
  readonly defaults_applied: readonly Readonly<DefaultApplied>[];
  readonly unresolved_fields: readonly string[];
  /** Legacy WoE scorecard; null for companies or when no scorecard was supplied. */
  readonly legacy_score: number | null;
  readonly legacy_band: string | null;
  readonly state_trail: readonly AssessmentState[];
  readonly evaluated_at: string;
};

export type AssessmentRequest = {
  request_id?: string | null;
  /** Explicit version (audit replay); otherwise pinned or published. */
  model_version?: string | null;
  attributes: ApplicantAttributes;
};

export type AssessmentOptions = {
  assessmentId?: string;
  requestId?: string | null;
  now?: () => Date;
  /** Scorecard for the legacy band. assessAttributes skips it when absent; evaluateAssessment loads the shipped one unless null. */
  legacyScorecard?: LegacyScorecard | null;
};

export type EvaluateOptions = Omit<AssessmentOptions, "requestId"> & {
  /** Persistence collaborator; awaited before the result is returned. */
  onResult?: (result: AssessmentResult) => void | Promise<void>;
};

function freezeResult(result: AssessmentResult): AssessmentResult {
  for (const list of [result.factor_breakdown, result.triggered_rules, result.advisory_flags, result.defaults_applied]) {
    for (const item of list) Object.freeze(item);
  }
  Object.freeze(result.factor_breakdown);
  Object.freeze(result.triggered_rules);
  Object.freeze(result.advisory_flags);
  Object.freeze(result.defaults_applied);
  Object.freeze(result.unresolved_fields);
  Object.freeze(result.state_trail);
  return Object.freeze(result);
}

/** Pure evaluation of one attribute set against a loaded snapshot. */
export function assessAttributes(
  snapshot: ModelSnapshot,
  attributes: ApplicantAttributes,
  options: AssessmentOptions = {}
): AssessmentResult {
  const trail = createStateTrail();
  const base = {
    assessment_id: options.assessmentId ?? randomUUID(),
    request_id: options.requestId ?? null,
    version_id: snapshot.version.version_id,
  };

  const legacy =
    options.legacyScorecard && applicantSegment(attributes) === "B2C" ? scoreLegacy(options.legacyScorecard, attributes) : null;
  const legacyFields = { legacy_score: legacy?.score ?? null, legacy_band: legacy?.band ?? null };

  const rules = evaluateBusinessRules(snapshot, attributes);
  trail.advance("RULES_EVALUATED");

  if (rules.hard_kill) {
    const kill = rules.hard_kill;
    trail.advance("FINALIZED");
    return freezeResult({
      ...base,
      total_score: null,
      tier: kill.forced_tier,
      decision: kill.forced_decision,
      estimated_pd: snapshot.tierByName.get(kill.forced_tier)?.estimated_pd ?? null,
      factor_breakdown: [],
      triggered_rules: [...rules.advisories, kill],
      advisory_flags: rules.advisories,
      override_note: `Hard-kill rule ${kill.rule_code} (${kill.rule_name}) forced ${kill.forced_tier} / ${kill.forced_decision}: ${kill.condition}`,
      defaults_applied: [],
      unresolved_fields: rules.unresolved_fields,
      ...legacyFields,
      state_trail: trail.states(),
      evaluated_at: (options.now?.() ?? new Date()).toISOString(),
    });
  }

  const composite = scoreComposite(snapshot, attributes);
  trail.advance("SCORED");

  const classification = classifyTier(snapshot, composite.total);
  trail.advance("CLASSIFIED");
  trail.advance("FINALIZED");

  return freezeResult({
    ...base,
    total_score: composite.total,
    tier: classification.tier,
    decision: classification.decision,
    estimated_pd: classification.estimated_pd,
    factor_breakdown: composite.perFactor,
    triggered_rules: rules.advisories,
    advisory_flags: rules.advisories,
    override_note: null,
    defaults_applied: composite.perFactor
      .filter((f) => f.used_missing_bin)
      .map((f) => ({ factor_name: f.factor_name, input_field: f.input_field, bin_label: f.bin_label, raw_score: f.raw_score })),
    unresolved_fields: rules.unresolved_fields,
    ...legacyFields,
    state_trail: trail.states(),
    evaluated_at: (options.now?.() ?? new Date()).toISOString(),
  });
}

/** Resolve the model version, evaluate, hand the result to the persistence sink and log it. */
export async function evaluateAssessment(
  resolver: ModelResolver,
  request: AssessmentRequest,
  options: EvaluateOptions = {}
): Promise<AssessmentResult> {
  const snapshot = await resolver.resolve(request.model_version ?? null);

  let result: AssessmentResult;
  try {
    result = assessAttributes(snapshot, request.attributes, {
      ...options,
      requestId: request.request_id ?? null,
      legacyScorecard: options.legacyScorecard === undefined ? loadLegacyScorecard() : options.legacyScorecard,
    });
  } catch (err) {
    log.error("assessment aborted", {
      request_id: request.request_id ?? null,
      version_id: snapshot.version.version_id,
      error: err instanceof Error ? err.message : String(err),
    });
    throw err;
  }

  if (options.onResult) await options.onResult(result);

  log.info("assessment finalized", {
    assessment_id: result.assessment_id,
    request_id: result.request_id,
    version_id: result.version_id,
    total_score: result.total_score,
    tier: result.tier,
    decision: result.decision,
    legacy_band: result.legacy_band,
    hard_kill: result.override_note != null,
  });
  return result;
}

export type LeasingAssessment = {
  result: AssessmentResult;
  attributes: Record<string, AttributeValue>;
  dscr: DscrResult;
};

/** Validate a raw leasing application, derive its attributes and evaluate it. */
export async function evaluateLeasingApplication(
  resolver: ModelResolver,
  rawApplication: unknown,
  options: EvaluateOptions = {}
): Promise<LeasingAssessment> {
  const application = parseLeasingApplication(rawApplication);
  const { attributes, dscr } = buildApplicantAttributes(application);
  log.debug("applicant attributes derived", {
    request_id: application.request_id,
    dscr_method: dscr.calculation_method,
  });
  const result = await evaluateAssessment(
    resolver,
    { request_id: application.request_id, model_version: application.model_version ?? null, attributes },
    options
  );
  return { result, attributes, dscr };
}
