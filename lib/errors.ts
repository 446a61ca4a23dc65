/**
 * Error taxonomy for scoring and calibration.
 * Every error carries a stable `code` and optional `details` so callers (editing UI,
 * persistence layer, operator scripts) can render it without string matching.
 */

export type ErrorCode =
  | "CONFIG_ERROR"
  | "UNMATCHED_VALUE"
  | "MISSING_FIELD"
  | "VALIDATION_ERROR"
  | "IMMUTABLE_VERSION"
  | "NOT_FOUND"
  | "CONFLICT"
  | "INVALID_TRANSITION"
  | "STORE_ERROR";

export class RiskEngineError extends Error {
  readonly code: ErrorCode;
  readonly details: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

/** Structural defect found while scoring (missing bin, no tier). Should have been caught at publish. */
export class ConfigError extends RiskEngineError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super("CONFIG_ERROR", message, details);
  }
}

/** No bin of an enabled factor matched a present value. */
export class UnmatchedValueError extends RiskEngineError {
  readonly factorName: string;
  readonly value: unknown;

  constructor(factorName: string, value: unknown) {
    super("UNMATCHED_VALUE", `No bin of factor ${factorName} matches value ${String(value)}`, {
      factor_name: factorName,
      value,
    });
    this.factorName = factorName;
    this.value = value;
  }
}

/** Rule condition field absent from the attribute set. Recovered by the rule evaluator. */
export class MissingFieldError extends RiskEngineError {
  readonly field: string;

  constructor(field: string, ruleCode: string) {
    super("MISSING_FIELD", `Rule ${ruleCode} cannot resolve field ${field}`, {
      field,
      rule_code: ruleCode,
    });
    this.field = field;
  }
}

/** Aggregates every violation found; never only the first. */
export class ValidationError extends RiskEngineError {
  readonly violations: string[];

  constructor(violations: string[], message = "Validation failed") {
    super("VALIDATION_ERROR", `${message}: ${violations.join("; ")}`, { violations });
    this.violations = violations;
  }
}

export class ImmutableVersionError extends RiskEngineError {
  constructor(versionId: string, status: string) {
    super("IMMUTABLE_VERSION", `Model version ${versionId} is ${status}; only DRAFT versions can be edited`, {
      version_id: versionId,
      status,
    });
  }
}

export class NotFoundError extends RiskEngineError {
  constructor(entity: string, id: string) {
    super("NOT_FOUND", `${entity} ${id} not found`, { entity, id });
  }
}

/** A concurrent change won the race (e.g. another version was published in between). */
export class ConflictError extends RiskEngineError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super("CONFLICT", message, details);
  }
}

/** Assessment state machine asked to take an edge its transition table does not have. */
export class InvalidTransitionError extends RiskEngineError {
  constructor(from: string, to: string) {
    super("INVALID_TRANSITION", `Invalid assessment transition ${from} -> ${to}`, { from, to });
  }
}

/** Collaborator I/O failure (database, network). */
export class StoreError extends RiskEngineError {
  constructor(operation: string, cause: unknown) {
    const message =
      cause && typeof cause === "object" && "message" in cause && typeof cause.message === "string"
        ? cause.message
        : String(cause);
    super("STORE_ERROR", `${operation} failed: ${message}`, { operation });
  }
}

export type ErrorPayload = {
  ok: false;
  error: ErrorCode | "INTERNAL_ERROR";
  message: string;
  details: Record<string, unknown>;
};

/** Map any thrown value to the structured payload the editing UI renders. */
export function toErrorPayload(err: unknown): ErrorPayload {
  if (err instanceof RiskEngineError) {
    return { ok: false, error: err.code, message: err.message, details: err.details };
  }
  const message = err instanceof Error ? err.message : String(err);
  return { ok: false, error: "INTERNAL_ERROR", message, details: {} };
}
