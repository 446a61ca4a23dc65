/**
 * Calibration store: persisted model versions, their factor/bin/tier/rule rows and the audit log.
 * Owned by a collaborator (database); the engine only dictates the shape.
 *
 * Mutations are all-or-nothing per call: a record update and its audit entries land together,
 * and publishVersion swaps the published pointer in one step, so readers never observe zero or
 * two PUBLISHED versions.
 */

import type {
  AuditLogEntry,
  BinRecord,
  BusinessRuleRecord,
  FactorRecord,
  ModelVersionRecord,
  ModelVersionRows,
  TierRecord,
} from "../scoring/modelVersion";

export type TableRecords = {
  scoring_factor_config: FactorRecord;
  scoring_factor_bins: BinRecord;
  scoring_tier_thresholds: TierRecord;
  business_rules: BusinessRuleRecord;
};

export type CalibrationTable = keyof TableRecords;

export const CALIBRATION_TABLES: readonly CalibrationTable[] = [
  "scoring_factor_config",
  "scoring_factor_bins",
  "scoring_tier_thresholds",
  "business_rules",
];

/** Fields an editor may change; identity and ownership columns are fixed. */
export type EditableFields<T extends CalibrationTable> = Partial<
  Omit<TableRecords[T], "id" | "version_id" | "factor_name" | "rule_code" | "tier_name">
>;

export type PublishParams = {
  versionId: string;
  /** Compare-and-swap guard: the version expected to be PUBLISHED right now (null = none). */
  expectedPublishedId: string | null;
  /** Content guard: audit entries the draft had when it was validated. Any edit since then appends one. */
  expectedAuditCount: number;
  actor: string;
  publishedAt: string;
  audit: AuditLogEntry[];
};

export type PublishOutcome = {
  archivedVersionId: string | null;
};

export interface CalibrationStore {
  listVersions(): Promise<ModelVersionRecord[]>;
  getVersion(versionId: string): Promise<ModelVersionRecord | null>;
  getPublishedVersionId(): Promise<string | null>;
  loadRows(versionId: string): Promise<ModelVersionRows | null>;
  /** Insert a new DRAFT version with all its rows. */
  insertVersion(rows: ModelVersionRows, audit: AuditLogEntry[]): Promise<void>;
  /** Apply changes to one record of a DRAFT version; throws ImmutableVersionError otherwise. */
  updateRecord<T extends CalibrationTable>(
    versionId: string,
    table: T,
    recordId: string,
    changes: EditableFields<T>,
    audit: AuditLogEntry[]
  ): Promise<void>;
  /** Remove a DRAFT version and its rows; audit entries stay. */
  deleteDraft(versionId: string, audit: AuditLogEntry[]): Promise<void>;
  /**
   * Atomically: target DRAFT → PUBLISHED, prior PUBLISHED → ARCHIVED, audit appended.
   * Throws ConflictError when the published pointer no longer equals expectedPublishedId,
   * or when the draft's audit count differs from expectedAuditCount.
   */
  publishVersion(params: PublishParams): Promise<PublishOutcome>;
  appendAudit(entries: AuditLogEntry[]): Promise<void>;
  /** Audit entries of one version, oldest first. */
  listAudit(versionId: string): Promise<AuditLogEntry[]>;
}
