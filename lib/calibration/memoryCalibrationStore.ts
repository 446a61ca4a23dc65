/**
 * In-process calibration store for tests, operator dry runs and the stress harness.
 * Each method body runs without awaiting, so every mutation (including the publish swap)
 * is atomic with respect to concurrent callers on the same event loop.
 */

import { ConflictError, ImmutableVersionError, NotFoundError } from "../errors";
import type { AuditLogEntry, ModelVersionRecord, ModelVersionRows } from "../scoring/modelVersion";
import type {
  CalibrationStore,
  CalibrationTable,
  EditableFields,
  PublishOutcome,
  PublishParams,
  TableRecords,
} from "./calibrationStore";

type VersionTables = { [T in CalibrationTable]: TableRecords[T][] };

type StoredVersion = {
  version: ModelVersionRecord;
  tables: VersionTables;
};

function toTables(rows: ModelVersionRows): VersionTables {
  return {
    scoring_factor_config: rows.factors,
    scoring_factor_bins: rows.bins,
    scoring_tier_thresholds: rows.tiers,
    business_rules: rows.rules,
  };
}

export class MemoryCalibrationStore implements CalibrationStore {
  private readonly versions = new Map<string, StoredVersion>();
  private readonly audit: AuditLogEntry[] = [];

  /** Seed versions directly (any status), bypassing governance. */
  constructor(initial: ModelVersionRows[] = []) {
    for (const rows of initial) {
      const copy = structuredClone(rows);
      this.versions.set(copy.version.version_id, { version: copy.version, tables: toTables(copy) });
    }
  }

  async listVersions(): Promise<ModelVersionRecord[]> {
    return [...this.versions.values()]
      .map((v) => structuredClone(v.version))
      .sort((a, b) => a.created_at.localeCompare(b.created_at));
  }

  async getVersion(versionId: string): Promise<ModelVersionRecord | null> {
    const stored = this.versions.get(versionId);
    return stored ? structuredClone(stored.version) : null;
  }

  async getPublishedVersionId(): Promise<string | null> {
    return this.currentPublishedId();
  }

  async loadRows(versionId: string): Promise<ModelVersionRows | null> {
    const stored = this.versions.get(versionId);
    if (!stored) return null;
    return structuredClone({
      version: stored.version,
      factors: stored.tables.scoring_factor_config,
      bins: stored.tables.scoring_factor_bins,
      tiers: stored.tables.scoring_tier_thresholds,
      rules: stored.tables.business_rules,
    });
  }

  async insertVersion(rows: ModelVersionRows, audit: AuditLogEntry[]): Promise<void> {
    const id = rows.version.version_id;
    if (this.versions.has(id)) {
      throw new ConflictError(`Model version ${id} already exists`, { version_id: id });
    }
    const copy = structuredClone(rows);
    this.versions.set(id, { version: copy.version, tables: toTables(copy) });
    this.audit.push(...structuredClone(audit));
  }

  async updateRecord<T extends CalibrationTable>(
    versionId: string,
    table: T,
    recordId: string,
    changes: EditableFields<T>,
    audit: AuditLogEntry[]
  ): Promise<void> {
    const stored = this.requireDraft(versionId);
    const records: TableRecords[T][] = stored.tables[table];
    const record = records.find((r) => r.id === recordId);
    if (!record) throw new NotFoundError(table, `${versionId}/${recordId}`);
    for (const [key, value] of Object.entries(structuredClone(changes))) {
      if (value !== undefined) Object.assign(record, { [key]: value });
    }
    this.audit.push(...structuredClone(audit));
  }

  async deleteDraft(versionId: string, audit: AuditLogEntry[]): Promise<void> {
    this.requireDraft(versionId);
    this.versions.delete(versionId);
    this.audit.push(...structuredClone(audit));
  }

  async publishVersion(params: PublishParams): Promise<PublishOutcome> {
    const target = this.requireDraft(params.versionId);
    const currentId = this.currentPublishedId();
    if (currentId !== params.expectedPublishedId) {
      throw new ConflictError(
        `Published version changed concurrently (expected ${params.expectedPublishedId ?? "none"}, found ${currentId ?? "none"})`,
        { version_id: params.versionId, expected: params.expectedPublishedId, found: currentId }
      );
    }
    const auditCount = this.audit.filter((e) => e.version_id === params.versionId).length;
    if (auditCount !== params.expectedAuditCount) {
      throw new ConflictError(`Draft ${params.versionId} changed since it was validated`, {
        version_id: params.versionId,
        expected_audit_count: params.expectedAuditCount,
        found_audit_count: auditCount,
      });
    }
    if (currentId) {
      const prior = this.versions.get(currentId);
      if (prior) prior.version.status = "ARCHIVED";
    }
    target.version.status = "PUBLISHED";
    target.version.published_at = params.publishedAt;
    target.version.published_by = params.actor;
    this.audit.push(...structuredClone(params.audit));
    return { archivedVersionId: currentId };
  }

  async appendAudit(entries: AuditLogEntry[]): Promise<void> {
    this.audit.push(...structuredClone(entries));
  }

  async listAudit(versionId: string): Promise<AuditLogEntry[]> {
    return this.audit.filter((e) => e.version_id === versionId).map((e) => structuredClone(e));
  }

  private currentPublishedId(): string | null {
    for (const [id, stored] of this.versions) {
      if (stored.version.status === "PUBLISHED") return id;
    }
    return null;
  }

  private requireDraft(versionId: string): StoredVersion {
    const stored = this.versions.get(versionId);
    if (!stored) throw new NotFoundError("Model version", versionId);
    if (stored.version.status !== "DRAFT") throw new ImmutableVersionError(versionId, stored.version.status);
    return stored;
  }
}
