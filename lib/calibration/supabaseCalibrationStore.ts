/**
 * Calibration store on Supabase (Postgres). Reads go through the table API and are validated with zod;
 * every mutation is one database function call so record + audit (and the publish swap) commit together.
 * Schema and functions: supabase/migrations/0001_calibration.sql.
 */

import type { PostgrestError, SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import { ConflictError, ImmutableVersionError, NotFoundError, StoreError } from "../errors";
import { createLogger } from "../logger";
import type { AuditLogEntry, ModelVersionRecord, ModelVersionRows } from "../scoring/modelVersion";
import { auditLogRowSchema, modelVersionRowSchema, parseModelVersionRows } from "../scoring/modelSchema";
import { createServiceRoleClient } from "../supabase/service";
import type {
  CalibrationStore,
  CalibrationTable,
  EditableFields,
  PublishOutcome,
  PublishParams,
} from "./calibrationStore";

const log = createLogger("calibration-store");

const VERSIONS_TABLE = "model_versions";
const AUDIT_TABLE = "calibration_audit_log";

/** SQLSTATEs raised by the calibration database functions. */
const SQLSTATE_IMMUTABLE = "RE001";
const SQLSTATE_NOT_FOUND = "RE002";
const SQLSTATE_CONFLICT = "RE003";
const SQLSTATE_UNIQUE_VIOLATION = "23505";

const publishedIdSchema = z.object({ version_id: z.string() }).nullable();
const archivedIdSchema = z.string().nullable();

function mapRpcError(operation: string, versionId: string, error: PostgrestError): Error {
  switch (error.code) {
    case SQLSTATE_IMMUTABLE:
      return new ImmutableVersionError(versionId, error.details || "not DRAFT");
    case SQLSTATE_NOT_FOUND:
      return new NotFoundError(error.details || "Model version", versionId);
    case SQLSTATE_CONFLICT:
    case SQLSTATE_UNIQUE_VIOLATION:
      return new ConflictError(error.message, { version_id: versionId, operation });
    default:
      return new StoreError(operation, error);
  }
}

function parseOrThrow<S extends z.ZodTypeAny>(schema: S, data: unknown, operation: string): z.output<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new StoreError(operation, new Error(`unexpected row shape: ${issues.join("; ")}`));
  }
  return result.data;
}

export class SupabaseCalibrationStore implements CalibrationStore {
  private readonly supabase: SupabaseClient;

  constructor(supabase: SupabaseClient = createServiceRoleClient()) {
    this.supabase = supabase;
  }

  async listVersions(): Promise<ModelVersionRecord[]> {
    const { data, error } = await this.supabase
      .from(VERSIONS_TABLE)
      .select("*")
      .order("created_at", { ascending: true });
    if (error) throw new StoreError("listVersions", error);
    return parseOrThrow(z.array(modelVersionRowSchema), data ?? [], "listVersions");
  }

  async getVersion(versionId: string): Promise<ModelVersionRecord | null> {
    const { data, error } = await this.supabase
      .from(VERSIONS_TABLE)
      .select("*")
      .eq("version_id", versionId)
      .maybeSingle();
    if (error) throw new StoreError("getVersion", error);
    return parseOrThrow(modelVersionRowSchema.nullable(), data, "getVersion");
  }

  async getPublishedVersionId(): Promise<string | null> {
    const { data, error } = await this.supabase
      .from(VERSIONS_TABLE)
      .select("version_id")
      .eq("status", "PUBLISHED")
      .maybeSingle();
    if (error) throw new StoreError("getPublishedVersionId", error);
    return parseOrThrow(publishedIdSchema, data, "getPublishedVersionId")?.version_id ?? null;
  }

  async loadRows(versionId: string): Promise<ModelVersionRows | null> {
    const version = await this.getVersion(versionId);
    if (!version) return null;

    const [factors, bins, tiers, rules] = await Promise.all(
      (["scoring_factor_config", "scoring_factor_bins", "scoring_tier_thresholds", "business_rules"] as const).map(
        async (table) => {
          const { data, error } = await this.supabase.from(table).select("*").eq("version_id", versionId);
          if (error) throw new StoreError(`loadRows(${table})`, error);
          return data ?? [];
        }
      )
    );

    // Malformed stored rows are a calibration defect, not an I/O failure: ConfigError.
    return parseModelVersionRows({ version, factors, bins, tiers, rules });
  }

  async insertVersion(rows: ModelVersionRows, audit: AuditLogEntry[]): Promise<void> {
    const versionId = rows.version.version_id;
    const { error } = await this.supabase.rpc("create_model_version", {
      p_version: rows.version,
      p_factors: rows.factors,
      p_bins: rows.bins,
      p_tiers: rows.tiers,
      p_rules: rows.rules,
      p_audit: audit,
    });
    if (error) throw mapRpcError("insertVersion", versionId, error);
    log.debug("version inserted", { version_id: versionId, status: rows.version.status });
  }

  async updateRecord<T extends CalibrationTable>(
    versionId: string,
    table: T,
    recordId: string,
    changes: EditableFields<T>,
    audit: AuditLogEntry[]
  ): Promise<void> {
    const { error } = await this.supabase.rpc("update_calibration_record", {
      p_version_id: versionId,
      p_table: table,
      p_record_id: recordId,
      p_changes: changes,
      p_audit: audit,
    });
    if (error) throw mapRpcError("updateRecord", versionId, error);
  }

  async deleteDraft(versionId: string, audit: AuditLogEntry[]): Promise<void> {
    const { error } = await this.supabase.rpc("delete_draft_version", {
      p_version_id: versionId,
      p_audit: audit,
    });
    if (error) throw mapRpcError("deleteDraft", versionId, error);
  }

  async publishVersion(params: PublishParams): Promise<PublishOutcome> {
    const { data, error } = await this.supabase.rpc("publish_model_version", {
      p_version_id: params.versionId,
      p_expected_published_id: params.expectedPublishedId,
      p_expected_audit_count: params.expectedAuditCount,
      p_actor: params.actor,
      p_published_at: params.publishedAt,
      p_audit: params.audit,
    });
    if (error) throw mapRpcError("publishVersion", params.versionId, error);
    return { archivedVersionId: parseOrThrow(archivedIdSchema, data ?? null, "publishVersion") };
  }

  async appendAudit(entries: AuditLogEntry[]): Promise<void> {
    if (entries.length === 0) return;
    const { error } = await this.supabase.from(AUDIT_TABLE).insert(entries);
    if (error) throw new StoreError("appendAudit", error);
  }

  async listAudit(versionId: string): Promise<AuditLogEntry[]> {
    const { data, error } = await this.supabase
      .from(AUDIT_TABLE)
      .select("*")
      .eq("version_id", versionId)
      .order("seq", { ascending: true });
    if (error) throw new StoreError("listAudit", error);
    return parseOrThrow(z.array(auditLogRowSchema), data ?? [], "listAudit");
  }
}
