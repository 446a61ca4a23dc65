/**
 * Supabase calibration store: reads are parsed from table rows, mutations go through one RPC each,
 * and database errors map onto the engine's error classes.
 */
import { describe, it, expect, vi, beforeEach } from "vitest";
import { ConflictError, ConfigError, ImmutableVersionError, NotFoundError, StoreError } from "../errors";
import { buildTestModelRows } from "../scoring/testModel";
import { SupabaseCalibrationStore } from "./supabaseCalibrationStore";

type DbError = { code: string; message: string; details: string; hint: string };
type DbResult = { data: unknown; error: DbError | null };

type FakeQuery = {
  select: (...args: unknown[]) => FakeQuery;
  eq: (...args: unknown[]) => FakeQuery;
  order: (...args: unknown[]) => FakeQuery;
  insert: (...args: unknown[]) => FakeQuery;
  maybeSingle: () => Promise<DbResult>;
  then: <T>(onFulfilled: (result: DbResult) => T, onRejected?: (reason: unknown) => T) => Promise<T>;
};

const responses = new Map<string, DbResult>();
const mockCall = vi.fn();
const mockRpc = vi.fn();

function fakeQuery(table: string): FakeQuery {
  const result = (): DbResult => responses.get(table) ?? { data: [], error: null };
  const query: FakeQuery = {
    select: (...args) => {
      mockCall(table, "select", ...args);
      return query;
    },
    eq: (...args) => {
      mockCall(table, "eq", ...args);
      return query;
    },
    order: (...args) => {
      mockCall(table, "order", ...args);
      return query;
    },
    insert: (...args) => {
      mockCall(table, "insert", ...args);
      return query;
    },
    maybeSingle: () => Promise.resolve(result()),
    then: (onFulfilled, onRejected) => Promise.resolve(result()).then(onFulfilled, onRejected),
  };
  return query;
}

vi.mock("../supabase/service", () => ({
  createServiceRoleClient: () => ({
    from: (table: string) => fakeQuery(table),
    rpc: (fn: string, params: Record<string, unknown>) => mockRpc(fn, params),
  }),
}));

function dbError(code: string, message: string, details = ""): DbError {
  return { code, message, details, hint: "" };
}

beforeEach(() => {
  responses.clear();
  mockCall.mockReset();
  mockRpc.mockReset();
});

describe("SupabaseCalibrationStore reads", () => {
  it("reads the published pointer", async () => {
    responses.set("model_versions", { data: { version_id: "1.2.0" }, error: null });
    expect(await new SupabaseCalibrationStore().getPublishedVersionId()).toBe("1.2.0");
    expect(mockCall).toHaveBeenCalledWith("model_versions", "eq", "status", "PUBLISHED");
  });

  it("returns null when no version is published", async () => {
    responses.set("model_versions", { data: null, error: null });
    expect(await new SupabaseCalibrationStore().getPublishedVersionId()).toBeNull();
  });

  it("loads and validates every table of a version", async () => {
    const rows = buildTestModelRows("1.2.0");
    responses.set("model_versions", { data: rows.version, error: null });
    responses.set("scoring_factor_config", { data: rows.factors, error: null });
    responses.set("scoring_factor_bins", { data: rows.bins, error: null });
    responses.set("scoring_tier_thresholds", { data: rows.tiers, error: null });
    responses.set("business_rules", { data: rows.rules, error: null });

    expect(await new SupabaseCalibrationStore().loadRows("1.2.0")).toEqual(rows);
    expect(mockCall).toHaveBeenCalledWith("scoring_factor_bins", "eq", "version_id", "1.2.0");
  });

  it("returns null for an unknown version", async () => {
    responses.set("model_versions", { data: null, error: null });
    expect(await new SupabaseCalibrationStore().loadRows("9.9.9")).toBeNull();
  });

  it("raises ConfigError for malformed calibration rows", async () => {
    const rows = buildTestModelRows("1.2.0");
    responses.set("model_versions", { data: rows.version, error: null });
    responses.set("scoring_factor_bins", { data: [{ ...rows.bins[0], raw_score: "high" }], error: null });
    await expect(new SupabaseCalibrationStore().loadRows("1.2.0")).rejects.toBeInstanceOf(ConfigError);
  });

  it("raises StoreError for a failed query or an unexpected row shape", async () => {
    responses.set("model_versions", { data: null, error: dbError("08006", "connection lost") });
    await expect(new SupabaseCalibrationStore().listVersions()).rejects.toThrow("listVersions failed: connection lost");

    responses.set("model_versions", { data: [{ version_id: 5 }], error: null });
    await expect(new SupabaseCalibrationStore().listVersions()).rejects.toBeInstanceOf(StoreError);
  });

  it("lists audit entries oldest first", async () => {
    responses.set("calibration_audit_log", { data: [], error: null });
    expect(await new SupabaseCalibrationStore().listAudit("1.2.0")).toEqual([]);
    expect(mockCall).toHaveBeenCalledWith("calibration_audit_log", "order", "seq", { ascending: true });
  });
});

describe("SupabaseCalibrationStore mutations", () => {
  it("publishes through one database function with the compare-and-swap guard", async () => {
    mockRpc.mockResolvedValue({ data: "1.2.0", error: null });
    const outcome = await new SupabaseCalibrationStore().publishVersion({
      versionId: "1.2.1",
      expectedPublishedId: "1.2.0",
      expectedAuditCount: 4,
      actor: "bob",
      publishedAt: "2026-03-02T00:00:00.000Z",
      audit: [],
    });
    expect(outcome).toEqual({ archivedVersionId: "1.2.0" });
    expect(mockRpc).toHaveBeenCalledWith("publish_model_version", {
      p_version_id: "1.2.1",
      p_expected_published_id: "1.2.0",
      p_expected_audit_count: 4,
      p_actor: "bob",
      p_published_at: "2026-03-02T00:00:00.000Z",
      p_audit: [],
    });
  });

  it("sends record updates with their audit entries", async () => {
    mockRpc.mockResolvedValue({ data: null, error: null });
    await new SupabaseCalibrationStore().updateRecord("1.2.1", "scoring_factor_bins", "LTV-1", { raw_score: 10 }, []);
    expect(mockRpc).toHaveBeenCalledWith("update_calibration_record", {
      p_version_id: "1.2.1",
      p_table: "scoring_factor_bins",
      p_record_id: "LTV-1",
      p_changes: { raw_score: 10 },
      p_audit: [],
    });
  });

  it("maps database errors onto engine errors", async () => {
    const store = new SupabaseCalibrationStore();

    mockRpc.mockResolvedValue({ data: null, error: dbError("RE001", "version is immutable", "PUBLISHED") });
    await expect(store.updateRecord("1.2.0", "scoring_factor_bins", "LTV-1", { raw_score: 1 }, [])).rejects.toThrow(
      new ImmutableVersionError("1.2.0", "PUBLISHED")
    );

    mockRpc.mockResolvedValue({ data: null, error: dbError("RE002", "not found", "scoring_factor_bins") });
    await expect(store.deleteDraft("1.2.9", [])).rejects.toBeInstanceOf(NotFoundError);

    mockRpc.mockResolvedValue({ data: null, error: dbError("RE003", "published version changed") });
    await expect(
      store.publishVersion({
        versionId: "1.2.1",
        expectedPublishedId: null,
        expectedAuditCount: 0,
        actor: "bob",
        publishedAt: "x",
        audit: [],
      })
    ).rejects.toBeInstanceOf(ConflictError);

    mockRpc.mockResolvedValue({ data: null, error: dbError("23505", "duplicate key value") });
    await expect(store.insertVersion(buildTestModelRows("1.2.0", "DRAFT"), [])).rejects.toBeInstanceOf(ConflictError);

    mockRpc.mockResolvedValue({ data: null, error: dbError("XX000", "boom") });
    await expect(store.deleteDraft("1.2.1", [])).rejects.toThrow("deleteDraft failed: boom");
  });

  it("skips an empty audit append", async () => {
    await new SupabaseCalibrationStore().appendAudit([]);
    expect(mockCall).not.toHaveBeenCalled();
  });
});
