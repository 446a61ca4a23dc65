import { describe, it, expect } from "vitest";
import { ConflictError, ImmutableVersionError, NotFoundError } from "../errors";
import { buildTestModelRows } from "../scoring/testModel";
import { buildAuditEntry } from "./auditLog";
import { MemoryCalibrationStore } from "./memoryCalibrationStore";

const who = { actor: "alice", at: "2026-03-01T10:00:00.000Z" };

function store(): MemoryCalibrationStore {
  return new MemoryCalibrationStore([buildTestModelRows("1.0.0", "PUBLISHED"), buildTestModelRows("1.0.1", "DRAFT")]);
}

describe("MemoryCalibrationStore", () => {
  it("lists versions and the published pointer", async () => {
    const s = store();
    expect((await s.listVersions()).map((v) => [v.version_id, v.status])).toEqual([
      ["1.0.0", "PUBLISHED"],
      ["1.0.1", "DRAFT"],
    ]);
    expect(await s.getPublishedVersionId()).toBe("1.0.0");
    expect(await s.getVersion("2.0.0")).toBeNull();
    expect(await s.loadRows("2.0.0")).toBeNull();
  });

  it("returns copies that callers cannot use to mutate stored rows", async () => {
    const s = store();
    const rows = await s.loadRows("1.0.1");
    if (!rows) throw new Error("missing rows");
    rows.bins[0].raw_score = 99;
    expect((await s.loadRows("1.0.1"))?.bins[0].raw_score).toBe(8);
  });

  it("updates a DRAFT record and appends its audit entries together", async () => {
    const s = store();
    const entry = buildAuditEntry(who, {
      version_id: "1.0.1",
      action: "UPDATED",
      table_name: "scoring_factor_bins",
      record_id: "LTV-1",
      field_name: "raw_score",
      old_value: 8,
      new_value: 9,
    });
    await s.updateRecord("1.0.1", "scoring_factor_bins", "LTV-1", { raw_score: 9, bin_label: undefined }, [entry]);
    const rows = await s.loadRows("1.0.1");
    expect(rows?.bins.find((b) => b.id === "LTV-1")).toMatchObject({ raw_score: 9, bin_label: "<75%" });
    expect(await s.listAudit("1.0.1")).toEqual([entry]);
  });

  it("refuses to modify non-DRAFT versions", async () => {
    const s = store();
    await expect(s.updateRecord("1.0.0", "scoring_factor_bins", "LTV-1", { raw_score: 9 }, [])).rejects.toBeInstanceOf(
      ImmutableVersionError
    );
    await expect(s.deleteDraft("1.0.0", [])).rejects.toBeInstanceOf(ImmutableVersionError);
    await expect(s.updateRecord("3.0.0", "scoring_factor_bins", "LTV-1", { raw_score: 9 }, [])).rejects.toBeInstanceOf(
      NotFoundError
    );
  });

  it("throws NotFoundError for an unknown record", async () => {
    await expect(store().updateRecord("1.0.1", "scoring_factor_bins", "LTV-9", { raw_score: 1 }, [])).rejects.toThrow(
      "scoring_factor_bins 1.0.1/LTV-9 not found"
    );
  });

  it("rejects a duplicate version id", async () => {
    await expect(store().insertVersion(buildTestModelRows("1.0.0", "DRAFT"), [])).rejects.toBeInstanceOf(ConflictError);
  });

  it("publishes with compare-and-swap and archives the prior version", async () => {
    const s = store();
    const outcome = await s.publishVersion({
      versionId: "1.0.1",
      expectedPublishedId: "1.0.0",
      expectedAuditCount: 0,
      actor: "bob",
      publishedAt: "2026-03-02T00:00:00.000Z",
      audit: [],
    });
    expect(outcome).toEqual({ archivedVersionId: "1.0.0" });
    expect((await s.getVersion("1.0.0"))?.status).toBe("ARCHIVED");
    expect(await s.getVersion("1.0.1")).toMatchObject({
      status: "PUBLISHED",
      published_by: "bob",
      published_at: "2026-03-02T00:00:00.000Z",
    });
  });

  it("fails the swap when the published pointer moved", async () => {
    const s = store();
    await expect(
      s.publishVersion({
        versionId: "1.0.1",
        expectedPublishedId: null,
        expectedAuditCount: 0,
        actor: "bob",
        publishedAt: who.at,
        audit: [],
      })
    ).rejects.toThrow("Published version changed concurrently (expected none, found 1.0.0)");
    expect(await s.getPublishedVersionId()).toBe("1.0.0");
    expect((await s.getVersion("1.0.1"))?.status).toBe("DRAFT");
  });

  it("refuses to publish a draft edited after the expected audit count", async () => {
    const s = store();
    const edit = buildAuditEntry(who, { version_id: "1.0.1", action: "UPDATED", table_name: "scoring_factor_bins" });
    await s.updateRecord("1.0.1", "scoring_factor_bins", "LTV-1", { raw_score: 3 }, [edit]);
    await expect(
      s.publishVersion({
        versionId: "1.0.1",
        expectedPublishedId: "1.0.0",
        expectedAuditCount: 0,
        actor: "bob",
        publishedAt: who.at,
        audit: [],
      })
    ).rejects.toThrow("Draft 1.0.1 changed since it was validated");
    expect(await s.getPublishedVersionId()).toBe("1.0.0");
    expect((await s.getVersion("1.0.1"))?.status).toBe("DRAFT");
  });

  it("deletes a draft but keeps its audit trail", async () => {
    const s = store();
    const entry = buildAuditEntry(who, { version_id: "1.0.1", action: "ARCHIVED", table_name: "model_versions" });
    await s.deleteDraft("1.0.1", [entry]);
    expect(await s.getVersion("1.0.1")).toBeNull();
    expect(await s.listAudit("1.0.1")).toEqual([entry]);
  });
});
