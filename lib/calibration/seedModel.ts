/**
 * Baseline v1.2.0 calibration (15 factors across both applicant segments, 4 tiers, 12 hard-kill rules)
 * shipped as data/model-1.2.0.json.
 * The file holds the version as a DRAFT; scripts/seedModelVersion.ts inserts it and publishes it
 * through governance so the seed passes the same validation as any recalibration.
 */

import { readFileSync } from "node:fs";
import { buildSnapshot, parseModelVersionRows } from "../scoring/modelSchema";
import type { ModelSnapshot, ModelVersionRows } from "../scoring/modelVersion";
import { MemoryCalibrationStore } from "./memoryCalibrationStore";

export const SEED_VERSION_ID = "1.2.0";

const SEED_FILE = new URL("../../data/model-1.2.0.json", import.meta.url);

/** Fresh, validated copy of the seed rows (status DRAFT). */
export function loadSeedModelRows(): ModelVersionRows {
  return parseModelVersionRows(JSON.parse(readFileSync(SEED_FILE, "utf8")));
}

/** Seed rows marked PUBLISHED, as they stand after the initial rollout. */
export function publishedSeedRows(publishedAt = "2026-02-26T00:00:00.000Z"): ModelVersionRows {
  const rows = loadSeedModelRows();
  rows.version = { ...rows.version, status: "PUBLISHED", published_at: publishedAt, published_by: "system" };
  return rows;
}

export function loadSeedSnapshot(): ModelSnapshot {
  return buildSnapshot(publishedSeedRows());
}

/** In-memory store holding the published seed; used by tests and the stress harness. */
export function createSeededMemoryStore(): MemoryCalibrationStore {
  return new MemoryCalibrationStore([publishedSeedRows()]);
}
