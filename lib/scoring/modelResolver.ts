/**
 * Resolves which model version a request scores against and loads its snapshot.
 * Order: explicit request version → SCORING_MODEL_VERSION pin → published pointer.
 * The published pointer is read on every call; snapshots are cached by version id
 * (PUBLISHED and ARCHIVED content never changes). DRAFT versions are never scorable.
 */

import type { CalibrationStore } from "../calibration/calibrationStore";
import { loadConfig } from "../config";
import { ConfigError, NotFoundError, ValidationError } from "../errors";
import { createLogger } from "../logger";
import { buildSnapshot } from "./modelSchema";
import type { ModelSnapshot } from "./modelVersion";

const log = createLogger("model-resolver");

export type ModelResolverOptions = {
  cacheSize?: number;
  /** Version every request without an explicit version scores against, instead of the published one. */
  pinnedVersionId?: string | null;
};

export class ModelResolver {
  private readonly cache = new Map<string, Promise<ModelSnapshot>>();
  private readonly cacheSize: number;
  private readonly pinnedVersionId: string | null;

  constructor(
    private readonly store: CalibrationStore,
    options: ModelResolverOptions = {}
  ) {
    this.cacheSize = Math.max(1, options.cacheSize ?? 16);
    this.pinnedVersionId = options.pinnedVersionId ?? null;
  }

  async resolve(explicitVersionId?: string | null): Promise<ModelSnapshot> {
    const versionId = explicitVersionId ?? this.pinnedVersionId ?? (await this.store.getPublishedVersionId());
    if (!versionId) throw new ConfigError("No published model version to score against");
    return this.load(versionId);
  }

  /** Number of cached snapshots (for diagnostics and tests). */
  get cachedCount(): number {
    return this.cache.size;
  }

  clear(): void {
    this.cache.clear();
  }

  private load(versionId: string): Promise<ModelSnapshot> {
    const hit = this.cache.get(versionId);
    if (hit) {
      // Refresh recency.
      this.cache.delete(versionId);
      this.cache.set(versionId, hit);
      return hit;
    }

    const pending = this.fetchSnapshot(versionId);
    this.cache.set(versionId, pending);
    pending.catch(() => {
      if (this.cache.get(versionId) === pending) this.cache.delete(versionId);
    });
    while (this.cache.size > this.cacheSize) {
      const oldest = this.cache.keys().next();
      if (oldest.done) break;
      this.cache.delete(oldest.value);
    }
    return pending;
  }

  private async fetchSnapshot(versionId: string): Promise<ModelSnapshot> {
    const rows = await this.store.loadRows(versionId);
    if (!rows) throw new NotFoundError("Model version", versionId);
    if (rows.version.status === "DRAFT") {
      throw new ValidationError(
        [`model version ${versionId} is DRAFT; only PUBLISHED or ARCHIVED versions can score`],
        "Unscorable model version"
      );
    }
    const snapshot = buildSnapshot(rows);
    log.debug("snapshot loaded", { version_id: versionId, status: rows.version.status });
    return snapshot;
  }
}

/** Resolver configured from the environment (SNAPSHOT_CACHE_SIZE, SCORING_MODEL_VERSION). */
export function createModelResolver(store: CalibrationStore, env?: Record<string, string | undefined>): ModelResolver {
  const config = loadConfig(env);
  return new ModelResolver(store, {
    cacheSize: config.SNAPSHOT_CACHE_SIZE,
    pinnedVersionId: config.SCORING_MODEL_VERSION ?? null,
  });
}
