/**
 * Write the model card PDF of one version. --seed renders the bundled baseline without a database.
 *
 * Usage: npx tsx scripts/exportModelCard.ts (--version <id> | --seed) [--out model-card.pdf]
 */

import { writeFileSync } from "fs";
import { loadSeedSnapshot } from "../lib/calibration/seedModel";
import { SupabaseCalibrationStore } from "../lib/calibration/supabaseCalibrationStore";
import { toErrorPayload } from "../lib/errors";
import { buildModelCardPdf } from "../lib/methodology/buildModelCardPdf";
import { buildSnapshot } from "../lib/scoring/modelSchema";
import type { ModelSnapshot } from "../lib/scoring/modelVersion";

function argValue(name: string): string | undefined {
  const i = process.argv.indexOf(name);
  return i >= 0 ? process.argv[i + 1] : undefined;
}

async function loadSnapshot(): Promise<ModelSnapshot> {
  if (process.argv.includes("--seed")) return loadSeedSnapshot();
  const versionId = argValue("--version");
  if (!versionId) {
    console.error("Pass --version <id> or --seed.");
    process.exit(1);
  }
  const rows = await new SupabaseCalibrationStore().loadRows(versionId);
  if (!rows) {
    console.error(`Model version ${versionId} not found.`);
    process.exit(1);
  }
  return buildSnapshot(rows);
}

async function main() {
  const snapshot = await loadSnapshot();
  const out = argValue("--out") ?? `model-card-${snapshot.version.version_id}.pdf`;
  const bytes = await buildModelCardPdf({ snapshot, generatedAt: new Date().toISOString() });
  writeFileSync(out, bytes);
  console.log(`Wrote ${out} (${bytes.length} bytes).`);
}

main().catch((err) => {
  console.error("Export failed:", toErrorPayload(err));
  process.exit(1);
});
