/**
 * Publish a DRAFT model version after validation. --dry-run prints the violations and the net
 * changes against the base version without writing anything.
 *
 * Usage: npx tsx scripts/publishModelVersion.ts --version 1.2.1 --actor jane.doe [--reason "..."] [--dry-run | --commit]
 */

import { publish } from "../lib/calibration/governance";
import { validateModelVersion } from "../lib/calibration/publishValidation";
import { SupabaseCalibrationStore } from "../lib/calibration/supabaseCalibrationStore";
import { binScoreDeltas, diffModelVersions } from "../lib/calibration/versionDiff";
import { toErrorPayload } from "../lib/errors";

function argValue(name: string): string | undefined {
  const i = process.argv.indexOf(name);
  return i >= 0 ? process.argv[i + 1] : undefined;
}

async function main() {
  const hasDryRun = process.argv.includes("--dry-run");
  const hasCommit = process.argv.includes("--commit");
  const versionId = argValue("--version");
  const actor = argValue("--actor");
  const reason = argValue("--reason") ?? null;
  if ((!hasDryRun && !hasCommit) || !versionId || !actor) {
    console.error("Usage: --version <id> --actor <name> [--reason <text>] and --dry-run or --commit.");
    process.exit(1);
  }
  const dryRun = hasDryRun || !hasCommit;

  const store = new SupabaseCalibrationStore();
  const rows = await store.loadRows(versionId);
  if (!rows) {
    console.error(`Model version ${versionId} not found.`);
    process.exit(1);
  }
  if (rows.version.status !== "DRAFT") {
    console.error(`Model version ${versionId} is ${rows.version.status}; only DRAFT versions can be published.`);
    process.exit(1);
  }

  const base = rows.version.base_version_id ? await store.loadRows(rows.version.base_version_id) : null;
  const changes = diffModelVersions(base, rows);
  console.log(`Draft ${versionId} (base ${rows.version.base_version_id ?? "none"}): ${changes.length} changed fields`);
  for (const d of binScoreDeltas(base, rows).slice(0, 10)) {
    console.log(`  ${d.factor_name} / ${d.bin_label}: ${d.previous_score ?? "new"} -> ${d.current_score}`);
  }

  const violations = validateModelVersion(rows);
  if (violations.length > 0) {
    console.error(`${violations.length} violations:`);
    for (const v of violations) console.error(`  - ${v}`);
    process.exit(1);
  }

  if (dryRun) {
    console.log("Dry run: validation passed, nothing published. Run with --commit to publish.");
    return;
  }

  const result = await publish(store, versionId, actor, reason);
  console.log(
    `Published ${result.version_id}; archived ${result.archived_version_id ?? "none"}; ${result.audit_entries} audit entries.`
  );
}

main().catch((err) => {
  console.error("Publish failed:", toErrorPayload(err));
  process.exit(1);
});
