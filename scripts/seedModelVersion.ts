/**
 * One-time seed: insert the baseline v1.2.0 calibration as a DRAFT and publish it through governance,
 * so it passes the same publish validation as any recalibration. Skips when the version already exists.
 *
 * Usage: npx tsx scripts/seedModelVersion.ts [--dry-run | --commit]
 */

import { createDraft, publish } from "../lib/calibration/governance";
import { validateModelVersion } from "../lib/calibration/publishValidation";
import { loadSeedModelRows, SEED_VERSION_ID } from "../lib/calibration/seedModel";
import { SupabaseCalibrationStore } from "../lib/calibration/supabaseCalibrationStore";
import { toErrorPayload } from "../lib/errors";

async function main() {
  const hasDryRun = process.argv.includes("--dry-run");
  const hasCommit = process.argv.includes("--commit");
  if (!hasDryRun && !hasCommit) {
    console.error("Use --dry-run to validate the seed only, or --commit to insert and publish it.");
    process.exit(1);
  }
  const dryRun = hasDryRun || !hasCommit;

  const rows = loadSeedModelRows();
  console.log(
    `Seed ${SEED_VERSION_ID}: ${rows.factors.length} factors, ${rows.bins.length} bins, ${rows.tiers.length} tiers, ${rows.rules.length} rules`
  );

  const violations = validateModelVersion(rows);
  if (violations.length > 0) {
    console.error("Seed fails publish validation:");
    for (const v of violations) console.error(`  - ${v}`);
    process.exit(1);
  }
  console.log("Seed passes publish validation.");

  if (dryRun) {
    console.log("Dry run: nothing written. Run with --commit to insert and publish.");
    return;
  }

  const store = new SupabaseCalibrationStore();
  const existing = await store.getVersion(SEED_VERSION_ID);
  if (existing) {
    console.log(`Version ${SEED_VERSION_ID} already exists (${existing.status}). Nothing to do.`);
    return;
  }

  const { version: _version, ...content } = rows;
  await createDraft(store, {
    baseVersionId: null,
    versionId: SEED_VERSION_ID,
    description: rows.version.description,
    actor: rows.version.created_by,
    reason: "Initial calibration seed",
    content,
  });
  const result = await publish(store, SEED_VERSION_ID, rows.version.created_by, "Initial calibration seed");
  console.log(
    `Published ${result.version_id} (archived: ${result.archived_version_id ?? "none"}, audit entries: ${result.audit_entries}).`
  );
}

main().catch((err) => {
  console.error("Seed failed:", toErrorPayload(err));
  process.exit(1);
});
