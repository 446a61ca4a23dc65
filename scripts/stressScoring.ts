/**
 * Stress harness for the leasing scoring engine against the seed calibration.
 * Scores a deterministic pseudo-random population of applicants, prints the tier distribution,
 * bin coverage and hard-kill counts, and asserts the engine invariants.
 *
 * Run: npx tsx scripts/stressScoring.ts [--count 5000]
 */

import { loadSeedSnapshot } from "../lib/calibration/seedModel";
import { companyType } from "../lib/scoring/applicantAttributes";
import { assessAttributes, type AssessmentResult } from "../lib/scoring/assessment";
import { loadLegacyScorecard } from "../lib/scoring/legacyScorecard";
import type { AttributeValue } from "../lib/scoring/modelVersion";
import { orderTiersForScan } from "../lib/scoring/tierClassifier";

/** Mulberry32: small seeded PRNG so every run scores the same population. */
function prng(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function randomApplicant(rand: () => number): Record<string, AttributeValue> {
  const maybe = <T extends AttributeValue>(p: number, v: T): T | null => (rand() < p ? null : v);
  const pick = <T,>(xs: readonly T[]): T => xs[Math.floor(rand() * xs.length)];
  const b2b = rand() < 0.2;
  const shared = {
    party_type: b2b ? "B2B" : "B2C",
    ltv: maybe(0.05, Math.round(rand() * 13000) / 100),
    term_months: pick([12, 24, 36, 48, 60, 72, 84]),
    crif_score: maybe(0.1, Math.floor(rand() * 1000)),
    vehicle_price: Math.round(8000 + rand() * 150000),
    dealer_default_rate: maybe(0.2, Math.round(rand() * 25) / 100),
    seasoned_dealer_default_rate: maybe(0.3, Math.round(rand() * 25) / 100),
  };
  if (b2b) {
    const ebitda = maybe(0.1, Math.round((rand() * 1.2 - 0.1) * 1_000_000));
    const zefixStatus = maybe(0.1, pick(["ACTIVE", "ACTIVE", "ACTIVE", "UNKNOWN", "DISSOLVED", "NOT_FOUND"]));
    const legalForm = maybe(0.1, pick(["AG", "GmbH", "KG", "Einzelfirma", "Other"]));
    return {
      ...shared,
      permit_type: "B2B",
      company_age_years: maybe(0.05, Math.floor(rand() * 40)),
      debt_ratio: maybe(0.1, Math.round(rand() * 90) / 100),
      dscr_value: ebitda != null && ebitda > 0 ? Math.round(rand() * 400) / 100 : null,
      company_type: companyType(legalForm, zefixStatus),
      zefix_status: zefixStatus,
      industry_risk: maybe(0.1, pick(["Low", "Medium", "High", "Critical", "Unknown"])),
      annual_ebitda: ebitda,
    };
  }
  const zek = maybe(0.1, pick(["clean", "clean", "clean", "1", "2+"] as const));
  return {
    ...shared,
    age: maybe(0.05, 16 + Math.floor(rand() * 60)),
    intrum_score: maybe(0.2, Math.floor(rand() * 8)),
    dscr_value: maybe(0.1, Math.round((rand() * 25 - 2) * 100) / 100),
    permit_type: maybe(0.1, pick(["B", "C", "L", "DIPLOMAT", "UNKNOWN"])),
    zek_profile: zek,
    zek_entry_count: zek === "2+" ? 2 + Math.floor(rand() * 3) : zek === "1" ? 1 : zek === "clean" ? 0 : null,
    monthly_net_income: maybe(0.05, Math.round(rand() * 12000)),
  };
}

function main() {
  const countArg = process.argv.indexOf("--count");
  const count = countArg >= 0 ? Number(process.argv[countArg + 1]) : 5000;
  if (!Number.isInteger(count) || count <= 0) {
    console.error("--count must be a positive integer");
    process.exit(1);
  }

  const snapshot = loadSeedSnapshot();
  console.log(`Leasing scoring stress harness: model ${snapshot.version.version_id}, ${count} applicants\n`);

  const rand = prng(20260226);
  const distribution = new Map<string, number>(orderTiersForScan(snapshot.tiers).map((t) => [t.tier_name, 0]));
  const binHits = new Map<string, number>([...snapshot.binById.keys()].map((id) => [id, 0]));
  const killsByRule = new Map<string, number>();
  const legacyBands = new Map<string, number>();
  const legacyScorecard = loadLegacyScorecard();
  const scores: number[] = [];
  let nondeterministic = 0;
  let killWithScore = 0;
  let decisionMismatch = 0;

  for (let i = 0; i < count; i++) {
    const attributes = randomApplicant(rand);
    const options = { assessmentId: `stress-${i}`, now: () => new Date(0), legacyScorecard };
    const a: AssessmentResult = assessAttributes(snapshot, attributes, options);
    const b: AssessmentResult = assessAttributes(snapshot, attributes, options);
    if (JSON.stringify(a) !== JSON.stringify(b)) nondeterministic++;

    distribution.set(a.tier, (distribution.get(a.tier) ?? 0) + 1);
    if (a.legacy_band) legacyBands.set(a.legacy_band, (legacyBands.get(a.legacy_band) ?? 0) + 1);
    const kill = a.triggered_rules.find((r) => r.severity === "HARD");
    if (kill) {
      killsByRule.set(kill.rule_code, (killsByRule.get(kill.rule_code) ?? 0) + 1);
      if (a.total_score !== null || a.factor_breakdown.length > 0) killWithScore++;
      continue;
    }
    if (a.total_score !== null) scores.push(a.total_score);
    for (const f of a.factor_breakdown) binHits.set(f.bin_id, (binHits.get(f.bin_id) ?? 0) + 1);
    if (snapshot.tierByName.get(a.tier)?.decision !== a.decision) decisionMismatch++;
  }

  console.log("--- Distribution (count per tier) ---");
  console.log(JSON.stringify(Object.fromEntries(distribution), null, 2));
  console.log("\n--- Legacy bands (private applicants) ---");
  console.log(JSON.stringify(Object.fromEntries([...legacyBands].sort(([x], [y]) => x.localeCompare(y))), null, 2));
  console.log("\n--- Hard kills per rule ---");
  console.log(JSON.stringify(Object.fromEntries([...killsByRule].sort(([x], [y]) => x.localeCompare(y))), null, 2));

  const mean = scores.reduce((s, x) => s + x, 0) / Math.max(1, scores.length);
  console.log("\n--- Scored population ---");
  console.log(
    JSON.stringify(
      {
        scored: scores.length,
        mean_score: Math.round(mean * 100) / 100,
        min_score: scores.length ? Math.min(...scores) : null,
        max_score: scores.length ? Math.max(...scores) : null,
      },
      null,
      2
    )
  );

  const neverHit = [...binHits].filter(([, n]) => n === 0).map(([id]) => id);
  console.log(`\nBins never selected: ${neverHit.length ? neverHit.join(", ") : "none"}`);

  console.log("\n--- Assertions ---");
  const okDeterministic = nondeterministic === 0;
  const okKills = killWithScore === 0;
  const okDecisions = decisionMismatch === 0;
  console.log(`Deterministic (same input, same result): ${okDeterministic ? "PASS" : "FAIL"} (${nondeterministic})`);
  console.log(`Hard kills carry no score: ${okKills ? "PASS" : "FAIL"} (${killWithScore})`);
  console.log(`Decision matches tier: ${okDecisions ? "PASS" : "FAIL"} (${decisionMismatch})`);

  const allPass = okDeterministic && okKills && okDecisions;
  console.log(allPass ? "\nAll assertions passed." : "\nSome assertions failed.");
  process.exit(allPass ? 0 : 1);
}

main();
