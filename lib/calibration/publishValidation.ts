/**
 * Structural validation run before a version may be published.
 * Returns every violation found (never stops at the first); empty array = publishable.
 * Anything reported here would otherwise surface at scoring time as ConfigError / UnmatchedValueError.
 */

import { isCatchAllBin, isCategoricalBin, isNumericBin } from "../scoring/factorBinner";
import type { BinRecord, ModelVersionRows } from "../scoring/modelVersion";
import { compileCondition } from "../scoring/ruleCondition";
import { checkTierCoverage } from "../scoring/tierClassifier";

function duplicates(values: readonly string[]): string[] {
  const seen = new Set<string>();
  const dup = new Set<string>();
  for (const v of values) {
    if (seen.has(v)) dup.add(v);
    seen.add(v);
  }
  return [...dup];
}

function boundLabel(value: number | null, inclusive: boolean, side: "lower" | "upper"): string {
  if (value == null) return side === "lower" ? "(-inf" : "+inf)";
  return side === "lower" ? `${inclusive ? "[" : "("}${value}` : `${value}${inclusive ? "]" : ")"}`;
}

function rangeLabel(bin: BinRecord): string {
  return `${bin.bin_label} ${boundLabel(bin.lower_bound, bin.lower_inclusive, "lower")}, ${boundLabel(
    bin.upper_bound,
    bin.upper_inclusive,
    "upper"
  )}`;
}

/** A bin whose bounds admit no value at all. */
function isEmptyRange(bin: BinRecord): boolean {
  const { lower_bound: lo, upper_bound: hi } = bin;
  if (lo == null || hi == null) return false;
  if (lo > hi) return true;
  return lo === hi && !(bin.lower_inclusive && bin.upper_inclusive);
}

/**
 * Gaps and overlaps between neighbouring numeric bins, ordered along the number line.
 * Two bins touch cleanly only when they share a bound and exactly one side includes it.
 */
export function checkNumericContinuity(factorName: string, bins: readonly BinRecord[]): string[] {
  const violations: string[] = [];
  const sorted = bins
    .filter((b) => isNumericBin(b) && !isEmptyRange(b))
    .sort((a, b) => {
      const la = a.lower_bound ?? Number.NEGATIVE_INFINITY;
      const lb = b.lower_bound ?? Number.NEGATIVE_INFINITY;
      if (la !== lb) return la - lb;
      return (a.upper_bound ?? Number.POSITIVE_INFINITY) - (b.upper_bound ?? Number.POSITIVE_INFINITY);
    });

  for (let i = 1; i < sorted.length; i++) {
    const prev = sorted[i - 1];
    const curr = sorted[i];
    const where = `factor ${factorName}: bins ${rangeLabel(prev)} and ${rangeLabel(curr)}`;
    if (prev.upper_bound == null || curr.lower_bound == null) {
      violations.push(`${where} overlap`);
      continue;
    }
    if (prev.upper_bound < curr.lower_bound) {
      violations.push(`${where} leave a gap`);
    } else if (prev.upper_bound > curr.lower_bound) {
      violations.push(`${where} overlap`);
    } else if (prev.upper_inclusive && curr.lower_inclusive) {
      violations.push(`${where} overlap at ${curr.lower_bound}`);
    } else if (!prev.upper_inclusive && !curr.lower_inclusive) {
      violations.push(`${where} leave a gap at ${curr.lower_bound}`);
    }
  }
  return violations;
}

/**
 * Outer ends of a purely numeric factor. Without a catch-all, a value beyond the lowest or highest
 * bound would raise UnmatchedValueError at scoring time.
 */
export function checkNumericEnds(factorName: string, bins: readonly BinRecord[]): string[] {
  if (bins.some((b) => isCatchAllBin(b) || isCategoricalBin(b))) return [];
  const numeric = bins.filter((b) => isNumericBin(b) && !isEmptyRange(b));
  if (numeric.length === 0) return [];

  const violations: string[] = [];
  if (numeric.every((b) => b.lower_bound != null)) {
    const lowest = numeric.reduce((a, b) => ((b.lower_bound ?? 0) < (a.lower_bound ?? 0) ? b : a));
    const side = lowest.lower_inclusive ? "below" : "at or below";
    violations.push(`factor ${factorName}: values ${side} ${lowest.lower_bound} are not covered`);
  }
  if (numeric.every((b) => b.upper_bound != null)) {
    const highest = numeric.reduce((a, b) => ((b.upper_bound ?? 0) > (a.upper_bound ?? 0) ? b : a));
    const side = highest.upper_inclusive ? "above" : "at or above";
    violations.push(`factor ${factorName}: values ${side} ${highest.upper_bound} are not covered`);
  }
  return violations;
}

export function validateModelVersion(rows: ModelVersionRows): string[] {
  const violations: string[] = [];
  const versionId = rows.version.version_id;

  const tables: [string, readonly { id: string; version_id: string }[]][] = [
    ["factor", rows.factors],
    ["bin", rows.bins],
    ["tier", rows.tiers],
    ["rule", rows.rules],
  ];
  for (const [label, records] of tables) {
    for (const r of records) {
      if (r.version_id !== versionId) violations.push(`${label} ${r.id} belongs to version ${r.version_id}`);
    }
    for (const id of duplicates(records.map((r) => r.id))) violations.push(`duplicate ${label} id ${id}`);
  }

  // Factors and their bins
  for (const name of duplicates(rows.factors.map((f) => f.factor_name))) {
    violations.push(`duplicate factor name ${name}`);
  }
  const factorNames = new Set(rows.factors.map((f) => f.factor_name));
  for (const bin of rows.bins) {
    if (!factorNames.has(bin.factor_name)) violations.push(`bin ${bin.id} references unknown factor ${bin.factor_name}`);
  }

  for (const factor of rows.factors) {
    const name = factor.factor_name;
    const bins = rows.bins.filter((b) => b.factor_name === name);
    const missingBins = bins.filter((b) => b.is_missing_bin);

    if (factor.weight < 0 || factor.weight > 1) {
      violations.push(`factor ${name}: weight ${factor.weight} outside [0, 1]`);
    }
    if (factor.enabled && bins.length === 0) violations.push(`factor ${name}: enabled but has no bins`);
    if (factor.enabled && factor.nullable && missingBins.length !== 1) {
      violations.push(`factor ${name}: nullable input needs exactly one missing bin, found ${missingBins.length}`);
    } else if (missingBins.length > 1) {
      violations.push(`factor ${name}: ${missingBins.length} missing bins, at most one allowed`);
    }

    for (const order of duplicates(bins.map((b) => String(b.bin_order)))) {
      violations.push(`factor ${name}: duplicate bin_order ${order}`);
    }
    for (const bin of bins) {
      if (bin.lower_bound != null && bin.upper_bound != null && bin.lower_bound > bin.upper_bound) {
        violations.push(`factor ${name}: bin ${bin.bin_label} has lower_bound ${bin.lower_bound} > upper_bound ${bin.upper_bound}`);
      } else if (isEmptyRange(bin)) {
        violations.push(`factor ${name}: bin ${bin.bin_label} matches no value`);
      }
      if (isNumericBin(bin) && bin.match_value != null) {
        violations.push(`factor ${name}: bin ${bin.bin_label} mixes bounds and match_value`);
      }
      const { score_range_min: min, score_range_max: max } = factor;
      if ((min != null && bin.raw_score < min) || (max != null && bin.raw_score > max)) {
        violations.push(
          `factor ${name}: bin ${bin.bin_label} raw_score ${bin.raw_score} outside declared range [${min ?? "-inf"}, ${max ?? "+inf"}]`
        );
      }
    }
    const catchAlls = bins.filter(isCatchAllBin);
    if (catchAlls.length > 1) {
      violations.push(`factor ${name}: ${catchAlls.length} catch-all bins; only the first can ever match`);
    }
    violations.push(...checkNumericContinuity(name, bins));
    if (factor.enabled) violations.push(...checkNumericEnds(name, bins));
  }

  // Tiers
  violations.push(...checkTierCoverage(rows.tiers));
  const tierNames = new Set(rows.tiers.map((t) => t.tier_name));
  for (const tier of rows.tiers) {
    if (tier.estimated_pd != null && (tier.estimated_pd < 0 || tier.estimated_pd > 1)) {
      violations.push(`tier ${tier.tier_name}: estimated_pd ${tier.estimated_pd} outside [0, 1]`);
    }
  }

  // Rules
  for (const code of duplicates(rows.rules.map((r) => r.rule_code))) violations.push(`duplicate rule code ${code}`);
  for (const rule of rows.rules) {
    const compiled = compileCondition(rule.condition_field, rule.condition_operator, rule.condition_value);
    if (!compiled.ok) violations.push(`rule ${rule.rule_code}: ${compiled.error}`);
    if (!tierNames.has(rule.forced_tier)) {
      violations.push(`rule ${rule.rule_code}: forced_tier ${rule.forced_tier} is not a defined tier`);
    }
  }

  return violations;
}
