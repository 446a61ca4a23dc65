/**
 * Legacy WoE scorecard with A-E bands, reported beside the composite for private applicants.
 * Score = intercept + the points of one bin per factor, rounded. It never changes tier or decision;
 * existing reports keep reading the band.
 *
 * Bins are tried in file order: match_value compares the value as text, bounds take numbers, and a
 * bin with neither takes any present value. An absent value takes the bin flagged matches_missing.
 * No matching bin adds 0 points.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { ConfigError } from "../errors";
import { isAbsent, numericBinMatches } from "./factorBinner";
import type { ApplicantAttributes, AttributeValue } from "./modelVersion";

const LEGACY_FILE = new URL("../../data/legacy-scorecard-1.2.0.json", import.meta.url);

const optionalNumber = z.number().finite().nullable().default(null);

const legacyBinSchema = z.object({
  bin_label: z.string().min(1),
  lower_bound: optionalNumber,
  upper_bound: optionalNumber,
  lower_inclusive: z.boolean().default(true),
  upper_inclusive: z.boolean().default(true),
  match_value: z.string().nullable().default(null),
  matches_missing: z.boolean().default(false),
  points: z.number().finite(),
  woe: optionalNumber,
  default_rate: z.number().min(0).max(1).nullable().default(null),
  sample_count: z.number().int().nonnegative().nullable().default(null),
});

const legacyFactorSchema = z.object({
  factor_name: z.string().min(1),
  input_field: z.string().min(1),
  coefficient: optionalNumber,
  bins: z.array(legacyBinSchema).min(1),
});

const legacyBandSchema = z.object({
  band: z.string().min(1),
  min_score: z.number().finite().nullable(),
});

export const legacyScorecardSchema = z
  .object({
    version_id: z.string().min(1),
    description: z.string().nullable().default(null),
    intercept: z.number().finite(),
    development_sample: z.number().int().nonnegative().nullable().default(null),
    /** Best band first; the last one has min_score null. */
    bands: z.array(legacyBandSchema).min(1),
    factors: z.array(legacyFactorSchema).min(1),
  })
  .superRefine((card, ctx) => {
    const floors = card.bands.map((b) => b.min_score);
    if (floors[floors.length - 1] !== null || floors.slice(0, -1).some((f) => f === null)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["bands"], message: "only the last band may have min_score null" });
    }
    for (let i = 1; i < floors.length - 1; i++) {
      const prev = floors[i - 1];
      const curr = floors[i];
      if (prev != null && curr != null && curr >= prev) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["bands", i], message: "min_score must descend" });
      }
    }
  });

export type LegacyScorecard = z.infer<typeof legacyScorecardSchema>;
export type LegacyBin = z.infer<typeof legacyBinSchema>;

export type LegacyFactorPoints = {
  factor_name: string;
  input_field: string;
  value: AttributeValue;
  bin_label: string | null;
  points: number;
  woe: number | null;
};

export type LegacyScore = {
  version_id: string;
  score: number;
  band: string;
  factors: LegacyFactorPoints[];
};

export function parseLegacyScorecard(raw: unknown): LegacyScorecard {
  const result = legacyScorecardSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigError(`Malformed legacy scorecard: ${issues.join("; ")}`, { issues });
  }
  return result.data;
}

let cached: LegacyScorecard | null = null;

/** The shipped 1.2.0 scorecard, parsed once per process. */
export function loadLegacyScorecard(): LegacyScorecard {
  if (!cached) cached = parseLegacyScorecard(JSON.parse(readFileSync(LEGACY_FILE, "utf8")));
  return cached;
}

export function selectLegacyBin(bins: readonly LegacyBin[], value: AttributeValue | undefined): LegacyBin | undefined {
  if (isAbsent(value)) return bins.find((b) => b.matches_missing);
  return bins.find((b) => {
    if (b.match_value != null) return String(value) === b.match_value;
    if (b.lower_bound != null || b.upper_bound != null) return typeof value === "number" && numericBinMatches(b, value);
    return true;
  });
}

export function legacyBand(scorecard: LegacyScorecard, score: number): string {
  const band = scorecard.bands.find((b) => b.min_score == null || score >= b.min_score);
  if (!band) throw new ConfigError(`Legacy scorecard ${scorecard.version_id} has no band for ${score}`);
  return band.band;
}

export function scoreLegacy(scorecard: LegacyScorecard, attributes: ApplicantAttributes): LegacyScore {
  let total = scorecard.intercept;
  const factors = scorecard.factors.map((factor): LegacyFactorPoints => {
    const value = attributes[factor.input_field] ?? null;
    const bin = selectLegacyBin(factor.bins, value);
    const points = bin?.points ?? 0;
    total += points;
    return {
      factor_name: factor.factor_name,
      input_field: factor.input_field,
      value,
      bin_label: bin?.bin_label ?? null,
      points,
      woe: bin?.woe ?? null,
    };
  });
  const score = Math.round(total);
  return { version_id: scorecard.version_id, score, band: legacyBand(scorecard, score), factors };
}
