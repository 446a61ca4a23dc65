/**
 * Factor binning: pick exactly one calibrated bin for a raw input value.
 * First match in bin_order wins. Absent input → the factor's missing bin.
 * A value no bin covers is a calibration defect and throws; it never scores zero.
 */

import { ConfigError, UnmatchedValueError } from "../errors";
import type { AttributeValue, BinRecord, FactorRecord } from "./modelVersion";

type Bin = Readonly<BinRecord>;
type Bounds = Readonly<Pick<BinRecord, "lower_bound" | "upper_bound" | "lower_inclusive" | "upper_inclusive">>;

/** null, undefined and non-finite numbers count as absent input. */
export function isAbsent(value: AttributeValue | undefined): value is null | undefined {
  return value == null || (typeof value === "number" && !Number.isFinite(value));
}

export function isNumericBin(bin: Bin): boolean {
  return bin.lower_bound != null || bin.upper_bound != null;
}

export function isCategoricalBin(bin: Bin): boolean {
  return bin.match_value != null;
}

/** Matches every present value: no bounds, no match value, not the missing bin. */
export function isCatchAllBin(bin: Bin): boolean {
  return !bin.is_missing_bin && !isNumericBin(bin) && !isCategoricalBin(bin);
}

export function numericBinMatches(bin: Bounds, value: number): boolean {
  const { lower_bound: lo, upper_bound: hi } = bin;
  const aboveLower = lo == null || (bin.lower_inclusive ? value >= lo : value > lo);
  const belowUpper = hi == null || (bin.upper_inclusive ? value <= hi : value < hi);
  return aboveLower && belowUpper;
}

/** Whether a bin accepts a present value. A missing bin takes part only through its own criteria. */
export function binMatches(bin: Bin, value: Exclude<AttributeValue, null>): boolean {
  if (isCategoricalBin(bin)) return String(value) === bin.match_value;
  if (isNumericBin(bin)) return typeof value === "number" && numericBinMatches(bin, value);
  return !bin.is_missing_bin;
}

export function findMissingBin(bins: readonly Bin[]): Bin | undefined {
  return bins.find((b) => b.is_missing_bin);
}

export function selectBin(
  factor: Readonly<FactorRecord>,
  bins: readonly Bin[],
  value: AttributeValue | undefined
): Bin {
  if (isAbsent(value)) {
    const missing = findMissingBin(bins);
    if (!missing) {
      throw new ConfigError(`Factor ${factor.factor_name} has no missing bin for absent input ${factor.input_field}`, {
        version_id: factor.version_id,
        factor_name: factor.factor_name,
        input_field: factor.input_field,
      });
    }
    return missing;
  }
  for (const bin of bins) {
    if (binMatches(bin, value)) return bin;
  }
  throw new UnmatchedValueError(factor.factor_name, value);
}
