import { describe, it, expect } from "vitest";
import { ConfigError, UnmatchedValueError } from "../errors";
import { loadSeedSnapshot } from "../calibration/seedModel";
import { buildSnapshot } from "./modelSchema";
import type { ModelSnapshot } from "./modelVersion";
import { isAbsent, isCatchAllBin, numericBinMatches, selectBin } from "./factorBinner";
import { buildTestModelRows } from "./testModel";

const snapshot = buildSnapshot(buildTestModelRows());
const seed = loadSeedSnapshot();

function pick(s: ModelSnapshot, factorName: string, value: Parameters<typeof selectBin>[2]): string {
  const factor = s.factorByName.get(factorName);
  if (!factor) throw new Error(`no factor ${factorName}`);
  return selectBin(factor, s.binsByFactor.get(factorName) ?? [], value).id;
}

describe("isAbsent", () => {
  it("treats null, undefined and non-finite numbers as absent", () => {
    expect(isAbsent(null)).toBe(true);
    expect(isAbsent(undefined)).toBe(true);
    expect(isAbsent(Number.NaN)).toBe(true);
    expect(isAbsent(0)).toBe(false);
    expect(isAbsent("")).toBe(false);
  });
});

describe("numericBinMatches", () => {
  it("honours inclusive and exclusive bounds", () => {
    const bins = snapshot.binsByFactor.get("LTV") ?? [];
    const [below75, mid] = bins;
    expect(numericBinMatches(below75, 74.99)).toBe(true);
    expect(numericBinMatches(below75, 75)).toBe(false);
    expect(numericBinMatches(mid, 75)).toBe(true);
    expect(numericBinMatches(mid, 95)).toBe(true);
  });
});

describe("selectBin", () => {
  it("selects exactly one numeric bin per value", () => {
    expect(pick(snapshot, "LTV", 70)).toBe("LTV-1");
    expect(pick(snapshot, "LTV", 75)).toBe("LTV-2");
    expect(pick(snapshot, "LTV", 95)).toBe("LTV-2");
    expect(pick(snapshot, "LTV", 95.01)).toBe("LTV-3");
    expect(pick(snapshot, "Term", 36)).toBe("Term-1");
    expect(pick(snapshot, "Term", 37)).toBe("Term-2");
  });

  it("routes absent input to the missing bin", () => {
    expect(pick(snapshot, "CRIF", null)).toBe("CRIF-3");
    expect(pick(snapshot, "CRIF", undefined)).toBe("CRIF-3");
    expect(pick(snapshot, "LTV", Number.NaN)).toBe("LTV-4");
  });

  it("throws ConfigError when an absent input has no missing bin", () => {
    expect(() => pick(snapshot, "Term", null)).toThrow(ConfigError);
  });

  it("throws UnmatchedValueError for a present value no bin covers", () => {
    expect(() => pick(snapshot, "Term", "forty")).toThrow(UnmatchedValueError);
    try {
      pick(snapshot, "Term", "forty");
    } catch (err) {
      expect(err).toBeInstanceOf(UnmatchedValueError);
      if (err instanceof UnmatchedValueError) {
        expect(err.factorName).toBe("Term");
        expect(err.message).toBe("No bin of factor Term matches value forty");
      }
    }
  });

  it("matches categorical bins by value and falls back to the catch-all", () => {
    expect(pick(seed, "Permit", "C")).toBe("Permit-3");
    expect(pick(seed, "Permit", "B2B")).toBe("Permit-1");
    expect(pick(seed, "Permit", "UNKNOWN")).toBe("Permit-6");
    expect(pick(seed, "Permit", null)).toBe("Permit-7");
  });

  it("lets a missing bin also match its own category", () => {
    expect(pick(seed, "Intrum", 0)).toBe("Intrum-1");
    expect(pick(seed, "Intrum", null)).toBe("Intrum-1");
    expect(pick(seed, "Intrum", 1)).toBe("Intrum-2");
    expect(pick(seed, "Intrum", 3)).toBe("Intrum-3");
    expect(pick(seed, "Intrum", 4)).toBe("Intrum-4");
  });

  it("identifies catch-all bins", () => {
    const permit = seed.binsByFactor.get("Permit") ?? [];
    expect(permit.filter(isCatchAllBin).map((b) => b.id)).toEqual(["Permit-6"]);
  });
});
