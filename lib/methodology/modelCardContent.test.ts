import { describe, it, expect } from "vitest";
import { loadSeedSnapshot } from "../calibration/seedModel";
import { buildModelCardSections, describeBinRange, modelCardTitle } from "./modelCardContent";

const snapshot = loadSeedSnapshot();

function bin(id: string) {
  const found = snapshot.binById.get(id);
  if (!found) throw new Error(`missing bin ${id}`);
  return found;
}

describe("describeBinRange", () => {
  it("renders numeric bounds with their inclusivity", () => {
    expect(describeBinRange(bin("LTV-1"))).toBe("(-inf, 75)");
    expect(describeBinRange(bin("LTV-2"))).toBe("[75, 85]");
  });

  it("renders categorical, missing and catch-all bins", () => {
    expect(describeBinRange(bin("Intrum-1"))).toBe("= 0 or absent input");
    expect(describeBinRange(bin("Permit-6"))).toBe("any other value");
  });
});

describe("buildModelCardSections", () => {
  const sections = buildModelCardSections(snapshot);

  it("has one section per factor plus the fixed sections", () => {
    expect(sections).toHaveLength(21);
    expect(sections[0]?.heading).toBe("Purpose");
    expect(sections.at(-1)?.heading).toBe("Limitations");
  });

  it("lists factor bins with signed scores", () => {
    const ltv = sections.find((s) => s.heading.endsWith(": LTV"));
    expect(ltv?.bullets?.[0]).toBe("<75%: (-inf, 75) -> +8 (Strong equity cushion)");
  });

  it("lists tiers from the highest threshold down and rules in code order", () => {
    const tiers = sections.find((s) => s.heading === "Risk Tiers");
    expect(tiers?.bullets?.[0]).toBe("BRIGHT_GREEN: score >= 25 -> AUTO_APPROVE, PD 1.5%");
    expect(tiers?.bullets?.at(-1)).toBe("RED: catch-all -> DECLINE, PD 15.0%");

    const rules = sections.find((s) => s.heading === "Business Rules");
    expect(rules?.bullets?.[0]).toBe("BR-01 Minor applicant [HARD, B2C only]: age < 18 -> RED / DECLINE");
    expect(rules?.bullets?.[1]).toBe("BR-02 Extreme over-financing [HARD]: ltv > 120 -> RED / DECLINE");
  });

  it("names the segment of a scoped factor", () => {
    const companyAge = sections.find((s) => s.heading === "Factor 11: CompanyAge");
    expect(companyAge?.body).toBe(
      "Years since founding in the commercial register Input: company_age_years. Weight 0.1. Score range [-10, 8]. Applies to company applicants only."
    );
  });

  it("titles the card by version", () => {
    expect(modelCardTitle("1.2.0")).toBe("Leasing Risk Model 1.2.0 - Model Card");
  });
});
