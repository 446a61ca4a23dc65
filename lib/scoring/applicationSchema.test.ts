import { describe, it, expect } from "vitest";
import { ValidationError } from "../errors";
import { parseLeasingApplication } from "./applicationSchema";
import { buildSampleApplication } from "./testModel";

const sampleApplication = buildSampleApplication();

describe("parseLeasingApplication", () => {
  it("accepts a complete application and applies defaults", () => {
    const parsed = parseLeasingApplication(sampleApplication);
    expect(parsed.customer.party_type).toBe("B2C");
    expect(parsed.contract.downpayment_amount).toBe(0);
    expect(parsed.model_version).toBeUndefined();
  });

  it("lists every invalid field", () => {
    const raw = {
      ...sampleApplication,
      customer: { ...sampleApplication.customer, customer_id: undefined },
      vehicle: { vehicle_price: -1 },
    };
    try {
      parseLeasingApplication(raw);
      expect.unreachable("expected ValidationError");
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      if (err instanceof ValidationError) {
        expect(err.violations).toContain("customer.customer_id: Required");
        expect(err.violations).toContain("vehicle.vehicle_price: Number must be greater than 0");
        expect(err.message.startsWith("Invalid leasing application: ")).toBe(true);
      }
    }
  });

  it("rejects a non-object payload", () => {
    expect(() => parseLeasingApplication("nope")).toThrow(ValidationError);
  });
});
