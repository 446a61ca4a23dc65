/**
 * Strict Zod schema for an inbound leasing application (untrusted input).
 * Bureau scores, ZEK profile and dealer statistics are resolved upstream and may be absent.
 * Company register data (legal form, Zefix status, founding age, industry risk) applies to B2B parties.
 */

import { z } from "zod";
import { ValidationError } from "../errors";

const isoDate = z.string().refine((v) => !Number.isNaN(Date.parse(v)), "must be an ISO-8601 date");
const money = z.number().finite().nonnegative();
const optionalMoney = money.nullable().optional();

export const PERMIT_TYPES = ["B", "C", "L", "Diplomat", "Unknown"] as const;
export const LEGAL_FORMS = ["AG", "GmbH", "KG", "Einzelfirma", "Other", "Unknown"] as const;
export const ZEFIX_STATUSES = ["ACTIVE", "DISSOLVED", "SUSPENDED", "NOT_FOUND", "UNKNOWN"] as const;
export const INDUSTRY_RISKS = ["Low", "Medium", "High", "Critical", "Unknown"] as const;

const customerSchema = z.object({
  customer_id: z.string().min(1),
  party_type: z.enum(["B2B", "B2C"]),
  date_of_birth: isoDate.nullable().optional(),
  permit_type: z.enum(PERMIT_TYPES).nullable().optional(),
  monthly_net_income: optionalMoney,
  monthly_existing_obligations: optionalMoney,
  monthly_rent: optionalMoney,
  monthly_insurance: optionalMoney,
  monthly_alimony: optionalMoney,
  annual_revenue: optionalMoney,
  // negative for loss-making companies
  annual_ebitda: z.number().finite().nullable().optional(),
  total_debt_service: optionalMoney,
  crif_score: z.number().int().min(0).max(1000).nullable().optional(),
  intrum_score: z.number().int().min(0).max(10).nullable().optional(),
  zek_has_entries: z.boolean().nullable().optional(),
  zek_entry_count: z.number().int().nonnegative().nullable().optional(),
  legal_form: z.enum(LEGAL_FORMS).nullable().optional(),
  zefix_status: z.enum(ZEFIX_STATUSES).nullable().optional(),
  company_age_years: z.number().finite().nonnegative().nullable().optional(),
  industry_risk: z.enum(INDUSTRY_RISKS).nullable().optional(),
});

const vehicleSchema = z.object({
  vehicle_price: z.number().finite().positive(),
  vehicle_type: z.string().nullable().optional(),
});

const contractSchema = z.object({
  contract_id: z.string().min(1),
  financed_amount: z.number().finite().positive(),
  downpayment_amount: money.default(0),
  term_months: z.number().int().positive().max(120),
  monthly_payment: z.number().finite().positive(),
});

const dealerSchema = z.object({
  dealer_id: z.string().min(1),
  dealer_default_rate: z.number().min(0).max(1).nullable().optional(),
  dealer_active_months: z.number().int().nonnegative().nullable().optional(),
});

export const leasingApplicationSchema = z.object({
  request_id: z.string().min(1),
  timestamp: isoDate,
  customer: customerSchema,
  vehicle: vehicleSchema,
  contract: contractSchema,
  dealer: dealerSchema,
  /** Explicit scoring version (audit replay); defaults to the published version. */
  model_version: z.string().min(1).nullable().optional(),
  /** Pre-resolved attributes from upstream collaborators; they fill derived attributes left null, never replace a value. */
  extra_attributes: z.record(z.union([z.number(), z.string(), z.boolean(), z.null()])).optional(),
});

export type LeasingApplication = z.infer<typeof leasingApplicationSchema>;

/** Validate an untrusted application payload; ValidationError lists every invalid field. */
export function parseLeasingApplication(raw: unknown): LeasingApplication {
  const result = leasingApplicationSchema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError(
      result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`),
      "Invalid leasing application"
    );
  }
  return result.data;
}
