/**
 * Flatten a leasing application into the attribute map factors and rules read.
 * Inputs without an upstream value stay null so each factor routes to its missing-bin policy;
 * nothing here guesses a substitute. Attributes of the other party type are left null.
 */

import type { LeasingApplication } from "./applicationSchema";
import { calculateDscr, type DscrResult } from "./dscrCalculator";
import type { AttributeValue } from "./modelVersion";

/** Dealers younger than this have no usable default-rate history for scoring. */
export const MIN_DEALER_ACTIVE_MONTHS = 6;

export type DerivedAttributes = {
  attributes: Record<string, AttributeValue>;
  dscr: DscrResult;
};

/** Completed years between birth date and the reference date (calendar-based, not 365.25-day years). */
export function completedYears(dateOfBirth: string, reference: string): number | null {
  const dob = new Date(dateOfBirth);
  const ref = new Date(reference);
  if (Number.isNaN(dob.getTime()) || Number.isNaN(ref.getTime())) return null;
  let years = ref.getUTCFullYear() - dob.getUTCFullYear();
  const beforeBirthday =
    ref.getUTCMonth() < dob.getUTCMonth() ||
    (ref.getUTCMonth() === dob.getUTCMonth() && ref.getUTCDate() < dob.getUTCDate());
  if (beforeBirthday) years -= 1;
  return years;
}

function zekProfile(hasEntries: boolean | null | undefined, count: number | null | undefined): string | null {
  if (hasEntries == null) return null;
  if (!hasEntries) return "clean";
  return (count ?? 1) <= 1 ? "1" : "2+";
}

/** Register status first: a dissolved or unknown company scores as such whatever its form. */
export function companyType(
  legalForm: string | null | undefined,
  zefixStatus: string | null | undefined
): string {
  const status = zefixStatus ?? "UNKNOWN";
  if (status === "DISSOLVED" || status === "SUSPENDED") return "DISSOLVED";
  if (status === "NOT_FOUND") return "NOT_FOUND";
  const form = legalForm == null || legalForm === "Unknown" ? "OTHER" : legalForm.toUpperCase();
  return status === "UNKNOWN" ? `${form}_UNCHECKED` : form;
}

/** Existing plus annualised new debt service over annual revenue; null without positive revenue. */
export function debtRatio(
  annualRevenue: number | null | undefined,
  totalDebtService: number | null | undefined,
  monthlyPayment: number
): number | null {
  if (annualRevenue == null || annualRevenue <= 0) return null;
  return ((totalDebtService ?? 0) + monthlyPayment * 12) / annualRevenue;
}

function permitCategory(application: LeasingApplication): string | null {
  const { party_type, permit_type } = application.customer;
  if (party_type === "B2B") return "B2B";
  if (permit_type == null) return null;
  return permit_type.toUpperCase();
}

export function buildApplicantAttributes(application: LeasingApplication): DerivedAttributes {
  const { customer, vehicle, contract, dealer } = application;

  const dscr = calculateDscr({
    party_type: customer.party_type,
    monthly_payment: contract.monthly_payment,
    monthly_net_income: customer.monthly_net_income,
    monthly_rent: customer.monthly_rent,
    monthly_insurance: customer.monthly_insurance,
    monthly_alimony: customer.monthly_alimony,
    monthly_existing_obligations: customer.monthly_existing_obligations,
    annual_ebitda: customer.annual_ebitda,
    total_debt_service: customer.total_debt_service,
  });

  // Age at application time so a replay months later bins identically.
  const age = customer.date_of_birth ? completedYears(customer.date_of_birth, application.timestamp) : null;

  const dealerRate = dealer.dealer_default_rate ?? null;
  const seasoned =
    dealerRate != null && dealer.dealer_active_months != null && dealer.dealer_active_months >= MIN_DEALER_ACTIVE_MONTHS;

  const company = customer.party_type === "B2B";

  const attributes: Record<string, AttributeValue> = {
    party_type: customer.party_type,
    ltv: (contract.financed_amount / vehicle.vehicle_price) * 100,
    term_months: contract.term_months,
    age,
    crif_score: customer.crif_score ?? null,
    intrum_score: customer.intrum_score ?? null,
    dscr_value: dscr.dscr_value,
    permit_type: permitCategory(application),
    vehicle_price: vehicle.vehicle_price,
    dealer_default_rate: dealerRate,
    seasoned_dealer_default_rate: seasoned ? dealerRate : null,
    monthly_payment: contract.monthly_payment,
    financed_amount: contract.financed_amount,
    // private persons only
    zek_profile: company ? null : zekProfile(customer.zek_has_entries, customer.zek_entry_count),
    zek_entry_count: company ? null : customer.zek_has_entries === false ? 0 : customer.zek_entry_count ?? null,
    monthly_net_income: company ? null : customer.monthly_net_income ?? null,
    // companies only
    company_age_years: company ? customer.company_age_years ?? null : null,
    company_type: company ? companyType(customer.legal_form, customer.zefix_status) : null,
    zefix_status: company ? customer.zefix_status ?? null : null,
    industry_risk: company ? customer.industry_risk ?? null : null,
    debt_ratio: company ? debtRatio(customer.annual_revenue, customer.total_debt_service, contract.monthly_payment) : null,
    annual_revenue: company ? customer.annual_revenue ?? null : null,
    annual_ebitda: company ? customer.annual_ebitda ?? null : null,
  };

  for (const [key, value] of Object.entries(application.extra_attributes ?? {})) {
    if (attributes[key] == null) attributes[key] = value;
  }

  return { attributes, dscr };
}
