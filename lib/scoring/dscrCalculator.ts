/**
 * Debt service coverage for the DSCR factor and the negative-DSCR kill rule.
 * B2C: (net income − rent − insurance − alimony − existing obligations − living-cost floor) / new payment.
 * B2B: EBITDA / (existing annual debt service + annualised new payment).
 * Returns dscr_value = null (method FALLBACK) when inputs are insufficient; the factor then scores its missing bin.
 */

/** Swiss subsistence minimum, single person, CHF/month. */
export const MINIMUM_LIVING_COST_SINGLE = 1350;
export const MINIMUM_LIVING_COST_BUFFER_PCT = 0.1;

export type DscrMethod = "B2C_NET_INCOME" | "B2B_EBITDA" | "FALLBACK";

export type DscrInput = {
  party_type: "B2B" | "B2C";
  monthly_payment: number;
  monthly_net_income?: number | null;
  monthly_rent?: number | null;
  monthly_insurance?: number | null;
  monthly_alimony?: number | null;
  monthly_existing_obligations?: number | null;
  annual_ebitda?: number | null;
  total_debt_service?: number | null;
};

export type DscrResult = {
  dscr_value: number | null;
  monthly_disposable_income: number | null;
  monthly_payment: number;
  calculation_method: DscrMethod;
  is_valid: boolean;
};

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

function calcB2c(input: DscrInput): DscrResult {
  const { monthly_payment } = input;
  const netIncome = input.monthly_net_income;
  if (netIncome == null || netIncome <= 0) {
    return {
      dscr_value: null,
      monthly_disposable_income: null,
      monthly_payment,
      calculation_method: "FALLBACK",
      is_valid: false,
    };
  }

  const minLiving = MINIMUM_LIVING_COST_SINGLE * (1 + MINIMUM_LIVING_COST_BUFFER_PCT);
  const deductions =
    (input.monthly_rent ?? 0) +
    (input.monthly_insurance ?? 0) +
    (input.monthly_alimony ?? 0) +
    (input.monthly_existing_obligations ?? 0) +
    minLiving;
  const disposable = netIncome - deductions;

  if (monthly_payment <= 0) {
    return {
      dscr_value: null,
      monthly_disposable_income: round2(disposable),
      monthly_payment,
      calculation_method: "B2C_NET_INCOME",
      is_valid: false,
    };
  }

  return {
    dscr_value: round2(disposable / monthly_payment),
    monthly_disposable_income: round2(disposable),
    monthly_payment,
    calculation_method: "B2C_NET_INCOME",
    is_valid: true,
  };
}

function calcB2b(input: DscrInput): DscrResult {
  const { monthly_payment } = input;
  const ebitda = input.annual_ebitda;
  if (ebitda == null || ebitda <= 0) {
    return {
      dscr_value: null,
      monthly_disposable_income: null,
      monthly_payment,
      calculation_method: "FALLBACK",
      is_valid: false,
    };
  }

  const totalAnnualDebtService = (input.total_debt_service ?? 0) + monthly_payment * 12;
  if (totalAnnualDebtService <= 0) {
    return {
      dscr_value: null,
      monthly_disposable_income: null,
      monthly_payment,
      calculation_method: "B2B_EBITDA",
      is_valid: false,
    };
  }

  return {
    dscr_value: round2(ebitda / totalAnnualDebtService),
    monthly_disposable_income: round2(ebitda / 12 - monthly_payment),
    monthly_payment,
    calculation_method: "B2B_EBITDA",
    is_valid: true,
  };
}

export function calculateDscr(input: DscrInput): DscrResult {
  return input.party_type === "B2B" ? calcB2b(input) : calcB2c(input);
}
