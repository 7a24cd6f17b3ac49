/**
 * services/finance.ts — Mortgage and cash-flow model per market
 *
 * Derives mortgage, STR/LTR monthly economics, positive-cash-flow flags,
 * STR yield and total cash required from the market's price, revenue and rent.
 */
import type {
  CashFlowFlag, FinancedMarket, FinancialAssumptions, MarketFinancials, MarketRecord,
} from '../types.ts';

/** Closing costs as a fraction of price, paid in cash on top of the down payment. */
export const CLOSING_COST_PCT = 0.04;

/**
 * Standard amortized monthly payment.
 * A zero rate pays the principal off linearly.
 *
 * @param annualRate - Annual interest rate as decimal
 * @param years - Loan term in years
 */
export function monthlyMortgagePayment(principal: number, annualRate: number, years: number): number {
  const monthlyRate = annualRate / 12;
  const numPayments = years * 12;

  if (monthlyRate === 0) return principal / numPayments;

  const growth = Math.pow(1 + monthlyRate, numPayments);
  return principal * ((monthlyRate * growth) / (growth - 1));
}

/** Cash required to close: down payment, closing costs and the renovation buffer. */
export function totalCashRequired(price: number, downPaymentPct: number, renovationBuffer: number): number {
  return (downPaymentPct + CLOSING_COST_PCT) * price + renovationBuffer;
}

const flag = (cashFlow: number | null): CashFlowFlag => (cashFlow !== null && cashFlow > 0 ? 1 : 0);

const finite = (value: number | null): value is number => value !== null && Number.isFinite(value);

/**
 * Financial model for one market.
 *
 * Markets without a usable price (missing, zero, negative) get null mortgage,
 * yield and cash flows and an Infinity cash requirement. Missing revenue or
 * rent only nulls the scenario that depends on it.
 */
export function computeMarketFinancials(market: MarketRecord, a: FinancialAssumptions): MarketFinancials {
  const { price, annualRevenue, ltrMedianRent } = market.metrics;

  if (!finite(price) || price <= 0) {
    return {
      estMortgage: null,
      strExpenses: finite(annualRevenue) ? (annualRevenue * a.strExpenseRatio) / 12 : null,
      strCashFlow: null,
      ltrExpenses: finite(ltrMedianRent) ? ltrMedianRent * a.ltrExpenseRatio : null,
      ltrCashFlow: null,
      strPositiveCf: 0,
      ltrPositiveCf: 0,
      strYield: null,
      totalCashRequired: Number.POSITIVE_INFINITY,
    };
  }

  const loanAmount = price * (1 - a.downPaymentPct);
  const estMortgage = monthlyMortgagePayment(loanAmount, a.interestRate, a.loanTermYears);

  let strExpenses: number | null = null;
  let strCashFlow: number | null = null;
  if (finite(annualRevenue)) {
    strExpenses = (annualRevenue * a.strExpenseRatio) / 12;
    strCashFlow = annualRevenue / 12 - estMortgage - strExpenses;
  }

  let ltrExpenses: number | null = null;
  let ltrCashFlow: number | null = null;
  if (finite(ltrMedianRent)) {
    ltrExpenses = ltrMedianRent * a.ltrExpenseRatio;
    ltrCashFlow = ltrMedianRent - estMortgage - ltrExpenses;
  }

  return {
    estMortgage,
    strExpenses,
    strCashFlow,
    ltrExpenses,
    ltrCashFlow,
    strPositiveCf: flag(strCashFlow),
    ltrPositiveCf: flag(ltrCashFlow),
    strYield: finite(annualRevenue) ? annualRevenue / price : null,
    totalCashRequired: totalCashRequired(price, a.downPaymentPct, a.renovationBuffer),
  };
}

/** Run the financial model over the whole dataset. Records are copied, never mutated. */
export function applyFinancialModel(markets: readonly MarketRecord[], a: FinancialAssumptions): FinancedMarket[] {
  return markets.map(m => ({ ...m, financials: computeMarketFinancials(m, a) }));
}

/** Starting point of the assumption sliders. */
export const DEFAULT_FINANCING = {
  interestRate: 0.07,
  loanTermYears: 30,
  downPaymentPct: 0.20,
  strExpenseRatio: 0.30,
  ltrExpenseRatio: 0.40,
} as const satisfies Omit<FinancialAssumptions, 'renovationBuffer' | 'maxInvestment'>;

export const DEFAULT_MAX_INVESTMENT = 100_000;
