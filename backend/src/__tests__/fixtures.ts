import type {
  FinancedMarket, FinancialAssumptions, MarketFinancials, MarketRecord, RankedMarket, RawMetrics,
} from '../types.ts';

const EMPTY_METRICS: RawMetrics = {
  price: null,
  annualRevenue: null,
  ltrMedianRent: null,
  marketScore: null,
  occupancy: null,
  bookingDemandGrowth: null,
  grossYieldSfr: null,
  rentToPriceRatio: null,
  smallMultiDiscount: null,
  homeValueGrowth5y: null,
  populationGrowth5y: null,
  rentGrowthYoy: null,
  vacancyRate: null,
};

const EMPTY_FINANCIALS: MarketFinancials = {
  estMortgage: null,
  strExpenses: null,
  strCashFlow: null,
  ltrExpenses: null,
  ltrCashFlow: null,
  strPositiveCf: 0,
  ltrPositiveCf: 0,
  strYield: null,
  totalCashRequired: 0,
};

export function makeMarket(name: string, metrics: Partial<RawMetrics> = {}, state = 'TX'): MarketRecord {
  return { name, state, metrics: { ...EMPTY_METRICS, ...metrics } };
}

export function makeFinanced(
  name: string,
  metrics: Partial<RawMetrics> = {},
  financials: Partial<MarketFinancials> = {},
  state = 'TX',
): FinancedMarket {
  return { ...makeMarket(name, metrics, state), financials: { ...EMPTY_FINANCIALS, ...financials } };
}

export function makeRanked(
  name: string,
  opts: { state?: string; rank?: number; masterScore?: number; metrics?: Partial<RawMetrics>; financials?: Partial<MarketFinancials> } = {},
): RankedMarket {
  return {
    ...makeFinanced(name, opts.metrics, opts.financials, opts.state),
    normalized: {},
    masterScore: opts.masterScore ?? 0,
    rank: opts.rank ?? 1,
  };
}

export const ASSUMPTIONS: FinancialAssumptions = {
  interestRate: 0.07,
  loanTermYears: 30,
  downPaymentPct: 0.20,
  strExpenseRatio: 0.30,
  ltrExpenseRatio: 0.40,
  renovationBuffer: 0,
  maxInvestment: 1_000_000_000,
};

/**
 * Three markets where X beats Y beats Z on every metric.
 * Total cash with a 30k buffer: X 54,000, Y 78,000, Z 102,000.
 */
export const THREE_MARKETS: MarketRecord[] = [
  makeMarket('Z', {
    price: 300_000, annualRevenue: 30_000, ltrMedianRent: 1000, marketScore: 50, occupancy: 50,
    bookingDemandGrowth: 1, grossYieldSfr: 0.05, rentToPriceRatio: 0.003, smallMultiDiscount: 1,
    homeValueGrowth5y: 10, populationGrowth5y: 0.5, rentGrowthYoy: 1, vacancyRate: 9,
  }, 'OH'),
  makeMarket('X', {
    price: 100_000, annualRevenue: 60_000, ltrMedianRent: 1500, marketScore: 90, occupancy: 70,
    bookingDemandGrowth: 9, grossYieldSfr: 0.10, rentToPriceRatio: 0.015, smallMultiDiscount: 5,
    homeValueGrowth5y: 40, populationGrowth5y: 5, rentGrowthYoy: 5, vacancyRate: 3,
  }, 'TX'),
  makeMarket('Y', {
    price: 200_000, annualRevenue: 40_000, ltrMedianRent: 1200, marketScore: 70, occupancy: 60,
    bookingDemandGrowth: 5, grossYieldSfr: 0.07, rentToPriceRatio: 0.006, smallMultiDiscount: 3,
    homeValueGrowth5y: 25, populationGrowth5y: 2, rentGrowthYoy: 3, vacancyRate: 6,
  }, 'GA'),
];
