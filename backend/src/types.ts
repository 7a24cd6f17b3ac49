// ═══════════════════════════════════════════════════════
// Market Scoring — Core Type Definitions
// Every data shape used across the engine and the API.
// ═══════════════════════════════════════════════════════

// ── Raw dataset ──

/** Numeric columns read from the Master Score Sheet. */
export type RawMetricKey =
  | 'price'               // small multi (2–4 unit) median sales price
  | 'annualRevenue'       // STR annual revenue
  | 'ltrMedianRent'       // 2-bed SFR median monthly rent
  | 'marketScore'
  | 'occupancy'           // percent, e.g. 62.5
  | 'bookingDemandGrowth'
  | 'grossYieldSfr'
  | 'rentToPriceRatio'
  | 'smallMultiDiscount'
  | 'homeValueGrowth5y'
  | 'populationGrowth5y'
  | 'rentGrowthYoy'
  | 'vacancyRate';

/** Empty sheet cells are null. */
export type RawMetrics = Record<RawMetricKey, number | null>;

export interface MarketRecord {
  name: string;
  state: string;
  metrics: RawMetrics;
}

export interface MarketDataset {
  markets: readonly MarketRecord[];
  source: string;
  loadedAt: string;
}

// ── Financial model ──

export interface FinancialAssumptions {
  interestRate: number;      // annual, fraction
  loanTermYears: number;
  downPaymentPct: number;    // fraction
  strExpenseRatio: number;   // fraction of STR revenue
  ltrExpenseRatio: number;   // fraction of LTR rent
  renovationBuffer: number;  // flat amount, 0 when excluded
  maxInvestment: number;     // capital ceiling
}

export type CashFlowFlag = 0 | 1;

/** Monthly figures unless named otherwise. null when the inputs are missing. */
export interface MarketFinancials {
  estMortgage: number | null;
  strExpenses: number | null;
  strCashFlow: number | null;
  ltrExpenses: number | null;
  ltrCashFlow: number | null;
  strPositiveCf: CashFlowFlag;
  ltrPositiveCf: CashFlowFlag;
  strYield: number | null;
  /** Infinity for unpriced markets so the capital filter always drops them. */
  totalCashRequired: number;
}

export interface FinancedMarket extends MarketRecord {
  financials: MarketFinancials;
}

// ── Metric catalog ──

export type MetricId =
  | 'marketScore'
  | 'strYield'
  | 'occupancy'
  | 'bookingDemandGrowth'
  | 'strPositiveCf'
  | 'grossYieldSfr'
  | 'ltrPositiveCf'
  | 'rentToPriceRatio'
  | 'medianPrice'
  | 'smallMultiDiscount'
  | 'homeValueGrowth5y'
  | 'populationGrowth5y'
  | 'rentGrowthYoy'
  | 'vacancyRate';

export type ThemeGroupId = 'strPerformance' | 'ltrSafetyNet' | 'entryValue' | 'fundamentals';

/** cost: lower raw value scores higher. */
export type MetricDirection = 'cost' | 'benefit';

export interface MetricDefinition {
  id: MetricId;
  column: string;       // sheet / export column header
  label: string;
  description: string;
  group: ThemeGroupId;
  direction: MetricDirection;
  read: (market: FinancedMarket) => number | null;
}

export interface ThemeGroup {
  id: ThemeGroupId;
  label: string;
  metrics: readonly MetricId[];
}

export type PresetName = 'Balanced' | 'Cash Flow Heavy' | 'Appreciation First';

export type GroupWeights = Record<ThemeGroupId, number>;

// ── Weighting ──

export type WeightingInput =
  | { mode: 'theme'; preset?: PresetName; groupWeights?: Partial<GroupWeights> }
  | { mode: 'metric'; metricWeights?: Partial<Record<MetricId, number>> };

export type WeightingMode = WeightingInput['mode'];

/** metric id → weight. Keys outside the catalog are ignored when scoring. */
export type WeightScheme = Record<string, number>;

// ── Scoring & ranking ──

export interface ScoredMarket extends FinancedMarket {
  /** Per scored metric; null when this market lacks the value. */
  normalized: Partial<Record<MetricId, number | null>>;
  masterScore: number;
}

export interface RankedMarket extends ScoredMarket {
  rank: number;
}

export interface RankedRow {
  rank: number;
  name: string;
  state: string;
  masterScore: number;
  values: Partial<Record<MetricId, number | null>>;
}

export interface ComparisonRow {
  metric: 'masterScore' | MetricId;
  label: string;
  a: number | null;
  b: number | null;
}

export interface MarketComparison {
  a: RankedMarket;
  b: RankedMarket;
  rows: ComparisonRow[];
}

// ── Pipeline ──

export interface CapitalInput {
  maxInvestment: number;
  includeRenovation: boolean;
}

export interface ScoringInputs {
  assumptions: FinancialAssumptions;
  weighting: WeightingInput;
}

export interface ScoringPass {
  weights: WeightScheme;
  groupWeights: GroupWeights;
  ranked: RankedMarket[];
  totalMarkets: number;
  excludedMarkets: number;
}
