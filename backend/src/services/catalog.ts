// ═══════════════════════════════════════════════════════
// catalog.ts — Metric catalog, theme groups and weight presets
// Every scored metric belongs to exactly one group and carries its direction.
// ═══════════════════════════════════════════════════════
import type {
  GroupWeights, MetricDefinition, MetricId, PresetName, ThemeGroup, ThemeGroupId,
} from '../types.ts';

/** Sheet column holding the purchase price used by the financial model. */
export const PRICE_COLUMN = 'Small Multi Median Sales Price 2025 YtD (2–4 Units)';

export const METRICS: readonly MetricDefinition[] = [
  // ── STR Performance ──
  {
    id: 'marketScore', column: 'Market Score', label: 'Market Score', group: 'strPerformance', direction: 'benefit',
    description: 'Overall STR market performance score from AirDNA.',
    read: m => m.metrics.marketScore,
  },
  {
    id: 'strYield', column: 'STR_Yield', label: 'STR Yield', group: 'strPerformance', direction: 'benefit',
    description: 'STR Annual Revenue divided by property price.',
    read: m => m.financials.strYield,
  },
  {
    id: 'occupancy', column: 'Occupancy', label: 'Occupancy', group: 'strPerformance', direction: 'benefit',
    description: 'Average annual occupancy rate for STR listings.',
    read: m => m.metrics.occupancy,
  },
  {
    id: 'bookingDemandGrowth', column: 'Booking Demand Growth', label: 'Booking Demand Growth', group: 'strPerformance', direction: 'benefit',
    description: 'Growth in STR demand year over year.',
    read: m => m.metrics.bookingDemandGrowth,
  },
  {
    id: 'strPositiveCf', column: 'STR_Positive_CF', label: 'STR Positive Cash Flow', group: 'strPerformance', direction: 'benefit',
    description: 'Binary flag: does STR cash flow after expenses?',
    read: m => m.financials.strPositiveCf,
  },

  // ── LTR Safety Net ──
  {
    id: 'grossYieldSfr', column: 'Gross Yield (SFR)', label: 'Gross Yield (SFR)', group: 'ltrSafetyNet', direction: 'benefit',
    description: 'LTR gross income / property price.',
    read: m => m.metrics.grossYieldSfr,
  },
  {
    id: 'ltrPositiveCf', column: 'LTR_Positive_CF', label: 'LTR Positive Cash Flow', group: 'ltrSafetyNet', direction: 'benefit',
    description: 'Binary flag: does LTR cash flow after expenses?',
    read: m => m.financials.ltrPositiveCf,
  },
  {
    id: 'rentToPriceRatio', column: 'Rent-to-Price Ratio', label: 'Rent-to-Price Ratio', group: 'ltrSafetyNet', direction: 'cost',
    description: 'Monthly rent divided by home price.',
    read: m => m.metrics.rentToPriceRatio,
  },

  // ── Entry & Value ──
  {
    id: 'medianPrice', column: PRICE_COLUMN, label: 'Median Price (2–4 Units)', group: 'entryValue', direction: 'cost',
    description: 'Median price for 2–4 unit properties.',
    read: m => m.metrics.price,
  },
  {
    id: 'smallMultiDiscount', column: 'Small Multi Discount Markets', label: 'Small Multi Discount', group: 'entryValue', direction: 'benefit',
    description: 'Market discount compared to list price.',
    read: m => m.metrics.smallMultiDiscount,
  },
  {
    id: 'homeValueGrowth5y', column: 'Home Value Growth (5 Years)', label: 'Home Value Growth (5 Years)', group: 'entryValue', direction: 'benefit',
    description: 'Appreciation over the past 5 years.',
    read: m => m.metrics.homeValueGrowth5y,
  },

  // ── Fundamentals ──
  {
    id: 'populationGrowth5y', column: 'Population Growth (5 years)', label: 'Population Growth (5 Years)', group: 'fundamentals', direction: 'benefit',
    description: 'Population change over the past 5 years.',
    read: m => m.metrics.populationGrowth5y,
  },
  {
    id: 'rentGrowthYoy', column: 'Rent Growth (YoY)', label: 'Rent Growth (YoY)', group: 'fundamentals', direction: 'benefit',
    description: 'Annual rent increase.',
    read: m => m.metrics.rentGrowthYoy,
  },
  {
    id: 'vacancyRate', column: 'Vacancy Rate', label: 'Vacancy Rate', group: 'fundamentals', direction: 'cost',
    description: '% of unoccupied rental units (lower is better).',
    read: m => m.metrics.vacancyRate,
  },
];

const GROUP_LABELS: Record<ThemeGroupId, string> = {
  strPerformance: 'STR Performance',
  ltrSafetyNet: 'LTR Safety Net',
  entryValue: 'Entry & Value',
  fundamentals: 'Fundamentals',
};

export const GROUP_IDS: readonly ThemeGroupId[] = ['strPerformance', 'ltrSafetyNet', 'entryValue', 'fundamentals'];

export const THEME_GROUPS: readonly ThemeGroup[] = GROUP_IDS.map(id => ({
  id,
  label: GROUP_LABELS[id],
  metrics: METRICS.filter(m => m.group === id).map(m => m.id),
}));

export const PRESETS: Record<PresetName, GroupWeights> = {
  'Balanced': { strPerformance: 0.40, ltrSafetyNet: 0.25, entryValue: 0.15, fundamentals: 0.20 },
  'Cash Flow Heavy': { strPerformance: 0.50, ltrSafetyNet: 0.30, entryValue: 0.10, fundamentals: 0.10 },
  'Appreciation First': { strPerformance: 0.30, ltrSafetyNet: 0.20, entryValue: 0.20, fundamentals: 0.30 },
};

export const PRESET_NAMES = ['Balanced', 'Cash Flow Heavy', 'Appreciation First'] as const satisfies readonly PresetName[];

export const DEFAULT_PRESET: PresetName = 'Balanced';

/** Per-metric slider default in metric mode. */
export const DEFAULT_METRIC_WEIGHT = 0.05;

export const TOP_N_CHOICES = [5, 10, 15, 20] as const;
export const DEFAULT_TOP_N = 10;

const METRIC_INDEX = new Map<string, MetricDefinition>(METRICS.map(m => [m.id, m]));

/** Catalog lookup. Unknown ids return undefined rather than throwing. */
export function getMetric(id: string): MetricDefinition | undefined {
  return METRIC_INDEX.get(id);
}
