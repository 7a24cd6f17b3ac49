// ═══════════════════════════════════════════════════════
// Zod Schemas — Input validation for every API endpoint
// ═══════════════════════════════════════════════════════
import { z } from 'zod';
import { DEFAULT_TOP_N, PRESET_NAMES, TOP_N_CHOICES } from './services/catalog.ts';
import { DEFAULT_FINANCING, DEFAULT_MAX_INVESTMENT } from './services/finance.ts';
import type { MetricId, ScoringInputs, ThemeGroupId } from './types.ts';

// ── Shared pieces ──

const fraction = z.number().finite().min(0).max(1);
const weight = z.number().finite().min(0);

const PresetEnum = z.enum(PRESET_NAMES);

const GroupWeightsSchema = z.object({
  strPerformance: weight,
  ltrSafetyNet: weight,
  entryValue: weight,
  fundamentals: weight,
} satisfies Record<ThemeGroupId, z.ZodNumber>).partial();

const MetricWeightsSchema = z.object({
  marketScore: weight,
  strYield: weight,
  occupancy: weight,
  bookingDemandGrowth: weight,
  strPositiveCf: weight,
  grossYieldSfr: weight,
  ltrPositiveCf: weight,
  rentToPriceRatio: weight,
  medianPrice: weight,
  smallMultiDiscount: weight,
  homeValueGrowth5y: weight,
  populationGrowth5y: weight,
  rentGrowthYoy: weight,
  vacancyRate: weight,
} satisfies Record<MetricId, z.ZodNumber>).partial();

// ── Scoring body (POST /score, /export, /compare) ──

export const AssumptionsSchema = z.object({
  interestRate: fraction.default(DEFAULT_FINANCING.interestRate),
  loanTermYears: z.number().int().min(1).max(50).default(DEFAULT_FINANCING.loanTermYears),
  downPaymentPct: fraction.default(DEFAULT_FINANCING.downPaymentPct),
  strExpenseRatio: fraction.default(DEFAULT_FINANCING.strExpenseRatio),
  ltrExpenseRatio: fraction.default(DEFAULT_FINANCING.ltrExpenseRatio),
});

export const CapitalSchema = z.object({
  maxInvestment: z.number().finite().min(0).default(DEFAULT_MAX_INVESTMENT),
  includeRenovation: z.boolean().default(true),
});

export const WeightingSchema = z.discriminatedUnion('mode', [
  z.object({ mode: z.literal('theme'), preset: PresetEnum.optional(), groupWeights: GroupWeightsSchema.optional() }),
  z.object({ mode: z.literal('metric'), metricWeights: MetricWeightsSchema.optional() }),
]);

const TopNSchema = z.number().int().refine(
  (n) => TOP_N_CHOICES.some(choice => choice === n),
  { message: `topN must be one of ${TOP_N_CHOICES.join(', ')}` },
);

export const ScoreRequestSchema = z.object({
  assumptions: AssumptionsSchema.default({}),
  capital: CapitalSchema.default({}),
  weighting: WeightingSchema.default({ mode: 'theme' }),
  topN: TopNSchema.default(DEFAULT_TOP_N),
});

export type ScoreRequest = z.infer<typeof ScoreRequestSchema>;

export const CompareRequestSchema = ScoreRequestSchema.extend({
  marketA: z.string().trim().min(1).max(200),
  marketB: z.string().trim().min(1).max(200),
});

export type CompareRequest = z.infer<typeof CompareRequestSchema>;

/** Turn a validated request into engine inputs; the buffer amount comes from config. */
export function toScoringInputs(req: ScoreRequest, renovationBufferAmount: number): ScoringInputs {
  return {
    assumptions: {
      ...req.assumptions,
      renovationBuffer: req.capital.includeRenovation ? renovationBufferAmount : 0,
      maxInvestment: req.capital.maxInvestment,
    },
    weighting: req.weighting,
  };
}
