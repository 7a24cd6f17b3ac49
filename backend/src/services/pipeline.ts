/**
 * services/pipeline.ts — One full scoring pass
 *
 * dataset → financial model → capital filter → (weights) → scoring → ranking
 *
 * Stateless: the same dataset and inputs always produce the same ranking.
 * Callers rerun it whenever any input changes.
 */
import { applyCapitalFilter } from './capital-filter.ts';
import { applyFinancialModel } from './finance.ts';
import { rankMarkets } from './ranking.ts';
import { scoreMarkets } from './scoring.ts';
import { resolveWeights, summarizeGroupWeights } from './weights.ts';
import { childLogger } from '../shared/logger.ts';
import { filteredMarkets, scoringPassDuration, scoringPasses } from '../shared/metrics.ts';
import type { MarketRecord, ScoringInputs, ScoringPass } from '../types.ts';

const log = childLogger({ module: 'pipeline' });

export function runScoringPass(markets: readonly MarketRecord[], inputs: ScoringInputs): ScoringPass {
  const end = scoringPassDuration.startTimer();

  const weights = resolveWeights(inputs.weighting);
  const financed = applyFinancialModel(markets, inputs.assumptions);
  const affordable = applyCapitalFilter(financed, inputs.assumptions.maxInvestment);
  const ranked = rankMarkets(scoreMarkets(affordable, weights));

  const seconds = end();
  scoringPasses.inc({ mode: inputs.weighting.mode });
  filteredMarkets.set(affordable.length);
  log.debug({
    mode: inputs.weighting.mode,
    total: markets.length,
    kept: affordable.length,
    maxInvestment: inputs.assumptions.maxInvestment,
    ms: +(seconds * 1000).toFixed(3),
  }, 'Scoring pass complete');

  return {
    weights,
    groupWeights: summarizeGroupWeights(weights),
    ranked,
    totalMarkets: markets.length,
    excludedMarkets: markets.length - affordable.length,
  };
}
