import { describe, it, expect } from 'vitest';
import { runScoringPass } from '../services/pipeline.ts';
import type { ScoringInputs } from '../types.ts';
import { ASSUMPTIONS, THREE_MARKETS } from './fixtures.ts';

const metricMode: ScoringInputs = { assumptions: ASSUMPTIONS, weighting: { mode: 'metric' } };

describe('runScoringPass', () => {
  it('ranks the market that wins every metric first', () => {
    const pass = runScoringPass(THREE_MARKETS, metricMode);
    expect(pass.ranked.map(m => m.name)).toEqual(['X', 'Y', 'Z']);
    expect(pass.totalMarkets).toBe(3);
    expect(pass.excludedMarkets).toBe(0);
  });

  it('sums the weights of the metrics each market leads on', () => {
    // every market has positive STR cash flow, so that column adds nothing;
    // X has the highest rent-to-price ratio, which counts against it
    const [x, , z] = runScoringPass(THREE_MARKETS, metricMode).ranked;
    expect(x?.masterScore).toBeCloseTo(0.60, 10);
    expect(x?.normalized.strPositiveCf).toBe(0);
    expect(x?.normalized.rentToPriceRatio).toBe(1);
    expect(z?.masterScore).toBeCloseTo(0.05, 10);
  });

  it('splits theme weights and reports them per group', () => {
    const pass = runScoringPass(THREE_MARKETS, { assumptions: ASSUMPTIONS, weighting: { mode: 'theme' } });
    expect(pass.ranked[0]?.masterScore).toBeCloseTo(0.92 - 0.25 / 3, 10);
    expect(pass.groupWeights.strPerformance).toBeCloseTo(0.4, 10);
    expect(pass.groupWeights.fundamentals).toBeCloseTo(0.2, 10);
  });

  it('is deterministic for identical inputs', () => {
    const first = runScoringPass(THREE_MARKETS, metricMode);
    const second = runScoringPass([...THREE_MARKETS].reverse(), metricMode);
    expect(second.ranked.map(m => [m.name, m.masterScore])).toEqual(first.ranked.map(m => [m.name, m.masterScore]));
  });

  it('normalizes against the filtered set only', () => {
    // 30k buffer: X needs 54k, Y 78k, Z 102k
    const pass = runScoringPass(THREE_MARKETS, {
      assumptions: { ...ASSUMPTIONS, renovationBuffer: 30_000, maxInvestment: 100_000 },
      weighting: { mode: 'metric', metricWeights: { medianPrice: 1 } },
    });
    expect(pass.excludedMarkets).toBe(1);
    const byName = Object.fromEntries(pass.ranked.map(m => [m.name, m.normalized.medianPrice]));
    expect(byName).toEqual({ X: 0, Y: 1 });
  });

  it('returns an empty ranking when nothing is affordable', () => {
    const pass = runScoringPass(THREE_MARKETS, { ...metricMode, assumptions: { ...ASSUMPTIONS, maxInvestment: 1 } });
    expect(pass.ranked).toEqual([]);
    expect(pass.excludedMarkets).toBe(3);
  });

  it('leaves the dataset untouched', () => {
    runScoringPass(THREE_MARKETS, metricMode);
    expect(THREE_MARKETS[0]).not.toHaveProperty('financials');
  });
});
