import { describe, it, expect } from 'vitest';
import { MarketNotAvailableError } from '../services/errors.ts';
import { buildRankedTable, compareMarkets, findMarket, rankMarkets, topMarkets } from '../services/ranking.ts';
import type { ScoredMarket } from '../types.ts';
import { makeFinanced, makeRanked } from './fixtures.ts';

const scored = (name: string, masterScore: number, state = 'TX'): ScoredMarket => ({
  ...makeFinanced(name, {}, {}, state),
  normalized: {},
  masterScore,
});

describe('rankMarkets', () => {
  it('orders by Master Score descending and numbers from 1', () => {
    const ranked = rankMarkets([scored('A', 0.2), scored('B', 0.9), scored('C', 0.5)]);
    expect(ranked.map(m => [m.rank, m.name])).toEqual([[1, 'B'], [2, 'C'], [3, 'A']]);
  });

  it('breaks ties by name, then state, regardless of input order', () => {
    const input = [scored('Mesa', 0.5, 'AZ'), scored('Austin', 0.5), scored('Mesa', 0.5, 'AL')];
    const forward = rankMarkets(input).map(m => `${m.name}/${m.state}`);
    const reversed = rankMarkets([...input].reverse()).map(m => `${m.name}/${m.state}`);
    expect(forward).toEqual(['Austin/TX', 'Mesa/AL', 'Mesa/AZ']);
    expect(reversed).toEqual(forward);
  });
});

describe('topMarkets', () => {
  const ranked = rankMarkets([scored('A', 3), scored('B', 2), scored('C', 1)]);

  it('returns the first N', () => {
    expect(topMarkets(ranked, 2).map(m => m.name)).toEqual(['A', 'B']);
  });

  it('returns everything when N exceeds the set', () => {
    expect(topMarkets(ranked, 10)).toHaveLength(3);
  });
});

describe('buildRankedTable', () => {
  it('lists raw values of the weighted metrics only', () => {
    const ranked = [makeRanked('Austin', {
      masterScore: 0.42,
      metrics: { price: 250_000, occupancy: 61 },
      financials: { strYield: 0.18 },
    })];
    expect(buildRankedTable(ranked, { strYield: 0.5, medianPrice: 0.5 })).toEqual([{
      rank: 1,
      name: 'Austin',
      state: 'TX',
      masterScore: 0.42,
      values: { strYield: 0.18, medianPrice: 250_000 },
    }]);
  });
});

describe('compareMarkets', () => {
  const ranked = [
    makeRanked('Austin', { rank: 1, masterScore: 0.8, metrics: { occupancy: 61 } }),
    makeRanked('Boise', { rank: 2, masterScore: 0.3, state: 'ID', metrics: { occupancy: 55 } }),
  ];

  it('puts Master Score first, then each weighted metric by sheet column', () => {
    const { a, b, rows } = compareMarkets(ranked, { occupancy: 1 }, 'Austin', 'Boise');
    expect(a.name).toBe('Austin');
    expect(b.state).toBe('ID');
    expect(rows).toEqual([
      { metric: 'masterScore', label: 'Master Score', a: 0.8, b: 0.3 },
      { metric: 'occupancy', label: 'Occupancy', a: 61, b: 55 },
    ]);
  });

  it('throws MarketNotAvailableError naming the filtered-out market', () => {
    try {
      compareMarkets(ranked, { occupancy: 1 }, 'Austin', 'Denver');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(MarketNotAvailableError);
      expect(err).toMatchObject({
        code: 'MARKET_NOT_AVAILABLE',
        status: 404,
        markets: ['Denver'],
        message: 'Denver not available under current filter',
      });
    }
  });

  it('names a missing market once when it is asked for twice', () => {
    expect(() => compareMarkets(ranked, {}, 'Denver', 'Denver')).toThrow('Denver not available under current filter');
  });

  it('finds markets by exact name', () => {
    expect(findMarket(ranked, 'Boise')?.rank).toBe(2);
    expect(findMarket(ranked, 'boise')).toBeUndefined();
  });
});
