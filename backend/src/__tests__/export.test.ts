import { describe, it, expect } from 'vitest';
import { exportScoredCsv } from '../services/export.ts';
import { makeRanked } from './fixtures.ts';

describe('exportScoredCsv', () => {
  const market = {
    ...makeRanked('Austin, North', {
      masterScore: 0.5,
      metrics: { price: 100_000, occupancy: 60 },
      financials: { strYield: 0.2, totalCashRequired: 30_000 },
    }),
    normalized: { occupancy: 1 },
  };

  const lines = exportScoredCsv([market], { occupancy: 1 }).split('\r\n');

  it('writes raw, derived, normalized and score columns in that order', () => {
    const header = lines[0]?.split(',') ?? [];
    expect(header.slice(0, 3)).toEqual(['Market Name', 'State', 'Small Multi Median Sales Price 2025 YtD (2–4 Units)']);
    expect(header).toHaveLength(2 + 13 + 9 + 1 + 1);
    expect(header.slice(-4)).toEqual(['STR_Yield', 'Total_Cash_Required', 'Occupancy_norm', 'Master Score']);
  });

  it('writes one row per market with blanks for missing values', () => {
    const expected = [
      '"Austin, North"', 'TX',
      '100000', '', '', '', '60', '', '', '', '', '', '', '', '',
      '', '', '', '', '', '0', '0', '0.2', '30000',
      '1', '0.5',
    ].join(',');
    expect(lines[1]).toBe(expected);
    expect(lines[2]).toBe('');
    expect(lines).toHaveLength(3);
  });
});
