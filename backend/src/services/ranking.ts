/**
 * services/ranking.ts — Ranking, top-N, lookups and side-by-side comparison
 */
import { getMetric } from './catalog.ts';
import { scoredMetricIds } from './scoring.ts';
import { MarketNotAvailableError } from './errors.ts';
import type {
  ComparisonRow, MarketComparison, RankedMarket, RankedRow, ScoredMarket, WeightScheme,
} from '../types.ts';

const byText = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Sort by Master Score descending. Equal scores order by market name, then
 * state, both ascending, so ranking never depends on dataset order.
 */
export function rankMarkets(markets: readonly ScoredMarket[]): RankedMarket[] {
  return [...markets]
    .sort((a, b) => b.masterScore - a.masterScore || byText(a.name, b.name) || byText(a.state, b.state))
    .map((m, i) => ({ ...m, rank: i + 1 }));
}

export function topMarkets<T>(ranked: readonly T[], n: number): T[] {
  return ranked.slice(0, Math.max(0, Math.floor(n)));
}

/** Name, state, Master Score and the raw value of every weighted metric. */
export function buildRankedTable(ranked: readonly RankedMarket[], weights: WeightScheme): RankedRow[] {
  const ids = scoredMetricIds(weights);
  return ranked.map(m => {
    const values: RankedRow['values'] = {};
    for (const id of ids) values[id] = getMetric(id)?.read(m) ?? null;
    return { rank: m.rank, name: m.name, state: m.state, masterScore: m.masterScore, values };
  });
}

export function findMarket(ranked: readonly RankedMarket[], name: string): RankedMarket | undefined {
  return ranked.find(m => m.name === name);
}

/**
 * Side-by-side table of Master Score and each weighted metric's raw value.
 * Throws MarketNotAvailableError naming every market the filter removed.
 */
export function compareMarkets(
  ranked: readonly RankedMarket[],
  weights: WeightScheme,
  nameA: string,
  nameB: string,
): MarketComparison {
  const a = findMarket(ranked, nameA);
  const b = findMarket(ranked, nameB);
  if (!a || !b) {
    const missing = [!a ? nameA : null, !b ? nameB : null].filter((n): n is string => n !== null);
    throw new MarketNotAvailableError([...new Set(missing)]);
  }

  const rows: ComparisonRow[] = [{ metric: 'masterScore', label: 'Master Score', a: a.masterScore, b: b.masterScore }];
  for (const id of scoredMetricIds(weights)) {
    const metric = getMetric(id);
    if (!metric) continue;
    rows.push({ metric: id, label: metric.column, a: metric.read(a), b: metric.read(b) });
  }

  return { a, b, rows };
}
