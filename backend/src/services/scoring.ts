/**
 * services/scoring.ts — Min-max normalization and Master Score
 *
 * For each weighted metric present in the filtered set:
 *   normalized  = (v - min) / (max - min), or 0 when the column is constant
 *   directional = 1 - normalized for cost metrics, normalized otherwise
 *   masterScore += weight * directional
 *
 * min/max depend on the filtered set, so every pass recomputes from scratch.
 */
import { getMetric } from './catalog.ts';
import type { FinancedMarket, MetricDefinition, MetricId, ScoredMarket, WeightScheme } from '../types.ts';

export interface ColumnRange {
  min: number;
  max: number;
}

/** Range of the finite values, or null when no market has one (column absent). */
export function columnRange(values: readonly (number | null)[]): ColumnRange | null {
  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;
  for (const v of values) {
    if (v === null || !Number.isFinite(v)) continue;
    if (v < min) min = v;
    if (v > max) max = v;
  }
  return min <= max ? { min, max } : null;
}

/** Min-max scale into [0,1]; a degenerate range maps everything to 0. */
export function normalizeValue(value: number, range: ColumnRange): number {
  if (range.max === range.min) return 0;
  return (value - range.min) / (range.max - range.min);
}

export function directionalValue(normalized: number, metric: Pick<MetricDefinition, 'direction'>): number {
  return metric.direction === 'cost' ? 1 - normalized : normalized;
}

/**
 * Score every market in the (already filtered) set.
 * Unknown weight keys and metrics with no values in the set are skipped.
 * A market missing one value gets null for it and no contribution.
 */
export function scoreMarkets(markets: readonly FinancedMarket[], weights: WeightScheme): ScoredMarket[] {
  const scored: ScoredMarket[] = markets.map(m => ({ ...m, normalized: {}, masterScore: 0 }));

  for (const [id, weight] of Object.entries(weights)) {
    const metric = getMetric(id);
    if (!metric) continue;

    const values = markets.map(m => metric.read(m));
    const range = columnRange(values);
    if (!range) continue;

    scored.forEach((market, i) => {
      const raw = values[i];
      if (raw === undefined || raw === null || !Number.isFinite(raw)) {
        market.normalized[metric.id] = null;
        return;
      }
      const normalized = normalizeValue(raw, range);
      market.normalized[metric.id] = normalized;
      market.masterScore += weight * directionalValue(normalized, metric);
    });
  }

  return scored;
}

/** Ids of the weighted metrics the catalog knows, in weight-scheme order. */
export function scoredMetricIds(weights: WeightScheme): MetricId[] {
  const ids: MetricId[] = [];
  for (const key of Object.keys(weights)) {
    const metric = getMetric(key);
    if (metric) ids.push(metric.id);
  }
  return ids;
}
