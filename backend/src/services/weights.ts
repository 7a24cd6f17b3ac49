/**
 * services/weights.ts — Weighting scheme resolution
 *
 * Two modes:
 *   theme  — one weight per group, split evenly across the group's metrics
 *   metric — one weight per metric, no sum constraint
 *
 * Both produce a flat metric id → weight map consumed by scoring.ts.
 */
import {
  DEFAULT_METRIC_WEIGHT, DEFAULT_PRESET, GROUP_IDS, METRICS, PRESETS, THEME_GROUPS, getMetric,
} from './catalog.ts';
import { ScoringError } from './errors.ts';
import type { GroupWeights, WeightScheme, WeightingInput } from '../types.ts';

function assertWeight(key: string, value: number): number {
  if (!Number.isFinite(value) || value < 0) {
    throw new ScoringError(`Weight for ${key} must be a finite, non-negative number`, 'INVALID_WEIGHT', 400);
  }
  return value;
}

/** Group weights for theme mode: the preset, overridden slider by slider. */
export function resolveGroupWeights(input: Extract<WeightingInput, { mode: 'theme' }>): GroupWeights {
  const preset = PRESETS[input.preset ?? DEFAULT_PRESET];
  const out = { ...preset };
  for (const id of GROUP_IDS) {
    const override = input.groupWeights?.[id];
    out[id] = assertWeight(id, override ?? preset[id]);
  }
  return out;
}

/**
 * Resolve a weighting input into metric weights.
 * Throws ScoringError(INVALID_WEIGHT) for negative or non-finite weights.
 */
export function resolveWeights(input: WeightingInput): WeightScheme {
  const weights: WeightScheme = {};

  if (input.mode === 'theme') {
    const groupWeights = resolveGroupWeights(input);
    for (const group of THEME_GROUPS) {
      for (const metric of group.metrics) {
        weights[metric] = groupWeights[group.id] / group.metrics.length;
      }
    }
    return weights;
  }

  for (const metric of METRICS) {
    weights[metric.id] = assertWeight(metric.id, input.metricWeights?.[metric.id] ?? DEFAULT_METRIC_WEIGHT);
  }
  return weights;
}

/** Sum resolved metric weights per group. Keys outside the catalog are skipped. */
export function summarizeGroupWeights(weights: WeightScheme): GroupWeights {
  const totals: GroupWeights = { strPerformance: 0, ltrSafetyNet: 0, entryValue: 0, fundamentals: 0 };
  for (const [id, weight] of Object.entries(weights)) {
    const metric = getMetric(id);
    if (metric) totals[metric.group] += weight;
  }
  return totals;
}
