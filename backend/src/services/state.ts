// ═══════════════════════════════════════════════════════
// state.ts — The loaded dataset, the only process-wide state
// Scoring passes read it and never write to it.
// ═══════════════════════════════════════════════════════
import { DatasetError } from './errors.ts';
import type { MarketDataset } from '../types.ts';

let dataset: MarketDataset | null = null;

export function setDataset(v: MarketDataset): void {
  dataset = { ...v, markets: Object.freeze([...v.markets]) };
}

export function hasDataset(): boolean {
  return dataset !== null;
}

/** Throws DATASET_NOT_LOADED until setDataset() has run. */
export function getDataset(): MarketDataset {
  if (!dataset) throw new DatasetError('Market dataset is not loaded yet', 'DATASET_NOT_LOADED');
  return dataset;
}

/** Reset all state (for testing) */
export function resetAll(): void {
  dataset = null;
}
