/**
 * services/dataset.ts — Loads the market dataset from a CSV export of the
 * "Master Score Sheet".
 *
 * Header cells must use the sheet's column names. Market Name and State are
 * required; any numeric column may be absent or blank (→ null).
 */
import { readFile } from 'fs/promises';
import { z } from 'zod';
import { PRICE_COLUMN } from './catalog.ts';
import { parseCsv, toRecords } from './csv.ts';
import { DatasetError } from './errors.ts';
import { parseNumericCell } from './helpers.ts';
import { childLogger } from '../shared/logger.ts';
import type { MarketDataset, MarketRecord, RawMetricKey, RawMetrics } from '../types.ts';

const log = childLogger({ module: 'dataset' });

export const NAME_COLUMN = 'Market Name';
export const STATE_COLUMN = 'State';

/** Raw metric → sheet column header. */
export const RAW_COLUMNS: Record<RawMetricKey, string> = {
  price: PRICE_COLUMN,
  annualRevenue: 'Annual Revenue',
  ltrMedianRent: '2 Bed SFR Median Rent',
  marketScore: 'Market Score',
  occupancy: 'Occupancy',
  bookingDemandGrowth: 'Booking Demand Growth',
  grossYieldSfr: 'Gross Yield (SFR)',
  rentToPriceRatio: 'Rent-to-Price Ratio',
  smallMultiDiscount: 'Small Multi Discount Markets',
  homeValueGrowth5y: 'Home Value Growth (5 Years)',
  populationGrowth5y: 'Population Growth (5 years)',
  rentGrowthYoy: 'Rent Growth (YoY)',
  vacancyRate: 'Vacancy Rate',
};

export const RAW_METRIC_KEYS: readonly RawMetricKey[] = [
  'price', 'annualRevenue', 'ltrMedianRent', 'marketScore', 'occupancy', 'bookingDemandGrowth',
  'grossYieldSfr', 'rentToPriceRatio', 'smallMultiDiscount', 'homeValueGrowth5y',
  'populationGrowth5y', 'rentGrowthYoy', 'vacancyRate',
];

const RowIdentitySchema = z.object({
  [NAME_COLUMN]: z.string().trim(),
  [STATE_COLUMN]: z.string().trim().default(''),
});

/** Parse CSV text into market records. Rows without a name are skipped. */
export function parseMarketDataset(csv: string): MarketRecord[] {
  const rows = parseCsv(csv);
  const header = (rows[0] ?? []).map(h => h.trim());
  if (!header.includes(NAME_COLUMN)) {
    throw new DatasetError(`Dataset is missing the "${NAME_COLUMN}" column`);
  }

  const missing = RAW_METRIC_KEYS.filter(k => !header.includes(RAW_COLUMNS[k]));
  if (missing.length > 0) {
    log.warn({ columns: missing.map(k => RAW_COLUMNS[k]) }, 'Dataset columns absent — metrics will be skipped');
  }

  const markets: MarketRecord[] = [];
  const seen = new Set<string>();

  for (const record of toRecords(rows)) {
    const identity = RowIdentitySchema.parse(record);
    const name = identity[NAME_COLUMN];
    if (!name) continue;
    if (seen.has(name)) throw new DatasetError(`Duplicate market name: ${name}`, 'DUPLICATE_MARKET');
    seen.add(name);

    const cell = (key: RawMetricKey): number | null => parseNumericCell(record[RAW_COLUMNS[key]]);
    const metrics: RawMetrics = {
      price: cell('price'),
      annualRevenue: cell('annualRevenue'),
      ltrMedianRent: cell('ltrMedianRent'),
      marketScore: cell('marketScore'),
      occupancy: cell('occupancy'),
      bookingDemandGrowth: cell('bookingDemandGrowth'),
      grossYieldSfr: cell('grossYieldSfr'),
      rentToPriceRatio: cell('rentToPriceRatio'),
      smallMultiDiscount: cell('smallMultiDiscount'),
      homeValueGrowth5y: cell('homeValueGrowth5y'),
      populationGrowth5y: cell('populationGrowth5y'),
      rentGrowthYoy: cell('rentGrowthYoy'),
      vacancyRate: cell('vacancyRate'),
    };
    markets.push({ name, state: identity[STATE_COLUMN], metrics });
  }

  return markets;
}

/** Read and parse a dataset file. */
export async function loadMarketDataset(path: string): Promise<MarketDataset> {
  const t0 = Date.now();
  const csv = await readFile(path, 'utf8');
  const markets = parseMarketDataset(csv);
  log.info({ path, markets: markets.length, ms: Date.now() - t0 }, 'Dataset loaded');
  return { markets, source: path, loadedAt: new Date().toISOString() };
}
