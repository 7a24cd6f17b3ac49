/**
 * services/export.ts — Full scored table as CSV
 *
 * Rank order; raw sheet columns, derived financial columns, one
 * "<column>_norm" per scored metric, then Master Score.
 */
import { getMetric } from './catalog.ts';
import { stringifyCsv, type CsvCell } from './csv.ts';
import { NAME_COLUMN, RAW_COLUMNS, RAW_METRIC_KEYS, STATE_COLUMN } from './dataset.ts';
import { scoredMetricIds } from './scoring.ts';
import type { MarketFinancials, RankedMarket, WeightScheme } from '../types.ts';

export const EXPORT_FILE_NAME = 'top_markets_scored.csv';

const DERIVED_COLUMNS: readonly [string, keyof MarketFinancials][] = [
  ['Est_Mortgage', 'estMortgage'],
  ['STR_Expenses', 'strExpenses'],
  ['STR_CashFlow', 'strCashFlow'],
  ['LTR_Expenses', 'ltrExpenses'],
  ['LTR_CashFlow', 'ltrCashFlow'],
  ['STR_Positive_CF', 'strPositiveCf'],
  ['LTR_Positive_CF', 'ltrPositiveCf'],
  ['STR_Yield', 'strYield'],
  ['Total_Cash_Required', 'totalCashRequired'],
];

export function exportScoredCsv(ranked: readonly RankedMarket[], weights: WeightScheme): string {
  const normIds = scoredMetricIds(weights);

  const header = [
    NAME_COLUMN,
    STATE_COLUMN,
    ...RAW_METRIC_KEYS.map(k => RAW_COLUMNS[k]),
    ...DERIVED_COLUMNS.map(([column]) => column),
    ...normIds.map(id => `${getMetric(id)?.column ?? id}_norm`),
    'Master Score',
  ];

  const rows = ranked.map((m): CsvCell[] => [
    m.name,
    m.state,
    ...RAW_METRIC_KEYS.map(k => m.metrics[k]),
    ...DERIVED_COLUMNS.map(([, key]) => m.financials[key]),
    ...normIds.map(id => m.normalized[id]),
    m.masterScore,
  ]);

  return stringifyCsv(header, rows);
}
