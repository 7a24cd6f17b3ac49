/**
 * services/narrative.ts — Investor comparison write-up for two markets
 *
 * Picks the higher-STR-yield market for short-term upside and the higher
 * LTR-cash-flow market for long-term safety. Ties and missing values go to
 * the second market.
 */
import { fmtCurrency, fmtFixed, fmtPercent } from './helpers.ts';
import type { RankedMarket } from '../types.ts';

export interface NarrativePicks {
  shortTermUpside: RankedMarket;
  longTermSafety: RankedMarket;
}

const greater = (x: number | null, y: number | null): boolean => x !== null && y !== null && x > y;

export function pickNarrativeWinners(a: RankedMarket, b: RankedMarket): NarrativePicks {
  return {
    shortTermUpside: greater(a.financials.strYield, b.financials.strYield) ? a : b,
    longTermSafety: greater(a.financials.ltrCashFlow, b.financials.ltrCashFlow) ? a : b,
  };
}

function marketBlock(m: RankedMarket): string {
  return [
    `${m.name}, ${m.state}:`,
    `- Master Score: ${fmtFixed(m.masterScore, 2)}`,
    `- STR Yield: ${fmtPercent(m.financials.strYield)} | LTR Gross Yield: ${fmtPercent(m.metrics.grossYieldSfr)}`,
    `- Occupancy Rate: ${fmtFixed(m.metrics.occupancy, 1, '%')}`,
    `- Median Price (2–4 Units): ${fmtCurrency(m.metrics.price)}`,
    `- STR Cash Flow: ${fmtCurrency(m.financials.strCashFlow)} | LTR Cash Flow: ${fmtCurrency(m.financials.ltrCashFlow)}`,
  ].join('\n');
}

/** Plain-text, two-paragraph comparison embedding both markets' key numbers. */
export function buildInvestorNarrative(a: RankedMarket, b: RankedMarket): string {
  const picks = pickNarrativeWinners(a, b);
  return [
    'Investor Insight Analysis',
    '',
    `Here is a high-level comparison between ${a.name} and ${b.name} under the current assumptions.`,
    '',
    marketBlock(a),
    '',
    marketBlock(b),
    '',
    'Recommendation:',
    `If you're seeking higher STR upside, go with ${picks.shortTermUpside.name}.`,
    `If long-term resilience and safety are top priority, ${picks.longTermSafety.name} may win.`,
  ].join('\n');
}
