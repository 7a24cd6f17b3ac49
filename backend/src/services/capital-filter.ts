// ═══════════════════════════════════════════════════════
// capital-filter.ts — Drops markets the investor cannot afford
// ═══════════════════════════════════════════════════════
import type { FinancedMarket } from '../types.ts';

/**
 * Keep markets whose total cash required fits under the capital ceiling.
 * Unpriced markets carry an Infinity requirement and never pass.
 */
export function applyCapitalFilter<T extends FinancedMarket>(markets: readonly T[], maxInvestment: number): T[] {
  return markets.filter(m => m.financials.totalCashRequired <= maxInvestment);
}
