// ═══════════════════════════════════════════════════════
// helpers.ts — Pure formatting utilities (zero dependencies)
// ═══════════════════════════════════════════════════════

const wholeDollars = new Intl.NumberFormat('en-US', {
  style: 'currency', currency: 'USD', maximumFractionDigits: 0, minimumFractionDigits: 0,
});

const usable = (v: number | null | undefined): v is number => v !== null && v !== undefined && Number.isFinite(v);

/** 310000 → "$310,000"; missing → "N/A" */
export function fmtCurrency(v: number | null | undefined): string {
  return usable(v) ? wholeDollars.format(v) : 'N/A';
}

/** Fraction as percent: 0.1234 → "12.34%" */
export function fmtPercent(v: number | null | undefined, decimals = 2): string {
  return usable(v) ? `${(v * 100).toFixed(decimals)}%` : 'N/A';
}

/** Fixed decimals with an optional suffix: (61.24, 1, '%') → "61.2%" */
export function fmtFixed(v: number | null | undefined, decimals = 2, suffix = ''): string {
  return usable(v) ? `${v.toFixed(decimals)}${suffix}` : 'N/A';
}

/**
 * Parse a sheet cell into a number.
 * Strips "$", thousands separators, "%" and whitespace; blank → null; garbage → null.
 */
export function parseNumericCell(raw: string | undefined): number | null {
  if (raw === undefined) return null;
  const cleaned = raw.replace(/[$,%\s]/g, '');
  if (cleaned === '' || cleaned === '-' || /^n\/?a$/i.test(cleaned)) return null;
  const n = Number(cleaned);
  return Number.isFinite(n) ? n : null;
}
