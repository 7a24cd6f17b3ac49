import { describe, it, expect } from 'vitest';
import {
  applyFinancialModel, computeMarketFinancials, monthlyMortgagePayment, totalCashRequired,
} from '../services/finance.ts';
import { ASSUMPTIONS, makeMarket } from './fixtures.ts';
import type { FinancialAssumptions } from '../types.ts';

describe('monthlyMortgagePayment', () => {
  it('amortizes $100k at 6% over 30 years to about $599.55', () => {
    expect(monthlyMortgagePayment(100_000, 0.06, 30)).toBeCloseTo(599.55, 2);
  });

  it('pays a zero-rate loan off linearly', () => {
    expect(monthlyMortgagePayment(120_000, 0, 10)).toBe(1000);
  });

  it('returns 0 for a zero principal', () => {
    expect(monthlyMortgagePayment(0, 0.07, 30)).toBe(0);
  });
});

describe('totalCashRequired', () => {
  it('adds 4% closing costs and the renovation buffer to the down payment', () => {
    expect(totalCashRequired(200_000, 0.2, 30_000)).toBeCloseTo(78_000, 6);
    expect(totalCashRequired(200_000, 0.2, 0)).toBeCloseTo(48_000, 6);
  });
});

describe('computeMarketFinancials', () => {
  const zeroRate: FinancialAssumptions = {
    ...ASSUMPTIONS,
    interestRate: 0,
    loanTermYears: 10,
    renovationBuffer: 30_000,
  };

  it('derives both rental scenarios from price, revenue and rent', () => {
    const f = computeMarketFinancials(
      makeMarket('A', { price: 200_000, annualRevenue: 48_000, ltrMedianRent: 1500 }),
      zeroRate,
    );

    // loan 160,000 over 120 payments
    expect(f.estMortgage).toBeCloseTo(1333.3333, 3);
    expect(f.strExpenses).toBeCloseTo(1200, 6);
    expect(f.strCashFlow).toBeCloseTo(1466.6667, 3);
    expect(f.ltrExpenses).toBeCloseTo(600, 6);
    expect(f.ltrCashFlow).toBeCloseTo(-433.3333, 3);
    expect(f.strPositiveCf).toBe(1);
    expect(f.ltrPositiveCf).toBe(0);
    expect(f.strYield).toBeCloseTo(0.24, 10);
    expect(f.totalCashRequired).toBeCloseTo(78_000, 6);
  });

  it('gives unpriced markets an infinite cash requirement and no yield', () => {
    for (const price of [null, 0, -5]) {
      const f = computeMarketFinancials(makeMarket('B', { price, annualRevenue: 40_000, ltrMedianRent: 1200 }), zeroRate);
      expect(f.totalCashRequired).toBe(Number.POSITIVE_INFINITY);
      expect(f.estMortgage).toBeNull();
      expect(f.strYield).toBeNull();
      expect(f.strCashFlow).toBeNull();
      expect(f.ltrCashFlow).toBeNull();
      expect(f.strPositiveCf).toBe(0);
      expect(f.ltrPositiveCf).toBe(0);
    }
  });

  it('nulls only the scenario whose input is missing', () => {
    const f = computeMarketFinancials(makeMarket('C', { price: 200_000, annualRevenue: 48_000 }), zeroRate);
    expect(f.strCashFlow).toBeCloseTo(1466.6667, 3);
    expect(f.ltrExpenses).toBeNull();
    expect(f.ltrCashFlow).toBeNull();
    expect(f.ltrPositiveCf).toBe(0);
  });

  it('treats a cash flow of exactly zero as not positive', () => {
    // payment 150,000 / 120 = 1250, expenses 0 → LTR cash flow 0
    const f = computeMarketFinancials(
      makeMarket('D', { price: 150_000, ltrMedianRent: 1250 }),
      { ...zeroRate, downPaymentPct: 0, ltrExpenseRatio: 0 },
    );
    expect(f.ltrCashFlow).toBe(0);
    expect(f.ltrPositiveCf).toBe(0);
  });
});

describe('applyFinancialModel', () => {
  it('returns new records and leaves the input untouched', () => {
    const input = [makeMarket('A', { price: 100_000 })];
    const out = applyFinancialModel(input, ASSUMPTIONS);
    expect(out).toHaveLength(1);
    expect(out[0]).not.toBe(input[0]);
    expect(input[0]).not.toHaveProperty('financials');
  });
});
