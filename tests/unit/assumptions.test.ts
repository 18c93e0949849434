import { describe, expect, it } from 'vitest';
import { DEFAULT_VALUATION_CONFIG } from '@/core/config';
import { buildBaseAssumptions, mean, resolveBaseYear, revenueCagr } from '@/valuation/assumptions';
import { makeSnapshot } from '../helpers';

const config = DEFAULT_VALUATION_CONFIG;

describe('revenueCagr', () => {
  it('compounds across the full history', () => {
    expect(revenueCagr([100, 110, 121])).toBeCloseTo(0.1, 12);
  });

  it('needs two positive endpoints', () => {
    expect(revenueCagr([100])).toBeNull();
    expect(revenueCagr(undefined)).toBeNull();
    expect(revenueCagr([0, 100])).toBeNull();
  });
});

describe('mean', () => {
  it('averages values and returns null when empty', () => {
    expect(mean([0.1, 0.2, 0.3])).toBeCloseTo(0.2, 12);
    expect(mean([])).toBeNull();
  });
});

describe('resolveBaseYear', () => {
  it('prefers the fiscal year', () => {
    expect(resolveBaseYear({ fiscalYear: 2024, asOf: '2025-03-31' })).toBe(2024);
  });

  it('falls back to the as-of date', () => {
    expect(resolveBaseYear({ fiscalYear: null, asOf: '2025-03-31' })).toBe(2025);
  });

  it('returns null for a missing or unparseable date', () => {
    expect(resolveBaseYear({ fiscalYear: null, asOf: null })).toBeNull();
    expect(resolveBaseYear({ fiscalYear: null, asOf: 'not-a-date' })).toBeNull();
  });
});

describe('buildBaseAssumptions', () => {
  it('falls back to config defaults with LOW confidence for a bare snapshot', () => {
    const assumptions = buildBaseAssumptions(makeSnapshot(), {}, config);

    expect(assumptions.scenario).toBe('base');
    expect(assumptions.horizonYears).toBe(5);
    expect(assumptions.startGrowth).toBe(0.05);
    expect(assumptions.sources.startGrowth).toBe('fallback_constant');
    expect(assumptions.terminalGrowth).toBe(0.025);
    expect(assumptions.sources.terminalGrowth).toBe('industry_norm');
    expect(assumptions.taxRate).toBe(0.21);
    expect(assumptions.confidence.taxRate).toBe('LOW');
    expect(assumptions.operatingMargin).toEqual({ start: 0.15, end: 0.15 });
    expect(assumptions.exitMultiple).toBe(12);
    expect(assumptions.fadeOptions.fastShare).toBe(0.6);
    expect(assumptions.fadeOptions.decay).toBeUndefined();
  });

  it('derives the cost of capital from CAPM with the resolved tax rate', () => {
    const assumptions = buildBaseAssumptions(makeSnapshot(), {}, config);
    expect(assumptions.wacc).toBeCloseTo(0.0860384615, 9);
    expect(assumptions.sources.wacc).toBe('industry_norm');

    const taxed = buildBaseAssumptions(makeSnapshot({ taxRate: 0 }), {}, config);
    expect(taxed.wacc).toBeCloseTo(0.115 / 1.3, 12);
  });

  it('reads filed facts as HIGH confidence ratios to revenue', () => {
    const snapshot = makeSnapshot({
      revenue: 2000,
      operatingMargin: 0.18,
      capex: 120,
      depreciationAmortization: 80,
      netWorkingCapital: 300,
      stockBasedCompensation: 20,
      taxRate: 0.24,
    });
    const assumptions = buildBaseAssumptions(snapshot, {}, config);

    expect(assumptions.operatingMargin).toEqual({ start: 0.18, end: 0.18 });
    expect(assumptions.capexPctRevenue).toEqual({ start: 0.06, end: 0.06 });
    expect(assumptions.daPctRevenue).toBe(0.04);
    expect(assumptions.nwcPctRevenueChange).toBe(0.15);
    expect(assumptions.sbcPctRevenue).toBe(0.01);
    expect(assumptions.taxRate).toBe(0.24);
    expect(assumptions.confidence.operatingMargin).toBe('HIGH');
    expect(assumptions.confidence.terminalOperatingMargin).toBe('HIGH');
    expect(assumptions.confidence.capexPctRevenue).toBe('HIGH');
  });

  it('uses filed history as MED confidence', () => {
    const snapshot = makeSnapshot({
      history: { revenue: [800, 880, 968], operatingMargin: [0.1, 0.12, 0.14] },
    });
    const assumptions = buildBaseAssumptions(snapshot, {}, config);

    expect(assumptions.startGrowth).toBeCloseTo(0.1, 12);
    expect(assumptions.operatingMargin.start).toBeCloseTo(0.12, 12);
    expect(assumptions.confidence.startGrowth).toBe('MED');
    expect(assumptions.confidence.operatingMargin).toBe('MED');
  });

  it('prefers caller-supplied values and methods', () => {
    const assumptions = buildBaseAssumptions(
      makeSnapshot({ operatingMargin: 0.18 }),
      {
        horizonYears: 7,
        fadeMethod: 'exponential',
        terminalMethod: 'exit-multiple',
        exitMetric: 'ebitda',
        fadeOptions: { decay: 0.4 },
        values: {
          wacc: { value: 0.09, source: 'filing' },
          terminalOperatingMargin: { value: 0.22, source: 'interpolated' },
        },
      },
      config
    );

    expect(assumptions.horizonYears).toBe(7);
    expect(assumptions.fadeMethod).toBe('exponential');
    expect(assumptions.marginFadeMethod).toBe('linear');
    expect(assumptions.terminalMethod).toBe('exit-multiple');
    expect(assumptions.exitMetric).toBe('ebitda');
    expect(assumptions.fadeOptions.decay).toBe(0.4);
    expect(assumptions.wacc).toBe(0.09);
    expect(assumptions.confidence.wacc).toBe('HIGH');
    expect(assumptions.operatingMargin).toEqual({ start: 0.18, end: 0.22 });
    expect(assumptions.confidence.terminalOperatingMargin).toBe('MED');
  });

  it('returns a frozen record', () => {
    const assumptions = buildBaseAssumptions(makeSnapshot(), {}, config);
    expect(Object.isFrozen(assumptions)).toBe(true);
    expect(Object.isFrozen(assumptions.sources)).toBe(true);
  });
});
