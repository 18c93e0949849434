import { describe, expect, it } from 'vitest';
import { buildForecast, materializeDrivers, yearLabel } from '@/valuation/forecast';
import { InvalidAssumptionError } from '@/valuation/errors';
import { makeAssumptions, makeSnapshot } from '../helpers';

describe('buildForecast', () => {
  it('walks revenue down to unlevered free cash flow', () => {
    const assumptions = makeAssumptions({
      horizonYears: 2,
      startGrowth: 0.1,
      terminalGrowth: 0.1,
      operatingMargin: { start: 0.2, end: 0.2 },
      daPctRevenue: 0.05,
      sbcPctRevenue: 0.01,
      taxRate: 0.25,
      nwcPctRevenueChange: 0.1,
      capexPctRevenue: { start: 0.06, end: 0.06 },
    });

    const [y1, y2] = buildForecast(makeSnapshot({ revenue: 1000 }), assumptions);

    expect(y1.yearIndex).toBe(1);
    expect(y1.revenue).toBeCloseTo(1100, 9);
    expect(y1.ebit).toBeCloseTo(220, 9);
    expect(y1.depreciationAmortization).toBeCloseTo(55, 9);
    expect(y1.ebitda).toBeCloseTo(275, 9);
    expect(y1.taxes).toBeCloseTo(55, 9);
    expect(y1.nopat).toBeCloseTo(165, 9);
    expect(y1.stockBasedCompensation).toBeCloseTo(11, 9);
    expect(y1.addBacks).toBeCloseTo(66, 9);
    expect(y1.deltaNwc).toBeCloseTo(10, 9);
    expect(y1.capex).toBeCloseTo(66, 9);
    expect(y1.unleveredFcf).toBeCloseTo(155, 9);

    expect(y2.yearIndex).toBe(2);
    expect(y2.revenue).toBeCloseTo(1210, 9);
    expect(y2.deltaNwc).toBeCloseTo(11, 9);
    expect(y2.unleveredFcf).toBeCloseTo(170.5, 9);
  });

  it('compounds revenue on the prior year for every year', () => {
    const assumptions = makeAssumptions({ horizonYears: 7, fadeMethod: 'piecewise' });
    const drivers = materializeDrivers(assumptions);
    const years = buildForecast(makeSnapshot({ revenue: 1000 }), assumptions, drivers);

    expect(years[0].revenue).toBe(1000 * (1 + drivers.growth[0]));
    for (let i = 1; i < years.length; i++) {
      expect(years[i].revenue).toBe(years[i - 1].revenue * (1 + drivers.growth[i]));
      expect(years[i].growthRate).toBe(drivers.growth[i]);
    }
  });

  it('fades the operating margin and capex intensity with the margin fade method', () => {
    const assumptions = makeAssumptions({
      horizonYears: 3,
      operatingMargin: { start: 0.1, end: 0.2 },
      capexPctRevenue: { start: 0.08, end: 0.04 },
    });
    const years = buildForecast(makeSnapshot(), assumptions);

    expect(years[0].operatingMargin).toBe(0.1);
    expect(years[1].operatingMargin).toBeCloseTo(0.15, 12);
    expect(years[2].operatingMargin).toBe(0.2);
    expect(years[2].capex).toBeCloseTo(years[2].revenue * 0.04, 9);
  });

  it('fades margin and capex through their own intermediate, not the growth midpoint', () => {
    const assumptions = makeAssumptions({
      horizonYears: 6,
      fadeMethod: 'piecewise',
      marginFadeMethod: 'piecewise',
      fadeOptions: { midpoint: 0.1 },
      operatingMargin: { start: 0.3, end: 0.25 },
      capexPctRevenue: { start: 0.08, end: 0.04 },
    });
    const drivers = materializeDrivers(assumptions);
    const years = buildForecast(makeSnapshot(), assumptions, drivers);

    // growth: 0.2 -> 0.1 over two years; margin: 0.3 + (0.25 - 0.3) * 0.6 = 0.27; capex: 0.08 - 0.04 * 0.6 = 0.056
    expect(drivers.growth[2]).toBeCloseTo(0.1, 12);
    expect(years[2].operatingMargin).toBeCloseTo(0.27, 12);
    expect(drivers.capexPctRevenue[2]).toBeCloseTo(0.056, 12);
    for (const year of years) {
      expect(year.operatingMargin).toBeGreaterThanOrEqual(0.25 - 1e-12);
      expect(year.operatingMargin).toBeLessThanOrEqual(0.3 + 1e-12);
    }
  });

  it('passes decay and fastShare to the margin fade', () => {
    const assumptions = makeAssumptions({
      horizonYears: 6,
      marginFadeMethod: 'piecewise',
      fadeOptions: { fastShare: 0.5 },
      operatingMargin: { start: 0.3, end: 0.2 },
    });
    const years = buildForecast(makeSnapshot(), assumptions);
    expect(years[2].operatingMargin).toBeCloseTo(0.25, 12);
  });

  it('does not tax operating losses', () => {
    const assumptions = makeAssumptions({
      horizonYears: 1,
      operatingMargin: { start: -0.1, end: -0.1 },
    });
    const [year] = buildForecast(makeSnapshot(), assumptions);

    expect(year.ebit).toBeLessThan(0);
    expect(year.taxes).toBe(0);
    expect(year.nopat).toBe(year.ebit);
  });

  it('labels years from the base fiscal year when known', () => {
    const years = buildForecast(makeSnapshot(), makeAssumptions({ horizonYears: 2, baseYear: 2025 }));
    expect(years.map((y) => y.label)).toEqual(['FY2026', 'FY2027']);
    expect(yearLabel(null, 3)).toBe('Y3');
  });

  it('returns frozen rows', () => {
    const [year] = buildForecast(makeSnapshot(), makeAssumptions({ horizonYears: 1 }));
    expect(Object.isFrozen(year)).toBe(true);
  });

  it('rejects non-positive base revenue', () => {
    expect(() => buildForecast(makeSnapshot({ revenue: 0 }), makeAssumptions())).toThrow(
      InvalidAssumptionError
    );
  });

  it('rejects an empty growth sequence', () => {
    expect(() =>
      buildForecast(makeSnapshot(), makeAssumptions(), {
        growth: [],
        operatingMargin: [],
        capexPctRevenue: [],
      })
    ).toThrow('growth: growth sequence is empty');
  });

  it('rejects driver sequences that do not match the growth sequence', () => {
    expect(() =>
      buildForecast(makeSnapshot(), makeAssumptions(), {
        growth: [0.1, 0.05],
        operatingMargin: [0.2],
        capexPctRevenue: [0.05, 0.05],
      })
    ).toThrow(InvalidAssumptionError);
  });
});
