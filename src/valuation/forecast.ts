/**
 * Operating Forecast
 *
 * Compounds revenue along the growth fade and walks each year down to
 * unlevered free cash flow:
 *
 *   revenue = prior revenue × (1 + growth)
 *   EBIT    = revenue × operating margin
 *   NOPAT   = EBIT − max(EBIT, 0) × tax rate
 *   UFCF    = NOPAT + D&A + SBC − ΔNWC − capex
 *
 * ΔNWC is charged on the revenue change; D&A, SBC and capex on revenue.
 * Discounting happens in discount.ts.
 */

import { InvalidAssumptionError } from './errors';
import { fadeDriver, fadeSchedule } from './fade';
import type { Assumptions, FadeOptions, FinancialSnapshot, ProjectedYear } from './types';

export interface ForecastDrivers {
  growth: readonly number[];
  operatingMargin: readonly number[];
  capexPctRevenue: readonly number[];
}

export function materializeDrivers(assumptions: Assumptions): ForecastDrivers {
  const { horizonYears, fadeMethod, marginFadeMethod, fadeOptions } = assumptions;
  // midpoint is an absolute growth rate; margin and capex fades take only the unitless options
  const marginFadeOptions: FadeOptions = { decay: fadeOptions.decay, fastShare: fadeOptions.fastShare };
  return {
    growth: fadeSchedule(
      assumptions.startGrowth,
      assumptions.terminalGrowth,
      horizonYears,
      fadeMethod,
      fadeOptions
    ),
    operatingMargin: fadeDriver(assumptions.operatingMargin, horizonYears, marginFadeMethod, marginFadeOptions),
    capexPctRevenue: fadeDriver(assumptions.capexPctRevenue, horizonYears, marginFadeMethod, marginFadeOptions),
  };
}

export function yearLabel(baseYear: number | null, yearIndex: number): string {
  return baseYear === null ? `Y${yearIndex}` : `FY${baseYear + yearIndex}`;
}

export function buildForecast(
  snapshot: FinancialSnapshot,
  assumptions: Assumptions,
  drivers: ForecastDrivers = materializeDrivers(assumptions)
): ProjectedYear[] {
  if (!(snapshot.revenue > 0)) {
    throw new InvalidAssumptionError(`base revenue must be positive, got ${snapshot.revenue}`, 'revenue');
  }
  const horizon = drivers.growth.length;
  if (horizon === 0) {
    throw new InvalidAssumptionError('growth sequence is empty', 'growth');
  }
  if (drivers.operatingMargin.length !== horizon) {
    throw new InvalidAssumptionError(
      `expected ${horizon} values, got ${drivers.operatingMargin.length}`,
      'operatingMargin'
    );
  }
  if (drivers.capexPctRevenue.length !== horizon) {
    throw new InvalidAssumptionError(
      `expected ${horizon} values, got ${drivers.capexPctRevenue.length}`,
      'capexPctRevenue'
    );
  }

  const { daPctRevenue, sbcPctRevenue, nwcPctRevenueChange, taxRate } = assumptions;
  const years: ProjectedYear[] = [];
  let priorRevenue = snapshot.revenue;

  for (let i = 0; i < horizon; i++) {
    const growthRate = drivers.growth[i];
    const operatingMargin = drivers.operatingMargin[i];

    const revenue = priorRevenue * (1 + growthRate);
    const ebit = revenue * operatingMargin;
    const depreciationAmortization = revenue * daPctRevenue;
    const taxes = Math.max(ebit, 0) * taxRate;
    const nopat = ebit - taxes;
    const stockBasedCompensation = revenue * sbcPctRevenue;
    const addBacks = depreciationAmortization + stockBasedCompensation;
    const deltaNwc = (revenue - priorRevenue) * nwcPctRevenueChange;
    const capex = revenue * drivers.capexPctRevenue[i];

    years.push(
      Object.freeze({
        yearIndex: i + 1,
        label: yearLabel(assumptions.baseYear, i + 1),
        growthRate,
        revenue,
        operatingMargin,
        ebit,
        depreciationAmortization,
        ebitda: ebit + depreciationAmortization,
        taxes,
        nopat,
        stockBasedCompensation,
        addBacks,
        deltaNwc,
        capex,
        unleveredFcf: nopat + addBacks - deltaNwc - capex,
      })
    );
    priorRevenue = revenue;
  }

  return years;
}
