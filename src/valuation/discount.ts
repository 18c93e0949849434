/**
 * Discounting & Terminal Value
 *
 * df[i] = 1 / (1 + wacc)^(i + 1)   (end-of-year convention)
 *
 * Terminal value:
 * - gordon:        UFCF_last × (1 + g) / (wacc − g), requires wacc > g
 * - exit-multiple: multiple × EBIT_last (or EBITDA_last)
 *
 * PV(TV) uses the final-year discount factor.
 */

import { DivisionByZeroError, InvalidAssumptionError, InvalidTerminalValueError } from './errors';
import type { ExitMetric, ForecastYear, ProjectedYear, TerminalMethod, TerminalValue } from './types';

export interface DiscountParams {
  wacc: number;
  terminalMethod: TerminalMethod;
  terminalGrowth: number;
  exitMultiple: number;
  exitMetric: ExitMetric;
  netDebt: number;
  sharesOutstanding: number;
}

export interface DiscountedValuation {
  forecast: ForecastYear[];
  terminal: TerminalValue;
  sumPvFcf: number;
  enterpriseValue: number;
  netDebt: number;
  equityValue: number;
  sharesOutstanding: number;
  valuePerShare: number;
  terminalValueShare: number;
}

export function discountFactors(wacc: number, years: number): number[] {
  if (!Number.isFinite(wacc) || wacc <= -1) {
    throw new InvalidAssumptionError(`must be finite and greater than -1, got ${wacc}`, 'wacc');
  }
  return Array.from({ length: years }, (_, i) => 1 / Math.pow(1 + wacc, i + 1));
}

/**
 * Undiscounted terminal value at the end of the final forecast year.
 */
export function computeTerminalValue(
  lastYear: ProjectedYear,
  params: Pick<DiscountParams, 'wacc' | 'terminalMethod' | 'terminalGrowth' | 'exitMultiple' | 'exitMetric'>
): Omit<TerminalValue, 'presentValue'> {
  if (params.terminalMethod === 'gordon') {
    const { wacc, terminalGrowth } = params;
    if (!Number.isFinite(terminalGrowth)) {
      throw new InvalidAssumptionError(`must be finite, got ${terminalGrowth}`, 'terminalGrowth');
    }
    if (!(wacc > terminalGrowth)) {
      throw new InvalidTerminalValueError(wacc, terminalGrowth);
    }
    return {
      method: 'gordon',
      value: (lastYear.unleveredFcf * (1 + terminalGrowth)) / (wacc - terminalGrowth),
      growth: terminalGrowth,
      multiple: null,
      metric: null,
    };
  }

  const { exitMultiple, exitMetric } = params;
  if (!Number.isFinite(exitMultiple) || exitMultiple <= 0) {
    throw new InvalidAssumptionError(`must be positive, got ${exitMultiple}`, 'exitMultiple');
  }
  const metricValue = exitMetric === 'ebitda' ? lastYear.ebitda : lastYear.ebit;
  return {
    method: 'exit-multiple',
    value: exitMultiple * metricValue,
    growth: null,
    multiple: exitMultiple,
    metric: exitMetric,
  };
}

export function toPerShare(equityValue: number, sharesOutstanding: number): number {
  if (!(sharesOutstanding > 0)) {
    throw new DivisionByZeroError(
      `share count must be positive to compute value per share, got ${sharesOutstanding}`,
      'sharesOutstanding'
    );
  }
  return equityValue / sharesOutstanding;
}

export function discountForecast(
  years: readonly ProjectedYear[],
  params: DiscountParams
): DiscountedValuation {
  if (years.length === 0) {
    throw new InvalidAssumptionError('forecast has no years to discount', 'forecast');
  }

  const factors = discountFactors(params.wacc, years.length);
  const forecast = years.map((year, i) =>
    Object.freeze({
      ...year,
      discountFactor: factors[i],
      presentValue: year.unleveredFcf * factors[i],
    })
  );

  const terminalBase = computeTerminalValue(years[years.length - 1], params);
  const terminal: TerminalValue = Object.freeze({
    ...terminalBase,
    presentValue: terminalBase.value * factors[factors.length - 1],
  });

  const sumPvFcf = forecast.reduce((sum, year) => sum + year.presentValue, 0);
  const enterpriseValue = sumPvFcf + terminal.presentValue;
  const equityValue = enterpriseValue - params.netDebt;
  const valuePerShare = toPerShare(equityValue, params.sharesOutstanding);

  return {
    forecast,
    terminal,
    sumPvFcf,
    enterpriseValue,
    netDebt: params.netDebt,
    equityValue,
    sharesOutstanding: params.sharesOutstanding,
    valuePerShare,
    terminalValueShare: enterpriseValue !== 0 ? terminal.presentValue / enterpriseValue : 0,
  };
}
