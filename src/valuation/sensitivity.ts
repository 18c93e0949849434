/**
 * Cost of capital × terminal growth sensitivity grid.
 *
 * Reuses the Base scenario's projected cash flows, net debt and share count
 * and re-runs only the discounting step per cell. Cells whose terminal value is undefined
 * (wacc <= g under Gordon) are marked n/a instead of failing the grid.
 */

import { createChildLogger } from '@/utils/logger';
import { discountForecast, type DiscountParams } from './discount';
import { InvalidAssumptionError, InvalidTerminalValueError } from './errors';
import type { SensitivityCell, SensitivityGrid, ValuationResult } from './types';

const logger = createChildLogger('sensitivity');

const AXIS_PRECISION = 10;
export const AXIS_TOLERANCE = 1e-9;

/**
 * Odd-length ascending axis centred exactly on `center`.
 */
export function buildAxis(center: number, step: number, size: number): number[] {
  if (!Number.isInteger(size) || size < 1 || size % 2 === 0) {
    throw new InvalidAssumptionError(`must be a positive odd integer, got ${size}`, 'sensitivity.size');
  }
  if (!Number.isFinite(step) || step <= 0) {
    throw new InvalidAssumptionError(`must be positive, got ${step}`, 'sensitivity.step');
  }

  const half = (size - 1) / 2;
  return Array.from({ length: size }, (_, i) => {
    const offset = i - half;
    if (offset === 0) return center;
    return Number((center + offset * step).toFixed(AXIS_PRECISION));
  });
}

function evaluateCell(base: ValuationResult, params: DiscountParams): SensitivityCell {
  try {
    return { status: 'ok', valuePerShare: discountForecast(base.forecast, params).valuePerShare };
  } catch (error) {
    if (error instanceof InvalidTerminalValueError) {
      return {
        status: 'n/a',
        reason: `wacc ${error.wacc} <= terminal growth ${error.terminalGrowth}`,
      };
    }
    throw error;
  }
}

export function runSensitivity(
  base: ValuationResult,
  waccAxis: readonly number[],
  terminalGrowthAxis: readonly number[]
): SensitivityGrid {
  const { assumptions } = base;

  const cells = waccAxis.map((wacc) =>
    Object.freeze(
      terminalGrowthAxis.map((terminalGrowth) =>
        Object.freeze(
          evaluateCell(base, {
            wacc,
            terminalGrowth,
            terminalMethod: assumptions.terminalMethod,
            exitMultiple: assumptions.exitMultiple,
            exitMetric: assumptions.exitMetric,
            netDebt: base.netDebt,
            sharesOutstanding: base.sharesOutstanding,
          })
        )
      )
    )
  );

  const invalid = cells.flat().filter((cell) => cell.status === 'n/a').length;
  if (invalid > 0) {
    logger.debug({ invalid, total: waccAxis.length * terminalGrowthAxis.length }, 'Sensitivity cells marked n/a');
  }

  return Object.freeze({
    terminalMethod: assumptions.terminalMethod,
    baseWacc: assumptions.wacc,
    baseTerminalGrowth: assumptions.terminalGrowth,
    waccAxis: Object.freeze([...waccAxis]),
    terminalGrowthAxis: Object.freeze([...terminalGrowthAxis]),
    cells: Object.freeze(cells),
  });
}

export function findCell(
  grid: SensitivityGrid,
  wacc: number,
  terminalGrowth: number,
  tolerance: number = AXIS_TOLERANCE
): SensitivityCell | null {
  const row = grid.waccAxis.findIndex((value) => Math.abs(value - wacc) <= tolerance);
  const col = grid.terminalGrowthAxis.findIndex((value) => Math.abs(value - terminalGrowth) <= tolerance);
  if (row === -1 || col === -1) return null;
  return grid.cells[row][col];
}
