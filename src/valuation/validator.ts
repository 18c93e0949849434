/**
 * Preconditions checked before any fade schedule or forecast is built.
 * The first failing check throws; nothing is computed on invalid input.
 */

import { ValidationError } from './errors';
import type { Assumptions, FinancialSnapshot } from './types';

const FINITE_FIELDS = [
  'startGrowth',
  'terminalGrowth',
  'daPctRevenue',
  'nwcPctRevenueChange',
  'sbcPctRevenue',
  'taxRate',
  'wacc',
  'exitMultiple',
] as const;

export function validateValuationInputs(snapshot: FinancialSnapshot, assumptions: Assumptions): void {
  if (!Number.isInteger(assumptions.horizonYears) || assumptions.horizonYears < 1) {
    throw new ValidationError(
      `must be a positive integer, got ${assumptions.horizonYears}`,
      'assumptions.horizonYears'
    );
  }
  if (!(snapshot.revenue > 0)) {
    throw new ValidationError(`must be greater than 0, got ${snapshot.revenue}`, 'snapshot.revenue');
  }
  if (!(snapshot.sharesOutstanding > 0)) {
    throw new ValidationError(
      `must be greater than 0, got ${snapshot.sharesOutstanding}`,
      'snapshot.sharesOutstanding'
    );
  }
  if (!Number.isFinite(snapshot.netDebt)) {
    throw new ValidationError(`must be finite, got ${snapshot.netDebt}`, 'snapshot.netDebt');
  }

  for (const field of FINITE_FIELDS) {
    if (!Number.isFinite(assumptions[field])) {
      throw new ValidationError(`must be finite, got ${assumptions[field]}`, `assumptions.${field}`);
    }
  }
  for (const end of ['start', 'end'] as const) {
    const margin = assumptions.operatingMargin[end];
    if (!Number.isFinite(margin) || margin >= 1) {
      throw new ValidationError(`must be below 1, got ${margin}`, `assumptions.operatingMargin.${end}`);
    }
  }
  if (assumptions.taxRate < 0 || assumptions.taxRate >= 1) {
    throw new ValidationError(`must be in [0, 1), got ${assumptions.taxRate}`, 'assumptions.taxRate');
  }
}

/**
 * Checked once the growth fade has been built from validated assumptions.
 */
export function validateGrowthPath(growthPath: readonly number[], horizonYears: number): void {
  if (growthPath.length === 0) {
    throw new ValidationError('growth-rate sequence is empty', 'growthPath');
  }
  if (growthPath.length !== horizonYears) {
    throw new ValidationError(`expected ${horizonYears} rates, got ${growthPath.length}`, 'growthPath');
  }
}
