/**
 * Weighted average cost of capital from CAPM components.
 *
 *   Ke   = rf + β × ERP
 *   Kd'  = Kd × (1 − t)
 *   Wd   = (D/E) / (1 + D/E),  We = 1 / (1 + D/E)
 *   WACC = We × Ke + Wd × Kd'
 */

import { InvalidAssumptionError } from './errors';

export interface CostOfCapitalInputs {
  riskFreeRate: number;
  equityRiskPremium: number;
  beta: number;
  costOfDebt: number;
  taxRate: number;
  debtToEquity: number;
}

export interface CostOfCapitalBreakdown {
  costOfEquity: number;
  afterTaxCostOfDebt: number;
  equityWeight: number;
  debtWeight: number;
  wacc: number;
}

export function computeCostOfCapital(inputs: CostOfCapitalInputs): CostOfCapitalBreakdown {
  if (!Number.isFinite(inputs.debtToEquity) || inputs.debtToEquity < 0) {
    throw new InvalidAssumptionError(
      `must be a non-negative number, got ${inputs.debtToEquity}`,
      'debtToEquity'
    );
  }

  const costOfEquity = inputs.riskFreeRate + inputs.beta * inputs.equityRiskPremium;
  const afterTaxCostOfDebt = inputs.costOfDebt * (1 - inputs.taxRate);
  const debtWeight = inputs.debtToEquity / (1 + inputs.debtToEquity);
  const equityWeight = 1 / (1 + inputs.debtToEquity);

  return {
    costOfEquity,
    afterTaxCostOfDebt,
    equityWeight,
    debtWeight,
    wacc: equityWeight * costOfEquity + debtWeight * afterTaxCostOfDebt,
  };
}
