import { labelAssumptions, mapAssumptionKeys } from '@/valuation/confidence';
import type { Assumptions, FinancialSnapshot, ProjectedYear, ProvenanceTag } from '@/valuation/types';

export function makeSnapshot(overrides: Partial<FinancialSnapshot> = {}): FinancialSnapshot {
  return {
    symbol: 'TEST',
    currency: 'USD',
    fiscalYear: null,
    asOf: null,
    revenue: 1000,
    operatingMargin: null,
    depreciationAmortization: null,
    capex: null,
    netWorkingCapital: null,
    stockBasedCompensation: null,
    taxRate: null,
    netDebt: 50,
    sharesOutstanding: 100,
    ...overrides,
  };
}

export function makeAssumptions(overrides: Partial<Assumptions> = {}): Assumptions {
  const sources = mapAssumptionKeys<ProvenanceTag>(() => 'filing');
  return {
    scenario: 'base',
    horizonYears: 5,
    baseYear: null,
    fadeMethod: 'linear',
    marginFadeMethod: 'linear',
    fadeOptions: {},
    startGrowth: 0.2,
    terminalGrowth: 0.03,
    operatingMargin: { start: 0.2, end: 0.2 },
    capexPctRevenue: { start: 0.05, end: 0.05 },
    daPctRevenue: 0.04,
    nwcPctRevenueChange: 0.1,
    sbcPctRevenue: 0,
    taxRate: 0.25,
    wacc: 0.1,
    terminalMethod: 'gordon',
    exitMultiple: 10,
    exitMetric: 'ebit',
    sources,
    confidence: labelAssumptions(sources),
    ...overrides,
  };
}

export function makeYear(overrides: Partial<ProjectedYear> = {}): ProjectedYear {
  return {
    yearIndex: 1,
    label: 'Y1',
    growthRate: 0.1,
    revenue: 1000,
    operatingMargin: 0.2,
    ebit: 200,
    depreciationAmortization: 40,
    ebitda: 240,
    taxes: 50,
    nopat: 150,
    stockBasedCompensation: 0,
    addBacks: 40,
    deltaNwc: 10,
    capex: 50,
    unleveredFcf: 130,
    ...overrides,
  };
}
