/**
 * Base-case assumption derivation
 *
 * Each numeric assumption resolves from the first available source:
 *   1. caller-supplied sourced value
 *   2. snapshot facts (filing)
 *   3. filed history (historical_average)
 *   4. config defaults (industry_norm / fallback_constant)
 *
 * and carries its provenance tag and confidence tier.
 */

import { getYear, isValid, parseISO } from 'date-fns';
import type { ValuationConfig } from '@/core/config';
import { labelAssumptions, mapAssumptionKeys } from './confidence';
import type { AssumptionInput, SourcedValue } from './inputs';
import type { AssumptionKey, Assumptions, FadeOptions, FinancialSnapshot, ProvenanceTag } from './types';
import { computeCostOfCapital } from './wacc';

interface Candidate {
  value: number | null | undefined;
  source: ProvenanceTag;
}

function firstAvailable(
  supplied: SourcedValue | undefined,
  candidates: Candidate[],
  fallback: SourcedValue
): SourcedValue {
  if (supplied && Number.isFinite(supplied.value)) return supplied;
  for (const candidate of candidates) {
    if (candidate.value !== null && candidate.value !== undefined && Number.isFinite(candidate.value)) {
      return { value: candidate.value, source: candidate.source };
    }
  }
  return fallback;
}

function ratioToRevenue(value: number | null, revenue: number): number | null {
  if (value === null || !(revenue > 0)) return null;
  return value / revenue;
}

/**
 * Compound annual growth across the revenue history (oldest first).
 */
export function revenueCagr(history: readonly number[] | undefined): number | null {
  if (!history || history.length < 2) return null;
  const first = history[0];
  const last = history[history.length - 1];
  if (!(first > 0) || !(last > 0)) return null;
  return Math.pow(last / first, 1 / (history.length - 1)) - 1;
}

export function mean(values: readonly number[] | undefined): number | null {
  if (!values || values.length === 0) return null;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

export function resolveBaseYear(snapshot: Pick<FinancialSnapshot, 'fiscalYear' | 'asOf'>): number | null {
  if (snapshot.fiscalYear !== null) return snapshot.fiscalYear;
  if (!snapshot.asOf) return null;
  const asOf = parseISO(snapshot.asOf);
  return isValid(asOf) ? getYear(asOf) : null;
}

export function buildBaseAssumptions(
  snapshot: FinancialSnapshot,
  input: AssumptionInput,
  config: ValuationConfig
): Assumptions {
  const defaults = config.defaults;
  const supplied = input.values ?? {};
  const revenue = snapshot.revenue;

  const taxRate = firstAvailable(
    supplied.taxRate,
    [{ value: snapshot.taxRate, source: 'filing' }],
    { value: defaults.taxRate, source: 'fallback_constant' }
  );
  const operatingMargin = firstAvailable(
    supplied.operatingMargin,
    [
      { value: snapshot.operatingMargin, source: 'filing' },
      { value: mean(snapshot.history?.operatingMargin), source: 'historical_average' },
    ],
    { value: defaults.operatingMargin, source: 'fallback_constant' }
  );
  const capexPctRevenue = firstAvailable(
    supplied.capexPctRevenue,
    [{ value: ratioToRevenue(snapshot.capex, revenue), source: 'filing' }],
    { value: defaults.capexPctRevenue, source: 'fallback_constant' }
  );

  const resolved: Record<AssumptionKey, SourcedValue> = {
    startGrowth: firstAvailable(
      supplied.startGrowth,
      [{ value: revenueCagr(snapshot.history?.revenue), source: 'historical_average' }],
      { value: defaults.startGrowth, source: 'fallback_constant' }
    ),
    terminalGrowth: firstAvailable(supplied.terminalGrowth, [], {
      value: defaults.terminalGrowth,
      source: 'industry_norm',
    }),
    operatingMargin,
    // Steady-state margin and capital intensity default to the starting level
    terminalOperatingMargin: firstAvailable(supplied.terminalOperatingMargin, [], operatingMargin),
    capexPctRevenue,
    terminalCapexPctRevenue: firstAvailable(supplied.terminalCapexPctRevenue, [], capexPctRevenue),
    daPctRevenue: firstAvailable(
      supplied.daPctRevenue,
      [{ value: ratioToRevenue(snapshot.depreciationAmortization, revenue), source: 'filing' }],
      { value: defaults.daPctRevenue, source: 'fallback_constant' }
    ),
    nwcPctRevenueChange: firstAvailable(
      supplied.nwcPctRevenueChange,
      [{ value: ratioToRevenue(snapshot.netWorkingCapital, revenue), source: 'filing' }],
      { value: defaults.nwcPctRevenueChange, source: 'fallback_constant' }
    ),
    sbcPctRevenue: firstAvailable(
      supplied.sbcPctRevenue,
      [{ value: ratioToRevenue(snapshot.stockBasedCompensation, revenue), source: 'filing' }],
      { value: defaults.sbcPctRevenue, source: 'fallback_constant' }
    ),
    taxRate,
    wacc: firstAvailable(supplied.wacc, [], {
      value: computeCostOfCapital({ ...config.capm, taxRate: taxRate.value }).wacc,
      source: 'industry_norm',
    }),
    exitMultiple: firstAvailable(supplied.exitMultiple, [], {
      value: defaults.exitMultiple,
      source: 'industry_norm',
    }),
  };

  const fadeOptions: FadeOptions = {
    decay: input.fadeOptions?.decay ?? defaults.decay ?? undefined,
    midpoint: input.fadeOptions?.midpoint,
    fastShare: input.fadeOptions?.fastShare ?? defaults.fastShare,
  };
  const sources = Object.freeze(mapAssumptionKeys((key) => resolved[key].source));

  const assumptions: Assumptions = {
    scenario: 'base',
    horizonYears: input.horizonYears ?? defaults.horizonYears,
    baseYear: resolveBaseYear(snapshot),
    fadeMethod: input.fadeMethod ?? defaults.fadeMethod,
    marginFadeMethod: input.marginFadeMethod ?? defaults.marginFadeMethod,
    fadeOptions: Object.freeze(fadeOptions),
    startGrowth: resolved.startGrowth.value,
    terminalGrowth: resolved.terminalGrowth.value,
    operatingMargin: Object.freeze({
      start: resolved.operatingMargin.value,
      end: resolved.terminalOperatingMargin.value,
    }),
    capexPctRevenue: Object.freeze({
      start: resolved.capexPctRevenue.value,
      end: resolved.terminalCapexPctRevenue.value,
    }),
    daPctRevenue: resolved.daPctRevenue.value,
    nwcPctRevenueChange: resolved.nwcPctRevenueChange.value,
    sbcPctRevenue: resolved.sbcPctRevenue.value,
    taxRate: resolved.taxRate.value,
    wacc: resolved.wacc.value,
    terminalMethod: input.terminalMethod ?? defaults.terminalMethod,
    exitMultiple: resolved.exitMultiple.value,
    exitMetric: input.exitMetric ?? defaults.exitMetric,
    sources,
    confidence: labelAssumptions(sources),
  };
  return Object.freeze(assumptions);
}
