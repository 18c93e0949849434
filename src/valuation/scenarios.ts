/**
 * Base / Bull / Bear scenarios
 *
 * Bull and Bear are pure delta transformations of the Base assumptions.
 * Each scenario runs validate → forecast → discount on its own inputs; the
 * first failure aborts the whole set.
 */

import type { ScenarioDelta } from '@/core/config';
import { createChildLogger } from '@/utils/logger';
import { labelAssumptions, mapAssumptionKeys } from './confidence';
import { discountForecast } from './discount';
import { buildForecast, materializeDrivers } from './forecast';
import type {
  AssumptionKey,
  Assumptions,
  FinancialSnapshot,
  ProvenanceTag,
  ScenarioName,
  ScenarioSet,
  ValuationResult,
} from './types';
import { validateGrowthPath, validateValuationInputs } from './validator';

const logger = createChildLogger('scenarios');

const DELTA_FIELDS = ['startGrowth', 'operatingMargin', 'wacc', 'terminalGrowth'] as const;

const SHIFTED_KEYS: Record<keyof ScenarioDelta, readonly AssumptionKey[]> = {
  startGrowth: ['startGrowth'],
  operatingMargin: ['operatingMargin', 'terminalOperatingMargin'],
  wacc: ['wacc'],
  terminalGrowth: ['terminalGrowth'],
};

export interface ScenarioDeltas {
  bull: ScenarioDelta;
  bear: ScenarioDelta;
}

export function deriveScenario(
  base: Assumptions,
  scenario: ScenarioName,
  delta: ScenarioDelta
): Assumptions {
  const shifted = new Set<AssumptionKey>();
  for (const field of DELTA_FIELDS) {
    if (delta[field] !== 0) {
      SHIFTED_KEYS[field].forEach((key) => shifted.add(key));
    }
  }

  const sources = Object.freeze(
    mapAssumptionKeys<ProvenanceTag>((key) => (shifted.has(key) ? 'scenario_delta' : base.sources[key]))
  );

  const derived: Assumptions = {
    ...base,
    scenario,
    startGrowth: base.startGrowth + delta.startGrowth,
    terminalGrowth: base.terminalGrowth + delta.terminalGrowth,
    operatingMargin: Object.freeze({
      start: base.operatingMargin.start + delta.operatingMargin,
      end: base.operatingMargin.end + delta.operatingMargin,
    }),
    wacc: base.wacc + delta.wacc,
    sources,
    confidence: labelAssumptions(sources),
  };
  return Object.freeze(derived);
}

export function runScenario(snapshot: FinancialSnapshot, assumptions: Assumptions): ValuationResult {
  validateValuationInputs(snapshot, assumptions);
  const drivers = materializeDrivers(assumptions);
  validateGrowthPath(drivers.growth, assumptions.horizonYears);

  const projected = buildForecast(snapshot, assumptions, drivers);
  const discounted = discountForecast(projected, {
    wacc: assumptions.wacc,
    terminalMethod: assumptions.terminalMethod,
    terminalGrowth: assumptions.terminalGrowth,
    exitMultiple: assumptions.exitMultiple,
    exitMetric: assumptions.exitMetric,
    netDebt: snapshot.netDebt,
    sharesOutstanding: snapshot.sharesOutstanding,
  });

  const result: ValuationResult = {
    scenario: assumptions.scenario,
    ...discounted,
    forecast: Object.freeze(discounted.forecast),
    assumptions,
  };
  return Object.freeze(result);
}

export function runScenarios(
  snapshot: FinancialSnapshot,
  base: Assumptions,
  deltas: ScenarioDeltas
): ScenarioSet {
  const inputs: Record<ScenarioName, Assumptions> = {
    base,
    bull: deriveScenario(base, 'bull', deltas.bull),
    bear: deriveScenario(base, 'bear', deltas.bear),
  };

  const results: Record<ScenarioName, ValuationResult> = {
    base: runScenario(snapshot, inputs.base),
    bull: runScenario(snapshot, inputs.bull),
    bear: runScenario(snapshot, inputs.bear),
  };

  logger.debug(
    {
      symbol: snapshot.symbol,
      base: results.base.valuePerShare,
      bull: results.bull.valuePerShare,
      bear: results.bear.valuePerShare,
    },
    'Scenario values per share'
  );

  return Object.freeze(results);
}
