/**
 * Valuation pipeline
 *
 * snapshot + assumption input
 *   → base assumptions (with provenance & confidence)
 *   → Base/Bull/Bear scenarios
 *   → sensitivity grid around the Base cost of capital and terminal growth
 *   → report with a content fingerprint
 *
 * Pure and synchronous: identical inputs yield an identical report.
 */

import { getValuationConfig, type ValuationConfig } from '@/core/config';
import { contentHash } from '@/core/seed';
import { createChildLogger } from '@/utils/logger';
import { buildBaseAssumptions } from './assumptions';
import type { AssumptionInput } from './inputs';
import { runScenarios } from './scenarios';
import { buildAxis, runSensitivity } from './sensitivity';
import type { FinancialSnapshot, ValuationReport } from './types';

const logger = createChildLogger('valuation-engine');

export interface ValuationOptions {
  config?: ValuationConfig;
  /** Explicit sensitivity axes; built around the Base values from config steps otherwise */
  waccAxis?: readonly number[];
  terminalGrowthAxis?: readonly number[];
}

export function runValuation(
  snapshot: FinancialSnapshot,
  input: AssumptionInput = {},
  options: ValuationOptions = {}
): ValuationReport {
  const config = options.config ?? getValuationConfig();
  logger.info({ symbol: snapshot.symbol, configHash: config.hash }, 'Valuation started');

  const base = buildBaseAssumptions(snapshot, input, config);
  const scenarios = runScenarios(snapshot, base, config.scenarios);

  const { waccStep, terminalGrowthStep, size } = config.sensitivity;
  const sensitivity = runSensitivity(
    scenarios.base,
    options.waccAxis ?? buildAxis(base.wacc, waccStep, size),
    options.terminalGrowthAxis ?? buildAxis(base.terminalGrowth, terminalGrowthStep, size)
  );

  const fingerprint = contentHash({ symbol: snapshot.symbol, scenarios, sensitivity });

  logger.info(
    {
      symbol: snapshot.symbol,
      valuePerShare: scenarios.base.valuePerShare,
      fingerprint: fingerprint.substring(0, 12),
    },
    'Valuation finished'
  );

  return Object.freeze({
    symbol: snapshot.symbol,
    currency: snapshot.currency,
    scenarios,
    sensitivity,
    fingerprint,
  });
}
